import { Body, Controller, Delete, Get, HttpCode, Param, Patch, Post, UseGuards } from '@nestjs/common';
import { ProjectCreateSchema, ProjectUpdateSchema } from '@gcpanel/validation';

import { parseOrThrow } from '../common/validation';
import { CurrentTenant } from '../tenant/tenant.decorator';
import { JwtAuthGuard, TenantGuard } from '../tenant/tenant.guard';
import { ProjectsService } from './projects.service';

@Controller('projects')
@UseGuards(JwtAuthGuard, TenantGuard)
export class ProjectsController {
  constructor(private readonly projects: ProjectsService) {}

  @Post()
  @HttpCode(201)
  create(@CurrentTenant() tenantId: string, @Body() body: unknown) {
    return this.projects.create(tenantId, parseOrThrow(ProjectCreateSchema, body));
  }

  @Get()
  list(@CurrentTenant() tenantId: string) {
    return this.projects.list(tenantId);
  }

  @Get(':id')
  get(@CurrentTenant() tenantId: string, @Param('id') id: string) {
    return this.projects.getOrThrow(tenantId, id);
  }

  @Patch(':id')
  update(@CurrentTenant() tenantId: string, @Param('id') id: string, @Body() body: unknown) {
    return this.projects.update(tenantId, id, parseOrThrow(ProjectUpdateSchema, body));
  }

  @Delete(':id')
  @HttpCode(204)
  async remove(@CurrentTenant() tenantId: string, @Param('id') id: string): Promise<void> {
    await this.projects.remove(tenantId, id);
  }
}
