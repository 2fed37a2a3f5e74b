import { Body, Controller, Get, HttpCode, Param, Patch, Post, Query, UseGuards } from '@nestjs/common';
import {
  RfiCreateSchema,
  RfiListQuerySchema,
  RfiResponseSchema,
  RfiUpdateSchema,
} from '@gcpanel/validation';

import { parseOrThrow } from '../common/validation';
import { CurrentTenant } from '../tenant/tenant.decorator';
import { JwtAuthGuard, TenantGuard } from '../tenant/tenant.guard';
import { RfiService } from './rfi.service';

@Controller('projects/:projectId/rfis')
@UseGuards(JwtAuthGuard, TenantGuard)
export class RfiController {
  constructor(private readonly rfis: RfiService) {}

  @Post()
  @HttpCode(201)
  create(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string, @Body() body: unknown) {
    return this.rfis.create(tenantId, projectId, parseOrThrow(RfiCreateSchema, body));
  }

  @Get()
  list(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string, @Query() query: unknown) {
    return this.rfis.list(tenantId, projectId, parseOrThrow(RfiListQuerySchema, query));
  }

  // Declared before ':id' so "metrics" is not taken for an RFI id.
  @Get('metrics')
  metrics(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string) {
    return this.rfis.metrics(tenantId, projectId);
  }

  @Get(':id')
  get(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string, @Param('id') id: string) {
    return this.rfis.get(tenantId, projectId, id);
  }

  @Patch(':id')
  update(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Param('id') id: string,
    @Body() body: unknown,
  ) {
    return this.rfis.update(tenantId, projectId, id, parseOrThrow(RfiUpdateSchema, body));
  }

  @Post(':id/submit')
  @HttpCode(200)
  submit(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string, @Param('id') id: string) {
    return this.rfis.submit(tenantId, projectId, id);
  }

  @Post(':id/responses')
  @HttpCode(201)
  respond(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Param('id') id: string,
    @Body() body: unknown,
  ) {
    return this.rfis.addResponse(tenantId, projectId, id, parseOrThrow(RfiResponseSchema, body));
  }

  @Post(':id/close')
  @HttpCode(200)
  close(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string, @Param('id') id: string) {
    return this.rfis.close(tenantId, projectId, id);
  }
}
