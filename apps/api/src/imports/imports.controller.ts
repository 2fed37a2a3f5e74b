import { Body, Controller, Delete, Get, HttpCode, Param, Post, Query, UseGuards } from '@nestjs/common';
import {
  ImportHistoryQuerySchema,
  ImportListQuerySchema,
  ImportRequestSchema,
} from '@gcpanel/validation';

import type { AuthUser } from '../auth/auth-user';
import { parseOrThrow } from '../common/validation';
import { CurrentTenant, CurrentUser } from '../tenant/tenant.decorator';
import { JwtAuthGuard, TenantGuard } from '../tenant/tenant.guard';
import { ImportsService } from './imports.service';
import { PLATFORM_DATA_TYPES } from './platform-support';

@Controller('imports')
@UseGuards(JwtAuthGuard, TenantGuard)
export class ImportsController {
  constructor(private readonly imports: ImportsService) {}

  @Get('platforms')
  platforms() {
    return PLATFORM_DATA_TYPES;
  }

  @Post()
  @HttpCode(201)
  save(@CurrentTenant() tenantId: string, @CurrentUser() user: AuthUser, @Body() body: unknown) {
    return this.imports.save(tenantId, user.userId, parseOrThrow(ImportRequestSchema, body));
  }

  @Get()
  list(@CurrentTenant() tenantId: string, @Query() query: unknown) {
    return this.imports.list(tenantId, parseOrThrow(ImportListQuerySchema, query));
  }

  @Get('history')
  history(@CurrentTenant() tenantId: string, @Query() query: unknown) {
    const { limit } = parseOrThrow(ImportHistoryQuerySchema, query);
    return this.imports.history(tenantId, limit);
  }

  @Delete(':id')
  @HttpCode(204)
  async remove(@CurrentTenant() tenantId: string, @Param('id') id: string): Promise<void> {
    await this.imports.remove(tenantId, id);
  }
}
