import { Body, Controller, Get, HttpCode, Param, Patch, Post, Query, UseGuards } from '@nestjs/common';
import {
  BimElementCreateSchema,
  ClashDetectionOptionsSchema,
  ClashListQuerySchema,
  ClashUpdateSchema,
  ElementListQuerySchema,
  ElementStatusUpdateSchema,
  WorkItemCreateSchema,
  WorkProgressSchema,
} from '@gcpanel/validation';

import { parseOrThrow } from '../common/validation';
import { CurrentTenant } from '../tenant/tenant.decorator';
import { JwtAuthGuard, TenantGuard } from '../tenant/tenant.guard';
import { BimService } from './bim.service';

@Controller('projects/:projectId/bim')
@UseGuards(JwtAuthGuard, TenantGuard)
export class BimController {
  constructor(private readonly bim: BimService) {}

  @Post('elements')
  @HttpCode(201)
  createElement(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Body() body: unknown,
  ) {
    return this.bim.createElement(tenantId, projectId, parseOrThrow(BimElementCreateSchema, body));
  }

  @Get('elements')
  listElements(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Query() query: unknown,
  ) {
    return this.bim.listElements(tenantId, projectId, parseOrThrow(ElementListQuerySchema, query));
  }

  @Get('elements/:id')
  getElement(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string, @Param('id') id: string) {
    return this.bim.getElement(tenantId, projectId, id);
  }

  @Patch('elements/:id/status')
  updateElementStatus(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Param('id') id: string,
    @Body() body: unknown,
  ) {
    const { status } = parseOrThrow(ElementStatusUpdateSchema, body);
    return this.bim.updateElementStatus(tenantId, projectId, id, status);
  }

  @Post('clash-detection')
  @HttpCode(200)
  detectClashes(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Body() body: unknown,
  ) {
    return this.bim.detectClashes(tenantId, projectId, parseOrThrow(ClashDetectionOptionsSchema, body ?? {}));
  }

  @Get('clashes')
  listClashes(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Query() query: unknown,
  ) {
    return this.bim.listClashes(tenantId, projectId, parseOrThrow(ClashListQuerySchema, query));
  }

  @Get('clashes/statistics')
  clashStatistics(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string) {
    return this.bim.clashStatistics(tenantId, projectId);
  }

  @Patch('clashes/:id')
  updateClash(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Param('id') id: string,
    @Body() body: unknown,
  ) {
    return this.bim.updateClash(tenantId, projectId, id, parseOrThrow(ClashUpdateSchema, body));
  }

  @Post('work')
  @HttpCode(201)
  createWorkItem(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Body() body: unknown,
  ) {
    return this.bim.createWorkItem(tenantId, projectId, parseOrThrow(WorkItemCreateSchema, body));
  }

  @Get('work')
  listWork(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string) {
    return this.bim.listWork(tenantId, projectId);
  }

  @Get('work/summary')
  workSummary(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string) {
    return this.bim.workSummary(tenantId, projectId);
  }

  @Patch('work/:id/progress')
  updateProgress(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Param('id') id: string,
    @Body() body: unknown,
  ) {
    return this.bim.updateProgress(tenantId, projectId, id, parseOrThrow(WorkProgressSchema, body));
  }

  @Get('analytics/systems')
  systemAnalytics(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string) {
    return this.bim.systemAnalytics(tenantId, projectId);
  }

  @Get('export')
  exportProject(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string) {
    return this.bim.exportProject(tenantId, projectId);
  }
}
