import { Body, Controller, Delete, Get, HttpCode, Param, Patch, Post, Query, UseGuards } from '@nestjs/common';
import {
  DocumentCreateSchema,
  DocumentListQuerySchema,
  DocumentRevisionSchema,
  DocumentStatusUpdateSchema,
} from '@gcpanel/validation';

import { parseOrThrow } from '../common/validation';
import { CurrentTenant } from '../tenant/tenant.decorator';
import { JwtAuthGuard, TenantGuard } from '../tenant/tenant.guard';
import { DocumentsService } from './documents.service';

/**
 * Quotas (per tenant, see RATE_LIMITS): number of registered documents,
 * size of a single document, and total registered storage.
 */
@Controller('projects/:projectId/documents')
@UseGuards(JwtAuthGuard, TenantGuard)
export class DocumentsController {
  constructor(private readonly documents: DocumentsService) {}

  @Post()
  @HttpCode(201)
  register(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string, @Body() body: unknown) {
    return this.documents.register(tenantId, projectId, parseOrThrow(DocumentCreateSchema, body));
  }

  @Get()
  list(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string, @Query() query: unknown) {
    return this.documents.list(tenantId, projectId, parseOrThrow(DocumentListQuerySchema, query));
  }

  @Get(':id')
  get(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string, @Param('id') id: string) {
    return this.documents.get(tenantId, projectId, id);
  }

  @Patch(':id/status')
  updateStatus(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Param('id') id: string,
    @Body() body: unknown,
  ) {
    const { status } = parseOrThrow(DocumentStatusUpdateSchema, body);
    return this.documents.updateStatus(tenantId, projectId, id, status);
  }

  @Post(':id/revisions')
  @HttpCode(201)
  revise(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Param('id') id: string,
    @Body() body: unknown,
  ) {
    return this.documents.revise(tenantId, projectId, id, parseOrThrow(DocumentRevisionSchema, body));
  }

  @Delete(':id')
  @HttpCode(204)
  async remove(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Param('id') id: string,
  ): Promise<void> {
    await this.documents.remove(tenantId, projectId, id);
  }
}
