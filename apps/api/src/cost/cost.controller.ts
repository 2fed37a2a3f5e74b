import { Body, Controller, Delete, Get, HttpCode, Param, Patch, Post, Query, UseGuards } from '@nestjs/common';
import { CSI_DIVISIONS } from '@gcpanel/schemas';
import {
  BudgetLineItemCreateSchema,
  BudgetLineItemListQuerySchema,
  BudgetLineItemUpdateSchema,
  ChangeOrderCreateSchema,
} from '@gcpanel/validation';

import { parseOrThrow } from '../common/validation';
import { CurrentTenant } from '../tenant/tenant.decorator';
import { JwtAuthGuard, TenantGuard } from '../tenant/tenant.guard';
import { CostService } from './cost.service';

@Controller('projects/:projectId/cost')
@UseGuards(JwtAuthGuard, TenantGuard)
export class CostController {
  constructor(private readonly cost: CostService) {}

  @Post('line-items')
  @HttpCode(201)
  createLineItem(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Body() body: unknown,
  ) {
    return this.cost.createLineItem(tenantId, projectId, parseOrThrow(BudgetLineItemCreateSchema, body));
  }

  @Get('line-items')
  listLineItems(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Query() query: unknown,
  ) {
    return this.cost.listLineItems(tenantId, projectId, parseOrThrow(BudgetLineItemListQuerySchema, query));
  }

  @Get('line-items/:id')
  getLineItem(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string, @Param('id') id: string) {
    return this.cost.getLineItem(tenantId, projectId, id);
  }

  @Patch('line-items/:id')
  updateLineItem(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Param('id') id: string,
    @Body() body: unknown,
  ) {
    return this.cost.updateLineItem(tenantId, projectId, id, parseOrThrow(BudgetLineItemUpdateSchema, body));
  }

  @Delete('line-items/:id')
  @HttpCode(204)
  async deleteLineItem(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Param('id') id: string,
  ): Promise<void> {
    await this.cost.deleteLineItem(tenantId, projectId, id);
  }

  @Get('totals')
  totals(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string) {
    return this.cost.totals(tenantId, projectId);
  }

  @Get('divisions')
  divisionPerformance(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string) {
    return this.cost.divisionPerformance(tenantId, projectId);
  }

  @Post('change-orders')
  @HttpCode(201)
  createChangeOrder(
    @CurrentTenant() tenantId: string,
    @Param('projectId') projectId: string,
    @Body() body: unknown,
  ) {
    return this.cost.createChangeOrder(tenantId, projectId, parseOrThrow(ChangeOrderCreateSchema, body));
  }

  @Get('change-orders')
  listChangeOrders(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string) {
    return this.cost.listChangeOrders(tenantId, projectId);
  }

  @Post('change-orders/:id/approve')
  @HttpCode(200)
  approve(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string, @Param('id') id: string) {
    return this.cost.decideChangeOrder(tenantId, projectId, id, 'approved');
  }

  @Post('change-orders/:id/reject')
  @HttpCode(200)
  reject(@CurrentTenant() tenantId: string, @Param('projectId') projectId: string, @Param('id') id: string) {
    return this.cost.decideChangeOrder(tenantId, projectId, id, 'rejected');
  }
}

/** MasterFormat catalog used to code budget lines. */
@Controller('csi-divisions')
@UseGuards(JwtAuthGuard, TenantGuard)
export class CsiDivisionsController {
  @Get()
  list() {
    return CSI_DIVISIONS;
  }
}
