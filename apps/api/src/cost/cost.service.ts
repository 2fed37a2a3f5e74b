import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { csiDivisionName } from '@gcpanel/schemas';
import type {
  BudgetLineItem,
  BudgetLineItemView,
  ChangeOrder,
  ChangeOrderStatus,
  CostTotals,
  DivisionPerformance,
} from '@gcpanel/types';
import type {
  BudgetLineItemCreateInput,
  BudgetLineItemListQuery,
  BudgetLineItemUpdateInput,
  ChangeOrderCreateInput,
} from '@gcpanel/validation';
import { v4 as uuidv4 } from 'uuid';

import { Clock } from '../common/clock';
import { SequenceLock } from '../common/sequence-lock.service';
import { ProjectsService } from '../projects/projects.service';
import {
  costTotals,
  divisionPerformance,
  nextChangeOrderNumber,
  toLineItemView,
} from './budget-analysis';
import { CostRepository } from './cost.repository';

function assertKnownDivision(code: string | undefined): void {
  if (code !== undefined && !csiDivisionName(code)) {
    throw new UnprocessableEntityException({
      error: 'ValidationError',
      issues: [{ path: ['csiDivision'], message: `Unknown CSI division "${code}"` }],
    });
  }
}

@Injectable()
export class CostService {
  private readonly logger = new Logger('CostService');

  constructor(
    private readonly repo: CostRepository,
    private readonly projects: ProjectsService,
    private readonly clock: Clock,
    private readonly lock: SequenceLock,
  ) {}

  // --- Budget line items ---

  async createLineItem(
    tenantId: string,
    projectId: string,
    input: BudgetLineItemCreateInput,
  ): Promise<BudgetLineItemView> {
    await this.projects.getOrThrow(tenantId, projectId);
    assertKnownDivision(input.csiDivision);
    const now = this.clock.timestamp();
    const item: BudgetLineItem = {
      id: uuidv4(),
      tenantId,
      projectId,
      ...input,
      createdAt: now,
      updatedAt: now,
    };
    await this.repo.saveLineItem(item);
    return toLineItemView(item);
  }

  async listLineItems(
    tenantId: string,
    projectId: string,
    query: BudgetLineItemListQuery,
  ): Promise<BudgetLineItemView[]> {
    await this.projects.getOrThrow(tenantId, projectId);
    const items = await this.repo.listLineItems(tenantId, projectId);
    return items
      .filter((i) => !query.category || i.category === query.category)
      .filter((i) => !query.status || i.status === query.status)
      .filter((i) => !query.csiDivision || i.csiDivision === query.csiDivision)
      .sort((a, b) => a.costCode.localeCompare(b.costCode))
      .map(toLineItemView);
  }

  async getLineItem(tenantId: string, projectId: string, id: string): Promise<BudgetLineItemView> {
    return toLineItemView(await this.getLineItemOrThrow(tenantId, projectId, id));
  }

  async updateLineItem(
    tenantId: string,
    projectId: string,
    id: string,
    input: BudgetLineItemUpdateInput,
  ): Promise<BudgetLineItemView> {
    const current = await this.getLineItemOrThrow(tenantId, projectId, id);
    assertKnownDivision(input.csiDivision);
    const saved = await this.repo.saveLineItem({
      ...current,
      ...input,
      updatedAt: this.clock.timestamp(),
    });
    return toLineItemView(saved);
  }

  async deleteLineItem(tenantId: string, projectId: string, id: string): Promise<void> {
    await this.getLineItemOrThrow(tenantId, projectId, id);
    await this.repo.deleteLineItem(tenantId, id);
  }

  async totals(tenantId: string, projectId: string): Promise<CostTotals> {
    await this.projects.getOrThrow(tenantId, projectId);
    const [items, orders] = await Promise.all([
      this.repo.listLineItems(tenantId, projectId),
      this.repo.listChangeOrders(tenantId, projectId),
    ]);
    return costTotals(items, orders);
  }

  async divisionPerformance(tenantId: string, projectId: string): Promise<DivisionPerformance[]> {
    await this.projects.getOrThrow(tenantId, projectId);
    const items = await this.repo.listLineItems(tenantId, projectId);
    return divisionPerformance(items, csiDivisionName);
  }

  // --- Change orders ---

  async createChangeOrder(
    tenantId: string,
    projectId: string,
    input: ChangeOrderCreateInput,
  ): Promise<ChangeOrder> {
    await this.projects.getOrThrow(tenantId, projectId);
    return this.lock.run(`change-orders:${tenantId}:${projectId}`, async () => {
      const existing = await this.repo.listChangeOrders(tenantId, projectId);
      const now = this.clock.timestamp();
      const order: ChangeOrder = {
        id: uuidv4(),
        tenantId,
        projectId,
        coNumber: nextChangeOrderNumber(existing, this.clock.now().getUTCFullYear()),
        ...input,
        status: 'pending',
        submittedDate: this.clock.today(),
        createdAt: now,
        updatedAt: now,
      };
      await this.repo.saveChangeOrder(order);
      this.logger.log(`Created ${order.coNumber}`, { tenantId, projectId, amount: order.amount });
      return order;
    });
  }

  async listChangeOrders(tenantId: string, projectId: string): Promise<ChangeOrder[]> {
    await this.projects.getOrThrow(tenantId, projectId);
    const orders = await this.repo.listChangeOrders(tenantId, projectId);
    return orders.sort((a, b) => a.coNumber.localeCompare(b.coNumber, undefined, { numeric: true }));
  }

  async decideChangeOrder(
    tenantId: string,
    projectId: string,
    id: string,
    decision: Exclude<ChangeOrderStatus, 'pending'>,
  ): Promise<ChangeOrder> {
    const order = await this.repo.getChangeOrder(tenantId, projectId, id);
    if (!order) {
      throw new NotFoundException(`Change order ${id} not found`);
    }
    if (order.status !== 'pending') {
      throw new ConflictException(`${order.coNumber} was already ${order.status}`);
    }
    const decided: ChangeOrder = {
      ...order,
      status: decision,
      decidedDate: this.clock.today(),
      updatedAt: this.clock.timestamp(),
    };
    await this.repo.saveChangeOrder(decided);
    this.logger.log(`${order.coNumber} ${decision}`, { tenantId, projectId });
    return decided;
  }

  private async getLineItemOrThrow(tenantId: string, projectId: string, id: string): Promise<BudgetLineItem> {
    const item = await this.repo.getLineItem(tenantId, projectId, id);
    if (!item) {
      throw new NotFoundException(`Budget line item ${id} not found`);
    }
    return item;
  }
}
