import { Injectable } from '@nestjs/common';
import type { BudgetLineItem, ChangeOrder } from '@gcpanel/types';

import type { EntityStore } from '../common/persistence/entity-store';
import { StoreFactory } from '../common/persistence/store.factory';

@Injectable()
export class CostRepository {
  private readonly lineItems: EntityStore<BudgetLineItem>;
  private readonly changeOrders: EntityStore<ChangeOrder>;

  constructor(factory: StoreFactory) {
    this.lineItems = factory.create<BudgetLineItem>('budget_line_items');
    this.changeOrders = factory.create<ChangeOrder>('change_orders');
  }

  async listLineItems(tenantId: string, projectId: string): Promise<BudgetLineItem[]> {
    const items = await this.lineItems.list(tenantId);
    return items.filter((i) => i.projectId === projectId);
  }

  async getLineItem(tenantId: string, projectId: string, id: string): Promise<BudgetLineItem | undefined> {
    const item = await this.lineItems.get(tenantId, id);
    return item?.projectId === projectId ? item : undefined;
  }

  saveLineItem(item: BudgetLineItem): Promise<BudgetLineItem> {
    return this.lineItems.put(item);
  }

  deleteLineItem(tenantId: string, id: string): Promise<boolean> {
    return this.lineItems.delete(tenantId, id);
  }

  async listChangeOrders(tenantId: string, projectId: string): Promise<ChangeOrder[]> {
    const orders = await this.changeOrders.list(tenantId);
    return orders.filter((co) => co.projectId === projectId);
  }

  async getChangeOrder(tenantId: string, projectId: string, id: string): Promise<ChangeOrder | undefined> {
    const order = await this.changeOrders.get(tenantId, id);
    return order?.projectId === projectId ? order : undefined;
  }

  saveChangeOrder(order: ChangeOrder): Promise<ChangeOrder> {
    return this.changeOrders.put(order);
  }
}
