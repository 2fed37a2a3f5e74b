import { Injectable } from '@nestjs/common';
import type { Rfi } from '@gcpanel/types';

import type { EntityStore } from '../common/persistence/entity-store';
import { StoreFactory } from '../common/persistence/store.factory';

@Injectable()
export class RfiRepository {
  private readonly store: EntityStore<Rfi>;

  constructor(factory: StoreFactory) {
    this.store = factory.create<Rfi>('rfis');
  }

  async listByProject(tenantId: string, projectId: string): Promise<Rfi[]> {
    const rfis = await this.store.list(tenantId);
    return rfis.filter((r) => r.projectId === projectId);
  }

  async get(tenantId: string, projectId: string, id: string): Promise<Rfi | undefined> {
    const rfi = await this.store.get(tenantId, id);
    return rfi && rfi.projectId === projectId ? rfi : undefined;
  }

  save(rfi: Rfi): Promise<Rfi> {
    return this.store.put(rfi);
  }
}
