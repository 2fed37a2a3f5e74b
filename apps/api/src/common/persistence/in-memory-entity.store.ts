import type { TenantRecord } from '@gcpanel/types';

import type { EntityStore } from './entity-store';

export class InMemoryEntityStore<T extends TenantRecord> implements EntityStore<T> {
  private readonly tenants = new Map<string, Map<string, T>>();

  private bucket(tenantId: string): Map<string, T> {
    let bucket = this.tenants.get(tenantId);
    if (!bucket) {
      bucket = new Map<string, T>();
      this.tenants.set(tenantId, bucket);
    }
    return bucket;
  }

  // Copies in and out, so callers cannot mutate stored state without a put().
  async list(tenantId: string): Promise<T[]> {
    return [...this.bucket(tenantId).values()].map((entity) => structuredClone(entity));
  }

  async get(tenantId: string, id: string): Promise<T | undefined> {
    const entity = this.bucket(tenantId).get(id);
    return entity ? structuredClone(entity) : undefined;
  }

  async put(entity: T): Promise<T> {
    this.bucket(entity.tenantId).set(entity.id, structuredClone(entity));
    return entity;
  }

  async delete(tenantId: string, id: string): Promise<boolean> {
    return this.bucket(tenantId).delete(id);
  }
}
