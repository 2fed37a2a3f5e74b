import type { TenantRecord } from '@gcpanel/types';

/**
 * Tenant-scoped record store. Every call is confined to one tenant; a record
 * written under one tenant can never be read through another.
 */
export interface EntityStore<T extends TenantRecord> {
  list(tenantId: string): Promise<T[]>;
  get(tenantId: string, id: string): Promise<T | undefined>;
  put(entity: T): Promise<T>;
  /** Resolves `false` when there was nothing to delete. */
  delete(tenantId: string, id: string): Promise<boolean>;
}
