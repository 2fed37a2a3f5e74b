import { Injectable } from '@nestjs/common';
import type { ProjectDocument } from '@gcpanel/types';

import type { EntityStore } from '../common/persistence/entity-store';
import { StoreFactory } from '../common/persistence/store.factory';

@Injectable()
export class DocumentsRepository {
  private readonly store: EntityStore<ProjectDocument>;

  constructor(factory: StoreFactory) {
    this.store = factory.create<ProjectDocument>('documents');
  }

  /** Every document the tenant has registered, across projects; quotas are counted over this. */
  listByTenant(tenantId: string): Promise<ProjectDocument[]> {
    return this.store.list(tenantId);
  }

  async listByProject(tenantId: string, projectId: string): Promise<ProjectDocument[]> {
    const documents = await this.store.list(tenantId);
    return documents.filter((d) => d.projectId === projectId);
  }

  async get(tenantId: string, projectId: string, id: string): Promise<ProjectDocument | undefined> {
    const document = await this.store.get(tenantId, id);
    return document?.projectId === projectId ? document : undefined;
  }

  save(document: ProjectDocument): Promise<ProjectDocument> {
    return this.store.put(document);
  }

  delete(tenantId: string, id: string): Promise<boolean> {
    return this.store.delete(tenantId, id);
  }
}
