import { Injectable } from '@nestjs/common';
import type { Project } from '@gcpanel/types';

import type { EntityStore } from '../common/persistence/entity-store';
import { StoreFactory } from '../common/persistence/store.factory';

@Injectable()
export class ProjectsRepository {
  private readonly store: EntityStore<Project>;

  constructor(factory: StoreFactory) {
    this.store = factory.create<Project>('projects');
  }

  list(tenantId: string): Promise<Project[]> {
    return this.store.list(tenantId);
  }

  get(tenantId: string, id: string): Promise<Project | undefined> {
    return this.store.get(tenantId, id);
  }

  async findByNumber(tenantId: string, projectNumber: string): Promise<Project | undefined> {
    const projects = await this.store.list(tenantId);
    return projects.find((p) => p.projectNumber === projectNumber);
  }

  save(project: Project): Promise<Project> {
    return this.store.put(project);
  }

  delete(tenantId: string, id: string): Promise<boolean> {
    return this.store.delete(tenantId, id);
  }
}
