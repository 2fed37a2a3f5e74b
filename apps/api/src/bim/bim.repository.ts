import { Injectable } from '@nestjs/common';
import type { BimElement, Clash, WorkInPlaceItem } from '@gcpanel/types';

import type { EntityStore } from '../common/persistence/entity-store';
import { StoreFactory } from '../common/persistence/store.factory';

async function inProject<T extends { projectId: string }>(
  records: Promise<T[]>,
  projectId: string,
): Promise<T[]> {
  return (await records).filter((r) => r.projectId === projectId);
}

/** Model elements, detected clashes and work-in-place tracking for a project. */
@Injectable()
export class BimRepository {
  private readonly elements: EntityStore<BimElement>;
  private readonly clashes: EntityStore<Clash>;
  private readonly work: EntityStore<WorkInPlaceItem>;

  constructor(factory: StoreFactory) {
    this.elements = factory.create<BimElement>('bim_elements');
    this.clashes = factory.create<Clash>('clashes');
    this.work = factory.create<WorkInPlaceItem>('work_in_place');
  }

  listElements(tenantId: string, projectId: string): Promise<BimElement[]> {
    return inProject(this.elements.list(tenantId), projectId);
  }

  async getElement(tenantId: string, projectId: string, id: string): Promise<BimElement | undefined> {
    const element = await this.elements.get(tenantId, id);
    return element?.projectId === projectId ? element : undefined;
  }

  saveElement(element: BimElement): Promise<BimElement> {
    return this.elements.put(element);
  }

  listClashes(tenantId: string, projectId: string): Promise<Clash[]> {
    return inProject(this.clashes.list(tenantId), projectId);
  }

  async getClash(tenantId: string, projectId: string, id: string): Promise<Clash | undefined> {
    const clash = await this.clashes.get(tenantId, id);
    return clash?.projectId === projectId ? clash : undefined;
  }

  saveClash(clash: Clash): Promise<Clash> {
    return this.clashes.put(clash);
  }

  listWork(tenantId: string, projectId: string): Promise<WorkInPlaceItem[]> {
    return inProject(this.work.list(tenantId), projectId);
  }

  async getWork(tenantId: string, projectId: string, id: string): Promise<WorkInPlaceItem | undefined> {
    const item = await this.work.get(tenantId, id);
    return item?.projectId === projectId ? item : undefined;
  }

  saveWork(item: WorkInPlaceItem): Promise<WorkInPlaceItem> {
    return this.work.put(item);
  }
}
