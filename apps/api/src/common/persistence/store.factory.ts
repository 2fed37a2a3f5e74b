import { Injectable, Logger } from '@nestjs/common';
import type { TenantRecord } from '@gcpanel/types';

import { FirebaseAdminService } from '../../firebase/firebase-admin.service';
import { persistenceDriver, type PersistenceDriver } from '../config';
import type { EntityStore } from './entity-store';
import { FirestoreEntityStore } from './firestore-entity.store';
import { InMemoryEntityStore } from './in-memory-entity.store';

/** Hands each repository a store for its collection, backed by the configured driver. */
@Injectable()
export class StoreFactory {
  private readonly logger = new Logger('StoreFactory');
  readonly driver: PersistenceDriver = persistenceDriver();

  constructor(private readonly firebase: FirebaseAdminService) {}

  create<T extends TenantRecord>(collection: string): EntityStore<T> {
    this.logger.log(`Using ${this.driver} store for "${collection}"`);
    if (this.driver === 'firestore') {
      return new FirestoreEntityStore<T>(this.firebase, collection);
    }
    return new InMemoryEntityStore<T>();
  }
}
