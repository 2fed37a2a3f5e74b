import type { TenantRecord } from '@gcpanel/types';

import type { FirebaseAdminService } from '../../firebase/firebase-admin.service';
import type { EntityStore } from './entity-store';

/** Stores records at `tenants/{tenantId}/{collection}/{id}`. */
export class FirestoreEntityStore<T extends TenantRecord> implements EntityStore<T> {
  constructor(
    private readonly firebase: FirebaseAdminService,
    private readonly collection: string,
  ) {}

  private collectionRef(tenantId: string) {
    return this.firebase.firestore
      .collection('tenants')
      .doc(tenantId)
      .collection(this.collection);
  }

  async list(tenantId: string): Promise<T[]> {
    const snapshot = await this.collectionRef(tenantId).get();
    return snapshot.docs.map((doc) => doc.data() as T);
  }

  async get(tenantId: string, id: string): Promise<T | undefined> {
    const doc = await this.collectionRef(tenantId).doc(id).get();
    return doc.exists ? (doc.data() as T) : undefined;
  }

  async put(entity: T): Promise<T> {
    await this.collectionRef(entity.tenantId).doc(entity.id).set(entity);
    return entity;
  }

  async delete(tenantId: string, id: string): Promise<boolean> {
    const ref = this.collectionRef(tenantId).doc(id);
    const doc = await ref.get();
    if (!doc.exists) {
      return false;
    }
    await ref.delete();
    return true;
  }
}
