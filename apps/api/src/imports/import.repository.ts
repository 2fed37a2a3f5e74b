import { Injectable, Logger } from '@nestjs/common';
import type {
  ImportDataType,
  ImportedDataItem,
  ImportedDataset,
  ImportedDatasetRecord,
  ImportPlatform,
} from '@gcpanel/types';

import type { Query } from 'firebase-admin/firestore';

import type { FirebaseAdminService } from '../firebase/firebase-admin.service';

export const IMPORT_REPOSITORY = Symbol('IMPORT_REPOSITORY');
export const FALLBACK_IMPORT_REPOSITORY = Symbol('FALLBACK_IMPORT_REPOSITORY');

export interface DatasetFilter {
  platform?: ImportPlatform;
  dataType?: ImportDataType;
}

export interface ImportRepository {
  save(dataset: ImportedDataset): Promise<void>;
  listDatasets(tenantId: string, filter: DatasetFilter): Promise<ImportedDatasetRecord[]>;
  getItems(tenantId: string, datasetId: string): Promise<ImportedDataItem[]>;
  /** Removes a dataset with its items; `false` when it was not stored here. */
  delete(tenantId: string, datasetId: string): Promise<boolean>;
  deleteMatching(tenantId: string, platform: ImportPlatform, dataType: ImportDataType): Promise<number>;
}

function matches(record: ImportedDatasetRecord, filter: DatasetFilter): boolean {
  return (
    (!filter.platform || record.platform === filter.platform) &&
    (!filter.dataType || record.dataType === filter.dataType)
  );
}

@Injectable()
export class InMemoryImportRepository implements ImportRepository {
  private readonly tenants = new Map<string, Map<string, ImportedDataset>>();

  private bucket(tenantId: string): Map<string, ImportedDataset> {
    let bucket = this.tenants.get(tenantId);
    if (!bucket) {
      bucket = new Map<string, ImportedDataset>();
      this.tenants.set(tenantId, bucket);
    }
    return bucket;
  }

  async save(dataset: ImportedDataset): Promise<void> {
    this.bucket(dataset.tenantId).set(dataset.id, structuredClone(dataset));
  }

  async listDatasets(tenantId: string, filter: DatasetFilter): Promise<ImportedDatasetRecord[]> {
    return [...this.bucket(tenantId).values()]
      .filter((d) => matches(d, filter))
      .map(({ items: _items, ...record }) => record);
  }

  async getItems(tenantId: string, datasetId: string): Promise<ImportedDataItem[]> {
    const dataset = this.bucket(tenantId).get(datasetId);
    return dataset ? structuredClone(dataset.items) : [];
  }

  async delete(tenantId: string, datasetId: string): Promise<boolean> {
    return this.bucket(tenantId).delete(datasetId);
  }

  async deleteMatching(tenantId: string, platform: ImportPlatform, dataType: ImportDataType): Promise<number> {
    const bucket = this.bucket(tenantId);
    let removed = 0;
    for (const [id, dataset] of bucket) {
      if (dataset.platform === platform && dataset.dataType === dataType) {
        bucket.delete(id);
        removed++;
      }
    }
    return removed;
  }
}

// Firestore caps a write batch at 500 operations.
const BATCH_LIMIT = 450;

export type DatasetWrite =
  | { kind: 'item'; item: ImportedDataItem }
  | { kind: 'header'; record: ImportedDatasetRecord };

/**
 * Splits a dataset into write batches of at most `limit` operations. The
 * header is the final write of the final batch, so it commits atomically with
 * the last items and a listed dataset always has all of them.
 */
export function datasetWriteBatches(dataset: ImportedDataset, limit = BATCH_LIMIT): DatasetWrite[][] {
  const { items, ...record } = dataset;
  const writes: DatasetWrite[] = items.map((item): DatasetWrite => ({ kind: 'item', item }));
  writes.push({ kind: 'header', record });
  const batches: DatasetWrite[][] = [];
  for (let start = 0; start < writes.length; start += limit) {
    batches.push(writes.slice(start, start + limit));
  }
  return batches;
}

/**
 * Commits batches in order. When a later batch fails, `rollback` removes what
 * the earlier ones wrote before the failure propagates.
 */
export async function commitBatches<T>(
  batches: T[],
  commit: (batch: T) => Promise<void>,
  rollback: () => Promise<void>,
): Promise<void> {
  let committed = 0;
  try {
    for (const batch of batches) {
      await commit(batch);
      committed++;
    }
  } catch (err) {
    if (committed > 0) {
      await rollback();
    }
    throw err;
  }
}

/**
 * Datasets at `tenants/{tenantId}/imported_datasets/{id}`, their items in an
 * `items` sub-collection beneath each dataset.
 */
export class FirestoreImportRepository implements ImportRepository {
  private readonly logger = new Logger('FirestoreImportRepository');

  constructor(private readonly firebase: FirebaseAdminService) {}

  private datasets(tenantId: string) {
    return this.firebase.firestore.collection('tenants').doc(tenantId).collection('imported_datasets');
  }

  async save(dataset: ImportedDataset): Promise<void> {
    const firestore = this.firebase.firestore;
    const ref = this.datasets(dataset.tenantId).doc(dataset.id);
    await commitBatches(
      datasetWriteBatches(dataset),
      async (writes) => {
        const batch = firestore.batch();
        for (const write of writes) {
          if (write.kind === 'header') {
            batch.set(ref, write.record);
          } else {
            batch.set(ref.collection('items').doc(write.item.id), write.item);
          }
        }
        await batch.commit();
      },
      async () => {
        this.logger.warn(`Removing partially written dataset ${dataset.id}`, { tenantId: dataset.tenantId });
        await firestore.recursiveDelete(ref);
      },
    );
  }

  async listDatasets(tenantId: string, filter: DatasetFilter): Promise<ImportedDatasetRecord[]> {
    let query: Query = this.datasets(tenantId);
    if (filter.platform) {
      query = query.where('platform', '==', filter.platform);
    }
    if (filter.dataType) {
      query = query.where('dataType', '==', filter.dataType);
    }
    const snapshot = await query.get();
    return snapshot.docs.map((doc) => doc.data() as ImportedDatasetRecord);
  }

  async getItems(tenantId: string, datasetId: string): Promise<ImportedDataItem[]> {
    const snapshot = await this.datasets(tenantId).doc(datasetId).collection('items').get();
    return snapshot.docs.map((doc) => doc.data() as ImportedDataItem);
  }

  async delete(tenantId: string, datasetId: string): Promise<boolean> {
    const ref = this.datasets(tenantId).doc(datasetId);
    const doc = await ref.get();
    if (!doc.exists) {
      return false;
    }
    await this.firebase.firestore.recursiveDelete(ref);
    return true;
  }

  async deleteMatching(tenantId: string, platform: ImportPlatform, dataType: ImportDataType): Promise<number> {
    const snapshot = await this.datasets(tenantId)
      .where('platform', '==', platform)
      .where('dataType', '==', dataType)
      .get();
    for (const doc of snapshot.docs) {
      await this.firebase.firestore.recursiveDelete(doc.ref);
    }
    return snapshot.size;
  }
}
