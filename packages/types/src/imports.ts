import type { JsonObject } from './common';

export type ImportPlatform = 'procore' | 'plangrid' | 'fieldwire' | 'buildingconnected';

export type ImportDataType =
  | 'documents'
  | 'specifications'
  | 'bids'
  | 'daily_reports'
  | 'budget'
  | 'schedule'
  | 'incidents';

export type ImportMethod = 'merge' | 'replace';

/** Where a dataset ended up: the configured store, or the in-process fallback. */
export type ImportStorage = 'primary' | 'fallback';

export interface ImportedDataItem {
  id: string;
  datasetId: string;
  externalId?: string;
  itemType?: string;
  name?: string;
  data: JsonObject;
}

export interface ImportedDataset {
  id: string;
  tenantId: string;
  platform: ImportPlatform;
  dataType: ImportDataType;
  importDate: string;
  itemCount: number;
  importMethod: ImportMethod;
  status: 'complete';
  userId?: string;
  storage: ImportStorage;
  items: ImportedDataItem[];
}

/** Dataset header as stored, without its items. */
export type ImportedDatasetRecord = Omit<ImportedDataset, 'items'>;

export type ImportedPayload =
  | JsonObject[]
  | { items: JsonObject[]; summary: JsonObject }
  | { tasks: JsonObject[]; summary: JsonObject };

export interface ImportedDatasetView extends ImportedDatasetRecord {
  data: ImportedPayload;
}

export interface ImportHistoryRow {
  id: string;
  platform: ImportPlatform;
  dataType: ImportDataType;
  importDate: string;
  itemCount: number;
  importMethod: ImportMethod;
  status: 'complete';
}
