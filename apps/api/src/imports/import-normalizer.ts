import type {
  ImportDataType,
  ImportedDataItem,
  ImportedPayload,
  JsonObject,
  JsonValue,
} from '@gcpanel/types';

export const SUMMARY_ITEM_TYPE = 'summary';

/** Raised when an import payload is neither a record list nor an items/tasks envelope. */
export class UnsupportedImportShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedImportShapeError';
  }
}

export interface NormalizedImport {
  items: ImportedDataItem[];
  /** Records stored, not counting a summary. */
  itemCount: number;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: JsonObject, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function externalId(record: JsonObject): string | undefined {
  const value = record.id;
  return typeof value === 'string' || typeof value === 'number' ? String(value) : undefined;
}

/**
 * Splits a platform payload into stored items. Accepts a list of records, a
 * budget envelope `{ items, summary? }` or a schedule envelope `{ tasks, summary? }`.
 * Entries that are not JSON objects are skipped.
 */
export function normalizeImport(datasetId: string, data: JsonValue): NormalizedImport {
  const items: ImportedDataItem[] = [];
  const push = (item: Omit<ImportedDataItem, 'id' | 'datasetId'>) =>
    items.push({ id: `${datasetId}-${items.length + 1}`, datasetId, ...item });

  if (Array.isArray(data)) {
    for (const record of data.filter(isJsonObject)) {
      push({
        externalId: externalId(record),
        itemType: stringField(record, 'type'),
        name: stringField(record, 'name'),
        data: record,
      });
    }
    return { items, itemCount: items.length };
  }

  if (!isJsonObject(data)) {
    throw new UnsupportedImportShapeError('Import data must be a list of records or an object envelope');
  }

  let itemType: string;
  let records: JsonValue[];
  let summaryName: string;
  const envelopeItems = data.items;
  const envelopeTasks = data.tasks;
  if (Array.isArray(envelopeItems)) {
    itemType = 'budget_item';
    records = envelopeItems;
    summaryName = 'Budget Summary';
  } else if (Array.isArray(envelopeTasks)) {
    itemType = 'schedule_task';
    records = envelopeTasks;
    summaryName = 'Schedule Summary';
  } else {
    throw new UnsupportedImportShapeError('Import object must carry an "items" or "tasks" list');
  }

  for (const record of records.filter(isJsonObject)) {
    push({
      externalId: externalId(record),
      itemType,
      name:
        itemType === 'budget_item'
          ? stringField(record, 'category') ?? stringField(record, 'name')
          : stringField(record, 'name'),
      data: record,
    });
  }
  const itemCount = items.length;

  const summary = data.summary;
  if (isJsonObject(summary)) {
    push({ itemType: SUMMARY_ITEM_TYPE, name: summaryName, data: summary });
  }

  return { items, itemCount };
}

/** Rebuilds the payload shape a client imported, from stored items. */
export function rebuildPayload(dataType: ImportDataType, items: ImportedDataItem[]): ImportedPayload {
  const summary = items.find((i) => i.itemType === SUMMARY_ITEM_TYPE)?.data ?? {};
  const records = items.filter((i) => i.itemType !== SUMMARY_ITEM_TYPE).map((i) => i.data);

  if (dataType === 'budget') {
    return { items: records, summary };
  }
  if (dataType === 'schedule') {
    return { tasks: records, summary };
  }
  return items.map((i) => i.data);
}
