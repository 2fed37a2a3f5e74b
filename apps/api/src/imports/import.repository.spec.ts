import type { ImportedDataItem, ImportedDataset } from '@gcpanel/types';

import { commitBatches, datasetWriteBatches, type DatasetWrite } from './import.repository';

function dataset(itemCount: number): ImportedDataset {
  const items: ImportedDataItem[] = Array.from({ length: itemCount }, (_, i) => ({
    id: `item-${i + 1}`,
    datasetId: 'ds-1',
    data: { n: i + 1 },
  }));
  return {
    id: 'ds-1',
    tenantId: 't1',
    platform: 'procore',
    dataType: 'documents',
    importDate: '2025-03-10T09:00:00.000Z',
    itemCount,
    importMethod: 'merge',
    status: 'complete',
    storage: 'primary',
    items,
  };
}

const describeWrite = (w: DatasetWrite) => (w.kind === 'header' ? 'header' : w.item.id);

describe('datasetWriteBatches', () => {
  it('puts the header in the final batch with the last items', () => {
    const batches = datasetWriteBatches(dataset(5), 2);
    expect(batches.map((b) => b.map(describeWrite))).toEqual([
      ['item-1', 'item-2'],
      ['item-3', 'item-4'],
      ['item-5', 'header'],
    ]);
  });

  it('gives the header a batch of its own when the items fill the last one', () => {
    const batches = datasetWriteBatches(dataset(4), 2);
    expect(batches.map((b) => b.map(describeWrite))).toEqual([
      ['item-1', 'item-2'],
      ['item-3', 'item-4'],
      ['header'],
    ]);
  });

  it('stores the header without its items', () => {
    const [[header]] = datasetWriteBatches(dataset(0));
    expect(header).toEqual({
      kind: 'header',
      record: {
        id: 'ds-1',
        tenantId: 't1',
        platform: 'procore',
        dataType: 'documents',
        importDate: '2025-03-10T09:00:00.000Z',
        itemCount: 0,
        importMethod: 'merge',
        status: 'complete',
        storage: 'primary',
      },
    });
  });
});

describe('commitBatches', () => {
  it('commits every batch in order', async () => {
    const committed: number[] = [];
    const rollback = jest.fn(async () => undefined);

    await commitBatches(
      [1, 2, 3],
      async (n) => {
        committed.push(n);
      },
      rollback,
    );

    expect(committed).toEqual([1, 2, 3]);
    expect(rollback).not.toHaveBeenCalled();
  });

  it('rolls back earlier batches when a later one fails', async () => {
    const rollback = jest.fn(async () => undefined);
    const commit = jest.fn(async (n: number) => {
      if (n === 2) {
        throw new Error('deadline exceeded');
      }
    });

    await expect(commitBatches([1, 2, 3], commit, rollback)).rejects.toThrow('deadline exceeded');
    expect(commit).toHaveBeenCalledTimes(2);
    expect(rollback).toHaveBeenCalledTimes(1);
  });

  it('leaves nothing to roll back when the first batch fails', async () => {
    const rollback = jest.fn(async () => undefined);

    await expect(
      commitBatches(
        [1],
        async () => {
          throw new Error('permission denied');
        },
        rollback,
      ),
    ).rejects.toThrow('permission denied');
    expect(rollback).not.toHaveBeenCalled();
  });
});
