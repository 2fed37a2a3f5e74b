import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import type {
  ImportedDataItem,
  ImportedDataset,
  ImportedDatasetRecord,
  ImportedDatasetView,
  ImportHistoryRow,
  ImportStorage,
  JsonValue,
} from '@gcpanel/types';
import type { ImportListQuery, ImportRequest } from '@gcpanel/validation';
import { v4 as uuidv4 } from 'uuid';

import { Clock } from '../common/clock';
import { RATE_LIMITS, RateLimitExceededException, RateLimitService } from '../common/rate-limit.service';
import {
  normalizeImport,
  rebuildPayload,
  UnsupportedImportShapeError,
  type NormalizedImport,
} from './import-normalizer';
import {
  FALLBACK_IMPORT_REPOSITORY,
  IMPORT_REPOSITORY,
  type DatasetFilter,
  type ImportRepository,
} from './import.repository';
import { isSupported } from './platform-support';

export type ImportResult = Omit<ImportedDataset, 'items'>;

interface SourcedRecord {
  record: ImportedDatasetRecord;
  source: ImportRepository;
}

function normalizeOrReject(datasetId: string, data: JsonValue): NormalizedImport {
  try {
    return normalizeImport(datasetId, data);
  } catch (error) {
    if (error instanceof UnsupportedImportShapeError) {
      throw new UnprocessableEntityException({
        error: 'ValidationError',
        issues: [{ path: ['data'], message: error.message }],
      });
    }
    throw error;
  }
}

class PrimaryItemsUnreadableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PrimaryItemsUnreadableError';
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Persists data imported from external platforms. Writes go to the primary
 * repository; when it fails they land in the in-process fallback, and reads
 * merge both so nothing imported is lost from view.
 */
@Injectable()
export class ImportsService {
  private readonly logger = new Logger('ImportsService');

  constructor(
    @Inject(IMPORT_REPOSITORY) private readonly primary: ImportRepository,
    @Inject(FALLBACK_IMPORT_REPOSITORY) private readonly fallback: ImportRepository,
    private readonly rateLimits: RateLimitService,
    private readonly clock: Clock,
  ) {}

  async save(tenantId: string, userId: string, request: ImportRequest): Promise<ImportResult> {
    const { platform, dataType, importMethod, data } = request;
    if (!isSupported(platform, dataType)) {
      throw new BadRequestException(`${platform} does not provide ${dataType}`);
    }

    const id = uuidv4();
    const normalized = normalizeOrReject(id, data);

    const limit = this.rateLimits.checkImportLimit(tenantId, normalized.itemCount);
    if (!limit.allowed) {
      throw new RateLimitExceededException('import_limit_reached', limit.reason ?? 'Import not allowed', {
        importsPerHour: RATE_LIMITS.IMPORTS_PER_HOUR,
        maxItemsPerImport: RATE_LIMITS.IMPORT_MAX_ITEMS,
      });
    }

    const dataset: ImportedDataset = {
      id,
      tenantId,
      platform,
      dataType,
      importDate: this.clock.timestamp(),
      itemCount: normalized.itemCount,
      importMethod,
      status: 'complete',
      userId,
      storage: 'primary',
      items: normalized.items,
    };

    const storage = await this.write(dataset);
    this.rateLimits.recordImport(tenantId);
    this.logger.log(`Imported ${dataset.itemCount} ${dataType} record(s) from ${platform}`, {
      tenantId,
      datasetId: id,
      importMethod,
      storage,
    });

    const { items: _items, ...result } = dataset;
    return { ...result, storage };
  }

  private async write(dataset: ImportedDataset): Promise<ImportStorage> {
    const { tenantId, platform, dataType, importMethod } = dataset;
    try {
      if (importMethod === 'replace') {
        await this.primary.deleteMatching(tenantId, platform, dataType);
        await this.fallback.deleteMatching(tenantId, platform, dataType);
      }
      await this.primary.save(dataset);
      return 'primary';
    } catch (error) {
      this.logger.warn(`Primary import store failed, keeping dataset in memory: ${errorMessage(error)}`, {
        tenantId,
        datasetId: dataset.id,
      });
      if (importMethod === 'replace') {
        await this.fallback.deleteMatching(tenantId, platform, dataType);
      }
      await this.fallback.save({ ...dataset, storage: 'fallback' });
      return 'fallback';
    }
  }

  /** Primary and fallback headers, newest first. A failing primary degrades to fallback only. */
  private async readRecords(tenantId: string, filter: DatasetFilter): Promise<SourcedRecord[]> {
    let primaryRecords: ImportedDatasetRecord[] = [];
    try {
      primaryRecords = await this.primary.listDatasets(tenantId, filter);
    } catch (error) {
      this.logger.warn(`Primary import store unreadable, serving fallback only: ${errorMessage(error)}`, {
        tenantId,
      });
    }
    const fallbackRecords = await this.fallback.listDatasets(tenantId, filter);

    const sourced = [
      ...primaryRecords.map((record) => ({ record, source: this.primary })),
      ...fallbackRecords.map((record) => ({ record, source: this.fallback })),
    ];
    // Reversed first so that, with equal timestamps, later writes still come first.
    return sourced.reverse().sort((a, b) => b.record.importDate.localeCompare(a.record.importDate));
  }

  async list(tenantId: string, query: ImportListQuery): Promise<ImportedDatasetView[]> {
    const { limit, ...filter } = query;
    const records = await this.readRecords(tenantId, filter);
    try {
      return await this.withPayloads(tenantId, records.slice(0, limit));
    } catch (error) {
      if (!(error instanceof PrimaryItemsUnreadableError)) {
        throw error;
      }
      this.logger.warn(`Primary import items unreadable, serving fallback only: ${error.message}`, { tenantId });
      const fallbackOnly = records.filter(({ source }) => source === this.fallback);
      return this.withPayloads(tenantId, fallbackOnly.slice(0, limit));
    }
  }

  private withPayloads(tenantId: string, records: SourcedRecord[]): Promise<ImportedDatasetView[]> {
    return Promise.all(
      records.map(async ({ record, source }) => {
        const items = await this.itemsFrom(source, tenantId, record.id);
        return { ...record, data: rebuildPayload(record.dataType, items) };
      }),
    );
  }

  private async itemsFrom(source: ImportRepository, tenantId: string, datasetId: string): Promise<ImportedDataItem[]> {
    if (source !== this.primary) {
      return source.getItems(tenantId, datasetId);
    }
    try {
      return await source.getItems(tenantId, datasetId);
    } catch (error) {
      throw new PrimaryItemsUnreadableError(errorMessage(error));
    }
  }

  async history(tenantId: string, limit: number): Promise<ImportHistoryRow[]> {
    const records = (await this.readRecords(tenantId, {})).slice(0, limit);
    return records.map(({ record }) => ({
      id: record.id,
      platform: record.platform,
      dataType: record.dataType,
      importDate: record.importDate,
      itemCount: record.itemCount,
      importMethod: record.importMethod,
      status: record.status,
    }));
  }

  async remove(tenantId: string, id: string): Promise<void> {
    let removed = false;
    try {
      removed = await this.primary.delete(tenantId, id);
    } catch (error) {
      this.logger.warn(`Primary import store delete failed: ${errorMessage(error)}`, { tenantId, datasetId: id });
    }
    removed = (await this.fallback.delete(tenantId, id)) || removed;
    if (!removed) {
      throw new NotFoundException(`Imported dataset ${id} not found`);
    }
    this.logger.log(`Deleted imported dataset ${id}`, { tenantId });
  }
}
