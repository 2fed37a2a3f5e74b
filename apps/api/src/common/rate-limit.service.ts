import { HttpException, HttpStatus, Injectable } from '@nestjs/common';

/**
 * ============================================================================
 * Per-tenant limits: import throughput and the document register quota
 * ============================================================================
 * Hourly windows live in memory (reset on deploy). Document counts and
 * storage are computed by the caller from the register itself, so they
 * survive restarts when the Firestore driver is used.
 */

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

interface TenantUsage {
  imports: RateLimitEntry;
}

const HOUR_MS = 3600000;

// Configurable limits via environment variables
export const RATE_LIMITS = {
  // Imports
  IMPORTS_PER_HOUR: parseInt(process.env.IMPORTS_PER_HOUR || '30'),
  IMPORT_MAX_ITEMS: parseInt(process.env.IMPORT_MAX_ITEMS || '5000'),

  // Document register
  DOCS_PER_TENANT_MAX: parseInt(process.env.DOCS_PER_TENANT_MAX || '500'),
  DOC_MAX_SIZE_MB: parseInt(process.env.DOC_MAX_SIZE_MB || '100'),
  STORAGE_PER_TENANT_MB: parseInt(process.env.STORAGE_PER_TENANT_MB || '2048'),
};

export interface LimitDecision {
  allowed: boolean;
  reason?: string;
  remaining?: number;
}

/** Thrown as a 429 with the limits the client ran into. */
export class RateLimitExceededException extends HttpException {
  constructor(error: string, message: string, limits: Record<string, number>) {
    super({ error, message, limits }, HttpStatus.TOO_MANY_REQUESTS);
  }
}

@Injectable()
export class RateLimitService {
  private tenantUsage = new Map<string, TenantUsage>();

  private getOrCreateUsage(tenantId: string): TenantUsage {
    let usage = this.tenantUsage.get(tenantId);
    if (!usage) {
      usage = { imports: { count: 0, resetAt: Date.now() + HOUR_MS } };
      this.tenantUsage.set(tenantId, usage);
    }
    return usage;
  }

  private checkAndResetIfNeeded(entry: RateLimitEntry): void {
    if (Date.now() > entry.resetAt) {
      entry.count = 0;
      entry.resetAt = Date.now() + HOUR_MS;
    }
  }

  /**
   * Check whether an import of `itemCount` records may run now.
   */
  checkImportLimit(tenantId: string, itemCount: number): LimitDecision {
    const usage = this.getOrCreateUsage(tenantId);
    this.checkAndResetIfNeeded(usage.imports);

    if (usage.imports.count >= RATE_LIMITS.IMPORTS_PER_HOUR) {
      const resetIn = Math.ceil((usage.imports.resetAt - Date.now()) / 60000);
      return {
        allowed: false,
        reason: `Import limit reached (${RATE_LIMITS.IMPORTS_PER_HOUR}/hour). Resets in ${resetIn} minutes.`,
        remaining: 0,
      };
    }

    if (itemCount > RATE_LIMITS.IMPORT_MAX_ITEMS) {
      return {
        allowed: false,
        reason: `Import too large (${itemCount} records). Maximum is ${RATE_LIMITS.IMPORT_MAX_ITEMS}.`,
      };
    }

    return {
      allowed: true,
      remaining: RATE_LIMITS.IMPORTS_PER_HOUR - usage.imports.count,
    };
  }

  recordImport(tenantId: string): void {
    const usage = this.getOrCreateUsage(tenantId);
    this.checkAndResetIfNeeded(usage.imports);
    usage.imports.count++;
  }

  /**
   * Check whether a document of `sizeBytes` fits the tenant's register quota.
   */
  checkDocumentQuota(
    sizeBytes: number,
    currentDocCount: number,
    currentStorageBytes: number,
  ): LimitDecision {
    if (currentDocCount >= RATE_LIMITS.DOCS_PER_TENANT_MAX) {
      return {
        allowed: false,
        reason: `Maximum documents reached (${RATE_LIMITS.DOCS_PER_TENANT_MAX}). Delete some documents to register more.`,
      };
    }

    const sizeMB = sizeBytes / (1024 * 1024);
    if (sizeMB > RATE_LIMITS.DOC_MAX_SIZE_MB) {
      return {
        allowed: false,
        reason: `File too large (${sizeMB.toFixed(1)}MB). Maximum is ${RATE_LIMITS.DOC_MAX_SIZE_MB}MB.`,
      };
    }

    const newTotalMB = (currentStorageBytes + sizeBytes) / (1024 * 1024);
    if (newTotalMB > RATE_LIMITS.STORAGE_PER_TENANT_MB) {
      return {
        allowed: false,
        reason: `Storage limit reached (${RATE_LIMITS.STORAGE_PER_TENANT_MB}MB). Delete some documents to free space.`,
      };
    }

    return { allowed: true };
  }
}
