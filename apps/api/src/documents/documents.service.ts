import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import type { DocumentStatus, ProjectDocument } from '@gcpanel/types';
import type {
  DocumentCreateInput,
  DocumentListQuery,
  DocumentRevisionInput,
} from '@gcpanel/validation';
import { v4 as uuidv4 } from 'uuid';

import { Clock } from '../common/clock';
import { RATE_LIMITS, RateLimitExceededException, RateLimitService } from '../common/rate-limit.service';
import { ProjectsService } from '../projects/projects.service';
import { DocumentsRepository } from './documents.repository';

/**
 * Document register: metadata for drawings, specifications, submittals and the
 * like. Files themselves live elsewhere; only their size counts against quota.
 */
@Injectable()
export class DocumentsService {
  private readonly logger = new Logger('DocumentsService');

  constructor(
    private readonly repo: DocumentsRepository,
    private readonly projects: ProjectsService,
    private readonly rateLimits: RateLimitService,
    private readonly clock: Clock,
  ) {}

  async register(tenantId: string, projectId: string, input: DocumentCreateInput): Promise<ProjectDocument> {
    await this.projects.getOrThrow(tenantId, projectId);
    await this.assertQuota(tenantId, input.sizeBytes);
    const now = this.clock.timestamp();
    const document: ProjectDocument = {
      id: uuidv4(),
      tenantId,
      projectId,
      ...input,
      createdAt: now,
      updatedAt: now,
    };
    await this.repo.save(document);
    this.logger.log(`Registered ${document.fileName} rev ${document.revision}`, { tenantId, projectId });
    return document;
  }

  async list(tenantId: string, projectId: string, query: DocumentListQuery): Promise<ProjectDocument[]> {
    await this.projects.getOrThrow(tenantId, projectId);
    const includeSuperseded = query.includeSuperseded === 'true' || query.status === 'superseded';
    const documents = await this.repo.listByProject(tenantId, projectId);
    return documents
      .filter((d) => includeSuperseded || d.status !== 'superseded')
      .filter((d) => !query.documentType || d.documentType === query.documentType)
      .filter((d) => !query.status || d.status === query.status)
      .sort((a, b) => a.title.localeCompare(b.title) || a.createdAt.localeCompare(b.createdAt));
  }

  get(tenantId: string, projectId: string, id: string): Promise<ProjectDocument> {
    return this.getOrThrow(tenantId, projectId, id);
  }

  async updateStatus(
    tenantId: string,
    projectId: string,
    id: string,
    status: Exclude<DocumentStatus, 'superseded'>,
  ): Promise<ProjectDocument> {
    const document = await this.getOrThrow(tenantId, projectId, id);
    this.assertCurrent(document);
    return this.repo.save({ ...document, status, updatedAt: this.clock.timestamp() });
  }

  /** Registers a new revision and marks the one it replaces as superseded. */
  async revise(
    tenantId: string,
    projectId: string,
    id: string,
    input: DocumentRevisionInput,
  ): Promise<ProjectDocument> {
    const previous = await this.getOrThrow(tenantId, projectId, id);
    this.assertCurrent(previous);
    await this.assertQuota(tenantId, input.sizeBytes);

    const now = this.clock.timestamp();
    const revision: ProjectDocument = {
      id: uuidv4(),
      tenantId,
      projectId,
      title: previous.title,
      documentType: previous.documentType,
      discipline: previous.discipline,
      csiSection: previous.csiSection,
      ...input,
      status: 'draft',
      supersedesId: previous.id,
      createdAt: now,
      updatedAt: now,
    };
    await this.repo.save(revision);
    await this.repo.save({ ...previous, status: 'superseded', updatedAt: now });
    this.logger.log(`${previous.title}: rev ${previous.revision} superseded by rev ${revision.revision}`, {
      tenantId,
      projectId,
    });
    return revision;
  }

  async remove(tenantId: string, projectId: string, id: string): Promise<void> {
    await this.getOrThrow(tenantId, projectId, id);
    await this.repo.delete(tenantId, id);
    this.logger.log(`Deleted document ${id}`, { tenantId, projectId });
  }

  async countByStatus(tenantId: string, projectId: string): Promise<Record<DocumentStatus, number>> {
    const byStatus: Record<DocumentStatus, number> = {
      draft: 0,
      issued_for_review: 0,
      approved: 0,
      superseded: 0,
    };
    for (const document of await this.repo.listByProject(tenantId, projectId)) {
      byStatus[document.status]++;
    }
    return byStatus;
  }

  private async assertQuota(tenantId: string, sizeBytes: number): Promise<void> {
    const registered = await this.repo.listByTenant(tenantId);
    const storageBytes = registered.reduce((sum, d) => sum + d.sizeBytes, 0);
    const decision = this.rateLimits.checkDocumentQuota(sizeBytes, registered.length, storageBytes);
    if (!decision.allowed) {
      this.logger.warn(`Document quota reached: ${decision.reason}`, { tenantId });
      throw new RateLimitExceededException('upload_limit_reached', decision.reason ?? 'Quota reached', {
        maxDocuments: RATE_LIMITS.DOCS_PER_TENANT_MAX,
        maxFileSizeMB: RATE_LIMITS.DOC_MAX_SIZE_MB,
        maxStorageMB: RATE_LIMITS.STORAGE_PER_TENANT_MB,
      });
    }
  }

  private async getOrThrow(tenantId: string, projectId: string, id: string): Promise<ProjectDocument> {
    const document = await this.repo.get(tenantId, projectId, id);
    if (!document) {
      throw new NotFoundException(`Document ${id} not found`);
    }
    return document;
  }

  private assertCurrent(document: ProjectDocument): void {
    if (document.status === 'superseded') {
      throw new ConflictException(`Document ${document.id} has been superseded`);
    }
  }
}
