import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import type { Rfi, RfiMetrics, RfiView } from '@gcpanel/types';
import type {
  RfiCreateInput,
  RfiListQuery,
  RfiResponseInput,
  RfiUpdateInput,
} from '@gcpanel/validation';
import { v4 as uuidv4 } from 'uuid';

import { Clock } from '../common/clock';
import { SequenceLock } from '../common/sequence-lock.service';
import { addDays } from '../common/dates';
import { pad3 } from '../common/sequence';
import { ProjectsService } from '../projects/projects.service';
import { compareRfis, computeRfiMetrics, isOverdue, nextRfiNumber, toRfiView } from './rfi.metrics';
import { RfiRepository } from './rfi.repository';

const DEFAULT_RESPONSE_DAYS = 7;

@Injectable()
export class RfiService {
  private readonly logger = new Logger('RfiService');

  constructor(
    private readonly repo: RfiRepository,
    private readonly projects: ProjectsService,
    private readonly clock: Clock,
    private readonly lock: SequenceLock,
  ) {}

  async create(tenantId: string, projectId: string, input: RfiCreateInput): Promise<RfiView> {
    await this.projects.getOrThrow(tenantId, projectId);
    return this.lock.run(`rfis:${tenantId}:${projectId}`, async () => {
      const existing = await this.repo.listByProject(tenantId, projectId);
      const today = this.clock.today();
      const now = this.clock.timestamp();

      const { dueDate, ...fields } = input;
      const rfi: Rfi = {
        id: uuidv4(),
        tenantId,
        projectId,
        rfiNumber: nextRfiNumber(existing, this.clock.now().getUTCFullYear()),
        ...fields,
        status: 'draft',
        submittedDate: today,
        dueDate: dueDate ?? addDays(today, DEFAULT_RESPONSE_DAYS),
        responses: [],
        createdAt: now,
        updatedAt: now,
      };
      await this.repo.save(rfi);
      this.logger.log(`Created ${rfi.rfiNumber}`, { tenantId, projectId, priority: rfi.priority });
      return toRfiView(rfi, today);
    });
  }

  async list(tenantId: string, projectId: string, query: RfiListQuery): Promise<RfiView[]> {
    await this.projects.getOrThrow(tenantId, projectId);
    const today = this.clock.today();
    const rfis = await this.repo.listByProject(tenantId, projectId);
    return rfis
      .filter((r) => !query.status || r.status === query.status)
      .filter((r) => !query.priority || r.priority === query.priority)
      .filter((r) => query.overdue === undefined || isOverdue(r, today) === (query.overdue === 'true'))
      .sort(compareRfis)
      .map((r) => toRfiView(r, today));
  }

  async get(tenantId: string, projectId: string, id: string): Promise<RfiView> {
    return toRfiView(await this.getOrThrow(tenantId, projectId, id), this.clock.today());
  }

  async update(tenantId: string, projectId: string, id: string, input: RfiUpdateInput): Promise<RfiView> {
    const current = await this.getOrThrow(tenantId, projectId, id);
    this.assertOpen(current, 'update');
    return this.persist({ ...current, ...input });
  }

  async submit(tenantId: string, projectId: string, id: string): Promise<RfiView> {
    const current = await this.getOrThrow(tenantId, projectId, id);
    if (current.status !== 'draft') {
      throw new ConflictException(`${current.rfiNumber} is ${current.status}; only draft RFIs can be submitted`);
    }
    return this.persist({ ...current, status: 'submitted' });
  }

  async addResponse(
    tenantId: string,
    projectId: string,
    id: string,
    input: RfiResponseInput,
  ): Promise<RfiView> {
    const current = await this.getOrThrow(tenantId, projectId, id);
    this.assertOpen(current, 'respond to');
    const today = this.clock.today();

    const responses = [
      ...current.responses,
      { id: `resp-${pad3(current.responses.length + 1)}`, responseDate: today, ...input },
    ];
    const updated: Rfi = input.requiresFurtherClarification
      ? { ...current, responses, status: 'under_review' }
      : { ...current, responses, status: 'answered', responseDate: today };
    this.logger.log(`Response recorded on ${current.rfiNumber}`, { tenantId, status: updated.status });
    return this.persist(updated);
  }

  async close(tenantId: string, projectId: string, id: string): Promise<RfiView> {
    const current = await this.getOrThrow(tenantId, projectId, id);
    this.assertOpen(current, 'close');
    return this.persist({ ...current, status: 'closed', closedDate: this.clock.today() });
  }

  async metrics(tenantId: string, projectId: string): Promise<RfiMetrics> {
    await this.projects.getOrThrow(tenantId, projectId);
    const rfis = await this.repo.listByProject(tenantId, projectId);
    return computeRfiMetrics(rfis, this.clock.today());
  }

  private async getOrThrow(tenantId: string, projectId: string, id: string): Promise<Rfi> {
    const rfi = await this.repo.get(tenantId, projectId, id);
    if (!rfi) {
      throw new NotFoundException(`RFI ${id} not found`);
    }
    return rfi;
  }

  private assertOpen(rfi: Rfi, action: string): void {
    if (rfi.status === 'closed') {
      throw new ConflictException(`Cannot ${action} ${rfi.rfiNumber}: it is closed`);
    }
  }

  private async persist(rfi: Rfi): Promise<RfiView> {
    const saved = await this.repo.save({ ...rfi, updatedAt: this.clock.timestamp() });
    return toRfiView(saved, this.clock.today());
  }
}
