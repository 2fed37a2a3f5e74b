import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import type {
  BimElement,
  BimElementView,
  Clash,
  ClashStatistics,
  ClashView,
  ElementStatus,
  Project,
  SystemAnalytics,
  SystemType,
  WorkInPlaceItem,
  WorkInPlaceSummary,
} from '@gcpanel/types';
import type {
  BimElementCreateInput,
  ClashDetectionOptions,
  ClashListQuery,
  ClashUpdateInput,
  ElementListQuery,
  WorkItemCreateInput,
  WorkProgressInput,
} from '@gcpanel/validation';
import { v4 as uuidv4 } from 'uuid';

import { Clock } from '../common/clock';
import { SequenceLock } from '../common/sequence-lock.service';
import { nextSequence, pad3 } from '../common/sequence';
import { ProjectsService } from '../projects/projects.service';
import {
  applyProgress,
  clashStatistics,
  summarizeWorkInPlace,
  systemAnalytics,
  toClashView,
} from './bim-analytics';
import { BimRepository } from './bim.repository';
import { displayName, findClashes, locationDescription, pairKey } from './clash-detection';

export const CLASH_DETECTOR = 'gcPanel clash engine';

const CLASH_NUMBER = /^CLASH-(\d+)$/;

export interface ClashDetectionRun {
  detected: ClashView[];
  checkedPairs: number;
  skippedPairs: number;
}

export interface BimExport {
  project: Project;
  elements: BimElementView[];
  clashes: ClashView[];
  workInPlace: WorkInPlaceItem[];
  exportedAt: string;
}

function toElementView(element: BimElement): BimElementView {
  return {
    ...element,
    displayName: displayName(element),
    locationDescription: locationDescription(element),
  };
}

// Stable sort keeps insertion order for elements created in the same instant.
function byCreation<T extends { createdAt: string }>(records: T[]): T[] {
  return [...records].sort((a, b) => a.createdAt.localeCompare(b.createdAt));
}

function byClashNumber(a: Clash, b: Clash): number {
  return a.clashNumber.localeCompare(b.clashNumber, undefined, { numeric: true });
}

function isUnresolved(clash: Clash): boolean {
  return clash.status === 'active' || clash.status === 'reviewing';
}

@Injectable()
export class BimService {
  private readonly logger = new Logger('BimService');

  constructor(
    private readonly repo: BimRepository,
    private readonly projects: ProjectsService,
    private readonly clock: Clock,
    private readonly lock: SequenceLock,
  ) {}

  // --- Elements ---

  async createElement(
    tenantId: string,
    projectId: string,
    input: BimElementCreateInput,
  ): Promise<BimElementView> {
    await this.projects.getOrThrow(tenantId, projectId);
    const now = this.clock.timestamp();
    const element: BimElement = {
      id: uuidv4(),
      tenantId,
      projectId,
      ...input,
      createdAt: now,
      updatedAt: now,
    };
    await this.repo.saveElement(element);
    return toElementView(element);
  }

  async listElements(
    tenantId: string,
    projectId: string,
    query: ElementListQuery,
  ): Promise<BimElementView[]> {
    await this.projects.getOrThrow(tenantId, projectId);
    const elements = await this.repo.listElements(tenantId, projectId);
    return byCreation(elements)
      .filter((e) => !query.systemType || e.systemType === query.systemType)
      .filter((e) => !query.status || e.status === query.status)
      .filter((e) => !query.level || e.level === query.level)
      .map(toElementView);
  }

  async getElement(tenantId: string, projectId: string, id: string): Promise<BimElementView> {
    return toElementView(await this.getElementOrThrow(tenantId, projectId, id));
  }

  async updateElementStatus(
    tenantId: string,
    projectId: string,
    id: string,
    status: ElementStatus,
  ): Promise<BimElementView> {
    const element = await this.getElementOrThrow(tenantId, projectId, id);
    const updated = await this.repo.saveElement({ ...element, status, updatedAt: this.clock.timestamp() });
    return toElementView(updated);
  }

  // --- Clashes ---

  async detectClashes(
    tenantId: string,
    projectId: string,
    options: ClashDetectionOptions,
  ): Promise<ClashDetectionRun> {
    await this.projects.getOrThrow(tenantId, projectId);
    return this.lock.run(`clashes:${tenantId}:${projectId}`, () =>
      this.runDetection(tenantId, projectId, options),
    );
  }

  private async runDetection(
    tenantId: string,
    projectId: string,
    options: ClashDetectionOptions,
  ): Promise<ClashDetectionRun> {
    const [elements, clashes] = await Promise.all([
      this.repo.listElements(tenantId, projectId),
      this.repo.listClashes(tenantId, projectId),
    ]);

    const openPairs = new Set(
      clashes.filter(isUnresolved).map((c) => pairKey(c.elementAId, c.elementBId)),
    );
    const sweep = findClashes(byCreation(elements), options, openPairs);

    let sequence = nextSequence(
      clashes.map((c) => c.clashNumber),
      CLASH_NUMBER,
    );
    const now = this.clock.timestamp();
    const detected: Clash[] = [];
    for (const candidate of sweep.candidates) {
      const clash: Clash = {
        id: uuidv4(),
        tenantId,
        projectId,
        clashNumber: `CLASH-${pad3(sequence++)}`,
        elementAId: candidate.elementA.id,
        elementBId: candidate.elementB.id,
        clashType: candidate.clashType,
        status: 'active',
        priority: candidate.priority,
        distance: candidate.distance,
        location: candidate.location,
        description: `${displayName(candidate.elementA)} conflicts with ${displayName(candidate.elementB)}`,
        detectedBy: CLASH_DETECTOR,
        createdAt: now,
      };
      await this.repo.saveClash(clash);
      detected.push(clash);
    }

    this.logger.log(`Clash detection found ${detected.length} new clash(es)`, {
      tenantId,
      projectId,
      elements: elements.length,
      checkedPairs: sweep.checkedPairs,
      skippedPairs: sweep.skippedPairs,
    });

    return {
      detected: detected.map((c) => toClashView(c, now)),
      checkedPairs: sweep.checkedPairs,
      skippedPairs: sweep.skippedPairs,
    };
  }

  async listClashes(tenantId: string, projectId: string, query: ClashListQuery): Promise<ClashView[]> {
    await this.projects.getOrThrow(tenantId, projectId);
    const now = this.clock.timestamp();
    const clashes = await this.repo.listClashes(tenantId, projectId);
    return clashes
      .filter((c) => !query.status || c.status === query.status)
      .filter((c) => !query.priority || c.priority === query.priority)
      .sort(byClashNumber)
      .map((c) => toClashView(c, now));
  }

  async updateClash(
    tenantId: string,
    projectId: string,
    id: string,
    input: ClashUpdateInput,
  ): Promise<ClashView> {
    const clash = await this.repo.getClash(tenantId, projectId, id);
    if (!clash) {
      throw new NotFoundException(`Clash ${id} not found`);
    }
    const now = this.clock.timestamp();
    const updated: Clash = {
      ...clash,
      status: input.status,
      resolution: input.resolution ?? clash.resolution,
      assignedTo: input.assignedTo ?? clash.assignedTo,
      // Reopening a clash restarts its open-days count from creation.
      resolvedAt: input.status === 'resolved' ? now : undefined,
    };
    await this.repo.saveClash(updated);
    this.logger.log(`${clash.clashNumber} -> ${input.status}`, { tenantId, projectId });
    return toClashView(updated, now);
  }

  async clashStatistics(tenantId: string, projectId: string): Promise<ClashStatistics> {
    await this.projects.getOrThrow(tenantId, projectId);
    const [elements, clashes] = await Promise.all([
      this.repo.listElements(tenantId, projectId),
      this.repo.listClashes(tenantId, projectId),
    ]);
    return clashStatistics(clashes, elements);
  }

  // --- Work in place ---

  async createWorkItem(
    tenantId: string,
    projectId: string,
    input: WorkItemCreateInput,
  ): Promise<WorkInPlaceItem> {
    await this.getElementOrThrow(tenantId, projectId, input.elementId);
    const now = this.clock.timestamp();
    const { progressPercentage, ...fields } = input;
    const draft: WorkInPlaceItem = {
      id: uuidv4(),
      tenantId,
      projectId,
      ...fields,
      status: 'not_started',
      progressPercentage: 0,
      notes: [],
      createdAt: now,
      updatedAt: now,
    };
    const item = applyProgress(draft, progressPercentage, this.clock.today());
    return this.repo.saveWork(item);
  }

  async listWork(tenantId: string, projectId: string): Promise<WorkInPlaceItem[]> {
    await this.projects.getOrThrow(tenantId, projectId);
    return byCreation(await this.repo.listWork(tenantId, projectId));
  }

  async updateProgress(
    tenantId: string,
    projectId: string,
    id: string,
    input: WorkProgressInput,
  ): Promise<WorkInPlaceItem> {
    const item = await this.repo.getWork(tenantId, projectId, id);
    if (!item) {
      throw new NotFoundException(`Work item ${id} not found`);
    }
    const updated = applyProgress(item, input.progressPercentage, this.clock.today(), input.note);
    return this.repo.saveWork({ ...updated, updatedAt: this.clock.timestamp() });
  }

  async workSummary(tenantId: string, projectId: string): Promise<WorkInPlaceSummary> {
    await this.projects.getOrThrow(tenantId, projectId);
    const [elements, items] = await Promise.all([
      this.repo.listElements(tenantId, projectId),
      this.repo.listWork(tenantId, projectId),
    ]);
    return summarizeWorkInPlace(items, elements);
  }

  async systemAnalytics(
    tenantId: string,
    projectId: string,
  ): Promise<Partial<Record<SystemType, SystemAnalytics>>> {
    await this.projects.getOrThrow(tenantId, projectId);
    const [elements, items] = await Promise.all([
      this.repo.listElements(tenantId, projectId),
      this.repo.listWork(tenantId, projectId),
    ]);
    return systemAnalytics(elements, items);
  }

  async exportProject(tenantId: string, projectId: string): Promise<BimExport> {
    const project = await this.projects.getOrThrow(tenantId, projectId);
    const [elements, clashes, workInPlace] = await Promise.all([
      this.repo.listElements(tenantId, projectId),
      this.repo.listClashes(tenantId, projectId),
      this.repo.listWork(tenantId, projectId),
    ]);
    const now = this.clock.timestamp();
    return {
      project,
      elements: byCreation(elements).map(toElementView),
      clashes: clashes.sort(byClashNumber).map((c) => toClashView(c, now)),
      workInPlace: byCreation(workInPlace),
      exportedAt: now,
    };
  }

  private async getElementOrThrow(tenantId: string, projectId: string, id: string): Promise<BimElement> {
    const element = await this.repo.getElement(tenantId, projectId, id);
    if (!element) {
      throw new NotFoundException(`Element ${id} not found`);
    }
    return element;
  }
}
