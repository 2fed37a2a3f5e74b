import { Injectable } from '@nestjs/common';
import type {
  ClashStatistics,
  CostTotals,
  DocumentStatus,
  Project,
  RfiMetrics,
  WorkInPlaceSummary,
} from '@gcpanel/types';

import { BimService } from '../bim/bim.service';
import { Clock } from '../common/clock';
import { CostService } from '../cost/cost.service';
import { DocumentsService } from '../documents/documents.service';
import { ProjectsService } from '../projects/projects.service';
import { RfiService } from '../rfi/rfi.service';

export interface ProjectDashboard {
  project: Project;
  rfis: RfiMetrics;
  cost: CostTotals;
  bim: {
    elements: number;
    clashes: ClashStatistics;
    workInPlace: WorkInPlaceSummary;
  };
  documents: {
    total: number;
    byStatus: Record<DocumentStatus, number>;
  };
  generatedAt: string;
}

/** One-call summary of a project across every feature area. */
@Injectable()
export class DashboardService {
  constructor(
    private readonly projects: ProjectsService,
    private readonly rfis: RfiService,
    private readonly cost: CostService,
    private readonly bim: BimService,
    private readonly documents: DocumentsService,
    private readonly clock: Clock,
  ) {}

  async forProject(tenantId: string, projectId: string): Promise<ProjectDashboard> {
    const project = await this.projects.getOrThrow(tenantId, projectId);
    const [rfis, cost, elements, clashes, workInPlace, byStatus] = await Promise.all([
      this.rfis.metrics(tenantId, projectId),
      this.cost.totals(tenantId, projectId),
      this.bim.listElements(tenantId, projectId, {}),
      this.bim.clashStatistics(tenantId, projectId),
      this.bim.workSummary(tenantId, projectId),
      this.documents.countByStatus(tenantId, projectId),
    ]);

    return {
      project,
      rfis,
      cost,
      bim: { elements: elements.length, clashes, workInPlace },
      documents: {
        total: Object.values(byStatus).reduce((sum, n) => sum + n, 0),
        byStatus,
      },
      generatedAt: this.clock.timestamp(),
    };
  }
}
