import type { Priority, TenantRecord } from './common';

export type RfiStatus = 'draft' | 'submitted' | 'under_review' | 'answered' | 'closed';

export const RFI_STATUSES: readonly RfiStatus[] = [
  'draft',
  'submitted',
  'under_review',
  'answered',
  'closed',
];

export type RfiCategory =
  | 'design_clarification'
  | 'specification_question'
  | 'coordination_issue'
  | 'material_substitution'
  | 'construction_method'
  | 'schedule_impact'
  | 'cost_impact'
  | 'safety_concern';

export interface RfiResponse {
  id: string;
  respondedBy: string;
  responseDate: string; // date
  responseText: string;
  requiresFurtherClarification: boolean;
}

export interface Rfi extends TenantRecord {
  projectId: string;
  rfiNumber: string;
  title: string;
  description: string;
  question: string;
  category: RfiCategory;
  priority: Priority;
  status: RfiStatus;
  location?: string;
  drawingReferences: string[];
  specificationSections: string[];
  submittedBy: string;
  assignedTo: string;
  reviewers: string[];
  submittedDate: string; // date
  dueDate: string; // date
  responseDate?: string; // date
  closedDate?: string; // date
  costImpact?: number;
  scheduleImpactDays?: number;
  responses: RfiResponse[];
  createdAt: string; // date-time
  updatedAt: string; // date-time
}

export interface RfiView extends Rfi {
  daysOpen: number;
  isOverdue: boolean;
}

export interface RfiMetrics {
  total: number;
  statusBreakdown: Record<RfiStatus, number>;
  priorityBreakdown: Record<Priority, number>;
  averageResponseDays: number;
  overdueCount: number;
  responseRate: number;
}
