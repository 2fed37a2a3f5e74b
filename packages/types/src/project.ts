import type { TenantRecord } from './common';

export type ProjectStatus = 'planning' | 'active' | 'on_hold' | 'completed' | 'cancelled';

export interface Project extends TenantRecord {
  name: string;
  projectNumber: string;
  description?: string;
  status: ProjectStatus;
  contractValue: number;
  location?: string;
  projectManager?: string;
  startDate?: string; // date
  plannedCompletionDate?: string; // date
  createdAt: string; // date-time
  updatedAt: string; // date-time
}
