import type { Priority, TenantRecord } from './common';

export type SystemType =
  | 'structural'
  | 'mechanical'
  | 'electrical'
  | 'plumbing'
  | 'fire_protection'
  | 'architectural'
  | 'civil';

export const SYSTEM_TYPES: readonly SystemType[] = [
  'structural',
  'mechanical',
  'electrical',
  'plumbing',
  'fire_protection',
  'architectural',
  'civil',
];

export type ElementStatus = 'not_started' | 'in_progress' | 'complete' | 'issue' | 'on_hold';

export const ELEMENT_STATUSES: readonly ElementStatus[] = [
  'not_started',
  'in_progress',
  'complete',
  'issue',
  'on_hold',
];

export type ClashType = 'hard_clash' | 'soft_clash' | 'clearance_clash' | 'workflow_clash';

export const CLASH_TYPES: readonly ClashType[] = [
  'hard_clash',
  'soft_clash',
  'clearance_clash',
  'workflow_clash',
];

export type ClashStatus = 'active' | 'reviewing' | 'resolved' | 'ignored';

/** Model coordinates in millimetres. */
export interface Point3D {
  x: number;
  y: number;
  z: number;
}

/** Beams, ducts, conduits and pipes: a run between two points with a cross-section. */
export interface LinearGeometry {
  kind: 'linear';
  start: Point3D;
  end: Point3D;
  width: number;
  height: number;
}

export interface BoxGeometry {
  kind: 'box';
  min: Point3D;
  max: Point3D;
}

export type ElementGeometry = LinearGeometry | BoxGeometry;

export interface BoundingBox {
  min: Point3D;
  max: Point3D;
}

export interface BimElement extends TenantRecord {
  projectId: string;
  modelId: string;
  name: string;
  customId?: string;
  systemType: SystemType;
  subSystemType?: string;
  elementType: string;
  status: ElementStatus;
  level: string;
  zone?: string;
  gridLocation?: string;
  geometry: ElementGeometry;
  properties: Record<string, string | number | boolean>;
  ifcGuid?: string;
  createdAt: string;
  updatedAt: string;
}

export interface BimElementView extends BimElement {
  displayName: string;
  locationDescription: string;
}

export interface Clash extends TenantRecord {
  projectId: string;
  /** `CLASH-NNN`, sequential within the project. */
  clashNumber: string;
  elementAId: string;
  elementBId: string;
  clashType: ClashType;
  status: ClashStatus;
  priority: Priority;
  distance: number;
  location: Point3D;
  description: string;
  resolution?: string;
  detectedBy: string;
  assignedTo?: string;
  createdAt: string;
  resolvedAt?: string;
}

export interface ClashView extends Clash {
  daysOpen: number;
  isCritical: boolean;
}

export interface ClashStatistics {
  total: number;
  active: number;
  resolved: number;
  critical: number;
  resolutionRate: number;
  byType: Record<ClashType, number>;
  systemInteractions: Record<string, number>;
}

export interface WorkInPlaceItem extends TenantRecord {
  projectId: string;
  elementId: string;
  workType: string;
  description: string;
  status: ElementStatus;
  assignedTo: string;
  startDate?: string;
  targetCompletion?: string;
  actualCompletion?: string;
  progressPercentage: number;
  notes: string[];
  createdAt: string;
  updatedAt: string;
}

export interface WorkInPlaceSummary {
  totalItems: number;
  completed: number;
  inProgress: number;
  notStarted: number;
  overallProgress: number;
  systemProgress: Partial<Record<SystemType, number>>;
}

export interface SystemAnalytics {
  totalElements: number;
  statusDistribution: Record<ElementStatus, number>;
  averageProgress: number;
  workItems: number;
  onSchedule: number;
  delayed: number;
}
