import type {
  BimElement,
  Clash,
  ClashStatistics,
  ClashView,
  ElementStatus,
  SystemAnalytics,
  SystemType,
  WorkInPlaceItem,
  WorkInPlaceSummary,
} from '@gcpanel/types';
import { SYSTEM_TYPES } from '@gcpanel/types';

import { roundTo1, wholeDaysBetween } from '../common/dates';

export function toClashView(clash: Clash, now: string): ClashView {
  return {
    ...clash,
    daysOpen: wholeDaysBetween(clash.createdAt, clash.resolvedAt ?? now),
    isCritical: clash.priority === 'critical' || clash.clashType === 'hard_clash',
  };
}

export function clashStatistics(clashes: Clash[], elements: BimElement[]): ClashStatistics {
  const systems = new Map(elements.map((e) => [e.id, e.systemType]));
  const byType: ClashStatistics['byType'] = {
    hard_clash: 0,
    soft_clash: 0,
    clearance_clash: 0,
    workflow_clash: 0,
  };
  const systemInteractions: Record<string, number> = {};
  let active = 0;
  let resolved = 0;
  let critical = 0;

  for (const clash of clashes) {
    byType[clash.clashType]++;
    if (clash.status === 'active') active++;
    if (clash.status === 'resolved') resolved++;
    if (clash.priority === 'critical') critical++;

    const systemA = systems.get(clash.elementAId);
    const systemB = systems.get(clash.elementBId);
    if (systemA && systemB) {
      const key = `${systemA}-${systemB}`;
      systemInteractions[key] = (systemInteractions[key] ?? 0) + 1;
    }
  }

  return {
    total: clashes.length,
    active,
    resolved,
    critical,
    resolutionRate: clashes.length > 0 ? roundTo1((resolved / clashes.length) * 100) : 0,
    byType,
    systemInteractions,
  };
}

/**
 * Sets progress (clamped to 0..100) and derives the item status from it.
 * Reaching 100 stamps `actualCompletion`; dropping back below 100 clears it.
 */
export function applyProgress(
  item: WorkInPlaceItem,
  progress: number,
  today: string,
  note?: string,
): WorkInPlaceItem {
  const progressPercentage = Math.max(0, Math.min(100, progress));
  const status: ElementStatus =
    progressPercentage >= 100 ? 'complete' : progressPercentage > 0 ? 'in_progress' : 'not_started';
  let actualCompletion: string | undefined;
  if (status === 'complete') {
    actualCompletion = item.status === 'complete' && item.actualCompletion ? item.actualCompletion : today;
  }
  return {
    ...item,
    progressPercentage,
    status,
    actualCompletion,
    notes: note ? [...item.notes, `${today}: ${note}`] : item.notes,
  };
}

function meanProgress(items: WorkInPlaceItem[]): number {
  if (items.length === 0) {
    return 0;
  }
  return roundTo1(items.reduce((sum, w) => sum + w.progressPercentage, 0) / items.length);
}

export function summarizeWorkInPlace(
  items: WorkInPlaceItem[],
  elements: BimElement[],
): WorkInPlaceSummary {
  const systems = new Map(elements.map((e) => [e.id, e.systemType]));
  const bySystem = new Map<SystemType, WorkInPlaceItem[]>();
  for (const item of items) {
    const system = systems.get(item.elementId);
    if (system) {
      bySystem.set(system, [...(bySystem.get(system) ?? []), item]);
    }
  }

  const systemProgress: WorkInPlaceSummary['systemProgress'] = {};
  for (const [system, systemItems] of bySystem) {
    systemProgress[system] = meanProgress(systemItems);
  }

  return {
    totalItems: items.length,
    completed: items.filter((w) => w.status === 'complete').length,
    inProgress: items.filter((w) => w.status === 'in_progress').length,
    notStarted: items.filter((w) => w.status === 'not_started').length,
    overallProgress: meanProgress(items),
    systemProgress,
  };
}

// Without a target date an item can be neither on schedule nor verifiably late; it counts as delayed.
function onSchedule(item: WorkInPlaceItem): boolean {
  if (!item.targetCompletion) {
    return false;
  }
  if (item.status !== 'complete') {
    return true;
  }
  return !item.actualCompletion || item.actualCompletion <= item.targetCompletion;
}

export function systemAnalytics(
  elements: BimElement[],
  items: WorkInPlaceItem[],
): Partial<Record<SystemType, SystemAnalytics>> {
  const analytics: Partial<Record<SystemType, SystemAnalytics>> = {};

  for (const system of SYSTEM_TYPES) {
    const systemElements = elements.filter((e) => e.systemType === system);
    if (systemElements.length === 0) {
      continue;
    }
    const ids = new Set(systemElements.map((e) => e.id));
    const work = items.filter((w) => ids.has(w.elementId));
    const statusDistribution: Record<ElementStatus, number> = {
      not_started: 0,
      in_progress: 0,
      complete: 0,
      issue: 0,
      on_hold: 0,
    };
    for (const element of systemElements) {
      statusDistribution[element.status]++;
    }
    const scheduled = work.filter(onSchedule).length;

    analytics[system] = {
      totalElements: systemElements.length,
      statusDistribution,
      averageProgress: meanProgress(work),
      workItems: work.length,
      onSchedule: scheduled,
      delayed: work.length - scheduled,
    };
  }

  return analytics;
}
