import type { Priority, Rfi, RfiMetrics, RfiStatus, RfiView } from '@gcpanel/types';

import { roundTo1, wholeDaysBetween } from '../common/dates';
import { nextSequence, pad3 } from '../common/sequence';

const RFI_NUMBER = /^RFI-\d{4}-(\d+)$/;

export function nextRfiNumber(existing: Rfi[], year: number): string {
  const n = nextSequence(
    existing.map((r) => r.rfiNumber),
    RFI_NUMBER,
  );
  return `RFI-${year}-${pad3(n)}`;
}

/** Open RFIs past their due date. Closed RFIs are never overdue. */
export function isOverdue(rfi: Rfi, today: string): boolean {
  return rfi.status !== 'closed' && today > rfi.dueDate;
}

export function daysOpen(rfi: Rfi, today: string): number {
  const end = rfi.status === 'closed' && rfi.closedDate ? rfi.closedDate : today;
  return wholeDaysBetween(rfi.submittedDate, end);
}

export function toRfiView(rfi: Rfi, today: string): RfiView {
  return { ...rfi, daysOpen: daysOpen(rfi, today), isOverdue: isOverdue(rfi, today) };
}

// Newest first; RFIs raised on the same day fall back to their number.
export function compareRfis(a: Rfi, b: Rfi): number {
  if (a.submittedDate !== b.submittedDate) {
    return a.submittedDate < b.submittedDate ? 1 : -1;
  }
  return b.rfiNumber.localeCompare(a.rfiNumber, undefined, { numeric: true });
}

export function computeRfiMetrics(rfis: Rfi[], today: string): RfiMetrics {
  const statusBreakdown: Record<RfiStatus, number> = {
    draft: 0,
    submitted: 0,
    under_review: 0,
    answered: 0,
    closed: 0,
  };
  const priorityBreakdown: Record<Priority, number> = { low: 0, medium: 0, high: 0, critical: 0 };
  let overdueCount = 0;
  let responded = 0;
  let responseDaysTotal = 0;

  for (const rfi of rfis) {
    statusBreakdown[rfi.status]++;
    priorityBreakdown[rfi.priority]++;
    if (isOverdue(rfi, today)) {
      overdueCount++;
    }
    if (rfi.responseDate) {
      responded++;
      responseDaysTotal += wholeDaysBetween(rfi.submittedDate, rfi.responseDate);
    }
  }

  return {
    total: rfis.length,
    statusBreakdown,
    priorityBreakdown,
    averageResponseDays: responded > 0 ? roundTo1(responseDaysTotal / responded) : 0,
    overdueCount,
    responseRate: rfis.length > 0 ? roundTo1((responded / rfis.length) * 100) : 0,
  };
}
