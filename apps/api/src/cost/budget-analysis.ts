import type {
  BudgetLineItem,
  BudgetLineItemView,
  BudgetStatus,
  ChangeOrder,
  CostTotals,
  DivisionPerformance,
} from '@gcpanel/types';

import { roundTo1 } from '../common/dates';
import { nextSequence, pad3 } from '../common/sequence';

const CO_NUMBER = /^CO-\d{4}-(\d+)$/;

/** Overrun or underrun beyond 10% is reported outright; over 5% is a warning. */
export function budgetStatus(variancePercentage: number): BudgetStatus {
  if (variancePercentage > 10) return 'over_budget';
  if (variancePercentage < -10) return 'under_budget';
  if (variancePercentage > 5) return 'at_risk';
  return 'on_budget';
}

function percentOf(part: number, whole: number): number {
  return whole === 0 ? 0 : (part / whole) * 100;
}

export function toLineItemView(item: BudgetLineItem): BudgetLineItemView {
  const variance = item.actualAmount - item.budgetedAmount;
  const pct = percentOf(variance, item.budgetedAmount);
  return {
    ...item,
    remainingAmount: item.budgetedAmount - item.actualAmount,
    variance,
    variancePercentage: roundTo1(pct),
    budgetStatus: budgetStatus(pct),
  };
}

/** Variance is measured against the original budget; approved change orders only revise it. */
export function costTotals(items: BudgetLineItem[], changeOrders: ChangeOrder[]): CostTotals {
  const totalBudget = items.reduce((sum, i) => sum + i.budgetedAmount, 0);
  const totalCommitted = items.reduce((sum, i) => sum + i.committedAmount, 0);
  const totalActual = items.reduce((sum, i) => sum + i.actualAmount, 0);
  const approvedChangeOrders = changeOrders
    .filter((co) => co.status === 'approved')
    .reduce((sum, co) => sum + co.amount, 0);
  const budgetVariance = totalActual - totalBudget;

  return {
    totalBudget,
    totalCommitted,
    totalActual,
    totalRemaining: totalBudget - totalActual,
    approvedChangeOrders,
    revisedBudget: totalBudget + approvedChangeOrders,
    budgetVariance,
    variancePercentage: roundTo1(percentOf(budgetVariance, totalBudget)),
  };
}

export function divisionPerformance(
  items: BudgetLineItem[],
  divisionName: (code: string) => string | undefined,
): DivisionPerformance[] {
  const byDivision = new Map<string, BudgetLineItem[]>();
  for (const item of items) {
    byDivision.set(item.csiDivision, [...(byDivision.get(item.csiDivision) ?? []), item]);
  }

  return [...byDivision.keys()].sort().map((division) => {
    const rows = byDivision.get(division) ?? [];
    const budgeted = rows.reduce((sum, i) => sum + i.budgetedAmount, 0);
    const committed = rows.reduce((sum, i) => sum + i.committedAmount, 0);
    const actual = rows.reduce((sum, i) => sum + i.actualAmount, 0);
    const variance = actual - budgeted;
    const pct = percentOf(variance, budgeted);
    return {
      division,
      divisionName: divisionName(division) ?? `Division ${division}`,
      budgeted,
      committed,
      actual,
      remaining: budgeted - actual,
      variance,
      variancePercentage: roundTo1(pct),
      status: budgetStatus(pct),
    };
  });
}

export function nextChangeOrderNumber(existing: ChangeOrder[], year: number): string {
  const n = nextSequence(
    existing.map((co) => co.coNumber),
    CO_NUMBER,
  );
  return `CO-${year}-${pad3(n)}`;
}
