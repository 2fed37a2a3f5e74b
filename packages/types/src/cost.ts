import type { TenantRecord } from './common';

export type CostCategory =
  | 'labor'
  | 'materials'
  | 'equipment'
  | 'subcontractor'
  | 'overhead'
  | 'contingency';

export type CostItemStatus = 'planned' | 'committed' | 'invoiced' | 'paid';

export type BudgetStatus = 'on_budget' | 'over_budget' | 'under_budget' | 'at_risk';

export interface CsiDivision {
  code: string;
  name: string;
}

export interface BudgetLineItem extends TenantRecord {
  projectId: string;
  costCode: string;
  csiDivision: string;
  description: string;
  category: CostCategory;
  status: CostItemStatus;
  budgetedAmount: number;
  committedAmount: number;
  actualAmount: number;
  vendor?: string;
  purchaseOrder?: string;
  invoiceNumber?: string;
  plannedDate?: string;
  actualDate?: string;
  createdBy: string;
  createdAt: string;
  updatedAt: string;
}

export interface BudgetLineItemView extends BudgetLineItem {
  remainingAmount: number;
  variance: number;
  variancePercentage: number;
  budgetStatus: BudgetStatus;
}

export type ChangeOrderStatus = 'pending' | 'approved' | 'rejected';

export interface ChangeOrder extends TenantRecord {
  projectId: string;
  coNumber: string;
  description: string;
  reason: string;
  amount: number;
  status: ChangeOrderStatus;
  impactDescription?: string;
  submittedDate: string;
  decidedDate?: string;
  createdAt: string;
  updatedAt: string;
}

export interface CostTotals {
  totalBudget: number;
  totalCommitted: number;
  totalActual: number;
  totalRemaining: number;
  approvedChangeOrders: number;
  revisedBudget: number;
  budgetVariance: number;
  variancePercentage: number;
}

export interface DivisionPerformance {
  division: string;
  divisionName: string;
  budgeted: number;
  committed: number;
  actual: number;
  remaining: number;
  variance: number;
  variancePercentage: number;
  status: BudgetStatus;
}
