import { z } from 'zod';

export const CostCategorySchema = z.enum([
  'labor',
  'materials',
  'equipment',
  'subcontractor',
  'overhead',
  'contingency',
]);

export const CostItemStatusSchema = z.enum(['planned', 'committed', 'invoiced', 'paid']);

export const BudgetLineItemCreateSchema = z.object({
  costCode: z.string().min(1),
  csiDivision: z.string().regex(/^\d{2}$/, 'csiDivision must be a two-digit division code'),
  description: z.string().min(1),
  category: CostCategorySchema,
  status: CostItemStatusSchema.default('planned'),
  budgetedAmount: z.number().positive(),
  committedAmount: z.number().nonnegative().default(0),
  actualAmount: z.number().nonnegative().default(0),
  vendor: z.string().optional(),
  purchaseOrder: z.string().optional(),
  invoiceNumber: z.string().optional(),
  plannedDate: z.string().date().optional(),
  actualDate: z.string().date().optional(),
  createdBy: z.string().min(1),
});

export const BudgetLineItemUpdateSchema = BudgetLineItemCreateSchema.omit({ createdBy: true })
  .partial()
  .strict();

export const BudgetLineItemListQuerySchema = z.object({
  category: CostCategorySchema.optional(),
  status: CostItemStatusSchema.optional(),
  csiDivision: z.string().optional(),
});

export const ChangeOrderCreateSchema = z.object({
  description: z.string().min(1),
  reason: z.string().min(1),
  amount: z.number(),
  impactDescription: z.string().optional(),
});

export type BudgetLineItemCreateInput = z.infer<typeof BudgetLineItemCreateSchema>;
export type BudgetLineItemUpdateInput = z.infer<typeof BudgetLineItemUpdateSchema>;
export type BudgetLineItemListQuery = z.infer<typeof BudgetLineItemListQuerySchema>;
export type ChangeOrderCreateInput = z.infer<typeof ChangeOrderCreateSchema>;
