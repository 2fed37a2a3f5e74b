import { z } from 'zod';

import { PrioritySchema } from './common.zod';

export const RfiCategorySchema = z.enum([
  'design_clarification',
  'specification_question',
  'coordination_issue',
  'material_substitution',
  'construction_method',
  'schedule_impact',
  'cost_impact',
  'safety_concern',
]);

export const RfiStatusSchema = z.enum(['draft', 'submitted', 'under_review', 'answered', 'closed']);

export const RfiCreateSchema = z.object({
  title: z.string().min(1),
  description: z.string().min(1),
  question: z.string().min(1),
  category: RfiCategorySchema,
  priority: PrioritySchema.default('medium'),
  location: z.string().optional(),
  drawingReferences: z.array(z.string().min(1)).default([]),
  specificationSections: z.array(z.string().min(1)).default([]),
  submittedBy: z.string().min(1),
  assignedTo: z.string().min(1),
  reviewers: z.array(z.string().min(1)).default([]),
  dueDate: z.string().date().optional(),
  costImpact: z.number().optional(),
  scheduleImpactDays: z.number().int().optional(),
});

export const RfiUpdateSchema = RfiCreateSchema.omit({ submittedBy: true })
  .partial()
  .strict();

export const RfiResponseSchema = z.object({
  respondedBy: z.string().min(1),
  responseText: z.string().min(1),
  requiresFurtherClarification: z.boolean().default(false),
});

export const RfiListQuerySchema = z.object({
  status: RfiStatusSchema.optional(),
  priority: PrioritySchema.optional(),
  overdue: z.enum(['true', 'false']).optional(),
});

export type RfiCreateInput = z.infer<typeof RfiCreateSchema>;
export type RfiUpdateInput = z.infer<typeof RfiUpdateSchema>;
export type RfiResponseInput = z.infer<typeof RfiResponseSchema>;
export type RfiListQuery = z.infer<typeof RfiListQuerySchema>;
