import { z } from 'zod';

const ProjectFields = z.object({
  name: z.string().min(1),
  projectNumber: z.string().min(1),
  description: z.string().optional(),
  status: z.enum(['planning', 'active', 'on_hold', 'completed', 'cancelled']).default('planning'),
  contractValue: z.number().nonnegative().default(0),
  location: z.string().optional(),
  projectManager: z.string().optional(),
  startDate: z.string().date().optional(),
  plannedCompletionDate: z.string().date().optional(),
});

const completionAfterStart = (p: { startDate?: string; plannedCompletionDate?: string }) =>
  !p.startDate || !p.plannedCompletionDate || p.plannedCompletionDate >= p.startDate;

const completionMessage = {
  message: 'plannedCompletionDate must not be before startDate',
  path: ['plannedCompletionDate'],
};

export const ProjectCreateSchema = ProjectFields.refine(completionAfterStart, completionMessage);

export const ProjectUpdateSchema = ProjectFields.omit({ projectNumber: true })
  .partial()
  .refine(completionAfterStart, completionMessage);

export type ProjectCreateInput = z.infer<typeof ProjectCreateSchema>;
export type ProjectUpdateInput = z.infer<typeof ProjectUpdateSchema>;
