import { z } from 'zod';

import { PrioritySchema } from './common.zod';

export const SystemTypeSchema = z.enum([
  'structural',
  'mechanical',
  'electrical',
  'plumbing',
  'fire_protection',
  'architectural',
  'civil',
]);

export const ElementStatusSchema = z.enum([
  'not_started',
  'in_progress',
  'complete',
  'issue',
  'on_hold',
]);

export const ClashStatusSchema = z.enum(['active', 'reviewing', 'resolved', 'ignored']);

const Point3DSchema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
});

export const ElementGeometrySchema = z
  .discriminatedUnion('kind', [
    z.object({
      kind: z.literal('linear'),
      start: Point3DSchema,
      end: Point3DSchema,
      width: z.number().nonnegative(),
      height: z.number().nonnegative(),
    }),
    z.object({
      kind: z.literal('box'),
      min: Point3DSchema,
      max: Point3DSchema,
    }),
  ])
  .refine(
    (g) => g.kind !== 'box' || (g.min.x <= g.max.x && g.min.y <= g.max.y && g.min.z <= g.max.z),
    { message: 'box min must not exceed max on any axis', path: ['max'] },
  );

export const BimElementCreateSchema = z.object({
  modelId: z.string().min(1),
  name: z.string().min(1),
  customId: z.string().min(1).optional(),
  systemType: SystemTypeSchema,
  subSystemType: z.string().optional(),
  elementType: z.string().min(1),
  status: ElementStatusSchema.default('not_started'),
  level: z.string().min(1),
  zone: z.string().optional(),
  gridLocation: z.string().optional(),
  geometry: ElementGeometrySchema,
  properties: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
  ifcGuid: z.string().optional(),
});

export const ElementStatusUpdateSchema = z.object({
  status: ElementStatusSchema,
});

export const ElementListQuerySchema = z.object({
  systemType: SystemTypeSchema.optional(),
  status: ElementStatusSchema.optional(),
  level: z.string().optional(),
});

export const ClashDetectionOptionsSchema = z
  .object({
    hardTolerance: z.number().nonnegative().default(0),
    softTolerance: z.number().nonnegative().default(25),
    includeSameSystem: z.boolean().default(false),
  })
  .refine((o) => o.softTolerance >= o.hardTolerance, {
    message: 'softTolerance must be at least hardTolerance',
    path: ['softTolerance'],
  });

export const ClashUpdateSchema = z.object({
  status: ClashStatusSchema,
  resolution: z.string().min(1).optional(),
  assignedTo: z.string().min(1).optional(),
});

export const ClashListQuerySchema = z.object({
  status: ClashStatusSchema.optional(),
  priority: PrioritySchema.optional(),
});

export const WorkItemCreateSchema = z.object({
  elementId: z.string().min(1),
  workType: z.string().min(1),
  description: z.string().min(1),
  assignedTo: z.string().min(1),
  startDate: z.string().date().optional(),
  targetCompletion: z.string().date().optional(),
  progressPercentage: z.number().default(0),
});

export const WorkProgressSchema = z.object({
  progressPercentage: z.number(),
  note: z.string().min(1).optional(),
});

export type BimElementCreateInput = z.infer<typeof BimElementCreateSchema>;
export type ElementListQuery = z.infer<typeof ElementListQuerySchema>;
export type ClashDetectionOptions = z.infer<typeof ClashDetectionOptionsSchema>;
export type ClashUpdateInput = z.infer<typeof ClashUpdateSchema>;
export type ClashListQuery = z.infer<typeof ClashListQuerySchema>;
export type WorkItemCreateInput = z.infer<typeof WorkItemCreateSchema>;
export type WorkProgressInput = z.infer<typeof WorkProgressSchema>;
