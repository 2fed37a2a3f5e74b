import { z } from 'zod';

import { JsonValueSchema } from './common.zod';

export const ImportPlatformSchema = z.enum(['procore', 'plangrid', 'fieldwire', 'buildingconnected']);

export const ImportDataTypeSchema = z.enum([
  'documents',
  'specifications',
  'bids',
  'daily_reports',
  'budget',
  'schedule',
  'incidents',
]);

export const ImportRequestSchema = z.object({
  platform: ImportPlatformSchema,
  dataType: ImportDataTypeSchema,
  importMethod: z.enum(['merge', 'replace']).default('merge'),
  data: JsonValueSchema,
});

export const ImportListQuerySchema = z.object({
  platform: ImportPlatformSchema.optional(),
  dataType: ImportDataTypeSchema.optional(),
  limit: z.coerce.number().int().positive().max(1000).default(1000),
});

export const ImportHistoryQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).default(50),
});

export type ImportRequest = z.infer<typeof ImportRequestSchema>;
export type ImportListQuery = z.infer<typeof ImportListQuerySchema>;
