import { z } from 'zod';
import type { JsonValue } from '@gcpanel/types';

export const PrioritySchema = z.enum(['low', 'medium', 'high', 'critical']);

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

export const JsonObjectSchema = z.record(JsonValueSchema);
