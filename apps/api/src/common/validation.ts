import { UnprocessableEntityException } from '@nestjs/common';
import type { z, ZodTypeAny } from 'zod';

/**
 * Parses a request body or query with a zod schema, answering 422 with the
 * issue list when it does not conform.
 */
export function parseOrThrow<S extends ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new UnprocessableEntityException({
      error: 'ValidationError',
      issues: parsed.error.issues.map((i) => ({ path: i.path, message: i.message })),
    });
  }
  return parsed.data;
}
