/**
 * Request Validation Schemas
 *
 * Zod schemas shared by the HTTP API and the MCP handlers.
 */

import { z } from 'zod';
import { fail, succeed, type OperationResult } from './errors';

export const newConceptSchema = z.object({
  id: z.string().optional(),
  name: z.string().default(''),
  category: z.string().default(''),
  prerequisites: z.array(z.string()).default([]),
});

export const conceptIdSchema = z.object({
  conceptId: z.string().min(1, 'conceptId is required'),
});

export const advanceSchema = z.object({
  days: z.number({ required_error: 'days is required' }).int('days must be an integer').safe('days out of range'),
});

export const decayRateSchema = z.object({
  rate: z.number({ required_error: 'rate is required' }).finite().nonnegative(),
});

export const queueSchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
});

/**
 * Validate a request payload, reporting the first problem as INVALID_INPUT.
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): OperationResult<z.infer<S>> {
  const parsed = schema.safeParse(input ?? {});
  if (parsed.success) return succeed(parsed.data);

  const issue = parsed.error.issues[0];
  const field = issue?.path.join('.');
  const message = issue ? (field ? `${field}: ${issue.message}` : issue.message) : 'Invalid request';
  return fail('INVALID_INPUT', message);
}
