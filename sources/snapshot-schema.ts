/**
 * Import Snapshot Validation
 *
 * Zod schemas for the payloads import sources hand back. Only the fields
 * the seed transition reads are checked.
 */

import { z } from 'zod';
import { RetentionError } from '../errors';
import type { ImportSnapshot } from '../simulation-state';

export const rawConceptSchema = z.object({
  id: z.string().min(1, 'id is required'),
  name: z.string().default(''),
  category: z.string().default(''),
  prerequisites: z.array(z.string()).default([]),
  memory_strength: z.number().min(0).max(1).default(1.0),
  // Outside (0, 1] the weight is ignored and inferred from memory_strength
  initial_weight: z
    .number()
    .nullish()
    .transform((value) => (typeof value === 'number' && value > 0 && value <= 1 ? value : undefined)),
});

export const countersSchema = z.object({
  totalRevisions: z.number().int().nonnegative().optional(),
});

/**
 * Validate raw concept and counter payloads into an ImportSnapshot.
 * A counters payload that fails validation is treated as absent.
 */
export function parseSnapshot(conceptsPayload: unknown, countersPayload: unknown, origin: string): ImportSnapshot {
  const concepts = z.array(rawConceptSchema).safeParse(conceptsPayload);
  if (!concepts.success) {
    const issue = concepts.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid payload';
    throw new RetentionError('EXTERNAL_COLLABORATOR_FAILURE', `Invalid concept data from ${origin} (${where})`);
  }

  const counters = countersSchema.safeParse(countersPayload);

  return {
    concepts: concepts.data,
    counters: counters.success ? counters.data : {},
  };
}
