/**
 * Concept Operations
 *
 * Transitions over a SimulationState: seed, add, revise, advance and
 * decay-rate changes, plus the read projections. Every transition either
 * applies completely or leaves the state untouched and returns a failure.
 */

import {
  NEW_CONCEPT_STRENGTH,
  REVISION_BOOST,
  MEMORY_CEILING,
  SEED_BASELINE_DAY,
} from './constants';
import { computeStrength, inferElapsedDays, inferInitialWeight } from './decay/forgetting-curve';
import {
  findConcept,
  refreshStats,
  averageMemoryPercent,
  sortByStrength,
  buildRetentionSummary,
  deriveConceptId,
  type RetentionSummary,
} from './concept-helpers';
import { succeed, fail, type OperationResult } from './errors';
import type { Concept, ImportSnapshot, SimulationState, StatsView } from './simulation-state';

export interface SeedResult {
  seeded: boolean;
  imported: number;
  skipped: string[];
}

export interface NewConceptInput {
  id?: string;
  name: string;
  category?: string;
  prerequisites?: string[];
}

export interface AdvanceResult {
  days: number;
  currentDay: number;
}

// =============================================================================
// Seed
// =============================================================================

/**
 * Reconstruct a revision history for imported concepts.
 *
 * The clock is set to SEED_BASELINE_DAY and each concept is placed at the
 * day its current strength implies. Runs once; later calls are no-ops.
 */
export function seedConcepts(state: SimulationState, snapshot: ImportSnapshot): SeedResult {
  if (state.seeded) {
    return { seeded: false, imported: 0, skipped: [] };
  }

  const currentDay = SEED_BASELINE_DAY;
  const knownIds = new Set(state.concepts.map((c) => c.id));
  const imported: Concept[] = [];
  const skipped: string[] = [];

  for (const raw of snapshot.concepts) {
    if (knownIds.has(raw.id)) {
      skipped.push(raw.id);
      continue;
    }
    knownIds.add(raw.id);

    const strength = raw.memory_strength;
    const initialWeight =
      raw.initial_weight === undefined || raw.initial_weight === strength
        ? inferInitialWeight(strength)
        : raw.initial_weight;
    const elapsed = inferElapsedDays(strength, initialWeight, state.decayRate);

    imported.push({
      id: raw.id,
      name: raw.name,
      category: raw.category,
      prerequisites: [...raw.prerequisites],
      memory_strength: strength,
      initial_weight: initialWeight,
      last_revised_day: Math.max(0, currentDay - elapsed),
    });
  }

  state.concepts = [...imported, ...state.concepts];
  state.currentDay = currentDay;
  if (snapshot.counters.totalRevisions !== undefined) {
    state.stats.totalRevisions = snapshot.counters.totalRevisions;
  }
  state.seeded = true;
  refreshStats(state);

  return { seeded: true, imported: imported.length, skipped };
}

// =============================================================================
// Add
// =============================================================================

export function addConcept(state: SimulationState, input: NewConceptInput): OperationResult<Concept> {
  const id = input.id?.trim() || deriveConceptId(input.name);
  if (!id) {
    return fail('INVALID_INPUT', 'id or name is required');
  }
  if (findConcept(state, id)) {
    return fail('DUPLICATE_IDENTITY', `Concept with id "${id}" already exists`);
  }

  const concept: Concept = {
    id,
    name: input.name,
    category: input.category ?? '',
    prerequisites: [...(input.prerequisites ?? [])],
    memory_strength: NEW_CONCEPT_STRENGTH,
    initial_weight: NEW_CONCEPT_STRENGTH,
    last_revised_day: state.currentDay,
  };

  state.concepts.push(concept);
  state.stats.totalConcepts = state.concepts.length;
  state.stats.avgMemory = averageMemoryPercent(state.concepts);

  return succeed(concept);
}

// =============================================================================
// Revise
// =============================================================================

/**
 * Reinforce a concept. The boost is additive, so a badly decayed concept
 * needs several revisions to reach full strength.
 */
export function reviseConcept(state: SimulationState, id: string): OperationResult<Concept> {
  const concept = findConcept(state, id);
  if (!concept) {
    return fail('NOT_FOUND', `Concept "${id}" not found`);
  }

  concept.memory_strength = Math.min(MEMORY_CEILING, concept.memory_strength + REVISION_BOOST);
  concept.initial_weight = concept.memory_strength;
  concept.last_revised_day = state.currentDay;
  state.stats.totalRevisions++;

  return succeed(concept);
}

// =============================================================================
// Advance
// =============================================================================

/**
 * Move the clock and recompute every strength from its revision anchor.
 * Negative day counts are accepted and move the clock backward.
 */
export function advanceDays(state: SimulationState, days: number): OperationResult<AdvanceResult> {
  if (!Number.isInteger(days)) {
    return fail('INVALID_INPUT', `days must be an integer, got ${days}`);
  }
  const currentDay = state.currentDay + days;
  if (!Number.isSafeInteger(days) || !Number.isSafeInteger(currentDay)) {
    return fail('INVALID_INPUT', `days out of range, got ${days}`);
  }

  state.currentDay = currentDay;
  for (const concept of state.concepts) {
    concept.memory_strength = computeStrength(
      concept.initial_weight,
      state.currentDay - concept.last_revised_day,
      state.decayRate
    );
  }

  return succeed({ days, currentDay: state.currentDay });
}

// =============================================================================
// Decay Rate
// =============================================================================

/** Takes effect for later decay computations only; history is untouched. */
export function setDecayRate(state: SimulationState, rate: number): OperationResult<number> {
  if (!Number.isFinite(rate) || rate < 0) {
    return fail('INVALID_INPUT', `rate must be a non-negative number, got ${rate}`);
  }
  state.decayRate = rate;
  return succeed(rate);
}

// =============================================================================
// Reads
// =============================================================================

export function getConcepts(state: SimulationState): Concept[] {
  return state.concepts;
}

/** Refreshes the stored aggregates before returning them. */
export function getStats(state: SimulationState): StatsView {
  return { ...refreshStats(state), currentDay: state.currentDay };
}

export function getRevisionQueue(state: SimulationState, limit?: number): Concept[] {
  const queue = sortByStrength(state.concepts);
  return limit === undefined ? queue : queue.slice(0, limit);
}

export function getNextRevision(state: SimulationState): Concept | null {
  return getRevisionQueue(state, 1)[0] ?? null;
}

export function getRetentionSummary(state: SimulationState): RetentionSummary {
  return buildRetentionSummary(state.concepts);
}
