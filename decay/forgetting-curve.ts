/**
 * Forgetting Curve - Exponential Decay
 *
 * Pure functions for the memory model. Strength decays from the weight
 * recorded at the last revision:
 *
 *   strength = clamp(initial * e^(-lambda * days), 0.1, 1.0)
 *
 * The inverse recovers how many days must have passed for an observed
 * strength, which lets imported concepts without revision history be
 * placed on the simulated timeline.
 */

import {
  MEMORY_FLOOR,
  MEMORY_CEILING,
  FRESH_STRENGTH_THRESHOLD,
  UNKNOWN_AGE_DAYS,
  SEED_INITIAL_WEIGHT_BANDS,
  SEED_STRONG_INITIAL_WEIGHT,
} from '../constants';

// =============================================================================
// Forward Decay
// =============================================================================

/**
 * Memory strength after `elapsedDays` without revision.
 *
 * Example with lambda=0.15 and initial 1.0:
 * - 0 days: 1.00
 * - 5 days: 0.47
 * - 10 days: 0.22
 * - 20 days: 0.10 (floor)
 *
 * Negative elapsed time moves strength back toward (and past) the initial
 * weight, capped at 1.0.
 */
export function computeStrength(initialWeight: number, elapsedDays: number, decayRate: number): number {
  const decayed = initialWeight * Math.exp(-decayRate * elapsedDays);
  if (Number.isNaN(decayed)) return MEMORY_FLOOR;
  return Math.max(MEMORY_FLOOR, Math.min(MEMORY_CEILING, decayed));
}

// =============================================================================
// Inverse Inference
// =============================================================================

/**
 * Days that must have elapsed for `memoryStrength` to be observed when
 * decay started from `initialWeight`.
 *
 * Total over all numeric input: degenerate cases yield 0 ("just revised")
 * and a fully decayed memory yields UNKNOWN_AGE_DAYS.
 */
export function inferElapsedDays(memoryStrength: number, initialWeight: number, decayRate: number): number {
  if (initialWeight <= 0) return 0;

  let anchor = initialWeight;
  if (memoryStrength >= initialWeight) {
    if (memoryStrength >= FRESH_STRENGTH_THRESHOLD) return 0;
    // Claimed initial is unreliable once the observed strength reaches it
    anchor = MEMORY_CEILING;
  }

  const ratio = memoryStrength / anchor;
  if (ratio <= 0) return UNKNOWN_AGE_DAYS;

  const days = -Math.log(ratio) / decayRate;
  if (!Number.isFinite(days)) return 0;

  return Math.max(0, Math.round(days));
}

/**
 * Plausible strength at the last revision for a concept whose only known
 * attribute is its current strength.
 */
export function inferInitialWeight(strength: number): number {
  for (const band of SEED_INITIAL_WEIGHT_BANDS) {
    if (strength < band.below) return band.initialWeight;
  }
  return Math.max(strength, SEED_STRONG_INITIAL_WEIGHT);
}
