/**
 * Retention Simulator Constants
 *
 * Centralized configuration values for the memory model.
 * The decay curve is the classic exponential forgetting curve:
 * strength = initial * e^(-lambda * days)
 */

// =============================================================================
// Decay Curve
// =============================================================================

/** Default decay constant shared by every concept */
export const DEFAULT_DECAY_RATE = 0.15;

/** Residual memory that never fades */
export const MEMORY_FLOOR = 0.1;

/** Upper bound on memory strength */
export const MEMORY_CEILING = 1.0;

/** Strength at or above which a concept is treated as just revised */
export const FRESH_STRENGTH_THRESHOLD = 0.9;

/** Elapsed days reported when a memory has fully decayed */
export const UNKNOWN_AGE_DAYS = 999;

// =============================================================================
// Revision
// =============================================================================

/** Additive boost applied by a revision (capped at MEMORY_CEILING) */
export const REVISION_BOOST = 0.4;

/** Strength of a freshly added concept */
export const NEW_CONCEPT_STRENGTH = 1.0;

// =============================================================================
// Seeding
// =============================================================================

/** Simulated day the clock is set to when imported history is reconstructed */
export const SEED_BASELINE_DAY = 30;

/**
 * Banded initial weights assumed for imported concepts that carry no
 * revision history. Bands are checked in order; the first match wins.
 */
export const SEED_INITIAL_WEIGHT_BANDS = [
  { below: 0.5, initialWeight: 0.85 },
  { below: 0.7, initialWeight: 0.9 },
] as const;

/** Minimum initial weight assumed for strong imported concepts */
export const SEED_STRONG_INITIAL_WEIGHT = 0.95;

// =============================================================================
// Review Priority
// =============================================================================

/** Concepts below this strength count as urgent */
export const URGENCY_THRESHOLD = 0.3;

/** Upper bounds of the priority bands (urgent < high < medium < low) */
export const PRIORITY_BANDS = {
  urgent: URGENCY_THRESHOLD,
  high: 0.5,
  medium: 0.7,
} as const;

/** Default number of concepts printed by the simulation report */
export const DEFAULT_QUEUE_LIMIT = 10;

// =============================================================================
// External Collaborators
// =============================================================================

/** Timeout for one invocation of the backend executable */
export const DEFAULT_BACKEND_TIMEOUT_MS = 5000;

/** Characters of unparsable output quoted in collaborator errors */
export const OUTPUT_PREVIEW_LENGTH = 100;
