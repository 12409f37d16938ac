/**
 * Concept Source Contract
 *
 * A concept source supplies the one-time import snapshot and receives
 * decay-rate changes. Implementations throw RetentionErrors with code
 * EXTERNAL_COLLABORATOR_FAILURE when the collaborator cannot be reached
 * or answers with something unparsable. Nothing is retried.
 */

import type { ImportSnapshot } from '../simulation-state';

export interface ConceptSource {
  readonly kind: string;
  importSnapshot(): Promise<ImportSnapshot>;
  /** Resolves with the collaborator's acknowledgment, passed through as-is */
  forwardDecayRate(rate: number): Promise<unknown>;
  close?(): Promise<void>;
}
