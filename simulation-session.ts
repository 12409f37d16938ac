/**
 * Simulation Session
 *
 * Owns one SimulationState and the concept source it is seeded from.
 * The first operation imports the snapshot and seeds the store; concurrent
 * first callers share that import. A failed import is reported to the
 * caller that triggered it and leaves the store unseeded, so the next
 * request imports again.
 */

import {
  seedConcepts,
  addConcept,
  reviseConcept,
  advanceDays,
  setDecayRate,
  getConcepts,
  getStats,
  getRevisionQueue,
  getNextRevision,
  getRetentionSummary,
  type SeedResult,
  type NewConceptInput,
  type AdvanceResult,
} from './concept-operations';
import { succeed, toCollaboratorError, type OperationResult } from './errors';
import { createSimulationState, type Concept, type SimulationState, type StatsView } from './simulation-state';
import type { RetentionSummary } from './concept-helpers';
import type { ConceptSource } from './sources/types';

export interface DecayRateResult {
  rate: number;
  sink: { acknowledged: true; response: unknown } | { acknowledged: false; error: string };
}

export type SessionLogger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface SessionOptions {
  decayRate?: number;
  /** Defaults to console; stdio servers pass a stderr-only logger */
  logger?: SessionLogger;
}

export class SimulationSession {
  readonly state: SimulationState;
  private seeding: Promise<OperationResult<SeedResult>> | null = null;
  private readonly logger: SessionLogger;

  constructor(private readonly source: ConceptSource, options: SessionOptions = {}) {
    this.state = createSimulationState({ decayRate: options.decayRate });
    this.logger = options.logger ?? console;
  }

  // ===========================================================================
  // Seeding
  // ===========================================================================

  async ensureSeeded(): Promise<OperationResult<SeedResult>> {
    if (this.state.seeded) {
      return succeed({ seeded: false, imported: 0, skipped: [] });
    }
    if (!this.seeding) {
      this.seeding = this.importAndSeed().finally(() => {
        this.seeding = null;
      });
    }
    return this.seeding;
  }

  private async importAndSeed(): Promise<OperationResult<SeedResult>> {
    try {
      const snapshot = await this.source.importSnapshot();
      const result = seedConcepts(this.state, snapshot);
      this.logger.log(
        `[retention-session] Seeded ${result.imported} concepts from ${this.source.kind} (day ${this.state.currentDay})`
      );
      if (result.skipped.length > 0) {
        this.logger.warn(`[retention-session] Skipped duplicate ids: ${result.skipped.join(', ')}`);
      }
      return succeed(result);
    } catch (error) {
      const failure = toCollaboratorError(error, `Import from ${this.source.kind} failed`);
      this.logger.error('[retention-session] import error:', failure.message);
      return { success: false, error: failure };
    }
  }

  // ===========================================================================
  // Transitions
  // ===========================================================================

  async addConcept(input: NewConceptInput): Promise<OperationResult<Concept>> {
    const ready = await this.ensureSeeded();
    if (!ready.success) return ready;
    return addConcept(this.state, input);
  }

  async reviseConcept(id: string): Promise<OperationResult<Concept>> {
    const ready = await this.ensureSeeded();
    if (!ready.success) return ready;
    return reviseConcept(this.state, id);
  }

  async advance(days: number): Promise<OperationResult<AdvanceResult>> {
    const ready = await this.ensureSeeded();
    if (!ready.success) return ready;
    return advanceDays(this.state, days);
  }

  /**
   * Update the local decay rate, then forward it to the source. The
   * source's answer is passed through; a failing sink does not undo the
   * local change.
   */
  async setDecayRate(rate: number): Promise<OperationResult<DecayRateResult>> {
    const updated = setDecayRate(this.state, rate);
    if (!updated.success) return updated;

    try {
      const response = await this.source.forwardDecayRate(rate);
      return succeed({ rate, sink: { acknowledged: true, response } });
    } catch (error) {
      const failure = toCollaboratorError(error, `Forwarding decay rate to ${this.source.kind} failed`);
      this.logger.warn('[retention-session] decay-rate sink error:', failure.message);
      return succeed({ rate, sink: { acknowledged: false, error: failure.message } });
    }
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  async listConcepts(): Promise<OperationResult<Concept[]>> {
    const ready = await this.ensureSeeded();
    if (!ready.success) return ready;
    return succeed(getConcepts(this.state));
  }

  /** Refreshes the stored aggregates as a side effect. */
  async getStats(): Promise<OperationResult<StatsView>> {
    const ready = await this.ensureSeeded();
    if (!ready.success) return ready;
    return succeed(getStats(this.state));
  }

  async getRevisionQueue(limit?: number): Promise<OperationResult<Concept[]>> {
    const ready = await this.ensureSeeded();
    if (!ready.success) return ready;
    return succeed(getRevisionQueue(this.state, limit));
  }

  async getNextRevision(): Promise<OperationResult<Concept | null>> {
    const ready = await this.ensureSeeded();
    if (!ready.success) return ready;
    return succeed(getNextRevision(this.state));
  }

  async getRetentionSummary(): Promise<OperationResult<RetentionSummary>> {
    const ready = await this.ensureSeeded();
    if (!ready.success) return ready;
    return succeed(getRetentionSummary(this.state));
  }

  async close(): Promise<void> {
    await this.source.close?.();
  }
}
