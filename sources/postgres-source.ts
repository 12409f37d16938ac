/**
 * Postgres Concept Source
 *
 * Imports concepts and the revision counter from PostgreSQL and records
 * decay-rate changes in simulation_settings. Table layout: db/schema.sql.
 */

import { query, queryOne, closePool } from '../db/client';
import { toCollaboratorError } from '../errors';
import { parseSnapshot } from './snapshot-schema';
import type { ConceptSource } from './types';
import type { ImportSnapshot } from '../simulation-state';

interface ConceptRow {
  id: string;
  name: string;
  category: string;
  prerequisites: string[];
  memory_strength: number;
  initial_weight: number | null;
}

export class PostgresConceptSource implements ConceptSource {
  readonly kind = 'postgres';

  async importSnapshot(): Promise<ImportSnapshot> {
    let rows: ConceptRow[];
    let counters: { total_revisions: number } | null;

    try {
      rows = await query<ConceptRow>(
        `SELECT id, name, category, prerequisites, memory_strength, initial_weight
         FROM concepts
         ORDER BY position`
      );
      counters = await queryOne<{ total_revisions: number }>(
        `SELECT total_revisions FROM simulation_counters LIMIT 1`
      );
    } catch (error) {
      throw toCollaboratorError(error, 'Concept import failed');
    }

    return parseSnapshot(rows, { totalRevisions: counters?.total_revisions }, 'database');
  }

  async forwardDecayRate(rate: number): Promise<unknown> {
    try {
      const row = await queryOne<{ decay_rate: number; updated_at: Date }>(
        `INSERT INTO simulation_settings (id, decay_rate, updated_at)
         VALUES (1, $1, now())
         ON CONFLICT (id) DO UPDATE SET decay_rate = EXCLUDED.decay_rate, updated_at = EXCLUDED.updated_at
         RETURNING decay_rate, updated_at`,
        [rate]
      );
      return { status: 'success', rate: row?.decay_rate ?? rate };
    } catch (error) {
      throw toCollaboratorError(error, 'Decay rate update failed');
    }
  }

  async close(): Promise<void> {
    await closePool();
  }
}
