/**
 * Concept Operations Tests
 *
 * Seed, add, revise, advance and decay-rate transitions plus the read
 * projections over a SimulationState.
 */

import {
  seedConcepts,
  addConcept,
  reviseConcept,
  advanceDays,
  setDecayRate,
  getStats,
  getRevisionQueue,
  getNextRevision,
  getRetentionSummary,
} from '../concept-operations';
import { classifyPriority, refreshStats, deriveConceptId } from '../concept-helpers';
import { createSimulationState, type RawConcept, type SimulationState } from '../simulation-state';

// =============================================================================
// Helpers
// =============================================================================

function raw(id: string, strength: number, extra: Partial<RawConcept> = {}): RawConcept {
  return { id, name: id.toUpperCase(), category: 'Test', prerequisites: [], memory_strength: strength, ...extra };
}

function seeded(concepts: RawConcept[], totalRevisions?: number): SimulationState {
  const state = createSimulationState();
  seedConcepts(state, { concepts, counters: { totalRevisions } });
  return state;
}

function strengthOf(state: SimulationState, id: string): number | undefined {
  return state.concepts.find((c) => c.id === id)?.memory_strength;
}

// =============================================================================
// Seed
// =============================================================================

describe('seedConcepts', () => {
  it('reconstructs history for a weak imported concept', () => {
    const state = createSimulationState();
    const result = seedConcepts(state, { concepts: [raw('a', 0.4)], counters: {} });

    expect(result).toEqual({ seeded: true, imported: 1, skipped: [] });
    expect(state.currentDay).toBe(30);
    expect(state.seeded).toBe(true);
    expect(state.concepts[0]).toEqual({
      id: 'a',
      name: 'A',
      category: 'Test',
      prerequisites: [],
      memory_strength: 0.4,
      initial_weight: 0.85,
      last_revised_day: 25,
    });
  });

  it('is a no-op after the first run', () => {
    const state = seeded([raw('a', 0.4)]);
    const again = seedConcepts(state, { concepts: [raw('b', 0.6)], counters: {} });

    expect(again).toEqual({ seeded: false, imported: 0, skipped: [] });
    expect(state.concepts.map((c) => c.id)).toEqual(['a']);
  });

  it('keeps a supplied initial weight that differs from the strength', () => {
    const state = seeded([raw('b', 0.5, { initial_weight: 0.8 })]);

    expect(state.concepts[0].initial_weight).toBe(0.8);
    expect(state.concepts[0].last_revised_day).toBe(27);
  });

  it('replaces an initial weight equal to the current strength', () => {
    const state = seeded([raw('c', 0.6, { initial_weight: 0.6 })]);

    expect(state.concepts[0].initial_weight).toBe(0.9);
    expect(state.concepts[0].last_revised_day).toBe(27);
  });

  it('places strong and fully decayed concepts at the ends of the timeline', () => {
    const state = seeded([raw('strong', 0.95), raw('steady', 0.75), raw('gone', 0)]);

    expect(state.concepts.map((c) => [c.id, c.initial_weight, c.last_revised_day])).toEqual([
      ['strong', 0.95, 30],
      ['steady', 0.95, 28],
      ['gone', 0.85, 0],
    ]);
  });

  it('uses the state decay rate for age inference', () => {
    const state = createSimulationState({ decayRate: 0.3 });
    seedConcepts(state, { concepts: [raw('a', 0.4)], counters: {} });

    expect(state.concepts[0].last_revised_day).toBe(27);
  });

  it('takes the revision counter from the snapshot and refreshes aggregates', () => {
    const state = seeded([raw('a', 0.2), raw('b', 0.4), raw('c', 0.9)], 12);

    expect(state.stats.totalRevisions).toBe(12);
    expect(state.stats.totalConcepts).toBe(3);
    expect(state.stats.avgMemory).toBeCloseTo(50, 5);
    expect(state.stats.urgentCount).toBe(1);
  });

  it('skips duplicate ids within the import and against existing concepts', () => {
    const state = createSimulationState();
    addConcept(state, { id: 'x', name: 'X' });

    const result = seedConcepts(state, {
      concepts: [raw('a', 0.4), raw('a', 0.6), raw('x', 0.3)],
      counters: {},
    });

    expect(result).toEqual({ seeded: true, imported: 1, skipped: ['a', 'x'] });
    expect(state.concepts.map((c) => c.id)).toEqual(['a', 'x']);
    expect(state.concepts[0].memory_strength).toBe(0.4);
  });
});

// =============================================================================
// Add
// =============================================================================

describe('addConcept', () => {
  it('inserts a freshly learned concept', () => {
    const state = createSimulationState();
    state.currentDay = 12;

    const result = addConcept(state, { id: 'x', name: 'X', category: 'Algorithms', prerequisites: ['arrays'] });

    expect(result).toEqual({
      success: true,
      data: {
        id: 'x',
        name: 'X',
        category: 'Algorithms',
        prerequisites: ['arrays'],
        memory_strength: 1.0,
        initial_weight: 1.0,
        last_revised_day: 12,
      },
    });
    expect(state.stats.totalConcepts).toBe(1);
    expect(state.stats.avgMemory).toBe(100);
  });

  it('rejects a duplicate id and leaves the collection unchanged', () => {
    const state = createSimulationState();
    addConcept(state, { id: 'x', name: 'X' });

    const result = addConcept(state, { id: 'x', name: 'Another X' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('DUPLICATE_IDENTITY');
      expect(result.error.message).toBe('Concept with id "x" already exists');
    }
    expect(state.concepts).toHaveLength(1);
    expect(state.concepts[0].name).toBe('X');
  });

  it('derives the id from the name when none is given', () => {
    const state = createSimulationState();
    const result = addConcept(state, { name: 'Dynamic  Programming' });

    expect(result.success && result.data.id).toBe('dynamic_programming');
    expect(deriveConceptId('  Hash Tables ')).toBe('hash_tables');
  });

  it('rejects a concept with neither id nor name', () => {
    const state = createSimulationState();
    const result = addConcept(state, { id: ' ', name: '  ' });

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.code).toBe('INVALID_INPUT');
    expect(state.concepts).toHaveLength(0);
  });

  it('copies the prerequisite list', () => {
    const state = createSimulationState();
    const prerequisites = ['arrays'];
    addConcept(state, { id: 'x', name: 'X', prerequisites });
    prerequisites.push('trees');

    expect(state.concepts[0].prerequisites).toEqual(['arrays']);
  });
});

// =============================================================================
// Revise
// =============================================================================

describe('reviseConcept', () => {
  it('boosts a strong concept to full strength', () => {
    const state = seeded([raw('x', 0.8)]);

    const result = reviseConcept(state, 'x');

    expect(result.success).toBe(true);
    expect(state.concepts[0].memory_strength).toBe(1.0);
    expect(state.concepts[0].initial_weight).toBe(1.0);
    expect(state.concepts[0].last_revised_day).toBe(30);
    expect(state.stats.totalRevisions).toBe(1);
  });

  it('adds a fixed boost instead of resetting a weak concept', () => {
    const state = seeded([raw('x', 0.1)]);

    reviseConcept(state, 'x');
    expect(state.concepts[0].memory_strength).toBeCloseTo(0.5, 10);

    reviseConcept(state, 'x');
    expect(state.concepts[0].memory_strength).toBeCloseTo(0.9, 10);
    expect(state.stats.totalRevisions).toBe(2);
  });

  it('anchors decay at the revised strength', () => {
    const state = seeded([raw('a', 0.1), raw('b', 0.35), raw('c', 0.7), raw('d', 1.0)]);

    for (const concept of state.concepts) {
      reviseConcept(state, concept.id);
      expect(concept.initial_weight).toBe(concept.memory_strength);
    }
  });

  it('fails for an unknown id without counting a revision', () => {
    const state = seeded([raw('x', 0.5)]);

    const result = reviseConcept(state, 'missing');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('NOT_FOUND');
      expect(result.error.message).toBe('Concept "missing" not found');
    }
    expect(state.stats.totalRevisions).toBe(0);
  });
});

// =============================================================================
// Advance
// =============================================================================

describe('advanceDays', () => {
  function freshConcept(): SimulationState {
    const state = createSimulationState();
    addConcept(state, { id: 'x', name: 'X' });
    return state;
  }

  it('decays a fresh concept over ten days', () => {
    const state = freshConcept();

    const result = advanceDays(state, 10);

    expect(result).toEqual({ success: true, data: { days: 10, currentDay: 10 } });
    expect(strengthOf(state, 'x')).toBeCloseTo(0.2231, 4);
    expect(state.concepts[0].initial_weight).toBe(1.0);
    expect(state.concepts[0].last_revised_day).toBe(0);
  });

  it('does not accumulate across repeated zero-day advances', () => {
    const state = freshConcept();
    advanceDays(state, 10);

    advanceDays(state, 0);
    const once = strengthOf(state, 'x');
    advanceDays(state, 0);

    expect(strengthOf(state, 'x')).toBe(once);
  });

  it('depends only on the cumulative elapsed time', () => {
    const stepped = freshConcept();
    advanceDays(stepped, 4);
    advanceDays(stepped, 6);

    const direct = freshConcept();
    advanceDays(direct, 10);

    expect(strengthOf(stepped, 'x')).toBe(strengthOf(direct, 'x'));
  });

  it('accepts negative days and moves the clock backward', () => {
    const state = freshConcept();
    advanceDays(state, 10);

    advanceDays(state, -5);

    expect(state.currentDay).toBe(5);
    expect(strengthOf(state, 'x')).toBeCloseTo(0.4724, 4);
  });

  it('caps strength at 1.0 when the clock moves before the last revision', () => {
    const state = freshConcept();

    advanceDays(state, -3);

    expect(state.currentDay).toBe(-3);
    expect(strengthOf(state, 'x')).toBe(1.0);
  });

  it('bottoms out at the residual floor', () => {
    const state = freshConcept();
    advanceDays(state, 30);

    expect(strengthOf(state, 'x')).toBe(0.1);
  });

  it('rejects fractional days without moving the clock', () => {
    const state = freshConcept();

    const result = advanceDays(state, 1.5);

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.code).toBe('INVALID_INPUT');
    expect(state.currentDay).toBe(0);
    expect(strengthOf(state, 'x')).toBe(1.0);
  });

  it('rejects day counts beyond the safe integer range', () => {
    const state = freshConcept();

    const result = advanceDays(state, 1e308);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('INVALID_INPUT');
      expect(result.error.message).toBe('days out of range, got 1e+308');
    }
    expect(state.currentDay).toBe(0);
    expect(strengthOf(state, 'x')).toBe(1.0);
  });

  it('rejects an advance that would push the clock past the safe integer range', () => {
    const state = freshConcept();
    advanceDays(state, Number.MAX_SAFE_INTEGER);

    const result = advanceDays(state, 1);

    expect(result.success).toBe(false);
    expect(state.currentDay).toBe(Number.MAX_SAFE_INTEGER);
  });
});

// =============================================================================
// Decay Rate
// =============================================================================

describe('setDecayRate', () => {
  it('applies to later decay computations only', () => {
    const state = seeded([raw('a', 0.4)]);

    expect(setDecayRate(state, 0.3)).toEqual({ success: true, data: 0.3 });
    expect(state.concepts[0].last_revised_day).toBe(25);
    expect(state.concepts[0].memory_strength).toBe(0.4);

    advanceDays(state, 0);
    // 0.85 * e^(-0.3 * 5)
    expect(state.concepts[0].memory_strength).toBeCloseTo(0.1897, 4);
  });

  it('rejects negative and non-finite rates', () => {
    const state = createSimulationState();

    for (const rate of [-0.1, Number.NaN, Infinity]) {
      const result = setDecayRate(state, rate);
      expect(result.success).toBe(false);
      if (!result.success) expect(result.error.code).toBe('INVALID_INPUT');
    }
    expect(state.decayRate).toBe(0.15);
  });
});

// =============================================================================
// Reads
// =============================================================================

describe('getStats', () => {
  it('refreshes and stores the derived aggregates', () => {
    const state = seeded([raw('a', 0.5), raw('b', 0.6)], 4);
    state.concepts[0].memory_strength = 0.2;
    expect(state.stats.urgentCount).toBe(0);

    const stats = getStats(state);

    expect(stats.urgentCount).toBe(1);
    expect(stats.avgMemory).toBeCloseTo(40, 5);
    expect(stats.totalRevisions).toBe(4);
    expect(stats.currentDay).toBe(30);
    expect(state.stats.urgentCount).toBe(1);
  });

  it('reports zeros for an empty collection', () => {
    const state = createSimulationState();

    expect(getStats(state)).toEqual({
      totalConcepts: 0,
      avgMemory: 0,
      urgentCount: 0,
      totalRevisions: 0,
      currentDay: 0,
    });
    expect(refreshStats(state).avgMemory).toBe(0);
  });
});

describe('getRevisionQueue', () => {
  const concepts = [raw('a', 0.5), raw('b', 0.3), raw('c', 0.5), raw('d', 0.1)];

  it('orders weakest first and keeps insertion order for ties', () => {
    const state = seeded(concepts);

    expect(getRevisionQueue(state).map((c) => c.id)).toEqual(['d', 'b', 'a', 'c']);
    expect(state.concepts.map((c) => c.id)).toEqual(['a', 'b', 'c', 'd']);
  });

  it('truncates to the requested limit', () => {
    const state = seeded(concepts);

    expect(getRevisionQueue(state, 2).map((c) => c.id)).toEqual(['d', 'b']);
  });

  it('exposes the head of the queue', () => {
    expect(getNextRevision(seeded(concepts))?.id).toBe('d');
    expect(getNextRevision(createSimulationState())).toBeNull();
  });
});

describe('getRetentionSummary', () => {
  it('counts priority bands and averages per category', () => {
    const state = seeded([
      raw('a', 0.2, { category: 'Algorithms' }),
      raw('b', 0.45, { category: 'Data Structures' }),
      raw('c', 0.6, { category: 'Algorithms' }),
      raw('d', 0.8, { category: 'Data Structures' }),
    ]);

    const summary = getRetentionSummary(state);

    expect(summary.byPriority).toEqual({ urgent: 1, high: 1, medium: 1, low: 1 });
    expect(summary.byCategory.map((c) => [c.category, c.count])).toEqual([
      ['Algorithms', 2],
      ['Data Structures', 2],
    ]);
    expect(summary.byCategory[0].avgMemory).toBeCloseTo(40, 5);
    expect(summary.byCategory[1].avgMemory).toBeCloseTo(62.5, 5);
  });

  it('classifies band boundaries into the weaker-priority band', () => {
    expect(classifyPriority(0.29)).toBe('urgent');
    expect(classifyPriority(0.3)).toBe('high');
    expect(classifyPriority(0.5)).toBe('medium');
    expect(classifyPriority(0.7)).toBe('low');
  });
});
