/**
 * Simulation State
 *
 * Types for concepts, counters and the state value every transition
 * operates on. One state is created per session and discarded with it.
 */

import { DEFAULT_DECAY_RATE } from './constants';

export interface Concept {
  id: string;
  name: string;
  category: string;
  prerequisites: string[];
  memory_strength: number;
  initial_weight: number;
  last_revised_day: number;
}

/** Concept as supplied by an import source, before history is reconstructed */
export interface RawConcept {
  id: string;
  name: string;
  category: string;
  prerequisites: string[];
  memory_strength: number;
  initial_weight?: number;
}

export interface ImportSnapshot {
  concepts: RawConcept[];
  counters: { totalRevisions?: number };
}

export interface SimulationStats {
  totalConcepts: number;
  avgMemory: number;
  urgentCount: number;
  totalRevisions: number;
}

export interface StatsView extends SimulationStats {
  currentDay: number;
}

export interface SimulationState {
  concepts: Concept[];
  currentDay: number;
  decayRate: number;
  stats: SimulationStats;
  seeded: boolean;
}

export interface SimulationStateOptions {
  decayRate?: number;
  currentDay?: number;
}

export function createSimulationState(options: SimulationStateOptions = {}): SimulationState {
  const { decayRate = DEFAULT_DECAY_RATE, currentDay = 0 } = options;

  return {
    concepts: [],
    currentDay,
    decayRate,
    stats: {
      totalConcepts: 0,
      avgMemory: 0,
      urgentCount: 0,
      totalRevisions: 0,
    },
    seeded: false,
  };
}
