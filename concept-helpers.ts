/**
 * Concept Helpers
 *
 * Aggregate statistics, priority classification and small lookups over
 * the concept collection.
 */

import { PRIORITY_BANDS, URGENCY_THRESHOLD } from './constants';
import type { Concept, SimulationState, SimulationStats } from './simulation-state';

export type Priority = 'urgent' | 'high' | 'medium' | 'low';

export interface CategorySummary {
  category: string;
  count: number;
  avgMemory: number;
}

export interface RetentionSummary {
  byPriority: Record<Priority, number>;
  byCategory: CategorySummary[];
}

export function findConcept(state: SimulationState, id: string): Concept | undefined {
  return state.concepts.find((c) => c.id === id);
}

/** Mean strength as a percentage (0 for an empty collection) */
export function averageMemoryPercent(concepts: Concept[]): number {
  if (concepts.length === 0) return 0;
  const total = concepts.reduce((sum, c) => sum + c.memory_strength, 0);
  return (total / concepts.length) * 100;
}

/**
 * Recompute the derived aggregates and store them on the state.
 * `totalRevisions` is a counter, not an aggregate, and is left alone.
 */
export function refreshStats(state: SimulationState): SimulationStats {
  state.stats.totalConcepts = state.concepts.length;
  state.stats.avgMemory = averageMemoryPercent(state.concepts);
  state.stats.urgentCount = state.concepts.filter((c) => c.memory_strength < URGENCY_THRESHOLD).length;
  return state.stats;
}

export function classifyPriority(strength: number): Priority {
  if (strength < PRIORITY_BANDS.urgent) return 'urgent';
  if (strength < PRIORITY_BANDS.high) return 'high';
  if (strength < PRIORITY_BANDS.medium) return 'medium';
  return 'low';
}

/** Weakest memory first; ties keep insertion order */
export function sortByStrength(concepts: Concept[]): Concept[] {
  return [...concepts].sort((a, b) => a.memory_strength - b.memory_strength);
}

export function buildRetentionSummary(concepts: Concept[]): RetentionSummary {
  const byPriority: Record<Priority, number> = { urgent: 0, high: 0, medium: 0, low: 0 };
  const categories = new Map<string, Concept[]>();

  for (const concept of concepts) {
    byPriority[classifyPriority(concept.memory_strength)]++;
    const members = categories.get(concept.category) ?? [];
    members.push(concept);
    categories.set(concept.category, members);
  }

  const byCategory = [...categories.entries()].map(([category, members]) => ({
    category,
    count: members.length,
    avgMemory: averageMemoryPercent(members),
  }));

  return { byPriority, byCategory };
}

/** "Dynamic Programming" -> "dynamic_programming" */
export function deriveConceptId(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, '_');
}
