/**
 * Response Formatters
 *
 * Text renderings of concepts, stats and summaries for MCP tool responses
 * and the simulation report script.
 */

import { classifyPriority, type RetentionSummary } from './concept-helpers';
import type { RetentionError } from './errors';
import type { Concept, StatsView } from './simulation-state';

export type McpResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function text(body: string): McpResponse {
  return { content: [{ type: 'text', text: body }] };
}

export function formatPercent(strength: number): string {
  return `${Math.round(strength * 100)}%`;
}

// =============================================================================
// Concept Formatters
// =============================================================================

export function formatConceptLine(concept: Concept, index: number): string {
  const prereqs = concept.prerequisites.length > 0 ? concept.prerequisites.join(', ') : 'none';
  return `[${index + 1}] ${concept.name || concept.id} (${concept.id}) - ${formatPercent(concept.memory_strength)} ` +
    `[${classifyPriority(concept.memory_strength)}]\n` +
    `    Category: ${concept.category || 'N/A'} | Last revised: day ${concept.last_revised_day} | Prerequisites: ${prereqs}`;
}

export function formatConceptList(concepts: Concept[], heading: string): McpResponse {
  if (concepts.length === 0) {
    return text('No concepts yet.');
  }
  const formatted = concepts.map(formatConceptLine).join('\n\n');
  return text(`${heading} (${concepts.length}):\n\n${formatted}`);
}

export function formatConceptChange(action: string, concept: Concept): McpResponse {
  return text(
    `${action}: ${concept.name || concept.id} (${concept.id}) now at ${formatPercent(concept.memory_strength)}, ` +
    `last revised day ${concept.last_revised_day}`
  );
}

// =============================================================================
// Stats Formatters
// =============================================================================

export function formatStatsText(stats: StatsView): string {
  return [
    `Day ${stats.currentDay}`,
    `- Concepts: ${stats.totalConcepts}`,
    `- Average memory: ${stats.avgMemory.toFixed(1)}%`,
    `- Urgent: ${stats.urgentCount}`,
    `- Revisions: ${stats.totalRevisions}`,
  ].join('\n');
}

export function formatStatsResult(stats: StatsView): McpResponse {
  return text(formatStatsText(stats));
}

export function formatSummaryResult(summary: RetentionSummary): McpResponse {
  const { urgent, high, medium, low } = summary.byPriority;
  const categories = summary.byCategory.length > 0
    ? summary.byCategory
      .map((c) => `- ${c.category || 'Uncategorized'}: ${c.count} concepts, avg ${c.avgMemory.toFixed(1)}%`)
      .join('\n')
    : '- none';

  return text(
    `Priority: urgent ${urgent}, high ${high}, medium ${medium}, low ${low}\n\nCategories:\n${categories}`
  );
}

/**
 * Plain-text report: stats followed by the head of the revision queue.
 */
export function formatQueueReport(stats: StatsView, queue: Concept[]): string {
  const rows = queue.map((c, i) =>
    `${String(i + 1).padStart(2)}. ${formatPercent(c.memory_strength).padStart(4)}  ${c.name || c.id} [${classifyPriority(c.memory_strength)}]`
  );
  return [formatStatsText(stats), '', 'Revision queue:', ...(rows.length > 0 ? rows : ['(empty)'])].join('\n');
}

// =============================================================================
// Failures
// =============================================================================

export function formatFailure(error: RetentionError): McpResponse {
  return { content: [{ type: 'text', text: `Error (${error.code}): ${error.message}` }], isError: true };
}
