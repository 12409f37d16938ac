/**
 * Concept Handlers
 *
 * MCP handlers for the concept collection: listing, adding, revising and
 * the revision queue.
 */

import {
  formatConceptList,
  formatConceptChange,
  formatSummaryResult,
  formatFailure,
  type McpResponse,
} from '../formatters';
import { parseRequest, newConceptSchema, conceptIdSchema, queueSchema } from '../request-schemas';
import type { SimulationSession } from '../simulation-session';

export type { McpResponse };

export type Handler = (args: unknown) => Promise<McpResponse>;

export function createConceptHandlers(session: SimulationSession): Record<string, Handler> {
  return {
    list_concepts: async () => {
      const result = await session.listConcepts();
      if (!result.success) return formatFailure(result.error);
      return formatConceptList(result.data, 'Concepts');
    },

    add_concept: async (args) => {
      const input = parseRequest(newConceptSchema, args);
      if (!input.success) return formatFailure(input.error);
      const result = await session.addConcept(input.data);
      if (!result.success) return formatFailure(result.error);
      return formatConceptChange('Added', result.data);
    },

    revise_concept: async (args) => {
      const input = parseRequest(conceptIdSchema, args);
      if (!input.success) return formatFailure(input.error);
      const result = await session.reviseConcept(input.data.conceptId);
      if (!result.success) return formatFailure(result.error);
      return formatConceptChange('Revised', result.data);
    },

    get_revision_queue: async (args) => {
      const input = parseRequest(queueSchema, args);
      if (!input.success) return formatFailure(input.error);
      const result = await session.getRevisionQueue(input.data.limit);
      if (!result.success) return formatFailure(result.error);
      return formatConceptList(result.data, 'Revision queue (weakest first)');
    },

    get_retention_summary: async () => {
      const result = await session.getRetentionSummary();
      if (!result.success) return formatFailure(result.error);
      return formatSummaryResult(result.data);
    },
  };
}
