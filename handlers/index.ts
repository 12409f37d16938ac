/**
 * Handler Registry Index
 *
 * Combines all handler modules into a single registry for MCP dispatch.
 */

export type { McpResponse, Handler } from './concept-handlers';
export { createConceptHandlers } from './concept-handlers';
export { createSimulationHandlers } from './simulation-handlers';

import { createConceptHandlers, type Handler } from './concept-handlers';
import { createSimulationHandlers } from './simulation-handlers';
import type { SimulationSession } from '../simulation-session';

/**
 * Combined handler registry for all MCP tools, bound to one session
 */
export function createHandlers(session: SimulationSession): Record<string, Handler> {
  return {
    ...createConceptHandlers(session),
    ...createSimulationHandlers(session),
  };
}
