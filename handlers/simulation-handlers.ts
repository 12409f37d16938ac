/**
 * Simulation Handlers
 *
 * MCP handlers for the clock, the decay rate and aggregate stats.
 */

import { formatStatsResult, formatFailure } from '../formatters';
import { parseRequest, advanceSchema, decayRateSchema } from '../request-schemas';
import type { SimulationSession } from '../simulation-session';
import type { Handler } from './concept-handlers';

export function createSimulationHandlers(session: SimulationSession): Record<string, Handler> {
  return {
    simulate_days: async (args) => {
      const input = parseRequest(advanceSchema, args);
      if (!input.success) return formatFailure(input.error);
      const result = await session.advance(input.data.days);
      if (!result.success) return formatFailure(result.error);
      return {
        content: [{ type: 'text', text: `Advanced ${result.data.days} days. Current day: ${result.data.currentDay}` }],
      };
    },

    set_decay_rate: async (args) => {
      const input = parseRequest(decayRateSchema, args);
      if (!input.success) return formatFailure(input.error);
      const result = await session.setDecayRate(input.data.rate);
      if (!result.success) return formatFailure(result.error);

      const { sink } = result.data;
      const sinkNote = sink.acknowledged
        ? `Backend acknowledged: ${JSON.stringify(sink.response)}`
        : `Backend did not acknowledge: ${sink.error}`;
      return { content: [{ type: 'text', text: `Decay rate set to ${result.data.rate}. ${sinkNote}` }] };
    },

    get_stats: async () => {
      const result = await session.getStats();
      if (!result.success) return formatFailure(result.error);
      return formatStatsResult(result.data);
    },
  };
}
