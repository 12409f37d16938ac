#!/usr/bin/env npx ts-node
/**
 * Simulation Runner
 *
 * Seeds the store from the configured source, advances the clock and
 * prints the stats and revision queue.
 *
 * Usage: npm run simulate -- [days=7]
 */

import * as dotenv from 'dotenv';
import { loadConfig } from '../config';
import { DEFAULT_QUEUE_LIMIT } from '../constants';
import { formatQueueReport } from '../formatters';
import { createConceptSource } from '../sources';
import { SimulationSession } from '../simulation-session';

dotenv.config({ path: '.env.local' });

async function main() {
  const days = process.argv[2] === undefined ? 7 : Number(process.argv[2]);
  const config = loadConfig();
  const session = new SimulationSession(createConceptSource(config), { decayRate: config.decayRate });

  try {
    const advanced = await session.advance(days);
    if (!advanced.success) throw advanced.error;

    const stats = await session.getStats();
    const queue = await session.getRevisionQueue(DEFAULT_QUEUE_LIMIT);
    if (!stats.success) throw stats.error;
    if (!queue.success) throw queue.error;

    console.log(`[Simulation] Advanced ${days} days (decay rate ${session.state.decayRate})\n`);
    console.log(formatQueueReport(stats.data, queue.data));
  } catch (error) {
    console.error('[Simulation] Failed:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  } finally {
    await session.close();
  }
}

main().catch((error) => { console.error('[Simulation] Fatal error:', error); process.exit(1); });
