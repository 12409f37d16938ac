#!/usr/bin/env npx ts-node
/**
 * Retention HTTP Server
 *
 * Starts the REST API on RETENTION_PORT with the configured concept source.
 */

import * as dotenv from 'dotenv';
import { loadConfig } from './config';
import { createConceptSource } from './sources';
import { SimulationSession } from './simulation-session';
import { createApp } from './http-api';

dotenv.config({ path: '.env.local' });

const config = loadConfig();
const session = new SimulationSession(createConceptSource(config), { decayRate: config.decayRate });
const app = createApp(session, { staticDir: config.staticDir });

const httpServer = app.listen(config.port, config.host, () => {
  console.log(`[retention-api] Retention HTTP API listening on port ${config.port} (source: ${config.source})`);
  console.log(`[retention-api] Health: http://localhost:${config.port}/api/health`);
});

process.on('SIGTERM', () => {
  console.log('[retention-api] Shutting down...');
  httpServer.close();
  session
    .close()
    .catch((error) => console.error('[retention-api] Shutdown error:', error))
    .finally(() => process.exit(0));
});
