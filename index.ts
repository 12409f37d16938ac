#!/usr/bin/env npx ts-node
/**
 * Retention Simulator MCP Server
 *
 * Exposes the concept store over MCP (stdio): add and revise concepts,
 * advance the simulated clock and read the revision queue.
 */

import * as dotenv from 'dotenv';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { loadConfig } from './config';
import { createConceptSource } from './sources';
import { SimulationSession } from './simulation-session';
import { tools } from './tool-definitions';
import { createHandlers } from './handlers';

dotenv.config({ path: '.env.local' });

const config = loadConfig();
const session = new SimulationSession(createConceptSource(config), {
  decayRate: config.decayRate,
  logger: { log: console.error, warn: console.error, error: console.error },
});
const handlers = createHandlers(session);

const server = new Server(
  { name: 'retention-sim', version: '1.0.0' },
  { capabilities: { tools: {} } }
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  const handler = handlers[name];

  if (!handler) {
    return { content: [{ type: 'text', text: `Unknown tool: ${name}` }], isError: true };
  }

  try {
    return await handler(args);
  } catch (error) {
    return {
      content: [{ type: 'text', text: `Error: ${error instanceof Error ? error.message : 'Unknown'}` }],
      isError: true,
    };
  }
});

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  // stdout carries the protocol; log to stderr only
  console.error(`[retention-mcp] MCP server running (source: ${config.source}, decay rate: ${config.decayRate})`);
}

process.on('SIGTERM', () => {
  session
    .close()
    .catch((error) => console.error('[retention-mcp] Shutdown error:', error))
    .finally(() => process.exit(0));
});

main().catch((error) => { console.error('[retention-mcp] Fatal error:', error); process.exit(1); });
