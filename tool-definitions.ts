/**
 * MCP Tool Definitions
 *
 * Tool schemas for the retention simulator MCP server.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

export const tools: Tool[] = [
  {
    name: 'list_concepts',
    description: 'List every concept with its current memory strength, category and last revision day.',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'add_concept',
    description: `Learn a new concept. It starts at full strength, revised today.
The id defaults to the name in snake_case; adding an existing id fails.`,
    inputSchema: {
      type: 'object',
      properties: {
        id: { type: 'string', description: 'Unique id (default: derived from name)' },
        name: { type: 'string', description: 'Display name' },
        category: { type: 'string', description: 'Grouping, e.g. "Algorithms"' },
        prerequisites: { type: 'array', items: { type: 'string' }, description: 'Ids of prerequisite concepts' },
      },
      required: ['name'],
    },
  },
  {
    name: 'revise_concept',
    description: `Revise a concept: strength +0.4 (capped at 100%), decay restarts from today.`,
    inputSchema: {
      type: 'object',
      properties: {
        conceptId: { type: 'string', description: 'Id of the concept to revise' },
      },
      required: ['conceptId'],
    },
  },
  {
    name: 'simulate_days',
    description: `Advance the simulated clock and recompute every memory strength.
Negative values move the clock backward.`,
    inputSchema: {
      type: 'object',
      properties: {
        days: { type: 'integer', description: 'Days to advance' },
      },
      required: ['days'],
    },
  },
  {
    name: 'set_decay_rate',
    description: 'Set the global decay constant (default 0.15). Applies to future decay only.',
    inputSchema: {
      type: 'object',
      properties: {
        rate: { type: 'number', description: 'Decay constant lambda, >= 0' },
      },
      required: ['rate'],
    },
  },
  {
    name: 'get_stats',
    description: 'Current day, concept count, average memory, urgent count and total revisions.',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'get_revision_queue',
    description: 'Concepts ordered weakest memory first - what to review next.',
    inputSchema: {
      type: 'object',
      properties: {
        limit: { type: 'integer', description: 'Max concepts (default: all)' },
      },
    },
  },
  {
    name: 'get_retention_summary',
    description: 'Concept counts per priority band (urgent/high/medium/low) and per category.',
    inputSchema: { type: 'object', properties: {} },
  },
];
