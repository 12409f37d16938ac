/**
 * Process Concept Source
 *
 * Talks to an external backend executable: one invocation per command,
 * the command name (and its argument) passed on argv, one JSON document
 * read back from stdout.
 *
 * Commands:
 *   GET_ALL_CONCEPTS        - concept array
 *   GET_STATS               - aggregate counters
 *   SET_DECAY_RATE <rate>   - acknowledgment object
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { DEFAULT_BACKEND_TIMEOUT_MS, OUTPUT_PREVIEW_LENGTH } from '../constants';
import { RetentionError } from '../errors';
import { parseSnapshot } from './snapshot-schema';
import type { ConceptSource } from './types';
import type { ImportSnapshot } from '../simulation-state';

const execFileAsync = promisify(execFile);

function isStatusReply(payload: unknown): boolean {
  return typeof payload === 'object' && payload !== null && 'status' in payload;
}

export interface ProcessSourceOptions {
  command: string;
  timeoutMs?: number;
  logger?: Pick<Console, 'warn'>;
}

export class ProcessConceptSource implements ConceptSource {
  readonly kind = 'process';
  private readonly command: string;
  private readonly timeoutMs: number;
  private readonly logger: Pick<Console, 'warn'>;

  constructor(options: ProcessSourceOptions) {
    this.command = options.command;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_BACKEND_TIMEOUT_MS;
    this.logger = options.logger ?? console;
  }

  async importSnapshot(): Promise<ImportSnapshot> {
    const concepts = await this.run('GET_ALL_CONCEPTS');
    const counters = await this.readCounters();
    return parseSnapshot(concepts, counters, `backend ${this.command}`);
  }

  /**
   * Stats are optional: a failed GET_STATS or a status reply yields no
   * counters, and the concepts are still imported.
   */
  private async readCounters(): Promise<unknown> {
    try {
      const stats = await this.run('GET_STATS');
      return isStatusReply(stats) ? {} : stats;
    } catch (error) {
      if (!(error instanceof RetentionError)) throw error;
      this.logger.warn('[retention-backend] GET_STATS failed, importing without counters:', error.message);
      return {};
    }
  }

  async forwardDecayRate(rate: number): Promise<unknown> {
    return this.run('SET_DECAY_RATE', String(rate));
  }

  /**
   * Execute one backend command and parse its stdout as JSON.
   */
  async run(commandName: string, data?: string): Promise<unknown> {
    const args = data === undefined ? [commandName] : [commandName, data];

    let stdout: string;
    try {
      ({ stdout } = await execFileAsync(this.command, args, { timeout: this.timeoutMs, encoding: 'utf8' }));
    } catch (error) {
      throw new RetentionError('EXTERNAL_COLLABORATOR_FAILURE', this.describeFailure(error));
    }

    try {
      return JSON.parse(stdout);
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'parse error';
      throw new RetentionError(
        'EXTERNAL_COLLABORATOR_FAILURE',
        `Invalid JSON from backend: ${reason}. Output: ${stdout.slice(0, OUTPUT_PREVIEW_LENGTH)}`
      );
    }
  }

  private describeFailure(error: unknown): string {
    if (!(error instanceof Error)) return String(error);

    if ('code' in error && error.code === 'ENOENT') {
      return `Backend executable not found: ${this.command}`;
    }
    if ('killed' in error && error.killed === true) {
      return `Backend timed out after ${this.timeoutMs}ms`;
    }
    if ('stderr' in error && typeof error.stderr === 'string' && error.stderr.trim()) {
      return error.stderr.trim();
    }
    return error.message || 'Backend returned an error';
  }
}
