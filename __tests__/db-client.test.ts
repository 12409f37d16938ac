/**
 * Database Client Tests
 *
 * Pool lifecycle and query helpers, with pg mocked.
 */

import { configureDatabase, getPool, query, queryOne, closePool } from '../db/client';

// =============================================================================
// Mock pg
// =============================================================================

const mockPoolCreated = jest.fn();
const mockPoolQuery = jest.fn();
const mockPoolEnd = jest.fn();
const mockPoolOn = jest.fn();

jest.mock('pg', () => ({
  Pool: jest.fn().mockImplementation((options: unknown) => {
    mockPoolCreated(options);
    return {
      query: (...args: unknown[]) => mockPoolQuery(...args),
      end: (...args: unknown[]) => mockPoolEnd(...args),
      on: (...args: unknown[]) => mockPoolOn(...args),
    };
  }),
}));

beforeEach(() => {
  jest.clearAllMocks();
});

afterEach(async () => {
  await closePool();
});

describe('db client', () => {
  it('refuses to create a pool without a connection string', () => {
    delete process.env.RETENTION_DATABASE_URL;

    expect(() => getPool()).toThrow('No database configured: set RETENTION_DATABASE_URL');
    expect(mockPoolCreated).not.toHaveBeenCalled();
  });

  it('creates one pool from the configured connection string', () => {
    configureDatabase('postgres://localhost/retention');

    const first = getPool();
    const second = getPool();

    expect(first).toBe(second);
    expect(mockPoolCreated).toHaveBeenCalledTimes(1);
    expect(mockPoolCreated).toHaveBeenCalledWith({
      connectionString: 'postgres://localhost/retention',
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });
    expect(mockPoolOn).toHaveBeenCalledWith('error', expect.any(Function));
  });

  it('returns rows from query and the first row from queryOne', async () => {
    configureDatabase('postgres://localhost/retention');
    mockPoolQuery.mockResolvedValueOnce({ rows: [{ id: 'a' }, { id: 'b' }] });
    mockPoolQuery.mockResolvedValueOnce({ rows: [] });

    await expect(query('SELECT id FROM concepts', [1])).resolves.toEqual([{ id: 'a' }, { id: 'b' }]);
    await expect(queryOne('SELECT id FROM concepts WHERE id = $1', ['z'])).resolves.toBeNull();
    expect(mockPoolQuery).toHaveBeenNthCalledWith(1, 'SELECT id FROM concepts', [1]);
  });

  it('ends the pool on close and creates a fresh one afterwards', async () => {
    configureDatabase('postgres://localhost/retention');
    getPool();

    await closePool();
    getPool();

    expect(mockPoolEnd).toHaveBeenCalledTimes(1);
    expect(mockPoolCreated).toHaveBeenCalledTimes(2);
  });
});
