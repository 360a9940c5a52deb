import { describe, it, expect, afterEach, vi } from 'vitest';

// In-process stand-in for pg.Pool; nothing connects to a server
const mockPoolQuery = vi.fn();
const mockClientQuery = vi.fn();
const mockRelease = vi.fn();
const mockEnd = vi.fn(() => Promise.resolve());
const mockOn = vi.fn();

const mockPool = {
  query: mockPoolQuery,
  connect: vi.fn(() => Promise.resolve({ query: mockClientQuery, release: mockRelease })),
  end: mockEnd,
  on: mockOn,
};

vi.mock('pg', () => ({
  default: {
    Pool: vi.fn(function () {
      return mockPool;
    }),
  },
}));

const {
  closePool,
  getPool,
  healthCheck,
  pgConfigFromEnv,
  queryWithRetry,
  runMigrations,
  withTransaction,
} = await import('../src/persistence/pg-client.js');

afterEach(async () => {
  await closePool();
  mockPoolQuery.mockReset();
  mockClientQuery.mockReset();
  vi.clearAllMocks();
  vi.restoreAllMocks();
});

describe('pgConfigFromEnv', () => {
  it('uses defaults for an empty environment', () => {
    expect(pgConfigFromEnv({})).toEqual({
      host: 'localhost',
      port: 5432,
      user: 'asset_graph',
      password: '',
      database: 'asset_graph',
      poolMin: 0,
      poolMax: 5,
      idleTimeoutMs: 30_000,
      connectionTimeoutMs: 5_000,
    });
  });

  it('reads PG_* variables', () => {
    const config = pgConfigFromEnv({ PG_HOST: 'db', PG_PORT: '6543', PG_PASSWORD: 'test-secret', PG_POOL_MAX: '2' });
    expect(config.host).toBe('db');
    expect(config.port).toBe(6543);
    expect(config.password).toBe('test-secret');
    expect(config.poolMax).toBe(2);
  });
});

describe('getPool', () => {
  it('returns the same pool until closed', async () => {
    const first = await getPool(pgConfigFromEnv({}));
    const second = await getPool();
    expect(second).toBe(first);
    expect(mockOn).toHaveBeenCalledWith('error', expect.any(Function));

    await closePool();
    expect(mockEnd).toHaveBeenCalledTimes(1);
  });
});

describe('healthCheck', () => {
  it('returns true when SELECT 1 answers', async () => {
    mockPoolQuery.mockResolvedValueOnce({ rows: [{ ok: 1 }] });
    expect(await healthCheck()).toBe(true);
    expect(mockPoolQuery).toHaveBeenCalledWith('SELECT 1 AS ok');
  });

  it('returns false and warns when the query fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    mockPoolQuery.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

    expect(await healthCheck()).toBe(false);
    expect(warn).toHaveBeenCalledWith('[pg-client] health check failed:', 'connect ECONNREFUSED');
  });
});

describe('withTransaction', () => {
  it('commits and releases the client', async () => {
    mockClientQuery.mockResolvedValue({ rows: [] });

    const result = await withTransaction(async (client) => {
      await client.query('DELETE FROM assets');
      return 'done';
    });

    expect(result).toBe('done');
    expect(mockClientQuery.mock.calls.map(call => call[0])).toEqual(['BEGIN', 'DELETE FROM assets', 'COMMIT']);
    expect(mockRelease).toHaveBeenCalledTimes(1);
  });

  it('rolls back and rethrows when the callback fails', async () => {
    mockClientQuery.mockResolvedValue({ rows: [] });

    await expect(
      withTransaction(async () => {
        throw new Error('constraint violated');
      }),
    ).rejects.toThrow('constraint violated');

    expect(mockClientQuery.mock.calls.map(call => call[0])).toEqual(['BEGIN', 'ROLLBACK']);
    expect(mockRelease).toHaveBeenCalledTimes(1);
  });
});

describe('queryWithRetry', () => {
  it('retries a recoverable error on a fresh pool', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    mockPoolQuery
      .mockRejectedValueOnce(new Error('Connection terminated unexpectedly'))
      .mockResolvedValueOnce({ rows: [{ n: 1 }] });

    const result = await queryWithRetry<{ n: number }>('SELECT $1::int AS n', [1], 2, 0);

    expect(result.rows).toEqual([{ n: 1 }]);
    expect(mockPoolQuery).toHaveBeenCalledTimes(2);
    expect(mockEnd).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      '[pg-client] queryWithRetry attempt 1/2 failed: Connection terminated unexpectedly. Retrying in 0ms...',
    );
  });

  it('throws a non-recoverable error on the first attempt', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    mockPoolQuery.mockRejectedValueOnce(new Error('relation "assets" does not exist'));

    await expect(queryWithRetry('SELECT * FROM assets', [], 2, 0)).rejects.toThrow('relation "assets" does not exist');
    expect(mockPoolQuery).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith(
      '[pg-client] queryWithRetry failed after 1 attempt(s): relation "assets" does not exist',
    );
  });
});

describe('runMigrations', () => {
  it('applies pending migrations and records each version', async () => {
    mockPoolQuery.mockResolvedValue({ rows: [] });
    mockClientQuery.mockResolvedValue({ rows: [] });

    expect(await runMigrations()).toEqual(['001_asset_graph']);

    const statements = mockClientQuery.mock.calls.map(call => String(call[0]));
    expect(statements[0]).toBe('BEGIN');
    expect(statements[1]).toContain('CREATE TABLE IF NOT EXISTS assets');
    expect(mockClientQuery).toHaveBeenCalledWith('INSERT INTO schema_migrations (version) VALUES ($1)', [
      '001_asset_graph',
    ]);
    expect(statements[3]).toBe('COMMIT');
  });

  it('skips migrations already recorded', async () => {
    mockPoolQuery.mockImplementation((sql: string) =>
      Promise.resolve({ rows: sql.startsWith('SELECT version') ? [{ version: '001_asset_graph' }] : [] }),
    );

    expect(await runMigrations()).toEqual([]);
    expect(mockClientQuery).not.toHaveBeenCalled();
  });
});
