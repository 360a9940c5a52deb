import { resolve } from 'node:path';
import { describe, it, expect } from 'vitest';
import { configFromEnv, parseBoolean, parseSymbols } from '../src/config.js';
import { FileSnapshotRepository } from '../src/persistence/file-repository.js';
import { DEFAULT_CACHE_PATH, createRepository } from '../src/persistence/create-repository.js';

describe('parseBoolean', () => {
  it('treats common falsy words as false', () => {
    expect(parseBoolean('off', true)).toBe(false);
    expect(parseBoolean(' FALSE ', true)).toBe(false);
    expect(parseBoolean('0', true)).toBe(false);
    expect(parseBoolean('yes', false)).toBe(true);
  });

  it('uses the fallback for missing or blank values', () => {
    expect(parseBoolean(undefined, true)).toBe(true);
    expect(parseBoolean('  ', false)).toBe(false);
  });
});

describe('parseSymbols', () => {
  it('normalizes and deduplicates', () => {
    expect(parseSymbols('aapl, msft,,AAPL')).toEqual(['AAPL', 'MSFT']);
  });

  it('defaults when nothing usable is given', () => {
    expect(parseSymbols(undefined)).toEqual(['AAPL', 'MSFT', 'XOM', 'JPM']);
    expect(parseSymbols(' , ')).toEqual(['AAPL', 'MSFT', 'XOM', 'JPM']);
  });
});

describe('configFromEnv', () => {
  it('applies defaults for an empty environment', () => {
    const config = configFromEnv({});
    expect(config).toMatchObject({
      backend: 'none',
      cachePath: null,
      enableNetwork: false,
      preload: false,
      symbols: ['AAPL', 'MSFT', 'XOM', 'JPM'],
    });
    expect(config.pg).toMatchObject({ host: 'localhost', port: 5432, database: 'asset_graph' });
    expect(config.marketData).toMatchObject({
      baseUrl: 'https://financialmodelingprep.com/stable',
      apiKey: '',
      rateLimit: 300,
    });
  });

  it('selects the file backend when a cache path is set', () => {
    const config = configFromEnv({ ASSET_GRAPH_CACHE_PATH: ' /tmp/graph.json ' });
    expect(config.backend).toBe('file');
    expect(config.cachePath).toBe('/tmp/graph.json');
  });

  it('reads explicit settings', () => {
    const config = configFromEnv({
      ASSET_GRAPH_BACKEND: 'Postgres',
      ASSET_GRAPH_NETWORK: 'true',
      ASSET_GRAPH_PRELOAD: '1',
      ASSET_GRAPH_SYMBOLS: 'jpm',
      PG_PORT: '6543',
      FMP_API_KEY: 'test-secret',
    });
    expect(config.backend).toBe('postgres');
    expect(config.enableNetwork).toBe(true);
    expect(config.preload).toBe(true);
    expect(config.symbols).toEqual(['JPM']);
    expect(config.pg.port).toBe(6543);
    expect(config.marketData.apiKey).toBe('test-secret');
  });

  it('rejects an unknown backend', () => {
    expect(() => configFromEnv({ ASSET_GRAPH_BACKEND: 'redis' })).toThrow(
      "ASSET_GRAPH_BACKEND must be one of file, postgres, none (got 'redis')",
    );
  });
});

describe('createRepository', () => {
  it('returns a file repository on the default path', async () => {
    const repo = await createRepository({ ...configFromEnv({}), backend: 'file' });
    expect(repo).toBeInstanceOf(FileSnapshotRepository);
    expect(repo instanceof FileSnapshotRepository ? repo.path : '').toBe(resolve(DEFAULT_CACHE_PATH));
  });

  it('returns null for the none backend', async () => {
    await expect(createRepository(configFromEnv({}))).resolves.toBeNull();
  });
});
