import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  AssetGraph,
  configFromEnv,
  createAsset,
  serializeGraph,
  type AppConfig,
  type MarketDataSource,
} from '@asset-graph/core';
import { bootstrap, resetContext } from '../src/bootstrap.js';
import { MemoryRepository } from '../../asset-graph/tests/fixtures.js';

function equity(id: string) {
  return createAsset({ id, symbol: id, name: `${id} Inc.`, assetClass: 'equity', sector: 'Energy', price: 50 });
}

function config(overrides: Partial<AppConfig> = {}): AppConfig {
  return { ...configFromEnv({}), ...overrides };
}

const source: MarketDataSource = {
  fetchAssets: () => Promise.resolve([equity('XOM'), equity('CVX')]),
  fetchRegulatoryEvents: () => Promise.resolve([]),
};

describe('bootstrap', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts empty without a repository', async () => {
    const ctx = await bootstrap(config(), { repository: null });
    expect(ctx.origin).toBe('empty');
    expect(await ctx.guard.summary()).toEqual({ assets: 0, relationships: 0, regulatoryEvents: 0 });
  });

  it('starts empty when the repository holds nothing', async () => {
    const ctx = await bootstrap(config(), { repository: new MemoryRepository() });
    expect(ctx.origin).toBe('empty');
  });

  it('restores the stored snapshot', async () => {
    const stored = new AssetGraph();
    stored.addAsset(equity('XOM'));
    const ctx = await bootstrap(config(), { repository: new MemoryRepository(serializeGraph(stored)) });
    expect(ctx.origin).toBe('cache');
    expect(await ctx.guard.getAsset('XOM')).toMatchObject({ sector: 'Energy' });
  });

  it('preloads from the market data source and saves the cache', async () => {
    const repository = new MemoryRepository();
    const ctx = await bootstrap(config({ preload: true, enableNetwork: true }), { repository, source });
    expect(ctx.origin).toBe('network');
    expect(await ctx.guard.summary()).toEqual({ assets: 2, relationships: 2, regulatoryEvents: 0 });
    expect(repository.saves).toBe(1);
  });

  it('preloads the fallback when the network is disabled', async () => {
    const fallback = new AssetGraph();
    fallback.addAsset(equity('FALLBACK'));
    const ctx = await bootstrap(config({ preload: true }), {
      repository: null,
      source,
      fallbackFactory: () => fallback,
    });
    expect(ctx.origin).toBe('fallback');
    expect([...(await ctx.guard.getAssets()).keys()]).toEqual(['FALLBACK']);
  });

  it('resetContext empties the graph and closes the repository', async () => {
    const repository = new MemoryRepository();
    const ctx = await bootstrap(config({ preload: true, enableNetwork: true }), { repository, source });
    await resetContext(ctx);
    expect(await ctx.guard.summary()).toEqual({ assets: 0, relationships: 0, regulatoryEvents: 0 });
    expect(repository.closed).toBe(true);
  });
});
