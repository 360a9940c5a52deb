import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MarketDataSource } from '../src/data/fmp-source.js';
import { GraphLoader, loadSampleGraph } from '../src/data/graph-loader.js';
import { AssetGraph } from '../src/graph/asset-graph.js';
import { countRelationships } from '../src/graph/relationship-store.js';
import { serializeGraph } from '../src/persistence/snapshot.js';
import { MemoryRepository, equity, event } from './fixtures.js';

function stubSource(overrides: Partial<MarketDataSource> = {}): MarketDataSource {
  return {
    fetchAssets: vi.fn(() => Promise.resolve([equity('A'), equity('B')])),
    fetchRegulatoryEvents: vi.fn(() => Promise.resolve([event('E1', 'A', 0.5, ['B'])])),
    ...overrides,
  };
}

function fallbackGraph(): AssetGraph {
  const graph = new AssetGraph();
  graph.addAsset(equity('FALLBACK'));
  return graph;
}

describe('GraphLoader', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefers the cached snapshot', async () => {
    const cached = new AssetGraph();
    cached.addAsset(equity('C'));
    const source = stubSource();

    const { graph, origin } = await new GraphLoader({
      cache: new MemoryRepository(serializeGraph(cached)),
      source,
    }).load();

    expect(origin).toBe('cache');
    expect([...graph.assets.keys()]).toEqual(['C']);
    expect(source.fetchAssets).not.toHaveBeenCalled();
  });

  it('builds from the source and writes the cache', async () => {
    const cache = new MemoryRepository();
    const { graph, origin } = await new GraphLoader({ cache, source: stubSource() }).load();

    expect(origin).toBe('network');
    expect(graph.relationships.get('A')).toEqual([
      { targetId: 'B', relationshipType: 'same_sector', strength: 0.7 },
      { targetId: 'B', relationshipType: 'event_impact', strength: 0.5 },
    ]);
    expect(cache.saves).toBe(1);
    expect(cache.snapshot?.assets.map(a => a.id)).toEqual(['A', 'B']);
  });

  it('continues past a cache that fails to load', async () => {
    const cache = new MemoryRepository();
    vi.spyOn(cache, 'load').mockRejectedValue(new Error('disk on fire'));
    const { origin } = await new GraphLoader({ cache, source: stubSource() }).load();
    expect(origin).toBe('network');
    expect(console.warn).toHaveBeenCalledWith(
      '[graph-loader] failed to load cached graph, fetching instead: disk on fire',
    );
  });

  it('keeps the fetched graph when the cache cannot be written', async () => {
    const cache = new MemoryRepository();
    vi.spyOn(cache, 'save').mockRejectedValue(new Error('read-only'));
    const { origin } = await new GraphLoader({ cache, source: stubSource() }).load();
    expect(origin).toBe('network');
    expect(console.error).toHaveBeenCalledWith('[graph-loader] failed to persist graph cache: read-only');
  });

  it('falls back when the source returns no assets', async () => {
    const source = stubSource({ fetchAssets: vi.fn(() => Promise.resolve([])) });
    const { graph, origin } = await new GraphLoader({ source, fallbackFactory: fallbackGraph }).load();
    expect(origin).toBe('fallback');
    expect([...graph.assets.keys()]).toEqual(['FALLBACK']);
    expect(source.fetchRegulatoryEvents).not.toHaveBeenCalled();
  });

  it('falls back when the source throws', async () => {
    const cache = new MemoryRepository();
    const source = stubSource({ fetchAssets: vi.fn(() => Promise.reject(new Error('offline'))) });
    const { origin } = await new GraphLoader({ cache, source, fallbackFactory: fallbackGraph }).load();
    expect(origin).toBe('fallback');
    expect(cache.saves).toBe(0);
  });

  it('uses the bundled sample when the network is disabled', async () => {
    const source = stubSource();
    const { graph, origin } = await new GraphLoader({ source, enableNetwork: false }).load();
    expect(origin).toBe('fallback');
    expect(graph.assets.size).toBe(11);
    expect(source.fetchAssets).not.toHaveBeenCalled();
  });
});

describe('loadSampleGraph', () => {
  it('rebuilds relationships for the bundled dataset', async () => {
    const graph = await loadSampleGraph();

    expect(graph.assets.size).toBe(11);
    expect(graph.regulatoryEvents).toHaveLength(3);
    // 11 rule edges + 5 event edges
    expect(countRelationships(graph.relationships)).toBe(16);
    expect(graph.relationships.get('AAPL_BOND')).toEqual([
      { targetId: 'AAPL', relationshipType: 'same_sector', strength: 0.7 },
      { targetId: 'AAPL', relationshipType: 'corporate_link', strength: 0.9 },
      { targetId: 'MSFT', relationshipType: 'same_sector', strength: 0.7 },
    ]);
    expect(graph.relationships.get('XOM')).toEqual([
      { targetId: 'CL_FUTURE', relationshipType: 'same_sector', strength: 0.7 },
      { targetId: 'CL_FUTURE', relationshipType: 'event_impact', strength: 0.05 },
    ]);
  });
});
