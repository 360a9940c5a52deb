import { describe, it, expect, vi, afterEach } from 'vitest';
import { AssetGraph } from '../src/graph/asset-graph.js';
import { inferRelationships } from '../src/graph/inference.js';
import type { SkippedRelationship } from '../src/graph/relationship-store.js';
import type { RelationshipRule } from '../src/graph/rules.js';
import type { Asset } from '../src/models/asset.js';
import { bond, equity, event } from './fixtures.js';

function assetMap(...assets: Asset[]): Map<string, Asset> {
  return new Map(assets.map(a => [a.id, a]));
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('inferRelationships', () => {
  it('links same-sector assets in both directions', () => {
    const store = inferRelationships(assetMap(equity('A'), equity('B')), []);
    expect([...store.entries()]).toEqual([
      ['A', [{ targetId: 'B', relationshipType: 'same_sector', strength: 0.7 }]],
      ['B', [{ targetId: 'A', relationshipType: 'same_sector', strength: 0.7 }]],
    ]);
  });

  it('never links on the Unknown sector', () => {
    const store = inferRelationships(assetMap(equity('A', 'Unknown'), equity('B', 'Unknown')), []);
    expect(store.size).toBe(0);
  });

  it('links a bond to its issuer in one direction', () => {
    const store = inferRelationships(assetMap(equity('AAPL'), bond('BOND1', 'AAPL')), []);
    expect(store.get('BOND1')).toEqual([{ targetId: 'AAPL', relationshipType: 'corporate_link', strength: 0.9 }]);
    expect(store.has('AAPL')).toBe(false);
  });

  it('evaluates rules in order within a pair', () => {
    const store = inferRelationships(assetMap(equity('AAPL'), bond('BOND1', 'AAPL', 'Technology')), []);
    expect(store.get('BOND1')).toEqual([
      { targetId: 'AAPL', relationshipType: 'same_sector', strength: 0.7 },
      { targetId: 'AAPL', relationshipType: 'corporate_link', strength: 0.9 },
    ]);
  });

  it('adds event impact edges with the absolute impact score', () => {
    const store = inferRelationships(assetMap(equity('A', 'Tech'), equity('B', 'Energy')), [
      event('E1', 'A', -0.4, ['B']),
    ]);
    expect(store.get('A')).toEqual([{ targetId: 'B', relationshipType: 'event_impact', strength: 0.4 }]);
  });

  it('reports unknown event targets to the skip hook', () => {
    const skips: SkippedRelationship[] = [];
    const store = inferRelationships(
      assetMap(equity('A', 'Tech'), equity('B', 'Energy')),
      [event('E1', 'A', 0.3, ['B', 'ZZZ'])],
      { onSkip: s => skips.push(s) },
    );
    expect(store.get('A')).toHaveLength(1);
    expect(skips).toEqual([
      { reason: 'unknown_event_target', sourceId: 'A', targetId: 'ZZZ', relationshipType: 'event_impact', eventId: 'E1' },
    ]);
  });

  it('reports one skip per related asset for an unknown event source', () => {
    const skips: SkippedRelationship[] = [];
    const store = inferRelationships(assetMap(equity('A'), equity('B', 'Energy')), [event('E1', 'GHOST', 0.3, ['A', 'B'])], {
      onSkip: s => skips.push(s),
    });
    expect(store.size).toBe(0);
    expect(skips.map(s => [s.reason, s.targetId])).toEqual([
      ['unknown_event_source', 'A'],
      ['unknown_event_source', 'B'],
    ]);
  });

  it('keeps the first of duplicate event edges', () => {
    const skips: SkippedRelationship[] = [];
    const store = inferRelationships(
      assetMap(equity('A', 'Tech'), equity('B', 'Energy')),
      [event('E1', 'A', 0.3, ['B']), event('E2', 'A', 0.9, ['B'])],
      { onSkip: s => skips.push(s) },
    );
    expect(store.get('A')).toEqual([{ targetId: 'B', relationshipType: 'event_impact', strength: 0.3 }]);
    expect(skips).toHaveLength(1);
    expect(skips[0].reason).toBe('duplicate');
    expect(skips[0].eventId).toBe('E2');
  });

  it('logs and ignores a throwing skip hook', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const store = inferRelationships(assetMap(equity('A')), [event('E1', 'A', 0.3, ['ZZZ'])], {
      onSkip: () => {
        throw new Error('hook failed');
      },
    });
    expect(store.size).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toContain('hook failed');
  });

  it('does not depend on asset insertion order', () => {
    const first = inferRelationships(assetMap(equity('C'), equity('A'), equity('B')), []);
    const second = inferRelationships(assetMap(equity('B'), equity('C'), equity('A')), []);
    expect([...first.entries()]).toEqual([...second.entries()]);
    expect([...first.keys()]).toEqual(['A', 'B', 'C']);
  });
});

describe('AssetGraph', () => {
  it('rebuilds relationships idempotently', () => {
    const graph = new AssetGraph();
    graph.addAsset(equity('A'));
    graph.addAsset(equity('B'));
    graph.addRegulatoryEvent(event('E1', 'A', 0.5, ['B']));
    graph.buildRelationships();
    const first = [...graph.relationships.entries()];
    graph.buildRelationships();
    expect([...graph.relationships.entries()]).toEqual(first);
  });

  it('discards manual edges on rebuild', () => {
    const graph = new AssetGraph();
    graph.addAsset(equity('A'));
    graph.addRelationship('A', 'X', 'manual', 0.2);
    graph.buildRelationships();
    expect(graph.relationships.size).toBe(0);
  });

  it('stores both directions for a bidirectional manual edge', () => {
    const graph = new AssetGraph();
    expect(graph.addRelationship('A', 'B', 'correlation', 0.6, true)).toBe(2);
    expect(graph.addRelationship('A', 'B', 'correlation', 0.1)).toBe(0);
    expect(graph.relationships.get('B')).toEqual([{ targetId: 'A', relationshipType: 'correlation', strength: 0.6 }]);
  });

  it('replaces an asset added twice with the same id', () => {
    const graph = new AssetGraph();
    graph.addAsset(equity('A', 'Tech', 10));
    graph.addAsset(equity('A', 'Tech', 20));
    expect(graph.assets.size).toBe(1);
    expect(graph.assets.get('A')?.price).toBe(20);
  });

  it('includes relationship targets in the participating ids', () => {
    const graph = new AssetGraph();
    graph.addAsset(equity('B'));
    graph.addRelationship('B', 'A', 'manual', 0.5);
    expect(graph.getParticipatingAssetIds()).toEqual(['A', 'B']);
  });

  it('accepts an extended rule list', () => {
    const priceBand: RelationshipRule = {
      name: 'price_band',
      evaluate: (first, second) =>
        Math.abs(first.price - second.price) < 5
          ? { sourceId: first.id, targetId: second.id, relationshipType: 'price_band', strength: 0.5, bidirectional: false }
          : null,
    };
    const graph = new AssetGraph({ rules: [priceBand] });
    graph.addAsset(equity('A', 'Tech', 100));
    graph.addAsset(equity('B', 'Tech', 102));
    graph.buildRelationships();
    expect([...graph.relationships.entries()]).toEqual([
      ['A', [{ targetId: 'B', relationshipType: 'price_band', strength: 0.5 }]],
    ]);
  });

  it('clears all state', () => {
    const graph = new AssetGraph();
    graph.addAsset(equity('A'));
    graph.addRegulatoryEvent(event('E1', 'A', 0.1, []));
    graph.addRelationship('A', 'B', 'manual', 0.5);
    graph.clear();
    expect(graph.assets.size).toBe(0);
    expect(graph.regulatoryEvents).toEqual([]);
    expect(graph.relationships.size).toBe(0);
  });
});
