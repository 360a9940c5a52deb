// Graph loader: cache, then live market data, then the bundled sample graph

import { readFile } from 'node:fs/promises';
import { AssetGraph, type AssetGraphOptions } from '../graph/asset-graph.js';
import { countRelationships } from '../graph/relationship-store.js';
import type { GraphRepository } from '../persistence/repository.js';
import { deserializeGraph, serializeGraph } from '../persistence/snapshot.js';
import type { MarketDataSource } from './fmp-source.js';

export const SAMPLE_GRAPH_URL = new URL('../../data/sample-graph.json', import.meta.url);

export type GraphOrigin = 'cache' | 'network' | 'fallback';

export interface LoadedGraph {
  graph: AssetGraph;
  origin: GraphOrigin;
}

export interface GraphLoaderOptions {
  /** Read first, written after a successful fetch. */
  cache?: GraphRepository | null;
  source?: MarketDataSource | null;
  enableNetwork?: boolean;
  fallbackFactory?: () => AssetGraph | Promise<AssetGraph>;
  graphOptions?: AssetGraphOptions;
}

function errMsg(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** The bundled sample dataset, relationships rebuilt from its assets and events. */
export async function loadSampleGraph(options?: AssetGraphOptions): Promise<AssetGraph> {
  const raw = await readFile(SAMPLE_GRAPH_URL, 'utf-8');
  const graph = deserializeGraph(JSON.parse(raw), options);
  graph.buildRelationships();
  return graph;
}

export class GraphLoader {
  constructor(private readonly options: GraphLoaderOptions = {}) {}

  async load(): Promise<LoadedGraph> {
    const { cache, source, enableNetwork = true, graphOptions } = this.options;

    if (cache) {
      try {
        const snapshot = await cache.load();
        if (snapshot) {
          console.warn('[graph-loader] loading asset graph from cache');
          return { graph: deserializeGraph(snapshot, graphOptions), origin: 'cache' };
        }
      } catch (err) {
        console.warn(`[graph-loader] failed to load cached graph, fetching instead: ${errMsg(err)}`);
      }
    }

    if (!enableNetwork || !source) {
      console.warn('[graph-loader] network fetching disabled, using fallback dataset');
      return { graph: await this.fallback(), origin: 'fallback' };
    }

    let graph: AssetGraph;
    try {
      graph = new AssetGraph(graphOptions);
      const assets = await source.fetchAssets();
      if (assets.length === 0) {
        throw new Error('market data source returned no assets');
      }
      for (const asset of assets) graph.addAsset(asset);
      for (const event of await source.fetchRegulatoryEvents(assets)) graph.addRegulatoryEvent(event);
      graph.buildRelationships();
    } catch (err) {
      console.error(`[graph-loader] failed to build graph from market data: ${errMsg(err)}`);
      console.warn('[graph-loader] falling back to sample data');
      return { graph: await this.fallback(), origin: 'fallback' };
    }

    if (cache) {
      try {
        await cache.save(serializeGraph(graph));
      } catch (err) {
        console.error(`[graph-loader] failed to persist graph cache: ${errMsg(err)}`);
      }
    }

    console.warn(
      `[graph-loader] built graph with ${graph.assets.size} assets and ${countRelationships(graph.relationships)} relationships`,
    );
    return { graph, origin: 'network' };
  }

  private async fallback(): Promise<AssetGraph> {
    if (this.options.fallbackFactory) return this.options.fallbackFactory();
    return loadSampleGraph(this.options.graphOptions);
  }
}
