// GraphGuard: serializes every read and write of one AssetGraph behind a Mutex

import { analyzeGraphFormulas, type FormulaicAnalysis } from '../analysis/formulaic-analysis.js';
import type { AssetGraph } from '../graph/asset-graph.js';
import { countRelationships, type RelationshipEdge } from '../graph/relationship-store.js';
import type { GraphMetrics } from '../metrics/network-metrics.js';
import type { Asset } from '../models/asset.js';
import type { RegulatoryEvent } from '../models/regulatory-event.js';
import type { GraphRepository } from '../persistence/repository.js';
import { hydrateGraph, serializeGraph, type GraphSnapshot } from '../persistence/snapshot.js';
import { buildGraphScene, type GraphScene, type SceneOptions } from '../visualization/scene.js';
import type { VisualizationData } from '../visualization/visualization-data.js';
import { Mutex } from './mutex.js';

export interface GraphSummary {
  assets: number;
  relationships: number;
  regulatoryEvents: number;
}

/**
 * Every method holds the lock for its whole duration, awaited I/O included.
 * Reads hand back deep copies taken under the lock, so callers never see
 * a half-rebuilt store or share mutable state with the graph.
 */
export class GraphGuard {
  private readonly mutex = new Mutex();

  constructor(private readonly graph: AssetGraph) {}

  /** Run `fn` against the raw graph under the lock. Do not leak the reference. */
  withGraph<T>(fn: (graph: AssetGraph) => T | Promise<T>): Promise<T> {
    return this.mutex.runExclusive(() => fn(this.graph));
  }

  getAssets(): Promise<Map<string, Asset>> {
    return this.withGraph(g => structuredClone(g.assets));
  }

  getAsset(id: string): Promise<Asset | undefined> {
    return this.withGraph(g => {
      const asset = g.assets.get(id);
      return asset ? structuredClone(asset) : undefined;
    });
  }

  getRelationships(): Promise<Map<string, RelationshipEdge[]>> {
    return this.withGraph(g => structuredClone(g.relationships));
  }

  getRegulatoryEvents(): Promise<RegulatoryEvent[]> {
    return this.withGraph(g => structuredClone(g.regulatoryEvents));
  }

  addAsset(asset: Asset): Promise<void> {
    return this.withGraph(g => g.addAsset(asset));
  }

  addRegulatoryEvent(event: RegulatoryEvent): Promise<void> {
    return this.withGraph(g => g.addRegulatoryEvent(event));
  }

  buildRelationships(): Promise<void> {
    return this.withGraph(g => g.buildRelationships());
  }

  calculateMetrics(): Promise<GraphMetrics> {
    return this.withGraph(g => g.calculateMetrics());
  }

  analyzeFormulas(): Promise<FormulaicAnalysis> {
    return this.withGraph(g => analyzeGraphFormulas(g));
  }

  getVisualizationData(idOrder?: readonly string[]): Promise<VisualizationData> {
    return this.withGraph(g => g.getVisualizationData(idOrder));
  }

  getScene(options: SceneOptions = {}): Promise<GraphScene> {
    return this.withGraph(g => buildGraphScene(g, options));
  }

  summary(): Promise<GraphSummary> {
    return this.withGraph(g => ({
      assets: g.assets.size,
      relationships: countRelationships(g.relationships),
      regulatoryEvents: g.regulatoryEvents.length,
    }));
  }

  toSnapshot(): Promise<GraphSnapshot> {
    return this.withGraph(g => serializeGraph(g));
  }

  save(repository: GraphRepository): Promise<void> {
    return this.withGraph(g => repository.save(serializeGraph(g)));
  }

  /** Replace the graph with the stored snapshot. Returns false when nothing was stored. */
  load(repository: GraphRepository): Promise<boolean> {
    return this.withGraph(async g => {
      const snapshot = await repository.load();
      if (!snapshot) return false;
      hydrateGraph(g, snapshot);
      return true;
    });
  }

  /** Replace the graph contents with another graph's, under the lock. */
  replaceWith(source: AssetGraph): Promise<void> {
    return this.withGraph(g => hydrateGraph(g, serializeGraph(source)));
  }

  reset(): Promise<void> {
    return this.withGraph(g => g.clear());
  }
}
