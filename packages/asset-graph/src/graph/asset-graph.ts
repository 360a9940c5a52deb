// AssetGraph: asset map, event list and the derived relationship store

import type { Asset } from '../models/asset.js';
import type { RegulatoryEvent } from '../models/regulatory-event.js';
import { calculateNetworkMetrics, type GraphMetrics } from '../metrics/network-metrics.js';
import { buildVisualizationData, validateAssetIdOrder, type VisualizationData } from '../visualization/visualization-data.js';
import { inferRelationships } from './inference.js';
import {
  appendRelationship,
  collectParticipatingIds,
  compareIds,
  notifySkip,
  type RelationshipStore,
  type SkipHandler,
} from './relationship-store.js';
import { DEFAULT_RULES, type RelationshipRule } from './rules.js';

export interface AssetGraphOptions {
  /** Pairwise rules, evaluated in order. Defaults to same-sector then corporate-link. */
  rules?: readonly RelationshipRule[];
  onSkip?: SkipHandler;
}

/**
 * In-memory relationship graph. Not synchronized: share it between async
 * callers only through a GraphGuard.
 */
export class AssetGraph {
  readonly assets = new Map<string, Asset>();
  relationships: RelationshipStore = new Map();
  readonly regulatoryEvents: RegulatoryEvent[] = [];

  private readonly rules: readonly RelationshipRule[];
  private readonly onSkip?: SkipHandler;

  constructor(options: AssetGraphOptions = {}) {
    this.rules = options.rules ?? DEFAULT_RULES;
    this.onSkip = options.onSkip;
  }

  /** Insert or replace by id. */
  addAsset(asset: Asset): void {
    this.assets.set(asset.id, asset);
  }

  addRegulatoryEvent(event: RegulatoryEvent): void {
    this.regulatoryEvents.push(event);
  }

  /**
   * Store one edge directly (snapshot hydration and manual links). Returns the
   * number of edges actually stored; duplicates are reported to the skip hook.
   */
  addRelationship(
    sourceId: string,
    targetId: string,
    relationshipType: string,
    strength: number,
    bidirectional = false,
  ): number {
    let added = 0;
    const add = (from: string, to: string): void => {
      if (appendRelationship(this.relationships, from, { targetId: to, relationshipType, strength })) {
        added++;
      } else {
        notifySkip(this.onSkip, { reason: 'duplicate', sourceId: from, targetId: to, relationshipType });
      }
    };
    add(sourceId, targetId);
    if (bidirectional) add(targetId, sourceId);
    return added;
  }

  /** Discard the store and infer it again from the current assets and events. */
  buildRelationships(): void {
    this.relationships = inferRelationships(this.assets, this.regulatoryEvents, {
      rules: this.rules,
      onSkip: this.onSkip,
    });
  }

  /** Effective asset set in ascending id order. */
  getParticipatingAssetIds(): string[] {
    return [...collectParticipatingIds(this.assets.keys(), this.relationships)].sort(compareIds);
  }

  calculateMetrics(): GraphMetrics {
    return calculateNetworkMetrics({
      assets: this.assets,
      relationships: this.relationships,
      regulatoryEventCount: this.regulatoryEvents.length,
    });
  }

  /** @throws StructuralValidationError when `idOrder` holds empty or repeated ids */
  getVisualizationData(idOrder?: readonly string[]): VisualizationData {
    if (idOrder) {
      validateAssetIdOrder(idOrder);
      return buildVisualizationData(this.assets, idOrder);
    }
    return buildVisualizationData(this.assets, this.getParticipatingAssetIds());
  }

  clear(): void {
    this.assets.clear();
    this.relationships = new Map();
    this.regulatoryEvents.length = 0;
  }
}
