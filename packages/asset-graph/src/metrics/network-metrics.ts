// Network metrics: single pass over assets, relationships and event count

import type { Asset, AssetClass } from '../models/asset.js';
import { collectParticipatingIds, type RelationshipEdge } from '../graph/relationship-store.js';

export const QUALITY_STRENGTH_WEIGHT = 0.7;
export const QUALITY_EVENT_WEIGHT = 0.3;
export const EVENT_SATURATION_K = 10;
export const TOP_RELATIONSHIP_LIMIT = 10;

export interface TopRelationship {
  sourceId: string;
  targetId: string;
  relationshipType: string;
  strength: number;
}

export interface GraphMetrics {
  /** Size of the effective asset set (explicit ids plus relationship targets). */
  totalAssets: number;
  totalRelationships: number;
  averageRelationshipStrength: number;
  /** Directed edges as a percentage of N·(N−1), in [0, 100]. */
  relationshipDensity: number;
  relationshipDistribution: Record<string, number>;
  /** Explicit assets only. */
  assetClassDistribution: Partial<Record<AssetClass, number>>;
  topRelationships: TopRelationship[];
  regulatoryEventCount: number;
  regulatoryEventNorm: number;
  qualityScore: number;
}

export interface MetricsInput {
  assets: ReadonlyMap<string, Asset>;
  relationships: ReadonlyMap<string, readonly RelationshipEdge[]>;
  regulatoryEventCount: number;
}

export function clamp01(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

/** count / (count + k), or 0 for non-positive counts. */
export function saturatingNorm(count: number, k: number): number {
  if (count <= 0) return 0;
  return count / (count + k);
}

export function relationshipDensity(assetCount: number, relationshipCount: number): number {
  if (assetCount <= 1) return 0;
  const maxPossible = assetCount * (assetCount - 1);
  return Math.min(100, (relationshipCount / maxPossible) * 100);
}

export function calculateNetworkMetrics(input: MetricsInput): GraphMetrics {
  const effectiveIds = collectParticipatingIds(input.assets.keys(), input.relationships);

  const typeCounts = new Map<string, number>();
  const all: TopRelationship[] = [];
  let strengthSum = 0;

  for (const [sourceId, edges] of input.relationships) {
    for (const edge of edges) {
      typeCounts.set(edge.relationshipType, (typeCounts.get(edge.relationshipType) ?? 0) + 1);
      all.push({
        sourceId,
        targetId: edge.targetId,
        relationshipType: edge.relationshipType,
        strength: edge.strength,
      });
      strengthSum += edge.strength;
    }
  }

  const totalRelationships = all.length;
  const averageRelationshipStrength = totalRelationships > 0 ? strengthSum / totalRelationships : 0;

  // Array.prototype.sort is stable, so equal strengths keep traversal order
  const topRelationships = [...all]
    .sort((a, b) => b.strength - a.strength)
    .slice(0, TOP_RELATIONSHIP_LIMIT);

  const assetClassDistribution: Partial<Record<AssetClass, number>> = {};
  for (const asset of input.assets.values()) {
    assetClassDistribution[asset.assetClass] = (assetClassDistribution[asset.assetClass] ?? 0) + 1;
  }

  const regulatoryEventCount = Math.max(0, input.regulatoryEventCount);
  const regulatoryEventNorm = saturatingNorm(regulatoryEventCount, EVENT_SATURATION_K);
  const qualityScore = clamp01(
    QUALITY_STRENGTH_WEIGHT * clamp01(averageRelationshipStrength) + QUALITY_EVENT_WEIGHT * regulatoryEventNorm,
  );

  return {
    totalAssets: effectiveIds.size,
    totalRelationships,
    averageRelationshipStrength,
    relationshipDensity: relationshipDensity(effectiveIds.size, totalRelationships),
    relationshipDistribution: Object.fromEntries(typeCounts),
    assetClassDistribution,
    topRelationships,
    regulatoryEventCount,
    regulatoryEventNorm,
    qualityScore,
  };
}
