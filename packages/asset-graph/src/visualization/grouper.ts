// Relationship grouper: buckets indexed edges by (type, bidirectional) for rendering

import type { RelationshipIndex } from './index-builder.js';

export interface GroupedRelationship {
  sourceId: string;
  targetId: string;
  strength: number;
}

export interface RelationshipGroup {
  relationshipType: string;
  bidirectional: boolean;
  relationships: GroupedRelationship[];
}

/** Relationship type → shown. Types mapped to false are dropped; absent types are kept. */
export type RelationshipFilters = Readonly<Record<string, boolean>>;

/** Order-independent key used to emit a bidirectional pair once. */
export function canonicalPairKey(sourceId: string, targetId: string, relationshipType: string): string {
  return sourceId <= targetId
    ? JSON.stringify([sourceId, targetId, relationshipType])
    : JSON.stringify([targetId, sourceId, relationshipType]);
}

export function groupRelationships(
  index: RelationshipIndex,
  filters?: RelationshipFilters,
): RelationshipGroup[] {
  const processedPairs = new Set<string>();
  const groups = new Map<string, RelationshipGroup>();

  for (const edge of index) {
    if (filters && Object.hasOwn(filters, edge.relationshipType) && filters[edge.relationshipType] === false) {
      continue;
    }

    const bidirectional = index.hasReverse(edge);
    if (bidirectional) {
      const pairKey = canonicalPairKey(edge.sourceId, edge.targetId, edge.relationshipType);
      if (processedPairs.has(pairKey)) continue;
      processedPairs.add(pairKey);
    }

    const groupKey = JSON.stringify([edge.relationshipType, bidirectional]);
    let group = groups.get(groupKey);
    if (!group) {
      group = { relationshipType: edge.relationshipType, bidirectional, relationships: [] };
      groups.set(groupKey, group);
    }
    group.relationships.push({ sourceId: edge.sourceId, targetId: edge.targetId, strength: edge.strength });
  }

  return [...groups.values()];
}
