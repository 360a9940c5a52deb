// Relationship store: adjacency map from source id to its ordered outgoing edges

export interface RelationshipEdge {
  targetId: string;
  relationshipType: string;
  strength: number;
}

export type RelationshipStore = Map<string, RelationshipEdge[]>;

export type SkipReason = 'unknown_event_source' | 'unknown_event_target' | 'duplicate';

export interface SkippedRelationship {
  reason: SkipReason;
  sourceId: string;
  targetId: string;
  relationshipType: string;
  eventId?: string;
}

/** Observer for edges that were dropped instead of stored. Never alters the outcome. */
export type SkipHandler = (skip: SkippedRelationship) => void;

/**
 * Append an edge unless the source already holds one with the same target and type.
 * Returns false when the edge was dropped as a duplicate.
 */
export function appendRelationship(
  store: RelationshipStore,
  sourceId: string,
  edge: RelationshipEdge,
): boolean {
  let edges = store.get(sourceId);
  if (!edges) {
    edges = [];
    store.set(sourceId, edges);
  }
  if (edges.some(e => e.targetId === edge.targetId && e.relationshipType === edge.relationshipType)) {
    return false;
  }
  edges.push({ ...edge });
  return true;
}

/** Explicit asset ids plus every relationship target. */
export function collectParticipatingIds(
  assetIds: Iterable<string>,
  store: ReadonlyMap<string, readonly RelationshipEdge[]>,
): Set<string> {
  const ids = new Set(assetIds);
  for (const edges of store.values()) {
    for (const edge of edges) ids.add(edge.targetId);
  }
  return ids;
}

export function countRelationships(store: ReadonlyMap<string, readonly RelationshipEdge[]>): number {
  let total = 0;
  for (const edges of store.values()) total += edges.length;
  return total;
}

/** Code-unit ordering, independent of locale. */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Invoke a skip observer; a throwing observer is logged and ignored. */
export function notifySkip(handler: SkipHandler | undefined, skip: SkippedRelationship): void {
  if (!handler) return;
  try {
    handler(skip);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.warn(`[relationship-store] skip handler failed for ${skip.sourceId} -> ${skip.targetId}: ${msg}`);
  }
}
