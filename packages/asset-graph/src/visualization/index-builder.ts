// Visualization index builder: O(1) id→position and (source, target, type)→strength lookups
// This is where store contents are re-validated before rendering code trusts them.

import { z } from 'zod';
import { StructuralValidationError } from '../errors.js';

export interface IndexedRelationship {
  sourceId: string;
  targetId: string;
  relationshipType: string;
  strength: number;
}

const IndexedEdgeSchema = z
  .object({
    targetId: z.string().min(1),
    relationshipType: z.string().min(1),
    strength: z.number().finite(),
  })
  .strict();

/** Collision-free composite key for (source, target, type). */
export function relationshipKey(sourceId: string, targetId: string, relationshipType: string): string {
  return JSON.stringify([sourceId, targetId, relationshipType]);
}

export class RelationshipIndex implements Iterable<IndexedRelationship> {
  private readonly entries = new Map<string, IndexedRelationship>();

  set(edge: IndexedRelationship): void {
    this.entries.set(relationshipKey(edge.sourceId, edge.targetId, edge.relationshipType), edge);
  }

  get(sourceId: string, targetId: string, relationshipType: string): number | undefined {
    return this.entries.get(relationshipKey(sourceId, targetId, relationshipType))?.strength;
  }

  has(sourceId: string, targetId: string, relationshipType: string): boolean {
    return this.entries.has(relationshipKey(sourceId, targetId, relationshipType));
  }

  /** True when the same-typed edge in the opposite direction is indexed. */
  hasReverse(edge: IndexedRelationship): boolean {
    return this.has(edge.targetId, edge.sourceId, edge.relationshipType);
  }

  get size(): number {
    return this.entries.size;
  }

  [Symbol.iterator](): Iterator<IndexedRelationship> {
    return this.entries.values();
  }
}

/**
 * Validate a requested id list: every entry a non-empty string.
 * @throws StructuralValidationError
 */
export function assertAssetIdList(assetIds: readonly unknown[]): asserts assetIds is readonly string[] {
  if (!Array.isArray(assetIds)) {
    throw new StructuralValidationError('asset ids must be an array', 'assetIds');
  }
  assetIds.forEach((id, idx) => {
    if (typeof id !== 'string' || id.length === 0) {
      throw new StructuralValidationError(`asset id at index ${idx} must be a non-empty string`, `assetIds[${idx}]`);
    }
  });
}

export function buildAssetIdIndex(assetIds: readonly string[]): Map<string, number> {
  const index = new Map<string, number>();
  assetIds.forEach((id, idx) => index.set(id, idx));
  return index;
}

/**
 * Index every edge whose endpoints are both in `assetIds`. Only sources in
 * the requested set are read; their edges are validated in full.
 * @throws StructuralValidationError on malformed ids or edges
 */
export function buildRelationshipIndex(
  relationships: ReadonlyMap<string, readonly unknown[]>,
  assetIds: readonly string[],
): RelationshipIndex {
  assertAssetIdList(assetIds);
  const requested = new Set(assetIds);
  const index = new RelationshipIndex();

  for (const [sourceId, edges] of relationships) {
    if (!requested.has(sourceId)) continue;
    if (!Array.isArray(edges)) {
      throw new StructuralValidationError(
        `relationships for '${sourceId}' must be an array`,
        `relationships.${sourceId}`,
      );
    }
    edges.forEach((raw: unknown, idx: number) => {
      const parsed = IndexedEdgeSchema.safeParse(raw);
      if (!parsed.success) {
        const detail = parsed.error.issues
          .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
          .join('; ');
        throw new StructuralValidationError(
          `relationship at index ${idx} for '${sourceId}' is malformed (${detail})`,
          `relationships.${sourceId}[${idx}]`,
        );
      }
      const { targetId, relationshipType, strength } = parsed.data;
      if (requested.has(targetId)) {
        index.set({ sourceId, targetId, relationshipType, strength });
      }
    });
  }

  return index;
}
