import { StructuralValidationError } from '../errors.js';
import { ARROW_POSITION } from './constants.js';
import type { RelationshipIndex } from './index-builder.js';
import type { Vec3 } from './layout.js';

export interface DirectionalMarker {
  sourceId: string;
  targetId: string;
  relationshipType: string;
  position: Vec3;
  hoverText: string;
}

/**
 * Check that positions are finite 3-vectors aligned one-to-one with the ids.
 * @throws StructuralValidationError
 */
export function assertPositions(positions: readonly unknown[], expectedLength: number): asserts positions is readonly Vec3[] {
  if (positions.length !== expectedLength) {
    throw new StructuralValidationError(
      `positions length (${positions.length}) must match asset ids length (${expectedLength})`,
      'positions',
    );
  }
  positions.forEach((pos, idx) => {
    if (!Array.isArray(pos) || pos.length !== 3) {
      throw new StructuralValidationError(`position at index ${idx} must have 3 coordinates`, `positions[${idx}]`);
    }
    if (!pos.every((v: unknown) => typeof v === 'number' && Number.isFinite(v))) {
      throw new StructuralValidationError(`position at index ${idx} must contain finite numbers`, `positions[${idx}]`);
    }
  });
}

export function pointAlong(source: Vec3, target: Vec3, t: number): Vec3 {
  return [
    source[0] + t * (target[0] - source[0]),
    source[1] + t * (target[1] - source[1]),
    source[2] + t * (target[2] - source[2]),
  ];
}

/**
 * One marker per indexed edge that has no same-typed reverse edge.
 * `positions[i]` belongs to the id that `idIndex` maps to i.
 */
export function computeDirectionalMarkers(
  index: RelationshipIndex,
  positions: readonly unknown[],
  idIndex: ReadonlyMap<string, number>,
): DirectionalMarker[] {
  assertPositions(positions, idIndex.size);
  const markers: DirectionalMarker[] = [];

  for (const edge of index) {
    if (index.hasReverse(edge)) continue;
    const src = idIndex.get(edge.sourceId);
    const tgt = idIndex.get(edge.targetId);
    if (src === undefined || tgt === undefined) {
      throw new StructuralValidationError(
        `edge ${edge.sourceId} -> ${edge.targetId} references an id without a position`,
      );
    }
    markers.push({
      sourceId: edge.sourceId,
      targetId: edge.targetId,
      relationshipType: edge.relationshipType,
      position: pointAlong(positions[src], positions[tgt], ARROW_POSITION),
      hoverText: `Direction: ${edge.sourceId} → ${edge.targetId}<br>Type: ${edge.relationshipType}`,
    });
  }

  return markers;
}
