// Deterministic layouts computed from the id list alone

export type Vec2 = [number, number];
export type Vec3 = [number, number, number];

export type LayoutType = 'circular' | 'grid' | 'spring';

export const LAYOUT_TYPES: readonly LayoutType[] = ['circular', 'grid', 'spring'];

function angleAt(i: number, n: number): number {
  return (2 * Math.PI * i) / n;
}

/** Unit circle in the XY plane, z = 0; aligned with `assetIds`. */
export function circularLayout3d(assetIds: readonly string[]): Vec3[] {
  const n = assetIds.length;
  return assetIds.map((_, i) => [Math.cos(angleAt(i, n)), Math.sin(angleAt(i, n)), 0]);
}

export function circularLayout2d(assetIds: readonly string[]): Map<string, Vec2> {
  const n = assetIds.length;
  const positions = new Map<string, Vec2>();
  assetIds.forEach((id, i) => positions.set(id, [Math.cos(angleAt(i, n)), Math.sin(angleAt(i, n))]));
  return positions;
}

/** Row-major grid with ⌈√n⌉ columns. */
export function gridLayout(assetIds: readonly string[]): Map<string, Vec2> {
  const positions = new Map<string, Vec2>();
  if (assetIds.length === 0) return positions;
  const cols = Math.ceil(Math.sqrt(assetIds.length));
  assetIds.forEach((id, i) => positions.set(id, [i % cols, Math.floor(i / cols)]));
  return positions;
}

/**
 * "Spring" layout: the first two coordinates of an existing 3D layout.
 * No force simulation runs; ids missing from `positions3d` are left out.
 */
export function springLayout2d(
  positions3d: ReadonlyMap<string, Vec3>,
  assetIds: readonly string[],
): Map<string, Vec2> {
  const positions = new Map<string, Vec2>();
  for (const id of assetIds) {
    const pos = positions3d.get(id);
    if (pos) positions.set(id, [pos[0], pos[1]]);
  }
  return positions;
}

export function positionsById(assetIds: readonly string[], positions: readonly Vec3[]): Map<string, Vec3> {
  const byId = new Map<string, Vec3>();
  assetIds.forEach((id, i) => {
    if (i < positions.length) byId.set(id, positions[i]);
  });
  return byId;
}

export function resolveLayout2d(layoutType: LayoutType, assetIds: readonly string[]): Map<string, Vec2> {
  switch (layoutType) {
    case 'circular':
      return circularLayout2d(assetIds);
    case 'grid':
      return gridLayout(assetIds);
    case 'spring':
      return springLayout2d(positionsById(assetIds, circularLayout3d(assetIds)), assetIds);
  }
}
