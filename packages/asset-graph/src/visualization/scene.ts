// Scene composition: index, group, lay out and annotate into renderer-neutral traces

import type { AssetGraph } from '../graph/asset-graph.js';
import { relationshipColor } from './constants.js';
import { groupRelationships, type RelationshipFilters, type RelationshipGroup } from './grouper.js';
import { buildAssetIdIndex, buildRelationshipIndex } from './index-builder.js';
import { resolveLayout2d, type LayoutType, type Vec3 } from './layout.js';
import { computeDirectionalMarkers } from './overlay.js';

export type SceneDimension = '3d' | '2d';

export interface SceneOptions {
  dimension?: SceneDimension;
  layoutType?: LayoutType;
  relationshipFilters?: RelationshipFilters;
  showDirectionalArrows?: boolean;
  baseTitle?: string;
}

export const DEFAULT_SCENE_TITLE = 'Financial Asset Relationship Network';

export interface LineStyle {
  color: string;
  width: number;
  dash: 'solid' | 'dash';
}

export interface NodeTrace {
  kind: 'nodes';
  ids: string[];
  x: number[];
  y: number[];
  /** Present for 3D scenes only. */
  z?: number[];
  colors: string[];
  hoverTexts: string[];
}

export interface EdgeTrace {
  kind: 'edges';
  name: string;
  relationshipType: string;
  bidirectional: boolean;
  x: (number | null)[];
  y: (number | null)[];
  z?: (number | null)[];
  hoverTexts: (string | null)[];
  line: LineStyle;
}

export interface ArrowTrace {
  kind: 'arrows';
  x: number[];
  y: number[];
  z: number[];
  hoverTexts: string[];
}

export interface GraphScene {
  title: string;
  dimension: SceneDimension;
  nodes: NodeTrace;
  edges: EdgeTrace[];
  arrows: ArrowTrace | null;
}

/** `same_sector`, bidirectional → `Same Sector (↔)`. */
export function formatTraceName(relationshipType: string, bidirectional: boolean): string {
  const label = relationshipType
    .split('_')
    .filter(part => part.length > 0)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
  return `${label} (${bidirectional ? '↔' : '→'})`;
}

export function formatEdgeHover(
  sourceId: string,
  targetId: string,
  relationshipType: string,
  strength: number,
  bidirectional: boolean,
): string {
  const arrow = bidirectional ? '↔' : '→';
  return `${sourceId} ${arrow} ${targetId}<br>Type: ${relationshipType}<br>Strength: ${strength.toFixed(2)}`;
}

function buildEdgeTrace(group: RelationshipGroup, positions: ReadonlyMap<string, Vec3>, is3d: boolean): EdgeTrace {
  const x: (number | null)[] = [];
  const y: (number | null)[] = [];
  const z: (number | null)[] = [];
  const hoverTexts: (string | null)[] = [];

  for (const rel of group.relationships) {
    const src = positions.get(rel.sourceId);
    const tgt = positions.get(rel.targetId);
    if (!src || !tgt) continue;
    const hover = formatEdgeHover(rel.sourceId, rel.targetId, group.relationshipType, rel.strength, group.bidirectional);
    x.push(src[0], tgt[0], null);
    y.push(src[1], tgt[1], null);
    if (is3d) z.push(src[2], tgt[2], null);
    hoverTexts.push(hover, hover, null);
  }

  return {
    kind: 'edges',
    name: formatTraceName(group.relationshipType, group.bidirectional),
    relationshipType: group.relationshipType,
    bidirectional: group.bidirectional,
    x,
    y,
    ...(is3d ? { z } : {}),
    hoverTexts,
    line: {
      color: relationshipColor(group.relationshipType),
      width: group.bidirectional ? 4 : 2,
      dash: group.bidirectional ? 'solid' : 'dash',
    },
  };
}

/**
 * Compose the full scene for a graph. Arrows are drawn in 3D only; the title
 * counts zero assets when the placeholder point is shown.
 */
export function buildGraphScene(graph: AssetGraph, options: SceneOptions = {}): GraphScene {
  const dimension = options.dimension ?? '3d';
  const is3d = dimension === '3d';
  const data = graph.getVisualizationData();
  const assetIds = data.isPlaceholder ? [] : data.assetIds;

  const index = buildRelationshipIndex(graph.relationships, assetIds);
  const groups = groupRelationships(index, options.relationshipFilters);

  // 2D layouts are lifted to z = 0 so both dimensions share one lookup
  const positions = new Map<string, Vec3>();
  if (is3d) {
    data.assetIds.forEach((id, i) => positions.set(id, data.positions[i]));
  } else {
    for (const [id, [x, y]] of resolveLayout2d(options.layoutType ?? 'spring', data.assetIds)) {
      positions.set(id, [x, y, 0]);
    }
  }

  const nodes: NodeTrace = { kind: 'nodes', ids: [], x: [], y: [], colors: [], hoverTexts: [] };
  const z: number[] = [];
  data.assetIds.forEach((id, i) => {
    const pos = positions.get(id);
    if (!pos) return;
    nodes.ids.push(id);
    nodes.x.push(pos[0]);
    nodes.y.push(pos[1]);
    z.push(pos[2]);
    nodes.colors.push(data.colors[i]);
    nodes.hoverTexts.push(data.hoverTexts[i]);
  });
  if (is3d) nodes.z = z;

  const edges = groups.map(group => buildEdgeTrace(group, positions, is3d));

  let arrows: ArrowTrace | null = null;
  if (is3d && (options.showDirectionalArrows ?? true) && assetIds.length > 0) {
    const markers = computeDirectionalMarkers(index, data.positions, buildAssetIdIndex(assetIds)).filter(m =>
      options.relationshipFilters ? options.relationshipFilters[m.relationshipType] !== false : true,
    );
    if (markers.length > 0) {
      arrows = {
        kind: 'arrows',
        x: markers.map(m => m.position[0]),
        y: markers.map(m => m.position[1]),
        z: markers.map(m => m.position[2]),
        hoverTexts: markers.map(m => m.hoverText),
      };
    }
  }

  const relationshipCount = groups.reduce((sum, group) => sum + group.relationships.length, 0);
  const base = options.baseTitle ?? DEFAULT_SCENE_TITLE;

  return {
    title: `${base} - ${assetIds.length} Assets, ${relationshipCount} Relationships`,
    dimension,
    nodes,
    edges,
    arrows,
  };
}
