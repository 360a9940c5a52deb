// Node-level visualization data for the 3D view

import { StructuralValidationError } from '../errors.js';
import type { Asset } from '../models/asset.js';
import {
  ASSET_CLASS_COLORS,
  DEFAULT_NODE_COLOR,
  PLACEHOLDER_COLOR,
  PLACEHOLDER_HOVER,
  PLACEHOLDER_ID,
} from './constants.js';
import { assertAssetIdList } from './index-builder.js';
import { circularLayout3d, type Vec3 } from './layout.js';

export interface VisualizationData {
  assetIds: string[];
  positions: Vec3[];
  colors: string[];
  hoverTexts: string[];
  /** True when the graph is empty and the single point is a stand-in. */
  isPlaceholder: boolean;
}

/**
 * Requested ids must be unique non-empty strings.
 * @throws StructuralValidationError
 */
export function validateAssetIdOrder(idOrder: readonly unknown[]): asserts idOrder is readonly string[] {
  assertAssetIdList(idOrder);
  const seen = new Set<string>();
  idOrder.forEach((id, idx) => {
    if (seen.has(id)) {
      throw new StructuralValidationError(`duplicate asset id '${id}' in id order`, `assetIds[${idx}]`);
    }
    seen.add(id);
  });
}

export function placeholderVisualizationData(): VisualizationData {
  return {
    assetIds: [PLACEHOLDER_ID],
    positions: [[0, 0, 0]],
    colors: [PLACEHOLDER_COLOR],
    hoverTexts: [PLACEHOLDER_HOVER],
    isPlaceholder: true,
  };
}

export function buildVisualizationData(
  assets: ReadonlyMap<string, Asset>,
  assetIds: readonly string[],
): VisualizationData {
  if (assetIds.length === 0) return placeholderVisualizationData();

  const ids = [...assetIds];
  return {
    assetIds: ids,
    positions: circularLayout3d(ids),
    colors: ids.map(id => {
      const asset = assets.get(id);
      return asset ? ASSET_CLASS_COLORS[asset.assetClass] : DEFAULT_NODE_COLOR;
    }),
    hoverTexts: ids.map(id => `Asset: ${id}`),
    isPlaceholder: false,
  };
}
