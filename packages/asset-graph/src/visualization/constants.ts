import type { AssetClass } from '../models/asset.js';

export const DEFAULT_RELATIONSHIP_COLOR = '#888888';

export const REL_TYPE_COLORS: Readonly<Record<string, string>> = {
  same_sector: '#FF6B6B',
  corporate_link: '#96CEB4',
  event_impact: '#FFA07A',
  market_cap_similar: '#4ECDC4',
  correlation: '#45B7D1',
  commodity_currency: '#FFEAA7',
  income_comparison: '#DDA0DD',
};

export const ASSET_CLASS_COLORS: Readonly<Record<AssetClass, string>> = {
  equity: '#1f77b4',
  fixed_income: '#2ca02c',
  commodity: '#ff7f0e',
  currency: '#d62728',
};

/** Nodes reached only through relationships have no asset class. */
export const DEFAULT_NODE_COLOR = '#4ECDC4';

// Reserved for the single point drawn for an empty graph
export const PLACEHOLDER_ID = 'A';
export const PLACEHOLDER_COLOR = '#888888';
export const PLACEHOLDER_HOVER = 'Asset A';

/** Fraction of the source→target segment where direction markers sit. */
export const ARROW_POSITION = 0.7;

export function relationshipColor(relationshipType: string): string {
  return Object.hasOwn(REL_TYPE_COLORS, relationshipType)
    ? REL_TYPE_COLORS[relationshipType]
    : DEFAULT_RELATIONSHIP_COLOR;
}
