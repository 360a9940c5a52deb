// Network report: Markdown summary of graph metrics with a connectivity recommendation

import type { GraphMetrics } from '../metrics/network-metrics.js';
import { SAME_SECTOR_STRENGTH, CORPORATE_LINK_STRENGTH } from '../graph/rules.js';

export const HIGH_DENSITY_THRESHOLD = 30;
export const BALANCED_DENSITY_THRESHOLD = 10;

export interface NetworkReportOptions {
  title?: string;
  /** Include the static rule descriptions. Default true. */
  includeRules?: boolean;
}

export function densityRecommendation(density: number): string {
  if (density > HIGH_DENSITY_THRESHOLD) return 'High connectivity: consider normalizing relationship definitions.';
  if (density > BALANCED_DENSITY_THRESHOLD) return 'Well-balanced: suitable for most analytical use cases.';
  return 'Sparse: consider enriching relationship definitions.';
}

export function formatPercent(value: number, digits = 1): string {
  return `${(value * 100).toFixed(digits)}%`;
}

function relationshipTypeLines(metrics: GraphMetrics): string[] {
  const entries = Object.entries(metrics.relationshipDistribution).sort(
    ([a, ca], [b, cb]) => cb - ca || (a < b ? -1 : a > b ? 1 : 0),
  );
  if (entries.length === 0) return ['- None'];
  return entries.map(([type, count]) => `- **${type}**: ${count}`);
}

function assetClassLines(metrics: GraphMetrics): string[] {
  const entries = Object.entries(metrics.assetClassDistribution).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  if (entries.length === 0) return ['- None'];
  return entries.map(([cls, count]) => `- **${cls}**: ${count}`);
}

function topRelationshipLines(metrics: GraphMetrics): string[] {
  if (metrics.topRelationships.length === 0) return ['- No relationships recorded yet.'];
  return metrics.topRelationships.map(
    (r, i) => `${i + 1}. **${r.sourceId}** → **${r.targetId}** (${r.relationshipType}, strength ${r.strength.toFixed(2)})`,
  );
}

/**
 * Render metrics as Markdown. Sections: network statistics, relationship
 * types, asset classes, top relationships, rules, data quality.
 */
export function generateNetworkReport(metrics: GraphMetrics, options: NetworkReportOptions = {}): string {
  const lines: string[] = [
    `# ${options.title ?? 'Asset Relationship Network Report'}`,
    '',
    '## Network Statistics',
    '',
    `- **Total Assets**: ${metrics.totalAssets}`,
    `- **Total Relationships**: ${metrics.totalRelationships}`,
    `- **Average Relationship Strength**: ${metrics.averageRelationshipStrength.toFixed(3)}`,
    `- **Relationship Density**: ${metrics.relationshipDensity.toFixed(2)}%`,
    `- **Regulatory Events**: ${metrics.regulatoryEventCount}`,
    '',
    '## Relationship Types',
    '',
    ...relationshipTypeLines(metrics),
    '',
    '## Asset Classes',
    '',
    ...assetClassLines(metrics),
    '',
    '## Top Relationships',
    '',
    ...topRelationshipLines(metrics),
    '',
  ];

  if (options.includeRules ?? true) {
    lines.push(
      '## Relationship Rules',
      '',
      `- **same_sector**: assets sharing a known sector, both directions, strength ${SAME_SECTOR_STRENGTH}`,
      `- **corporate_link**: bond to its issuer, one direction, strength ${CORPORATE_LINK_STRENGTH}`,
      '- **event_impact**: event asset to each related asset, strength |impact score|',
      '',
    );
  }

  lines.push(
    '## Data Quality',
    '',
    `- **Quality Score**: ${formatPercent(metrics.qualityScore)}`,
    `- **Recommendation**: ${densityRecommendation(metrics.relationshipDensity)}`,
    '',
  );

  return lines.join('\n');
}
