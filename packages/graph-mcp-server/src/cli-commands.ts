// CLI commands over snapshot files; each returns the text to print

import {
  FileSnapshotRepository,
  LAYOUT_TYPES,
  analyzeGraphFormulas,
  closePool,
  countRelationships,
  deserializeGraph,
  generateNetworkReport,
  healthCheck,
  resolveLayout2d,
  runMigrations,
  serializeGraph,
  type AssetGraph,
  type FormulaicAnalysis,
  type GraphMetrics,
  type LayoutType,
} from '@asset-graph/core';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export async function loadSnapshotGraph(path: string): Promise<AssetGraph> {
  const snapshot = await new FileSnapshotRepository(path).load();
  if (!snapshot) throw new CliUsageError(`snapshot file not found: ${path}`);
  return deserializeGraph(snapshot);
}

export function parseLayoutType(value: string | undefined): LayoutType {
  if (value === undefined) return 'spring';
  const match = LAYOUT_TYPES.find(t => t === value);
  if (!match) throw new CliUsageError(`--type must be one of ${LAYOUT_TYPES.join(', ')} (got '${value}')`);
  return match;
}

function padR(s: string, n: number): string { return s.length >= n ? s : s + ' '.repeat(n - s.length); }
function padL(s: string, n: number): string { return s.length >= n ? s : ' '.repeat(n - s.length) + s; }

export function formatMetrics(metrics: GraphMetrics): string {
  const lines = [
    `Assets:                ${metrics.totalAssets}`,
    `Relationships:         ${metrics.totalRelationships}`,
    `Average strength:      ${metrics.averageRelationshipStrength.toFixed(3)}`,
    `Density:               ${metrics.relationshipDensity.toFixed(2)}%`,
    `Regulatory events:     ${metrics.regulatoryEventCount}`,
    `Quality score:         ${metrics.qualityScore.toFixed(3)}`,
  ];
  const types = Object.entries(metrics.relationshipDistribution);
  if (types.length > 0) {
    lines.push('', 'By type:');
    for (const [type, count] of types) lines.push(`  ${padR(type, 20)} ${padL(String(count), 5)}`);
  }
  if (metrics.topRelationships.length > 0) {
    lines.push('', 'Top relationships:');
    for (const r of metrics.topRelationships) {
      lines.push(`  ${r.sourceId} -> ${r.targetId}  ${r.relationshipType}  ${r.strength.toFixed(2)}`);
    }
  }
  return lines.join('\n');
}

export async function metricsCommand(path: string): Promise<string> {
  const graph = await loadSnapshotGraph(path);
  return formatMetrics(graph.calculateMetrics());
}

export async function reportCommand(path: string): Promise<string> {
  const graph = await loadSnapshotGraph(path);
  return generateNetworkReport(graph.calculateMetrics());
}

export function formatFormulas(analysis: FormulaicAnalysis): string {
  const lines = [`${analysis.formulaCount} formulas, average R² ${analysis.summary.avgRSquared.toFixed(2)}`];
  for (const f of analysis.formulas) {
    lines.push('', `[${f.category}] ${f.name}  (R² ${f.rSquared.toFixed(2)})`, `  ${f.expression}`, `  ${f.exampleCalculation}`);
  }
  lines.push('', 'Insights:');
  for (const insight of analysis.summary.keyInsights) lines.push(`  - ${insight}`);
  return lines.join('\n');
}

export async function formulasCommand(path: string): Promise<string> {
  const graph = await loadSnapshotGraph(path);
  return formatFormulas(analyzeGraphFormulas(graph));
}

/** Re-infer relationships and write the snapshot to `outPath` (default: in place). */
export async function rebuildCommand(path: string, outPath?: string): Promise<string> {
  const graph = await loadSnapshotGraph(path);
  const before = countRelationships(graph.relationships);
  graph.buildRelationships();
  const target = outPath ?? path;
  await new FileSnapshotRepository(target).save(serializeGraph(graph));
  return `Rebuilt ${graph.assets.size} assets: ${before} -> ${countRelationships(graph.relationships)} relationships, written to ${target}`;
}

export async function layoutCommand(path: string, layoutType: LayoutType): Promise<string> {
  const graph = await loadSnapshotGraph(path);
  const positions = resolveLayout2d(layoutType, graph.getParticipatingAssetIds());
  const lines = [`${layoutType} layout (${positions.size} assets)`];
  for (const [id, [x, y]] of positions) {
    lines.push(`  ${padR(id, 12)} ${padL(x.toFixed(3), 8)} ${padL(y.toFixed(3), 8)}`);
  }
  return lines.join('\n');
}

/** Apply pending PostgreSQL migrations using the PG_* settings. */
export async function migrateCommand(): Promise<string> {
  try {
    if (!(await healthCheck())) {
      throw new CliUsageError('cannot reach PostgreSQL; check the PG_* settings');
    }
    const ran = await runMigrations();
    return ran.length > 0 ? `Applied migrations: ${ran.join(', ')}` : 'Database schema is up to date';
  } finally {
    await closePool();
  }
}
