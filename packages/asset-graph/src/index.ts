// @asset-graph/core: public surface

export { ConstructionError, StructuralValidationError, MarketDataError } from './errors.js';

export {
  AssetClassSchema,
  AssetSchema,
  ASSET_CLASSES,
  UNKNOWN_SECTOR,
  createAsset,
  isBond,
} from './models/asset.js';
export type {
  Asset,
  AssetClass,
  AssetInput,
  BondAsset,
  CommodityAsset,
  CurrencyAsset,
  EquityAsset,
} from './models/asset.js';
export {
  RegulatoryActivitySchema,
  RegulatoryEventSchema,
  createRegulatoryEvent,
} from './models/regulatory-event.js';
export type { RegulatoryActivity, RegulatoryEvent, RegulatoryEventInput } from './models/regulatory-event.js';

export { AssetGraph } from './graph/asset-graph.js';
export type { AssetGraphOptions } from './graph/asset-graph.js';
export { inferRelationships } from './graph/inference.js';
export {
  RelationshipType,
  SAME_SECTOR_STRENGTH,
  CORPORATE_LINK_STRENGTH,
  DEFAULT_RULES,
  sameSectorRule,
  corporateLinkRule,
} from './graph/rules.js';
export type { RelationshipRule, RuleMatch } from './graph/rules.js';
export { countRelationships, compareIds } from './graph/relationship-store.js';
export type {
  RelationshipEdge,
  RelationshipStore,
  SkipHandler,
  SkipReason,
  SkippedRelationship,
} from './graph/relationship-store.js';

export { calculateNetworkMetrics } from './metrics/network-metrics.js';
export type { GraphMetrics, TopRelationship } from './metrics/network-metrics.js';

export {
  RelationshipIndex,
  buildAssetIdIndex,
  buildRelationshipIndex,
  relationshipKey,
} from './visualization/index-builder.js';
export { groupRelationships, canonicalPairKey } from './visualization/grouper.js';
export type { RelationshipFilters, RelationshipGroup } from './visualization/grouper.js';
export {
  LAYOUT_TYPES,
  circularLayout2d,
  circularLayout3d,
  gridLayout,
  resolveLayout2d,
  springLayout2d,
} from './visualization/layout.js';
export type { LayoutType, Vec2, Vec3 } from './visualization/layout.js';
export { computeDirectionalMarkers } from './visualization/overlay.js';
export type { DirectionalMarker } from './visualization/overlay.js';
export type { VisualizationData } from './visualization/visualization-data.js';
export { buildGraphScene, formatTraceName } from './visualization/scene.js';
export type { GraphScene, SceneDimension, SceneOptions } from './visualization/scene.js';

export { Mutex } from './concurrency/mutex.js';
export { GraphGuard } from './concurrency/graph-guard.js';
export type { GraphSummary } from './concurrency/graph-guard.js';

export {
  deserializeGraph,
  hydrateGraph,
  parseSnapshot,
  serializeGraph,
} from './persistence/snapshot.js';
export type { GraphSnapshot } from './persistence/snapshot.js';
export type { GraphRepository, RepositoryBackend } from './persistence/repository.js';
export { FileSnapshotRepository } from './persistence/file-repository.js';
export { PgGraphRepository } from './persistence/pg-repository.js';
export { runMigrations, healthCheck, closePool } from './persistence/pg-client.js';
export { createRepository, DEFAULT_CACHE_PATH } from './persistence/create-repository.js';

export { MarketDataClient, marketDataFetch, CacheTTL } from './data/market-data-client.js';
export type { MarketDataClientConfig } from './data/market-data-client.js';
export { FmpMarketDataSource, DEFAULT_SYMBOLS } from './data/fmp-source.js';
export type { MarketDataSource } from './data/fmp-source.js';
export { GraphLoader, loadSampleGraph } from './data/graph-loader.js';
export type { GraphLoaderOptions, GraphOrigin, LoadedGraph } from './data/graph-loader.js';

export { generateNetworkReport, densityRecommendation } from './reports/network-report.js';

export {
  FORMULA_TEMPLATES,
  FormulaCategory,
  analyzeFormulas,
  analyzeGraphFormulas,
  averagePairStrength,
  categorizeFormulas,
  pairStrengths,
} from './analysis/formulaic-analysis.js';
export type {
  EmpiricalRelationships,
  Formula,
  FormulaicAnalysis,
  FormulaSummary,
  PairStrength,
} from './analysis/formulaic-analysis.js';

export { configFromEnv } from './config.js';
export type { AppConfig } from './config.js';
