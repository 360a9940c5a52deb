// Bootstrap: builds the guarded graph and its repository from configuration

import {
  AssetGraph,
  FmpMarketDataSource,
  GraphGuard,
  GraphLoader,
  MarketDataClient,
  createRepository,
  type AppConfig,
  type AssetGraphOptions,
  type GraphOrigin,
  type GraphRepository,
  type MarketDataSource,
} from '@asset-graph/core';

export interface AppContext {
  config: AppConfig;
  guard: GraphGuard;
  repository: GraphRepository | null;
  /** Where the initial contents came from; `empty` when nothing was loaded. */
  origin: GraphOrigin | 'empty';
}

export interface BootstrapOverrides {
  repository?: GraphRepository | null;
  source?: MarketDataSource | null;
  fallbackFactory?: () => AssetGraph | Promise<AssetGraph>;
  graphOptions?: AssetGraphOptions;
}

/**
 * Without preload the graph starts from the repository snapshot when one
 * exists, otherwise empty. With preload it goes through the full loader.
 */
export async function bootstrap(config: AppConfig, overrides: BootstrapOverrides = {}): Promise<AppContext> {
  const repository = overrides.repository !== undefined ? overrides.repository : await createRepository(config);
  const graph = new AssetGraph(overrides.graphOptions);
  const guard = new GraphGuard(graph);

  if (config.preload) {
    const source =
      overrides.source !== undefined
        ? overrides.source
        : new FmpMarketDataSource(new MarketDataClient(config.marketData), config.symbols);
    const loader = new GraphLoader({
      cache: repository,
      source,
      enableNetwork: config.enableNetwork,
      fallbackFactory: overrides.fallbackFactory,
      graphOptions: overrides.graphOptions,
    });
    const loaded = await loader.load();
    await guard.replaceWith(loaded.graph);
    return { config, guard, repository, origin: loaded.origin };
  }

  if (repository && (await guard.load(repository))) {
    return { config, guard, repository, origin: 'cache' };
  }
  return { config, guard, repository, origin: 'empty' };
}

/** Empty the graph and release the repository's connections. */
export async function resetContext(context: AppContext): Promise<void> {
  await context.guard.reset();
  if (context.repository) await context.repository.close();
}
