import { z } from 'zod';
import { DEFAULT_SYMBOLS } from './data/fmp-source.js';
import { marketDataConfigFromEnv, type MarketDataClientConfig } from './data/market-data-client.js';
import { pgConfigFromEnv, type PgConfig } from './persistence/pg-client.js';
import type { RepositoryBackend } from './persistence/repository.js';

export interface AppConfig {
  backend: RepositoryBackend;
  /** Snapshot file for the file backend. */
  cachePath: string | null;
  enableNetwork: boolean;
  /** Populate the graph through the loader at startup instead of starting empty. */
  preload: boolean;
  symbols: string[];
  pg: PgConfig;
  marketData: MarketDataClientConfig;
}

const BackendSchema = z.enum(['file', 'postgres', 'none']);

const FALSY = new Set(['0', 'false', 'no', 'off']);

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return !FALSY.has(value.trim().toLowerCase());
}

export function parseSymbols(value: string | undefined): string[] {
  if (!value) return [...DEFAULT_SYMBOLS];
  const symbols = value
    .split(',')
    .map(s => s.trim().toUpperCase())
    .filter(s => s.length > 0);
  return symbols.length > 0 ? [...new Set(symbols)] : [...DEFAULT_SYMBOLS];
}

/**
 * ASSET_GRAPH_BACKEND defaults to `file` when ASSET_GRAPH_CACHE_PATH is set, `none` otherwise.
 * @throws Error for an unknown backend name
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cachePath = env.ASSET_GRAPH_CACHE_PATH?.trim() || null;
  const backendRaw = env.ASSET_GRAPH_BACKEND?.trim().toLowerCase() || (cachePath ? 'file' : 'none');
  const backend = BackendSchema.safeParse(backendRaw);
  if (!backend.success) {
    throw new Error(`ASSET_GRAPH_BACKEND must be one of file, postgres, none (got '${backendRaw}')`);
  }

  return {
    backend: backend.data,
    cachePath,
    enableNetwork: parseBoolean(env.ASSET_GRAPH_NETWORK, false),
    preload: parseBoolean(env.ASSET_GRAPH_PRELOAD, false),
    symbols: parseSymbols(env.ASSET_GRAPH_SYMBOLS),
    pg: pgConfigFromEnv(env),
    marketData: marketDataConfigFromEnv(env),
  };
}
