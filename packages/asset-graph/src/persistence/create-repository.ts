import type { AppConfig } from '../config.js';
import { FileSnapshotRepository } from './file-repository.js';
import { getPool } from './pg-client.js';
import { PgGraphRepository } from './pg-repository.js';
import type { GraphRepository } from './repository.js';

export const DEFAULT_CACHE_PATH = '.asset-graph/graph-cache.json';

/** Repository for the configured backend, or null for `none`. */
export async function createRepository(config: AppConfig): Promise<GraphRepository | null> {
  switch (config.backend) {
    case 'file':
      return new FileSnapshotRepository(config.cachePath ?? DEFAULT_CACHE_PATH);
    case 'postgres':
      // Creates the shared pool with these settings; no connection is opened yet
      await getPool(config.pg);
      return new PgGraphRepository();
    case 'none':
      return null;
  }
}
