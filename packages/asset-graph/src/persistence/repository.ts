import type { GraphSnapshot } from './snapshot.js';

export interface GraphRepository {
  /** Stored snapshot, or null when nothing has been saved yet. */
  load(): Promise<GraphSnapshot | null>;
  /** Replace whatever was stored before. */
  save(snapshot: GraphSnapshot): Promise<void>;
  /** Release connections; a no-op for file storage. */
  close(): Promise<void>;
}

export type RepositoryBackend = 'file' | 'postgres' | 'none';
