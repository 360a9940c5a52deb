// File snapshot repository: one JSON document, replaced atomically on save

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { StructuralValidationError } from '../errors.js';
import type { GraphRepository } from './repository.js';
import { parseSnapshot, type GraphSnapshot } from './snapshot.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileSnapshotRepository implements GraphRepository {
  readonly path: string;

  constructor(path: string) {
    this.path = resolve(path);
  }

  async load(): Promise<GraphSnapshot | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new StructuralValidationError(`Snapshot file ${this.path} is not valid JSON: ${msg}`);
    }
    return parseSnapshot(payload);
  }

  /** Write to a sibling temp file, then rename over the target. */
  async save(snapshot: GraphSnapshot): Promise<void> {
    const dir = dirname(this.path);
    await mkdir(dir, { recursive: true });
    const tmpPath = join(dir, `.${basename(this.path)}.${process.pid}.${Date.now()}.tmp`);
    try {
      await writeFile(tmpPath, JSON.stringify(snapshot, null, 2), 'utf-8');
      await rename(tmpPath, this.path);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw err;
    }
  }

  async close(): Promise<void> {
    // nothing held open
  }
}
