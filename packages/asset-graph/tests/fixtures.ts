// Shared builders for graph tests

import { createAsset, type Asset } from '../src/models/asset.js';
import { createRegulatoryEvent, type RegulatoryEvent } from '../src/models/regulatory-event.js';
import type { GraphRepository } from '../src/persistence/repository.js';
import type { GraphSnapshot } from '../src/persistence/snapshot.js';

export function equity(id: string, sector = 'Technology', price = 100): Asset {
  return createAsset({ id, symbol: id, name: `${id} Inc.`, assetClass: 'equity', sector, price });
}

export function bond(id: string, issuerId?: string, sector = 'Corporate'): Asset {
  return createAsset({
    id,
    symbol: id,
    name: `${id} Note`,
    assetClass: 'fixed_income',
    sector,
    price: 98.5,
    couponRate: 0.04,
    issuerId,
  });
}

export function event(id: string, assetId: string, impactScore: number, relatedAssets: string[]): RegulatoryEvent {
  return createRegulatoryEvent({
    id,
    assetId,
    eventType: 'earnings_report',
    date: '2024-11-01',
    description: `${id} description`,
    impactScore,
    relatedAssets,
  });
}

/** In-process repository holding one snapshot. */
export class MemoryRepository implements GraphRepository {
  snapshot: GraphSnapshot | null = null;
  saves = 0;
  closed = false;

  constructor(initial: GraphSnapshot | null = null) {
    this.snapshot = initial;
  }

  async load(): Promise<GraphSnapshot | null> {
    return this.snapshot ? structuredClone(this.snapshot) : null;
  }

  async save(snapshot: GraphSnapshot): Promise<void> {
    this.saves++;
    this.snapshot = structuredClone(snapshot);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
