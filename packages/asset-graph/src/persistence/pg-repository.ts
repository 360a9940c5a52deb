// PostgreSQL graph repository: snapshot rows across four tables, saved in one transaction

import { closePool, queryWithRetry, withTransaction } from './pg-client.js';
import type { GraphRepository } from './repository.js';
import { parseSnapshot, type GraphSnapshot } from './snapshot.js';

export const ASSET_COLUMNS = [
  'id',
  'symbol',
  'name',
  'asset_class',
  'sector',
  'price',
  'market_cap',
  'currency',
  'pe_ratio',
  'dividend_yield',
  'earnings_per_share',
  'book_value',
  'yield_to_maturity',
  'coupon_rate',
  'maturity_date',
  'credit_rating',
  'issuer_id',
  'contract_size',
  'delivery_date',
  'volatility',
  'exchange_rate',
  'country',
  'central_bank_rate',
] as const;

type AssetRow = Record<(typeof ASSET_COLUMNS)[number], unknown>;

interface RelationshipRow {
  source_asset_id: string;
  target_asset_id: string;
  relationship_type: string;
  strength: number;
}

interface EventRow {
  position: number;
  id: string;
  asset_id: string;
  event_type: string;
  date: string;
  description: string;
  impact_score: number;
}

interface EventAssetRow {
  event_position: number;
  asset_id: string;
}

const ASSET_INSERT = `INSERT INTO assets (${ASSET_COLUMNS.join(', ')}, position)
  VALUES (${ASSET_COLUMNS.map((_, i) => `$${i + 1}`).join(', ')}, $${ASSET_COLUMNS.length + 1})`;

/** Class tag the snapshot codec expects on each asset record. */
const TYPE_TAGS: Readonly<Record<string, string>> = {
  equity: 'Equity',
  fixed_income: 'Bond',
  commodity: 'Commodity',
  currency: 'Currency',
};

export class PgGraphRepository implements GraphRepository {
  /** Null when all four tables are empty. */
  async load(): Promise<GraphSnapshot | null> {
    const [assets, relationships, events, eventAssets] = await Promise.all([
      queryWithRetry<AssetRow>(`SELECT ${ASSET_COLUMNS.join(', ')} FROM assets ORDER BY position, id`, []),
      queryWithRetry<RelationshipRow>(
        'SELECT source_asset_id, target_asset_id, relationship_type, strength FROM asset_relationships ORDER BY position',
        [],
      ),
      queryWithRetry<EventRow>(
        'SELECT position, id, asset_id, event_type, date, description, impact_score FROM regulatory_events ORDER BY position',
        [],
      ),
      queryWithRetry<EventAssetRow>(
        'SELECT event_position, asset_id FROM regulatory_event_assets ORDER BY event_position, position',
        [],
      ),
    ]);

    if (assets.rows.length === 0 && relationships.rows.length === 0 && events.rows.length === 0) {
      return null;
    }

    const related = new Map<number, string[]>();
    for (const row of eventAssets.rows) {
      const list = related.get(row.event_position) ?? [];
      list.push(row.asset_id);
      related.set(row.event_position, list);
    }

    const outgoing = new Map<string, { target: string; relationship_type: string; strength: number }[]>();
    for (const row of relationships.rows) {
      const list = outgoing.get(row.source_asset_id) ?? [];
      list.push({
        target: row.target_asset_id,
        relationship_type: row.relationship_type,
        strength: Number(row.strength),
      });
      outgoing.set(row.source_asset_id, list);
    }

    // Rows go back through the codec so the database is treated like any other untrusted source
    return parseSnapshot({
      assets: assets.rows.map(row => ({ ...row, __type__: TYPE_TAGS[String(row.asset_class)] })),
      regulatory_events: events.rows.map(row => ({
        id: row.id,
        asset_id: row.asset_id,
        event_type: row.event_type,
        date: row.date,
        description: row.description,
        impact_score: Number(row.impact_score),
        related_assets: related.get(row.position) ?? [],
      })),
      relationships: Object.fromEntries(outgoing),
    });
  }

  /** Replace every stored row with the snapshot's contents. */
  async save(snapshot: GraphSnapshot): Promise<void> {
    await withTransaction(async (client) => {
      await client.query('DELETE FROM regulatory_event_assets');
      await client.query('DELETE FROM regulatory_events');
      await client.query('DELETE FROM asset_relationships');
      await client.query('DELETE FROM assets');

      for (const [position, record] of snapshot.assets.entries()) {
        const fields: Record<string, unknown> = record;
        await client.query(ASSET_INSERT, [...ASSET_COLUMNS.map(col => fields[col] ?? null), position]);
      }

      let position = 0;
      for (const [source, edges] of Object.entries(snapshot.relationships)) {
        for (const edge of edges) {
          await client.query(
            `INSERT INTO asset_relationships
               (source_asset_id, target_asset_id, relationship_type, strength, position)
             VALUES ($1, $2, $3, $4, $5)`,
            [source, edge.target, edge.relationship_type, edge.strength, position++],
          );
        }
      }

      for (const [eventPosition, event] of snapshot.regulatory_events.entries()) {
        await client.query(
          `INSERT INTO regulatory_events
             (position, id, asset_id, event_type, date, description, impact_score)
           VALUES ($1, $2, $3, $4, $5, $6, $7)`,
          [eventPosition, event.id, event.asset_id, event.event_type, event.date, event.description, event.impact_score],
        );
        for (const [idx, assetId] of event.related_assets.entries()) {
          await client.query(
            'INSERT INTO regulatory_event_assets (event_position, asset_id, position) VALUES ($1, $2, $3)',
            [eventPosition, assetId, idx],
          );
        }
      }
    });
  }

  async close(): Promise<void> {
    await closePool();
  }
}
