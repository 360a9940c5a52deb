// Graph snapshot codec: the snake_case JSON cache format shared by every repository
//
// Assets carry a trailing `__type__` tag, absent optionals are written as null,
// and `incoming_relationships` is derived on save and ignored on load.

import { z } from 'zod';
import { StructuralValidationError } from '../errors.js';
import { AssetGraph, type AssetGraphOptions } from '../graph/asset-graph.js';
import { createAsset, type Asset, type AssetInput } from '../models/asset.js';
import {
  RegulatoryActivitySchema,
  createRegulatoryEvent,
  type RegulatoryEvent,
} from '../models/regulatory-event.js';

const optionalNumber = z.number().finite().nullish();
const optionalString = z.string().nullish();

const BaseAssetRecordSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  name: z.string(),
  sector: z.string().nullish(),
  price: z.number().finite(),
  market_cap: optionalNumber,
  currency: optionalString,
});

const EquityRecordSchema = BaseAssetRecordSchema.extend({
  asset_class: z.literal('equity'),
  pe_ratio: optionalNumber,
  dividend_yield: optionalNumber,
  earnings_per_share: optionalNumber,
  book_value: optionalNumber,
  __type__: z.literal('Equity').optional(),
});

const BondRecordSchema = BaseAssetRecordSchema.extend({
  asset_class: z.literal('fixed_income'),
  yield_to_maturity: optionalNumber,
  coupon_rate: optionalNumber,
  maturity_date: optionalString,
  credit_rating: optionalString,
  issuer_id: optionalString,
  __type__: z.literal('Bond').optional(),
});

const CommodityRecordSchema = BaseAssetRecordSchema.extend({
  asset_class: z.literal('commodity'),
  contract_size: optionalNumber,
  delivery_date: optionalString,
  volatility: optionalNumber,
  __type__: z.literal('Commodity').optional(),
});

const CurrencyRecordSchema = BaseAssetRecordSchema.extend({
  asset_class: z.literal('currency'),
  exchange_rate: optionalNumber,
  country: optionalString,
  central_bank_rate: optionalNumber,
  __type__: z.literal('Currency').optional(),
});

export const AssetRecordSchema = z.discriminatedUnion('asset_class', [
  EquityRecordSchema,
  BondRecordSchema,
  CommodityRecordSchema,
  CurrencyRecordSchema,
]);

export const EventRecordSchema = z.object({
  id: z.string(),
  asset_id: z.string(),
  event_type: RegulatoryActivitySchema,
  date: z.string(),
  description: z.string(),
  impact_score: z.number().finite(),
  related_assets: z.array(z.string()).default([]),
});

export const OutgoingEdgeRecordSchema = z.object({
  target: z.string().min(1),
  relationship_type: z.string().min(1),
  strength: z.number().finite(),
});

export const IncomingEdgeRecordSchema = z.object({
  source: z.string().min(1),
  relationship_type: z.string().min(1),
  strength: z.number().finite(),
});

const PlainObjectSchema = z.custom<Record<string, unknown>>(
  value => typeof value === 'object' && value !== null && !Array.isArray(value),
  'Expected object',
);

/**
 * A record keyed by asset id. Unlike `z.record`, an own `__proto__` key is
 * kept, since any string is a valid id.
 */
function assetKeyedRecord<T extends z.ZodTypeAny>(item: T) {
  return PlainObjectSchema.transform((raw, ctx) => {
    const entries: [string, z.output<T>][] = [];
    for (const [key, value] of Object.entries(raw)) {
      const parsed = item.safeParse(value);
      if (parsed.success) {
        entries.push([key, parsed.data]);
      } else {
        for (const issue of parsed.error.issues) ctx.addIssue({ ...issue, path: [key, ...issue.path] });
      }
    }
    return Object.fromEntries(entries);
  });
}

export const GraphSnapshotSchema = z.object({
  assets: z.array(AssetRecordSchema).default([]),
  regulatory_events: z.array(EventRecordSchema).default([]),
  relationships: assetKeyedRecord(z.array(OutgoingEdgeRecordSchema)).default({}),
  incoming_relationships: assetKeyedRecord(z.array(IncomingEdgeRecordSchema)).optional(),
});

export type AssetRecord = z.infer<typeof AssetRecordSchema>;
export type EventRecord = z.infer<typeof EventRecordSchema>;
export type GraphSnapshot = z.infer<typeof GraphSnapshotSchema>;

function headFields(asset: Asset) {
  return { id: asset.id, symbol: asset.symbol, name: asset.name };
}

function tailFields(asset: Asset) {
  return {
    sector: asset.sector,
    price: asset.price,
    market_cap: asset.marketCap ?? null,
    currency: asset.currency ?? null,
  };
}

/** Field order: identity, asset_class, common fields, class fields, `__type__`. */
export function serializeAsset(asset: Asset): AssetRecord {
  switch (asset.assetClass) {
    case 'equity':
      return {
        ...headFields(asset),
        asset_class: 'equity',
        ...tailFields(asset),
        pe_ratio: asset.peRatio ?? null,
        dividend_yield: asset.dividendYield ?? null,
        earnings_per_share: asset.earningsPerShare ?? null,
        book_value: asset.bookValue ?? null,
        __type__: 'Equity',
      };
    case 'fixed_income':
      return {
        ...headFields(asset),
        asset_class: 'fixed_income',
        ...tailFields(asset),
        yield_to_maturity: asset.yieldToMaturity ?? null,
        coupon_rate: asset.couponRate ?? null,
        maturity_date: asset.maturityDate ?? null,
        credit_rating: asset.creditRating ?? null,
        issuer_id: asset.issuerId ?? null,
        __type__: 'Bond',
      };
    case 'commodity':
      return {
        ...headFields(asset),
        asset_class: 'commodity',
        ...tailFields(asset),
        contract_size: asset.contractSize ?? null,
        delivery_date: asset.deliveryDate ?? null,
        volatility: asset.volatility ?? null,
        __type__: 'Commodity',
      };
    case 'currency':
      return {
        ...headFields(asset),
        asset_class: 'currency',
        ...tailFields(asset),
        exchange_rate: asset.exchangeRate ?? null,
        country: asset.country ?? null,
        central_bank_rate: asset.centralBankRate ?? null,
        __type__: 'Currency',
      };
  }
}

export function serializeEvent(event: RegulatoryEvent): EventRecord {
  return {
    id: event.id,
    asset_id: event.assetId,
    event_type: event.eventType,
    date: event.date,
    description: event.description,
    impact_score: event.impactScore,
    related_assets: [...event.relatedAssets],
  };
}

type OutgoingEdgeRecord = z.infer<typeof OutgoingEdgeRecordSchema>;
type IncomingEdgeRecord = z.infer<typeof IncomingEdgeRecordSchema>;

export function serializeGraph(graph: AssetGraph): GraphSnapshot {
  // Maps, not object literals: ids such as `constructor` or `__proto__` would hit the prototype
  const relationships = new Map<string, OutgoingEdgeRecord[]>();
  const incoming = new Map<string, IncomingEdgeRecord[]>();

  for (const [source, edges] of graph.relationships) {
    relationships.set(
      source,
      edges.map(e => ({
        target: e.targetId,
        relationship_type: e.relationshipType,
        strength: e.strength,
      })),
    );
    for (const e of edges) {
      const list = incoming.get(e.targetId) ?? [];
      list.push({
        source,
        relationship_type: e.relationshipType,
        strength: e.strength,
      });
      incoming.set(e.targetId, list);
    }
  }

  return {
    assets: [...graph.assets.values()].map(serializeAsset),
    regulatory_events: graph.regulatoryEvents.map(serializeEvent),
    relationships: Object.fromEntries(relationships),
    incoming_relationships: Object.fromEntries(incoming),
  };
}

/**
 * Structural check of an untrusted payload.
 * @throws StructuralValidationError naming the first offending path
 */
export function parseSnapshot(payload: unknown): GraphSnapshot {
  const parsed = GraphSnapshotSchema.safeParse(payload);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const path = first && first.path.length > 0 ? first.path.join('.') : undefined;
    const detail = parsed.error.issues
      .slice(0, 5)
      .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new StructuralValidationError(`Invalid graph snapshot: ${detail}`, path);
  }
  return parsed.data;
}

function toAssetInput(record: AssetRecord): AssetInput {
  const base = {
    id: record.id,
    symbol: record.symbol,
    name: record.name,
    sector: record.sector ?? undefined,
    price: record.price,
    marketCap: record.market_cap ?? undefined,
    currency: record.currency ?? undefined,
  };
  switch (record.asset_class) {
    case 'equity':
      return {
        ...base,
        assetClass: 'equity',
        peRatio: record.pe_ratio ?? undefined,
        dividendYield: record.dividend_yield ?? undefined,
        earningsPerShare: record.earnings_per_share ?? undefined,
        bookValue: record.book_value ?? undefined,
      };
    case 'fixed_income':
      return {
        ...base,
        assetClass: 'fixed_income',
        yieldToMaturity: record.yield_to_maturity ?? undefined,
        couponRate: record.coupon_rate ?? undefined,
        maturityDate: record.maturity_date ?? undefined,
        creditRating: record.credit_rating ?? undefined,
        issuerId: record.issuer_id ?? undefined,
      };
    case 'commodity':
      return {
        ...base,
        assetClass: 'commodity',
        contractSize: record.contract_size ?? undefined,
        deliveryDate: record.delivery_date ?? undefined,
        volatility: record.volatility ?? undefined,
      };
    case 'currency':
      return {
        ...base,
        assetClass: 'currency',
        exchangeRate: record.exchange_rate ?? undefined,
        country: record.country ?? undefined,
        centralBankRate: record.central_bank_rate ?? undefined,
      };
  }
}

/**
 * Replace the contents of `graph` with the payload. Everything is validated
 * and constructed before the graph is touched, so a bad payload leaves it as it was.
 * @throws StructuralValidationError | ConstructionError
 */
export function hydrateGraph(graph: AssetGraph, payload: unknown): void {
  const snapshot = parseSnapshot(payload);
  const assets = snapshot.assets.map(record => createAsset(toAssetInput(record)));
  const events = snapshot.regulatory_events.map(record =>
    createRegulatoryEvent({
      id: record.id,
      assetId: record.asset_id,
      eventType: record.event_type,
      date: record.date,
      description: record.description,
      impactScore: record.impact_score,
      relatedAssets: record.related_assets,
    }),
  );

  graph.clear();
  for (const asset of assets) graph.addAsset(asset);
  for (const event of events) graph.addRegulatoryEvent(event);
  for (const [source, edges] of Object.entries(snapshot.relationships)) {
    for (const edge of edges) {
      graph.addRelationship(source, edge.target, edge.relationship_type, edge.strength);
    }
  }
}

export function deserializeGraph(payload: unknown, options?: AssetGraphOptions): AssetGraph {
  const graph = new AssetGraph(options);
  hydrateGraph(graph, payload);
  return graph;
}
