// Market data sources: turn remote quotes and profiles into graph assets and events

import { z } from 'zod';
import { ConstructionError, MarketDataError } from '../errors.js';
import { UNKNOWN_SECTOR, createAsset, type Asset } from '../models/asset.js';
import { createRegulatoryEvent, type RegulatoryEvent } from '../models/regulatory-event.js';
import { CacheTTL, type MarketDataClient } from './market-data-client.js';

export interface MarketDataSource {
  fetchAssets(): Promise<Asset[]>;
  /** Events for already-fetched assets; may be empty. */
  fetchRegulatoryEvents(assets: readonly Asset[]): Promise<RegulatoryEvent[]>;
}

export const DEFAULT_SYMBOLS = ['AAPL', 'MSFT', 'XOM', 'JPM'] as const;

const ProfileSchema = z.object({
  symbol: z.string().min(1),
  companyName: z.string().nullish(),
  price: z.number(),
  marketCap: z.number().nullish(),
  mktCap: z.number().nullish(),
  sector: z.string().nullish(),
  currency: z.string().nullish(),
  lastDividend: z.number().nullish(),
  lastDiv: z.number().nullish(),
});

const EarningsSchema = z.object({
  symbol: z.string(),
  date: z.string(),
  epsActual: z.number().nullish(),
  epsEstimated: z.number().nullish(),
});

type Profile = z.infer<typeof ProfileSchema>;
type Earnings = z.infer<typeof EarningsSchema>;

function errMsg(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function profileToEquity(profile: Profile): Asset {
  const marketCap = profile.marketCap ?? profile.mktCap ?? undefined;
  const lastDividend = profile.lastDividend ?? profile.lastDiv ?? undefined;
  const currency = profile.currency && /^[A-Z]{3}$/.test(profile.currency) ? profile.currency : undefined;
  return createAsset({
    id: profile.symbol,
    symbol: profile.symbol,
    name: profile.companyName || profile.symbol,
    assetClass: 'equity',
    sector: profile.sector || UNKNOWN_SECTOR,
    price: profile.price,
    marketCap: marketCap !== undefined && marketCap >= 0 ? marketCap : undefined,
    currency,
    dividendYield: lastDividend !== undefined && profile.price > 0 ? lastDividend / profile.price : undefined,
  });
}

/** EPS surprise relative to the estimate, clamped to [-1, 1]. */
export function earningsSurprise(actual: number, estimated: number): number {
  if (estimated === 0) return 0;
  const surprise = (actual - estimated) / Math.abs(estimated);
  return Math.max(-1, Math.min(1, surprise));
}

export function earningsToEvent(earnings: Earnings, related: readonly string[]): RegulatoryEvent | null {
  if (earnings.epsActual == null || earnings.epsEstimated == null) return null;
  return createRegulatoryEvent({
    id: `${earnings.symbol}_EARNINGS_${earnings.date}`,
    assetId: earnings.symbol,
    eventType: 'earnings_report',
    date: earnings.date,
    description: `Earnings report: EPS ${earnings.epsActual} vs ${earnings.epsEstimated} estimated`,
    impactScore: earningsSurprise(earnings.epsActual, earnings.epsEstimated),
    relatedAssets: [...related],
  });
}

/**
 * Equities for a fixed symbol list. A symbol that fails is logged and skipped;
 * the caller decides what an empty result means.
 */
export class FmpMarketDataSource implements MarketDataSource {
  constructor(
    private readonly client: MarketDataClient,
    private readonly symbols: readonly string[] = DEFAULT_SYMBOLS,
  ) {}

  async fetchAssets(): Promise<Asset[]> {
    const assets: Asset[] = [];
    for (const symbol of this.symbols) {
      try {
        const data = await this.client.fetch('profile', { symbol }, { cacheTtl: CacheTTL.LONG });
        const parsed = z.array(ProfileSchema).safeParse(data);
        if (!parsed.success || parsed.data.length === 0) {
          console.warn(`[fmp-source] no usable profile for ${symbol}`);
          continue;
        }
        assets.push(profileToEquity(parsed.data[0]));
      } catch (err) {
        if (!(err instanceof MarketDataError || err instanceof ConstructionError)) throw err;
        console.warn(`[fmp-source] failed to fetch ${symbol}: ${err.message}`);
      }
    }
    return assets;
  }

  /** Latest earnings per asset; same-sector peers become the related assets. */
  async fetchRegulatoryEvents(assets: readonly Asset[]): Promise<RegulatoryEvent[]> {
    const events: RegulatoryEvent[] = [];
    for (const asset of assets) {
      try {
        const data = await this.client.fetch('earnings', { symbol: asset.symbol, limit: 4 }, { cacheTtl: CacheTTL.SHORT });
        const parsed = z.array(EarningsSchema).safeParse(data);
        if (!parsed.success) continue;
        const latest = parsed.data.find(e => e.epsActual != null && e.epsEstimated != null);
        if (!latest) continue;
        const peers = assets
          .filter(a => a.id !== asset.id && a.sector !== UNKNOWN_SECTOR && a.sector === asset.sector)
          .map(a => a.id);
        const event = earningsToEvent({ ...latest, symbol: asset.id }, peers);
        if (event) events.push(event);
      } catch (err) {
        console.warn(`[fmp-source] failed to fetch earnings for ${asset.symbol}: ${errMsg(err)}`);
      }
    }
    return events;
  }
}
