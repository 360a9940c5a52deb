// Market data client: Financial Modeling Prep REST API with caching and rate limiting

import { MarketDataError } from '../errors.js';

export interface MarketDataClientConfig {
  baseUrl: string;
  apiKey: string;
  /** Requests per rolling minute. */
  rateLimit: number;
  /** Default cache TTL in seconds. */
  cacheTtl: number;
  timeoutMs: number;
}

export function marketDataConfigFromEnv(env: NodeJS.ProcessEnv = process.env): MarketDataClientConfig {
  return {
    baseUrl: env.FMP_BASE_URL || 'https://financialmodelingprep.com/stable',
    apiKey: env.FMP_API_KEY ?? '',
    rateLimit: Number(env.FMP_RATE_LIMIT ?? 300),
    cacheTtl: Number(env.FMP_CACHE_TTL ?? 300),
    timeoutMs: Number(env.FMP_TIMEOUT_MS ?? 10_000),
  };
}

interface CacheEntry {
  data: unknown;
  expiresAt: number;
}

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface MarketDataRequestOptions {
  cacheTtl?: number; // seconds, 0 to skip cache
}

/** Cache TTL presets by data type */
export const CacheTTL = {
  REALTIME: 30,       // quotes
  SHORT: 300,         // earnings calendar
  MEDIUM: 3600,       // financial statements
  LONG: 86400,        // profiles
} as const;

const MAX_CACHE_ENTRIES = 1000;

export class MarketDataClient {
  private readonly cache = new Map<string, CacheEntry>();
  private requestTimestamps: number[] = [];

  constructor(private readonly config: MarketDataClientConfig) {}

  get configured(): boolean {
    return this.config.apiKey.length > 0;
  }

  private isRateLimited(): boolean {
    const now = Date.now();
    this.requestTimestamps = this.requestTimestamps.filter(t => now - t < 60_000);
    return this.requestTimestamps.length >= this.config.rateLimit;
  }

  private getCached(key: string): unknown {
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }
    return entry.data;
  }

  private setCache(key: string, data: unknown, ttlSeconds: number): void {
    this.cache.set(key, { data, expiresAt: Date.now() + ttlSeconds * 1000 });
    if (this.cache.size > MAX_CACHE_ENTRIES) {
      const now = Date.now();
      for (const [k, v] of this.cache) {
        if (now > v.expiresAt) this.cache.delete(k);
      }
    }
  }

  /**
   * GET `endpoint` and return the decoded JSON body, unvalidated.
   * @throws MarketDataError on missing key, local or remote rate limit, or non-2xx status
   */
  async fetch(endpoint: string, params: QueryParams = {}, options: MarketDataRequestOptions = {}): Promise<unknown> {
    if (!this.configured) {
      throw new MarketDataError('FMP_API_KEY environment variable is not set');
    }

    const base = this.config.baseUrl.endsWith('/') ? this.config.baseUrl : this.config.baseUrl + '/';
    const url = new URL(endpoint, base);
    url.searchParams.set('apikey', this.config.apiKey);
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined) url.searchParams.set(k, String(v));
    }

    const cacheKey = url.toString();
    const ttl = options.cacheTtl ?? this.config.cacheTtl;
    if (ttl > 0) {
      const cached = this.getCached(cacheKey);
      if (cached !== undefined) return cached;
    }

    if (this.isRateLimited()) {
      throw new MarketDataError(`FMP rate limit exceeded (${this.config.rateLimit} req/min). Try again shortly.`, 429);
    }
    this.requestTimestamps.push(Date.now());

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const res = await fetch(url.toString(), {
        headers: { 'Accept': 'application/json' },
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        if (res.status === 401) throw new MarketDataError('FMP: Invalid API key', 401);
        if (res.status === 403) throw new MarketDataError('FMP: Endpoint not available on your plan', 403);
        if (res.status === 429) throw new MarketDataError('FMP: Rate limited by server', 429);
        throw new MarketDataError(`FMP: HTTP ${res.status}: ${body.slice(0, 200)}`, res.status);
      }

      const data: unknown = await res.json();
      if (ttl > 0) this.setCache(cacheKey, data, ttl);
      return data;
    } catch (err) {
      if (err instanceof MarketDataError) throw err;
      const msg = err instanceof Error ? err.message : String(err);
      throw new MarketDataError(`FMP: request to ${endpoint} failed: ${msg}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}

let _defaultClient: MarketDataClient | null = null;

/** Shared client configured from the environment on first use. */
export function getDefaultMarketDataClient(): MarketDataClient {
  if (!_defaultClient) {
    _defaultClient = new MarketDataClient(marketDataConfigFromEnv());
  }
  return _defaultClient;
}

export function marketDataFetch(
  endpoint: string,
  params: QueryParams = {},
  options: MarketDataRequestOptions = {},
): Promise<unknown> {
  return getDefaultMarketDataClient().fetch(endpoint, params, options);
}
