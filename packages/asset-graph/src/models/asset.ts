// Asset records: validated, immutable plain objects discriminated by asset class

import { z } from 'zod';
import { ConstructionError } from '../errors.js';
import { IsoDateSchema, formatIssues } from './common.js';

export const UNKNOWN_SECTOR = 'Unknown';

export const AssetClassSchema = z.enum(['equity', 'fixed_income', 'commodity', 'currency']);
export type AssetClass = z.infer<typeof AssetClassSchema>;

export const ASSET_CLASSES: readonly AssetClass[] = AssetClassSchema.options;

const BaseAssetSchema = z.object({
  id: z.string().min(1, 'id must be a non-empty string'),
  symbol: z.string().min(1, 'symbol must be a non-empty string'),
  name: z.string().min(1, 'name must be a non-empty string'),
  sector: z.string().min(1).default(UNKNOWN_SECTOR),
  price: z.number().finite().positive('price must be greater than 0'),
  marketCap: z.number().finite().nonnegative('market cap must not be negative').optional(),
  currency: z.string().regex(/^[A-Z]{3}$/, 'currency must be a 3-letter ISO code').optional(),
});

export const EquitySchema = BaseAssetSchema.extend({
  assetClass: z.literal('equity'),
  peRatio: z.number().finite().optional(),
  dividendYield: z.number().finite().min(0).optional(),
  earningsPerShare: z.number().finite().optional(),
  bookValue: z.number().finite().optional(),
});

export const BondSchema = BaseAssetSchema.extend({
  assetClass: z.literal('fixed_income'),
  yieldToMaturity: z.number().finite().optional(),
  couponRate: z.number().finite().min(0).optional(),
  maturityDate: IsoDateSchema.optional(),
  creditRating: z.string().min(1).optional(),
  issuerId: z.string().min(1).optional(),
});

export const CommoditySchema = BaseAssetSchema.extend({
  assetClass: z.literal('commodity'),
  contractSize: z.number().finite().positive().optional(),
  deliveryDate: IsoDateSchema.optional(),
  volatility: z.number().finite().min(0).optional(),
});

export const CurrencySchema = BaseAssetSchema.extend({
  assetClass: z.literal('currency'),
  exchangeRate: z.number().finite().positive().optional(),
  country: z.string().min(1).optional(),
  centralBankRate: z.number().finite().optional(),
});

export const AssetSchema = z.discriminatedUnion('assetClass', [
  EquitySchema,
  BondSchema,
  CommoditySchema,
  CurrencySchema,
]);

export type EquityAsset = z.infer<typeof EquitySchema>;
export type BondAsset = z.infer<typeof BondSchema>;
export type CommodityAsset = z.infer<typeof CommoditySchema>;
export type CurrencyAsset = z.infer<typeof CurrencySchema>;
export type Asset = z.infer<typeof AssetSchema>;
export type AssetInput = z.input<typeof AssetSchema>;

/**
 * Validate and freeze an asset record.
 * @throws ConstructionError when any field is invalid
 */
export function createAsset(input: AssetInput): Asset {
  const parsed = AssetSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error, 'asset');
    const label = typeof input.id === 'string' && input.id ? ` '${input.id}'` : '';
    throw new ConstructionError(`Invalid asset${label}: ${issues.join('; ')}`, issues);
  }
  return Object.freeze(parsed.data);
}

export function isBond(asset: Asset): asset is BondAsset {
  return asset.assetClass === 'fixed_income';
}
