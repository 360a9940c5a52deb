import { z } from 'zod';
import { AssetClassSchema, RegulatoryActivitySchema } from '@asset-graph/core';

const optionalNumber = z.coerce.number().optional();

export const AddEquityNodeSchema = z.object({
  asset_id: z.string().describe('Unique asset id, usually the ticker'),
  symbol: z.string().describe('Ticker symbol'),
  name: z.string().describe('Company name'),
  sector: z.string().describe('Sector; "Unknown" disables same-sector links'),
  price: z.coerce.number().describe('Last price, must be greater than 0'),
});

export const AddAssetSchema = z.object({
  asset_class: AssetClassSchema.describe('equity, fixed_income, commodity or currency'),
  id: z.string().describe('Unique asset id'),
  symbol: z.string(),
  name: z.string(),
  sector: z.string().optional().describe('Defaults to "Unknown"'),
  price: z.coerce.number().describe('Must be greater than 0'),
  market_cap: optionalNumber,
  currency: z.string().optional().describe('ISO 4217 code'),
  pe_ratio: optionalNumber,
  dividend_yield: optionalNumber,
  earnings_per_share: optionalNumber,
  book_value: optionalNumber,
  yield_to_maturity: optionalNumber,
  coupon_rate: optionalNumber,
  maturity_date: z.string().optional().describe('ISO 8601 date (YYYY-MM-DD)'),
  credit_rating: z.string().optional(),
  issuer_id: z.string().optional().describe('Id of the issuing asset; creates a corporate link'),
  contract_size: optionalNumber,
  delivery_date: z.string().optional().describe('ISO 8601 date (YYYY-MM-DD)'),
  volatility: optionalNumber,
  exchange_rate: optionalNumber,
  country: z.string().optional(),
  central_bank_rate: optionalNumber,
});

export const AddRegulatoryEventSchema = z.object({
  id: z.string().describe('Unique event id'),
  asset_id: z.string().describe('Asset the event happened to'),
  event_type: RegulatoryActivitySchema,
  date: z.string().describe('ISO 8601 date (YYYY-MM-DD)'),
  description: z.string(),
  impact_score: z.coerce.number().describe('Between -1 (negative) and 1 (positive)'),
  related_assets: z.array(z.string()).optional().describe('Asset ids the impact propagates to'),
});

export const EmptySchema = z.object({});

export const FormulaicAnalysisSchema = z.object({
  category: z.string().optional().describe('Only formulas in this category, e.g. "Valuation" or "Risk Management"'),
});

export const AssetRelationshipsSchema = z.object({
  asset_id: z.string().describe('Asset to inspect'),
  direction: z.enum(['outgoing', 'incoming', 'both']).optional().describe('Defaults to both'),
});

export const VisualizationSceneSchema = z.object({
  dimension: z.enum(['3d', '2d']).optional().describe('Defaults to 3d'),
  layout_type: z.enum(['circular', 'grid', 'spring']).optional().describe('2D layout, defaults to spring'),
  show_arrows: z.boolean().optional().describe('Directional markers in 3D, default true'),
  relationship_filters: z
    .record(z.boolean())
    .optional()
    .describe('Relationship type to visibility; types mapped to false are hidden'),
});

export const NetworkReportSchema = z.object({
  title: z.string().optional(),
  include_rules: z.boolean().optional(),
});

export type AddAssetParams = z.infer<typeof AddAssetSchema>;
