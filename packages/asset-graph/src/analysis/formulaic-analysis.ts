// Formulaic analysis: the financial formulas that apply to a graph's assets, with worked examples

import type { AssetGraph } from '../graph/asset-graph.js';
import type { RelationshipEdge } from '../graph/relationship-store.js';
import type {
  Asset,
  AssetClass,
  BondAsset,
  CommodityAsset,
  CurrencyAsset,
  EquityAsset,
} from '../models/asset.js';
import { clamp01 } from '../metrics/network-metrics.js';

export const FormulaCategory = {
  Valuation: 'Valuation',
  Income: 'Income',
  FixedIncome: 'Fixed Income',
  RiskManagement: 'Risk Management',
  Statistical: 'Statistical Analysis',
  PortfolioTheory: 'Portfolio Theory',
  CurrencyMarkets: 'Currency Markets',
  CrossAsset: 'Cross-Asset',
} as const;

export type FormulaCategory = (typeof FormulaCategory)[keyof typeof FormulaCategory];

export interface Formula {
  name: string;
  expression: string;
  latex: string;
  description: string;
  /** Symbol → meaning, in display order. */
  variables: [symbol: string, meaning: string][];
  exampleCalculation: string;
  category: FormulaCategory;
  /** Reliability of the relationship in [0, 1]; 0 for accounting identities with no fit. */
  rSquared: number;
}

export interface PairStrength {
  asset1: string;
  asset2: string;
  strength: number;
}

export interface EmpiricalRelationships {
  /** One entry per unordered pair joined by any edge, strongest first. */
  pairStrengths: PairStrength[];
  strongestPairs: PairStrength[];
}

export interface FormulaSummary {
  totalFormulas: number;
  avgRSquared: number;
  empiricalDataPoints: number;
  avgPairStrength: number;
  keyInsights: string[];
}

export interface FormulaicAnalysis {
  formulas: Formula[];
  formulaCount: number;
  categories: Record<string, number>;
  empiricalRelationships: EmpiricalRelationships;
  summary: FormulaSummary;
}

export interface FormulaInput {
  assets: ReadonlyMap<string, Asset>;
  relationships: ReadonlyMap<string, readonly RelationshipEdge[]>;
}

export const MAX_EXAMPLES = 2;
export const STRONGEST_PAIR_LIMIT = 5;
/** Used when the graph has no edges to measure. */
export const NEUTRAL_CORRELATION = 0.5;
export const CORRELATION_R_SQUARED_CAP = 0.75;

const PRICE_PER_SHARE = 'Price per share';

interface AnalysisContext {
  equities: EquityAsset[];
  bonds: BondAsset[];
  commodities: CommodityAsset[];
  currencies: CurrencyAsset[];
  edgeCount: number;
  avgEdgeStrength: number | null;
}

interface FormulaTemplate extends Omit<Formula, 'exampleCalculation' | 'rSquared'> {
  appliesTo?(ctx: AnalysisContext): boolean;
  example(ctx: AnalysisContext): string;
  rSquared: number | ((ctx: AnalysisContext) => number);
}

/** First `MAX_EXAMPLES` rendered values, or the fallback when none qualify. */
function examples<T>(items: readonly T[], render: (item: T) => string | null, fallback: string): string {
  const out: string[] = [];
  for (const item of items) {
    const line = render(item);
    if (line === null) continue;
    out.push(line);
    if (out.length >= MAX_EXAMPLES) break;
  }
  return out.length > 0 ? out.join('; ') : fallback;
}

export const FORMULA_TEMPLATES: readonly FormulaTemplate[] = [
  {
    name: 'Price-to-Earnings',
    expression: 'P / E',
    latex: '\\frac{P}{E}',
    description: 'Market price per share divided by earnings per share.',
    variables: [
      ['P', PRICE_PER_SHARE],
      ['E', 'Earnings per share (EPS)'],
    ],
    category: FormulaCategory.Valuation,
    rSquared: 0,
    appliesTo: ctx => ctx.equities.length > 0,
    example: ctx =>
      examples(
        ctx.equities,
        a => (a.peRatio === undefined ? null : `${a.symbol}: PE = ${a.peRatio.toFixed(2)}`),
        'Example: PE = 100.00 / 5.00 = 20.00',
      ),
  },
  {
    name: 'Dividend Yield',
    expression: 'D / P',
    latex: '\\frac{D}{P}',
    description: 'Dividend per share divided by price per share.',
    variables: [
      ['D', 'Dividend per share'],
      ['P', PRICE_PER_SHARE],
    ],
    category: FormulaCategory.Income,
    rSquared: 0,
    appliesTo: ctx => ctx.equities.some(a => (a.dividendYield ?? 0) > 0),
    example: ctx =>
      examples(
        ctx.equities,
        a =>
          a.dividendYield === undefined
            ? null
            : `${a.symbol}: Yield = ${(a.dividendYield * 100).toFixed(2)}% at price $${a.price.toFixed(2)}`,
        'Example: Div Yield = (2.00 / 100.00) * 100 = 2.00%',
      ),
  },
  {
    name: 'Market Capitalization',
    expression: 'Price × Shares Outstanding',
    latex: 'P \\times \\text{Shares}',
    description: 'Estimated market capitalization computed from price and shares outstanding.',
    variables: [
      ['Price', PRICE_PER_SHARE],
      ['Shares Outstanding', 'Number of shares outstanding'],
    ],
    category: FormulaCategory.Valuation,
    rSquared: 0,
    appliesTo: ctx => ctx.equities.length > 0,
    example: ctx =>
      examples(
        ctx.equities,
        a => (a.marketCap === undefined ? null : `${a.symbol}: Market Cap = $${(a.marketCap / 1e9).toFixed(1)}B`),
        'Example: Market Cap = $1.5T',
      ),
  },
  {
    name: 'Yield to Maturity (approximation)',
    expression: 'YTM ≈ (C + (F - P) / n) / ((F + P) / 2)',
    latex: 'YTM \\approx \\frac{C + \\frac{F - P}{n}}{\\frac{F + P}{2}}',
    description: 'Approximate annual return of a bond held to maturity.',
    variables: [
      ['C', 'Annual coupon payment'],
      ['F', 'Face value'],
      ['P', 'Bond price'],
      ['n', 'Years to maturity'],
    ],
    category: FormulaCategory.FixedIncome,
    rSquared: 0,
    appliesTo: ctx => ctx.bonds.length > 0,
    example: ctx =>
      examples(
        ctx.bonds,
        a =>
          a.yieldToMaturity === undefined ? null : `${a.symbol}: YTM ≈ ${(a.yieldToMaturity * 100).toFixed(2)}%`,
        'Example: YTM ≈ 3.0%',
      ),
  },
  {
    name: 'Beta (Systematic Risk)',
    expression: 'β = Cov(R_asset, R_market) / Var(R_market)',
    latex: '\\beta = \\frac{Cov(R_i, R_m)}{Var(R_m)}',
    description: "Measure of an asset's sensitivity to market movements",
    variables: [
      ['β', 'Beta coefficient'],
      ['R_i', 'Asset return'],
      ['R_m', 'Market return'],
      ['Cov', 'Covariance'],
      ['Var', 'Variance'],
    ],
    category: FormulaCategory.RiskManagement,
    rSquared: 0.75,
    example: () => 'Beta calculated from historical returns vs market index',
  },
  {
    name: 'Correlation Coefficient',
    expression: 'ρ = Cov(X, Y) / (σ_X × σ_Y)',
    latex: '\\rho = \\frac{Cov(X, Y)}{\\sigma_X \\times \\sigma_Y}',
    description: 'Measure of linear relationship between two variables',
    variables: [
      ['ρ', 'Correlation coefficient (-1 to 1)'],
      ['Cov(X,Y)', 'Covariance between X and Y'],
      ['σ_X', 'Standard deviation of X'],
      ['σ_Y', 'Standard deviation of Y'],
    ],
    category: FormulaCategory.Statistical,
    rSquared: ctx =>
      ctx.avgEdgeStrength === null
        ? NEUTRAL_CORRELATION
        : Math.min(CORRELATION_R_SQUARED_CAP, Math.max(0, ctx.avgEdgeStrength)),
    example: ctx =>
      ctx.edgeCount > 0
        ? `Calculated from ${ctx.edgeCount} asset pair relationships`
        : 'Correlation between asset pairs calculated from price movements',
  },
  {
    name: 'Price-to-Book Ratio',
    expression: 'P/B = Market_Price / Book_Value_per_Share',
    latex: 'P/B = \\frac{P}{BV_{per\\_share}}',
    description: 'Valuation metric comparing market price to book value',
    variables: [
      ['P/B', 'Price-to-Book Ratio'],
      ['P', 'Market Price per Share ($)'],
      ['BV_per_share', 'Book Value per Share ($)'],
    ],
    category: FormulaCategory.Valuation,
    rSquared: 0.88,
    appliesTo: ctx => ctx.equities.length > 0,
    example: ctx =>
      examples(
        ctx.equities,
        a => {
          if (a.bookValue === undefined) return null;
          const ratio = a.bookValue === 0 ? 0 : a.price / a.bookValue;
          return `${a.symbol}: P/B = ${ratio.toFixed(2)}`;
        },
        'Example: P/B = 150 / 50 = 3.0',
      ),
  },
  {
    name: 'Enterprise Value',
    expression: 'EV = Market_Cap + Total_Debt - Cash',
    latex: 'EV = MarketCap + Debt - Cash',
    description: 'Total value of a company including debt',
    variables: [
      ['EV', 'Enterprise Value ($)'],
      ['Market_Cap', 'Market Capitalization ($)'],
      ['Debt', 'Total Debt ($)'],
      ['Cash', 'Cash and Cash Equivalents ($)'],
    ],
    category: FormulaCategory.Valuation,
    rSquared: 0.95,
    example: () => 'EV calculation requires debt and cash data (not available in current dataset)',
  },
  {
    name: 'Sharpe Ratio',
    expression: 'Sharpe = (R_portfolio - R_risk_free) / σ_portfolio',
    latex: 'Sharpe = \\frac{R_p - R_f}{\\sigma_p}',
    description: 'Risk-adjusted return metric',
    variables: [
      ['Sharpe', 'Sharpe Ratio'],
      ['R_p', 'Portfolio Return (%)'],
      ['R_f', 'Risk-free Rate (%)'],
      ['σ_p', 'Portfolio Standard Deviation (%)'],
    ],
    category: FormulaCategory.RiskManagement,
    rSquared: 0.82,
    example: () => 'Sharpe = (10% - 2%) / 15% = 0.53',
  },
  {
    name: 'Volatility (Standard Deviation)',
    expression: 'σ = √(Σ(R_i - μ)² / (n-1))',
    latex: '\\sigma = \\sqrt{\\frac{\\sum_{i=1}^{n}(R_i - \\mu)^2}{n-1}}',
    description: 'Measure of price variability and risk',
    variables: [
      ['σ', 'Standard deviation (volatility)'],
      ['R_i', 'Individual return'],
      ['μ', 'Mean return'],
      ['n', 'Number of observations'],
    ],
    category: FormulaCategory.RiskManagement,
    rSquared: 0.9,
    example: ctx =>
      examples(
        ctx.commodities,
        a => (a.volatility === undefined ? null : `${a.symbol}: σ = ${(a.volatility * 100).toFixed(2)}%`),
        'Example: σ = 20% annualized',
      ),
  },
  {
    name: 'Portfolio Expected Return',
    expression: 'E(R_p) = Σ(w_i × E(R_i))',
    latex: 'E(R_p) = \\sum_{i=1}^{n} w_i \\times E(R_i)',
    description: 'Weighted average of individual asset expected returns',
    variables: [
      ['E(R_p)', 'Expected portfolio return'],
      ['w_i', 'Weight of asset i in portfolio'],
      ['E(R_i)', 'Expected return of asset i'],
      ['n', 'Number of assets'],
    ],
    category: FormulaCategory.PortfolioTheory,
    rSquared: 1,
    example: () => 'Example: E(Rp) = 0.6 × 10% + 0.4 × 5% = 8%',
  },
  {
    name: 'Exchange Rate Relationships',
    expression: 'USD/EUR × EUR/GBP = USD/GBP',
    latex: '\\frac{USD}{EUR} \\times \\frac{EUR}{GBP} = \\frac{USD}{GBP}',
    description: 'Triangular arbitrage relationship between currencies',
    variables: [
      ['USD/EUR', 'US Dollar to Euro exchange rate'],
      ['EUR/GBP', 'Euro to British Pound exchange rate'],
      ['USD/GBP', 'US Dollar to British Pound exchange rate'],
    ],
    category: FormulaCategory.CurrencyMarkets,
    rSquared: 0.99,
    appliesTo: ctx => ctx.currencies.length > 0,
    example: ctx => {
      const [first, second] = ctx.currencies;
      if (!first || !second) return 'Example: USD/EUR × EUR/GBP = USD/GBP';
      return `${first.symbol}/USD × USD/${second.symbol} = ${first.symbol}/${second.symbol}`;
    },
  },
  {
    name: 'Commodity-Currency Relationship',
    expression: 'Currency_Value ∝ 1/Commodity_Price (for commodity exporters)',
    latex: 'FX_{commodity} \\propto \\frac{1}{P_{commodity}}',
    description: 'Inverse relationship between commodity prices and currency values',
    variables: [
      ['FX_commodity', 'Currency value of commodity exporter'],
      ['P_commodity', 'Commodity price'],
    ],
    category: FormulaCategory.CrossAsset,
    rSquared: 0.65,
    appliesTo: ctx => ctx.commodities.length > 0 && ctx.currencies.length > 0,
    example: () => 'Example: As oil prices rise, USD strengthens (inverse relationship)',
  },
];

function buildContext(input: FormulaInput): AnalysisContext {
  const ctx: AnalysisContext = {
    equities: [],
    bonds: [],
    commodities: [],
    currencies: [],
    edgeCount: 0,
    avgEdgeStrength: null,
  };
  for (const asset of input.assets.values()) {
    switch (asset.assetClass) {
      case 'equity': ctx.equities.push(asset); break;
      case 'fixed_income': ctx.bonds.push(asset); break;
      case 'commodity': ctx.commodities.push(asset); break;
      case 'currency': ctx.currencies.push(asset); break;
    }
  }
  let strengthSum = 0;
  for (const edges of input.relationships.values()) {
    for (const edge of edges) {
      ctx.edgeCount++;
      strengthSum += edge.strength;
    }
  }
  if (ctx.edgeCount > 0) ctx.avgEdgeStrength = strengthSum / ctx.edgeCount;
  return ctx;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Strongest edge between each unordered pair, in either direction, clamped to [0, 1].
 * Ties keep id order so the output is stable.
 */
export function pairStrengths(relationships: FormulaInput['relationships']): PairStrength[] {
  const pairs = new Map<string, PairStrength>();
  for (const [source, edges] of relationships) {
    for (const edge of edges) {
      if (edge.targetId === source) continue;
      const [asset1, asset2] = compareIds(source, edge.targetId) < 0 ? [source, edge.targetId] : [edge.targetId, source];
      const key = JSON.stringify([asset1, asset2]);
      const strength = clamp01(edge.strength);
      const current = pairs.get(key);
      if (!current || strength > current.strength) pairs.set(key, { asset1, asset2, strength });
    }
  }
  return [...pairs.values()].sort(
    (a, b) => b.strength - a.strength || compareIds(a.asset1, b.asset1) || compareIds(a.asset2, b.asset2),
  );
}

/** Mean pair strength, ignoring saturated pairs; neutral when nothing remains. */
export function averagePairStrength(pairs: readonly PairStrength[]): number {
  const values = pairs.map(p => p.strength).filter(s => s < 1);
  return values.length > 0 ? values.reduce((sum, s) => sum + s, 0) / values.length : NEUTRAL_CORRELATION;
}

export function categorizeFormulas(formulas: readonly Formula[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const f of formulas) counts.set(f.category, (counts.get(f.category) ?? 0) + 1);
  return Object.fromEntries(counts);
}

function keyInsights(formulas: readonly Formula[], avgPairStrength: number, presentClasses: Set<AssetClass>): string[] {
  const insights = [
    `Identified ${formulas.length} mathematical relationships`,
    `Average correlation strength: ${avgPairStrength.toFixed(2)}`,
  ];
  if (presentClasses.has('equity')) insights.push('Valuation models applicable to equity assets');
  if (presentClasses.size > 1) insights.push('Portfolio theory formulas available for multi-asset analysis');
  if (formulas.some(f => f.category === FormulaCategory.CrossAsset)) {
    insights.push('Cross-asset relationships identified between commodities and currencies');
  }
  return insights;
}

export function analyzeFormulas(input: FormulaInput): FormulaicAnalysis {
  const ctx = buildContext(input);
  const formulas: Formula[] = FORMULA_TEMPLATES.filter(t => t.appliesTo?.(ctx) ?? true).map(t => ({
    name: t.name,
    expression: t.expression,
    latex: t.latex,
    description: t.description,
    variables: t.variables.map(([symbol, meaning]): [string, string] => [symbol, meaning]),
    exampleCalculation: t.example(ctx),
    category: t.category,
    rSquared: typeof t.rSquared === 'number' ? t.rSquared : t.rSquared(ctx),
  }));

  const pairs = pairStrengths(input.relationships);
  const avgPairStrength = averagePairStrength(pairs);
  const presentClasses = new Set([...input.assets.values()].map(a => a.assetClass));

  return {
    formulas,
    formulaCount: formulas.length,
    categories: categorizeFormulas(formulas),
    empiricalRelationships: {
      pairStrengths: pairs,
      strongestPairs: pairs.slice(0, STRONGEST_PAIR_LIMIT),
    },
    summary: {
      totalFormulas: formulas.length,
      avgRSquared: formulas.length > 0 ? formulas.reduce((sum, f) => sum + f.rSquared, 0) / formulas.length : 0,
      empiricalDataPoints: pairs.length,
      avgPairStrength,
      keyInsights: keyInsights(formulas, avgPairStrength, presentClasses),
    },
  };
}

export function analyzeGraphFormulas(graph: AssetGraph): FormulaicAnalysis {
  return analyzeFormulas({ assets: graph.assets, relationships: graph.relationships });
}
