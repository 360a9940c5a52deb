import { describe, it, expect } from 'vitest';
import {
  FORMULA_TEMPLATES,
  analyzeFormulas,
  analyzeGraphFormulas,
  averagePairStrength,
  pairStrengths,
} from '../src/analysis/formulaic-analysis.js';
import { GraphGuard } from '../src/concurrency/graph-guard.js';
import { AssetGraph } from '../src/graph/asset-graph.js';
import { createAsset } from '../src/models/asset.js';

function mixedGraph(): AssetGraph {
  const graph = new AssetGraph();
  graph.addAsset(
    createAsset({
      id: 'AAPL',
      symbol: 'AAPL',
      name: 'Apple',
      assetClass: 'equity',
      sector: 'Technology',
      price: 150,
      peRatio: 25,
      dividendYield: 0.005,
      marketCap: 2.5e12,
      bookValue: 4,
    }),
  );
  graph.addAsset(
    createAsset({
      id: 'MSFT',
      symbol: 'MSFT',
      name: 'Microsoft',
      assetClass: 'equity',
      sector: 'Technology',
      price: 400,
      peRatio: 35.123,
      bookValue: 0,
    }),
  );
  graph.addAsset(
    createAsset({
      id: 'AAPL30',
      symbol: 'AAPL30',
      name: 'Apple 2030 Note',
      assetClass: 'fixed_income',
      sector: 'Corporate',
      price: 97,
      yieldToMaturity: 0.0425,
      issuerId: 'AAPL',
    }),
  );
  graph.addAsset(
    createAsset({ id: 'GC', symbol: 'GC', name: 'Gold', assetClass: 'commodity', sector: 'Commodities', price: 2300, volatility: 0.15 }),
  );
  graph.addAsset(createAsset({ id: 'EUR', symbol: 'EUR', name: 'Euro', assetClass: 'currency', price: 1.08 }));
  graph.addAsset(createAsset({ id: 'JPY', symbol: 'JPY', name: 'Yen', assetClass: 'currency', price: 0.0067 }));
  graph.buildRelationships();
  return graph;
}

describe('analyzeFormulas', () => {
  it('keeps only the general formulas for an empty graph', () => {
    const analysis = analyzeGraphFormulas(new AssetGraph());

    expect(analysis.formulas.map(f => f.name)).toEqual([
      'Beta (Systematic Risk)',
      'Correlation Coefficient',
      'Enterprise Value',
      'Sharpe Ratio',
      'Volatility (Standard Deviation)',
      'Portfolio Expected Return',
    ]);
    expect(analysis.formulaCount).toBe(6);
    expect(analysis.categories).toEqual({
      'Risk Management': 3,
      'Statistical Analysis': 1,
      Valuation: 1,
      'Portfolio Theory': 1,
    });

    const correlation = analysis.formulas[1];
    expect(correlation.rSquared).toBe(0.5);
    expect(correlation.exampleCalculation).toBe('Correlation between asset pairs calculated from price movements');
    expect(analysis.formulas[4].exampleCalculation).toBe('Example: σ = 20% annualized');

    expect(analysis.empiricalRelationships).toEqual({ pairStrengths: [], strongestPairs: [] });
    expect(analysis.summary.totalFormulas).toBe(6);
    expect(analysis.summary.avgRSquared).toBeCloseTo(4.92 / 6, 10);
    expect(analysis.summary.empiricalDataPoints).toBe(0);
    expect(analysis.summary.keyInsights).toEqual([
      'Identified 6 mathematical relationships',
      'Average correlation strength: 0.50',
    ]);
  });

  it('derives every formula and its examples from a mixed graph', () => {
    const analysis = analyzeGraphFormulas(mixedGraph());
    const byName = new Map(analysis.formulas.map(f => [f.name, f]));

    expect(analysis.formulaCount).toBe(13);
    expect(analysis.formulas.map(f => f.name)).toEqual(FORMULA_TEMPLATES.map(t => t.name));

    expect(byName.get('Price-to-Earnings')?.exampleCalculation).toBe('AAPL: PE = 25.00; MSFT: PE = 35.12');
    expect(byName.get('Dividend Yield')?.exampleCalculation).toBe('AAPL: Yield = 0.50% at price $150.00');
    expect(byName.get('Market Capitalization')?.exampleCalculation).toBe('AAPL: Market Cap = $2500.0B');
    expect(byName.get('Yield to Maturity (approximation)')?.exampleCalculation).toBe('AAPL30: YTM ≈ 4.25%');
    expect(byName.get('Price-to-Book Ratio')?.exampleCalculation).toBe('AAPL: P/B = 37.50; MSFT: P/B = 0.00');
    expect(byName.get('Volatility (Standard Deviation)')?.exampleCalculation).toBe('GC: σ = 15.00%');
    expect(byName.get('Exchange Rate Relationships')?.exampleCalculation).toBe('EUR/USD × USD/JPY = EUR/JPY');

    // AAPL↔MSFT same sector twice plus AAPL30 → AAPL; the mean 0.767 is capped
    const correlation = byName.get('Correlation Coefficient');
    expect(correlation?.exampleCalculation).toBe('Calculated from 3 asset pair relationships');
    expect(correlation?.rSquared).toBe(0.75);

    expect(analysis.categories).toEqual({
      Valuation: 4,
      Income: 1,
      'Fixed Income': 1,
      'Risk Management': 3,
      'Statistical Analysis': 1,
      'Portfolio Theory': 1,
      'Currency Markets': 1,
      'Cross-Asset': 1,
    });

    expect(analysis.empiricalRelationships.pairStrengths).toEqual([
      { asset1: 'AAPL', asset2: 'AAPL30', strength: 0.9 },
      { asset1: 'AAPL', asset2: 'MSFT', strength: 0.7 },
    ]);
    expect(analysis.summary.empiricalDataPoints).toBe(2);
    expect(analysis.summary.avgPairStrength).toBeCloseTo(0.8, 10);
    expect(analysis.summary.keyInsights).toEqual([
      'Identified 13 mathematical relationships',
      'Average correlation strength: 0.80',
      'Valuation models applicable to equity assets',
      'Portfolio theory formulas available for multi-asset analysis',
      'Cross-asset relationships identified between commodities and currencies',
    ]);
  });

  it('falls back to illustrative examples when fields are missing', () => {
    const graph = new AssetGraph();
    graph.addAsset(createAsset({ id: 'X', symbol: 'X', name: 'X Corp', assetClass: 'equity', price: 10 }));
    graph.addAsset(createAsset({ id: 'USD', symbol: 'USD', name: 'Dollar', assetClass: 'currency', price: 1 }));
    const byName = new Map(analyzeGraphFormulas(graph).formulas.map(f => [f.name, f.exampleCalculation]));

    expect(byName.get('Price-to-Earnings')).toBe('Example: PE = 100.00 / 5.00 = 20.00');
    expect(byName.get('Market Capitalization')).toBe('Example: Market Cap = $1.5T');
    expect(byName.get('Price-to-Book Ratio')).toBe('Example: P/B = 150 / 50 = 3.0');
    expect(byName.get('Exchange Rate Relationships')).toBe('Example: USD/EUR × EUR/GBP = USD/GBP');
    expect(byName.has('Dividend Yield')).toBe(false);
    expect(byName.has('Commodity-Currency Relationship')).toBe(false);
  });

  it('returns formulas that do not share state with the templates', () => {
    const analysis = analyzeFormulas({ assets: new Map(), relationships: new Map() });
    analysis.formulas[0].variables[0][1] = 'changed';
    expect(FORMULA_TEMPLATES.find(t => t.name === 'Beta (Systematic Risk)')?.variables[0]).toEqual(['β', 'Beta coefficient']);
  });

  it('is available through the guard', async () => {
    const guard = new GraphGuard(mixedGraph());
    expect((await guard.analyzeFormulas()).formulaCount).toBe(13);
  });
});

describe('pairStrengths', () => {
  it('keeps the strongest edge per unordered pair, clamped, strongest first', () => {
    const relationships = new Map([
      [
        'A',
        [
          { targetId: 'B', relationshipType: 'x', strength: 0.4 },
          { targetId: 'A', relationshipType: 'self', strength: 1 },
        ],
      ],
      [
        'B',
        [
          { targetId: 'A', relationshipType: 'y', strength: 0.6 },
          { targetId: 'C', relationshipType: 'z', strength: 1.7 },
        ],
      ],
    ]);
    const pairs = pairStrengths(relationships);

    expect(pairs).toEqual([
      { asset1: 'B', asset2: 'C', strength: 1 },
      { asset1: 'A', asset2: 'B', strength: 0.6 },
    ]);
    // saturated pairs are left out of the mean
    expect(averagePairStrength(pairs)).toBe(0.6);
    expect(averagePairStrength([])).toBe(0.5);
  });
});
