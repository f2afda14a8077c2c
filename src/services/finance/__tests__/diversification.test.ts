import { describe, it, expect } from 'vitest';
import {
  analyzeDiversification,
  diversityScore,
  suggestRebalancing,
  summarizeDiversification,
  summarizeTrades,
  toDiversificationPayload,
} from '../diversification.js';
import { HoldingsSchema, type Holding } from '../schemas.js';

const holdings = (input: unknown): Holding[] => HoldingsSchema.parse(input);

const concentrated = holdings([
  { symbol: 'AAPL', value: 80000, asset_class: 'equity', sector: 'technology', geography: 'US' },
  { symbol: 'MSFT', value: 20000, asset_class: 'equity', sector: 'technology', geography: 'US' },
]);

const spread = holdings([
  { symbol: 'VTI', value: 40000, asset_class: 'equity', sector: 'diversified' },
  { symbol: 'VXUS', value: 20000, asset_class: 'equity', sector: 'diversified' },
  { symbol: 'BND', value: 25000, asset_class: 'bond', sector: 'bonds' },
  { symbol: 'VNQ', value: 10000, asset_class: 'real_estate', sector: 'real_estate' },
  { symbol: 'GLD', value: 5000, asset_class: 'commodity', sector: 'materials' },
]);

describe('diversityScore', () => {
  it('is zero for a single category', () => {
    expect(diversityScore({ equity: 100 })).toBe(0);
  });

  it('rewards evenness and penalizes weights above 40%', () => {
    // evenness 50 + bonus 20 - penalty 15
    expect(diversityScore({ a: 50, b: 50 })).toBe(55);
  });
});

describe('analyzeDiversification', () => {
  it('flags a concentrated tech portfolio', () => {
    const analysis = analyzeDiversification(concentrated);

    expect(analysis.overallScore).toBe(0);
    expect(analysis.concentrationRisk).toBe('HIGH - Significant concentration in single positions');
    expect(analysis.recommendations).toEqual([
      'Consider adding more asset classes (bonds, real estate, commodities)',
      'High equity allocation - consider adding bonds for stability',
      'Add international exposure for geographic diversification',
      'Consider reducing largest positions to below 20% each',
      'Heavy tech concentration - diversify into other sectors',
    ]);
  });

  it('scores a spread portfolio per dimension', () => {
    const analysis = analyzeDiversification(spread);

    expect(analysis.assetClassScore).toBeCloseTo(32.5, 10);
    expect(analysis.sectorScore).toBeCloseTo(32.5, 10);
    expect(analysis.geographyScore).toBe(0);
    expect(analysis.overallScore).toBeCloseTo(24.375, 10);
    expect(analysis.concentrationRisk).toBe('MODERATE - Some concentration present');
    expect(analysis.recommendations).toEqual([
      'Add international exposure for geographic diversification',
      'Consider reducing largest positions to below 20% each',
    ]);
    expect(analysis.breakdown.geography).toEqual({ unknown: 100 });
  });

  it('handles empty and valueless portfolios', () => {
    expect(analyzeDiversification([]).recommendations).toEqual(['Add investments to begin diversification']);

    const valueless = analyzeDiversification(holdings([{ symbol: 'X', value: 0 }]));
    expect(valueless.concentrationRisk).toBe('No value');
    expect(valueless.breakdown).toEqual({});
  });

  it('renders the analysis', () => {
    const lines = summarizeDiversification(analyzeDiversification(concentrated)).split('\n');

    expect(lines[0]).toBe('🔴 **Diversification Analysis**');
    expect(lines).toContain('📊 **Overall Score**: 0/100');
    expect(lines).toContain('**Asset Class**:');
    expect(lines).toContain('  - technology: 100.0%');
    expect(lines).toContain('• Heavy tech concentration - diversify into other sectors');
  });

  it('builds a rounded payload', () => {
    const payload = toDiversificationPayload(analyzeDiversification(spread));

    expect(payload.overall_score).toBe(24.4);
    expect(payload.asset_class_diversification).toBe(32.5);
    expect(payload.breakdown.asset_class).toEqual({ equity: 60, bond: 25, real_estate: 10, commodity: 5 });
  });
});

describe('suggestRebalancing', () => {
  const equityHeavy = holdings([
    { symbol: 'VTI', value: 90000, asset_class: 'equity' },
    { symbol: 'BND', value: 10000, asset_class: 'bond' },
  ]);

  it('moves toward the default 60/25/5/5/5 mix', () => {
    const trades = suggestRebalancing(equityHeavy);

    expect(trades.map(t => [t.action, t.symbol])).toEqual([
      ['sell', 'EQUITY'],
      ['buy', 'BOND'],
      ['buy', 'CASH'],
      ['buy', 'REAL_ESTATE'],
      ['buy', 'COMMODITY'],
    ]);
    expect(trades[0].amount).toBeCloseTo(30000, 6);
    expect(trades[0].reason).toBe('Reduce equity allocation from 90.0% to 60.0%');
    expect(trades[1].amount).toBeCloseTo(15000, 6);
    expect(trades[1].reason).toBe('Increase bond allocation from 10.0% to 25.0%');
    expect(trades[3].name).toBe('Real Estate ETF');
    expect(trades[4].amount).toBeCloseTo(5000, 6);
  });

  it('accepts a custom target', () => {
    const trades = suggestRebalancing(equityHeavy, { equity: 0.5, bond: 0.5 });

    expect(trades).toHaveLength(2);
    expect(trades[0].amount).toBeCloseTo(40000, 6);
    expect(trades[1].amount).toBeCloseTo(40000, 6);
  });

  it('skips drift under two percent', () => {
    const balanced = holdings([
      { symbol: 'VTI', value: 61000, asset_class: 'equity' },
      { symbol: 'BND', value: 24000, asset_class: 'bond' },
      { symbol: 'CASH', value: 5000, asset_class: 'cash' },
      { symbol: 'VNQ', value: 5000, asset_class: 'real_estate' },
      { symbol: 'GLD', value: 5000, asset_class: 'commodity' },
    ]);
    expect(suggestRebalancing(balanced)).toEqual([]);
  });

  it('returns nothing for a valueless portfolio', () => {
    expect(suggestRebalancing([])).toEqual([]);
  });

  it('renders trades', () => {
    const text = summarizeTrades(suggestRebalancing(equityHeavy));
    const lines = text.split('\n');

    expect(lines[0]).toBe('📊 **Rebalancing Recommendations**');
    expect(lines[2]).toBe('🔴 **SELL** $30,000.00 of Equity holdings');
    expect(lines[3]).toBe('   Reason: Reduce equity allocation from 90.0% to 60.0%');
    expect(lines[5]).toBe('🟢 **BUY** $15,000.00 of Bond ETF');
  });

  it('reports a balanced portfolio', () => {
    expect(summarizeTrades([])).toBe('✅ Portfolio is well-balanced. No rebalancing needed.');
  });
});

describe('category keys', () => {
  it('keeps a "__proto__" category as its own entry', () => {
    const analysis = analyzeDiversification(
      holdings([{ symbol: 'X', value: 1000, asset_class: 'equity', sector: '__proto__', geography: 'US' }])
    );
    const sectors = analysis.breakdown.sector ?? {};

    expect(Object.entries(sectors)).toEqual([['__proto__', 100]]);
    expect(Object.entries(toDiversificationPayload(analysis).breakdown.sector)).toEqual([['__proto__', 100]]);
  });

  it('ignores inherited names when reading current weights', () => {
    const trades = suggestRebalancing(holdings([{ symbol: 'VTI', value: 1000, asset_class: 'equity' }]), {
      constructor: 0.5,
      equity: 0.5,
    });

    expect(trades).toEqual([
      {
        action: 'buy',
        symbol: 'CONSTRUCTOR',
        name: 'Constructor ETF',
        amount: 500,
        reason: 'Increase constructor allocation from 0.0% to 50.0%',
      },
      {
        action: 'sell',
        symbol: 'EQUITY',
        name: 'Equity holdings',
        amount: 500,
        reason: 'Reduce equity allocation from 100.0% to 50.0%',
      },
    ]);
  });

  it('handles portfolios too large to spread into Math.max', () => {
    const many: Holding[] = Array.from({ length: 300000 }, (_, i) => ({
      symbol: `S${i}`,
      name: `Stock ${i}`,
      value: 1,
      assetClass: 'equity',
    }));

    expect(analyzeDiversification(many).concentrationRisk).toBe(
      'HIGH - Significant concentration in single positions'
    );
  });
});
