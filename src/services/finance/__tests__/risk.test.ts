import { describe, it, expect } from 'vitest';
import {
  assessRiskTolerance,
  calculatePortfolioRisk,
  summarizeRiskMetrics,
  summarizeRiskProfile,
  toRiskMetricsPayload,
} from '../risk.js';
import { AnalysisError } from '../errors.js';
import { HoldingsSchema, RiskQuestionnaireSchema, type Holding } from '../schemas.js';

const holdings = (input: unknown): Holding[] => HoldingsSchema.parse(input);
const questionnaire = (input: unknown) => RiskQuestionnaireSchema.parse(input);

describe('calculatePortfolioRisk', () => {
  it('uses asset-class defaults for a single equity holding', () => {
    const metrics = calculatePortfolioRisk(holdings([{ symbol: 'VTI', value: 100000, asset_class: 'equity' }]));

    expect(metrics.totalValue).toBe(100000);
    expect(metrics.volatility).toBeCloseTo(0.2, 10);
    expect(metrics.sharpeRatio).toBeCloseTo(0.3, 10);
    expect(metrics.maxDrawdown).toBeCloseTo(0.5, 10);
    expect(metrics.beta).toBeCloseTo(4 / 3, 10);
    expect(metrics.var95).toBeCloseTo((100000 * 0.2 * 1.645) / Math.sqrt(252), 6);
    expect(metrics.var99).toBeCloseTo((100000 * 0.2 * 2.326) / Math.sqrt(252), 6);
  });

  it('combines weighted volatilities as if uncorrelated', () => {
    const metrics = calculatePortfolioRisk(
      holdings([
        { symbol: 'VTI', value: 60000, asset_class: 'equity' },
        { symbol: 'BND', value: 40000, asset_class: 'bond' },
      ])
    );

    expect(metrics.volatility).toBeCloseTo(Math.sqrt(0.12 ** 2 + 0.02 ** 2), 10);
    expect(metrics.sharpeRatio).toBeCloseTo((0.076 - 0.04) / Math.sqrt(0.0148), 10);
  });

  it('prefers per-holding estimates and treats zero as missing', () => {
    const custom = calculatePortfolioRisk(
      holdings([{ symbol: 'X', value: 1000, asset_class: 'equity', volatility: 0.3, annual_return: 0.16 }])
    );
    expect(custom.volatility).toBeCloseTo(0.3, 10);
    expect(custom.sharpeRatio).toBeCloseTo(0.4, 10);

    const zeroed = calculatePortfolioRisk(holdings([{ symbol: 'X', value: 1000, asset_class: 'bond', volatility: 0 }]));
    expect(zeroed.volatility).toBeCloseTo(0.05, 10);
  });

  it('falls back to generic estimates for unknown classes', () => {
    const metrics = calculatePortfolioRisk(holdings([{ symbol: 'ART', value: 5000, asset_class: 'collectibles' }]));
    expect(metrics.volatility).toBeCloseTo(0.15, 10);
    expect(metrics.beta).toBeCloseTo(1, 10);
  });

  it('caps maximum drawdown at 60%', () => {
    const metrics = calculatePortfolioRisk(holdings([{ symbol: 'BTC', value: 10000, asset_class: 'crypto' }]));
    expect(metrics.maxDrawdown).toBe(0.6);
  });

  it('applies a custom risk-free rate', () => {
    const metrics = calculatePortfolioRisk(holdings([{ symbol: 'VTI', value: 100, asset_class: 'equity' }]), 0.02);
    expect(metrics.sharpeRatio).toBeCloseTo(0.4, 10);
  });

  it('returns zeros for an empty portfolio', () => {
    expect(calculatePortfolioRisk([])).toEqual({
      totalValue: 0,
      var95: 0,
      var99: 0,
      sharpeRatio: 0,
      volatility: 0,
      maxDrawdown: 0,
      beta: null,
    });
  });

  it('rejects holdings with no total value', () => {
    const zero = holdings([{ symbol: 'VTI', value: 0 }]);
    expect(() => calculatePortfolioRisk(zero)).toThrow(AnalysisError);
    expect(() => calculatePortfolioRisk(zero)).toThrow('portfolio has no value');
  });
});

describe('risk metric rendering', () => {
  const metrics = calculatePortfolioRisk(holdings([{ symbol: 'VTI', value: 100000, asset_class: 'equity' }]));

  it('summarizes the metrics as text', () => {
    const lines = summarizeRiskMetrics(metrics).split('\n');

    expect(lines[0]).toBe('📊 **Portfolio Risk Assessment**');
    expect(lines).toContain('💰 **Total Portfolio Value**: $100,000.00');
    expect(lines).toContain('- Annual Volatility: 20.0%');
    expect(lines).toContain('- Maximum Drawdown: 50.0%');
    expect(lines).toContain('- Sharpe Ratio: 0.30 (Needs attention)');
    expect(lines).toContain('- Beta: 1.33');
  });

  it('shows N/A beta for an empty portfolio', () => {
    expect(summarizeRiskMetrics(calculatePortfolioRisk([]))).toContain('- Beta: N/A');
  });

  it('rounds the JSON payload', () => {
    expect(toRiskMetricsPayload(metrics)).toMatchObject({
      total_value: 100000,
      sharpe_ratio: 0.3,
      volatility: 20,
      max_drawdown: 50,
      beta: 1.333,
    });
  });
});

describe('assessRiskTolerance', () => {
  it('scores the reference investor as very aggressive', () => {
    const profile = assessRiskTolerance(questionnaire({ age: 35, time_horizon: 20, loss_reaction: 'hold', goal: 'growth' }));

    expect(profile.score).toBe(75);
    expect(profile.riskLevel).toBe('very_aggressive');
    expect(profile.equityAllocation).toBe(0.85);
    expect(profile.bondAllocation).toBe(0.1);
  });

  it('clamps at 100', () => {
    const profile = assessRiskTolerance(
      questionnaire({
        age: 25,
        time_horizon: 30,
        investment_experience: 'advanced',
        loss_reaction: 'buy_more',
        goal: 'aggressive_growth',
      })
    );
    expect(profile.score).toBe(100);
    expect(profile.riskLevel).toBe('very_aggressive');
  });

  it('clamps at 0', () => {
    const profile = assessRiskTolerance(
      questionnaire({
        age: 65,
        time_horizon: 3,
        investment_experience: 'none',
        loss_reaction: 'sell_all',
        goal: 'preservation',
      })
    );
    expect(profile.score).toBe(0);
    expect(profile.riskLevel).toBe('conservative');
    expect(profile.equityAllocation).toBe(0.25);
    expect(profile.bondAllocation).toBe(0.55);
  });

  it('penalizes investors over 65 more than those over 55', () => {
    const answers = { time_horizon: 10, investment_experience: 'intermediate', loss_reaction: 'hold', goal: 'income' };

    expect(assessRiskTolerance(questionnaire({ ...answers, age: 70 })).score).toBe(25);
    expect(assessRiskTolerance(questionnaire({ ...answers, age: 60 })).score).toBe(35);
  });

  it('uses defaults for missing answers', () => {
    const profile = assessRiskTolerance(questionnaire({}));
    expect(profile.score).toBe(60);
    expect(profile.riskLevel).toBe('aggressive');
    expect(profile.timeHorizonYears).toBe(10);
  });

  it('ignores unrecognized answers', () => {
    const profile = assessRiskTolerance(questionnaire({ age: 45, investment_experience: 'guru', loss_reaction: 'panic', goal: 'fun' }));
    expect(profile.score).toBe(50);
    expect(profile.riskLevel).toBe('aggressive');
  });

  it('renders the profile summary', () => {
    const profile = assessRiskTolerance(questionnaire({ age: 35, time_horizon: 20, loss_reaction: 'hold', goal: 'growth' }));

    expect(summarizeRiskProfile(profile)).toBe(
      [
        '🎯 **Risk Profile Assessment**',
        '',
        'Risk Level: **Very Aggressive**',
        'Risk Score: 75/100',
        '',
        '📊 **Recommended Asset Allocation**:',
        '- Equities: 85%',
        '- Bonds: 10%',
        '- Cash/Alternatives: 5%',
        '',
        '📝 Based on your profile, you are a very aggressive investor with a 20-year horizon.',
      ].join('\n')
    );
  });
});

describe('table lookups', () => {
  it('treats Object.prototype names as unknown asset classes', () => {
    const metrics = calculatePortfolioRisk(holdings([{ symbol: 'X', value: 1000, asset_class: 'toString' }]));

    expect(metrics.volatility).toBeCloseTo(0.15, 10);
    expect(metrics.sharpeRatio).toBeCloseTo((0.08 - 0.04) / 0.15, 10);
    expect(Number.isFinite(metrics.var95)).toBe(true);
  });

  it('scores Object.prototype names as unrecognized answers', () => {
    const profile = assessRiskTolerance(
      questionnaire({ investment_experience: 'constructor', loss_reaction: 'toString', goal: 'valueOf' })
    );

    expect(profile.score).toBe(50);
    expect(profile.riskLevel).toBe('aggressive');
  });
});
