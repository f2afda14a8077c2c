// Portfolio risk metrics and risk-tolerance scoring
// Simplified heuristics: assets are treated as uncorrelated and
// per-class defaults stand in for missing return/volatility estimates.

import { AnalysisError } from './errors.js';
import { formatCurrency, formatPercent, roundTo, titleCase } from './format.js';
import { lookup } from './lookup.js';
import type { Holding, RiskQuestionnaire } from './schemas.js';

export const TRADING_DAYS_PER_YEAR = 252;
export const DEFAULT_RISK_FREE_RATE = 0.04;

const Z_SCORE_95 = 1.645;
const Z_SCORE_99 = 2.326;
const MARKET_VOLATILITY = 0.15;
const MAX_DRAWDOWN_CAP = 0.6;

const DEFAULT_VOLATILITY: Record<string, number> = {
  equity: 0.2,
  bond: 0.05,
  cash: 0.01,
  real_estate: 0.12,
  commodity: 0.25,
  crypto: 0.8,
};

const DEFAULT_RETURNS: Record<string, number> = {
  equity: 0.1,
  bond: 0.04,
  cash: 0.02,
  real_estate: 0.08,
  commodity: 0.05,
  crypto: 0.15,
};

const FALLBACK_VOLATILITY = 0.15;
const FALLBACK_RETURN = 0.08;

export interface RiskMetrics {
  totalValue: number;
  /** Daily value at risk, 95% confidence */
  var95: number;
  var99: number;
  sharpeRatio: number;
  /** Annualized, as a fraction */
  volatility: number;
  maxDrawdown: number;
  beta: number | null;
}

export function calculatePortfolioRisk(
  holdings: Holding[],
  riskFreeRate: number = DEFAULT_RISK_FREE_RATE,
): RiskMetrics {
  if (holdings.length === 0) {
    return { totalValue: 0, var95: 0, var99: 0, sharpeRatio: 0, volatility: 0, maxDrawdown: 0, beta: null };
  }

  const totalValue = holdings.reduce((sum, h) => sum + h.value, 0);
  if (totalValue <= 0) {
    throw new AnalysisError('portfolio has no value');
  }

  let portfolioReturn = 0;
  let weightedVarianceSum = 0;

  for (const holding of holdings) {
    const assetClass = holding.assetClass ?? 'equity';
    const weight = holding.value / totalValue;
    // Zero is treated as "not provided"
    const volatility = holding.volatility || (lookup(DEFAULT_VOLATILITY, assetClass) ?? FALLBACK_VOLATILITY);
    const annualReturn = holding.annualReturn || (lookup(DEFAULT_RETURNS, assetClass) ?? FALLBACK_RETURN);

    portfolioReturn += weight * annualReturn;
    weightedVarianceSum += (weight * volatility) ** 2;
  }

  const volatility = Math.sqrt(weightedVarianceSum);
  const dailyVolatility = volatility / Math.sqrt(TRADING_DAYS_PER_YEAR);

  return {
    totalValue,
    var95: totalValue * dailyVolatility * Z_SCORE_95,
    var99: totalValue * dailyVolatility * Z_SCORE_99,
    sharpeRatio: volatility > 0 ? (portfolioReturn - riskFreeRate) / volatility : 0,
    volatility,
    maxDrawdown: Math.min(volatility * 2.5, MAX_DRAWDOWN_CAP),
    beta: volatility / MARKET_VOLATILITY,
  };
}

export function summarizeRiskMetrics(metrics: RiskMetrics): string {
  const sharpeNote = metrics.sharpeRatio > 1 ? '(Good)' : '(Needs attention)';
  const beta = metrics.beta ? metrics.beta.toFixed(2) : 'N/A';

  return [
    '📊 **Portfolio Risk Assessment**',
    '',
    `💰 **Total Portfolio Value**: ${formatCurrency(metrics.totalValue)}`,
    '',
    '📉 **Risk Metrics**:',
    `- Value at Risk (95%): ${formatCurrency(metrics.var95)} (daily potential loss)`,
    `- Value at Risk (99%): ${formatCurrency(metrics.var99)}`,
    `- Annual Volatility: ${formatPercent(metrics.volatility, 1)}`,
    `- Maximum Drawdown: ${formatPercent(metrics.maxDrawdown, 1)}`,
    '',
    '📈 **Performance Metrics**:',
    `- Sharpe Ratio: ${metrics.sharpeRatio.toFixed(2)} ${sharpeNote}`,
    `- Beta: ${beta}`,
  ].join('\n');
}

export function toRiskMetricsPayload(metrics: RiskMetrics) {
  return {
    total_value: roundTo(metrics.totalValue, 2),
    var_95: roundTo(metrics.var95, 2),
    var_99: roundTo(metrics.var99, 2),
    sharpe_ratio: roundTo(metrics.sharpeRatio, 3),
    volatility: roundTo(metrics.volatility * 100, 2),
    max_drawdown: roundTo(metrics.maxDrawdown * 100, 2),
    beta: metrics.beta ? roundTo(metrics.beta, 3) : null,
  };
}

export type RiskLevel = 'conservative' | 'moderate' | 'aggressive' | 'very_aggressive';

export interface RiskProfile {
  riskLevel: RiskLevel;
  /** 0-100 */
  score: number;
  equityAllocation: number;
  bondAllocation: number;
  timeHorizonYears: number;
  notes: string;
}

const EXPERIENCE_SCORES: Record<string, number> = { none: -15, beginner: -5, intermediate: 5, advanced: 15 };
const LOSS_REACTION_SCORES: Record<string, number> = { sell_all: -25, sell_some: -10, hold: 5, buy_more: 20 };
const GOAL_SCORES: Record<string, number> = { preservation: -20, income: -10, growth: 10, aggressive_growth: 25 };

const RISK_BANDS: Array<{ below: number; level: RiskLevel; equity: number; bonds: number }> = [
  { below: 25, level: 'conservative', equity: 0.25, bonds: 0.55 },
  { below: 50, level: 'moderate', equity: 0.5, bonds: 0.35 },
  { below: 75, level: 'aggressive', equity: 0.7, bonds: 0.2 },
  { below: Infinity, level: 'very_aggressive', equity: 0.85, bonds: 0.1 },
];

function ageAdjustment(age: number): number {
  if (age < 30) return 20;
  if (age < 40) return 10;
  if (age > 65) return -25;
  if (age > 55) return -15;
  return 0;
}

function horizonAdjustment(years: number): number {
  if (years > 20) return 15;
  if (years > 10) return 5;
  if (years < 5) return -20;
  return 0;
}

export function assessRiskTolerance(questionnaire: RiskQuestionnaire): RiskProfile {
  let score = 50;
  score += ageAdjustment(questionnaire.age);
  score += horizonAdjustment(questionnaire.timeHorizon);
  score += lookup(EXPERIENCE_SCORES, questionnaire.investmentExperience) ?? 0;
  score += lookup(LOSS_REACTION_SCORES, questionnaire.lossReaction) ?? 0;
  score += lookup(GOAL_SCORES, questionnaire.goal) ?? 0;
  score = Math.max(0, Math.min(100, score));

  const band = RISK_BANDS.find(b => score < b.below) ?? RISK_BANDS[RISK_BANDS.length - 1];
  const years = questionnaire.timeHorizon;

  return {
    riskLevel: band.level,
    score,
    equityAllocation: band.equity,
    bondAllocation: band.bonds,
    timeHorizonYears: years,
    notes: `Based on your profile, you are a ${titleCase(band.level).toLowerCase()} investor with a ${years}-year horizon.`,
  };
}

export function summarizeRiskProfile(profile: RiskProfile): string {
  const cash = 1 - profile.equityAllocation - profile.bondAllocation;

  return [
    '🎯 **Risk Profile Assessment**',
    '',
    `Risk Level: **${titleCase(profile.riskLevel)}**`,
    `Risk Score: ${profile.score}/100`,
    '',
    '📊 **Recommended Asset Allocation**:',
    `- Equities: ${formatPercent(profile.equityAllocation)}`,
    `- Bonds: ${formatPercent(profile.bondAllocation)}`,
    `- Cash/Alternatives: ${formatPercent(cash)}`,
    '',
    `📝 ${profile.notes}`,
  ].join('\n');
}
