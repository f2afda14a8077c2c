// Diversification scoring and rebalancing trades

import { formatCurrency, roundTo, titleCase } from './format.js';
import { lookup } from './lookup.js';
import type { Holding, TargetAllocation } from './schemas.js';

export type AllocationDimension = 'asset_class' | 'sector' | 'geography';

/** Percent of portfolio value per category, in insertion order. */
export type Allocation = Record<string, number>;

export interface DiversificationAnalysis {
  overallScore: number;
  assetClassScore: number;
  sectorScore: number;
  geographyScore: number;
  concentrationRisk: string;
  recommendations: string[];
  breakdown: Partial<Record<AllocationDimension, Allocation>>;
}

function emptyAnalysis(concentrationRisk: string, recommendation: string): DiversificationAnalysis {
  return {
    overallScore: 0,
    assetClassScore: 0,
    sectorScore: 0,
    geographyScore: 0,
    concentrationRisk,
    recommendations: [recommendation],
    breakdown: {},
  };
}

function categoryOf(holding: Holding, dimension: AllocationDimension): string {
  switch (dimension) {
    case 'asset_class':
      return holding.assetClass ?? 'unknown';
    case 'sector':
      return holding.sector ?? 'unknown';
    case 'geography':
      return holding.geography ?? 'unknown';
  }
}

export function allocationBy(holdings: Holding[], dimension: AllocationDimension, totalValue: number): Allocation {
  const allocation = new Map<string, number>();
  for (const holding of holdings) {
    const category = categoryOf(holding, dimension);
    allocation.set(category, (allocation.get(category) ?? 0) + (holding.value / totalValue) * 100);
  }
  // fromEntries defines own properties, so "__proto__" stays a category
  return Object.fromEntries(allocation);
}

// Spreading a large array into Math.max overflows the call stack
function maxOf(values: number[]): number {
  return values.reduce((max, value) => Math.max(max, value), -Infinity);
}

/**
 * 0-100, higher is more diversified. Rewards evenness and category count,
 * penalizes any single category above 40%.
 */
export function diversityScore(allocation: Allocation): number {
  const weights = Object.values(allocation);
  if (weights.length <= 1) return 0;

  const count = weights.length;
  const maxWeight = maxOf(weights);
  const concentrationPenalty = Math.max(0, (maxWeight - 40) * 1.5);
  const categoryBonus = Math.min(count * 10, 30);

  const ideal = 100 / count;
  const deviation = weights.reduce((sum, w) => sum + Math.abs(w - ideal), 0) / count;
  const evenness = Math.max(0, 50 - deviation);

  return Math.min(100, Math.max(0, evenness + categoryBonus - concentrationPenalty));
}

function concentrationLevel(maxHoldingWeight: number, maxSectorWeight: number): string {
  if (maxHoldingWeight > 50 || maxSectorWeight > 60) {
    return 'HIGH - Significant concentration in single positions';
  }
  if (maxHoldingWeight > 25 || maxSectorWeight > 40) {
    return 'MODERATE - Some concentration present';
  }
  return 'LOW - Well diversified';
}

export function analyzeDiversification(holdings: Holding[]): DiversificationAnalysis {
  if (holdings.length === 0) {
    return emptyAnalysis('No holdings', 'Add investments to begin diversification');
  }

  const totalValue = holdings.reduce((sum, h) => sum + h.value, 0);
  if (totalValue === 0) {
    return emptyAnalysis('No value', 'Portfolio has no value');
  }

  const assetClasses = allocationBy(holdings, 'asset_class', totalValue);
  const sectors = allocationBy(holdings, 'sector', totalValue);
  const geographies = allocationBy(holdings, 'geography', totalValue);

  const assetClassScore = diversityScore(assetClasses);
  const sectorScore = diversityScore(sectors);
  const geographyScore = diversityScore(geographies);
  const overallScore = assetClassScore * 0.4 + sectorScore * 0.35 + geographyScore * 0.25;

  const maxHoldingWeight = maxOf(holdings.map(h => (h.value / totalValue) * 100));
  const maxSectorWeight = maxOf(Object.values(sectors));

  const recommendations: string[] = [];
  if (Object.keys(assetClasses).length < 3) {
    recommendations.push('Consider adding more asset classes (bonds, real estate, commodities)');
  }
  if ((lookup(assetClasses, 'equity') ?? 0) > 80) {
    recommendations.push('High equity allocation - consider adding bonds for stability');
  }
  if ((lookup(assetClasses, 'cash') ?? 0) > 30) {
    recommendations.push('High cash position - consider deploying to growth assets');
  }
  if ((lookup(geographies, 'unknown') ?? 0) > 50 || Object.keys(geographies).length < 2) {
    recommendations.push('Add international exposure for geographic diversification');
  }
  if (maxHoldingWeight > 20) {
    recommendations.push('Consider reducing largest positions to below 20% each');
  }
  if ((lookup(sectors, 'technology') ?? 0) > 40) {
    recommendations.push('Heavy tech concentration - diversify into other sectors');
  }
  if (recommendations.length === 0) {
    recommendations.push('Portfolio is well diversified - maintain current allocation');
  }

  return {
    overallScore,
    assetClassScore,
    sectorScore,
    geographyScore,
    concentrationRisk: concentrationLevel(maxHoldingWeight, maxSectorWeight),
    recommendations,
    breakdown: { asset_class: assetClasses, sector: sectors, geography: geographies },
  };
}

function scoreBadge(score: number): string {
  if (score >= 70) return '🟢';
  if (score >= 40) return '🟡';
  return '🔴';
}

export function summarizeDiversification(analysis: DiversificationAnalysis): string {
  const lines = [
    `${scoreBadge(analysis.overallScore)} **Diversification Analysis**`,
    '',
    `📊 **Overall Score**: ${analysis.overallScore.toFixed(0)}/100`,
    '',
    '**Category Scores**:',
    `- Asset Class Diversification: ${analysis.assetClassScore.toFixed(0)}/100`,
    `- Sector Diversification: ${analysis.sectorScore.toFixed(0)}/100`,
    `- Geographic Diversification: ${analysis.geographyScore.toFixed(0)}/100`,
    '',
    `⚠️ **Concentration Risk**: ${analysis.concentrationRisk}`,
  ];

  const dimensions = Object.entries(analysis.breakdown);
  if (dimensions.length > 0) {
    lines.push('', '📈 **Portfolio Breakdown**:');
    for (const [dimension, allocation] of dimensions) {
      lines.push(`**${titleCase(dimension)}**:`);
      const top = Object.entries(allocation ?? {})
        .sort((a, b) => b[1] - a[1])
        .slice(0, 5);
      for (const [category, pct] of top) {
        lines.push(`  - ${category}: ${pct.toFixed(1)}%`);
      }
    }
  }

  lines.push('', '💡 **Recommendations**:');
  for (const recommendation of analysis.recommendations.slice(0, 5)) {
    lines.push(`• ${recommendation}`);
  }

  return lines.join('\n');
}

function roundAllocation(allocation: Allocation | undefined): Allocation {
  return Object.fromEntries(Object.entries(allocation ?? {}).map(([category, pct]) => [category, roundTo(pct, 2)]));
}

export function toDiversificationPayload(analysis: DiversificationAnalysis) {
  return {
    overall_score: roundTo(analysis.overallScore, 1),
    sector_diversification: roundTo(analysis.sectorScore, 1),
    geography_diversification: roundTo(analysis.geographyScore, 1),
    asset_class_diversification: roundTo(analysis.assetClassScore, 1),
    concentration_risk: analysis.concentrationRisk,
    recommendations: analysis.recommendations,
    breakdown: {
      asset_class: roundAllocation(analysis.breakdown.asset_class),
      sector: roundAllocation(analysis.breakdown.sector),
      geography: roundAllocation(analysis.breakdown.geography),
    },
  };
}

// Rebalancing

export const DEFAULT_TARGET_ALLOCATION: TargetAllocation = {
  equity: 0.6,
  bond: 0.25,
  cash: 0.05,
  real_estate: 0.05,
  commodity: 0.05,
};

/** Drift below this fraction of the portfolio is left alone. */
export const REBALANCE_THRESHOLD = 0.02;

export interface Trade {
  action: 'buy' | 'sell';
  symbol: string;
  name: string;
  amount: number;
  reason: string;
}

export function suggestRebalancing(
  holdings: Holding[],
  target: TargetAllocation = DEFAULT_TARGET_ALLOCATION,
): Trade[] {
  const totalValue = holdings.reduce((sum, h) => sum + h.value, 0);
  if (totalValue === 0) return [];

  const current = allocationBy(holdings, 'asset_class', totalValue);
  const trades: Trade[] = [];

  for (const [assetClass, targetFraction] of Object.entries(target)) {
    const currentFraction = (lookup(current, assetClass) ?? 0) / 100;
    const diff = targetFraction - currentFraction;
    if (Math.abs(diff) < REBALANCE_THRESHOLD) continue;

    const amount = Math.abs(diff * totalValue);
    const from = (currentFraction * 100).toFixed(1);
    const to = (targetFraction * 100).toFixed(1);

    if (diff > 0) {
      trades.push({
        action: 'buy',
        symbol: assetClass.toUpperCase(),
        name: `${titleCase(assetClass)} ETF`,
        amount,
        reason: `Increase ${assetClass} allocation from ${from}% to ${to}%`,
      });
    } else {
      trades.push({
        action: 'sell',
        symbol: assetClass.toUpperCase(),
        name: `${titleCase(assetClass)} holdings`,
        amount,
        reason: `Reduce ${assetClass} allocation from ${from}% to ${to}%`,
      });
    }
  }

  return trades;
}

export function summarizeTrades(trades: Trade[]): string {
  if (trades.length === 0) {
    return '✅ Portfolio is well-balanced. No rebalancing needed.';
  }

  const blocks = trades.map(trade => {
    const badge = trade.action === 'buy' ? '🟢' : '🔴';
    return [
      `${badge} **${trade.action.toUpperCase()}** ${formatCurrency(trade.amount)} of ${trade.name}`,
      `   Reason: ${trade.reason}`,
    ].join('\n');
  });

  return ['📊 **Rebalancing Recommendations**', '', blocks.join('\n\n')].join('\n');
}
