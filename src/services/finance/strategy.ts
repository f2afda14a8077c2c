// Goal-based investment strategy design

import { formatCurrency, formatPercent, roundTo, titleCase } from './format.js';
import { hasKey, lookup } from './lookup.js';
import type { Goal, GoalType, StrategyRequest } from './schemas.js';

export type StrategyProfile = 'conservative' | 'moderate' | 'aggressive' | 'very_aggressive';

interface StrategyTemplate {
  name: string;
  allocation: Record<string, number>;
  expectedReturn: number;
}

export const STRATEGY_TEMPLATES: Record<StrategyProfile, StrategyTemplate> = {
  conservative: {
    name: 'Capital Preservation',
    allocation: { equity: 0.25, bond: 0.5, cash: 0.15, real_estate: 0.1 },
    expectedReturn: 0.05,
  },
  moderate: {
    name: 'Balanced Growth',
    allocation: { equity: 0.5, bond: 0.3, real_estate: 0.1, cash: 0.05, commodity: 0.05 },
    expectedReturn: 0.07,
  },
  aggressive: {
    name: 'Growth Focus',
    allocation: { equity: 0.7, bond: 0.15, real_estate: 0.1, commodity: 0.05 },
    expectedReturn: 0.09,
  },
  very_aggressive: {
    name: 'Maximum Growth',
    allocation: { equity: 0.85, bond: 0.05, real_estate: 0.05, crypto: 0.05 },
    expectedReturn: 0.11,
  },
};

interface FundSuggestion {
  name: string;
  ticker: string;
  type: string;
}

// First entry per class is the one recommended
const FUND_SUGGESTIONS: Record<string, FundSuggestion[]> = {
  equity: [
    { name: 'Total Stock Market ETF', ticker: 'VTI', type: 'US Equity' },
    { name: 'S&P 500 ETF', ticker: 'VOO', type: 'US Large Cap' },
    { name: 'International ETF', ticker: 'VXUS', type: 'International' },
  ],
  bond: [
    { name: 'Total Bond Market ETF', ticker: 'BND', type: 'US Bonds' },
    { name: 'Treasury Bond ETF', ticker: 'TLT', type: 'Long Treasury' },
  ],
  real_estate: [{ name: 'Real Estate ETF', ticker: 'VNQ', type: 'REIT' }],
  commodity: [{ name: 'Gold ETF', ticker: 'GLD', type: 'Gold' }],
  cash: [{ name: 'Money Market Fund', ticker: 'VMFXX', type: 'Cash' }],
  crypto: [{ name: 'Bitcoin ETF', ticker: 'IBIT', type: 'Bitcoin' }],
};

const MAX_HORIZON_YEARS = 30;
const SHORT_HORIZON_YEARS = 5;

const DEFAULT_GOAL: Goal = {
  goalType: 'wealth_building',
  targetAmount: 500000,
  yearsToGoal: 20,
  currentSavings: 0,
  monthlyContribution: 0,
};

export interface PortfolioSuggestion extends FundSuggestion {
  allocation: number;
  amount: number;
}

export interface InvestmentPlan {
  strategyName: string;
  /** Display form, e.g. "Very Aggressive" */
  riskProfile: string;
  goals: Goal[];
  recommendedAllocation: Record<string, number>;
  monthlySavingsNeeded: number;
  projectedValue: number;
  actionItems: string[];
  portfolioSuggestions: PortfolioSuggestion[];
}

export function normalizeProfile(value: string): StrategyProfile {
  const normalized = value.trim().toLowerCase().replace(/ /g, '_');
  return hasKey(STRATEGY_TEMPLATES, normalized) ? normalized : 'moderate';
}

/** Monthly payment that grows to `amount` over `months` at monthly rate `rate`. */
function requiredMonthlySavings(amount: number, rate: number, months: number): number {
  if (rate > 0) {
    return (amount * rate) / ((1 + rate) ** months - 1);
  }
  return amount / months;
}

export function designStrategy(request: StrategyRequest): InvestmentPlan {
  const profile = normalizeProfile(request.riskProfile);
  const template = STRATEGY_TEMPLATES[profile];
  const { currentPortfolioValue, monthlyContribution } = request;

  const goals = request.goals.length > 0 ? request.goals : [DEFAULT_GOAL];
  const totalTarget = goals.reduce((sum, g) => sum + g.targetAmount, 0);
  const horizonYears = goals.reduce((min, g) => Math.min(min, g.yearsToGoal), MAX_HORIZON_YEARS);

  const allocation = { ...template.allocation };
  if (horizonYears < SHORT_HORIZON_YEARS) {
    allocation.equity = Math.max(0.2, (allocation.equity ?? 0) - 0.2);
    allocation.bond = (allocation.bond ?? 0) + 0.15;
    allocation.cash = (allocation.cash ?? 0) + 0.05;
  }

  const months = horizonYears * 12;
  const monthlyRate = template.expectedReturn / 12;

  let monthlyNeeded: number;
  if (months > 0) {
    const grownCurrent = currentPortfolioValue > 0 ? currentPortfolioValue * (1 + monthlyRate) ** months : 0;
    monthlyNeeded = requiredMonthlySavings(Math.max(0, totalTarget - grownCurrent), monthlyRate, months);
  } else {
    monthlyNeeded = totalTarget / 240;
  }

  const contribution = Math.max(monthlyContribution, monthlyNeeded);
  let projected = currentPortfolioValue;
  for (let month = 0; month < months; month++) {
    projected = projected * (1 + monthlyRate) + contribution;
  }

  const portfolioSuggestions: PortfolioSuggestion[] = [];
  for (const [assetClass, fraction] of Object.entries(allocation)) {
    const top = lookup(FUND_SUGGESTIONS, assetClass)?.[0];
    if (fraction > 0 && top) {
      portfolioSuggestions.push({ ...top, allocation: fraction, amount: projected * fraction });
    }
  }

  return {
    strategyName: template.name,
    riskProfile: titleCase(profile),
    goals,
    recommendedAllocation: allocation,
    monthlySavingsNeeded: monthlyNeeded,
    projectedValue: projected,
    actionItems: buildActionItems(currentPortfolioValue, contribution, allocation, goals.map(g => g.goalType)),
    portfolioSuggestions,
  };
}

function buildActionItems(
  currentPortfolioValue: number,
  contribution: number,
  allocation: Record<string, number>,
  goalTypes: GoalType[],
): string[] {
  const items: string[] = [];

  if (currentPortfolioValue === 0) {
    items.push('Open a brokerage account (Fidelity, Vanguard, or Schwab recommended)');
  }
  items.push(`Set up automatic monthly investment of $${Math.round(contribution).toLocaleString('en-US')}`);
  if ((allocation.equity ?? 0) > 0.5) {
    items.push('Consider tax-advantaged accounts (401k, IRA) for equity holdings');
  }
  items.push('Review and rebalance portfolio quarterly');
  items.push('Increase contributions by 1-2% annually if possible');

  if (goalTypes.includes('retirement')) {
    items.push('Maximize employer 401k match if available');
  }
  if (goalTypes.includes('emergency_fund')) {
    items.push('Keep 3-6 months expenses in high-yield savings');
  }

  return items;
}

export function summarizePlan(plan: InvestmentPlan): string {
  const allocationLines = Object.entries(plan.recommendedAllocation)
    .sort((a, b) => b[1] - a[1])
    .map(([assetClass, fraction]) => `  • ${titleCase(assetClass)}: ${formatPercent(fraction)}`);

  const suggestionLines = plan.portfolioSuggestions
    .slice(0, 5)
    .map(s => `  • **${s.name}** (${s.ticker}) - ${formatPercent(s.allocation)} allocation`);

  const actionLines = plan.actionItems.slice(0, 5).map((item, i) => `  ${i + 1}. ${item}`);

  return [
    `🎯 **Investment Strategy: ${plan.strategyName}**`,
    '',
    `📋 **Profile**: ${plan.riskProfile}`,
    '',
    '📊 **Recommended Asset Allocation**:',
    ...allocationLines,
    '',
    '💰 **Financial Projections**:',
    `- Monthly Savings Needed: ${formatCurrency(plan.monthlySavingsNeeded)}`,
    `- Projected Portfolio Value: ${formatCurrency(plan.projectedValue)}`,
    '',
    '📈 **Suggested Investments**:',
    ...suggestionLines,
    '',
    '✅ **Action Items**:',
    ...actionLines,
  ].join('\n');
}

export function toPlanPayload(plan: InvestmentPlan) {
  return {
    strategy_name: plan.strategyName,
    risk_profile: plan.riskProfile,
    recommended_allocation: plan.recommendedAllocation,
    monthly_savings_needed: roundTo(plan.monthlySavingsNeeded, 2),
    projected_value: roundTo(plan.projectedValue, 2),
    action_items: plan.actionItems,
    portfolio_suggestions: plan.portfolioSuggestions,
  };
}
