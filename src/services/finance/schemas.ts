// Input schemas for portfolio data
// Accepts the snake_case JSON the model and the HTTP clients send and
// normalizes it into the camelCase shapes the analysis functions take.

import { z } from 'zod';

const optionalNumber = z.coerce.number().finite().nullish().transform(v => v ?? undefined);
const optionalString = z.string().nullish().transform(v => v ?? undefined);

export interface Holding {
  symbol: string;
  name: string;
  value: number;
  assetClass?: string;
  sector?: string;
  geography?: string;
  annualReturn?: number;
  volatility?: number;
}

export const HoldingSchema = z
  .object({
    symbol: z.string().default('UNKNOWN'),
    name: z.string().default('Unknown Asset'),
    value: z.coerce.number().finite().default(0),
    asset_class: optionalString,
    sector: optionalString,
    geography: optionalString,
    annual_return: optionalNumber,
    volatility: optionalNumber,
  })
  .transform((h): Holding => ({
    symbol: h.symbol,
    name: h.name,
    value: h.value,
    assetClass: h.asset_class,
    sector: h.sector,
    geography: h.geography,
    annualReturn: h.annual_return,
    volatility: h.volatility,
  }));

/** A list of holdings, or a single holding object. */
export const HoldingsSchema = z.union([
  z.array(HoldingSchema),
  HoldingSchema.transform(h => [h]),
]);

export const TargetAllocationSchema = z.record(z.string(), z.coerce.number().min(0).max(1));

export type TargetAllocation = z.output<typeof TargetAllocationSchema>;

export const RebalancingInputSchema = z.union([
  z.object({
    holdings: z.array(HoldingSchema),
    target_allocation: TargetAllocationSchema.optional(),
  }),
  HoldingsSchema.transform(holdings => ({ holdings, target_allocation: undefined })),
]);

export const RiskQuestionnaireSchema = z
  .object({
    age: z.coerce.number().finite().default(40),
    income: optionalNumber,
    investment_experience: z.string().default('beginner'),
    time_horizon: z.coerce.number().finite().default(10),
    loss_reaction: z.string().default('hold'),
    goal: z.string().default('growth'),
  })
  .transform(q => ({
    age: q.age,
    income: q.income,
    investmentExperience: q.investment_experience,
    timeHorizon: q.time_horizon,
    lossReaction: q.loss_reaction,
    goal: q.goal,
  }));

export type RiskQuestionnaire = z.output<typeof RiskQuestionnaireSchema>;

export const GOAL_TYPES = [
  'retirement',
  'education',
  'home_purchase',
  'wealth_building',
  'income_generation',
  'emergency_fund',
] as const;

export type GoalType = (typeof GOAL_TYPES)[number];

export const GoalSchema = z
  .object({
    goal_type: z.enum(GOAL_TYPES).default('wealth_building'),
    target_amount: z.coerce.number().finite().default(100000),
    years: z.coerce.number().finite().default(10),
    current_savings: z.coerce.number().finite().default(0),
    monthly_contribution: z.coerce.number().finite().default(0),
  })
  .transform(g => ({
    goalType: g.goal_type,
    targetAmount: g.target_amount,
    yearsToGoal: Math.trunc(g.years),
    currentSavings: g.current_savings,
    monthlyContribution: g.monthly_contribution,
  }));

export type Goal = z.output<typeof GoalSchema>;

export const StrategyRequestSchema = z
  .object({
    risk_profile: z.string().default('moderate'),
    goals: z.array(GoalSchema).default([]),
    current_portfolio_value: z.coerce.number().finite().default(0),
    monthly_contribution: z.coerce.number().finite().default(0),
  })
  .transform(r => ({
    riskProfile: r.risk_profile,
    goals: r.goals,
    currentPortfolioValue: r.current_portfolio_value,
    monthlyContribution: r.monthly_contribution,
  }));

export type StrategyRequest = z.output<typeof StrategyRequestSchema>;

/** A saved portfolio: `{ holdings: [...] }` or a bare list of holdings. */
export const PortfolioSchema = z.union([
  z.object({ holdings: z.array(HoldingSchema) }),
  HoldingsSchema.transform(holdings => ({ holdings })),
]);

export type Portfolio = z.output<typeof PortfolioSchema>;
