// Investment Strategy Tool

import { designStrategy, summarizePlan } from '../finance/strategy.js';
import { GOAL_TYPES, StrategyRequestSchema } from '../finance/schemas.js';
import { parseToolInput } from './input.js';
import type { ToolDefinition } from './types.js';

export const strategyTool: ToolDefinition = {
  name: 'design_investment_strategy',
  description: 'Design a goal-based investment plan with allocation, monthly savings target and action items.',
  parameters: [
    {
      name: 'risk_profile',
      type: 'string',
      description: 'Investor risk profile',
      required: false,
      enum: ['conservative', 'moderate', 'aggressive', 'very_aggressive'],
    },
    {
      name: 'goals',
      type: 'array',
      description: `List of goals with goal_type (${GOAL_TYPES.join(', ')}), target_amount, years`,
      required: false,
    },
    { name: 'current_portfolio_value', type: 'number', description: 'Value already invested', required: false },
    { name: 'monthly_contribution', type: 'number', description: 'Planned monthly savings', required: false },
  ],
  invoke: (jsonText: string): string => {
    const input = parseToolInput(jsonText, StrategyRequestSchema);
    if (!input.success) {
      return `Error designing strategy: ${input.error}`;
    }
    return summarizePlan(designStrategy(input.data));
  },
};
