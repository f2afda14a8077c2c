// Risk Tolerance Tool
// Scores a questionnaire into a risk level and a starting allocation

import { assessRiskTolerance, summarizeRiskProfile } from '../finance/risk.js';
import { RiskQuestionnaireSchema } from '../finance/schemas.js';
import { parseToolInput } from './input.js';
import type { ToolDefinition } from './types.js';

export const riskToleranceTool: ToolDefinition = {
  name: 'assess_risk_tolerance',
  description: "Assess the user's risk tolerance from questionnaire answers and recommend an asset allocation.",
  parameters: [
    { name: 'age', type: 'number', description: 'Investor age in years', required: false },
    { name: 'time_horizon', type: 'number', description: 'Years until the money is needed', required: false },
    {
      name: 'investment_experience',
      type: 'string',
      description: 'Prior investing experience',
      required: false,
      enum: ['none', 'beginner', 'intermediate', 'advanced'],
    },
    {
      name: 'loss_reaction',
      type: 'string',
      description: 'Reaction to a 20% portfolio drop',
      required: false,
      enum: ['sell_all', 'sell_some', 'hold', 'buy_more'],
    },
    {
      name: 'goal',
      type: 'string',
      description: 'Primary investment goal',
      required: false,
      enum: ['preservation', 'income', 'growth', 'aggressive_growth'],
    },
    { name: 'income', type: 'number', description: 'Annual income', required: false },
  ],
  invoke: (jsonText: string): string => {
    const input = parseToolInput(jsonText, RiskQuestionnaireSchema);
    if (!input.success) {
      return `Error assessing risk tolerance: ${input.error}`;
    }
    return summarizeRiskProfile(assessRiskTolerance(input.data));
  },
};
