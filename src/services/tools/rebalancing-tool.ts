// Rebalancing Tool
// Trades needed to move the portfolio to a target asset-class mix

import { DEFAULT_TARGET_ALLOCATION, suggestRebalancing, summarizeTrades } from '../finance/diversification.js';
import { RebalancingInputSchema } from '../finance/schemas.js';
import { parseToolInput } from './input.js';
import type { ToolDefinition } from './types.js';

export const rebalancingTool: ToolDefinition = {
  name: 'suggest_rebalancing',
  description:
    'Suggest buy/sell trades to reach a target allocation (default 60% equity, 25% bond, 5% cash, 5% real estate, 5% commodity).',
  parameters: [
    {
      name: 'holdings',
      type: 'array',
      description: 'JSON array of holdings with symbol, value, asset_class. May also be sent bare as the whole input.',
      required: true,
    },
    {
      name: 'target_allocation',
      type: 'object',
      description: 'Map of asset class to target fraction, e.g. {"equity": 0.7, "bond": 0.3}',
      required: false,
    },
  ],
  invoke: (jsonText: string): string => {
    const input = parseToolInput(jsonText, RebalancingInputSchema);
    if (!input.success) {
      return `Error generating rebalancing suggestions: ${input.error}`;
    }
    const { holdings, target_allocation } = input.data;
    return summarizeTrades(suggestRebalancing(holdings, target_allocation ?? DEFAULT_TARGET_ALLOCATION));
  },
};
