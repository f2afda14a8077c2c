// Portfolio Risk Tool
// VaR, volatility, Sharpe ratio and drawdown for a list of holdings

import { calculatePortfolioRisk, summarizeRiskMetrics } from '../finance/risk.js';
import { HoldingsSchema } from '../finance/schemas.js';
import { parseToolInput } from './input.js';
import type { ToolDefinition } from './types.js';

export function createPortfolioRiskTool(riskFreeRate: number): ToolDefinition {
  return {
    name: 'calculate_portfolio_risk',
    description: 'Calculate risk metrics (VaR, volatility, Sharpe ratio, max drawdown, beta) for a portfolio.',
    parameters: [
      {
        name: 'holdings',
        type: 'array',
        description:
          'JSON array of holdings, each with symbol, name, value, asset_class and optional annual_return, volatility',
        required: true,
      },
    ],
    invoke: (jsonText: string): string => {
      const input = parseToolInput(jsonText, HoldingsSchema);
      if (!input.success) {
        return `Error calculating risk: ${input.error}`;
      }
      try {
        return summarizeRiskMetrics(calculatePortfolioRisk(input.data, riskFreeRate));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return `Error calculating risk: ${message}`;
      }
    },
  };
}
