// Tool System Initialization

import { calculatorTool } from './calculator-tool.js';
import { diversificationTool } from './diversification-tool.js';
import { createPortfolioRiskTool } from './portfolio-risk-tool.js';
import { rebalancingTool } from './rebalancing-tool.js';
import { riskToleranceTool } from './risk-tolerance-tool.js';
import { strategyTool } from './strategy-tool.js';
import { ToolRegistry } from './registry.js';
import { DEFAULT_RISK_FREE_RATE } from '../finance/risk.js';

export { ToolRegistry } from './registry.js';
export { TOOL_NAMES, isToolName } from './types.js';
export type { ToolDefinition, ToolName, ToolParameter, ToolCallRequest } from './types.js';

export interface FinancialToolOptions {
  riskFreeRate?: number;
}

export function createFinancialToolRegistry(options: FinancialToolOptions = {}): ToolRegistry {
  return new ToolRegistry([
    createPortfolioRiskTool(options.riskFreeRate ?? DEFAULT_RISK_FREE_RATE),
    riskToleranceTool,
    diversificationTool,
    rebalancingTool,
    strategyTool,
    calculatorTool,
  ]);
}
