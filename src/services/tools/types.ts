// Tool system types
// Tools exchange plain text with the model: JSON in, a readable block out.

export const TOOL_NAMES = [
  'calculate_portfolio_risk',
  'assess_risk_tolerance',
  'analyze_diversification',
  'suggest_rebalancing',
  'design_investment_strategy',
  'calculator',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(value: string): value is ToolName {
  const names: readonly string[] = TOOL_NAMES;
  return names.includes(value);
}

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description: string;
  required: boolean;
  enum?: string[];
}

export interface ToolDefinition {
  name: ToolName;
  description: string;
  parameters: ToolParameter[];
  /**
   * Runs the tool against untrusted JSON text.
   * Bad input and computation faults come back as a string starting with "Error".
   */
  invoke: (jsonText: string) => string;
}

/** A tool invocation found in model output, before validation. */
export interface ToolCallRequest {
  toolName: string;
  rawInput: string;
}

export type ToolInputResult<T> = { success: true; data: T } | { success: false; error: string };
