// Offline responder
// Keyword routing to the tools with sample inputs, used when no model is reachable.
// Output depends only on the message text.

import type { ToolRegistry } from '../tools/registry.js';
import type { ToolName } from '../tools/types.js';

interface OfflineRule {
  matches: (text: string) => boolean;
  tool: ToolName;
  sampleInput: unknown;
}

const SAMPLE_HOLDINGS = [
  { symbol: 'VTI', value: 50000, asset_class: 'equity' },
  { symbol: 'BND', value: 20000, asset_class: 'bond' },
];

// First match wins
const OFFLINE_RULES: OfflineRule[] = [
  {
    matches: t => t.includes('risk') && (t.includes('assess') || t.includes('tolerance')),
    tool: 'assess_risk_tolerance',
    sampleInput: { age: 35, time_horizon: 20, loss_reaction: 'hold', goal: 'growth' },
  },
  {
    matches: t => t.includes('diversif'),
    tool: 'analyze_diversification',
    sampleInput: [
      { symbol: 'VTI', value: 50000, asset_class: 'equity', sector: 'diversified', geography: 'US' },
      { symbol: 'BND', value: 20000, asset_class: 'bond', sector: 'bonds', geography: 'US' },
    ],
  },
  {
    matches: t => t.includes('strateg'),
    tool: 'design_investment_strategy',
    sampleInput: {
      risk_profile: 'moderate',
      goals: [{ goal_type: 'retirement', target_amount: 1000000, years: 25 }],
    },
  },
  {
    matches: t => t.includes('rebalanc'),
    tool: 'suggest_rebalancing',
    sampleInput: [
      { symbol: 'VTI', value: 60000, asset_class: 'equity' },
      { symbol: 'BND', value: 20000, asset_class: 'bond' },
    ],
  },
  {
    matches: t => t.includes('portfolio') && t.includes('risk'),
    tool: 'calculate_portfolio_risk',
    sampleInput: SAMPLE_HOLDINGS,
  },
];

export const OFFLINE_HELP_MESSAGE = `👋 Hello! I'm your Wealth Management AI Assistant.

⚠️ **No AI provider configured.** To enable full chat, set one of GOOGLE_API_KEY, OPENROUTER_API_KEY or OPENAI_API_KEY.

I can still help with these requests:
• "Assess my risk tolerance"
• "Analyze my portfolio diversification"
• "Design an investment strategy"
• "Suggest rebalancing for my portfolio"
• "What's the risk level of my portfolio?"`;

export interface OfflineReply {
  text: string;
  tool: ToolName | null;
}

export class OfflineResponder {
  constructor(private readonly tools: ToolRegistry) {}

  respond(message: string): OfflineReply {
    const text = message.toLowerCase();
    const rule = OFFLINE_RULES.find(r => r.matches(text));
    const tool = rule ? this.tools.get(rule.tool) : undefined;

    if (!rule || !tool) {
      return { text: OFFLINE_HELP_MESSAGE, tool: null };
    }
    return { text: tool.invoke(JSON.stringify(rule.sampleInput)), tool: tool.name };
  }
}
