// Diversification Tool

import { analyzeDiversification, summarizeDiversification } from '../finance/diversification.js';
import { HoldingsSchema } from '../finance/schemas.js';
import { parseToolInput } from './input.js';
import type { ToolDefinition } from './types.js';

export const diversificationTool: ToolDefinition = {
  name: 'analyze_diversification',
  description: 'Score portfolio diversification across asset classes, sectors and geographies, and flag concentration.',
  parameters: [
    {
      name: 'holdings',
      type: 'array',
      description: 'JSON array of holdings with symbol, value, asset_class, sector, geography',
      required: true,
    },
  ],
  invoke: (jsonText: string): string => {
    const input = parseToolInput(jsonText, HoldingsSchema);
    if (!input.success) {
      return `Error analyzing diversification: ${input.error}`;
    }
    return summarizeDiversification(analyzeDiversification(input.data));
  },
};
