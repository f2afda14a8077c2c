// Calculator Tool
// Evaluates arithmetic with mathjs, e.g. compound growth or loan payments

import { all, create, format } from 'mathjs';
import { z } from 'zod';
import { parseToolInput } from './input.js';
import type { ToolDefinition } from './types.js';

// Private instance: expressions come from the model and must not change
// mathjs state shared with other sessions. range() is off so one call
// cannot allocate a billion-element matrix.
const math = create(all);
const evaluate = math.evaluate;

const DISABLED_FUNCTIONS = [
  'import',
  'createUnit',
  'evaluate',
  'parse',
  'simplify',
  'derivative',
  'range',
];

math.import(
  Object.fromEntries(
    DISABLED_FUNCTIONS.map(name => [
      name,
      () => {
        throw new Error(`Function ${name} is disabled`);
      },
    ])
  ),
  { override: true }
);

const CalculatorInputSchema = z.object({
  expression: z.string().trim().min(1, 'expression is required'),
});

export const calculatorTool: ToolDefinition = {
  name: 'calculator',
  description: 'Evaluate a mathematical expression. Use it for compound growth, percentages and other arithmetic.',
  parameters: [
    {
      name: 'expression',
      type: 'string',
      description: 'Expression to evaluate, e.g. "10000 * (1 + 0.07)^10"',
      required: true,
    },
  ],
  invoke: (jsonText: string): string => {
    const input = parseToolInput(jsonText, CalculatorInputSchema);
    if (!input.success) {
      return `Error evaluating expression: ${input.error}`;
    }

    const { expression } = input.data;
    try {
      const result: unknown = evaluate(expression);
      return `${expression} = ${format(result, { precision: 14 })}`;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return `Error evaluating expression: ${message}`;
    }
  },
};
