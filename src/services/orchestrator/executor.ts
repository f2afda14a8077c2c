// Tool Executor
// Runs a registered tool; a tool that throws is reported back to the model as text.

import type { ToolDefinition } from '../tools/types.js';
import type { ExecutedToolCall } from './types.js';

export function executeTool(tool: ToolDefinition, rawInput: string): ExecutedToolCall {
  const input = rawInput || '{}';
  const startTime = Date.now();

  let result: string;
  try {
    result = tool.invoke(input);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`⚠️ Tool ${tool.name} failed: ${message}`);
    result = `Tool error: ${message}`;
  }

  console.log(`✓ Tool ${tool.name} finished in ${Date.now() - startTime}ms`);
  return { name: tool.name, input, result };
}
