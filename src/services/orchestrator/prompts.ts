// Prompt templates for the two-phase tool exchange

import type { ToolRegistry } from '../tools/registry.js';

export function buildToolPrompt(userQuery: string, tools: ToolRegistry, systemPrompt = ''): string {
  return [
    systemPrompt,
    '',
    'You have access to these tools:',
    tools.renderCatalog(),
    '',
    'To use a tool, respond with:',
    'TOOL: <tool_name>',
    'INPUT: <json_input>',
    '',
    'After seeing the tool result, provide your final answer.',
    '',
    `User query: ${userQuery}`,
  ].join('\n');
}

export function buildFollowUpPrompt(toolName: string, result: string, userQuery: string): string {
  return [
    `Tool result for ${toolName}:`,
    result,
    '',
    `User query: ${userQuery}`,
    '',
    'Now provide a helpful response to the user based on this result.',
  ].join('\n');
}
