// Orchestrator Module - Main exports

export { ToolOrchestrator, MAX_RETRIES_MESSAGE } from './orchestrator.js';
export { parseToolCall } from './parser.js';
export { executeTool } from './executor.js';
export { buildToolPrompt, buildFollowUpPrompt } from './prompts.js';
export type { OrchestratorOptions, OrchestratorTurn, ExecutedToolCall } from './types.js';
