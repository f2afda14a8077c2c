// Orchestrator Types

import type { ToolName } from '../tools/types.js';
import type { RetryPolicy, Sleeper } from '../../utils/retry.js';

export interface ExecutedToolCall {
  name: ToolName;
  /** JSON text handed to the tool, `{}` when the model sent none */
  input: string;
  result: string;
}

export interface OrchestratorTurn {
  text: string;
  toolCall?: ExecutedToolCall;
  /** Exchanges started, 1 when no rate-limit retry happened */
  attempts: number;
}

export interface OrchestratorOptions {
  retry?: RetryPolicy;
  sleep?: Sleeper;
}

export type ExchangeOutcome =
  | { status: 'complete'; text: string; toolCall?: ExecutedToolCall }
  | { status: 'rate_limited' };
