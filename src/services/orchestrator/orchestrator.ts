// Tool Orchestrator
// One user query, at most two model calls:
//   prompt -> model -> (no tool: done) | (tool -> model with the result -> done)
// A rate limit on either call restarts the whole exchange with backoff.

import { describeGenerationFailure, type Provider } from '../../providers/types.js';
import { DEFAULT_RETRY_POLICY, RetryState, sleep, type RetryPolicy, type Sleeper } from '../../utils/retry.js';
import type { ToolRegistry } from '../tools/registry.js';
import { executeTool } from './executor.js';
import { parseToolCall } from './parser.js';
import { buildFollowUpPrompt, buildToolPrompt } from './prompts.js';
import type { ExchangeOutcome, OrchestratorOptions, OrchestratorTurn } from './types.js';

export const MAX_RETRIES_MESSAGE = 'Error: Maximum retries exceeded.';

export class ToolOrchestrator {
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleeper;

  constructor(
    private readonly provider: Provider,
    private readonly tools: ToolRegistry,
    options: OrchestratorOptions = {}
  ) {
    this.retryPolicy = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? sleep;
  }

  async run(userQuery: string, systemPrompt = ''): Promise<OrchestratorTurn> {
    const retry = new RetryState(this.retryPolicy);

    for (;;) {
      const outcome = await this.exchange(userQuery, systemPrompt);
      const attempts = retry.attempt + 1;

      if (outcome.status === 'complete') {
        return { text: outcome.text, toolCall: outcome.toolCall, attempts };
      }
      if (!retry.canRetry()) {
        return { text: MAX_RETRIES_MESSAGE, attempts };
      }

      const delay = retry.nextDelayMs();
      console.warn(`⚠️ ${this.provider.label} rate limit hit during tool exchange. Retrying in ${delay / 1000}s...`);
      await retry.backoff(this.sleep);
    }
  }

  private async exchange(userQuery: string, systemPrompt: string): Promise<ExchangeOutcome> {
    const first = await this.provider.complete(buildToolPrompt(userQuery, this.tools, systemPrompt));
    if (!first.ok) {
      if (first.kind === 'rate_limited') return { status: 'rate_limited' };
      return { status: 'complete', text: describeGenerationFailure(first) };
    }

    const request = parseToolCall(first.text);
    const tool = request ? this.tools.get(request.toolName) : undefined;
    if (!request || !tool) {
      // Unknown tool names fall through as a plain answer
      return { status: 'complete', text: first.text };
    }

    const toolCall = executeTool(tool, request.rawInput);

    const second = await this.provider.complete(buildFollowUpPrompt(tool.name, toolCall.result, userQuery));
    if (!second.ok) {
      if (second.kind === 'rate_limited') return { status: 'rate_limited' };
      return { status: 'complete', text: describeGenerationFailure(second), toolCall };
    }

    return { status: 'complete', text: second.text, toolCall };
  }
}
