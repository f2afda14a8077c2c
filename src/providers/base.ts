// Base Provider
// Availability and rate-limit retry shared by every SDK-backed provider.
// Subclasses only implement sendPrompt().

import type { ProviderName } from '../env.js';
import { ToolOrchestrator } from '../services/orchestrator/orchestrator.js';
import type { ToolRegistry } from '../services/tools/registry.js';
import { DEFAULT_RETRY_POLICY, RetryState, isRateLimitError, sleep, type RetryPolicy, type Sleeper } from '../utils/retry.js';
import { errorMessage } from '../utils/errors.js';
import { toDisplayText, type GenerationResult, type Provider } from './types.js';

export interface BaseProviderOptions {
  retry?: RetryPolicy;
  /** Replaced in tests so backoff does not wait on real timers */
  sleep?: Sleeper;
}

export abstract class BaseProvider implements Provider {
  protected readonly retryPolicy: RetryPolicy;
  protected readonly sleep: Sleeper;
  private ready = false;
  private unavailableMessage: string;

  constructor(
    readonly name: ProviderName,
    readonly label: string,
    options: BaseProviderOptions = {}
  ) {
    this.retryPolicy = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? sleep;
    this.unavailableMessage = `${label} is not configured.`;
  }

  get isAvailable(): boolean {
    return this.ready;
  }

  protected markReady(): void {
    this.ready = true;
  }

  protected markUnavailable(message: string): void {
    this.ready = false;
    this.unavailableMessage = message;
  }

  /** One raw SDK call. Throws on any failure. */
  protected abstract sendPrompt(prompt: string, systemPrompt: string): Promise<string>;

  async complete(prompt: string, systemPrompt = ''): Promise<GenerationResult> {
    if (!this.ready) {
      return { ok: false, kind: 'unavailable', message: this.unavailableMessage };
    }

    const retry = new RetryState(this.retryPolicy);
    for (;;) {
      try {
        const text = await this.sendPrompt(prompt, systemPrompt);
        return { ok: true, text };
      } catch (error) {
        const message = errorMessage(error);
        if (!isRateLimitError(error)) {
          return { ok: false, kind: 'provider_error', message };
        }
        if (!retry.canRetry()) {
          return { ok: false, kind: 'rate_limited', message };
        }
        console.warn(`⚠️ ${this.label} rate limit hit. Retrying in ${retry.nextDelayMs() / 1000}s...`);
        await retry.backoff(this.sleep);
      }
    }
  }

  async generate(prompt: string, systemPrompt = ''): Promise<string> {
    return toDisplayText(await this.complete(prompt, systemPrompt));
  }

  async generateWithTools(prompt: string, tools: ToolRegistry, systemPrompt = ''): Promise<string> {
    if (!this.ready) {
      return this.unavailableMessage;
    }
    const orchestrator = new ToolOrchestrator(this, tools, { retry: this.retryPolicy, sleep: this.sleep });
    const turn = await orchestrator.run(prompt, systemPrompt);
    return turn.text;
  }
}
