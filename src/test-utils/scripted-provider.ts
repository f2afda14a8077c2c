// In-process stand-ins for model providers used across the test suites

import type { ProviderName, ProviderSettings } from '../env.js';
import { BaseProvider, type BaseProviderOptions } from '../providers/base.js';
import type { Sleeper } from '../utils/retry.js';

/** A reply to hand back, or an error to throw from the SDK call */
export type ScriptStep = string | Error;

export interface ScriptedProviderOptions extends BaseProviderOptions {
  name?: ProviderName;
  available?: boolean;
}

export class ScriptedProvider extends BaseProvider {
  readonly prompts: string[] = [];
  readonly systemPrompts: string[] = [];
  private readonly script: ScriptStep[];

  constructor(script: ScriptStep[], options: ScriptedProviderOptions = {}) {
    super(options.name ?? 'gemini', 'Scripted', options);
    this.script = [...script];
    if (options.available === false) {
      this.markUnavailable('Scripted provider is offline.');
    } else {
      this.markReady();
    }
  }

  get remaining(): number {
    return this.script.length;
  }

  protected async sendPrompt(prompt: string, systemPrompt: string): Promise<string> {
    this.prompts.push(prompt);
    this.systemPrompts.push(systemPrompt);
    const step = this.script.shift();
    if (step === undefined) {
      throw new Error('script exhausted');
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

export function rateLimitError(): Error {
  return Object.assign(new Error('Too Many Requests'), { status: 429 });
}

/** A sleeper that resolves immediately and remembers each requested delay. */
export function recordingSleep(): { sleep: Sleeper; calls: number[] } {
  const calls: number[] = [];
  const sleep: Sleeper = async ms => {
    calls.push(ms);
  };
  return { sleep, calls };
}

export function testSettings(overrides: Partial<ProviderSettings> = {}): ProviderSettings {
  return {
    primaryModel: 'openrouter',
    googleApiKey: '',
    geminiModel: 'gemini-2.0-flash-lite',
    openRouterApiKey: '',
    openRouterModel: 'test-model',
    openAIApiKey: '',
    openAIModel: 'gpt-4o-mini',
    temperature: 0.7,
    retry: { maxAttempts: 3, baseDelayMs: 5000 },
    ...overrides,
  };
}
