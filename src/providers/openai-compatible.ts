// OpenAI-compatible chat completions provider
// Shared by OpenAI itself and gateways that speak the same API

import OpenAI from 'openai';
import type { ProviderName } from '../env.js';
import { errorMessage } from '../utils/errors.js';
import { BaseProvider, type BaseProviderOptions } from './base.js';

export interface OpenAICompatibleConfig {
  apiKey: string;
  model: string;
  temperature?: number;
  baseURL?: string;
  defaultHeaders?: Record<string, string>;
  /** Shown when the key is missing */
  missingKeyMessage: string;
}

export class OpenAICompatibleProvider extends BaseProvider {
  private client: OpenAI | null = null;
  private readonly model: string;
  private readonly temperature: number | undefined;

  constructor(name: ProviderName, label: string, config: OpenAICompatibleConfig, options: BaseProviderOptions = {}) {
    super(name, label, options);
    this.model = config.model;
    this.temperature = config.temperature;

    if (!config.apiKey) {
      this.markUnavailable(config.missingKeyMessage);
      return;
    }

    try {
      this.client = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        defaultHeaders: config.defaultHeaders,
        // Retries on 429 are ours
        maxRetries: 0,
      });
      this.markReady();
      console.log(`✓ ${label} client initialized (${config.model})`);
    } catch (error) {
      console.warn(`⚠️ Failed to initialize ${label}: ${errorMessage(error)}`);
      this.markUnavailable(config.missingKeyMessage);
    }
  }

  protected async sendPrompt(prompt: string, systemPrompt: string): Promise<string> {
    if (!this.client) {
      throw new Error(`${this.label} client not initialized`);
    }

    const messages: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];
    if (systemPrompt) {
      messages.push({ role: 'system', content: systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages,
      temperature: this.temperature,
    });

    return completion.choices[0]?.message?.content ?? '';
  }
}
