// OpenAI Provider

import type { BaseProviderOptions } from './base.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';

export interface OpenAIProviderConfig {
  apiKey: string;
  model: string;
  temperature?: number;
}

export class OpenAIProvider extends OpenAICompatibleProvider {
  constructor(config: OpenAIProviderConfig, options: BaseProviderOptions = {}) {
    super('openai', 'OpenAI', { ...config, missingKeyMessage: 'OpenAI is not configured. Please set OPENAI_API_KEY.' }, options);
  }
}
