// OpenRouter Provider
// Free-tier models behind an OpenAI-compatible endpoint

import type { BaseProviderOptions } from './base.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export interface OpenRouterProviderConfig {
  apiKey: string;
  model: string;
  temperature?: number;
}

export class OpenRouterProvider extends OpenAICompatibleProvider {
  constructor(config: OpenRouterProviderConfig, options: BaseProviderOptions = {}) {
    super(
      'openrouter',
      'OpenRouter',
      {
        ...config,
        baseURL: OPENROUTER_BASE_URL,
        defaultHeaders: {
          'HTTP-Referer': 'http://localhost:5000',
          'X-Title': 'Wealth Advisor',
        },
        missingKeyMessage: 'OpenRouter is not configured. Please set OPENROUTER_API_KEY.',
      },
      options
    );
  }
}
