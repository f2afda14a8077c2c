// Provider Registry
// Builds providers from settings and picks the one a session will use

import { PROVIDER_NAMES, type ProviderName, type ProviderSettings } from '../env.js';
import type { BaseProviderOptions } from './base.js';
import { GeminiProvider } from './gemini.js';
import { OpenAIProvider } from './openai.js';
import { OpenRouterProvider } from './openrouter.js';
import type { Provider } from './types.js';

export type ProviderFactory = (name: ProviderName, settings: ProviderSettings) => Provider;

export function createProvider(
  name: ProviderName,
  settings: ProviderSettings,
  options: BaseProviderOptions = {}
): Provider {
  const shared = { retry: settings.retry, ...options };
  switch (name) {
    case 'gemini':
      return new GeminiProvider(
        { apiKey: settings.googleApiKey, model: settings.geminiModel, temperature: settings.temperature },
        shared
      );
    case 'openrouter':
      return new OpenRouterProvider(
        { apiKey: settings.openRouterApiKey, model: settings.openRouterModel, temperature: settings.temperature },
        shared
      );
    case 'openai':
      return new OpenAIProvider(
        { apiKey: settings.openAIApiKey, model: settings.openAIModel, temperature: settings.temperature },
        shared
      );
  }
}

/**
 * Preferred provider first, then the others in fallback order.
 * A candidate is only kept when it reports itself available.
 * Returns null when nothing is usable (offline mode).
 */
export function selectProvider(
  settings: ProviderSettings,
  factory: ProviderFactory = createProvider
): Provider | null {
  const order: ProviderName[] = [
    settings.primaryModel,
    ...PROVIDER_NAMES.filter(name => name !== settings.primaryModel),
  ];

  for (const name of order) {
    const provider = factory(name, settings);
    if (provider.isAvailable) {
      return provider;
    }
  }
  return null;
}

export { BaseProvider } from './base.js';
export type { BaseProviderOptions } from './base.js';
export { GeminiProvider } from './gemini.js';
export { OpenRouterProvider } from './openrouter.js';
export { OpenAIProvider } from './openai.js';
export type { Provider, GenerationResult, GenerationFailureKind } from './types.js';
export { describeGenerationFailure, toDisplayText } from './types.js';
