// Provider Interface for the Wealth Advisor API
// Common interface that all LLM providers implement

import type { ToolRegistry } from '../services/tools/registry.js';
import type { ProviderName } from '../env.js';

export type GenerationFailureKind = 'rate_limited' | 'unavailable' | 'provider_error';

export type GenerationResult =
  | { ok: true; text: string }
  | { ok: false; kind: GenerationFailureKind; message: string };

export interface Provider {
  readonly name: ProviderName;
  readonly label: string;
  /** False when credentials are missing or the SDK client failed to initialize. */
  readonly isAvailable: boolean;
  complete(prompt: string, systemPrompt?: string): Promise<GenerationResult>;
  /** Never rejects; failures come back as display text. */
  generate(prompt: string, systemPrompt?: string): Promise<string>;
  generateWithTools(prompt: string, tools: ToolRegistry, systemPrompt?: string): Promise<string>;
}

export function describeGenerationFailure(result: Extract<GenerationResult, { ok: false }>): string {
  switch (result.kind) {
    case 'rate_limited':
      return 'Error: Maximum retries exceeded.';
    case 'unavailable':
      return result.message;
    case 'provider_error':
      return `Error generating response: ${result.message}`;
  }
}

export function toDisplayText(result: GenerationResult): string {
  return result.ok ? result.text : describeGenerationFailure(result);
}
