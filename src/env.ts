// Environment configuration for the Wealth Advisor API
// Load provider credentials and settings from environment variables

export type ProviderName = 'gemini' | 'openrouter' | 'openai';

export const PROVIDER_NAMES: readonly ProviderName[] = ['gemini', 'openrouter', 'openai'];

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseRate(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed < 0 || parsed > 2) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function isProviderName(value: string): value is ProviderName {
  const names: readonly string[] = PROVIDER_NAMES;
  return names.includes(value);
}

function parsePrimaryModel(value: string | undefined): ProviderName {
  const normalized = strEnv(value).toLowerCase();
  if (!normalized) return 'openrouter';
  if (!isProviderName(normalized)) {
    console.error(`Invalid PRIMARY_MODEL "${value}", using default openrouter`);
    return 'openrouter';
  }
  return normalized;
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 5000),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: (process.env.CORS_ORIGINS || 'http://localhost:5000,http://127.0.0.1:5000')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),

  // Provider preference
  PRIMARY_MODEL: parsePrimaryModel(process.env.PRIMARY_MODEL),

  // Google Gemini
  GOOGLE_API_KEY: strEnv(process.env.GOOGLE_API_KEY),
  GEMINI_MODEL: strEnv(process.env.GEMINI_MODEL, 'gemini-2.0-flash-lite'),

  // OpenRouter (OpenAI-compatible)
  OPENROUTER_API_KEY: strEnv(process.env.OPENROUTER_API_KEY),
  OPENROUTER_MODEL: strEnv(process.env.OPENROUTER_MODEL, 'nex-agi/deepseek-v3.1-nex-n1:free'),

  // OpenAI
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_MODEL: strEnv(process.env.OPENAI_MODEL, 'gpt-4o-mini'),

  LLM_TEMPERATURE: parseRate(process.env.LLM_TEMPERATURE, 0.7, 'LLM_TEMPERATURE'),

  // Rate-limit retry
  RETRY_MAX_ATTEMPTS: parsePositiveInt(process.env.RETRY_MAX_ATTEMPTS, 3, 'RETRY_MAX_ATTEMPTS'),
  RETRY_BASE_DELAY_MS: parsePositiveInt(process.env.RETRY_BASE_DELAY_MS, 5000, 'RETRY_BASE_DELAY_MS'),

  // Analytics
  RISK_FREE_RATE: parseRate(process.env.RISK_FREE_RATE, 0.04, 'RISK_FREE_RATE'),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

/**
 * Credentials and model choices consumed by provider selection.
 * Kept separate from `env` so sessions can be built from explicit settings in tests.
 */
export interface ProviderSettings {
  primaryModel: ProviderName;
  googleApiKey: string;
  geminiModel: string;
  openRouterApiKey: string;
  openRouterModel: string;
  openAIApiKey: string;
  openAIModel: string;
  temperature: number;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
  };
}

export function providerSettingsFromEnv(): ProviderSettings {
  return {
    primaryModel: env.PRIMARY_MODEL,
    googleApiKey: env.GOOGLE_API_KEY,
    geminiModel: env.GEMINI_MODEL,
    openRouterApiKey: env.OPENROUTER_API_KEY,
    openRouterModel: env.OPENROUTER_MODEL,
    openAIApiKey: env.OPENAI_API_KEY,
    openAIModel: env.OPENAI_MODEL,
    temperature: env.LLM_TEMPERATURE,
    retry: {
      maxAttempts: Math.max(1, env.RETRY_MAX_ATTEMPTS),
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
    },
  };
}

export function isProviderConfigured(provider: ProviderName, settings: ProviderSettings = providerSettingsFromEnv()): boolean {
  switch (provider) {
    case 'gemini':
      return !!settings.googleApiKey;
    case 'openrouter':
      return !!settings.openRouterApiKey;
    case 'openai':
      return !!settings.openAIApiKey;
    default:
      return false;
  }
}

export function listConfiguredProviders(settings: ProviderSettings = providerSettingsFromEnv()): ProviderName[] {
  return PROVIDER_NAMES.filter(name => isProviderConfigured(name, settings));
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  const configured = listConfiguredProviders();
  console.log('Wealth Advisor API Configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  Primary model: ${env.PRIMARY_MODEL}`);
  console.log(`  Configured providers: ${configured.join(', ') || 'none (offline mode)'}`);
  console.log(`  Retry: ${env.RETRY_MAX_ATTEMPTS} attempts, base delay ${env.RETRY_BASE_DELAY_MS}ms`);
  console.log(`  Risk-free rate: ${env.RISK_FREE_RATE}`);
}
