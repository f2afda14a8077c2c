// Google Gemini Provider
// Uses @google/generative-ai with an API key (free tier friendly)

import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import { errorMessage } from '../utils/errors.js';
import { BaseProvider, type BaseProviderOptions } from './base.js';

export interface GeminiProviderConfig {
  apiKey: string;
  model: string;
  temperature?: number;
}

export class GeminiProvider extends BaseProvider {
  private model: GenerativeModel | null = null;

  constructor(config: GeminiProviderConfig, options: BaseProviderOptions = {}) {
    super('gemini', 'Gemini', options);

    if (!config.apiKey) {
      this.markUnavailable('Gemini is not configured. Please set GOOGLE_API_KEY.');
      return;
    }

    try {
      const client = new GoogleGenerativeAI(config.apiKey);
      this.model = client.getGenerativeModel({
        model: config.model,
        generationConfig: config.temperature === undefined ? undefined : { temperature: config.temperature },
      });
      this.markReady();
      console.log(`✓ Gemini client initialized (${config.model})`);
    } catch (error) {
      console.warn(`⚠️ Failed to initialize Gemini: ${errorMessage(error)}`);
      this.markUnavailable('Gemini is not configured. Please set GOOGLE_API_KEY.');
    }
  }

  protected async sendPrompt(prompt: string, systemPrompt: string): Promise<string> {
    if (!this.model) {
      throw new Error('Gemini model not initialized');
    }
    // Gemini gets the system instructions inline
    const fullPrompt = systemPrompt ? `${systemPrompt}\n\nUser: ${prompt}` : prompt;
    const result = await this.model.generateContent(fullPrompt);
    return result.response.text();
  }
}
