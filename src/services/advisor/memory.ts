// Conversation memory
// Per-user chat history, profile preferences and the last saved portfolio.
// Process-local: everything is lost on restart.

import { formatCurrency, titleCase } from '../finance/format.js';
import type { Portfolio } from '../finance/schemas.js';

export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: TurnRole;
  content: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
}

export type Preferences = Record<string, unknown>;

export interface ConversationMemory {
  addMessage(role: TurnRole, content: string, metadata?: Record<string, unknown>): void;
  /** Oldest first, at most `limit` of the latest turns */
  getRecentMessages(limit?: number): ConversationTurn[];
  getPreferences(): Preferences;
  /** Merged into the existing preferences */
  savePreferences(preferences: Preferences): void;
  savePortfolio(portfolio: Portfolio): void;
  getPortfolio(): Portfolio | null;
  /** Drops the history; preferences and portfolio stay */
  clearHistory(): void;
  getMemorySummary(): string;
}

export function formatPreferenceValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value !== null && typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export class InMemoryConversationMemory implements ConversationMemory {
  private history: ConversationTurn[] = [];
  private preferences: Preferences = {};
  private portfolio: Portfolio | null = null;

  constructor(readonly userId: string = 'default') {}

  addMessage(role: TurnRole, content: string, metadata: Record<string, unknown> = {}): void {
    this.history.push({ role, content, metadata, createdAt: new Date() });
  }

  getRecentMessages(limit = 10): ConversationTurn[] {
    if (limit <= 0) return [];
    return this.history.slice(-limit);
  }

  getPreferences(): Preferences {
    return { ...this.preferences };
  }

  savePreferences(preferences: Preferences): void {
    this.preferences = { ...this.preferences, ...preferences };
  }

  savePortfolio(portfolio: Portfolio): void {
    this.portfolio = portfolio;
  }

  getPortfolio(): Portfolio | null {
    return this.portfolio;
  }

  clearHistory(): void {
    this.history = [];
  }

  get messageCount(): number {
    return this.history.length;
  }

  getMemorySummary(): string {
    const parts: string[] = [];

    const entries = Object.entries(this.preferences);
    if (entries.length > 0) {
      parts.push('**User Profile:**');
      for (const [key, value] of entries) {
        parts.push(`- ${titleCase(key)}: ${formatPreferenceValue(value)}`);
      }
    }

    if (this.portfolio) {
      const total = this.portfolio.holdings.reduce((sum, h) => sum + h.value, 0);
      parts.push(`\n**Portfolio Value:** ${formatCurrency(total)}`);
    }

    parts.push(`\n**Conversation History:** ${this.history.length} messages`);
    return parts.join('\n');
  }
}
