// Advisor Agent
// One per user session. Routes chat through the selected provider with the
// financial tools, or through the offline responder when no provider is usable.

import type { Provider } from '../../providers/types.js';
import { errorMessage } from '../../utils/errors.js';
import type { Portfolio } from '../finance/schemas.js';
import { ToolOrchestrator } from '../orchestrator/orchestrator.js';
import type { OrchestratorOptions } from '../orchestrator/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import {
  InMemoryConversationMemory,
  formatPreferenceValue,
  type ConversationMemory,
  type ConversationTurn,
  type Preferences,
} from './memory.js';
import { OfflineResponder } from './offline-responder.js';
import { ADVISOR_SYSTEM_PROMPT, withUserProfile } from './prompts.js';

export type ReplySource = 'llm' | 'offline' | 'error';

export interface AdvisorAgentOptions {
  userId?: string;
  /** null runs the agent offline */
  provider: Provider | null;
  tools: ToolRegistry;
  memory?: ConversationMemory;
  systemPrompt?: string;
  orchestrator?: OrchestratorOptions;
}

interface AgentReply {
  text: string;
  source: ReplySource;
  tool: string | null;
}

export class AdvisorAgent {
  readonly userId: string;
  readonly memory: ConversationMemory;
  private readonly provider: Provider | null;
  private readonly tools: ToolRegistry;
  private readonly offline: OfflineResponder;
  private readonly systemPrompt: string;
  private readonly orchestratorOptions: OrchestratorOptions;

  constructor(options: AdvisorAgentOptions) {
    this.userId = options.userId ?? 'default';
    this.provider = options.provider;
    this.tools = options.tools;
    this.memory = options.memory ?? new InMemoryConversationMemory(this.userId);
    this.offline = new OfflineResponder(options.tools);
    this.systemPrompt = options.systemPrompt ?? ADVISOR_SYSTEM_PROMPT;
    this.orchestratorOptions = options.orchestrator ?? {};
  }

  /** Provider name, or null when offline */
  get providerName(): string | null {
    return this.provider?.name ?? null;
  }

  async chat(message: string): Promise<string> {
    this.memory.addMessage('user', message);

    let reply: AgentReply;
    try {
      reply = await this.respond(message);
    } catch (error) {
      reply = { text: `Error: ${errorMessage(error)}`, source: 'error', tool: null };
    }

    this.memory.addMessage('assistant', reply.text, {
      source: reply.source,
      provider: this.providerName,
      tool: reply.tool,
    });
    return reply.text;
  }

  private async respond(message: string): Promise<AgentReply> {
    // Availability is re-read every turn
    if (!this.provider || !this.provider.isAvailable) {
      const offline = this.offline.respond(message);
      return { text: offline.text, source: 'offline', tool: offline.tool };
    }

    const profile: Record<string, string> = {};
    for (const [key, value] of Object.entries(this.memory.getPreferences())) {
      profile[key] = formatPreferenceValue(value);
    }

    const orchestrator = new ToolOrchestrator(this.provider, this.tools, this.orchestratorOptions);
    const turn = await orchestrator.run(withUserProfile(message, profile), this.systemPrompt);
    return { text: turn.text, source: 'llm', tool: turn.toolCall?.name ?? null };
  }

  updatePreferences(preferences: Preferences): void {
    this.memory.savePreferences(preferences);
  }

  updatePortfolio(portfolio: Portfolio): void {
    this.memory.savePortfolio(portfolio);
  }

  getMemorySummary(): string {
    return this.memory.getMemorySummary();
  }

  clearConversation(): void {
    this.memory.clearHistory();
  }

  getHistory(limit = 20): ConversationTurn[] {
    return this.memory.getRecentMessages(limit);
  }
}
