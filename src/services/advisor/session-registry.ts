// Session Registry
// One AdvisorAgent per user id, created on first use and kept for the process lifetime.

import type { ProviderSettings } from '../../env.js';
import { createProvider, selectProvider, type ProviderFactory } from '../../providers/index.js';
import { createFinancialToolRegistry } from '../tools/index.js';
import { AdvisorAgent } from './agent.js';

export const DEFAULT_USER_ID = 'default';

export type AgentFactory = (userId: string) => AdvisorAgent;

export class SessionRegistry {
  private readonly agents = new Map<string, AdvisorAgent>();

  constructor(private readonly createAgent: AgentFactory) {}

  /** Returns the user's agent, creating it on first access. */
  get(userId: string = DEFAULT_USER_ID): AdvisorAgent {
    let agent = this.agents.get(userId);
    if (!agent) {
      agent = this.createAgent(userId);
      this.agents.set(userId, agent);
    }
    return agent;
  }

  peek(userId: string): AdvisorAgent | undefined {
    return this.agents.get(userId);
  }

  get size(): number {
    return this.agents.size;
  }
}

export interface SessionRegistryConfig {
  settings: ProviderSettings;
  riskFreeRate?: number;
  providerFactory?: ProviderFactory;
}

export function createSessionRegistry(config: SessionRegistryConfig): SessionRegistry {
  const tools = createFinancialToolRegistry({ riskFreeRate: config.riskFreeRate });
  const factory = config.providerFactory ?? createProvider;

  return new SessionRegistry(userId => {
    const provider = selectProvider(config.settings, factory);
    console.log(`✓ Session ${userId} using ${provider ? provider.label : 'offline responder'}`);
    return new AdvisorAgent({
      userId,
      provider,
      tools,
      orchestrator: { retry: config.settings.retry },
    });
  });
}
