import { describe, it, expect } from 'vitest';
import { AdvisorAgent } from '../agent.js';
import { OFFLINE_HELP_MESSAGE } from '../offline-responder.js';
import { createFinancialToolRegistry } from '../../tools/index.js';
import type { GenerationResult } from '../../../providers/types.js';
import { ScriptedProvider } from '../../../test-utils/scripted-provider.js';

const RISK_PROFILE_TEXT = [
  '🎯 **Risk Profile Assessment**',
  '',
  'Risk Level: **Very Aggressive**',
  'Risk Score: 75/100',
  '',
  '📊 **Recommended Asset Allocation**:',
  '- Equities: 85%',
  '- Bonds: 10%',
  '- Cash/Alternatives: 5%',
  '',
  '📝 Based on your profile, you are a very aggressive investor with a 20-year horizon.',
].join('\n');

const tools = createFinancialToolRegistry();

class ExplodingProvider extends ScriptedProvider {
  async complete(): Promise<GenerationResult> {
    throw new Error('socket hang up');
  }
}

describe('AdvisorAgent offline', () => {
  it('records both turns of every exchange in order', async () => {
    const agent = new AdvisorAgent({ provider: null, tools });

    await agent.chat('hello');
    await agent.chat('bye');

    const history = agent.getHistory();
    expect(history.map(t => [t.role, t.content])).toEqual([
      ['user', 'hello'],
      ['assistant', OFFLINE_HELP_MESSAGE],
      ['user', 'bye'],
      ['assistant', OFFLINE_HELP_MESSAGE],
    ]);
    expect(history[1].metadata).toEqual({ source: 'offline', provider: null, tool: null });
  });

  it('answers the risk question with the sample assessment regardless of history', async () => {
    const agent = new AdvisorAgent({ provider: null, tools });

    expect(await agent.chat('Assess my risk tolerance')).toBe(RISK_PROFILE_TEXT);
    await agent.chat('Design an investment strategy');
    expect(await agent.chat('Assess my risk tolerance')).toBe(RISK_PROFILE_TEXT);
    expect(agent.getHistory(1)[0].metadata).toEqual({ source: 'offline', provider: null, tool: 'assess_risk_tolerance' });
  });

  it('routes keywords to the matching tools', async () => {
    const agent = new AdvisorAgent({ provider: null, tools });

    expect(await agent.chat('How diversified am I?')).toContain('**Diversification Analysis**');
    expect(await agent.chat('Give me a strategy')).toContain('**Investment Strategy: Balanced Growth**');
    expect(await agent.chat('Should I rebalance?')).toContain('**Rebalancing Recommendations**');
    expect(await agent.chat("What's the risk level of my portfolio?")).toContain('**Portfolio Risk Assessment**');
  });

  it('falls back offline when the provider is unavailable', async () => {
    const provider = new ScriptedProvider(['never sent'], { available: false });
    const agent = new AdvisorAgent({ provider, tools });

    expect(await agent.chat('hi')).toBe(OFFLINE_HELP_MESSAGE);
    expect(provider.prompts).toEqual([]);
  });
});

describe('AdvisorAgent with a provider', () => {
  it('returns the model answer and tags the turn', async () => {
    const provider = new ScriptedProvider(['Hi there'], { name: 'openrouter' });
    const agent = new AdvisorAgent({ provider, tools });

    expect(await agent.chat('hello')).toBe('Hi there');
    expect(agent.getHistory(1)[0].metadata).toEqual({ source: 'llm', provider: 'openrouter', tool: null });
    expect(provider.prompts[0]).toContain('You are WealthAdvisor');
  });

  it('prefixes saved preferences to the query', async () => {
    const provider = new ScriptedProvider(['Noted.']);
    const agent = new AdvisorAgent({ provider, tools });
    agent.updatePreferences({ risk_tolerance: 'moderate', age: 40 });

    await agent.chat('hello');

    expect(provider.prompts[0].endsWith('User query: [User profile: risk_tolerance: moderate, age: 40]\n\nhello')).toBe(true);
    // The stored user turn keeps the original text
    expect(agent.getHistory(2)[0].content).toBe('hello');
  });

  it('records the tool used', async () => {
    const provider = new ScriptedProvider(['TOOL: calculator\nINPUT: {"expression": "1 + 1"}', 'It is 2.']);
    const agent = new AdvisorAgent({ provider, tools });

    expect(await agent.chat('1 + 1?')).toBe('It is 2.');
    expect(agent.getHistory(1)[0].metadata).toEqual({ source: 'llm', provider: 'gemini', tool: 'calculator' });
  });

  it('turns unexpected failures into an error reply', async () => {
    const agent = new AdvisorAgent({ provider: new ExplodingProvider([]), tools });

    expect(await agent.chat('hello')).toBe('Error: socket hang up');
    expect(agent.getHistory().map(t => t.role)).toEqual(['user', 'assistant']);
    expect(agent.getHistory(1)[0].metadata).toEqual({ source: 'error', provider: 'gemini', tool: null });
  });
});

describe('AdvisorAgent memory operations', () => {
  it('clears history but keeps preferences and portfolio', async () => {
    const agent = new AdvisorAgent({ provider: null, tools });
    agent.updatePreferences({ risk_tolerance: 'moderate' });
    agent.updatePortfolio({
      holdings: [
        { symbol: 'VTI', name: 'Total Market', value: 50000 },
        { symbol: 'BND', name: 'Bonds', value: 20000 },
      ],
    });
    await agent.chat('hello');

    expect(agent.getMemorySummary()).toBe(
      '**User Profile:**\n- Risk Tolerance: moderate\n\n**Portfolio Value:** $70,000.00\n\n**Conversation History:** 2 messages'
    );

    agent.clearConversation();

    expect(agent.getHistory()).toEqual([]);
    expect(agent.getMemorySummary()).toBe(
      '**User Profile:**\n- Risk Tolerance: moderate\n\n**Portfolio Value:** $70,000.00\n\n**Conversation History:** 0 messages'
    );
  });

  it('limits history to the latest turns', async () => {
    const agent = new AdvisorAgent({ provider: null, tools });
    await agent.chat('one');
    await agent.chat('two');

    expect(agent.getHistory(2).map(t => t.content)).toEqual(['two', OFFLINE_HELP_MESSAGE]);
  });
});
