import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { buildServer } from '../../app.js';
import { createSessionRegistry } from '../../services/advisor/session-registry.js';
import { OFFLINE_HELP_MESSAGE } from '../../services/advisor/offline-responder.js';
import { testSettings } from '../../test-utils/scripted-provider.js';

describe('Chat Routes', () => {
  let app: Awaited<ReturnType<typeof buildServer>>;

  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    app = await buildServer({
      sessions: createSessionRegistry({ settings: testSettings() }),
      riskFreeRate: 0.04,
      configuredProviders: [],
    });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    vi.restoreAllMocks();
  });

  it('reports health via GET /api/health', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/health' });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({ status: 'healthy', service: 'Wealth Advisor API', providers: [] });
  });

  it('answers offline via POST /api/chat', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/chat',
      payload: { message: 'Assess my risk tolerance', user_id: 'alice' },
    });

    expect(response.statusCode).toBe(200);
    const body = JSON.parse(response.body);
    expect(body.user_id).toBe('alice');
    expect(body.response).toContain('Risk Level: **Very Aggressive**');
  });

  it('uses the default user when none is given', async () => {
    const response = await app.inject({ method: 'POST', url: '/api/chat', payload: { message: 'hi' } });

    expect(JSON.parse(response.body)).toEqual({ response: OFFLINE_HELP_MESSAGE, user_id: 'default' });
  });

  it('rejects a chat without a message', async () => {
    const response = await app.inject({ method: 'POST', url: '/api/chat', payload: {} });

    expect(response.statusCode).toBe(400);
    const body = JSON.parse(response.body);
    expect(body.error).toBe('validation_error');
    expect(body.message).toBe('message: Required');
    expect(body.details).toEqual([expect.objectContaining({ path: ['message'], message: 'Required' })]);
  });

  it('rejects malformed JSON bodies', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/api/chat',
      headers: { 'content-type': 'application/json' },
      payload: '{"message":',
    });

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body).error).toBe('bad_request');
  });

  it('stores preferences and reports them in GET /api/memory', async () => {
    const saved = await app.inject({
      method: 'POST',
      url: '/api/preferences',
      payload: { user_id: 'bob', preferences: { age: 40 } },
    });
    expect(JSON.parse(saved.body)).toEqual({ success: true, message: 'Preferences updated' });

    const response = await app.inject({ method: 'GET', url: '/api/memory?user_id=bob' });

    expect(JSON.parse(response.body)).toEqual({
      success: true,
      summary: '**User Profile:**\n- Age: 40\n\n**Conversation History:** 0 messages',
    });
  });

  it('stores a portfolio via POST /api/portfolio', async () => {
    await app.inject({
      method: 'POST',
      url: '/api/portfolio',
      payload: {
        user_id: 'carol',
        portfolio: [
          { symbol: 'VTI', value: 50000 },
          { symbol: 'BND', value: 20000 },
        ],
      },
    });

    const response = await app.inject({ method: 'GET', url: '/api/memory?user_id=carol' });

    expect(JSON.parse(response.body).summary).toBe(
      '\n**Portfolio Value:** $70,000.00\n\n**Conversation History:** 0 messages'
    );
  });

  it('returns recent turns via GET /api/history', async () => {
    await app.inject({ method: 'POST', url: '/api/chat', payload: { message: 'hello', user_id: 'dave' } });

    const response = await app.inject({ method: 'GET', url: '/api/history?user_id=dave&limit=1' });

    const body = JSON.parse(response.body);
    expect(body.success).toBe(true);
    expect(body.messages).toHaveLength(1);
    expect(body.messages[0]).toMatchObject({
      role: 'assistant',
      content: OFFLINE_HELP_MESSAGE,
      metadata: { source: 'offline', provider: null, tool: null },
    });
    expect(typeof body.messages[0].created_at).toBe('string');
  });

  it('clears a conversation via POST /api/clear', async () => {
    await app.inject({ method: 'POST', url: '/api/chat', payload: { message: 'hello', user_id: 'erin' } });

    const cleared = await app.inject({ method: 'POST', url: '/api/clear', payload: { user_id: 'erin' } });
    expect(JSON.parse(cleared.body)).toEqual({ success: true, message: 'Conversation cleared' });

    const history = await app.inject({ method: 'GET', url: '/api/history?user_id=erin' });
    expect(JSON.parse(history.body).messages).toEqual([]);
  });
});
