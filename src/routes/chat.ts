import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { PortfolioSchema } from '../services/finance/schemas.js';
import { DEFAULT_USER_ID, type SessionRegistry } from '../services/advisor/session-registry.js';

export interface ChatRoutesOptions {
  sessions: SessionRegistry;
}

const UserIdSchema = z.string().trim().min(1).default(DEFAULT_USER_ID);

const ChatSchema = z.object({
  message: z.string().trim().min(1, 'Message is required'),
  user_id: UserIdSchema,
});

const PreferencesSchema = z.object({
  user_id: UserIdSchema,
  preferences: z.record(z.string(), z.unknown()).default({}),
});

const SavePortfolioSchema = z.object({
  user_id: UserIdSchema,
  portfolio: PortfolioSchema,
});

const UserQuerySchema = z.object({
  user_id: UserIdSchema,
});

const HistoryQuerySchema = z.object({
  user_id: UserIdSchema,
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

export const chatRoutes: FastifyPluginAsync<ChatRoutesOptions> = async (server, options) => {
  const { sessions } = options;

  // POST /chat - one conversational turn
  server.post('/chat', async (request) => {
    const body = ChatSchema.parse(request.body);
    const agent = sessions.get(body.user_id);

    request.log.info({ userId: body.user_id, provider: agent.providerName ?? 'offline' }, 'Chat message received');
    const response = await agent.chat(body.message);

    return { response, user_id: body.user_id };
  });

  server.post('/preferences', async (request) => {
    const body = PreferencesSchema.parse(request.body);
    sessions.get(body.user_id).updatePreferences(body.preferences);
    return { success: true, message: 'Preferences updated' };
  });

  server.post('/portfolio', async (request) => {
    const body = SavePortfolioSchema.parse(request.body);
    sessions.get(body.user_id).updatePortfolio(body.portfolio);
    return { success: true, message: 'Portfolio updated' };
  });

  server.get('/memory', async (request) => {
    const query = UserQuerySchema.parse(request.query);
    return { success: true, summary: sessions.get(query.user_id).getMemorySummary() };
  });

  server.get('/history', async (request) => {
    const query = HistoryQuerySchema.parse(request.query);
    const messages = sessions.get(query.user_id).getHistory(query.limit);
    return {
      success: true,
      messages: messages.map(turn => ({
        role: turn.role,
        content: turn.content,
        metadata: turn.metadata,
        created_at: turn.createdAt.toISOString(),
      })),
    };
  });

  // Clearing an unknown user is a no-op
  server.post('/clear', async (request) => {
    const body = UserQuerySchema.parse(request.body ?? {});
    sessions.peek(body.user_id)?.clearConversation();
    return { success: true, message: 'Conversation cleared' };
  });
};
