// HTTP server assembly, kept apart from index.ts so tests can inject requests

import Fastify, { type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import type { ProviderName } from './env.js';
import { analysisRoutes } from './routes/analysis.js';
import { chatRoutes } from './routes/chat.js';
import type { SessionRegistry } from './services/advisor/session-registry.js';
import { AnalysisError } from './services/finance/errors.js';
import { AppError, formatErrorResponse, toAppError } from './utils/errors.js';

export const SERVICE_NAME = 'Wealth Advisor API';

export interface ServerOptions {
  sessions: SessionRegistry;
  riskFreeRate: number;
  configuredProviders: ProviderName[];
  corsOrigins?: string[];
  logger?: FastifyServerOptions['logger'];
}

export async function buildServer(options: ServerOptions) {
  const server = Fastify({ logger: options.logger ?? false });

  await server.register(cors, {
    origin: options.corsOrigins ?? true,
  });

  server.setErrorHandler((error, request, reply) => {
    let appError: AppError;
    if (error instanceof AppError || error instanceof ZodError) {
      appError = toAppError(error);
    } else if (error instanceof AnalysisError) {
      appError = AppError.badRequest(error.message);
    } else if (error.statusCode !== undefined && error.statusCode < 500) {
      appError = AppError.badRequest(error.message);
    } else {
      request.log.error({ err: error }, 'Unhandled route error');
      appError = AppError.internal();
    }
    return reply.code(appError.statusCode).send(formatErrorResponse(appError));
  });

  server.get('/api/health', async () => {
    return {
      status: 'healthy',
      service: SERVICE_NAME,
      providers: options.configuredProviders,
    };
  });

  await server.register(chatRoutes, { prefix: '/api', sessions: options.sessions });
  await server.register(analysisRoutes, { prefix: '/api', riskFreeRate: options.riskFreeRate });

  return server;
}
