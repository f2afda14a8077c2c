// Wealth Advisor API
// Port: 5000 by default

// Load environment variables from .env file
import 'dotenv/config';

import { buildServer } from './app.js';
import { env, listConfiguredProviders, logConfiguration, providerSettingsFromEnv } from './env.js';
import { createSessionRegistry } from './services/advisor/session-registry.js';

const settings = providerSettingsFromEnv();

const server = await buildServer({
  sessions: createSessionRegistry({ settings, riskFreeRate: env.RISK_FREE_RATE }),
  riskFreeRate: env.RISK_FREE_RATE,
  configuredProviders: listConfiguredProviders(settings),
  corsOrigins: env.CORS_ORIGINS,
  logger: {
    level: env.LOG_LEVEL,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  },
});

try {
  await server.listen({ port: env.PORT, host: env.HOST });
  console.log(`💼 Wealth Advisor API listening on http://${env.HOST}:${env.PORT}`);
  console.log(`📊 Health: http://${env.HOST}:${env.PORT}/api/health`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
