import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import {
  analyzeDiversification,
  summarizeDiversification,
  toDiversificationPayload,
} from '../services/finance/diversification.js';
import { calculatePortfolioRisk, summarizeRiskMetrics, toRiskMetricsPayload } from '../services/finance/risk.js';
import { HoldingsSchema, StrategyRequestSchema } from '../services/finance/schemas.js';
import { designStrategy, summarizePlan, toPlanPayload } from '../services/finance/strategy.js';

export interface AnalysisRoutesOptions {
  riskFreeRate: number;
}

const PortfolioBodySchema = z.object({
  portfolio: HoldingsSchema,
});

// Direct calculator endpoints, no model involved
export const analysisRoutes: FastifyPluginAsync<AnalysisRoutesOptions> = async (server, options) => {
  server.post('/risk-assessment', async (request) => {
    const { portfolio } = PortfolioBodySchema.parse(request.body);
    const metrics = calculatePortfolioRisk(portfolio, options.riskFreeRate);
    return {
      success: true,
      metrics: toRiskMetricsPayload(metrics),
      summary: summarizeRiskMetrics(metrics),
    };
  });

  server.post('/diversification', async (request) => {
    const { portfolio } = PortfolioBodySchema.parse(request.body);
    const analysis = analyzeDiversification(portfolio);
    return {
      success: true,
      analysis: toDiversificationPayload(analysis),
      summary: summarizeDiversification(analysis),
    };
  });

  server.post('/strategy', async (request) => {
    const body = StrategyRequestSchema.parse(request.body ?? {});
    const plan = designStrategy(body);
    return {
      success: true,
      strategy: toPlanPayload(plan),
      summary: summarizePlan(plan),
    };
  });
};
