import type { FastifyInstance } from 'fastify';
import { RATE_LIMITS } from '../rate-limit.js';
import {
  getCorrelationAnalysis,
  getSocialSentiment,
  getVolatility,
} from '../services/market-analytics.js';
import { fetchFearGreedIndex } from '../services/sentiment.js';
import { cryptoIdParams, parseRequestParams } from './_shared/validation.js';

export default async function analyticsRoutes(app: FastifyInstance) {
  app.get(
    '/correlation-analysis/:id',
    { config: { rateLimit: RATE_LIMITS.STRICT } },
    async (req, reply) => {
      const params = parseRequestParams(cryptoIdParams, req, reply);
      if (!params) return reply;
      return getCorrelationAnalysis(params.id);
    },
  );

  app.get(
    '/volatility-heatmap/:id',
    { config: { rateLimit: RATE_LIMITS.MODERATE } },
    async (req, reply) => {
      const params = parseRequestParams(cryptoIdParams, req, reply);
      if (!params) return reply;
      return getVolatility(params.id);
    },
  );

  app.get(
    '/social-sentiment-analysis/:id',
    { config: { rateLimit: RATE_LIMITS.MODERATE } },
    async (req, reply) => {
      const params = parseRequestParams(cryptoIdParams, req, reply);
      if (!params) return reply;
      return getSocialSentiment(params.id);
    },
  );

  app.get(
    '/market-sentiment',
    { config: { rateLimit: RATE_LIMITS.LAX } },
    async () => fetchFearGreedIndex(),
  );
}
