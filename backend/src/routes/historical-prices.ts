import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { RATE_LIMITS } from '../rate-limit.js';
import { DEFAULT_HISTORY_DAYS, getHistoricalPrices } from '../services/market-data.js';
import { cryptoIdParams, parseRequestParams, parseRequestQuery } from './_shared/validation.js';

const historyQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(DEFAULT_HISTORY_DAYS),
});

export default async function historicalPricesRoute(app: FastifyInstance) {
  app.get(
    '/historical-prices/:id',
    { config: { rateLimit: RATE_LIMITS.MODERATE } },
    async (req, reply) => {
      const params = parseRequestParams(cryptoIdParams, req, reply);
      if (!params) return reply;
      const query = parseRequestQuery(historyQuerySchema, req, reply);
      if (!query) return reply;
      return getHistoricalPrices(params.id, query.days);
    },
  );
}
