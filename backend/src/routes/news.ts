import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { RATE_LIMITS } from '../rate-limit.js';
import { fetchNews } from '../services/news.js';
import { parseRequestQuery } from './_shared/validation.js';

const newsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export default async function newsRoute(app: FastifyInstance) {
  app.get(
    '/crypto-news',
    { config: { rateLimit: RATE_LIMITS.MODERATE } },
    async (req, reply) => {
      const query = parseRequestQuery(newsQuerySchema, req, reply);
      if (!query) return reply;
      const news = await fetchNews({ log: req.log });
      return query.limit ? news.slice(0, query.limit) : news;
    },
  );
}
