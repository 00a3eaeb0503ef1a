import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { RATE_LIMITS } from '../rate-limit.js';
import {
  getAssetDetails,
  getAssetMarketData,
  getAverageVolume,
  getExchangeListings,
  listAssets,
  MARKETS_PAGE_SIZE,
} from '../services/market-data.js';
import { cryptoIdParams, parseRequestParams, parseRequestQuery } from './_shared/validation.js';

const listQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(MARKETS_PAGE_SIZE).default(20),
});

export default async function cryptosRoutes(app: FastifyInstance) {
  app.get(
    '/cryptos',
    { config: { rateLimit: RATE_LIMITS.LAX } },
    async (req, reply) => {
      const query = parseRequestQuery(listQuerySchema, req, reply);
      if (!query) return reply;
      const { total, items } = await listAssets(query.skip, query.limit);
      reply.header('Cache-Control', 'no-store, max-age=0');
      reply.header('X-Total-Count', String(total));
      return items;
    },
  );

  app.get(
    '/cryptos/:id',
    { config: { rateLimit: RATE_LIMITS.LAX } },
    async (req, reply) => {
      const params = parseRequestParams(cryptoIdParams, req, reply);
      if (!params) return reply;
      return getAssetMarketData(params.id);
    },
  );

  app.get(
    '/cryptos/:id/details',
    { config: { rateLimit: RATE_LIMITS.LAX } },
    async (req, reply) => {
      const params = parseRequestParams(cryptoIdParams, req, reply);
      if (!params) return reply;
      return getAssetDetails(params.id);
    },
  );

  app.get(
    '/crypto-exchanges/:id',
    { config: { rateLimit: RATE_LIMITS.LAX } },
    async (req, reply) => {
      const params = parseRequestParams(cryptoIdParams, req, reply);
      if (!params) return reply;
      return getExchangeListings(params.id);
    },
  );

  app.get(
    '/average-volume/:id',
    { config: { rateLimit: RATE_LIMITS.LAX } },
    async (req, reply) => {
      const params = parseRequestParams(cryptoIdParams, req, reply);
      if (!params) return reply;
      return getAverageVolume(params.id);
    },
  );
}
