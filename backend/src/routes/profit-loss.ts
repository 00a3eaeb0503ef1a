import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { RATE_LIMITS } from '../rate-limit.js';
import { evaluatePosition } from '../services/profit-loss.js';
import { cryptoIdSchema, parseRequestQuery } from './_shared/validation.js';

const EXAMPLE_URL =
  '/api/profit-loss-calculator?cryptoName=bitcoin&amount=1&purchasePrice=50000&operation=long';

export const MISSING_PARAMS_MESSAGE = `please provide the required parameters. Example: ${EXAMPLE_URL}`;

const profitLossQuerySchema = z.object({
  cryptoName: cryptoIdSchema,
  amount: z.coerce.number().positive(),
  purchasePrice: z.coerce.number().positive(),
  operation: z.enum(['long', 'short']),
});

export default async function profitLossRoute(app: FastifyInstance) {
  app.get(
    '/profit-loss-calculator',
    { config: { rateLimit: RATE_LIMITS.MODERATE } },
    async (req, reply) => {
      const query = parseRequestQuery(profitLossQuerySchema, req, reply, MISSING_PARAMS_MESSAGE);
      if (!query) return reply;
      return evaluatePosition(query);
    },
  );
}
