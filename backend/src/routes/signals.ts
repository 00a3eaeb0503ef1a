import type { FastifyInstance } from 'fastify';
import { RATE_LIMITS } from '../rate-limit.js';
import { getTrendSignal } from '../services/signals.js';
import type { SignalHorizon } from '../services/signals.types.js';
import { cryptoIdParams, parseRequestParams } from './_shared/validation.js';

const HORIZONS: SignalHorizon[] = ['short-term', 'long-term'];

export default async function signalRoutes(app: FastifyInstance) {
  for (const horizon of HORIZONS) {
    app.get(
      `/${horizon}/:id`,
      { config: { rateLimit: RATE_LIMITS.MODERATE } },
      async (req, reply) => {
        const params = parseRequestParams(cryptoIdParams, req, reply);
        if (!params) return reply;
        return getTrendSignal(params.id, horizon);
      },
    );
  }
}
