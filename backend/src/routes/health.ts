import type { FastifyInstance } from 'fastify';
import { RATE_LIMITS } from '../rate-limit.js';

interface HealthStatus {
  ok: boolean;
  ts: number;
  uptimeSec?: number;
}

export default async function healthRoute(app: FastifyInstance) {
  app.get(
    '/health',
    { config: { rateLimit: RATE_LIMITS.LAX } },
    async (_req, reply): Promise<HealthStatus> => {
      reply.header('Cache-Control', 'no-store');
      if (!app.isStarted) {
        reply.code(503);
        return { ok: false, ts: Date.now() };
      }
      return { ok: true, ts: Date.now(), uptimeSec: Math.round(process.uptime()) };
    },
  );
}
