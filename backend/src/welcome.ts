import type { FastifyInstance } from 'fastify';
import { readFileSync } from 'node:fs';
import { RATE_LIMITS } from './rate-limit.js';

const WELCOME_PAGE_URL = new URL('../public/welcome.html', import.meta.url);

let welcomePage: string | null = null;

function loadWelcomePage(): string {
  welcomePage ??= readFileSync(WELCOME_PAGE_URL, 'utf8');
  return welcomePage;
}

export default async function welcomeRoute(app: FastifyInstance) {
  app.get(
    '/',
    { config: { rateLimit: RATE_LIMITS.LAX } },
    async (_req, reply) => reply.type('text/html; charset=utf-8').send(loadWelcomePage()),
  );
}
