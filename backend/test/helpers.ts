import { vi } from 'vitest';
import type { FastifyBaseLogger } from 'fastify';
import type { FetchLike } from '../src/util/fetch.types.js';

export interface FakeResponse {
  status?: number;
  body: unknown;
}

export type FakeRoute = FakeResponse | ((url: URL) => FakeResponse);

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export const offlineFetch: FetchLike = async (url) => {
  throw new Error(`unexpected network call to ${url}`);
};

/**
 * In-process stand-in for the CoinGecko REST API. Routes are keyed by the
 * path below `/api/v3`; unknown paths answer 404 like the real service.
 */
export function fakeCoinGecko(routes: Record<string, FakeRoute>) {
  return vi.fn<FetchLike>(async (input) => {
    const url = new URL(input);
    const key = url.pathname.replace(/^\/api\/v3/, '');
    const route = routes[key];
    if (!route) return jsonResponse({ error: 'coin not found' }, 404);
    const { status = 200, body } = typeof route === 'function' ? route(url) : route;
    return jsonResponse(body, status);
  });
}

export function requestedUrls(fetchMock: ReturnType<typeof fakeCoinGecko>): URL[] {
  return fetchMock.mock.calls.map(([input]) => new URL(input));
}

export function mockLogger() {
  const log = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    child: () => log,
  };
  return log;
}

export function asLogger(log: ReturnType<typeof mockLogger>): FastifyBaseLogger {
  return log as unknown as FastifyBaseLogger;
}
