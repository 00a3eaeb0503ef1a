import NodeCache from 'node-cache';
import type { z } from 'zod';

import { env } from '../util/env.js';
import { ERROR_MESSAGES } from '../util/error-messages.js';
import type { FetchLike } from '../util/fetch.types.js';
import { UpstreamError, upstreamStatusToHttp } from '../util/http-error.js';
import {
  coinResponseSchema,
  marketChartResponseSchema,
  marketsResponseSchema,
} from './coingecko-client.schemas.js';
import type {
  CoinResponse,
  FetchMarketsOptions,
  MarketChartResponse,
  MarketCoin,
} from './coingecko-client.types.js';

const VS_CURRENCY = 'usd';
const API_KEY_HEADER = 'x-cg-demo-api-key';

const responseCache = new NodeCache({
  stdTTL: env.COINGECKO_CACHE_TTL_SEC,
  checkperiod: Math.max(1, Math.ceil(env.COINGECKO_CACHE_TTL_SEC / 2)),
  useClones: false,
});

const pendingRequests = new Map<string, Promise<unknown>>();

const defaultFetch: FetchLike = (url, init) => fetch(url, init);
let fetchImpl: FetchLike = defaultFetch;

function buildUrl(path: string, params: Record<string, string | number | undefined>): string {
  const url = new URL(`${env.COINGECKO_BASE_URL}${path}`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

async function requestJson(url: string): Promise<unknown> {
  const headers: Record<string, string> = { accept: 'application/json' };
  if (env.COINGECKO_API_KEY) headers[API_KEY_HEADER] = env.COINGECKO_API_KEY;

  let res: Response;
  try {
    res = await fetchImpl(url, {
      headers,
      signal: AbortSignal.timeout(env.UPSTREAM_TIMEOUT_MS),
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new UpstreamError(502, `${ERROR_MESSAGES.upstream}: ${reason}`);
  }
  if (!res.ok) {
    throw new UpstreamError(
      upstreamStatusToHttp(res.status),
      ERROR_MESSAGES.upstream,
      res.status,
    );
  }
  try {
    return await res.json();
  } catch {
    throw new UpstreamError(502, `${ERROR_MESSAGES.upstream}: invalid JSON`);
  }
}

function loadBody(url: string): Promise<unknown> {
  const cached = responseCache.get<unknown>(url);
  if (cached !== undefined) return Promise.resolve(cached);

  let pending = pendingRequests.get(url);
  if (!pending) {
    pending = requestJson(url)
      .then((body) => {
        if (env.COINGECKO_CACHE_TTL_SEC > 0) responseCache.set(url, body);
        return body;
      })
      .finally(() => {
        pendingRequests.delete(url);
      });
    pendingRequests.set(url, pending);
  }
  return pending;
}

async function getJson<S extends z.ZodTypeAny>(url: string, schema: S): Promise<z.infer<S>> {
  const parsed = schema.safeParse(await loadBody(url));
  if (!parsed.success) {
    throw new UpstreamError(502, `${ERROR_MESSAGES.upstream}: unexpected response shape`);
  }
  return parsed.data;
}

export async function fetchMarkets(opts: FetchMarketsOptions = {}): Promise<MarketCoin[]> {
  const url = buildUrl('/coins/markets', {
    vs_currency: VS_CURRENCY,
    ids: opts.ids?.length ? opts.ids.join(',') : undefined,
    per_page: opts.perPage,
    page: opts.page,
  });
  return getJson(url, marketsResponseSchema);
}

export async function fetchCoin(id: string): Promise<CoinResponse> {
  const url = buildUrl(`/coins/${encodeURIComponent(id)}`, {
    localization: 'false',
    tickers: 'true',
    market_data: 'true',
    community_data: 'false',
    developer_data: 'false',
    sparkline: 'false',
  });
  return getJson(url, coinResponseSchema);
}

export async function fetchMarketChart(id: string, days: number): Promise<MarketChartResponse> {
  const url = buildUrl(`/coins/${encodeURIComponent(id)}/market_chart`, {
    vs_currency: VS_CURRENCY,
    days,
  });
  return getJson(url, marketChartResponseSchema);
}

export function setCoinGeckoFetch(fn: FetchLike | null): void {
  fetchImpl = fn ?? defaultFetch;
  clearCoinGeckoCache();
}

export function clearCoinGeckoCache(): void {
  responseCache.flushAll();
  pendingRequests.clear();
}
