import NodeCache from 'node-cache';
import { z } from 'zod';

import { env } from '../util/env.js';
import { UpstreamError, upstreamStatusToHttp } from '../util/http-error.js';
import type { FetchLike } from '../util/fetch.types.js';
import type { FearGreedIndex } from './sentiment.types.js';

const FEAR_GREED_ERROR = 'failed to fetch fear & greed index';
const CACHE_KEY = 'fear-greed';

const fearGreedEntrySchema = z.object({
  value: z.coerce.number(),
  value_classification: z.string().catch(''),
  timestamp: z.coerce.number().optional().catch(undefined),
});

const fearGreedResponseSchema = z.object({
  data: z.array(fearGreedEntrySchema).min(1),
});

const cache = new NodeCache({
  stdTTL: env.COINGECKO_CACHE_TTL_SEC,
  checkperiod: Math.max(1, Math.ceil(env.COINGECKO_CACHE_TTL_SEC / 2)),
});

const defaultFetch: FetchLike = (url, init) => fetch(url, init);
let fetchImpl: FetchLike = defaultFetch;

export async function fetchFearGreedIndex(): Promise<FearGreedIndex> {
  const cached = cache.get<FearGreedIndex>(CACHE_KEY);
  if (cached) return cached;

  let res: Response;
  try {
    res = await fetchImpl(env.FEAR_GREED_URL, {
      signal: AbortSignal.timeout(env.UPSTREAM_TIMEOUT_MS),
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new UpstreamError(502, `${FEAR_GREED_ERROR}: ${reason}`);
  }
  if (!res.ok) {
    throw new UpstreamError(upstreamStatusToHttp(res.status), FEAR_GREED_ERROR, res.status);
  }
  const parsed = fearGreedResponseSchema.safeParse(await res.json().catch(() => null));
  if (!parsed.success || Number.isNaN(parsed.data.data[0].value)) {
    throw new UpstreamError(502, `${FEAR_GREED_ERROR}: unexpected response shape`);
  }
  const [latest] = parsed.data.data;
  const index: FearGreedIndex = {
    value: latest.value,
    classification: latest.value_classification,
    updatedAt:
      latest.timestamp !== undefined ? new Date(latest.timestamp * 1000).toISOString() : null,
  };
  if (env.COINGECKO_CACHE_TTL_SEC > 0) cache.set(CACHE_KEY, index);
  return index;
}

export function setSentimentFetch(fn: FetchLike | null): void {
  fetchImpl = fn ?? defaultFetch;
  cache.flushAll();
}

export type { FearGreedIndex } from './sentiment.types.js';
