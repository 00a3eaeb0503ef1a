import Parser from 'rss-parser';
import NodeCache from 'node-cache';
import pLimit from 'p-limit';
import type { FastifyBaseLogger } from 'fastify';

import { env } from '../util/env.js';
import { UpstreamError } from '../util/http-error.js';
import type { NewsItem } from './news.types.js';

const parser = new Parser();

const NEWS_CACHE_TTL_SEC = 10 * 60;
export const FEED_CONCURRENCY = 3;

const cache = new NodeCache({ stdTTL: NEWS_CACHE_TTL_SEC, checkperiod: 120 });

function feedHost(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
}

async function fetchFeed(url: string): Promise<NewsItem[]> {
  const feed = await parser.parseURL(url);
  const source = feedHost(url);
  const items: NewsItem[] = [];
  for (const item of feed.items) {
    if (!item.title || !item.link) continue;
    items.push({
      title: item.title,
      published: item.pubDate ?? item.isoDate ?? null,
      link: item.link,
      description: item.contentSnippet ?? item.content ?? item.summary ?? '',
      source,
    });
  }
  return items;
}

export async function fetchNews(
  opts: { log?: FastifyBaseLogger; force?: boolean; feeds?: string[] } = {},
): Promise<NewsItem[]> {
  const feeds = opts.feeds ?? env.NEWS_FEEDS;
  const cacheKey = `news:${feeds.join(',')}`;
  if (!opts.force) {
    const cached = cache.get<NewsItem[]>(cacheKey);
    if (cached) return cached;
  }

  const limit = pLimit(FEED_CONCURRENCY);
  const failedFeeds: Record<string, string> = {};
  const perFeed: Record<string, number> = {};
  const results = await Promise.all(
    feeds.map((url) =>
      limit(async () => {
        try {
          const items = await fetchFeed(url);
          perFeed[url] = items.length;
          return items;
        } catch (err) {
          failedFeeds[url] = err instanceof Error ? err.message : 'unknown error';
          return [];
        }
      }),
    ),
  );

  if (feeds.length > 0 && Object.keys(failedFeeds).length === feeds.length) {
    opts.log?.error({ failedFeeds }, 'all news feeds failed');
    throw new UpstreamError(502, 'failed to fetch news feeds');
  }

  const seen = new Set<string>();
  const collected: NewsItem[] = [];
  for (const item of results.flat()) {
    if (seen.has(item.link)) continue;
    seen.add(item.link);
    collected.push(item);
  }

  opts.log?.info(
    { totalNew: collected.length, perFeed, failedFeeds },
    'news fetch summary',
  );

  cache.set(cacheKey, collected);
  return collected;
}

export async function refreshNews(log: FastifyBaseLogger): Promise<void> {
  try {
    await fetchNews({ log, force: true });
  } catch (err) {
    log.error({ err }, 'failed to refresh news');
  }
}

export function clearNewsCache(): void {
  cache.flushAll();
}

export type { NewsItem } from './news.types.js';
