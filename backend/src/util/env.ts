import { config } from 'dotenv';
import { z } from 'zod';

config();

const DEFAULT_NEWS_FEEDS = [
  'https://www.fxempire.com/api/v1/en/articles/rss/news',
  'https://cointelegraph.com/rss',
];

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  COINGECKO_BASE_URL: z
    .string()
    .url()
    .default('https://api.coingecko.com/api/v3'),
  COINGECKO_API_KEY: z.string().optional(),
  COINGECKO_CACHE_TTL_SEC: z.coerce.number().int().min(0).default(60),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FEAR_GREED_URL: z.string().url().default('https://api.alternative.me/fng/'),
  NEWS_FEEDS: z
    .string()
    .optional()
    .transform((value) =>
      value
        ? value
            .split(',')
            .map((url) => url.trim())
            .filter(Boolean)
        : DEFAULT_NEWS_FEEDS,
    ),
});

export const env = envSchema.parse(process.env);
