import { z } from 'zod';

const nullableNumber = z.number().nullable().catch(null);
const nullableString = z.string().nullable().catch(null);
const currencyNumbers = z.record(z.number().nullable()).catch({});
const currencyDates = z.record(z.string().nullable()).catch({});

export const marketCoinSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  name: z.string(),
  current_price: nullableNumber,
  market_cap: nullableNumber,
  total_volume: nullableNumber,
  high_24h: nullableNumber,
  low_24h: nullableNumber,
  price_change_percentage_24h: nullableNumber,
});

export const marketsResponseSchema = z.array(marketCoinSchema);

export const tickerSchema = z.object({
  base: z.string(),
  target: z.string(),
  market: z.object({ name: z.string() }),
  trade_url: nullableString,
});

export const coinResponseSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  name: z.string(),
  description: z.object({ en: z.string().catch('') }).catch({ en: '' }),
  links: z
    .object({
      homepage: z.array(z.string()).catch([]),
      twitter_screen_name: nullableString,
      subreddit_url: nullableString,
    })
    .catch({ homepage: [], twitter_screen_name: null, subreddit_url: null }),
  market_data: z
    .object({
      current_price: currencyNumbers,
      market_cap: currencyNumbers,
      ath: currencyNumbers,
      ath_date: currencyDates,
      atl: currencyNumbers,
      atl_date: currencyDates,
      circulating_supply: nullableNumber,
      total_supply: nullableNumber,
    })
    .nullable()
    .catch(null),
  sentiment_votes_up_percentage: nullableNumber,
  sentiment_votes_down_percentage: nullableNumber,
  tickers: z.array(tickerSchema).catch([]),
});

const seriesPoint = z.tuple([z.number(), z.number()]);

export const marketChartResponseSchema = z.object({
  prices: z.array(seriesPoint),
  market_caps: z.array(seriesPoint).catch([]),
  total_volumes: z.array(seriesPoint).catch([]),
});
