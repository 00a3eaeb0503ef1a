import type { z } from 'zod';
import type {
  coinResponseSchema,
  marketChartResponseSchema,
  marketCoinSchema,
  tickerSchema,
} from './coingecko-client.schemas.js';

export type MarketCoin = z.infer<typeof marketCoinSchema>;
export type CoinTicker = z.infer<typeof tickerSchema>;
export type CoinResponse = z.infer<typeof coinResponseSchema>;
export type MarketChartResponse = z.infer<typeof marketChartResponseSchema>;

export interface FetchMarketsOptions {
  ids?: string[];
  perPage?: number;
  page?: number;
}
