import type { CoinResponse, MarketCoin } from '../src/services/coingecko-client.types.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

export function marketCoin(overrides: Partial<MarketCoin> & Pick<MarketCoin, 'id'>): MarketCoin {
  return {
    symbol: overrides.id.slice(0, 3),
    name: overrides.id.charAt(0).toUpperCase() + overrides.id.slice(1),
    current_price: 1,
    market_cap: 1_000,
    total_volume: 100,
    high_24h: 1.1,
    low_24h: 0.9,
    price_change_percentage_24h: 0.5,
    ...overrides,
  };
}

export function coinResponse(overrides: Partial<CoinResponse> & Pick<CoinResponse, 'id'>): CoinResponse {
  return {
    symbol: overrides.id.slice(0, 3),
    name: overrides.id,
    description: { en: '' },
    links: { homepage: [], twitter_screen_name: null, subreddit_url: null },
    market_data: null,
    sentiment_votes_up_percentage: null,
    sentiment_votes_down_percentage: null,
    tickers: [],
    ...overrides,
  };
}

/** Builds a market_chart payload with one point per day starting at the epoch. */
export function marketChart(prices: number[], volumes: number[] = []) {
  return {
    prices: prices.map((price, idx) => [idx * DAY_MS, price]),
    market_caps: [],
    total_volumes: volumes.map((volume, idx) => [idx * DAY_MS, volume]),
  };
}
