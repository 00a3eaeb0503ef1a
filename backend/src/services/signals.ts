import { HttpError } from '../util/http-error.js';
import { fetchMarketChart } from './coingecko-client.js';
import { calcExpWeightedAverage, roundTo } from './indicators.js';
import type { SignalDirection, SignalHorizon, TrendSignal } from './signals.types.js';

const SIGNAL_LOOKBACK_DAYS = 1;

export const SIGNAL_WINDOWS: Record<SignalHorizon, number> = {
  'short-term': 20,
  'long-term': 200,
};

export function classifyTrend(
  prices: number[],
  window: number,
): { signal: SignalDirection; position: string; currentPrice: number; ema: number } {
  const currentPrice = prices[prices.length - 1] ?? 0;
  const ema = calcExpWeightedAverage(prices, window);
  const above = currentPrice > ema;
  return {
    signal: above ? 'long' : 'short',
    position: `price ${above ? 'above' : 'below'} EMA ${window}`,
    currentPrice,
    ema,
  };
}

export async function getTrendSignal(
  cryptoId: string,
  horizon: SignalHorizon,
): Promise<TrendSignal> {
  const chart = await fetchMarketChart(cryptoId, SIGNAL_LOOKBACK_DAYS);
  const prices = chart.prices.map(([, price]) => price);
  if (!prices.length) {
    throw new HttpError(404, `price data not available for '${cryptoId}'`);
  }
  const window = SIGNAL_WINDOWS[horizon];
  const trend = classifyTrend(prices, window);
  return {
    cryptoId,
    horizon,
    signal: trend.signal,
    position: trend.position,
    window,
    currentPrice: trend.currentPrice,
    ema: roundTo(trend.ema, 6),
  };
}
