import { describe, it, expect } from 'vitest';
import { setCoinGeckoFetch } from '../src/services/coingecko-client.js';
import { calcExpWeightedAverage } from '../src/services/indicators.js';
import { classifyTrend, getTrendSignal, SIGNAL_WINDOWS } from '../src/services/signals.js';
import { fakeCoinGecko, requestedUrls } from './helpers.js';
import { marketChart } from './fixtures.js';

describe('trend signals', () => {
  it('goes long when the latest price is above the average', () => {
    const trend = classifyTrend([1, 2, 3, 4, 5], 20);
    expect(trend.signal).toBe('long');
    expect(trend.position).toBe('price above EMA 20');
    expect(trend.currentPrice).toBe(5);
  });

  it('goes short when the latest price is below the average', () => {
    const trend = classifyTrend([5, 4, 3, 2, 1], 200);
    expect(trend.signal).toBe('short');
    expect(trend.position).toBe('price below EMA 200');
  });

  it('uses one day of prices and the horizon window', async () => {
    const prices = [100, 102, 101, 99, 98];
    const fetchMock = fakeCoinGecko({
      '/coins/bitcoin/market_chart': { body: marketChart(prices) },
    });
    setCoinGeckoFetch(fetchMock);

    const signal = await getTrendSignal('bitcoin', 'long-term');

    expect(SIGNAL_WINDOWS['long-term']).toBe(200);
    expect(signal).toMatchObject({
      cryptoId: 'bitcoin',
      horizon: 'long-term',
      signal: 'short',
      position: 'price below EMA 200',
      window: 200,
      currentPrice: 98,
    });
    expect(signal.ema).toBeCloseTo(calcExpWeightedAverage(prices, 200), 5);
    expect(requestedUrls(fetchMock)[0].searchParams.get('days')).toBe('1');
  });

  it('rejects an empty price series', async () => {
    setCoinGeckoFetch(
      fakeCoinGecko({ '/coins/bitcoin/market_chart': { body: marketChart([]) } }),
    );

    await expect(getTrendSignal('bitcoin', 'short-term')).rejects.toMatchObject({
      statusCode: 404,
      message: "price data not available for 'bitcoin'",
    });
  });
});
