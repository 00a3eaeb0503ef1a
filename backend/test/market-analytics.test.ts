import { describe, it, expect } from 'vitest';
import { setCoinGeckoFetch } from '../src/services/coingecko-client.js';
import {
  classifySentiment,
  getCorrelationAnalysis,
  getSocialSentiment,
  getVolatility,
} from '../src/services/market-analytics.js';
import { annualizedVolatility } from '../src/services/indicators.js';
import { fakeCoinGecko, requestedUrls } from './helpers.js';
import { coinResponse, marketChart, marketCoin } from './fixtures.js';

describe('market analytics', () => {
  it('correlates against bitcoin and ethereum over 180 days', async () => {
    const fetchMock = fakeCoinGecko({
      '/coins/solana/market_chart': { body: marketChart([1, 2, 3, 4]) },
      '/coins/bitcoin/market_chart': { body: marketChart([2, 4, 6, 8]) },
      '/coins/ethereum/market_chart': { body: marketChart([40, 30, 20, 10]) },
    });
    setCoinGeckoFetch(fetchMock);

    const result = await getCorrelationAnalysis('solana');

    expect(result.cryptoId).toBe('solana');
    expect(result.days).toBe(180);
    expect(result.samples).toBe(4);
    expect(result.correlationWithBtc).toBeCloseTo(1, 10);
    expect(result.correlationWithEth).toBeCloseTo(-1, 10);
    expect(requestedUrls(fetchMock).map((url) => url.searchParams.get('days'))).toEqual([
      '180',
      '180',
      '180',
    ]);
  });

  it('reports undefined correlation as null', async () => {
    setCoinGeckoFetch(
      fakeCoinGecko({
        '/coins/tether/market_chart': { body: marketChart([1, 1, 1]) },
        '/coins/bitcoin/market_chart': { body: marketChart([2, 4, 6]) },
        '/coins/ethereum/market_chart': { body: marketChart([3, 2, 1]) },
      }),
    );

    const result = await getCorrelationAnalysis('tether');

    expect(result.correlationWithBtc).toBeNull();
    expect(result.correlationWithEth).toBeNull();
  });

  it('computes annualised volatility over 90 days', async () => {
    const prices = [100, 110, 99, 105, 0, 101];
    const fetchMock = fakeCoinGecko({
      '/coins/markets': { body: [marketCoin({ id: 'solana' })] },
      '/coins/solana/market_chart': { body: marketChart(prices) },
    });
    setCoinGeckoFetch(fetchMock);

    const result = await getVolatility('solana');

    expect(result).toEqual({
      cryptoId: 'solana',
      days: 90,
      volatility: annualizedVolatility([100, 110, 99, 105, 101]),
    });
    const chartUrl = requestedUrls(fetchMock).find((url) => url.pathname.endsWith('market_chart'));
    expect(chartUrl?.searchParams.get('days')).toBe('90');
  });

  it('rejects volatility for unknown coins', async () => {
    setCoinGeckoFetch(fakeCoinGecko({ '/coins/markets': { body: [] } }));

    await expect(getVolatility('nothing')).rejects.toMatchObject({
      statusCode: 404,
      message: 'cryptocurrency not found',
    });
  });

  it('classifies sentiment scores around the 0.1 threshold', () => {
    expect(classifySentiment(0.1)).toBe('neutral');
    expect(classifySentiment(0.11)).toBe('positive');
    expect(classifySentiment(-0.1)).toBe('neutral');
    expect(classifySentiment(-0.2)).toBe('negative');
    expect(classifySentiment(0)).toBe('neutral');
  });

  it('scores community votes', async () => {
    setCoinGeckoFetch(
      fakeCoinGecko({
        '/coins/bitcoin': {
          body: coinResponse({
            id: 'bitcoin',
            sentiment_votes_up_percentage: 75.5,
            sentiment_votes_down_percentage: 24.5,
          }),
        },
      }),
    );

    await expect(getSocialSentiment('bitcoin')).resolves.toEqual({
      cryptoId: 'bitcoin',
      sentiment: 'positive',
      sentimentScore: 51,
      votesUpPercentage: 75.5,
      votesDownPercentage: 24.5,
    });
  });

  it('rejects coins without vote data', async () => {
    setCoinGeckoFetch(
      fakeCoinGecko({
        '/coins/obscure': {
          body: coinResponse({ id: 'obscure', sentiment_votes_up_percentage: 60 }),
        },
      }),
    );

    await expect(getSocialSentiment('obscure')).rejects.toMatchObject({
      statusCode: 404,
      message: 'sentiment data not available',
    });
  });
});
