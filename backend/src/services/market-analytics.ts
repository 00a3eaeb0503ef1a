import { HttpError } from '../util/http-error.js';
import { fetchCoin, fetchMarketChart } from './coingecko-client.js';
import { annualizedVolatility, calcCorrelation } from './indicators.js';
import { findMarketCoin } from './market-data.js';
import type {
  CorrelationResult,
  SentimentLabel,
  SocialSentiment,
  VolatilityResult,
} from './market-analytics.types.js';

export const CORRELATION_DAYS = 180;
export const VOLATILITY_DAYS = 90;
export const SENTIMENT_THRESHOLD = 0.1;

const REFERENCE_ASSETS = { btc: 'bitcoin', eth: 'ethereum' } as const;

async function fetchPrices(cryptoId: string, days: number): Promise<number[]> {
  const chart = await fetchMarketChart(cryptoId, days);
  return chart.prices.map(([, price]) => price);
}

export async function getCorrelationAnalysis(cryptoId: string): Promise<CorrelationResult> {
  const [prices, btcPrices, ethPrices] = await Promise.all([
    fetchPrices(cryptoId, CORRELATION_DAYS),
    fetchPrices(REFERENCE_ASSETS.btc, CORRELATION_DAYS),
    fetchPrices(REFERENCE_ASSETS.eth, CORRELATION_DAYS),
  ]);
  return {
    cryptoId,
    days: CORRELATION_DAYS,
    samples: prices.length,
    correlationWithBtc: calcCorrelation(prices, btcPrices),
    correlationWithEth: calcCorrelation(prices, ethPrices),
  };
}

export async function getVolatility(cryptoId: string): Promise<VolatilityResult> {
  const coin = await findMarketCoin(cryptoId);
  if (!coin) throw new HttpError(404, 'cryptocurrency not found');

  const prices = (await fetchPrices(cryptoId, VOLATILITY_DAYS)).filter((p) => p > 0);
  if (prices.length < 2) {
    throw new HttpError(404, `price data not available for '${cryptoId}'`);
  }
  return {
    cryptoId,
    days: VOLATILITY_DAYS,
    volatility: annualizedVolatility(prices),
  };
}

export function classifySentiment(score: number): SentimentLabel {
  if (score > SENTIMENT_THRESHOLD) return 'positive';
  if (score < -SENTIMENT_THRESHOLD) return 'negative';
  return 'neutral';
}

export async function getSocialSentiment(cryptoId: string): Promise<SocialSentiment> {
  const coin = await fetchCoin(cryptoId);
  const up = coin.sentiment_votes_up_percentage;
  const down = coin.sentiment_votes_down_percentage;
  if (up === null || down === null) {
    throw new HttpError(404, 'sentiment data not available');
  }
  const sentimentScore = up - down;
  return {
    cryptoId,
    sentiment: classifySentiment(sentimentScore),
    sentimentScore,
    votesUpPercentage: up,
    votesDownPercentage: down,
  };
}
