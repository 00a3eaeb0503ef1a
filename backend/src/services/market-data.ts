import { notFoundMessage } from '../util/error-messages.js';
import { HttpError } from '../util/http-error.js';
import { fetchCoin, fetchMarketChart, fetchMarkets } from './coingecko-client.js';
import type { CoinResponse, MarketCoin } from './coingecko-client.types.js';
import { roundTo, sliceMean } from './indicators.js';
import type {
  AssetDetails,
  AssetList,
  AssetMarketData,
  AssetSummary,
  AverageVolume,
  ExchangeListing,
  HistoricalSeries,
} from './market-data.types.js';

export const MARKETS_PAGE_SIZE = 250;
export const AVERAGE_VOLUME_DAYS = 30;
export const DEFAULT_HISTORY_DAYS = 30;

function roundPrice(value: number | null): number | null {
  return value === null ? null : roundTo(value, 2);
}

export function toAssetSummary(coin: MarketCoin): AssetSummary {
  return {
    id: coin.id,
    symbol: coin.symbol,
    name: coin.name,
    currentPrice: roundPrice(coin.current_price),
  };
}

export function toAssetMarketData(coin: MarketCoin): AssetMarketData {
  return {
    ...toAssetSummary(coin),
    marketCap: coin.market_cap,
    volume24h: coin.total_volume,
    priceChangePercentage24h: coin.price_change_percentage_24h,
    low24h: coin.low_24h,
    high24h: coin.high_24h,
  };
}

export function toAssetDetails(coin: CoinResponse): AssetDetails {
  const market = coin.market_data;
  const homepage = coin.links.homepage.find((link) => link.trim() !== '') ?? null;
  return {
    id: coin.id,
    name: coin.name,
    symbol: coin.symbol,
    description: coin.description.en,
    circulatingSupply: market?.circulating_supply ?? null,
    totalSupply: market?.total_supply ?? null,
    marketCap: market?.market_cap.usd ?? null,
    currentPrice: roundPrice(market?.current_price.usd ?? null),
    ath: market?.ath.usd ?? null,
    athDate: market?.ath_date.usd ?? null,
    atl: market?.atl.usd ?? null,
    atlDate: market?.atl_date.usd ?? null,
    links: {
      homepage,
      twitter: coin.links.twitter_screen_name || null,
      reddit: coin.links.subreddit_url || null,
    },
  };
}

/** `YYYY-MM-DD HH:mm:ss` in UTC. */
export function formatTimestamp(ms: number): string {
  return new Date(ms).toISOString().slice(0, 19).replace('T', ' ');
}

export async function listAssets(skip: number, limit: number): Promise<AssetList> {
  const coins = await fetchMarkets({ perPage: MARKETS_PAGE_SIZE, page: 1 });
  return {
    total: coins.length,
    items: coins.slice(skip, skip + limit).map(toAssetSummary),
  };
}

export async function findMarketCoin(cryptoId: string): Promise<MarketCoin | undefined> {
  const [coin] = await fetchMarkets({ ids: [cryptoId] });
  return coin;
}

export async function getAssetMarketData(cryptoId: string): Promise<AssetMarketData> {
  const coin = await findMarketCoin(cryptoId);
  if (!coin) throw new HttpError(404, notFoundMessage(cryptoId));
  return toAssetMarketData(coin);
}

export async function getAssetDetails(cryptoId: string): Promise<AssetDetails> {
  return toAssetDetails(await fetchCoin(cryptoId));
}

export async function getExchangeListings(cryptoId: string): Promise<ExchangeListing[]> {
  const coin = await fetchCoin(cryptoId);
  if (!coin.tickers.length) {
    throw new HttpError(404, 'exchange data not available for this cryptocurrency');
  }
  return coin.tickers.map((ticker) => ({
    exchangeName: ticker.market.name,
    base: ticker.base,
    target: ticker.target,
    tradeUrl: ticker.trade_url,
  }));
}

export async function getAverageVolume(cryptoId: string): Promise<AverageVolume> {
  const chart = await fetchMarketChart(cryptoId, AVERAGE_VOLUME_DAYS);
  const volumes = chart.total_volumes.map(([, volume]) => volume);
  if (!volumes.length) {
    throw new HttpError(404, `volume data not available for '${cryptoId}'`);
  }
  return {
    cryptoId,
    averageVolume30Days: roundTo(sliceMean(volumes), 2),
  };
}

export async function getHistoricalPrices(
  cryptoId: string,
  days: number = DEFAULT_HISTORY_DAYS,
): Promise<HistoricalSeries> {
  const chart = await fetchMarketChart(cryptoId, days);
  const priceData = chart.prices
    .map(([ts, price]) => ({ timestamp: formatTimestamp(ts), price: roundTo(price, 2) }))
    .reverse();
  return { cryptoId, days, priceData };
}
