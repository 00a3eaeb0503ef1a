export interface AssetSummary {
  id: string;
  symbol: string;
  name: string;
  currentPrice: number | null;
}

export interface AssetMarketData extends AssetSummary {
  marketCap: number | null;
  volume24h: number | null;
  priceChangePercentage24h: number | null;
  low24h: number | null;
  high24h: number | null;
}

export interface AssetList {
  total: number;
  items: AssetSummary[];
}

export interface AssetLinks {
  homepage: string | null;
  twitter: string | null;
  reddit: string | null;
}

export interface AssetDetails {
  id: string;
  name: string;
  symbol: string;
  description: string;
  circulatingSupply: number | null;
  totalSupply: number | null;
  marketCap: number | null;
  currentPrice: number | null;
  ath: number | null;
  athDate: string | null;
  atl: number | null;
  atlDate: string | null;
  links: AssetLinks;
}

export interface ExchangeListing {
  exchangeName: string;
  base: string;
  target: string;
  tradeUrl: string | null;
}

export interface AverageVolume {
  cryptoId: string;
  averageVolume30Days: number;
}

export interface PricePoint {
  timestamp: string;
  price: number;
}

export interface HistoricalSeries {
  cryptoId: string;
  days: number;
  priceData: PricePoint[];
}
