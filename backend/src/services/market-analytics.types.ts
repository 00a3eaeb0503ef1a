export interface CorrelationResult {
  cryptoId: string;
  days: number;
  samples: number;
  correlationWithBtc: number | null;
  correlationWithEth: number | null;
}

export interface VolatilityResult {
  cryptoId: string;
  days: number;
  volatility: number;
}

export type SentimentLabel = 'positive' | 'neutral' | 'negative';

export interface SocialSentiment {
  cryptoId: string;
  sentiment: SentimentLabel;
  sentimentScore: number;
  votesUpPercentage: number;
  votesDownPercentage: number;
}
