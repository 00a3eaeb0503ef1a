export type SignalHorizon = 'short-term' | 'long-term';

export type SignalDirection = 'long' | 'short';

export interface TrendSignal {
  cryptoId: string;
  horizon: SignalHorizon;
  signal: SignalDirection;
  position: string;
  window: number;
  currentPrice: number;
  ema: number;
}
