export type PositionSide = 'long' | 'short';

export interface ProfitLossInput {
  currentPrice: number;
  purchasePrice: number;
  amount: number;
  operation: PositionSide;
}

export interface ProfitLossOutcome {
  profitLossStatus: 'profit' | 'loss';
  profitLossValue: number;
  profitLossPercentage: number;
}

export interface ProfitLossResult extends ProfitLossOutcome {
  cryptoName: string;
  operation: PositionSide;
  amount: number;
  purchasePrice: number;
  currentPrice: number;
}
