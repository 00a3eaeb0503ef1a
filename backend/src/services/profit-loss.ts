import { HttpError } from '../util/http-error.js';
import { roundTo } from './indicators.js';
import { getAssetMarketData } from './market-data.js';
import type {
  PositionSide,
  ProfitLossInput,
  ProfitLossOutcome,
  ProfitLossResult,
} from './profit-loss.types.js';

export function calculateProfitLoss({
  currentPrice,
  purchasePrice,
  amount,
  operation,
}: ProfitLossInput): ProfitLossOutcome {
  let delta = (currentPrice - purchasePrice) * amount;
  if (operation === 'short') delta = -delta;
  const costBasis = purchasePrice * amount;
  return {
    profitLossStatus: delta >= 0 ? 'profit' : 'loss',
    profitLossValue: roundTo(Math.abs(delta), 2),
    profitLossPercentage: costBasis > 0 ? roundTo((delta / costBasis) * 100, 2) : 0,
  };
}

export async function evaluatePosition(params: {
  cryptoName: string;
  amount: number;
  purchasePrice: number;
  operation: PositionSide;
}): Promise<ProfitLossResult> {
  const asset = await getAssetMarketData(params.cryptoName);
  if (asset.currentPrice === null) {
    throw new HttpError(404, `current price not available for '${params.cryptoName}'`);
  }
  return {
    ...params,
    currentPrice: asset.currentPrice,
    ...calculateProfitLoss({ ...params, currentPrice: asset.currentPrice }),
  };
}
