// Pure series maths shared by the signal and analytics services.

export function sliceMean(arr: number[]): number {
  if (!arr.length) return 0;
  return arr.reduce((sum, value) => sum + value, 0) / arr.length;
}

export function roundTo(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Exponentially weighted average of the trailing `window` prices. The k-th
 * most recent price (k = 0 is the latest) is weighted `exp(-k / (window - 1))`
 * and weights are normalised over the points actually available.
 */
export function calcExpWeightedAverage(prices: number[], window: number): number {
  if (!prices.length || window < 1) return 0;
  const span = Math.min(window, prices.length);
  let weighted = 0;
  let totalWeight = 0;
  for (let k = 0; k < span; k++) {
    const weight = window === 1 ? 1 : Math.exp(-k / (window - 1));
    weighted += prices[prices.length - 1 - k] * weight;
    totalWeight += weight;
  }
  return weighted / totalWeight;
}

/** Pearson correlation on the trailing common length; null when undefined. */
export function calcCorrelation(a: number[], b: number[]): number | null {
  const n = Math.min(a.length, b.length);
  if (n < 2) return null;
  const xs = a.slice(a.length - n);
  const ys = b.slice(b.length - n);
  const meanX = sliceMean(xs);
  const meanY = sliceMean(ys);
  let num = 0;
  let denX = 0;
  let denY = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - meanX;
    const dy = ys[i] - meanY;
    num += dx * dy;
    denX += dx * dx;
    denY += dy * dy;
  }
  if (denX === 0 || denY === 0) return null;
  return num / Math.sqrt(denX * denY);
}

export function logReturns(closes: number[]): number[] {
  const res: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const prev = closes[i - 1];
    const current = closes[i];
    if (prev === 0) res.push(0);
    else res.push(Math.log(current / prev));
  }
  return res;
}

export function stddev(values: number[]): number {
  if (!values.length) return 0;
  const mean = sliceMean(values);
  const variance = sliceMean(values.map((v) => (v - mean) ** 2));
  return Math.sqrt(variance);
}

export const TRADING_DAYS_PER_YEAR = 252;

export function annualizedVolatility(prices: number[]): number {
  return stddev(logReturns(prices)) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}
