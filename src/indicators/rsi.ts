import { InsufficientDataError, InvalidConfigError } from '../errors.js';
import type { CandleSeries } from '../types/index.js';

/**
 * RSI (Relative Strength Index): 단순 이동평균 (Wilder 스무딩 아님)
 * 마지막 period개 변화량의 평균 상승/하락폭으로 계산.
 * RSI = 100 - 100/(1 + RS), RS = avgGain / avgLoss
 */
export function computeRsi(closes: CandleSeries, period: number): number {
  if (!Number.isInteger(period) || period < 1) {
    throw new InvalidConfigError([`indicatorPeriod must be a positive integer, got ${period}`]);
  }
  if (closes.length < period + 1) {
    throw new InsufficientDataError(period + 1, closes.length);
  }

  let gainSum = 0;
  let lossSum = 0;
  for (let i = closes.length - period; i < closes.length; i++) {
    const prev = closes[i - 1];
    const cur = closes[i];
    if (prev === undefined || cur === undefined) continue;
    const delta = cur - prev;
    if (delta > 0) gainSum += delta;
    else if (delta < 0) lossSum -= delta;
  }

  const avgGain = gainSum / period;
  const avgLoss = lossSum / period;
  // 하락 없음 (단조 증가·횡보 포함) → 상한 100
  if (avgLoss === 0) return 100;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}
