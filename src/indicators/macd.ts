import { ema } from "./ema.js";

export const MACD_FAST = 12;
export const MACD_SLOW = 26;

/**
 * MACD = EMA(12) - EMA(26)，不做越界检查，index 至少要 25
 */
export function macd(closes: readonly number[], index: number): number {
  return ema(closes, index, MACD_FAST) - ema(closes, index, MACD_SLOW);
}
