import type { CloseOnly, StrategyResult } from "../types/candle.js";
import { simulate, type SimulationOptions } from "./simulator.js";
import { aggregateResult } from "./result.js";

/**
 * RSI + MACD + SMA 日线策略回测
 *
 * @param profitThreshold - 收益超过多少算“成功”（小数，0.01 = 1%）
 */
export function runRsiMacdStrategy(
  candles: readonly CloseOnly[],
  profitThreshold: number,
  options: SimulationOptions = {}
): StrategyResult {
  const closes = candles.map((c) => c.close);
  const state = simulate(closes, profitThreshold, options);
  return aggregateResult(state);
}

/**
 * 打印结果
 */
export function printStrategyResult(
  result: StrategyResult,
  candleCount: number
): void {
  console.log("=== RSI + MACD + SMA 日线策略回测 ===");
  console.log("K线数量:", candleCount);
  console.log("交易笔数:", result.tradeCount);
  console.log("成功率:", result.successRate.toFixed(2), "%");
  console.log("平均每笔收益:", result.avgReturnPct.toFixed(2), "%");
}
