import type { StrategyResult } from "../types/candle.js";
import type { SimulationState } from "./simulator.js";

/**
 * 把计数器汇总成胜率 / 平均收益（百分比）
 */
export function aggregateResult(
  state: Pick<SimulationState, "trades" | "wins" | "totalReturn">
): StrategyResult {
  const { trades, wins, totalReturn } = state;

  const successRate = trades > 0 ? (wins / trades) * 100 : 0;
  const avgReturnPct = trades > 0 ? (totalReturn / trades) * 100 : 0;

  return {
    successRate,
    avgReturnPct,
    tradeCount: trades,
    tradeDetails: [],
  };
}
