/**
 * 一根K线的数据结构（日线）
 */
export interface Candle {
  openTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  closeTime: number;
}

/**
 * 策略核心只用收盘价
 */
export type CloseOnly = Pick<Candle, "close">;

export type ExitReason = "RSI" | "SMA" | "FORCED";

/**
 * 一笔交易的记录（index 是价格序列里的位置）
 */
export interface Trade {
  entryIndex: number;
  exitIndex: number;
  entryPrice: number;
  exitPrice: number;
  returnPct: number; // 小数形式，0.01 = 1%
  exitReason: ExitReason;
}

/**
 * 策略汇总结果
 */
export interface StrategyResult {
  successRate: number;   // 收益超过阈值的交易占比（%）
  avgReturnPct: number;  // 平均每笔收益（%，可为负）
  tradeCount: number;
  tradeDetails: Trade[]; // 目前始终为空，只保留结构
}
