// src/index-backtest.ts
import "dotenv/config";
import type { Candle } from "./types/candle.js";
import { loadConfig } from "./config.js";
import { getCandles } from "./data/candles.js";
import {
  printStrategyResult,
  runRsiMacdStrategy,
} from "./backtest/engine.js";
import {
  WARMUP_BARS,
  type TransitionEvent,
} from "./backtest/simulator.js";

function formatTime(candles: Candle[], index: number): string {
  const c = candles[index];
  return c ? new Date(c.closeTime).toISOString().slice(0, 10) : `#${index}`;
}

function logTransition(candles: Candle[], event: TransitionEvent): void {
  if (event.type === "ENTRY") {
    console.log(
      `[开多] ${formatTime(candles, event.index)} 价格=${event.price}` +
        ` RSI=${event.rsi.toFixed(2)} MACD=${event.macd.toFixed(4)}` +
        ` SMA20=${event.sma20.toFixed(2)}`
    );
    return;
  }

  const { trade } = event;
  console.log(
    `[平仓:${trade.exitReason}] ${formatTime(candles, trade.exitIndex)}` +
      ` ${trade.entryPrice} -> ${trade.exitPrice}` +
      ` 收益=${(trade.returnPct * 100).toFixed(2)}%`
  );
}

async function main() {
  const config = await loadConfig();
  console.log(JSON.stringify(config, null, 2));

  const candles = await getCandles(config);

  if (candles.length <= WARMUP_BARS) {
    console.warn(`K 线太少（${candles.length} 根），至少需要 ${WARMUP_BARS + 1} 根才会产生信号。`);
  }

  const result = runRsiMacdStrategy(
    candles,
    config.profitThreshold,
    config.verbose
      ? { onTransition: (event) => logTransition(candles, event) }
      : {}
  );

  printStrategyResult(result, candles.length);
}

main().catch((err) => {
  console.error("回测运行出错:", err);
  process.exit(1);
});
