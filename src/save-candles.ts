// src/save-candles.ts
import "dotenv/config";
import { loadConfig } from "./config.js";
import { fetchDailyCandles } from "./exchange/binance.js";
import { saveCandlesFile } from "./data/candles.js";

async function main() {
  const config = await loadConfig();
  const file =
    config.candlesFile ?? `./data/${config.symbol.toLowerCase()}-1d.json`;

  console.log(`从 Binance 拉 ${config.symbol} 历史日线并保存为本地样本...`);

  const candles = await fetchDailyCandles(config.symbol, config.candlesLimit);
  console.log(`1D K 线数量: ${candles.length}`);

  const written = saveCandlesFile(file, candles);
  console.log("✅ 已写入:", written);
}

main().catch((err) => {
  console.error("保存 K 线出错:", err);
  process.exit(1);
});
