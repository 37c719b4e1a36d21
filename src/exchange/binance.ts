import axios from "axios";
import type { Candle } from "../types/candle.js";

// 允许你以后改成镜像域名
const BINANCE_BASE_URL =
  process.env.BINANCE_BASE_URL ?? "https://api.binance.com";

const PAGE_LIMIT = 1000; // Binance 最大 1000

function toNumber(value: unknown, what: string): number {
  const n = typeof value === "string" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isFinite(n)) {
    throw new Error(`Binance kline ${what} 不是有效数字: ${String(value)}`);
  }
  return n;
}

/**
 * Binance kline 行：[openTime, open, high, low, close, volume, closeTime, ...]
 */
export function parseKline(row: unknown): Candle {
  if (!Array.isArray(row) || row.length < 7) {
    throw new Error("Binance kline unexpected: " + JSON.stringify(row));
  }
  return {
    openTime: toNumber(row[0], "openTime"),
    open: toNumber(row[1], "open"),
    high: toNumber(row[2], "high"),
    low: toNumber(row[3], "low"),
    close: toNumber(row[4], "close"),
    volume: toNumber(row[5], "volume"),
    closeTime: toNumber(row[6], "closeTime"),
  };
}

/**
 * 通用函数：按指定 interval 往回翻页拉 K 线，返回从旧到新
 */
export async function fetchCandles(
  symbol: string,
  interval: string,
  total: number
): Promise<Candle[]> {
  let candles: Candle[] = [];
  let endTime = Date.now();

  while (candles.length < total) {
    const need = total - candles.length;
    const reqLimit = Math.min(need, PAGE_LIMIT);

    const url =
      `${BINANCE_BASE_URL}/api/v3/klines` +
      `?symbol=${symbol}&interval=${interval}&endTime=${endTime}&limit=${reqLimit}`;

    const res = await axios.get<unknown>(url);
    const batch = res.data;

    if (!Array.isArray(batch)) {
      throw new Error("Binance klines unexpected: " + JSON.stringify(batch));
    }
    if (batch.length === 0) break;

    const parsed = batch.map((row: unknown) => parseKline(row));

    // 新批次放前面（因为是从最近往前拉的）
    candles = [...parsed, ...candles];

    // 不满一页说明已经到最早的数据了
    if (parsed.length < reqLimit) break;

    // 下一次请求往更旧的时间点挪动
    const oldest = parsed[0];
    if (!oldest) break;

    endTime = oldest.openTime - 1;

    // 轻微延迟，避免 API rate limit
    await new Promise((r) => setTimeout(r, 150));
  }

  return candles;
}

/**
 * 拉取 日线 1D K 线
 */
export async function fetchDailyCandles(
  symbol: string,
  total: number
): Promise<Candle[]> {
  return fetchCandles(symbol, "1d", total);
}
