// src/data/candles.ts
import fs from "node:fs";
import path from "node:path";
import type { Candle } from "../types/candle.js";
import type { BacktestConfig } from "../config.js";
import { fetchDailyCandles } from "../exchange/binance.js";

function readField(
  values: Record<string, unknown>,
  field: keyof Candle,
  i: number
): number {
  const v = values[field];
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new Error(`第 ${i} 根K线的 ${field} 不是有效数字`);
  }
  return v;
}

function toCandle(row: unknown, i: number): Candle {
  if (typeof row !== "object" || row === null || Array.isArray(row)) {
    throw new Error(`第 ${i} 根K线不是对象`);
  }
  const values: Record<string, unknown> = { ...row };
  return {
    openTime: readField(values, "openTime", i),
    open: readField(values, "open", i),
    high: readField(values, "high", i),
    low: readField(values, "low", i),
    close: readField(values, "close", i),
    volume: readField(values, "volume", i),
    closeTime: readField(values, "closeTime", i),
  };
}

/**
 * 校验本地快照里的K线数组，并确认时间是升序
 */
export function parseCandles(raw: unknown): Candle[] {
  if (!Array.isArray(raw)) {
    throw new Error("K线文件必须是数组");
  }
  const candles = raw.map((row, i) => toCandle(row, i));

  for (let i = 1; i < candles.length; i++) {
    // Safe: i and i - 1 are in bounds
    if (candles[i]!.openTime <= candles[i - 1]!.openTime) {
      throw new Error(`第 ${i} 根K线时间没有按从旧到新排序`);
    }
  }
  return candles;
}

export function loadCandlesFile(relPath: string): Candle[] {
  const full = path.resolve(relPath);
  const raw = fs.readFileSync(full, "utf8");
  return parseCandles(JSON.parse(raw));
}

export function saveCandlesFile(relPath: string, candles: Candle[]): string {
  const full = path.resolve(relPath);
  const dir = path.dirname(full);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(full, JSON.stringify(candles, null, 2), "utf8");
  return full;
}

/**
 * 本地快照存在就直接读，否则从 Binance 拉
 */
export async function getCandles(
  config: Pick<BacktestConfig, "symbol" | "candlesLimit" | "candlesFile">
): Promise<Candle[]> {
  if (config.candlesFile && fs.existsSync(path.resolve(config.candlesFile))) {
    console.log(`从本地 ${config.candlesFile} 读取 ${config.symbol} 日线...`);
    return loadCandlesFile(config.candlesFile);
  }

  if (config.candlesFile) {
    console.warn(`本地文件 ${config.candlesFile} 不存在，改为从 Binance 拉取。`);
  }
  console.log(`从 Binance 拉取 ${config.symbol} 日线 ${config.candlesLimit} 根...`);
  return fetchDailyCandles(config.symbol, config.candlesLimit);
}
