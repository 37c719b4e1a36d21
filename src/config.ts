import path from "node:path";
import { readFile } from "node:fs/promises";

// === 配置类型定义 ===

export interface BacktestConfig {
  symbol: string;
  candlesLimit: number;     // 拉多少根日线
  candlesFile?: string;     // 本地K线快照，存在就不走网络
  profitThreshold: number;  // 收益超过多少算成功（0.01 = 1%）
  verbose: boolean;         // 是否打印每笔开平仓
}

const DEFAULT_SYMBOL = "BTCUSDT";
const DEFAULT_CANDLES_LIMIT = 1000;

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// 未设置或只有空白都当作没填
function isBlank(value: unknown): boolean {
  return value === undefined || (typeof value === "string" && value.trim() === "");
}

function readNumber(field: string, value: unknown): number | undefined {
  if (isBlank(value)) return undefined;
  const n = typeof value === "string" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isFinite(n)) {
    throw new Error(`配置 ${field} 不是有效数字: ${String(value)}`);
  }
  return n;
}

function readString(field: string, value: unknown): string | undefined {
  if (isBlank(value)) return undefined;
  if (typeof value !== "string") {
    throw new Error(`配置 ${field} 必须是字符串`);
  }
  return value;
}

function readBoolean(field: string, value: unknown): boolean | undefined {
  if (isBlank(value)) return undefined;
  if (typeof value === "boolean") return value;
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false") return false;
  throw new Error(`配置 ${field} 必须是布尔值`);
}

/**
 * 校验 config.json 的内容，环境变量优先
 */
export function parseConfig(raw: unknown, env: Env = process.env): BacktestConfig {
  if (!isRecord(raw)) {
    throw new Error("config.json 必须是一个对象");
  }

  const symbol =
    readString("SYMBOL", env.SYMBOL) ??
    readString("symbol", raw.symbol) ??
    DEFAULT_SYMBOL;

  const candlesLimit =
    readNumber("CANDLES_LIMIT", env.CANDLES_LIMIT) ??
    readNumber("candlesLimit", raw.candlesLimit) ??
    DEFAULT_CANDLES_LIMIT;
  if (!Number.isInteger(candlesLimit) || candlesLimit <= 0) {
    throw new Error(`配置 candlesLimit 必须是正整数: ${candlesLimit}`);
  }

  const profitThreshold =
    readNumber("PROFIT_THRESHOLD", env.PROFIT_THRESHOLD) ??
    readNumber("profitThreshold", raw.profitThreshold);
  if (profitThreshold === undefined) {
    throw new Error("config.json 缺少 profitThreshold 配置");
  }

  const candlesFile =
    readString("CANDLES_FILE", env.CANDLES_FILE) ??
    readString("candlesFile", raw.candlesFile);

  const verbose =
    readBoolean("BACKTEST_VERBOSE", env.BACKTEST_VERBOSE) ??
    readBoolean("verbose", raw.verbose) ??
    false;

  return {
    symbol,
    candlesLimit,
    ...(candlesFile !== undefined && { candlesFile }),
    profitThreshold,
    verbose,
  };
}

// === 从 JSON 读取配置 ===

export async function loadConfig(
  configPath = process.env.BACKTEST_CONFIG ?? "./config.json",
  env: Env = process.env
): Promise<BacktestConfig> {
  const absPath = path.resolve(configPath);
  const raw = await readFile(absPath, "utf-8");
  return parseConfig(JSON.parse(raw), env);
}
