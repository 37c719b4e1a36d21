// indicators/rsi.ts

/**
 * 窗口 RSI：只看 index 往前 period 个涨跌（含 index 本身）。
 * 每次都重新累加，不做 Wilder 平滑。
 *
 * - 历史不足（index < period）时返回中性值 50
 * - 窗口里没有下跌时返回 100
 */
export function rsi(
  closes: readonly number[],
  index: number,
  period = 14
): number {
  if (index < period) return 50;

  let gain = 0;
  let loss = 0;

  for (let i = index - period + 1; i <= index; i++) {
    // Safe: index >= period, so i - 1 >= 0
    const diff = closes[i]! - closes[i - 1]!;
    if (diff > 0) gain += diff;
    else loss -= diff;
  }

  if (loss === 0) return 100;

  const rs = gain / loss;
  return 100 - 100 / (1 + rs);
}
