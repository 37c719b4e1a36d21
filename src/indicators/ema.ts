/**
 * 窗口EMA：以窗口内最旧的价格为种子，向前滚动到 index。
 *
 * 注意每次调用都会重新播种，不是从序列开头一直延续下来的 EMA，
 * 所以同一个 index 的结果只取决于最近 length 根K线。
 *
 * 调用方必须保证 index - length + 1 >= 0（MACD 靠 26 根暖机保证）。
 */
export function ema(
  values: readonly number[],
  index: number,
  length: number
): number {
  const k = 2 / (length + 1);
  const start = index - length + 1;

  // Safe: caller guarantees start >= 0
  let prev = values[start]!;
  for (let i = start + 1; i <= index; i++) {
    // Safe: start < i <= index
    prev = values[i]! * k + prev * (1 - k);
  }
  return prev;
}
