/**
 * 简单均线：最近 period 根的算术平均。
 * 历史不足时直接返回当前价格。
 */
export function sma(
  values: readonly number[],
  index: number,
  period: number
): number {
  // Safe: index is a position inside values
  if (index < period) return values[index]!;

  let sum = 0;
  for (let i = index - period + 1; i <= index; i++) {
    sum += values[i]!;
  }
  return sum / period;
}
