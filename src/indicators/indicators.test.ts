import { describe, it, expect } from "vitest";
import { rsi } from "./rsi.js";
import { ema } from "./ema.js";
import { macd } from "./macd.js";
import { sma } from "./sma.js";

// 固定种子的伪随机序列，用来检查边界性质
function randomWalk(length: number, seed = 7): number[] {
  let state = seed;
  let price = 100;
  const out: number[] = [];
  for (let i = 0; i < length; i++) {
    state = (state * 1103515245 + 12345) % 2147483648;
    price += (state / 2147483648 - 0.5) * 6;
    out.push(price);
  }
  return out;
}

describe("rsi", () => {
  it("returns 50 while index < period", () => {
    const closes = [10, 9, 8, 7, 6];
    expect(rsi(closes, 0)).toBe(50);
    expect(rsi(closes, 4)).toBe(50);
    expect(rsi(closes, 3, 4)).toBe(50);
  });

  it("returns 100 when the window has no losses", () => {
    const closes = [1, 2, 2, 3, 5, 5, 8];
    expect(rsi(closes, 6, 6)).toBe(100);
    expect(rsi([4, 4, 4, 4], 3, 3)).toBe(100);
  });

  it("returns 0 when every change is a loss", () => {
    expect(rsi([5, 4, 3, 2], 3, 3)).toBe(0);
  });

  it("computes 100 - 100 / (1 + gain / loss) over the trailing window", () => {
    // diffs: +2, -1 -> rs = 2
    expect(rsi([10, 12, 11], 2, 2)).toBeCloseTo(200 / 3, 10);
  });

  it("only reads the last period changes", () => {
    // 第一根的大跌在窗口外
    expect(rsi([100, 10, 12, 11], 3, 2)).toBeCloseTo(200 / 3, 10);
  });

  it("stays within [0, 100]", () => {
    const closes = randomWalk(200);
    for (let i = 0; i < closes.length; i++) {
      const value = rsi(closes, i);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(100);
    }
  });
});

describe("ema", () => {
  it("seeds with the oldest value in the window and folds forward", () => {
    // k = 0.5: 1 -> 1.5 -> 2.25
    expect(ema([1, 2, 3], 2, 3)).toBe(2.25);
  });

  it("re-seeds on every call instead of carrying earlier history", () => {
    expect(ema([100, 1, 2, 3], 3, 3)).toBe(2.25);
  });

  it("returns the current value for length 1", () => {
    expect(ema([4, 7, 9], 2, 1)).toBe(9);
  });
});

describe("macd", () => {
  it("is the difference of the 12 and 26 bar windowed EMAs", () => {
    const closes = randomWalk(60);
    expect(macd(closes, 40)).toBe(ema(closes, 40, 12) - ema(closes, 40, 26));
  });

  it("is zero for a flat series", () => {
    const closes = new Array<number>(30).fill(100);
    expect(macd(closes, 29)).toBeCloseTo(0, 10);
  });

  it("is positive after a jump", () => {
    const closes = [...new Array<number>(20).fill(100), ...new Array<number>(10).fill(200)];
    expect(macd(closes, 29)).toBeGreaterThan(0);
  });
});

describe("sma", () => {
  it("returns the current value while index < period", () => {
    const values = [3, 6, 9];
    expect(sma(values, 0, 2)).toBe(3);
    expect(sma(values, 1, 2)).toBe(6);
    expect(sma(values, 2, 20)).toBe(9);
  });

  it("averages exactly period trailing values", () => {
    const values = [1, 2, 3, 4, 5];
    expect(sma(values, 4, 3)).toBe(4);
    expect(sma(values, 3, 3)).toBe(3);
  });

  it("matches a direct mean on a longer series", () => {
    const values = randomWalk(50);
    const window = values.slice(30, 50);
    const mean = window.reduce((a, b) => a + b, 0) / 20;
    expect(sma(values, 49, 20)).toBeCloseTo(mean, 10);
  });
});
