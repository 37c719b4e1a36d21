import type { ExitReason, Trade } from "../types/candle.js";
import { rsi } from "../indicators/rsi.js";
import { macd, MACD_SLOW } from "../indicators/macd.js";
import { sma } from "../indicators/sma.js";

// 26 根暖机：最长的 EMA 需要的历史
export const WARMUP_BARS = MACD_SLOW;
export const SMA_PERIOD = 20;
export const ENTRY_RSI_BELOW = 30;
export const EXIT_RSI_ABOVE = 60;

/**
 * 仓位状态：空仓 / 持多
 */
export type PositionState =
  | { kind: "FLAT" }
  | { kind: "LONG"; entryPrice: number; entryIndex: number };

export interface SimulationState {
  position: PositionState;
  entries: number;
  trades: number;
  wins: number;
  totalReturn: number; // 每笔收益（小数）简单相加
}

export interface EntryEvent {
  type: "ENTRY";
  index: number;
  price: number;
  rsi: number;
  macd: number;
  sma20: number;
}

export interface ExitEvent {
  type: "EXIT";
  trade: Trade;
}

export type TransitionEvent = EntryEvent | ExitEvent;

export interface SimulationOptions {
  /** 每次开仓 / 平仓时回调，只用来观察，不影响回测 */
  onTransition?: (event: TransitionEvent) => void;
}

export function createSimulationState(): SimulationState {
  return {
    position: { kind: "FLAT" },
    entries: 0,
    trades: 0,
    wins: 0,
    totalReturn: 0,
  };
}

function openPosition(
  state: SimulationState,
  event: EntryEvent
): SimulationState {
  return {
    ...state,
    position: { kind: "LONG", entryPrice: event.price, entryIndex: event.index },
    entries: state.entries + 1,
  };
}

function closePosition(
  state: SimulationState,
  exitIndex: number,
  exitPrice: number,
  exitReason: ExitReason,
  profitThreshold: number
): { state: SimulationState; trade: Trade | null } {
  const { position } = state;
  if (position.kind !== "LONG") {
    return { state, trade: null };
  }

  const ret = (exitPrice - position.entryPrice) / position.entryPrice;
  const trade: Trade = {
    entryIndex: position.entryIndex,
    exitIndex,
    entryPrice: position.entryPrice,
    exitPrice,
    returnPct: ret,
    exitReason,
  };

  return {
    state: {
      ...state,
      position: { kind: "FLAT" },
      trades: state.trades + 1,
      wins: ret > profitThreshold ? state.wins + 1 : state.wins,
      totalReturn: state.totalReturn + ret,
    },
    trade,
  };
}

/**
 * 单根K线的决策：空仓只看开仓条件，持仓只看平仓条件
 */
export function stepSimulation(
  state: SimulationState,
  closes: readonly number[],
  index: number,
  profitThreshold: number,
  options: SimulationOptions = {}
): SimulationState {
  // Safe: index comes from the scan over closes
  const price = closes[index]!;
  const r = rsi(closes, index);
  const m = macd(closes, index);
  const sma20 = sma(closes, index, SMA_PERIOD);

  if (state.position.kind === "FLAT") {
    // 超卖 + MACD 为正 + 站上 20 日线
    if (r < ENTRY_RSI_BELOW && m > 0 && price > sma20) {
      const event: EntryEvent = {
        type: "ENTRY",
        index,
        price,
        rsi: r,
        macd: m,
        sma20,
      };
      options.onTransition?.(event);
      return openPosition(state, event);
    }
    return state;
  }

  // 持仓：RSI 过 60 止盈，或跌破 20 日线
  const rsiExit = r > EXIT_RSI_ABOVE;
  if (rsiExit || price < sma20) {
    const closed = closePosition(
      state,
      index,
      price,
      rsiExit ? "RSI" : "SMA",
      profitThreshold
    );
    if (closed.trade) {
      options.onTransition?.({ type: "EXIT", trade: closed.trade });
    }
    return closed.state;
  }

  return state;
}

/**
 * 从第 26 根开始顺序扫描，结束时还持仓就按最后收盘价强制平仓
 */
export function simulate(
  closes: readonly number[],
  profitThreshold: number,
  options: SimulationOptions = {}
): SimulationState {
  let state = createSimulationState();

  for (let i = WARMUP_BARS; i < closes.length; i++) {
    state = stepSimulation(state, closes, i, profitThreshold, options);
  }

  // 最后一笔强制平仓
  if (state.position.kind === "LONG") {
    const lastIndex = closes.length - 1;
    // Safe: a position can only be open if closes is non-empty
    const closed = closePosition(
      state,
      lastIndex,
      closes[lastIndex]!,
      "FORCED",
      profitThreshold
    );
    if (closed.trade) {
      options.onTransition?.({ type: "EXIT", trade: closed.trade });
    }
    state = closed.state;
  }

  return state;
}
