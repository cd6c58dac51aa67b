import type { BarSignal, IndicatorSeries } from "../indicators/types";
import { crossedAbove, crossedBelow } from "./crossover";
import { at } from "./at";

export type BarSignalParams = {
  oversold?: number; // default 30
  overbought?: number; // default 70
  /** tighter than the consolidator's 1.05 / 0.95 band (default 1.01) */
  nearLower?: number;
  nearUpper?: number; // default 0.99
};

/**
 * Per-bar signal column: 1 buy, -1 sell, 0 nothing. Rules run in order and
 * a later rule overwrites an earlier one on the same bar.
 */
export function computeBarSignals(
  indicators: IndicatorSeries,
  { oversold = 30, overbought = 70, nearLower = 1.01, nearUpper = 0.99 }: BarSignalParams = {},
): BarSignal[] {
  const { values, close } = indicators;
  const out: BarSignal[] = [];

  for (let i = 0; i < indicators.length; i++) {
    let s: BarSignal = 0;

    const rsi = at(values.RSI, i);
    if (rsi != null && rsi < oversold) s = 1;
    if (rsi != null && rsi > overbought) s = -1;

    if (crossedAbove(values.MACD, values.MACD_signal, i)) s = 1;
    if (crossedBelow(values.MACD, values.MACD_signal, i)) s = -1;

    const lower = at(values.BB_lower, i);
    const upper = at(values.BB_upper, i);
    if (lower != null && close[i] < lower * nearLower) s = 1;
    if (upper != null && close[i] > upper * nearUpper) s = -1;

    if (crossedAbove(values.SMA_50, values.SMA_200, i)) s = 1;
    if (crossedBelow(values.SMA_50, values.SMA_200, i)) s = -1;

    out.push(s);
  }
  return out;
}
