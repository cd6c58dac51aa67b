import type { Bar, IndicatorName, IndicatorSeries, Line, PriceSeries } from "../indicators/types";
import { createPriceSeries } from "../price-series";

export const T0 = Date.UTC(2024, 0, 1);
export const MINUTE = 60_000;

export function makeBars(closes: readonly number[], volumes?: readonly number[]): Bar[] {
  return closes.map((close, i) => ({
    timestamp: T0 + i * MINUTE,
    open: close,
    high: close,
    low: close,
    close,
    volume: volumes?.[i] ?? 1000,
  }));
}

export function makeSeries(
  closes: readonly number[],
  volumes?: readonly number[],
  symbol = "TEST",
): PriceSeries {
  return createPriceSeries(symbol, makeBars(closes, volumes));
}

export function flatCloses(n: number, price = 100): number[] {
  return Array.from({ length: n }, () => price);
}

/** Each close 0.5% above the previous one. */
export function strictUptrend(n: number): number[] {
  const out = [100];
  for (let i = 1; i < n; i++) out.push(out[i - 1] * 1.005);
  return out;
}

/** +1% on odd bars, -0.6% on even bars: rising, with real down moves. */
export function zigzagUptrend(n: number): number[] {
  const out = [100];
  for (let i = 1; i < n; i++) out.push(out[i - 1] * (i % 2 === 1 ? 1.01 : 0.994));
  return out;
}

type Lines = Partial<Record<IndicatorName, Line>>;

/** Hand-built indicator series; unspecified lines are all warm-up. */
export function makeIndicators({
  close,
  volume,
  values = {},
}: {
  close: readonly number[];
  volume?: readonly number[];
  values?: Lines;
}): IndicatorSeries {
  const length = close.length;
  const empty = (): Line => Array<number | null>(length).fill(null);
  return {
    symbol: "TEST",
    length,
    timestamps: close.map((_, i) => T0 + i * MINUTE),
    close,
    volume: volume ?? close.map(() => 1000),
    values: {
      RSI: values.RSI ?? empty(),
      MACD: values.MACD ?? empty(),
      MACD_signal: values.MACD_signal ?? empty(),
      MACD_hist: values.MACD_hist ?? empty(),
      BB_upper: values.BB_upper ?? empty(),
      BB_middle: values.BB_middle ?? empty(),
      BB_lower: values.BB_lower ?? empty(),
      SMA_50: values.SMA_50 ?? empty(),
      SMA_200: values.SMA_200 ?? empty(),
      EMA_20: values.EMA_20 ?? empty(),
      EMA_50: values.EMA_50 ?? empty(),
    },
  };
}
