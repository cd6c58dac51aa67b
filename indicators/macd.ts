import { crossedAbove, crossedBelow } from "../utils/crossover";
import { ema } from "../utils/ewm";
import { at } from "../utils/at";
import type { IIndicatorVote, IndicatorSeries, Line } from "./types";

export type MacdParams = {
  closes: readonly number[];
  fastPeriod?: number; // default 12
  slowPeriod?: number; // default 26
  signalPeriod?: number; // default 9
};

export type MacdLines = { macd: Line; signal: Line; hist: Line };

export class MACDIndicator {
  static calculate({
    closes,
    fastPeriod = 12,
    slowPeriod = 26,
    signalPeriod = 9,
  }: MacdParams): MacdLines {
    const fast = ema(closes, fastPeriod);
    const slow = ema(closes, slowPeriod);
    const macd = fast.map((f, i) => f - slow[i]);
    const signal = ema(macd, signalPeriod);
    const hist = macd.map((m, i) => m - signal[i]);
    return { macd, signal, hist };
  }

  static vote(indicators: IndicatorSeries, i: number): IIndicatorVote | null {
    const { MACD, MACD_signal, MACD_hist } = indicators.values;
    const macd = at(MACD, i);
    const signal = at(MACD_signal, i);
    const hist = at(MACD_hist, i);
    if (macd == null || signal == null || hist == null) return null;

    const details: Record<string, string> = {
      MACD: macd.toFixed(2),
      MACD_signal: signal.toFixed(2),
      MACD_hist: hist.toFixed(2),
    };

    if (crossedAbove(MACD, MACD_signal, i)) {
      details.MACD_crossover = "Buy (bullish crossover)";
      return { id: "MACD", vote: "Buy", weight: 1, details };
    }
    if (crossedBelow(MACD, MACD_signal, i)) {
      details.MACD_crossover = "Sell (bearish crossover)";
      return { id: "MACD", vote: "Sell", weight: 1, details };
    }
    if (macd > signal) {
      details.MACD_position = "Positive (MACD > Signal)";
      return { id: "MACD", vote: "Buy", weight: 0.5, details };
    }
    if (macd < signal) {
      details.MACD_position = "Negative (MACD < Signal)";
      return { id: "MACD", vote: "Sell", weight: 0.5, details };
    }
    details.MACD_position = "Neutral";
    return { id: "MACD", vote: "Neutral", weight: 1, details };
  }

  static score(indicators: IndicatorSeries, i: number): number {
    const { MACD, MACD_signal, MACD_hist } = indicators.values;
    const macd = at(MACD, i);
    const signal = at(MACD_signal, i);
    if (macd == null || signal == null) return 0;

    let points = 0;
    if (macd > signal) points += 1.0;

    const hist = at(MACD_hist, i);
    const prevHist = at(MACD_hist, i - 1);
    if (hist != null && prevHist != null && hist > prevHist) points += 0.5;

    if (crossedAbove(MACD, MACD_signal, i)) points += 1.5;
    return points;
  }
}
