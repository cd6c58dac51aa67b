import { crossedAbove, crossedBelow } from "../utils/crossover";
import { ema } from "../utils/ewm";
import { at } from "../utils/at";
import type { IIndicatorVote, IndicatorSeries, Line } from "./types";

export type EmaParams = {
  closes: readonly number[];
  shortPeriod?: number; // default 20
  longPeriod?: number; // default 50
};

export class EMAIndicator {
  static calculate({ closes, shortPeriod = 20, longPeriod = 50 }: EmaParams): {
    short: Line;
    long: Line;
  } {
    return { short: ema(closes, shortPeriod), long: ema(closes, longPeriod) };
  }

  static vote(indicators: IndicatorSeries, i: number): IIndicatorVote | null {
    const { EMA_20, EMA_50 } = indicators.values;
    const short = at(EMA_20, i);
    const long = at(EMA_50, i);
    if (short == null || long == null) return null;

    const details: Record<string, string> = {
      EMA_20: short.toFixed(2),
      EMA_50: long.toFixed(2),
    };

    if (crossedAbove(EMA_20, EMA_50, i)) {
      details.EMA_crossover = "Buy (bullish crossover)";
      return { id: "EMA", vote: "Buy", weight: 1, details };
    }
    if (crossedBelow(EMA_20, EMA_50, i)) {
      details.EMA_crossover = "Sell (bearish crossover)";
      return { id: "EMA", vote: "Sell", weight: 1, details };
    }
    if (short > long) {
      details.EMA_position = "Positive (EMA 20 > EMA 50)";
      return { id: "EMA", vote: "Buy", weight: 0.5, details };
    }
    if (short < long) {
      details.EMA_position = "Negative (EMA 20 < EMA 50)";
      return { id: "EMA", vote: "Sell", weight: 0.5, details };
    }
    details.EMA_position = "Neutral";
    return { id: "EMA", vote: "Neutral", weight: 0.5, details };
  }

  static score(indicators: IndicatorSeries, i: number): number {
    const { EMA_20, EMA_50 } = indicators.values;
    const short = at(EMA_20, i);
    const long = at(EMA_50, i);
    if (short == null || long == null) return 0;

    let points = 0;
    if (short > long) points += 1.0;
    if (crossedAbove(EMA_20, EMA_50, i)) points += 1.5;
    return points;
  }
}
