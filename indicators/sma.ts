import { SLOW_CROSS_LOOKBACK, crossedAbove, crossedBelow } from "../utils/crossover";
import { at } from "../utils/at";
import { rollingMean } from "../utils/rolling";
import type { IIndicatorVote, IndicatorSeries, Line } from "./types";

export type SmaParams = {
  closes: readonly number[];
  shortPeriod?: number; // default 50
  longPeriod?: number; // default 200
};

export class SMAIndicator {
  static calculate({ closes, shortPeriod = 50, longPeriod = 200 }: SmaParams): {
    short: Line;
    long: Line;
  } {
    return { short: rollingMean(closes, shortPeriod), long: rollingMean(closes, longPeriod) };
  }

  static goldenCross(indicators: IndicatorSeries, i: number): boolean {
    const { SMA_50, SMA_200 } = indicators.values;
    return crossedAbove(SMA_50, SMA_200, i, SLOW_CROSS_LOOKBACK);
  }

  static deathCross(indicators: IndicatorSeries, i: number): boolean {
    const { SMA_50, SMA_200 } = indicators.values;
    return crossedBelow(SMA_50, SMA_200, i, SLOW_CROSS_LOOKBACK);
  }

  static vote(indicators: IndicatorSeries, i: number): IIndicatorVote | null {
    const short = at(indicators.values.SMA_50, i);
    const long = at(indicators.values.SMA_200, i);
    if (short == null || long == null) return null;

    const details: Record<string, string> = {
      SMA_50: short.toFixed(2),
      SMA_200: long.toFixed(2),
    };

    if (SMAIndicator.goldenCross(indicators, i)) {
      details.SMA_crossover = "Strong buy (recent Golden Cross)";
      return { id: "SMA", vote: "Buy", weight: 2, details };
    }
    if (SMAIndicator.deathCross(indicators, i)) {
      details.SMA_crossover = "Strong sell (recent Death Cross)";
      return { id: "SMA", vote: "Sell", weight: 2, details };
    }
    if (short > long) {
      details.SMA_position = "Positive (SMA 50 > SMA 200)";
      return { id: "SMA", vote: "Buy", weight: 0.5, details };
    }
    if (short < long) {
      details.SMA_position = "Negative (SMA 50 < SMA 200)";
      return { id: "SMA", vote: "Sell", weight: 0.5, details };
    }
    details.SMA_position = "Neutral";
    return { id: "SMA", vote: "Neutral", weight: 0.5, details };
  }

  static score(indicators: IndicatorSeries, i: number): number {
    const short = at(indicators.values.SMA_50, i);
    const long = at(indicators.values.SMA_200, i);
    if (short == null || long == null) return 0;
    const price = indicators.close[i];

    let points = 0;
    if (price > short && price > long) points += 1.0;
    if (short > long) points += 1.0;
    if (SMAIndicator.goldenCross(indicators, i)) points += 2.0;
    return points;
  }
}
