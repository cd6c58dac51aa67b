import { at } from "../utils/at";
import { rollingMean, rollingStd } from "../utils/rolling";
import type { IIndicatorVote, IndicatorSeries, Line } from "./types";

export type BollingerParams = {
  closes: readonly number[];
  period?: number; // default 20
  stdDev?: number; // default 2
};

export type BollingerLines = { upper: Line; middle: Line; lower: Line };

export type BollingerVoteParams = {
  /** close below lower * nearLower is a buy (default 1.05) */
  nearLower?: number;
  /** close above upper * nearUpper is a sell (default 0.95) */
  nearUpper?: number;
};

export class BollingerBandsIndicator {
  static calculate({ closes, period = 20, stdDev = 2 }: BollingerParams): BollingerLines {
    const middle = rollingMean(closes, period);
    const upper: Array<number | null> = [];
    const lower: Array<number | null> = [];
    for (let i = 0; i < closes.length; i++) {
      const mid = middle[i];
      const sd = rollingStd(closes, period, i);
      if (mid == null || sd == null) {
        upper.push(null);
        lower.push(null);
        continue;
      }
      upper.push(mid + stdDev * sd);
      lower.push(mid - stdDev * sd);
    }
    return { upper, middle, lower };
  }

  static vote(
    indicators: IndicatorSeries,
    i: number,
    { nearLower = 1.05, nearUpper = 0.95 }: BollingerVoteParams = {},
  ): IIndicatorVote | null {
    const upper = at(indicators.values.BB_upper, i);
    const lower = at(indicators.values.BB_lower, i);
    if (upper == null || lower == null) return null;
    const price = indicators.close[i];

    const details: Record<string, string> = {
      Price: price.toFixed(2),
      BB_upper: upper.toFixed(2),
      BB_lower: lower.toFixed(2),
    };

    if (price < lower * nearLower) {
      details.Bollinger = "Buy (near lower band)";
      return { id: "Bollinger Bands", vote: "Buy", weight: 1, details };
    }
    if (price > upper * nearUpper) {
      details.Bollinger = "Sell (near upper band)";
      return { id: "Bollinger Bands", vote: "Sell", weight: 1, details };
    }
    details.Bollinger = "Neutral (between bands)";
    return { id: "Bollinger Bands", vote: "Neutral", weight: 1, details };
  }

  static score(indicators: IndicatorSeries, i: number): number {
    const lower = at(indicators.values.BB_lower, i);
    if (lower == null) return 0;
    const { close } = indicators;

    let points = 0;
    if (close[i] < lower * 1.05) points += 1.0;

    // bounce off the lower band
    const prevLower = at(indicators.values.BB_lower, i - 1);
    if (prevLower != null && close[i] > close[i - 1] && close[i - 1] < prevLower) points += 1.5;
    return points;
  }
}
