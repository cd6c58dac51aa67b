import { adjustedEwm } from "../utils/ewm";
import { at } from "../utils/at";
import type { IIndicatorVote, IndicatorSeries, Line } from "./types";

export type RsiParams = {
  closes: readonly number[];
  /** RSI period (default: 14) */
  period?: number;
};

export type RsiVoteParams = {
  /** Oversold threshold (default: 30) */
  oversold?: number;
  /** Overbought threshold (default: 70) */
  overbought?: number;
};

export class RSIIndicator {
  /**
   * Wilder-style RSI: up and down moves are smoothed independently with an
   * adjusted exponential mean (center of mass `period - 1`), and the value is
   * only defined once `period` deltas exist. A flat window (no up, no down)
   * has no RSI.
   */
  static calculate({ closes, period = 14 }: RsiParams): Line {
    const len = closes.length;
    if (!len) return [];

    const up: Array<number | null> = [null];
    const down: Array<number | null> = [null];
    for (let i = 1; i < len; i++) {
      const delta = closes[i] - closes[i - 1];
      up.push(Math.max(delta, 0));
      down.push(Math.max(-delta, 0));
    }

    const avgUp = adjustedEwm(up, period - 1, period);
    const avgDown = adjustedEwm(down, period - 1, period);

    return avgUp.map((u, i) => {
      const d = avgDown[i];
      if (u == null || d == null) return null;
      if (d === 0) return u > 0 ? 100 : null;
      return 100 - 100 / (1 + u / d);
    });
  }

  static vote(
    indicators: IndicatorSeries,
    i: number,
    { oversold = 30, overbought = 70 }: RsiVoteParams = {},
  ): IIndicatorVote | null {
    const rsi = at(indicators.values.RSI, i);
    if (rsi == null) return null;

    const details = { RSI: rsi.toFixed(2), RSI_signal: "Neutral" };
    if (rsi < oversold) {
      details.RSI_signal = "Buy (oversold)";
      return { id: "RSI", vote: "Buy", weight: 1, details };
    }
    if (rsi > overbought) {
      details.RSI_signal = "Sell (overbought)";
      return { id: "RSI", vote: "Sell", weight: 1, details };
    }
    return { id: "RSI", vote: "Neutral", weight: 1, details };
  }

  static score(indicators: IndicatorSeries, i: number): number {
    const rsi = at(indicators.values.RSI, i);
    if (rsi == null) return 0;
    if (rsi >= 40 && rsi <= 60) return 0.5; // balanced
    if (rsi >= 30 && rsi < 40) return 1.0; // possibly undervalued
    if (rsi < 30) return 1.5; // oversold
    return 0;
  }
}
