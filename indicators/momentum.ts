import type { IndicatorSeries } from "./types";

export class MomentumIndicator {
  /**
   * Close-to-close return over the `window` bars ending at `i`. Shorter
   * histories measure from the first bar.
   */
  static change(closes: readonly number[], i: number, window = 7): number | null {
    if (i < 0 || i >= closes.length) return null;
    const start = Math.max(0, i - window + 1);
    return closes[i] / closes[start] - 1;
  }

  static score(indicators: IndicatorSeries, i: number, window = 7): number {
    const change = MomentumIndicator.change(indicators.close, i, window);
    if (change == null) return 0;
    if (change > 0.1) return 2.0;
    if (change > 0.05) return 1.0;
    if (change > 0) return 0.5;
    return 0;
  }
}
