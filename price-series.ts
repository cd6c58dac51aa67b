import { PriceSeriesError } from "./errors";
import type { Bar, PriceSeries } from "./indicators/types";

const PRICE_FIELDS = ["open", "high", "low", "close"] as const;

/**
 * Validates and freezes a chronological bar list. Structural problems fail
 * here, never inside indicator math.
 */
export function createPriceSeries(symbol: string, bars: readonly Bar[]): PriceSeries {
  const out: Bar[] = [];
  for (let i = 0; i < bars.length; i++) {
    const bar = bars[i];
    if (!Number.isFinite(bar.timestamp)) {
      throw new PriceSeriesError(`${symbol}: bar ${i} has an invalid timestamp`, symbol, i);
    }
    for (const field of PRICE_FIELDS) {
      const v = bar[field];
      if (!Number.isFinite(v) || v <= 0) {
        throw new PriceSeriesError(`${symbol}: bar ${i} has non-positive ${field} (${v})`, symbol, i);
      }
    }
    if (!Number.isFinite(bar.volume) || bar.volume < 0) {
      throw new PriceSeriesError(`${symbol}: bar ${i} has invalid volume (${bar.volume})`, symbol, i);
    }
    if (i > 0) {
      const prev = bars[i - 1].timestamp;
      if (bar.timestamp === prev) {
        throw new PriceSeriesError(`${symbol}: duplicate timestamp ${bar.timestamp} at bar ${i}`, symbol, i);
      }
      if (bar.timestamp < prev) {
        throw new PriceSeriesError(
          `${symbol}: bars out of order at ${i} (${bar.timestamp} < ${prev})`,
          symbol,
          i,
        );
      }
    }
    out.push(Object.freeze({ ...bar }));
  }
  return Object.freeze({ symbol, bars: Object.freeze(out) });
}
