import { CryptoCompareClient, historyLimit, type HistoryOptions } from "./cryptocompare";
import { generateDemoBars, type DemoInterval } from "./demo-data";
import type { SourceName } from "./env";
import type { PriceSeries } from "./indicators/types";
import { createPriceSeries } from "./price-series";
import { intervalMs, resampleBars } from "./utils/resample";

export type FetchOptions = { period?: string; interval?: string };

export interface PriceSeriesSource {
  readonly name: SourceName;
  fetch(symbol: string, options?: FetchOptions): Promise<PriceSeries>;
}

const DEMO_INTERVALS: Record<string, DemoInterval> = {
  "1m": "minute",
  "5m": "minute",
  "15m": "minute",
  "1h": "hour",
  "4h": "hour",
  "1d": "day",
};

const RESAMPLED = new Set(["5m", "15m", "4h"]);

export class DemoSource implements PriceSeriesSource {
  readonly name = "demo" as const;

  constructor(private readonly endTime?: number) {}

  async fetch(symbol: string, { period = "7d", interval = "1h" }: FetchOptions = {}): Promise<PriceSeries> {
    const bars = generateDemoBars(symbol, {
      interval: DEMO_INTERVALS[interval] ?? "hour",
      points: historyLimit(period, interval),
      endTime: this.endTime,
    });
    const resampled = RESAMPLED.has(interval) ? resampleBars(bars, intervalMs(interval)) : bars;
    return createPriceSeries(symbol, resampled);
  }
}

export class CryptoCompareSource implements PriceSeriesSource {
  readonly name = "cryptocompare" as const;

  constructor(private readonly client: CryptoCompareClient) {}

  async fetch(symbol: string, options: HistoryOptions = {}): Promise<PriceSeries> {
    return createPriceSeries(symbol, await this.client.getHistory(symbol, options));
  }
}

export function createSource(name: SourceName, { apiKey }: { apiKey?: string } = {}): PriceSeriesSource {
  if (name === "cryptocompare") return new CryptoCompareSource(new CryptoCompareClient({ apiKey }));
  return new DemoSource();
}
