import { describe, expect, it } from "vitest";
import { generateDemoBars, generateDemoPrices } from "../demo-data";
import { createSource, CryptoCompareSource, DemoSource } from "../get-price-series";
import { intervalMs, resampleBars } from "../utils/resample";
import { makeBars, MINUTE, T0 } from "./helpers";

const END = Date.UTC(2024, 5, 1, 12, 30);

describe("generateDemoBars", () => {
  it("is deterministic for a symbol and end time", () => {
    expect(generateDemoBars("BTC", { endTime: END })).toEqual(generateDemoBars("BTC", { endTime: END }));
    expect(generateDemoBars("BTC", { endTime: END })).not.toEqual(generateDemoBars("ETH", { endTime: END }));
  });

  it("produces positive, evenly spaced bars ending on the aligned end time", () => {
    const bars = generateDemoBars("SOL", { interval: "hour", endTime: END });
    expect(bars).toHaveLength(168);
    expect(bars[167].timestamp).toBe(Date.UTC(2024, 5, 1, 12));
    for (let i = 1; i < bars.length; i++) {
      expect(bars[i].timestamp - bars[i - 1].timestamp).toBe(60 * MINUTE);
    }
    for (const b of bars) {
      expect(b.low).toBeGreaterThan(0);
      expect(b.low).toBeLessThanOrEqual(Math.min(b.open, b.close));
      expect(b.high).toBeGreaterThanOrEqual(Math.max(b.open, b.close));
      expect(b.volume).toBeGreaterThanOrEqual(0);
    }
  });

  it("honours an explicit point count", () => {
    expect(generateDemoBars("XYZ", { interval: "day", points: 5, endTime: END })).toHaveLength(5);
  });
});

describe("generateDemoPrices", () => {
  it("stays within 5% of the base price and repeats per symbol", () => {
    const prices = generateDemoPrices(["ETH", "UNKNOWN"]);
    expect(prices.ETH).toBeGreaterThanOrEqual(2850);
    expect(prices.ETH).toBeLessThanOrEqual(3150);
    expect(prices.UNKNOWN).toBeGreaterThanOrEqual(95);
    expect(prices.UNKNOWN).toBeLessThanOrEqual(105);
    expect(generateDemoPrices(["ETH"])).toEqual({ ETH: prices.ETH });
  });
});

describe("resampleBars", () => {
  it("aggregates bars into aligned buckets", () => {
    const bars = makeBars([1, 3, 2, 5, 4], [1, 1, 1, 1, 1]);
    const out = resampleBars(bars, 2 * MINUTE);
    expect(out.map((b) => [b.timestamp - T0, b.open, b.close, b.volume])).toEqual([
      [0, 1, 3, 2],
      [2 * MINUTE, 2, 5, 2],
      [4 * MINUTE, 4, 4, 1],
    ]);
    expect(out[1].high).toBe(5);
    expect(out[1].low).toBe(2);
  });

  it("does not mutate the input bars", () => {
    const bars = makeBars([1, 3]);
    resampleBars(bars, 2 * MINUTE);
    expect(bars[0].close).toBe(1);
  });

  it("parses interval labels", () => {
    expect(intervalMs("15m")).toBe(15 * MINUTE);
    expect(intervalMs("4h")).toBe(240 * MINUTE);
    expect(intervalMs("1d")).toBe(1440 * MINUTE);
    expect(() => intervalMs("1w")).toThrow("Unsupported interval: 1w");
  });
});

describe("price series sources", () => {
  it("builds a validated demo series", async () => {
    const series = await new DemoSource(END).fetch("BTC");
    expect(series.symbol).toBe("BTC");
    expect(series.bars).toHaveLength(168);
    expect(Object.isFrozen(series.bars)).toBe(true);
  });

  it("sizes the demo series from the period", async () => {
    const source = new DemoSource(END);
    expect((await source.fetch("BTC", { period: "1d", interval: "1h" })).bars).toHaveLength(24);
    expect((await source.fetch("BTC", { period: "30d", interval: "1h" })).bars).toHaveLength(720);
  });

  it("resamples demo minutes for multi-minute intervals", async () => {
    const series = await new DemoSource(END).fetch("BTC", { interval: "15m" });
    for (let i = 1; i < series.bars.length; i++) {
      expect(series.bars[i].timestamp - series.bars[i - 1].timestamp).toBe(15 * MINUTE);
    }
  });

  it("picks the source by name", () => {
    expect(createSource("demo")).toBeInstanceOf(DemoSource);
    expect(createSource("cryptocompare", { apiKey: "test-key" })).toBeInstanceOf(CryptoCompareSource);
  });
});
