import { describe, expect, it } from "vitest";
import { computeIndicators, RSIIndicator } from "../indicators";
import { INDICATOR_NAMES } from "../indicators/types";
import { createPriceSeries } from "../price-series";
import { adjustedEwm, ema } from "../utils/ewm";
import { rollingMean, rollingStd } from "../utils/rolling";
import { flatCloses, makeSeries, strictUptrend, zigzagUptrend } from "./helpers";

describe("ewm helpers", () => {
  it("seeds the recursive EMA with the first value", () => {
    expect(ema([1, 2, 3], 3)).toEqual([1, 1.5, 2.25]);
  });

  it("keeps the adjusted mean undefined until min periods are seen", () => {
    const out = adjustedEwm([null, 1, 0, 2], 1, 2);
    expect(out[0]).toBeNull();
    expect(out[1]).toBeNull();
    expect(out[2]).toBeCloseTo(1 / 3, 12);
    expect(out[3]).toBeCloseTo(2.25 / 1.75, 12);
  });
});

describe("rolling helpers", () => {
  it("returns the exact value and zero spread on a constant window", () => {
    const values = flatCloses(30, 0.1);
    const means = rollingMean(values, 20);
    expect(means[18]).toBeNull();
    expect(means.slice(19).every((m) => m === 0.1)).toBe(true);
    expect(rollingStd(values, 20, 29)).toBe(0);
  });

  it("keeps precision on a near-flat window at a high price", () => {
    const values = Array.from({ length: 20 }, (_, i) => (i % 2 === 0 ? 50000 : 50000.001));
    // ten values 0.0005 either side of the mean
    expect(rollingStd(values, 20, 19)).toBeCloseTo(0.0005 * Math.sqrt(20 / 19), 9);
  });
});

describe("RSIIndicator.calculate", () => {
  it("smooths up and down moves independently", () => {
    const rsi = RSIIndicator.calculate({ closes: [10, 11, 10, 12], period: 2 });
    expect(rsi[0]).toBeNull();
    expect(rsi[1]).toBeNull();
    expect(rsi[2]).toBeCloseTo(100 / 3, 10);
    expect(rsi[3]).toBeCloseTo(100 - 100 / 5.5, 10);
  });

  it("saturates at 100 without down moves and is undefined on a flat window", () => {
    const up = RSIIndicator.calculate({ closes: strictUptrend(20) });
    expect(up.slice(0, 14).every((v) => v === null)).toBe(true);
    expect(up.slice(14).every((v) => v === 100)).toBe(true);

    const flat = RSIIndicator.calculate({ closes: flatCloses(30) });
    expect(flat.every((v) => v === null)).toBe(true);
  });

  it("stays within [0, 100]", () => {
    const closes = Array.from({ length: 300 }, (_, i) => 100 + 10 * Math.sin(i / 3) + (i % 7));
    for (const v of RSIIndicator.calculate({ closes })) {
      if (v == null) continue;
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThanOrEqual(100);
    }
  });
});

describe("computeIndicators", () => {
  const wave = Array.from({ length: 260 }, (_, i) => 50 + 5 * Math.sin(i / 5) + i * 0.05);

  it("returns an empty series for an empty input", () => {
    const out = computeIndicators(createPriceSeries("EMPTY", []));
    expect(out.length).toBe(0);
    for (const name of INDICATOR_NAMES) expect(out.values[name]).toEqual([]);
  });

  it("aligns every line with the price series and honours warm-up", () => {
    const out = computeIndicators(makeSeries(wave));
    for (const name of INDICATOR_NAMES) expect(out.values[name]).toHaveLength(260);

    expect(out.values.BB_middle[18]).toBeNull();
    expect(out.values.BB_middle[19]).not.toBeNull();
    expect(out.values.SMA_50[48]).toBeNull();
    expect(out.values.SMA_50[49]).not.toBeNull();
    expect(out.values.SMA_200[198]).toBeNull();
    expect(out.values.SMA_200[199]).not.toBeNull();
    expect(out.values.EMA_20[0]).toBe(wave[0]);
    expect(out.values.EMA_50[0]).toBe(wave[0]);
    expect(out.values.MACD[0]).toBe(0);
  });

  it("computes SMA as the plain rolling mean", () => {
    const out = computeIndicators(makeSeries(wave));
    const window = wave.slice(10, 60);
    const mean = window.reduce((a, b) => a + b, 0) / 50;
    expect(out.values.SMA_50[59]).toBeCloseTo(mean, 9);
  });

  it("keeps the bands ordered and the histogram exact", () => {
    const out = computeIndicators(makeSeries(wave));
    const { BB_lower, BB_middle, BB_upper, MACD, MACD_signal, MACD_hist } = out.values;
    for (let i = 0; i < out.length; i++) {
      const mid = BB_middle[i];
      const lo = BB_lower[i];
      const hi = BB_upper[i];
      if (mid != null && lo != null && hi != null) {
        expect(lo).toBeLessThanOrEqual(mid);
        expect(mid).toBeLessThanOrEqual(hi);
      }
      const m = MACD[i];
      const s = MACD_signal[i];
      if (m != null && s != null) expect(MACD_hist[i]).toBe(m - s);
    }
  });

  it("uses the sample standard deviation for the bands", () => {
    const closes = [...flatCloses(19, 10), 30];
    const out = computeIndicators(makeSeries(closes));
    // mean 11, sample variance (19 * 1 + 361) / 19 = 20
    expect(out.values.BB_middle[19]).toBeCloseTo(11, 12);
    expect(out.values.BB_upper[19]).toBeCloseTo(11 + 2 * Math.sqrt(20), 10);
    expect(out.values.BB_lower[19]).toBeCloseTo(11 - 2 * Math.sqrt(20), 10);
  });

  it("is idempotent and leaves the input untouched", () => {
    const series = makeSeries(wave);
    const before = JSON.stringify(series);
    expect(computeIndicators(series)).toEqual(computeIndicators(series));
    expect(JSON.stringify(series)).toBe(before);
  });

  it("collapses the bands and zeroes MACD on a flat series", () => {
    const out = computeIndicators(makeSeries(flatCloses(250)));
    for (let i = 19; i < 250; i++) {
      expect(out.values.BB_upper[i]).toBe(100);
      expect(out.values.BB_middle[i]).toBe(100);
      expect(out.values.BB_lower[i]).toBe(100);
    }
    expect(out.values.RSI.every((v) => v === null)).toBe(true);
    expect(out.values.MACD.every((v) => v === 0)).toBe(true);
    expect(out.values.MACD_signal.every((v) => v === 0)).toBe(true);
  });

  it.each([0.1, 0.3, 1.1, 123.456, 3000.3])(
    "collapses the bands exactly on a flat series at %s",
    (price) => {
      const out = computeIndicators(makeSeries(flatCloses(250, price)));
      for (let i = 19; i < 250; i++) {
        expect(out.values.BB_lower[i]).toBe(price);
        expect(out.values.BB_middle[i]).toBe(price);
        expect(out.values.BB_upper[i]).toBe(price);
      }
      expect(out.values.SMA_50[249]).toBe(price);
      expect(out.values.SMA_200[249]).toBe(price);
    },
  );

  it("tracks a strict uptrend", () => {
    const out = computeIndicators(makeSeries(strictUptrend(250)));
    const { RSI, MACD, SMA_50, SMA_200 } = out.values;
    expect(RSI[249]).toBe(100);
    for (let i = 26; i < 250; i++) expect(MACD[i]).toBeGreaterThan(0);
    expect(SMA_50[249]).toBeGreaterThan(SMA_200[249] ?? Infinity);
  });

  it("keeps RSI above 50 on a rising zig-zag", () => {
    const out = computeIndicators(makeSeries(zigzagUptrend(250)));
    const rsi = out.values.RSI[249];
    expect(rsi).toBeGreaterThan(50);
    expect(rsi).toBeLessThan(70);
  });
});
