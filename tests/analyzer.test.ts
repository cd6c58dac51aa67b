import { describe, expect, it } from "vitest";
import { analyzeSymbol, generateSignals, identifyPromising } from "../analyzer";
import { createPriceSeries } from "../price-series";
import { ALL_INDICATORS, parseSelectedIndicators } from "../utils/selection";
import { flatCloses, makeSeries, MINUTE, strictUptrend, T0 } from "./helpers";

describe("analyzeSymbol", () => {
  it("returns null for an empty series", () => {
    expect(analyzeSymbol(createPriceSeries("EMPTY", []), ALL_INDICATORS)).toBeNull();
  });

  it("bundles indicators, score, signal and bar signals", () => {
    const analysis = analyzeSymbol(makeSeries(flatCloses(30)), ALL_INDICATORS);
    expect(analysis?.symbol).toBe("TEST");
    expect(analysis?.indicators.length).toBe(30);
    expect(analysis?.barSignals).toHaveLength(30);
    // MACD flat (1) and EMA equal (0.5) neutral; the collapsed band votes Buy
    expect(analysis?.signal.votes).toEqual({ buy: 1, sell: 0, neutral: 1.5 });
  });
});

describe("identifyPromising", () => {
  it("ranks rising symbols above flat ones and skips empty series", () => {
    const series = new Map([
      ["FLAT", makeSeries(flatCloses(30), undefined, "FLAT")],
      ["UP", makeSeries(strictUptrend(30), undefined, "UP")],
      ["NONE", createPriceSeries("NONE", [])],
    ]);
    const ranked = identifyPromising(series, parseSelectedIndicators([]), 5);
    // 7-bar momentum: 1.005^6 - 1 ≈ 3% -> 0.5
    expect(ranked).toEqual([
      { symbol: "UP", score: 0.5 },
      { symbol: "FLAT", score: 0 },
    ]);
  });

  it("accepts a plain record", () => {
    const ranked = identifyPromising({ ONLY: makeSeries(flatCloses(10)) }, ALL_INDICATORS, 1);
    expect(ranked.map((r) => r.symbol)).toEqual(["ONLY"]);
  });
});

describe("generateSignals", () => {
  it("stamps each signal with the latest bar", () => {
    const signals = generateSignals(
      { FLAT: makeSeries(flatCloses(30, 42)), NONE: createPriceSeries("NONE", []) },
      parseSelectedIndicators(["RSI", "MACD", "EMA", "SMA"]),
    );
    expect(Object.keys(signals)).toEqual(["FLAT"]);
    expect(signals.FLAT.signal).toBe("Neutral");
    expect(signals.FLAT.priceAtSignal).toBe(42);
    expect(signals.FLAT.timestamp).toBe(T0 + 29 * MINUTE);
  });
});
