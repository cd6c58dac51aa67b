import { computeIndicators } from "./indicators";
import type {
  BarSignal,
  IndicatorSeries,
  PriceSeries,
  SelectedIndicatorSet,
  Signal,
} from "./indicators/types";
import { computeBarSignals } from "./utils/bar-signals";
import { consolidateSignal } from "./utils/consolidate-signal";
import { logger } from "./utils/logger";
import { rankScores, type RankedSymbol } from "./utils/rank";
import { scoreIndicators } from "./utils/score";

export type SymbolAnalysis = {
  symbol: string;
  indicators: IndicatorSeries;
  score: number;
  signal: Signal;
  barSignals: BarSignal[];
};

export type SignalReport = Signal & {
  timestamp: number;
  priceAtSignal: number;
};

type SeriesBySymbol = ReadonlyMap<string, PriceSeries> | Readonly<Record<string, PriceSeries>>;

function isMap(series: SeriesBySymbol): series is ReadonlyMap<string, PriceSeries> {
  return series instanceof Map;
}

function entriesOf(series: SeriesBySymbol): Array<[string, PriceSeries]> {
  return isMap(series) ? [...series.entries()] : Object.entries(series);
}

/** Full pipeline for one symbol; `null` when there is nothing to analyse. */
export function analyzeSymbol(
  series: PriceSeries,
  selected: SelectedIndicatorSet,
): SymbolAnalysis | null {
  if (!series.bars.length) {
    logger.symbol(series.symbol).debug("empty series, skipped");
    return null;
  }
  const indicators = computeIndicators(series);
  return {
    symbol: series.symbol,
    indicators,
    score: scoreIndicators(indicators, selected),
    signal: consolidateSignal(indicators, selected),
    barSignals: computeBarSignals(indicators),
  };
}

export function identifyPromising(
  seriesBySymbol: SeriesBySymbol,
  selected: SelectedIndicatorSet,
  topN = 5,
): RankedSymbol[] {
  const scores = new Map<string, number>();
  for (const [symbol, series] of entriesOf(seriesBySymbol)) {
    if (!series.bars.length) {
      logger.symbol(symbol).debug("empty series, not ranked");
      continue;
    }
    scores.set(symbol, scoreIndicators(computeIndicators(series), selected));
  }
  return rankScores(scores, topN);
}

export function generateSignals(
  seriesBySymbol: SeriesBySymbol,
  selected: SelectedIndicatorSet,
): Record<string, SignalReport> {
  const out: Record<string, SignalReport> = {};
  for (const [symbol, series] of entriesOf(seriesBySymbol)) {
    const analysis = analyzeSymbol(series, selected);
    if (!analysis) continue;
    const last = analysis.indicators.length - 1;
    out[symbol] = {
      ...analysis.signal,
      timestamp: analysis.indicators.timestamps[last],
      priceAtSignal: analysis.indicators.close[last],
    };
  }
  return out;
}
