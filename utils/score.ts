import {
  BollingerBandsIndicator,
  EMAIndicator,
  MACDIndicator,
  MomentumIndicator,
  RSIIndicator,
  SMAIndicator,
  VolumeIndicator,
} from "../indicators";
import type { IndicatorSeries, SelectableIndicator, SelectedIndicatorSet } from "../indicators/types";

type Scorer = (indicators: IndicatorSeries, i: number) => number;

const INDICATOR_SCORERS: Record<SelectableIndicator, Scorer> = {
  RSI: RSIIndicator.score,
  MACD: MACDIndicator.score,
  "Bollinger Bands": BollingerBandsIndicator.score,
  EMA: EMAIndicator.score,
  SMA: SMAIndicator.score,
};

/**
 * Additive promise score at the latest bar. Momentum and volume always
 * count; indicator clauses only when selected and warmed up. Only
 * meaningful relative to other symbols scored the same way.
 */
export function scoreIndicators(indicators: IndicatorSeries, selected: SelectedIndicatorSet): number {
  if (!indicators.length) return 0;
  const i = indicators.length - 1;

  let score = MomentumIndicator.score(indicators, i);
  for (const id of selected) score += INDICATOR_SCORERS[id](indicators, i);
  score += VolumeIndicator.score(indicators, i);
  return score;
}
