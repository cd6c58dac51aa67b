import { BollingerBandsIndicator } from "./bollinger-bands";
import { EMAIndicator } from "./ema";
import { MACDIndicator } from "./macd";
import { RSIIndicator } from "./rsi";
import { SMAIndicator } from "./sma";
import type { IndicatorName, IndicatorSeries, Line, PriceSeries } from "./types";

/**
 * Computes every indicator line for a series. Pure: the input is never
 * touched and identical input yields identical output.
 */
export function computeIndicators(series: PriceSeries): IndicatorSeries {
  const closes = series.bars.map((b) => b.close);
  const macd = MACDIndicator.calculate({ closes });
  const bb = BollingerBandsIndicator.calculate({ closes });
  const sma = SMAIndicator.calculate({ closes });
  const ema = EMAIndicator.calculate({ closes });

  const values: Record<IndicatorName, Line> = {
    RSI: RSIIndicator.calculate({ closes }),
    MACD: macd.macd,
    MACD_signal: macd.signal,
    MACD_hist: macd.hist,
    BB_upper: bb.upper,
    BB_middle: bb.middle,
    BB_lower: bb.lower,
    SMA_50: sma.short,
    SMA_200: sma.long,
    EMA_20: ema.short,
    EMA_50: ema.long,
  };
  for (const line of Object.values(values)) Object.freeze(line);

  return Object.freeze({
    symbol: series.symbol,
    length: closes.length,
    timestamps: Object.freeze(series.bars.map((b) => b.timestamp)),
    close: Object.freeze(closes),
    volume: Object.freeze(series.bars.map((b) => b.volume)),
    values: Object.freeze(values),
  });
}

export { BollingerBandsIndicator, EMAIndicator, MACDIndicator, RSIIndicator, SMAIndicator };
export { MomentumIndicator } from "./momentum";
export { VolumeIndicator } from "./volume";
