import type { IndicatorSeries } from "./types";

export type VolumeParams = {
  maPeriod?: number; // mean volume window (default 7)
  highFactor?: number; // default 1.5
  elevatedFactor?: number; // default 1.2
};

export class VolumeIndicator {
  /** Mean volume of the `maPeriod` bars ending at `i`, or `null` without enough history. */
  static mean(volumes: readonly number[], i: number, maPeriod = 7): number | null {
    const start = i - maPeriod + 1;
    if (start < 0 || i >= volumes.length) return null;
    let sum = 0;
    for (let k = start; k <= i; k++) sum += volumes[k];
    return sum / maPeriod;
  }

  static score(
    indicators: IndicatorSeries,
    i: number,
    { maPeriod = 7, highFactor = 1.5, elevatedFactor = 1.2 }: VolumeParams = {},
  ): number {
    const mean = VolumeIndicator.mean(indicators.volume, i, maPeriod);
    if (mean == null || mean <= 0) return 0;
    const ratio = indicators.volume[i] / mean;
    if (ratio > highFactor) return 1.0;
    if (ratio > elevatedFactor) return 0.5;
    return 0;
  }
}
