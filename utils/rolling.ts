import * as TI from "technicalindicators";
import type { Line } from "../indicators/types";
import { padLeft } from "./pad-left";

/** Length of the run of equal values ending at each index. */
function equalRuns(values: readonly number[]): number[] {
  const runs: number[] = [];
  for (let i = 0; i < values.length; i++) {
    runs.push(i > 0 && values[i] === values[i - 1] ? runs[i - 1] + 1 : 1);
  }
  return runs;
}

/** Rolling mean; a window of identical values yields that value exactly. */
export function rollingMean(values: readonly number[], window: number): Line {
  if (values.length < window) return Array<number | null>(values.length).fill(null);
  const means = padLeft(values.length, TI.SMA.calculate({ period: window, values: [...values] }));
  const runs = equalRuns(values);
  return means.map((m, i) => (m != null && runs[i] >= window ? values[i] : m));
}

/**
 * Sample standard deviation (n - 1) of the `window` values ending at `endIdx`,
 * from squared deviations around the window mean. Identical values give 0.
 */
export function rollingStd(values: readonly number[], window: number, endIdx: number): number | null {
  if (window <= 1) return null;
  const start = endIdx - window + 1;
  if (start < 0 || endIdx >= values.length) return null;

  let sum = 0;
  let constant = true;
  for (let i = start; i <= endIdx; i++) {
    sum += values[i];
    if (values[i] !== values[start]) constant = false;
  }
  if (constant) return 0;

  const mean = sum / window;
  let squares = 0;
  for (let i = start; i <= endIdx; i++) {
    const d = values[i] - mean;
    squares += d * d;
  }
  return Math.sqrt(squares / (window - 1));
}
