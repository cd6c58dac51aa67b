import type { Line } from "../indicators/types";

/** Aligns a warm-up-trimmed series to `fullLen` bars, filling the prefix with `null`. */
export function padLeft(fullLen: number, arr: ReadonlyArray<number | null | undefined>): Line {
  const pad: Array<number | null> = Array(Math.max(0, fullLen - arr.length)).fill(null);
  return pad.concat(arr.map((v) => (v == null || !Number.isFinite(v) ? null : v)));
}
