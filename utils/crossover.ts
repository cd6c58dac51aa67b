import type { Line } from "../indicators/types";
import { at } from "./at";

type Pair = { a: number; b: number; pa: number; pb: number };

function pairAt(a: Line, b: Line, i: number, lookback: number): Pair | null {
  if (lookback < 1) return null;
  const av = at(a, i);
  const bv = at(b, i);
  const pa = at(a, i - lookback);
  const pb = at(b, i - lookback);
  if (av == null || bv == null || pa == null || pb == null) return null;
  return { a: av, b: bv, pa, pb };
}

/**
 * `a` is above `b` at bar `i` and was at or below it `lookback` bars earlier.
 * Missing values on either bar mean no crossover.
 */
export function crossedAbove(a: Line, b: Line, i: number, lookback = 1): boolean {
  const p = pairAt(a, b, i, lookback);
  return p != null && p.a > p.b && p.pa <= p.pb;
}

export function crossedBelow(a: Line, b: Line, i: number, lookback = 1): boolean {
  const p = pairAt(a, b, i, lookback);
  return p != null && p.a < p.b && p.pa >= p.pb;
}

// Golden/Death cross compare against 20 bars back to filter noise
export const SLOW_CROSS_LOOKBACK = 20;
