import type { Line } from "../indicators/types";

/** Value at bar `i`, or `null` when out of range or still warming up. */
export function at(line: Line, i: number): number | null {
  if (i < 0 || i >= line.length) return null;
  return line[i] ?? null;
}
