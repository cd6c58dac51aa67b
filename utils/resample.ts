import type { Bar } from "../indicators/types";

/**
 * Buckets bars into `bucketMs` windows aligned on the epoch:
 * first open, max high, min low, last close, summed volume.
 */
export function resampleBars(bars: readonly Bar[], bucketMs: number): Bar[] {
  const out: Bar[] = [];
  let current: Bar | null = null;
  for (const bar of bars) {
    const bucket = Math.floor(bar.timestamp / bucketMs) * bucketMs;
    if (current && current.timestamp === bucket) {
      current.high = Math.max(current.high, bar.high);
      current.low = Math.min(current.low, bar.low);
      current.close = bar.close;
      current.volume += bar.volume;
      continue;
    }
    current = { ...bar, timestamp: bucket };
    out.push(current);
  }
  return out;
}

export function intervalMs(interval: string): number {
  const num = parseInt(interval, 10);
  if (interval.endsWith("m")) return num * 60_000;
  if (interval.endsWith("h")) return num * 60 * 60_000;
  if (interval.endsWith("d")) return num * 24 * 60 * 60_000;
  throw new Error(`Unsupported interval: ${interval}`);
}
