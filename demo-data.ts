import type { Bar } from "./indicators/types";

export type DemoInterval = "minute" | "hour" | "day";

const BASE_PRICES: Record<string, number> = {
  BTC: 50000,
  ETH: 3000,
  BNB: 500,
  SOL: 100,
  XRP: 0.5,
  ADA: 0.4,
  DOGE: 0.1,
  DOT: 10,
  MATIC: 1.5,
  AVAX: 30,
  SHIB: 0.00001,
  LTC: 150,
  LINK: 15,
  UNI: 8,
  ATOM: 12,
  ETC: 40,
  XLM: 0.3,
  BCH: 300,
  ALGO: 0.5,
  NEAR: 5,
};

const POINTS: Record<DemoInterval, number> = { minute: 500, hour: 168, day: 90 };
const STEP_MS: Record<DemoInterval, number> = {
  minute: 60_000,
  hour: 60 * 60_000,
  day: 24 * 60 * 60_000,
};

// mulberry32
function rng(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function hashSeed(text: string): number {
  let h = 2166136261;
  for (let i = 0; i < text.length; i++) h = Math.imul(h ^ text.charCodeAt(i), 16777619);
  return h >>> 0;
}

function normal(rand: () => number, mean: number, sd: number): number {
  const u = 1 - rand();
  const v = rand();
  return mean + sd * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

export type DemoOptions = {
  interval?: DemoInterval; // default "hour"
  points?: number;
  endTime?: number; // default now
  seed?: number; // default derived from the symbol
  volatility?: number; // default 0.03
};

/**
 * Synthetic OHLCV random walk with a small drift in a random direction.
 * Same symbol, seed and end time give the same bars.
 */
export function generateDemoBars(
  symbol: string,
  { interval = "hour", points, endTime = Date.now(), seed, volatility = 0.03 }: DemoOptions = {},
): Bar[] {
  const rand = rng(seed ?? hashSeed(symbol));
  const n = points ?? POINTS[interval];
  const step = STEP_MS[interval];
  const basePrice = BASE_PRICES[symbol.toUpperCase()] ?? 100;
  const trend = rand() < 0.5 ? -1 : 1;
  const start = Math.floor(endTime / step) * step - (n - 1) * step;

  const bars: Bar[] = [];
  let price = basePrice;
  for (let i = 0; i < n; i++) {
    price *= 1 + normal(rand, 0.001 * trend, volatility);
    // keep the walk strictly positive
    price = Math.max(price, basePrice * 1e-6);
    const open = price * (1 + normal(rand, 0, 0.005));
    const high = Math.max(open, price) * (1 + Math.abs(normal(rand, 0, 0.01)));
    const low = Math.min(open, price) * (1 - Math.min(0.5, Math.abs(normal(rand, 0, 0.01))));
    const volume = Math.max(0, basePrice * 1000 * (1 + normal(rand, 0, 0.2)));
    bars.push({ timestamp: start + i * step, open, high, low, close: price, volume });
  }
  return bars;
}

/** Base price of each symbol moved by up to 5% either way. */
export function generateDemoPrices(
  symbols: readonly string[],
  { seed }: { seed?: number } = {},
): Record<string, number> {
  const prices: Record<string, number> = {};
  for (const symbol of symbols) {
    const rand = rng(seed ?? hashSeed(symbol));
    const basePrice = BASE_PRICES[symbol.toUpperCase()] ?? 100;
    prices[symbol] = basePrice * (1 + (rand() - 0.5) * 0.1);
  }
  return prices;
}
