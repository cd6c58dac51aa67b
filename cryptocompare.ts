import axios, { type AxiosInstance } from "axios";
import qs from "qs";
import { generateDemoBars, generateDemoPrices, type DemoInterval } from "./demo-data";
import { SourceError } from "./errors";
import type { Bar } from "./indicators/types";
import { logger } from "./utils/logger";
import { intervalMs, resampleBars } from "./utils/resample";

const CRYPTOCOMPARE_BASE = "https://min-api.cryptocompare.com/data";

export const DEFAULT_SYMBOLS = ["BTC", "ETH", "BNB", "SOL", "XRP", "ADA", "DOGE", "DOT", "MATIC", "AVAX"];

// period -> number of hourly points
const PERIOD_POINTS: Record<string, number> = {
  "1d": 24,
  "7d": 168,
  "30d": 720,
  "90d": 2160,
};

/** Raw points to request for a period; sub-hour intervals need more minutes to resample from. */
export function historyLimit(period: string, interval: string): number {
  const limit = PERIOD_POINTS[period] ?? PERIOD_POINTS["7d"];
  if (interval === "5m" || interval === "15m") return Math.floor((limit * 60) / parseInt(interval, 10));
  return limit;
}

const INTERVAL_MAP: Record<string, DemoInterval> = {
  "1m": "minute",
  "5m": "minute",
  "15m": "minute",
  "1h": "hour",
  "4h": "hour",
  "1d": "day",
};

const ENDPOINTS: Record<DemoInterval, string> = {
  minute: "/histominute",
  hour: "/histohour",
  day: "/histoday",
};

const RESAMPLED = new Set(["5m", "15m", "4h"]);

type HistoRow = {
  time: number; // seconds
  open: number;
  high: number;
  low: number;
  close: number;
  volumefrom: number;
};

type ErrorPayload = {
  Response?: string;
  Message?: string;
};

// pricemulti: { BTC: { USD: 50000 }, ... }
type PriceMulti = Record<string, Record<string, number> | string | undefined>;

type TopCoin = { CoinInfo?: { Name?: string } };

export type HistoryOptions = {
  period?: string; // default "7d"
  interval?: string; // default "1h"
  vsCurrency?: string; // default "USD"
};

export class CryptoCompareClient {
  private readonly http: Pick<AxiosInstance, "get">;

  constructor({ apiKey, http }: { apiKey?: string; http?: Pick<AxiosInstance, "get"> } = {}) {
    this.http =
      http ??
      axios.create({
        baseURL: CRYPTOCOMPARE_BASE,
        headers: apiKey ? { authorization: `Apikey ${apiKey}` } : undefined,
      });
  }

  private async fetchJson<T>(
    path: string,
    params: Record<string, string | number>,
  ): Promise<T & ErrorPayload> {
    const url = `${path}?${qs.stringify(params)}`;
    let data: T & ErrorPayload;
    try {
      ({ data } = await this.http.get<T & ErrorPayload>(url));
    } catch (err) {
      const status = axios.isAxiosError(err) ? err.response?.status : undefined;
      const message = err instanceof Error ? err.message : String(err);
      throw new SourceError(`cryptocompare ${path} failed: ${message}`, "cryptocompare", status, {
        cause: err,
      });
    }
    if (data.Response === "Error") {
      throw new SourceError(data.Message || "Unknown API error", "cryptocompare");
    }
    return data;
  }

  private async request<T>(path: string, params: Record<string, string | number>): Promise<T> {
    const data = await this.fetchJson<{ Data?: T }>(path, params);
    if (data.Data === undefined) {
      throw new SourceError(`cryptocompare ${path}: missing Data`, "cryptocompare");
    }
    return data.Data;
  }

  async getHistory(
    symbol: string,
    { period = "7d", interval = "1h", vsCurrency = "USD" }: HistoryOptions = {},
  ): Promise<Bar[]> {
    const apiInterval = INTERVAL_MAP[interval];
    if (!apiInterval) throw new Error(`Unsupported interval: ${interval}`);

    const limit = historyLimit(period, interval);

    try {
      const list = await this.request<HistoRow[]>(ENDPOINTS[apiInterval], {
        fsym: symbol,
        tsym: vsCurrency,
        limit,
      });
      const bars = list
        .filter((k) => k.close > 0 && k.open > 0 && k.high > 0 && k.low > 0)
        .map<Bar>((k) => ({
          timestamp: k.time * 1000,
          open: Number(k.open),
          high: Number(k.high),
          low: Number(k.low),
          close: Number(k.close),
          volume: Number(k.volumefrom ?? 0),
        }));
      if (bars.length < list.length) {
        logger.symbol(symbol).debug(`dropped ${list.length - bars.length} bars without a price`);
      }
      return RESAMPLED.has(interval) ? resampleBars(bars, intervalMs(interval)) : bars;
    } catch (err) {
      if (err instanceof SourceError && err.rateLimited) {
        logger.symbol(symbol).warn("Rate limit reached, using demo data");
        return generateDemoBars(symbol, { interval: apiInterval });
      }
      throw err;
    }
  }

  /** Latest price per symbol; symbols the API does not know are left out. */
  async getCurrentPrices(
    symbols: readonly string[],
    vsCurrency = "USD",
  ): Promise<Record<string, number>> {
    if (!symbols.length) return {};
    try {
      const data = await this.fetchJson<PriceMulti>("/pricemulti", {
        fsyms: symbols.join(","),
        tsyms: vsCurrency,
      });
      const prices: Record<string, number> = {};
      for (const symbol of symbols) {
        const quote = data[symbol];
        const price = typeof quote === "object" ? quote[vsCurrency] : undefined;
        if (typeof price === "number" && Number.isFinite(price)) prices[symbol] = price;
      }
      return prices;
    } catch (err) {
      if (err instanceof SourceError && err.rateLimited) {
        logger.warn("Rate limit reached, using demo prices");
        return generateDemoPrices(symbols);
      }
      throw err;
    }
  }

  async listTopSymbols(limit = 50, vsCurrency = "USD"): Promise<string[]> {
    try {
      const coins = await this.request<TopCoin[]>("/top/mktcapfull", { limit, tsym: vsCurrency });
      return coins.map((c) => c.CoinInfo?.Name).filter((s): s is string => Boolean(s));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(`Could not list symbols (${message}), using defaults`);
      return [...DEFAULT_SYMBOLS];
    }
  }
}
