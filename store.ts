import fs from "node:fs/promises";
import path from "node:path";
import {
  INDICATOR_NAMES,
  type BarSignal,
  type DetailMap,
  type IndicatorName,
  type IndicatorSeries,
  type Signal,
  type TDirection,
} from "./indicators/types";
import { logger } from "./utils/logger";

export type IndicatorRow = {
  symbol: string;
  timestamp: number;
  indicatorName: IndicatorName;
  value: number;
};

export type SignalRow = {
  symbol: string;
  timestamp: number;
  signalType: TDirection;
  reason: string;
  details: DetailMap;
  priceAtSignal: number;
};

export interface IndicatorStore {
  saveIndicators(symbol: string, indicators: IndicatorSeries): Promise<number>;
}

export interface SignalStore {
  saveSignal(row: SignalRow): Promise<void>;
}

/** One row per defined value; warm-up bars produce no rows. */
export function toIndicatorRows(symbol: string, indicators: IndicatorSeries): IndicatorRow[] {
  const rows: IndicatorRow[] = [];
  for (let i = 0; i < indicators.length; i++) {
    for (const name of INDICATOR_NAMES) {
      const value = indicators.values[name][i];
      if (value == null) continue;
      rows.push({ symbol, timestamp: indicators.timestamps[i], indicatorName: name, value });
    }
  }
  return rows;
}

/** Stamps the signal with the latest bar; `null` for an empty series. */
export function toSignalRow(
  symbol: string,
  signal: Signal,
  indicators: IndicatorSeries,
): SignalRow | null {
  const i = indicators.length - 1;
  if (i < 0) return null;
  return {
    symbol,
    timestamp: indicators.timestamps[i],
    signalType: signal.signal,
    reason: signal.reason,
    details: { ...signal.details },
    priceAtSignal: indicators.close[i],
  };
}

export class MemoryStore implements IndicatorStore, SignalStore {
  private readonly indicatorRows: IndicatorRow[] = [];
  private readonly signalRows: SignalRow[] = [];

  async saveIndicators(symbol: string, indicators: IndicatorSeries): Promise<number> {
    const rows = toIndicatorRows(symbol, indicators);
    this.indicatorRows.push(...rows);
    return rows.length;
  }

  async saveSignal(row: SignalRow): Promise<void> {
    this.signalRows.push({ ...row, details: { ...row.details } });
  }

  indicators(symbol?: string): IndicatorRow[] {
    return this.indicatorRows.filter((r) => symbol == null || r.symbol === symbol).map((r) => ({ ...r }));
  }

  /** Most recent first. */
  recentSignals(limit = 10): SignalRow[] {
    return [...this.signalRows]
      .sort((a, b) => b.timestamp - a.timestamp)
      .slice(0, limit)
      .map((r) => ({ ...r, details: { ...r.details } }));
  }
}

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Writes `<SYMBOL>_indicators.csv` per symbol and appends to `signals.csv`. */
export class CsvStore implements IndicatorStore, SignalStore {
  constructor(private readonly dir: string) {}

  async saveIndicators(
    symbol: string,
    indicators: IndicatorSeries,
    barSignals?: readonly BarSignal[],
  ): Promise<number> {
    await fs.mkdir(this.dir, { recursive: true });
    const header = ["timestamp", "close", ...INDICATOR_NAMES, ...(barSignals ? ["bar_signal"] : [])];
    const lines = [header.join(",")];
    for (let i = 0; i < indicators.length; i++) {
      const cells: Array<string | number> = [indicators.timestamps[i], indicators.close[i]];
      for (const name of INDICATOR_NAMES) cells.push(indicators.values[name][i] ?? "");
      if (barSignals) cells.push(barSignals[i] ?? 0);
      lines.push(cells.map(csvField).join(","));
    }
    const fileName = path.join(this.dir, `${symbol.toUpperCase().replace(/\s+/g, "")}_indicators.csv`);
    await fs.writeFile(fileName, lines.join("\n") + "\n");
    logger.debug(`Indicators saved to ${fileName}`);
    return indicators.length;
  }

  async saveSignal(row: SignalRow): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const fileName = path.join(this.dir, "signals.csv");
    const exists = await fs
      .access(fileName)
      .then(() => true)
      .catch(() => false);
    const line = [
      row.symbol,
      row.timestamp,
      row.signalType,
      row.reason,
      JSON.stringify(row.details),
      row.priceAtSignal,
    ]
      .map(csvField)
      .join(",");
    const header = exists ? "" : "symbol,timestamp,signal_type,reason,details,price_at_signal\n";
    await fs.appendFile(fileName, header + line + "\n");
  }
}
