import chalk from "chalk";
import Table from "cli-table3";
import { Command } from "commander";
import { analyzeSymbol, type SymbolAnalysis } from "./analyzer";
import { CryptoCompareClient, DEFAULT_SYMBOLS } from "./cryptocompare";
import { getEnv, type SourceName } from "./env";
import { createSource } from "./get-price-series";
import type { PriceSeries, TDirection } from "./indicators/types";
import { CsvStore, toSignalRow } from "./store";
import { parsePositiveInt, parseSourceName } from "./utils/cli-args";
import { formatCurrency, formatDate } from "./utils/format";
import { logger } from "./utils/logger";
import { rankScores } from "./utils/rank";
import { parseSelectedIndicators } from "./utils/selection";

type CommonOptions = {
  symbols?: string;
  indicators?: string;
  period: string;
  interval: string;
  source?: SourceName;
  csvDir?: string;
  verbose?: boolean;
};

const env = getEnv();

const SIGNAL_COLORS: Record<TDirection, (s: string) => string> = {
  Buy: chalk.green,
  Sell: chalk.red,
  Neutral: chalk.gray,
};

function splitList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

async function loadSeries(symbols: string[], opts: CommonOptions): Promise<PriceSeries[]> {
  const source = createSource(opts.source ?? env.DATA_SOURCE, { apiKey: env.CRYPTOCOMPARE_API_KEY });
  logger.info(`Fetching ${symbols.length} symbols from ${source.name}`);

  const results = await Promise.allSettled(
    symbols.map((s) => source.fetch(s, { period: opts.period, interval: opts.interval })),
  );
  const out: PriceSeries[] = [];
  results.forEach((r, i) => {
    if (r.status === "fulfilled") out.push(r.value);
    else {
      const message = r.reason instanceof Error ? r.reason.message : String(r.reason);
      logger.symbol(symbols[i]).error(message);
    }
  });
  return out;
}

async function analyzeAll(opts: CommonOptions): Promise<SymbolAnalysis[]> {
  logger.setVerbose(Boolean(opts.verbose) || env.VERBOSE);
  const selected = parseSelectedIndicators(splitList(opts.indicators, env.DEFAULT_INDICATORS));
  const symbols = splitList(opts.symbols, DEFAULT_SYMBOLS).map((s) => s.toUpperCase());

  const analyses: SymbolAnalysis[] = [];
  for (const series of await loadSeries(symbols, opts)) {
    const analysis = analyzeSymbol(series, selected);
    if (analysis) analyses.push(analysis);
  }

  if (opts.csvDir) {
    const store = new CsvStore(opts.csvDir);
    for (const a of analyses) {
      await store.saveIndicators(a.symbol, a.indicators, a.barSignals);
      const row = toSignalRow(a.symbol, a.signal, a.indicators);
      if (row) await store.saveSignal(row);
    }
    logger.success(`Saved ${analyses.length} symbols to ${opts.csvDir}`);
  }
  return analyses;
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option("-s, --symbols <list>", "comma-separated symbols")
    .option("-i, --indicators <list>", 'e.g. "RSI,MACD,Bollinger Bands,EMA,SMA"')
    .option("-p, --period <period>", "1d | 7d | 30d | 90d", "7d")
    .option("--interval <interval>", "1m | 5m | 15m | 1h | 4h | 1d", "1h")
    .option("--source <source>", "demo | cryptocompare", parseSourceName)
    .option("--csv-dir <dir>", "write indicators and signals as CSV")
    .option("-v, --verbose", "debug logging");
}

const program = new Command();
program.name("ta-signals").description("Technical-indicator scoring and signals for a set of assets");

withCommonOptions(program.command("rank").description("Rank symbols by promise score"))
  .option("-n, --top <n>", "how many symbols to show", parsePositiveInt, env.TOP_N)
  .action(async (opts: CommonOptions & { top: number }) => {
    const analyses = await analyzeAll(opts);
    const ranked = rankScores(new Map(analyses.map((a) => [a.symbol, a.score])), opts.top);

    logger.header(`Top ${ranked.length} by score`);
    const table = new Table({ head: ["#", "Symbol", "Score", "Price", "Signal"] });
    ranked.forEach((r, idx) => {
      const a = analyses.find((x) => x.symbol === r.symbol);
      const last = a ? a.indicators.close[a.indicators.length - 1] : undefined;
      const signal = a?.signal.signal ?? "Neutral";
      table.push([idx + 1, r.symbol, r.score.toFixed(1), formatCurrency(last), SIGNAL_COLORS[signal](signal)]);
    });
    console.log(table.toString());
  });

withCommonOptions(program.command("signals").description("Consolidated signal per symbol")).action(
  async (opts: CommonOptions) => {
    const analyses = await analyzeAll(opts);
    for (const a of analyses) {
      const { signal } = a;
      const last = a.indicators.length - 1;
      const label = signal.strength ? `${signal.signal} (${signal.strength})` : signal.signal;
      logger.header(
        `${a.symbol}  ${formatCurrency(a.indicators.close[last])}  ${formatDate(a.indicators.timestamps[last])}`,
      );
      console.log(`${SIGNAL_COLORS[signal.signal](label)}  ${signal.reason}`);
      const table = new Table({ head: ["Indicator", "Value"] });
      for (const [k, v] of Object.entries(signal.details)) table.push([k, v]);
      console.log(table.toString());
      console.log(chalk.italic(signal.advice));
    }
  },
);

program
  .command("symbols")
  .description("List the largest assets by market cap")
  .option("-l, --limit <n>", "how many", parsePositiveInt, 50)
  .action(async (opts: { limit: number }) => {
    const client = new CryptoCompareClient({ apiKey: env.CRYPTOCOMPARE_API_KEY });
    const symbols = await client.listTopSymbols(opts.limit);
    console.log(symbols.join(", "));
  });

program
  .command("prices")
  .description("Latest price per symbol")
  .option("-s, --symbols <list>", "comma-separated symbols")
  .action(async (opts: { symbols?: string }) => {
    const client = new CryptoCompareClient({ apiKey: env.CRYPTOCOMPARE_API_KEY });
    const symbols = splitList(opts.symbols, DEFAULT_SYMBOLS).map((s) => s.toUpperCase());
    const prices = await client.getCurrentPrices(symbols);

    const table = new Table({ head: ["Symbol", "Price"] });
    for (const symbol of symbols) table.push([symbol, formatCurrency(prices[symbol])]);
    console.log(table.toString());
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
