import { config } from "dotenv";

config();

export type SourceName = "demo" | "cryptocompare";

export type Env = {
  CRYPTOCOMPARE_API_KEY?: string;
  DATA_SOURCE: SourceName;
  DEFAULT_INDICATORS: string[];
  TOP_N: number;
  VERBOSE: boolean;
};

export function getEnv(env: NodeJS.ProcessEnv = process.env): Env {
  const source = env.DATA_SOURCE === "cryptocompare" ? "cryptocompare" : "demo";
  const indicators = (env.DEFAULT_INDICATORS || "RSI,MACD,Bollinger Bands,EMA,SMA")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  const topN = Number(env.TOP_N || 5);
  return {
    CRYPTOCOMPARE_API_KEY: env.CRYPTOCOMPARE_API_KEY || undefined,
    DATA_SOURCE: source,
    DEFAULT_INDICATORS: indicators,
    TOP_N: Number.isInteger(topN) && topN > 0 ? topN : 5,
    VERBOSE: env.VERBOSE === "1" || env.VERBOSE === "true",
  };
}
