export type Bar = {
  timestamp: number; // ms epoch
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

export type PriceSeries = {
  symbol: string;
  bars: readonly Bar[];
};

export const INDICATOR_NAMES = [
  "RSI",
  "MACD",
  "MACD_signal",
  "MACD_hist",
  "BB_upper",
  "BB_middle",
  "BB_lower",
  "SMA_50",
  "SMA_200",
  "EMA_20",
  "EMA_50",
] as const;

export type IndicatorName = (typeof INDICATOR_NAMES)[number];

/** `null` marks a bar inside the indicator's warm-up window. */
export type Line = ReadonlyArray<number | null>;

export type IndicatorSeries = {
  symbol: string;
  length: number;
  timestamps: readonly number[];
  close: readonly number[];
  volume: readonly number[];
  values: Readonly<Record<IndicatorName, Line>>;
};

export const SELECTABLE_INDICATORS = ["RSI", "MACD", "Bollinger Bands", "EMA", "SMA"] as const;

export type SelectableIndicator = (typeof SELECTABLE_INDICATORS)[number];
export type SelectedIndicatorSet = ReadonlySet<SelectableIndicator>;

export type TDirection = "Buy" | "Sell" | "Neutral";
export type TStrength = "moderate" | "strong";

/** Ordered label -> formatted value / interpretation. */
export type DetailMap = Record<string, string>;

// one indicator's contribution to the consolidated signal
export interface IIndicatorVote {
  id: SelectableIndicator;
  vote: TDirection;
  weight: number; // crossovers weigh more than position
  details: DetailMap;
}

export type VoteTally = {
  buy: number;
  sell: number;
  neutral: number;
};

export type Signal = {
  signal: TDirection;
  strength: TStrength | null; // only set for Buy/Sell
  reason: string;
  details: DetailMap;
  advice: string;
  votes: VoteTally;
};

export type BarSignal = -1 | 0 | 1;
