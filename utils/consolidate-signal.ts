import {
  BollingerBandsIndicator,
  EMAIndicator,
  MACDIndicator,
  RSIIndicator,
  SMAIndicator,
} from "../indicators";
import type {
  DetailMap,
  IIndicatorVote,
  IndicatorSeries,
  SelectableIndicator,
  SelectedIndicatorSet,
  Signal,
  TDirection,
  TStrength,
  VoteTally,
} from "../indicators/types";

type Voter = (indicators: IndicatorSeries, i: number) => IIndicatorVote | null;

// evaluation order, which is also the order of the detail map
const VOTERS: Array<[SelectableIndicator, Voter]> = [
  ["RSI", (ind, i) => RSIIndicator.vote(ind, i)],
  ["MACD", MACDIndicator.vote],
  ["Bollinger Bands", (ind, i) => BollingerBandsIndicator.vote(ind, i)],
  ["SMA", SMAIndicator.vote],
  ["EMA", EMAIndicator.vote],
];

export const ADVICE: Record<TDirection, string> = {
  Buy: "Consider buying in steps to limit risk. Watch resistance levels above the current price.",
  Sell: "Consider taking profits or reducing the position. Watch support levels below the current price.",
  Neutral:
    "Wait for a clearer signal before acting. Keep a close eye on how the indicators evolve.",
};

/** Margin one side must exceed the other by before the signal leaves Neutral. */
export const HYSTERESIS = 0.5;

export function tallyVotes(votes: readonly IIndicatorVote[]): VoteTally {
  return votes.reduce<VoteTally>(
    (t, v) => {
      if (v.vote === "Buy") t.buy += v.weight;
      else if (v.vote === "Sell") t.sell += v.weight;
      else t.neutral += v.weight;
      return t;
    },
    { buy: 0, sell: 0, neutral: 0 },
  );
}

export function resolveSignal({ buy, sell }: VoteTally): {
  signal: TDirection;
  strength: TStrength | null;
  reason: string;
} {
  if (buy > sell + HYSTERESIS) {
    const strength: TStrength = buy >= 2 * sell ? "strong" : "moderate";
    return {
      signal: "Buy",
      strength,
      reason: `${strength === "strong" ? "Strong" : "Moderate"} buy signal based on ${buy.toFixed(1)} positive indicators against ${sell.toFixed(1)} negative`,
    };
  }
  if (sell > buy + HYSTERESIS) {
    const strength: TStrength = sell >= 2 * buy ? "strong" : "moderate";
    return {
      signal: "Sell",
      strength,
      reason: `${strength === "strong" ? "Strong" : "Moderate"} sell signal based on ${sell.toFixed(1)} negative indicators against ${buy.toFixed(1)} positive`,
    };
  }
  return {
    signal: "Neutral",
    strength: null,
    reason: `Mixed signals with ${buy.toFixed(1)} positive and ${sell.toFixed(1)} negative indicators`,
  };
}

/**
 * Collects one weighted vote per selected, warmed-up indicator at the latest
 * bar and folds them into a single signal. An empty series is not
 * applicable; callers skip it before getting here.
 */
export function consolidateSignal(
  indicators: IndicatorSeries,
  selected: SelectedIndicatorSet,
): Signal {
  const i = indicators.length - 1;
  const votes: IIndicatorVote[] = [];
  if (i >= 0) {
    for (const [id, voter] of VOTERS) {
      if (!selected.has(id)) continue;
      const v = voter(indicators, i);
      if (v) votes.push(v);
    }
  }

  const details: DetailMap = {};
  for (const v of votes) Object.assign(details, v.details);

  const tally = tallyVotes(votes);
  const { signal, strength, reason } = resolveSignal(tally);
  return { signal, strength, reason, details, advice: ADVICE[signal], votes: tally };
}
