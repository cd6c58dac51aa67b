import {
  SELECTABLE_INDICATORS,
  type SelectableIndicator,
  type SelectedIndicatorSet,
} from "../indicators/types";

function isSelectable(label: string): label is SelectableIndicator {
  return (SELECTABLE_INDICATORS as readonly string[]).includes(label);
}

/** Keeps the labels the engine knows (exact, case-sensitive); others are dropped. */
export function parseSelectedIndicators(labels: Iterable<string>): SelectedIndicatorSet {
  const out = new Set<SelectableIndicator>();
  for (const label of labels) if (isSelectable(label)) out.add(label);
  return out;
}

export const ALL_INDICATORS: SelectedIndicatorSet = new Set(SELECTABLE_INDICATORS);
