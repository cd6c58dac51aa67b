/**
 * Recursive EMA seeded with the first value, no warm-up gate.
 * alpha = 2 / (span + 1).
 */
export function ema(values: readonly number[], span: number): number[] {
  const alpha = 2 / (span + 1);
  const out: number[] = [];
  let prev = 0;
  for (let i = 0; i < values.length; i++) {
    // prev + alpha * (x - prev) keeps a constant input exactly constant
    prev = i === 0 ? values[0] : prev + alpha * (values[i] - prev);
    out.push(prev);
  }
  return out;
}

/**
 * Bias-adjusted exponential mean with alpha = 1 / (1 + com).
 * `null` inputs are skipped; output stays `null` until `minPeriods`
 * observations have been seen.
 */
export function adjustedEwm(
  values: ReadonlyArray<number | null>,
  com: number,
  minPeriods: number,
): Array<number | null> {
  const decay = 1 - 1 / (1 + com);
  const out: Array<number | null> = [];
  let num = 0;
  let den = 0;
  let seen = 0;
  for (const v of values) {
    if (v != null) {
      num = decay * num + v;
      den = decay * den + 1;
      seen++;
    } else if (seen > 0) {
      num *= decay;
      den *= decay;
    }
    out.push(seen >= minPeriods && den > 0 ? num / den : null);
  }
  return out;
}
