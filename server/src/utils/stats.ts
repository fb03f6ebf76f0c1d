/**
 * Small numeric helpers for the degradation fitter.
 */

/**
 * Weighted median: sort by value, return the first value whose cumulative
 * weight reaches half the total. With equal weights and an even count this
 * is the lower of the two middle values. NaN for empty input.
 */
export function weightedMedian(values: number[], weights: number[]): number {
  if (values.length === 0) return NaN;
  if (weights.length !== values.length) {
    throw new Error(`weightedMedian: ${values.length} values but ${weights.length} weights`);
  }

  const order = values.map((_, i) => i).sort((a, b) => values[a] - values[b]);
  const total = weights.reduce((s, w) => s + w, 0);
  const cutoff = total / 2;

  let cumulative = 0;
  for (const i of order) {
    cumulative += weights[i];
    if (cumulative >= cutoff) return values[i];
  }
  return values[order[order.length - 1]];
}

/**
 * Quantile with linear interpolation between closest ranks (q in [0, 1]).
 * NaN for empty input.
 */
export function quantile(values: number[], q: number): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const pos = (sorted.length - 1) * Math.min(1, Math.max(0, q));
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function spread(values: number[]): number {
  if (values.length === 0) return 0;
  return Math.max(...values) - Math.min(...values);
}

/**
 * Weighted least-squares line y = slope·x + intercept.
 *
 * Each residual is scaled by its weight before squaring, so a row with
 * weight 3 pulls the fit as hard as nine rows with weight 1. Returns null
 * when x has no spread.
 */
export function weightedLinearFit(
  x: number[],
  y: number[],
  w: number[]
): { slope: number; intercept: number } | null {
  if (x.length === 0 || x.length !== y.length || x.length !== w.length) return null;

  let sw = 0;
  let swx = 0;
  let swy = 0;
  for (let i = 0; i < x.length; i++) {
    const wi = w[i] * w[i];
    sw += wi;
    swx += wi * x[i];
    swy += wi * y[i];
  }
  if (sw <= 0) return null;
  const mx = swx / sw;
  const my = swy / sw;

  let sxx = 0;
  let sxy = 0;
  for (let i = 0; i < x.length; i++) {
    const wi = w[i] * w[i];
    sxx += wi * (x[i] - mx) ** 2;
    sxy += wi * (x[i] - mx) * (y[i] - my);
  }
  if (sxx === 0) return null;

  const slope = sxy / sxx;
  return { slope, intercept: my - slope * mx };
}

export function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/** Rounds to the nearest integer, ties to the even neighbour (2.5 → 2, 3.5 → 4) */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}
