import type {
  Compound,
  CompoundModel,
  CompoundModels,
  RaceCondition,
  StrategyCandidate,
} from "../../../shared/types.js";
import { DRY_COMPOUNDS, WET_COMPOUNDS, isDryCompound } from "../utils/compounds.js";
import { round3 } from "../utils/stats.js";

/** Stint length search space around each compound's modeled window */
export interface StintSearchSettings {
  /** Laps either side of the window a stint may run */
  marginLaps: number;
  /** Step between candidate lengths for every stint but the last */
  stepLaps: number;
  /** No stint shorter than this */
  minStintLaps: number;
}

export const DEFAULT_STINT_SEARCH: Readonly<StintSearchSettings> = Object.freeze({
  marginLaps: 6,
  stepLaps: 2,
  minStintLaps: 5,
});

export interface StrategySearchParams {
  raceLaps: number;
  trackLengthKm: number;
  raceCondition: RaceCondition;
  pitLossSec?: number;
  maxStops?: number;
  topK?: number;
  search?: Partial<StintSearchSettings>;
}

// ─── Compound pool & sequences ───────────────────────────────────────────────

export function compoundPool(condition: RaceCondition, models: CompoundModels): Compound[] {
  const wanted =
    condition === "wet"
      ? WET_COMPOUNDS
      : condition === "mixed"
        ? [...DRY_COMPOUNDS, ...WET_COMPOUNDS]
        : DRY_COMPOUNDS;
  return wanted.filter((c) => models[c] !== undefined);
}

/** Dry races must use at least two different dry compounds */
export function isValidSequence(sequence: Compound[], condition: RaceCondition): boolean {
  if (condition !== "dry") return true;
  return new Set(sequence.filter(isDryCompound)).size >= 2;
}

/**
 * Every ordered sequence (with repetition) of the pool, for stint counts
 * minStints..maxStints, shortest first and in pool order within a length.
 */
export function* compoundSequences(
  pool: Compound[],
  minStints: number,
  maxStints: number
): Generator<Compound[]> {
  if (pool.length === 0) return;
  for (let stints = Math.max(1, minStints); stints <= maxStints; stints++) {
    const idx = new Array<number>(stints).fill(0);
    while (true) {
      yield idx.map((i) => pool[i]);

      // Odometer increment, rightmost position fastest
      let pos = stints - 1;
      while (pos >= 0 && idx[pos] === pool.length - 1) {
        idx[pos] = 0;
        pos--;
      }
      if (pos < 0) break;
      idx[pos]++;
    }
  }
}

// ─── Stint lengths ───────────────────────────────────────────────────────────

export function stintLengthRanges(
  sequence: Compound[],
  models: Map<Compound, CompoundModel>,
  settings: StintSearchSettings
): Array<[number, number]> {
  return sequence.map((compound) => {
    const window = Math.round(models.get(compound)?.windowLaps ?? 0);
    const lo = Math.max(settings.minStintLaps, window - settings.marginLaps);
    const hi = Math.max(lo, window + settings.marginLaps);
    return [lo, hi];
  });
}

/**
 * Stint length combinations that add up to exactly `totalLaps`.
 *
 * Depth-first over positions with an explicit stack. Every stint but the last
 * steps from its range minimum by `stepLaps`; the last stint takes whatever is
 * left, if that fits its range. Branches whose remainder can no longer fit the
 * remaining ranges are cut. Yields in lexicographic order.
 */
export function* enumerateStintLengths(
  ranges: Array<[number, number]>,
  totalLaps: number,
  stepLaps: number = DEFAULT_STINT_SEARCH.stepLaps
): Generator<number[]> {
  const n = ranges.length;
  if (n === 0) return;
  if (stepLaps < 1) throw new Error(`stepLaps must be >= 1 (got ${stepLaps})`);

  if (n === 1) {
    const [lo, hi] = ranges[0];
    if (lo <= totalLaps && totalLaps <= hi) yield [totalLaps];
    return;
  }

  // Bounds on what positions i..n-1 can absorb together
  const minRest = new Array<number>(n + 1).fill(0);
  const maxRest = new Array<number>(n + 1).fill(0);
  for (let i = n - 1; i >= 0; i--) {
    minRest[i] = minRest[i + 1] + ranges[i][0];
    maxRest[i] = maxRest[i + 1] + ranges[i][1];
  }

  const stack: Array<{ pos: number; lengths: number[]; remaining: number }> = [
    { pos: 0, lengths: [], remaining: totalLaps },
  ];

  while (true) {
    const frame = stack.pop();
    if (!frame) break;
    const { pos, lengths, remaining } = frame;
    const [lo, hi] = ranges[pos];

    if (pos === n - 1) {
      if (lo <= remaining && remaining <= hi) yield [...lengths, remaining];
      continue;
    }

    const children: typeof stack = [];
    for (let length = lo; length <= hi && length < remaining; length += stepLaps) {
      const rest = remaining - length;
      if (rest < minRest[pos + 1] || rest > maxRest[pos + 1]) continue;
      children.push({ pos: pos + 1, lengths: [...lengths, length], remaining: rest });
    }
    // Reverse so the shortest length is explored first
    for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
  }
}

// ─── Scoring ─────────────────────────────────────────────────────────────────

/**
 * Predicted race time: each stint runs fresh + slope·trackLength·i for
 * lap i = 0..n-1, plus one pit loss per stop.
 */
export function scoreStrategy(
  sequence: Compound[],
  stintLaps: number[],
  models: Map<Compound, CompoundModel>,
  trackLengthKm: number,
  pitLossSec: number
): number {
  let total = 0;
  sequence.forEach((compound, i) => {
    const model = models.get(compound);
    if (!model) throw new Error(`No model for ${compound}`);
    const n = stintLaps[i];
    const slopePerLap = model.slopeSecPerKm * trackLengthKm;
    total += n * model.freshLapTimeSec + (slopePerLap * n * (n - 1)) / 2;
  });
  return total + pitLossSec * (sequence.length - 1);
}

// ─── Search ──────────────────────────────────────────────────────────────────

/**
 * Every valid candidate, generated lazily in sequence order then
 * stint-length order.
 */
export function* generateCandidates(
  models: CompoundModels,
  params: StrategySearchParams
): Generator<StrategyCandidate> {
  const settings: StintSearchSettings = { ...DEFAULT_STINT_SEARCH, ...params.search };
  const pitLossSec = params.pitLossSec ?? 21;
  const maxStops = params.maxStops ?? 2;

  const pool = compoundPool(params.raceCondition, models);
  if (pool.length === 0) return;
  if (params.raceCondition === "dry" && pool.length < 2) return;

  const available = new Map<Compound, CompoundModel>();
  for (const c of pool) {
    const model = models[c];
    if (model) available.set(c, model);
  }

  for (const sequence of compoundSequences(pool, 2, maxStops + 1)) {
    if (!isValidSequence(sequence, params.raceCondition)) continue;

    const ranges = stintLengthRanges(sequence, available, settings);
    for (const stintLaps of enumerateStintLengths(ranges, params.raceLaps, settings.stepLaps)) {
      yield {
        compounds: sequence,
        stintLaps,
        stops: sequence.length - 1,
        predictedTotalTimeSec: round3(
          scoreStrategy(sequence, stintLaps, available, params.trackLengthKm, pitLossSec)
        ),
      };
    }
  }
}

/**
 * Lowest predicted-time strategies, ascending. Ties keep generation order.
 * Returns [] when the compound pool is too small or no combination of stint
 * lengths adds up to the race distance.
 */
export function optimizeStrategy(
  models: CompoundModels,
  params: StrategySearchParams
): StrategyCandidate[] {
  const topK = params.topK ?? 5;
  if (topK <= 0) return [];

  // Sorted buffer of at most topK candidates
  const best: StrategyCandidate[] = [];
  for (const candidate of generateCandidates(models, params)) {
    const time = candidate.predictedTotalTimeSec;
    if (best.length === topK && time >= best[best.length - 1].predictedTotalTimeSec) continue;

    let insertAt = best.length;
    while (insertAt > 0 && best[insertAt - 1].predictedTotalTimeSec > time) insertAt--;
    best.splice(insertAt, 0, candidate);
    if (best.length > topK) best.pop();
  }
  return best;
}
