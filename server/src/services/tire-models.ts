import type {
  Compound,
  CompoundModel,
  CompoundModels,
  LapRecord,
  TrackType,
} from "../../../shared/types.js";
import { VALID_COMPOUNDS, isWetCompound } from "../utils/compounds.js";
import { quantile, roundHalfEven, spread, weightedLinearFit, weightedMedian } from "../utils/stats.js";

export interface ModelTarget {
  driver: string;
  team: string;
  trackType: TrackType;
  trackLengthKm: number;
}

export interface CompoundModelOptions {
  wetExperienceKm?: number;
  /** Lap-time loss (s) that marks the end of a compound's useful window */
  lapDeltaWindowSec?: number;
  /** Records of the target's track type needed before the fit is restricted to them */
  minTrackTypeSamples?: number;
  minFitSamples?: number;
  defaultSlopeSecPerKm?: number;
  /** Multiplier on wet experience before the wet-compound slope discount */
  rainIntensityScale?: number;
}

const DEFAULTS: Required<CompoundModelOptions> = {
  wetExperienceKm: 0,
  lapDeltaWindowSec: 1.2,
  minTrackTypeSamples: 12,
  minFitSamples: 6,
  defaultSlopeSecPerKm: 0.03,
  rainIntensityScale: 1,
};

/** Slope discount cap for wet compounds, reached at WET_EXPERIENCE_FULL_KM */
const MAX_WET_DISCOUNT = 0.2;
const WET_EXPERIENCE_FULL_KM = 2000;
const FRESH_TYRE_MAX_LAPS = 2;

// ─── Scoping ─────────────────────────────────────────────────────────────────

interface ScopeTier {
  name: string;
  matches(record: LapRecord, target: ModelTarget): boolean;
}

/** Tried in order; the first tier with any records wins */
export const SCOPE_TIERS: readonly ScopeTier[] = [
  {
    name: "driver+team",
    matches: (r, t) => r.driver === t.driver && r.team === t.team,
  },
  {
    name: "team",
    matches: (r, t) => r.team === t.team,
  },
  {
    name: "all",
    matches: () => true,
  },
];

export function scopeHistory(
  history: LapRecord[],
  target: ModelTarget
): { tier: string; records: LapRecord[] } {
  for (const tier of SCOPE_TIERS) {
    const records = history.filter((r) => tier.matches(r, target));
    if (records.length > 0) return { tier: tier.name, records };
  }
  return { tier: "none", records: [] };
}

// ─── Stint baseline ──────────────────────────────────────────────────────────

function stintKey(r: LapRecord): string {
  return [r.year, r.eventName, r.driver, r.team, r.stintId, r.compound].join("|");
}

/**
 * Lap time minus the fastest lap of the same stint. Removes fuel-load and
 * track-evolution drift so what is left is tire wear.
 */
export function computeLapDeltas(records: LapRecord[]): number[] {
  const baseline = new Map<string, number>();
  for (const r of records) {
    const key = stintKey(r);
    const best = baseline.get(key);
    if (best === undefined || r.lapTimeSeconds < best) baseline.set(key, r.lapTimeSeconds);
  }
  return records.map((r) => r.lapTimeSeconds - (baseline.get(stintKey(r)) ?? r.lapTimeSeconds));
}

// ─── Fitting ─────────────────────────────────────────────────────────────────

function fitCompound(
  compound: Compound,
  rows: Array<{ record: LapRecord; lapDelta: number }>,
  target: ModelTarget,
  opts: Required<CompoundModelOptions>
): CompoundModel {
  // Prefer data from tracks of the same speed class when there is enough of it
  const sameTrackType = rows.filter((r) => r.record.trackType === target.trackType);
  const data = sameTrackType.length >= opts.minTrackTypeSamples ? sameTrackType : rows;

  const x = data.map((r) => r.record.tyreLifeKm);
  const y = data.map((r) => r.lapDelta);
  const w = data.map((r) => r.record.dataWeight);

  let slope = opts.defaultSlopeSecPerKm;
  let intercept = 0;
  if (data.length >= opts.minFitSamples && spread(x) > 0) {
    const fit = weightedLinearFit(x, y, w);
    if (fit) {
      slope = fit.slope;
      intercept = fit.intercept;
    }
  }
  slope = Math.max(0, slope);
  intercept = Math.max(0, intercept);

  if (isWetCompound(compound) && opts.wetExperienceKm > 0) {
    const reduction = Math.min(
      MAX_WET_DISCOUNT,
      (opts.wetExperienceKm * opts.rainIntensityScale) / WET_EXPERIENCE_FULL_KM
    );
    slope *= 1 - reduction;
  }

  let windowKm = slope > 1e-6 ? opts.lapDeltaWindowSec / slope : quantile(x, 0.75);
  // Never extrapolate past the tyre ages actually observed
  windowKm = Math.min(windowKm, quantile(x, 0.9));
  const windowLaps = Math.max(1, roundHalfEven(windowKm / target.trackLengthKm));

  let fresh = data.filter((r) => r.record.tyreLifeLaps <= FRESH_TYRE_MAX_LAPS);
  if (fresh.length === 0) fresh = data;
  const freshLapTimeSec = weightedMedian(
    fresh.map((r) => r.record.lapTimeSeconds),
    fresh.map((r) => r.record.dataWeight)
  );

  return {
    compound,
    slopeSecPerKm: slope,
    interceptSec: intercept,
    windowKm,
    windowLaps,
    freshLapTimeSec,
    sampleSize: data.length,
  };
}

/**
 * Fit one degradation model per compound present in the (scoped) history.
 * Compounds without data are absent from the result.
 */
export function buildCompoundModels(
  history: LapRecord[],
  target: ModelTarget,
  options: CompoundModelOptions = {}
): CompoundModels {
  const opts: Required<CompoundModelOptions> = { ...DEFAULTS, ...options };
  const models: CompoundModels = {};
  if (history.length === 0) return models;

  const { records } = scopeHistory(history, target);
  const deltas = computeLapDeltas(records);
  const rows = records.map((record, i) => ({ record, lapDelta: deltas[i] }));

  for (const compound of VALID_COMPOUNDS) {
    const compoundRows = rows.filter((r) => r.record.compound === compound);
    if (compoundRows.length === 0) continue;
    models[compound] = fitCompound(compound, compoundRows, target, opts);
  }

  return models;
}

/**
 * Distance (km) the driver/team covered on wet laps this season at tracks of
 * the same speed class. 0 when there are none.
 */
export function computeWetExperienceKm(
  history: LapRecord[],
  targetYear: number,
  driver: string,
  team: string,
  targetTrackType: TrackType
): number {
  let total = 0;
  for (const r of history) {
    if (
      r.year === targetYear &&
      r.driver === driver &&
      r.team === team &&
      r.isWet === 1 &&
      r.trackType === targetTrackType
    ) {
      total += r.trackLengthKm;
    }
  }
  return total;
}
