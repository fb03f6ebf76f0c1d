import type {
  CompoundModels,
  LapRecord,
  OverstayTable,
  RaceCondition,
  StrategyCandidate,
  StrategyReport,
} from "../../../shared/types.js";
import { env } from "../config/env.js";
import { AppError } from "../middleware/error-handler.js";
import { VALID_COMPOUNDS } from "../utils/compounds.js";
import { normalizeTeamName } from "../utils/team-names.js";
import { round3 } from "../utils/stats.js";
import type { StrategyRequest } from "../utils/strategy-validators.js";
import { buildWeightedHistory, resolveTargetContext } from "./history.js";
import { buildOverstayTable } from "./overstay.js";
import type { HistoricalDataProvider } from "./providers/types.js";
import { optimizeStrategy, type StintSearchSettings } from "./strategy-search.js";
import { buildCompoundModels, computeWetExperienceKm } from "./tire-models.js";

export interface StrategyRunOptions {
  maxStops: number;
  topK: number;
  search: StintSearchSettings;
  wetShareThreshold: number;
  rainIntensityScale: number;
}

export function defaultRunOptions(): StrategyRunOptions {
  return {
    maxStops: env.MAX_STOPS,
    topK: env.TOP_K,
    search: {
      marginLaps: env.STINT_MARGIN_LAPS,
      stepLaps: env.STINT_STEP_LAPS,
      minStintLaps: env.MIN_STINT_LAPS,
    },
    wetShareThreshold: env.WET_SHARE_THRESHOLD,
    rainIntensityScale: env.RAIN_INTENSITY_SCALE,
  };
}

/** "wet" when at least `threshold` of the historical laps were wet, else "dry" */
export function inferRaceCondition(history: LapRecord[], threshold = 0.25): RaceCondition {
  if (history.length === 0) return "dry";
  const wetLaps = history.filter((r) => r.isWet === 1).length;
  return wetLaps / history.length >= threshold ? "wet" : "dry";
}

// ─── Wire format ─────────────────────────────────────────────────────────────

function serializeModels(models: CompoundModels): StrategyReport["phase_2_compound_models"] {
  const out: StrategyReport["phase_2_compound_models"] = {};
  for (const m of Object.values(models)) {
    if (!m) continue;
    out[m.compound] = {
      slope_sec_per_km: m.slopeSecPerKm,
      intercept_sec: m.interceptSec,
      window_km: m.windowKm,
      window_laps: m.windowLaps,
      fresh_lap_time_sec: m.freshLapTimeSec,
      sample_size: m.sampleSize,
    };
  }
  return out;
}

function serializeStrategies(strategies: StrategyCandidate[]): StrategyReport["phase_3_best_strategies"] {
  return strategies.map((s) => ({
    compounds: s.compounds,
    stint_laps: s.stintLaps,
    stops: s.stops,
    predicted_total_time_sec: s.predictedTotalTimeSec,
  }));
}

function serializeOverstay(table: OverstayTable): StrategyReport["phase_3_overstay_delta"] {
  const out: StrategyReport["phase_3_overstay_delta"] = {};
  for (const compound of VALID_COMPOUNDS) {
    const rows = table[compound];
    if (!rows) continue;
    out[compound] = rows.map((r) => ({
      extra_lap: r.extraLap,
      incremental_delta_sec: r.incrementalDeltaSec,
      cumulative_delta_sec: r.cumulativeDeltaSec,
    }));
  }
  return out;
}

// ─── Run ─────────────────────────────────────────────────────────────────────

/**
 * Full planning run: weighted history → compound models → ranked strategies
 * and overstay table. Throws NO_HISTORY / NO_COMPOUND_MODELS when there is
 * nothing to plan from; an empty strategy list is a normal result.
 */
export async function runStrategy(
  request: StrategyRequest,
  provider: HistoricalDataProvider,
  options: StrategyRunOptions = defaultRunOptions()
): Promise<StrategyReport> {
  const team = normalizeTeamName(request.team);
  const target = await resolveTargetContext(provider, request.year, request.grandPrix);
  console.log(
    `Planning ${request.year} ${target.eventName} for ${request.driver} (${team}), ` +
      `${target.trackType} track, ${target.trackLengthKm} km`
  );

  // ── Phase 1: weighted history ──────────────────────────────────
  const history = await buildWeightedHistory(provider, request.year, target.eventName);
  if (history.records.length === 0) {
    throw new AppError(
      422,
      "No historical race data could be loaded for this configuration.",
      "NO_HISTORY"
    );
  }

  // ── Phase 2: degradation models ────────────────────────────────
  const wetExperienceKm = computeWetExperienceKm(
    history.records,
    request.year,
    request.driver,
    team,
    target.trackType
  );
  const models = buildCompoundModels(
    history.records,
    {
      driver: request.driver,
      team,
      trackType: target.trackType,
      trackLengthKm: target.trackLengthKm,
    },
    { wetExperienceKm, rainIntensityScale: options.rainIntensityScale }
  );
  if (Object.keys(models).length === 0) {
    throw new AppError(
      422,
      "Unable to build compound models from available history.",
      "NO_COMPOUND_MODELS"
    );
  }

  // ── Phase 3: strategy search ───────────────────────────────────
  const condition =
    request.condition === "auto"
      ? inferRaceCondition(history.records, options.wetShareThreshold)
      : request.condition;

  const strategies = optimizeStrategy(models, {
    raceLaps: request.raceLaps,
    trackLengthKm: target.trackLengthKm,
    raceCondition: condition,
    pitLossSec: request.pitLossSec,
    maxStops: options.maxStops,
    topK: options.topK,
    search: options.search,
  });
  if (strategies.length === 0) {
    console.warn(
      `  WARN: no feasible ${condition} strategy for ${request.raceLaps} laps ` +
        `with compounds ${Object.keys(models).join(", ")}`
    );
  }
  const overstay = buildOverstayTable(models, target.trackLengthKm);

  return {
    target: {
      year: request.year,
      grand_prix: request.grandPrix,
      event_name: target.eventName,
      driver: request.driver,
      team,
      track_type: target.trackType,
      track_length_km: target.trackLengthKm,
      race_laps: request.raceLaps,
      race_condition: condition,
    },
    phase_1_history_rows: history.records.length,
    phase_2_compound_models: serializeModels(models),
    phase_2_wet_experience_km: round3(wetExperienceKm),
    phase_3_best_strategies: serializeStrategies(strategies),
    phase_3_overstay_delta: serializeOverstay(overstay),
  };
}
