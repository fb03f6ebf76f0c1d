import type { LapRecord, RaceSlice, SliceSource, TargetContext } from "../../../shared/types.js";
import { AppError } from "../middleware/error-handler.js";
import { foldName } from "../utils/names.js";
import { resolveTrackInfo } from "../utils/track-catalog.js";
import { extractSessionLaps } from "./lap-extract.js";
import type { HistoricalDataProvider, ScheduleEvent, SessionKind } from "./providers/types.js";

// ─── Slice weights ───────────────────────────────────────────────────────────

/** Weights for the three races before the target, most recent first */
export const RECENT_RACE_WEIGHTS = [3.0, 2.5, 2.0] as const;
export const OLDER_CURRENT_SEASON_WEIGHT = 1.0;
export const SAME_RACE_PREV_YEAR_WEIGHT = 2.5;
export const FALLBACK_WEIGHT = 1.2;
export const FALLBACK_RACE_COUNT = 5;

export const SOURCE_WEIGHTS: Record<SliceSource, number> = {
  prev_1_race: RECENT_RACE_WEIGHTS[0],
  prev_2_race: RECENT_RACE_WEIGHTS[1],
  prev_3_race: RECENT_RACE_WEIGHTS[2],
  older_current_season: OLDER_CURRENT_SEASON_WEIGHT,
  same_race_prev_year: SAME_RACE_PREV_YEAR_WEIGHT,
  fallback_prev_season_tail: FALLBACK_WEIGHT,
};

const RECENT_SOURCES: SliceSource[] = ["prev_1_race", "prev_2_race", "prev_3_race"];

export interface WeightedHistory {
  records: LapRecord[];
  /** Slices that contributed at least one record */
  slices: RaceSlice[];
  usedFallback: boolean;
  skipped: Array<{ slice: RaceSlice; reason: string }>;
}

// ─── Target resolution ───────────────────────────────────────────────────────

/**
 * Find a grand prix on a season schedule. Accepts the canonical event name,
 * a fragment of it ("Bahrain") or the circuit/location name.
 */
export function findEvent(schedule: ScheduleEvent[], grandPrix: string): ScheduleEvent | undefined {
  const q = foldName(grandPrix);
  if (!q) return undefined;
  return (
    schedule.find((e) => foldName(e.eventName) === q) ??
    schedule.find((e) => foldName(e.eventName).includes(q)) ??
    schedule.find((e) => foldName(e.circuitName) === q)
  );
}

export async function resolveTargetContext(
  provider: HistoricalDataProvider,
  year: number,
  grandPrix: string
): Promise<TargetContext> {
  const schedule = await provider.getSchedule(year);
  const event = findEvent(schedule, grandPrix);
  if (!event) {
    throw new AppError(404, `Grand prix "${grandPrix}" not found on the ${year} schedule`, "EVENT_NOT_FOUND");
  }

  const track = resolveTrackInfo(event.circuitName, event.eventName);
  return {
    roundNumber: event.roundNumber,
    eventName: event.eventName,
    circuitName: event.circuitName,
    trackType: track.type,
    trackLengthKm: track.lengthKm,
  };
}

// ─── Slice selection ─────────────────────────────────────────────────────────

/**
 * Weighted race slices for a target: the three races before it (3.0/2.5/2.0,
 * most recent first), every earlier round of the season (1.0) and the same
 * event one year earlier (2.5).
 */
export function buildRaceSlices(
  schedule: ScheduleEvent[],
  year: number,
  target: { roundNumber: number; eventName: string }
): RaceSlice[] {
  const prior = schedule
    .filter((e) => e.roundNumber < target.roundNumber)
    .sort((a, b) => a.roundNumber - b.roundNumber);

  const recent = prior.slice(-RECENT_SOURCES.length).reverse();
  const older = prior.slice(0, Math.max(0, prior.length - recent.length));

  const slices: RaceSlice[] = recent.map((e, idx) => ({
    year,
    eventName: e.eventName,
    weight: SOURCE_WEIGHTS[RECENT_SOURCES[idx]],
    source: RECENT_SOURCES[idx],
  }));

  for (const e of older) {
    slices.push({
      year,
      eventName: e.eventName,
      weight: OLDER_CURRENT_SEASON_WEIGHT,
      source: "older_current_season",
    });
  }

  slices.push({
    year: year - 1,
    eventName: target.eventName,
    weight: SAME_RACE_PREV_YEAR_WEIGHT,
    source: "same_race_prev_year",
  });

  return slices;
}

/** Last rounds of the previous season, used when no regular slice has data */
export function buildFallbackSlices(prevSchedule: ScheduleEvent[], prevYear: number): RaceSlice[] {
  return [...prevSchedule]
    .sort((a, b) => a.roundNumber - b.roundNumber)
    .slice(-FALLBACK_RACE_COUNT)
    .map((e) => ({
      year: prevYear,
      eventName: e.eventName,
      weight: FALLBACK_WEIGHT,
      source: "fallback_prev_season_tail" as const,
    }));
}

// ─── Aggregation ─────────────────────────────────────────────────────────────

async function collectSlices(
  provider: HistoricalDataProvider,
  slices: RaceSlice[],
  kind: SessionKind,
  into: WeightedHistory
): Promise<void> {
  for (const slice of slices) {
    try {
      const session = await provider.loadSession(slice.year, slice.eventName, kind);
      const records = extractSessionLaps(session, slice);
      if (records.length === 0) {
        into.skipped.push({ slice, reason: "no usable laps" });
        console.log(`  SKIP: ${slice.year} ${slice.eventName} (${slice.source}): no usable laps`);
        continue;
      }
      into.records.push(...records);
      into.slices.push(slice);
      console.log(
        `  Loaded: ${slice.year} ${slice.eventName} (${slice.source}, w=${slice.weight}): ${records.length} laps`
      );
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      into.skipped.push({ slice, reason });
      console.warn(`  WARN: ${slice.year} ${slice.eventName} (${slice.source}) unavailable: ${reason}`);
    }
  }
}

/**
 * Build the weighted pre-race dataset for a target race. Slices that fail to
 * load are skipped; if none yields data, the tail of the previous season is
 * used instead. An empty `records` array means no history at all.
 */
export async function buildWeightedHistory(
  provider: HistoricalDataProvider,
  year: number,
  grandPrix: string,
  kind: SessionKind = "R"
): Promise<WeightedHistory> {
  const schedule = await provider.getSchedule(year);
  const target = findEvent(schedule, grandPrix);
  if (!target) {
    throw new AppError(404, `Grand prix "${grandPrix}" not found on the ${year} schedule`, "EVENT_NOT_FOUND");
  }

  const history: WeightedHistory = { records: [], slices: [], usedFallback: false, skipped: [] };
  await collectSlices(provider, buildRaceSlices(schedule, year, target), kind, history);
  if (history.records.length > 0) return history;

  // Early season or sparse cache: fall back to the end of last season
  history.usedFallback = true;
  let prevSchedule: ScheduleEvent[];
  try {
    prevSchedule = await provider.getSchedule(year - 1);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`  WARN: ${year - 1} schedule unavailable for fallback: ${reason}`);
    return history;
  }

  console.log(`  No data from regular slices, falling back to the end of ${year - 1}`);
  await collectSlices(provider, buildFallbackSlices(prevSchedule, year - 1), kind, history);
  return history;
}
