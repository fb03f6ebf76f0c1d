import type { LapRecord, RaceSlice } from "../../../shared/types.js";
import { isCompound, isWetCompound } from "../utils/compounds.js";
import { normalizeTeamName } from "../utils/team-names.js";
import { resolveTrackInfo } from "../utils/track-catalog.js";
import type { SessionData, WeatherSample } from "../utils/session-validators.js";

const GREEN_TRACK_STATUS = "1";

/**
 * Latest weather sample at or before `time` (backward as-of join).
 * `samples` must be sorted by time ascending.
 */
export function weatherAsOf(samples: WeatherSample[], time: number | null): WeatherSample | null {
  if (time === null || samples.length === 0) return null;

  let lo = 0;
  let hi = samples.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (samples[mid].time <= time) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return found >= 0 ? samples[found] : null;
}

/**
 * Turn one session's raw laps into cleaned, weighted lap records.
 *
 * Keeps accurate green-flag laps on the five known compounds, attaches track
 * metadata and the preceding weather sample, and tags every row with the
 * slice's weight and source. Returns [] when nothing survives.
 */
export function extractSessionLaps(session: SessionData, slice: RaceSlice): LapRecord[] {
  const { event } = session;
  const track = resolveTrackInfo(event.circuitName, event.eventName);
  const weather = [...session.weather].sort((a, b) => a.time - b.time);

  const records: LapRecord[] = [];
  for (const lap of session.laps) {
    if (!lap.isAccurate || lap.trackStatus !== GREEN_TRACK_STATUS) continue;

    const compound = (lap.compound ?? "").trim().toUpperCase();
    if (!isCompound(compound)) continue;

    // Required fields: lap time, tyre-life distance, driver, team
    if (lap.lapTimeSec === null || lap.tyreLife === null) continue;
    const driver = (lap.driver ?? "").trim();
    const rawTeam = (lap.team ?? "").trim();
    if (!driver || !rawTeam) continue;

    const sample = weatherAsOf(weather, lap.time);
    const rainfall = sample?.rainfall ? 1 : 0;

    records.push({
      year: slice.year,
      roundNumber: event.roundNumber,
      eventName: event.eventName,
      driver,
      team: normalizeTeamName(rawTeam),
      lapNumber: lap.lapNumber,
      tyreLifeLaps: lap.tyreLife,
      tyreLifeKm: lap.tyreLife * track.lengthKm,
      trackLengthKm: track.lengthKm,
      compound,
      stintId: lap.stint ?? 0,
      trackType: track.type,
      isWet: isWetCompound(compound) || rainfall > 0 ? 1 : 0,
      airTemp: sample?.airTemp ?? null,
      trackTemp: sample?.trackTemp ?? null,
      humidity: sample?.humidity ?? null,
      rainfall,
      windSpeed: sample?.windSpeed ?? null,
      windDirection: sample?.windDirection ?? null,
      lapTimeSeconds: lap.lapTimeSec,
      dataWeight: slice.weight,
      dataSource: slice.source,
    });
  }

  return records;
}
