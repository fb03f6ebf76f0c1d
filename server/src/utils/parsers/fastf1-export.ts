/**
 * FastF1-style CSV export parser
 *
 * Reads the three tables a session export is made of:
 *   1. schedule.csv: RoundNumber, EventName, Location (or CircuitName)
 *   2. laps.csv: Driver, Team, LapNumber, LapTime, Time, Compound, TyreLife,
 *      Stint, IsAccurate, TrackStatus
 *   3. weather.csv: Time, AirTemp, TrackTemp, Humidity, Rainfall, WindSpeed,
 *      WindDirection
 *
 * Durations may be plain seconds or timedelta strings ("0 days 01:02:03.456000").
 */

import { parseCSV, mapHeaders, col, numCol, boolCol, parseDuration } from "./csv-utils.js";
import type { RawLap, ScheduleEvent, WeatherSample } from "../session-validators.js";

export function parseScheduleCsv(text: string): ScheduleEvent[] {
  const rows = parseCSV(text);
  if (rows.length < 2) throw new Error("Schedule CSV has no data rows");
  const hdr = mapHeaders(rows[0]);

  const events: ScheduleEvent[] = [];
  for (let i = 1; i < rows.length; i++) {
    const row = rows[i];
    const roundNumber = numCol(row, hdr, "roundnumber");
    const eventName = col(row, hdr, "eventname");
    // Round 0 is pre-season testing
    if (roundNumber === null || roundNumber < 1 || !eventName) continue;
    if (/testing/i.test(col(row, hdr, "eventformat"))) continue;

    events.push({
      roundNumber,
      eventName,
      circuitName: col(row, hdr, "circuitname") || col(row, hdr, "location"),
    });
  }

  return events.sort((a, b) => a.roundNumber - b.roundNumber);
}

export function parseLapsCsv(text: string): { laps: RawLap[]; warnings: string[] } {
  const rows = parseCSV(text);
  if (rows.length < 2) return { laps: [], warnings: ["Laps CSV has no data rows"] };
  const hdr = mapHeaders(rows[0]);
  const warnings: string[] = [];

  const laps: RawLap[] = [];
  for (let i = 1; i < rows.length; i++) {
    const row = rows[i];
    const lapNumber = numCol(row, hdr, "lapnumber");
    if (lapNumber === null || lapNumber < 1 || !Number.isInteger(lapNumber)) {
      warnings.push(`Row ${i + 1}: invalid LapNumber, skipped`);
      continue;
    }

    laps.push({
      driver: col(row, hdr, "driver") || null,
      team: col(row, hdr, "team") || null,
      lapNumber,
      lapTimeSec: parseDuration(col(row, hdr, "laptime")),
      time: parseDuration(col(row, hdr, "time")),
      compound: col(row, hdr, "compound") || null,
      tyreLife: numCol(row, hdr, "tyrelife"),
      stint: numCol(row, hdr, "stint"),
      isAccurate: boolCol(row, hdr, "isaccurate") ?? false,
      trackStatus: col(row, hdr, "trackstatus").replace(/\.0$/, ""),
    });
  }

  return { laps, warnings };
}

export function parseWeatherCsv(text: string): WeatherSample[] {
  const rows = parseCSV(text);
  if (rows.length < 2) return [];
  const hdr = mapHeaders(rows[0]);

  const samples: WeatherSample[] = [];
  for (let i = 1; i < rows.length; i++) {
    const row = rows[i];
    const time = parseDuration(col(row, hdr, "time"));
    if (time === null) continue;

    samples.push({
      time,
      airTemp: numCol(row, hdr, "airtemp"),
      trackTemp: numCol(row, hdr, "tracktemp"),
      humidity: numCol(row, hdr, "humidity"),
      rainfall: boolCol(row, hdr, "rainfall"),
      windSpeed: numCol(row, hdr, "windspeed"),
      windDirection: numCol(row, hdr, "winddirection"),
    });
  }

  return samples.sort((a, b) => a.time - b.time);
}
