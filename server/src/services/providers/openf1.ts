/**
 * OpenF1 provider
 *
 * Maps OpenF1's per-endpoint tables (laps, stints, drivers, weather,
 * race_control) onto the session shape the lap extractor expects:
 *   - TyreLife is rebuilt from stint start age + laps into the stint
 *   - IsAccurate drops pit-out laps, in-laps and laps without a duration
 *   - TrackStatus is "1" unless race control neutralized that lap
 *     ("2" yellow, "4" safety car, "5" red, "6" virtual safety car)
 */

import { createOpenF1Client, type OpenF1Client, type OpenF1RaceControl, type OpenF1Stint } from "../../lib/openf1.js";
import { DataUnavailableError } from "../../middleware/error-handler.js";
import { foldName } from "../../utils/names.js";
import { sessionDataSchema, type RawLap, type WeatherSample } from "../../utils/session-validators.js";
import type { HistoricalDataProvider, ScheduleEvent, SessionData, SessionKind } from "./types.js";

const SESSION_NAMES: Record<SessionKind, string> = {
  R: "Race",
  S: "Sprint",
  Q: "Qualifying",
};

function secondsSince(startMs: number, isoDate: string): number | null {
  const ms = Date.parse(isoDate);
  return Number.isNaN(ms) ? null : (ms - startMs) / 1000;
}

const SAFETY_CAR = "4";
const RED_FLAG = "5";
const VIRTUAL_SAFETY_CAR = "6";
const YELLOW = "2";

/**
 * Lap number → status code for every neutralized lap.
 *
 * Safety car, virtual safety car and red flag periods run from the message
 * that starts them to the one that ends them ("... IN THIS LAP", "... ENDING",
 * a green light after a red flag, or "TRACK CLEAR"); every lap in between is
 * tagged. A period still open after the last message runs to `lastLap`.
 * Yellow flags only tag their own lap.
 */
export function neutralizedLaps(messages: OpenF1RaceControl[], lastLap?: number): Map<number, string> {
  const out = new Map<number, string>();
  const open = new Map<string, number>();

  const tag = (from: number, to: number, code: string) => {
    for (let lap = from; lap <= to; lap++) {
      const existing = out.get(lap) ?? "";
      if (!existing.includes(code)) out.set(lap, existing + code);
    }
  };
  const start = (lap: number, code: string) => {
    if (!open.has(code)) open.set(code, lap);
    tag(lap, lap, code);
  };
  const end = (lap: number, code: string) => {
    const from = open.get(code);
    if (from === undefined) return;
    tag(from, lap, code);
    open.delete(code);
  };

  const ordered = messages
    .flatMap((m) => (m.lap_number == null ? [] : [{ ...m, lap: m.lap_number }]))
    .sort((a, b) => a.lap - b.lap);

  for (const m of ordered) {
    const flag = (m.flag ?? "").toUpperCase();
    const text = (m.message ?? "").toUpperCase();

    if (flag === "RED") {
      start(m.lap, RED_FLAG);
    } else if (m.category === "SafetyCar") {
      const code = text.includes("VIRTUAL") ? VIRTUAL_SAFETY_CAR : SAFETY_CAR;
      if (text.includes("IN THIS LAP") || text.includes("ENDING")) {
        // The lap the car comes in is neutralized even without a matching deployment
        if (!open.has(code)) open.set(code, m.lap);
        end(m.lap, code);
      } else {
        start(m.lap, code);
      }
    } else if (flag === "YELLOW" || flag === "DOUBLE YELLOW") {
      tag(m.lap, m.lap, YELLOW);
    } else if (text.includes("TRACK CLEAR")) {
      for (const code of [...open.keys()]) end(m.lap, code);
    } else if (flag === "GREEN") {
      end(m.lap, RED_FLAG);
    }
  }

  const finalLap = lastLap ?? ordered.reduce((max, m) => Math.max(max, m.lap), 0);
  for (const [code, from] of open) tag(from, Math.max(from, finalLap), code);
  return out;
}

function findStint(stints: OpenF1Stint[], lapNumber: number): OpenF1Stint | undefined {
  return stints.find(
    (s) =>
      s.lap_start != null &&
      s.lap_end != null &&
      lapNumber >= s.lap_start &&
      lapNumber <= s.lap_end
  );
}

export function createOpenF1Provider(client: OpenF1Client = createOpenF1Client()): HistoricalDataProvider {
  const schedules = new Map<number, Array<ScheduleEvent & { meetingKey: number }>>();

  async function meetingsFor(year: number) {
    const cached = schedules.get(year);
    if (cached) return cached;

    const meetings = (await client.getMeetings(year))
      .filter((m) => !/testing/i.test(m.meeting_name))
      .sort((a, b) => Date.parse(a.date_start) - Date.parse(b.date_start));
    if (meetings.length === 0) {
      throw new DataUnavailableError(`OpenF1 has no meetings for ${year}`);
    }

    const events = meetings.map((m, idx) => ({
      roundNumber: idx + 1,
      eventName: m.meeting_name,
      circuitName: m.circuit_short_name ?? "",
      meetingKey: m.meeting_key,
    }));
    schedules.set(year, events);
    return events;
  }

  async function getSchedule(year: number): Promise<ScheduleEvent[]> {
    const events = await meetingsFor(year);
    return events.map(({ roundNumber, eventName, circuitName }) => ({
      roundNumber,
      eventName,
      circuitName,
    }));
  }

  async function loadSession(
    year: number,
    eventName: string,
    kind: SessionKind
  ): Promise<SessionData> {
    const events = await meetingsFor(year);
    const event = events.find((e) => foldName(e.eventName) === foldName(eventName));
    if (!event) {
      throw new DataUnavailableError(`"${eventName}" is not on the ${year} OpenF1 calendar`);
    }

    const [session] = await client.getSessions(event.meetingKey, SESSION_NAMES[kind]);
    if (!session) {
      throw new DataUnavailableError(`No ${SESSION_NAMES[kind]} session for ${year} ${event.eventName}`);
    }
    const startMs = Date.parse(session.date_start);

    const [drivers, laps, stints, weather, raceControl] = await Promise.all([
      client.getDrivers(session.session_key),
      client.getLaps(session.session_key),
      client.getStints(session.session_key),
      client.getWeather(session.session_key),
      client.getRaceControl(session.session_key),
    ]);

    const driverByNumber = new Map(drivers.map((d) => [d.driver_number, d]));
    const stintsByDriver = new Map<number, OpenF1Stint[]>();
    for (const s of stints) {
      let arr = stintsByDriver.get(s.driver_number);
      if (!arr) { arr = []; stintsByDriver.set(s.driver_number, arr); }
      arr.push(s);
    }
    const lastStintNumber = new Map<number, number>();
    for (const [num, arr] of stintsByDriver) {
      lastStintNumber.set(num, Math.max(...arr.map((s) => s.stint_number)));
    }
    const lastLap = laps.reduce((max, l) => Math.max(max, l.lap_number), 0);
    const neutralized = neutralizedLaps(raceControl, lastLap);

    const rawLaps: RawLap[] = laps.map((lap) => {
      const driver = driverByNumber.get(lap.driver_number);
      const stint = findStint(stintsByDriver.get(lap.driver_number) ?? [], lap.lap_number);
      const isInLap =
        stint != null &&
        stint.lap_end === lap.lap_number &&
        stint.stint_number !== lastStintNumber.get(lap.driver_number);

      const lapStart = lap.date_start ? secondsSince(startMs, lap.date_start) : null;
      const duration = lap.lap_duration ?? null;

      return {
        driver: driver?.name_acronym ?? null,
        team: driver?.team_name ?? null,
        lapNumber: lap.lap_number,
        lapTimeSec: duration,
        time: lapStart !== null && duration !== null ? lapStart + duration : null,
        compound: stint?.compound ?? null,
        tyreLife:
          stint?.lap_start != null
            ? (stint.tyre_age_at_start ?? 0) + (lap.lap_number - stint.lap_start) + 1
            : null,
        stint: stint?.stint_number ?? null,
        isAccurate: duration !== null && !lap.is_pit_out_lap && !isInLap,
        trackStatus: neutralized.get(lap.lap_number) ?? "1",
      };
    });

    const samples: WeatherSample[] = [];
    for (const w of weather) {
      const time = secondsSince(startMs, w.date);
      if (time === null) continue;
      samples.push({
        time,
        airTemp: w.air_temperature ?? null,
        trackTemp: w.track_temperature ?? null,
        humidity: w.humidity ?? null,
        rainfall: w.rainfall == null ? null : w.rainfall > 0,
        windSpeed: w.wind_speed ?? null,
        windDirection: w.wind_direction ?? null,
      });
    }
    samples.sort((a, b) => a.time - b.time);

    const parsed = sessionDataSchema.safeParse({
      event: {
        year,
        roundNumber: event.roundNumber,
        eventName: event.eventName,
        circuitName: event.circuitName,
      },
      laps: rawLaps,
      weather: samples,
    });
    if (!parsed.success) {
      throw new DataUnavailableError(
        `OpenF1 session for ${year} ${event.eventName} failed validation: ${parsed.error.issues[0]?.message ?? "invalid"}`
      );
    }
    return parsed.data;
  }

  return {
    id: "openf1",
    name: "OpenF1 API",
    getSchedule,
    loadSession,
  };
}
