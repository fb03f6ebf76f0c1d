import { readFile } from "fs/promises";
import { join, resolve } from "path";
import { DataUnavailableError } from "../../middleware/error-handler.js";
import { parseLapsCsv, parseScheduleCsv, parseWeatherCsv } from "../../utils/parsers/fastf1-export.js";
import { foldName } from "../../utils/names.js";
import { scheduleSchema, sessionDataSchema } from "../../utils/session-validators.js";
import type { HistoricalDataProvider, ScheduleEvent, SessionData, SessionKind } from "./types.js";

/** "São Paulo Grand Prix" → "sao-paulo-grand-prix" */
export function eventSlug(eventName: string): string {
  return foldName(eventName)
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

async function readText(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

/**
 * Reads FastF1-style CSV exports from disk:
 *
 *   <dataDir>/<year>/schedule.csv
 *   <dataDir>/<year>/<event-slug>/<kind>/laps.csv
 *   <dataDir>/<year>/<event-slug>/<kind>/weather.csv   (optional)
 */
export function createLocalCsvProvider(dataDir: string): HistoricalDataProvider {
  const root = resolve(dataDir);
  const schedules = new Map<number, ScheduleEvent[]>();

  async function getSchedule(year: number): Promise<ScheduleEvent[]> {
    const cached = schedules.get(year);
    if (cached) return cached;

    const path = join(root, String(year), "schedule.csv");
    const text = await readText(path);
    if (text === null) {
      throw new DataUnavailableError(`No schedule export for ${year} (${path})`);
    }

    let events: ScheduleEvent[];
    try {
      events = scheduleSchema.parse(parseScheduleCsv(text));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DataUnavailableError(`Unreadable schedule for ${year}: ${reason}`);
    }
    schedules.set(year, events);
    return events;
  }

  async function loadSession(
    year: number,
    eventName: string,
    kind: SessionKind
  ): Promise<SessionData> {
    const schedule = await getSchedule(year);
    const event = schedule.find((e) => foldName(e.eventName) === foldName(eventName));
    if (!event) {
      throw new DataUnavailableError(`"${eventName}" is not on the ${year} schedule`);
    }

    const sessionDir = join(root, String(year), eventSlug(event.eventName), kind);
    const lapsText = await readText(join(sessionDir, "laps.csv"));
    if (lapsText === null) {
      throw new DataUnavailableError(`No lap export for ${year} ${event.eventName} (${kind})`);
    }
    const weatherText = await readText(join(sessionDir, "weather.csv"));

    const { laps, warnings } = parseLapsCsv(lapsText);
    for (const w of warnings.slice(0, 5)) {
      console.warn(`  WARN: ${year} ${event.eventName}: ${w}`);
    }

    const parsed = sessionDataSchema.safeParse({
      event: { year, ...event },
      laps,
      weather: weatherText === null ? [] : parseWeatherCsv(weatherText),
    });
    if (!parsed.success) {
      const issues = parsed.error.issues
        .slice(0, 5)
        .map((i) => `${i.path.join(".")}: ${i.message}`);
      throw new DataUnavailableError(
        `Session export failed validation for ${year} ${event.eventName}:\n${issues.join("\n")}`
      );
    }
    return parsed.data;
  }

  return {
    id: "local",
    name: "Local CSV exports",
    getSchedule,
    loadSession,
  };
}
