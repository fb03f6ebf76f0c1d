import { z } from "zod";
import { env } from "../config/env.js";
import { DataUnavailableError } from "../middleware/error-handler.js";

// ─── Wire schemas (only the fields the planner reads) ────────────────────────

const meetingSchema = z.object({
  meeting_key: z.number(),
  meeting_name: z.string(),
  circuit_short_name: z.string().nullish(),
  date_start: z.string(),
  year: z.number(),
});

const sessionSchema = z.object({
  session_key: z.number(),
  meeting_key: z.number(),
  session_name: z.string(),
  date_start: z.string(),
});

const driverSchema = z.object({
  driver_number: z.number(),
  name_acronym: z.string().nullish(),
  team_name: z.string().nullish(),
});

const lapSchema = z.object({
  driver_number: z.number(),
  lap_number: z.number(),
  lap_duration: z.number().nullish(),
  date_start: z.string().nullish(),
  is_pit_out_lap: z.boolean().nullish(),
});

const stintSchema = z.object({
  driver_number: z.number(),
  stint_number: z.number(),
  compound: z.string().nullish(),
  lap_start: z.number().nullish(),
  lap_end: z.number().nullish(),
  tyre_age_at_start: z.number().nullish(),
});

const weatherSchema = z.object({
  date: z.string(),
  air_temperature: z.number().nullish(),
  track_temperature: z.number().nullish(),
  humidity: z.number().nullish(),
  rainfall: z.number().nullish(),
  wind_speed: z.number().nullish(),
  wind_direction: z.number().nullish(),
});

const raceControlSchema = z.object({
  date: z.string(),
  lap_number: z.number().nullish(),
  category: z.string().nullish(),
  flag: z.string().nullish(),
  message: z.string().nullish(),
});

export type OpenF1Meeting = z.infer<typeof meetingSchema>;
export type OpenF1Session = z.infer<typeof sessionSchema>;
export type OpenF1Driver = z.infer<typeof driverSchema>;
export type OpenF1Lap = z.infer<typeof lapSchema>;
export type OpenF1Stint = z.infer<typeof stintSchema>;
export type OpenF1Weather = z.infer<typeof weatherSchema>;
export type OpenF1RaceControl = z.infer<typeof raceControlSchema>;

/** Minimal fetch surface so tests can hand in a stub */
export type FetchLike = (url: string) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;

export interface OpenF1Client {
  getMeetings(year: number): Promise<OpenF1Meeting[]>;
  getSessions(meetingKey: number, sessionName: string): Promise<OpenF1Session[]>;
  getDrivers(sessionKey: number): Promise<OpenF1Driver[]>;
  getLaps(sessionKey: number): Promise<OpenF1Lap[]>;
  getStints(sessionKey: number): Promise<OpenF1Stint[]>;
  getWeather(sessionKey: number): Promise<OpenF1Weather[]>;
  getRaceControl(sessionKey: number): Promise<OpenF1RaceControl[]>;
}

export const DEFAULT_MAX_CACHED_RESPONSES = 128;

/**
 * OpenF1 REST client. Responses are memoized per process, keyed by URL,
 * so a strategy run never asks for the same season or session twice.
 * The memo keeps the `maxCachedResponses` most recently used URLs.
 */
export function createOpenF1Client(
  baseUrl: string = env.OPENF1_BASE_URL,
  fetchImpl: FetchLike = fetch,
  maxCachedResponses: number = DEFAULT_MAX_CACHED_RESPONSES
): OpenF1Client {
  const cache = new Map<string, Promise<unknown>>();

  async function request(path: string, params: Record<string, string | number>): Promise<unknown> {
    const qs = new URLSearchParams(
      Object.entries(params).map(([k, v]): [string, string] => [k, String(v)])
    ).toString();
    const url = `${baseUrl.replace(/\/+$/, "")}/v1/${path}?${qs}`;

    const cached = cache.get(url);
    if (cached) {
      // Most recently used goes last
      cache.delete(url);
      cache.set(url, cached);
      return cached;
    }

    const pending = (async () => {
      let resp: Awaited<ReturnType<FetchLike>>;
      try {
        resp = await fetchImpl(url);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new DataUnavailableError(`OpenF1 request failed (${path}): ${reason}`);
      }
      if (!resp.ok) {
        throw new DataUnavailableError(`OpenF1 error ${resp.status} (${path})`);
      }
      return resp.json();
    })();

    cache.set(url, pending);
    while (cache.size > maxCachedResponses) {
      const oldest = cache.keys().next().value;
      if (oldest === undefined) break;
      cache.delete(oldest);
    }
    // Failed requests are retried on the next call
    pending.catch(() => {
      if (cache.get(url) === pending) cache.delete(url);
    });
    return pending;
  }

  async function list<T extends z.ZodTypeAny>(
    schema: T,
    path: string,
    params: Record<string, string | number>
  ): Promise<Array<z.infer<T>>> {
    const body = await request(path, params);
    const parsed = z.array(schema).safeParse(body);
    if (!parsed.success) {
      throw new DataUnavailableError(
        `Unexpected OpenF1 response for ${path}: ${parsed.error.issues[0]?.message ?? "invalid"}`
      );
    }
    return parsed.data;
  }

  return {
    getMeetings: (year) => list(meetingSchema, "meetings", { year }),
    getSessions: (meetingKey, sessionName) =>
      list(sessionSchema, "sessions", { meeting_key: meetingKey, session_name: sessionName }),
    getDrivers: (sessionKey) => list(driverSchema, "drivers", { session_key: sessionKey }),
    getLaps: (sessionKey) => list(lapSchema, "laps", { session_key: sessionKey }),
    getStints: (sessionKey) => list(stintSchema, "stints", { session_key: sessionKey }),
    getWeather: (sessionKey) => list(weatherSchema, "weather", { session_key: sessionKey }),
    getRaceControl: (sessionKey) =>
      list(raceControlSchema, "race_control", { session_key: sessionKey }),
  };
}
