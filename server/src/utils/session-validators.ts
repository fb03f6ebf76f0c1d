import { z } from "zod";

// ─── Provider output: race schedule ──────────────────────────────────────────

export const scheduleEventSchema = z.object({
  roundNumber: z.number().int().positive(),
  eventName: z.string().min(1),
  circuitName: z.string().default(""),
});

export type ScheduleEvent = z.infer<typeof scheduleEventSchema>;

export const scheduleSchema = z.array(scheduleEventSchema);

// ─── Provider output: session laps (pre-normalization) ───────────────────────

const optionalNumber = z.number().finite().nullable().default(null);

export const rawLapSchema = z.object({
  driver: z.string().nullable(),
  team: z.string().nullable(),
  lapNumber: z.number().int().positive(),
  lapTimeSec: optionalNumber,
  /** Session time (seconds) at which the lap was completed */
  time: optionalNumber,
  compound: z.string().nullable(),
  tyreLife: optionalNumber,
  stint: optionalNumber,
  isAccurate: z.boolean(),
  /** Concatenated track status codes seen during the lap ("1" = green) */
  trackStatus: z.string(),
});

export type RawLap = z.infer<typeof rawLapSchema>;

// ─── Provider output: weather samples ────────────────────────────────────────

export const weatherSampleSchema = z.object({
  time: z.number().finite(),
  airTemp: optionalNumber,
  trackTemp: optionalNumber,
  humidity: optionalNumber,
  rainfall: z.boolean().nullable().default(null),
  windSpeed: optionalNumber,
  windDirection: optionalNumber,
});

export type WeatherSample = z.infer<typeof weatherSampleSchema>;

// ─── Provider output: full session ───────────────────────────────────────────

/** R = race, S = sprint, Q = qualifying */
export type SessionKind = "R" | "S" | "Q";

export const sessionDataSchema = z.object({
  event: z.object({
    year: z.number().int(),
    roundNumber: z.number().int().positive(),
    eventName: z.string().min(1),
    circuitName: z.string().default(""),
  }),
  laps: z.array(rawLapSchema),
  weather: z.array(weatherSampleSchema).default([]),
});

export type SessionData = z.infer<typeof sessionDataSchema>;
