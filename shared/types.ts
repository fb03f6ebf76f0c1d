// ─── Tires & Tracks ───────────────────────────────────────────────────────────

export type Compound = "SOFT" | "MEDIUM" | "HARD" | "INTERMEDIATE" | "WET";

export type TrackType = "Low" | "Medium" | "High";

export type RaceCondition = "dry" | "wet" | "mixed";

export interface TrackInfo {
  type: TrackType;
  lengthKm: number;
}

// ─── History ──────────────────────────────────────────────────────────────────

export type SliceSource =
  | "prev_1_race"
  | "prev_2_race"
  | "prev_3_race"
  | "older_current_season"
  | "same_race_prev_year"
  | "fallback_prev_season_tail";

export interface RaceSlice {
  year: number;
  eventName: string;
  weight: number;
  source: SliceSource;
}

/** One cleaned, weighted lap from a historical race session */
export interface LapRecord {
  year: number;
  roundNumber: number;
  eventName: string;
  driver: string;
  team: string;
  lapNumber: number;
  tyreLifeLaps: number;
  tyreLifeKm: number;
  trackLengthKm: number;
  compound: Compound;
  stintId: number;
  trackType: TrackType;
  isWet: 0 | 1;
  airTemp: number | null;
  trackTemp: number | null;
  humidity: number | null;
  rainfall: 0 | 1;
  windSpeed: number | null;
  windDirection: number | null;
  lapTimeSeconds: number;
  dataWeight: number;
  dataSource: SliceSource;
}

export interface TargetContext {
  roundNumber: number;
  eventName: string;
  circuitName: string;
  trackType: TrackType;
  trackLengthKm: number;
}

// ─── Models & Strategies ──────────────────────────────────────────────────────

export interface CompoundModel {
  compound: Compound;
  slopeSecPerKm: number;
  interceptSec: number;
  windowKm: number;
  windowLaps: number;
  freshLapTimeSec: number;
  sampleSize: number;
}

export type CompoundModels = Partial<Record<Compound, CompoundModel>>;

export interface StrategyCandidate {
  compounds: Compound[];
  stintLaps: number[];
  stops: number;
  predictedTotalTimeSec: number;
}

export interface OverstayRow {
  extraLap: number;
  incrementalDeltaSec: number;
  cumulativeDeltaSec: number;
}

export type OverstayTable = Partial<Record<Compound, OverstayRow[]>>;

// ─── Report (wire format) ─────────────────────────────────────────────────────

export interface StrategyReport {
  target: {
    year: number;
    grand_prix: string;
    event_name: string;
    driver: string;
    team: string;
    track_type: TrackType;
    track_length_km: number;
    race_laps: number;
    race_condition: RaceCondition;
  };
  phase_1_history_rows: number;
  phase_2_compound_models: Partial<
    Record<
      Compound,
      {
        slope_sec_per_km: number;
        intercept_sec: number;
        window_km: number;
        window_laps: number;
        fresh_lap_time_sec: number;
        sample_size: number;
      }
    >
  >;
  phase_2_wet_experience_km: number;
  phase_3_best_strategies: Array<{
    compounds: Compound[];
    stint_laps: number[];
    stops: number;
    predicted_total_time_sec: number;
  }>;
  phase_3_overstay_delta: Partial<
    Record<
      Compound,
      Array<{
        extra_lap: number;
        incremental_delta_sec: number;
        cumulative_delta_sec: number;
      }>
    >
  >;
}

// ─── API Responses ────────────────────────────────────────────────────────────

export interface ApiError {
  error: string;
  code?: string;
  details?: Array<{ field: string; message: string }>;
}
