/**
 * Shared types for historical data providers.
 *
 * Every data source (local CSV exports, OpenF1, ...) implements the
 * HistoricalDataProvider interface. The provider registry maps source IDs
 * to their factory.
 */

import type { ScheduleEvent, SessionData, SessionKind } from "../../utils/session-validators.js";

export type { ScheduleEvent, SessionData, SessionKind };

export interface HistoricalDataProvider {
  /** Unique ID used in config (DATA_PROVIDER) and CLI flags */
  id: string;

  /** Display name */
  name: string;

  /**
   * Season schedule ordered by round number, testing events excluded.
   * Throws DataUnavailableError when the season cannot be loaded.
   */
  getSchedule(year: number): Promise<ScheduleEvent[]>;

  /**
   * Lap-level records and weather for one session of an event.
   * Throws DataUnavailableError when the session cannot be loaded.
   */
  loadSession(year: number, eventName: string, kind: SessionKind): Promise<SessionData>;
}
