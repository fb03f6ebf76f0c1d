/**
 * Provider Registry
 *
 * Central registry of historical data sources.
 * To add a new source:
 *   1. Create a new file in this directory implementing HistoricalDataProvider
 *   2. Add its factory to PROVIDERS below
 *   3. That's it. DATA_PROVIDER and the CLI --provider flag pick it up
 */

import { env } from "../../config/env.js";
import type { HistoricalDataProvider } from "./types.js";
import { createLocalCsvProvider } from "./local-csv.js";
import { createOpenF1Provider } from "./openf1.js";

const PROVIDERS = new Map<string, () => HistoricalDataProvider>([
  ["local", () => createLocalCsvProvider(env.DATA_DIR)],
  ["openf1", () => createOpenF1Provider()],
]);

const instances = new Map<string, HistoricalDataProvider>();

/** Get a provider by its source ID (one shared instance per ID) */
export function getProvider(providerId: string): HistoricalDataProvider | undefined {
  const existing = instances.get(providerId);
  if (existing) return existing;

  const factory = PROVIDERS.get(providerId);
  if (!factory) return undefined;

  const provider = factory();
  instances.set(providerId, provider);
  return provider;
}

export function getProviderIds(): string[] {
  return [...PROVIDERS.keys()];
}

export type { HistoricalDataProvider, ScheduleEvent, SessionData, SessionKind } from "./types.js";
