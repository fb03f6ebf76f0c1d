/**
 * Static circuit lookup: circuit name → track speed class and lap length.
 * Event names (e.g. "Bahrain Grand Prix") resolve through an alias table.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import type { TrackInfo } from "../../../shared/types.js";

const trackInfoSchema = z.object({
  type: z.enum(["Low", "Medium", "High"]),
  lengthKm: z.number().positive(),
});

const trackCatalogSchema = z.object({
  circuits: z.record(z.string(), trackInfoSchema),
  eventAliases: z.record(z.string(), z.string()).default({}),
});

export const DEFAULT_TRACK_INFO: Readonly<TrackInfo> = Object.freeze({
  type: "Medium",
  lengthKm: 5.0,
});

const catalog = trackCatalogSchema.parse(
  JSON.parse(readFileSync(new URL("../../data/tracks.json", import.meta.url), "utf-8"))
);

const CIRCUITS: ReadonlyMap<string, Readonly<TrackInfo>> = new Map(
  Object.entries(catalog.circuits).map(([name, info]) => [name, Object.freeze(info)])
);
const EVENT_ALIASES: ReadonlyMap<string, string> = new Map(
  Object.entries(catalog.eventAliases)
);

/** Look up a circuit (or grand prix event) name; unknown names get the default */
export function getTrackInfo(name: string): TrackInfo {
  const key = name.trim();
  const info = CIRCUITS.get(key) ?? CIRCUITS.get(EVENT_ALIASES.get(key) ?? "");
  return { ...(info ?? DEFAULT_TRACK_INFO) };
}

/** Resolve the first name in the list the catalog knows, else the default */
export function resolveTrackInfo(...names: Array<string | null | undefined>): TrackInfo {
  for (const name of names) {
    if (name && isKnownTrack(name)) return getTrackInfo(name);
  }
  return { ...DEFAULT_TRACK_INFO };
}

export function isKnownTrack(name: string): boolean {
  const key = name.trim();
  return CIRCUITS.has(key) || EVENT_ALIASES.has(key);
}

export function listTracks(): Array<{ circuit: string } & TrackInfo> {
  return [...CIRCUITS.entries()].map(([circuit, info]) => ({ circuit, ...info }));
}
