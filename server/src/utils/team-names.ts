import { readFileSync } from "fs";
import { z } from "zod";

const teamMappingSchema = z.record(z.string(), z.string().min(1));

// Raw names from timing feeds → canonical team (covers rebrands, e.g. Renault → Alpine)
const TEAM_MAPPING: ReadonlyMap<string, string> = new Map(
  Object.entries(
    teamMappingSchema.parse(
      JSON.parse(readFileSync(new URL("../../data/team-names.json", import.meta.url), "utf-8"))
    )
  )
);

/** Canonical team name; unknown names are returned unchanged */
export function normalizeTeamName(teamName: string): string {
  return TEAM_MAPPING.get(teamName) ?? teamName;
}
