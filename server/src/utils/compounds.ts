import type { Compound } from "../../../shared/types.js";

export const VALID_COMPOUNDS: readonly Compound[] = ["SOFT", "MEDIUM", "HARD", "INTERMEDIATE", "WET"];
export const DRY_COMPOUNDS: readonly Compound[] = ["SOFT", "MEDIUM", "HARD"];
export const WET_COMPOUNDS: readonly Compound[] = ["INTERMEDIATE", "WET"];

export function isCompound(value: string): value is Compound {
  return VALID_COMPOUNDS.some((c) => c === value);
}

export function isWetCompound(compound: Compound): boolean {
  return WET_COMPOUNDS.includes(compound);
}

export function isDryCompound(compound: Compound): boolean {
  return DRY_COMPOUNDS.includes(compound);
}
