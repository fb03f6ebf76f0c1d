import type { CompoundModels, OverstayRow, OverstayTable } from "../../../shared/types.js";
import { round3 } from "../utils/stats.js";

export const DEFAULT_MAX_EXTRA_LAPS = 10;

/**
 * Cost of running each compound 1..maxExtraLaps laps past its window.
 * The n-th extra lap costs slope·trackLength·n; cumulative is the running sum.
 */
export function buildOverstayTable(
  models: CompoundModels,
  trackLengthKm: number,
  maxExtraLaps: number = DEFAULT_MAX_EXTRA_LAPS
): OverstayTable {
  const table: OverstayTable = {};

  for (const model of Object.values(models)) {
    if (!model) continue;
    const slopePerLap = model.slopeSecPerKm * trackLengthKm;

    const rows: OverstayRow[] = [];
    let cumulative = 0;
    for (let extra = 1; extra <= maxExtraLaps; extra++) {
      const incremental = slopePerLap * extra;
      cumulative += incremental;
      rows.push({
        extraLap: extra,
        incrementalDeltaSec: round3(incremental),
        cumulativeDeltaSec: round3(cumulative),
      });
    }
    table[model.compound] = rows;
  }

  return table;
}
