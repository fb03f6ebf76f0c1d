import { describe, expect, it } from "vitest";
import type { CompoundModels } from "../../../shared/types.js";
import { buildOverstayTable } from "./overstay.js";

const models: CompoundModels = {
  SOFT: {
    compound: "SOFT",
    slopeSecPerKm: 0.05,
    interceptSec: 0,
    windowKm: 60,
    windowLaps: 11,
    freshLapTimeSec: 95,
    sampleSize: 40,
  },
  HARD: {
    compound: "HARD",
    slopeSecPerKm: 0,
    interceptSec: 0.2,
    windowKm: 150,
    windowLaps: 28,
    freshLapTimeSec: 97,
    sampleSize: 40,
  },
};

describe("buildOverstayTable", () => {
  const table = buildOverstayTable(models, 5.412);

  it("has ten rows per modeled compound", () => {
    expect(Object.keys(table)).toEqual(["SOFT", "HARD"]);
    expect(table.SOFT?.map((r) => r.extraLap)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  it("grows linearly per extra lap and accumulates", () => {
    // 0.05 s/km · 5.412 km = 0.2706 s per lap of extra age
    expect(table.SOFT?.[0]).toEqual({ extraLap: 1, incrementalDeltaSec: 0.271, cumulativeDeltaSec: 0.271 });
    expect(table.SOFT?.[1]).toEqual({ extraLap: 2, incrementalDeltaSec: 0.541, cumulativeDeltaSec: 0.812 });
    expect(table.SOFT?.[9]).toEqual({ extraLap: 10, incrementalDeltaSec: 2.706, cumulativeDeltaSec: 14.883 });
  });

  it("never decreases", () => {
    const rows = table.SOFT ?? [];
    for (let i = 1; i < rows.length; i++) {
      expect(rows[i].cumulativeDeltaSec).toBeGreaterThanOrEqual(rows[i - 1].cumulativeDeltaSec);
    }
  });

  it("is flat for a compound without wear", () => {
    expect(table.HARD?.every((r) => r.incrementalDeltaSec === 0 && r.cumulativeDeltaSec === 0)).toBe(true);
  });

  it("honours a custom row count and empty models", () => {
    expect(buildOverstayTable(models, 5.412, 3).SOFT).toHaveLength(3);
    expect(buildOverstayTable({}, 5.412)).toEqual({});
  });
});
