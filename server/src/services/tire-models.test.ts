import { describe, expect, it } from "vitest";
import { makeRecord, makeStint } from "../test/factories.js";
import {
  buildCompoundModels,
  computeLapDeltas,
  computeWetExperienceKm,
  scopeHistory,
  type ModelTarget,
} from "./tire-models.js";

const target: ModelTarget = {
  driver: "VER",
  team: "Red Bull Racing",
  trackType: "Medium",
  trackLengthKm: 5,
};

describe("computeLapDeltas", () => {
  it("measures each lap against the fastest lap of its stint", () => {
    const records = [
      makeRecord({ stintId: 1, lapTimeSeconds: 91 }),
      makeRecord({ stintId: 1, lapTimeSeconds: 90.5 }),
      makeRecord({ stintId: 1, lapTimeSeconds: 91.2 }),
      makeRecord({ stintId: 2, lapTimeSeconds: 95 }),
      makeRecord({ stintId: 2, lapTimeSeconds: 94 }),
    ];
    const deltas = computeLapDeltas(records);
    [0.5, 0, 0.7, 1, 0].forEach((expected, i) => expect(deltas[i]).toBeCloseTo(expected, 9));
  });

  it("keeps stints with the same number apart across drivers", () => {
    const records = [
      makeRecord({ driver: "VER", lapTimeSeconds: 90 }),
      makeRecord({ driver: "PER", lapTimeSeconds: 91 }),
    ];
    expect(computeLapDeltas(records)).toEqual([0, 0]);
  });
});

describe("scopeHistory", () => {
  const history = [
    ...makeStint(8, 90, 0.02, { compound: "SOFT" }),
    ...makeStint(8, 92, 0.01, { driver: "HAM", team: "Mercedes", compound: "HARD" }),
  ];

  it("prefers the driver and team, then the team, then everyone", () => {
    expect(scopeHistory(history, target).tier).toBe("driver+team");
    expect(scopeHistory(history, { ...target, driver: "PER" }).tier).toBe("team");
    expect(scopeHistory(history, { ...target, driver: "LEC", team: "Ferrari" }).tier).toBe("all");
    expect(scopeHistory([], target)).toEqual({ tier: "none", records: [] });
  });

  it("limits the fitted compounds to the scoped records", () => {
    expect(Object.keys(buildCompoundModels(history, target))).toEqual(["SOFT"]);
    expect(Object.keys(buildCompoundModels(history, { ...target, driver: "PER" }))).toEqual(["SOFT"]);
    expect(Object.keys(buildCompoundModels(history, { ...target, driver: "LEC", team: "Ferrari" }))).toEqual([
      "SOFT",
      "HARD",
    ]);
  });
});

describe("buildCompoundModels", () => {
  it("returns no models for an empty history", () => {
    expect(buildCompoundModels([], target)).toEqual({});
  });

  it("fits linear degradation per km of tyre life", () => {
    // Tyre lives 1..10 on a 5 km track: 5..50 km, +0.02 s/km
    const { SOFT } = buildCompoundModels(makeStint(10, 90, 0.02), target);

    expect(SOFT?.slopeSecPerKm).toBeCloseTo(0.02, 9);
    expect(SOFT?.interceptSec).toBe(0);
    // 1.2 s / 0.02 = 60 km, capped at the 90th percentile of observed tyre km
    expect(SOFT?.windowKm).toBeCloseTo(45.5, 9);
    expect(SOFT?.windowLaps).toBe(9);
    expect(SOFT?.freshLapTimeSec).toBeCloseTo(90.1, 9);
    expect(SOFT?.sampleSize).toBe(10);
  });

  it("uses the default slope when there are too few laps to fit", () => {
    const { MEDIUM } = buildCompoundModels(makeStint(3, 91, 0.1, { compound: "MEDIUM" }), target);

    expect(MEDIUM).toMatchObject({ slopeSecPerKm: 0.03, interceptSec: 0, windowLaps: 3, sampleSize: 3 });
    expect(MEDIUM?.windowKm).toBeCloseTo(14, 9);
    expect(MEDIUM?.freshLapTimeSec).toBeCloseTo(91.5, 9);
  });

  it("clamps an improving lap time to zero slope", () => {
    const { HARD } = buildCompoundModels(makeStint(10, 95, -0.01, { compound: "HARD" }), target);

    expect(HARD?.slopeSecPerKm).toBe(0);
    expect(HARD?.interceptSec).toBeCloseTo(0.5, 9);
    // No slope: window is the 75th percentile of observed tyre km
    expect(HARD?.windowKm).toBeCloseTo(38.75, 9);
    expect(HARD?.windowLaps).toBe(8);
  });

  it("rounds a window of exactly two and a half laps down to the even lap count", () => {
    const longLap = { ...target, trackLengthKm: 15.5 };
    const { HARD } = buildCompoundModels(makeStint(10, 95, -0.01, { compound: "HARD" }), longLap);

    expect(HARD?.windowKm).toBeCloseTo(38.75, 9);
    expect(HARD?.windowLaps).toBe(2);
  });

  it("restricts the fit to the target track type when it has enough laps", () => {
    const medium = makeStint(12, 90, 0.01);
    const high = makeStint(12, 100, 0.1, { eventName: "Belgian Grand Prix", trackType: "High" });

    const restricted = buildCompoundModels([...medium, ...high], { ...target, trackType: "High" });
    expect(restricted.SOFT?.sampleSize).toBe(12);
    expect(restricted.SOFT?.slopeSecPerKm).toBeCloseTo(0.1, 9);

    const pooled = buildCompoundModels([...medium, ...high.slice(0, 11)], { ...target, trackType: "High" });
    expect(pooled.SOFT?.sampleSize).toBe(23);
  });

  it("discounts wet-compound wear with wet experience", () => {
    const history = [
      ...makeStint(10, 100, 0.05, { compound: "INTERMEDIATE", isWet: 1 }),
      ...makeStint(10, 90, 0.05, { compound: "SOFT", stintId: 2 }),
    ];

    const some = buildCompoundModels(history, target, { wetExperienceKm: 100 });
    expect(some.INTERMEDIATE?.slopeSecPerKm).toBeCloseTo(0.0475, 9);
    expect(some.SOFT?.slopeSecPerKm).toBeCloseTo(0.05, 9);

    const capped = buildCompoundModels(history, target, { wetExperienceKm: 5000 });
    expect(capped.INTERMEDIATE?.slopeSecPerKm).toBeCloseTo(0.04, 9);

    const scaled = buildCompoundModels(history, target, { wetExperienceKm: 100, rainIntensityScale: 2 });
    expect(scaled.INTERMEDIATE?.slopeSecPerKm).toBeCloseTo(0.045, 9);
  });

  it("keeps slope, intercept and window within bounds on noisy data", () => {
    const noise = [0.3, -0.2, 0.5, -0.4, 0.1, 0.6, -0.1, 0.2];
    const history = (["SOFT", "MEDIUM", "HARD"] as const).flatMap((compound, c) =>
      noise.map((n, i) =>
        makeRecord({
          compound,
          tyreLifeLaps: i + 1,
          lapTimeSeconds: 90 + c + n,
          dataWeight: 1 + (i % 3),
        })
      )
    );

    const models = buildCompoundModels(history, target);
    expect(Object.keys(models)).toEqual(["SOFT", "MEDIUM", "HARD"]);
    for (const model of Object.values(models)) {
      expect(model?.slopeSecPerKm).toBeGreaterThanOrEqual(0);
      expect(model?.interceptSec).toBeGreaterThanOrEqual(0);
      expect(model?.windowLaps).toBeGreaterThanOrEqual(1);
      expect(Number.isInteger(model?.windowLaps)).toBe(true);
    }
  });
});

describe("computeWetExperienceKm", () => {
  it("is zero without history", () => {
    expect(computeWetExperienceKm([], 2024, "VER", "Red Bull Racing", "Medium")).toBe(0);
  });

  it("sums wet laps for the driver and team this season on the same track type", () => {
    const history = [
      makeRecord({ isWet: 1, trackLengthKm: 5.412 }),
      makeRecord({ isWet: 1, trackLengthKm: 5.412 }),
      makeRecord({ isWet: 1, year: 2023 }),
      makeRecord({ isWet: 0 }),
      makeRecord({ isWet: 1, trackType: "High" }),
      makeRecord({ isWet: 1, driver: "HAM" }),
    ];
    expect(computeWetExperienceKm(history, 2024, "VER", "Red Bull Racing", "Medium")).toBeCloseTo(10.824, 9);
  });
});
