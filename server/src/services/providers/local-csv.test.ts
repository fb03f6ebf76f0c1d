import { fileURLToPath } from "url";
import { describe, expect, it } from "vitest";
import { DataUnavailableError } from "../../middleware/error-handler.js";
import { createLocalCsvProvider, eventSlug } from "./local-csv.js";

const dataDir = fileURLToPath(new URL("./__fixtures__/race-data", import.meta.url));

describe("eventSlug", () => {
  it("strips accents and punctuation", () => {
    expect(eventSlug("São Paulo Grand Prix")).toBe("sao-paulo-grand-prix");
    expect(eventSlug("  Emilia-Romagna  Grand Prix! ")).toBe("emilia-romagna-grand-prix");
  });
});

describe("createLocalCsvProvider", () => {
  const provider = createLocalCsvProvider(dataDir);

  it("reads the season schedule without testing", async () => {
    await expect(provider.getSchedule(2024)).resolves.toEqual([
      { roundNumber: 1, eventName: "Bahrain Grand Prix", circuitName: "Sakhir" },
      { roundNumber: 2, eventName: "São Paulo Grand Prix", circuitName: "São Paulo" },
    ]);
  });

  it("loads laps and weather for a race", async () => {
    const session = await provider.loadSession(2024, "bahrain grand prix", "R");

    expect(session.event).toEqual({
      year: 2024,
      roundNumber: 1,
      eventName: "Bahrain Grand Prix",
      circuitName: "Sakhir",
    });
    expect(session.laps).toHaveLength(3);
    expect(session.laps[1]).toEqual({
      driver: "VER",
      team: "Red Bull Racing",
      lapNumber: 2,
      lapTimeSec: expect.closeTo(96.6, 6),
      time: expect.closeTo(3898.1, 6),
      compound: "SOFT",
      tyreLife: 5,
      stint: 1,
      isAccurate: true,
      trackStatus: "1",
    });
    expect(session.weather.map((w) => w.time)).toEqual([3600, 3840]);
    expect(session.weather[0]).toMatchObject({ airTemp: 18.6, rainfall: false, windSpeed: 1.1 });
  });

  it("treats the weather export as optional", async () => {
    const session = await provider.loadSession(2024, "Sao Paulo Grand Prix", "R");
    expect(session.weather).toEqual([]);
    expect(session.laps[0]).toMatchObject({ driver: "NOR", compound: "INTERMEDIATE", tyreLife: 5 });
  });

  it("rejects a schedule whose rounds are not whole numbers", async () => {
    const error = await provider.getSchedule(2020).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(DataUnavailableError);
    expect(error).toHaveProperty("message", expect.stringMatching(/^Unreadable schedule for 2020: /));
  });

  it("reports missing data as unavailable", async () => {
    await expect(provider.getSchedule(2019)).rejects.toBeInstanceOf(DataUnavailableError);
    await expect(provider.loadSession(2024, "Monaco Grand Prix", "R")).rejects.toThrow(/not on the 2024 schedule/);
    await expect(provider.loadSession(2024, "Bahrain Grand Prix", "Q")).rejects.toThrow(/No lap export/);
  });
});
