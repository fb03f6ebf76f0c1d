import { describe, expect, it } from "vitest";
import { DataUnavailableError } from "../middleware/error-handler.js";
import { createOpenF1Client, type FetchLike } from "./openf1.js";

const meeting = {
  meeting_key: 1228,
  meeting_name: "Bahrain Grand Prix",
  circuit_short_name: "Sakhir",
  date_start: "2024-02-29T11:30:00+00:00",
  year: 2024,
};

function stubFetch(respond: (url: string) => { ok: boolean; status: number; body: unknown }) {
  const calls: string[] = [];
  const fetchImpl: FetchLike = async (url) => {
    calls.push(url);
    const { ok, status, body } = respond(url);
    return { ok, status, json: async () => body };
  };
  return { calls, fetchImpl };
}

describe("createOpenF1Client", () => {
  it("builds query URLs and validates the response", async () => {
    const { calls, fetchImpl } = stubFetch(() => ({ ok: true, status: 200, body: [meeting] }));
    const client = createOpenF1Client("https://openf1.test/", fetchImpl);

    await expect(client.getMeetings(2024)).resolves.toEqual([meeting]);
    expect(calls).toEqual(["https://openf1.test/v1/meetings?year=2024"]);
  });

  it("encodes every parameter", async () => {
    const { calls, fetchImpl } = stubFetch(() => ({ ok: true, status: 200, body: [] }));
    const client = createOpenF1Client("https://openf1.test", fetchImpl);

    await client.getSessions(1228, "Race");
    expect(calls).toEqual(["https://openf1.test/v1/sessions?meeting_key=1228&session_name=Race"]);
  });

  it("asks for each URL once", async () => {
    const { calls, fetchImpl } = stubFetch(() => ({ ok: true, status: 200, body: [meeting] }));
    const client = createOpenF1Client("https://openf1.test", fetchImpl);

    await client.getMeetings(2024);
    await client.getMeetings(2024);
    await client.getMeetings(2023);
    expect(calls).toHaveLength(2);
  });

  it("forgets the least recently used URL once the memo is full", async () => {
    const { calls, fetchImpl } = stubFetch(() => ({ ok: true, status: 200, body: [meeting] }));
    const client = createOpenF1Client("https://openf1.test", fetchImpl, 2);

    await client.getMeetings(2024);
    await client.getMeetings(2023);
    await client.getMeetings(2024);
    await client.getMeetings(2022);
    await client.getMeetings(2024);
    await client.getMeetings(2023);

    expect(calls).toEqual([
      "https://openf1.test/v1/meetings?year=2024",
      "https://openf1.test/v1/meetings?year=2023",
      "https://openf1.test/v1/meetings?year=2022",
      "https://openf1.test/v1/meetings?year=2023",
    ]);
  });

  it("turns HTTP errors into unavailable data and retries next time", async () => {
    let status = 429;
    const { calls, fetchImpl } = stubFetch(() => ({ ok: status === 200, status, body: [meeting] }));
    const client = createOpenF1Client("https://openf1.test", fetchImpl);

    await expect(client.getMeetings(2024)).rejects.toThrow(/OpenF1 error 429 \(meetings\)/);
    status = 200;
    await expect(client.getMeetings(2024)).resolves.toHaveLength(1);
    expect(calls).toHaveLength(2);
  });

  it("rejects responses of the wrong shape", async () => {
    const { fetchImpl } = stubFetch(() => ({ ok: true, status: 200, body: { detail: "rate limited" } }));
    const client = createOpenF1Client("https://openf1.test", fetchImpl);

    await expect(client.getLaps(9472)).rejects.toBeInstanceOf(DataUnavailableError);
  });

  it("wraps network failures", async () => {
    const fetchImpl: FetchLike = async () => {
      throw new Error("connect ECONNREFUSED");
    };
    const client = createOpenF1Client("https://openf1.test", fetchImpl);

    await expect(client.getStints(9472)).rejects.toThrow("OpenF1 request failed (stints): connect ECONNREFUSED");
  });
});
