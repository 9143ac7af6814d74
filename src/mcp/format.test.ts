import { describe, it, expect } from "vitest";
import { formatBody, formatRequestText, formatStatsText, formatSummaryLine, toToolSummary } from "./format.js";
import { computeStats } from "../query/stats.js";
import { makePartialRequest, makeRequest } from "../../tests/fixtures/requests.js";

describe("formatBody", () => {
  it("replaces binary bodies with a size placeholder", () => {
    expect(formatBody(Buffer.alloc(1536), "application/octet-stream")).toBe("[binary data, 1.5KB]");
  });

  it("keeps malformed JSON as raw text", () => {
    expect(formatBody(Buffer.from("{nope"), "application/json")).toBe("{nope");
  });

  it("passes plain text through", () => {
    expect(formatBody(Buffer.from("hi there"), "text/plain")).toBe("hi there");
  });
});

describe("summaries", () => {
  it("marks incomplete exchanges", () => {
    const request = makePartialRequest({ id: 12, timestamp: 0, url: "http://down.test/" });

    expect(formatSummaryLine(request)).toBe("[12] 1970-01-01T00:00:00.000Z GET http://down.test/ → incomplete");
    expect(toToolSummary(request)).toMatchObject({ id: 12, status: null, duration_ms: null });
  });

  it("shows the failure reason in the detail view", () => {
    const text = formatRequestText(makePartialRequest({ error: "ECONNREFUSED" }));

    expect(text).toContain("**Status:** incomplete (ECONNREFUSED)");
    expect(text).not.toContain("### Response Headers");
  });
});

describe("formatStatsText", () => {
  it("lists hosts by count", () => {
    const stats = computeStats([
      makeRequest({ host: "b.test", durationMs: 10 }),
      makeRequest({ host: "a.test", durationMs: 20 }),
      makeRequest({ host: "a.test", durationMs: 30, responseStatus: 404 }),
    ]);

    const lines = formatStatsText(stats).split("\n");

    expect(lines.slice(0, 4)).toEqual([
      "Total requests: 3",
      "Request data: 0B",
      expect.stringMatching(/^Response data: \d+B$/),
      "Duration: min 10ms, max 30ms, avg 20.0ms",
    ]);
    expect(lines).toContain("  a.test: 2");
    expect(lines.indexOf("  a.test: 2")).toBeLessThan(lines.indexOf("  b.test: 1"));
    expect(lines).toContain("  4xx: 1");
  });
});
