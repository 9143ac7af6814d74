import { describe, it, expect, beforeEach, vi } from "vitest";
import { CaptureHook } from "./capture-hook.js";
import type { CaptureSink, NewCapturedRequest } from "../shared/types.js";
import type { Logger } from "../shared/logger.js";

class MemorySink implements CaptureSink {
  records: NewCapturedRequest[] = [];

  append(record: NewCapturedRequest): number {
    this.records.push(record);
    return this.records.length;
  }
}

function createMockLogger(): Logger {
  return {
    level: "trace",
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
  };
}

describe("CaptureHook", () => {
  let sink: MemorySink;
  let logger: Logger;
  let clock: number;
  let hook: CaptureHook;

  beforeEach(() => {
    sink = new MemorySink();
    logger = createMockLogger();
    clock = 1_000;
    hook = new CaptureHook(sink, { logger, now: () => clock });
  });

  it("merges request and response into one record", () => {
    hook.requestObserved("flow-1", {
      method: "post",
      url: "https://API.example.com/users?x=1",
      headers: { "content-type": "application/json" },
      body: Buffer.from('{"name":"a"}'),
    });
    clock = 1_250;
    hook.responseObserved("flow-1", {
      status: 201,
      headers: { "content-type": "application/json" },
      body: Buffer.from('{"id":1}'),
    });

    expect(sink.records).toEqual([
      {
        timestamp: 1_250,
        method: "POST",
        url: "https://API.example.com/users?x=1",
        host: "api.example.com",
        path: "/users?x=1",
        requestHeaders: { "content-type": "application/json" },
        requestBody: Buffer.from('{"name":"a"}'),
        requestBodyTruncated: false,
        responseStatus: 201,
        responseHeaders: { "content-type": "application/json" },
        responseBody: Buffer.from('{"id":1}'),
        responseBodyTruncated: false,
        durationMs: 250,
      },
    ]);
    expect(hook.inFlightCount).toBe(0);
  });

  it("prefers the engine's elapsed time when supplied", () => {
    hook.requestObserved("flow-1", { method: "GET", url: "http://a.test/", headers: {} });
    clock = 5_000;
    hook.responseObserved("flow-1", { status: 200, headers: {}, elapsedMs: 12.6 });

    expect(sink.records[0]?.durationMs).toBe(13);
  });

  it("ignores a response with no matching request and logs a warning", () => {
    hook.responseObserved("unknown", { status: 200, headers: {} });

    expect(sink.records).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith("Response for unknown flow ignored", {
      flowKey: "unknown",
      status: 200,
    });
  });

  it("records a failed exchange as a partial record", () => {
    hook.requestObserved("flow-1", { method: "GET", url: "http://down.test/x", headers: {} });
    hook.exchangeFailed("flow-1", "ECONNREFUSED");

    expect(sink.records).toHaveLength(1);
    const record = sink.records[0];
    expect(record?.responseStatus).toBeUndefined();
    expect(record?.durationMs).toBeUndefined();
    expect(record?.error).toBe("ECONNREFUSED");
    expect(record?.host).toBe("down.test");
  });

  it("uses a default reason when the engine gives none", () => {
    hook.requestObserved("flow-1", { method: "GET", url: "http://down.test/", headers: {} });
    hook.exchangeFailed("flow-1");

    expect(sink.records[0]?.error).toBe("exchange did not complete");
  });

  it("keeps the response when an abort arrives while its body is read", () => {
    hook.requestObserved("flow-1", { method: "GET", url: "http://slow.test/", headers: {} });
    hook.responseStarted("flow-1");
    hook.exchangeFailed("flow-1", "socket hang up");

    expect(sink.records).toHaveLength(0);

    hook.responseObserved("flow-1", { status: 200, headers: {}, body: Buffer.from("done") });

    expect(sink.records).toHaveLength(1);
    expect(sink.records[0]?.responseStatus).toBe(200);
    expect(sink.records[0]?.responseBody?.toString()).toBe("done");
    expect(sink.records[0]?.error).toBeUndefined();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("flushes a flow whose response never finished as partial on shutdown", () => {
    hook.requestObserved("flow-1", { method: "GET", url: "http://slow.test/", headers: {} });
    hook.responseStarted("flow-1");

    expect(hook.flushAll()).toBe(1);
    expect(sink.records[0]?.error).toBe("proxy stopped before the exchange completed");
  });

  it("keeps concurrent flows apart", () => {
    hook.requestObserved("a", { method: "GET", url: "http://a.test/", headers: {} });
    hook.requestObserved("b", { method: "GET", url: "http://b.test/", headers: {} });
    hook.responseObserved("b", { status: 404, headers: {} });
    hook.responseObserved("a", { status: 200, headers: {} });

    expect(sink.records.map((r) => [r.host, r.responseStatus])).toEqual([
      ["b.test", 404],
      ["a.test", 200],
    ]);
  });

  it("swallows and logs store failures", () => {
    const failing: CaptureSink = {
      append: () => {
        throw new Error("database is locked");
      },
    };
    const failingHook = new CaptureHook(failing, { logger });

    failingHook.requestObserved("flow-1", { method: "GET", url: "http://a.test/", headers: {} });
    expect(() => failingHook.responseObserved("flow-1", { status: 200, headers: {} })).not.toThrow();
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(failingHook.inFlightCount).toBe(0);
  });

  it("truncates bodies over the limit and flags them", () => {
    const small = new CaptureHook(sink, { maxBodyBytes: 4 });
    small.requestObserved("flow-1", {
      method: "POST",
      url: "http://a.test/",
      headers: {},
      body: Buffer.from("abcdefgh"),
    });
    small.responseObserved("flow-1", { status: 200, headers: {}, body: Buffer.from("1234") });

    expect(sink.records[0]?.requestBody).toEqual(Buffer.from("abcd"));
    expect(sink.records[0]?.requestBodyTruncated).toBe(true);
    expect(sink.records[0]?.responseBody).toEqual(Buffer.from("1234"));
    expect(sink.records[0]?.responseBodyTruncated).toBe(false);
  });

  it("drops empty bodies", () => {
    hook.requestObserved("flow-1", { method: "GET", url: "http://a.test/", headers: {}, body: Buffer.alloc(0) });
    hook.responseObserved("flow-1", { status: 204, headers: {}, body: Buffer.alloc(0) });

    expect(sink.records[0]?.requestBody).toBeUndefined();
    expect(sink.records[0]?.responseBody).toBeUndefined();
  });

  describe("bounded stash", () => {
    it("sweep flushes only flows older than the timeout", () => {
      const timed = new CaptureHook(sink, { staleFlowTimeoutMs: 100, now: () => clock });
      timed.requestObserved("old", { method: "GET", url: "http://old.test/", headers: {} });
      clock = 1_080;
      timed.requestObserved("new", { method: "GET", url: "http://new.test/", headers: {} });
      clock = 1_150;

      expect(timed.sweep()).toBe(1);
      expect(sink.records.map((r) => r.host)).toEqual(["old.test"]);
      expect(sink.records[0]?.error).toBe("no response within 100ms");
      expect(timed.inFlightCount).toBe(1);

      timed.responseObserved("old", { status: 200, headers: {} });
      expect(sink.records).toHaveLength(1);
    });

    it("flushes the oldest flow when the in-flight limit is reached", () => {
      const bounded = new CaptureHook(sink, { maxInFlightFlows: 2 });
      bounded.requestObserved("1", { method: "GET", url: "http://one.test/", headers: {} });
      bounded.requestObserved("2", { method: "GET", url: "http://two.test/", headers: {} });
      bounded.requestObserved("3", { method: "GET", url: "http://three.test/", headers: {} });

      expect(bounded.inFlightCount).toBe(2);
      expect(sink.records.map((r) => [r.host, r.error])).toEqual([["one.test", "in-flight limit reached"]]);
    });

    it("flushAll writes every pending flow", () => {
      hook.requestObserved("1", { method: "GET", url: "http://one.test/", headers: {} });
      hook.requestObserved("2", { method: "GET", url: "http://two.test/", headers: {} });

      expect(hook.flushAll()).toBe(2);
      expect(sink.records.every((r) => r.responseStatus === undefined)).toBe(true);
      expect(hook.inFlightCount).toBe(0);
    });
  });
});
