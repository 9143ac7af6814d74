import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { RequestRepository } from "../daemon/storage.js";
import { StoreUnavailableError } from "../shared/errors.js";
import type { NewCapturedRequest } from "../shared/types.js";
import { TOOLS, ToolDispatcher, type ToolResult, type ToolStore } from "./tools.js";

function makeRecord(overrides: Partial<NewCapturedRequest> = {}): NewCapturedRequest {
  return {
    timestamp: 1_700_000_000_000,
    method: "GET",
    url: "https://api.example.com/users",
    host: "api.example.com",
    path: "/users",
    requestHeaders: { accept: "application/json" },
    responseStatus: 200,
    responseHeaders: { "content-type": "application/json" },
    responseBody: Buffer.from('{"ok":true}'),
    durationMs: 40,
    ...overrides,
  };
}

function resultText(result: ToolResult): string {
  return result.content[0]?.text ?? "";
}

function resultJson(result: ToolResult) {
  return JSON.parse(resultText(result));
}

describe("ToolDispatcher", () => {
  let tempDir: string;
  let repo: RequestRepository;
  let dispatcher: ToolDispatcher;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "trafficlens-tools-test-"));
    repo = new RequestRepository(path.join(tempDir, "requests.db"));
    dispatcher = new ToolDispatcher(() => repo);
  });

  afterEach(() => {
    dispatcher.close();
    repo.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("lists the six tools", () => {
    expect(TOOLS.map((t) => t.name)).toEqual([
      "list_requests",
      "read_request",
      "search_requests",
      "get_request_stats",
      "clear_requests",
      "export_har",
    ]);
  });

  describe("list_requests", () => {
    it("paginates in id order and reports the total", () => {
      for (const p of ["/1", "/2", "/3", "/4", "/5"]) repo.append(makeRecord({ path: p }));

      const body = resultJson(dispatcher.call("list_requests", { limit: 2, offset: 1 }));

      expect(body.total).toBe(5);
      expect(body.showing).toBe(2);
      expect(body.requests.map((r: { id: number }) => r.id)).toEqual([2, 3]);
    });

    it("returns summaries with null status and duration for partial records", () => {
      repo.append(makeRecord());
      repo.append(
        makeRecord({
          responseStatus: undefined,
          responseHeaders: undefined,
          responseBody: undefined,
          durationMs: undefined,
          error: "ECONNREFUSED",
        })
      );

      const body = resultJson(dispatcher.call("list_requests", {}));

      expect(body.requests).toEqual([
        {
          id: 1,
          timestamp: "2023-11-14T22:13:20.000Z",
          method: "GET",
          host: "api.example.com",
          path: "/users",
          status: 200,
          duration_ms: 40,
        },
        {
          id: 2,
          timestamp: "2023-11-14T22:13:20.000Z",
          method: "GET",
          host: "api.example.com",
          path: "/users",
          status: null,
          duration_ms: null,
        },
      ]);
    });

    it("treats limit 0 as no limit", () => {
      for (let i = 0; i < 3; i++) repo.append(makeRecord());

      expect(resultJson(dispatcher.call("list_requests", { limit: 0 })).showing).toBe(3);
    });

    it("applies host, method, status and url filters", () => {
      repo.append(makeRecord({ host: "api.example.com", responseStatus: 404 }));
      repo.append(makeRecord({ host: "example.org", responseStatus: 404 }));
      repo.append(makeRecord({ host: "cdn.example.com", responseStatus: 200 }));
      repo.append(makeRecord({ host: "example.com", method: "POST", responseStatus: 201, url: "https://example.com/login" }));

      const ids = (args: Record<string, unknown>) =>
        resultJson(dispatcher.call("list_requests", args)).requests.map((r: { id: number }) => r.id);

      expect(ids({ host: "example.com" })).toEqual([1, 3, 4]);
      expect(ids({ host: "example.com", status: "4xx" })).toEqual([1]);
      expect(ids({ status: 404 })).toEqual([1, 2]);
      expect(ids({ method: "post" })).toEqual([4]);
      expect(ids({ url_contains: "LOGIN" })).toEqual([4]);
    });

    it("renders a text listing", () => {
      repo.append(makeRecord());

      expect(resultText(dispatcher.call("list_requests", { format: "text" }))).toBe(
        "Found 1 requests (showing 1)\n\n[1] 2023-11-14T22:13:20.000Z GET https://api.example.com/users → 200 (40ms)"
      );
    });
  });

  describe("argument validation", () => {
    it("rejects unknown keys", () => {
      const result = dispatcher.call("list_requests", { bogus: 1 });

      expect(result.isError).toBe(true);
      expect(resultJson(result)).toEqual({
        error: { code: "INVALID_ARGUMENT", message: 'Unknown argument "bogus"' },
      });
    });

    it("rejects a negative limit", () => {
      const result = resultJson(dispatcher.call("list_requests", { limit: -1 }));

      expect(result.error).toEqual({
        code: "INVALID_ARGUMENT",
        message: 'Invalid argument "limit": Number must be greater than or equal to 0',
      });
    });

    it("rejects a malformed status", () => {
      expect(resultJson(dispatcher.call("list_requests", { status: "abc" })).error.code).toBe("INVALID_ARGUMENT");
      expect(resultJson(dispatcher.call("list_requests", { status: 700 })).error.code).toBe("INVALID_ARGUMENT");
    });

    it("rejects a non-numeric id", () => {
      const result = resultJson(dispatcher.call("read_request", { id: "abc" }));

      expect(result.error).toEqual({
        code: "INVALID_ARGUMENT",
        message: 'Invalid argument "id": Expected an integer id or a numeric string',
      });
    });

    it("rejects an unknown tool", () => {
      expect(resultJson(dispatcher.call("drop_tables", {})).error).toEqual({
        code: "INVALID_ARGUMENT",
        message: "Unknown tool: drop_tables",
      });
    });

    it("does not open the store for rejected arguments", () => {
      const opener = vi.fn(() => repo);
      const lazy = new ToolDispatcher(opener);

      lazy.call("list_requests", { limit: -5 });

      expect(opener).not.toHaveBeenCalled();
    });
  });

  describe("read_request", () => {
    it("returns the full record, accepting a numeric string id", () => {
      repo.append(makeRecord());
      const id = repo.append(
        makeRecord({
          method: "POST",
          requestHeaders: { "content-type": "text/plain" },
          requestBody: Buffer.from("hello"),
          responseHeaders: { "content-type": "image/png" },
          responseBody: Buffer.from([0x89, 0x50, 0x4e, 0x47]),
          responseBodyTruncated: true,
        })
      );

      expect(resultJson(dispatcher.call("read_request", { id: String(id) }))).toEqual({
        id: 2,
        timestamp: "2023-11-14T22:13:20.000Z",
        method: "POST",
        url: "https://api.example.com/users",
        host: "api.example.com",
        path: "/users",
        request_headers: { "content-type": "text/plain" },
        request_body: "hello",
        request_body_truncated: false,
        status: 200,
        response_headers: { "content-type": "image/png" },
        response_body: "iVBORw==",
        response_body_encoding: "base64",
        response_body_truncated: true,
        duration_ms: 40,
      });
    });

    it("returns NOT_FOUND for an id never assigned", () => {
      const result = dispatcher.call("read_request", { id: 999 });

      expect(result.isError).toBe(true);
      expect(resultJson(result).error).toEqual({ code: "NOT_FOUND", message: "Request 999 not found" });
    });

    it("renders text with a code fence for JSON bodies", () => {
      const id = repo.append(makeRecord());

      const text = resultText(dispatcher.call("read_request", { id, format: "text" }));

      expect(text).toContain("**Status:** 200");
      expect(text).toContain('### Response Body\n```json\n{\n  "ok": true\n}\n```');
    });
  });

  describe("search_requests", () => {
    it("matches case-insensitively in bodies", () => {
      repo.append(makeRecord({ responseBody: Buffer.from('{"code":"FOO"}') }));
      repo.append(makeRecord({ responseBody: Buffer.from('{"code":"bar"}') }));

      const body = resultJson(dispatcher.call("search_requests", { text: "foo" }));

      expect(body.text).toBe("foo");
      expect(body.total).toBe(1);
      expect(body.requests[0].id).toBe(1);
    });

    it("rejects empty text", () => {
      expect(resultJson(dispatcher.call("search_requests", { text: "" })).error.code).toBe("INVALID_ARGUMENT");
    });
  });

  describe("get_request_stats", () => {
    it("aggregates the store", () => {
      repo.append(makeRecord({ durationMs: 10 }));
      repo.append(makeRecord({ method: "POST", responseStatus: 500, durationMs: 30 }));
      repo.append(
        makeRecord({ responseStatus: undefined, responseHeaders: undefined, responseBody: undefined, durationMs: undefined })
      );

      const stats = resultJson(dispatcher.call("get_request_stats", {}));

      expect(stats.total).toBe(3);
      expect(stats.by_method).toEqual({ GET: 2, POST: 1 });
      expect(stats.by_status_class).toEqual({ "2xx": 1, "3xx": 0, "4xx": 0, "5xx": 1, other: 0, none: 1 });
      expect(stats.duration).toEqual({ min_ms: 10, max_ms: 30, average_ms: 20 });
    });
  });

  describe("clear_requests", () => {
    it("removes everything, keeps ids monotonic and is idempotent", () => {
      for (let i = 0; i < 7; i++) repo.append(makeRecord());

      expect(resultJson(dispatcher.call("clear_requests", {}))).toEqual({ removed: 7 });
      expect(resultJson(dispatcher.call("list_requests", {})).requests).toEqual([]);
      expect(resultJson(dispatcher.call("read_request", { id: 3 })).error.code).toBe("NOT_FOUND");
      expect(repo.append(makeRecord())).toBeGreaterThan(7);
      expect(resultJson(dispatcher.call("clear_requests", {}))).toEqual({ removed: 1 });
      expect(resultJson(dispatcher.call("clear_requests", {}))).toEqual({ removed: 0 });
    });

    it("rejects arguments", () => {
      expect(resultJson(dispatcher.call("clear_requests", { all: true })).error.code).toBe("INVALID_ARGUMENT");
    });
  });

  describe("export_har", () => {
    it("exports one entry per filtered record with time equal to duration", () => {
      repo.append(makeRecord({ host: "a.test", durationMs: 12 }));
      repo.append(makeRecord({ host: "b.test", durationMs: 34 }));
      repo.append(makeRecord({ host: "a.test", durationMs: 56 }));

      const har = resultJson(dispatcher.call("export_har", { host: "a.test" }));

      expect(har.log.version).toBe("1.2");
      expect(har.log.entries.map((e: { time: number }) => e.time)).toEqual([12, 56]);
      expect(har.log.entries.map((e: { _captureId: number }) => e._captureId)).toEqual([1, 3]);
    });

    it("narrows to the requested ids", () => {
      for (let i = 0; i < 3; i++) repo.append(makeRecord());

      const har = resultJson(dispatcher.call("export_har", { ids: [3, 1, 42] }));

      expect(har.log.entries.map((e: { _captureId: number }) => e._captureId)).toEqual([1, 3]);
    });
  });

  describe("failures", () => {
    it("reopens the store on the next call after an open failure", () => {
      const opener = vi
        .fn<() => ToolStore>()
        .mockImplementationOnce(() => {
          throw new StoreUnavailableError("Store unavailable (open): disk I/O error");
        })
        .mockImplementation(() => repo);
      const retrying = new ToolDispatcher(opener);

      expect(resultJson(retrying.call("list_requests", {})).error).toEqual({
        code: "STORE_UNAVAILABLE",
        message: "Store unavailable (open): disk I/O error",
      });
      expect(resultJson(retrying.call("list_requests", {})).total).toBe(0);
      expect(opener).toHaveBeenCalledTimes(2);
    });

    it("turns unexpected faults into INTERNAL_ERROR for that call only", () => {
      repo.append(makeRecord());
      let failNext = true;
      const flaky: ToolStore = {
        snapshot: (filter) => {
          if (failNext) {
            failNext = false;
            throw new TypeError("cannot read properties of undefined");
          }
          return repo.snapshot(filter);
        },
        getRequest: (id) => repo.getRequest(id),
        clear: () => repo.clear(),
        close: () => undefined,
      };
      const faulty = new ToolDispatcher(() => flaky);

      expect(resultJson(faulty.call("get_request_stats", {})).error).toEqual({
        code: "INTERNAL_ERROR",
        message: "Internal error: cannot read properties of undefined",
      });
      expect(resultJson(faulty.call("get_request_stats", {})).total).toBe(1);
    });
  });
});
