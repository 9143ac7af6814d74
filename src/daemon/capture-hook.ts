import type { CaptureSink, NewCapturedRequest } from "../shared/types.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import {
  DEFAULT_MAX_BODY_BYTES,
  DEFAULT_MAX_IN_FLIGHT_FLOWS,
  DEFAULT_STALE_FLOW_TIMEOUT_MS,
  INCOMPLETE_EXCHANGE_REASON,
} from "../shared/constants.js";
import { parseRequestUrl } from "../shared/url.js";

export interface ObservedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: Buffer;
}

export interface ObservedResponse {
  status: number;
  headers: Record<string, string>;
  body?: Buffer;
  /** Engine-measured time from request to response; measured locally when absent */
  elapsedMs?: number;
}

export interface CaptureHookOptions {
  logger?: Logger;
  maxBodyBytes?: number;
  staleFlowTimeoutMs?: number;
  maxInFlightFlows?: number;
  now?: () => number;
}

interface PendingFlow {
  method: string;
  url: string;
  host: string;
  path: string;
  headers: Record<string, string>;
  body?: Buffer;
  bodyTruncated: boolean;
  startedAt: number;
  /** Response headers have arrived; the body is still being read */
  responding: boolean;
}

interface TruncatedBody {
  body?: Buffer;
  truncated: boolean;
}

/**
 * Correlates the proxy engine's request and response callbacks by flow key
 * and appends one record per exchange. Every callback swallows its own
 * failures: a capture problem is logged and the proxied traffic carries on.
 *
 * Pending flows live in an insertion-ordered map, so the first entry is
 * always the oldest. Entries that never see a response are written out as
 * partial records by sweep(), by the in-flight limit, or by flushAll().
 */
export class CaptureHook {
  private readonly stash = new Map<string, PendingFlow>();
  private readonly logger: Logger;
  private readonly maxBodyBytes: number;
  private readonly staleFlowTimeoutMs: number;
  private readonly maxInFlightFlows: number;
  private readonly now: () => number;

  constructor(
    private readonly sink: CaptureSink,
    options: CaptureHookOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.staleFlowTimeoutMs = options.staleFlowTimeoutMs ?? DEFAULT_STALE_FLOW_TIMEOUT_MS;
    this.maxInFlightFlows = options.maxInFlightFlows ?? DEFAULT_MAX_IN_FLIGHT_FLOWS;
    this.now = options.now ?? Date.now;
  }

  get inFlightCount(): number {
    return this.stash.size;
  }

  requestObserved(flowKey: string, request: ObservedRequest): void {
    try {
      if (this.stash.has(flowKey)) {
        this.logger.warn("Duplicate request for flow, replacing", { flowKey });
        this.stash.delete(flowKey);
      }

      while (this.stash.size >= this.maxInFlightFlows) {
        const oldest = this.stash.keys().next();
        if (oldest.done) break;
        this.flushAsPartial(oldest.value, "in-flight limit reached");
      }

      const { host, path } = parseRequestUrl(request.url);
      const { body, truncated } = this.truncate(request.body);

      this.stash.set(flowKey, {
        method: request.method.toUpperCase(),
        url: request.url,
        host,
        path,
        headers: request.headers,
        body,
        bodyTruncated: truncated,
        startedAt: this.now(),
        responding: false,
      });
    } catch (err) {
      this.logger.error("Failed to stash request", { flowKey, error: err });
    }
  }

  responseObserved(flowKey: string, response: ObservedResponse): void {
    const flow = this.stash.get(flowKey);
    if (!flow) {
      this.logger.warn("Response for unknown flow ignored", { flowKey, status: response.status });
      return;
    }
    this.stash.delete(flowKey);

    const timestamp = this.now();
    const { body, truncated } = this.truncate(response.body);
    const elapsed = response.elapsedMs ?? timestamp - flow.startedAt;

    this.persist(flowKey, {
      ...this.requestFields(flow, timestamp),
      responseStatus: response.status,
      responseHeaders: response.headers,
      responseBody: body,
      responseBodyTruncated: truncated,
      durationMs: Math.max(0, Math.round(elapsed)),
    });
  }

  /**
   * Mark a flow whose response is on its way. A failure reported for it
   * afterwards is ignored; the flow ends with responseObserved(), or as a
   * partial record through sweep() or flushAll().
   */
  responseStarted(flowKey: string): void {
    const flow = this.stash.get(flowKey);
    if (flow) {
      flow.responding = true;
    }
  }

  exchangeFailed(flowKey: string, reason?: string): void {
    const flow = this.stash.get(flowKey);
    if (!flow) {
      this.logger.warn("Failure for unknown flow ignored", { flowKey, reason });
      return;
    }
    if (flow.responding) {
      this.logger.debug("Failure after response started ignored", { flowKey, reason });
      return;
    }
    this.flushAsPartial(flowKey, reason ?? INCOMPLETE_EXCHANGE_REASON);
  }

  /**
   * Write out flows that have waited longer than the stale timeout.
   * Returns how many were flushed.
   */
  sweep(): number {
    const cutoff = this.now() - this.staleFlowTimeoutMs;
    const stale: string[] = [];

    for (const [flowKey, flow] of this.stash) {
      if (flow.startedAt > cutoff) break;
      stale.push(flowKey);
    }

    for (const flowKey of stale) {
      this.flushAsPartial(flowKey, `no response within ${this.staleFlowTimeoutMs}ms`);
    }

    if (stale.length > 0) {
      this.logger.info("Flushed stale flows", { count: stale.length });
    }

    return stale.length;
  }

  /**
   * Write out every pending flow. Called when the proxy shuts down.
   */
  flushAll(): number {
    const keys = [...this.stash.keys()];
    for (const flowKey of keys) {
      this.flushAsPartial(flowKey, "proxy stopped before the exchange completed");
    }
    return keys.length;
  }

  private flushAsPartial(flowKey: string, reason: string): void {
    const flow = this.stash.get(flowKey);
    if (!flow) return;
    this.stash.delete(flowKey);

    this.persist(flowKey, { ...this.requestFields(flow, this.now()), error: reason });
  }

  private requestFields(flow: PendingFlow, timestamp: number): NewCapturedRequest {
    return {
      timestamp,
      method: flow.method,
      url: flow.url,
      host: flow.host,
      path: flow.path,
      requestHeaders: flow.headers,
      requestBody: flow.body,
      requestBodyTruncated: flow.bodyTruncated,
    };
  }

  private persist(flowKey: string, record: NewCapturedRequest): void {
    try {
      const id = this.sink.append(record);
      this.logger.trace("Captured exchange", { flowKey, id, status: record.responseStatus });
    } catch (err) {
      this.logger.error("Failed to store exchange", { flowKey, url: record.url, error: err });
    }
  }

  private truncate(body: Buffer | undefined): TruncatedBody {
    if (!body || body.length === 0) {
      return { body: undefined, truncated: false };
    }
    if (body.length > this.maxBodyBytes) {
      return { body: body.subarray(0, this.maxBodyBytes), truncated: true };
    }
    return { body, truncated: false };
  }
}
