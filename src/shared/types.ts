/**
 * Core types for trafficlens
 */

/**
 * One captured exchange. A record without `responseStatus` is partial:
 * the exchange failed or never completed before the proxy gave up on it.
 */
export interface CapturedRequest {
  id: number;
  timestamp: number;
  method: string;
  url: string;
  host: string;
  path: string;
  requestHeaders: Record<string, string>;
  requestBody?: Buffer;
  requestBodyTruncated?: boolean;
  responseStatus?: number;
  responseHeaders?: Record<string, string>;
  responseBody?: Buffer;
  responseBodyTruncated?: boolean;
  durationMs?: number;
  /** Failure reason reported by the proxy engine for partial records */
  error?: string;
}

/** A record as handed to the store, before it has been given an id. */
export type NewCapturedRequest = Omit<CapturedRequest, "id">;

/**
 * Status constraint. `exact` matches a single code; `range` is inclusive on
 * both ends and also represents Nxx classes (e.g. 4xx is 400-499).
 */
export type StatusMatcher = { kind: "exact"; code: number } | { kind: "range"; min: number; max: number };

/**
 * The closed set of recognised filter options. Unset options impose no
 * constraint.
 */
export interface RequestFilter {
  /** Exact host, or dot-boundary suffix. A leading "." restricts to subdomains. */
  host?: string;
  /** Case-insensitive exact method */
  method?: string;
  status?: StatusMatcher;
  /** Case-insensitive URL substring */
  urlContains?: string;
}

export interface PageOptions {
  limit?: number;
  offset?: number;
}

export interface RequestPage {
  /** Number of records matching the filter before pagination */
  total: number;
  requests: CapturedRequest[];
}

/**
 * Read side of the capture store: everything the query engine needs.
 * `filter` is a narrowing hint; implementations may return extra records.
 */
export interface RequestSource {
  snapshot(filter?: RequestFilter): CapturedRequest[];
  getRequest(id: number): CapturedRequest | undefined;
}

/** Write side of the capture store, as seen by the capture hook. */
export interface CaptureSink {
  append(record: NewCapturedRequest): number;
}

export type StatusClass = "2xx" | "3xx" | "4xx" | "5xx" | "other" | "none";

export interface DurationStats {
  min: number;
  max: number;
  average: number;
}

export interface RequestStats {
  total: number;
  byHost: Record<string, number>;
  byMethod: Record<string, number>;
  byStatusClass: Record<StatusClass, number>;
  /** Null when no record has a duration */
  duration: DurationStats | null;
  requestBytes: number;
  responseBytes: number;
}

export interface ProxyStatus {
  running: boolean;
  pid?: number;
  proxyPort?: number;
  requestCount: number;
  version: string;
}
