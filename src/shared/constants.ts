/**
 * Shared constants used across the proxy, the query engine and the CLI.
 */

/** Name reported in HAR `log.creator` and the MCP server info. */
export const TRAFFICLENS_NAME = "trafficlens";

/** Default cap on captured body size, per direction. */
export const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

/** In-flight exchanges older than this are written out as partial records. */
export const DEFAULT_STALE_FLOW_TIMEOUT_MS = 5 * 60 * 1000;

/** Upper bound on exchanges waiting for a response at any one time. */
export const DEFAULT_MAX_IN_FLIGHT_FLOWS = 10_000;

/** How long a SQLite call waits on the other process's lock before failing. */
export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

/** Failure reason recorded when the proxy engine gives none. */
export const INCOMPLETE_EXCHANGE_REASON = "exchange did not complete";
