import type { CapturedRequest, RequestStats, StatusClass } from "../shared/types.js";

export function statusClass(status: number | undefined): StatusClass {
  if (status === undefined) return "none";
  if (status >= 200 && status < 300) return "2xx";
  if (status >= 300 && status < 400) return "3xx";
  if (status >= 400 && status < 500) return "4xx";
  if (status >= 500 && status < 600) return "5xx";
  return "other";
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

/**
 * Aggregate counts, duration range and byte totals over a set of records.
 */
export function computeStats(requests: CapturedRequest[]): RequestStats {
  // Keys are arbitrary hostnames, "__proto__" included
  const byHost = new Map<string, number>();
  const byMethod = new Map<string, number>();
  const byStatusClass: Record<StatusClass, number> = {
    "2xx": 0,
    "3xx": 0,
    "4xx": 0,
    "5xx": 0,
    other: 0,
    none: 0,
  };

  let min = Infinity;
  let max = -Infinity;
  let durationSum = 0;
  let durationCount = 0;
  let requestBytes = 0;
  let responseBytes = 0;

  for (const request of requests) {
    increment(byHost, request.host);
    increment(byMethod, request.method);
    byStatusClass[statusClass(request.responseStatus)]++;

    if (request.durationMs !== undefined) {
      min = Math.min(min, request.durationMs);
      max = Math.max(max, request.durationMs);
      durationSum += request.durationMs;
      durationCount++;
    }

    requestBytes += request.requestBody?.length ?? 0;
    responseBytes += request.responseBody?.length ?? 0;
  }

  return {
    total: requests.length,
    byHost: Object.fromEntries(byHost),
    byMethod: Object.fromEntries(byMethod),
    byStatusClass,
    duration: durationCount > 0 ? { min, max, average: durationSum / durationCount } : null,
    requestBytes,
    responseBytes,
  };
}
