import type { CapturedRequest, RequestFilter, StatusMatcher } from "../shared/types.js";
import { InvalidArgumentError } from "../shared/errors.js";

const MIN_HTTP_STATUS = 100;
const MAX_HTTP_STATUS = 599;
const STATUS_RANGE_MULTIPLIER = 100;

function isHttpStatus(code: number): boolean {
  return Number.isInteger(code) && code >= MIN_HTTP_STATUS && code <= MAX_HTTP_STATUS;
}

/**
 * Parse a status constraint. Accepts an exact code (401 or "401"), an Nxx
 * class ("4xx") and an inclusive range ("500-503").
 */
export function parseStatusFilter(value: number | string): StatusMatcher {
  if (typeof value === "number") {
    if (!isHttpStatus(value)) {
      throw new InvalidArgumentError(`Invalid status: ${value}. Expected a code from 100 to 599.`);
    }
    return { kind: "exact", code: value };
  }

  const trimmed = value.trim().toLowerCase();

  if (/^[1-5]xx$/.test(trimmed)) {
    const min = parseInt(trimmed.charAt(0), 10) * STATUS_RANGE_MULTIPLIER;
    return { kind: "range", min, max: min + STATUS_RANGE_MULTIPLIER - 1 };
  }

  const rangeMatch = trimmed.match(/^(\d{3})-(\d{3})$/);
  if (rangeMatch && rangeMatch[1] && rangeMatch[2]) {
    const min = parseInt(rangeMatch[1], 10);
    const max = parseInt(rangeMatch[2], 10);
    if (isHttpStatus(min) && isHttpStatus(max) && min <= max) {
      return { kind: "range", min, max };
    }
  }

  if (/^\d{3}$/.test(trimmed)) {
    const code = parseInt(trimmed, 10);
    if (isHttpStatus(code)) {
      return { kind: "exact", code };
    }
  }

  throw new InvalidArgumentError(
    `Invalid status: "${value}". Use an exact code (e.g. 404), a class (e.g. 4xx) or a range (e.g. 500-503).`
  );
}

/** Raw filter options as they arrive from a tool call or the command line. */
export interface FilterInput {
  host?: string;
  method?: string;
  status?: number | string;
  urlContains?: string;
}

/**
 * Build a RequestFilter, dropping empty options and parsing the status.
 */
export function buildFilter(input: FilterInput): RequestFilter {
  const filter: RequestFilter = {};
  if (input.host) filter.host = input.host;
  if (input.method) filter.method = input.method;
  if (input.status !== undefined) filter.status = parseStatusFilter(input.status);
  if (input.urlContains) filter.urlContains = input.urlContains;
  return filter;
}

/**
 * Host match: exact, or a suffix on a dot boundary. A leading "." restricts
 * the match to subdomains.
 */
export function matchesHost(host: string, pattern: string): boolean {
  const h = host.toLowerCase();
  const p = pattern.toLowerCase();
  if (p.startsWith(".")) {
    return h.endsWith(p);
  }
  return h === p || h.endsWith(`.${p}`);
}

export function matchesStatus(status: number | undefined, matcher: StatusMatcher): boolean {
  if (status === undefined) {
    return false;
  }
  if (matcher.kind === "exact") {
    return status === matcher.code;
  }
  return status >= matcher.min && status <= matcher.max;
}

export function matchesFilter(request: CapturedRequest, filter: RequestFilter): boolean {
  if (filter.host !== undefined && !matchesHost(request.host, filter.host)) {
    return false;
  }
  if (filter.method !== undefined && request.method.toUpperCase() !== filter.method.toUpperCase()) {
    return false;
  }
  if (filter.status !== undefined && !matchesStatus(request.responseStatus, filter.status)) {
    return false;
  }
  if (
    filter.urlContains !== undefined &&
    !request.url.toLowerCase().includes(filter.urlContains.toLowerCase())
  ) {
    return false;
  }
  return true;
}

export function applyFilter(requests: CapturedRequest[], filter: RequestFilter): CapturedRequest[] {
  return requests.filter((request) => matchesFilter(request, filter));
}
