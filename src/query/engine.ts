/**
 * Read-only queries over a capture source. Every operation takes one
 * snapshot and works on that, so a capture landing mid-query is either
 * wholly included or wholly absent.
 */

import type {
  CapturedRequest,
  PageOptions,
  RequestFilter,
  RequestPage,
  RequestSource,
  RequestStats,
} from "../shared/types.js";
import { InvalidArgumentError, NotFoundError } from "../shared/errors.js";
import { decodeTextBody, getHeader } from "../shared/content-type.js";
import { applyFilter } from "./filters.js";
import { computeStats } from "./stats.js";

function checkNonNegativeInteger(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new InvalidArgumentError(`Invalid ${name}: ${value}. Expected a non-negative integer.`);
  }
}

/**
 * Skip `offset` items then take up to `limit`. An absent limit is unbounded.
 */
export function paginate<T>(items: T[], page: PageOptions = {}): T[] {
  checkNonNegativeInteger("limit", page.limit);
  checkNonNegativeInteger("offset", page.offset);

  const start = page.offset ?? 0;
  const end = page.limit === undefined ? undefined : start + page.limit;
  return items.slice(start, end);
}

function headersContain(headers: Record<string, string> | undefined, needle: string): boolean {
  if (!headers) return false;
  return Object.entries(headers).some(
    ([name, value]) => name.toLowerCase().includes(needle) || value.toLowerCase().includes(needle)
  );
}

function bodyContains(
  body: Buffer | undefined,
  headers: Record<string, string> | undefined,
  needle: string
): boolean {
  if (!body || body.length === 0) return false;
  const text = decodeTextBody(body, getHeader(headers, "content-type"));
  return text !== undefined && text.toLowerCase().includes(needle);
}

/**
 * Case-insensitive substring match over the URL, both header maps and both
 * bodies. Bodies that are not text are skipped.
 */
export function matchesSearch(request: CapturedRequest, text: string): boolean {
  const needle = text.toLowerCase();
  return (
    request.url.toLowerCase().includes(needle) ||
    headersContain(request.requestHeaders, needle) ||
    headersContain(request.responseHeaders, needle) ||
    bodyContains(request.requestBody, request.requestHeaders, needle) ||
    bodyContains(request.responseBody, request.responseHeaders, needle)
  );
}

export function searchRecords(requests: CapturedRequest[], text: string): CapturedRequest[] {
  if (text.length === 0) {
    throw new InvalidArgumentError("Search text must not be empty.");
  }
  return requests.filter((request) => matchesSearch(request, text));
}

/**
 * A fixed set of records, e.g. entries read back from a HAR archive.
 */
export class InMemoryRequestSource implements RequestSource {
  private readonly requests: CapturedRequest[];

  constructor(requests: CapturedRequest[]) {
    this.requests = [...requests].sort((a, b) => a.id - b.id);
  }

  snapshot(): CapturedRequest[] {
    return [...this.requests];
  }

  getRequest(id: number): CapturedRequest | undefined {
    return this.requests.find((request) => request.id === id);
  }
}

export class QueryEngine {
  constructor(private readonly source: RequestSource) {}

  /**
   * Filtered records in ascending id order, plus the count before paging.
   */
  list(filter: RequestFilter = {}, page: PageOptions = {}): RequestPage {
    const matched = this.filtered(filter);
    return { total: matched.length, requests: paginate(matched, page) };
  }

  getOne(id: number): CapturedRequest {
    const request = this.source.getRequest(id);
    if (!request) {
      throw new NotFoundError(`Request ${id} not found`);
    }
    return request;
  }

  search(text: string): CapturedRequest[] {
    return searchRecords(this.source.snapshot(), text);
  }

  stats(): RequestStats {
    return computeStats(this.source.snapshot());
  }

  /**
   * Every record matching the filter, unpaged. Used for export.
   */
  filtered(filter: RequestFilter = {}): CapturedRequest[] {
    return applyFilter(this.source.snapshot(filter), filter);
  }
}
