/**
 * Wire and text renderings of records for tool results.
 */

import type { CapturedRequest, RequestStats } from "../shared/types.js";
import { decodeTextBody, getHeader, isJsonContentType } from "../shared/content-type.js";
import { formatSize } from "../shared/formatters.js";

const JSON_INDENT = 2;
const TOP_HOSTS = 10;

export interface ToolSummary {
  id: number;
  timestamp: string;
  method: string;
  host: string;
  path: string;
  status: number | null;
  duration_ms: number | null;
}

export function toToolSummary(request: CapturedRequest): ToolSummary {
  return {
    id: request.id,
    timestamp: new Date(request.timestamp).toISOString(),
    method: request.method,
    host: request.host,
    path: request.path,
    status: request.responseStatus ?? null,
    duration_ms: request.durationMs ?? null,
  };
}

/**
 * JSON-safe representation of a CapturedRequest. Text bodies are UTF-8
 * strings; other bodies are base64 with `*_body_encoding: "base64"`.
 */
export interface SerialisedRequest {
  id: number;
  timestamp: string;
  method: string;
  url: string;
  host: string;
  path: string;
  request_headers: Record<string, string>;
  request_body: string | null;
  request_body_encoding?: "base64";
  request_body_truncated: boolean;
  status: number | null;
  response_headers: Record<string, string> | null;
  response_body: string | null;
  response_body_encoding?: "base64";
  response_body_truncated: boolean;
  duration_ms: number | null;
  error?: string;
}

interface WireBody {
  text: string | null;
  base64: boolean;
}

function bodyToWire(body: Buffer | undefined, headers: Record<string, string> | undefined): WireBody {
  if (!body || body.length === 0) {
    return { text: null, base64: false };
  }
  const text = decodeTextBody(body, getHeader(headers, "content-type"));
  return text !== undefined ? { text, base64: false } : { text: body.toString("base64"), base64: true };
}

export function serialiseRequest(request: CapturedRequest): SerialisedRequest {
  const requestBody = bodyToWire(request.requestBody, request.requestHeaders);
  const responseBody = bodyToWire(request.responseBody, request.responseHeaders);

  return {
    id: request.id,
    timestamp: new Date(request.timestamp).toISOString(),
    method: request.method,
    url: request.url,
    host: request.host,
    path: request.path,
    request_headers: request.requestHeaders,
    request_body: requestBody.text,
    ...(requestBody.base64 ? { request_body_encoding: "base64" as const } : {}),
    request_body_truncated: request.requestBodyTruncated ?? false,
    status: request.responseStatus ?? null,
    response_headers: request.responseHeaders ?? null,
    response_body: responseBody.text,
    ...(responseBody.base64 ? { response_body_encoding: "base64" as const } : {}),
    response_body_truncated: request.responseBodyTruncated ?? false,
    duration_ms: request.durationMs ?? null,
    ...(request.error !== undefined ? { error: request.error } : {}),
  };
}

export interface SerialisedStats {
  total: number;
  by_host: Record<string, number>;
  by_method: Record<string, number>;
  by_status_class: Record<string, number>;
  duration: { min_ms: number; max_ms: number; average_ms: number } | null;
  request_bytes: number;
  response_bytes: number;
}

export function serialiseStats(stats: RequestStats): SerialisedStats {
  return {
    total: stats.total,
    by_host: stats.byHost,
    by_method: stats.byMethod,
    by_status_class: stats.byStatusClass,
    duration: stats.duration
      ? { min_ms: stats.duration.min, max_ms: stats.duration.max, average_ms: stats.duration.average }
      : null,
    request_bytes: stats.requestBytes,
    response_bytes: stats.responseBytes,
  };
}

/**
 * Format a body buffer for display in text output.
 *
 * - **Binary**: `[binary data, N]`
 * - **JSON**: pretty-printed inside a ```json code fence, raw text when it does not parse
 * - **Other text**: the UTF-8 string
 */
export function formatBody(body: Buffer, contentType: string | undefined): string {
  const text = decodeTextBody(body, contentType);
  if (text === undefined) {
    return `[binary data, ${formatSize(body.length)}]`;
  }

  if (isJsonContentType(contentType)) {
    try {
      return "```json\n" + JSON.stringify(JSON.parse(text), null, JSON_INDENT) + "\n```";
    } catch {
      // Malformed JSON falls through to raw text
    }
  }

  return text;
}

/**
 * One line per record: `[id] timestamp METHOD url → status (Nms)`.
 */
export function formatSummaryLine(request: CapturedRequest): string {
  const ts = new Date(request.timestamp).toISOString();
  const status = request.responseStatus !== undefined ? ` → ${request.responseStatus}` : " → incomplete";
  const duration = request.durationMs !== undefined ? ` (${request.durationMs}ms)` : "";
  return `[${request.id}] ${ts} ${request.method} ${request.url}${status}${duration}`;
}

export function formatSummaryList(heading: string, requests: CapturedRequest[]): string {
  if (requests.length === 0) {
    return `${heading}\n\nNo requests.`;
  }
  return [heading, "", ...requests.map(formatSummaryLine)].join("\n");
}

function pushHeaders(lines: string[], title: string, headers: Record<string, string> | undefined): void {
  if (!headers || Object.keys(headers).length === 0) return;
  lines.push("", `### ${title}`);
  for (const [name, value] of Object.entries(headers)) {
    lines.push(`- **${name}:** ${value}`);
  }
}

function pushBody(
  lines: string[],
  title: string,
  body: Buffer | undefined,
  headers: Record<string, string> | undefined,
  truncated: boolean | undefined
): void {
  if (!body || body.length === 0) return;
  lines.push("", `### ${title}`, formatBody(body, getHeader(headers, "content-type")));
  if (truncated) {
    lines.push("_(truncated)_");
  }
}

/**
 * Markdown-ish block with headers and bodies, for `format: "text"`.
 */
export function formatRequestText(request: CapturedRequest): string {
  const lines: string[] = [
    `## ${request.method} ${request.url}`,
    `**ID:** ${request.id}`,
    `**Timestamp:** ${new Date(request.timestamp).toISOString()}`,
    `**Host:** ${request.host}`,
    `**Path:** ${request.path}`,
  ];

  if (request.responseStatus !== undefined) {
    lines.push(`**Status:** ${request.responseStatus}`);
  } else {
    lines.push(`**Status:** incomplete (${request.error ?? "no response"})`);
  }
  if (request.durationMs !== undefined) {
    lines.push(`**Duration:** ${request.durationMs}ms`);
  }

  pushHeaders(lines, "Request Headers", request.requestHeaders);
  pushBody(lines, "Request Body", request.requestBody, request.requestHeaders, request.requestBodyTruncated);
  pushHeaders(lines, "Response Headers", request.responseHeaders);
  pushBody(lines, "Response Body", request.responseBody, request.responseHeaders, request.responseBodyTruncated);

  return lines.join("\n");
}

function byCountDescending(counts: Record<string, number>): [string, number][] {
  return Object.entries(counts).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

export function formatStatsText(stats: RequestStats): string {
  const lines = [
    `Total requests: ${stats.total}`,
    `Request data: ${formatSize(stats.requestBytes)}`,
    `Response data: ${formatSize(stats.responseBytes)}`,
  ];

  if (stats.duration) {
    const { min, max, average } = stats.duration;
    lines.push(`Duration: min ${min}ms, max ${max}ms, avg ${average.toFixed(1)}ms`);
  }

  lines.push("", `By host (top ${TOP_HOSTS}):`);
  for (const [host, count] of byCountDescending(stats.byHost).slice(0, TOP_HOSTS)) {
    lines.push(`  ${host}: ${count}`);
  }

  lines.push("", "By method:");
  for (const [method, count] of byCountDescending(stats.byMethod)) {
    lines.push(`  ${method}: ${count}`);
  }

  lines.push("", "By status class:");
  for (const [statusClass, count] of Object.entries(stats.byStatusClass)) {
    lines.push(`  ${statusClass}: ${count}`);
  }

  return lines.join("\n");
}
