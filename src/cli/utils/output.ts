/**
 * Terminal renderings for the read commands.
 */

import type { CapturedRequest } from "../../shared/types.js";
import { getHeader } from "../../shared/content-type.js";
import { formatDuration, formatMethod, formatStatus, padLeft, padRight, truncate } from "../../shared/formatters.js";
import { renderBody } from "./syntax-highlight.js";

const ID_WIDTH = 6;
const STATUS_WIDTH = 4;
const DURATION_WIDTH = 8;
const HOST_WIDTH = 32;
const PATH_WIDTH = 60;

export function formatRequestRow(request: CapturedRequest): string {
  return [
    padLeft(String(request.id), ID_WIDTH),
    formatMethod(request.method),
    padRight(formatStatus(request.responseStatus), STATUS_WIDTH),
    padLeft(formatDuration(request.durationMs), DURATION_WIDTH),
    padRight(truncate(request.host, HOST_WIDTH), HOST_WIDTH),
    truncate(request.path, PATH_WIDTH),
  ].join("  ");
}

export function formatRequestTable(requests: CapturedRequest[]): string {
  const header = [
    padLeft("ID", ID_WIDTH),
    formatMethod("METHOD"),
    padRight("CODE", STATUS_WIDTH),
    padLeft("TIME", DURATION_WIDTH),
    padRight("HOST", HOST_WIDTH),
    "PATH",
  ].join("  ");
  return [header, ...requests.map(formatRequestRow)].join("\n");
}

function headerLines(headers: Record<string, string>): string[] {
  return Object.entries(headers).map(([name, value]) => `  ${name}: ${value}`);
}

function bodyLines(
  label: string,
  body: Buffer | undefined,
  headers: Record<string, string> | undefined,
  truncated: boolean | undefined,
  color: boolean
): string[] {
  if (!body || body.length === 0) {
    return [`${label}: (empty)`];
  }
  const suffix = truncated ? ", truncated" : "";
  return [
    `${label} (${body.length} bytes${suffix}):`,
    renderBody(body, getHeader(headers, "content-type"), { color }),
  ];
}

export interface DetailOptions {
  color: boolean;
}

/**
 * Full request/response view for `trafficlens request <id>`.
 */
export function formatRequestDetail(request: CapturedRequest, options: DetailOptions): string {
  const lines = [
    `Request ${request.id}  ${new Date(request.timestamp).toISOString()}`,
    "",
    `${request.method} ${request.url}`,
    ...headerLines(request.requestHeaders),
    "",
    ...bodyLines("Request body", request.requestBody, request.requestHeaders, request.requestBodyTruncated, options.color),
    "",
  ];

  if (request.responseStatus === undefined) {
    lines.push(`No response: ${request.error ?? "exchange did not complete"}`);
    return lines.join("\n");
  }

  lines.push(
    `Status ${request.responseStatus} (${formatDuration(request.durationMs)})`,
    ...headerLines(request.responseHeaders ?? {}),
    "",
    ...bodyLines(
      "Response body",
      request.responseBody,
      request.responseHeaders,
      request.responseBodyTruncated,
      options.color
    )
  );
  return lines.join("\n");
}
