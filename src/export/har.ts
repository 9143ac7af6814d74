/**
 * HAR 1.2 export and import.
 *
 * Exports carry a few underscore-prefixed fields (allowed by HAR 1.2
 * for custom data) so that an archive can be read back into records:
 * `_captureId` on each entry, `_encoding` on base64 request bodies,
 * `_truncated` on cut bodies and `_error` on responses that never arrived.
 */

import { STATUS_CODES } from "node:http";
import { z } from "zod";
import type { CapturedRequest } from "../shared/types.js";
import { decodeTextBody, getHeader } from "../shared/content-type.js";
import { InvalidArgumentError, getErrorMessage } from "../shared/errors.js";
import { INCOMPLETE_EXCHANGE_REASON, TRAFFICLENS_NAME } from "../shared/constants.js";
import { getTrafficLensVersion } from "../shared/version.js";
import { parseRequestUrl } from "../shared/url.js";

const HAR_VERSION = "1.2";
const HTTP_VERSION = "HTTP/1.1";
const UNKNOWN_MIME_TYPE = "x-unknown";
const PARTIAL_STATUS = 0;
const JSON_INDENT = 2;

export interface HarNameValue {
  name: string;
  value: string;
}

export interface HarPostData {
  mimeType: string;
  text: string;
  _encoding?: "base64";
  _truncated?: true;
}

export interface HarRequest {
  method: string;
  url: string;
  httpVersion: string;
  cookies: HarNameValue[];
  headers: HarNameValue[];
  queryString: HarNameValue[];
  postData?: HarPostData;
  headersSize: number;
  bodySize: number;
}

export interface HarContent {
  size: number;
  mimeType: string;
  text?: string;
  encoding?: "base64";
  _truncated?: true;
}

export interface HarResponse {
  status: number;
  statusText: string;
  httpVersion: string;
  cookies: HarNameValue[];
  headers: HarNameValue[];
  content: HarContent;
  redirectURL: string;
  headersSize: number;
  bodySize: number;
  _error?: string;
}

export interface HarTimings {
  send: number;
  wait: number;
  receive: number;
}

export interface HarEntry {
  startedDateTime: string;
  time: number;
  request: HarRequest;
  response: HarResponse;
  cache: Record<string, never>;
  timings: HarTimings;
  _captureId: number;
}

export interface Har {
  log: {
    version: string;
    creator: { name: string; version: string };
    entries: HarEntry[];
  };
}

function headersToHar(headers: Record<string, string> | undefined): HarNameValue[] {
  if (!headers) return [];
  return Object.entries(headers).map(([name, value]) => ({ name, value }));
}

function parseQueryString(url: string): HarNameValue[] {
  try {
    return [...new URL(url).searchParams.entries()].map(([name, value]) => ({ name, value }));
  } catch {
    return [];
  }
}

interface EncodedBody {
  text: string;
  base64: boolean;
}

/**
 * Text bodies are kept as-is; anything else is base64.
 */
function encodeBody(body: Buffer, contentType: string | undefined): EncodedBody {
  const text = decodeTextBody(body, contentType);
  return text !== undefined ? { text, base64: false } : { text: body.toString("base64"), base64: true };
}

function buildPostData(request: CapturedRequest): HarPostData | undefined {
  if (!request.requestBody || request.requestBody.length === 0) {
    return undefined;
  }

  const contentType = getHeader(request.requestHeaders, "content-type");
  const { text, base64 } = encodeBody(request.requestBody, contentType);

  return {
    mimeType: contentType ?? "",
    text,
    ...(base64 ? { _encoding: "base64" as const } : {}),
    ...(request.requestBodyTruncated ? { _truncated: true as const } : {}),
  };
}

function buildPartialResponse(request: CapturedRequest): HarResponse {
  return {
    status: PARTIAL_STATUS,
    statusText: "",
    httpVersion: HTTP_VERSION,
    cookies: [],
    headers: [],
    content: { size: 0, mimeType: UNKNOWN_MIME_TYPE },
    redirectURL: "",
    headersSize: -1,
    bodySize: -1,
    _error: request.error ?? INCOMPLETE_EXCHANGE_REASON,
  };
}

function buildResponse(request: CapturedRequest, status: number): HarResponse {
  const contentType = getHeader(request.responseHeaders, "content-type");
  const body = request.responseBody;
  const content: HarContent = { size: body?.length ?? 0, mimeType: contentType ?? "" };

  if (body && body.length > 0) {
    const { text, base64 } = encodeBody(body, contentType);
    content.text = text;
    if (base64) content.encoding = "base64";
  }
  if (request.responseBodyTruncated) {
    content._truncated = true;
  }

  return {
    status,
    statusText: STATUS_CODES[status] ?? "",
    httpVersion: HTTP_VERSION,
    cookies: [],
    headers: headersToHar(request.responseHeaders),
    content,
    redirectURL: getHeader(request.responseHeaders, "location") ?? "",
    headersSize: -1,
    bodySize: body?.length ?? 0,
  };
}

function requestToEntry(request: CapturedRequest): HarEntry {
  const status = request.responseStatus;
  const time = status === undefined ? 0 : (request.durationMs ?? 0);

  return {
    startedDateTime: new Date(request.timestamp).toISOString(),
    time,
    request: {
      method: request.method,
      url: request.url,
      httpVersion: HTTP_VERSION,
      cookies: [],
      headers: headersToHar(request.requestHeaders),
      queryString: parseQueryString(request.url),
      postData: buildPostData(request),
      headersSize: -1,
      bodySize: request.requestBody?.length ?? 0,
    },
    response: status === undefined ? buildPartialResponse(request) : buildResponse(request, status),
    cache: {},
    timings: { send: 0, wait: time, receive: 0 },
    _captureId: request.id,
  };
}

/**
 * Build a HAR document. Entries keep the order of the input.
 */
export function generateHar(requests: CapturedRequest[]): Har {
  return {
    log: {
      version: HAR_VERSION,
      creator: { name: TRAFFICLENS_NAME, version: getTrafficLensVersion() },
      entries: requests.map(requestToEntry),
    },
  };
}

export function generateHarString(requests: CapturedRequest[]): string {
  return JSON.stringify(generateHar(requests), null, JSON_INDENT);
}

// Import accepts archives from other tools, so only the fields needed to
// rebuild a record are required and everything else passes through.
const nameValueSchema = z.object({ name: z.string(), value: z.string() }).passthrough();

const importEntrySchema = z
  .object({
    startedDateTime: z.string(),
    time: z.number(),
    request: z
      .object({
        method: z.string(),
        url: z.string(),
        headers: z.array(nameValueSchema),
        postData: z
          .object({
            mimeType: z.string().optional(),
            text: z.string().optional(),
            _encoding: z.literal("base64").optional(),
            _truncated: z.boolean().optional(),
          })
          .passthrough()
          .optional(),
      })
      .passthrough(),
    response: z
      .object({
        status: z.number().int(),
        headers: z.array(nameValueSchema),
        content: z
          .object({
            text: z.string().optional(),
            encoding: z.string().optional(),
            _truncated: z.boolean().optional(),
          })
          .passthrough(),
        _error: z.string().optional(),
      })
      .passthrough(),
    _captureId: z.number().int().positive().optional(),
  })
  .passthrough();

const importHarSchema = z
  .object({
    log: z
      .object({
        version: z.string(),
        entries: z.array(importEntrySchema),
      })
      .passthrough(),
  })
  .passthrough();

export type ImportableHar = z.infer<typeof importHarSchema>;
type ImportEntry = z.infer<typeof importEntrySchema>;

/**
 * Parse and validate HAR text.
 */
export function parseHar(text: string): ImportableHar {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new InvalidArgumentError(`Invalid HAR: ${getErrorMessage(err)}`);
  }

  const result = importHarSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new InvalidArgumentError(`Invalid HAR${where}: ${issue?.message ?? "unrecognised structure"}`);
  }
  return result.data;
}

function harToHeaders(headers: { name: string; value: string }[]): Record<string, string> {
  const result = new Map<string, string>();
  for (const { name, value } of headers) {
    const existing = result.get(name);
    result.set(name, existing === undefined ? value : `${existing}, ${value}`);
  }
  return Object.fromEntries(result);
}

function decodeHarBody(text: string | undefined, base64: boolean): Buffer | undefined {
  if (text === undefined || text.length === 0) {
    return undefined;
  }
  return base64 ? Buffer.from(text, "base64") : Buffer.from(text, "utf-8");
}

function entryToRequest(entry: ImportEntry, id: number): CapturedRequest {
  const timestamp = Date.parse(entry.startedDateTime);
  if (Number.isNaN(timestamp)) {
    throw new InvalidArgumentError(`Invalid HAR: entry ${id} has an unparseable startedDateTime`);
  }

  const { host, path } = parseRequestUrl(entry.request.url);
  const postData = entry.request.postData;

  const request: CapturedRequest = {
    id,
    timestamp,
    method: entry.request.method.toUpperCase(),
    url: entry.request.url,
    host,
    path,
    requestHeaders: harToHeaders(entry.request.headers),
    requestBody: decodeHarBody(postData?.text, postData?._encoding === "base64"),
    requestBodyTruncated: postData?._truncated === true,
    responseBodyTruncated: false,
  };

  const { response } = entry;
  if (response.status === PARTIAL_STATUS) {
    request.error = response._error ?? INCOMPLETE_EXCHANGE_REASON;
    return request;
  }

  request.responseStatus = response.status;
  request.responseHeaders = harToHeaders(response.headers);
  request.responseBody = decodeHarBody(response.content.text, response.content.encoding === "base64");
  request.responseBodyTruncated = response.content._truncated === true;
  request.durationMs = Math.max(0, entry.time);
  return request;
}

/**
 * Rebuild records from a HAR document. Entries without `_captureId` are
 * numbered after the highest id present.
 */
export function importHar(har: ImportableHar): CapturedRequest[] {
  const { entries } = har.log;
  let nextId = entries.reduce((max, entry) => Math.max(max, entry._captureId ?? 0), 0) + 1;
  const seen = new Set<number>();

  return entries.map((entry) => {
    const id = entry._captureId ?? nextId++;
    if (seen.has(id)) {
      throw new InvalidArgumentError(`Invalid HAR: duplicate _captureId ${id}`);
    }
    seen.add(id);
    return entryToRequest(entry, id);
  });
}
