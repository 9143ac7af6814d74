/**
 * Content-type helpers shared by search, HAR export and the CLI.
 */

const BINARY_PREFIXES = ["image/", "audio/", "video/", "font/"];

const BINARY_TYPES = new Set([
  "application/octet-stream",
  "application/pdf",
  "application/zip",
  "application/gzip",
  "application/x-gzip",
  "application/wasm",
  "application/protobuf",
  "application/x-protobuf",
]);

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Lower-case a content-type header and strip parameters such as charset.
 * Returns undefined for a missing or blank header.
 */
export function normaliseContentType(contentType: string | undefined): string | undefined {
  if (!contentType) return undefined;
  const base = contentType.split(";")[0]?.trim().toLowerCase();
  return base ? base : undefined;
}

/**
 * Short display form: "application/json; charset=utf-8" becomes "json".
 */
export function shortContentType(contentType: string | undefined): string | undefined {
  const normalised = normaliseContentType(contentType);
  if (!normalised) return undefined;
  const slash = normalised.indexOf("/");
  return slash === -1 ? normalised : normalised.slice(slash + 1);
}

export function isJsonContentType(contentType: string | undefined): boolean {
  const normalised = normaliseContentType(contentType);
  return normalised !== undefined && (normalised === "application/json" || normalised.endsWith("+json"));
}

export function isBinaryContentType(contentType: string | undefined): boolean {
  const normalised = normaliseContentType(contentType);
  if (!normalised) return false;
  if (normalised === "image/svg+xml") return false;
  return BINARY_TYPES.has(normalised) || BINARY_PREFIXES.some((prefix) => normalised.startsWith(prefix));
}

/**
 * Decode a body as UTF-8, or return undefined when it cannot be treated as
 * text: a binary content type, or bytes that are not valid UTF-8.
 */
export function decodeTextBody(body: Buffer, contentType: string | undefined): string | undefined {
  if (isBinaryContentType(contentType)) {
    return undefined;
  }
  try {
    return utf8.decode(body);
  } catch {
    return undefined;
  }
}

export function isTextBody(body: Buffer, contentType: string | undefined): boolean {
  return decodeTextBody(body, contentType) !== undefined;
}

/**
 * Look up a header value case-insensitively.
 */
export function getHeader(headers: Record<string, string> | undefined, name: string): string | undefined {
  if (!headers) return undefined;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}
