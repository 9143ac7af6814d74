/**
 * Body rendering for `trafficlens request`: JSON is pretty-printed, text is
 * coloured with cli-highlight when the terminal supports it, and binary
 * bodies are replaced with a size placeholder.
 */

import { highlight, supportsLanguage } from "cli-highlight";
import { decodeTextBody, isJsonContentType, shortContentType } from "../../shared/content-type.js";
import { formatSize } from "../../shared/formatters.js";

const JSON_INDENT = 2;

const SUBTYPE_LANGUAGES: Record<string, string> = {
  json: "json",
  xml: "xml",
  html: "html",
  css: "css",
  javascript: "javascript",
  "x-javascript": "javascript",
  ecmascript: "javascript",
};

/**
 * Resolve a content-type header to a highlight.js language name.
 */
function resolveLanguage(contentType: string | undefined): string | undefined {
  const subtype = shortContentType(contentType);
  if (!subtype) return undefined;

  let language = SUBTYPE_LANGUAGES[subtype];
  if (!language && subtype.endsWith("+json")) language = "json";
  if (!language && subtype.endsWith("+xml")) language = "xml";

  return language && supportsLanguage(language) ? language : undefined;
}

/**
 * Colour a code string for the terminal. Returns the input unchanged when
 * there is no language for the content type or highlighting fails.
 */
export function highlightCode(code: string, contentType: string | undefined): string {
  if (!code) return code;

  const language = resolveLanguage(contentType);
  if (!language) return code;

  try {
    return highlight(code, { language, ignoreIllegals: true });
  } catch {
    // highlight.js can throw on malformed input
    return code;
  }
}

function prettyJson(text: string): string {
  try {
    return JSON.stringify(JSON.parse(text), null, JSON_INDENT);
  } catch {
    return text;
  }
}

export interface RenderBodyOptions {
  color: boolean;
}

export function renderBody(body: Buffer, contentType: string | undefined, options: RenderBodyOptions): string {
  const text = decodeTextBody(body, contentType);
  if (text === undefined) {
    return `[binary data, ${formatSize(body.length)}]`;
  }

  const formatted = isJsonContentType(contentType) ? prettyJson(text) : text;
  return options.color ? highlightCode(formatted, contentType) : formatted;
}
