/**
 * Tool definitions, argument validation and dispatch for the MCP server.
 *
 * Every argument object is parsed by a strict zod schema before anything
 * touches the store, so unknown keys and malformed values come back as
 * INVALID_ARGUMENT results. Failures never escape `call`: each one becomes
 * an `isError` result carrying `{"error": {"code", "message"}}`.
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { CapturedRequest, RequestFilter, RequestSource } from "../shared/types.js";
import { InvalidArgumentError, toTrafficLensError } from "../shared/errors.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import { QueryEngine } from "../query/engine.js";
import { buildFilter } from "../query/filters.js";
import { generateHarString } from "../export/har.js";
import {
  formatRequestText,
  formatStatsText,
  formatSummaryList,
  serialiseRequest,
  serialiseStats,
  toToolSummary,
} from "./format.js";

const JSON_INDENT = 2;

export interface ToolResult {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError?: true;
}

/** What the tools need from the capture store. */
export interface ToolStore extends RequestSource {
  clear(): number;
  close(): void;
}

export type StoreOpener = () => ToolStore;

function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

function jsonResult(data: unknown): ToolResult {
  return textResult(JSON.stringify(data, null, JSON_INDENT));
}

function errorResult(code: string, message: string): ToolResult {
  return { ...jsonResult({ error: { code, message } }), isError: true };
}

// --- Argument schemas ---

const formatSchema = z.enum(["json", "text"]).default("json");

const pageNumberSchema = z.number().int().nonnegative();

const statusSchema = z.union([z.number(), z.string()], {
  errorMap: () => ({ message: "Expected a status code, class (4xx) or range (500-503)" }),
});

const ID_MESSAGE = "Expected an integer id or a numeric string";

const idSchema = z.union(
  [
    z.number().int(ID_MESSAGE).nonnegative(ID_MESSAGE),
    z.string().regex(/^\d+$/, ID_MESSAGE).transform(Number),
  ],
  { errorMap: () => ({ message: ID_MESSAGE }) }
);

const filterShape = {
  host: z.string().min(1).optional(),
  method: z.string().min(1).optional(),
  status: statusSchema.optional(),
  url_contains: z.string().optional(),
};

const listArgsSchema = z
  .object({
    ...filterShape,
    limit: pageNumberSchema.optional(),
    offset: pageNumberSchema.optional(),
    format: formatSchema,
  })
  .strict();

const readArgsSchema = z.object({ id: idSchema, format: formatSchema }).strict();

const searchArgsSchema = z.object({ text: z.string(), format: formatSchema }).strict();

const statsArgsSchema = z.object({ format: formatSchema }).strict();

const clearArgsSchema = z.object({}).strict();

const exportArgsSchema = z
  .object({
    ...filterShape,
    ids: z.array(z.number().int().nonnegative()).optional(),
  })
  .strict();

type FilterArgs = z.infer<typeof exportArgsSchema>;

/**
 * Parse tool arguments, turning the first zod issue into an
 * InvalidArgumentError that names the offending argument.
 */
export function parseArgs<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> {
  const result = schema.safeParse(raw ?? {});
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  if (issue?.code === "unrecognized_keys") {
    throw new InvalidArgumentError(`Unknown argument "${issue.keys[0] ?? ""}"`);
  }
  const where = issue && issue.path.length > 0 ? ` "${issue.path.join(".")}"` : "";
  throw new InvalidArgumentError(`Invalid argument${where}: ${issue?.message ?? "malformed arguments"}`);
}

function toFilter(args: FilterArgs): RequestFilter {
  return buildFilter({ host: args.host, method: args.method, status: args.status, urlContains: args.url_contains });
}

// --- Tool definitions ---

const FORMAT_PROPERTY = {
  type: "string",
  enum: ["json", "text"],
  description: 'Output format: "json" (default) or "text" (human-readable).',
};

const FILTER_PROPERTIES = {
  host: {
    type: "string",
    description:
      'Host filter. "example.com" matches the host and its subdomains; ".example.com" matches subdomains only.',
  },
  method: { type: "string", description: "HTTP method, case-insensitive (GET, POST, ...)." },
  status: {
    type: ["integer", "string"],
    description: 'Status filter: exact code (404 or "404"), class ("4xx") or inclusive range ("500-503").',
  },
  url_contains: { type: "string", description: "Case-insensitive substring of the URL." },
};

export const TOOLS: Tool[] = [
  {
    name: "list_requests",
    description:
      "List captured HTTP exchanges in capture order. Returns summaries (id, timestamp, method, host, path, status, duration_ms); status is null for exchanges that never completed. Use read_request with an id for headers and bodies.",
    inputSchema: {
      type: "object",
      properties: {
        ...FILTER_PROPERTIES,
        limit: { type: "integer", minimum: 0, description: "Maximum results. Omit or pass 0 for all." },
        offset: { type: "integer", minimum: 0, description: "Number of matching results to skip." },
        format: FORMAT_PROPERTY,
      },
      additionalProperties: false,
    },
  },
  {
    name: "read_request",
    description: "Read one captured exchange in full: headers and bodies in both directions.",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: ["integer", "string"], description: "Request id from list_requests or search_requests." },
        format: FORMAT_PROPERTY,
      },
      required: ["id"],
      additionalProperties: false,
    },
  },
  {
    name: "search_requests",
    description:
      "Case-insensitive search over URLs, header names and values, and text bodies of every captured exchange.",
    inputSchema: {
      type: "object",
      properties: {
        text: { type: "string", description: "Text to search for." },
        format: FORMAT_PROPERTY,
      },
      required: ["text"],
      additionalProperties: false,
    },
  },
  {
    name: "get_request_stats",
    description:
      "Aggregate statistics over captured traffic: totals, counts by host, method and status class, duration range and byte totals.",
    inputSchema: {
      type: "object",
      properties: { format: FORMAT_PROPERTY },
      additionalProperties: false,
    },
  },
  {
    name: "clear_requests",
    description: "Delete every captured exchange. Returns how many were removed. Ids are never reused.",
    inputSchema: { type: "object", properties: {}, additionalProperties: false },
  },
  {
    name: "export_har",
    description: "Export captured exchanges as a HAR 1.2 document, optionally filtered.",
    inputSchema: {
      type: "object",
      properties: {
        ...FILTER_PROPERTIES,
        ids: {
          type: "array",
          items: { type: "integer", minimum: 0 },
          description: "Only export these request ids.",
        },
      },
      additionalProperties: false,
    },
  },
];

// --- Dispatch ---

/**
 * Runs tool calls against a lazily opened store. If opening fails, the
 * next call tries again.
 */
export class ToolDispatcher {
  private store: ToolStore | undefined;

  constructor(
    private readonly openStore: StoreOpener,
    private readonly logger: Logger = silentLogger
  ) {}

  call(name: string, args: unknown): ToolResult {
    try {
      return this.dispatch(name, args);
    } catch (err) {
      const error = toTrafficLensError(err);
      if (error.code === "INTERNAL_ERROR") {
        this.logger.error("Tool call failed", { tool: name, error: err });
      } else {
        this.logger.debug("Tool call rejected", { tool: name, code: error.code, message: error.message });
      }
      return errorResult(error.code, error.message);
    }
  }

  close(): void {
    this.store?.close();
    this.store = undefined;
  }

  private getStore(): ToolStore {
    if (!this.store) {
      this.store = this.openStore();
      this.logger.debug("Store opened");
    }
    return this.store;
  }

  private dispatch(name: string, rawArgs: unknown): ToolResult {
    switch (name) {
      case "list_requests": {
        const args = parseArgs(listArgsSchema, rawArgs);
        const filter = toFilter(args);
        const limit = args.limit === 0 ? undefined : args.limit;
        const page = new QueryEngine(this.getStore()).list(filter, { limit, offset: args.offset });

        if (args.format === "text") {
          return textResult(
            formatSummaryList(`Found ${page.total} requests (showing ${page.requests.length})`, page.requests)
          );
        }
        return jsonResult({
          total: page.total,
          showing: page.requests.length,
          requests: page.requests.map(toToolSummary),
        });
      }

      case "read_request": {
        const args = parseArgs(readArgsSchema, rawArgs);
        const request = new QueryEngine(this.getStore()).getOne(args.id);
        return args.format === "text" ? textResult(formatRequestText(request)) : jsonResult(serialiseRequest(request));
      }

      case "search_requests": {
        const args = parseArgs(searchArgsSchema, rawArgs);
        const matches = new QueryEngine(this.getStore()).search(args.text);

        if (args.format === "text") {
          return textResult(formatSummaryList(`Found ${matches.length} requests matching "${args.text}"`, matches));
        }
        return jsonResult({ text: args.text, total: matches.length, requests: matches.map(toToolSummary) });
      }

      case "get_request_stats": {
        const args = parseArgs(statsArgsSchema, rawArgs);
        const stats = new QueryEngine(this.getStore()).stats();
        return args.format === "text" ? textResult(formatStatsText(stats)) : jsonResult(serialiseStats(stats));
      }

      case "clear_requests": {
        parseArgs(clearArgsSchema, rawArgs);
        const removed = this.getStore().clear();
        this.logger.info("Requests cleared via tool", { removed });
        return jsonResult({ removed });
      }

      case "export_har": {
        const args = parseArgs(exportArgsSchema, rawArgs);
        const filter = toFilter(args);
        let records: CapturedRequest[] = new QueryEngine(this.getStore()).filtered(filter);
        if (args.ids) {
          const wanted = new Set(args.ids);
          records = records.filter((record) => wanted.has(record.id));
        }
        return textResult(generateHarString(records));
      }

      default:
        throw new InvalidArgumentError(`Unknown tool: ${name}`);
    }
  }
}
