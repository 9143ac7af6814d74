import Database from "better-sqlite3";
import type {
  CaptureSink,
  CapturedRequest,
  NewCapturedRequest,
  RequestFilter,
  RequestSource,
  StatusMatcher,
} from "../shared/types.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import { StoreUnavailableError, getErrorMessage } from "../shared/errors.js";
import { DEFAULT_BUSY_TIMEOUT_MS } from "../shared/constants.js";

const SCHEMA_VERSION = 1;

// AUTOINCREMENT keeps ids monotonic across DELETE, so clear never recycles one.
const SCHEMA = `
CREATE TABLE IF NOT EXISTS requests (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp INTEGER NOT NULL,
    method TEXT NOT NULL,
    url TEXT NOT NULL,
    host TEXT NOT NULL,
    path TEXT NOT NULL,
    request_headers TEXT NOT NULL,
    request_body BLOB,
    request_body_truncated INTEGER NOT NULL DEFAULT 0,
    response_status INTEGER,
    response_headers TEXT,
    response_body BLOB,
    response_body_truncated INTEGER NOT NULL DEFAULT 0,
    duration_ms INTEGER,
    error TEXT
);

CREATE INDEX IF NOT EXISTS idx_requests_timestamp ON requests(timestamp);
CREATE INDEX IF NOT EXISTS idx_requests_method ON requests(method);
CREATE INDEX IF NOT EXISTS idx_requests_status ON requests(response_status);
CREATE INDEX IF NOT EXISTS idx_requests_host ON requests(host);
`;

type SqlParam = string | number | Buffer | null;

/**
 * Escape SQL LIKE wildcards in user input to prevent unintended pattern matching.
 */
function escapeLikeWildcards(input: string): string {
  return input.replace(/\\/g, "\\\\").replace(/%/g, "\\%").replace(/_/g, "\\_");
}

function applyStatusCondition(conditions: string[], params: SqlParam[], status: StatusMatcher): void {
  if (status.kind === "exact") {
    conditions.push("response_status = ?");
    params.push(status.code);
  } else {
    conditions.push("response_status >= ? AND response_status <= ?");
    params.push(status.min, status.max);
  }
}

/**
 * Push the indexed filter dimensions into SQL. The result is a superset of
 * the exact match; the query engine re-applies the full filter.
 */
function applyFilterConditions(
  conditions: string[],
  params: SqlParam[],
  filter: RequestFilter | undefined
): void {
  if (!filter) return;

  if (filter.method) {
    conditions.push("method = ?");
    params.push(filter.method.toUpperCase());
  }

  if (filter.status) {
    applyStatusCondition(conditions, params, filter.status);
  }

  if (filter.host) {
    const host = filter.host.toLowerCase();
    if (host.startsWith(".")) {
      // Subdomains only: ".example.com" matches "api.example.com"
      conditions.push("host LIKE ? ESCAPE '\\'");
      params.push(`%${escapeLikeWildcards(host)}`);
    } else {
      conditions.push("(host = ? OR host LIKE ? ESCAPE '\\')");
      params.push(host, `%.${escapeLikeWildcards(host)}`);
    }
  }
}

export interface RepositoryOptions {
  logger?: Logger;
  /** How long to wait on the other process's write lock, in ms */
  busyTimeoutMs?: number;
}

/**
 * SQLite-backed capture store. One writer process appends while other
 * processes read and clear the same file; WAL mode lets readers proceed
 * during a write and every SELECT sees one consistent snapshot.
 */
export class RequestRepository implements RequestSource, CaptureSink {
  private db: Database.Database;
  private logger: Logger;
  private insertStmt: Database.Statement<SqlParam[]>;

  constructor(dbPath: string, options: RepositoryOptions = {}) {
    this.logger = options.logger ?? silentLogger;

    const db = guard("open", () => {
      const opened = new Database(dbPath, {
        timeout: options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS,
      });
      try {
        opened.pragma("journal_mode = WAL");
        checkSchemaVersion(opened);
        opened.exec(SCHEMA);
        opened.pragma(`user_version = ${SCHEMA_VERSION}`);
      } catch (err) {
        opened.close();
        throw err;
      }
      return opened;
    });

    this.db = db;
    this.insertStmt = db.prepare<SqlParam[]>(`
      INSERT INTO requests (
        timestamp, method, url, host, path,
        request_headers, request_body, request_body_truncated,
        response_status, response_headers, response_body, response_body_truncated,
        duration_ms, error
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.logger.debug("Store opened", { dbPath });
  }

  /**
   * Persist a record and return its id. The insert runs in an IMMEDIATE
   * transaction so it takes the write lock up front.
   */
  append(request: NewCapturedRequest): number {
    const insert = this.db.transaction((record: NewCapturedRequest) =>
      this.insertStmt.run(
        record.timestamp,
        record.method,
        record.url,
        record.host,
        record.path,
        JSON.stringify(record.requestHeaders),
        record.requestBody ?? null,
        record.requestBodyTruncated ? 1 : 0,
        record.responseStatus ?? null,
        record.responseHeaders ? JSON.stringify(record.responseHeaders) : null,
        record.responseBody ?? null,
        record.responseBodyTruncated ? 1 : 0,
        record.durationMs ?? null,
        record.error ?? null
      )
    );

    const result = guard("append", () => insert.immediate(request));
    const id = Number(result.lastInsertRowid);

    this.logger.debug("Request saved", { id, method: request.method, url: request.url });

    return id;
  }

  /**
   * All records in ascending id order, read in a single statement.
   */
  snapshot(filter?: RequestFilter): CapturedRequest[] {
    const conditions: string[] = [];
    const params: SqlParam[] = [];

    applyFilterConditions(conditions, params, filter);

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";

    const rows = guard("read", () =>
      this.db
        .prepare<SqlParam[], DbRequestRow>(`SELECT * FROM requests ${whereClause} ORDER BY id ASC`)
        .all(...params)
    );

    return rows.map((row) => this.rowToRequest(row));
  }

  getRequest(id: number): CapturedRequest | undefined {
    const row = guard("read", () =>
      this.db.prepare<[number], DbRequestRow>("SELECT * FROM requests WHERE id = ?").get(id)
    );

    return row ? this.rowToRequest(row) : undefined;
  }

  count(): number {
    const row = guard("read", () =>
      this.db.prepare<[], DbCountRow>("SELECT COUNT(*) as count FROM requests").get()
    );
    return row?.count ?? 0;
  }

  /**
   * Remove every record and return how many were removed. The id sequence
   * is kept, so the next append gets a higher id than anything removed.
   */
  clear(): number {
    const remove = this.db.transaction(() => this.db.prepare("DELETE FROM requests").run());
    const removed = guard("clear", () => remove.immediate()).changes;

    this.logger.info("Requests cleared", { removed });

    return removed;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private safeParseHeaders(json: string): Record<string, string> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch {
      return {};
    }
    if (typeof parsed !== "object" || parsed === null) {
      return {};
    }
    return Object.fromEntries(
      Object.entries(parsed).filter((entry): entry is [string, string] => typeof entry[1] === "string")
    );
  }

  private rowToRequest(row: DbRequestRow): CapturedRequest {
    return {
      id: row.id,
      timestamp: row.timestamp,
      method: row.method,
      url: row.url,
      host: row.host,
      path: row.path,
      requestHeaders: this.safeParseHeaders(row.request_headers),
      requestBody: row.request_body ?? undefined,
      requestBodyTruncated: row.request_body_truncated === 1,
      responseStatus: row.response_status ?? undefined,
      responseHeaders: row.response_headers ? this.safeParseHeaders(row.response_headers) : undefined,
      responseBody: row.response_body ?? undefined,
      responseBodyTruncated: row.response_body_truncated === 1,
      durationMs: row.duration_ms ?? undefined,
      error: row.error ?? undefined,
    };
  }
}

function checkSchemaVersion(db: Database.Database): void {
  const version = db.pragma("user_version", { simple: true });
  if (typeof version === "number" && version > SCHEMA_VERSION) {
    throw new Error(`database schema version ${version} is newer than supported (${SCHEMA_VERSION})`);
  }
}

/**
 * Run a SQLite operation, reporting any failure as StoreUnavailableError.
 */
function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof StoreUnavailableError) {
      throw err;
    }
    throw new StoreUnavailableError(`Store unavailable (${operation}): ${getErrorMessage(err)}`, err);
  }
}

interface DbRequestRow {
  id: number;
  timestamp: number;
  method: string;
  url: string;
  host: string;
  path: string;
  request_headers: string;
  request_body: Buffer | null;
  request_body_truncated: number;
  response_status: number | null;
  response_headers: string | null;
  response_body: Buffer | null;
  response_body_truncated: number;
  duration_ms: number | null;
  error: string | null;
}

interface DbCountRow {
  count: number;
}
