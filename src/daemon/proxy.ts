import * as mockttp from "mockttp";
import type { CompletedRequest, CompletedResponse } from "mockttp";
import type { CaptureHook } from "./capture-hook.js";
import { silentLogger, type Logger } from "../shared/logger.js";

const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

export interface ProxyOptions {
  caKeyPath: string;
  caCertPath: string;
  hook: CaptureHook;
  /** Port to listen on; a free port is chosen when omitted */
  port?: number;
  /** How often to flush stale in-flight flows */
  sweepIntervalMs?: number;
  logger?: Logger;
}

export interface ProxyServer {
  port: number;
  url: string;
  stop: () => Promise<void>;
}

/**
 * Join multi-valued headers with ", " and drop empty entries.
 */
export function flattenHeaders(
  headers: Record<string, string | string[] | undefined>
): Record<string, string> {
  const flat: [string, string][] = [];
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flat.push([name, Array.isArray(value) ? value.join(", ") : value]);
  }
  return Object.fromEntries(flat);
}

function elapsedFromTimings(response: CompletedResponse): number | undefined {
  const { startTimestamp, responseSentTimestamp } = response.timingEvents;
  if (responseSentTimestamp === undefined) {
    return undefined;
  }
  return responseSentTimestamp - startTimestamp;
}

/**
 * Start a passthrough mockttp proxy whose lifecycle events feed the
 * capture hook. Every request is forwarded upstream untouched.
 */
export async function createProxy(options: ProxyOptions): Promise<ProxyServer> {
  const { hook } = options;
  const logger = options.logger ?? silentLogger;

  const server = mockttp.getLocal({
    https: {
      keyPath: options.caKeyPath,
      certPath: options.caCertPath,
    },
  });

  // Must stay synchronous: the stash entry has to exist before the
  // matching response event can arrive.
  const onRequest = (request: CompletedRequest): void => {
    hook.requestObserved(request.id, {
      method: request.method,
      url: request.url,
      headers: flattenHeaders(request.headers),
      body: request.body.buffer,
    });
  };

  const decodeBody = async (response: CompletedResponse): Promise<Buffer> => {
    try {
      return (await response.body.getDecodedBuffer()) ?? response.body.buffer;
    } catch (err) {
      logger.warn("Could not decode response body, storing it encoded", { flowKey: response.id, error: err });
      return response.body.buffer;
    }
  };

  // An abort can arrive while the body is being decoded; the flow is
  // marked first so that it still ends as a complete record.
  const onResponse = async (response: CompletedResponse): Promise<void> => {
    hook.responseStarted(response.id);
    const body = await decodeBody(response);
    hook.responseObserved(response.id, {
      status: response.statusCode,
      headers: flattenHeaders(response.headers),
      body,
      elapsedMs: elapsedFromTimings(response),
    });
  };

  await server.forAnyRequest().thenPassThrough();

  await server.on("request", onRequest);

  await server.on("response", (response) => {
    onResponse(response).catch((err: unknown) => {
      // The flow stays stashed and is written out as partial by the next sweep
      logger.error("Failed to capture response", { flowKey: response.id, error: err });
    });
  });

  await server.on("abort", (request) => {
    hook.exchangeFailed(request.id, request.error?.message);
  });

  await server.start(options.port);

  const sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
  const sweepTimer = setInterval(() => hook.sweep(), sweepIntervalMs);
  sweepTimer.unref();

  logger.info("Proxy started", { port: server.port });

  let stopped = false;

  return {
    port: server.port,
    url: server.url,
    stop: async () => {
      if (stopped) return;
      stopped = true;
      clearInterval(sweepTimer);
      await server.stop();
      const flushed = hook.flushAll();
      logger.info("Proxy stopped", { flushed });
    },
  };
}
