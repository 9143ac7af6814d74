/**
 * Library entry point. The CLI lives in ./cli/index.ts.
 */

export type * from "./shared/types.js";
export * from "./shared/errors.js";
export { loadConfig, parseConfig, type TrafficLensConfig } from "./shared/config.js";
export { RequestRepository } from "./daemon/storage.js";
export { CaptureHook, type ObservedRequest, type ObservedResponse } from "./daemon/capture-hook.js";
export { createProxy, type ProxyServer } from "./daemon/proxy.js";
export { startCaptureProxy, type CaptureProxy } from "./daemon/index.js";
export { QueryEngine, InMemoryRequestSource } from "./query/engine.js";
export { parseStatusFilter, matchesFilter } from "./query/filters.js";
export { generateHar, generateHarString, parseHar, importHar, type Har } from "./export/har.js";
export { createTrafficLensMcpServer } from "./mcp/server.js";
export { ToolDispatcher, TOOLS } from "./mcp/tools.js";
