/**
 * Optional per-project settings read from .trafficlens/config.json.
 */

import * as fs from "node:fs";
import { z } from "zod";
import { getTrafficLensPaths } from "./project.js";
import { InvalidArgumentError, getErrorMessage } from "./errors.js";
import {
  DEFAULT_BUSY_TIMEOUT_MS,
  DEFAULT_MAX_BODY_BYTES,
  DEFAULT_MAX_IN_FLIGHT_FLOWS,
  DEFAULT_STALE_FLOW_TIMEOUT_MS,
} from "./constants.js";

const configSchema = z
  .object({
    proxyPort: z.number().int().min(0).max(65535).optional(),
    maxBodyBytes: z.number().int().nonnegative().default(DEFAULT_MAX_BODY_BYTES),
    staleFlowTimeoutMs: z.number().int().positive().default(DEFAULT_STALE_FLOW_TIMEOUT_MS),
    maxInFlightFlows: z.number().int().positive().default(DEFAULT_MAX_IN_FLIGHT_FLOWS),
    busyTimeoutMs: z.number().int().nonnegative().default(DEFAULT_BUSY_TIMEOUT_MS),
  })
  .strict();

export type TrafficLensConfig = z.infer<typeof configSchema>;

/**
 * Turn the first zod issue into a message naming the offending key.
 */
function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return "invalid configuration";
  }
  if (issue.code === "unrecognized_keys") {
    return `unknown key "${issue.keys.join('", "')}"`;
  }
  const key = issue.path.join(".");
  return key ? `"${key}": ${issue.message}` : issue.message;
}

/**
 * Validate an already-parsed config object, filling in defaults.
 */
export function parseConfig(raw: unknown, source = "config.json"): TrafficLensConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidArgumentError(`Invalid ${source}: ${describeIssue(result.error)}`);
  }
  return result.data;
}

export function defaultConfig(): TrafficLensConfig {
  return parseConfig({});
}

/**
 * Load config.json from the project's data directory. A missing file yields
 * the defaults; malformed JSON or an invalid value is an InvalidArgumentError.
 */
export function loadConfig(projectRoot: string): TrafficLensConfig {
  const { configFile } = getTrafficLensPaths(projectRoot);

  if (!fs.existsSync(configFile)) {
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configFile, "utf-8"));
  } catch (err) {
    throw new InvalidArgumentError(`Invalid ${configFile}: ${getErrorMessage(err)}`);
  }

  return parseConfig(raw, configFile);
}
