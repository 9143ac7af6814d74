import * as fs from "node:fs";
import { Command, InvalidArgumentError as CommanderArgumentError } from "commander";
import {
  findProjectRoot,
  findOrCreateProjectRoot,
  getTrafficLensPaths,
  setConfigOverride,
  getConfigOverride,
  resolveOverridePath,
} from "../../shared/project.js";
import { loadConfig } from "../../shared/config.js";
import { StoreUnavailableError, getErrorMessage } from "../../shared/errors.js";
import { createLogger, parseVerbosity } from "../../shared/logger.js";
import type { RequestSource } from "../../shared/types.js";
import { RequestRepository } from "../../daemon/storage.js";
import { InMemoryRequestSource } from "../../query/engine.js";
import { importHar, parseHar } from "../../export/har.js";

export interface GlobalOptions {
  verbose: number;
  dir?: string;
  config?: string;
}

/**
 * Validate and extract global CLI options from a Commander command.
 * CLI flags take precedence over environment variables.
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  const raw = command.optsWithGlobals<Record<string, unknown>>();
  return {
    verbose: typeof raw["verbose"] === "number" ? raw["verbose"] : 0,
    dir: typeof raw["dir"] === "string" ? raw["dir"] : (process.env["TRAFFICLENS_DIR"] ?? undefined),
    config:
      typeof raw["config"] === "string" ? raw["config"] : (process.env["TRAFFICLENS_CONFIG"] ?? undefined),
  };
}

/**
 * Print `Error: <message>` and exit with status 1.
 */
export function exitWithError(err: unknown): never {
  console.error(`Error: ${getErrorMessage(err)}`);
  process.exit(1);
}

/**
 * Find the project root or exit with a friendly error message.
 * When a config override is active, returns the override path as a
 * stand-in project root (getTrafficLensDir will ignore it).
 */
export function requireProjectRoot(override?: string): string {
  const configOverride = getConfigOverride();
  if (configOverride) {
    return configOverride;
  }

  const projectRoot = findProjectRoot(undefined, override);
  if (!projectRoot) {
    if (override) {
      console.error(`No .trafficlens or .git found at ${override} (specified via --dir)`);
    } else {
      console.error("Not in a project directory (no .trafficlens or .git found)");
    }
    process.exit(1);
  }
  return projectRoot;
}

/**
 * Set the config override from global options and return an appropriate
 * project root. When --config is provided, the override is set and the
 * resolved config path is returned (getTrafficLensDir will use the override).
 * Otherwise falls back to findOrCreateProjectRoot with --dir.
 */
export function resolveProjectContext(globalOpts: GlobalOptions): string {
  if (globalOpts.config) {
    const resolved = resolveOverridePath(globalOpts.config);
    setConfigOverride(resolved);
    return resolved;
  }
  return findOrCreateProjectRoot(undefined, globalOpts.dir);
}

/**
 * Resolve the project for a read or admin command: applies --config, then
 * requires an existing project root.
 */
export function requireProjectContext(command: Command): string {
  const globalOpts = getGlobalOptions(command);
  if (globalOpts.config) {
    setConfigOverride(resolveOverridePath(globalOpts.config));
  }
  return requireProjectRoot(globalOpts.dir);
}

/**
 * Open the project's capture store with the configured busy timeout.
 */
export function openRepository(command: Command): RequestRepository {
  const projectRoot = requireProjectContext(command);
  const { verbose } = getGlobalOptions(command);
  const paths = getTrafficLensPaths(projectRoot);

  if (!fs.existsSync(paths.databaseFile)) {
    throw new StoreUnavailableError(
      `No captured traffic yet (${paths.databaseFile} does not exist). Start capturing with: trafficlens proxy`
    );
  }

  const config = loadConfig(projectRoot);
  return new RequestRepository(paths.databaseFile, {
    logger: createLogger("storage", projectRoot, parseVerbosity(verbose)),
    busyTimeoutMs: config.busyTimeoutMs,
  });
}

export interface OpenedSource {
  source: RequestSource;
  close: () => void;
}

/**
 * Records to query: a HAR archive when `harFile` is given, otherwise the
 * project's store.
 */
export function openRequestSource(command: Command, harFile: string | undefined): OpenedSource {
  if (harFile) {
    const records = importHar(parseHar(fs.readFileSync(harFile, "utf-8")));
    return { source: new InMemoryRequestSource(records), close: () => undefined };
  }

  const repository = openRepository(command);
  return { source: repository, close: () => repository.close() };
}

/**
 * Commander argParser for non-negative integers (--limit, --offset, --port).
 */
export function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new CommanderArgumentError("Expected a non-negative integer.");
  }
  return parseInt(value, 10);
}

export interface FilterCliOptions {
  host?: string;
  method?: string;
  status?: string;
  urlContains?: string;
}

/**
 * Register the shared filter flags on a command.
 */
export function addFilterOptions(command: Command): Command {
  return command
    .option("--host <host>", "host or parent domain (.example.com for subdomains only)")
    .option("--method <method>", "HTTP method")
    .option("--status <status>", "status code, class (4xx) or range (500-503)")
    .option("--url-contains <text>", "case-insensitive URL substring");
}
