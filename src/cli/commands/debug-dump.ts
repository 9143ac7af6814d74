import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Command } from "commander";
import { getTrafficLensPaths } from "../../shared/project.js";
import { getErrorMessage } from "../../shared/errors.js";
import type { ProxyStatus } from "../../shared/types.js";
import { getProxyStatus } from "./status.js";
import { exitWithError, requireProjectContext } from "./helpers.js";

const DEBUG_LOG_LINES = 200;

interface DebugDump {
  timestamp: string;
  system: {
    platform: string;
    release: string;
    nodeVersion: string;
  };
  proxy: ProxyStatus | { error: string };
  dataDir: {
    path: string;
    exists: boolean;
    files: string[];
  };
  recentLogs: string[];
}

/**
 * Collect debug information for a project.
 */
export function collectDebugInfo(projectRoot: string): DebugDump {
  const paths = getTrafficLensPaths(projectRoot);

  const dump: DebugDump = {
    timestamp: new Date().toISOString(),
    system: {
      platform: os.platform(),
      release: os.release(),
      nodeVersion: process.version,
    },
    proxy: { error: "not checked" },
    dataDir: {
      path: paths.dataDir,
      exists: fs.existsSync(paths.dataDir),
      files: [],
    },
    recentLogs: [],
  };

  try {
    dump.proxy = getProxyStatus(projectRoot);
  } catch (err) {
    dump.proxy = { error: getErrorMessage(err) };
  }

  if (dump.dataDir.exists) {
    dump.dataDir.files = fs.readdirSync(paths.dataDir).sort();
  }

  if (fs.existsSync(paths.logFile)) {
    const lines = fs.readFileSync(paths.logFile, "utf-8").trim().split("\n");
    dump.recentLogs = lines.slice(-DEBUG_LOG_LINES);
  }

  return dump;
}

/**
 * Generate a filename for the debug dump.
 */
function generateDumpFilename(): string {
  const timestamp = new Date()
    .toISOString()
    .replace(/:/g, "-")
    .replace(/\.\d{3}Z$/, "");
  return `debug-dump-${timestamp}.json`;
}

export const debugDumpCommand = new Command("debug-dump")
  .description("Collect diagnostic information for debugging")
  .action((_, command: Command) => {
    try {
      const projectRoot = requireProjectContext(command);
      const paths = getTrafficLensPaths(projectRoot);
      const dump = collectDebugInfo(projectRoot);

      fs.mkdirSync(paths.dataDir, { recursive: true });
      const filepath = path.join(paths.dataDir, generateDumpFilename());
      fs.writeFileSync(filepath, JSON.stringify(dump, null, 2), "utf-8");
      console.log(`Debug dump written to: ${filepath}`);
    } catch (err) {
      exitWithError(err);
    }
  });
