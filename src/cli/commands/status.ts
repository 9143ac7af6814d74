import * as fs from "node:fs";
import { Command } from "commander";
import { RequestRepository } from "../../daemon/storage.js";
import { getTrafficLensPaths, isProcessRunning, readProxyPid, readProxyPort } from "../../shared/project.js";
import { getTrafficLensVersion } from "../../shared/version.js";
import type { ProxyStatus } from "../../shared/types.js";
import { exitWithError, requireProjectContext } from "./helpers.js";

/**
 * Proxy liveness from the pid file, plus the number of stored requests.
 */
export function getProxyStatus(projectRoot: string): ProxyStatus {
  const paths = getTrafficLensPaths(projectRoot);
  const pid = readProxyPid(projectRoot);
  const running = pid !== undefined && isProcessRunning(pid);

  let requestCount = 0;
  if (fs.existsSync(paths.databaseFile)) {
    const repository = new RequestRepository(paths.databaseFile);
    try {
      requestCount = repository.count();
    } finally {
      repository.close();
    }
  }

  return {
    running,
    ...(running ? { pid, proxyPort: readProxyPort(projectRoot) } : {}),
    requestCount,
    version: getTrafficLensVersion(),
  };
}

export const statusCommand = new Command("status")
  .description("Show whether the capture proxy is running and how much is stored")
  .action((_, command: Command) => {
    try {
      const status = getProxyStatus(requireProjectContext(command));

      if (status.running) {
        console.log(`Proxy is running (pid ${status.pid ?? "?"})`);
        console.log(`  Proxy port: ${status.proxyPort ?? "unknown"}`);
      } else {
        console.log("Proxy is not running");
      }
      console.log(`  Requests captured: ${status.requestCount}`);
      console.log(`  Version: ${status.version}`);
    } catch (err) {
      exitWithError(err);
    }
  });
