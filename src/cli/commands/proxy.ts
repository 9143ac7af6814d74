import { Command } from "commander";
import { startCaptureProxy } from "../../daemon/index.js";
import { parseVerbosity } from "../../shared/logger.js";
import { ensureTrafficLensDir, isProcessRunning, readProxyPid } from "../../shared/project.js";
import { buildProxyEnvVars, formatEnvVars } from "../utils/env.js";
import { exitWithError, getGlobalOptions, parseNonNegativeInt, resolveProjectContext } from "./helpers.js";

export const proxyCommand = new Command("proxy")
  .description("Run the capture proxy in the foreground, recording every exchange")
  .option("-p, --port <port>", "port to listen on (default: config.json proxyPort, else a free port)", parseNonNegativeInt)
  .action(async (options: { port?: number }, command: Command) => {
    const globalOpts = getGlobalOptions(command);
    const projectRoot = resolveProjectContext(globalOpts);
    ensureTrafficLensDir(projectRoot);

    const existingPid = readProxyPid(projectRoot);
    if (existingPid !== undefined && existingPid !== process.pid && isProcessRunning(existingPid)) {
      exitWithError(new Error(`A capture proxy is already running for this project (pid ${existingPid})`));
    }

    const capture = await startCaptureProxy({
      projectRoot,
      port: options.port,
      logLevel: parseVerbosity(globalOpts.verbose),
    }).catch((err: unknown) => exitWithError(err));

    const { proxy, caCertPath } = capture;

    // Export lines go to stdout so they can be pasted or eval'd; status goes to stderr
    console.log(formatEnvVars(buildProxyEnvVars(proxy.url, caCertPath)));
    process.stderr.write(`trafficlens: capturing on ${proxy.url} (CA certificate: ${caCertPath})\n`);
    process.stderr.write("trafficlens: press Ctrl+C to stop\n");

    let stopping = false;
    const shutdown = (signal: NodeJS.Signals) => {
      if (stopping) return;
      stopping = true;
      process.stderr.write(`trafficlens: ${signal} received, stopping proxy\n`);
      capture
        .stop()
        .then(() => process.exit(0))
        .catch((err: unknown) => exitWithError(err));
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });
