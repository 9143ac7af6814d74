/**
 * Writer process: proxy engine, capture hook and store wired together.
 */

import * as fs from "node:fs";
import { generateCACertificate } from "mockttp";
import { RequestRepository } from "./storage.js";
import { CaptureHook } from "./capture-hook.js";
import { createProxy, type ProxyServer } from "./proxy.js";
import { loadConfig } from "../shared/config.js";
import { createLogger, type LogLevel } from "../shared/logger.js";
import {
  ensureTrafficLensDir,
  getTrafficLensPaths,
  removeProxyRuntimeFiles,
  writeProxyPid,
  writeProxyPort,
} from "../shared/project.js";
import { TRAFFICLENS_NAME } from "../shared/constants.js";

export interface CaptureProxyOptions {
  projectRoot: string;
  /** Overrides proxyPort from config.json */
  port?: number;
  logLevel?: LogLevel;
}

export interface CaptureProxy {
  proxy: ProxyServer;
  caCertPath: string;
  stop: () => Promise<void>;
}

/**
 * Generate the interception CA on first run. Clients must trust ca.pem to
 * have HTTPS traffic captured.
 */
export async function ensureCaCertificate(projectRoot: string): Promise<void> {
  const { caKeyFile, caCertFile } = getTrafficLensPaths(projectRoot);
  if (fs.existsSync(caKeyFile) && fs.existsSync(caCertFile)) {
    return;
  }

  const ca = await generateCACertificate({
    subject: { commonName: `${TRAFFICLENS_NAME} CA` },
  });
  fs.writeFileSync(caKeyFile, ca.key, { mode: 0o600 });
  fs.writeFileSync(caCertFile, ca.cert);
}

export async function startCaptureProxy(options: CaptureProxyOptions): Promise<CaptureProxy> {
  const { projectRoot } = options;
  ensureTrafficLensDir(projectRoot);

  const config = loadConfig(projectRoot);
  const paths = getTrafficLensPaths(projectRoot);
  const logger = createLogger("proxy", projectRoot, options.logLevel);

  await ensureCaCertificate(projectRoot);

  const storage = new RequestRepository(paths.databaseFile, {
    logger: createLogger("storage", projectRoot, options.logLevel),
    busyTimeoutMs: config.busyTimeoutMs,
  });

  const hook = new CaptureHook(storage, {
    logger: createLogger("capture", projectRoot, options.logLevel),
    maxBodyBytes: config.maxBodyBytes,
    staleFlowTimeoutMs: config.staleFlowTimeoutMs,
    maxInFlightFlows: config.maxInFlightFlows,
  });

  let proxy: ProxyServer;
  try {
    proxy = await createProxy({
      caKeyPath: paths.caKeyFile,
      caCertPath: paths.caCertFile,
      hook,
      port: options.port ?? config.proxyPort,
      sweepIntervalMs: Math.min(config.staleFlowTimeoutMs, 60_000),
      logger,
    });
  } catch (err) {
    storage.close();
    throw err;
  }

  writeProxyPid(projectRoot, process.pid);
  writeProxyPort(projectRoot, proxy.port);

  let stopped = false;

  return {
    proxy,
    caCertPath: paths.caCertFile,
    stop: async () => {
      if (stopped) return;
      stopped = true;
      try {
        await proxy.stop();
      } finally {
        storage.close();
        removeProxyRuntimeFiles(projectRoot);
      }
    },
  };
}
