import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

const TRAFFICLENS_DIR = ".trafficlens";
const HOME_DIR_PREFIX = "~";

/**
 * Module-level override for the trafficlens data directory.
 * When set, getTrafficLensDir returns this path directly instead of
 * appending .trafficlens to the project root.
 */
let _configOverride: string | undefined;

export function setConfigOverride(dir: string | undefined): void {
  _configOverride = dir;
}

export function getConfigOverride(): string | undefined {
  return _configOverride;
}

/**
 * Resolve an override path, expanding ~ to the user's home directory
 * and converting relative paths to absolute.
 */
export function resolveOverridePath(override: string): string {
  if (override === HOME_DIR_PREFIX) {
    return os.homedir();
  }
  if (override.startsWith(HOME_DIR_PREFIX + "/") || override.startsWith(HOME_DIR_PREFIX + path.sep)) {
    return path.join(os.homedir(), override.slice(2));
  }
  return path.resolve(override);
}

/**
 * Find the project root by looking for a .trafficlens or .git directory,
 * walking up from startDir. Returns undefined if neither is found.
 *
 * When override is provided, returns the resolved override path only if
 * it contains one of those directories.
 */
export function findProjectRoot(
  startDir: string = process.cwd(),
  override?: string
): string | undefined {
  if (override !== undefined) {
    const resolved = resolveOverridePath(override);
    if (
      fs.existsSync(path.join(resolved, TRAFFICLENS_DIR)) ||
      fs.existsSync(path.join(resolved, ".git"))
    ) {
      return resolved;
    }
    return undefined;
  }

  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  while (currentDir !== root) {
    if (fs.existsSync(path.join(currentDir, TRAFFICLENS_DIR))) {
      return currentDir;
    }

    if (fs.existsSync(path.join(currentDir, ".git"))) {
      return currentDir;
    }

    currentDir = path.dirname(currentDir);
  }

  return undefined;
}

/**
 * Determine the project root for commands that may create state.
 * Falls back to the home directory (a global instance) when no root is found.
 */
export function findOrCreateProjectRoot(
  startDir: string = process.cwd(),
  override?: string
): string {
  if (override !== undefined) {
    return resolveOverridePath(override);
  }

  return findProjectRoot(startDir) ?? os.homedir();
}

/**
 * Get the .trafficlens directory path for a project root.
 * Returns the config override when set (ignoring projectRoot).
 */
export function getTrafficLensDir(projectRoot: string): string {
  return _configOverride ?? path.join(projectRoot, TRAFFICLENS_DIR);
}

/**
 * Ensure the .trafficlens directory exists and return its path.
 */
export function ensureTrafficLensDir(projectRoot: string): string {
  const dir = getTrafficLensDir(projectRoot);

  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  return dir;
}

export interface TrafficLensPaths {
  dataDir: string;
  databaseFile: string;
  caKeyFile: string;
  caCertFile: string;
  proxyPortFile: string;
  pidFile: string;
  logFile: string;
  configFile: string;
}

/**
 * Get paths to the files kept in the .trafficlens directory.
 */
export function getTrafficLensPaths(projectRoot: string): TrafficLensPaths {
  const dataDir = getTrafficLensDir(projectRoot);

  return {
    dataDir,
    databaseFile: path.join(dataDir, "requests.db"),
    caKeyFile: path.join(dataDir, "ca-key.pem"),
    caCertFile: path.join(dataDir, "ca.pem"),
    proxyPortFile: path.join(dataDir, "proxy.port"),
    pidFile: path.join(dataDir, "proxy.pid"),
    logFile: path.join(dataDir, "trafficlens.log"),
    configFile: path.join(dataDir, "config.json"),
  };
}

function readIntFile(file: string): number | undefined {
  if (!fs.existsSync(file)) {
    return undefined;
  }

  const content = fs.readFileSync(file, "utf-8").trim();
  const value = parseInt(content, 10);

  return isNaN(value) ? undefined : value;
}

/**
 * Read the proxy port written by a running `trafficlens proxy`.
 */
export function readProxyPort(projectRoot: string): number | undefined {
  return readIntFile(getTrafficLensPaths(projectRoot).proxyPortFile);
}

export function writeProxyPort(projectRoot: string, port: number): void {
  const { proxyPortFile } = getTrafficLensPaths(projectRoot);
  fs.writeFileSync(proxyPortFile, port.toString(), "utf-8");
}

/**
 * Read the PID of the proxy process.
 */
export function readProxyPid(projectRoot: string): number | undefined {
  return readIntFile(getTrafficLensPaths(projectRoot).pidFile);
}

export function writeProxyPid(projectRoot: string, pid: number): void {
  const { pidFile } = getTrafficLensPaths(projectRoot);
  fs.writeFileSync(pidFile, pid.toString(), "utf-8");
}

/**
 * Remove the pid and port files left by the proxy process.
 */
export function removeProxyRuntimeFiles(projectRoot: string): void {
  const { pidFile, proxyPortFile } = getTrafficLensPaths(projectRoot);

  for (const file of [pidFile, proxyPortFile]) {
    if (fs.existsSync(file)) {
      fs.unlinkSync(file);
    }
  }
}

/**
 * Check if a process with the given PID is running.
 */
export function isProcessRunning(pid: number): boolean {
  try {
    // Signal 0 checks for existence without delivering anything
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
