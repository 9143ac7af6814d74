import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { collectDebugInfo } from "./debug-dump.js";
import { ensureTrafficLensDir, getTrafficLensPaths } from "../../shared/project.js";

describe("collectDebugInfo", () => {
  let projectRoot: string;

  beforeEach(() => {
    projectRoot = fs.mkdtempSync(path.join(os.tmpdir(), "trafficlens-debug-test-"));
  });

  afterEach(() => {
    fs.rmSync(projectRoot, { recursive: true, force: true });
  });

  it("reports a missing data directory", () => {
    const dump = collectDebugInfo(projectRoot);

    expect(dump.dataDir.exists).toBe(false);
    expect(dump.dataDir.files).toEqual([]);
    expect(dump.recentLogs).toEqual([]);
    expect(dump.proxy).toMatchObject({ running: false, requestCount: 0 });
  });

  it("lists data files and keeps the tail of the log", () => {
    ensureTrafficLensDir(projectRoot);
    const { logFile } = getTrafficLensPaths(projectRoot);
    const lines = Array.from({ length: 205 }, (_, i) => `line ${i}`);
    fs.writeFileSync(logFile, lines.join("\n") + "\n");

    const dump = collectDebugInfo(projectRoot);

    expect(dump.dataDir.files).toEqual(["trafficlens.log"]);
    expect(dump.recentLogs).toHaveLength(200);
    expect(dump.recentLogs[0]).toBe("line 5");
    expect(dump.recentLogs.at(-1)).toBe("line 204");
  });
});
