import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { getProxyStatus } from "./status.js";
import { RequestRepository } from "../../daemon/storage.js";
import { ensureTrafficLensDir, getTrafficLensPaths, writeProxyPid, writeProxyPort } from "../../shared/project.js";
import { getTrafficLensVersion } from "../../shared/version.js";

describe("getProxyStatus", () => {
  let projectRoot: string;

  beforeEach(() => {
    projectRoot = fs.mkdtempSync(path.join(os.tmpdir(), "trafficlens-status-test-"));
    ensureTrafficLensDir(projectRoot);
  });

  afterEach(() => {
    fs.rmSync(projectRoot, { recursive: true, force: true });
  });

  it("reports a stopped proxy with an empty store", () => {
    expect(getProxyStatus(projectRoot)).toEqual({
      running: false,
      requestCount: 0,
      version: getTrafficLensVersion(),
    });
  });

  it("reports the pid, port and request count of a live proxy", () => {
    const repo = new RequestRepository(getTrafficLensPaths(projectRoot).databaseFile);
    repo.append({
      timestamp: 1,
      method: "GET",
      url: "http://a.test/",
      host: "a.test",
      path: "/",
      requestHeaders: {},
    });
    repo.close();
    writeProxyPid(projectRoot, process.pid);
    writeProxyPort(projectRoot, 8123);

    expect(getProxyStatus(projectRoot)).toMatchObject({
      running: true,
      pid: process.pid,
      proxyPort: 8123,
      requestCount: 1,
    });
  });
});
