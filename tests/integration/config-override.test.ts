import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { startCaptureProxy } from "../../src/daemon/index.js";
import { createTrafficLensMcpServer } from "../../src/mcp/server.js";
import { getTrafficLensPaths, setConfigOverride } from "../../src/shared/project.js";

describe("config override integration", () => {
  let tempDir: string;
  let configDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "trafficlens-config-test-"));
    // The config dir is a standalone directory: no .trafficlens appended
    configDir = path.join(tempDir, "my-trafficlens-data");
  });

  afterEach(() => {
    // Always clear the override to avoid cross-test contamination
    setConfigOverride(undefined);
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("keeps every proxy file in the override directory", async () => {
    setConfigOverride(configDir);

    const projectRoot = path.join(tempDir, "project");
    fs.mkdirSync(projectRoot);

    const capture = await startCaptureProxy({ projectRoot });
    try {
      expect(getTrafficLensPaths(projectRoot).dataDir).toBe(configDir);
      for (const file of ["ca-key.pem", "ca.pem", "requests.db", "proxy.pid", "proxy.port"]) {
        expect(fs.existsSync(path.join(configDir, file))).toBe(true);
      }
    } finally {
      await capture.stop();
    }

    expect(fs.readdirSync(projectRoot)).toEqual([]);
  });

  it("points the MCP server at the override directory", async () => {
    setConfigOverride(configDir);
    fs.mkdirSync(configDir, { recursive: true });
    fs.writeFileSync(path.join(configDir, "config.json"), JSON.stringify({ busyTimeoutMs: 100 }));

    const mcp = createTrafficLensMcpServer({ projectRoot: "/ignored-project-root" });
    try {
      const result = mcp.dispatcher.call("clear_requests", {});

      expect(result.content[0]?.text).toBe(JSON.stringify({ removed: 0 }, null, 2));
      expect(fs.existsSync(path.join(configDir, "requests.db"))).toBe(true);
    } finally {
      await mcp.close();
    }
  });

  it("rejects an invalid config.json before starting the MCP server", () => {
    setConfigOverride(configDir);
    fs.mkdirSync(configDir, { recursive: true });
    fs.writeFileSync(path.join(configDir, "config.json"), JSON.stringify({ maxBodyBytes: -1 }));

    expect(() => createTrafficLensMcpServer({ projectRoot: "/ignored-project-root" })).toThrow(
      /^Invalid .*config\.json: "maxBodyBytes"/
    );
  });
});
