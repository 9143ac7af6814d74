#!/usr/bin/env node

import { program } from "commander";
import { clearCommand } from "./commands/clear.js";
import { debugDumpCommand } from "./commands/debug-dump.js";
import { exportCommand } from "./commands/export.js";
import { mcpCommand } from "./commands/mcp.js";
import { proxyCommand } from "./commands/proxy.js";
import { requestCommand } from "./commands/request.js";
import { requestsCommand } from "./commands/requests.js";
import { searchCommand } from "./commands/search.js";
import { statsCommand } from "./commands/stats.js";
import { statusCommand } from "./commands/status.js";
import { getTrafficLensVersion } from "../shared/version.js";

program
  .name("trafficlens")
  .description("Capture proxied HTTP traffic and query it from the terminal or an MCP client")
  .version(getTrafficLensVersion())
  .option(
    "-v, --verbose",
    "increase verbosity (use -vv or -vvv for more)",
    (_, prev: number) => prev + 1,
    0
  )
  .option("-d, --dir <path>", "override project root directory")
  .option("-c, --config <path>", "override trafficlens data directory (no .trafficlens appended)");

program.addCommand(proxyCommand);
program.addCommand(mcpCommand);
program.addCommand(requestsCommand);
program.addCommand(requestCommand);
program.addCommand(searchCommand);
program.addCommand(statsCommand);
program.addCommand(clearCommand);
program.addCommand(exportCommand);
program.addCommand(statusCommand);
program.addCommand(debugDumpCommand);

program.addHelpText(
  "after",
  `
Quick start:
  trafficlens proxy      Start capturing (prints proxy env vars)
  trafficlens requests   List captured requests
  trafficlens mcp        Serve captured traffic to an MCP client`
);

program.parse();
