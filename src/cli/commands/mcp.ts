import { Command } from "commander";
import { createTrafficLensMcpServer } from "../../mcp/server.js";
import { parseVerbosity } from "../../shared/logger.js";
import { exitWithError, getGlobalOptions, requireProjectContext } from "./helpers.js";

const SEPARATOR_WIDTH = 48;

const MCP_CLIENT_CONFIG = [
  "  {",
  '    "mcpServers": {',
  '      "trafficlens": {',
  '        "command": "trafficlens",',
  '        "args": ["mcp"]',
  "      }",
  "    }",
  "  }",
];

function printSetupInstructions(): void {
  console.log("trafficlens MCP server");
  console.log("");
  console.log("Add trafficlens to your AI tool to give it access to captured HTTP traffic.");
  console.log("");

  const clients: { name: string; lines: string[] }[] = [
    {
      name: "Cursor",
      lines: ["  Add to .cursor/mcp.json:", "", ...MCP_CLIENT_CONFIG],
    },
    {
      name: "Other MCP clients",
      lines: ["  Add to your MCP client config:", "", ...MCP_CLIENT_CONFIG],
    },
  ];

  for (const client of clients) {
    const label = ` ${client.name} `;
    const padding = "─".repeat(Math.max(0, SEPARATOR_WIDTH - label.length - 2));
    console.log(`──${label}${padding}`);
    console.log("");
    for (const line of client.lines) {
      console.log(line);
    }
    console.log("");
  }

  console.log("Note: run `trafficlens proxy` to capture traffic; the MCP server reads what it records.");
}

export const mcpCommand = new Command("mcp")
  .description("Start the trafficlens MCP server (stdio transport for AI tool integration)")
  .action(async (_, command: Command) => {
    // If stdout is a TTY, user ran directly: show setup instructions instead
    if (process.stdout.isTTY) {
      printSetupInstructions();
      return;
    }

    const projectRoot = requireProjectContext(command);
    const logLevel = parseVerbosity(getGlobalOptions(command).verbose);

    try {
      const mcp = createTrafficLensMcpServer({ projectRoot, logLevel });

      let closing = false;
      const shutdown = () => {
        if (closing) return;
        closing = true;
        mcp
          .close()
          .then(() => process.exit(0))
          .catch((err: unknown) => exitWithError(err));
      };
      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);

      await mcp.start();

      // stdout is reserved for the JSON-RPC stream
      process.stderr.write(`trafficlens MCP server running (project: ${projectRoot})\n`);
    } catch (err) {
      exitWithError(err);
    }
  });
