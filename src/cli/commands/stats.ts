import { Command } from "commander";
import { QueryEngine } from "../../query/engine.js";
import { formatStatsText, serialiseStats } from "../../mcp/format.js";
import { exitWithError, openRequestSource } from "./helpers.js";

const JSON_INDENT = 2;

export const statsCommand = new Command("stats")
  .description("Show aggregate statistics over captured traffic")
  .option("--json", "print JSON")
  .option("--har <file>", "read from a HAR archive instead of the capture store")
  .action((options: { json?: boolean; har?: string }, command: Command) => {
    try {
      const { source, close } = openRequestSource(command, options.har);
      try {
        const stats = new QueryEngine(source).stats();
        console.log(options.json ? JSON.stringify(serialiseStats(stats), null, JSON_INDENT) : formatStatsText(stats));
      } finally {
        close();
      }
    } catch (err) {
      exitWithError(err);
    }
  });
