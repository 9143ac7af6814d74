import { Command } from "commander";
import { QueryEngine } from "../../query/engine.js";
import { toToolSummary } from "../../mcp/format.js";
import { formatRequestTable } from "../utils/output.js";
import { exitWithError, openRequestSource } from "./helpers.js";

const JSON_INDENT = 2;

export const searchCommand = new Command("search")
  .description("Search URLs, headers and text bodies (case-insensitive)")
  .argument("<text>", "text to look for")
  .option("--json", "print JSON summaries")
  .option("--har <file>", "read from a HAR archive instead of the capture store")
  .action((text: string, options: { json?: boolean; har?: string }, command: Command) => {
    try {
      const { source, close } = openRequestSource(command, options.har);
      try {
        const matches = new QueryEngine(source).search(text);
        if (options.json) {
          console.log(
            JSON.stringify({ text, total: matches.length, requests: matches.map(toToolSummary) }, null, JSON_INDENT)
          );
        } else if (matches.length === 0) {
          console.log(`No requests match "${text}".`);
        } else {
          console.log(formatRequestTable(matches));
        }
      } finally {
        close();
      }
    } catch (err) {
      exitWithError(err);
    }
  });
