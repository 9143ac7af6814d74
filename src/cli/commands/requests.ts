import { Command } from "commander";
import { QueryEngine } from "../../query/engine.js";
import { buildFilter } from "../../query/filters.js";
import { toToolSummary } from "../../mcp/format.js";
import { formatRequestTable } from "../utils/output.js";
import {
  addFilterOptions,
  exitWithError,
  openRequestSource,
  parseNonNegativeInt,
  type FilterCliOptions,
} from "./helpers.js";

const JSON_INDENT = 2;

interface RequestsOptions extends FilterCliOptions {
  limit?: number;
  offset?: number;
  json?: boolean;
  har?: string;
}

export const requestsCommand = addFilterOptions(
  new Command("requests").description("List captured requests in capture order")
)
  .option("-n, --limit <n>", "maximum number of requests to show", parseNonNegativeInt)
  .option("--offset <n>", "number of matching requests to skip", parseNonNegativeInt)
  .option("--json", "print JSON summaries")
  .option("--har <file>", "read from a HAR archive instead of the capture store")
  .action((options: RequestsOptions, command: Command) => {
    try {
      const filter = buildFilter(options);
      const { source, close } = openRequestSource(command, options.har);
      try {
        const page = new QueryEngine(source).list(filter, {
          limit: options.limit === 0 ? undefined : options.limit,
          offset: options.offset,
        });

        if (options.json) {
          console.log(
            JSON.stringify(
              { total: page.total, showing: page.requests.length, requests: page.requests.map(toToolSummary) },
              null,
              JSON_INDENT
            )
          );
          return;
        }

        if (page.requests.length === 0) {
          console.log("No requests captured.");
          return;
        }
        console.log(formatRequestTable(page.requests));
        console.log(`\nShowing ${page.requests.length} of ${page.total}`);
      } finally {
        close();
      }
    } catch (err) {
      exitWithError(err);
    }
  });
