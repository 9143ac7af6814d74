import * as fs from "node:fs";
import { Command } from "commander";
import { QueryEngine } from "../../query/engine.js";
import { buildFilter } from "../../query/filters.js";
import { generateHarString } from "../../export/har.js";
import {
  addFilterOptions,
  exitWithError,
  openRepository,
  type FilterCliOptions,
} from "./helpers.js";

export const exportCommand = addFilterOptions(
  new Command("export").description("Export captured requests as a HAR 1.2 archive")
)
  .option("-o, --out <file>", "write to a file instead of stdout")
  .action((options: FilterCliOptions & { out?: string }, command: Command) => {
    try {
      const filter = buildFilter(options);
      const repository = openRepository(command);
      try {
        const records = new QueryEngine(repository).filtered(filter);
        const har = generateHarString(records);

        if (options.out) {
          fs.writeFileSync(options.out, har + "\n", "utf-8");
          console.error(`Exported ${records.length} requests to ${options.out}`);
        } else {
          console.log(har);
        }
      } finally {
        repository.close();
      }
    } catch (err) {
      exitWithError(err);
    }
  });
