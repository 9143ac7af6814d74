import { Command } from "commander";
import { QueryEngine } from "../../query/engine.js";
import { serialiseRequest } from "../../mcp/format.js";
import { InvalidArgumentError } from "../../shared/errors.js";
import { formatRequestDetail } from "../utils/output.js";
import { exitWithError, openRequestSource } from "./helpers.js";

const JSON_INDENT = 2;

function parseRequestId(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError(`Invalid request id "${value}". Expected an integer.`);
  }
  return parseInt(value, 10);
}

export const requestCommand = new Command("request")
  .description("Show one captured request with headers and bodies")
  .argument("<id>", "request id")
  .option("--json", "print the record as JSON")
  .option("--har <file>", "read from a HAR archive instead of the capture store")
  .action((id: string, options: { json?: boolean; har?: string }, command: Command) => {
    try {
      const requestId = parseRequestId(id);
      const { source, close } = openRequestSource(command, options.har);
      try {
        const request = new QueryEngine(source).getOne(requestId);
        if (options.json) {
          console.log(JSON.stringify(serialiseRequest(request), null, JSON_INDENT));
        } else {
          console.log(formatRequestDetail(request, { color: process.stdout.isTTY === true }));
        }
      } finally {
        close();
      }
    } catch (err) {
      exitWithError(err);
    }
  });
