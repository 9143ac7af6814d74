import { Command } from "commander";
import { exitWithError, openRepository } from "./helpers.js";

export const clearCommand = new Command("clear")
  .description("Delete every captured request (ids are never reused)")
  .action((_, command: Command) => {
    try {
      const repository = openRepository(command);
      try {
        const removed = repository.clear();
        console.log(`Cleared ${removed} ${removed === 1 ? "request" : "requests"}`);
      } finally {
        repository.close();
      }
    } catch (err) {
      exitWithError(err);
    }
  });
