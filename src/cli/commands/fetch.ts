/**
 * mail-rules fetch
 */

import { Command, InvalidArgumentError } from "commander";
import { formatFetchSummary } from "../format.js";
import { reportFailure, withApp } from "../context.js";

interface FetchCommandOptions {
  folder?: string;
  maxPages?: number;
}

export function parsePositiveInteger(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export const fetchCommand = new Command("fetch")
  .description("Mirror folders and messages from the mail provider into the local store")
  .option("-f, --folder <name>", "Only fetch one folder")
  .option("--max-pages <n>", "Stop after this many pages", parsePositiveInteger)
  .action(async (options: FetchCommandOptions) => {
    try {
      await withApp(async (app) => {
        const summary = await app.fetcher.fetch({
          ...(options.folder ? { folder: options.folder } : {}),
          ...(options.maxPages !== undefined ? { maxPages: options.maxPages } : {}),
        });
        for (const line of formatFetchSummary(summary)) console.log(line);
      });
    } catch (err) {
      reportFailure(err);
    }
  });
