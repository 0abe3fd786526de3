/**
 * mail-rules history
 */

import { Command } from "commander";
import { formatHistory } from "../format.js";
import { reportFailure, withApp } from "../context.js";
import { parsePositiveInteger } from "./fetch.js";

interface HistoryOptions {
  limit: number;
  workflow?: number;
}

export const historyCommand = new Command("history")
  .description("List recent workflow runs")
  .option("-n, --limit <n>", "Number of runs to show", parsePositiveInteger, 20)
  .option("--workflow <id>", "Only runs of this workflow", parsePositiveInteger)
  .action(async (options: HistoryOptions) => {
    try {
      await withApp(async (app) => {
        const entries = await app.workflows.listRuns({
          limit: options.limit,
          ...(options.workflow !== undefined ? { workflowId: options.workflow } : {}),
        });
        for (const line of formatHistory(entries)) console.log(line);
      });
    } catch (err) {
      reportFailure(err);
    }
  });
