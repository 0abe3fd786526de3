/**
 * mail-rules apply-rules
 *
 * Runs one workflow document against the locally stored mailbox. Exits 0
 * when the run completes, even if some emails failed; non-zero when the
 * document is invalid or the run itself fails.
 */

import { Command } from "commander";
import { readWorkflowFile } from "../../rules/schema.js";
import { formatRunReport } from "../format.js";
import { reportFailure, withApp, withInterrupt } from "../context.js";

interface ApplyRulesOptions {
  workflow: string;
  email?: string;
}

export const applyRulesCommand = new Command("apply-rules")
  .description("Apply a workflow file to stored emails")
  .requiredOption("-w, --workflow <path>", "Workflow JSON file")
  .option("-e, --email <address>", "Mailbox owner (defaults to the authenticated account)")
  .action(async (options: ApplyRulesOptions) => {
    try {
      const document = await readWorkflowFile(options.workflow);

      await withApp(async (app) => {
        const address = options.email ?? (await app.provider.authenticate());
        const user = await app.users.getUserByEmail(address);
        if (!user) {
          console.error(`No stored mailbox for ${address}; run "mail-rules fetch" first`);
          process.exitCode = 1;
          return;
        }

        const report = await withInterrupt((signal) =>
          app.engine.run(document, { userId: user.id, signal })
        );
        for (const line of formatRunReport(report)) console.log(line);
        if (report.run.status !== "completed") process.exitCode = 1;
      });
    } catch (err) {
      reportFailure(err);
    }
  });
