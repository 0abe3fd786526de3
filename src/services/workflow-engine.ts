/**
 * Workflow engine.
 *
 * Drives one run of a workflow: resolve its stored identity, open a run,
 * select matching emails, apply the action to each, record what was done,
 * and close the run.
 *
 * Per-email action failures are recorded in the report and do not stop the
 * run (partial success). Storage or compilation faults end the run as
 * `failed` and are rethrown. Aborting the signal stops new emails from being
 * attempted; the run then ends as `failed` with the activities recorded so
 * far left in place.
 */

import type { Email } from "../types/email.js";
import type { Workflow, WorkflowDocument, WorkflowRun } from "../types/workflow.js";
import { TERMINAL_RUN_STATUSES } from "../types/workflow.js";
import type { WorkflowStore } from "../storage/workflows.js";
import type { EmailRepository } from "../storage/emails.js";
import type { Logger } from "../logger.js";
import { compileRules } from "../rules/filter.js";
import { renderFilter } from "../rules/sql.js";
import { errorMessage } from "../errors.js";
import type { ActionExecutor } from "./action-executor.js";
import { mapWithConcurrencyUntilAborted } from "./concurrency.js";

export type EmailOutcomeStatus = "applied" | "failed" | "skipped";

export interface EmailOutcome {
  emailId: number;
  providerId: string;
  subject: string | null;
  status: EmailOutcomeStatus;
  /** Present when status is `failed` */
  error?: string;
}

export interface RunReport {
  workflow: Workflow;
  /** True when this run stored the workflow for the first time */
  workflowCreated: boolean;
  run: WorkflowRun;
  outcomes: EmailOutcome[];
  appliedCount: number;
  failedCount: number;
  skippedCount: number;
}

export interface RunOptions {
  userId: number;
  signal?: AbortSignal;
}

export interface WorkflowEngineDeps {
  store: WorkflowStore;
  emails: EmailRepository;
  executor: ActionExecutor;
  logger: Logger;
  /** Upper bound on concurrent per-email actions; 1 is sequential */
  actionConcurrency?: number;
  /** Candidates loaded from storage at a time */
  matchBatchSize?: number;
  /** Evaluation time source; relative date rules are measured from it */
  clock?: () => Date;
}

export class WorkflowEngine {
  private store: WorkflowStore;
  private emails: EmailRepository;
  private executor: ActionExecutor;
  private logger: Logger;
  private actionConcurrency: number;
  private matchBatchSize: number | undefined;
  private clock: () => Date;

  constructor(deps: WorkflowEngineDeps) {
    this.store = deps.store;
    this.emails = deps.emails;
    this.executor = deps.executor;
    this.logger = deps.logger;
    this.actionConcurrency = Math.max(1, deps.actionConcurrency ?? 1);
    this.matchBatchSize = deps.matchBatchSize;
    this.clock = deps.clock ?? (() => new Date());
  }

  async run(document: WorkflowDocument, options: RunOptions): Promise<RunReport> {
    const { workflow, created } = await this.store.resolveWorkflow(document);
    this.logger.info(
      `${created ? "Stored new" : "Reusing"} workflow ${workflow.id} (${workflow.hash.slice(0, 12)})`
    );

    let run = await this.store.createRun(workflow.id);

    try {
      const evaluatedAt = this.clock();
      run = await this.store.markRunStarted(run.id, evaluatedAt);

      const filter = renderFilter(compileRules(document.condition, document.rules, evaluatedAt));
      this.logger.debug("Filter", { sql: filter.sql, params: filter.params });

      // Once cancelled, later batches come back as skipped without being attempted
      const outcomes: EmailOutcome[] = [];
      for await (const batch of this.emails.matchingBatches(options.userId, filter, this.matchBatchSize)) {
        this.logger.debug(`Loaded ${batch.length} matching emails during run ${run.id}`);
        outcomes.push(...(await this.applyToAll(run.id, batch, document, options.signal)));
      }
      this.logger.info(`Found ${outcomes.length} emails matching the rules during run ${run.id}`);

      const aborted = options.signal?.aborted ?? false;
      run = await this.store.markRunFinished(run.id, aborted ? "failed" : "completed", this.clock());

      const report = summarize(workflow, created, run, outcomes);
      this.logger.info(
        `Run ${run.id} ${run.status}: ${report.appliedCount} applied, ` +
          `${report.failedCount} failed, ${report.skippedCount} skipped`
      );
      return report;
    } catch (err) {
      this.logger.error(`Run ${run.id} failed: ${errorMessage(err)}`);
      await this.failRun(run);
      throw err;
    }
  }

  /**
   * Apply the action to every candidate, waiting for all started work before
   * returning. A fatal error stops new work and is rethrown after the join.
   */
  private async applyToAll(
    runId: number,
    candidates: readonly Email[],
    document: WorkflowDocument,
    signal: AbortSignal | undefined
  ): Promise<EmailOutcome[]> {
    const halt = new AbortController();
    const onAbort = (): void => halt.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    if (signal?.aborted) halt.abort();

    const fatalErrors: unknown[] = [];

    try {
      const results = await mapWithConcurrencyUntilAborted(
        candidates,
        this.actionConcurrency,
        async (email): Promise<EmailOutcome> => {
          try {
            return await this.applyToEmail(runId, email, document);
          } catch (err) {
            fatalErrors.push(err);
            halt.abort();
            return outcomeFor(email, "skipped");
          }
        },
        halt.signal
      );

      if (fatalErrors.length > 0) throw fatalErrors[0];

      return results.map((result, index) => {
        if ("status" in result) return result;
        const email = candidates[index];
        if (!email) throw new Error(`No candidate at index ${index}`);
        return outcomeFor(email, "skipped");
      });
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private async applyToEmail(
    runId: number,
    email: Email,
    document: WorkflowDocument
  ): Promise<EmailOutcome> {
    this.logger.debug(`Applying ${document.action} to email ${email.id} during run ${runId}`);

    const result = await this.executor.execute(email, document.action, document.action_target);
    if (!result.ok) {
      return { ...outcomeFor(email, "failed"), error: result.error.message };
    }

    // Storage errors here are fatal to the run
    await this.store.recordActivity(runId, email.id, result.action, result.commitLocal);
    return outcomeFor(email, "applied");
  }

  private async failRun(run: WorkflowRun): Promise<void> {
    try {
      const current = await this.store.getRun(run.id);
      if (current && !TERMINAL_RUN_STATUSES.includes(current.status)) {
        await this.store.markRunFinished(run.id, "failed", this.clock());
      }
    } catch (err) {
      this.logger.error(`Could not mark run ${run.id} as failed: ${errorMessage(err)}`);
    }
  }
}

function outcomeFor(email: Email, status: EmailOutcomeStatus): EmailOutcome {
  return {
    emailId: email.id,
    providerId: email.providerId,
    subject: email.subject,
    status,
  };
}

function summarize(
  workflow: Workflow,
  workflowCreated: boolean,
  run: WorkflowRun,
  outcomes: EmailOutcome[]
): RunReport {
  return {
    workflow,
    workflowCreated,
    run,
    outcomes,
    appliedCount: outcomes.filter((o) => o.status === "applied").length,
    failedCount: outcomes.filter((o) => o.status === "failed").length,
    skippedCount: outcomes.filter((o) => o.status === "skipped").length,
  };
}
