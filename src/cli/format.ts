/**
 * Plain-text rendering of command results.
 */

import type { RunReport } from "../services/workflow-engine.js";
import type { FetchSummary } from "../services/email-fetcher.js";
import type { RunHistoryEntry } from "../storage/workflows.js";

function formatTimestamp(value: Date | null): string {
  return value ? value.toISOString() : "-";
}

export function formatRunReport(report: RunReport): string[] {
  const { workflow, run } = report;
  const lines = [
    `Workflow ${workflow.id} (${report.workflowCreated ? "new" : "existing"}), run ${run.id}: ${run.status}`,
  ];

  for (const outcome of report.outcomes) {
    const subject = outcome.subject ?? "(no subject)";
    const detail = outcome.error ? `: ${outcome.error}` : "";
    lines.push(`  ${outcome.status.padEnd(8)}#${outcome.emailId} ${subject}${detail}`);
  }

  lines.push(
    `${report.outcomes.length} matched: ${report.appliedCount} applied, ` +
      `${report.failedCount} failed, ${report.skippedCount} skipped`
  );
  return lines;
}

export function formatFetchSummary(summary: FetchSummary): string[] {
  return [
    `Mailbox ${summary.user.emailAddress}: ${summary.foldersSynced} folders`,
    `${summary.messagesSeen} messages seen: ${summary.stored} stored, ` +
      `${summary.alreadyStored} already stored, ${summary.failed} failed`,
  ];
}

export function formatHistory(entries: readonly RunHistoryEntry[]): string[] {
  if (entries.length === 0) return ["No runs yet"];
  return entries.map(({ run, description, activityCount }) =>
    [
      `#${run.id}`,
      `workflow ${run.workflowId}`,
      run.status,
      `started ${formatTimestamp(run.startedAt)}`,
      `completed ${formatTimestamp(run.completedAt)}`,
      `${activityCount} actions`,
      description,
    ].join("  ")
  );
}
