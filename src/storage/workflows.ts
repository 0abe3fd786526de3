/**
 * Workflow Storage
 *
 * Workflows (deduplicated by content hash), their runs, and the activity
 * log of actions taken during each run.
 */

import type {
  RunStatus,
  Workflow,
  WorkflowAction,
  WorkflowDocument,
  WorkflowRun,
  WorkflowRunActivity,
} from "../types/workflow.js";
import { RUN_TRANSITIONS } from "../types/workflow.js";
import { canonicalizeWorkflowDocument, hashWorkflowDocument } from "../rules/hash.js";
import { assertWorkflowDocument } from "../rules/schema.js";
import { StorageError } from "../errors.js";
import { toRowId, withStorage, type SqliteDatabase } from "./sqlite.js";

interface WorkflowRow {
  id: number;
  hash: string;
  content: string;
  created_at: string;
  updated_at: string;
}

interface RunRow {
  id: number;
  workflow_id: number;
  status: RunStatus;
  started_at: string | null;
  completed_at: string | null;
  created_at: string;
}

interface ActivityRow {
  id: number;
  run_id: number;
  email_id: number;
  action_type: WorkflowAction;
  created_at: string;
}

export interface ResolvedWorkflow {
  workflow: Workflow;
  /** True when this call stored the workflow for the first time */
  created: boolean;
}

/**
 * Run summary for history listings.
 */
export interface RunHistoryEntry {
  run: WorkflowRun;
  description: string;
  activityCount: number;
}

export interface WorkflowStore {
  /**
   * Look up a workflow by content hash, storing it if it is new. At most one
   * row exists per hash, even under concurrent submission.
   */
  resolveWorkflow(document: WorkflowDocument): Promise<ResolvedWorkflow>;

  getWorkflow(id: number): Promise<Workflow | null>;

  /** New run in `yet_to_start` */
  createRun(workflowId: number): Promise<WorkflowRun>;

  /** `yet_to_start` → `running`, stamping started_at */
  markRunStarted(runId: number, at?: Date): Promise<WorkflowRun>;

  /** → `completed` | `failed`, stamping completed_at */
  markRunFinished(runId: number, status: "completed" | "failed", at?: Date): Promise<WorkflowRun>;

  getRun(runId: number): Promise<WorkflowRun | null>;

  /**
   * Append an activity row. `sideEffect` runs in the same transaction, so the
   * row and the local state change land together or not at all.
   */
  recordActivity(
    runId: number,
    emailId: number,
    actionType: WorkflowAction,
    sideEffect?: () => void
  ): Promise<WorkflowRunActivity>;

  listActivities(runId: number): Promise<WorkflowRunActivity[]>;

  /** Most recent runs first */
  listRuns(options?: { workflowId?: number; limit?: number }): Promise<RunHistoryEntry[]>;
}

function toWorkflow(row: WorkflowRow): Workflow {
  return {
    id: row.id,
    hash: row.hash,
    content: assertWorkflowDocument(JSON.parse(row.content)),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function toRun(row: RunRow): WorkflowRun {
  return {
    id: row.id,
    workflowId: row.workflow_id,
    status: row.status,
    startedAt: row.started_at ? new Date(row.started_at) : null,
    completedAt: row.completed_at ? new Date(row.completed_at) : null,
    createdAt: new Date(row.created_at),
  };
}

function toActivity(row: ActivityRow): WorkflowRunActivity {
  return {
    id: row.id,
    runId: row.run_id,
    emailId: row.email_id,
    actionType: row.action_type,
    createdAt: new Date(row.created_at),
  };
}

const RUN_COLUMNS = "id, workflow_id, status, started_at, completed_at, created_at";

export function createWorkflowStore(database: SqliteDatabase): WorkflowStore {
  const selectWorkflowByHash = database.prepare<[string], WorkflowRow>(
    "SELECT id, hash, content, created_at, updated_at FROM workflow WHERE hash = ?"
  );
  const selectWorkflowById = database.prepare<[number], WorkflowRow>(
    "SELECT id, hash, content, created_at, updated_at FROM workflow WHERE id = ?"
  );
  const insertWorkflow = database.prepare<[string, string]>(
    "INSERT INTO workflow (hash, content) VALUES (?, ?) ON CONFLICT(hash) DO NOTHING"
  );
  const selectRun = database.prepare<[number], RunRow>(
    `SELECT ${RUN_COLUMNS} FROM workflow_run WHERE id = ?`
  );
  const selectActivity = database.prepare<[number], ActivityRow>(
    "SELECT id, run_id, email_id, action_type, created_at FROM workflow_run_activity WHERE id = ?"
  );

  const insertOrFetch = database.transaction((hash: string, content: string) => {
    const existing = selectWorkflowByHash.get(hash);
    if (existing) return { row: existing, created: false };
    const result = insertWorkflow.run(hash, content);
    const row = selectWorkflowByHash.get(hash);
    if (!row) throw new StorageError(`Workflow ${hash} missing after insert`);
    return { row, created: result.changes > 0 };
  });

  const loadRun = (runId: number): RunRow => {
    const row = selectRun.get(runId);
    if (!row) throw new StorageError(`Workflow run ${runId} not found`);
    return row;
  };

  const transition = database.transaction(
    (runId: number, next: RunStatus, column: "started_at" | "completed_at", at: string) => {
      const current = loadRun(runId);
      if (!RUN_TRANSITIONS[current.status].includes(next)) {
        throw new StorageError(
          `Workflow run ${runId} cannot move from ${current.status} to ${next}`
        );
      }
      database
        .prepare(`UPDATE workflow_run SET status = ?, ${column} = ? WHERE id = ?`)
        .run(next, at, runId);
      return loadRun(runId);
    }
  );

  const appendActivity = database.transaction(
    (runId: number, emailId: number, actionType: WorkflowAction, sideEffect?: () => void) => {
      const result = database
        .prepare("INSERT INTO workflow_run_activity (run_id, email_id, action_type) VALUES (?, ?, ?)")
        .run(runId, emailId, actionType);
      sideEffect?.();
      const row = selectActivity.get(toRowId(result.lastInsertRowid));
      if (!row) throw new StorageError("Activity missing after insert");
      return row;
    }
  );

  return {
    async resolveWorkflow(document: WorkflowDocument): Promise<ResolvedWorkflow> {
      const hash = hashWorkflowDocument(document);
      const content = canonicalizeWorkflowDocument(document);

      // A concurrent insert of the same hash is a no-op; every caller reads back one row
      const { row, created } = withStorage("Resolve workflow", () => insertOrFetch(hash, content));
      return { workflow: toWorkflow(row), created };
    },

    async getWorkflow(id: number): Promise<Workflow | null> {
      const row = withStorage("Load workflow", () => selectWorkflowById.get(id));
      return row ? toWorkflow(row) : null;
    },

    async createRun(workflowId: number): Promise<WorkflowRun> {
      return withStorage("Create workflow run", () => {
        const result = database
          .prepare("INSERT INTO workflow_run (workflow_id, status) VALUES (?, 'yet_to_start')")
          .run(workflowId);
        return toRun(loadRun(toRowId(result.lastInsertRowid)));
      });
    },

    async markRunStarted(runId: number, at: Date = new Date()): Promise<WorkflowRun> {
      return withStorage("Start workflow run", () =>
        toRun(transition(runId, "running", "started_at", at.toISOString()))
      );
    },

    async markRunFinished(
      runId: number,
      status: "completed" | "failed",
      at: Date = new Date()
    ): Promise<WorkflowRun> {
      return withStorage("Finish workflow run", () =>
        toRun(transition(runId, status, "completed_at", at.toISOString()))
      );
    },

    async getRun(runId: number): Promise<WorkflowRun | null> {
      const row = withStorage("Load workflow run", () => selectRun.get(runId));
      return row ? toRun(row) : null;
    },

    async recordActivity(runId, emailId, actionType, sideEffect): Promise<WorkflowRunActivity> {
      return withStorage("Record activity", () =>
        toActivity(appendActivity(runId, emailId, actionType, sideEffect))
      );
    },

    async listActivities(runId: number): Promise<WorkflowRunActivity[]> {
      const rows = withStorage("List activities", () =>
        database
          .prepare<[number], ActivityRow>(
            `SELECT id, run_id, email_id, action_type, created_at
             FROM workflow_run_activity WHERE run_id = ? ORDER BY id`
          )
          .all(runId)
      );
      return rows.map(toActivity);
    },

    async listRuns(options: { workflowId?: number; limit?: number } = {}): Promise<RunHistoryEntry[]> {
      const limit = options.limit ?? 20;
      const rows = withStorage("List workflow runs", () =>
        database
          .prepare<[number | null, number | null, number], RunRow & { content: string; activity_count: number }>(
            `SELECT r.id, r.workflow_id, r.status, r.started_at, r.completed_at, r.created_at,
                    w.content,
                    (SELECT COUNT(*) FROM workflow_run_activity a WHERE a.run_id = r.id) AS activity_count
             FROM workflow_run r
             JOIN workflow w ON w.id = r.workflow_id
             WHERE (? IS NULL OR r.workflow_id = ?)
             ORDER BY r.id DESC
             LIMIT ?`
          )
          .all(options.workflowId ?? null, options.workflowId ?? null, limit)
      );
      return rows.map((row) => ({
        run: toRun(row),
        description: assertWorkflowDocument(JSON.parse(row.content)).description,
        activityCount: row.activity_count,
      }));
    },
  };
}
