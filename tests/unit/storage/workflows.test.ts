import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { openDatabase, type SqliteDatabase } from "../../../src/storage/sqlite.js";
import { createWorkflowStore, type WorkflowStore } from "../../../src/storage/workflows.js";
import { StorageError } from "../../../src/errors.js";
import { RUN_STATUSES, RUN_TRANSITIONS, TERMINAL_RUN_STATUSES } from "../../../src/types/index.js";
import type { WorkflowDocument } from "../../../src/types/index.js";
import { createMailbox, storeEmail, type Mailbox } from "../fixtures.js";
import { withReversedKeys } from "../rules/generators.js";

const document: WorkflowDocument = {
  description: "Archive invoices",
  condition: "any",
  rules: [
    { field_name: "subject", predicate: "contains", value: "invoice" },
    { field_name: "date_received", predicate: "less_than", value: 7, value_unit: "days" },
  ],
  action: "move",
  action_target: "Archive",
};

function countWorkflows(database: SqliteDatabase): number {
  const row = database.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM workflow").get();
  return row?.n ?? 0;
}

describe("Workflow store", () => {
  let mailbox: Mailbox;
  let store: WorkflowStore;

  beforeEach(async () => {
    mailbox = await createMailbox();
    store = mailbox.store;
  });

  afterEach(() => {
    mailbox.database.close();
  });

  describe("resolveWorkflow", () => {
    it("stores a document once and reuses it afterwards", async () => {
      const first = await store.resolveWorkflow(document);
      const second = await store.resolveWorkflow(document);

      expect(first.created).toBe(true);
      expect(second.created).toBe(false);
      expect(second.workflow.id).toBe(first.workflow.id);
      expect(second.workflow.content).toEqual(document);
      expect(countWorkflows(mailbox.database)).toBe(1);
    });

    it("reports driver failures as StorageError", async () => {
      const database = openDatabase(":memory:");
      const closedStore = createWorkflowStore(database);
      database.close();

      await expect(closedStore.resolveWorkflow(document)).rejects.toThrow(StorageError);
      await expect(closedStore.resolveWorkflow(document)).rejects.toThrow(/^Resolve workflow failed: /);
    });

    it("treats reordered keys as the same workflow", async () => {
      const first = await store.resolveWorkflow(document);
      const second = await store.resolveWorkflow(withReversedKeys(document));

      expect(second).toMatchObject({ created: false, workflow: { id: first.workflow.id } });
    });

    it("treats reordered rules as a different workflow", async () => {
      const first = await store.resolveWorkflow(document);
      const second = await store.resolveWorkflow({ ...document, rules: [...document.rules].reverse() });

      expect(second.created).toBe(true);
      expect(second.workflow.id).not.toBe(first.workflow.id);
      expect(countWorkflows(mailbox.database)).toBe(2);
    });

    it("round-trips through getWorkflow", async () => {
      const { workflow } = await store.resolveWorkflow(document);
      const loaded = await store.getWorkflow(workflow.id);

      expect(loaded).toEqual(workflow);
      expect(await store.getWorkflow(workflow.id + 100)).toBeNull();
    });
  });

  describe("run lifecycle", () => {
    it("creates runs that have not started", async () => {
      const { workflow } = await store.resolveWorkflow(document);
      const run = await store.createRun(workflow.id);

      expect(run).toMatchObject({
        workflowId: workflow.id,
        status: "yet_to_start",
        startedAt: null,
        completedAt: null,
      });
    });

    it("stamps start and completion times", async () => {
      const { workflow } = await store.resolveWorkflow(document);
      const run = await store.createRun(workflow.id);

      const started = await store.markRunStarted(run.id, new Date("2026-03-15T12:00:00.000Z"));
      expect(started.status).toBe("running");
      expect(started.startedAt?.toISOString()).toBe("2026-03-15T12:00:00.000Z");

      const finished = await store.markRunFinished(run.id, "completed", new Date("2026-03-15T12:01:00.000Z"));
      expect(finished.status).toBe("completed");
      expect(finished.completedAt?.toISOString()).toBe("2026-03-15T12:01:00.000Z");
      expect(await store.getRun(run.id)).toEqual(finished);
    });

    it("refuses to complete a run that never started", async () => {
      const { workflow } = await store.resolveWorkflow(document);
      const run = await store.createRun(workflow.id);

      await expect(store.markRunFinished(run.id, "completed")).rejects.toThrow(
        `Workflow run ${run.id} cannot move from yet_to_start to completed`
      );
      expect((await store.getRun(run.id))?.status).toBe("yet_to_start");
    });

    it("never leaves a terminal status", async () => {
      const { workflow } = await store.resolveWorkflow(document);
      const run = await store.createRun(workflow.id);
      await store.markRunStarted(run.id);
      await store.markRunFinished(run.id, "failed");

      await expect(store.markRunFinished(run.id, "completed")).rejects.toBeInstanceOf(StorageError);
      await expect(store.markRunStarted(run.id)).rejects.toBeInstanceOf(StorageError);
      expect((await store.getRun(run.id))?.status).toBe("failed");
    });

    it("fails for unknown runs", async () => {
      await expect(store.markRunStarted(999)).rejects.toThrow("Workflow run 999 not found");
    });

    it("defines transitions for every status", () => {
      for (const status of RUN_STATUSES) {
        expect(RUN_TRANSITIONS[status]).toBeDefined();
      }
      for (const status of TERMINAL_RUN_STATUSES) {
        expect(RUN_TRANSITIONS[status]).toEqual([]);
      }
    });
  });

  describe("activities", () => {
    it("records activities together with their side effect", async () => {
      const emailId = await storeEmail(mailbox, { providerId: "p1" });
      const { workflow } = await store.resolveWorkflow(document);
      const run = await store.createRun(workflow.id);

      const activity = await store.recordActivity(run.id, emailId, "mark_as_read", () =>
        mailbox.emails.setReadState(emailId, true)
      );

      expect(activity).toMatchObject({ runId: run.id, emailId, actionType: "mark_as_read" });
      expect((await mailbox.emails.getEmail(emailId))?.isRead).toBe(true);
      expect(await store.listActivities(run.id)).toEqual([activity]);
    });

    it("rolls the activity back when the side effect fails", async () => {
      const emailId = await storeEmail(mailbox, { providerId: "p1" });
      const { workflow } = await store.resolveWorkflow(document);
      const run = await store.createRun(workflow.id);

      await expect(
        store.recordActivity(run.id, emailId, "move", () => {
          throw new Error("disk full");
        })
      ).rejects.toThrow("Record activity failed: disk full");

      expect(await store.listActivities(run.id)).toEqual([]);
    });

    it("records each email at most once per run", async () => {
      const emailId = await storeEmail(mailbox, { providerId: "p1" });
      const { workflow } = await store.resolveWorkflow(document);
      const run = await store.createRun(workflow.id);

      await store.recordActivity(run.id, emailId, "move");
      await expect(store.recordActivity(run.id, emailId, "move")).rejects.toBeInstanceOf(StorageError);
    });
  });

  describe("listRuns", () => {
    it("lists newest runs first with their activity counts", async () => {
      const emailId = await storeEmail(mailbox, { providerId: "p1" });
      const { workflow } = await store.resolveWorkflow(document);
      const other = await store.resolveWorkflow({ ...document, description: "Other" });

      const first = await store.createRun(workflow.id);
      await store.recordActivity(first.id, emailId, "move");
      const second = await store.createRun(other.workflow.id);
      const third = await store.createRun(workflow.id);

      const entries = await store.listRuns();
      expect(entries.map((entry) => [entry.run.id, entry.description, entry.activityCount])).toEqual([
        [third.id, "Archive invoices", 0],
        [second.id, "Other", 0],
        [first.id, "Archive invoices", 1],
      ]);

      const filtered = await store.listRuns({ workflowId: workflow.id, limit: 1 });
      expect(filtered.map((entry) => entry.run.id)).toEqual([third.id]);
    });
  });
});

describe("Workflow store across connections", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "workflow-store-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("keeps one row per document when two connections submit it", async () => {
    const file = path.join(tempDir, "mail.db");
    const first = openDatabase(file);
    const second = openDatabase(file);

    try {
      const [a, b] = await Promise.all([
        createWorkflowStore(first).resolveWorkflow(document),
        createWorkflowStore(second).resolveWorkflow(withReversedKeys(document)),
      ]);

      expect(a.workflow.id).toBe(b.workflow.id);
      expect([a.created, b.created].sort()).toEqual([false, true]);
      expect(countWorkflows(first)).toBe(1);
    } finally {
      first.close();
      second.close();
    }
  });
});
