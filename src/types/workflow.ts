/**
 * Workflow types.
 *
 * A workflow document is the JSON a user writes: a list of rules joined by a
 * condition, plus one action to apply to every email the rules select.
 */

/**
 * Email fields a rule can test.
 */
export type FieldName = TextFieldName | "date_received";

/** Fields compared as text */
export const TEXT_FIELD_NAMES = ["from", "to", "subject"] as const;

export type TextFieldName = (typeof TEXT_FIELD_NAMES)[number];

export const TEXT_PREDICATES = ["contains", "does_not_contain", "equals", "not_equals"] as const;

export type TextPredicate = (typeof TEXT_PREDICATES)[number];

/**
 * Date predicates read as "received less/more than N units ago".
 */
export const DATE_PREDICATES = ["less_than", "greater_than"] as const;

export type DatePredicate = (typeof DATE_PREDICATES)[number];

export const VALUE_UNITS = ["days", "months"] as const;

export type ValueUnit = (typeof VALUE_UNITS)[number];

/** Largest date rule value per unit: about a thousand years back */
export const MAX_DATE_RULE_VALUE: Readonly<Record<ValueUnit, number>> = {
  days: 365_250,
  months: 12_000,
};

/**
 * How rules combine: `all` is AND, `any` is OR.
 */
export const CONDITIONS = ["any", "all"] as const;

export type Condition = (typeof CONDITIONS)[number];

export const WORKFLOW_ACTIONS = ["mark_as_read", "move"] as const;

export type WorkflowAction = (typeof WORKFLOW_ACTIONS)[number];

export interface TextRule {
  field_name: TextFieldName;
  predicate: TextPredicate;
  value: string;
}

export interface DateRule {
  field_name: "date_received";
  predicate: DatePredicate;
  /** Whole number of units, relative to evaluation time */
  value: number;
  value_unit: ValueUnit;
}

export type Rule = TextRule | DateRule;

/**
 * A validated workflow document. Property names follow the JSON wire format.
 */
export interface WorkflowDocument {
  description: string;
  condition: Condition;
  rules: Rule[];
  action: WorkflowAction;
  /**
   * Destination folder for `move`. Required for `mark_as_read` too, where it
   * is kept but unused.
   */
  action_target: string;
}

/**
 * A stored workflow, one row per distinct content hash.
 */
export interface Workflow {
  id: number;
  hash: string;
  content: WorkflowDocument;
  createdAt: Date;
  updatedAt: Date;
}

export type RunStatus = "yet_to_start" | "running" | "completed" | "failed";

export const RUN_STATUSES: readonly RunStatus[] = [
  "yet_to_start",
  "running",
  "completed",
  "failed",
] as const;

/** Statuses a run can never leave */
export const TERMINAL_RUN_STATUSES: readonly RunStatus[] = ["completed", "failed"] as const;

/**
 * Allowed forward transitions of a run.
 */
export const RUN_TRANSITIONS: Readonly<Record<RunStatus, readonly RunStatus[]>> = {
  yet_to_start: ["running", "failed"],
  running: ["completed", "failed"],
  completed: [],
  failed: [],
};

export interface WorkflowRun {
  id: number;
  workflowId: number;
  status: RunStatus;
  startedAt: Date | null;
  completedAt: Date | null;
  createdAt: Date;
}

/**
 * Record that an action was taken on one email during one run.
 */
export interface WorkflowRunActivity {
  id: number;
  runId: number;
  emailId: number;
  actionType: WorkflowAction;
  createdAt: Date;
}
