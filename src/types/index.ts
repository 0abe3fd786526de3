/**
 * Mail Rules Type Definitions
 */

// Workflow document and run bookkeeping
export type {
  FieldName,
  TextFieldName,
  TextPredicate,
  DatePredicate,
  ValueUnit,
  Condition,
  WorkflowAction,
  TextRule,
  DateRule,
  Rule,
  WorkflowDocument,
  Workflow,
  RunStatus,
  WorkflowRun,
  WorkflowRunActivity,
} from "./workflow.js";
export {
  MAX_DATE_RULE_VALUE,
  TEXT_FIELD_NAMES,
  TEXT_PREDICATES,
  DATE_PREDICATES,
  VALUE_UNITS,
  CONDITIONS,
  WORKFLOW_ACTIONS,
  RUN_STATUSES,
  TERMINAL_RUN_STATUSES,
  RUN_TRANSITIONS,
} from "./workflow.js";

// Mailbox mirror
export type {
  User,
  Folder,
  FolderType,
  RecipientType,
  EmailAddress,
  EmailRecipient,
  Email,
  IncomingEmail,
} from "./email.js";
