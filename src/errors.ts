/**
 * Error types.
 *
 * Every error raised on purpose carries a stable `code` so the CLI and
 * callers can branch without matching on messages.
 */

export type ErrorCode =
  | "VALIDATION_FAILED"
  | "COMPILATION_FAILED"
  | "STORAGE_FAILED"
  | "ACTION_FAILED"
  | "PROVIDER_FAILED"
  | "CONFIG_INVALID"
  | "AUTH_FAILED";

export class MailRulesError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export interface ValidationIssue {
  /** Dotted path into the document, e.g. `rules.0.value` */
  path: string;
  message: string;
}

/**
 * Malformed workflow document. Raised before anything touches storage.
 */
export class ValidationError extends MailRulesError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[], options?: { cause?: unknown }) {
    super("VALIDATION_FAILED", formatIssues(issues), options);
    this.issues = issues;
  }
}

/**
 * A rule reached the compiler in a shape validation should have rejected.
 */
export class CompilationError extends MailRulesError {
  constructor(message: string) {
    super("COMPILATION_FAILED", message);
  }
}

export class StorageError extends MailRulesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORAGE_FAILED", message, options);
  }
}

/**
 * Per-email action failure. Recovered by the engine, never fatal to a run.
 */
export class ActionError extends MailRulesError {
  readonly emailId: number;

  constructor(emailId: number, message: string, options?: { cause?: unknown }) {
    super("ACTION_FAILED", message, options);
    this.emailId = emailId;
  }
}

export class ProviderError extends MailRulesError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super("PROVIDER_FAILED", message, options);
    this.status = status;
  }
}

export class ConfigError extends MailRulesError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

export class AuthenticationError extends MailRulesError {
  constructor(message = "Authentication failed", options?: { cause?: unknown }) {
    super("AUTH_FAILED", message, options);
  }
}

function formatIssues(issues: ValidationIssue[]): string {
  if (issues.length === 0) return "Invalid workflow document";
  const lines = issues.map((issue) =>
    issue.path ? `${issue.path}: ${issue.message}` : issue.message
  );
  return `Invalid workflow document:\n  ${lines.join("\n  ")}`;
}

/**
 * Best-effort message for an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
