/**
 * Workflow document schema.
 *
 * Validates candidate documents against the rule grammar. Validation is pure
 * and all-or-nothing: a document either comes back whole or not at all.
 */

import * as fs from "node:fs";
import { z } from "zod";
import {
  CONDITIONS,
  DATE_PREDICATES,
  MAX_DATE_RULE_VALUE,
  TEXT_FIELD_NAMES,
  TEXT_PREDICATES,
  VALUE_UNITS,
  WORKFLOW_ACTIONS,
  type WorkflowDocument,
} from "../types/workflow.js";
import { ValidationError, errorMessage, type ValidationIssue } from "../errors.js";

const textRuleSchema = z
  .object({
    field_name: z.enum(TEXT_FIELD_NAMES),
    predicate: z.enum(TEXT_PREDICATES),
    value: z.string().min(1, "Text rules need a non-empty string value"),
  })
  .strict();

const dateRuleSchema = z
  .object({
    field_name: z.literal("date_received"),
    predicate: z.enum(DATE_PREDICATES),
    value: z.number().int().nonnegative(),
    value_unit: z.enum(VALUE_UNITS),
  })
  .strict();

export const ruleSchema = z.discriminatedUnion("field_name", [textRuleSchema, dateRuleSchema]);

export const workflowDocumentSchema = z
  .object({
    description: z.string(),
    condition: z.enum(CONDITIONS),
    rules: z.array(ruleSchema).min(1, "At least one rule is required"),
    action: z.enum(WORKFLOW_ACTIONS),
    action_target: z.string(),
  })
  .strict()
  .superRefine((doc, ctx) => {
    if (doc.action === "move" && doc.action_target.trim() === "") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["action_target"],
        message: "A move action needs a destination folder",
      });
    }
    doc.rules.forEach((rule, index) => {
      if (rule.field_name !== "date_received") return;
      const max = MAX_DATE_RULE_VALUE[rule.value_unit];
      if (rule.value > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["rules", index, "value"],
          message: `At most ${max} ${rule.value_unit}`,
        });
      }
    });
  });

export type ValidationResult =
  | { ok: true; document: WorkflowDocument }
  | { ok: false; issues: ValidationIssue[] };

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Check a candidate document. Never throws.
 */
export function validateWorkflowDocument(input: unknown): ValidationResult {
  const result = workflowDocumentSchema.safeParse(input);
  if (!result.success) {
    return { ok: false, issues: toIssues(result.error) };
  }
  const document: WorkflowDocument = result.data;
  return { ok: true, document };
}

/**
 * Like validateWorkflowDocument, but throws ValidationError.
 */
export function assertWorkflowDocument(input: unknown): WorkflowDocument {
  const result = validateWorkflowDocument(input);
  if (!result.ok) throw new ValidationError(result.issues);
  return result.document;
}

/**
 * Read, parse and validate a workflow file.
 */
export async function readWorkflowFile(filePath: string): Promise<WorkflowDocument> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf-8");
  } catch (err) {
    throw new ValidationError(
      [{ path: "", message: `Cannot read workflow file ${filePath}: ${errorMessage(err)}` }],
      { cause: err }
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError(
      [{ path: "", message: `Workflow file is not valid JSON: ${errorMessage(err)}` }],
      { cause: err }
    );
  }

  return assertWorkflowDocument(parsed);
}
