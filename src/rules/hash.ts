/**
 * Workflow identity.
 *
 * A workflow is identified by the SHA-256 of its canonical serialization:
 * the validated document as JSON with object keys sorted at every level.
 * Formatting and key order in the source file do not change the hash; rule
 * order does.
 */

import { createHash } from "node:crypto";
import type { WorkflowDocument } from "../types/workflow.js";

type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function canonicalValue(value: unknown): Json {
  if (Array.isArray(value)) return value.map(canonicalValue);
  if (isPlainObject(value)) {
    const sorted: { [key: string]: Json } = {};
    for (const key of Object.keys(value).sort()) {
      const entry = value[key];
      if (entry !== undefined) sorted[key] = canonicalValue(entry);
    }
    return sorted;
  }
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value === null
  ) {
    return value;
  }
  throw new TypeError(`Cannot canonicalize a value of type ${typeof value}`);
}

/**
 * Deterministic JSON for a document.
 */
export function canonicalizeWorkflowDocument(document: WorkflowDocument): string {
  return JSON.stringify(canonicalValue(document));
}

export function hashWorkflowDocument(document: WorkflowDocument): string {
  return createHash("sha256").update(canonicalizeWorkflowDocument(document)).digest("hex");
}
