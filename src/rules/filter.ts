/**
 * Filter expressions.
 *
 * Rules compile into a small immutable expression tree. The tree says what
 * to match; a storage renderer decides how (see sql.ts).
 */

import type {
  Condition,
  DateRule,
  Rule,
  TextFieldName,
  TextRule,
} from "../types/workflow.js";
import { CompilationError } from "../errors.js";
import { computeCutoff } from "./dates.js";

/**
 * Substring or whole-value comparison on a text field.
 * `negated` flips the result of the positive match.
 */
export interface TextMatch {
  readonly kind: "text";
  readonly field: TextFieldName;
  readonly match: "contains" | "equals";
  readonly negated: boolean;
  readonly value: string;
}

/**
 * Received strictly after (`after`) or strictly before (`before`) a cutoff.
 */
export interface ReceivedMatch {
  readonly kind: "received";
  readonly comparison: "after" | "before";
  readonly cutoff: Date;
}

export interface AllOf {
  readonly kind: "all";
  readonly operands: readonly FilterExpression[];
}

export interface AnyOf {
  readonly kind: "any";
  readonly operands: readonly FilterExpression[];
}

export type FilterExpression = TextMatch | ReceivedMatch | AllOf | AnyOf;

function compileTextRule(rule: TextRule): TextMatch {
  switch (rule.predicate) {
    case "contains":
      return freeze({ kind: "text", field: rule.field_name, match: "contains", negated: false, value: rule.value });
    case "does_not_contain":
      return freeze({ kind: "text", field: rule.field_name, match: "contains", negated: true, value: rule.value });
    case "equals":
      return freeze({ kind: "text", field: rule.field_name, match: "equals", negated: false, value: rule.value });
    case "not_equals":
      return freeze({ kind: "text", field: rule.field_name, match: "equals", negated: true, value: rule.value });
    default:
      throw new CompilationError(
        `Unsupported predicate "${String(rule.predicate)}" for field "${rule.field_name}"`
      );
  }
}

function compileDateRule(rule: DateRule, evaluatedAt: Date): ReceivedMatch {
  if (!Number.isInteger(rule.value) || rule.value < 0) {
    throw new CompilationError(`date_received needs a whole number of units, got ${rule.value}`);
  }
  if (rule.value_unit !== "days" && rule.value_unit !== "months") {
    throw new CompilationError(`Unsupported unit "${String(rule.value_unit)}" for date_received`);
  }

  const cutoff = computeCutoff(evaluatedAt, rule.value, rule.value_unit);
  if (Number.isNaN(cutoff.getTime())) {
    throw new CompilationError(
      `date_received cutoff of ${rule.value} ${rule.value_unit} is out of range`
    );
  }
  switch (rule.predicate) {
    // Received less than N units ago: newer than the cutoff
    case "less_than":
      return freeze({ kind: "received", comparison: "after", cutoff });
    case "greater_than":
      return freeze({ kind: "received", comparison: "before", cutoff });
    default:
      throw new CompilationError(
        `Unsupported predicate "${String(rule.predicate)}" for field "date_received"`
      );
  }
}

/**
 * Compile one validated rule, relative to `evaluatedAt`.
 */
export function compileRule(rule: Rule, evaluatedAt: Date): FilterExpression {
  const field: string = rule.field_name;
  switch (rule.field_name) {
    case "from":
    case "to":
    case "subject":
      return compileTextRule(rule);
    case "date_received":
      return compileDateRule(rule, evaluatedAt);
    default:
      throw new CompilationError(`Unsupported field "${field}"`);
  }
}

/**
 * Join compiled rules under `all` (AND) or `any` (OR).
 */
export function composeCondition(
  condition: Condition,
  fragments: readonly FilterExpression[]
): FilterExpression {
  if (fragments.length === 0) {
    throw new CompilationError("Cannot compose a condition over zero rules");
  }
  if (condition !== "all" && condition !== "any") {
    throw new CompilationError(`Unsupported condition "${String(condition)}"`);
  }
  const operands = Object.freeze([...fragments]);
  return condition === "all"
    ? freeze({ kind: "all", operands })
    : freeze({ kind: "any", operands });
}

/**
 * Compile every rule of a document and compose them.
 */
export function compileRules(
  condition: Condition,
  rules: readonly Rule[],
  evaluatedAt: Date
): FilterExpression {
  return composeCondition(
    condition,
    rules.map((rule) => compileRule(rule, evaluatedAt))
  );
}

function freeze<T extends FilterExpression>(expression: T): T {
  Object.freeze(expression);
  return expression;
}
