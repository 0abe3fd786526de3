/**
 * SQLite renderer for filter expressions.
 *
 * Produces a WHERE-clause fragment over the `emails` table aliased as `e`.
 * User values only ever travel as positional `?` parameters, emitted in the
 * same left-to-right order as their placeholders.
 */

import type { FilterExpression, ReceivedMatch, TextMatch } from "./filter.js";
import { CompilationError } from "../errors.js";

export type SqlParam = string | number;

export interface SqlFragment {
  sql: string;
  params: SqlParam[];
}

/** Case-insensitive substring test (ASCII folding, like SQLite's lower()) */
function containsSql(column: string): string {
  return `instr(lower(${column}), lower(?)) > 0`;
}

const SENDER_SEARCH_TEXT = "e.sender_email_address || ' ' || coalesce(e.sender_name, '')";
const RECIPIENT_SEARCH_TEXT = "coalesce(r.email_address, '') || ' ' || coalesce(r.name, '')";

/** Per-row test for one To recipient, aliased as `r` */
function recipientSql(match: TextMatch): string {
  return match.match === "contains"
    ? containsSql(RECIPIENT_SEARCH_TEXT)
    : "lower(coalesce(r.email_address, '')) = lower(?)";
}

function positiveTextSql(match: TextMatch): string {
  switch (match.field) {
    case "subject":
      return match.match === "contains"
        ? containsSql("coalesce(e.subject, '')")
        : "coalesce(e.subject, '') = ?";
    case "from":
      return match.match === "contains"
        ? containsSql(SENDER_SEARCH_TEXT)
        : "lower(e.sender_email_address) = lower(?)";
    default:
      throw new CompilationError(`No column mapping for field "${String(match.field)}"`);
  }
}

function renderText(match: TextMatch): SqlFragment {
  // Recipient rules hold when any To recipient passes, negated ones included
  if (match.field === "to") {
    const test = recipientSql(match);
    return {
      sql:
        "EXISTS (SELECT 1 FROM email_recipients r " +
        `WHERE r.email_id = e.id AND r.type = 'to' AND ${match.negated ? `NOT (${test})` : test})`,
      params: [match.value],
    };
  }

  const positive = positiveTextSql(match);
  return {
    sql: match.negated ? `NOT (${positive})` : positive,
    params: [match.value],
  };
}

function renderReceived(match: ReceivedMatch): SqlFragment {
  const operator = match.comparison === "after" ? ">" : "<";
  return {
    sql: `e.received_timestamp ${operator} ?`,
    params: [match.cutoff.toISOString()],
  };
}

/**
 * Render an expression tree to SQL text plus bound parameters.
 */
export function renderFilter(expression: FilterExpression): SqlFragment {
  switch (expression.kind) {
    case "text":
      return renderText(expression);
    case "received":
      return renderReceived(expression);
    case "all":
    case "any": {
      if (expression.operands.length === 0) {
        throw new CompilationError(`Empty "${expression.kind}" group`);
      }
      const parts = expression.operands.map(renderFilter);
      const joiner = expression.kind === "all" ? " AND " : " OR ";
      return {
        sql: `(${parts.map((part) => part.sql).join(joiner)})`,
        params: parts.flatMap((part) => part.params),
      };
    }
    default:
      throw new CompilationError("Unknown filter expression");
  }
}
