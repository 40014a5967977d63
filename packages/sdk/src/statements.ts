/**
 * Minimal statement subset for `execute`
 */

import { UnsupportedStatementError } from "./errors.js";

export type Statement = { kind: "count"; table: string } | { kind: "show_tables" };

const COUNT_PATTERN = /^SELECT\s+COUNT\(\s*\*\s*\)\s+FROM\s+([^\s;]+)\s*;?$/i;
const SHOW_TABLES_PATTERN = /^SHOW\s+TABLES\s*;?$/i;

/**
 * Parse `SELECT COUNT(*) FROM <table>` or `SHOW TABLES`.
 * Keywords are case-insensitive; the table name keeps its case.
 * @throws UnsupportedStatementError for anything else
 */
export function parseStatement(statement: string): Statement {
  const text = statement.trim();

  const count = COUNT_PATTERN.exec(text);
  if (count?.[1]) {
    return { kind: "count", table: count[1] };
  }

  if (SHOW_TABLES_PATTERN.test(text)) {
    return { kind: "show_tables" };
  }

  throw new UnsupportedStatementError(text);
}
