/**
 * SQL Utility Functions
 *
 * Statement classification and LIKE pattern helpers.
 */

/**
 * True for statements that modify the database or its transaction state.
 * Only the leading keyword is checked; this tags log lines and is not an
 * access check.
 */
export function isWriteStatement(sql: string): boolean {
  return /^(INSERT|UPDATE|DELETE|REPLACE|CREATE|DROP|ALTER|BEGIN|COMMIT|ROLLBACK|VACUUM|ATTACH|DETACH)\b/i.test(sql.trim());
}

/**
 * Build a LIKE pattern matching names that contain `text`.
 * `%`, `_` and the escape character itself are matched literally
 * (use with `ESCAPE '\'`).
 */
export function containsPattern(text: string): string {
  return `%${text.replace(/[\\%_]/g, ch => `\\${ch}`)}%`;
}
