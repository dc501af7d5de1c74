/**
 * Statement classifier
 *
 * Decides whether caller text may reach the database at all. Pure and total:
 * anything it does not recognise is a rejection, never an exception.
 *
 * This is a textual classifier, not a SQL parser. The allow-list on the
 * leading keyword carries the guarantee; the keyword scan and the
 * multi-statement check reject anything that slips past it. Quoted literals
 * and comments are scanned like any other text, so a literal such as 'DROP'
 * or 'a;b' is rejected too.
 */

export const READ_ONLY_PREFIXES = ["SELECT", "WITH", "EXPLAIN"] as const;

export const FORBIDDEN_KEYWORDS = [
  "INSERT",
  "UPDATE",
  "DELETE",
  "DROP",
  "ALTER",
  "CREATE",
  "TRUNCATE",
  "GRANT",
  "REVOKE",
  "EXEC",
  "EXECUTE",
  "CALL",
  "COPY",
  "LOAD",
] as const;

export type RejectionReason = "NOT_READ_ONLY_PREFIX" | "FORBIDDEN_KEYWORD" | "MULTIPLE_STATEMENTS";

export type Classification =
  | { readonly verdict: "accepted"; readonly statement: string }
  | { readonly verdict: "rejected"; readonly reason: RejectionReason; readonly fragment: string };

const TERMINATOR = ";";
const FRAGMENT_LENGTH = 50;

// PostgreSQL identifiers may contain letters, digits, _ and $
const IDENTIFIER_CHAR = "[\\p{L}\\p{N}_$]";

const PREFIX_PATTERN = new RegExp(`^(?:${READ_ONLY_PREFIXES.join("|")})(?!${IDENTIFIER_CHAR})`, "iu");

const FORBIDDEN_PATTERN = new RegExp(
  `(?<!${IDENTIFIER_CHAR})(?:${FORBIDDEN_KEYWORDS.join("|")})(?!${IDENTIFIER_CHAR})`,
  "iu"
);

/**
 * Trim, drop at most one trailing terminator, trim again.
 */
export function normalizeStatement(text: string): string {
  const trimmed = text.trim();
  const withoutTerminator = trimmed.endsWith(TERMINATOR) ? trimmed.slice(0, -TERMINATOR.length) : trimmed;
  return withoutTerminator.trimEnd();
}

export function classifyStatement(text: string): Classification {
  const statement = normalizeStatement(text);

  if (!PREFIX_PATTERN.test(statement)) {
    return reject("NOT_READ_ONLY_PREFIX", statement.slice(0, FRAGMENT_LENGTH));
  }

  const forbidden = FORBIDDEN_PATTERN.exec(statement);
  if (forbidden) {
    return reject("FORBIDDEN_KEYWORD", forbidden[0]);
  }

  const terminatorAt = statement.indexOf(TERMINATOR);
  if (terminatorAt !== -1) {
    return reject("MULTIPLE_STATEMENTS", statement.slice(terminatorAt, terminatorAt + FRAGMENT_LENGTH));
  }

  return { verdict: "accepted", statement };
}

function reject(reason: RejectionReason, fragment: string): Classification {
  return { verdict: "rejected", reason, fragment };
}

/**
 * Render a rejection as the audit line returned to the caller and logged.
 * The `BLOCKED [REASON]:` prefix is stable; tooling greps for it.
 */
export function describeRejection(reason: RejectionReason, fragment: string): string {
  switch (reason) {
    case "NOT_READ_ONLY_PREFIX":
      return (
        `BLOCKED [${reason}]: Only ${READ_ONLY_PREFIXES.join(", ")} queries are allowed. ` +
        `Got: '${fragment}'`
      );
    case "FORBIDDEN_KEYWORD":
      return (
        `BLOCKED [${reason}]: Detected forbidden keyword '${fragment}' in query. ` +
        `Only read-only queries are allowed.`
      );
    case "MULTIPLE_STATEMENTS":
      return (
        `BLOCKED [${reason}]: Multiple statements detected near '${fragment}'. ` +
        `Only a single statement is allowed.`
      );
  }
}
