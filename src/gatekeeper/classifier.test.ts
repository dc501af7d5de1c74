import { describe, expect, it } from "vitest";
import { classifyStatement, describeRejection, normalizeStatement } from "./classifier.js";

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

describe("normalizeStatement", () => {
  it("trims whitespace around a single trailing terminator", () => {
    expect(normalizeStatement("  select 1  ;  ")).toBe("select 1");
  });

  it("strips at most one terminator", () => {
    expect(normalizeStatement("select 1;;")).toBe("select 1;");
  });

  it("leaves text without a terminator alone apart from trimming", () => {
    expect(normalizeStatement("\n\tSELECT id FROM orders \n")).toBe("SELECT id FROM orders");
  });
});

// ---------------------------------------------------------------------------
// Prefix check
// ---------------------------------------------------------------------------

describe("classifyStatement prefix check", () => {
  it.each([
    "SELECT id FROM orders WHERE status = 'pending'",
    "select * from orders",
    "WITH recent AS (SELECT * FROM orders) SELECT count(*) FROM recent",
    "EXPLAIN SELECT * FROM orders",
    "Explain analyze select 1",
    "SELECT\n  id\nFROM orders",
  ])("accepts %j", (query) => {
    expect(classifyStatement(query)).toEqual({ verdict: "accepted", statement: query });
  });

  it("returns the normalized statement on acceptance", () => {
    expect(classifyStatement("  select 1  ;  ")).toEqual({ verdict: "accepted", statement: "select 1" });
  });

  it("rejects DROP before the keyword scan runs", () => {
    expect(classifyStatement("DROP TABLE orders")).toEqual({
      verdict: "rejected",
      reason: "NOT_READ_ONLY_PREFIX",
      fragment: "DROP TABLE orders",
    });
  });

  it("rejects empty and whitespace-only input", () => {
    const expected = { verdict: "rejected", reason: "NOT_READ_ONLY_PREFIX", fragment: "" };
    expect(classifyStatement("")).toEqual(expected);
    expect(classifyStatement("   \n ")).toEqual(expected);
    expect(classifyStatement(";")).toEqual(expected);
  });

  it("cuts the reported fragment to 50 characters", () => {
    expect(classifyStatement("UPDATE orders SET status = 'cancelled' WHERE id IN (1, 2, 3)")).toEqual({
      verdict: "rejected",
      reason: "NOT_READ_ONLY_PREFIX",
      fragment: "UPDATE orders SET status = 'cancelled' WHERE id IN",
    });
  });

  it("requires the allowed keyword to be a whole token", () => {
    const result = classifyStatement("SELECTED_ROWS");
    expect(result.verdict).toBe("rejected");
    if (result.verdict === "rejected") {
      expect(result.reason).toBe("NOT_READ_ONLY_PREFIX");
    }
  });

  it("rejects a leading comment rather than looking past it", () => {
    const result = classifyStatement("/* report */ SELECT 1");
    expect(result).toEqual({ verdict: "rejected", reason: "NOT_READ_ONLY_PREFIX", fragment: "/* report */ SELECT 1" });
  });

  it("reports the prefix when a mutation comes first in a stacked batch", () => {
    const result = classifyStatement("DROP TABLE x; SELECT 1");
    expect(result.verdict === "rejected" && result.reason).toBe("NOT_READ_ONLY_PREFIX");
  });
});

// ---------------------------------------------------------------------------
// Forbidden keywords
// ---------------------------------------------------------------------------

describe("classifyStatement forbidden keyword scan", () => {
  it("reports DELETE stacked after a valid SELECT", () => {
    expect(classifyStatement("SELECT * FROM orders; DELETE FROM orders")).toEqual({
      verdict: "rejected",
      reason: "FORBIDDEN_KEYWORD",
      fragment: "DELETE",
    });
  });

  it("matches in any casing and reports the word as written", () => {
    expect(classifyStatement("select * from t; Drop Table t")).toEqual({
      verdict: "rejected",
      reason: "FORBIDDEN_KEYWORD",
      fragment: "Drop",
    });
  });

  it("catches data-modifying CTEs", () => {
    expect(classifyStatement("WITH gone AS (DELETE FROM orders RETURNING *) SELECT * FROM gone")).toEqual({
      verdict: "rejected",
      reason: "FORBIDDEN_KEYWORD",
      fragment: "DELETE",
    });
  });

  it("catches EXPLAIN ANALYZE of a mutation", () => {
    expect(classifyStatement("EXPLAIN ANALYZE UPDATE orders SET status = 'x'")).toEqual({
      verdict: "rejected",
      reason: "FORBIDDEN_KEYWORD",
      fragment: "UPDATE",
    });
  });

  it("reports EXECUTE rather than its EXEC prefix", () => {
    expect(classifyStatement("SELECT 1 WHERE execute")).toEqual({
      verdict: "rejected",
      reason: "FORBIDDEN_KEYWORD",
      fragment: "execute",
    });
  });

  it("matches keywords next to punctuation", () => {
    expect(classifyStatement("SELECT (copy) FROM t")).toEqual({
      verdict: "rejected",
      reason: "FORBIDDEN_KEYWORD",
      fragment: "copy",
    });
  });

  it.each([
    "SELECT created_at FROM orders",
    "SELECT updated_at, update_count FROM orders",
    "SELECT dropdown_id FROM widgets",
    "SELECT x$delete, calls, loaded, copy2 FROM t",
    "SELECT inserted FROM audit",
  ])("accepts identifiers that only contain a keyword: %j", (query) => {
    expect(classifyStatement(query)).toEqual({ verdict: "accepted", statement: query });
  });

  it("scans quoted literals like any other text", () => {
    expect(classifyStatement("SELECT * FROM notes WHERE body = 'drop'")).toEqual({
      verdict: "rejected",
      reason: "FORBIDDEN_KEYWORD",
      fragment: "drop",
    });
  });
});

// ---------------------------------------------------------------------------
// Multiple statements
// ---------------------------------------------------------------------------

describe("classifyStatement multi-statement check", () => {
  it("rejects two stacked reads", () => {
    expect(classifyStatement("SELECT 1; SELECT 2")).toEqual({
      verdict: "rejected",
      reason: "MULTIPLE_STATEMENTS",
      fragment: "; SELECT 2",
    });
  });

  it("rejects a doubled terminator", () => {
    expect(classifyStatement("select 1;;")).toEqual({
      verdict: "rejected",
      reason: "MULTIPLE_STATEMENTS",
      fragment: ";",
    });
  });

  it("rejects a terminator inside a quoted literal", () => {
    const result = classifyStatement("SELECT * FROM t WHERE name = 'a;b'");
    expect(result.verdict === "rejected" && result.reason).toBe("MULTIPLE_STATEMENTS");
  });
});

describe("classifyStatement determinism", () => {
  it.each(["SELECT 1", "DROP TABLE orders", "SELECT 1; SELECT 2", "select * from t; Drop Table t"])(
    "classifies %j the same way twice",
    (query) => {
      expect(classifyStatement(query)).toEqual(classifyStatement(query));
    }
  );
});

// ---------------------------------------------------------------------------
// Audit lines
// ---------------------------------------------------------------------------

describe("describeRejection", () => {
  it("names the allowed prefixes and the offending text", () => {
    expect(describeRejection("NOT_READ_ONLY_PREFIX", "DROP TABLE orders")).toBe(
      "BLOCKED [NOT_READ_ONLY_PREFIX]: Only SELECT, WITH, EXPLAIN queries are allowed. Got: 'DROP TABLE orders'"
    );
  });

  it("names the forbidden keyword", () => {
    expect(describeRejection("FORBIDDEN_KEYWORD", "DELETE")).toBe(
      "BLOCKED [FORBIDDEN_KEYWORD]: Detected forbidden keyword 'DELETE' in query. Only read-only queries are allowed."
    );
  });

  it("quotes the text after the first terminator", () => {
    expect(describeRejection("MULTIPLE_STATEMENTS", "; SELECT 2")).toBe(
      "BLOCKED [MULTIPLE_STATEMENTS]: Multiple statements detected near '; SELECT 2'. Only a single statement is allowed."
    );
  });
});
