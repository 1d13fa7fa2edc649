/**
 * Execution-Order Explainer
 *
 * Shows the logical order in which SQL evaluates the clauses of a query.
 * This is keyword detection, not parsing: literals and comments are
 * blanked out first so a WHERE inside a string does not count.
 */

export type ClauseKey =
  | "with"
  | "from"
  | "join"
  | "where"
  | "group-by"
  | "having"
  | "select"
  | "window"
  | "distinct"
  | "order-by"
  | "limit";

export interface ExecutionStep {
  clause: ClauseKey;
  label: string;
  present: boolean;
  /** 1-based position among the present clauses, null when absent. */
  step: number | null;
  rationale: string;
}

interface ClauseRule {
  clause: ClauseKey;
  label: string;
  pattern: RegExp;
  rationale: string;
}

const CLAUSE_RULES: readonly ClauseRule[] = [
  {
    clause: "with",
    label: "WITH (CTE)",
    pattern: /\bwith\b/i,
    rationale: "Build the named temporary result sets first",
  },
  {
    clause: "from",
    label: "FROM",
    pattern: /\bfrom\b/i,
    rationale: "Load the source table(s)",
  },
  {
    clause: "join",
    label: "JOIN",
    pattern: /\bjoin\b/i,
    rationale: "Combine rows with other tables on the join condition",
  },
  {
    clause: "where",
    label: "WHERE",
    pattern: /\bwhere\b/i,
    rationale: "Filter individual rows; SELECT aliases do not exist yet",
  },
  {
    clause: "group-by",
    label: "GROUP BY",
    pattern: /\bgroup\s+by\b/i,
    rationale: "Collapse rows into one row per group",
  },
  {
    clause: "having",
    label: "HAVING",
    pattern: /\bhaving\b/i,
    rationale: "Filter groups using aggregate values",
  },
  {
    clause: "select",
    label: "SELECT",
    pattern: /\bselect\b/i,
    rationale: "Compute the output columns and their aliases",
  },
  {
    clause: "window",
    label: "Window functions (OVER)",
    pattern: /\bover\s*\(/i,
    rationale: "Evaluated with SELECT, after grouping; rows are not collapsed",
  },
  {
    clause: "distinct",
    label: "DISTINCT",
    pattern: /\bdistinct\b/i,
    rationale: "Remove duplicate output rows",
  },
  {
    clause: "order-by",
    label: "ORDER BY",
    pattern: /\border\s+by\b/i,
    rationale: "Sort the results; SELECT aliases can be used here",
  },
  {
    clause: "limit",
    label: "LIMIT",
    pattern: /\blimit\b/i,
    rationale: "Restrict the number of rows returned",
  },
];

const LITERAL_OR_COMMENT_RE = /'(?:[^']|'')*'?|"(?:[^"]|"")*"?|--[^\n]*|\/\*[\s\S]*?(?:\*\/|$)/g;

/**
 * Blank out string literals, quoted identifiers and comments, keeping
 * the text length unchanged.
 */
export function maskLiterals(sql: string): string {
  return sql.replace(LITERAL_OR_COMMENT_RE, (match) => " ".repeat(match.length));
}

/** Blank out comments only; literals and quoted names stay. */
export function maskComments(sql: string): string {
  return sql.replace(LITERAL_OR_COMMENT_RE, (match) =>
    match.startsWith("--") || match.startsWith("/*") ? " ".repeat(match.length) : match,
  );
}

export function explainExecutionOrder(sql: string): ExecutionStep[] {
  const masked = maskLiterals(sql);
  let step = 0;

  return CLAUSE_RULES.map((rule) => {
    const present = rule.pattern.test(masked);
    return {
      clause: rule.clause,
      label: rule.label,
      present,
      step: present ? ++step : null,
      rationale: rule.rationale,
    };
  });
}
