/**
 * Command Parser
 *
 * Turns one line of REPL input into a typed command.
 *
 * Supported input:
 * - run <sql>           -- execute SQL against the dataset
 * - SELECT ... / WITH ... -- bare SQL, same as run
 * - hint | stuck | help me
 * - next                -- next solution step
 * - answer | solution
 * - explain | schema | tables | progress
 * - lesson X.Y          -- jump to a lesson
 * - advance | continue | skip | reset
 * - help | ? | clear | cls | quit | exit | q
 */

export type SimpleCommandKind =
  | "hint"
  | "next"
  | "answer"
  | "explain"
  | "schema"
  | "tables"
  | "progress"
  | "advance"
  | "skip"
  | "reset"
  | "help"
  | "clear"
  | "quit";

export type Command =
  | { kind: "run"; sql: string }
  | { kind: "lesson"; target: string }
  | { kind: SimpleCommandKind }
  | { kind: "empty" }
  | { kind: "unknown"; input: string };

const KEYWORDS = new Map<string, SimpleCommandKind>([
  ["hint", "hint"],
  ["stuck", "hint"],
  ["help me", "hint"],
  ["next", "next"],
  ["answer", "answer"],
  ["solution", "answer"],
  ["explain", "explain"],
  ["schema", "schema"],
  ["tables", "tables"],
  ["progress", "progress"],
  ["advance", "advance"],
  ["continue", "advance"],
  ["skip", "skip"],
  ["reset", "reset"],
  ["help", "help"],
  ["?", "help"],
  ["clear", "clear"],
  ["cls", "clear"],
  ["quit", "quit"],
  ["exit", "quit"],
  ["q", "quit"],
]);

/** Statements that are run when typed without the `run` prefix. */
const BARE_SQL_RE = /^(select|with|insert|update|delete)\b/i;
const RUN_RE = /^run\b\s*/i;
const LESSON_RE = /^lesson\s+(\S+)$/i;
const LESSON_ID_RE = /^(\d+)\.(\d+)$/;

export function parseCommand(input: string): Command {
  const line = input.trim();
  if (line === "") { return { kind: "empty" }; }

  const keyword = KEYWORDS.get(line.toLowerCase().replace(/\s+/g, " "));
  if (keyword) { return { kind: keyword }; }

  const run = RUN_RE.exec(line);
  if (run) {
    return { kind: "run", sql: line.slice(run[0].length) };
  }

  const lesson = LESSON_RE.exec(line);
  if (lesson) {
    return { kind: "lesson", target: lesson[1] };
  }

  if (BARE_SQL_RE.test(line)) {
    return { kind: "run", sql: line };
  }

  return { kind: "unknown", input: line };
}

/** Split "2.3" into its phase and index. */
export function parseLessonId(text: string): { phase: number; index: number } | null {
  const m = LESSON_ID_RE.exec(text.trim());
  if (!m) { return null; }
  return { phase: Number(m[1]), index: Number(m[2]) };
}
