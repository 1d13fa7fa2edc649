/**
 * Core Type Definitions
 *
 * TypeScript representations of the curriculum, the query results the
 * executor produces and the durable session record.
 * The practice dataset itself lives in data/schema.sql and data/seed.sql.
 */

export type ScalarValue = number | string | Uint8Array | null;

export interface QueryResult {
  columns: string[];
  rows: ScalarValue[][];
}

export type QueryOutcome =
  | { ok: true; result: QueryResult }
  | { ok: false; message: string };

export type HintCategory = "clarifying-question" | "approach" | "concept" | "code";

/** Stage order hints must follow inside a lesson. */
export const HINT_STAGES: readonly HintCategory[] = [
  "clarifying-question",
  "approach",
  "concept",
  "code",
];

export interface Hint {
  category: HintCategory;
  text: string;
}

export interface SolutionStep {
  sql: string;
  explanation: string;
}

/**
 * Accepts a correctly-valued result whose row order differs from the
 * reference, as long as the named column is sorted in the given direction.
 */
export interface MonotonicAcceptance {
  kind: "monotonic";
  /** 0-based column index; aliases make names unreliable. */
  column: number;
  direction: "asc" | "desc";
}

export type AcceptancePredicate = MonotonicAcceptance;

export interface Lesson {
  /** "phase.index", e.g. "3.2". */
  id: string;
  phase: number;
  index: number;
  title: string;
  concept: string;
  challenge: string;
  referenceQuery: string;
  hints: Hint[];
  solutionSteps: SolutionStep[];
  followUp: string | null;
  /** Row order is part of the answer. */
  ordered: boolean;
  acceptance: AcceptancePredicate | null;
}

export interface Phase {
  id: number;
  title: string;
  description: string;
  lessons: Lesson[];
}

export interface RevealStats {
  hintsShown: number;
  stepsShown: number;
  fullReveals: number;
}

/**
 * Durable session record written to the progress store.
 */
export interface SessionState {
  version: 1;
  curriculumVersion: string;
  currentLesson: string;
  completedLessons: string[];
  hintCounts: Record<string, number>;
  stepCounts: Record<string, number>;
  revealStats: Record<string, RevealStats>;
  startedAt: string;
  updatedAt: string;
}
