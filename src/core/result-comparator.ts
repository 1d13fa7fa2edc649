import type { AcceptancePredicate, QueryResult, ScalarValue } from "../db/schema";

export interface Tolerance {
  absolute: number;
  relative: number;
}

export const DEFAULT_TOLERANCE: Tolerance = { absolute: 1e-6, relative: 1e-9 };

export interface ComparisonPolicy {
  /** Row order is part of the answer. */
  ordered: boolean;
  acceptance: AcceptancePredicate | null;
  tolerance: Tolerance;
}

export type MismatchReason = "column-count" | "row-count" | "row-order" | "values";

export type Comparison =
  | { match: true; via: "exact" | "acceptance" }
  | { match: false; reason: MismatchReason; detail: string };

/** Sort rank of each scalar kind; kinds never compare equal to each other. */
function kindRank(value: ScalarValue): number {
  if (value === null) { return 0; }
  if (typeof value === "number") { return 1; }
  if (typeof value === "string") { return 2; }
  return 3;
}

export function numbersEqual(a: number, b: number, tolerance: Tolerance): boolean {
  if (a === b) { return true; }
  const diff = Math.abs(a - b);
  const scale = Math.max(Math.abs(a), Math.abs(b));
  return diff <= Math.max(tolerance.absolute, tolerance.relative * scale);
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) { return false; }
  return a.every((byte, i) => byte === b[i]);
}

/**
 * Numbers match within tolerance, text and blobs match exactly,
 * null matches only null.
 */
export function scalarsEqual(a: ScalarValue, b: ScalarValue, tolerance: Tolerance): boolean {
  if (a === null || b === null) { return a === b; }
  if (typeof a === "number" && typeof b === "number") { return numbersEqual(a, b, tolerance); }
  if (typeof a === "string" && typeof b === "string") { return a === b; }
  if (a instanceof Uint8Array && b instanceof Uint8Array) { return bytesEqual(a, b); }
  return false;
}

/**
 * Total order used to bring two row sets into the same sequence.
 * Exact, so the order stays transitive; tolerance applies only when
 * the sorted rows are paired up.
 */
export function compareScalars(a: ScalarValue, b: ScalarValue): number {
  const rankDiff = kindRank(a) - kindRank(b);
  if (rankDiff !== 0) { return rankDiff; }

  if (typeof a === "number" && typeof b === "number") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    const len = Math.min(a.length, b.length);
    for (let i = 0; i < len; i++) {
      if (a[i] !== b[i]) { return a[i] - b[i]; }
    }
    return a.length - b.length;
  }
  return 0;
}

function compareRows(a: ScalarValue[], b: ScalarValue[]): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const diff = compareScalars(a[i], b[i]);
    if (diff !== 0) { return diff; }
  }
  return a.length - b.length;
}

function rowsEqual(a: ScalarValue[], b: ScalarValue[], tolerance: Tolerance): boolean {
  return a.length === b.length && a.every((value, i) => scalarsEqual(value, b[i], tolerance));
}

function sequenceEqual(a: ScalarValue[][], b: ScalarValue[][], tolerance: Tolerance): boolean {
  return a.length === b.length && a.every((row, i) => rowsEqual(row, b[i], tolerance));
}

/** Same rows with the same multiplicity, in any order. */
export function multisetEqual(a: ScalarValue[][], b: ScalarValue[][], tolerance: Tolerance): boolean {
  if (a.length !== b.length) { return false; }
  return sequenceEqual([...a].sort(compareRows), [...b].sort(compareRows), tolerance);
}

/**
 * Check a lesson's acceptance predicate against the submitted rows.
 */
export function satisfiesAcceptance(
  result: QueryResult,
  predicate: AcceptancePredicate,
  tolerance: Tolerance,
): boolean {
  switch (predicate.kind) {
    case "monotonic": {
      if (predicate.column >= result.columns.length) { return false; }
      const sign = predicate.direction === "asc" ? 1 : -1;
      for (let i = 1; i < result.rows.length; i++) {
        const prev = result.rows[i - 1][predicate.column];
        const curr = result.rows[i][predicate.column];
        if (scalarsEqual(prev, curr, tolerance)) { continue; }
        if (sign * compareScalars(prev, curr) > 0) { return false; }
      }
      return true;
    }
  }
}

/**
 * Result Comparator
 *
 * Decides whether a submitted result set answers the lesson. Column
 * names are ignored so any alias is accepted; column positions are not.
 */
export function compareResults(
  actual: QueryResult,
  expected: QueryResult,
  policy: ComparisonPolicy,
): Comparison {
  const { tolerance } = policy;

  if (actual.columns.length !== expected.columns.length) {
    return {
      match: false,
      reason: "column-count",
      detail: `Expected ${expected.columns.length} column(s), got ${actual.columns.length}`,
    };
  }

  if (actual.rows.length !== expected.rows.length) {
    return {
      match: false,
      reason: "row-count",
      detail: `Expected ${expected.rows.length} row(s), got ${actual.rows.length}`,
    };
  }

  if (!policy.ordered) {
    return multisetEqual(actual.rows, expected.rows, tolerance)
      ? { match: true, via: "exact" }
      : { match: false, reason: "values", detail: "Some values differ from the expected result" };
  }

  if (sequenceEqual(actual.rows, expected.rows, tolerance)) {
    return { match: true, via: "exact" };
  }

  if (!multisetEqual(actual.rows, expected.rows, tolerance)) {
    return { match: false, reason: "values", detail: "Some values differ from the expected result" };
  }

  if (policy.acceptance && satisfiesAcceptance(actual, policy.acceptance, tolerance)) {
    return { match: true, via: "acceptance" };
  }

  return {
    match: false,
    reason: "row-order",
    detail: "The rows are right but their order is not",
  };
}
