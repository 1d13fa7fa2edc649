import { describe, it, expect, beforeEach } from "vitest";
import { HintSequencer } from "../../src/core/hint-sequencer";
import type { Lesson } from "../../src/db/schema";

function makeLesson(overrides: Partial<Lesson> = {}): Lesson {
  return {
    id: "1.2",
    phase: 1,
    index: 2,
    title: "WHERE",
    concept: "",
    challenge: "Find mobile rows",
    referenceQuery: "SELECT * FROM ad_performance_daily WHERE device = 'MOBILE';",
    hints: [
      { category: "clarifying-question", text: "Which column holds the device?" },
      { category: "approach", text: "Filter before selecting" },
      { category: "code", text: "WHERE device = 'MOBILE'" },
    ],
    solutionSteps: [],
    followUp: null,
    ordered: false,
    acceptance: null,
    ...overrides,
  };
}

describe("HintSequencer", () => {
  let hints: HintSequencer;
  const lesson = makeLesson();

  beforeEach(() => {
    hints = new HintSequencer();
  });

  it("returns hints in stored order, then exhausted on every further call", () => {
    const results = [1, 2, 3, 4, 5].map(() => hints.next(lesson));

    expect(results.slice(0, 3)).toEqual([
      { kind: "hint", hint: lesson.hints[0], number: 1, total: 3 },
      { kind: "hint", hint: lesson.hints[1], number: 2, total: 3 },
      { kind: "hint", hint: lesson.hints[2], number: 3, total: 3 },
    ]);
    expect(results[3]).toEqual({ kind: "exhausted", total: 3 });
    expect(results[4]).toEqual({ kind: "exhausted", total: 3 });
    expect(hints.shown(lesson.id)).toBe(3);
  });

  it("starts from the first hint again after reset", () => {
    hints.next(lesson);
    hints.next(lesson);
    hints.reset(lesson.id);

    expect(hints.next(lesson)).toMatchObject({ kind: "hint", number: 1 });
  });

  it("keeps separate counters per lesson", () => {
    const other = makeLesson({ id: "2.1" });
    hints.next(lesson);
    hints.next(lesson);

    expect(hints.next(other)).toMatchObject({ number: 1 });
    expect(hints.toRecord()).toEqual({ "1.2": 2, "2.1": 1 });
  });

  it("is exhausted immediately for a lesson without hints", () => {
    expect(hints.next(makeLesson({ hints: [] }))).toEqual({ kind: "exhausted", total: 0 });
  });

  it("restores counters and drops invalid ones", () => {
    const lessons = [lesson, makeLesson({ id: "1.3" }), makeLesson({ id: "1.4" })];
    hints.restore({ "1.2": 2, "1.3": -1, "1.4": 1.5 }, lessons);

    expect(hints.toRecord()).toEqual({ "1.2": 2 });
    expect(hints.next(lesson)).toMatchObject({ number: 3 });
  });

  it("caps a restored counter at the lesson's hint count and drops unknown lessons", () => {
    hints.restore({ "1.2": 99, "9.9": 1 }, [lesson]);

    expect(hints.shown("1.2")).toBe(3);
    expect(hints.toRecord()).toEqual({ "1.2": 3 });
    expect(hints.next(lesson)).toEqual({ kind: "exhausted", total: 3 });
  });
});
