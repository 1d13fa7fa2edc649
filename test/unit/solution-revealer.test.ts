import { describe, it, expect, beforeEach } from "vitest";
import { SolutionRevealer } from "../../src/core/solution-revealer";
import type { Lesson } from "../../src/db/schema";

const lesson: Lesson = {
  id: "2.1",
  phase: 2,
  index: 1,
  title: "Aggregate Functions",
  concept: "",
  challenge: "Total the clicks",
  referenceQuery: "SELECT SUM(clicks) FROM ad_performance_daily;",
  hints: [],
  solutionSteps: [
    { sql: "SELECT SUM(clicks)", explanation: "Add up every row" },
    { sql: "FROM ad_performance_daily;", explanation: "From the daily table" },
  ],
  followUp: null,
  ordered: false,
  acceptance: null,
};

describe("SolutionRevealer", () => {
  let revealer: SolutionRevealer;

  beforeEach(() => {
    revealer = new SolutionRevealer();
  });

  it("reveals steps in order and then the full solution idempotently", () => {
    expect(revealer.next(lesson)).toEqual({ kind: "step", step: lesson.solutionSteps[0], number: 1, total: 2 });
    expect(revealer.next(lesson)).toEqual({ kind: "step", step: lesson.solutionSteps[1], number: 2, total: 2 });

    const done = { kind: "complete", answer: lesson.referenceQuery };
    expect(revealer.next(lesson)).toEqual(done);
    expect(revealer.next(lesson)).toEqual(done);
    expect(revealer.shown(lesson.id)).toBe(2);
  });

  it("shows the full answer without consuming steps", () => {
    revealer.next(lesson);

    expect(revealer.fullAnswer(lesson)).toBe(lesson.referenceQuery);
    expect(revealer.shown(lesson.id)).toBe(1);
    expect(revealer.next(lesson)).toMatchObject({ kind: "step", number: 2 });
  });

  it("starts over after reset", () => {
    revealer.next(lesson);
    revealer.next(lesson);
    revealer.reset(lesson.id);

    expect(revealer.shown(lesson.id)).toBe(0);
    expect(revealer.next(lesson)).toMatchObject({ kind: "step", number: 1 });
  });

  it("caps a restored counter at the lesson's step count", () => {
    revealer.restore({ "2.1": 7, "1.1": 1 }, [lesson]);

    expect(revealer.toRecord()).toEqual({ "2.1": 2 });
    expect(revealer.next(lesson)).toEqual({ kind: "complete", answer: lesson.referenceQuery });
  });
});
