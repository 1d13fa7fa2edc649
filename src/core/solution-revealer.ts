import type { Lesson, SolutionStep } from "../db/schema";

export type StepResult =
  | { kind: "step"; step: SolutionStep; number: number; total: number }
  | { kind: "complete"; answer: string };

/**
 * Walks through a lesson's solution one step at a time. Once every step
 * has been shown the complete reference query is returned instead.
 */
export class SolutionRevealer {
  private _counts = new Map<string, number>();

  shown(lessonId: string): number {
    return this._counts.get(lessonId) ?? 0;
  }

  next(lesson: Lesson): StepResult {
    const total = lesson.solutionSteps.length;
    const shown = this.shown(lesson.id);
    if (shown >= total) {
      return { kind: "complete", answer: lesson.referenceQuery };
    }

    this._counts.set(lesson.id, shown + 1);
    return { kind: "step", step: lesson.solutionSteps[shown], number: shown + 1, total };
  }

  /** The full reference query. Leaves the step counter alone. */
  fullAnswer(lesson: Lesson): string {
    return lesson.referenceQuery;
  }

  reset(lessonId: string): void {
    this._counts.delete(lessonId);
  }

  /** Restore saved counters, capped at each lesson's step count. */
  restore(counts: Record<string, number>, lessons: readonly Lesson[]): void {
    this._counts.clear();
    for (const lesson of lessons) {
      const count = counts[lesson.id];
      if (count !== undefined && Number.isInteger(count) && count > 0) {
        this._counts.set(lesson.id, Math.min(count, lesson.solutionSteps.length));
      }
    }
  }

  toRecord(): Record<string, number> {
    return Object.fromEntries(this._counts);
  }
}
