import type { Hint, Lesson } from "../db/schema";

export type HintResult =
  | { kind: "hint"; hint: Hint; number: number; total: number }
  | { kind: "exhausted"; total: number };

/**
 * Hint Sequencer
 *
 * Hands out a lesson's hints one at a time, in curriculum order
 * (clarifying question first, code last). Counters are kept per lesson
 * so they survive a restart through the session record.
 */
export class HintSequencer {
  private _counts = new Map<string, number>();

  /** Number of hints already shown for the lesson. */
  shown(lessonId: string): number {
    return this._counts.get(lessonId) ?? 0;
  }

  next(lesson: Lesson): HintResult {
    const total = lesson.hints.length;
    const shown = this.shown(lesson.id);
    if (shown >= total) {
      return { kind: "exhausted", total };
    }

    this._counts.set(lesson.id, shown + 1);
    return { kind: "hint", hint: lesson.hints[shown], number: shown + 1, total };
  }

  reset(lessonId: string): void {
    this._counts.delete(lessonId);
  }

  /**
   * Restore counters from a saved session. Counts for lessons not in
   * `lessons`, and negative or fractional counts, are dropped; the rest
   * are capped at the lesson's hint count.
   */
  restore(counts: Record<string, number>, lessons: readonly Lesson[]): void {
    this._counts.clear();
    for (const lesson of lessons) {
      const count = counts[lesson.id];
      if (count !== undefined && Number.isInteger(count) && count > 0) {
        this._counts.set(lesson.id, Math.min(count, lesson.hints.length));
      }
    }
  }

  toRecord(): Record<string, number> {
    return Object.fromEntries(this._counts);
  }
}
