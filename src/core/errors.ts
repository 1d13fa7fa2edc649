/**
 * Error taxonomy for the coach.
 *
 * Every error here is recoverable by the command loop except
 * CurriculumError, which means the bundled catalog is broken.
 * Query execution failures are returned as values, not thrown.
 */

export class CoachError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnknownLessonError extends CoachError {
  constructor(readonly lessonId: string) {
    super(`Lesson '${lessonId}' not found. Use a format like '1.2' or '3.1'`);
  }
}

/** Raised by advance/skip on the last lesson. Presented as a congratulation. */
export class EndOfCurriculumError extends CoachError {
  constructor(readonly lessonId: string) {
    super(`Lesson ${lessonId} is the last lesson in the curriculum`);
  }
}

export class LessonNotCompletedError extends CoachError {
  constructor(readonly lessonId: string) {
    super(`Lesson ${lessonId} is not completed yet. Solve it, or use 'skip' to move on`);
  }
}

export class ProgressStoreError extends CoachError {}

export class CurriculumError extends CoachError {}

