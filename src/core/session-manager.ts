import type { QueryExecutor } from "../db/query-executor";
import type {
  Lesson,
  Phase,
  QueryOutcome,
  QueryResult,
  RevealStats,
  SessionState,
} from "../db/schema";
import type { ProgressStore } from "../storage/progress-store";
import type { Logger } from "../utils/logger";
import type { Curriculum } from "./curriculum";
import { EndOfCurriculumError, LessonNotCompletedError, UnknownLessonError } from "./errors";
import { explainExecutionOrder, type ExecutionStep } from "./execution-order";
import { HintSequencer, type HintResult } from "./hint-sequencer";
import {
  compareResults,
  DEFAULT_TOLERANCE,
  type MismatchReason,
  type Tolerance,
} from "./result-comparator";
import { SolutionRevealer, type StepResult } from "./solution-revealer";

export interface Disposable {
  dispose(): void;
}

export type SubmitOutcome =
  | { kind: "execution-failure"; message: string }
  | { kind: "mismatch"; result: QueryResult; reason: MismatchReason; detail: string }
  | {
      kind: "match";
      result: QueryResult;
      /** True only the first time this lesson is solved. */
      newlyCompleted: boolean;
      readyToAdvance: true;
      /** Accepted by the lesson's acceptance predicate rather than exact equality. */
      viaAcceptance: boolean;
    };

export interface ProgressSummary {
  total: number;
  completedCount: number;
  /** Completed lesson ids, in curriculum order. */
  completed: string[];
  current: Lesson;
  currentPhase: Phase;
}

/** The last submitted query. Never persisted. */
export interface LastQuery {
  sql: string;
  outcome: QueryOutcome;
}

const EMPTY_STATS: RevealStats = { hintsShown: 0, stepsShown: 0, fullReveals: 0 };

/**
 * Session Manager
 *
 * Owns the learner's session and is the only thing that mutates it:
 *   - Query submission and completion tracking
 *   - Navigation (advance / skip / jump)
 *   - Hint and solution-step reveal counters
 *   - Persistence after every mutating operation
 *
 * There is one steady state, "at lesson X"; every operation runs to
 * completion before the next one starts.
 */
export class SessionManager {
  private _current: Lesson;
  private _completed = new Set<string>();
  private _revealStats = new Map<string, RevealStats>();
  private _startedAt: string;
  private _lastQuery: LastQuery | null = null;
  private readonly _hints = new HintSequencer();
  private readonly _steps = new SolutionRevealer();
  private readonly _expected = new Map<string, QueryResult>();

  private _persistFailureCallbacks: Array<(error: Error) => void> = [];

  constructor(
    private readonly _curriculum: Curriculum,
    private readonly _executor: QueryExecutor,
    private readonly _store: ProgressStore,
    private readonly _logger: Logger,
    private readonly _tolerance: Tolerance = DEFAULT_TOLERANCE,
    private readonly _clock: () => Date = () => new Date(),
  ) {
    this._current = _curriculum.first();
    this._startedAt = this._clock().toISOString();
  }

  get currentLesson(): Lesson {
    return this._current;
  }

  get lastQuery(): LastQuery | null {
    return this._lastQuery;
  }

  isCompleted(lessonId: string): boolean {
    return this._completed.has(lessonId);
  }

  hintsShown(lessonId: string = this._current.id): number {
    return this._hints.shown(lessonId);
  }

  stepsShown(lessonId: string = this._current.id): number {
    return this._steps.shown(lessonId);
  }

  revealStats(lessonId: string = this._current.id): RevealStats {
    return { ...(this._revealStats.get(lessonId) ?? EMPTY_STATS) };
  }

  onPersistFailure(callback: (error: Error) => void): Disposable {
    this._persistFailureCallbacks.push(callback);
    return {
      dispose: () => {
        this._persistFailureCallbacks = this._persistFailureCallbacks.filter((c) => c !== callback);
      },
    };
  }

  // ================================================================
  // Lifecycle
  // ================================================================

  /**
   * Resume the stored session when it fits the current curriculum,
   * otherwise start fresh at the first lesson. Never throws.
   */
  async start(): Promise<void> {
    let stored: SessionState | null = null;
    try {
      stored = await this._store.load();
    } catch (err) {
      this._logger.warn("Could not load progress, starting fresh", errorMessage(err));
    }

    if (stored && this._isCompatible(stored)) {
      this._restore(stored);
      this._logger.info(`Resumed session at lesson ${this._current.id}`, {
        completed: this._completed.size,
      });
      return;
    }

    this._resetSession();
    this._logger.info("Started a fresh session");
  }

  // ================================================================
  // Queries
  // ================================================================

  /**
   * Run the learner's SQL and check it against the current lesson.
   * Execution failures come back as values and leave progress alone.
   */
  async submit(sql: string): Promise<SubmitOutcome> {
    const lesson = this._current;
    const outcome = this._executor.execute(sql);
    this._lastQuery = { sql, outcome };

    if (!outcome.ok) {
      this._logger.debug(`Query failed on lesson ${lesson.id}`, outcome.message);
      return { kind: "execution-failure", message: outcome.message };
    }

    const expected = this._expectedResult(lesson);
    if (!expected) {
      return {
        kind: "mismatch",
        result: outcome.result,
        reason: "values",
        detail: "The expected result for this lesson could not be computed",
      };
    }

    const comparison = compareResults(outcome.result, expected, {
      ordered: lesson.ordered,
      acceptance: lesson.acceptance,
      tolerance: this._tolerance,
    });

    if (!comparison.match) {
      return {
        kind: "mismatch",
        result: outcome.result,
        reason: comparison.reason,
        detail: comparison.detail,
      };
    }

    const newlyCompleted = !this._completed.has(lesson.id);
    this._completed.add(lesson.id);
    if (newlyCompleted) {
      this._logger.info(`Lesson ${lesson.id} completed`);
      await this.persist();
    }

    return {
      kind: "match",
      result: outcome.result,
      newlyCompleted,
      readyToAdvance: true,
      viaAcceptance: comparison.via === "acceptance",
    };
  }

  /** Logical execution order of the last submitted SQL, or null before any. */
  explainLastQuery(): ExecutionStep[] | null {
    return this._lastQuery ? explainExecutionOrder(this._lastQuery.sql) : null;
  }

  // ================================================================
  // Navigation
  // ================================================================

  /**
   * Move to the next lesson once the current one is solved.
   * @throws EndOfCurriculumError on the last lesson.
   * @throws LessonNotCompletedError when the current lesson is unsolved.
   */
  async advance(): Promise<Lesson> {
    const next = this._nextOrThrow();
    if (!this._completed.has(this._current.id)) {
      throw new LessonNotCompletedError(this._current.id);
    }
    return this._moveTo(next);
  }

  /** Like advance, without requiring the current lesson to be solved. */
  async skip(): Promise<Lesson> {
    const next = this._nextOrThrow();
    this._logger.info(`Skipped lesson ${this._current.id}`);
    return this._moveTo(next);
  }

  async jump(phase: number, index: number): Promise<Lesson> {
    const target = this._curriculum.lessonAt(phase, index);
    if (!target) {
      throw new UnknownLessonError(`${phase}.${index}`);
    }
    return this._moveTo(target);
  }

  // ================================================================
  // Hints and solutions
  // ================================================================

  async resetHints(): Promise<void> {
    this._hints.reset(this._current.id);
    this._steps.reset(this._current.id);
    await this.persist();
  }

  async nextHint(): Promise<HintResult> {
    const result = this._hints.next(this._current);
    if (result.kind === "hint") {
      this._bumpStats(this._current.id, "hintsShown");
      await this.persist();
    }
    return result;
  }

  async nextStep(): Promise<StepResult> {
    const result = this._steps.next(this._current);
    if (result.kind === "step") {
      this._bumpStats(this._current.id, "stepsShown");
      await this.persist();
    }
    return result;
  }

  /** The complete reference query. Counted as a full reveal; step progress is untouched. */
  async fullAnswer(): Promise<string> {
    const answer = this._steps.fullAnswer(this._current);
    this._bumpStats(this._current.id, "fullReveals");
    await this.persist();
    return answer;
  }

  // ================================================================
  // Progress
  // ================================================================

  progressSummary(): ProgressSummary {
    const completed = this._completedInOrder();
    return {
      total: this._curriculum.lessonCount,
      completedCount: completed.length,
      completed,
      current: this._current,
      currentPhase: this._curriculum.phaseOf(this._current),
    };
  }

  /** The durable part of the session. */
  toState(): SessionState {
    return {
      version: 1,
      curriculumVersion: this._curriculum.version,
      currentLesson: this._current.id,
      completedLessons: this._completedInOrder(),
      hintCounts: this._hints.toRecord(),
      stepCounts: this._steps.toRecord(),
      revealStats: Object.fromEntries(
        [...this._revealStats].map(([id, stats]) => [id, { ...stats }]),
      ),
      startedAt: this._startedAt,
      updatedAt: this._clock().toISOString(),
    };
  }

  /**
   * Write the session record. A failed write is reported to the
   * persist-failure listeners and the session carries on in memory.
   */
  async persist(): Promise<boolean> {
    try {
      await this._store.save(this.toState());
      return true;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this._logger.warn("Could not save progress", error.message);
      for (const cb of this._persistFailureCallbacks) {
        cb(error);
      }
      return false;
    }
  }

  // ---- internal helpers ----

  private _nextOrThrow(): Lesson {
    const next = this._curriculum.nextLesson(this._current.id);
    if (!next) {
      throw new EndOfCurriculumError(this._current.id);
    }
    return next;
  }

  private async _moveTo(lesson: Lesson): Promise<Lesson> {
    this._current = lesson;
    this._hints.reset(lesson.id);
    this._steps.reset(lesson.id);
    this._logger.info(`Now at lesson ${lesson.id}`);
    await this.persist();
    return lesson;
  }

  /** Reference query result, computed once per lesson. */
  private _expectedResult(lesson: Lesson): QueryResult | null {
    const cached = this._expected.get(lesson.id);
    if (cached) { return cached; }

    const outcome = this._executor.execute(lesson.referenceQuery);
    if (!outcome.ok) {
      this._logger.error(`Reference query for lesson ${lesson.id} failed`, undefined, outcome.message);
      return null;
    }
    this._expected.set(lesson.id, outcome.result);
    return outcome.result;
  }

  private _bumpStats(lessonId: string, field: keyof RevealStats): void {
    const stats = { ...(this._revealStats.get(lessonId) ?? EMPTY_STATS) };
    stats[field]++;
    this._revealStats.set(lessonId, stats);
  }

  private _completedInOrder(): string[] {
    return this._curriculum
      .allLessons()
      .filter((l) => this._completed.has(l.id))
      .map((l) => l.id);
  }

  private _isCompatible(stored: SessionState): boolean {
    if (stored.curriculumVersion !== this._curriculum.version) {
      this._logger.warn(
        `Stored progress is for curriculum ${stored.curriculumVersion}, ` +
        `current is ${this._curriculum.version}; starting fresh`,
      );
      return false;
    }
    const ids = [stored.currentLesson, ...stored.completedLessons];
    const unknown = ids.filter((id) => !this._curriculum.lessonById(id));
    if (unknown.length > 0) {
      this._logger.warn("Stored progress names unknown lessons; starting fresh", unknown);
      return false;
    }
    return true;
  }

  private _restore(stored: SessionState): void {
    const known = (id: string) => this._curriculum.lessonById(id) !== null;
    const lesson = this._curriculum.lessonById(stored.currentLesson);
    this._current = lesson ?? this._curriculum.first();
    this._completed = new Set(stored.completedLessons);
    const lessons = this._curriculum.allLessons();
    this._hints.restore(stored.hintCounts, lessons);
    this._steps.restore(stored.stepCounts, lessons);
    this._revealStats = new Map(
      Object.entries(stored.revealStats).filter(([id]) => known(id)),
    );
    this._startedAt = stored.startedAt;
  }

  private _resetSession(): void {
    this._current = this._curriculum.first();
    this._completed = new Set();
    this._hints.restore({}, []);
    this._steps.restore({}, []);
    this._revealStats = new Map();
    this._startedAt = this._clock().toISOString();
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
