import type { Curriculum } from "../core/curriculum";
import { CoachError, EndOfCurriculumError, UnknownLessonError } from "../core/errors";
import type { SessionManager } from "../core/session-manager";
import type { TableInfo } from "../db/query-executor";
import type { Logger } from "../utils/logger";
import { parseLessonId, type Command } from "./command-parser";
import type { Renderer } from "./renderer";

/** Where rendered text goes. */
export interface Output {
  write(text: string): void;
  clear(): void;
}

/** The parts of the executor the schema and tables commands read. */
export interface DatasetInspector {
  describeSchema(): TableInfo[];
  tableCounts(): { table: string; rows: number }[];
}

/**
 * Maps each REPL command onto one session operation and renders the
 * outcome. Coach errors are shown to the learner; anything else
 * propagates to the REPL loop.
 */
export class CommandHandler {
  constructor(
    private readonly _session: SessionManager,
    private readonly _curriculum: Curriculum,
    private readonly _dataset: DatasetInspector,
    private readonly _renderer: Renderer,
    private readonly _output: Output,
    private readonly _logger: Logger,
  ) {}

  /** Greeting plus the current lesson, shown once at startup. */
  welcome(): void {
    this._output.write(this._renderer.welcome());
    this.showCurrentLesson();
  }

  showCurrentLesson(): void {
    const lesson = this._session.currentLesson;
    this._output.write(this._renderer.lesson(
      lesson,
      this._curriculum.phaseOf(lesson),
      this._session.progressSummary(),
    ));
  }

  /**
   * Run one command.
   * @returns false when the learner asked to quit.
   */
  async handle(command: Command): Promise<boolean> {
    try {
      return await this._dispatch(command);
    } catch (err) {
      if (err instanceof EndOfCurriculumError) {
        this._output.write(this._renderer.success("Congratulations! You've reached the end of the curriculum."));
        return true;
      }
      if (err instanceof CoachError) {
        this._logger.debug(`Command '${command.kind}' rejected`, err.message);
        this._output.write(this._renderer.error(err.message));
        return true;
      }
      throw err;
    }
  }

  private async _dispatch(command: Command): Promise<boolean> {
    const r = this._renderer;

    switch (command.kind) {
      case "empty":
        return true;

      case "run": {
        const lesson = this._session.currentLesson;
        const outcome = await this._session.submit(command.sql);
        this._output.write(r.submitOutcome(outcome, lesson, this._curriculum.nextLesson(lesson.id)));
        return true;
      }

      case "hint":
        this._output.write(r.hint(await this._session.nextHint()));
        return true;

      case "next":
        this._output.write(r.step(await this._session.nextStep()));
        return true;

      case "answer":
        this._output.write(r.answer(await this._session.fullAnswer()));
        return true;

      case "explain": {
        const steps = this._session.explainLastQuery();
        this._output.write(steps
          ? r.explain(steps)
          : r.notice("Run a query first, then type 'explain' to see its execution order."));
        return true;
      }

      case "schema":
        this._output.write(r.schema(this._dataset.describeSchema()));
        return true;

      case "tables":
        this._output.write(r.tables(this._dataset.tableCounts()));
        return true;

      case "lesson": {
        const target = parseLessonId(command.target);
        if (!target) {
          throw new UnknownLessonError(command.target);
        }
        await this._session.jump(target.phase, target.index);
        this._output.clear();
        this.showCurrentLesson();
        return true;
      }

      case "advance":
        await this._session.advance();
        this._output.clear();
        this.showCurrentLesson();
        return true;

      case "skip":
        await this._session.skip();
        this._output.clear();
        this.showCurrentLesson();
        return true;

      case "reset":
        await this._session.resetHints();
        this._output.write(r.paint("green", "Lesson progress reset. Hints and steps start from the beginning."));
        return true;

      case "progress":
        this._output.write(r.progress(this._session.progressSummary()));
        return true;

      case "help":
        this._output.write(r.help());
        return true;

      case "clear":
        this._output.clear();
        this.showCurrentLesson();
        return true;

      case "quit":
        return false;

      case "unknown":
        this._output.write(r.notice("Unknown command. Type 'help' for available commands."));
        return true;
    }
  }
}
