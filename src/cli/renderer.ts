import type { ExecutionStep } from "../core/execution-order";
import type { HintResult } from "../core/hint-sequencer";
import type { ProgressSummary, SubmitOutcome } from "../core/session-manager";
import type { StepResult } from "../core/solution-revealer";
import type { ColumnInfo, TableInfo } from "../db/query-executor";
import type { Lesson, Phase, QueryResult, ScalarValue } from "../db/schema";

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  brightBlack: "\x1b[90m",
  brightGreen: "\x1b[92m",
  brightBlue: "\x1b[94m",
  brightMagenta: "\x1b[95m",
  brightCyan: "\x1b[96m",
  brightWhite: "\x1b[97m",
} as const;

export type Style = keyof typeof ANSI;

/** Markup tokens allowed in curriculum text, e.g. "{cyan}GROUP BY{reset}". */
const MARKUP_RE = /\{(reset|bold|dim|red|green|yellow|blue|magenta|cyan)\}/g;

const BOX_WIDTH = 66;
const BAR_WIDTH = 20;

export interface RendererOptions {
  color: boolean;
  maxColumnWidth: number;
}

/**
 * Renderer
 *
 * Builds the text for every screen of the coach. Methods return strings;
 * writing them is the caller's job. With `color: false` no escape codes
 * are emitted at all.
 */
export class Renderer {
  constructor(private readonly _options: RendererOptions) {}

  paint(style: Style, text: string): string {
    return this._options.color ? `${ANSI[style]}${text}${ANSI.reset}` : text;
  }

  /** Replace curriculum markup tokens with escape codes, or drop them. */
  markup(text: string): string {
    return text.replace(MARKUP_RE, (_match, name: Style) => (this._options.color ? ANSI[name] : ""));
  }

  prompt(): string {
    return `${this.paint("brightBlue", "sql>")} `;
  }

  banner(): string {
    return this.box("SQL COACH  |  SQL for Ad Analytics", "brightBlue");
  }

  welcome(): string {
    return [
      this.banner(),
      "",
      this.paint("brightWhite", "Welcome to SQL Coach!"),
      "",
      "Work through the lessons, ask for hints when stuck and see solutions step by step.",
      this.paint("dim", "Type 'help' anytime to see all commands."),
    ].join("\n");
  }

  box(title: string, style: Style): string {
    const rule = "═".repeat(BOX_WIDTH);
    return [
      this.paint(style, `╔${rule}╗`),
      this.paint(style, `║  ${this.paint("bold", title.padEnd(BOX_WIDTH - 2))}║`),
      this.paint(style, `╚${rule}╝`),
    ].join("\n");
  }

  divider(): string {
    return this.paint("brightBlack", "─".repeat(70));
  }

  private _footer(text: string): string {
    const rule = "─".repeat(BOX_WIDTH);
    return this.paint("dim", `${rule}\n${text}\n${rule}`);
  }

  progressBar(completed: number, total: number, label = "Progress"): string {
    const ratio = total > 0 ? completed / total : 0;
    const percentage = Math.floor(ratio * 100);
    const filled = Math.floor(ratio * BAR_WIDTH);
    const bar = "█".repeat(filled) + "░".repeat(BAR_WIDTH - filled);
    const style: Style = percentage < 33 ? "red" : percentage < 66 ? "yellow" : "green";
    return `${label}: ${this.paint(style, bar)} ${percentage}% (${completed}/${total})`;
  }

  lesson(lesson: Lesson, phase: Phase, summary: ProgressSummary): string {
    return [
      "",
      this.progressBar(summary.completedCount, summary.total, "Overall Progress"),
      "",
      this.paint("brightMagenta", `Phase ${phase.id}: ${phase.title}`),
      this.paint("brightWhite", `Lesson ${lesson.id}: ${lesson.title}`),
      this.divider(),
      "",
      this.box("CONCEPT", "cyan"),
      "",
      this.markup(lesson.concept),
      "",
      this.box("YOUR CHALLENGE", "yellow"),
      "",
      lesson.challenge,
      "",
      this._footer("Commands: run <sql> │ hint │ next │ answer │ schema │ help"),
    ].join("\n");
  }

  formatValue(value: ScalarValue): string {
    if (value === null) { return "NULL"; }
    if (value instanceof Uint8Array) { return `<blob ${value.length} bytes>`; }
    return String(value);
  }

  table(result: QueryResult): string {
    if (result.rows.length === 0) {
      return this.paint("dim", "(No results)");
    }

    const max = this._options.maxColumnWidth;
    const cells = result.rows.map((row) => row.map((v) => this.formatValue(v)));
    const widths = result.columns.map((col, i) =>
      Math.min(
        Math.max(col.length, ...cells.map((row) => Math.min((row[i] ?? "").length, max))),
        max,
      ),
    );

    const border = (left: string, mid: string, right: string) =>
      this.paint("brightCyan", left + widths.map((w) => "─".repeat(w + 2)).join(mid) + right);
    const bar = this.paint("brightCyan", "│");
    const line = (values: string[], styleOf: (value: string, i: number) => Style | null) =>
      bar + widths.map((w, i) => {
        const text = (values[i] ?? "").slice(0, w).padEnd(w);
        const style = styleOf(values[i] ?? "", i);
        return ` ${style ? this.paint(style, text) : text} ${bar}`;
      }).join("");

    const rows = result.rows.map((row, r) =>
      line(cells[r], (_value, i) => (row[i] === null ? "dim" : null)),
    );

    return [
      border("┌", "┬", "┐"),
      line(result.columns, () => "bold"),
      border("├", "┼", "┤"),
      ...rows,
      border("└", "┴", "┘"),
      this.paint("dim", `${result.rows.length} row(s) returned`),
    ].join("\n");
  }

  success(message: string): string {
    return [this.box("SUCCESS", "green"), "", message].join("\n");
  }

  error(message: string): string {
    return [this.box("ERROR", "red"), "", message].join("\n");
  }

  notice(message: string): string {
    return this.paint("yellow", message);
  }

  submitOutcome(outcome: SubmitOutcome, lesson: Lesson, nextLesson: Lesson | null): string {
    switch (outcome.kind) {
      case "execution-failure":
        return this.error(`SQL Error:\n${outcome.message}`);

      case "mismatch":
        return [
          this.paint("green", "Query executed successfully!"),
          "",
          this.table(outcome.result),
          "",
          this.notice(`Not quite the expected result yet: ${outcome.detail}.`),
          this.paint("dim", "Type 'hint' for a nudge, or 'next' to see the solution step by step."),
        ].join("\n");

      case "match": {
        const lines = [
          this.paint("green", "Query executed successfully!"),
          "",
          this.table(outcome.result),
          "",
        ];
        if (!outcome.newlyCompleted) {
          lines.push(this.paint("green", `Correct! Lesson ${lesson.id} was already completed.`));
          return lines.join("\n");
        }
        const follow = lesson.followUp
          ? `\n\n${this.paint("yellow", "Follow-up:")} ${lesson.followUp}`
          : "";
        const next = nextLesson
          ? `\n\nType 'advance' to continue to lesson ${nextLesson.id}: ${nextLesson.title}`
          : "\n\nThat was the last lesson. Congratulations!";
        lines.push(this.success(`Perfect! Lesson ${lesson.id} completed.${follow}${next}`));
        return lines.join("\n");
      }
    }
  }

  hint(result: HintResult): string {
    if (result.kind === "exhausted") {
      return this.notice("No more hints! Type 'answer' to see the solution.");
    }
    return [
      this.box(`HINT ${result.number} of ${result.total}`, "yellow"),
      "",
      this.markup(result.hint.text),
      "",
      this._footer("→ Try again, type 'hint' for the next hint, or 'answer' for the solution"),
    ].join("\n");
  }

  step(result: StepResult): string {
    if (result.kind === "complete") {
      return [this.notice("No more steps! Here's the full solution:"), this.answer(result.answer)].join("\n");
    }
    return [
      this.box(`STEP ${result.number} of ${result.total}`, "magenta"),
      "",
      this.paint("brightWhite", result.step.sql),
      this.paint("dim", result.step.explanation),
      "",
      this._footer("→ Type 'next' for the next step, or 'answer' for the full solution"),
    ].join("\n");
  }

  answer(sql: string): string {
    return [
      this.box("FULL SOLUTION", "green"),
      "",
      this.paint("brightGreen", sql),
      "",
      this._footer("→ Type 'run <sql>' to try it, or 'skip' for the next lesson"),
    ].join("\n");
  }

  explain(steps: ExecutionStep[]): string {
    const present = steps.filter((s) => s.present);
    const width = Math.max(0, ...present.map((s) => s.label.length));
    return [
      this.box("QUERY EXECUTION ORDER", "cyan"),
      "",
      this.paint("dim", "Your query executes in this order:"),
      "",
      ...present.map((s) => `  ${s.step}. ${this.paint("cyan", s.label.padEnd(width))}  ← ${s.rationale}`),
    ].join("\n");
  }

  schema(tables: TableInfo[]): string {
    const describe = (col: ColumnInfo): string => {
      const name = col.name.padEnd(20);
      const styled = col.primaryKey
        ? this.paint("green", name)
        : col.references ? this.paint("blue", name) : name;
      const type = col.primaryKey ? `${col.type} PRIMARY KEY` : col.type;
      const ref = col.references ? ` → ${col.references.table}` : "";
      return `  ${styled} ${type}${ref}`;
    };

    return [
      this.box("DATABASE SCHEMA", "cyan"),
      ...tables.flatMap((t) => ["", this.paint("yellow", t.name), ...t.columns.map(describe)]),
      "",
      this.paint("dim", "Legend: green = primary key, blue = foreign key"),
      this.paint("dim", "Cost columns are in micros (divide by 1,000,000 for USD)"),
    ].join("\n");
  }

  tables(counts: { table: string; rows: number }[]): string {
    const width = Math.max(0, ...counts.map((c) => c.table.length));
    return [
      this.paint("cyan", "Available Tables:"),
      ...counts.map((c) => `  ${this.paint("yellow", c.table.padEnd(width))} - ${c.rows} rows`),
      "",
      this.paint("dim", "Type 'schema' for full details"),
    ].join("\n");
  }

  progress(summary: ProgressSummary): string {
    return [
      this.paint("bold", "Your Progress:"),
      "",
      this.progressBar(summary.completedCount, summary.total),
      "",
      this.paint("dim", `Completed lessons: ${summary.completed.join(", ") || "None yet"}`),
      this.paint("dim", `Current lesson: ${summary.current.id} (Phase ${summary.currentPhase.id}: ${summary.currentPhase.title})`),
    ].join("\n");
  }

  help(): string {
    const entries: [string, Style, string][] = [
      ["run <sql>", "green", "Execute a SQL query and see the results"],
      ["hint", "yellow", "Get a hint (progressive, several available)"],
      ["next", "yellow", "Show the next part of the solution"],
      ["answer", "yellow", "Show the full solution"],
      ["explain", "cyan", "Explain the execution order of your last query"],
      ["schema", "cyan", "Show the database schema"],
      ["tables", "cyan", "List all tables"],
      ["lesson X.Y", "magenta", "Jump to a lesson (e.g. lesson 2.1)"],
      ["advance", "magenta", "Continue to the next lesson once solved"],
      ["skip", "magenta", "Skip to the next lesson"],
      ["progress", "magenta", "Show your overall progress"],
      ["reset", "dim", "Restart hints and steps for this lesson"],
      ["clear", "dim", "Clear the screen and show the current lesson"],
      ["quit", "red", "Save progress and exit"],
    ];
    return [
      this.box("COMMANDS", "cyan"),
      "",
      ...entries.map(([name, style, text]) => `  ${this.paint(style, name.padEnd(12))}  ${text}`),
    ].join("\n");
  }

  goodbye(saved: boolean): string {
    return saved
      ? this.paint("green", "Progress saved! See you next time.")
      : this.notice("Progress could not be saved. See you next time.");
  }
}
