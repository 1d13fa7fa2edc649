import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import { ProgressStoreError } from "../core/errors";
import type { SessionState } from "../db/schema";

/**
 * Where the session record lives between runs.
 */
export interface ProgressStore {
  /** Null when nothing has been saved yet. */
  load(): Promise<SessionState | null>;
  save(state: SessionState): Promise<void>;
}

const counterRecord = z.record(z.string(), z.number().int().nonnegative());

const sessionStateSchema = z.object({
  version: z.literal(1),
  curriculumVersion: z.string(),
  currentLesson: z.string(),
  completedLessons: z.array(z.string()),
  hintCounts: counterRecord,
  stepCounts: counterRecord,
  revealStats: z.record(z.string(), z.object({
    hintsShown: z.number().int().nonnegative(),
    stepsShown: z.number().int().nonnegative(),
    fullReveals: z.number().int().nonnegative(),
  })),
  startedAt: z.string(),
  updatedAt: z.string(),
});

/**
 * Progress Store
 *
 * Keeps the session record as a single pretty-printed JSON file,
 * by default `~/.sql-coach/progress.json`.
 */
export class JsonProgressStore implements ProgressStore {
  constructor(private readonly _filePath: string) {}

  async load(): Promise<SessionState | null> {
    let text: string;
    try {
      text = await fs.readFile(this._filePath, "utf-8");
    } catch (err: unknown) {
      if (isNotFound(err)) { return null; }
      throw new ProgressStoreError(`Could not read ${this._filePath}`, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new ProgressStoreError(`${this._filePath} is not valid JSON`, { cause: err });
    }

    const parsed = sessionStateSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new ProgressStoreError(`${this._filePath} is not a session record (${issues})`);
    }
    return parsed.data;
  }

  async save(state: SessionState): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this._filePath), { recursive: true });
      await fs.writeFile(this._filePath, JSON.stringify(state, null, 2) + "\n", "utf-8");
    } catch (err) {
      throw new ProgressStoreError(`Could not write ${this._filePath}`, { cause: err });
    }
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
