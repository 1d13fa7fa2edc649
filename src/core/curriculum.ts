import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import { DEFAULT_DATA_DIR } from "../db/query-executor";
import { HINT_STAGES, type Lesson, type Phase } from "../db/schema";
import { CurriculumError } from "./errors";

export const DEFAULT_CURRICULUM_PATH = path.join(DEFAULT_DATA_DIR, "curriculum.json");

const hintSchema = z.object({
  category: z.enum(["clarifying-question", "approach", "concept", "code"]),
  text: z.string().min(1),
});

const lessonSchema = z.object({
  index: z.number().int().positive(),
  title: z.string().min(1),
  concept: z.string(),
  challenge: z.string().min(1),
  referenceQuery: z.string().min(1),
  hints: z.array(hintSchema),
  solutionSteps: z.array(z.object({
    sql: z.string().min(1),
    explanation: z.string(),
  })),
  followUp: z.string().optional(),
  ordered: z.boolean().default(false),
  acceptance: z.object({
    kind: z.literal("monotonic"),
    column: z.number().int().nonnegative(),
    direction: z.enum(["asc", "desc"]),
  }).optional(),
});

const curriculumSchema = z.object({
  version: z.string().min(1),
  title: z.string().min(1),
  phases: z.array(z.object({
    id: z.number().int().positive(),
    title: z.string().min(1),
    description: z.string(),
    lessons: z.array(lessonSchema).min(1),
  })).min(1),
});

export type CurriculumDocument = z.input<typeof curriculumSchema>;

/**
 * Curriculum Store
 *
 * The ordered, read-only lesson catalog. Lessons are addressed as
 * "phase.index" and ordered phase by phase, in document order.
 */
export class Curriculum {
  private readonly _lessons: Lesson[];
  private readonly _byId = new Map<string, Lesson>();

  private constructor(
    readonly version: string,
    readonly title: string,
    readonly phases: readonly Phase[],
  ) {
    this._lessons = phases.flatMap((p) => p.lessons);
    for (const lesson of this._lessons) {
      this._byId.set(lesson.id, lesson);
    }
  }

  /**
   * Validate a parsed curriculum document and build the catalog.
   * @throws CurriculumError when the document is malformed.
   */
  static fromDocument(doc: unknown): Curriculum {
    const parsed = curriculumSchema.safeParse(doc);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new CurriculumError(`Invalid curriculum: ${issues}`);
    }

    const seen = new Set<string>();
    const phases: Phase[] = parsed.data.phases.map((phase) => ({
      id: phase.id,
      title: phase.title,
      description: phase.description,
      lessons: phase.lessons.map((raw): Lesson => {
        const id = `${phase.id}.${raw.index}`;
        if (seen.has(id)) {
          throw new CurriculumError(`Duplicate lesson id ${id}`);
        }
        seen.add(id);
        assertHintOrder(id, raw.hints.map((h) => h.category));

        return {
          id,
          phase: phase.id,
          index: raw.index,
          title: raw.title,
          concept: raw.concept,
          challenge: raw.challenge,
          referenceQuery: raw.referenceQuery,
          hints: raw.hints,
          solutionSteps: raw.solutionSteps,
          followUp: raw.followUp ?? null,
          ordered: raw.ordered,
          acceptance: raw.acceptance ?? null,
        };
      }),
    }));

    return new Curriculum(parsed.data.version, parsed.data.title, phases);
  }

  allLessons(): readonly Lesson[] {
    return this._lessons;
  }

  get lessonCount(): number {
    return this._lessons.length;
  }

  first(): Lesson {
    return this._lessons[0];
  }

  lessonById(id: string): Lesson | null {
    return this._byId.get(id) ?? null;
  }

  lessonAt(phase: number, index: number): Lesson | null {
    return this.lessonById(`${phase}.${index}`);
  }

  /** Position in curriculum order, or -1. */
  positionOf(id: string): number {
    const lesson = this._byId.get(id);
    return lesson ? this._lessons.indexOf(lesson) : -1;
  }

  nextLesson(id: string): Lesson | null {
    const pos = this.positionOf(id);
    if (pos < 0) { return null; }
    return this._lessons[pos + 1] ?? null;
  }

  phaseOf(lesson: Lesson): Phase {
    const phase = this.phases.find((p) => p.id === lesson.phase);
    if (!phase) { throw new CurriculumError(`Lesson ${lesson.id} belongs to no phase`); }
    return phase;
  }
}

/**
 * Read and validate the bundled curriculum JSON.
 */
export async function loadCurriculum(filePath: string = DEFAULT_CURRICULUM_PATH): Promise<Curriculum> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new CurriculumError(`Could not read curriculum at ${filePath}`, { cause: err });
  }

  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    throw new CurriculumError(`Curriculum at ${filePath} is not valid JSON`, { cause: err });
  }
  return Curriculum.fromDocument(doc);
}

function assertHintOrder(lessonId: string, categories: readonly string[]): void {
  let previous = 0;
  for (const category of categories) {
    const stage = HINT_STAGES.findIndex((s) => s === category);
    if (stage < previous) {
      throw new CurriculumError(
        `Lesson ${lessonId}: '${category}' hint comes after a later-stage hint`,
      );
    }
    previous = stage;
  }
}
