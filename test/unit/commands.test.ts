import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from "vitest";
import { parseCommand } from "../../src/cli/command-parser";
import { CommandHandler, type DatasetInspector, type Output } from "../../src/cli/commands";
import { Renderer } from "../../src/cli/renderer";
import { type Curriculum, loadCurriculum } from "../../src/core/curriculum";
import { SessionManager } from "../../src/core/session-manager";
import { SqlJsQueryExecutor } from "../../src/db/query-executor";
import type { SessionState } from "../../src/db/schema";
import { Logger, MemoryLogSink } from "../../src/utils/logger";

describe("CommandHandler", () => {
  const executor = new SqlJsQueryExecutor();
  let curriculum: Curriculum;
  let session: SessionManager;
  let written: string[];
  let output: Output & { clears: number };
  let handler: CommandHandler;

  function makeHandler(dataset: DatasetInspector = executor): CommandHandler {
    return new CommandHandler(
      session,
      curriculum,
      dataset,
      new Renderer({ color: false, maxColumnWidth: 20 }),
      output,
      new Logger(new MemoryLogSink()),
    );
  }

  async function run(line: string): Promise<boolean> {
    return handler.handle(parseCommand(line));
  }

  function last(): string {
    return written[written.length - 1] ?? "";
  }

  beforeAll(async () => {
    curriculum = await loadCurriculum();
    await executor.initialize();
  });

  afterAll(() => {
    executor.close();
  });

  beforeEach(async () => {
    const store = {
      load: vi.fn(async (): Promise<SessionState | null> => null),
      save: vi.fn(async (_state: SessionState): Promise<void> => undefined),
    };
    session = new SessionManager(curriculum, executor, store, new Logger(new MemoryLogSink()));
    await session.start();
    written = [];
    output = {
      clears: 0,
      write: (text) => { written.push(text); },
      clear: () => { output.clears++; },
    };
    handler = makeHandler();
  });

  it("congratulates and points to the next lesson on a correct answer", async () => {
    await run(`run ${curriculum.first().referenceQuery}`);

    expect(last()).toContain("Perfect! Lesson 1.1 completed.");
    expect(last()).toContain("Type 'advance' to continue to lesson 1.2: WHERE - Filtering Rows");
  });

  it("shows SQL errors in an error box", async () => {
    await run("SELEC * FROM campaigns");

    expect(last()).toContain("SQL Error:\n");
    expect(last()).toContain("ERROR");
  });

  it("reports an unknown lesson", async () => {
    await run("lesson 9.9");
    expect(last()).toContain("Lesson '9.9' not found. Use a format like '1.2' or '3.1'");

    await run("lesson abc");
    expect(last()).toContain("Lesson 'abc' not found.");
    expect(session.currentLesson.id).toBe("1.1");
  });

  it("jumps, clears the screen and shows the lesson", async () => {
    await run("lesson 3.2");

    expect(session.currentLesson.id).toBe("3.2");
    expect(output.clears).toBe(1);
    expect(last()).toContain("Lesson 3.2: LEFT JOIN - Keep All Left Rows");
  });

  it("refuses to advance an unsolved lesson", async () => {
    await run("advance");

    expect(last()).toContain("Lesson 1.1 is not completed yet. Solve it, or use 'skip' to move on");
  });

  it("congratulates at the end of the curriculum", async () => {
    await run("lesson 4.3");
    await run("skip");

    expect(last()).toContain("Congratulations! You've reached the end of the curriculum.");
  });

  it("asks for a query before explaining", async () => {
    await run("explain");

    expect(last()).toBe("Run a query first, then type 'explain' to see its execution order.");
  });

  it("lists the tables with their row counts", async () => {
    await run("tables");

    expect(last()).toContain(`  ${"campaigns".padEnd(20)} - 6 rows`);
  });

  it("stops the loop on quit", async () => {
    expect(await run("quit")).toBe(false);
    expect(await run("progress")).toBe(true);
  });

  it("lets unexpected errors through", async () => {
    handler = makeHandler({
      describeSchema: () => { throw new Error("disk gone"); },
      tableCounts: () => [],
    });

    await expect(run("schema")).rejects.toThrow("disk gone");
  });
});
