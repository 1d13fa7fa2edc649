import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { FileLogSink, Logger, LogLevel, MemoryLogSink, parseLogLevel } from "../../src/utils/logger";

const LINE_RE = /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[(\w+)\] (.*)$/;

describe("Logger", () => {
  let sink: MemoryLogSink;

  beforeEach(() => {
    sink = new MemoryLogSink();
  });

  it("writes timestamped, levelled lines with JSON arguments", () => {
    new Logger(sink).info("Lesson 1.1 completed", { hints: 2 });

    const m = LINE_RE.exec(sink.lines[0]);
    expect(m?.[1]).toBe("INFO");
    expect(m?.[2]).toBe('Lesson 1.1 completed {"hints":2}');
  });

  it("drops lines below the minimum level", () => {
    const logger = new Logger(sink, LogLevel.WARN);
    logger.debug("noise");
    logger.info("noise");
    logger.warn("kept");

    expect(sink.lines).toHaveLength(1);
    expect(sink.lines[0]).toContain("[WARN] kept");
  });

  it("appends the stack of an error", () => {
    const err = new Error("boom");
    new Logger(sink).error("Save failed", err);

    expect(sink.lines[0]).toContain('[ERROR] Save failed "boom"');
    expect(sink.lines[1]).toBe(err.stack);
  });

  it("parses level names case-insensitively", () => {
    expect(parseLogLevel("Debug")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel("verbose")).toBeUndefined();
  });

  describe("FileLogSink", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "sql-coach-log-"));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it("creates the directory and appends lines", async () => {
      const file = path.join(dir, "logs", "sql-coach.log");
      const fileSink = new FileLogSink(file);
      fileSink.appendLine("first");
      fileSink.appendLine("second");

      expect(await fs.readFile(file, "utf-8")).toBe("first\nsecond\n");
    });

    it("turns file logging off after one warning when the path is unusable", async () => {
      const blocker = path.join(dir, "blocker");
      await fs.writeFile(blocker, "");
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      try {
        const fileSink = new FileLogSink(path.join(blocker, "sql-coach.log"));
        const logger = new Logger(fileSink);

        expect(() => logger.info("first")).not.toThrow();
        expect(() => logger.error("second", new Error("boom"))).not.toThrow();
        expect(fileSink.disabled).toBe(true);
        expect(warn).toHaveBeenCalledTimes(1);
        expect(String(warn.mock.calls[0][0])).toContain(
          `[sql-coach] Cannot write log file ${path.join(blocker, "sql-coach.log")}, file logging is off:`,
        );
      } finally {
        warn.mockRestore();
      }
    });
  });
});
