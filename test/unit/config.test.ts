import { describe, it, expect, vi, beforeEach, afterEach, afterAll } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { CONFIG_FILENAME, ConfigManager } from "../../src/utils/config";
import { LogLevel } from "../../src/utils/logger";

describe("ConfigManager", () => {
  let root: string;
  let cwd: string;
  let home: string;
  const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "sql-coach-config-"));
    cwd = path.join(root, "project");
    home = path.join(root, "home");
    await fs.mkdir(cwd, { recursive: true });
    await fs.mkdir(path.join(home, ".sql-coach"), { recursive: true });
    warn.mockClear();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  afterAll(() => {
    warn.mockRestore();
  });

  async function writeConfig(dir: string, content: unknown): Promise<void> {
    const text = typeof content === "string" ? content : JSON.stringify(content);
    await fs.writeFile(path.join(dir, CONFIG_FILENAME), text, "utf-8");
  }

  it("falls back to defaults when no config file exists", async () => {
    const config = await new ConfigManager({ cwd, homeDir: home, env: {} }).loadConfig();

    const dataDir = path.join(home, ".sql-coach");
    expect(config).toEqual({
      dataDir,
      progressFile: path.join(dataDir, "progress.json"),
      logFile: path.join(dataDir, "sql-coach.log"),
      logLevel: LogLevel.INFO,
      tolerance: { absolute: 1e-6, relative: 1e-9 },
      maxColumnWidth: 20,
      color: true,
    });
    expect(warn).not.toHaveBeenCalled();
  });

  it("reads the working directory config first", async () => {
    await writeConfig(cwd, { logLevel: "debug", maxColumnWidth: 30 });
    await writeConfig(path.join(home, ".sql-coach"), { logLevel: "error" });

    const config = await new ConfigManager({ cwd, homeDir: home, env: {} }).loadConfig();

    expect(config.logLevel).toBe(LogLevel.DEBUG);
    expect(config.maxColumnWidth).toBe(30);
  });

  it("falls back to the data directory config", async () => {
    await writeConfig(path.join(home, ".sql-coach"), { tolerance: { absolute: 0.01 } });

    const config = await new ConfigManager({ cwd, homeDir: home, env: {} }).loadConfig();

    expect(config.tolerance).toEqual({ absolute: 0.01, relative: 1e-9 });
  });

  it("takes the data directory from SQL_COACH_DATA_DIR", async () => {
    const config = await new ConfigManager({
      cwd,
      homeDir: home,
      env: { SQL_COACH_DATA_DIR: "state" },
    }).loadConfig();

    expect(config.dataDir).toBe(path.join(cwd, "state"));
    expect(config.progressFile).toBe(path.join(cwd, "state", "progress.json"));
  });

  it("resolves env vars and ~ in paths", async () => {
    await writeConfig(cwd, { progressFile: "${PROGRESS_DIR}/mine.json", logFile: "~/logs/coach.log" });

    const config = await new ConfigManager({
      cwd,
      homeDir: home,
      env: { PROGRESS_DIR: "/srv/coach" },
    }).loadConfig();

    expect(config.progressFile).toBe(path.resolve("/srv/coach/mine.json"));
    expect(config.logFile).toBe(path.join(home, "logs", "coach.log"));
  });

  it("disables color when NO_COLOR is set", async () => {
    await writeConfig(cwd, { color: true });

    const config = await new ConfigManager({ cwd, homeDir: home, env: { NO_COLOR: "1" } }).loadConfig();

    expect(config.color).toBe(false);
  });

  it("ignores a config file that is not JSON", async () => {
    await writeConfig(cwd, "{ broken");

    const config = await new ConfigManager({ cwd, homeDir: home, env: {} }).loadConfig();

    expect(config.maxColumnWidth).toBe(20);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("ignores a config file with invalid settings", async () => {
    await writeConfig(cwd, { logLevel: "loud" });

    const config = await new ConfigManager({ cwd, homeDir: home, env: {} }).loadConfig();

    expect(config.logLevel).toBe(LogLevel.INFO);
    expect(warn.mock.calls[0][0]).toContain("has invalid settings (logLevel:");
  });
});
