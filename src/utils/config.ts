import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { z } from "zod";
import { DEFAULT_TOLERANCE, type Tolerance } from "../core/result-comparator";
import { LogLevel, parseLogLevel } from "./logger";

export const CONFIG_FILENAME = "sqlcoach.config.json";

/**
 * Typed config shape after defaults and env resolution.
 */
export interface CoachConfig {
  dataDir: string;
  progressFile: string;
  logFile: string;
  logLevel: LogLevel;
  tolerance: Tolerance;
  maxColumnWidth: number;
  color: boolean;
}

const rawConfigSchema = z.object({
  dataDir: z.string().min(1).optional(),
  progressFile: z.string().min(1).optional(),
  logFile: z.string().min(1).optional(),
  logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
  tolerance: z.object({
    absolute: z.number().nonnegative().optional(),
    relative: z.number().nonnegative().optional(),
  }).optional(),
  maxColumnWidth: z.number().int().min(4).optional(),
  color: z.boolean().optional(),
});

type RawConfig = z.infer<typeof rawConfigSchema>;

const DEFAULT_MAX_COLUMN_WIDTH = 20;

export interface ConfigEnvironment {
  cwd: string;
  homeDir: string;
  env: Record<string, string | undefined>;
}

/**
 * Configuration Manager
 *
 * Reads sqlcoach.config.json, resolves ${ENV_VAR} patterns and
 * returns a typed config object. If the file is missing or malformed
 * the defaults apply, so the coach always starts.
 *
 * Search order:
 *   1. Working directory  (per-project config)
 *   2. Data directory     (~/.sql-coach or $SQL_COACH_DATA_DIR)
 */
export class ConfigManager {
  private _config: CoachConfig;
  private readonly _environment: ConfigEnvironment;

  constructor(environment?: Partial<ConfigEnvironment>) {
    this._environment = {
      cwd: environment?.cwd ?? process.cwd(),
      homeDir: environment?.homeDir ?? os.homedir(),
      env: environment?.env ?? process.env,
    };
    this._config = this._applyDefaults({});
  }

  /**
   * Load (or reload) config. Safe to call multiple times -- always re-reads from disk.
   */
  async loadConfig(): Promise<CoachConfig> {
    const candidates = [
      path.join(this._environment.cwd, CONFIG_FILENAME),
      path.join(this._defaultDataDir(), CONFIG_FILENAME),
    ];

    for (const configPath of candidates) {
      let text: string;
      try {
        text = await fs.readFile(configPath, "utf-8");
      } catch (err: unknown) {
        if (isNotFound(err)) { continue; }
        console.warn(`[ConfigManager] Error reading ${configPath}:`, err);
        continue;
      }

      const raw = this._parse(configPath, text);
      if (raw) {
        this._config = this._applyDefaults(raw);
        return this._config;
      }
    }

    this._config = this._applyDefaults({});
    return this._config;
  }

  /** Return already-loaded config (call loadConfig first). */
  get config(): CoachConfig {
    return this._config;
  }

  // ---- internal helpers ----

  private _parse(configPath: string, text: string): RawConfig | null {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      console.warn(`[ConfigManager] ${configPath} is not valid JSON -- ignoring it:`, err);
      return null;
    }

    const parsed = rawConfigSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      console.warn(`[ConfigManager] ${configPath} has invalid settings (${issues}) -- ignoring it`);
      return null;
    }
    return parsed.data;
  }

  private _applyDefaults(raw: RawConfig): CoachConfig {
    const dataDir = raw.dataDir
      ? this._resolvePath(raw.dataDir)
      : this._defaultDataDir();
    const noColor = this._environment.env.NO_COLOR !== undefined;

    return {
      dataDir,
      progressFile: raw.progressFile
        ? this._resolvePath(raw.progressFile)
        : path.join(dataDir, "progress.json"),
      logFile: raw.logFile
        ? this._resolvePath(raw.logFile)
        : path.join(dataDir, "sql-coach.log"),
      logLevel: parseLogLevel(raw.logLevel ?? "info") ?? LogLevel.INFO,
      tolerance: {
        absolute: raw.tolerance?.absolute ?? DEFAULT_TOLERANCE.absolute,
        relative: raw.tolerance?.relative ?? DEFAULT_TOLERANCE.relative,
      },
      maxColumnWidth: raw.maxColumnWidth ?? DEFAULT_MAX_COLUMN_WIDTH,
      color: noColor ? false : raw.color ?? true,
    };
  }

  private _defaultDataDir(): string {
    const fromEnv = this._environment.env.SQL_COACH_DATA_DIR;
    if (fromEnv) { return path.resolve(this._environment.cwd, fromEnv); }
    return path.join(this._environment.homeDir, ".sql-coach");
  }

  /** Resolve env vars and a leading "~", relative to the working directory. */
  private _resolvePath(value: string): string {
    let resolved = this._resolveEnvVars(value);
    if (resolved === "~" || resolved.startsWith("~/")) {
      resolved = path.join(this._environment.homeDir, resolved.slice(1));
    }
    return path.resolve(this._environment.cwd, resolved);
  }

  /**
   * Replace ${ENV_VAR} patterns with environment values.
   * Returns the original string if the env var is not set.
   */
  private _resolveEnvVars(value: string): string {
    return value.replace(/\$\{([^}]+)\}/g, (match, varName: string) => {
      const envValue = this._environment.env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      console.warn(`[ConfigManager] Env var ${varName} not set`);
      return match;
    });
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
