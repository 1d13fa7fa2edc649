import * as fs from "fs/promises";
import * as path from "path";
import initSqlJs, { type Database, type Statement } from "sql.js";
import { maskComments } from "../core/execution-order";
import type { QueryOutcome, QueryResult, ScalarValue } from "./schema";

/** data/ at the project root, seen from src/db or dist/db. */
export const DEFAULT_DATA_DIR = path.resolve(__dirname, "..", "..", "data");

const SCHEMA_FILE = "schema.sql";
const SEED_FILE = "seed.sql";

/**
 * Statements that could lift the read-only lock, matched with comments
 * masked. A pragma name may be quoted, so literals are left in place.
 */
const LOCK_RE = /^\s*(?:attach|detach)\b|^\s*pragma\b[\s\S]*\bquery_only\b/i;

/**
 * Runs SQL text against the practice dataset.
 */
export interface QueryExecutor {
  execute(sql: string): QueryOutcome;
}

export interface ColumnInfo {
  name: string;
  type: string;
  primaryKey: boolean;
  notNull: boolean;
  references: { table: string; column: string } | null;
}

export interface TableInfo {
  name: string;
  columns: ColumnInfo[];
}

/**
 * Query executor backed by sql.js (WASM SQLite).
 *
 * The dataset is built in memory from data/schema.sql and data/seed.sql
 * on every start, then locked with `PRAGMA query_only` so lessons can
 * never modify it.
 */
export class SqlJsQueryExecutor implements QueryExecutor {
  private _db: Database | null = null;

  /**
   * Initialize the database: load the WASM module, create the tables
   * and seed the sample rows.
   */
  async initialize(dataDir: string = DEFAULT_DATA_DIR): Promise<void> {
    const SQL = await initSqlJs();
    const [schemaSql, seedSql] = await Promise.all([
      fs.readFile(path.join(dataDir, SCHEMA_FILE), "utf-8"),
      fs.readFile(path.join(dataDir, SEED_FILE), "utf-8"),
    ]);

    const db = new SQL.Database();
    db.run(schemaSql);
    db.run(seedSql);
    db.run("PRAGMA query_only = ON");
    this._db = db;
  }

  close(): void {
    if (this._db) {
      this._db.close();
      this._db = null;
    }
  }

  private get db(): Database {
    if (!this._db) { throw new Error("Query executor not initialized"); }
    return this._db;
  }

  /**
   * Execute the first statement of `sql`. Failures (syntax errors,
   * unknown columns, write attempts) come back as `{ ok: false }` with
   * the engine's message.
   */
  execute(sql: string): QueryOutcome {
    const text = sql.trim();
    if (text === "") {
      return { ok: false, message: "No SQL to run" };
    }
    if (LOCK_RE.test(maskComments(text))) {
      return { ok: false, message: "The practice database is read-only" };
    }
    return this._run(text);
  }

  private _run(text: string): QueryOutcome {
    const db = this.db;
    let stmt: Statement | null = null;
    try {
      stmt = db.prepare(text);
      const columns = stmt.getColumnNames();
      const rows: ScalarValue[][] = [];
      while (stmt.step()) {
        rows.push(stmt.get());
      }
      return { ok: true, result: { columns, rows } };
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, message: message || "Query failed" };
    } finally {
      stmt?.free();
    }
  }

  // ================================================================
  // Dataset introspection (schema / tables commands)
  // ================================================================

  tableNames(): string[] {
    const result = this._query(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY rowid",
    );
    return result.rows.map((r) => String(r[0]));
  }

  describeSchema(): TableInfo[] {
    return this.tableNames().map((table) => {
      const fks = this._query(`PRAGMA foreign_key_list(${quoteIdentifier(table)})`);
      const fkFrom = fks.columns.indexOf("from");
      const fkTable = fks.columns.indexOf("table");
      const fkTo = fks.columns.indexOf("to");
      const references = new Map<string, { table: string; column: string }>();
      for (const row of fks.rows) {
        references.set(String(row[fkFrom]), { table: String(row[fkTable]), column: String(row[fkTo]) });
      }

      const info = this._query(`PRAGMA table_info(${quoteIdentifier(table)})`);
      const col = (name: string) => info.columns.indexOf(name);
      const columns = info.rows.map((row): ColumnInfo => {
        const name = String(row[col("name")]);
        return {
          name,
          type: String(row[col("type")]),
          primaryKey: Number(row[col("pk")]) > 0,
          notNull: Number(row[col("notnull")]) === 1,
          references: references.get(name) ?? null,
        };
      });

      return { name: table, columns };
    });
  }

  tableCounts(): { table: string; rows: number }[] {
    return this.tableNames().map((table) => {
      const result = this._query(`SELECT COUNT(*) FROM ${quoteIdentifier(table)}`);
      return { table, rows: Number(result.rows[0]?.[0] ?? 0) };
    });
  }

  private _query(sql: string): QueryResult {
    const outcome = this._run(sql);
    if (!outcome.ok) {
      throw new Error(`Introspection query failed: ${outcome.message}`);
    }
    return outcome.result;
  }
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
