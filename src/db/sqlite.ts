/**
 * SQLite database backend using better-sqlite3.
 */
import Database from "better-sqlite3";
import type { DatabaseBackend, Row, SqlValue } from "./backend.js";

type BindValue = string | number | bigint | null;

function bind(params: SqlValue[]): BindValue[] {
  return params.map((p) => (typeof p === "boolean" ? (p ? 1 : 0) : p));
}

export class SQLiteBackend implements DatabaseBackend {
  readonly dialect = "sqlite" as const;
  private path: string;
  private db: Database.Database | null = null;

  constructor(path: string = ":memory:") {
    this.path = path;
  }

  private connect(): Database.Database {
    if (!this.db) {
      this.db = new Database(this.path);
      if (this.path !== ":memory:") this.db.pragma("journal_mode = WAL");
    }
    return this.db;
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<number> {
    return this.connect().prepare(sql).run(...bind(params)).changes;
  }

  async executeMany(sql: string, rows: SqlValue[][]): Promise<number> {
    const stmt = this.connect().prepare(sql);
    let changes = 0;
    for (const row of rows) {
      changes += stmt.run(...bind(row)).changes;
    }
    return changes;
  }

  async query<T = Row>(sql: string, params: SqlValue[] = []): Promise<T[]> {
    return this.connect().prepare(sql).all(...bind(params)) as T[];
  }

  async queryOne<T = Row>(
    sql: string,
    params: SqlValue[] = [],
  ): Promise<T | null> {
    const row = this.connect().prepare(sql).get(...bind(params));
    return (row as T) ?? null;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const db = this.connect();
    db.exec("BEGIN");
    try {
      const result = await fn();
      db.exec("COMMIT");
      return result;
    } catch (err) {
      db.exec("ROLLBACK");
      throw err;
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
