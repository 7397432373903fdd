/**
 * PostgreSQL database backend using postgres-js.
 *
 * Holds a single connection; statements issued inside `transaction()`
 * run on the transaction's connection. Sessions run in UTC so bound
 * `YYYY-MM-DD HH:MM:SS` text lands in timestamptz columns unshifted.
 */
import postgres from "postgres";
import type { DatabaseBackend, Row, SqlValue } from "./backend.js";

/** Rewrite `?` placeholders to `$1..$n`, leaving quoted text untouched. */
export function toPositional(sql: string): string {
  let out = "";
  let n = 0;
  let quote: "'" | '"' | null = null;
  for (const ch of sql) {
    if (quote) {
      if (ch === quote) quote = null;
      out += ch;
    } else if (ch === "'" || ch === '"') {
      quote = ch;
      out += ch;
    } else if (ch === "?") {
      out += `$${++n}`;
    } else {
      out += ch;
    }
  }
  return out;
}

function bind(params: SqlValue[]): (string | number | boolean | null)[] {
  return params.map((p) => (typeof p === "bigint" ? p.toString() : p));
}

export class PostgresBackend implements DatabaseBackend {
  readonly dialect = "postgres" as const;
  private connectionString: string;
  private sql: postgres.Sql | null = null;
  private active: postgres.TransactionSql | null = null;

  constructor(connectionString: string) {
    this.connectionString = connectionString;
  }

  private pool(): postgres.Sql {
    if (!this.sql) {
      this.sql = postgres(this.connectionString, {
        max: 1,
        onnotice: () => {},
        connection: { TimeZone: "UTC" },
      });
    }
    return this.sql;
  }

  private connect(): postgres.Sql | postgres.TransactionSql {
    return this.active ?? this.pool();
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<number> {
    const result = await this.connect().unsafe(toPositional(sql), bind(params));
    return result.count;
  }

  async executeMany(sql: string, rows: SqlValue[][]): Promise<number> {
    const text = toPositional(sql);
    const conn = this.connect();
    let count = 0;
    for (const row of rows) {
      const result = await conn.unsafe(text, bind(row));
      count += result.count;
    }
    return count;
  }

  async query<T = Row>(sql: string, params: SqlValue[] = []): Promise<T[]> {
    const rows = await this.connect().unsafe(toPositional(sql), bind(params));
    return rows as unknown as T[];
  }

  async queryOne<T = Row>(
    sql: string,
    params: SqlValue[] = [],
  ): Promise<T | null> {
    const rows = await this.query<T>(sql, params);
    return rows[0] ?? null;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const holder: { result?: { value: T } } = {};
    if (this.active) throw new Error("Nested transactions are not supported");
    await this.pool().begin(async (tx) => {
      this.active = tx;
      try {
        holder.result = { value: await fn() };
      } finally {
        this.active = null;
      }
    });
    if (!holder.result) throw new Error("Transaction finished without a result");
    return holder.result.value;
  }

  async close(): Promise<void> {
    if (this.sql) {
      await this.sql.end();
      this.sql = null;
    }
  }
}
