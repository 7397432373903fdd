/**
 * Abstract database backend interface.
 *
 * All implementations use raw SQL, no ORM. Placeholders are always `?`.
 */

export type SqlDialect = "sqlite" | "postgres";

export type SqlValue = string | number | bigint | boolean | null;

export type Row = Record<string, unknown>;

export interface DatabaseBackend {
  readonly dialect: SqlDialect;

  /** Execute a write statement and return the affected row count. */
  execute(sql: string, params?: SqlValue[]): Promise<number>;

  /** Execute one statement per parameter row. */
  executeMany(sql: string, rows: SqlValue[][]): Promise<number>;

  /** Run a SELECT and return all matching rows. */
  query<T = Row>(sql: string, params?: SqlValue[]): Promise<T[]>;

  /** Run a SELECT and return the first row, or null. */
  queryOne<T = Row>(sql: string, params?: SqlValue[]): Promise<T | null>;

  /** Execute `fn` inside a transaction. */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}
