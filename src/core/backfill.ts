/**
 * Windowed backfill: replace every target row inside [start, end] with
 * rows recomputed from the source, so a job over a time partition can be
 * re-run without merge logic. Not safe to run concurrently on
 * overlapping windows of the same target.
 */
import type { DatabaseBackend } from "../db/backend.js";
import { quoteIdent, type TableRef } from "../db/identifiers.js";
import { childLogger, errorMessage, type Logger } from "../logger.js";
import { BackfillFailedException } from "./exceptions.js";
import type { Window } from "./types.js";
import { describeWindow, windowBounds } from "./window.js";

export interface BackfillTarget {
  db: DatabaseBackend;
  table: TableRef;
  /** Change-detection timestamp column the window applies to. */
  timestampColumn: string;
}

export interface BackfillSpec<S, T> {
  target: BackfillTarget;
  /** Source rows whose timestamp falls inside the window. */
  fetch(window: Window): Promise<S[]>;
  keyOf(row: S): string;
  timestampOf(row: S): Date | null;
  /** Map deduplicated source rows to target rows. */
  transform(rows: S[]): Promise<T[]> | T[];
  /** Write rows to the target; runs inside the target transaction. */
  insert(rows: T[]): Promise<number>;
  logger?: Logger;
  /** Wraps failures; defaults to BackfillFailedException. */
  failure?: (table: string, operation: string, cause: unknown) => Error;
}

export interface BackfillResult {
  window: Window;
  /** Rows the DELETE reported removing. */
  deleted: number;
  /** Rows counted inside the window just before the DELETE. */
  expectedDeleted: number;
  sourceRows: number;
  deduplicated: number;
  inserted: number;
}

/**
 * Keep one row per key: the one with the latest timestamp. Ties and
 * missing timestamps keep the first row seen. Output follows the order
 * in which keys first appear.
 */
export function rankLatest<S>(
  rows: S[],
  keyOf: (row: S) => string,
  timestampOf: (row: S) => Date | null,
): S[] {
  const best = new Map<string, { row: S; ts: number }>();
  for (const row of rows) {
    const key = keyOf(row);
    const ts = timestampOf(row)?.getTime() ?? Number.NEGATIVE_INFINITY;
    const current = best.get(key);
    if (!current || ts > current.ts) best.set(key, { row, ts });
  }
  return Array.from(best.values(), (entry) => entry.row);
}

function toCount(value: unknown): number {
  const n = Number(value ?? 0);
  return Number.isFinite(n) ? n : 0;
}

export async function windowedBackfill<S, T>(
  spec: BackfillSpec<S, T>,
  window: Window,
): Promise<BackfillResult> {
  const log = spec.logger ?? childLogger("windowed-backfill");
  const fail = spec.failure ?? ((t: string, op: string, cause: unknown) => new BackfillFailedException(t, op, cause));
  const { db, table } = spec.target;
  const ts = quoteIdent(spec.target.timestampColumn);
  const bounds = windowBounds(window);
  let operation = "fetch source rows";

  log.info({ table: table.name, window: describeWindow(window) }, "Backfilling window");

  try {
    const source = await spec.fetch(window);
    operation = "deduplicate source rows";
    const latest = rankLatest(source, spec.keyOf, spec.timestampOf);
    if (latest.length !== source.length) {
      log.info(
        { table: table.name, duplicates: source.length - latest.length },
        "Dropped older versions of duplicate keys",
      );
    }
    operation = "transform source rows";
    const replacement = await spec.transform(latest);

    return await db.transaction(async () => {
      operation = "count window rows";
      const counted = await db.queryOne<{ n: unknown }>(
        `SELECT COUNT(*) AS n FROM ${table.sql} WHERE ${ts} BETWEEN ? AND ?`,
        bounds,
      );
      const expectedDeleted = toCount(counted?.n);

      operation = "delete window rows";
      const deleted = await db.execute(
        `DELETE FROM ${table.sql} WHERE ${ts} BETWEEN ? AND ?`,
        bounds,
      );
      log.info({ table: table.name, deleted }, "Deleted previous rows in window");
      if (deleted !== expectedDeleted) {
        log.warn(
          { table: table.name, deleted, expectedDeleted },
          "Deleted row count differs from pre-delete count",
        );
      }

      operation = "insert replacement rows";
      const inserted = replacement.length > 0 ? await spec.insert(replacement) : 0;
      log.info({ table: table.name, inserted }, "Inserted replacement rows");

      return {
        window,
        deleted,
        expectedDeleted,
        sourceRows: source.length,
        deduplicated: latest.length,
        inserted,
      };
    });
  } catch (err) {
    log.error(
      { table: table.name, operation, err: errorMessage(err) },
      "Backfill failed",
    );
    throw fail(table.name, operation, err);
  }
}
