/**
 * Staging-table upsert: load a batch into a transient table, then copy
 * over only the rows whose key is new or whose change column moved.
 * Existing target rows are never rewritten.
 */
import type { DatabaseBackend, SqlValue } from "../db/backend.js";
import { nullSafeEquals } from "../db/dialect.js";
import { quoteIdent, type TableRef } from "../db/identifiers.js";
import {
  columnList,
  insertableColumns,
  placeholders,
  type ColumnDef,
} from "../db/schema.js";
import { childLogger, errorMessage, type Logger } from "../logger.js";
import { UpsertFailedException } from "./exceptions.js";

export interface StagingTarget {
  table: TableRef;
  columns: ColumnDef[];
  /** Natural key column. */
  key: string;
  /** Column compared to detect a changed row. */
  changeColumn: string;
}

export interface UpsertResult {
  staged: number;
  inserted: number;
}

export interface StagingUpsertOptions {
  logger?: Logger;
}

/**
 * Upsert `rows` (values in the order of the target's insertable
 * columns) into `target`. Re-running with identical rows inserts
 * nothing. Empty input is logged and skipped without touching the db.
 */
export async function stagingUpsert(
  db: DatabaseBackend,
  target: StagingTarget,
  rows: SqlValue[][],
  options: StagingUpsertOptions = {},
): Promise<UpsertResult> {
  const log = options.logger ?? childLogger("staging-upsert");
  const table = target.table.name;

  if (rows.length === 0) {
    log.warn({ table }, "No data to upsert");
    return { staged: 0, inserted: 0 };
  }

  const staging = quoteIdent(`${table}_staging`);
  const cols = columnList(target.columns);
  const width = insertableColumns(target.columns).length;
  const key = quoteIdent(target.key);
  const change = quoteIdent(target.changeColumn);
  let operation = "create staging table";

  try {
    return await db.transaction(async () => {
      await db.execute(`DROP TABLE IF EXISTS ${staging}`);
      await db.execute(
        `CREATE TEMP TABLE ${staging} AS SELECT ${cols} FROM ${target.table.sql} WHERE 1 = 0`,
      );
      log.info({ table, staging: `${table}_staging` }, "Created staging table");

      operation = "load staging table";
      const staged = await db.executeMany(
        `INSERT INTO ${staging} (${cols}) VALUES ${placeholders(width)}`,
        rows,
      );
      log.info({ table, staged }, "Loaded batch into staging table");

      operation = "merge staging into target";
      const inserted = await db.execute(
        `INSERT INTO ${target.table.sql} (${cols})
         SELECT DISTINCT ${columnList(target.columns, "s.")}
         FROM ${staging} s
         WHERE NOT EXISTS (
           SELECT 1 FROM ${target.table.sql} t
           WHERE t.${key} = s.${key}
             AND ${nullSafeEquals(db.dialect, `t.${change}`, `s.${change}`)}
         )`,
      );
      log.info({ table, staged, inserted }, "Merged new and changed rows");
      return { staged, inserted };
    });
  } catch (err) {
    log.error({ table, operation, err: errorMessage(err) }, "Upsert failed");
    throw new UpsertFailedException(table, operation, err);
  } finally {
    try {
      await db.execute(`DROP TABLE IF EXISTS ${staging}`);
    } catch (dropErr) {
      log.warn(
        { table, staging: `${table}_staging`, err: errorMessage(dropErr) },
        "Failed to drop staging table",
      );
    }
  }
}
