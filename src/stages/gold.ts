/**
 * Gold replicator: copies a silver window from the warehouse into the
 * gold store with portable column types.
 */
import { windowedBackfill, type BackfillResult } from "../core/backfill.js";
import { ReplicationFailedException } from "../core/exceptions.js";
import type { GoldArticleRecord, SilverArticleRecord, Window } from "../core/types.js";
import { windowBounds } from "../core/window.js";
import type { DatabaseBackend, SqlValue } from "../db/backend.js";
import type { TableRef } from "../db/identifiers.js";
import {
  columnList,
  createTableSql,
  GOLD_COLUMNS,
  GOLD_LINK_STATUS_COLUMNS,
  placeholders,
  SILVER_COLUMNS,
  type ColumnDef,
} from "../db/schema.js";
import { childLogger } from "../logger.js";
import type { StageContext } from "./context.js";
import { goldValues, silverFromRow } from "./rows.js";

export async function createGoldTables(ctx: StageContext): Promise<void> {
  const dialect = ctx.gold.dialect;
  await ctx.gold.execute(createTableSql(ctx.tables.get("gold"), GOLD_COLUMNS, dialect));
  await ctx.gold.execute(
    createTableSql(ctx.tables.get("goldLinkStatus"), GOLD_LINK_STATUS_COLUMNS, dialect),
  );
}

export function toGoldRow(s: SilverArticleRecord): GoldArticleRecord {
  return {
    rowId: String(s.rowId),
    url: s.url,
    domain: s.domain,
    category: s.category,
    urlTitle: s.urlTitle,
    datePublished: s.datePublished,
    dateModified: s.dateModified,
    daysBetweenPublishedModified: s.daysBetweenPublishedModified,
    title: s.title,
    author: s.author,
    tags: JSON.stringify(s.tags),
    contentLinks: JSON.stringify(s.contentLinks),
    content: JSON.stringify(s.content),
    contentParagraphs: s.contentParagraphs,
    totalContentWords: s.totalContentWords,
    year: s.year,
    month: s.month,
  };
}

/**
 * Insert rows with one multi-row `INSERT ... VALUES` statement per page
 * of `pageSize` rows. Returns the number of rows written.
 */
export async function insertPaged(
  db: DatabaseBackend,
  table: TableRef,
  columns: ColumnDef[],
  rows: SqlValue[][],
  pageSize: number,
): Promise<number> {
  const row = placeholders(columns.length);
  let written = 0;
  for (let i = 0; i < rows.length; i += pageSize) {
    const page = rows.slice(i, i + pageSize);
    written += await db.execute(
      `INSERT INTO ${table.sql} (${columnList(columns)}) VALUES ${page.map(() => row).join(", ")}`,
      page.flat(),
    );
  }
  return written;
}

export async function replicateGold(ctx: StageContext, window: Window): Promise<BackfillResult> {
  const log = ctx.logger ?? childLogger("gold");
  const silver = ctx.tables.get("silver");
  const gold = ctx.tables.get("gold");
  await createGoldTables(ctx);

  return windowedBackfill<SilverArticleRecord, GoldArticleRecord>(
    {
      target: { db: ctx.gold, table: gold, timestampColumn: "date_modified" },
      fetch: async (w) =>
        (
          await ctx.warehouse.query(
            `SELECT ${columnList(SILVER_COLUMNS)} FROM ${silver.sql}
             WHERE date_modified BETWEEN ? AND ? ORDER BY url`,
            windowBounds(w),
          )
        ).map(silverFromRow),
      keyOf: (s) => s.url,
      timestampOf: (s) => s.dateModified,
      transform: (rows) => rows.map(toGoldRow),
      insert: (rows) =>
        insertPaged(ctx.gold, gold, GOLD_COLUMNS, rows.map(goldValues), ctx.settings.goldPageSize),
      logger: log,
      failure: (table, operation, cause) => new ReplicationFailedException(table, operation, cause),
    },
    window,
  );
}
