/**
 * Silver transformer: bronze articles deduplicated per window and
 * enriched with fields parsed from the url and the body, plus the
 * content-links fanout table.
 */
import { randomUUID } from "node:crypto";
import { windowedBackfill, type BackfillResult } from "../core/backfill.js";
import type {
  ArticleRecord,
  ContentLinkRecord,
  SilverArticleRecord,
  Window,
} from "../core/types.js";
import { windowBounds } from "../core/window.js";
import {
  BRONZE_COLUMNS,
  columnList,
  createTableSql,
  placeholders,
  SILVER_COLUMNS,
  SILVER_LINK_COLUMNS,
} from "../db/schema.js";
import { childLogger } from "../logger.js";
import type { StageContext } from "./context.js";
import {
  articleFromRow,
  contentLinkValues,
  silverFromRow,
  silverValues,
} from "./rows.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SilverResult {
  articles: BackfillResult;
  links: BackfillResult;
}

export async function createSilverTables(ctx: StageContext): Promise<void> {
  const dialect = ctx.warehouse.dialect;
  await ctx.warehouse.execute(createTableSql(ctx.tables.get("silver"), SILVER_COLUMNS, dialect));
  await ctx.warehouse.execute(
    createTableSql(ctx.tables.get("silverLinks"), SILVER_LINK_COLUMNS, dialect),
  );
}

/** 1-based segment of `url.split("/")`; negative counts from the end. */
export function splitPart(url: string, index: number): string {
  const parts = url.split("/");
  const i = index > 0 ? index - 1 : parts.length + index;
  return parts[i] ?? "";
}

function utcDay(date: Date): number {
  return Math.floor(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()) / DAY_MS);
}

/** Calendar days from publication to last modification, not clamped. */
export function daysBetween(published: Date | null, modified: Date | null): number | null {
  if (!published || !modified) return null;
  return utcDay(modified) - utcDay(published);
}

export function countWords(paragraphs: string[]): number {
  return paragraphs.reduce(
    (sum, p) => sum + p.split(/\s+/).filter((w) => w.length > 0).length,
    0,
  );
}

export function deriveSilverRow(
  article: ArticleRecord,
  newId: () => string = randomUUID,
): SilverArticleRecord {
  const scheme = splitPart(article.url, 1);
  const host = splitPart(article.url, 3);
  return {
    ...article,
    rowId: newId(),
    domain: scheme || host ? `${scheme}//${host}` : "",
    category: splitPart(article.url, 4),
    urlTitle: splitPart(article.url, -2),
    daysBetweenPublishedModified: daysBetween(article.datePublished, article.dateModified),
    contentParagraphs: article.content.length,
    totalContentWords: countWords(article.content),
    year: article.dateModified ? article.dateModified.getUTCFullYear() : article.year,
    month: article.dateModified ? article.dateModified.getUTCMonth() + 1 : article.month,
  };
}

/** One link record per content link of each silver article. */
export function unnestContentLinks(rows: SilverArticleRecord[]): ContentLinkRecord[] {
  return rows.flatMap((row) =>
    row.contentLinks.map((l) => ({
      rowId: row.rowId,
      url: row.url,
      alias: l.text,
      link: l.link,
      dateModified: row.dateModified,
    })),
  );
}

/**
 * Rebuild the silver window from bronze, then rebuild the content-link
 * fanout for the same window from the fresh silver rows.
 */
export async function backfillSilver(ctx: StageContext, window: Window): Promise<SilverResult> {
  const log = ctx.logger ?? childLogger("silver");
  const db = ctx.warehouse;
  const bronze = ctx.tables.get("bronze");
  const silver = ctx.tables.get("silver");
  const links = ctx.tables.get("silverLinks");
  await createSilverTables(ctx);

  const articles = await windowedBackfill<ArticleRecord, SilverArticleRecord>(
    {
      target: { db, table: silver, timestampColumn: "date_modified" },
      fetch: async (w) =>
        (
          await db.query(
            `SELECT ${columnList(BRONZE_COLUMNS)} FROM ${bronze.sql}
             WHERE date_modified BETWEEN ? AND ? ORDER BY url`,
            windowBounds(w),
          )
        ).map(articleFromRow),
      keyOf: (a) => a.url,
      timestampOf: (a) => a.dateModified,
      transform: (rows) => rows.map((a) => deriveSilverRow(a)),
      insert: (rows) =>
        db.executeMany(
          `INSERT INTO ${silver.sql} (${columnList(SILVER_COLUMNS)})
           VALUES ${placeholders(SILVER_COLUMNS.length)}`,
          rows.map(silverValues),
        ),
      logger: log,
    },
    window,
  );

  const fanout = await windowedBackfill<ContentLinkRecord, ContentLinkRecord>(
    {
      target: { db, table: links, timestampColumn: "date_modified" },
      fetch: async (w) =>
        unnestContentLinks(
          (
            await db.query(
              `SELECT ${columnList(SILVER_COLUMNS)} FROM ${silver.sql}
               WHERE date_modified BETWEEN ? AND ? ORDER BY url`,
              windowBounds(w),
            )
          ).map(silverFromRow),
        ),
      keyOf: (l) => `${l.url}\u0000${l.link}`,
      timestampOf: (l) => l.dateModified,
      transform: (rows) => rows,
      insert: (rows) =>
        db.executeMany(
          `INSERT INTO ${links.sql} (${columnList(SILVER_LINK_COLUMNS)})
           VALUES ${placeholders(SILVER_LINK_COLUMNS.length)}`,
          rows.map(contentLinkValues),
        ),
      logger: log,
    },
    window,
  );

  return { articles, links: fanout };
}
