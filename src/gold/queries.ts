/**
 * Read-side queries over the gold store.
 */
import type { DatabaseBackend } from "../db/backend.js";
import { extractPart, jsonArrayElements } from "../db/dialect.js";
import type { TableRegistry } from "../db/identifiers.js";
import { parseSqlTimestamp, toSqlTimestamp } from "../db/timestamps.js";
import { decodeStringList } from "../stages/rows.js";
import { compileFilter, type ArticleFilter } from "./filters.js";

export interface RecentArticle {
  title: string | null;
  author: string | null;
  tags: string[];
  datePublished: Date | null;
  dateModified: Date | null;
}

export interface OverviewMetrics {
  total: number;
  lastSixMonths: number;
  topAuthor: string | null;
  topTag: string | null;
}

export interface MonthCount {
  year: number;
  month: number;
  articles: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export async function recentArticles(
  db: DatabaseBackend,
  tables: TableRegistry,
  filter: ArticleFilter,
  limit = 20,
): Promise<RecentArticle[]> {
  const gold = tables.get("gold");
  const where = compileFilter(filter, db.dialect);
  const rows = await db.query<Record<string, unknown>>(
    `SELECT title, author, tags, date_published, date_modified FROM ${gold.sql}
     ${where.sql}
     ORDER BY date_published DESC
     LIMIT ?`,
    [...where.params, limit],
  );
  return rows.map((r) => ({
    title: r.title == null ? null : String(r.title),
    author: r.author == null ? null : String(r.author),
    tags: decodeStringList(r.tags),
    datePublished: parseSqlTimestamp(r.date_published),
    dateModified: parseSqlTimestamp(r.date_modified),
  }));
}

export async function overviewMetrics(
  db: DatabaseBackend,
  tables: TableRegistry,
  now: Date = new Date(),
): Promise<OverviewMetrics> {
  const gold = tables.get("gold");
  const monthStart = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1);
  const since = toSqlTimestamp(new Date(monthStart - 180 * DAY_MS));

  const total = await db.queryOne<{ n: unknown }>(`SELECT COUNT(*) AS n FROM ${gold.sql}`);
  const recent = await db.queryOne<{ n: unknown }>(
    `SELECT COUNT(*) AS n FROM ${gold.sql} WHERE date_published >= ?`,
    [since],
  );
  const author = await db.queryOne<{ author: unknown }>(
    `SELECT author, COUNT(*) AS n FROM ${gold.sql}
     WHERE author IS NOT NULL
     GROUP BY author ORDER BY n DESC, author LIMIT 1`,
  );
  const tag = await db.queryOne<{ tag: unknown }>(
    `SELECT value AS tag, COUNT(*) AS n FROM ${gold.sql} g, ${jsonArrayElements(db.dialect, "g.tags")}
     GROUP BY value ORDER BY n DESC, tag LIMIT 1`,
  );

  return {
    total: Number(total?.n ?? 0),
    lastSixMonths: Number(recent?.n ?? 0),
    topAuthor: author?.author == null ? null : String(author.author),
    topTag: tag?.tag == null ? null : String(tag.tag),
  };
}

/** Articles per author, most prolific first. */
export async function articlesByAuthor(
  db: DatabaseBackend,
  tables: TableRegistry,
  limit = 10,
): Promise<{ author: string; articles: number }[]> {
  const gold = tables.get("gold");
  const rows = await db.query<{ author: unknown; n: unknown }>(
    `SELECT author, COUNT(*) AS n FROM ${gold.sql}
     WHERE author IS NOT NULL
     GROUP BY author ORDER BY n DESC, author LIMIT ?`,
    [limit],
  );
  return rows.map((r) => ({ author: String(r.author), articles: Number(r.n) }));
}

/** Distinct authors, alphabetical. Feeds the author filter. */
export async function listAuthors(db: DatabaseBackend, tables: TableRegistry): Promise<string[]> {
  const gold = tables.get("gold");
  const rows = await db.query<{ author: unknown }>(
    `SELECT DISTINCT author FROM ${gold.sql} WHERE author IS NOT NULL ORDER BY author`,
  );
  return rows.map((r) => String(r.author));
}

/** Distinct tags across all articles, alphabetical. */
export async function listTags(db: DatabaseBackend, tables: TableRegistry): Promise<string[]> {
  const gold = tables.get("gold");
  const rows = await db.query<{ tag: unknown }>(
    `SELECT DISTINCT value AS tag FROM ${gold.sql} g, ${jsonArrayElements(db.dialect, "g.tags")}
     ORDER BY tag`,
  );
  return rows.map((r) => String(r.tag));
}

/**
 * Publication counts per month between `start` and `end`, with months
 * lacking articles filled in as zero between the first and last month
 * that has any.
 */
export async function articlesPerMonth(
  db: DatabaseBackend,
  tables: TableRegistry,
  start: Date,
  end: Date,
): Promise<MonthCount[]> {
  const gold = tables.get("gold");
  const year = extractPart(db.dialect, "year", "date_published");
  const month = extractPart(db.dialect, "month", "date_published");
  const rows = await db.query<{ year: unknown; month: unknown; n: unknown }>(
    `SELECT ${year} AS year, ${month} AS month, COUNT(*) AS n FROM ${gold.sql}
     WHERE date_published BETWEEN ? AND ?
     GROUP BY 1, 2 ORDER BY 1, 2`,
    [toSqlTimestamp(start), toSqlTimestamp(end)],
  );
  const counts = rows.map((r) => ({
    year: Number(r.year),
    month: Number(r.month),
    articles: Number(r.n),
  }));
  const first = counts[0];
  const last = counts[counts.length - 1];
  if (!first || !last) return [];

  const byMonth = new Map(counts.map((c) => [c.year * 12 + c.month - 1, c.articles]));
  const filled: MonthCount[] = [];
  for (let m = first.year * 12 + first.month - 1; m <= last.year * 12 + last.month - 1; m++) {
    filled.push({ year: Math.floor(m / 12), month: (m % 12) + 1, articles: byMonth.get(m) ?? 0 });
  }
  return filled;
}
