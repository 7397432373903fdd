/**
 * Sitemap ingestion: discover article urls into the url table, then
 * scrape the articles of a window into raw partition files.
 */
import { SitemapUrlError } from "../core/exceptions.js";
import { stagingUpsert, type UpsertResult } from "../core/staging.js";
import type { ArticleRecord, UrlRecord, Window } from "../core/types.js";
import { monthsInWindow, windowBounds } from "../core/window.js";
import type { SqlValue } from "../db/backend.js";
import { extractPart } from "../db/dialect.js";
import { createTableSql, URL_COLUMNS } from "../db/schema.js";
import { parseSqlTimestamp, toSqlTimestamp } from "../db/timestamps.js";
import { childLogger, errorMessage } from "../logger.js";
import { writePartitioned } from "../storage/partitions.js";
import type { StageContext } from "./context.js";
import type { SitemapSource } from "./source.js";

export interface SitemapIngestResult extends UpsertResult {
  discovered: number;
  incomplete: number;
}

export interface SitemapIndexResult extends SitemapIngestResult {
  sitemaps: string[];
}

export interface ScrapeResult {
  months: number;
  parsed: number;
  skipped: number;
  failed: { url: string; error: string }[];
  files: string[];
}

export interface UrlTableSummary {
  total: number;
  distribution: { year: number; month: number; count: number }[];
}

export async function createUrlTable(ctx: StageContext): Promise<void> {
  await ctx.warehouse.execute(
    createTableSql(ctx.tables.get("sitemapUrls"), URL_COLUMNS, ctx.warehouse.dialect),
  );
}

/**
 * Parse the sitemap at `indexUrl` and upsert its entries into the url
 * table. Entries without a last-modified date are dropped.
 */
export async function ingestSitemap(
  ctx: StageContext,
  source: SitemapSource,
  indexUrl: string = ctx.site.sitemapUrl,
): Promise<SitemapIngestResult> {
  const log = ctx.logger ?? childLogger("sitemap");
  await createUrlTable(ctx);

  const entries = await source.parseSiteMapIndex(indexUrl);
  const complete = entries.filter(
    (e): e is UrlRecord & { lastModified: Date } => e.url !== "" && e.lastModified !== null,
  );
  log.info(
    { indexUrl, discovered: entries.length, incomplete: entries.length - complete.length },
    "Parsed sitemap",
  );

  const rows: SqlValue[][] = complete.map((e) => [e.url, toSqlTimestamp(e.lastModified)]);
  const result = await stagingUpsert(
    ctx.warehouse,
    {
      table: ctx.tables.get("sitemapUrls"),
      columns: URL_COLUMNS,
      key: "url",
      changeColumn: "last_modified",
    },
    rows,
    { logger: log },
  );
  return {
    ...result,
    discovered: entries.length,
    incomplete: entries.length - complete.length,
  };
}

/** Ingest every child sitemap listed by a sitemap index, in listed order. */
export async function ingestSitemapIndex(
  ctx: StageContext,
  source: SitemapSource,
  indexUrl: string,
): Promise<SitemapIndexResult> {
  const log = ctx.logger ?? childLogger("sitemap");
  const sitemaps = (await source.listPages(indexUrl)).filter((loc) =>
    loc.toLowerCase().endsWith(".xml"),
  );
  log.info({ indexUrl, sitemaps: sitemaps.length }, "Listed sitemap index");

  const result: SitemapIndexResult = { staged: 0, inserted: 0, discovered: 0, incomplete: 0, sitemaps };
  for (const sitemap of sitemaps) {
    const r = await ingestSitemap(ctx, source, sitemap);
    result.staged += r.staged;
    result.inserted += r.inserted;
    result.discovered += r.discovered;
    result.incomplete += r.incomplete;
  }
  return result;
}

/** Urls whose last modification falls in the given month. */
export async function queryMonthUrls(
  ctx: StageContext,
  year: number,
  month: number,
): Promise<UrlRecord[]> {
  const table = ctx.tables.get("sitemapUrls");
  const rows = await ctx.warehouse.query<{ url: string; last_modified: unknown }>(
    `SELECT DISTINCT url, last_modified FROM ${table.sql}
     WHERE ${extractPart(ctx.warehouse.dialect, "year", "last_modified")} = ?
       AND ${extractPart(ctx.warehouse.dialect, "month", "last_modified")} = ?
     ORDER BY url`,
    [year, month],
  );
  return rows.map((r) => ({ url: r.url, lastModified: parseSqlTimestamp(r.last_modified) }));
}

/** Whether `url` is an article page worth scraping. */
export function isArticleUrl(url: string, site: StageContext["site"]): boolean {
  if (url === site.baseUrl) return false;
  const lower = url.toLowerCase();
  return !site.excludedSuffixes.some((suffix) => lower.endsWith(`.${suffix.toLowerCase()}`));
}

/**
 * Scrape every article url of the window and write the parsed records
 * to raw partitions, one file per scraped month. A page that fails to
 * parse is reported and the rest continue.
 */
export async function scrapeWindow(
  ctx: StageContext,
  source: SitemapSource,
  window: Window,
): Promise<ScrapeResult> {
  const log = ctx.logger ?? childLogger("sitemap");
  const result: ScrapeResult = { months: 0, parsed: 0, skipped: 0, failed: [], files: [] };

  for (const { year, month } of monthsInWindow(window)) {
    result.months++;
    const urls = await queryMonthUrls(ctx, year, month);
    log.info({ year, month, urls: urls.length }, "Scraping month");

    const records: ArticleRecord[] = [];
    for (const { url } of urls) {
      if (!isArticleUrl(url, ctx.site)) {
        result.skipped++;
        continue;
      }
      try {
        records.push(await source.parseUrl(url));
      } catch (err) {
        log.warn({ url, err: errorMessage(err) }, "Failed to parse article");
        result.failed.push({ url, error: errorMessage(err) });
      }
    }

    result.parsed += records.length;
    if (records.length === 0) continue;
    const files = await writePartitioned(
      ctx.storage,
      records,
      ctx.settings.rawPath,
      ["year", "month"],
      `part-${year}-${String(month).padStart(2, "0")}`,
    );
    result.files.push(...files);
  }

  log.info(
    { parsed: result.parsed, failed: result.failed.length, files: result.files.length },
    "Scrape finished",
  );
  return result;
}

/** Row count and year/month distribution of the url table. */
export async function checkUrlTable(
  ctx: StageContext,
  window?: Window,
): Promise<UrlTableSummary> {
  const log = ctx.logger ?? childLogger("sitemap");
  const table = ctx.tables.get("sitemapUrls");
  const dialect = ctx.warehouse.dialect;
  const where = window ? "WHERE last_modified BETWEEN ? AND ?" : "";
  const params: SqlValue[] = window ? windowBounds(window) : [];

  const total = await ctx.warehouse.queryOne<{ n: unknown }>(
    `SELECT COUNT(*) AS n FROM ${table.sql} ${where}`,
    params,
  );
  const rows = await ctx.warehouse.query<{ year: unknown; month: unknown; n: unknown }>(
    `SELECT ${extractPart(dialect, "year", "last_modified")} AS year,
            ${extractPart(dialect, "month", "last_modified")} AS month,
            COUNT(*) AS n
     FROM ${table.sql} ${where}
     GROUP BY 1, 2
     ORDER BY 1, 2`,
    params,
  );
  const summary: UrlTableSummary = {
    total: Number(total?.n ?? 0),
    distribution: rows.map((r) => ({
      year: Number(r.year),
      month: Number(r.month),
      count: Number(r.n),
    })),
  };
  log.info(summary, "Url table summary");
  return summary;
}

/**
 * A sitemap url passed on the command line must live on the site host
 * and look like a sitemap document.
 */
export function validateSitemapUrl(url: string, site: StageContext["site"]): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new SitemapUrlError(`Invalid sitemap url: ${url}`);
  }
  const host = new URL(site.baseUrl).host;
  if (parsed.host !== host || !url.includes("sitemap") || !url.includes(".xml")) {
    throw new SitemapUrlError(
      `Sitemap url must be on ${host} and point to a sitemap .xml document: ${url}`,
    );
  }
  return url;
}
