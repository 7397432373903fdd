/**
 * Row codecs between stage records and SQL rows.
 *
 * Nested columns are JSON text in every store; timestamps are bound as
 * UTC `YYYY-MM-DD HH:MM:SS` text.
 */
import { z } from "zod";
import type {
  ArticleRecord,
  ContentLink,
  ContentLinkRecord,
  GoldArticleRecord,
  SilverArticleRecord,
} from "../core/types.js";
import type { SqlValue } from "../db/backend.js";
import { parseSqlTimestamp, toSqlTimestampOrNull } from "../db/timestamps.js";

const StringListSchema = z.array(z.string());
const ContentLinkListSchema = z.array(z.object({ text: z.string(), link: z.string() }));

function parseJsonColumn<T>(schema: z.ZodType<T>, value: unknown, fallback: T): T {
  if (value == null || value === "") return fallback;
  const raw: unknown = typeof value === "string" ? JSON.parse(value) : value;
  return schema.parse(raw);
}

export function decodeStringList(value: unknown): string[] {
  return parseJsonColumn(StringListSchema, value, []);
}

export function decodeContentLinks(value: unknown): ContentLink[] {
  return parseJsonColumn(ContentLinkListSchema, value, []);
}

function text(value: unknown): string | null {
  return value == null ? null : String(value);
}

function int(value: unknown): number | null {
  if (value == null) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

// ---------------------------------------------------------------------------
// Bronze
// ---------------------------------------------------------------------------

/** Values in BRONZE_COLUMNS order. */
export function bronzeValues(a: ArticleRecord): SqlValue[] {
  return [
    a.url,
    a.title,
    toSqlTimestampOrNull(a.datePublished),
    toSqlTimestampOrNull(a.dateModified),
    a.author,
    JSON.stringify(a.tags),
    JSON.stringify(a.contentLinks),
    JSON.stringify(a.content),
    a.year,
    a.month,
  ];
}

export function articleFromRow(row: Record<string, unknown>): ArticleRecord {
  return {
    url: String(row.url),
    title: text(row.title),
    datePublished: parseSqlTimestamp(row.date_published),
    dateModified: parseSqlTimestamp(row.date_modified),
    author: text(row.author),
    tags: decodeStringList(row.tags),
    contentLinks: decodeContentLinks(row.content_links),
    content: decodeStringList(row.content),
    year: int(row.year),
    month: int(row.month),
  };
}

// ---------------------------------------------------------------------------
// Silver
// ---------------------------------------------------------------------------

/** Values in SILVER_COLUMNS order. */
export function silverValues(s: SilverArticleRecord): SqlValue[] {
  return [
    s.rowId,
    s.url,
    s.domain,
    s.category,
    s.urlTitle,
    toSqlTimestampOrNull(s.datePublished),
    toSqlTimestampOrNull(s.dateModified),
    s.daysBetweenPublishedModified,
    s.title,
    s.author,
    JSON.stringify(s.tags),
    JSON.stringify(s.contentLinks),
    JSON.stringify(s.content),
    s.contentParagraphs,
    s.totalContentWords,
    s.year,
    s.month,
  ];
}

export function silverFromRow(row: Record<string, unknown>): SilverArticleRecord {
  return {
    ...articleFromRow(row),
    rowId: String(row.row_id),
    domain: text(row.domain) ?? "",
    category: text(row.category) ?? "",
    urlTitle: text(row.url_title) ?? "",
    daysBetweenPublishedModified: int(row.days_between_published_modified),
    contentParagraphs: int(row.content_paragraphs) ?? 0,
    totalContentWords: int(row.total_content_words) ?? 0,
  };
}

/** Values in SILVER_LINK_COLUMNS order. */
export function contentLinkValues(l: ContentLinkRecord): SqlValue[] {
  return [l.rowId, l.url, l.alias, l.link, toSqlTimestampOrNull(l.dateModified)];
}

export function contentLinkFromRow(row: Record<string, unknown>): ContentLinkRecord {
  return {
    rowId: String(row.row_id),
    url: String(row.url),
    alias: text(row.alias) ?? "",
    link: String(row.link),
    dateModified: parseSqlTimestamp(row.date_modified),
  };
}

// ---------------------------------------------------------------------------
// Gold
// ---------------------------------------------------------------------------

/** Values in GOLD_COLUMNS order. */
export function goldValues(g: GoldArticleRecord): SqlValue[] {
  return [
    g.rowId,
    g.url,
    g.domain,
    g.category,
    g.urlTitle,
    toSqlTimestampOrNull(g.datePublished),
    toSqlTimestampOrNull(g.dateModified),
    g.daysBetweenPublishedModified,
    g.title,
    g.author,
    g.tags,
    g.contentLinks,
    g.content,
    g.contentParagraphs,
    g.totalContentWords,
    g.year,
    g.month,
  ];
}

export function goldFromRow(row: Record<string, unknown>): GoldArticleRecord {
  return {
    rowId: String(row.row_id),
    url: String(row.url),
    domain: text(row.domain) ?? "",
    category: text(row.category) ?? "",
    urlTitle: text(row.url_title) ?? "",
    datePublished: parseSqlTimestamp(row.date_published),
    dateModified: parseSqlTimestamp(row.date_modified),
    daysBetweenPublishedModified: int(row.days_between_published_modified),
    title: text(row.title),
    author: text(row.author),
    tags: text(row.tags) ?? "[]",
    contentLinks: text(row.content_links) ?? "[]",
    content: text(row.content) ?? "[]",
    contentParagraphs: int(row.content_paragraphs) ?? 0,
    totalContentWords: int(row.total_content_words) ?? 0,
    year: int(row.year),
    month: int(row.month),
  };
}
