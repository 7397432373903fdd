/**
 * Table layouts for every stage, rendered per SQL dialect.
 */
import type { SqlDialect } from "./backend.js";
import { quoteIdent, type TableRef } from "./identifiers.js";

export type ColumnType = "text" | "timestamp" | "int" | "bigint" | "json" | "uuid" | "serial";

export interface ColumnDef {
  name: string;
  type: ColumnType;
}

const SQLITE_TYPES: Record<ColumnType, string> = {
  text: "TEXT",
  timestamp: "TEXT",
  int: "INTEGER",
  bigint: "INTEGER",
  json: "TEXT",
  uuid: "TEXT",
  serial: "INTEGER PRIMARY KEY AUTOINCREMENT",
};

const POSTGRES_TYPES: Record<ColumnType, string> = {
  text: "TEXT",
  timestamp: "TIMESTAMPTZ",
  int: "INTEGER",
  bigint: "BIGINT",
  json: "TEXT",
  uuid: "UUID",
  serial: "BIGSERIAL PRIMARY KEY",
};

export const URL_COLUMNS: ColumnDef[] = [
  { name: "id", type: "serial" },
  { name: "url", type: "text" },
  { name: "last_modified", type: "timestamp" },
];

export const BRONZE_COLUMNS: ColumnDef[] = [
  { name: "url", type: "text" },
  { name: "title", type: "text" },
  { name: "date_published", type: "timestamp" },
  { name: "date_modified", type: "timestamp" },
  { name: "author", type: "text" },
  { name: "tags", type: "json" },
  { name: "content_links", type: "json" },
  { name: "content", type: "json" },
  { name: "year", type: "int" },
  { name: "month", type: "int" },
];

const ARTICLE_DERIVED_COLUMNS: ColumnDef[] = [
  { name: "url", type: "text" },
  { name: "domain", type: "text" },
  { name: "category", type: "text" },
  { name: "url_title", type: "text" },
  { name: "date_published", type: "timestamp" },
  { name: "date_modified", type: "timestamp" },
  { name: "days_between_published_modified", type: "int" },
  { name: "title", type: "text" },
  { name: "author", type: "text" },
  { name: "tags", type: "json" },
  { name: "content_links", type: "json" },
  { name: "content", type: "json" },
  { name: "content_paragraphs", type: "bigint" },
  { name: "total_content_words", type: "bigint" },
  { name: "year", type: "int" },
  { name: "month", type: "int" },
];

export const SILVER_COLUMNS: ColumnDef[] = [
  { name: "row_id", type: "uuid" },
  ...ARTICLE_DERIVED_COLUMNS,
];

export const SILVER_LINK_COLUMNS: ColumnDef[] = [
  { name: "row_id", type: "uuid" },
  { name: "url", type: "text" },
  { name: "alias", type: "text" },
  { name: "link", type: "text" },
  { name: "date_modified", type: "timestamp" },
];

export const GOLD_COLUMNS: ColumnDef[] = [
  { name: "row_id", type: "text" },
  ...ARTICLE_DERIVED_COLUMNS,
];

export const GOLD_LINK_STATUS_COLUMNS: ColumnDef[] = [
  { name: "row_id", type: "text" },
  { name: "url", type: "text" },
  { name: "link", type: "text" },
  { name: "link_status", type: "text" },
  { name: "detail", type: "text" },
  { name: "date_modified", type: "timestamp" },
];

export function createTableSql(
  table: TableRef,
  columns: ColumnDef[],
  dialect: SqlDialect,
): string {
  const types = dialect === "sqlite" ? SQLITE_TYPES : POSTGRES_TYPES;
  const body = columns
    .map((c) => `${quoteIdent(c.name)} ${types[c.type]}`)
    .join(", ");
  return `CREATE TABLE IF NOT EXISTS ${table.sql} (${body})`;
}

/** Quoted, comma separated column names, skipping generated ids. */
export function columnList(columns: ColumnDef[], prefix = ""): string {
  return insertableColumns(columns)
    .map((c) => `${prefix}${quoteIdent(c.name)}`)
    .join(", ");
}

export function insertableColumns(columns: ColumnDef[]): ColumnDef[] {
  return columns.filter((c) => c.type !== "serial");
}

export function placeholders(count: number): string {
  return `(${Array.from({ length: count }, () => "?").join(", ")})`;
}
