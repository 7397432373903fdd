/**
 * Allow-listed SQL identifiers. Table names reach SQL text only through
 * a TableRegistry built from validated configuration.
 */
import { InvalidIdentifierError } from "../core/exceptions.js";

export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]{0,62}$/;

export interface TableNames {
  sitemapUrls: string;
  bronze: string;
  silver: string;
  silverLinks: string;
  gold: string;
  goldLinkStatus: string;
}

export type TableKey = keyof TableNames;

export const DEFAULT_TABLES: TableNames = {
  sitemapUrls: "sitemap_urls",
  bronze: "bronze_blogs",
  silver: "silver_blogs",
  silverLinks: "silver_content_links",
  gold: "gold_blogs",
  goldLinkStatus: "gold_content_link_status",
};

export function quoteIdent(name: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) throw new InvalidIdentifierError(name);
  return `"${name}"`;
}

/** A validated table: raw name for logs, quoted form for SQL. */
export interface TableRef {
  name: string;
  sql: string;
}

export class TableRegistry {
  private readonly names: TableNames;
  private readonly allowed: ReadonlySet<string>;

  constructor(names: Partial<TableNames> = {}) {
    this.names = { ...DEFAULT_TABLES, ...names };
    for (const name of Object.values(this.names)) quoteIdent(name);
    this.allowed = new Set(Object.values(this.names));
  }

  get(key: TableKey): TableRef {
    return this.ref(this.names[key]);
  }

  /** Resolve a raw table name, rejecting anything not registered. */
  ref(name: string): TableRef {
    if (!this.allowed.has(name)) {
      throw new InvalidIdentifierError(name, `Table not on allow-list: ${name}`);
    }
    return { name, sql: quoteIdent(name) };
  }
}
