/**
 * Author and tag filters over gold articles, compiled to bound SQL.
 */
import type { SqlDialect, SqlValue } from "../db/backend.js";
import { jsonArrayContains } from "../db/dialect.js";

export type FilterMode = "AND" | "OR";

/** Selection value meaning "no constraint". */
export const ALL = "All";

export interface ArticleFilter {
  mode: FilterMode;
  authors?: string[];
  tags?: string[];
}

export interface CompiledFilter {
  /** `WHERE ...` clause, or "" when nothing constrains. */
  sql: string;
  params: SqlValue[];
}

export class ArticleFilterBuilder {
  private filter: ArticleFilter = { mode: "AND" };

  authors(...authors: string[]): this {
    this.filter = { ...this.filter, authors };
    return this;
  }

  tags(...tags: string[]): this {
    this.filter = { ...this.filter, tags };
    return this;
  }

  mode(mode: FilterMode): this {
    this.filter = { ...this.filter, mode };
    return this;
  }

  build(): ArticleFilter {
    return { ...this.filter };
  }
}

export function articleFilter(): ArticleFilterBuilder {
  return new ArticleFilterBuilder();
}

function active(values: string[] | undefined): string[] {
  if (!values || values.length === 0 || values.includes(ALL)) return [];
  return values;
}

/**
 * Authors match any selected author; tags match articles carrying every
 * selected tag. `mode` joins the two constraints.
 */
export function compileFilter(filter: ArticleFilter, dialect: SqlDialect): CompiledFilter {
  const clauses: string[] = [];
  const params: SqlValue[] = [];

  const authors = active(filter.authors);
  if (authors.length > 0) {
    clauses.push(`author IN (${authors.map(() => "?").join(", ")})`);
    params.push(...authors);
  }

  const tags = active(filter.tags);
  if (tags.length > 0) {
    clauses.push(`(${tags.map(() => jsonArrayContains(dialect, "tags")).join(" AND ")})`);
    params.push(...tags);
  }

  if (clauses.length === 0) return { sql: "", params: [] };
  return { sql: `WHERE ${clauses.join(` ${filter.mode} `)}`, params };
}
