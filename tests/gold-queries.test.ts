import { beforeEach, describe, expect, test } from "vitest";
import { TableRegistry } from "../src/db/identifiers.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import { GOLD_COLUMNS, columnList, placeholders } from "../src/db/schema.js";
import { articleFilter, compileFilter } from "../src/gold/filters.js";
import {
  articlesByAuthor,
  articlesPerMonth,
  listAuthors,
  listTags,
  overviewMetrics,
  recentArticles,
} from "../src/gold/queries.js";
import { createGoldTables, toGoldRow } from "../src/stages/gold.js";
import { goldValues } from "../src/stages/rows.js";
import { deriveSilverRow } from "../src/stages/silver.js";
import { article, makeContext, utc } from "./fixtures.js";

const tables = new TableRegistry();
let db: SQLiteBackend;

beforeEach(async () => {
  const ctx = makeContext();
  db = new SQLiteBackend(":memory:");
  await createGoldTables({ ...ctx, gold: db });
  const articles = [
    article({ url: "https://pybit.es/articles/a", title: "A", author: "Alice", datePublished: utc("2024-03-10 00:00:00") }),
    article({ url: "https://pybit.es/articles/b", title: "B", author: "Bob", tags: ["python"], datePublished: utc("2024-01-05 00:00:00") }),
    article({ url: "https://pybit.es/articles/c", title: "C", author: "Alice", tags: ["django"], datePublished: utc("2023-06-01 00:00:00") }),
    article({ url: "https://pybit.es/articles/d", title: "D", author: null, datePublished: utc("2023-04-15 00:00:00") }),
  ];
  await db.executeMany(
    `INSERT INTO gold_blogs (${columnList(GOLD_COLUMNS)}) VALUES ${placeholders(GOLD_COLUMNS.length)}`,
    articles.map((a) => goldValues(toGoldRow(deriveSilverRow(a)))),
  );
});

async function titles(filter = articleFilter().build()): Promise<(string | null)[]> {
  return (await recentArticles(db, tables, filter)).map((a) => a.title);
}

describe("compileFilter", () => {
  test("no selection compiles to nothing", () => {
    expect(compileFilter(articleFilter().build(), "sqlite")).toEqual({ sql: "", params: [] });
    expect(compileFilter(articleFilter().authors("All").tags().build(), "sqlite")).toEqual({
      sql: "",
      params: [],
    });
  });

  test("authors become a bound IN list", () => {
    expect(compileFilter(articleFilter().authors("Alice", "Bob").build(), "sqlite")).toEqual({
      sql: "WHERE author IN (?, ?)",
      params: ["Alice", "Bob"],
    });
  });
});

describe("recentArticles", () => {
  test("newest publication first", async () => {
    expect(await titles()).toEqual(["A", "B", "C", "D"]);
  });

  test("author filter", async () => {
    expect(await titles(articleFilter().authors("Alice").build())).toEqual(["A", "C"]);
  });

  test("every selected tag is required", async () => {
    expect(await titles(articleFilter().tags("python", "testing").build())).toEqual(["A", "D"]);
  });

  test("mode joins author and tag constraints", async () => {
    const and = articleFilter().authors("Bob").tags("testing");
    expect(await titles(and.build())).toEqual([]);
    expect(await titles(and.mode("OR").build())).toEqual(["A", "B", "D"]);
  });

  test("decodes tags and dates", async () => {
    const [first] = await recentArticles(db, tables, articleFilter().build(), 1);
    expect(first).toEqual({
      title: "A",
      author: "Alice",
      tags: ["python", "testing"],
      datePublished: utc("2024-03-10 00:00:00"),
      dateModified: utc("2021-01-20 10:00:00"),
    });
  });
});

describe("aggregates", () => {
  test("overview metrics", async () => {
    expect(await overviewMetrics(db, tables, utc("2024-05-15 12:00:00"))).toEqual({
      total: 4,
      lastSixMonths: 2,
      topAuthor: "Alice",
      topTag: "python",
    });
  });

  test("articles by author skips missing authors", async () => {
    expect(await articlesByAuthor(db, tables)).toEqual([
      { author: "Alice", articles: 2 },
      { author: "Bob", articles: 1 },
    ]);
  });

  test("author and tag lists are distinct and sorted", async () => {
    expect(await listAuthors(db, tables)).toEqual(["Alice", "Bob"]);
    expect(await listTags(db, tables)).toEqual(["django", "python", "testing"]);
  });

  test("articles per month fills gaps with zero", async () => {
    const months = await articlesPerMonth(db, tables, utc("2023-01-01 00:00:00"), utc("2024-12-31 23:59:59"));
    expect(months).toHaveLength(12);
    expect(months[0]).toEqual({ year: 2023, month: 4, articles: 1 });
    expect(months[1]).toEqual({ year: 2023, month: 5, articles: 0 });
    expect(months[11]).toEqual({ year: 2024, month: 3, articles: 1 });
  });

  test("articles per month over an empty range", async () => {
    expect(await articlesPerMonth(db, tables, utc("2020-01-01 00:00:00"), utc("2020-12-31 00:00:00"))).toEqual([]);
  });
});
