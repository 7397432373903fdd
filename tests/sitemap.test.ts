/**
 * Tests for sitemap parsing, url ingestion and window scraping.
 */
import { describe, expect, test, vi } from "vitest";
import { SitemapUrlError } from "../src/core/exceptions.js";
import { resolveWindow } from "../src/core/window.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import { readPartitioned } from "../src/storage/partitions.js";
import {
  checkUrlTable,
  ingestSitemap,
  ingestSitemapIndex,
  isArticleUrl,
  queryMonthUrls,
  scrapeWindow,
  validateSitemapUrl,
} from "../src/stages/sitemap.js";
import {
  HttpSitemapSource,
  parseArticleHtml,
  parseLocs,
  parseSitemapXml,
} from "../src/stages/source.js";
import { article, FakeSitemapSource, makeContext, utc } from "./fixtures.js";

const SITEMAP_XML = `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <url>
    <loc>https://pybit.es/articles/first-post/</loc>
    <lastmod>2021-01-10T08:30:00+00:00</lastmod>
  </url>
  <url>
    <loc>https://pybit.es/articles/no-date/</loc>
  </url>
</urlset>`;

const ARTICLE_HTML = `<!doctype html>
<html><head>
<script type="application/ld+json" class="rank-math-schema">
{"@context":"https://schema.org","@graph":[
  {"@type":"Person","name":"Alice Doe"},
  {"@type":"WebPage","url":"https://pybit.es/articles/first-post/","name":"First Post",
   "datePublished":"2021-01-02T10:00:00+00:00","dateModified":"2021-01-10T08:30:00+00:00"}
]}
</script>
</head><body>
<div class="entry-category-header">python, testing ,</div>
<div class="entry-content">
  <p>Hello <a href="https://docs.python.org/3/">the docs</a> world.</p>
  <p>   </p>
  <h2>Section</h2>
  <p>See <a href="#intro">intro</a> and <a href="mailto:bob@example.com">mail</a>.</p>
</div>
</body></html>`;

describe("sitemap parsing", () => {
  test("parseSitemapXml reads loc and lastmod", () => {
    expect(parseSitemapXml(SITEMAP_XML)).toEqual([
      { url: "https://pybit.es/articles/first-post/", lastModified: utc("2021-01-10 08:30:00") },
      { url: "https://pybit.es/articles/no-date/", lastModified: null },
    ]);
  });

  test("parseLocs lists every loc", () => {
    expect(parseLocs(SITEMAP_XML)).toEqual([
      "https://pybit.es/articles/first-post/",
      "https://pybit.es/articles/no-date/",
    ]);
  });

  test("parseArticleHtml extracts metadata, tags, links and paragraphs", () => {
    const a = parseArticleHtml(ARTICLE_HTML, "https://pybit.es/articles/first-post/");
    expect(a).toEqual({
      url: "https://pybit.es/articles/first-post/",
      title: "First Post",
      datePublished: utc("2021-01-02 10:00:00"),
      dateModified: utc("2021-01-10 08:30:00"),
      author: "Alice Doe",
      tags: ["python", "testing"],
      contentLinks: [
        { text: "the docs", link: "https://docs.python.org/3/" },
        { text: "intro", link: "#intro" },
        { text: "mail", link: "mailto:bob@example.com" },
      ],
      content: ["Hello the docs world.", "Section", "See intro and mail."],
      year: 2021,
      month: 1,
    });
  });

  test("a page without structured data keeps the requested url", () => {
    const a = parseArticleHtml("<html><body><p>x</p></body></html>", "https://pybit.es/articles/bare/");
    expect(a).toMatchObject({ url: "https://pybit.es/articles/bare/", title: null, year: null, tags: [] });
  });

  test("broken ld+json falls back to the page's meta tags", () => {
    const html = `<html><head>
<script type="application/ld+json" class="rank-math-schema">{"@graph": [</script>
<meta property="og:title" content="Fallback Title">
<meta property="article:modified_time" content="2021-02-05T09:00:00+00:00">
<meta name="author" content="Bob">
</head><body>
<div class="entry-category-header">django</div>
<div class="entry-content"><p>Read <a href="/articles/y">this</a>.</p></div>
</body></html>`;
    expect(parseArticleHtml(html, "https://pybit.es/articles/broken/")).toEqual({
      url: "https://pybit.es/articles/broken/",
      title: "Fallback Title",
      datePublished: null,
      dateModified: utc("2021-02-05 09:00:00"),
      author: "Bob",
      tags: ["django"],
      contentLinks: [{ text: "this", link: "/articles/y" }],
      content: ["Read this."],
      year: 2021,
      month: 2,
    });
  });

  test("HttpSitemapSource raises on a failed response", async () => {
    const fetchFn = vi.fn(async () => new Response("gone", { status: 404 }));
    const source = new HttpSitemapSource(fetchFn);
    await expect(source.parseUrl("https://pybit.es/articles/gone/")).rejects.toThrow(
      "HTTP 404 fetching https://pybit.es/articles/gone/",
    );
  });

  test("HttpSitemapSource parses a fetched sitemap", async () => {
    const fetchFn = vi.fn(async () => new Response(SITEMAP_XML, { status: 200 }));
    const source = new HttpSitemapSource(fetchFn);
    const entries = await source.parseSiteMapIndex("https://pybit.es/post-sitemap1.xml");
    expect(entries).toHaveLength(2);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });
});

describe("ingestSitemap", () => {
  test("drops incomplete entries and upserts the rest", async () => {
    const ctx = makeContext();
    const source = new FakeSitemapSource([
      { url: "https://pybit.es/articles/a/", lastModified: utc("2021-01-10 00:00:00") },
      { url: "https://pybit.es/articles/b/", lastModified: null },
    ]);
    const result = await ingestSitemap(ctx, source);
    expect(result).toEqual({ staged: 1, inserted: 1, discovered: 2, incomplete: 1 });

    const again = await ingestSitemap(ctx, source);
    expect(again.inserted).toBe(0);
  });

  test("an empty sitemap warns and makes no upsert calls", async () => {
    const ctx = makeContext();
    const warehouse = ctx.warehouse;
    if (!(warehouse instanceof SQLiteBackend)) throw new Error("expected sqlite");
    const transaction = vi.spyOn(warehouse, "transaction");
    const executeMany = vi.spyOn(warehouse, "executeMany");
    const result = await ingestSitemap(ctx, new FakeSitemapSource([]));
    expect(result).toEqual({ staged: 0, inserted: 0, discovered: 0, incomplete: 0 });
    expect(transaction).not.toHaveBeenCalled();
    expect(executeMany).not.toHaveBeenCalled();
  });

  test("a sitemap index ingests each listed xml sitemap", async () => {
    const ctx = makeContext();
    const source = new FakeSitemapSource(
      [
        { url: "https://pybit.es/articles/a/", lastModified: utc("2021-01-10 00:00:00") },
        { url: "https://pybit.es/articles/b/", lastModified: utc("2021-01-12 00:00:00") },
      ],
      new Map(),
      ["https://pybit.es/post-sitemap1.xml", "https://pybit.es/post-sitemap2.xml", "https://pybit.es/feed/"],
    );
    const parse = vi.spyOn(source, "parseSiteMapIndex");
    const result = await ingestSitemapIndex(ctx, source, "https://pybit.es/sitemap_index.xml");
    expect(result).toEqual({
      staged: 4,
      inserted: 2,
      discovered: 4,
      incomplete: 0,
      sitemaps: ["https://pybit.es/post-sitemap1.xml", "https://pybit.es/post-sitemap2.xml"],
    });
    expect(parse.mock.calls).toEqual([
      ["https://pybit.es/post-sitemap1.xml"],
      ["https://pybit.es/post-sitemap2.xml"],
    ]);
  });

  test("queryMonthUrls and checkUrlTable", async () => {
    const ctx = makeContext();
    await ingestSitemap(
      ctx,
      new FakeSitemapSource([
        { url: "https://pybit.es/articles/a/", lastModified: utc("2021-01-10 00:00:00") },
        { url: "https://pybit.es/articles/b/", lastModified: utc("2021-01-31 23:59:59") },
        { url: "https://pybit.es/articles/c/", lastModified: utc("2021-02-01 00:00:00") },
      ]),
    );
    const jan = await queryMonthUrls(ctx, 2021, 1);
    expect(jan.map((u) => u.url)).toEqual(["https://pybit.es/articles/a/", "https://pybit.es/articles/b/"]);

    expect(await checkUrlTable(ctx)).toEqual({
      total: 3,
      distribution: [
        { year: 2021, month: 1, count: 2 },
        { year: 2021, month: 2, count: 1 },
      ],
    });
  });
});

describe("scrapeWindow", () => {
  test("parses each month, isolates failures and writes partitions", async () => {
    const ctx = makeContext();
    const good = article({ url: "https://pybit.es/articles/good/", dateModified: utc("2021-01-10 00:00:00") });
    const source = new FakeSitemapSource(
      [
        { url: "https://pybit.es/articles/good/", lastModified: utc("2021-01-10 00:00:00") },
        { url: "https://pybit.es/articles/broken/", lastModified: utc("2021-01-11 00:00:00") },
        { url: "https://pybit.es/articles/", lastModified: utc("2021-01-12 00:00:00") },
        { url: "https://pybit.es/wp-content/logo.png", lastModified: utc("2021-01-13 00:00:00") },
      ],
      new Map([[good.url, good]]),
    );
    await ingestSitemap(ctx, source);

    const window = resolveWindow(
      { startYear: 2021, startMonth: 1, endYear: 2021, endMonth: 2 },
      new Date(Date.UTC(2024, 0, 1)),
    );
    const result = await scrapeWindow(ctx, source, window);

    expect(result).toEqual({
      months: 2,
      parsed: 1,
      skipped: 2,
      failed: [{ url: "https://pybit.es/articles/broken/", error: "HTTP 404 fetching https://pybit.es/articles/broken/" }],
      files: ["raw/year=2021/month=1/part-2021-01.cols.gz"],
    });
    expect(source.parsed).toEqual(["https://pybit.es/articles/broken/", "https://pybit.es/articles/good/"]);
    const stored = await readPartitioned(ctx.storage, "raw");
    expect(stored.map((r) => r.url)).toEqual([good.url]);
  });
});

describe("url checks", () => {
  const site = makeContext().site;

  test("isArticleUrl skips the base url and image suffixes", () => {
    expect(isArticleUrl("https://pybit.es/articles/", site)).toBe(false);
    expect(isArticleUrl("https://pybit.es/a/pic.JPG", site)).toBe(false);
    expect(isArticleUrl("https://pybit.es/articles/x/", site)).toBe(true);
  });

  test("validateSitemapUrl", () => {
    expect(validateSitemapUrl("https://pybit.es/post-sitemap2.xml", site)).toBe(
      "https://pybit.es/post-sitemap2.xml",
    );
    expect(() => validateSitemapUrl("https://example.com/sitemap.xml", site)).toThrow(SitemapUrlError);
    expect(() => validateSitemapUrl("https://pybit.es/feed.xml", site)).toThrow(SitemapUrlError);
    expect(() => validateSitemapUrl("not a url", site)).toThrow(SitemapUrlError);
  });
});
