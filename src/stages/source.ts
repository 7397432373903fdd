/**
 * Sitemap and article source: discovers urls and parses article pages.
 */
import { load } from "cheerio";
import { z } from "zod";
import type { ArticleRecord, ContentLink, UrlRecord } from "../core/types.js";
import { childLogger, errorMessage } from "../logger.js";

export interface SitemapSource {
  /** Every `<loc>` of a sitemap or sitemap index. */
  listPages(indexUrl: string): Promise<string[]>;
  /** Url entries of a sitemap with their last modification time. */
  parseSiteMapIndex(url: string): Promise<UrlRecord[]>;
  /** Fetch and parse one article page. */
  parseUrl(url: string): Promise<ArticleRecord>;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

const USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

const LdGraphSchema = z.object({
  "@graph": z.array(z.record(z.unknown())).default([]),
});

function parseDate(value: unknown): Date | null {
  if (typeof value !== "string" || value.trim() === "") return null;
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? null : date;
}

/** ld+json text values come as plain strings or `{ text }` objects. */
const TextValueSchema = z.union([
  z.string(),
  z.object({ text: z.string() }).transform((v) => v.text),
]);

function stringField(value: unknown): string | null {
  const parsed = TextValueSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/** `@graph` nodes of an ld+json block; unreadable blocks yield none. */
function ldGraph(text: string, pageUrl: string): Record<string, unknown>[] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    childLogger("source").warn(
      { url: pageUrl, err: errorMessage(err) },
      "Unreadable ld+json metadata, using page meta tags",
    );
    return [];
  }
  const graph = LdGraphSchema.safeParse(json);
  return graph.success ? graph.data["@graph"] : [];
}

// ---------------------------------------------------------------------------
// Pure parsers
// ---------------------------------------------------------------------------

export function parseLocs(xml: string): string[] {
  const $ = load(xml, { xml: true });
  return $("loc")
    .map((_, el) => $(el).text().trim())
    .get()
    .filter((loc) => loc.length > 0);
}

export function parseSitemapXml(xml: string): UrlRecord[] {
  const $ = load(xml, { xml: true });
  const records: UrlRecord[] = [];
  $("url").each((_, el) => {
    const url = $(el).children("loc").text().trim();
    if (!url) return;
    records.push({
      url,
      lastModified: parseDate($(el).children("lastmod").text()),
    });
  });
  return records;
}

export function parseArticleHtml(html: string, pageUrl: string): ArticleRecord {
  const $ = load(html);

  let url: string | null = null;
  let title: string | null = null;
  let datePublished: Date | null = null;
  let dateModified: Date | null = null;
  let author: string | null = null;

  const ldScript =
    $('script[type="application/ld+json"].rank-math-schema').first().html() ??
    $('script[type="application/ld+json"]').first().html();
  if (ldScript) {
    for (const node of ldGraph(ldScript, pageUrl)) {
      if (node["@type"] === "WebPage") {
        url = stringField(node.url);
        title = stringField(node.name);
        datePublished = parseDate(node.datePublished);
        dateModified = parseDate(node.dateModified);
      } else if (node["@type"] === "Person") {
        author = stringField(node.name);
      }
    }
  }

  const meta = (selector: string): string | null =>
    $(selector).first().attr("content")?.trim() || null;
  url ??= $('link[rel="canonical"]').first().attr("href")?.trim() || null;
  title ??=
    meta('meta[property="og:title"]') ?? ($("h1.entry-title").first().text().trim() || null);
  datePublished ??= parseDate(meta('meta[property="article:published_time"]'));
  dateModified ??= parseDate(meta('meta[property="article:modified_time"]'));
  author ??= meta('meta[name="author"]');

  const tagsText = $("div.entry-category-header").first().text().trim();
  const tags = tagsText
    ? tagsText.split(",").map((t) => t.trim()).filter((t) => t.length > 0)
    : [];

  const body = $("div.entry-content").first();
  const contentLinks: ContentLink[] = body
    .find("a[href]")
    .map((_, a) => ({ text: $(a).text().trim(), link: $(a).attr("href") ?? "" }))
    .get();
  const content: string[] = body
    .children()
    .map((_, el) => $(el).text().trim())
    .get()
    .filter((line) => line.length > 0);

  return {
    url: url ?? pageUrl,
    title,
    datePublished,
    dateModified,
    author,
    tags,
    contentLinks,
    content,
    year: dateModified ? dateModified.getUTCFullYear() : null,
    month: dateModified ? dateModified.getUTCMonth() + 1 : null,
  };
}

// ---------------------------------------------------------------------------
// HTTP source
// ---------------------------------------------------------------------------

export class HttpSitemapSource implements SitemapSource {
  private fetchFn: FetchFn;

  constructor(fetchFn: FetchFn = fetch) {
    this.fetchFn = fetchFn;
  }

  private async get(url: string, accept: string): Promise<string> {
    const res = await this.fetchFn(url, {
      headers: { "User-Agent": USER_AGENT, Accept: accept },
    });
    if (!res.ok) throw new Error(`HTTP ${res.status} fetching ${url}`);
    return res.text();
  }

  async listPages(indexUrl: string): Promise<string[]> {
    return parseLocs(await this.get(indexUrl, "application/xml,text/xml;q=0.9,*/*;q=0.8"));
  }

  async parseSiteMapIndex(url: string): Promise<UrlRecord[]> {
    return parseSitemapXml(await this.get(url, "application/xml,text/xml;q=0.9,*/*;q=0.8"));
  }

  async parseUrl(url: string): Promise<ArticleRecord> {
    return parseArticleHtml(await this.get(url, "text/html"), url);
  }
}
