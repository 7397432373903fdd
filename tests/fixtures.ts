/**
 * Shared test fixtures: in-memory stores, article builders and fakes
 * behind the pipeline's collaborator interfaces.
 */
import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { defaultSettings, defaultSite, type PipelineSettings } from "../src/core/settings.js";
import type { ArticleRecord, DocumentChunk, UrlRecord } from "../src/core/types.js";
import { TableRegistry } from "../src/db/identifiers.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import type { EmbeddingService } from "../src/rag/embeddings.js";
import type { Tokenizer } from "../src/rag/tokenizer.js";
import type { HybridWeights, SearchHit, VectorStore } from "../src/rag/vector-store.js";
import type { StageContext } from "../src/stages/context.js";
import { ProbeTimeoutError, type HttpProbe } from "../src/stages/links.js";
import type { SitemapSource } from "../src/stages/source.js";
import { DiskStorage } from "../src/storage/disk.js";

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "blog-medallion-test-"));
}

export function utc(iso: string): Date {
  return new Date(`${iso.replace(" ", "T")}Z`);
}

export function makeContext(settings: Partial<PipelineSettings> = {}): StageContext {
  return {
    warehouse: new SQLiteBackend(":memory:"),
    gold: new SQLiteBackend(":memory:"),
    storage: new DiskStorage(join(makeTmpDir(), "store")),
    tables: new TableRegistry(),
    settings: defaultSettings({ groupDelayMs: 0, ...settings }),
    site: defaultSite(),
  };
}

export function article(overrides: Partial<ArticleRecord> = {}): ArticleRecord {
  const dateModified =
    overrides.dateModified === undefined ? utc("2021-01-20 10:00:00") : overrides.dateModified;
  return {
    url: "https://pybit.es/articles/x",
    title: "Article X",
    datePublished: utc("2021-01-01 08:00:00"),
    dateModified,
    author: "Bob",
    tags: ["python", "testing"],
    contentLinks: [{ text: "docs", link: "https://docs.python.org/3/" }],
    content: ["First paragraph here.", "Second one."],
    year: dateModified ? dateModified.getUTCFullYear() : null,
    month: dateModified ? dateModified.getUTCMonth() + 1 : null,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

export class FakeSitemapSource implements SitemapSource {
  readonly parsed: string[] = [];

  constructor(
    private entries: UrlRecord[],
    private articles: Map<string, ArticleRecord> = new Map(),
    private sitemaps: string[] = [],
  ) {}

  async listPages(): Promise<string[]> {
    return this.sitemaps;
  }

  async parseSiteMapIndex(): Promise<UrlRecord[]> {
    return this.entries;
  }

  async parseUrl(url: string): Promise<ArticleRecord> {
    this.parsed.push(url);
    const found = this.articles.get(url);
    if (!found) throw new Error(`HTTP 404 fetching ${url}`);
    return found;
  }
}

/** One token per character. */
export class CharTokenizer implements Tokenizer {
  encode(text: string): number[] {
    return Array.from(text, (ch) => ch.charCodeAt(0));
  }

  decode(tokens: number[]): string {
    return String.fromCharCode(...tokens);
  }
}

export class FakeEmbedder implements EmbeddingService {
  readonly dimensions = 3;
  readonly calls: string[] = [];

  constructor(private failOn?: string) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.failOn !== undefined && text.includes(this.failOn)) {
      throw new Error("embedding quota exceeded");
    }
    return [text.length, 1, 0];
  }
}

export class FakeVectorStore implements VectorStore {
  readonly collection = "test_articles";
  readonly upserts: DocumentChunk[][] = [];
  ensured = 0;

  constructor(private unavailable = false) {}

  async ensureCollection(): Promise<void> {
    if (this.unavailable) throw new Error("connect ECONNREFUSED");
    this.ensured++;
  }

  async upsert(documents: DocumentChunk[]): Promise<number> {
    this.upserts.push(documents);
    return documents.length;
  }

  private hits(k: number): SearchHit[] {
    return this.upserts
      .flat()
      .slice(0, k)
      .map((d, i) => ({ id: d.id, content: d.content, score: 1 / (i + 1), metadata: d.metadata }));
  }

  async searchDense(_vector: number[], k: number): Promise<SearchHit[]> {
    return this.hits(k);
  }

  async searchSparse(_text: string, k: number): Promise<SearchHit[]> {
    return this.hits(k);
  }

  async hybridSearch(
    _text: string,
    _vector: number[],
    k: number,
    _weights?: HybridWeights,
  ): Promise<SearchHit[]> {
    return this.hits(k);
  }
}

/** Answers from a url to status table; "timeout" entries reject like a timed-out probe. */
export class FakeProbe implements HttpProbe {
  readonly probed: string[] = [];

  constructor(private responses: Record<string, number | "timeout" | Error>) {}

  async probe(url: string, timeoutSec: number): Promise<number> {
    this.probed.push(url);
    const response = this.responses[url];
    if (response === undefined) return 200;
    if (response === "timeout") throw new ProbeTimeoutError(url, timeoutSec);
    if (response instanceof Error) throw response;
    return response;
  }
}
