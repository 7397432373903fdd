/**
 * blog-medallion: sitemap to bronze, silver, gold and vector store.
 */
import { buildDb, buildStorage, parseConfig, type Config } from "./config.js";
import { ConfigurationError } from "./core/exceptions.js";
import type { PipelineSettings, SiteSettings } from "./core/settings.js";
import type { Window } from "./core/types.js";
import { resolveWindow, type WindowArgs } from "./core/window.js";
import type { DatabaseBackend } from "./db/backend.js";
import { TableRegistry } from "./db/identifiers.js";
import { articleFilter, type ArticleFilter } from "./gold/filters.js";
import {
  articlesByAuthor,
  articlesPerMonth,
  listAuthors,
  listTags,
  overviewMetrics,
  recentArticles,
} from "./gold/queries.js";
import { childLogger, type Logger } from "./logger.js";
import { OpenAIEmbeddingService, type EmbeddingService } from "./rag/embeddings.js";
import { ingestVectors } from "./rag/ingest.js";
import { searchArticles, type SearchMode } from "./rag/search.js";
import { TiktokenTokenizer, type Tokenizer } from "./rag/tokenizer.js";
import { QdrantVectorStore, type VectorStore } from "./rag/vector-store.js";
import { loadBronze } from "./stages/bronze.js";
import type { StageContext } from "./stages/context.js";
import { replicateGold } from "./stages/gold.js";
import { backfillLinkStatus, FetchProbe, type HttpProbe } from "./stages/links.js";
import { backfillSilver } from "./stages/silver.js";
import {
  checkUrlTable,
  ingestSitemap,
  ingestSitemapIndex,
  scrapeWindow,
} from "./stages/sitemap.js";
import { HttpSitemapSource, type SitemapSource } from "./stages/source.js";
import type { StorageBackend } from "./storage/backend.js";

export interface PipelineDeps {
  warehouse: DatabaseBackend;
  gold: DatabaseBackend;
  storage: StorageBackend;
  tables: TableRegistry;
  settings: PipelineSettings;
  site: SiteSettings;
  source?: SitemapSource;
  probe?: HttpProbe;
  tokenizer?: Tokenizer;
  embedder?: EmbeddingService;
  store?: VectorStore;
  logger?: Logger;
}

export class BlogPipeline {
  private deps: PipelineDeps;
  private ctx: StageContext;
  private tokenizer?: Tokenizer;

  constructor(deps: PipelineDeps) {
    this.deps = deps;
    this.tokenizer = deps.tokenizer;
    this.ctx = {
      warehouse: deps.warehouse,
      gold: deps.gold,
      storage: deps.storage,
      tables: deps.tables,
      settings: deps.settings,
      site: deps.site,
      logger: deps.logger,
    };
  }

  /** Construct from a configuration object (validated with zod). */
  static fromConfig(raw: unknown): BlogPipeline {
    const config: Config = parseConfig(raw);
    const embedder = config.embedding.apiKey
      ? new OpenAIEmbeddingService({
          apiKey: config.embedding.apiKey,
          model: config.embedding.model,
          dimensions: config.embedding.dimensions,
        })
      : undefined;
    const store = embedder
      ? new QdrantVectorStore({
          url: config.vector.url,
          apiKey: config.vector.apiKey,
          collection: config.vector.collection,
          dimensions: embedder.dimensions,
        })
      : undefined;

    return new BlogPipeline({
      warehouse: buildDb(config.warehouse),
      gold: buildDb(config.gold),
      storage: buildStorage(config.storage),
      tables: new TableRegistry(config.tables),
      settings: config.pipeline,
      site: config.site,
      embedder,
      store,
      logger: childLogger("pipeline"),
    });
  }

  /** Validate year/month bounds into a backfill window. */
  window(args: WindowArgs, now: Date = new Date()): Window {
    return resolveWindow(args, now, this.deps.settings.earliestYear);
  }

  get context(): StageContext {
    return this.ctx;
  }

  // ------------------------------------------------------------------
  // Stages
  // ------------------------------------------------------------------

  ingestSitemap(indexUrl?: string) {
    return ingestSitemap(this.ctx, this.source(), indexUrl);
  }

  ingestSitemapIndex(indexUrl: string) {
    return ingestSitemapIndex(this.ctx, this.source(), indexUrl);
  }

  scrape(window: Window) {
    return scrapeWindow(this.ctx, this.source(), window);
  }

  checkUrls(window?: Window) {
    return checkUrlTable(this.ctx, window);
  }

  loadBronze() {
    return loadBronze(this.ctx);
  }

  backfillSilver(window: Window) {
    return backfillSilver(this.ctx, window);
  }

  replicateGold(window: Window) {
    return replicateGold(this.ctx, window);
  }

  checkLinks(window: Window) {
    return backfillLinkStatus(this.ctx, window, this.deps.probe ?? new FetchProbe());
  }

  async embed(window: Window) {
    const { embedder, store } = this.rag();
    return ingestVectors(this.ctx, { tokenizer: this.tokenizerOrDefault(), embedder, store }, window);
  }

  async search(query: string, k = 5, mode: SearchMode = "hybrid") {
    return searchArticles(this.rag(), query, k, mode);
  }

  // ------------------------------------------------------------------
  // Gold reads
  // ------------------------------------------------------------------

  recentArticles(filter: ArticleFilter = articleFilter().build(), limit = 20) {
    return recentArticles(this.ctx.gold, this.ctx.tables, filter, limit);
  }

  overview(now?: Date) {
    return overviewMetrics(this.ctx.gold, this.ctx.tables, now);
  }

  articlesByAuthor(limit = 10) {
    return articlesByAuthor(this.ctx.gold, this.ctx.tables, limit);
  }

  authors() {
    return listAuthors(this.ctx.gold, this.ctx.tables);
  }

  tags() {
    return listTags(this.ctx.gold, this.ctx.tables);
  }

  articlesPerMonth(start: Date, end: Date) {
    return articlesPerMonth(this.ctx.gold, this.ctx.tables, start, end);
  }

  async close(): Promise<void> {
    await this.ctx.warehouse.close();
    if (this.ctx.gold !== this.ctx.warehouse) await this.ctx.gold.close();
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private source(): SitemapSource {
    this.deps.source ??= new HttpSitemapSource();
    return this.deps.source;
  }

  private tokenizerOrDefault(): Tokenizer {
    this.tokenizer ??= new TiktokenTokenizer();
    return this.tokenizer;
  }

  private rag(): { embedder: EmbeddingService; store: VectorStore } {
    const { embedder, store } = this.deps;
    if (!embedder || !store) {
      throw new ConfigurationError(
        "Embedding and vector store are not configured (set OPENAI_API_KEY and QDRANT_URL)",
      );
    }
    return { embedder, store };
  }
}

export { configFromEnv, ConfigSchema } from "./config.js";
export * from "./core/exceptions.js";
export {
  LinkStatus,
  type ArticleRecord,
  type ContentLinkRecord,
  type ContentLinkStatusRecord,
  type DocumentChunk,
  type GoldArticleRecord,
  type SilverArticleRecord,
  type UrlRecord,
  type Window,
} from "./core/types.js";
export { articleFilter, compileFilter } from "./gold/filters.js";
export { TableRegistry } from "./db/identifiers.js";
