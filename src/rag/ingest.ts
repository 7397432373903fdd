/**
 * Chunk, embed and load gold articles into the vector store.
 */
import pLimit from "p-limit";
import { setTimeout as sleep } from "node:timers/promises";
import { VectorStoreUnavailableError } from "../core/exceptions.js";
import type { PipelineSettings } from "../core/settings.js";
import type { DocumentChunk, GoldArticleRecord, Window } from "../core/types.js";
import { windowBounds } from "../core/window.js";
import { columnList, GOLD_COLUMNS } from "../db/schema.js";
import { toSqlTimestampOrNull } from "../db/timestamps.js";
import { childLogger, errorMessage, type Logger } from "../logger.js";
import type { StageContext } from "../stages/context.js";
import { decodeStringList, goldFromRow } from "../stages/rows.js";
import { chunkBlog } from "./chunker.js";
import type { EmbeddingService } from "./embeddings.js";
import type { Tokenizer } from "./tokenizer.js";
import type { VectorStore } from "./vector-store.js";

export interface IngestDeps {
  tokenizer: Tokenizer;
  embedder: EmbeddingService;
  store: VectorStore;
  logger?: Logger;
}

export type IngestOptions = Pick<
  PipelineSettings,
  "chunkSize" | "chunkOverlap" | "concurrency" | "batchSize" | "groupDelayMs" | "embedConcurrency"
>;

export interface RowOutcome {
  rowId: string;
  title: string | null;
}

export interface IngestReport {
  total: number;
  processed: number;
  failed: (RowOutcome & { error: string })[];
  skipped: (RowOutcome & { reason: string })[];
  chunks: number;
  /** total minus every accounted row; zero on a clean run. */
  discrepancy: number;
}

function hasContent(paragraphs: string[]): boolean {
  return paragraphs.join(" ").trim().length > 0;
}

export async function ingestArticles(
  rows: GoldArticleRecord[],
  deps: IngestDeps,
  options: IngestOptions,
): Promise<IngestReport> {
  const log = deps.logger ?? childLogger("ingest");
  const report: IngestReport = {
    total: rows.length,
    processed: 0,
    failed: [],
    skipped: [],
    chunks: 0,
    discrepancy: 0,
  };

  try {
    await deps.store.ensureCollection();
  } catch (err) {
    log.error({ collection: deps.store.collection, err: errorMessage(err) }, "Vector store unavailable");
    throw new VectorStoreUnavailableError(deps.store.collection, err);
  }

  const rowLimit = pLimit(options.concurrency);
  const embedLimit = pLimit(options.embedConcurrency);

  const processRow = async (row: GoldArticleRecord): Promise<void> => {
    const outcome = { rowId: row.rowId, title: row.title };
    try {
      const paragraphs = decodeStringList(row.content);
      if (!hasContent(paragraphs)) {
        log.warn(outcome, "Empty or whitespace-only content");
        report.skipped.push({ ...outcome, reason: "empty content" });
        return;
      }

      const chunks = chunkBlog(paragraphs, deps.tokenizer, options.chunkSize, options.chunkOverlap);
      const vectors = await Promise.all(
        chunks.map((chunk) => embedLimit(() => deps.embedder.embed(chunk.text))),
      );
      const metadata = {
        row_id: row.rowId,
        url: row.url,
        date_published: toSqlTimestampOrNull(row.datePublished),
        date_modified: toSqlTimestampOrNull(row.dateModified),
        title: row.title,
        author: row.author,
        tags: decodeStringList(row.tags),
      };
      const documents: DocumentChunk[] = chunks.map((chunk, i) => ({
        id: `${row.rowId}_${i}`,
        content: chunk.text,
        denseVector: vectors[i] ?? [],
        metadata,
      }));

      await deps.store.upsert(documents);
      report.processed++;
      report.chunks += documents.length;
      log.info({ ...outcome, chunks: documents.length }, "Ingested article");
    } catch (err) {
      log.error({ ...outcome, err: errorMessage(err) }, "Failed to ingest article");
      report.failed.push({ ...outcome, error: errorMessage(err) });
    }
  };

  const groups = Math.ceil(rows.length / options.batchSize);
  for (let i = 0; i < rows.length; i += options.batchSize) {
    const group = rows.slice(i, i + options.batchSize);
    log.info(
      { group: i / options.batchSize + 1, groups, from: i + 1, to: i + group.length },
      "Processing group",
    );
    await Promise.all(group.map((row) => rowLimit(() => processRow(row))));
    if (i + options.batchSize < rows.length && options.groupDelayMs > 0) {
      await sleep(options.groupDelayMs);
    }
  }

  report.discrepancy =
    report.total - (report.processed + report.failed.length + report.skipped.length);
  if (report.discrepancy !== 0) {
    log.warn({ discrepancy: report.discrepancy }, "Row outcomes do not add up to the input count");
  }
  log.info(
    {
      total: report.total,
      processed: report.processed,
      failed: report.failed.length,
      skipped: report.skipped.length,
      chunks: report.chunks,
    },
    "Ingestion finished",
  );
  return report;
}

/** Gold articles modified inside `window`. */
export async function fetchGoldWindow(ctx: StageContext, window: Window): Promise<GoldArticleRecord[]> {
  const gold = ctx.tables.get("gold");
  const rows = await ctx.gold.query(
    `SELECT ${columnList(GOLD_COLUMNS)} FROM ${gold.sql}
     WHERE date_modified BETWEEN ? AND ? ORDER BY date_modified, url`,
    windowBounds(window),
  );
  return rows.map(goldFromRow);
}

export async function ingestVectors(
  ctx: StageContext,
  deps: IngestDeps,
  window: Window,
): Promise<IngestReport> {
  const rows = await fetchGoldWindow(ctx, window);
  return ingestArticles(rows, { logger: ctx.logger, ...deps }, ctx.settings);
}
