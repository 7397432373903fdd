/**
 * Vector store for article chunks: dense and sparse named vectors in
 * one Qdrant collection.
 */
import { createHash } from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";
import { z } from "zod";
import type { ChunkMetadata, DocumentChunk } from "../core/types.js";
import { childLogger, type Logger } from "../logger.js";
import { fuseRankings } from "./fusion.js";
import { sparseVector } from "./sparse.js";

export interface SearchHit {
  id: string;
  content: string;
  score: number;
  metadata: ChunkMetadata;
}

export interface HybridWeights {
  dense: number;
  sparse: number;
}

export interface VectorStore {
  readonly collection: string;
  /** Create the collection when it is missing. */
  ensureCollection(): Promise<void>;
  /** Insert or replace chunks by id. Returns the number written. */
  upsert(documents: DocumentChunk[]): Promise<number>;
  searchDense(vector: number[], k: number): Promise<SearchHit[]>;
  searchSparse(text: string, k: number): Promise<SearchHit[]>;
  hybridSearch(
    text: string,
    vector: number[],
    k: number,
    weights?: HybridWeights,
  ): Promise<SearchHit[]>;
}

export const ChunkMetadataSchema = z.object({
  row_id: z.string(),
  url: z.string(),
  date_published: z.string().nullable(),
  date_modified: z.string().nullable(),
  title: z.string().nullable(),
  author: z.string().nullable(),
  tags: z.array(z.string()),
});

const PayloadSchema = z.object({
  chunk_id: z.string(),
  content: z.string(),
  metadata: z.string(),
});

/** Deterministic UUID-shaped point id for a chunk id. */
export function pointId(chunkId: string): string {
  const hash = createHash("md5").update(chunkId).digest("hex");
  const variant = ((parseInt(hash.slice(16, 18), 16) & 0x3f) | 0x80).toString(16);
  return `${hash.slice(0, 8)}-${hash.slice(8, 12)}-4${hash.slice(13, 16)}-${variant}${hash.slice(18, 20)}-${hash.slice(20, 32)}`;
}

export function decodeHit(payload: unknown, score: number): SearchHit {
  const p = PayloadSchema.parse(payload);
  return {
    id: p.chunk_id,
    content: p.content,
    score,
    metadata: ChunkMetadataSchema.parse(JSON.parse(p.metadata)),
  };
}

export interface QdrantVectorStoreOptions {
  url: string;
  apiKey?: string;
  collection: string;
  dimensions: number;
  logger?: Logger;
  client?: QdrantClient;
}

export class QdrantVectorStore implements VectorStore {
  readonly collection: string;
  private client: QdrantClient;
  private dimensions: number;
  private log: Logger;

  constructor(options: QdrantVectorStoreOptions) {
    this.collection = options.collection;
    this.dimensions = options.dimensions;
    this.client = options.client ?? new QdrantClient({ url: options.url, apiKey: options.apiKey });
    this.log = options.logger ?? childLogger("vector-store");
  }

  async ensureCollection(): Promise<void> {
    const { exists } = await this.client.collectionExists(this.collection);
    if (exists) return;
    this.log.info({ collection: this.collection, dimensions: this.dimensions }, "Creating collection");
    await this.client.createCollection(this.collection, {
      vectors: { dense: { size: this.dimensions, distance: "Cosine" } },
      sparse_vectors: { sparse: { modifier: "idf" } },
    });
  }

  async upsert(documents: DocumentChunk[]): Promise<number> {
    if (documents.length === 0) return 0;
    await this.client.upsert(this.collection, {
      wait: true,
      points: documents.map((doc) => ({
        id: pointId(doc.id),
        vector: { dense: doc.denseVector, sparse: sparseVector(doc.content) },
        payload: {
          chunk_id: doc.id,
          content: doc.content,
          metadata: JSON.stringify(doc.metadata),
        },
      })),
    });
    return documents.length;
  }

  async searchDense(vector: number[], k: number): Promise<SearchHit[]> {
    const res = await this.client.query(this.collection, {
      query: vector,
      using: "dense",
      limit: k,
      with_payload: true,
    });
    return res.points.map((p) => decodeHit(p.payload, p.score));
  }

  async searchSparse(text: string, k: number): Promise<SearchHit[]> {
    const sparse = sparseVector(text);
    if (sparse.indices.length === 0) return [];
    const res = await this.client.query(this.collection, {
      query: sparse,
      using: "sparse",
      limit: k,
      with_payload: true,
    });
    return res.points.map((p) => decodeHit(p.payload, p.score));
  }

  async hybridSearch(
    text: string,
    vector: number[],
    k: number,
    weights: HybridWeights = { dense: 0.5, sparse: 0.5 },
  ): Promise<SearchHit[]> {
    const [dense, sparse] = await Promise.all([
      this.searchDense(vector, k * 2),
      this.searchSparse(text, k * 2),
    ]);
    return fuseRankings([dense, sparse], [weights.dense, weights.sparse], k);
  }
}
