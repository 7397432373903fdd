/**
 * Configuration validation and backend factories.
 */
import { z } from "zod";
import { PipelineSettingsSchema, SiteSchema } from "./core/settings.js";
import type { DatabaseBackend } from "./db/backend.js";
import { IDENTIFIER_PATTERN } from "./db/identifiers.js";
import { PostgresBackend } from "./db/postgres.js";
import { SQLiteBackend } from "./db/sqlite.js";
import type { StorageBackend } from "./storage/backend.js";
import { DiskStorage } from "./storage/disk.js";
import { S3Storage } from "./storage/s3.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const StorageConfigSchema = z.discriminatedUnion("provider", [
  z.object({
    provider: z.literal("disk"),
    basePath: z.string().default("./data"),
  }),
  z.object({
    provider: z.literal("s3"),
    bucket: z.string().min(1),
    endpoint: z.string().url().optional(),
    region: z.string().optional(),
    accessKeyId: z.string().optional(),
    secretAccessKey: z.string().optional(),
    sessionToken: z.string().optional(),
    prefix: z.string().optional(),
    forcePathStyle: z.boolean().optional(),
  }),
]);

const DbConfigSchema = z.discriminatedUnion("provider", [
  z.object({ provider: z.literal("sqlite"), path: z.string().default(":memory:") }),
  z.object({ provider: z.literal("postgres"), connectionString: z.string().min(1) }),
]);

const identifier = z.string().regex(IDENTIFIER_PATTERN, "not a valid SQL identifier");

const TablesSchema = z.object({
  sitemapUrls: identifier.optional(),
  bronze: identifier.optional(),
  silver: identifier.optional(),
  silverLinks: identifier.optional(),
  gold: identifier.optional(),
  goldLinkStatus: identifier.optional(),
});

const VectorConfigSchema = z.object({
  url: z.string().url().default("http://localhost:6333"),
  apiKey: z.string().optional(),
  collection: z.string().min(1).default("blog_articles"),
});

const EmbeddingConfigSchema = z.object({
  apiKey: z.string().optional(),
  model: z.string().default("text-embedding-3-small"),
  dimensions: z.number().int().positive().optional(),
});

export const ConfigSchema = z.object({
  storage: StorageConfigSchema.default({ provider: "disk" }),
  warehouse: DbConfigSchema.default({ provider: "sqlite" }),
  gold: DbConfigSchema.default({ provider: "sqlite" }),
  vector: VectorConfigSchema.default({}),
  embedding: EmbeddingConfigSchema.default({}),
  site: SiteSchema.default({}),
  tables: TablesSchema.default({}),
  pipeline: PipelineSettingsSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type RawConfig = z.input<typeof ConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type DbConfig = z.infer<typeof DbConfigSchema>;

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

/** Map environment variables onto a raw config object. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): RawConfig {
  const storage: RawConfig["storage"] =
    env.STORAGE_PROVIDER === "s3"
      ? {
          provider: "s3",
          bucket: env.S3_BUCKET ?? "",
          endpoint: env.S3_ENDPOINT,
          region: env.AWS_REGION,
          accessKeyId: env.AWS_ACCESS_KEY_ID,
          secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
          sessionToken: env.AWS_SESSION_TOKEN,
        }
      : { provider: "disk", basePath: env.STORAGE_PATH ?? "./data" };

  const int = (value: string | undefined): number | undefined =>
    value === undefined ? undefined : Number(value);

  const db = (url: string | undefined, path: string): RawConfig["warehouse"] =>
    url ? { provider: "postgres", connectionString: url } : { provider: "sqlite", path };

  return {
    storage,
    warehouse: db(env.WAREHOUSE_URL, env.WAREHOUSE_PATH ?? "./blog-medallion.db"),
    gold: db(env.GOLD_URL, env.GOLD_PATH ?? "./blog-medallion-gold.db"),
    vector: {
      url: env.QDRANT_URL ?? "http://localhost:6333",
      apiKey: env.QDRANT_API_KEY,
      collection: env.QDRANT_COLLECTION ?? "blog_articles",
    },
    embedding: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_EMBEDDING_MODEL ?? "text-embedding-3-small",
    },
    pipeline: {
      chunkSize: int(env.CHUNK_SIZE),
      chunkOverlap: int(env.CHUNK_OVERLAP),
    },
  };
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function buildStorage(config: StorageConfig): StorageBackend {
  switch (config.provider) {
    case "disk":
      return new DiskStorage(config.basePath);
    case "s3":
      return new S3Storage(config);
  }
}

export function buildDb(config: DbConfig): DatabaseBackend {
  switch (config.provider) {
    case "sqlite":
      return new SQLiteBackend(config.path);
    case "postgres":
      return new PostgresBackend(config.connectionString);
  }
}

export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw);
}
