/**
 * Tunables shared by the pipeline stages.
 */
import { z } from "zod";
import { EARLIEST_YEAR } from "./window.js";

export const PipelineSettingsSchema = z
  .object({
    /** Object-storage prefix of the raw article partitions. */
    rawPath: z.string().default("raw"),
    earliestYear: z.number().int().default(EARLIEST_YEAR),
    chunkSize: z.number().int().positive().default(400),
    chunkOverlap: z.number().int().nonnegative().default(50),
    /** Articles embedded at the same time. */
    concurrency: z.number().int().positive().default(2),
    /** Articles per ingestion group. */
    batchSize: z.number().int().positive().default(5),
    /** Pause between ingestion groups. */
    groupDelayMs: z.number().int().nonnegative().default(1000),
    /** Parallel embedding requests across all articles. */
    embedConcurrency: z.number().int().positive().default(4),
    goldPageSize: z.number().int().positive().default(1000),
    linkTimeoutSec: z.number().positive().default(30),
    linkConcurrency: z.number().int().positive().default(10),
  })
  .refine((s) => s.chunkOverlap < s.chunkSize, {
    message: "chunkOverlap must be smaller than chunkSize",
    path: ["chunkOverlap"],
  });

export type PipelineSettings = z.infer<typeof PipelineSettingsSchema>;

export const SiteSchema = z.object({
  baseUrl: z.string().url().default("https://pybit.es/articles/"),
  sitemapUrl: z.string().url().default("https://pybit.es/post-sitemap1.xml"),
  excludedSuffixes: z.array(z.string()).default(["png", "jpeg", "jpg"]),
});

export type SiteSettings = z.infer<typeof SiteSchema>;

export function defaultSettings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  return PipelineSettingsSchema.parse(overrides);
}

export function defaultSite(overrides: Partial<SiteSettings> = {}): SiteSettings {
  return SiteSchema.parse(overrides);
}
