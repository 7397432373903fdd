/**
 * Hive-style partitioned article files on object storage.
 *
 * Each partition holds one gzip-compressed columnar document: a typed
 * schema plus one value array per column, nested columns included.
 */
import { gunzipSync, gzipSync, strFromU8, strToU8 } from "fflate";
import { z } from "zod";
import type { ArticleRecord } from "../core/types.js";
import type { StorageBackend } from "./backend.js";

export const PARTITION_FILE_SUFFIX = ".cols.gz";
const NULL_PARTITION = "__HIVE_DEFAULT_PARTITION__";
const FORMAT_VERSION = 1;

export type PartitionKey = "year" | "month";

const ColumnTypeSchema = z.enum(["string", "timestamp", "int", "string[]", "link[]"]);
type ColumnType = z.infer<typeof ColumnTypeSchema>;

const ARTICLE_SCHEMA: { name: keyof ArticleRecord; type: ColumnType }[] = [
  { name: "url", type: "string" },
  { name: "title", type: "string" },
  { name: "datePublished", type: "timestamp" },
  { name: "dateModified", type: "timestamp" },
  { name: "author", type: "string" },
  { name: "tags", type: "string[]" },
  { name: "contentLinks", type: "link[]" },
  { name: "content", type: "string[]" },
  { name: "year", type: "int" },
  { name: "month", type: "int" },
];

const PartitionFileSchema = z.object({
  version: z.literal(FORMAT_VERSION),
  rowCount: z.number().int().nonnegative(),
  schema: z.array(z.object({ name: z.string(), type: ColumnTypeSchema })),
  columns: z.record(z.array(z.unknown())),
});

const StringColumn = z.array(z.string().nullable());
const IntColumn = z.array(z.number().int().nullable());
const StringListColumn = z.array(z.array(z.string()));
const LinkListColumn = z.array(z.array(z.object({ text: z.string(), link: z.string() })));

function toTimestamp(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

// ---------------------------------------------------------------------------
// Encode / decode
// ---------------------------------------------------------------------------

export function encodePartitionFile(records: ArticleRecord[]): Uint8Array {
  const doc = {
    version: FORMAT_VERSION,
    rowCount: records.length,
    schema: ARTICLE_SCHEMA,
    columns: {
      url: records.map((r) => r.url),
      title: records.map((r) => r.title),
      datePublished: records.map((r) => r.datePublished?.toISOString() ?? null),
      dateModified: records.map((r) => r.dateModified?.toISOString() ?? null),
      author: records.map((r) => r.author),
      tags: records.map((r) => r.tags),
      contentLinks: records.map((r) => r.contentLinks),
      content: records.map((r) => r.content),
      year: records.map((r) => r.year),
      month: records.map((r) => r.month),
    },
  };
  return gzipSync(strToU8(JSON.stringify(doc)));
}

export function decodePartitionFile(data: Uint8Array): ArticleRecord[] {
  const doc = PartitionFileSchema.parse(JSON.parse(strFromU8(gunzipSync(data))));
  const column = (name: string): unknown[] => {
    const values = doc.columns[name];
    if (!values || values.length !== doc.rowCount) {
      throw new Error(`Partition column ${name} missing or not ${doc.rowCount} rows long`);
    }
    return values;
  };

  const url = z.array(z.string()).parse(column("url"));
  const title = StringColumn.parse(column("title"));
  const datePublished = StringColumn.parse(column("datePublished"));
  const dateModified = StringColumn.parse(column("dateModified"));
  const author = StringColumn.parse(column("author"));
  const tags = StringListColumn.parse(column("tags"));
  const contentLinks = LinkListColumn.parse(column("contentLinks"));
  const content = StringListColumn.parse(column("content"));
  const year = IntColumn.parse(column("year"));
  const month = IntColumn.parse(column("month"));

  return url.map((u, i) => ({
    url: u,
    title: title[i] ?? null,
    datePublished: toTimestamp(datePublished[i] ?? null),
    dateModified: toTimestamp(dateModified[i] ?? null),
    author: author[i] ?? null,
    tags: tags[i] ?? [],
    contentLinks: contentLinks[i] ?? [],
    content: content[i] ?? [],
    year: year[i] ?? null,
    month: month[i] ?? null,
  }));
}

// ---------------------------------------------------------------------------
// Partitioned write / read
// ---------------------------------------------------------------------------

export function partitionPath(
  basePath: string,
  record: ArticleRecord,
  keys: PartitionKey[],
): string {
  const base = basePath.replace(/\/+$/, "");
  const parts = keys.map((k) => `${k}=${record[k] ?? NULL_PARTITION}`);
  return [base, ...parts].join("/");
}

/**
 * Write one file per partition, named `fileName` inside the partition
 * directory. Writing the same file name again replaces it. Returns the
 * written keys.
 */
export async function writePartitioned(
  storage: StorageBackend,
  records: ArticleRecord[],
  basePath: string,
  keys: PartitionKey[] = ["year", "month"],
  fileName = "part-0",
): Promise<string[]> {
  const groups = new Map<string, ArticleRecord[]>();
  for (const record of records) {
    const dir = partitionPath(basePath, record, keys);
    const group = groups.get(dir);
    if (group) group.push(record);
    else groups.set(dir, [record]);
  }

  const written: string[] = [];
  for (const [dir, group] of groups) {
    const key = `${dir}/${fileName}${PARTITION_FILE_SUFFIX}`;
    await storage.write(key, encodePartitionFile(group));
    written.push(key);
  }
  return written;
}

/** Read every partition file under `basePath`. */
export async function readPartitioned(
  storage: StorageBackend,
  basePath: string,
): Promise<ArticleRecord[]> {
  const keys = (await storage.list(basePath.replace(/\/+$/, ""))).filter((k) =>
    k.endsWith(PARTITION_FILE_SUFFIX),
  );
  const records: ArticleRecord[] = [];
  for (const key of keys) {
    records.push(...decodePartitionFile(await storage.read(key)));
  }
  return records;
}
