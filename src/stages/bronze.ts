/**
 * Bronze loader: raw partition files into the bronze table.
 */
import { stagingUpsert, type UpsertResult } from "../core/staging.js";
import { BRONZE_COLUMNS, createTableSql } from "../db/schema.js";
import { childLogger } from "../logger.js";
import { readPartitioned } from "../storage/partitions.js";
import type { StageContext } from "./context.js";
import { bronzeValues } from "./rows.js";

export interface BronzeResult extends UpsertResult {
  read: number;
  /** Bronze row count after the load. */
  total: number;
}

export async function createBronzeTable(ctx: StageContext): Promise<void> {
  await ctx.warehouse.execute(
    createTableSql(ctx.tables.get("bronze"), BRONZE_COLUMNS, ctx.warehouse.dialect),
  );
}

export async function loadBronze(
  ctx: StageContext,
  basePath: string = ctx.settings.rawPath,
): Promise<BronzeResult> {
  const log = ctx.logger ?? childLogger("bronze");
  const table = ctx.tables.get("bronze");
  await createBronzeTable(ctx);

  const records = await readPartitioned(ctx.storage, basePath);
  log.info({ basePath, records: records.length }, "Read raw partitions");

  const result = await stagingUpsert(
    ctx.warehouse,
    { table, columns: BRONZE_COLUMNS, key: "url", changeColumn: "date_modified" },
    records.map(bronzeValues),
    { logger: log },
  );

  const counted = await ctx.warehouse.queryOne<{ n: unknown }>(
    `SELECT COUNT(*) AS n FROM ${table.sql}`,
  );
  const total = Number(counted?.n ?? 0);
  log.info({ table: table.name, total }, "Bronze row count");

  return { ...result, read: records.length, total };
}
