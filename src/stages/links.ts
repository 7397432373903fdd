/**
 * Content link liveness: classify and probe every link of the silver
 * fanout table and record the outcome in the gold store.
 */
import pLimit from "p-limit";
import { windowedBackfill, type BackfillResult } from "../core/backfill.js";
import { ReplicationFailedException } from "../core/exceptions.js";
import {
  LinkStatus,
  type ContentLinkRecord,
  type ContentLinkStatusRecord,
  type Window,
} from "../core/types.js";
import { windowBounds } from "../core/window.js";
import { columnList, GOLD_LINK_STATUS_COLUMNS, SILVER_LINK_COLUMNS } from "../db/schema.js";
import { toSqlTimestampOrNull } from "../db/timestamps.js";
import { childLogger, errorMessage } from "../logger.js";
import type { StageContext } from "./context.js";
import { createGoldTables, insertPaged } from "./gold.js";
import { contentLinkFromRow } from "./rows.js";

export type LinkClass =
  | { kind: "fragment"; target: string }
  | { kind: "mail"; target: string }
  | { kind: "external"; target: string }
  | { kind: "internal"; target: string }
  | { kind: "invalid"; error: string };

export interface LinkCheck {
  status: LinkStatus;
  detail: string;
}

/** Performs one HTTP liveness request; resolves to the response status. */
export interface HttpProbe {
  probe(url: string, timeoutSec: number): Promise<number>;
}

export class ProbeTimeoutError extends Error {
  constructor(url: string, timeoutSec: number) {
    super(`Probe of ${url} exceeded ${timeoutSec} sec`);
    this.name = "ProbeTimeoutError";
  }
}

export class FetchProbe implements HttpProbe {
  async probe(url: string, timeoutSec: number): Promise<number> {
    try {
      const res = await fetch(url, {
        method: "GET",
        redirect: "follow",
        signal: AbortSignal.timeout(timeoutSec * 1000),
      });
      await res.body?.cancel();
      return res.status;
    } catch (err) {
      if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
        throw new ProbeTimeoutError(url, timeoutSec);
      }
      throw err;
    }
  }
}

export function classifyLink(link: string, articleUrl: string): LinkClass {
  const trimmed = link.trim();
  if (trimmed.startsWith("#")) return { kind: "fragment", target: trimmed };
  if (trimmed.toLowerCase().startsWith("mailto:")) return { kind: "mail", target: trimmed };
  try {
    if (/^https?:\/\//i.test(trimmed)) {
      new URL(trimmed);
      return { kind: "external", target: trimmed };
    }
    return { kind: "internal", target: new URL(trimmed, articleUrl).toString() };
  } catch (err) {
    return { kind: "invalid", error: errorMessage(err) };
  }
}

/** Classify then probe `link`. Never throws. */
export async function checkLink(
  link: string,
  articleUrl: string,
  probe: HttpProbe,
  timeoutSec: number,
): Promise<LinkCheck> {
  const cls = classifyLink(link, articleUrl);
  switch (cls.kind) {
    case "fragment":
      return { status: LinkStatus.InternalWorking, detail: "same page anchor" };
    case "mail":
      return { status: LinkStatus.MailLink, detail: cls.target };
    case "invalid":
      return { status: LinkStatus.ParseError, detail: cls.error };
  }

  const external = cls.kind === "external";
  try {
    const status = await probe.probe(cls.target, timeoutSec);
    const ok = status >= 200 && status < 400;
    const linkStatus = external
      ? ok ? LinkStatus.ExternalWorking : LinkStatus.ExternalBroken
      : ok ? LinkStatus.InternalWorking : LinkStatus.InternalBroken;
    return { status: linkStatus, detail: `HTTP ${status}` };
  } catch (err) {
    if (err instanceof ProbeTimeoutError) {
      return { status: LinkStatus.Timeout, detail: `timeout ${timeoutSec} sec` };
    }
    return {
      status: external ? LinkStatus.ExternalBroken : LinkStatus.InternalBroken,
      detail: errorMessage(err),
    };
  }
}

/**
 * Probe every content link of the window with bounded concurrency and
 * replace the window in the link status table.
 */
export async function backfillLinkStatus(
  ctx: StageContext,
  window: Window,
  probe: HttpProbe = new FetchProbe(),
): Promise<BackfillResult> {
  const log = ctx.logger ?? childLogger("links");
  const source = ctx.tables.get("silverLinks");
  const target = ctx.tables.get("goldLinkStatus");
  const { linkTimeoutSec, linkConcurrency, goldPageSize } = ctx.settings;
  await createGoldTables(ctx);

  return windowedBackfill<ContentLinkRecord, ContentLinkStatusRecord>(
    {
      target: { db: ctx.gold, table: target, timestampColumn: "date_modified" },
      fetch: async (w) =>
        (
          await ctx.warehouse.query(
            `SELECT ${columnList(SILVER_LINK_COLUMNS)} FROM ${source.sql}
             WHERE date_modified BETWEEN ? AND ? ORDER BY url, link`,
            windowBounds(w),
          )
        ).map(contentLinkFromRow),
      keyOf: (l) => `${l.url}\u0000${l.link}`,
      timestampOf: (l) => l.dateModified,
      transform: async (rows) => {
        const limit = pLimit(linkConcurrency);
        const checks = await Promise.all(
          rows.map((row) =>
            limit(async () => ({
              row,
              check: await checkLink(row.link, row.url, probe, linkTimeoutSec),
            })),
          ),
        );
        const counts: Record<string, number> = {};
        for (const { check } of checks) counts[check.status] = (counts[check.status] ?? 0) + 1;
        log.info({ links: rows.length, ...counts }, "Probed content links");
        return checks.map(({ row, check }) => ({
          rowId: row.rowId,
          url: row.url,
          link: row.link,
          linkStatus: check.status,
          detail: check.detail,
          dateModified: row.dateModified,
        }));
      },
      insert: (rows) =>
        insertPaged(
          ctx.gold,
          target,
          GOLD_LINK_STATUS_COLUMNS,
          rows.map((r) => [
            r.rowId,
            r.url,
            r.link,
            r.linkStatus,
            r.detail,
            toSqlTimestampOrNull(r.dateModified),
          ]),
          goldPageSize,
        ),
      logger: log,
      failure: (table, operation, cause) => new ReplicationFailedException(table, operation, cause),
    },
    window,
  );
}
