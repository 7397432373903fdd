/**
 * Command-line stages. `runCli` returns the process exit code:
 * 0 on success, 2 on invalid input (nothing touched), 1 on a failed run.
 */
import { parseArgs } from "node:util";
import { ZodError } from "zod";
import { configFromEnv, parseConfig, type Config } from "./config.js";
import {
  InvalidIdentifierError,
  SitemapUrlError,
  WindowValidationError,
} from "./core/exceptions.js";
import type { Window } from "./core/types.js";
import { resolveWindow } from "./core/window.js";
import { BlogPipeline } from "./index.js";
import { childLogger, errorMessage } from "./logger.js";
import { validateSitemapUrl } from "./stages/sitemap.js";

export const STAGES = ["sitemap", "scrape", "bronze", "silver", "gold", "links", "embed", "search"] as const;
export type Stage = (typeof STAGES)[number];

const USAGE = `
blog-medallion: blog sitemap to medallion tables and vector store

Usage:
  blog-medallion sitemap [--url <sitemap.xml> | --index <sitemap_index.xml>]
  blog-medallion scrape  --start-year <y> --start-month <m> [--end-year <y> --end-month <m>]
  blog-medallion bronze
  blog-medallion silver  --start-year <y> --start-month <m> [...]
  blog-medallion gold    --start-year <y> --start-month <m> [...]
  blog-medallion links   --start-year <y> --start-month <m> [...]
  blog-medallion embed   --start-year <y> --start-month <m> [...]
  blog-medallion search  --query <text> [--top-k <n>]

Options:
  --start-year <y>    First year of the window
  --start-month <m>   First month of the window (1-12)
  --end-year <y>      Last year of the window   (default: current year)
  --end-month <m>     Last month of the window  (default: current month)
  --url <url>         Sitemap url on the configured site
  --index <url>       Sitemap index url; every listed sitemap is ingested
  --query <text>      Search text
  --top-k <n>         Number of search results (default: 5)
  --help              Show this help

Configuration comes from the environment (STORAGE_PROVIDER, WAREHOUSE_PATH,
GOLD_URL, QDRANT_URL, OPENAI_API_KEY, CHUNK_SIZE, CHUNK_OVERLAP, ...).
`.trim();

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  now?: Date;
  createPipeline?: (config: Config) => BlogPipeline;
  print?: (line: string) => void;
}

function isStage(value: string | undefined): value is Stage {
  return STAGES.some((s) => s === value);
}

function intFlag(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^-?\d+$/.test(value.trim())) {
    throw new WindowValidationError(`--${name} must be an integer, got "${value}"`);
  }
  return Number(value);
}

/** Errors raised for bad input, before any side effect. */
export function isValidationError(err: unknown): boolean {
  return (
    err instanceof UsageError ||
    err instanceof WindowValidationError ||
    err instanceof SitemapUrlError ||
    err instanceof InvalidIdentifierError ||
    err instanceof ZodError
  );
}

function parseCliArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        "start-year": { type: "string" },
        "start-month": { type: "string" },
        "end-year": { type: "string" },
        "end-month": { type: "string" },
        url: { type: "string" },
        index: { type: "string" },
        query: { type: "string" },
        "top-k": { type: "string" },
        help: { type: "boolean", short: "h", default: false },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (err) {
    throw new UsageError(errorMessage(err));
  }
}

export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const log = childLogger("cli");
  const print = options.print ?? ((line: string) => console.log(line));

  let pipeline: BlogPipeline | undefined;
  try {
    const { values, positionals } = parseCliArgs(argv);

    if (values.help) {
      print(USAGE);
      return 0;
    }
    const stage = positionals[0];
    if (!isStage(stage)) {
      throw new UsageError(`Unknown or missing stage "${stage ?? ""}"\n\n${USAGE}`);
    }

    const config = parseConfig(configFromEnv(options.env ?? process.env));

    let window: Window | undefined;
    const startYear = intFlag("start-year", values["start-year"]);
    const startMonth = intFlag("start-month", values["start-month"]);
    if (["scrape", "silver", "gold", "links", "embed"].includes(stage)) {
      if (startYear === undefined || startMonth === undefined) {
        throw new UsageError(`${stage} needs --start-year and --start-month`);
      }
      window = resolveWindow(
        {
          startYear,
          startMonth,
          endYear: intFlag("end-year", values["end-year"]),
          endMonth: intFlag("end-month", values["end-month"]),
        },
        options.now ?? new Date(),
        config.pipeline.earliestYear,
      );
    }
    const url = values.url === undefined ? undefined : validateSitemapUrl(values.url, config.site);
    const index =
      values.index === undefined ? undefined : validateSitemapUrl(values.index, config.site);
    if (url && index) throw new UsageError("--url and --index are mutually exclusive");
    const query = values.query?.trim();
    if (stage === "search" && !query) throw new UsageError("search needs --query");
    const topK = intFlag("top-k", values["top-k"]) ?? 5;
    if (topK < 1) throw new UsageError("--top-k must be at least 1");

    pipeline = (options.createPipeline ?? ((c: Config) => BlogPipeline.fromConfig(c)))(config);
    const result = await runStage(pipeline, stage, { window, url, index, query: query ?? "", topK });
    print(JSON.stringify(result, null, 2));
    return 0;
  } catch (err) {
    if (isValidationError(err)) {
      log.error({ err: errorMessage(err) }, "Invalid input");
      print(errorMessage(err));
      return 2;
    }
    log.error({ err: errorMessage(err) }, "Stage failed");
    return 1;
  } finally {
    await pipeline?.close();
  }
}

interface StageArgs {
  window?: Window;
  url?: string;
  index?: string;
  query: string;
  topK: number;
}

async function runStage(
  pipeline: BlogPipeline,
  stage: Stage,
  { window, url, index, query, topK }: StageArgs,
): Promise<unknown> {
  const needWindow = (): Window => {
    if (!window) throw new UsageError(`${stage} needs a window`);
    return window;
  };
  switch (stage) {
    case "sitemap": {
      const ingested = index
        ? await pipeline.ingestSitemapIndex(index)
        : await pipeline.ingestSitemap(url);
      return { ...ingested, summary: await pipeline.checkUrls() };
    }
    case "scrape":
      return pipeline.scrape(needWindow());
    case "bronze":
      return pipeline.loadBronze();
    case "silver":
      return pipeline.backfillSilver(needWindow());
    case "gold":
      return pipeline.replicateGold(needWindow());
    case "links":
      return pipeline.checkLinks(needWindow());
    case "embed":
      return pipeline.embed(needWindow());
    case "search":
      return pipeline.search(query, topK);
  }
}
