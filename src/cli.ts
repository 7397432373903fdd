#!/usr/bin/env node
/**
 * CLI entrypoint for blog-medallion.
 *
 * Usage:
 *   blog-medallion sitemap
 *   blog-medallion silver --start-year 2021 --start-month 1 --end-year 2021 --end-month 6
 */
import { runCli } from "./commands.js";

process.exitCode = await runCli(process.argv.slice(2));
