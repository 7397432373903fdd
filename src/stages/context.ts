/**
 * Collaborators handed to every stage job.
 */
import type { PipelineSettings, SiteSettings } from "../core/settings.js";
import type { DatabaseBackend } from "../db/backend.js";
import type { TableRegistry } from "../db/identifiers.js";
import type { Logger } from "../logger.js";
import type { StorageBackend } from "../storage/backend.js";

export interface StageContext {
  /** Store A: sitemap urls, bronze and silver. */
  warehouse: DatabaseBackend;
  /** Store B: gold tables read by the dashboard. */
  gold: DatabaseBackend;
  storage: StorageBackend;
  tables: TableRegistry;
  settings: PipelineSettings;
  site: SiteSettings;
  logger?: Logger;
}
