/**
 * Record types flowing through the pipeline stages.
 */

/** A sitemap entry: one article url and when it last changed. */
export interface UrlRecord {
  url: string;
  lastModified: Date | null;
}

export interface ContentLink {
  text: string;
  link: string;
}

/** Parsed article as written to raw partitions and the bronze table. */
export interface ArticleRecord {
  url: string;
  title: string | null;
  datePublished: Date | null;
  dateModified: Date | null;
  author: string | null;
  tags: string[];
  contentLinks: ContentLink[];
  content: string[];
  year: number | null;
  month: number | null;
}

/** Fields derived from an article when it is promoted to silver. */
export interface SilverDerivedFields {
  rowId: string;
  domain: string;
  category: string;
  urlTitle: string;
  daysBetweenPublishedModified: number | null;
  contentParagraphs: number;
  totalContentWords: number;
}

export type SilverArticleRecord = ArticleRecord & SilverDerivedFields;

/** One link found in an article body, unnested from silver. */
export interface ContentLinkRecord {
  rowId: string;
  url: string;
  alias: string;
  link: string;
  dateModified: Date | null;
}

/**
 * Gold copy of a silver article. Nested columns travel as JSON
 * document strings because the gold store may lack struct arrays.
 */
export interface GoldArticleRecord {
  rowId: string;
  url: string;
  domain: string;
  category: string;
  urlTitle: string;
  datePublished: Date | null;
  dateModified: Date | null;
  daysBetweenPublishedModified: number | null;
  title: string | null;
  author: string | null;
  tags: string;
  contentLinks: string;
  content: string;
  contentParagraphs: number;
  totalContentWords: number;
  year: number | null;
  month: number | null;
}

export enum LinkStatus {
  InternalWorking = "internal_working",
  InternalBroken = "internal_broken",
  ExternalWorking = "external_working",
  ExternalBroken = "external_broken",
  MailLink = "mail_link",
  Timeout = "timeout",
  ParseError = "parse_error",
}

export interface ContentLinkStatusRecord {
  rowId: string;
  url: string;
  link: string;
  linkStatus: LinkStatus;
  detail: string;
  dateModified: Date | null;
}

export interface ChunkMetadata {
  row_id: string;
  url: string;
  date_published: string | null;
  date_modified: string | null;
  title: string | null;
  author: string | null;
  tags: string[];
}

/** One embedded slice of an article, ready for the vector store. */
export interface DocumentChunk {
  id: string;
  content: string;
  denseVector: number[];
  metadata: ChunkMetadata;
}

/** Inclusive time range scoping a backfill. */
export interface Window {
  start: Date;
  end: Date;
}
