/**
 * Custom exceptions for pipeline stages.
 */

export class WindowValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WindowValidationError";
  }
}

export class SitemapUrlError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SitemapUrlError";
  }
}

export class InvalidIdentifierError extends Error {
  identifier: string;

  constructor(identifier: string, message?: string) {
    super(message ?? `Invalid SQL identifier: ${identifier}`);
    this.name = "InvalidIdentifierError";
    this.identifier = identifier;
  }
}

/** Base for failures of a transactional unit of work on a table. */
export class TableOperationError extends Error {
  table: string;
  operation: string;

  constructor(
    kind: string,
    table: string,
    operation: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${kind} failed on ${table} during ${operation}: ${detail}`, {
      cause,
    });
    this.table = table;
    this.operation = operation;
  }
}

export class UpsertFailedException extends TableOperationError {
  constructor(table: string, operation: string, cause: unknown) {
    super("Upsert", table, operation, cause);
    this.name = "UpsertFailedException";
  }
}

export class BackfillFailedException extends TableOperationError {
  constructor(table: string, operation: string, cause: unknown) {
    super("Backfill", table, operation, cause);
    this.name = "BackfillFailedException";
  }
}

export class ReplicationFailedException extends TableOperationError {
  constructor(table: string, operation: string, cause: unknown) {
    super("Replication", table, operation, cause);
    this.name = "ReplicationFailedException";
  }
}

export class VectorStoreUnavailableError extends Error {
  constructor(collection: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Vector store unavailable for collection ${collection}: ${detail}`, {
      cause,
    });
    this.name = "VectorStoreUnavailableError";
  }
}

export class StorageConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StorageConfigError";
  }
}

/** An object key that is empty or climbs out of the storage root. */
export class StorageKeyError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`Invalid storage key: ${JSON.stringify(key)}`);
    this.name = "StorageKeyError";
    this.key = key;
  }
}

/** A collaborator needed by the requested stage is not configured. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
