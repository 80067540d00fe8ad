/**
 * errors.ts - Error taxonomy for a collection run
 *
 * Only SessionError, ArchiveError and ConfigError ever leave runCollection().
 * FetchError, SanitizationError and WriteError are recoverable: the stage that
 * raises them records the failure in the summary and moves on.
 */

export type CollectorStage =
  | "config"
  | "session"
  | "fetch"
  | "sanitize"
  | "write"
  | "archive";

/**
 * Base class carrying the pipeline stage that failed, so the CLI can name it.
 */
export class CollectorError extends Error {
  readonly stage: CollectorStage;

  constructor(stage: CollectorStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CollectorError";
    this.stage = stage;
  }
}

/** Invalid options or unreadable override files. Fatal, raised before the run. */
export class ConfigError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config", message, options);
    this.name = "ConfigError";
  }
}

/** The cluster API cannot be reached with the supplied kubeconfig. Fatal. */
export class SessionError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("session", message, options);
    this.name = "SessionError";
  }
}

/**
 * One kind/namespace listing failed. Recoverable. A listing cut short by the
 * run deadline is `cancelled` and counts as cancelled, not failed.
 */
export class FetchError extends CollectorError {
  readonly resource: string;
  readonly namespace: string;
  readonly cancelled: boolean;

  constructor(
    resource: string,
    namespace: string,
    message: string,
    options: { cancelled?: boolean } = {}
  ) {
    super("fetch", message);
    this.name = "FetchError";
    this.resource = resource;
    this.namespace = namespace;
    this.cancelled = options.cancelled ?? false;
  }
}

/** A record's shape does not match its declared kind. Recoverable per record. */
export class SanitizationError extends CollectorError {
  constructor(message: string) {
    super("sanitize", message);
    this.name = "SanitizationError";
  }
}

/** A record's file could not be written. Recoverable per record. */
export class WriteError extends CollectorError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("write", message, options);
    this.name = "WriteError";
    this.path = path;
  }
}

/** The requested archive could not be produced. Fatal to the final step. */
export class ArchiveError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("archive", message, options);
    this.name = "ArchiveError";
  }
}

/**
 * Message text for an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
