/**
 * Error taxonomy for the indexing pipeline.
 *
 * Per-document and per-page errors are recorded on the index and the run
 * continues. Only configuration and persistence errors abort a run.
 */

export class DiscoveryError extends Error {
  constructor(
    public readonly filePath: string,
    message: string
  ) {
    super(message);
    this.name = "DiscoveryError";
  }
}

export class ConversionError extends Error {
  public readonly transient: boolean;
  public readonly exitCode: number | null;

  constructor(message: string, options: { transient?: boolean; exitCode?: number | null } = {}) {
    super(message);
    this.name = "ConversionError";
    this.transient = options.transient ?? false;
    this.exitCode = options.exitCode ?? null;
  }
}

export class RasterizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RasterizationError";
  }
}

export class SummarizationError extends Error {
  public readonly transient: boolean;

  constructor(message: string, options: { transient?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "SummarizationError";
    this.transient = options.transient ?? false;
  }
}

export class PersistenceError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "PersistenceError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Thrown when a run is aborted before a unit of work could start. */
export class CancelledError extends Error {
  constructor(message = "Run cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export function isFatalError(err: unknown): boolean {
  return err instanceof PersistenceError || err instanceof ConfigurationError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message.split("\n")[0].trim() || err.name;
  }
  return String(err);
}
