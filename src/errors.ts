/**
 * Every fatal condition of an ingest run. Nothing here is retried: callers log the
 * error with its context and exit non-zero.
 */
export class IngestError extends Error {
  readonly context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.context = context;
  }
}

export class ConfigError extends IngestError {}

export class AuthError extends IngestError {}

export class TransportError extends IngestError {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, status?: number, options?: { cause?: unknown }) {
    super(message, status === undefined ? { url } : { url, status }, options);
    this.url = url;
    this.status = status;
  }
}

export class NoProjectsError extends IngestError {}

export class ManifestCorruptError extends IngestError {
  readonly filePath: string;

  constructor(message: string, filePath: string, options?: { cause?: unknown }) {
    super(message, { manifest: filePath }, options);
    this.filePath = filePath;
  }
}

/** Raised when the dataset backend fails outside of per-record work (init, auth setup, save). */
export class DatasetError extends IngestError {}

interface RecordFailure {
  project: string;
  destinationPath: string;
  cause: unknown;
}

export class RegistrationError extends IngestError {
  readonly project: string;
  readonly destinationPath: string;

  constructor({ project, destinationPath, cause }: RecordFailure) {
    super(
      `Failed to register ${destinationPath} (project ${project}): ${describeCause(cause)}`,
      { project, destinationPath },
      { cause }
    );
    this.project = project;
    this.destinationPath = destinationPath;
  }
}

// The manifest already holds a row for the path when this is thrown.
export class MaterializationError extends IngestError {
  readonly project: string;
  readonly destinationPath: string;

  constructor({ project, destinationPath, cause }: RecordFailure) {
    super(
      `Failed to materialize ${destinationPath} (project ${project}): ${describeCause(cause)}`,
      { project, destinationPath },
      { cause }
    );
    this.project = project;
    this.destinationPath = destinationPath;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** An API value would place a file outside its own directory in the dataset. */
export class UnsafePathError extends IngestError {}
