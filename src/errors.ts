export class PmexError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid environment, or a storage layout that cannot be resolved. */
export class ConfigurationError extends PmexError {}

export class MissingDirectoryError extends ConfigurationError {
  constructor(readonly directory: string) {
    super(`Snapshot directory does not exist: ${directory}`);
  }
}

/** The latest final snapshot is too far behind to fill automatically. */
export class StaleDataError extends PmexError {}

/** A month distance that cannot happen with a sane clock and snapshot naming. */
export class InvariantViolationError extends PmexError {}

export class UnexpectedResponseError extends PmexError {}

export class QueryServiceError extends PmexError {
  constructor(
    message: string,
    readonly statusCode: number | null = null,
  ) {
    super(message);
  }
}

export class IOError extends PmexError {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`I/O failure on ${path}: ${reason}`, { cause });
  }
}
