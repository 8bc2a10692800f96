export type ErrorCode = "InvalidInput" | "ConfigError" | "EmbeddingError" | "StorageError";

export interface RepolensErrorOptions {
  cause?: unknown;
}

/** Base class for every error the indexing and search core raises on purpose. */
export class RepolensError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options: RepolensErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
  }
}

/** Bad caller input: missing root, unsafe user id, non-positive top-k. */
export class InvalidInputError extends RepolensError {
  constructor(message: string, options: RepolensErrorOptions = {}) {
    super("InvalidInput", message, options);
  }
}

export class ConfigError extends RepolensError {
  constructor(message: string, options: RepolensErrorOptions = {}) {
    super("ConfigError", message, options);
  }
}

/**
 * The embedding model could not produce usable vectors. Always fatal for the
 * operation in flight: returning placeholder vectors would corrupt ranking.
 */
export class EmbeddingError extends RepolensError {
  constructor(message: string, options: RepolensErrorOptions = {}) {
    super("EmbeddingError", message, options);
  }
}

export class StorageError extends RepolensError {
  constructor(message: string, options: RepolensErrorOptions = {}) {
    super("StorageError", message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
