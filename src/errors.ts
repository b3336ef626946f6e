/**
 * Cache error kinds. None of these may block answer delivery; callers
 * degrade to a miss or skip caching.
 */
export enum CacheErrorCode {
  EMBEDDING_FAILURE = "EMBEDDING_FAILURE",
  STORAGE_CORRUPTION = "STORAGE_CORRUPTION",
  STORAGE_WRITE_FAILURE = "STORAGE_WRITE_FAILURE",
  INDEX_INCONSISTENCY = "INDEX_INCONSISTENCY",
  CONFIG_INVALID = "CONFIG_INVALID",
}

export class CacheError extends Error {
  constructor(
    public readonly code: CacheErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = "CacheError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/** Embedding provider unavailable, timed out or returned garbage */
export class EmbeddingFailure extends CacheError {
  constructor(message: string, cause?: unknown) {
    super(CacheErrorCode.EMBEDDING_FAILURE, message, cause);
    this.name = "EmbeddingFailure";
  }
}

export class StorageCorruption extends CacheError {
  constructor(
    message: string,
    public readonly line: number,
    cause?: unknown
  ) {
    super(CacheErrorCode.STORAGE_CORRUPTION, message, cause);
    this.name = "StorageCorruption";
  }
}

export class StorageWriteFailure extends CacheError {
  constructor(message: string, cause?: unknown) {
    super(CacheErrorCode.STORAGE_WRITE_FAILURE, message, cause);
    this.name = "StorageWriteFailure";
  }
}

export class IndexInconsistency extends CacheError {
  constructor(message: string, cause?: unknown) {
    super(CacheErrorCode.INDEX_INCONSISTENCY, message, cause);
    this.name = "IndexInconsistency";
  }
}

export class CacheConfigError extends CacheError {
  constructor(message: string) {
    super(CacheErrorCode.CONFIG_INVALID, message);
    this.name = "CacheConfigError";
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
