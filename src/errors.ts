// Retryable: network failures, timeouts, rate limits.
export class TransientRemoteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientRemoteError";
  }
}

// Document unreadable or empty. Never retried; surfaces as an ERROR record.
export class PermanentExtractionFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PermanentExtractionFailure";
  }
}

export class CacheCorruption extends Error {
  constructor(
    public readonly fingerprint: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CacheCorruption";
  }
}

// Raised when a checkpoint cannot be read or an atomic save fails.
// Nothing has been moved into place when this is thrown.
export class PersistenceFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceFailure";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
