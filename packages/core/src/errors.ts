export abstract class SessionIndexError extends Error {
  constructor(
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/** Backing store or process is unreachable; the provider cools down before the next attempt. */
export class ProviderUnavailableError extends SessionIndexError {
  constructor(
    public readonly providerId: string,
    reason: string,
  ) {
    super("PROVIDER_UNAVAILABLE", `Provider '${providerId}' is unavailable: ${reason}`);
  }
}

/** A record's backing file vanished or can no longer be read. */
export class StaleFileError extends SessionIndexError {
  constructor(public readonly filePath: string) {
    super("STALE_FILE", `Session file is missing or unreadable: ${filePath}`);
  }
}

export class ParseFailureError extends SessionIndexError {
  constructor(
    public readonly filePath: string,
    reason: string,
  ) {
    super("PARSE_FAILURE", `Failed to parse ${filePath}: ${reason}`);
  }
}

/** The persistent record cache could not be read. */
export class CacheCorruptionError extends SessionIndexError {
  constructor(reason: string) {
    super("CACHE_CORRUPTION", `Record cache read failed: ${reason}`);
  }
}

export function asErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string {
  if (error instanceof SessionIndexError) return error.code;
  return "INTERNAL_ERROR";
}
