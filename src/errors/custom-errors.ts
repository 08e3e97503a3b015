/**
 * Base error class for tagesschau-dl
 */
export class TagesschauError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TagesschauError';
  }
}

/**
 * Configuration error
 */
export class ConfigError extends TagesschauError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Invalid command-line input (bad date and the like)
 */
export class UsageError extends TagesschauError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Search endpoint unreachable, timed out or answered with something unusable
 */
export class RemoteUnavailableError extends TagesschauError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'RemoteUnavailableError';
  }
}

/**
 * One search result could not be projected into a catalog entry.
 * Raised per entry; the search skips it and carries on.
 */
export class MalformedEntryError extends TagesschauError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedEntryError';
  }
}

/**
 * No 20:00 edition for the date, neither cached nor in the search results
 */
export class NotAvailableError extends TagesschauError {
  constructor(public readonly date: string) {
    super(`No 20:00 edition available for ${date}`);
    this.name = 'NotAvailableError';
  }
}

/**
 * Download error
 */
export class DownloadError extends TagesschauError {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message);
    this.name = 'DownloadError';
  }
}

/**
 * The cache directory exists but cannot be read
 */
export class CacheError extends TagesschauError {
  constructor(
    message: string,
    public readonly dir: string,
  ) {
    super(message);
    this.name = 'CacheError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
