export class JamCrawlerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Request failed at the transport level or returned a non-2xx status. */
export class NetworkError extends JamCrawlerError {
  constructor(
    readonly url: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** A detail page is missing markup the extractor requires. */
export class MalformedPageError extends JamCrawlerError {
  constructor(readonly jamId: string, readonly reason: string) {
    super(`Malformed page for jam ${jamId}: ${reason}`);
  }
}

export class NotFoundError extends JamCrawlerError {
  constructor(readonly jamId: string) {
    super(`Jam ${jamId} not found`);
  }
}

/** Wraps a SQLite failure; the operation it names was rolled back. */
export class StorageError extends JamCrawlerError {
  constructor(readonly operation: string, cause: unknown) {
    super(`${operation} failed: ${errorMessage(cause)}`, { cause });
  }
}

export class InvalidJamError extends JamCrawlerError {}

export class ConfigError extends JamCrawlerError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
