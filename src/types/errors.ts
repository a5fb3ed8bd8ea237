// Error taxonomy for the fetch/extract pipeline.
// Only TransientFetchError crosses the page boundary; the parse errors stay inside the extractor.

export abstract class ScrapeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network or HTTP failure that survived every retry attempt
 */
export class TransientFetchError extends ScrapeError {
  readonly url: string;
  readonly attempts: number;
  readonly status?: number;

  constructor(
    message: string,
    details: { url: string; attempts: number; status?: number; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.url = details.url;
    this.attempts = details.attempts;
    this.status = details.status;
  }
}

/**
 * A page without the expected listing containers (no results, or an anti-bot interstitial)
 */
export class StructuralParseError extends ScrapeError {
  readonly source: string;

  constructor(message: string, source: string) {
    super(message);
    this.source = source;
  }
}

export class FieldParseError extends ScrapeError {
  readonly field: string;
  readonly raw: string;

  constructor(field: string, raw: string, reason?: string) {
    super(`Could not parse ${field} from "${raw}"${reason ? `: ${reason}` : ''}`);
    this.field = field;
    this.raw = raw;
  }
}

export class RecordParseError extends ScrapeError {
  readonly index: number;
  readonly containerHtml: string;

  constructor(index: number, containerHtml: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to process listing container ${index}: ${reason}`, { cause });
    this.index = index;
    this.containerHtml = containerHtml;
  }
}

export class SearchAbortedError extends ScrapeError {
  readonly query: string;
  readonly page: number;

  constructor(query: string, page: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Search "${query}" aborted: page ${page} failed (${reason})`, { cause });
    this.query = query;
    this.page = page;
  }
}

export class InvalidQueryError extends ScrapeError {
  constructor(query: string) {
    super(`Search query must not be blank (got "${query}")`);
  }
}

export class ConfigError extends ScrapeError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.issues = issues;
  }
}
