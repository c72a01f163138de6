export class WatercrawlError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.status = options.status;
  }
}

/** Missing or rejected API key. */
export class AuthenticationError extends WatercrawlError {}

/** Malformed parameters, rejected locally or by the service. */
export class ValidationError extends WatercrawlError {}

/** Network failure or an unexpected HTTP status. */
export class TransportError extends WatercrawlError {}

export class CrawlJobFailedError extends WatercrawlError {
  constructor(readonly jobId: string, readonly jobStatus: string) {
    super(`Crawl job ${jobId} ended with status "${jobStatus}"`);
  }
}

export class CrawlTimeoutError extends WatercrawlError {
  constructor(readonly jobId: string, readonly attempts: number) {
    super(`Crawl job ${jobId} did not finish after ${attempts} status checks`);
  }
}

export class CredentialValidationError extends WatercrawlError {}

// Wraps whatever stopped a host crawl; the typed error stays on `cause`.
export class CrawlFailedError extends WatercrawlError {
  constructor(cause: unknown) {
    super(`Failed to crawl website: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}
