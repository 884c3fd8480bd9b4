/**
 * Error taxonomy shared by the search, scrape and storage layers. Every class
 * exposes a stable `code` so log entries and outcomes can be filtered without
 * string matching on messages.
 */

/** Codes attached to {@link ProviderError}. */
export type ProviderErrorCode =
  | "E-PROVIDER-CREDENTIALS"
  | "E-PROVIDER-HTTP"
  | "E-PROVIDER-NETWORK"
  | "E-PROVIDER-TIMEOUT"
  | "E-PROVIDER-SCHEMA";

/**
 * Failure raised by a search provider. `transient` failures are retried by the
 * coordinator, permanent ones skip the provider for the rest of the search.
 */
export class ProviderError extends Error {
  public readonly provider: string;
  public readonly code: ProviderErrorCode;
  public readonly transient: boolean;
  public readonly status: number | null;

  constructor(
    provider: string,
    message: string,
    options: { code: ProviderErrorCode; transient: boolean; status?: number | null; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.provider = provider;
    this.code = options.code;
    this.transient = options.transient;
    this.status = options.status ?? null;
  }
}

/** HTTP statuses worth another attempt: rate limits, gateway hiccups, timeouts. */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/** Issue reported by the configuration validator. */
export interface ConfigurationIssue {
  readonly path: string;
  readonly message: string;
}

/** Fatal startup error: unreadable or invalid configuration. Never retried. */
export class ConfigurationError extends Error {
  public readonly code = "E-CONFIG-INVALID";
  public readonly issues: readonly ConfigurationIssue[];

  constructor(message: string, issues: readonly ConfigurationIssue[] = [], options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/** Raised when a page cannot be loaded by the browser. */
export class NavigationError extends Error {
  public readonly code = "E-SCRAPE-NAVIGATION";
  public readonly url: string;

  constructor(url: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NavigationError";
    this.url = url;
  }
}

/** Raised when a scrape task exceeds its render timeout. */
export class ScrapeTimeoutError extends Error {
  public readonly code = "E-SCRAPE-TIMEOUT";
  public readonly url: string;
  public readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`scrape of ${url} timed out after ${timeoutMs} ms`);
    this.name = "ScrapeTimeoutError";
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/** Raised when an artifact could not be written. */
export class SaveError extends Error {
  public readonly code = "E-STORE-WRITE";
  public readonly target: string;

  constructor(target: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SaveError";
    this.target = target;
  }
}

/** Raised (as a value) while the store circuit breaker rejects operations. */
export class StorageUnavailableError extends Error {
  public readonly code = "E-STORE-UNAVAILABLE";
  public readonly retryAt: number | null;

  constructor(retryAt: number | null) {
    super(
      retryAt === null
        ? "results store unavailable: circuit breaker is open"
        : `results store unavailable: circuit breaker is open until ${new Date(retryAt).toISOString()}`,
    );
    this.name = "StorageUnavailableError";
    this.retryAt = retryAt;
  }
}
