import type { ProviderName, RetrySettings } from "../config/schema.js";
import { ConfigurationError, ProviderError } from "../errors.js";
import { createExponentialPolicy, executeWithRetry, RetryExhaustedError, type RetryPolicy } from "../infra/retry.js";
import { describeError, StructuredLogger } from "../logger.js";
import type { AggregatedSearch, CandidateUrl, ProviderReport, SearchProvider } from "./types.js";

/** Dependencies required by {@link FallbackSearchCoordinator}. */
export interface FallbackSearchCoordinatorDependencies {
  /** Providers in priority order. */
  readonly providers: readonly SearchProvider[];
  readonly retry: RetryPolicy;
  readonly logger?: StructuredLogger;
  readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * Orders the registered providers according to {@link fallbackOrder}. An
 * unknown or unregistered name is a configuration error.
 */
export function resolveFallbackOrder(
  registry: Partial<Record<ProviderName, SearchProvider>>,
  fallbackOrder: readonly string[],
): SearchProvider[] {
  return fallbackOrder.map((name) => {
    const provider = Object.entries(registry).find(([key]) => key === name)?.[1];
    if (!provider) {
      throw new ConfigurationError(`unknown search provider '${name}' in search.fallbackOrder`, [
        { path: "search.fallbackOrder", message: `unknown provider '${name}'` },
      ]);
    }
    return provider;
  });
}

/** Converts the configured retry block into a policy. */
export function retryPolicyFromSettings(settings: RetrySettings): RetryPolicy {
  return createExponentialPolicy({
    maxAttempts: settings.maxAttempts,
    baseDelayMs: settings.baseDelayMs,
    maxDelayMs: settings.maxDelayMs,
  });
}

/**
 * Consults providers one after the other, each under its own retry policy,
 * and aggregates their URLs in encounter order. Stops as soon as the
 * aggregate holds twice the requested result count. Never throws: failing
 * providers are logged and reported.
 */
export class FallbackSearchCoordinator {
  private readonly providers: readonly SearchProvider[];
  private readonly retry: RetryPolicy;
  private readonly logger: StructuredLogger;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(deps: FallbackSearchCoordinatorDependencies) {
    if (deps.providers.length === 0) {
      throw new ConfigurationError("at least one search provider must be configured");
    }
    this.providers = deps.providers;
    this.retry = deps.retry;
    this.logger = deps.logger ?? new StructuredLogger({ component: "coordinator" });
    this.sleep = deps.sleep;
  }

  async search(query: string, maxResults: number): Promise<CandidateUrl[]> {
    const aggregate = await this.searchWithReport(query, maxResults);
    return [...aggregate.candidates];
  }

  async searchWithReport(query: string, maxResults: number): Promise<AggregatedSearch> {
    const candidates: CandidateUrl[] = [];
    const reports: ProviderReport[] = [];
    const seen = new Set<string>();
    const target = 2 * maxResults;
    let stoppedEarly = false;

    for (const [index, provider] of this.providers.entries()) {
      let attempts = 0;
      try {
        const urls = await executeWithRetry(
          (attempt) => {
            attempts = attempt;
            return provider.search(query, maxResults);
          },
          this.retry,
          {
            shouldRetry: (error) => error instanceof ProviderError && error.transient,
            onRetry: ({ attempt, delayMs, error }) =>
              this.logger.warn("provider_retry_scheduled", {
                provider: provider.name,
                attempt,
                delay_ms: delayMs,
                error: describeError(error),
              }),
            sleep: this.sleep,
          },
        );

        let added = 0;
        for (const url of urls.slice(0, maxResults)) {
          if (seen.has(url)) {
            continue;
          }
          seen.add(url);
          candidates.push({ url, provider: provider.name });
          added += 1;
        }
        reports.push({ provider: provider.name, status: "ok", attempts, received: urls.length, added });
        this.logger.info("provider_succeeded", { provider: provider.name, received: urls.length, added });
      } catch (error) {
        const cause = error instanceof RetryExhaustedError ? error.cause : error;
        const report: ProviderReport = {
          provider: provider.name,
          status: "failed",
          attempts,
          code: cause instanceof ProviderError ? cause.code : "E-PROVIDER-UNKNOWN",
          message: cause instanceof Error ? cause.message : String(cause),
        };
        reports.push(report);
        this.logger.warn("provider_failed", { ...report, error: describeError(cause) });
      }

      if (candidates.length >= target) {
        stoppedEarly = index < this.providers.length - 1;
        break;
      }
    }

    if (candidates.length === 0) {
      this.logger.warn("search_no_results", { query, providers: reports.length });
    }
    return { query, candidates, reports, stoppedEarly };
  }
}
