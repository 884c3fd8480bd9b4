export * from "./errors.js";
export * from "./config/schema.js";
export { loadConfig, parseConfig, applyEnvOverrides, collectSecretTokens, DEFAULT_CONFIG_FILE } from "./config/loader.js";
export { StructuredLogger, describeError, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export { CircuitBreaker, type CircuitBreakerState, type GuardedResult } from "./infra/circuitBreaker.js";
export { createExponentialPolicy, executeWithRetry, RetryExhaustedError, type RetryPolicy } from "./infra/retry.js";
export { MinIntervalRateLimiter } from "./infra/rateLimiter.js";
export * from "./search/types.js";
export { FallbackSearchCoordinator, resolveFallbackOrder, retryPolicyFromSettings } from "./search/coordinator.js";
export { UrlAdmissionFilter, type RejectionReason } from "./search/urlFilter.js";
export { RelevanceRanker, tokenize } from "./search/bm25.js";
export { LightContentFetcher } from "./search/contentFetcher.js";
export * from "./search/downloader.js";
export { SearchPipeline, type PipelineResult } from "./search/pipeline.js";
export * from "./search/providers/index.js";
export * from "./storage/naming.js";
export * from "./storage/resultsStore.js";
export type { BrowserPage, BrowserRenderer, PageSnapshot, PageOptions } from "./scrape/browser.js";
export { PlaywrightRenderer } from "./scrape/playwrightBrowser.js";
export { resolveScrapeMode, type ScrapeMode, type ScrapeToggles } from "./scrape/modes.js";
export * from "./scrape/orchestrator.js";
export * from "./extract/html.js";
export { Harvester, type HarvestOptions, type HarvestResult, type HarvestSummary } from "./harvest.js";
export { runCli, formatSummary } from "./cli.js";
export { parseCliArgs, CliUsageError } from "./cliOptions.js";
