import type { AppConfig, ProviderName, ScrapeModeKind } from "./config/schema.js";
import { describeError, StructuredLogger } from "./logger.js";
import type { BrowserRenderer } from "./scrape/browser.js";
import { ScrapeOrchestrator, type ScrapeOutcome, type ScrapeReport } from "./scrape/orchestrator.js";
import { PlaywrightRenderer } from "./scrape/playwrightBrowser.js";
import { RelevanceRanker } from "./search/bm25.js";
import { LightContentFetcher } from "./search/contentFetcher.js";
import { FallbackSearchCoordinator, resolveFallbackOrder, retryPolicyFromSettings } from "./search/coordinator.js";
import { HttpDownloader } from "./search/downloader.js";
import { SearchPipeline, type PipelineResult } from "./search/pipeline.js";
import { createProviders } from "./search/providers/index.js";
import type { SearchProvider } from "./search/types.js";
import { UrlAdmissionFilter } from "./search/urlFilter.js";
import { ResultsStore, type StoreFileSystem } from "./storage/resultsStore.js";

export interface HarvesterDependencies {
  readonly config: AppConfig;
  readonly logger: StructuredLogger;
  readonly fetchImpl?: typeof fetch;
  /** Replaces entries of the provider registry built from the configuration. */
  readonly providers?: Partial<Record<ProviderName, SearchProvider>>;
  readonly launchBrowser?: () => Promise<BrowserRenderer>;
  readonly storeFileSystem?: StoreFileSystem;
  readonly now?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly random?: () => number;
}

export interface HarvestOptions {
  readonly mode?: ScrapeModeKind;
  /** Set to `false` to stop after ranking. */
  readonly scrape?: boolean;
}

export interface HarvestSummary {
  readonly ranked: number;
  readonly succeeded: number;
  readonly partial: number;
  readonly failed: number;
}

export interface HarvestResult {
  readonly query: string;
  readonly sessionDirectory: string;
  readonly search: PipelineResult;
  readonly scrape: ScrapeReport | null;
  readonly summary: HarvestSummary;
}

/**
 * Composition root: wires providers, filter, fetcher, ranker, store and
 * scraper from one {@link AppConfig}. A harvester can serve several queries;
 * each gets its own session directory.
 */
export class Harvester {
  private readonly config: AppConfig;
  private readonly logger: StructuredLogger;
  private readonly pipeline: SearchPipeline;
  private readonly downloader: HttpDownloader;
  private readonly launchBrowser: () => Promise<BrowserRenderer>;

  constructor(private readonly deps: HarvesterDependencies) {
    const { config, logger } = deps;
    this.config = config;
    this.logger = logger;

    const registry = { ...createProviders(config, deps.fetchImpl), ...deps.providers };
    const coordinator = new FallbackSearchCoordinator({
      providers: resolveFallbackOrder(registry, config.search.fallbackOrder),
      retry: retryPolicyFromSettings(config.search.retry),
      logger: logger.child("coordinator"),
      sleep: deps.sleep,
    });
    this.downloader = new HttpDownloader({
      fetchImpl: deps.fetchImpl,
      userAgent: config.scraping.userAgents[0],
      headers: config.scraping.headers,
    });
    const validation = config.urlValidation;
    this.pipeline = new SearchPipeline(
      { maxResults: config.search.maxResults, bm25: config.bm25 },
      {
        coordinator,
        filter: new UrlAdmissionFilter(validation, logger.child("url_filter")),
        fetcher: new LightContentFetcher(
          {
            parallelism: validation.fetchParallelism,
            requestTimeoutMs: validation.fetchRequestTimeoutMs,
            sessionTimeoutMs: validation.fetchSessionTimeoutMs,
            maxContentSize: validation.maxContentSize,
          },
          { downloader: this.downloader, logger: logger.child("content_fetcher") },
        ),
        ranker: new RelevanceRanker(config.bm25),
        logger: logger.child("pipeline"),
      },
    );
    this.launchBrowser =
      deps.launchBrowser ??
      (() =>
        PlaywrightRenderer.launch({
          headless: config.scraping.headless,
          executablePath: config.scraping.browserExecutablePath,
        }));
  }

  async harvest(query: string, options: HarvestOptions = {}): Promise<HarvestResult> {
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      throw new RangeError("query must not be empty");
    }

    const store = new ResultsStore({
      query: trimmed,
      directories: this.config.directories,
      circuitBreaker: this.config.circuitBreaker,
      logger: this.logger.child("results_store"),
      fs: this.deps.storeFileSystem,
      now: this.deps.now,
    });
    const search = await this.pipeline.run(trimmed, store);

    let scrape: ScrapeReport | null = null;
    if (search.status === "ok" && search.ranked.length > 0 && options.scrape !== false) {
      const urls = search.ranked.map((result) => result.url);
      scrape = await this.scrape(urls, options.mode ?? this.config.scraping.defaultMode, store);
    }

    const summary: HarvestSummary = {
      ranked: search.status === "ok" ? search.ranked.length : 0,
      succeeded: scrape?.succeeded ?? 0,
      partial: scrape?.partial ?? 0,
      failed: scrape?.failed ?? 0,
    };
    this.logger.info("harvest_completed", { query: trimmed, status: search.status, ...summary });
    return { query: trimmed, sessionDirectory: store.sessionDirectory, search, scrape, summary };
  }

  private async scrape(urls: readonly string[], mode: ScrapeModeKind, store: ResultsStore): Promise<ScrapeReport> {
    let browser: BrowserRenderer;
    try {
      browser = await this.launchBrowser();
    } catch (error) {
      this.logger.error("browser_launch_failed", { error: describeError(error) });
      return this.unscrapedReport(urls, mode, error);
    }

    try {
      const orchestrator = new ScrapeOrchestrator(
        {
          settings: this.config.scraping,
          scrapeTopN: this.config.search.scrapeTopN,
          maxAssetBytes: this.config.urlValidation.maxContentSize,
        },
        {
          browser,
          store,
          downloader: this.downloader,
          logger: this.logger.child("scraper"),
          random: this.deps.random,
        },
      );
      return await orchestrator.scrape(urls, mode);
    } finally {
      await browser.close().catch((error: unknown) => {
        this.logger.warn("browser_close_failed", { error: describeError(error) });
      });
    }
  }

  /** Every URL fails with `internal` when no browser is available. */
  private unscrapedReport(urls: readonly string[], mode: ScrapeModeKind, error: unknown): ScrapeReport {
    const message = error instanceof Error ? error.message : String(error);
    const outcomes = urls.map(
      (url, index): ScrapeOutcome => ({
        url,
        success: false,
        status: "failed",
        fullExtraction: index < this.config.search.scrapeTopN,
        httpStatus: null,
        savedArtifactPaths: [],
        artifactErrors: [],
        errorKind: "internal",
        errorMessage: `browser unavailable: ${message}`,
      }),
    );
    return { mode, outcomes, succeeded: 0, partial: 0, failed: outcomes.length };
  }
}
