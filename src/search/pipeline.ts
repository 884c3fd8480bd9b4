import type { Bm25Settings, ProviderName } from "../config/schema.js";
import { describeError, StructuredLogger } from "../logger.js";
import type { ResultsStore } from "../storage/resultsStore.js";
import { RelevanceRanker } from "./bm25.js";
import type { LightContentFetcher } from "./contentFetcher.js";
import type { FallbackSearchCoordinator } from "./coordinator.js";
import type { ProviderReport, RankedResult } from "./types.js";
import type { UrlAdmissionFilter } from "./urlFilter.js";

/** Dependencies required to run the search pipeline. */
export interface SearchPipelineDependencies {
  readonly coordinator: FallbackSearchCoordinator;
  readonly filter: UrlAdmissionFilter;
  readonly fetcher: LightContentFetcher;
  readonly ranker?: RelevanceRanker;
  readonly logger?: StructuredLogger;
}

export interface SearchPipelineOptions {
  readonly maxResults: number;
  readonly bm25: Bm25Settings;
}

/** Stage at which a query ran out of candidates. */
export type EmptyStage = "search" | "validation";

export type PipelineResult =
  | {
      readonly status: "ok";
      readonly query: string;
      readonly ranked: readonly RankedResult[];
      /** `null` when the ranked list could not be persisted. */
      readonly resultsPath: string | null;
      readonly reports: readonly ProviderReport[];
    }
  | {
      readonly status: "no_results";
      readonly query: string;
      readonly stage: EmptyStage;
      readonly reports: readonly ProviderReport[];
    };

/**
 * Search half of a harvest: aggregate provider URLs, drop the inadmissible
 * ones, fetch a text corpus and rank it with BM25. Both the raw candidates and
 * the full ranked list are written to the session store, and only the top
 * `maxResults` are returned. A failed save is logged and does not stop the run.
 */
export class SearchPipeline {
  private readonly coordinator: FallbackSearchCoordinator;
  private readonly filter: UrlAdmissionFilter;
  private readonly fetcher: LightContentFetcher;
  private readonly ranker: RelevanceRanker;
  private readonly logger: StructuredLogger;

  constructor(
    private readonly options: SearchPipelineOptions,
    deps: SearchPipelineDependencies,
  ) {
    this.coordinator = deps.coordinator;
    this.filter = deps.filter;
    this.fetcher = deps.fetcher;
    this.ranker = deps.ranker ?? new RelevanceRanker(options.bm25);
    this.logger = deps.logger ?? new StructuredLogger({ component: "pipeline" });
  }

  async run(query: string, store: ResultsStore): Promise<PipelineResult> {
    try {
      await store.ensureDirectoriesReady();
    } catch (error) {
      this.logger.error("session_directories_failed", { query, error: describeError(error) });
    }

    const { candidates, reports } = await this.coordinator.searchWithReport(query, this.options.maxResults);
    if (candidates.length === 0) {
      return { status: "no_results", query, stage: "search", reports };
    }

    const raw = await store.saveSearchResults(
      candidates.map((candidate) => candidate.url),
      { stage: "raw", providers: candidates.map((candidate) => candidate.provider) },
    );
    if (!raw.saved) {
      this.logger.warn("raw_results_not_saved", { query, reason: raw.reason, error: describeError(raw.error) });
    }

    const accepted = this.filter.validateMany(candidates.map((candidate) => candidate.url));
    if (accepted.length === 0) {
      this.logger.warn("no_admissible_urls", { query, candidates: candidates.length });
      return { status: "no_results", query, stage: "validation", reports };
    }

    const corpus = await this.fetcher.fetchAll(accepted);
    const scored = this.ranker.rank(query, accepted, corpus);

    const providerByUrl = new Map<string, ProviderName>(
      candidates.map((candidate) => [candidate.url, candidate.provider]),
    );
    const saved = await store.saveSearchResults(
      scored.map((result) => result.url),
      {
        stage: "ranked",
        scores: scored.map((result) => result.score),
        providers: scored.map((result) => providerByUrl.get(result.url) ?? null),
        maxResults: this.options.maxResults,
        bm25: { k1: this.options.bm25.k1, b: this.options.bm25.b },
      },
    );
    if (!saved.saved) {
      this.logger.warn("ranked_results_not_saved", { query, reason: saved.reason, error: describeError(saved.error) });
    }

    const ranked = scored.slice(0, this.options.maxResults);
    this.logger.info("search_ranked", {
      query,
      candidates: candidates.length,
      accepted: accepted.length,
      ranked: ranked.length,
      top_score: ranked[0]?.score ?? null,
    });
    return { status: "ok", query, ranked, resultsPath: saved.saved ? saved.path : null, reports };
  }
}
