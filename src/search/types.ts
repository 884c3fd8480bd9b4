/**
 * Core domain types produced by the search side of the harvest. Keeping them
 * in a dedicated module avoids circular imports between the coordinator, the
 * ranker and the pipeline.
 */
import type { ProviderName } from "../config/schema.js";
import type { ProviderErrorCode } from "../errors.js";

/** Capability implemented by every search backend. */
export interface SearchProvider {
  readonly name: ProviderName;
  /** Returns at most {@link maxResults} URLs, best first. */
  search(query: string, maxResults: number): Promise<string[]>;
}

/** URL returned by a provider, tagged with its provenance. */
export interface CandidateUrl {
  readonly url: string;
  readonly provider: ProviderName;
}

/** URL with a relevance score in `[0, 1]`, relative to its batch only. */
export interface RankedResult {
  readonly url: string;
  readonly score: number;
}

/** Outcome of consulting one provider during a search. */
export type ProviderReport =
  | {
      readonly provider: ProviderName;
      readonly status: "ok";
      readonly attempts: number;
      /** URLs returned by the provider. */
      readonly received: number;
      /** URLs kept after de-duplication. */
      readonly added: number;
    }
  | {
      readonly provider: ProviderName;
      readonly status: "failed";
      readonly attempts: number;
      readonly code: ProviderErrorCode | "E-PROVIDER-UNKNOWN";
      readonly message: string;
    };

/** Aggregate produced by {@link FallbackSearchCoordinator.searchWithReport}. */
export interface AggregatedSearch {
  readonly query: string;
  readonly candidates: readonly CandidateUrl[];
  readonly reports: readonly ProviderReport[];
  /** True when the coordinator stopped before consulting every provider. */
  readonly stoppedEarly: boolean;
}
