import { z } from "zod";

import type { SearchProvider } from "../types.js";
import { collectUrls, missingCredential, requestJson, type ProviderTransport } from "./http.js";

const tavilyResponseSchema = z
  .object({
    results: z.array(z.object({ url: z.string() }).passthrough()).default([]),
  })
  .passthrough();

export interface TavilyProviderOptions extends ProviderTransport {
  readonly endpoint: string;
  readonly apiKey: string | null;
}

/** Tavily search API client (`TAVILY_API_KEY`). */
export class TavilyProvider implements SearchProvider {
  readonly name = "tavily" as const;

  constructor(private readonly options: TavilyProviderOptions) {}

  async search(query: string, maxResults: number): Promise<string[]> {
    if (!this.options.apiKey) {
      throw missingCredential(this.name, ["TAVILY_API_KEY"]);
    }

    const payload = await requestJson(
      this.name,
      new URL(this.options.endpoint),
      {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify({
          api_key: this.options.apiKey,
          query,
          max_results: maxResults,
          search_depth: "basic",
        }),
      },
      this.options,
      tavilyResponseSchema,
    );

    return collectUrls(
      payload.results.map((result) => result.url),
      maxResults,
    );
  }
}
