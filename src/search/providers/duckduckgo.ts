import { z } from "zod";

import type { SearchProvider } from "../types.js";
import { collectUrls, requestJson, type ProviderTransport } from "./http.js";

const topicSchema = z
  .object({
    FirstURL: z.string().optional(),
    Topics: z.array(z.object({ FirstURL: z.string().optional() }).passthrough()).optional(),
  })
  .passthrough();

/** Subset of the Instant Answer API payload carrying result links. */
const instantAnswerSchema = z
  .object({
    AbstractURL: z.string().optional(),
    Results: z.array(topicSchema).default([]),
    RelatedTopics: z.array(topicSchema).default([]),
  })
  .passthrough();

export interface DuckDuckGoProviderOptions extends ProviderTransport {
  readonly endpoint: string;
}

/**
 * DuckDuckGo Instant Answer client. The API needs no credential; links come
 * from `Results`, then `RelatedTopics` (including grouped sub-topics).
 */
export class DuckDuckGoProvider implements SearchProvider {
  readonly name = "duckduckgo" as const;

  constructor(private readonly options: DuckDuckGoProviderOptions) {}

  async search(query: string, maxResults: number): Promise<string[]> {
    const url = new URL(this.options.endpoint);
    url.search = new URLSearchParams({ q: query, format: "json", no_html: "1", skip_disambig: "1" }).toString();

    const payload = await requestJson(
      this.name,
      url,
      { method: "GET", headers: { Accept: "application/json" } },
      this.options,
      instantAnswerSchema,
    );

    const links: Array<string | undefined> = [payload.AbstractURL];
    for (const topic of [...payload.Results, ...payload.RelatedTopics]) {
      links.push(topic.FirstURL);
      for (const nested of topic.Topics ?? []) {
        links.push(nested.FirstURL);
      }
    }
    return collectUrls(links, maxResults);
  }
}
