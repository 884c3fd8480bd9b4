import { z } from "zod";

import type { SearchProvider } from "../types.js";
import { collectUrls, missingCredential, requestJson, type ProviderTransport } from "./http.js";

/** Custom Search JSON API caps `num` at 10 per request. */
const GOOGLE_MAX_PAGE_SIZE = 10;

const customSearchSchema = z
  .object({
    items: z.array(z.object({ link: z.string() }).passthrough()).default([]),
  })
  .passthrough();

export interface GoogleProviderOptions extends ProviderTransport {
  readonly endpoint: string;
  readonly apiKey: string | null;
  readonly cseId: string | null;
}

/** Google Custom Search client (`GOOGLE_API_KEY` + `GOOGLE_CSE_ID`). */
export class GoogleProvider implements SearchProvider {
  readonly name = "google" as const;

  constructor(private readonly options: GoogleProviderOptions) {}

  async search(query: string, maxResults: number): Promise<string[]> {
    const { apiKey, cseId } = this.options;
    if (!apiKey || !cseId) {
      throw missingCredential(this.name, ["GOOGLE_API_KEY", "GOOGLE_CSE_ID"]);
    }

    const url = new URL(this.options.endpoint);
    url.search = new URLSearchParams({
      key: apiKey,
      cx: cseId,
      q: query,
      num: String(Math.max(1, Math.min(GOOGLE_MAX_PAGE_SIZE, maxResults))),
    }).toString();

    const payload = await requestJson(
      this.name,
      url,
      { method: "GET", headers: { Accept: "application/json" } },
      this.options,
      customSearchSchema,
    );
    return collectUrls(
      payload.items.map((item) => item.link),
      maxResults,
    );
  }
}
