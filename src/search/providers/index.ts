import type { AppConfig, ProviderName } from "../../config/schema.js";
import type { SearchProvider } from "../types.js";
import { DuckDuckGoProvider } from "./duckduckgo.js";
import { GoogleProvider } from "./google.js";
import { TavilyProvider } from "./tavily.js";

export { DuckDuckGoProvider } from "./duckduckgo.js";
export { GoogleProvider } from "./google.js";
export { TavilyProvider } from "./tavily.js";
export { requestJson, collectUrls, type ProviderTransport } from "./http.js";

/** Instantiates every known provider from the configuration. */
export function createProviders(
  config: AppConfig,
  fetchImpl?: typeof fetch,
): Record<ProviderName, SearchProvider> {
  const settings = config.providers;
  const timeoutMs = config.search.timeoutMs;
  return {
    duckduckgo: new DuckDuckGoProvider({ endpoint: settings.duckduckgoEndpoint, timeoutMs, fetchImpl }),
    tavily: new TavilyProvider({ endpoint: settings.tavilyEndpoint, apiKey: settings.tavilyApiKey, timeoutMs, fetchImpl }),
    google: new GoogleProvider({
      endpoint: settings.googleEndpoint,
      apiKey: settings.googleApiKey,
      cseId: settings.googleCseId,
      timeoutMs,
      fetchImpl,
    }),
  };
}
