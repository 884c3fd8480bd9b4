import pLimit from "p-limit";

import { htmlToText } from "../extract/html.js";
import { describeError, StructuredLogger } from "../logger.js";
import { HttpDownloader } from "./downloader.js";

const HTML_CONTENT_TYPES = new Set(["text/html", "application/xhtml+xml"]);

export interface LightContentFetcherOptions {
  readonly parallelism: number;
  readonly requestTimeoutMs: number;
  /** Deadline for the whole batch; whatever is still running is aborted. */
  readonly sessionTimeoutMs: number;
  readonly maxContentSize: number;
}

export interface LightContentFetcherDependencies {
  readonly downloader: HttpDownloader;
  readonly logger?: StructuredLogger;
}

/** Text-ish payloads worth decoding for the ranking corpus. */
function isTextual(contentType: string | null): boolean {
  return contentType === null || contentType.startsWith("text/") || HTML_CONTENT_TYPES.has(contentType);
}

/**
 * Fetches the text of candidate pages to build the ranking corpus. The result
 * is positionally aligned with the input: failures, timeouts and non-text
 * payloads leave an empty string. Nothing is written to disk.
 */
export class LightContentFetcher {
  private readonly downloader: HttpDownloader;
  private readonly logger: StructuredLogger;

  constructor(
    private readonly options: LightContentFetcherOptions,
    deps: LightContentFetcherDependencies,
  ) {
    this.downloader = deps.downloader;
    this.logger = deps.logger ?? new StructuredLogger({ component: "content_fetcher" });
  }

  async fetchAll(urls: readonly string[]): Promise<string[]> {
    const limit = pLimit(Math.max(1, Math.floor(this.options.parallelism)));
    const session = new AbortController();
    const deadline = setTimeout(() => session.abort(), this.options.sessionTimeoutMs);

    try {
      const texts = await Promise.all(urls.map((url) => limit(() => this.fetchOne(url, session.signal))));
      const empty = texts.filter((text) => text.length === 0).length;
      this.logger.info("corpus_fetched", { documents: urls.length, empty });
      return texts;
    } finally {
      clearTimeout(deadline);
    }
  }

  private async fetchOne(url: string, signal: AbortSignal): Promise<string> {
    if (signal.aborted) {
      this.logger.debug("corpus_fetch_skipped", { url, reason: "session_deadline" });
      return "";
    }
    try {
      const resource = await this.downloader.download(url, {
        timeoutMs: this.options.requestTimeoutMs,
        maxBytes: this.options.maxContentSize,
        accept: "text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.1",
        expectContentType: isTextual,
        signal,
      });
      const raw = resource.body.toString("utf8");
      return resource.contentType === null || HTML_CONTENT_TYPES.has(resource.contentType) ? htmlToText(raw) : raw.trim();
    } catch (error) {
      this.logger.debug("corpus_fetch_failed", { url, error: describeError(error) });
      return "";
    }
  }
}
