import type { Buffer } from "node:buffer";

import pLimit from "p-limit";

import type { ScrapeModeKind, ScrapingSettings } from "../config/schema.js";
import { NavigationError, ScrapeTimeoutError } from "../errors.js";
import { extractImageUrls, extractPageSummary, extractPdfLinks, htmlToText } from "../extract/html.js";
import { MinIntervalRateLimiter } from "../infra/rateLimiter.js";
import { describeError, StructuredLogger } from "../logger.js";
import {
  DownloadError,
  DownloadTimeoutError,
  guessContentTypeFromUrl,
  HttpDownloader,
  HttpStatusError,
} from "../search/downloader.js";
import type { ArtifactKind, ArtifactOptions, ResultsStore, SaveResult } from "../storage/resultsStore.js";
import type { BrowserPage, BrowserRenderer } from "./browser.js";
import { resolveScrapeMode, type ScrapeMode } from "./modes.js";

const PDF_CONTENT_TYPE = "application/pdf";

export type ScrapeStatus = "succeeded" | "partially_failed" | "failed";
export type ScrapeErrorKind = "navigation" | "timeout" | "http_status" | "storage" | "internal";

/** A secondary artifact (or sidecar) that could not be captured. */
export interface ArtifactError {
  readonly kind: ArtifactKind | "metadata";
  readonly source: string;
  readonly message: string;
}

export interface ScrapeOutcome {
  readonly url: string;
  readonly success: boolean;
  readonly status: ScrapeStatus;
  readonly fullExtraction: boolean;
  readonly httpStatus: number | null;
  readonly savedArtifactPaths: readonly string[];
  readonly artifactErrors: readonly ArtifactError[];
  readonly errorKind?: ScrapeErrorKind;
  readonly errorMessage?: string;
}

export interface ScrapeReport {
  readonly mode: ScrapeModeKind;
  readonly outcomes: readonly ScrapeOutcome[];
  readonly succeeded: number;
  readonly partial: number;
  readonly failed: number;
}

export interface ScrapeOrchestratorOptions {
  readonly settings: ScrapingSettings;
  /** Leading URLs that get full extraction; the rest get a lightweight pass. */
  readonly scrapeTopN: number;
  /** Byte cap for downloaded images and PDFs. */
  readonly maxAssetBytes: number;
}

export interface ScrapeOrchestratorDependencies {
  readonly browser: BrowserRenderer;
  readonly store: ResultsStore;
  readonly downloader: HttpDownloader;
  readonly logger?: StructuredLogger;
  readonly rateLimiter?: MinIntervalRateLimiter;
  /** Picks the user agent of each task; defaults to `Math.random`. */
  readonly random?: () => number;
}

/** Terminal failure of a task, carrying the classification of the outcome. */
class TaskFailure extends Error {
  constructor(
    readonly kind: ScrapeErrorKind,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "TaskFailure";
  }
}

/** Mutable state collected while a task runs. */
interface TaskDraft {
  httpStatus: number | null;
  readonly saved: string[];
  readonly errors: ArtifactError[];
}

function classify(error: unknown): { kind: ScrapeErrorKind; message: string } {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof TaskFailure) {
    return { kind: error.kind, message };
  }
  if (error instanceof ScrapeTimeoutError || error instanceof DownloadTimeoutError) {
    return { kind: "timeout", message };
  }
  if (error instanceof HttpStatusError) {
    return { kind: "http_status", message };
  }
  if (error instanceof NavigationError || error instanceof DownloadError) {
    return { kind: "navigation", message };
  }
  return { kind: "internal", message };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Drives the browser over a list of URLs with bounded concurrency, a shared
 * start-rate limit and a per-task deadline. Every input produces exactly one
 * {@link ScrapeOutcome}; nothing here throws to the caller.
 */
export class ScrapeOrchestrator {
  private readonly settings: ScrapingSettings;
  private readonly scrapeTopN: number;
  private readonly maxAssetBytes: number;
  private readonly browser: BrowserRenderer;
  private readonly store: ResultsStore;
  private readonly downloader: HttpDownloader;
  private readonly logger: StructuredLogger;
  private readonly rateLimiter: MinIntervalRateLimiter;
  private readonly random: () => number;

  constructor(options: ScrapeOrchestratorOptions, deps: ScrapeOrchestratorDependencies) {
    this.settings = options.settings;
    this.scrapeTopN = Math.max(0, Math.floor(options.scrapeTopN));
    this.maxAssetBytes = options.maxAssetBytes;
    this.browser = deps.browser;
    this.store = deps.store;
    this.downloader = deps.downloader;
    this.logger = deps.logger ?? new StructuredLogger({ component: "scraper" });
    this.rateLimiter =
      deps.rateLimiter ?? new MinIntervalRateLimiter({ minIntervalMs: options.settings.rateLimit.delayMs });
    this.random = deps.random ?? Math.random;
  }

  async scrape(urls: readonly string[], modeKind: ScrapeModeKind = this.settings.defaultMode): Promise<ScrapeReport> {
    const mode = resolveScrapeMode(modeKind, this.settings);
    const limit = pLimit(this.settings.maxConcurrent);
    const outcomes = await Promise.all(
      urls.map((url, index) => limit(() => this.runTask(url, index < this.scrapeTopN, mode))),
    );

    const report: ScrapeReport = {
      mode: mode.kind,
      outcomes,
      succeeded: outcomes.filter((outcome) => outcome.status === "succeeded").length,
      partial: outcomes.filter((outcome) => outcome.status === "partially_failed").length,
      failed: outcomes.filter((outcome) => outcome.status === "failed").length,
    };
    this.logger.info("scrape_completed", {
      mode: mode.kind,
      urls: urls.length,
      succeeded: report.succeeded,
      partial: report.partial,
      failed: report.failed,
    });
    return report;
  }

  private async runTask(url: string, fullExtraction: boolean, mode: ScrapeMode): Promise<ScrapeOutcome> {
    const draft: TaskDraft = { httpStatus: null, saved: [], errors: [] };
    const timeoutMs = this.settings.timeoutMs;
    const controller = new AbortController();
    let page: BrowserPage | null = null;
    let timer: ReturnType<typeof setTimeout> | undefined;

    let outcome: ScrapeOutcome;
    try {
      await this.rateLimiter.acquire();
      this.logger.debug("scrape_task_started", { url, full_extraction: fullExtraction });

      const expired = new Promise<never>((_, reject) => {
        controller.signal.addEventListener("abort", () => reject(new ScrapeTimeoutError(url, timeoutMs)), {
          once: true,
        });
      });
      timer = setTimeout(() => controller.abort(), timeoutMs);

      const work = (async () => {
        if (guessContentTypeFromUrl(url) === PDF_CONTENT_TYPE) {
          await this.captureDirectPdf(url, draft, controller.signal);
          return;
        }
        const opened = await this.browser.newPage({ userAgent: this.pickUserAgent(), headers: this.settings.headers });
        if (controller.signal.aborted) {
          await this.closePage(opened, url);
          return;
        }
        page = opened;
        await this.processPage(url, opened, fullExtraction, mode, draft, controller.signal);
      })();

      await Promise.race([work, expired]);
      outcome = this.finish(url, fullExtraction, draft);
    } catch (error) {
      const { kind, message } = classify(error);
      outcome = this.finish(url, fullExtraction, draft, { kind, message });
    } finally {
      clearTimeout(timer);
      controller.abort();
      await this.closePage(page, url);
    }

    this.logger.info("scrape_task_completed", {
      url,
      status: outcome.status,
      http_status: outcome.httpStatus,
      artifacts: outcome.savedArtifactPaths.length,
      artifact_errors: outcome.artifactErrors.length,
      error_kind: outcome.errorKind ?? null,
    });
    return outcome;
  }

  private async processPage(
    url: string,
    page: BrowserPage,
    fullExtraction: boolean,
    mode: ScrapeMode,
    draft: TaskDraft,
    signal: AbortSignal,
  ): Promise<void> {
    const snapshot = await page.navigate(url, this.settings.timeoutMs);
    signal.throwIfAborted();
    draft.httpStatus = snapshot.statusCode;
    if (snapshot.statusCode !== null && snapshot.statusCode >= 400) {
      throw new TaskFailure("http_status", `received status ${snapshot.statusCode} for ${url}`);
    }

    if (snapshot.contentType === PDF_CONTENT_TYPE) {
      const body = await page.responseBody();
      if (!body || body.length === 0) {
        throw new TaskFailure("internal", `empty PDF response for ${url}`);
      }
      const metadata = { httpStatus: snapshot.statusCode, finalUrl: snapshot.finalUrl };
      await this.savePrimary(url, "pdf", body, { contentType: PDF_CONTENT_TYPE, metadata }, draft, signal);
      return;
    }
    if (!fullExtraction) {
      return;
    }

    const { toggles } = mode;
    const pageMetadata = {
      finalUrl: snapshot.finalUrl,
      httpStatus: snapshot.statusCode,
      mode: mode.kind,
      summary: extractPageSummary(snapshot.html),
    };
    const text = toggles.saveText ? htmlToText(snapshot.html) : "";

    if (toggles.saveHtml) {
      const html = { contentType: "text/html", metadata: pageMetadata };
      await this.savePrimary(url, "html", snapshot.html, html, draft, signal);
      if (text.length > 0) {
        const plain = { contentType: "text/plain", metadata: { finalUrl: snapshot.finalUrl } };
        await this.saveSecondary(url, "text", text, plain, draft, signal);
      }
    } else if (text.length > 0) {
      await this.savePrimary(url, "text", text, { contentType: "text/plain", metadata: pageMetadata }, draft, signal);
    }

    if (toggles.saveImages && toggles.maxImages > 0) {
      for (const imageUrl of extractImageUrls(snapshot.html, snapshot.finalUrl, toggles.maxImages)) {
        await this.captureAsset(url, imageUrl, "image", draft, signal);
      }
    }
    if (toggles.saveFormulas && toggles.maxImages > 0) {
      await this.captureFormulas(url, page, toggles.maxImages, draft, signal);
    }
    if (toggles.savePdfs && toggles.maxPdfs > 0) {
      for (const pdfUrl of extractPdfLinks(snapshot.html, snapshot.finalUrl, toggles.maxPdfs)) {
        await this.captureAsset(url, pdfUrl, "pdf", draft, signal);
      }
    }
  }

  /** URLs that name a PDF are downloaded directly; headless Chromium turns them into downloads. */
  private async captureDirectPdf(url: string, draft: TaskDraft, signal: AbortSignal): Promise<void> {
    try {
      const resource = await this.downloader.download(url, {
        timeoutMs: this.settings.timeoutMs,
        maxBytes: this.maxAssetBytes,
        accept: `${PDF_CONTENT_TYPE},*/*;q=0.1`,
        signal,
      });
      draft.httpStatus = resource.status;
      await this.savePrimary(
        url,
        "pdf",
        resource.body,
        { contentType: resource.contentType, metadata: { httpStatus: resource.status, finalUrl: resource.finalUrl } },
        draft,
        signal,
      );
    } catch (error) {
      if (error instanceof HttpStatusError) {
        draft.httpStatus = error.status;
      }
      throw error;
    }
  }

  private async captureAsset(
    pageUrl: string,
    assetUrl: string,
    kind: "image" | "pdf",
    draft: TaskDraft,
    signal: AbortSignal,
  ): Promise<void> {
    try {
      const resource = await this.downloader.download(assetUrl, {
        timeoutMs: this.settings.timeoutMs,
        maxBytes: this.maxAssetBytes,
        accept: kind === "image" ? "image/*" : PDF_CONTENT_TYPE,
        expectContentType:
          kind === "image"
            ? (contentType) => contentType?.startsWith("image/") ?? false
            : (contentType) => contentType === PDF_CONTENT_TYPE,
        signal,
      });
      await this.saveSecondary(
        assetUrl,
        kind,
        resource.body,
        { contentType: resource.contentType, metadata: { pageUrl } },
        draft,
        signal,
      );
    } catch (error) {
      signal.throwIfAborted();
      draft.errors.push({ kind, source: assetUrl, message: errorMessage(error) });
      this.logger.debug("scrape_asset_failed", { url: pageUrl, asset: assetUrl, kind, error: describeError(error) });
    }
  }

  private async captureFormulas(
    url: string,
    page: BrowserPage,
    limit: number,
    draft: TaskDraft,
    signal: AbortSignal,
  ): Promise<void> {
    let shots: Buffer[];
    try {
      shots = await page.screenshotElements(this.settings.formulaSelector, limit);
    } catch (error) {
      signal.throwIfAborted();
      draft.errors.push({ kind: "formula", source: url, message: errorMessage(error) });
      return;
    }
    for (const [index, shot] of shots.entries()) {
      await this.saveSecondary(
        url,
        "formula",
        shot,
        { contentType: "image/png", metadata: { index, selector: this.settings.formulaSelector } },
        draft,
        signal,
      );
    }
  }

  /** A primary artifact that cannot be saved fails the whole task. */
  private async savePrimary(
    url: string,
    kind: ArtifactKind,
    data: string | Uint8Array,
    options: ArtifactOptions,
    draft: TaskDraft,
    signal: AbortSignal,
  ): Promise<void> {
    signal.throwIfAborted();
    const result = await this.store.saveScrapedContent(url, kind, data, options);
    if (!result.saved) {
      throw new TaskFailure("storage", result.error.message, { cause: result.error });
    }
    this.recordSaved(result.path, result.sidecar, draft);
  }

  private async saveSecondary(
    url: string,
    kind: ArtifactKind,
    data: string | Uint8Array,
    options: ArtifactOptions,
    draft: TaskDraft,
    signal: AbortSignal,
  ): Promise<void> {
    signal.throwIfAborted();
    const result = await this.store.saveScrapedContent(url, kind, data, options);
    if (!result.saved) {
      draft.errors.push({ kind, source: url, message: result.error.message });
      return;
    }
    this.recordSaved(result.path, result.sidecar, draft);
  }

  private recordSaved(
    path: string,
    sidecar: SaveResult,
    draft: TaskDraft,
  ): void {
    draft.saved.push(path);
    if (!sidecar.saved) {
      draft.errors.push({ kind: "metadata", source: path, message: sidecar.error.message });
    }
  }

  private finish(
    url: string,
    fullExtraction: boolean,
    draft: TaskDraft,
    failure?: { kind: ScrapeErrorKind; message: string },
  ): ScrapeOutcome {
    const base = {
      url,
      fullExtraction,
      httpStatus: draft.httpStatus,
      savedArtifactPaths: [...draft.saved],
      artifactErrors: [...draft.errors],
    };
    if (failure) {
      return { ...base, success: false, status: "failed", errorKind: failure.kind, errorMessage: failure.message };
    }
    return { ...base, success: true, status: draft.errors.length > 0 ? "partially_failed" : "succeeded" };
  }

  private pickUserAgent(): string {
    const agents = this.settings.userAgents;
    const index = Math.min(agents.length - 1, Math.floor(this.random() * agents.length));
    return agents[index] ?? agents[0] ?? "";
  }

  private async closePage(page: BrowserPage | null, url: string): Promise<void> {
    if (!page) {
      return;
    }
    try {
      await page.close();
    } catch (error) {
      this.logger.warn("scrape_page_close_failed", { url, error: describeError(error) });
    }
  }
}
