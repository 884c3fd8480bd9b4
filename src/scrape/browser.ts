import type { Buffer } from "node:buffer";

/** What the scraper learns from loading a page. */
export interface PageSnapshot {
  /** Status of the main document response; `null` when the browser reported none. */
  readonly statusCode: number | null;
  readonly contentType: string | null;
  readonly finalUrl: string;
  /** Rendered DOM serialised as HTML. Empty for non-document payloads. */
  readonly html: string;
}

export interface PageOptions {
  readonly userAgent: string;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * One browser tab. Implementations throw {@link NavigationError} or
 * {@link ScrapeTimeoutError} from `navigate` so the orchestrator can classify
 * failures without knowing the engine.
 */
export interface BrowserPage {
  navigate(url: string, timeoutMs: number): Promise<PageSnapshot>;
  /** Raw bytes of the main response, when the engine kept them. */
  responseBody(): Promise<Buffer | null>;
  /** PNG screenshots of up to {@link limit} elements matching {@link selector}. */
  screenshotElements(selector: string, limit: number): Promise<Buffer[]>;
  close(): Promise<void>;
}

/** Headless rendering engine shared by every scrape task of a run. */
export interface BrowserRenderer {
  newPage(options: PageOptions): Promise<BrowserPage>;
  close(): Promise<void>;
}
