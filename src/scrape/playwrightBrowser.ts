import type { Buffer } from "node:buffer";

import { chromium, errors, type BrowserContextOptions, type Page, type Response } from "playwright-core";

import { NavigationError, ScrapeTimeoutError } from "../errors.js";
import { sanitiseContentType } from "../search/downloader.js";
import type { BrowserPage, BrowserRenderer, PageOptions, PageSnapshot } from "./browser.js";

export interface PlaywrightRendererOptions {
  readonly headless: boolean;
  /** Chromium binary; playwright-core ships none of its own. */
  readonly executablePath?: string | null;
}

/** The part of a playwright `BrowserContext` a page wrapper needs. */
export interface PageContext {
  newPage(): Promise<Page>;
  close(): Promise<void>;
}

/** The part of a playwright `Browser` the renderer drives. */
export interface ChromiumHandle {
  newContext(options: BrowserContextOptions): Promise<PageContext>;
  close(): Promise<void>;
}

class PlaywrightPage implements BrowserPage {
  private response: Response | null = null;

  constructor(
    private readonly context: PageContext,
    private readonly page: Page,
  ) {}

  async navigate(url: string, timeoutMs: number): Promise<PageSnapshot> {
    try {
      this.response = await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new ScrapeTimeoutError(url, timeoutMs);
      }
      throw new NavigationError(url, error instanceof Error ? error.message : String(error), { cause: error });
    }

    const contentType = sanitiseContentType(this.response?.headers()["content-type"]);
    const isDocument = contentType === null || contentType === "text/html" || contentType === "application/xhtml+xml";
    return {
      statusCode: this.response?.status() ?? null,
      contentType,
      finalUrl: this.page.url(),
      html: isDocument ? await this.page.content() : "",
    };
  }

  async responseBody(): Promise<Buffer | null> {
    return this.response ? this.response.body() : null;
  }

  async screenshotElements(selector: string, limit: number): Promise<Buffer[]> {
    const elements = (await this.page.locator(selector).all()).slice(0, limit);
    const shots: Buffer[] = [];
    for (const element of elements) {
      shots.push(await element.screenshot({ type: "png" }));
    }
    return shots;
  }

  async close(): Promise<void> {
    await this.context.close();
  }
}

/** Chromium driven through playwright-core. Each page gets its own context. */
export class PlaywrightRenderer implements BrowserRenderer {
  constructor(private readonly browser: ChromiumHandle) {}

  static async launch(options: PlaywrightRendererOptions): Promise<PlaywrightRenderer> {
    const browser = await chromium.launch({
      headless: options.headless,
      ...(options.executablePath ? { executablePath: options.executablePath } : {}),
    });
    return new PlaywrightRenderer(browser);
  }

  async newPage(options: PageOptions): Promise<BrowserPage> {
    const context = await this.browser.newContext({
      userAgent: options.userAgent,
      extraHTTPHeaders: { ...options.headers },
    });
    try {
      return new PlaywrightPage(context, await context.newPage());
    } catch (error) {
      await context.close();
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}
