import { describe, it } from "mocha";
import { expect } from "chai";
import { join } from "node:path";
import sinon from "sinon";

import { parseConfig } from "../../src/config/loader.js";
import { DEFAULT_FORMULA_SELECTOR } from "../../src/config/schema.js";
import { MinIntervalRateLimiter } from "../../src/infra/rateLimiter.js";
import { ScrapeOrchestrator, type ScrapeOutcome } from "../../src/scrape/orchestrator.js";
import { HttpDownloader } from "../../src/search/downloader.js";
import { ResultsStore } from "../../src/storage/resultsStore.js";
import { FakeBrowser, PDF_BYTES, PNG_BYTES, type ScriptedPage } from "../helpers/fakeBrowser.js";
import { bodyResponse } from "../helpers/http.js";
import { errnoError, MemoryFileSystem } from "../helpers/memoryFileSystem.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

const NOW = Date.UTC(2024, 4, 6, 7, 8, 9, 10);
const SCRAPED = join("Data", "20240506_070809_alpha", "Scraped_Results");

const ALPHA_HTML = `<html><head><title>Alpha</title></head><body><h1>Alpha</h1><p>Alpha text</p>
<img src="/img/one.png"><img src="https://cdn.test/missing.png">
<a href="/files/paper.pdf">paper</a> <math>x</math></body></html>`;

const PAGES: Record<string, ScriptedPage> = {
  "https://docs.test/a": { html: ALPHA_HTML, formulas: [PNG_BYTES] },
  "https://docs.test/b": { status: 404, html: "<p>missing</p>" },
  "https://docs.test/c": { html: "<p>gamma</p>" },
  "https://slow.test/": { hang: true },
  "https://docs.test/view?id=1": { contentType: "application/pdf", body: PDF_BYTES },
  "https://docs.test/empty?id=2": { contentType: "application/pdf", body: null },
};

const ASSETS: Record<string, () => Response> = {
  "https://docs.test/img/one.png": () => bodyResponse(new Uint8Array(PNG_BYTES), "image/png"),
  "https://cdn.test/missing.png": () => bodyResponse("gone", "text/plain", 404),
  "https://docs.test/files/paper.pdf": () => bodyResponse(new Uint8Array(PDF_BYTES), "application/pdf"),
  "https://docs.test/report.pdf": () => bodyResponse(new Uint8Array(PDF_BYTES), "application/pdf"),
};

function setup(scraping: Record<string, unknown> = {}, deps: { random?: () => number; rateLimiter?: MinIntervalRateLimiter } = {}) {
  const settings = parseConfig({ scraping: { rateLimit: { delayMs: 0 }, ...scraping } }).scraping;
  const fetchImpl = sinon.spy<typeof fetch>(async (input) => {
    const asset = ASSETS[String(input)];
    if (!asset) {
      throw new TypeError("fetch failed");
    }
    return asset();
  });
  const fs = new MemoryFileSystem();
  const logger = new RecordingLogger();
  const browser = new FakeBrowser(PAGES);
  const store = new ResultsStore({
    query: "alpha",
    directories: { base: "Data", searchResults: "Search_Results", scrapedResults: "Scraped_Results" },
    circuitBreaker: { failMax: 5, resetTimeoutMs: 60_000 },
    logger,
    fs,
    now: () => NOW,
  });
  const orchestrator = new ScrapeOrchestrator(
    { settings, scrapeTopN: 2, maxAssetBytes: 1_024 },
    { browser, store, downloader: new HttpDownloader({ fetchImpl }), logger, ...deps },
  );
  return { orchestrator, browser, fs, fetchImpl, logger };
}

function outcomeFor(outcomes: readonly ScrapeOutcome[], url: string): ScrapeOutcome | undefined {
  return outcomes.find((outcome) => outcome.url === url);
}

describe("scrape/orchestrator", () => {
  it("scrapes the top URLs fully and the rest lightly", async () => {
    const { orchestrator, browser, fs } = setup();
    const urls = [
      "https://docs.test/a",
      "https://docs.test/b",
      "https://docs.test/c",
      "https://docs.test/report.pdf",
      "https://gone.test/",
    ];

    const report = await orchestrator.scrape(urls);

    expect(report).to.deep.include({ mode: "standard", succeeded: 2, partial: 1, failed: 2 });
    expect(report.outcomes.map((outcome) => outcome.url)).to.deep.equal(urls);

    expect(report.outcomes[0]).to.deep.equal({
      url: "https://docs.test/a",
      success: true,
      status: "partially_failed",
      fullExtraction: true,
      httpStatus: 200,
      savedArtifactPaths: [
        join(SCRAPED, "html", "docs.test_a.html"),
        join(SCRAPED, "text", "docs.test_a.txt"),
        join(SCRAPED, "images", "docs.test_img_one.png"),
        join(SCRAPED, "formulas", "docs.test_a.png"),
        join(SCRAPED, "pdfs", "docs.test_files_paper.pdf"),
      ],
      artifactErrors: [
        {
          kind: "image",
          source: "https://cdn.test/missing.png",
          message: "Received status 404 when fetching https://cdn.test/missing.png",
        },
      ],
    });
    expect(fs.text(join(SCRAPED, "text", "docs.test_a.txt"))).to.equal("Alpha Alpha text paper x");
    expect(fs.json(join(SCRAPED, "metadata", "docs.test_a_html_metadata.json"))).to.deep.include({
      metadata: {
        finalUrl: "https://docs.test/a",
        httpStatus: 200,
        mode: "standard",
        summary: { title: "Alpha", description: null, linkCount: 1, imageCount: 2 },
      },
    });

    expect(report.outcomes[1]).to.deep.include({
      status: "failed",
      httpStatus: 404,
      errorKind: "http_status",
      errorMessage: "received status 404 for https://docs.test/b",
    });
    expect(report.outcomes[2]).to.deep.include({
      status: "succeeded",
      fullExtraction: false,
      httpStatus: 200,
      savedArtifactPaths: [],
    });
    expect(report.outcomes[3]).to.deep.include({
      status: "succeeded",
      httpStatus: 200,
      savedArtifactPaths: [join(SCRAPED, "pdfs", "docs.test_report.pdf")],
    });
    expect(report.outcomes[4]).to.deep.include({
      status: "failed",
      httpStatus: null,
      errorKind: "navigation",
      errorMessage: "net::ERR_NAME_NOT_RESOLVED at https://gone.test/",
    });

    expect(browser.pages).to.have.length(4);
    expect(browser.pages.every((page) => page.closed)).to.equal(true);
    expect(browser.pages.find((page) => page.url === "https://docs.test/a")?.screenshotSelectors).to.deep.equal([
      DEFAULT_FORMULA_SELECTOR,
    ]);
  });

  it("fails a task that exceeds its deadline and closes its page", async () => {
    const { orchestrator, browser } = setup({ timeoutMs: 20 });

    const report = await orchestrator.scrape(["https://slow.test/"]);

    expect(report.outcomes[0]).to.deep.include({
      success: false,
      status: "failed",
      errorKind: "timeout",
      errorMessage: "scrape of https://slow.test/ timed out after 20 ms",
    });
    expect(browser.pages[0]?.closed).to.equal(true);
  });

  it("fails a task whose primary artifact cannot be stored", async () => {
    const { orchestrator, fs } = setup();
    fs.fault = (operation) => (operation === "writeFile" ? errnoError("ENOSPC", "disk") : null);

    const report = await orchestrator.scrape(["https://docs.test/a"]);

    expect(report.outcomes[0]).to.deep.include({ status: "failed", errorKind: "storage", savedArtifactPaths: [] });
  });

  it("marks a task partial when only a sidecar fails", async () => {
    const { orchestrator, fs } = setup();
    fs.fault = (operation, path) =>
      operation === "rename" && path.endsWith("_metadata.json") ? errnoError("EIO", path) : null;

    const report = await orchestrator.scrape(["https://docs.test/c"], "light");

    const outcome = report.outcomes[0];
    expect(outcome?.status).to.equal("partially_failed");
    expect(outcome?.savedArtifactPaths).to.have.length(2);
    expect(outcome?.artifactErrors.map((error) => error.kind)).to.deep.equal(["metadata", "metadata"]);
  });

  it("skips assets in light mode", async () => {
    const { orchestrator, browser, fetchImpl } = setup();

    const report = await orchestrator.scrape(["https://docs.test/a"], "light");

    expect(report.mode).to.equal("light");
    expect(report.outcomes[0]?.savedArtifactPaths).to.deep.equal([
      join(SCRAPED, "html", "docs.test_a.html"),
      join(SCRAPED, "text", "docs.test_a.txt"),
    ]);
    sinon.assert.notCalled(fetchImpl);
    expect(browser.pages[0]?.screenshotSelectors).to.deep.equal([]);
  });

  it("applies configured mode overrides", async () => {
    const { orchestrator, fetchImpl } = setup({ modes: { standard: { saveImages: false, savePdfs: false } } });

    const report = await orchestrator.scrape(["https://docs.test/a"]);

    expect(report.outcomes[0]?.status).to.equal("succeeded");
    sinon.assert.notCalled(fetchImpl);
  });

  it("saves PDFs served to the browser even on the light pass", async () => {
    const { orchestrator } = setup();

    const report = await orchestrator.scrape([
      "https://docs.test/a",
      "https://docs.test/b",
      "https://docs.test/view?id=1",
      "https://docs.test/empty?id=2",
    ]);

    expect(report.outcomes[2]).to.deep.include({
      status: "succeeded",
      fullExtraction: false,
      savedArtifactPaths: [join(SCRAPED, "pdfs", "docs.test_view_id_1.pdf")],
    });
    expect(outcomeFor(report.outcomes, "https://docs.test/empty?id=2")).to.deep.include({
      status: "failed",
      errorKind: "internal",
      errorMessage: "empty PDF response for https://docs.test/empty?id=2",
    });
  });

  it("rotates user agents and forwards headers", async () => {
    const { orchestrator, browser } = setup(
      { userAgents: ["ua-1", "ua-2"], headers: { "Accept-Language": "en" } },
      { random: () => 0.99 },
    );

    await orchestrator.scrape(["https://docs.test/c"]);

    expect(browser.pageOptions).to.deep.equal([{ userAgent: "ua-2", headers: { "Accept-Language": "en" } }]);
  });

  it("spaces task starts through the rate limiter", async () => {
    let clock = 0;
    const sleeps: number[] = [];
    const rateLimiter = new MinIntervalRateLimiter({
      minIntervalMs: 1_000,
      now: () => clock,
      sleep: async (ms) => {
        sleeps.push(ms);
        clock += ms;
      },
    });
    const { orchestrator } = setup({}, { rateLimiter });

    await orchestrator.scrape(["https://docs.test/c", "https://docs.test/b", "https://gone.test/"], "light");

    expect(sleeps).to.deep.equal([1_000, 1_000]);
  });

  it("returns an empty report for no URLs", async () => {
    const { orchestrator, logger } = setup();
    const report = await orchestrator.scrape([]);
    expect(report).to.deep.equal({ mode: "standard", outcomes: [], succeeded: 0, partial: 0, failed: 0 });
    expect(logger.find("scrape_completed")?.payload).to.deep.equal({
      mode: "standard",
      urls: 0,
      succeeded: 0,
      partial: 0,
      failed: 0,
    });
  });
});
