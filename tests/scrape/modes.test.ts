import { describe, it } from "mocha";
import { expect } from "chai";

import { parseConfig } from "../../src/config/loader.js";
import { resolveScrapeMode } from "../../src/scrape/modes.js";

describe("scrape/modes", () => {
  it("provides the built-in profiles", () => {
    const settings = parseConfig({}).scraping;
    expect(resolveScrapeMode("standard", settings).toggles).to.include({ maxImages: 20, maxPdfs: 5, saveFormulas: true });
    expect(resolveScrapeMode("deep", settings).toggles).to.include({ maxImages: 100, maxPdfs: 20 });
    expect(resolveScrapeMode("light", settings)).to.deep.equal({
      kind: "light",
      toggles: {
        saveHtml: true,
        saveText: true,
        saveImages: false,
        saveFormulas: false,
        savePdfs: false,
        maxImages: 0,
        maxPdfs: 0,
      },
    });
  });

  it("overrides only the configured toggles", () => {
    const settings = parseConfig({ scraping: { modes: { deep: { maxImages: 5, saveFormulas: false } } } }).scraping;
    expect(resolveScrapeMode("deep", settings).toggles).to.deep.equal({
      saveHtml: true,
      saveText: true,
      saveImages: true,
      saveFormulas: false,
      savePdfs: true,
      maxImages: 5,
      maxPdfs: 20,
    });
    expect(resolveScrapeMode("standard", settings).toggles.maxImages).to.equal(20);
  });
});
