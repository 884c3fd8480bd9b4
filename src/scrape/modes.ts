import type { ScrapeModeKind, ScrapeToggleOverride, ScrapingSettings } from "../config/schema.js";

export interface ScrapeToggles {
  readonly saveHtml: boolean;
  readonly saveText: boolean;
  readonly saveImages: boolean;
  readonly saveFormulas: boolean;
  readonly savePdfs: boolean;
  readonly maxImages: number;
  readonly maxPdfs: number;
}

/** Extraction profile applied to the fully scraped URLs of a run. */
export interface ScrapeMode {
  readonly kind: ScrapeModeKind;
  readonly toggles: ScrapeToggles;
}

const BUILT_IN_MODES: Readonly<Record<ScrapeModeKind, ScrapeToggles>> = {
  standard: {
    saveHtml: true,
    saveText: true,
    saveImages: true,
    saveFormulas: true,
    savePdfs: true,
    maxImages: 20,
    maxPdfs: 5,
  },
  deep: {
    saveHtml: true,
    saveText: true,
    saveImages: true,
    saveFormulas: true,
    savePdfs: true,
    maxImages: 100,
    maxPdfs: 20,
  },
  light: {
    saveHtml: true,
    saveText: true,
    saveImages: false,
    saveFormulas: false,
    savePdfs: false,
    maxImages: 0,
    maxPdfs: 0,
  },
};

function applyOverride(base: ScrapeToggles, override: Readonly<ScrapeToggleOverride> | undefined): ScrapeToggles {
  if (!override) {
    return base;
  }
  return {
    saveHtml: override.saveHtml ?? base.saveHtml,
    saveText: override.saveText ?? base.saveText,
    saveImages: override.saveImages ?? base.saveImages,
    saveFormulas: override.saveFormulas ?? base.saveFormulas,
    savePdfs: override.savePdfs ?? base.savePdfs,
    maxImages: override.maxImages ?? base.maxImages,
    maxPdfs: override.maxPdfs ?? base.maxPdfs,
  };
}

/** Resolves a mode from its built-in toggles and the `scraping.modes` overrides. */
export function resolveScrapeMode(kind: ScrapeModeKind, settings: Pick<ScrapingSettings, "modes">): ScrapeMode {
  return { kind, toggles: applyOverride(BUILT_IN_MODES[kind], settings.modes[kind]) };
}
