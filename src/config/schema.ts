import { z } from "zod";

/** Search providers understood by the fallback coordinator. */
export const PROVIDER_NAMES = ["duckduckgo", "tavily", "google"] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

/** Scrape modes selectable per harvest. */
export const SCRAPE_MODE_KINDS = ["standard", "deep", "light"] as const;
export type ScrapeModeKind = (typeof SCRAPE_MODE_KINDS)[number];

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error"] as const;

/** Default fallback order: instant answers first, keyed APIs afterwards. */
export const DEFAULT_FALLBACK_ORDER: readonly ProviderName[] = ["duckduckgo", "tavily", "google"];
/** Extensions never worth downloading for ranking or scraping. */
export const DEFAULT_BLOCKED_EXTENSIONS: readonly string[] = [".exe", ".zip", ".rar"];
/** Desktop Chrome user agent presented by the browser and the light fetcher. */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";
/** Elements captured as formula screenshots. */
export const DEFAULT_FORMULA_SELECTOR = "math, .math, .equation, .MathJax, .katex";

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const retrySchema = z
  .object({
    maxAttempts: positiveInt.max(10).default(3),
    baseDelayMs: nonNegativeInt.default(1_000),
    maxDelayMs: nonNegativeInt.default(10_000),
  })
  .strict()
  .refine((retry) => retry.maxDelayMs >= retry.baseDelayMs, {
    message: "maxDelayMs must be greater than or equal to baseDelayMs",
    path: ["maxDelayMs"],
  });

const searchSchema = z
  .object({
    maxResults: positiveInt.max(100).default(10),
    scrapeTopN: nonNegativeInt.default(2),
    fallbackOrder: z
      .array(z.enum(PROVIDER_NAMES))
      .min(1)
      .refine((order) => new Set(order).size === order.length, { message: "providers must not repeat" })
      .default([...DEFAULT_FALLBACK_ORDER]),
    timeoutMs: positiveInt.default(30_000),
    retry: retrySchema.default({}),
  })
  .strict();

/** Partial toggles overriding the built-in definition of a scrape mode. */
export const scrapeToggleOverrideSchema = z
  .object({
    saveHtml: z.boolean().optional(),
    saveText: z.boolean().optional(),
    saveImages: z.boolean().optional(),
    saveFormulas: z.boolean().optional(),
    savePdfs: z.boolean().optional(),
    maxImages: nonNegativeInt.optional(),
    maxPdfs: nonNegativeInt.optional(),
  })
  .strict();

const scrapingSchema = z
  .object({
    maxConcurrent: positiveInt.max(64).default(5),
    timeoutMs: positiveInt.default(30_000),
    rateLimit: z.object({ delayMs: nonNegativeInt.default(1_000) }).strict().default({}),
    modes: z
      .object({
        standard: scrapeToggleOverrideSchema.optional(),
        deep: scrapeToggleOverrideSchema.optional(),
        light: scrapeToggleOverrideSchema.optional(),
      })
      .strict()
      .default({}),
    defaultMode: z.enum(SCRAPE_MODE_KINDS).default("standard"),
    userAgents: z.array(z.string().min(1)).min(1).default([DEFAULT_USER_AGENT]),
    headers: z.record(z.string()).default({
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.5",
    }),
    formulaSelector: z.string().min(1).default(DEFAULT_FORMULA_SELECTOR),
    headless: z.boolean().default(true),
    browserExecutablePath: z.string().min(1).nullable().default(null),
  })
  .strict();

const urlValidationSchema = z
  .object({
    allowedDomains: z.array(z.string().min(1)).default([]),
    blockedDomains: z.array(z.string().min(1)).default([]),
    blockedExtensions: z.array(z.string().min(1)).default([...DEFAULT_BLOCKED_EXTENSIONS]),
    allowAuthRequired: z.boolean().default(false),
    maxContentSize: positiveInt.default(10 * 1024 * 1024),
    fetchSessionTimeoutMs: positiveInt.default(60_000),
    fetchRequestTimeoutMs: positiveInt.default(15_000),
    fetchParallelism: positiveInt.max(64).default(5),
  })
  .strict();

const bm25Schema = z
  .object({
    k1: z.number().positive().default(1.2),
    b: z.number().min(0).max(1).default(0.75),
  })
  .strict();

const circuitBreakerSchema = z
  .object({
    failMax: positiveInt.default(5),
    resetTimeoutMs: nonNegativeInt.default(60_000),
  })
  .strict();

const directoriesSchema = z
  .object({
    base: z.string().min(1).default("Data"),
    searchResults: z.string().min(1).default("Search_Results"),
    scrapedResults: z.string().min(1).default("Scraped_Results"),
  })
  .strict();

const loggingSchema = z
  .object({
    level: z.enum(LOG_LEVEL_NAMES).default("info"),
    file: z.string().min(1).nullable().default(null),
    /** Redaction of sensitive payload keys and secret tokens. */
    redact: z.boolean().default(true),
    /** Extra literal tokens scrubbed from every string value. */
    redactTokens: z.array(z.string().min(1)).default([]),
  })
  .strict();

const providersSchema = z
  .object({
    tavilyApiKey: z.string().min(1).nullable().default(null),
    googleApiKey: z.string().min(1).nullable().default(null),
    googleCseId: z.string().min(1).nullable().default(null),
    duckduckgoEndpoint: z.string().url().default("https://api.duckduckgo.com/"),
    tavilyEndpoint: z.string().url().default("https://api.tavily.com/search"),
    googleEndpoint: z.string().url().default("https://www.googleapis.com/customsearch/v1"),
  })
  .strict();

/** Full application configuration as accepted from YAML (all keys optional). */
export const appConfigSchema = z
  .object({
    search: searchSchema.default({}),
    scraping: scrapingSchema.default({}),
    urlValidation: urlValidationSchema.default({}),
    bm25: bm25Schema.default({}),
    circuitBreaker: circuitBreakerSchema.default({}),
    directories: directoriesSchema.default({}),
    logging: loggingSchema.default({}),
    providers: providersSchema.default({}),
  })
  .strict();

/** Recursively marks every property and array of {@link T} as read-only. */
export type DeepReadonly<T> = T extends (infer Item)[]
  ? ReadonlyArray<DeepReadonly<Item>>
  : T extends object
    ? { readonly [Key in keyof T]: DeepReadonly<T[Key]> }
    : T;

/** Validated, immutable configuration handed to every component. */
export type AppConfig = DeepReadonly<z.output<typeof appConfigSchema>>;

export type SearchSettings = AppConfig["search"];
export type RetrySettings = AppConfig["search"]["retry"];
export type ScrapingSettings = AppConfig["scraping"];
export type UrlValidationSettings = AppConfig["urlValidation"];
export type Bm25Settings = AppConfig["bm25"];
export type CircuitBreakerSettings = AppConfig["circuitBreaker"];
export type DirectorySettings = AppConfig["directories"];
export type ProviderSettings = AppConfig["providers"];
export type ScrapeToggleOverride = z.output<typeof scrapeToggleOverrideSchema>;
