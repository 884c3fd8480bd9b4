import { Buffer } from "node:buffer";
import { randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { join, relative } from "node:path";

import { z } from "zod";

import type { CircuitBreakerSettings, DirectorySettings } from "../config/schema.js";
import { SaveError, StorageUnavailableError } from "../errors.js";
import { CircuitBreaker, type CircuitBreakerState } from "../infra/circuitBreaker.js";
import { describeError, StructuredLogger } from "../logger.js";
import { errnoCode } from "../nodePrimitives.js";
import {
  formatResultsTimestamp,
  formatSessionTimestamp,
  imageExtension,
  safeFilename,
  sanitizeQuery,
} from "./naming.js";

/** Kinds of scraped artifacts, each stored in its own sub-directory. */
export type ArtifactKind = "html" | "text" | "pdf" | "image" | "formula";

export const ARTIFACT_DIRECTORIES: Readonly<Record<ArtifactKind, string>> = {
  html: "html",
  text: "text",
  pdf: "pdfs",
  image: "images",
  formula: "formulas",
};

const METADATA_DIRECTORY = "metadata";
const RESULTS_FILE_PATTERN = /^query_results_\d{8}_\d{6}_\d{3}(?:_\d+)?\.json$/;

/** File-system primitives used by the store. Tests swap them to inject faults. */
export interface StoreFileSystem {
  mkdirp(path: string): Promise<void>;
  writeFile(path: string, data: string | Uint8Array): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  remove(path: string): Promise<void>;
  readdir(path: string): Promise<string[]>;
  stat(path: string): Promise<{ birthtimeMs: number; mtimeMs: number }>;
  readText(path: string): Promise<string>;
}

export const nodeFileSystem: StoreFileSystem = {
  mkdirp: async (path) => {
    await mkdir(path, { recursive: true });
  },
  writeFile: (path, data) => writeFile(path, data),
  rename: (from, to) => rename(from, to),
  remove: (path) => rm(path, { force: true }),
  readdir: (path) => readdir(path),
  stat: (path) => stat(path),
  readText: (path) => readFile(path, "utf8"),
};

/** Persisted shape of a search results file. */
export const searchResultsRecordSchema = z.object({
  query: z.string(),
  urls: z.array(z.string()),
  timestamp: z.string(),
  metadata: z.record(z.unknown()).optional(),
});
export type SearchResultsRecord = z.infer<typeof searchResultsRecordSchema>;

/** Outcome of a write. Failures are values; the store never throws on save. */
export type SaveResult =
  | { readonly saved: true; readonly path: string }
  | { readonly saved: false; readonly reason: "circuit_open"; readonly error: StorageUnavailableError }
  | { readonly saved: false; readonly reason: "write_failed"; readonly error: SaveError };

export type SaveFailure = Extract<SaveResult, { saved: false }>;

/** Artifact writes also report the sidecar, which may fail on its own. */
export type ArtifactSaveResult =
  | { readonly saved: true; readonly path: string; readonly sidecar: SaveResult }
  | SaveFailure;

export type LatestResults =
  | { readonly status: "found"; readonly path: string; readonly record: SearchResultsRecord }
  | { readonly status: "none" }
  | { readonly status: "unavailable"; readonly error: StorageUnavailableError | SaveError };

export interface ArtifactOptions {
  /** Resolved MIME type, recorded in the sidecar and used for image extensions. */
  readonly contentType?: string | null;
  /** Extra fields merged into the sidecar under `metadata`. */
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface ResultsStoreOptions {
  readonly query: string;
  readonly directories: DirectorySettings;
  readonly circuitBreaker: CircuitBreakerSettings;
  readonly logger?: StructuredLogger;
  readonly fs?: StoreFileSystem;
  /** Clock in epoch milliseconds. */
  readonly now?: () => number;
}

function artifactExtension(kind: ArtifactKind, contentType: string | null | undefined): string {
  switch (kind) {
    case "html":
      return ".html";
    case "text":
      return ".txt";
    case "pdf":
      return ".pdf";
    case "formula":
      return ".png";
    case "image":
      return imageExtension(contentType);
  }
}

function byteLength(data: string | Uint8Array): number {
  return typeof data === "string" ? Buffer.byteLength(data, "utf8") : data.byteLength;
}

/**
 * Persists search results and scraped artifacts for one session. Every write
 * lands in a temporary file first and is renamed into place, and every file
 * operation goes through a circuit breaker so a failing disk is skipped
 * quickly instead of timing out each save.
 */
export class ResultsStore {
  public readonly query: string;
  public readonly sessionDirectory: string;
  public readonly searchResultsDirectory: string;
  public readonly scrapedDirectory: string;

  private readonly fs: StoreFileSystem;
  private readonly logger: StructuredLogger;
  private readonly now: () => number;
  private readonly breaker: CircuitBreaker;
  private readonly artifactNameCounters = new Map<string, number>();
  private readonly usedArtifactNames = new Set<string>();
  private lastResultsStamp: string | null = null;
  private resultsStampRepeats = 0;
  private directoriesReady: Promise<void> | null = null;

  constructor(options: ResultsStoreOptions) {
    this.fs = options.fs ?? nodeFileSystem;
    this.logger = options.logger ?? new StructuredLogger({ component: "results_store" });
    this.now = options.now ?? (() => Date.now());
    this.breaker = new CircuitBreaker({
      failMax: options.circuitBreaker.failMax,
      resetTimeoutMs: options.circuitBreaker.resetTimeoutMs,
      now: this.now,
      onStateChange: (from, to) => this.logger.warn("store_circuit_transition", { from, to }),
    });

    this.query = options.query;
    const session = `${formatSessionTimestamp(new Date(this.now()))}_${sanitizeQuery(options.query)}`;
    this.sessionDirectory = join(options.directories.base, session);
    this.searchResultsDirectory = join(this.sessionDirectory, options.directories.searchResults);
    this.scrapedDirectory = join(this.sessionDirectory, options.directories.scrapedResults);
  }

  /** Every directory the store writes into. */
  get directories(): string[] {
    return [
      this.sessionDirectory,
      this.searchResultsDirectory,
      this.scrapedDirectory,
      ...Object.values(ARTIFACT_DIRECTORIES).map((name) => join(this.scrapedDirectory, name)),
      join(this.scrapedDirectory, METADATA_DIRECTORY),
    ];
  }

  get breakerState(): CircuitBreakerState {
    return this.breaker.getState();
  }

  /**
   * Creates the session tree. Idempotent: once it succeeded later calls return
   * immediately, and a failed attempt is retried on the next call.
   */
  async ensureDirectoriesReady(): Promise<void> {
    if (!this.directoriesReady) {
      this.directoriesReady = (async () => {
        for (const directory of this.directories) {
          await this.fs.mkdirp(directory);
        }
      })();
      this.directoriesReady.catch(() => {
        this.directoriesReady = null;
      });
    }
    try {
      await this.directoriesReady;
    } catch (error) {
      throw new SaveError(this.sessionDirectory, `cannot create ${this.sessionDirectory}`, { cause: error });
    }
  }

  /**
   * Probes every directory with a throw-away write. Returns `false` while the
   * breaker is open or when any probe fails. Probes bypass the breaker.
   */
  async isReady(): Promise<boolean> {
    if (this.breaker.getState() === "open") {
      return false;
    }
    try {
      await this.ensureDirectoriesReady();
      for (const directory of this.directories) {
        const probe = join(directory, `.probe-${randomUUID()}`);
        await this.fs.writeFile(probe, "");
        await this.fs.remove(probe);
      }
      return true;
    } catch (error) {
      this.logger.warn("store_not_ready", { error: describeError(error) });
      return false;
    }
  }

  /** Writes a `query_results_*.json` file into the session's results directory. */
  async saveSearchResults(urls: readonly string[], metadata?: Readonly<Record<string, unknown>>): Promise<SaveResult> {
    const timestamp = new Date(this.now());
    const record: SearchResultsRecord = {
      query: this.query,
      urls: [...urls],
      timestamp: timestamp.toISOString(),
      ...(metadata ? { metadata: { ...metadata } } : {}),
    };
    const target = join(this.searchResultsDirectory, this.nextResultsFileName(timestamp));
    const result = await this.guardedWrite(target, `${JSON.stringify(record, null, 2)}\n`);
    if (result.saved) {
      this.logger.info("search_results_saved", { path: result.path, urls: urls.length });
    }
    return result;
  }

  /**
   * Saves one scraped artifact under a name derived from {@link url} and writes
   * its metadata sidecar. Repeated saves of the same URL and kind get an index
   * suffix instead of overwriting.
   */
  async saveScrapedContent(
    url: string,
    kind: ArtifactKind,
    data: string | Uint8Array,
    options: ArtifactOptions = {},
  ): Promise<ArtifactSaveResult> {
    const extension = artifactExtension(kind, options.contentType);
    const name = this.reserveArtifactName(url, kind, extension);
    const target = join(this.scrapedDirectory, ARTIFACT_DIRECTORIES[kind], `${name}${extension}`);

    const artifact = await this.guardedWrite(target, data);
    if (!artifact.saved) {
      return artifact;
    }

    const sidecarPath = join(this.scrapedDirectory, METADATA_DIRECTORY, `${name}_${kind}_metadata.json`);
    const sidecar = {
      sourceUrl: url,
      kind,
      contentType: options.contentType ?? null,
      savedAt: new Date(this.now()).toISOString(),
      bytes: byteLength(data),
      artifactPath: relative(this.sessionDirectory, target),
      ...(options.metadata ? { metadata: { ...options.metadata } } : {}),
    };
    const sidecarResult = await this.guardedWrite(sidecarPath, `${JSON.stringify(sidecar, null, 2)}\n`);
    return { saved: true, path: artifact.path, sidecar: sidecarResult };
  }

  /**
   * Returns the newest results file of the session, ordered by creation time,
   * then modification time, then name. Unreadable files are skipped.
   */
  async loadLatestResults(): Promise<LatestResults> {
    const listing = await this.breaker.run(async () => {
      try {
        return await this.fs.readdir(this.searchResultsDirectory);
      } catch (error) {
        if (errnoCode(error) === "ENOENT") {
          return [];
        }
        throw error;
      }
    });
    if (!listing.ok) {
      return {
        status: "unavailable",
        error: listing.rejected
          ? new StorageUnavailableError(listing.retryAt)
          : new SaveError(this.searchResultsDirectory, "cannot list search results", { cause: listing.error }),
      };
    }

    const candidates: { path: string; name: string; birthtimeMs: number; mtimeMs: number }[] = [];
    for (const name of listing.value.filter((entry) => RESULTS_FILE_PATTERN.test(entry))) {
      const path = join(this.searchResultsDirectory, name);
      try {
        const info = await this.fs.stat(path);
        candidates.push({ path, name, birthtimeMs: info.birthtimeMs, mtimeMs: info.mtimeMs });
      } catch (error) {
        this.logger.warn("search_results_stat_failed", { path, error: describeError(error) });
      }
    }
    candidates.sort(
      (left, right) =>
        right.birthtimeMs - left.birthtimeMs ||
        right.mtimeMs - left.mtimeMs ||
        (right.name < left.name ? -1 : right.name > left.name ? 1 : 0),
    );

    for (const candidate of candidates) {
      try {
        const parsed = searchResultsRecordSchema.safeParse(JSON.parse(await this.fs.readText(candidate.path)));
        if (parsed.success) {
          return { status: "found", path: candidate.path, record: parsed.data };
        }
        this.logger.warn("search_results_invalid", { path: candidate.path });
      } catch (error) {
        this.logger.warn("search_results_unreadable", { path: candidate.path, error: describeError(error) });
      }
    }
    return { status: "none" };
  }

  private nextResultsFileName(timestamp: Date): string {
    const stamp = formatResultsTimestamp(timestamp);
    if (stamp === this.lastResultsStamp) {
      this.resultsStampRepeats += 1;
      return `query_results_${stamp}_${this.resultsStampRepeats + 1}.json`;
    }
    this.lastResultsStamp = stamp;
    this.resultsStampRepeats = 0;
    return `query_results_${stamp}.json`;
  }

  /**
   * `paper.pdf` saved as a pdf stays `paper.pdf`, not `paper.pdf.pdf`. Names
   * are unique per kind for the session, extension aside, so neither an
   * artifact nor its sidecar can replace an earlier one.
   */
  private reserveArtifactName(url: string, kind: ArtifactKind, extension: string): string {
    const derived = safeFilename(url);
    const base =
      derived.length > extension.length && derived.toLowerCase().endsWith(extension)
        ? derived.slice(0, -extension.length)
        : derived;
    const counterKey = `${kind}:${base.toLowerCase()}`;
    let count = this.artifactNameCounters.get(counterKey) ?? 0;
    let name: string;
    do {
      count += 1;
      name = count === 1 ? base : `${base}_${count}`;
    } while (this.usedArtifactNames.has(`${kind}:${name.toLowerCase()}`));
    this.artifactNameCounters.set(counterKey, count);
    this.usedArtifactNames.add(`${kind}:${name.toLowerCase()}`);
    return name;
  }

  private async guardedWrite(target: string, data: string | Uint8Array): Promise<SaveResult> {
    const result = await this.breaker.run(async () => {
      await this.ensureDirectoriesReady();
      await this.writeAtomic(target, data);
      return target;
    });
    if (result.ok) {
      return { saved: true, path: result.value };
    }
    if (result.rejected) {
      this.logger.warn("store_write_skipped", { target, reason: "circuit_open", retry_at: result.retryAt });
      return { saved: false, reason: "circuit_open", error: new StorageUnavailableError(result.retryAt) };
    }
    const error =
      result.error instanceof SaveError
        ? result.error
        : new SaveError(target, `cannot write ${target}`, { cause: result.error });
    this.logger.error("store_write_failed", { target, error: describeError(result.error) });
    return { saved: false, reason: "write_failed", error };
  }

  private async writeAtomic(target: string, data: string | Uint8Array): Promise<void> {
    const staging = `${target}.${randomUUID()}.tmp`;
    await this.fs.writeFile(staging, data);
    try {
      await this.fs.rename(staging, target);
    } catch (error) {
      await this.fs.remove(staging).catch((cleanupError: unknown) =>
        this.logger.warn("store_staging_cleanup_failed", { path: staging, error: describeError(cleanupError) }),
      );
      throw error;
    }
  }
}
