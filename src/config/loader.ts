import { readFile } from "node:fs/promises";
import process from "node:process";

import YAML from "yaml";
import type { ZodIssue } from "zod";

import { ConfigurationError, type ConfigurationIssue } from "../errors.js";
import { parseRedactionDirectives } from "../logger.js";
import { errnoCode, type ProcessEnv } from "../nodePrimitives.js";
import {
  readOptionalCsv,
  readOptionalEnum,
  readOptionalInt,
  readOptionalString,
} from "./env.js";
import { appConfigSchema, LOG_LEVEL_NAMES, type AppConfig } from "./schema.js";

/** File looked up when neither `--config` nor `HARVEST_CONFIG` is given. */
export const DEFAULT_CONFIG_FILE = "config.yaml";

export interface LoadConfigOptions {
  /** Explicit configuration file. A missing explicit file is an error. */
  readonly file?: string;
  /** Environment used for overrides and credentials. Defaults to `process.env`. */
  readonly env?: ProcessEnv;
}

type MutableRecord = Record<string, unknown>;

function isRecord(value: unknown): value is MutableRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Returns the nested object at `path`, creating empty objects along the way. */
function section(root: MutableRecord, path: readonly string[]): MutableRecord {
  let current = root;
  for (const key of path) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
      continue;
    }
    const created: MutableRecord = {};
    current[key] = created;
    current = created;
  }
  return current;
}

function assign(root: MutableRecord, path: readonly string[], key: string, value: unknown): void {
  if (value !== undefined) {
    section(root, path)[key] = value;
  }
}

/**
 * Layers environment overrides on top of the raw YAML document. Values are
 * validated afterwards together with the file content.
 */
export function applyEnvOverrides(raw: MutableRecord, env: ProcessEnv): MutableRecord {
  const options = { env };
  assign(raw, ["directories"], "base", readOptionalString("HARVEST_DATA_DIR", options));
  assign(raw, ["search"], "maxResults", readOptionalInt("HARVEST_MAX_RESULTS", { ...options, min: 1 }));
  assign(raw, ["search"], "scrapeTopN", readOptionalInt("HARVEST_SCRAPE_TOP_N", { ...options, min: 0 }));
  assign(raw, ["search"], "fallbackOrder", readOptionalCsv("HARVEST_FALLBACK_ORDER", options));
  assign(raw, ["scraping"], "maxConcurrent", readOptionalInt("HARVEST_MAX_CONCURRENT", { ...options, min: 1 }));
  assign(raw, ["logging"], "level", readOptionalEnum("HARVEST_LOG_LEVEL", LOG_LEVEL_NAMES, options));
  assign(raw, ["logging"], "file", readOptionalString("HARVEST_LOG_FILE", options));
  const redaction = readOptionalString("HARVEST_LOG_REDACT", options);
  if (redaction !== undefined) {
    const directives = parseRedactionDirectives(redaction);
    assign(raw, ["logging"], "redact", directives.enabled);
    assign(raw, ["logging"], "redactTokens", directives.tokens);
  }
  assign(raw, ["providers"], "tavilyApiKey", readOptionalString("TAVILY_API_KEY", options));
  assign(raw, ["providers"], "googleApiKey", readOptionalString("GOOGLE_API_KEY", options));
  assign(raw, ["providers"], "googleCseId", readOptionalString("GOOGLE_CSE_ID", options));
  return raw;
}

function toIssue(issue: ZodIssue): ConfigurationIssue {
  return { path: issue.path.length > 0 ? issue.path.join(".") : "(root)", message: issue.message };
}

/** Freezes {@link value} and everything reachable from it. */
function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validates a raw configuration document. Unknown keys and out-of-range values
 * raise a {@link ConfigurationError} listing every issue.
 */
export function parseConfig(raw: unknown): AppConfig {
  const parsed = appConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(toIssue);
    const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`invalid configuration: ${summary}`, issues);
  }
  return deepFreeze(parsed.data);
}

async function readDocument(file: string, required: boolean): Promise<MutableRecord> {
  let contents: string;
  try {
    contents = await readFile(file, "utf8");
  } catch (error) {
    if (!required && errnoCode(error) === "ENOENT") {
      return {};
    }
    throw new ConfigurationError(`unable to read configuration file ${file}`, [], { cause: error });
  }

  let document: unknown;
  try {
    document = YAML.parse(contents);
  } catch (error) {
    throw new ConfigurationError(`configuration file ${file} is not valid YAML`, [], { cause: error });
  }
  if (document === null || document === undefined) {
    return {};
  }
  if (!isRecord(document)) {
    throw new ConfigurationError(`configuration file ${file} must contain a mapping`, [
      { path: "(root)", message: "expected a mapping" },
    ]);
  }
  return document;
}

/**
 * Loads the YAML configuration, applies environment overrides and returns the
 * frozen result. The file defaults to `HARVEST_CONFIG`, then `config.yaml`
 * (optional).
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const explicit = options.file ?? readOptionalString("HARVEST_CONFIG", { env });
  const document = await readDocument(explicit ?? DEFAULT_CONFIG_FILE, explicit !== undefined);
  return parseConfig(applyEnvOverrides(document, env));
}

/** Secrets that loggers must scrub from string values: credentials first, then configured tokens. */
export function collectSecretTokens(config: AppConfig): string[] {
  const { tavilyApiKey, googleApiKey } = config.providers;
  const credentials = [tavilyApiKey, googleApiKey].filter((token): token is string => typeof token === "string");
  return [...new Set([...credentials, ...config.logging.redactTokens])];
}
