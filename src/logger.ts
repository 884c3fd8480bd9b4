import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import process from "node:process";
import { errnoCode } from "./nodePrimitives.js";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Default placeholder inserted when a secret token is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

/** Accepted directives enabling custom secret redaction. */
const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);

/** Directives explicitly disabling secret redaction despite configured tokens. */
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Keys whose values are redacted when redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "apikey",
  "token",
  "access_token",
  "cookie",
  "set-cookie",
]);

/**
 * Parses the `HARVEST_LOG_REDACT` environment variable so operators can both
 * toggle redaction and provide a list of sensitive substrings that must be
 * scrubbed from log lines. The helper accepts comma-separated directives such
 * as `"on,tvly-"` or `"off"` and enables redaction when custom patterns are
 * provided without an explicit toggle.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: Array<string>;
} {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  const directives = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  if (directives.length === 0) {
    return { enabled: false, tokens: [] };
  }

  let enabled: boolean | undefined;
  const tokens: Array<string> = [];

  for (const directive of directives) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
      continue;
    }
    if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
      continue;
    }
    tokens.push(directive);
  }

  if (enabled === undefined) {
    enabled = tokens.length > 0;
  }

  return { enabled, tokens: Array.from(new Set(tokens)) };
}

/** Default maximum size (in bytes) of the mirrored log file before rotation. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

/** Default number of historical log files retained during rotation. */
const DEFAULT_MAX_FILE_COUNT = 5;

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Ordered severities, lowest first. */
export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  payload?: unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Entries below this severity are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  /** Name stamped on every entry, e.g. `coordinator` or `store`. */
  readonly component?: string;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /**
   * Literal tokens or regular expressions scrubbed from string values, used
   * for provider credentials that could end up inside URLs or messages.
   */
  readonly redactSecrets?: Array<string | RegExp>;
  /**
   * Toggle for structured payload redaction. Defaults to `true`; the
   * configuration loader derives it from `HARVEST_LOG_REDACT` through
   * {@link parseRedactionDirectives}.
   */
  readonly redactionEnabled?: boolean;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Stream receiving the JSON lines. Defaults to stdout. */
  readonly stream?: { write(chunk: string): unknown };
}

/** Shape used when an error ends up inside a log payload. */
export interface SerialisedError {
  readonly name: string;
  readonly message: string;
  readonly code?: string;
}

/** Reduces an unknown failure to a compact, JSON-friendly description. */
export function describeError(error: unknown): SerialisedError {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    return code ? { name: error.name, message: error.message, code } : { name: error.name, message: error.message };
  }
  return { name: "Error", message: String(error) };
}

/** State shared between a logger and the children derived from it. */
export interface LoggerSink {
  writeQueue: Promise<void>;
  logDirectoryReady: boolean;
}

/**
 * Structured logger that emits JSON lines on stdout and optionally mirrors them
 * to a file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly options: LoggerOptions;
  private readonly logFile?: string;
  private readonly minLevel: number;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactSecrets: Array<string | RegExp>;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly redactionEnabled: boolean;
  private readonly stream: { write(chunk: string): unknown };
  private readonly sink: LoggerSink;

  constructor(options: LoggerOptions = {}, sink?: LoggerSink) {
    this.options = options;
    this.logFile = options.logFile ?? undefined;
    this.minLevel = LOG_LEVELS.indexOf(options.level ?? "info");
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.redactSecrets = [...new Set(options.redactSecrets ?? [])];
    this.entryListener = options.onEntry;
    this.redactionEnabled = options.redactionEnabled ?? true;
    this.stream = options.stream ?? process.stdout;
    this.sink = sink ?? { writeQueue: Promise.resolve(), logDirectoryReady: false };
  }

  /**
   * Returns a logger stamping `component` on every entry. The child shares the
   * file queue of its parent so ordering across components is preserved.
   */
  child(component: string): StructuredLogger {
    return new StructuredLogger({ ...this.options, component }, this.sink);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.minLevel;
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  private async ensureLogDestination(file: string): Promise<void> {
    if (this.sink.logDirectoryReady) {
      return;
    }

    const directory = dirname(file);
    try {
      await mkdir(directory, { recursive: true });
      this.sink.logDirectoryReady = true;
    } catch (error) {
      this.reportInternalFailure("log_directory_create_failed", { directory, error: describeError(error) });
      throw error;
    }
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const safePayload = payload !== undefined ? this.redactStructuredValue(payload) : undefined;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.options.component !== undefined ? { component: this.options.component } : {}),
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.stream.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    const file = this.logFile;
    if (!file) {
      return;
    }
    this.sink.writeQueue = this.sink.writeQueue
      .then(async () => {
        try {
          await this.ensureLogDestination(file);
          await this.rotateIfNeeded(file, Buffer.byteLength(line, "utf8"));
          await appendFile(file, line, "utf8");
        } catch (err) {
          this.reportInternalFailure("log_file_write_failed", describeError(err));
          // Allow future attempts to retry directory creation after a failure.
          this.sink.logDirectoryReady = false;
        }
      })
      .catch(() => {
        // Errors already reported; reset queue to avoid unhandled rejections.
        this.sink.writeQueue = Promise.resolve();
      });
  }

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to deterministically assert the content of mirrored log files.
   */
  async flush(): Promise<void> {
    await this.sink.writeQueue;
  }

  private reportInternalFailure(message: string, payload: unknown): void {
    const entry: LogEntry = { timestamp: new Date().toISOString(), level: "error", message, payload };
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  }

  /**
   * Rotates the active log file when appending the provided payload would
   * exceed the configured size limit. Rotation keeps at most
   * {@link maxFileCount} historical files alongside the active one.
   */
  private async rotateIfNeeded(file: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      const stats = await stat(file);
      currentSize = stats.size;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    try {
      await this.performRotation(file);
    } catch (error) {
      this.reportInternalFailure("log_file_rotation_failed", describeError(error));
    }
  }

  /** Executes the rotation sequence while honouring {@link maxFileCount}. */
  private async performRotation(file: string): Promise<void> {
    const keep = this.maxFileCount;
    if (keep === 1) {
      await rm(file, { force: true });
      return;
    }

    await rm(`${file}.${keep - 1}`, { force: true });

    for (let index = keep - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${file}.${index}`, `${file}.${index + 1}`);
    }
    await renameIfPresent(file, `${file}.1`);
  }

  private redactStructuredValue(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    return this.deepRedact(value);
  }

  private deepRedact(value: unknown): unknown {
    if (typeof value === "string") {
      return this.redactString(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }

  private redactString(value: string): string {
    let sanitized = value;
    for (const pattern of this.redactSecrets) {
      if (typeof pattern === "string" && pattern.length > 0) {
        sanitized = sanitized.split(pattern).join(REDACTION_TOKEN);
      } else if (pattern instanceof RegExp) {
        sanitized = sanitized.replace(pattern, REDACTION_TOKEN);
      }
    }
    return sanitized;
  }
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (errnoCode(error) !== "ENOENT") {
      throw error;
    }
  }
}
