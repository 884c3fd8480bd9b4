#!/usr/bin/env node
import process from "node:process";
import { pathToFileURL } from "node:url";

import { parseCliArgs, USAGE, CliUsageError } from "./cliOptions.js";
import { collectSecretTokens, loadConfig } from "./config/loader.js";
import { ConfigurationError } from "./errors.js";
import { Harvester, type HarvesterDependencies, type HarvestResult } from "./harvest.js";
import { describeError, StructuredLogger } from "./logger.js";
import type { ProcessEnv } from "./nodePrimitives.js";

/** Exit codes of the `search-harvest` command. */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIGURATION = 2;

interface Writable {
  write(chunk: string): unknown;
}

export interface CliRuntime {
  readonly env?: ProcessEnv;
  readonly stdout?: Writable;
  /** Receives the JSON log lines and usage errors. */
  readonly stderr?: Writable;
  /** Test seams forwarded to the {@link Harvester}. */
  readonly harvester?: Omit<HarvesterDependencies, "config" | "logger">;
}

export function formatSummary(result: HarvestResult): string {
  const lines = [`query: ${result.query}`, `session: ${result.sessionDirectory}`];
  if (result.search.status === "no_results") {
    lines.push(`no results (stage: ${result.search.stage})`);
  } else {
    lines.push(`ranked: ${result.summary.ranked}`);
    lines.push(`results file: ${result.search.resultsPath ?? "(not saved)"}`);
    for (const [index, entry] of result.search.ranked.entries()) {
      lines.push(`  ${index + 1}. ${entry.score.toFixed(3)} ${entry.url}`);
    }
  }
  if (result.scrape) {
    const { succeeded, partial, failed } = result.summary;
    lines.push(`scraped (${result.scrape.mode}): ${succeeded} succeeded, ${partial} partial, ${failed} failed`);
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Runs one harvest and resolves with the process exit code. Configuration
 * problems exit with {@link EXIT_CONFIGURATION}; a run that produced no
 * results still exits with {@link EXIT_OK}.
 */
export async function runCli(argv: readonly string[], runtime: CliRuntime = {}): Promise<number> {
  const env = runtime.env ?? process.env;
  const stdout = runtime.stdout ?? process.stdout;
  const stderr = runtime.stderr ?? process.stderr;

  let options;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      stderr.write(`${error.message}\n\n${USAGE}`);
      return EXIT_FAILURE;
    }
    throw error;
  }
  if (options.help) {
    stdout.write(USAGE);
    return EXIT_OK;
  }

  let logger: StructuredLogger | null = null;
  try {
    const config = await loadConfig({ file: options.configFile ?? undefined, env });
    logger = new StructuredLogger({
      level: config.logging.level,
      logFile: config.logging.file,
      redactionEnabled: config.logging.redact,
      redactSecrets: collectSecretTokens(config),
      stream: stderr,
    });
    const harvester = new Harvester({ ...runtime.harvester, config, logger });
    const result = await harvester.harvest(options.query, {
      scrape: options.scrape,
      ...(options.mode ? { mode: options.mode } : {}),
    });
    stdout.write(options.json ? `${JSON.stringify(result, null, 2)}\n` : formatSummary(result));
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      const details = error.issues.map((issue) => `  ${issue.path}: ${issue.message}`);
      stderr.write([`configuration error: ${error.message}`, ...details].join("\n") + "\n");
      return EXIT_CONFIGURATION;
    }
    if (logger) {
      logger.error("harvest_failed", { error: describeError(error) });
    } else {
      stderr.write(`harvest failed: ${error instanceof Error ? error.message : String(error)}\n`);
    }
    return EXIT_FAILURE;
  } finally {
    await logger?.flush();
  }
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  void runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`search-harvest crashed: ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
      process.exitCode = EXIT_FAILURE;
    },
  );
}
