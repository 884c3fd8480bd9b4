import { SCRAPE_MODE_KINDS, type ScrapeModeKind } from "./config/schema.js";

/** Options accepted by the `search-harvest` command. */
export interface CliOptions {
  readonly query: string;
  readonly configFile: string | null;
  readonly mode: ScrapeModeKind | null;
  readonly scrape: boolean;
  /** Print the whole result as JSON instead of the summary lines. */
  readonly json: boolean;
  readonly help: boolean;
}

/** Raised for malformed command lines. */
export class CliUsageError extends Error {
  public readonly code = "E-CLI-USAGE";

  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = `Usage: search-harvest [options] <query...>

Options:
  --config <file>   YAML configuration file (default: $HARVEST_CONFIG, then ./config.yaml)
  --mode <kind>     scrape mode: ${SCRAPE_MODE_KINDS.join(", ")}
  --no-scrape       stop after ranking
  --json            print the full result as JSON
  --help            show this message
`;

const FLAG_WITH_VALUE = new Set(["--config", "--mode"]);

function parseMode(value: string, flag: string): ScrapeModeKind {
  const mode = SCRAPE_MODE_KINDS.find((kind) => kind === value);
  if (!mode) {
    throw new CliUsageError(`${flag} must be one of ${SCRAPE_MODE_KINDS.join(", ")} (received '${value}')`);
  }
  return mode;
}

/**
 * Parses `process.argv.slice(2)`. Every argument that is not a flag is part of
 * the query; `--` ends flag parsing.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  let configFile: string | null = null;
  let mode: ScrapeModeKind | null = null;
  let scrape = true;
  let json = false;
  let help = false;
  const words: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index] ?? "";
    if (arg === "--") {
      words.push(...argv.slice(index + 1));
      break;
    }
    if (!arg.startsWith("--")) {
      words.push(arg);
      continue;
    }

    const separator = arg.indexOf("=");
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    let value = separator === -1 ? undefined : arg.slice(separator + 1);
    if (FLAG_WITH_VALUE.has(flag) && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new CliUsageError(`${flag} requires a value`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--config":
        configFile = value ?? null;
        break;
      case "--mode":
        mode = parseMode(value ?? "", flag);
        break;
      case "--no-scrape":
        scrape = false;
        break;
      case "--json":
        json = true;
        break;
      case "--help":
        help = true;
        break;
      default:
        throw new CliUsageError(`unknown option ${flag}`);
    }
  }

  const query = words.join(" ").trim();
  if (query.length === 0 && !help) {
    throw new CliUsageError("a query is required");
  }
  return { query, configFile, mode, scrape, json, help };
}
