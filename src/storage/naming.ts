import { createHash } from "node:crypto";

/** Longest sanitised query kept in a session directory name. */
export const MAX_QUERY_SEGMENT_LENGTH = 50;
/** Longest artifact base name derived from a URL. */
export const MAX_ARTIFACT_NAME_LENGTH = 120;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** `YYYYMMDD_HHMMSS` in UTC. */
export function formatSessionTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/** `YYYYMMDD_HHMMSS_mmm` in UTC, used for result files. */
export function formatResultsTimestamp(date: Date): string {
  return `${formatSessionTimestamp(date)}_${pad(date.getUTCMilliseconds(), 3)}`;
}

/**
 * Lowercases the query, collapses every run of non-alphanumeric characters to
 * `_` and caps the length. Queries without any usable character become
 * `query`.
 */
export function sanitizeQuery(query: string): string {
  const collapsed = query
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  const capped = collapsed.slice(0, MAX_QUERY_SEGMENT_LENGTH).replace(/_+$/, "");
  return capped.length > 0 ? capped : "query";
}

/**
 * Derives a portable file name from a URL: the scheme is dropped, characters
 * outside `[A-Za-z0-9_.-]` become `_` and the result is capped at
 * {@link maxLength}. Truncated names end with an 8-character SHA-1 of the full
 * URL so distinct long URLs keep distinct names.
 */
export function safeFilename(url: string, maxLength = MAX_ARTIFACT_NAME_LENGTH): string {
  const cleaned = url
    .replace(/^[a-z][a-z0-9+.-]*:\/\//i, "")
    .replace(/[^A-Za-z0-9_.-]+/g, "_")
    .replace(/^[_.]+|[_.]+$/g, "");
  const base = cleaned.length > 0 ? cleaned : "resource";
  if (base.length <= maxLength) {
    return base;
  }
  const digest = createHash("sha1").update(url).digest("hex").slice(0, 8);
  return `${base.slice(0, maxLength - digest.length - 1)}_${digest}`;
}

const IMAGE_EXTENSIONS: Readonly<Record<string, string>> = {
  "image/png": ".png",
  "image/jpeg": ".jpg",
  "image/gif": ".gif",
  "image/webp": ".webp",
  "image/svg+xml": ".svg",
  "image/avif": ".avif",
  "image/bmp": ".bmp",
};

/** Extension used for an image artifact of the given MIME type. */
export function imageExtension(contentType: string | null | undefined): string {
  return (contentType && IMAGE_EXTENSIONS[contentType]) || ".img";
}
