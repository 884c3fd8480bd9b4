import { Buffer } from "node:buffer";

/** Mapping from common extensions to MIME types used when headers are missing. */
const EXTENSION_MIME_FALLBACK: Readonly<Record<string, string>> = {
  pdf: "application/pdf",
  html: "text/html",
  htm: "text/html",
  txt: "text/plain",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  gif: "image/gif",
  webp: "image/webp",
  svg: "image/svg+xml",
};

/**
 * Generic error thrown by the downloader when the network operation fails or a
 * local constraint is violated.
 */
export class DownloadError extends Error {
  public readonly code: string = "E-FETCH-FAILED";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DownloadError";
  }
}

/** Error raised when the HTTP status code indicates a failure. */
export class HttpStatusError extends DownloadError {
  public override readonly code = "E-FETCH-HTTP";
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

/** Error raised whenever the payload exceeds the configured byte limit. */
export class DownloadSizeExceededError extends DownloadError {
  public override readonly code = "E-FETCH-TOO-LARGE";
  readonly maxBytes: number;

  constructor(maxBytes: number) {
    super(`Payload exceeds maximum allowed size of ${maxBytes} bytes.`);
    this.name = "DownloadSizeExceededError";
    this.maxBytes = maxBytes;
  }
}

/** Error raised when the operation is aborted due to timeout or cancellation. */
export class DownloadTimeoutError extends DownloadError {
  public override readonly code = "E-FETCH-TIMEOUT";
  readonly timeoutMs: number;

  constructor(timeoutMs: number, message = `Download timed out after ${timeoutMs} ms.`) {
    super(message);
    this.name = "DownloadTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Error raised when the payload type is not the one the caller asked for. */
export class UnsupportedContentTypeError extends DownloadError {
  public override readonly code = "E-FETCH-CONTENT-TYPE";
  readonly contentType: string | null;

  constructor(contentType: string | null, url: string) {
    super(`Unexpected content type ${contentType ?? "(none)"} for ${url}.`);
    this.name = "UnsupportedContentTypeError";
    this.contentType = contentType;
  }
}

/** Removes charset parameters from a Content-Type header. */
export function sanitiseContentType(raw: string | null | undefined): string | null {
  if (!raw) {
    return null;
  }
  const [type = ""] = raw.split(";");
  const trimmed = type.trim().toLowerCase();
  return trimmed.length > 0 ? trimmed : null;
}

/** Guesses the MIME type from the URL extension. */
export function guessContentTypeFromUrl(url: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }
  const lastDot = pathname.lastIndexOf(".");
  if (lastDot === -1 || lastDot === pathname.length - 1) {
    return null;
  }
  return EXTENSION_MIME_FALLBACK[pathname.slice(lastDot + 1).toLowerCase()] ?? null;
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const JPEG_SIGNATURE = Buffer.from([0xff, 0xd8, 0xff]);

/** Detects a handful of binary formats from their leading bytes. */
export function sniffContentType(buffer: Buffer): string | null {
  if (buffer.subarray(0, 4).toString("ascii") === "%PDF") {
    return "application/pdf";
  }
  if (buffer.length >= 8 && buffer.subarray(0, 8).equals(PNG_SIGNATURE)) {
    return "image/png";
  }
  if (buffer.length >= 3 && buffer.subarray(0, 3).equals(JPEG_SIGNATURE)) {
    return "image/jpeg";
  }
  const head = buffer.subarray(0, 6).toString("ascii");
  if (head === "GIF87a" || head === "GIF89a") {
    return "image/gif";
  }
  return null;
}

/** Content-Types considered too generic to trust without signature confirmation. */
const GENERIC_CONTENT_TYPES = new Set(["text/plain", "application/octet-stream", "binary/octet-stream"]);

/**
 * Prefers the declared type unless it is missing or generic while the payload
 * signature says otherwise.
 */
export function resolveContentType(declared: string | null, sniffed: string | null, guessed: string | null): string | null {
  if (!declared) {
    return sniffed ?? guessed;
  }
  if (sniffed && sniffed !== declared && GENERIC_CONTENT_TYPES.has(declared)) {
    return sniffed;
  }
  return declared;
}

/** Reads the response body while enforcing the maximum size constraint. */
export async function readClampedBody(
  response: Response,
  maxBytes: number,
  controller: AbortController,
): Promise<Buffer> {
  const body = response.body;
  if (!body) {
    return Buffer.alloc(0);
  }

  const declaredLength = Number.parseInt(response.headers.get("content-length") ?? "", 10);
  if (Number.isFinite(declaredLength) && declaredLength > maxBytes) {
    controller.abort();
    throw new DownloadSizeExceededError(maxBytes);
  }

  const reader = body.getReader();
  const chunks: Buffer[] = [];
  let total = 0;

  while (true) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      controller.abort();
      throw new DownloadSizeExceededError(maxBytes);
    }
    chunks.push(Buffer.from(value));
  }

  return Buffer.concat(chunks, total);
}

/** Payload returned by {@link HttpDownloader.download}. */
export interface DownloadedResource {
  readonly requestedUrl: string;
  readonly finalUrl: string;
  readonly status: number;
  readonly contentType: string | null;
  readonly body: Buffer;
}

export interface DownloadRequest {
  readonly timeoutMs: number;
  readonly maxBytes: number;
  /** Sent as the `Accept` header. */
  readonly accept?: string;
  /** Rejects the payload unless the resolved content type passes. */
  readonly expectContentType?: (contentType: string | null) => boolean;
  /** External cancellation (e.g. a session deadline). */
  readonly signal?: AbortSignal;
}

/** Optional dependencies injected into the downloader for testing. */
export interface DownloaderDependencies {
  readonly fetchImpl?: typeof fetch;
  readonly userAgent?: string;
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * Minimal HTTP downloader shared by the ranking fetcher and the scraper asset
 * downloads. Each call owns an {@link AbortController} combining its own
 * timeout with the caller's signal, so cancelling one download never touches
 * its siblings.
 */
export class HttpDownloader {
  private readonly fetchImpl: typeof fetch;
  private readonly userAgent?: string;
  private readonly headers: Readonly<Record<string, string>>;

  constructor(deps: DownloaderDependencies = {}) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.userAgent = deps.userAgent;
    this.headers = deps.headers ?? {};
  }

  async download(url: string, request: DownloadRequest): Promise<DownloadedResource> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
    const onExternalAbort = () => controller.abort();
    if (request.signal?.aborted) {
      controller.abort();
    } else {
      request.signal?.addEventListener("abort", onExternalAbort, { once: true });
    }

    const headers = new Headers(this.headers);
    headers.set("accept", request.accept ?? "*/*");
    if (this.userAgent) {
      headers.set("user-agent", this.userAgent);
    }

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, { headers, redirect: "follow", signal: controller.signal });
      } catch (error) {
        if (controller.signal.aborted) {
          throw this.abortError(request);
        }
        throw new DownloadError(`Failed to download ${url}: ${error instanceof Error ? error.message : String(error)}`, {
          cause: error,
        });
      }

      if (response.status >= 400) {
        await response.body?.cancel();
        throw new HttpStatusError(response.status, `Received status ${response.status} when fetching ${url}`);
      }

      const finalUrl = response.url || url;
      const declared = sanitiseContentType(response.headers.get("content-type"));
      if (request.expectContentType && declared && !request.expectContentType(declared)) {
        await response.body?.cancel();
        throw new UnsupportedContentTypeError(declared, url);
      }

      let body: Buffer;
      try {
        body = await readClampedBody(response, request.maxBytes, controller);
      } catch (error) {
        if (!(error instanceof DownloadError) && controller.signal.aborted) {
          throw this.abortError(request);
        }
        throw error;
      }

      const contentType = resolveContentType(declared, sniffContentType(body), guessContentTypeFromUrl(finalUrl));
      if (request.expectContentType && !request.expectContentType(contentType)) {
        throw new UnsupportedContentTypeError(contentType, url);
      }
      return { requestedUrl: url, finalUrl, status: response.status, contentType, body };
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener("abort", onExternalAbort);
    }
  }

  private abortError(request: DownloadRequest): DownloadTimeoutError {
    return request.signal?.aborted
      ? new DownloadTimeoutError(request.timeoutMs, "Download cancelled by the caller.")
      : new DownloadTimeoutError(request.timeoutMs);
  }
}
