import type { z } from "zod";

import type { ProviderName } from "../../config/schema.js";
import { isTransientStatus, ProviderError } from "../../errors.js";

/** Transport settings shared by every provider client. */
export interface ProviderTransport {
  readonly fetchImpl?: typeof fetch;
  readonly timeoutMs: number;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

/** Settles with {@link work}, or rejects with the abort reason once {@link signal} fires. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

function transportError(provider: ProviderName, error: unknown, timedOut: boolean, timeoutMs: number): ProviderError {
  if (timedOut || isAbortError(error)) {
    return new ProviderError(provider, `${provider} request timed out after ${timeoutMs} ms`, {
      code: "E-PROVIDER-TIMEOUT",
      transient: true,
      cause: error,
    });
  }
  return new ProviderError(provider, `${provider} request failed`, {
    code: "E-PROVIDER-NETWORK",
    transient: true,
    cause: error,
  });
}

/**
 * Executes one HTTP exchange and validates the JSON payload against
 * {@link schema}. The timeout covers the body as well as the headers. Network
 * failures, timeouts and retriable statuses become transient
 * {@link ProviderError}s; everything else is permanent.
 */
export async function requestJson<Schema extends z.ZodTypeAny>(
  provider: ProviderName,
  url: URL,
  init: RequestInit,
  transport: ProviderTransport,
  schema: Schema,
): Promise<z.output<Schema>> {
  const fetchImpl = transport.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), transport.timeoutMs);

  let status: number;
  let body: string;
  try {
    const response = await untilAborted(fetchImpl(url, { ...init, signal: controller.signal }), controller.signal).catch(
      (error: unknown) => {
        throw transportError(provider, error, controller.signal.aborted, transport.timeoutMs);
      },
    );
    status = response.status;
    if (!response.ok) {
      throw new ProviderError(provider, `${provider} responded with HTTP ${response.status}`, {
        code: "E-PROVIDER-HTTP",
        transient: isTransientStatus(response.status),
        status: response.status,
      });
    }
    body = await untilAborted(response.text(), controller.signal).catch((error: unknown) => {
      throw transportError(provider, error, controller.signal.aborted, transport.timeoutMs);
    });
  } finally {
    clearTimeout(timeout);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    throw new ProviderError(provider, `${provider} returned a payload that is not JSON`, {
      code: "E-PROVIDER-SCHEMA",
      transient: false,
      status,
      cause: error,
    });
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new ProviderError(provider, `${provider} payload did not match the expected schema`, {
      code: "E-PROVIDER-SCHEMA",
      transient: false,
      status,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** Raised before any request when a keyed provider has no credential. */
export function missingCredential(provider: ProviderName, variables: readonly string[]): ProviderError {
  return new ProviderError(provider, `${provider} requires ${variables.join(" and ")}`, {
    code: "E-PROVIDER-CREDENTIALS",
    transient: false,
  });
}

/** Keeps the first occurrence of each http(s) URL, up to {@link limit}. */
export function collectUrls(candidates: Iterable<string | null | undefined>, limit: number): string[] {
  const seen = new Set<string>();
  const urls: string[] = [];
  for (const candidate of candidates) {
    if (urls.length >= limit) {
      break;
    }
    if (typeof candidate !== "string" || !/^https?:\/\//i.test(candidate) || seen.has(candidate)) {
      continue;
    }
    seen.add(candidate);
    urls.push(candidate);
  }
  return urls;
}
