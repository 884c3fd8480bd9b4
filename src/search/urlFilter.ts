import type { UrlValidationSettings } from "../config/schema.js";
import { StructuredLogger } from "../logger.js";

/** Reason attached to a rejected candidate. Rejections are values, not errors. */
export type RejectionReason =
  | "malformed"
  | "unsupported_scheme"
  | "not_allowed_domain"
  | "blocked_domain"
  | "blocked_extension"
  | "embedded_credentials";

export type AdmissionPolicy = Pick<
  UrlValidationSettings,
  "allowedDomains" | "blockedDomains" | "blockedExtensions" | "allowAuthRequired"
>;

/**
 * Matches `host` against a domain list. Plain entries match the host exactly;
 * `*.example.com` matches every subdomain of `example.com`.
 */
function matchesDomain(host: string, patterns: readonly string[]): boolean {
  return patterns.some((raw) => {
    const pattern = raw.trim().toLowerCase();
    if (pattern.startsWith("*.")) {
      return host.endsWith(pattern.slice(1));
    }
    return host === pattern;
  });
}

/** Drops embedded credentials before a URL reaches the logs. */
function withoutCredentials(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.username = "";
    parsed.password = "";
    return parsed.toString();
  } catch {
    return url;
  }
}

/**
 * Pure admission gate applied to provider URLs before anything is fetched.
 * Rules run in a fixed order and the first rejection wins.
 */
export class UrlAdmissionFilter {
  private readonly blockedExtensions: readonly string[];

  constructor(
    private readonly policy: AdmissionPolicy,
    private readonly logger: StructuredLogger = new StructuredLogger({ component: "url_filter" }),
  ) {
    this.blockedExtensions = policy.blockedExtensions.map((extension) => {
      const lower = extension.trim().toLowerCase();
      return lower.startsWith(".") ? lower : `.${lower}`;
    });
  }

  /** Returns why {@link url} is rejected, or `null` when it is admitted. */
  explain(url: string): RejectionReason | null {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return "malformed";
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return "unsupported_scheme";
    }

    const host = parsed.hostname.toLowerCase();
    if (this.policy.allowedDomains.length > 0 && !matchesDomain(host, this.policy.allowedDomains)) {
      return "not_allowed_domain";
    }
    if (matchesDomain(host, this.policy.blockedDomains)) {
      return "blocked_domain";
    }
    const path = parsed.pathname.toLowerCase();
    if (this.blockedExtensions.some((extension) => path.endsWith(extension))) {
      return "blocked_extension";
    }
    if (!this.policy.allowAuthRequired && (parsed.username !== "" || parsed.password !== "")) {
      return "embedded_credentials";
    }
    return null;
  }

  isAccepted(url: string): boolean {
    const reason = this.explain(url);
    if (reason !== null) {
      this.logger.debug("url_rejected", { url: withoutCredentials(url), reason });
      return false;
    }
    return true;
  }

  /** Keeps admitted URLs in their original order. */
  validateMany(urls: readonly string[]): string[] {
    const accepted = urls.filter((url) => this.isAccepted(url));
    this.logger.info("urls_validated", { received: urls.length, accepted: accepted.length });
    return accepted;
  }
}
