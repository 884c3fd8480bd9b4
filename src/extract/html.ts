import { load, type CheerioAPI } from "cheerio";

/** Elements whose content never reaches the extracted text. */
const NON_CONTENT_SELECTOR = "script, style, noscript, template, svg, iframe";

/** Elements padded with spaces so adjacent blocks do not glue words together. */
const BLOCK_SELECTOR =
  "p, div, section, article, main, header, footer, aside, nav, li, ul, ol, h1, h2, h3, h4, h5, h6, td, th, tr, table, blockquote, pre, figcaption, dd, dt";

/** Title, description and link statistics kept next to the saved HTML. */
export interface PageSummary {
  readonly title: string | null;
  readonly description: string | null;
  readonly linkCount: number;
  readonly imageCount: number;
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** Converts an HTML document into whitespace-normalised plain text. */
export function htmlToText(html: string): string {
  const $ = load(html);
  $(NON_CONTENT_SELECTOR).remove();
  $("br").replaceWith(" ");
  $(BLOCK_SELECTOR).each((_, element) => {
    $(element).prepend(" ").append(" ");
  });
  const body = $("body");
  return collapseWhitespace(body.length > 0 ? body.text() : $.root().text());
}

/** Resolves {@link raw} against {@link baseUrl}, keeping http(s) URLs only. */
function resolveHttpUrl(raw: string | undefined, baseUrl: string): URL | null {
  if (!raw || raw.trim().length === 0) {
    return null;
  }
  try {
    const resolved = new URL(raw.trim(), baseUrl);
    if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
      return null;
    }
    resolved.hash = "";
    return resolved;
  } catch {
    return null;
  }
}

function collectLinks(
  $: CheerioAPI,
  selector: string,
  attribute: string,
  baseUrl: string,
  limit: number,
  accept: (url: URL) => boolean = () => true,
): string[] {
  const seen = new Set<string>();
  const links: string[] = [];
  $(selector).each((_, element) => {
    if (links.length >= limit) {
      return false;
    }
    const resolved = resolveHttpUrl($(element).attr(attribute), baseUrl);
    if (!resolved || !accept(resolved)) {
      return undefined;
    }
    const href = resolved.toString();
    if (!seen.has(href)) {
      seen.add(href);
      links.push(href);
    }
    return undefined;
  });
  return links;
}

/** Absolute, de-duplicated `img[src]` URLs in document order. */
export function extractImageUrls(html: string, baseUrl: string, limit = Number.POSITIVE_INFINITY): string[] {
  return collectLinks(load(html), "img[src]", "src", baseUrl, limit);
}

/** Absolute, de-duplicated links whose path ends in `.pdf`. */
export function extractPdfLinks(html: string, baseUrl: string, limit = Number.POSITIVE_INFINITY): string[] {
  return collectLinks(load(html), "a[href]", "href", baseUrl, limit, (url) =>
    url.pathname.toLowerCase().endsWith(".pdf"),
  );
}

export function extractPageSummary(html: string): PageSummary {
  const $ = load(html);
  const title =
    $("meta[property='og:title']").attr("content") || $("title").first().text() || $("h1").first().text();
  const description =
    $("meta[name='description']").attr("content") || $("meta[property='og:description']").attr("content") || "";
  return {
    title: collapseWhitespace(title) || null,
    description: collapseWhitespace(description) || null,
    linkCount: $("a[href]").length,
    imageCount: $("img[src]").length,
  };
}
