/**
 * Page text retrieval.
 *
 * Downloads a page and reduces it to readable text. Scripts, styles and page
 * chrome (navigation, headers, footers, asides, iframes) are dropped, the
 * remaining tags are stripped and whitespace is collapsed. Never throws;
 * failures come back as text.
 */

import { errorMessage, log, logWarn } from "../utils/logger.ts";
import { decodeEntities } from "./search.ts";

export interface PageFetchOptions {
  fetch?: typeof fetch;
  /** Maximum characters of text returned */
  maxChars?: number;
  timeoutMs?: number;
}

export const DEFAULT_PAGE_CHAR_LIMIT = 10_000;

const PAGE_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

const REMOVED_ELEMENTS = ["script", "style", "nav", "header", "footer", "aside", "iframe", "noscript"];

/**
 * Reduce an HTML document to whitespace-collapsed text.
 */
export function htmlToText(html: string): string {
  let text = html.replace(/<!--[\s\S]*?-->/g, " ");
  for (const tag of REMOVED_ELEMENTS) {
    text = text.replace(new RegExp(`<${tag}\\b[\\s\\S]*?<\\/${tag}\\s*>`, "gi"), " ");
  }
  text = text.replace(/<[^>]+>/g, " ");
  return decodeEntities(text).replace(/\s+/g, " ").trim();
}

/**
 * Fetch `url` and return at most `maxChars` characters of its text.
 *
 * @returns The page text, `"Failed to load page (Status: N)"` for a non-2xx
 *   response, or `"Error reading page: <message>"` for any other failure
 */
export async function fetchPageText(url: string, options: PageFetchOptions = {}): Promise<string> {
  const fetchImpl = options.fetch ?? fetch;
  const maxChars = options.maxChars ?? DEFAULT_PAGE_CHAR_LIMIT;

  try {
    const response = await fetchImpl(url, {
      headers: { "User-Agent": PAGE_USER_AGENT },
      signal: AbortSignal.timeout(options.timeoutMs ?? 10_000),
    });
    if (!response.ok) {
      logWarn("Fetch", "bad_status", { url, status: response.status });
      return `Failed to load page (Status: ${response.status})`;
    }
    const text = htmlToText(await response.text()).slice(0, maxChars);
    log("Fetch", "page_read", { url, chars: text.length });
    return text;
  } catch (error) {
    logWarn("Fetch", "request_failed", { url, error: errorMessage(error) });
    return `Error reading page: ${errorMessage(error)}`;
  }
}

/**
 * True when `text` is one of fetchPageText's failure strings.
 */
export function isPageFetchError(text: string): boolean {
  return text.startsWith("Failed to load page") || text.startsWith("Error reading page:");
}
