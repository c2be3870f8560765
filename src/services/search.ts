/**
 * Web Search Providers
 *
 * Providers return ordered `{ title, url, snippet }` lists and throw on any
 * failure. FallbackSearch tries them in order: provider k+1 is called only
 * when provider k throws, and an empty list is returned when all of them do.
 */

import { z } from "zod";

import { errorMessage, log, logWarn } from "../utils/logger.ts";
import { ExternalServiceError } from "./errors.ts";

// ============================================================================
// TYPES
// ============================================================================

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
}

export interface SearchProvider {
  readonly name: string;
  search(query: string, maxResults: number): Promise<SearchResult[]>;
}

export interface HttpProviderOptions {
  fetch?: typeof fetch;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 10_000;

const BROWSER_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

async function getJson(
  service: string,
  fetchImpl: typeof fetch,
  url: URL,
  init: RequestInit,
  timeoutMs: number,
): Promise<unknown> {
  const response = await fetchImpl(url.toString(), {
    ...init,
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (!response.ok) {
    throw new ExternalServiceError(service, `HTTP ${response.status}`);
  }
  return response.json();
}

// ============================================================================
// BRAVE
// ============================================================================

const BraveResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().default(""),
            url: z.string().default(""),
            description: z.string().default(""),
          }),
        )
        .default([]),
    })
    .optional(),
});

export class BraveSearchProvider implements SearchProvider {
  readonly name = "brave";
  static readonly ENDPOINT = "https://api.search.brave.com/res/v1/web/search";

  constructor(
    private readonly apiKey: string | undefined,
    private readonly options: HttpProviderOptions = {},
  ) {}

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    if (!this.apiKey) {
      throw new ExternalServiceError(this.name, "Brave API key not provided");
    }
    const url = new URL(BraveSearchProvider.ENDPOINT);
    url.searchParams.set("q", query);
    url.searchParams.set("count", String(maxResults));

    const data = BraveResponseSchema.parse(
      await getJson(
        this.name,
        this.options.fetch ?? fetch,
        url,
        {
          headers: {
            Accept: "application/json",
            "X-Subscription-Token": this.apiKey,
          },
        },
        this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      ),
    );

    return (data.web?.results ?? []).map((item) => ({
      title: item.title,
      url: item.url,
      snippet: item.description,
    }));
  }
}

// ============================================================================
// GOOGLE CUSTOM SEARCH
// ============================================================================

const GoogleResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().default(""),
        link: z.string().default(""),
        snippet: z.string().default(""),
      }),
    )
    .default([]),
});

/** Google Custom Search returns at most this many results per request */
const GOOGLE_MAX_RESULTS = 10;

export class GoogleSearchProvider implements SearchProvider {
  readonly name = "google";
  static readonly ENDPOINT = "https://www.googleapis.com/customsearch/v1";

  constructor(
    private readonly apiKey: string | undefined,
    private readonly cseId: string | undefined,
    private readonly options: HttpProviderOptions = {},
  ) {}

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    if (!this.apiKey || !this.cseId) {
      throw new ExternalServiceError(this.name, "Google API key or CSE ID not provided");
    }
    const url = new URL(GoogleSearchProvider.ENDPOINT);
    url.searchParams.set("q", query);
    url.searchParams.set("key", this.apiKey);
    url.searchParams.set("cx", this.cseId);
    url.searchParams.set("num", String(Math.min(maxResults, GOOGLE_MAX_RESULTS)));

    const data = GoogleResponseSchema.parse(
      await getJson(
        this.name,
        this.options.fetch ?? fetch,
        url,
        {},
        this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      ),
    );

    return data.items.map((item) => ({ title: item.title, url: item.link, snippet: item.snippet }));
  }
}

// ============================================================================
// DUCKDUCKGO (HTML endpoint)
// ============================================================================

const RESULT_LINK = /<a[^>]*class="[^"]*result__a[^"]*"[^>]*href="([^"]*)"[^>]*>([\s\S]*?)<\/a>/g;
const RESULT_SNIPPET = /<a[^>]*class="[^"]*result__snippet[^"]*"[^>]*>([\s\S]*?)<\/a>/g;

function textOf(html: string): string {
  return decodeEntities(html.replace(/<[^>]+>/g, "")).replace(/\s+/g, " ").trim();
}

/**
 * Resolve DuckDuckGo's redirect links (`//duckduckgo.com/l/?uddg=...`).
 */
function resolveResultUrl(href: string): string {
  const decoded = decodeEntities(href);
  try {
    const url = new URL(decoded, "https://duckduckgo.com");
    return url.searchParams.get("uddg") ?? url.toString();
  } catch {
    return decoded;
  }
}

const MAX_CODE_POINT = 0x10ffff;

/** Out-of-range numeric entities stay as written */
function fromCodePoint(code: number, entity: string): string {
  return code <= MAX_CODE_POINT ? String.fromCodePoint(code) : entity;
}

/**
 * Decode the HTML entities that commonly appear in page text.
 */
export function decodeEntities(text: string): string {
  return text
    .replace(/&#(\d+);/g, (entity: string, code: string) => fromCodePoint(Number(code), entity))
    .replace(/&#x([0-9a-f]+);/gi, (entity: string, code: string) => fromCodePoint(parseInt(code, 16), entity))
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&apos;/g, "'")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&nbsp;/g, " ")
    .replace(/&amp;/g, "&");
}

export function parseDuckDuckGoHtml(html: string, maxResults: number): SearchResult[] {
  const links = [...html.matchAll(RESULT_LINK)];
  const snippets = [...html.matchAll(RESULT_SNIPPET)];

  return links.slice(0, maxResults).map((link, index) => ({
    title: textOf(link[2] ?? ""),
    url: resolveResultUrl(link[1] ?? ""),
    snippet: textOf(snippets[index]?.[1] ?? ""),
  }));
}

export class DuckDuckGoSearchProvider implements SearchProvider {
  readonly name = "duckduckgo";
  static readonly ENDPOINT = "https://html.duckduckgo.com/html/";

  constructor(private readonly options: HttpProviderOptions = {}) {}

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    const url = new URL(DuckDuckGoSearchProvider.ENDPOINT);
    url.searchParams.set("q", query);

    const fetchImpl = this.options.fetch ?? fetch;
    const response = await fetchImpl(url.toString(), {
      headers: { "User-Agent": BROWSER_USER_AGENT },
      signal: AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
    if (!response.ok) {
      throw new ExternalServiceError(this.name, `HTTP ${response.status}`);
    }
    return parseDuckDuckGoHtml(await response.text(), maxResults);
  }
}

// ============================================================================
// FALLBACK CHAIN
// ============================================================================

/**
 * Tries each provider in order until one returns without throwing.
 *
 * @example
 * ```typescript
 * const search = new FallbackSearch([
 *   new BraveSearchProvider(config.search.braveApiKey),
 *   new GoogleSearchProvider(config.search.googleApiKey, config.search.googleCseId),
 *   new DuckDuckGoSearchProvider(),
 * ]);
 * const results = await search.search("tidal energy storage", 5);
 * ```
 */
export class FallbackSearch implements SearchProvider {
  readonly name = "fallback";

  constructor(private readonly providers: readonly SearchProvider[]) {}

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    for (const provider of this.providers) {
      try {
        const results = await provider.search(query, maxResults);
        log("Search", "provider_succeeded", { provider: provider.name, query, count: results.length });
        return results;
      } catch (error) {
        logWarn("Search", "provider_failed", { provider: provider.name, query, error: errorMessage(error) });
      }
    }
    logWarn("Search", "all_providers_failed", { query });
    return [];
  }
}

/**
 * The default chain: Brave, then Google, then DuckDuckGo.
 */
export function createDefaultSearch(keys: {
  braveApiKey?: string;
  googleApiKey?: string;
  googleCseId?: string;
  timeoutMs?: number;
}): FallbackSearch {
  const options: HttpProviderOptions = { timeoutMs: keys.timeoutMs };
  return new FallbackSearch([
    new BraveSearchProvider(keys.braveApiKey, options),
    new GoogleSearchProvider(keys.googleApiKey, keys.googleCseId, options),
    new DuckDuckGoSearchProvider(options),
  ]);
}

/**
 * Render results as a numbered plain-text block for prompts.
 */
export function formatSearchResults(results: readonly SearchResult[]): string {
  if (results.length === 0) {
    return "No results found.";
  }
  return results
    .map((result, index) => `[${index + 1}] ${result.title}\nURL: ${result.url}\n${result.snippet}`)
    .join("\n\n");
}
