import type { AxiosInstance } from "axios";
import { load } from "cheerio";
import { z } from "zod";
import { BING_ENDPOINT, DEFAULT_MAX_RESULTS, DUCKDUCKGO_URL, MAX_RESULTS_CAP } from "./constants";
import { ProviderError, describeError } from "./errors";
import { statusOf } from "./http";
import type { Logger } from "./logger";
import type { SearchResult, SearchSource } from "./types";
import { isHttpUrl } from "./utils";

/** Returns ranked candidates only; never fetches the pages. Throws `ProviderError`. */
export interface SearchProvider {
  source: SearchSource;
  textSearch(query: string, limit: number): Promise<SearchResult[]>;
}

export type SearchOutcome =
  | { kind: "results"; results: SearchResult[] }
  | { kind: "empty" }
  | { kind: "error"; error: ProviderError };

export interface SearchAdapter {
  search(query: string, maxResults?: number): Promise<SearchOutcome>;
}

function toProviderError(source: SearchSource, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  return new ProviderError(source, describeError(err), { status: statusOf(err), cause: err });
}

const BingResponse = z.object({
  webPages: z
    .object({
      value: z.array(z.object({ name: z.string(), url: z.string(), snippet: z.string().optional() })),
    })
    .optional(),
});

export function createBingProvider(http: AxiosInstance, key: string, endpoint = BING_ENDPOINT): SearchProvider {
  return {
    source: "bing",
    async textSearch(q, limit) {
      let data: unknown;
      try {
        ({ data } = await http.get<unknown>(endpoint, {
          params: { q, count: limit, offset: 0, mkt: "en-US" },
          headers: { "Ocp-Apim-Subscription-Key": key },
        }));
      } catch (err) {
        throw toProviderError("bing", err);
      }

      const parsed = BingResponse.safeParse(data);
      if (!parsed.success) throw new ProviderError("bing", "unexpected response shape");

      return (parsed.data.webPages?.value ?? []).map((v) => ({
        title: v.name,
        url: v.url,
        snippet: v.snippet,
        source: "bing" as const,
      }));
    },
  };
}

/** Result links point at a `/l/?uddg=<target>` redirect; ad links point back at duckduckgo.com. */
export function unwrapDuckDuckGoHref(href: string): string | undefined {
  let parsed: URL;
  try {
    parsed = new URL(href.startsWith("//") ? `https:${href}` : href, "https://duckduckgo.com");
  } catch {
    return undefined;
  }
  const target = parsed.searchParams.get("uddg");
  if (target) return target;
  return parsed.hostname.endsWith("duckduckgo.com") ? undefined : parsed.toString();
}

export function createDuckDuckGoProvider(http: AxiosInstance, endpoint = DUCKDUCKGO_URL): SearchProvider {
  return {
    source: "duckduckgo",
    async textSearch(q, limit) {
      let html: unknown;
      try {
        ({ data: html } = await http.get<unknown>(endpoint, { params: { q }, responseType: "text" }));
      } catch (err) {
        throw toProviderError("duckduckgo", err);
      }
      if (typeof html !== "string") throw new ProviderError("duckduckgo", "response body is not text");

      const $ = load(html);
      const results: SearchResult[] = [];

      $(".result:not(.result--ad) a.result__a").each((_, a) => {
        const href = $(a).attr("href");
        const title = $(a).text().trim();
        const url = href ? unwrapDuckDuckGoHref(href) : undefined;
        if (url && title) {
          const snippet = $(a).closest(".result").find(".result__snippet").first().text().trim();
          results.push({ title, url, snippet: snippet || undefined, source: "duckduckgo" });
        }
      });

      return results.slice(0, limit);
    },
  };
}

export function clampMaxResults(n: number): number {
  if (!Number.isFinite(n)) return DEFAULT_MAX_RESULTS;
  return Math.min(Math.max(Math.trunc(n), 1), MAX_RESULTS_CAP);
}

/**
 * Tries providers in order; the first non-empty list wins. Provider failures
 * are reported through the outcome, never thrown.
 */
export function createSearchAdapter(providers: SearchProvider[], logger: Logger): SearchAdapter {
  return {
    async search(query, maxResults = DEFAULT_MAX_RESULTS) {
      const limit = clampMaxResults(maxResults);
      let lastError: ProviderError | undefined;

      for (const provider of providers) {
        let found: SearchResult[];
        try {
          found = await provider.textSearch(query, limit);
        } catch (err) {
          if (!(err instanceof ProviderError)) throw err;
          logger.warn(`search provider failed: ${err.message}`);
          lastError = err;
          continue;
        }

        const results = Array.from(
          new Map(found.filter((r) => isHttpUrl(r.url)).map((r) => [r.url, r])).values()
        ).slice(0, limit);

        if (results.length) {
          logger.debug(`${provider.source} returned ${results.length} result(s)`);
          return { kind: "results", results };
        }
      }

      return lastError ? { kind: "error", error: lastError } : { kind: "empty" };
    },
  };
}
