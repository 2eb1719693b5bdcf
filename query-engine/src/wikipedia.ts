import type { AxiosInstance } from "axios";
import { z } from "zod";
import { SUMMARY_SENTENCES, WIKI_API_URL, WIKI_TIMEOUT_MS } from "./constants";
import { ProviderError, describeError } from "./errors";
import { statusOf } from "./http";
import type { Logger } from "./logger";
import { summarize } from "./parse";
import type { FetchedSource } from "./types";
import { collapseWhitespace } from "./utils";

export interface EncyclopediaClient {
  searchTitle(query: string): Promise<string | undefined>;
  fetchExtract(title: string): Promise<string | undefined>;
  pageUrl(title: string): string;
}

const SearchResponse = z.object({
  query: z.object({ search: z.array(z.object({ title: z.string() })) }).optional(),
});

const ExtractResponse = z.object({
  query: z
    .object({
      pages: z.record(z.object({ title: z.string().optional(), extract: z.string().optional(), missing: z.unknown().optional() })),
    })
    .optional(),
});

export function createWikipediaClient(http: AxiosInstance, apiUrl = WIKI_API_URL): EncyclopediaClient {
  async function call<S extends z.ZodTypeAny>(params: Record<string, string | number>, schema: S): Promise<z.infer<S>> {
    let data: unknown;
    try {
      ({ data } = await http.get<unknown>(apiUrl, {
        params: { action: "query", format: "json", ...params },
        timeout: WIKI_TIMEOUT_MS,
      }));
    } catch (err) {
      throw new ProviderError("wikipedia", describeError(err), { status: statusOf(err), cause: err });
    }
    const parsed = schema.safeParse(data);
    if (!parsed.success) throw new ProviderError("wikipedia", "unexpected response shape");
    return parsed.data;
  }

  return {
    async searchTitle(query) {
      const data = await call({ list: "search", srsearch: query, srlimit: 1 }, SearchResponse);
      return data.query?.search[0]?.title;
    },

    async fetchExtract(title) {
      const data = await call(
        { prop: "extracts", explaintext: 1, exintro: 1, titles: title },
        ExtractResponse
      );
      const page = Object.values(data.query?.pages ?? {})[0];
      if (!page || page.missing !== undefined) return undefined;
      return page.extract || undefined;
    },

    pageUrl(title) {
      return `${new URL(apiUrl).origin}/wiki/${encodeURIComponent(title.replace(/ /g, "_"))}`;
    },
  };
}

/** Drops parenthesised asides, nested ones included. */
export function cleanExtract(extract: string): string {
  let text = extract;
  let previous: string;
  do {
    previous = text;
    text = text.replace(/\([^()]*\)/g, "");
  } while (text !== previous);
  return collapseWhitespace(text).replace(/\s+([,.;:])/g, "$1");
}

export interface KnowledgeFallback {
  lookup(query: string): Promise<FetchedSource | undefined>;
}

export function createKnowledgeFallback(
  client: EncyclopediaClient,
  { logger, summarySentences = SUMMARY_SENTENCES }: { logger: Logger; summarySentences?: number }
): KnowledgeFallback {
  return {
    async lookup(query) {
      try {
        const title = await client.searchTitle(query);
        if (!title) return undefined;

        const extract = await client.fetchExtract(title);
        const content = extract ? summarize(cleanExtract(extract), summarySentences) : "";
        if (!content) return undefined;

        return Object.freeze({ url: client.pageUrl(title), title, content });
      } catch (err) {
        if (!(err instanceof ProviderError)) throw err;
        logger.warn(`knowledge fallback failed: ${err.message}`);
        return undefined;
      }
    },
  };
}
