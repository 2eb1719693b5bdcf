import { google } from "googleapis";
import { ProviderError, describeError } from "./errors";
import type { SearchProvider } from "./search";
import type { SearchResult } from "./types";

const PER_PAGE = 10; // Google caps at 10

export function createGoogleProvider(key: string, cx: string): SearchProvider {
  const customsearch = google.customsearch("v1");

  return {
    source: "google",
    async textSearch(q, limit) {
      try {
        const res = await customsearch.cse.list({ q, cx, key, num: Math.min(limit, PER_PAGE), start: 1 });
        const items = res.data.items ?? [];
        return items
          .filter((i) => Boolean(i.link))
          .map<SearchResult>((i) => ({
            title: i.title ?? "",
            url: i.link ?? "",
            snippet: i.snippet ?? undefined,
            source: "google",
          }));
      } catch (err) {
        throw new ProviderError("google", describeError(err), { cause: err });
      }
    },
  };
}
