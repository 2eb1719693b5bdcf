export type SearchSource = "google" | "bing" | "duckduckgo";

export type SearchResult = {
  title: string;
  url: string;
  snippet?: string;
  source: SearchSource;
};

export type FetchedSource = {
  readonly url: string;
  readonly title?: string;
  readonly content: string; // cleaned + summarized, never markup
};

export type ResolveMode = "fact-seeking" | "summary-only";

export type Resolution =
  | { kind: "fact"; query: string; answer: string }
  | { kind: "summary"; query: string; sources: FetchedSource[] }
  | { kind: "not-found"; query: string };

export type Gathered = {
  answer?: string;
  sources: FetchedSource[];
  via: "search" | "fallback";
};
