import type { AxiosInstance } from "axios";
import { rulesFor, extractAnswer, ANSWER_RULES, type AnswerRule } from "./answers";
import { DEFAULT_MAX_RESULTS, FETCH_TIMEOUT_MS, SUMMARY_SENTENCES } from "./constants";
import { fetchPage } from "./crawl";
import { InvalidQueryError, describeError } from "./errors";
import type { Logger } from "./logger";
import { extractTitle, stripMarkup, summarize } from "./parse";
import { clampMaxResults, type SearchAdapter } from "./search";
import type { FetchedSource, Gathered, Resolution, ResolveMode } from "./types";
import type { KnowledgeFallback } from "./wikipedia";

export type ResolverDeps = {
  http: AxiosInstance;
  search: SearchAdapter;
  knowledge: KnowledgeFallback;
  logger: Logger;
};

export type ResolverOptions = {
  mode?: ResolveMode;
  maxResults?: number;
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
  summarySentences?: number;
  rules?: readonly AnswerRule[];
};

export interface Resolver {
  resolve(query: string): Promise<Resolution>;
  /** Everything collected for `query` before aggregation, sources included in fact mode. */
  gather(query: string): Promise<Gathered>;
}

/**
 * Holds at most one answer per resolution. `claim` is synchronous, so two
 * fetch tasks finishing back to back cannot both see it empty.
 */
export type AnswerLatch = {
  readonly answer: string | undefined;
  isSet(): boolean;
  claim(answer: string): boolean;
};

export function createAnswerLatch(): AnswerLatch {
  let answer: string | undefined;
  return {
    get answer() {
      return answer;
    },
    isSet: () => answer !== undefined,
    claim: (candidate) => {
      if (answer !== undefined) return false;
      answer = candidate;
      return true;
    },
  };
}

export function aggregate(query: string, { answer, sources }: Pick<Gathered, "answer" | "sources">): Resolution {
  if (answer) return { kind: "fact", query, answer };
  if (sources.length) return { kind: "summary", query, sources };
  return { kind: "not-found", query };
}

export function createResolver(deps: ResolverDeps, options: ResolverOptions = {}): Resolver {
  const { http, search, knowledge, logger } = deps;
  const {
    mode = "fact-seeking",
    maxResults = DEFAULT_MAX_RESULTS,
    timeoutMs = FETCH_TIMEOUT_MS,
    retries = 0,
    retryDelayMs,
    summarySentences = SUMMARY_SENTENCES,
    rules = ANSWER_RULES,
  } = options;

  // All tasks start together and are all awaited, even once the latch is set.
  async function fetchAll(query: string, urls: string[]): Promise<Gathered> {
    const latch = createAnswerLatch();
    const sources: FetchedSource[] = [];
    const triggered = mode === "fact-seeking" ? rulesFor(query, rules) : [];

    const settled = await Promise.allSettled(
      urls.map(async (url) => {
        const page = await fetchPage(http, url, { timeoutMs, retries, retryDelayMs });
        if (!page.ok) {
          logger.warn(`Could not fetch ${url}. Reason: ${page.failure.message}`);
          return;
        }

        const text = stripMarkup(page.body);
        if (triggered.length && !latch.isSet()) {
          const answer = extractAnswer(triggered, { query, text, url });
          if (answer && latch.claim(answer)) logger.info(`Precise answer from ${url}: ${answer}`);
        }

        sources.push(Object.freeze({ url, title: extractTitle(page.body), content: summarize(text, summarySentences) }));
      })
    );

    for (const s of settled) {
      if (s.status === "rejected") logger.error(`fetch task failed: ${describeError(s.reason)}`);
    }

    return { answer: latch.answer, sources, via: "search" };
  }

  async function gather(rawQuery: string): Promise<Gathered> {
    const query = rawQuery.trim();
    if (!query) throw new InvalidQueryError();

    logger.info(`Performing web search for: '${query}'`);
    const limit = clampMaxResults(maxResults);
    const outcome = await search.search(query, limit);

    if (outcome.kind === "results") {
      const urls = outcome.results.slice(0, limit).map((r) => r.url);
      logger.info(`Fetching content from: ${urls.join(", ")}`);
      return fetchAll(query, urls);
    }

    if (outcome.kind === "error") logger.warn(`search unavailable (${outcome.error.message}), using knowledge fallback`);
    else logger.info("No search results, using knowledge fallback");

    const source = await knowledge.lookup(query);
    return { sources: source ? [source] : [], via: "fallback" };
  }

  return {
    gather,
    async resolve(query) {
      const gathered = await gather(query);
      return aggregate(query.trim(), gathered);
    },
  };
}
