import type { AxiosInstance } from "axios";
import type { Env } from "./env";
import { createGoogleProvider } from "./googleSearch";
import { createHttp } from "./http";
import { createConsoleLogger, type Logger } from "./logger";
import { createResolver, type Resolver } from "./resolve";
import { createBingProvider, createDuckDuckGoProvider, createSearchAdapter, type SearchProvider } from "./search";
import { createKnowledgeFallback, createWikipediaClient } from "./wikipedia";

/** Google when keyed, then Bing when keyed, then DuckDuckGo which needs no key. */
export function buildProviders(env: Env, http: AxiosInstance): SearchProvider[] {
  const providers: SearchProvider[] = [];
  if (env.GOOGLE_API_KEY && env.GOOGLE_CX) providers.push(createGoogleProvider(env.GOOGLE_API_KEY, env.GOOGLE_CX));
  if (env.BING_API_KEY) providers.push(createBingProvider(http, env.BING_API_KEY, env.BING_ENDPOINT));
  providers.push(createDuckDuckGoProvider(http, env.DUCKDUCKGO_URL));
  return providers;
}

export function createResolverFromEnv(env: Env, logger: Logger = createConsoleLogger(env.LOG_LEVEL)): Resolver {
  const http = createHttp({ userAgent: env.USER_AGENT, timeoutMs: env.FETCH_TIMEOUT_MS });
  const providers = buildProviders(env, http);
  logger.debug(`search providers: ${providers.map((p) => p.source).join(" -> ")}`);

  return createResolver(
    {
      http,
      search: createSearchAdapter(providers, logger),
      knowledge: createKnowledgeFallback(createWikipediaClient(http, env.WIKI_API_URL), {
        logger,
        summarySentences: env.SUMMARY_SENTENCES,
      }),
      logger,
    },
    {
      mode: env.RESOLVE_MODE,
      maxResults: env.SEARCH_MAX_RESULTS,
      timeoutMs: env.FETCH_TIMEOUT_MS,
      retries: env.FETCH_RETRIES,
      retryDelayMs: env.FETCH_RETRY_DELAY_MS,
      summarySentences: env.SUMMARY_SENTENCES,
    }
  );
}
