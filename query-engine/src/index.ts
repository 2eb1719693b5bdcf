export * from "./types";
export * from "./errors";
export * from "./constants";
export { loadEnv, parseEnv, EnvSchema, type Env } from "./env";
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from "./logger";
export { createHttp } from "./http";
export { fetchPage, type FetchOptions, type PageResult } from "./crawl";
export { stripMarkup, extractTitle, splitSentences, summarize } from "./parse";
export { ANSWER_RULES, officeHolderRule, rulesFor, extractAnswer, type AnswerRule, type AnswerContext } from "./answers";
export {
  createSearchAdapter,
  createBingProvider,
  createDuckDuckGoProvider,
  type SearchAdapter,
  type SearchOutcome,
  type SearchProvider,
} from "./search";
export { createGoogleProvider } from "./googleSearch";
export { createWikipediaClient, createKnowledgeFallback, type EncyclopediaClient, type KnowledgeFallback } from "./wikipedia";
export { createResolver, aggregate, type Resolver, type ResolverDeps, type ResolverOptions } from "./resolve";
export { createResolverFromEnv, buildProviders } from "./factory";
export { toJson, toHtml, escapeHtml, type ResolutionJson } from "./render";
