import "dotenv/config";
import { z } from "zod";
import {
  BING_ENDPOINT,
  DEFAULT_MAX_RESULTS,
  DEFAULT_USER_AGENT,
  DUCKDUCKGO_URL,
  FETCH_TIMEOUT_MS,
  MAX_FETCH_RETRIES,
  MAX_RESULTS_CAP,
  RETRY_DELAY_MS,
  SUMMARY_SENTENCES,
  WIKI_API_URL,
} from "./constants";
import { ConfigError } from "./errors";

export const EnvSchema = z.object({
  USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(FETCH_TIMEOUT_MS),
  FETCH_RETRIES: z.coerce.number().int().min(0).max(MAX_FETCH_RETRIES).default(0),
  FETCH_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(RETRY_DELAY_MS),
  SEARCH_MAX_RESULTS: z.coerce.number().int().min(1).max(MAX_RESULTS_CAP).default(DEFAULT_MAX_RESULTS),
  SUMMARY_SENTENCES: z.coerce.number().int().positive().default(SUMMARY_SENTENCES),
  RESOLVE_MODE: z.enum(["fact-seeking", "summary-only"]).default("fact-seeking"),
  GOOGLE_API_KEY: z.string().optional(),
  GOOGLE_CX: z.string().optional(),
  BING_API_KEY: z.string().optional(),
  BING_ENDPOINT: z.string().url().default(BING_ENDPOINT),
  DUCKDUCKGO_URL: z.string().url().default(DUCKDUCKGO_URL),
  WIKI_API_URL: z.string().url().default(WIKI_API_URL),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type Env = z.infer<typeof EnvSchema>;

/** Empty values count as unset; `Google_CX` is tolerated as an alias. */
export function parseEnv<S extends z.ZodTypeAny>(schema: S, source: NodeJS.ProcessEnv = process.env): z.infer<S> {
  const input: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== "") input[key] = value.trim();
  }
  if (!input.GOOGLE_CX && input.Google_CX) input.GOOGLE_CX = input.Google_CX;

  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const { fieldErrors } = parsed.error.flatten();
    throw new ConfigError(
      Object.entries(fieldErrors).map(([key, messages]) => `${key}: ${(messages ?? []).join(", ")}`)
    );
  }
  return parsed.data;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return parseEnv(EnvSchema, source);
}
