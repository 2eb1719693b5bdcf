import { describe, it, expect } from "vitest";
import { loadEnv } from "../env";
import { ConfigError } from "../errors";

describe("loadEnv", () => {
  it("fills in defaults", () => {
    const env = loadEnv({});
    expect(env).toMatchObject({
      FETCH_TIMEOUT_MS: 10_000,
      FETCH_RETRIES: 0,
      SEARCH_MAX_RESULTS: 3,
      SUMMARY_SENTENCES: 5,
      RESOLVE_MODE: "fact-seeking",
      WIKI_API_URL: "https://en.wikipedia.org/w/api.php",
      LOG_LEVEL: "info",
    });
    expect(env.GOOGLE_API_KEY).toBeUndefined();
    expect(env.USER_AGENT).toMatch(/^Mozilla\/5\.0/);
  });

  it("coerces numbers and ignores blank values", () => {
    const env = loadEnv({ FETCH_TIMEOUT_MS: "2500", SEARCH_MAX_RESULTS: " 5 ", BING_API_KEY: "", RESOLVE_MODE: "summary-only" });
    expect(env.FETCH_TIMEOUT_MS).toBe(2500);
    expect(env.SEARCH_MAX_RESULTS).toBe(5);
    expect(env.BING_API_KEY).toBeUndefined();
    expect(env.RESOLVE_MODE).toBe("summary-only");
  });

  it("accepts Google_CX as an alias", () => {
    expect(loadEnv({ GOOGLE_API_KEY: "test-key", Google_CX: "test-cx" }).GOOGLE_CX).toBe("test-cx");
  });

  it("lists every invalid key", () => {
    let caught: unknown;
    try {
      loadEnv({ SEARCH_MAX_RESULTS: "9", RESOLVE_MODE: "fast", FETCH_RETRIES: "-1" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const keys = caught instanceof ConfigError ? caught.issues.map((i) => i.split(":")[0]).sort() : [];
    expect(keys).toEqual(["FETCH_RETRIES", "RESOLVE_MODE", "SEARCH_MAX_RESULTS"]);
  });
});
