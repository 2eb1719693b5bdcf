import { describe, it, expect, vi } from "vitest";
import { ProviderError } from "../errors";
import { silentLogger } from "../logger";
import { cleanExtract, createKnowledgeFallback, createWikipediaClient, type EncyclopediaClient } from "../wikipedia";
import { fakeHttp, recordingLogger, type Route } from "./helpers";

const API = "https://en.wikipedia.org/w/api.php";

const wiki: Route = (config) => {
  const params = config.params;
  if (params.list === "search") {
    return params.srsearch === "golden retriever"
      ? { data: { query: { search: [{ title: "Golden Retriever", pageid: 21 }] } } }
      : { data: { query: { search: [] } } };
  }
  if (params.titles === "Golden Retriever") {
    return {
      data: {
        query: {
          pages: {
            "21": {
              pageid: 21,
              title: "Golden Retriever",
              extract: "The Golden Retriever (Scottish breed) is a dog. It is friendly.",
            },
          },
        },
      },
    };
  }
  return { data: { query: { pages: { "-1": { title: params.titles, missing: "" } } } } };
};

describe("createWikipediaClient", () => {
  it("searches for the best title", async () => {
    const { http, calls } = fakeHttp(wiki);
    const client = createWikipediaClient(http, API);

    await expect(client.searchTitle("golden retriever")).resolves.toBe("Golden Retriever");
    expect(calls[0].url).toBe(API);
    expect(calls[0].params).toEqual({ action: "query", format: "json", list: "search", srsearch: "golden retriever", srlimit: 1 });
    expect(calls[0].timeout).toBe(5_000);
  });

  it("returns undefined when nothing matches", async () => {
    const { http } = fakeHttp(wiki);
    await expect(createWikipediaClient(http, API).searchTitle("asdkjasdkj1234")).resolves.toBeUndefined();
  });

  it("fetches the plain-text intro of a page", async () => {
    const { http, calls } = fakeHttp(wiki);
    const extract = await createWikipediaClient(http, API).fetchExtract("Golden Retriever");

    expect(extract).toBe("The Golden Retriever (Scottish breed) is a dog. It is friendly.");
    expect(calls[0].params).toMatchObject({ prop: "extracts", explaintext: 1, exintro: 1, titles: "Golden Retriever" });
  });

  it("treats missing pages as no extract", async () => {
    const { http } = fakeHttp(wiki);
    await expect(createWikipediaClient(http, API).fetchExtract("Nope")).resolves.toBeUndefined();
  });

  it("raises ProviderError on transport failures and odd payloads", async () => {
    const down = fakeHttp(() => ({ error: "network" }));
    await expect(createWikipediaClient(down.http, API).searchTitle("q")).rejects.toBeInstanceOf(ProviderError);

    const odd = fakeHttp(() => ({ data: { query: { search: "nope" } } }));
    await expect(createWikipediaClient(odd.http, API).searchTitle("q")).rejects.toThrow("wikipedia: unexpected response shape");
  });

  it("builds article URLs on the API's host", () => {
    const { http } = fakeHttp(wiki);
    expect(createWikipediaClient(http, API).pageUrl("Golden Retriever")).toBe("https://en.wikipedia.org/wiki/Golden_Retriever");
  });
});

describe("cleanExtract", () => {
  it("removes nested parentheses and tidies punctuation", () => {
    expect(cleanExtract("Narendra Modi (born 17 September 1950 (age 74)) is an Indian politician .")).toBe(
      "Narendra Modi is an Indian politician."
    );
  });
});

describe("createKnowledgeFallback", () => {
  it("synthesizes one source from the encyclopedia", async () => {
    const { http, calls } = fakeHttp(wiki);
    const fallback = createKnowledgeFallback(createWikipediaClient(http, API), { logger: silentLogger });

    const source = await fallback.lookup("golden retriever");

    expect(source).toEqual({
      url: "https://en.wikipedia.org/wiki/Golden_Retriever",
      title: "Golden Retriever",
      content: "The Golden Retriever is a dog. It is friendly.",
    });
    expect(Object.isFrozen(source)).toBe(true);
    expect(calls).toHaveLength(2);
  });

  it("stops after the title search when there is no hit", async () => {
    const { http, calls } = fakeHttp(wiki);
    const fallback = createKnowledgeFallback(createWikipediaClient(http, API), { logger: silentLogger });

    await expect(fallback.lookup("asdkjasdkj1234")).resolves.toBeUndefined();
    expect(calls).toHaveLength(1);
  });

  it("summarizes long extracts", async () => {
    const client: EncyclopediaClient = {
      searchTitle: vi.fn(async () => "Topic"),
      fetchExtract: vi.fn(async () => "Alpha. Beta. Gamma. Delta."),
      pageUrl: (title) => `https://wiki.test/${title}`,
    };
    const fallback = createKnowledgeFallback(client, { logger: silentLogger, summarySentences: 2 });

    await expect(fallback.lookup("topic")).resolves.toEqual({ url: "https://wiki.test/Topic", title: "Topic", content: "Alpha. Beta. …" });
  });

  it("logs provider failures and yields nothing", async () => {
    const logger = recordingLogger();
    const { http } = fakeHttp(() => ({ error: "network" }));
    const fallback = createKnowledgeFallback(createWikipediaClient(http, API), { logger });

    await expect(fallback.lookup("golden retriever")).resolves.toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith("knowledge fallback failed: wikipedia: connect ECONNREFUSED 127.0.0.1:443");
  });

  it("does not hide unexpected errors", async () => {
    const client: EncyclopediaClient = {
      searchTitle: vi.fn(async () => {
        throw new RangeError("bug");
      }),
      fetchExtract: vi.fn(async () => undefined),
      pageUrl: (title) => title,
    };
    await expect(createKnowledgeFallback(client, { logger: silentLogger }).lookup("q")).rejects.toThrow(RangeError);
  });
});
