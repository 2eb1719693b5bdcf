import { describe, it, expect } from "vitest";
import { parseArgs, UsageError } from "../args";

describe("parseArgs", () => {
  it("joins the remaining words into the query", () => {
    expect(parseArgs(["prime", "minister", "of", "india"])).toEqual({
      query: "prime minister of india",
      format: "json",
      mode: undefined,
    });
  });

  it("reads --format and --mode wherever they appear", () => {
    expect(parseArgs(["golden", "--format", "HTML", "retriever", "--mode", "summary-only"])).toEqual({
      query: "golden retriever",
      format: "html",
      mode: "summary-only",
    });
  });

  it("returns an empty query when only flags are given", () => {
    expect(parseArgs(["--format", "json"]).query).toBe("");
  });

  it("rejects unknown values", () => {
    expect(() => parseArgs(["--format", "xml", "q"])).toThrow(UsageError);
    expect(() => parseArgs(["--format"])).toThrow(UsageError);
    expect(() => parseArgs(["--mode", "fast", "q"])).toThrow(UsageError);
  });
});
