import { describe, expect, it } from "vitest";
import { DEFAULT_ALIAS_TABLE, DEFAULT_CONFIG, configFromEnv, resolveConfig } from "./config";
import { ConfigError } from "./errors";
import { resolveSchema } from "./schema";

describe("resolveConfig", () => {
  it("returns the documented defaults", () => {
    const config = resolveConfig();
    expect(config.negativeRatingThreshold).toBe(3);
    expect(config.minTokenLength).toBe(3);
    expect(config.hotspotTopN).toBe(20);
    expect(config.aliasTable).toEqual(DEFAULT_ALIAS_TABLE);
    for (const word of ["broken", "slow", "refund", "complaint", "unhappy"]) {
      expect(config.negativeKeywords.has(word)).toBe(true);
    }
    expect(config.stopWords.has("the")).toBe(true);
  });

  it("lower-cases and trims word lists", () => {
    const config = resolveConfig({ negativeKeywords: [" Late ", "LOST", ""], stopWords: ["Please"] });
    expect(Array.from(config.negativeKeywords)).toEqual(["late", "lost"]);
    expect(Array.from(config.stopWords)).toEqual(["please"]);
  });

  it("merges a partial alias table", () => {
    const config = resolveConfig({ aliasTable: { product: ["department"] } });
    expect(config.aliasTable.product).toEqual(["department"]);
    expect(config.aliasTable.rating).toEqual(DEFAULT_ALIAS_TABLE.rating);
  });

  it("keeps the default list for an alias field passed as undefined", () => {
    const config = resolveConfig({ aliasTable: { product: undefined, rating: [" Grade "] } });
    expect(config.aliasTable.product).toEqual(DEFAULT_ALIAS_TABLE.product);
    expect(config.aliasTable.rating).toEqual(["Grade"]);
    expect(resolveSchema(["date", "Queue", "grade"], config.aliasTable).mapping).toEqual({
      created_at: "date",
      product: "Queue",
      rating: "grade",
      review_text: null,
    });
  });

  it("rejects an alias list with no names", () => {
    expect(() => resolveConfig({ aliasTable: { review_text: [" "] } })).toThrow(
      "aliasTable.review_text must name at least one column",
    );
  });

  it("rejects invalid numbers", () => {
    expect(() => resolveConfig({ minTokenLength: 0 })).toThrow(ConfigError);
    expect(() => resolveConfig({ hotspotTopN: 2.5 })).toThrow("hotspotTopN must be a positive integer, got 2.5");
    expect(() => resolveConfig({ negativeRatingThreshold: Number.NaN })).toThrow(ConfigError);
  });
});

describe("configFromEnv", () => {
  it("reads FEEDBACK_* variables", () => {
    const config = configFromEnv({
      FEEDBACK_NEGATIVE_THRESHOLD: "2",
      FEEDBACK_NEGATIVE_KEYWORDS: "Late, Lost",
      FEEDBACK_HOTSPOT_TOP_N: "5",
      FEEDBACK_MIN_TOKEN_LENGTH: "",
    });
    expect(config.negativeRatingThreshold).toBe(2);
    expect(Array.from(config.negativeKeywords)).toEqual(["late", "lost"]);
    expect(config.hotspotTopN).toBe(5);
    expect(config.minTokenLength).toBe(3);
    expect(config.stopWords).toBe(DEFAULT_CONFIG.stopWords);
  });

  it("rejects non-numeric values", () => {
    expect(() => configFromEnv({ FEEDBACK_NEGATIVE_THRESHOLD: "low" })).toThrow(
      'FEEDBACK_NEGATIVE_THRESHOLD must be numeric, got "low"',
    );
  });
});
