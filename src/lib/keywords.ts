import type { CanonicalRecord, KeywordRow } from "./contracts";
import { DEFAULT_CONFIG } from "./config";
import type { AnalyzerConfig } from "./config";

type TokenConfig = Pick<AnalyzerConfig, "stopWords" | "minTokenLength">;

const WORD_RE = /[\p{L}\p{N}]+/gu;

const round2 = (n: number) => Math.round(n * 100) / 100;

export function tokenize(text: string, config: TokenConfig = DEFAULT_CONFIG): string[] {
  const words = text.toLowerCase().match(WORD_RE) ?? [];
  return words.filter((w) => w.length >= config.minTokenLength && !config.stopWords.has(w));
}

/**
 * A rated row is negative when its rating is at or below the threshold. An
 * unrated row is negative when its comment contains a negative keyword.
 */
export function isNegativeFeedback(
  rating: number | null,
  reviewText: string,
  config: Pick<AnalyzerConfig, "negativeRatingThreshold" | "negativeKeywords"> = DEFAULT_CONFIG,
): boolean {
  if (rating !== null) {
    return rating <= config.negativeRatingThreshold;
  }
  const words = reviewText.toLowerCase().match(WORD_RE) ?? [];
  return words.some((w) => config.negativeKeywords.has(w));
}

type KeywordStats = { count: number; ratingSum: number; rated: number };

/**
 * Ranks keywords across the given (negative) records. `count` is every
 * occurrence; `avg_rating` is over the distinct rated records mentioning it.
 */
export function extractHotspots(
  records: readonly Pick<CanonicalRecord, "rating" | "review_text">[],
  config: TokenConfig & Pick<AnalyzerConfig, "hotspotTopN"> = DEFAULT_CONFIG,
): KeywordRow[] {
  const stats = new Map<string, KeywordStats>();

  for (const record of records) {
    const tokens = tokenize(record.review_text, config);
    for (const token of tokens) {
      const entry = stats.get(token) ?? { count: 0, ratingSum: 0, rated: 0 };
      entry.count += 1;
      stats.set(token, entry);
    }
    if (record.rating === null) continue;
    for (const token of new Set(tokens)) {
      const entry = stats.get(token);
      if (entry) {
        entry.ratingSum += record.rating;
        entry.rated += 1;
      }
    }
  }

  return Array.from(stats, ([keyword, s]) => ({
    keyword,
    count: s.count,
    avg_rating: s.rated > 0 ? round2(s.ratingSum / s.rated) : null,
  }))
    .sort((a, b) => b.count - a.count || (a.keyword < b.keyword ? -1 : a.keyword > b.keyword ? 1 : 0))
    .slice(0, config.hotspotTopN);
}
