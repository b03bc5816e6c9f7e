import lexicon from "./lexicon.json";
import { LOGICAL_FIELDS } from "./contracts";
import type { AliasTable, LogicalField } from "./contracts";
import { ConfigError } from "./errors";

export type AnalyzerConfig = Readonly<{
  negativeRatingThreshold: number;
  negativeKeywords: ReadonlySet<string>;
  stopWords: ReadonlySet<string>;
  minTokenLength: number;
  hotspotTopN: number;
  /** Alias priority list per logical field, matched case-insensitively. */
  aliasTable: AliasTable;
}>;

export type AnalyzerConfigOverrides = {
  negativeRatingThreshold?: number;
  negativeKeywords?: Iterable<string>;
  stopWords?: Iterable<string>;
  minTokenLength?: number;
  hotspotTopN?: number;
  aliasTable?: Partial<AliasTable>;
};

export const DEFAULT_ALIAS_TABLE: AliasTable = Object.freeze({
  created_at: ["created_at", "date", "timestamp", "submitted_at", "created"],
  product: ["product", "category", "service", "queue", "team"],
  rating: ["rating", "score", "stars", "satisfaction"],
  review_text: ["review_text", "comment", "message", "body", "feedback", "text"],
});

export const DEFAULT_CONFIG: AnalyzerConfig = Object.freeze({
  negativeRatingThreshold: 3,
  negativeKeywords: new Set(lexicon.negativeKeywords),
  stopWords: new Set(lexicon.stopWords),
  minTokenLength: 3,
  hotspotTopN: 20,
  aliasTable: DEFAULT_ALIAS_TABLE,
});

const lowerSet = (words: Iterable<string>) =>
  new Set(Array.from(words, (w) => w.trim().toLowerCase()).filter((w) => w.length > 0));

function positiveInt(name: string, value: number) {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function aliasList(field: LogicalField, aliases: readonly string[] | undefined): readonly string[] {
  if (aliases === undefined) return DEFAULT_ALIAS_TABLE[field];
  const cleaned = aliases.map((a) => a.trim()).filter((a) => a.length > 0);
  if (!cleaned.length) throw new ConfigError(`aliasTable.${field} must name at least one column`);
  return Object.freeze(cleaned);
}

// Per field, so an explicit undefined keeps the default list.
function mergeAliasTable(overrides: Partial<AliasTable>): AliasTable {
  const table: Record<LogicalField, readonly string[]> = { ...DEFAULT_ALIAS_TABLE };
  for (const field of LOGICAL_FIELDS) {
    table[field] = aliasList(field, overrides[field]);
  }
  return Object.freeze(table);
}

export function resolveConfig(overrides: AnalyzerConfigOverrides = {}): AnalyzerConfig {
  const threshold = overrides.negativeRatingThreshold ?? DEFAULT_CONFIG.negativeRatingThreshold;
  if (!Number.isFinite(threshold)) {
    throw new ConfigError(`negativeRatingThreshold must be a finite number, got ${threshold}`);
  }

  const aliasTable = mergeAliasTable(overrides.aliasTable ?? {});

  return Object.freeze({
    negativeRatingThreshold: threshold,
    negativeKeywords: overrides.negativeKeywords
      ? lowerSet(overrides.negativeKeywords)
      : DEFAULT_CONFIG.negativeKeywords,
    stopWords: overrides.stopWords ? lowerSet(overrides.stopWords) : DEFAULT_CONFIG.stopWords,
    minTokenLength: positiveInt("minTokenLength", overrides.minTokenLength ?? DEFAULT_CONFIG.minTokenLength),
    hotspotTopN: positiveInt("hotspotTopN", overrides.hotspotTopN ?? DEFAULT_CONFIG.hotspotTopN),
    aliasTable,
  });
}

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be numeric, got "${raw}"`);
  }
  return value;
}

function envList(env: NodeJS.ProcessEnv, key: string): string[] | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  return raw.split(",");
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): AnalyzerConfig {
  return resolveConfig({
    negativeRatingThreshold: envNumber(env, "FEEDBACK_NEGATIVE_THRESHOLD"),
    negativeKeywords: envList(env, "FEEDBACK_NEGATIVE_KEYWORDS"),
    stopWords: envList(env, "FEEDBACK_STOP_WORDS"),
    minTokenLength: envNumber(env, "FEEDBACK_MIN_TOKEN_LENGTH"),
    hotspotTopN: envNumber(env, "FEEDBACK_HOTSPOT_TOP_N"),
  });
}
