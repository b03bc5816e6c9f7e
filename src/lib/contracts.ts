// Canonical schema definitions for uploaded feedback data.
export type LogicalField = "created_at" | "product" | "rating" | "review_text";

export const LOGICAL_FIELDS: readonly LogicalField[] = ["created_at", "product", "rating", "review_text"];

export const UNKNOWN_PRODUCT = "Unknown";

export type RawValue = string | number | bigint | boolean | null | undefined;

export type RawRow = Readonly<Record<string, RawValue>>;

export type RawDataset = {
  columns: string[];
  rows: RawRow[];
};

// Input column per logical field; null when no alias matched.
export type FieldMapping = Readonly<Record<LogicalField, string | null>>;

export type AliasTable = Readonly<Record<LogicalField, readonly string[]>>;

export type ColumnMatch = {
  field: LogicalField;
  column: string;
  alias: string;
};

export type SchemaResolutionWarning = {
  kind: "schema";
  field: LogicalField;
  message: string;
};

export type RowParseWarning = {
  kind: "row";
  row_index: number;
  field: "created_at" | "rating";
  value: string;
  message: string;
};

export type LoadWarning = SchemaResolutionWarning | RowParseWarning;

export type CanonicalRecord = Readonly<{
  row_index: number;
  created_at_raw: string;
  created_at_date: string | null; // YYYY-MM-DD
  month: string | null; // YYYY-MM
  product: string;
  rating: number | null;
  review_text: string;
  is_negative: boolean;
}>;

export type FilterSpec = Readonly<{
  products: ReadonlySet<string>;
  date_from: string | null;
  date_to: string | null;
}>;

export type KpiResult = {
  total_tickets: number;
  avg_rating: number | null;
};

export type TrendRow = { month: string; volume: number; avg_rating: number | null };
export type SegmentRow = { product: string; tickets: number; avg_rating: number | null };
export type KeywordRow = { keyword: string; count: number; avg_rating: number | null };

export type NegativeSort = "recent" | "lowest_rating" | "highest_rating" | "longest_comment";

export const NEGATIVE_SORTS: readonly NegativeSort[] = ["recent", "lowest_rating", "highest_rating", "longest_comment"];

export type NegativeInsightOptions = {
  sort?: NegativeSort;
  search?: string;
};

export type NegativeInsights = {
  records: CanonicalRecord[];
  keywords: KeywordRow[];
};

export type DatasetProfile = {
  row_count: number;
  products: string[];
  min_date: string | null;
  max_date: string | null;
  undated_rows: number;
  unrated_rows: number;
  negative_rows: number;
};

export type BuiltQuery = {
  sql: string;
  params: string[];
};
