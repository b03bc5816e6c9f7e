import type {
  BuiltQuery,
  CanonicalRecord,
  DatasetProfile,
  FilterSpec,
  KpiResult,
  NegativeInsightOptions,
  NegativeInsights,
  NegativeSort,
  SegmentRow,
  TrendRow,
} from "./contracts";
import type { FeedbackTable } from "./dataset";
import { FEEDBACK_TABLE, queryRows, readNumber, readString } from "./duckdb";
import { EmptyDatasetError } from "./errors";
import { extractHotspots } from "./keywords";

type Clause = { sql: string; params: string[] };

const NEGATIVE_ORDER: Record<NegativeSort, string> = {
  recent: "created_at_date DESC NULLS LAST, row_index",
  lowest_rating: "rating ASC NULLS LAST, created_at_date ASC NULLS LAST, row_index",
  highest_rating: "rating DESC NULLS LAST, created_at_date DESC NULLS LAST, row_index",
  longest_comment: "length(review_text) DESC, created_at_date DESC NULLS LAST, row_index",
};

/**
 * WHERE clause for a filter plus any extra clauses, with positional parameters
 * in placeholder order. Rows without a date fail any active date bound.
 */
export function buildWhere(filter: FilterSpec, extra: Clause[] = []): Clause {
  const clauses: Clause[] = [];

  if (filter.products.size) {
    const products = Array.from(filter.products).sort();
    clauses.push({ sql: `product IN (${products.map(() => "?").join(", ")})`, params: products });
  }
  if (filter.date_from !== null) {
    clauses.push({ sql: "created_at_date >= ?", params: [filter.date_from] });
  }
  if (filter.date_to !== null) {
    clauses.push({ sql: "created_at_date <= ?", params: [filter.date_to] });
  }
  clauses.push(...extra);

  if (!clauses.length) return { sql: "", params: [] };
  return {
    sql: `WHERE ${clauses.map((c) => c.sql).join(" AND ")}`,
    params: clauses.flatMap((c) => c.params),
  };
}

export function buildKpiQuery(filter: FilterSpec): BuiltQuery {
  const where = buildWhere(filter);
  return {
    sql: `
      SELECT
        CAST(COUNT(*) AS INTEGER) AS total_tickets,
        ROUND(AVG(rating), 2) AS avg_rating
      FROM ${FEEDBACK_TABLE}
      ${where.sql};
    `,
    params: where.params,
  };
}

export function buildTrendQuery(filter: FilterSpec): BuiltQuery {
  const where = buildWhere(filter, [{ sql: "month IS NOT NULL", params: [] }]);
  return {
    sql: `
      SELECT
        month,
        CAST(COUNT(*) AS INTEGER) AS volume,
        ROUND(AVG(rating), 2) AS avg_rating
      FROM ${FEEDBACK_TABLE}
      ${where.sql}
      GROUP BY month
      ORDER BY month;
    `,
    params: where.params,
  };
}

export function buildSegmentQuery(filter: FilterSpec): BuiltQuery {
  const where = buildWhere(filter);
  return {
    sql: `
      SELECT
        product,
        CAST(COUNT(*) AS INTEGER) AS tickets,
        ROUND(AVG(rating), 2) AS avg_rating
      FROM ${FEEDBACK_TABLE}
      ${where.sql}
      GROUP BY product
      ORDER BY tickets DESC, product ASC;
    `,
    params: where.params,
  };
}

export function buildNegativeQuery(filter: FilterSpec, options: NegativeInsightOptions = {}): BuiltQuery {
  const extra: Clause[] = [{ sql: "is_negative", params: [] }];
  const search = options.search?.trim();
  if (search) {
    extra.push({ sql: "contains(lower(review_text), lower(?))", params: [search] });
  }
  const where = buildWhere(filter, extra);
  return {
    sql: `
      SELECT row_index
      FROM ${FEEDBACK_TABLE}
      ${where.sql}
      ORDER BY ${NEGATIVE_ORDER[options.sort ?? "recent"]};
    `,
    params: where.params,
  };
}

function assertHasRows(table: FeedbackTable) {
  if (!table.records.length) throw new EmptyDatasetError();
}

export async function getKpis(table: FeedbackTable, filter: FilterSpec): Promise<KpiResult> {
  assertHasRows(table);
  const [row] = await queryRows(table.store.connection, buildKpiQuery(filter));
  return {
    total_tickets: row ? readNumber(row, "total_tickets") ?? 0 : 0,
    avg_rating: row ? readNumber(row, "avg_rating") : null,
  };
}

export async function getTrend(table: FeedbackTable, filter: FilterSpec): Promise<TrendRow[]> {
  assertHasRows(table);
  const rows = await queryRows(table.store.connection, buildTrendQuery(filter));
  return rows.map((row) => ({
    month: readString(row, "month") ?? "",
    volume: readNumber(row, "volume") ?? 0,
    avg_rating: readNumber(row, "avg_rating"),
  }));
}

export async function getSegments(table: FeedbackTable, filter: FilterSpec): Promise<SegmentRow[]> {
  assertHasRows(table);
  const rows = await queryRows(table.store.connection, buildSegmentQuery(filter));
  return rows.map((row) => ({
    product: readString(row, "product") ?? "",
    tickets: readNumber(row, "tickets") ?? 0,
    avg_rating: readNumber(row, "avg_rating"),
  }));
}

export async function getNegativeInsights(
  table: FeedbackTable,
  filter: FilterSpec,
  options: NegativeInsightOptions = {},
): Promise<NegativeInsights> {
  assertHasRows(table);
  const rows = await queryRows(table.store.connection, buildNegativeQuery(filter, options));
  const records: CanonicalRecord[] = [];
  for (const row of rows) {
    const index = readNumber(row, "row_index");
    const record = index === null ? undefined : table.records[index];
    if (record) records.push(record);
  }
  return { records, keywords: extractHotspots(records, table.config) };
}

export type InsightReport = {
  kpis: KpiResult;
  trend: TrendRow[];
  segments: SegmentRow[];
  negative: NegativeInsights;
};

export async function runAllQueries(
  table: FeedbackTable,
  filter: FilterSpec,
  options: NegativeInsightOptions = {},
): Promise<InsightReport> {
  const kpis = await getKpis(table, filter);
  const trend = await getTrend(table, filter);
  const segments = await getSegments(table, filter);
  const negative = await getNegativeInsights(table, filter, options);
  return { kpis, trend, segments, negative };
}

export async function getDatasetProfile(table: FeedbackTable): Promise<DatasetProfile> {
  const connection = table.store.connection;
  const [summary] = await queryRows(connection, {
    sql: `
      SELECT
        CAST(COUNT(*) AS INTEGER) AS row_count,
        MIN(created_at_date) AS min_date,
        MAX(created_at_date) AS max_date,
        CAST(COUNT(*) - COUNT(created_at_date) AS INTEGER) AS undated_rows,
        CAST(COUNT(*) - COUNT(rating) AS INTEGER) AS unrated_rows,
        CAST(COUNT(*) FILTER (WHERE is_negative) AS INTEGER) AS negative_rows
      FROM ${FEEDBACK_TABLE};
    `,
    params: [],
  });
  const products = await queryRows(connection, {
    sql: `SELECT DISTINCT product FROM ${FEEDBACK_TABLE} ORDER BY product;`,
    params: [],
  });

  return {
    row_count: summary ? readNumber(summary, "row_count") ?? 0 : 0,
    products: products.map((row) => readString(row, "product") ?? ""),
    min_date: summary ? readString(summary, "min_date") : null,
    max_date: summary ? readString(summary, "max_date") : null,
    undated_rows: summary ? readNumber(summary, "undated_rows") ?? 0 : 0,
    unrated_rows: summary ? readNumber(summary, "unrated_rows") ?? 0 : 0,
    negative_rows: summary ? readNumber(summary, "negative_rows") ?? 0 : 0,
  };
}
