import { DuckDBInstance } from "@duckdb/node-api";
import type { DuckDBConnection, DuckDBPreparedStatement, DuckDBValue } from "@duckdb/node-api";
import type { BuiltQuery, CanonicalRecord } from "./contracts";
import { createLogger } from "./logger";

const log = createLogger("duckdb");

export const FEEDBACK_TABLE = "feedback";

export type SqlRow = Record<string, DuckDBValue>;

export type CanonicalStore = {
  instance: DuckDBInstance;
  connection: DuckDBConnection;
};

export async function openStore(): Promise<CanonicalStore> {
  const instance = await DuckDBInstance.create(":memory:");
  const connection = await instance.connect();
  return { instance, connection };
}

export function closeStore(store: CanonicalStore) {
  store.connection.closeSync();
  store.instance.closeSync();
}

function bindText(statement: DuckDBPreparedStatement, index: number, value: string | null) {
  if (value === null) statement.bindNull(index);
  else statement.bindVarchar(index, value);
}

/**
 * Creates the feedback table and loads the canonical records into it. Dates and
 * months are stored as ISO text so they compare lexicographically.
 */
export async function materializeCanonicalTable(
  connection: DuckDBConnection,
  records: readonly CanonicalRecord[],
) {
  await connection.run(`
    CREATE OR REPLACE TABLE ${FEEDBACK_TABLE} (
      row_index INTEGER NOT NULL,
      created_at_date VARCHAR,
      month VARCHAR,
      product VARCHAR NOT NULL,
      rating DOUBLE,
      review_text VARCHAR NOT NULL,
      is_negative BOOLEAN NOT NULL
    );
  `);
  if (!records.length) return;

  const insert = await connection.prepare(`INSERT INTO ${FEEDBACK_TABLE} VALUES ($1, $2, $3, $4, $5, $6, $7);`);
  await connection.run("BEGIN TRANSACTION;");
  try {
    for (const record of records) {
      insert.bindInteger(1, record.row_index);
      bindText(insert, 2, record.created_at_date);
      bindText(insert, 3, record.month);
      insert.bindVarchar(4, record.product);
      if (record.rating === null) insert.bindNull(5);
      else insert.bindDouble(5, record.rating);
      insert.bindVarchar(6, record.review_text);
      insert.bindBoolean(7, record.is_negative);
      await insert.run();
    }
    await connection.run("COMMIT;");
  } catch (err) {
    await connection.run("ROLLBACK;");
    throw err;
  }
  log.debug("materialized", records.length, "rows");
}

export async function queryRows(connection: DuckDBConnection, query: BuiltQuery): Promise<SqlRow[]> {
  log.debug(query.sql.trim(), query.params);
  const reader = query.params.length
    ? await connection.runAndReadAll(query.sql, query.params)
    : await connection.runAndReadAll(query.sql);
  return reader.getRowObjects();
}

export function readNumber(row: SqlRow, key: string): number | null {
  const value = row[key];
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  return null;
}

export function readString(row: SqlRow, key: string): string | null {
  const value = row[key];
  return typeof value === "string" ? value : null;
}
