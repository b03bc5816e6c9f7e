import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import type { RawDataset, RawRow, RawValue } from "./contracts";
import { closeStore, openStore } from "./duckdb";
import { IngestError } from "./errors";
import { CSV_SAMPLE_SIZE, MAX_COLUMNS, MAX_UPLOAD_BYTES, SUPPORTED_EXTENSIONS } from "./limits";
import { createLogger } from "./logger";

const log = createLogger("ingest");

export const SAMPLE_DIR = path.resolve(__dirname, "..", "..", "data");

const sqlString = (value: string) => `'${value.replace(/'/g, "''")}'`;

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

/**
 * Reads a delimited file through DuckDB's CSV sniffer. Every column comes back
 * as text (or null for empty cells) so the normalizer sees the values as written.
 */
export async function readCsvDataset(filePath: string): Promise<RawDataset> {
  let size: number;
  try {
    size = (await stat(filePath)).size;
  } catch (err) {
    throw new IngestError(`Cannot read ${filePath}: ${errorMessage(err)}`);
  }
  if (size > MAX_UPLOAD_BYTES) {
    throw new IngestError(`file too large: ${size} bytes (limit ${MAX_UPLOAD_BYTES})`);
  }
  const ext = path.extname(filePath).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.includes(ext)) {
    log.warn("Unrecognized file extension:", ext || "(none)");
  }

  const store = await openStore();
  try {
    await store.connection.run(`
      CREATE OR REPLACE TABLE data AS
      SELECT * FROM read_csv(${sqlString(filePath)}, header = true, all_varchar = true, sample_size = ${CSV_SAMPLE_SIZE});
    `);
    const reader = await store.connection.runAndReadAll("SELECT * FROM data;");
    const columns = reader.columnNames();
    if (columns.length > MAX_COLUMNS) {
      throw new IngestError(`too many columns: ${columns.length} (limit ${MAX_COLUMNS})`);
    }

    const rows: RawRow[] = reader.getRowObjects().map((row) => {
      const out: Record<string, RawValue> = {};
      for (const column of columns) {
        const value = row[column];
        out[column] = typeof value === "string" ? value : null;
      }
      return out;
    });

    log.info(`Read ${rows.length} rows from ${path.basename(filePath)}`);
    return { columns, rows };
  } catch (err) {
    if (err instanceof IngestError) throw err;
    throw new IngestError(`Could not parse ${path.basename(filePath)}: ${errorMessage(err)}`);
  } finally {
    closeStore(store);
  }
}

export async function listSampleDatasets(): Promise<string[]> {
  const entries = await readdir(SAMPLE_DIR);
  return entries
    .filter((name) => name.endsWith(".csv"))
    .map((name) => name.slice(0, -".csv".length))
    .sort();
}

export async function sampleDatasetPath(name: string): Promise<string> {
  const wanted = name.endsWith(".csv") ? name.slice(0, -".csv".length) : name;
  const available = await listSampleDatasets();
  if (!available.includes(wanted)) {
    throw new IngestError(`Unknown sample dataset "${name}". Available: ${available.join(", ")}`);
  }
  return path.join(SAMPLE_DIR, `${wanted}.csv`);
}
