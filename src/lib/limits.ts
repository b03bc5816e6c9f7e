// Centralized limits and guardrails for ingestion.
export const MAX_UPLOAD_BYTES = 50 * 1024 * 1024; // 50 MB hard cap
export const MAX_COLUMNS = 200; // guard against extremely wide CSVs
export const CSV_SAMPLE_SIZE = 20_000; // rows DuckDB sniffs for dialect detection

export const SUPPORTED_EXTENSIONS = [".csv", ".tsv", ".txt"];
