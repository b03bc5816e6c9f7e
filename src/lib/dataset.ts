import type { CanonicalRecord, ColumnMatch, FieldMapping, LoadWarning, RawDataset } from "./contracts";
import { DEFAULT_CONFIG } from "./config";
import type { AnalyzerConfig } from "./config";
import { closeStore, materializeCanonicalTable, openStore } from "./duckdb";
import type { CanonicalStore } from "./duckdb";
import { createLogger } from "./logger";
import { normalizeRows } from "./normalize";
import { resolveSchema } from "./schema";

const log = createLogger("dataset");

export type FeedbackTable = {
  records: readonly CanonicalRecord[];
  mapping: FieldMapping;
  matches: ColumnMatch[];
  warnings: LoadWarning[];
  config: AnalyzerConfig;
  store: CanonicalStore;
};

export async function loadFeedbackTable(
  dataset: RawDataset,
  config: AnalyzerConfig = DEFAULT_CONFIG,
): Promise<FeedbackTable> {
  const schema = resolveSchema(dataset.columns, config.aliasTable);
  const { records, warnings: rowWarnings } = normalizeRows(dataset.rows, schema.mapping, config);

  const store = await openStore();
  try {
    await materializeCanonicalTable(store.connection, records);
  } catch (err) {
    closeStore(store);
    throw err;
  }

  for (const warning of schema.warnings) log.warn(warning.message);
  if (rowWarnings.length) {
    log.warn(`${rowWarnings.length} row value(s) could not be parsed and were left empty`);
  }
  log.info(`Loaded ${records.length} rows`, schema.matches.map((m) => `${m.field}<-${m.column}`).join(", "));

  return Object.freeze({
    records: Object.freeze(records),
    mapping: schema.mapping,
    matches: schema.matches,
    warnings: [...schema.warnings, ...rowWarnings],
    config,
    store,
  });
}

export function closeFeedbackTable(table: FeedbackTable) {
  closeStore(table.store);
}
