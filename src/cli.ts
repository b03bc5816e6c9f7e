#!/usr/bin/env node
import dotenv from "dotenv";
import { parseArgs } from "node:util";
import { getDatasetProfile, runAllQueries } from "./lib/analytics";
import { configFromEnv } from "./lib/config";
import { NEGATIVE_SORTS } from "./lib/contracts";
import type { NegativeSort } from "./lib/contracts";
import { closeFeedbackTable, loadFeedbackTable } from "./lib/dataset";
import { createFilter } from "./lib/filters";
import { listSampleDatasets, readCsvDataset, sampleDatasetPath } from "./lib/ingest";
import { createLogger } from "./lib/logger";

dotenv.config();

const log = createLogger("cli");

const USAGE = `Usage: feedback-insights [--file <csv> | --sample <name>] [options]

  --file <csv>          feedback table to analyze
  --sample <name>       bundled sample dataset (default: first available)
  --list-samples        print the bundled sample names and exit
  --product <name>      restrict to a product; repeat for several
  --from <date>         earliest date, inclusive
  --to <date>           latest date, inclusive
  --sort <mode>         negative comment order: ${NEGATIVE_SORTS.join(", ")}
  --search <text>       only negative comments containing this text
  -h, --help            show this help`;

function parseSort(value: string | undefined): NegativeSort | undefined {
  if (value === undefined) return undefined;
  const sort = NEGATIVE_SORTS.find((s) => s === value);
  if (!sort) throw new Error(`--sort must be one of ${NEGATIVE_SORTS.join(", ")}`);
  return sort;
}

async function resolveInput(file: string | undefined, sample: string | undefined): Promise<string> {
  if (file) return file;
  if (sample) return sampleDatasetPath(sample);
  const [first] = await listSampleDatasets();
  if (!first) throw new Error("No --file given and no sample datasets found");
  return sampleDatasetPath(first);
}

async function main(argv: string[]) {
  const { values } = parseArgs({
    args: argv,
    options: {
      file: { type: "string" },
      sample: { type: "string" },
      "list-samples": { type: "boolean" },
      product: { type: "string", multiple: true },
      from: { type: "string" },
      to: { type: "string" },
      sort: { type: "string" },
      search: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }
  if (values["list-samples"]) {
    console.log((await listSampleDatasets()).join("\n"));
    return;
  }

  const config = configFromEnv();
  const filter = createFilter({ products: values.product, dateFrom: values.from, dateTo: values.to });
  const sort = parseSort(values.sort);

  const input = await resolveInput(values.file, values.sample);
  const table = await loadFeedbackTable(await readCsvDataset(input), config);
  try {
    const profile = await getDatasetProfile(table);
    const report = await runAllQueries(table, filter, { sort, search: values.search });
    const output = {
      source: input,
      mapping: table.mapping,
      warnings: table.warnings,
      profile,
      filter: { products: Array.from(filter.products), date_from: filter.date_from, date_to: filter.date_to },
      ...report,
    };
    console.log(JSON.stringify(output, null, 2));
  } finally {
    closeFeedbackTable(table);
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  log.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
