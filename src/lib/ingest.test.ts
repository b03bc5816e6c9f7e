import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { getDatasetProfile } from "./analytics";
import { closeFeedbackTable, loadFeedbackTable } from "./dataset";
import { IngestError } from "./errors";
import { listSampleDatasets, readCsvDataset, sampleDatasetPath } from "./ingest";

describe("readCsvDataset", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "feedback-ingest-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads every column as text and empty cells as null", async () => {
    const file = path.join(dir, "tickets.csv");
    await writeFile(
      file,
      ["Date,Queue,Satisfaction,Feedback", '2025-01-15,Billing,2,"slow, very slow checkout"', "2025-01-20,,5,"].join("\n"),
    );

    const dataset = await readCsvDataset(file);
    expect(dataset.columns).toEqual(["Date", "Queue", "Satisfaction", "Feedback"]);
    expect(dataset.rows).toEqual([
      { Date: "2025-01-15", Queue: "Billing", Satisfaction: "2", Feedback: "slow, very slow checkout" },
      { Date: "2025-01-20", Queue: null, Satisfaction: "5", Feedback: null },
    ]);
  });

  it("fails with IngestError for a missing file", async () => {
    await expect(readCsvDataset(path.join(dir, "absent.csv"))).rejects.toThrow(IngestError);
  });
});

describe("sample datasets", () => {
  it("lists the bundled samples", async () => {
    expect(await listSampleDatasets()).toEqual(["ecommerce_reviews", "support_tickets"]);
  });

  it("rejects unknown sample names", async () => {
    await expect(sampleDatasetPath("mortgage")).rejects.toThrow(
      'Unknown sample dataset "mortgage". Available: ecommerce_reviews, support_tickets',
    );
  });

  it("loads the support sample end to end", async () => {
    const dataset = await readCsvDataset(await sampleDatasetPath("support_tickets.csv"));
    const table = await loadFeedbackTable(dataset);
    try {
      expect(table.mapping).toEqual({
        created_at: "Date",
        product: "Queue",
        rating: "Satisfaction",
        review_text: "Feedback",
      });
      expect(table.warnings).toEqual([
        {
          kind: "row",
          row_index: 19,
          field: "created_at",
          value: "not a date",
          message: 'Row 20: unparseable date "not a date"',
        },
      ]);
      expect(await getDatasetProfile(table)).toEqual({
        row_count: 20,
        products: ["Accounts", "Billing", "Technical"],
        min_date: "2025-01-03",
        max_date: "2025-03-28",
        undated_rows: 1,
        unrated_rows: 1,
        negative_rows: 11,
      });
    } finally {
      closeFeedbackTable(table);
    }
  });
});
