import { describe, expect, it } from "vitest";
import { normalizeRows, parseCalendarDate, parseRating } from "./normalize";
import { resolveSchema } from "./schema";

describe("parseCalendarDate", () => {
  it.each([
    ["2025-01-15", "2025-01-15"],
    ["2025/1/5", "2025-01-05"],
    ["2025-01-15T10:30:00Z", "2025-01-15"],
    ["2025-01-15 23:59:59+02:00", "2025-01-15"],
    ["2025-01-15T08:00:00.250Z", "2025-01-15"],
    ["03/04/2025", "2025-03-04"],
    ["25/12/2024", "2024-12-25"],
    ["1/2/2025 10:00 AM", "2025-01-02"],
    ["Jan 15, 2025", "2025-01-15"],
    ["January 15 2025", "2025-01-15"],
    ["15 January 2025", "2025-01-15"],
    ["Sept 3 2025", "2025-09-03"],
    ["  2024-02-29  ", "2024-02-29"],
  ])("parses %j", (input, expected) => {
    expect(parseCalendarDate(input)).toBe(expected);
  });

  it.each(["", "yesterday", "2025-02-30", "2023-02-29", "13/13/2025", "20250115", "Mayday 3 2025", "2025-13-01"])(
    "rejects %j",
    (input) => {
      expect(parseCalendarDate(input)).toBeNull();
    },
  );
});

describe("parseRating", () => {
  it("casts numeric values", () => {
    expect(parseRating(4)).toBe(4);
    expect(parseRating("4.5")).toBe(4.5);
    expect(parseRating(" 3 ")).toBe(3);
    expect(parseRating(5n)).toBe(5);
  });

  it("returns null for anything else", () => {
    expect(parseRating("")).toBeNull();
    expect(parseRating("n/a")).toBeNull();
    expect(parseRating("4 stars")).toBeNull();
    expect(parseRating(Number.NaN)).toBeNull();
    expect(parseRating("1e400")).toBeNull();
    expect(parseRating(Number.POSITIVE_INFINITY)).toBeNull();
    expect(parseRating(true)).toBeNull();
    expect(parseRating(null)).toBeNull();
    expect(parseRating(undefined)).toBeNull();
  });
});

describe("normalizeRows", () => {
  const { mapping } = resolveSchema(["date", "rating", "comment"]);

  it("reports an overflowing rating instead of storing it", () => {
    const { records, warnings } = normalizeRows([{ rating: "1e400" }, { rating: "2" }], mapping);
    expect(records.map((r) => r.rating)).toEqual([null, 2]);
    expect(warnings).toEqual([
      { kind: "row", row_index: 0, field: "rating", value: "1e400", message: 'Row 1: unparseable rating "1e400"' },
    ]);
  });

  it("keeps every row and nulls what cannot be parsed", () => {
    const { records, warnings } = normalizeRows(
      [
        { date: "2025-01-15", rating: 2, comment: "slow checkout" },
        { date: "bad", rating: "x", comment: null },
        {},
      ],
      mapping,
    );

    expect(records).toEqual([
      {
        row_index: 0,
        created_at_raw: "2025-01-15",
        created_at_date: "2025-01-15",
        month: "2025-01",
        product: "Unknown",
        rating: 2,
        review_text: "slow checkout",
        is_negative: true,
      },
      {
        row_index: 1,
        created_at_raw: "bad",
        created_at_date: null,
        month: null,
        product: "Unknown",
        rating: null,
        review_text: "",
        is_negative: false,
      },
      {
        row_index: 2,
        created_at_raw: "",
        created_at_date: null,
        month: null,
        product: "Unknown",
        rating: null,
        review_text: "",
        is_negative: false,
      },
    ]);
    expect(warnings).toEqual([
      { kind: "row", row_index: 1, field: "created_at", value: "bad", message: 'Row 2: unparseable date "bad"' },
      { kind: "row", row_index: 1, field: "rating", value: "x", message: 'Row 2: unparseable rating "x"' },
    ]);
  });

  it("trims products and defaults blanks to Unknown", () => {
    const productMapping = resolveSchema(["team", "score"]).mapping;
    const { records } = normalizeRows([{ team: "  Billing " }, { team: "   " }, { team: null }], productMapping);
    expect(records.map((r) => r.product)).toEqual(["Billing", "Unknown", "Unknown"]);
  });

  it("flags unrated rows from their comment text", () => {
    const { records } = normalizeRows(
      [
        { rating: "", comment: "Screen arrived BROKEN" },
        { rating: "", comment: "works fine" },
        { rating: "5", comment: "broken box, great product" },
      ],
      mapping,
    );
    expect(records.map((r) => r.is_negative)).toEqual([true, false, false]);
  });

  it("produces frozen records", () => {
    const { records } = normalizeRows([{ date: "2025-01-15" }], mapping);
    expect(Object.isFrozen(records[0])).toBe(true);
  });

  it("is deterministic", () => {
    const rows = [
      { date: "Jan 3, 2025", rating: "1", comment: "late refund" },
      { date: "??", rating: "4", comment: "" },
    ];
    expect(normalizeRows(rows, mapping)).toEqual(normalizeRows(rows, mapping));
  });
});
