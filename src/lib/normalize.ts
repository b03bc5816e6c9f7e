import { UNKNOWN_PRODUCT } from "./contracts";
import type { CanonicalRecord, FieldMapping, RawRow, RawValue, RowParseWarning } from "./contracts";
import { DEFAULT_CONFIG } from "./config";
import type { AnalyzerConfig } from "./config";
import { isNegativeFeedback } from "./keywords";

export type NormalizeResult = {
  records: CanonicalRecord[];
  warnings: RowParseWarning[];
};

const MONTH_NAMES = [
  "january", "february", "march", "april", "may", "june",
  "july", "august", "september", "october", "november", "december",
];

const TIME_SUFFIX = String.raw`(?:[T ]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:\s?[AaPp][Mm])?(?:Z|[+-]\d{2}:?\d{2})?)?`;
const ISO_RE = new RegExp(String.raw`^(\d{4})[-/](\d{1,2})[-/](\d{1,2})${TIME_SUFFIX}$`);
const SLASH_RE = new RegExp(String.raw`^(\d{1,2})/(\d{1,2})/(\d{4})${TIME_SUFFIX}$`);
const MONTH_FIRST_RE = /^([A-Za-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/;
const DAY_FIRST_RE = /^(\d{1,2})(?:st|nd|rd|th)?\s+([A-Za-z]+)\.?,?\s+(\d{4})$/;
const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export function rawText(value: RawValue): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

function calendarDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return null;
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

// Full name, three-letter abbreviation, or "sept".
function monthNumber(name: string): number | undefined {
  const key = name.toLowerCase();
  const index = MONTH_NAMES.findIndex((full) => key === full || key === full.slice(0, 3));
  if (index >= 0) return index + 1;
  return key === "sept" ? 9 : undefined;
}

/**
 * Best-effort calendar date parser. Returns YYYY-MM-DD or null. Time and offset
 * parts are accepted but ignored: the date as written is kept.
 * Slash dates are month-first unless the first part cannot be a month.
 */
export function parseCalendarDate(value: string): string | null {
  const text = value.trim();
  if (!text) return null;

  let m = ISO_RE.exec(text);
  if (m) return calendarDate(Number(m[1]), Number(m[2]), Number(m[3]));

  m = SLASH_RE.exec(text);
  if (m) {
    const first = Number(m[1]);
    const second = Number(m[2]);
    const year = Number(m[3]);
    return first > 12 ? calendarDate(year, second, first) : calendarDate(year, first, second);
  }

  m = MONTH_FIRST_RE.exec(text);
  if (m) {
    const month = monthNumber(m[1]);
    return month ? calendarDate(Number(m[3]), month, Number(m[2])) : null;
  }

  m = DAY_FIRST_RE.exec(text);
  if (m) {
    const month = monthNumber(m[2]);
    return month ? calendarDate(Number(m[3]), month, Number(m[1])) : null;
  }

  return null;
}

// Finite numbers and plain decimal literals; anything that overflows is null.
export function parseRating(value: RawValue): number | null {
  let rating: number;
  if (typeof value === "number") rating = value;
  else if (typeof value === "bigint") rating = Number(value);
  else if (typeof value === "string" && DECIMAL_RE.test(value.trim())) rating = Number(value.trim());
  else return null;
  return Number.isFinite(rating) ? rating : null;
}

const read = (row: RawRow, column: string | null): RawValue => (column === null ? undefined : row[column]);

export function normalizeRows(
  rows: readonly RawRow[],
  mapping: FieldMapping,
  config: AnalyzerConfig = DEFAULT_CONFIG,
): NormalizeResult {
  const warnings: RowParseWarning[] = [];

  const records = rows.map((row, rowIndex): CanonicalRecord => {
    const dateValue = read(row, mapping.created_at);
    const ratingValue = read(row, mapping.rating);
    const createdAtRaw = rawText(dateValue).trim();
    const ratingRaw = rawText(ratingValue).trim();

    const createdAtDate = parseCalendarDate(createdAtRaw);
    if (createdAtDate === null && createdAtRaw) {
      warnings.push({
        kind: "row",
        row_index: rowIndex,
        field: "created_at",
        value: createdAtRaw,
        message: `Row ${rowIndex + 1}: unparseable date "${createdAtRaw}"`,
      });
    }

    const rating = parseRating(ratingValue);
    if (rating === null && ratingRaw) {
      warnings.push({
        kind: "row",
        row_index: rowIndex,
        field: "rating",
        value: ratingRaw,
        message: `Row ${rowIndex + 1}: unparseable rating "${ratingRaw}"`,
      });
    }

    const product = rawText(read(row, mapping.product)).trim();
    const reviewText = rawText(read(row, mapping.review_text));

    return Object.freeze({
      row_index: rowIndex,
      created_at_raw: createdAtRaw,
      created_at_date: createdAtDate,
      month: createdAtDate ? createdAtDate.slice(0, 7) : null,
      product: product || UNKNOWN_PRODUCT,
      rating,
      review_text: reviewText,
      is_negative: isNegativeFeedback(rating, reviewText, config),
    });
  });

  return { records, warnings };
}
