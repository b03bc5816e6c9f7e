import type { CanonicalRecord, FilterSpec } from "./contracts";
import { InvalidFilterError } from "./errors";
import { parseCalendarDate } from "./normalize";

export type FilterInput = {
  products?: Iterable<string>;
  dateFrom?: string | null;
  dateTo?: string | null;
};

export const ALL_RECORDS: FilterSpec = createFilter();

function filterDate(name: string, value: string | null | undefined): string | null {
  if (value === null || value === undefined || value.trim() === "") return null;
  const date = parseCalendarDate(value);
  if (date === null) {
    throw new InvalidFilterError(`${name} is not a valid date: "${value}"`);
  }
  return date;
}

export function createFilter(input: FilterInput = {}): FilterSpec {
  return Object.freeze({
    products: new Set(input.products ?? []),
    date_from: filterDate("dateFrom", input.dateFrom),
    date_to: filterDate("dateTo", input.dateTo),
  });
}

// Same predicate as buildWhere.
export function matchesFilter(record: CanonicalRecord, filter: FilterSpec): boolean {
  if (filter.products.size > 0 && !filter.products.has(record.product)) return false;
  const date = record.created_at_date;
  if (filter.date_from !== null && (date === null || date < filter.date_from)) return false;
  if (filter.date_to !== null && (date === null || date > filter.date_to)) return false;
  return true;
}
