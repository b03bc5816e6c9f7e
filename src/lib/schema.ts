import { LOGICAL_FIELDS } from "./contracts";
import type { AliasTable, ColumnMatch, FieldMapping, LogicalField, SchemaResolutionWarning } from "./contracts";
import { DEFAULT_ALIAS_TABLE } from "./config";

export type SchemaResolution = {
  mapping: FieldMapping;
  matches: ColumnMatch[];
  warnings: SchemaResolutionWarning[];
};

const FALLBACK_NOTE: Record<LogicalField, string> = {
  created_at: "dates will be empty and trend results will be empty",
  product: `every row will use product "Unknown"`,
  rating: "ratings will be empty and negativity falls back to keywords",
  review_text: "comments will be empty and no keywords will be extracted",
};

/**
 * Maps arbitrary column names onto the logical fields. Each field walks its alias
 * list in priority order; the first alias equal (trimmed, case-insensitive) to an
 * unclaimed column wins, and earlier columns win ties on the same alias.
 */
export function resolveSchema(
  columnNames: Iterable<string>,
  aliasTable: AliasTable = DEFAULT_ALIAS_TABLE,
): SchemaResolution {
  const columns = Array.from(columnNames);
  const claimed = new Set<string>();
  const mapping: Record<LogicalField, string | null> = {
    created_at: null,
    product: null,
    rating: null,
    review_text: null,
  };
  const matches: ColumnMatch[] = [];
  const warnings: SchemaResolutionWarning[] = [];

  for (const field of LOGICAL_FIELDS) {
    for (const alias of aliasTable[field]) {
      const wanted = alias.trim().toLowerCase();
      const column = columns.find((c) => !claimed.has(c) && c.trim().toLowerCase() === wanted);
      if (column !== undefined) {
        mapping[field] = column;
        claimed.add(column);
        matches.push({ field, column, alias });
        break;
      }
    }

    if (mapping[field] === null) {
      warnings.push({
        kind: "schema",
        field,
        message: `No column matched ${field} (tried ${aliasTable[field].join(", ")}); ${FALLBACK_NOTE[field]}`,
      });
    }
  }

  return { mapping: Object.freeze(mapping), matches, warnings };
}
