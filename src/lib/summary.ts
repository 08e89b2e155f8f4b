// src/lib/summary.ts
import { startOfDay } from "date-fns";
import type { Summary, Table, TopCategory, TypeMap } from "./types";
import { formatDateTime, isMissing, parseDate } from "./cells";
import { columnValues, columnsOfType, selectCategoryColumn, valueCounts } from "./stats";

export const MISSING_RATIO_THRESHOLD = 0.3;

export function summarize(table: Table, types: TypeMap): Summary {
  return {
    row_count: table.rows.length,
    column_count: table.columns.length,
    latest_date: findLatestDate(table, types),
    top_category: findTopCategory(table, types),
    missing_columns: findMissingColumns(table),
  };
}

/** Latest valid date over every date column, as local midnight. */
export function findLatestDate(table: Table, types: TypeMap): string | null {
  let latest: Date | null = null;
  for (const c of columnsOfType(table, types, "date")) {
    for (const v of columnValues(table, c)) {
      const parsed = parseDate(v);
      if (!parsed.ok) continue;
      if (latest === null || parsed.value.getTime() > latest.getTime()) latest = parsed.value;
    }
  }
  return latest ? formatDateTime(startOfDay(latest)) : null;
}

export function findTopCategory(table: Table, types: TypeMap): TopCategory | null {
  const column = selectCategoryColumn(table, types);
  if (column === null) return null;

  const counts = valueCounts(columnValues(table, column));
  if (counts.length === 0) return null;

  const total = counts.reduce((a, [, n]) => a + n, 0);
  const [value, top] = counts[0];
  return { column, value, ratio: top / total };
}

export function findMissingColumns(table: Table): string[] {
  const n = table.rows.length;
  if (n === 0) return [];
  return table.columns.filter((c) => {
    const missing = columnValues(table, c).filter(isMissing).length;
    return missing / n >= MISSING_RATIO_THRESHOLD;
  });
}
