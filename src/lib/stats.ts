// src/lib/stats.ts
import type { Cell, ColumnType, Table, TypeMap } from "./types";
import { isMissing, parseDate, parseNumber, toDisplayString } from "./cells";
import { createRecord, ownValue } from "./records";

export const SAMPLE_SIZE = 200;
export const DATE_THRESHOLD = 0.5;
export const NUMBER_THRESHOLD = 0.7;
export const CATEGORY_MAX_UNIQUE = 50;
export const CATEGORY_MAX_AVG_LENGTH = 50;

export function columnValues(table: Table, column: string): Cell[] {
  return table.rows.map((r) => ownValue(r, column) ?? null);
}

export function nonMissing(values: Cell[]): Cell[] {
  return values.filter((v) => !isMissing(v));
}

/** ======================= Type inference ======================= */

/**
 * Classify a column from its first {@link SAMPLE_SIZE} non-missing values.
 * Later values never change the outcome, so a file whose early rows are
 * unrepresentative can be misclassified.
 */
export function inferColumnType(values: Cell[]): ColumnType {
  const present = nonMissing(values);
  if (present.length === 0) return "text";

  const sample = present.slice(0, SAMPLE_SIZE);
  const share = (hits: number) => hits / sample.length;

  const dates = sample.filter((v) => parseDate(v).ok).length;
  if (share(dates) >= DATE_THRESHOLD) return "date";

  const nums = sample.filter((v) => parseNumber(v).ok).length;
  if (share(nums) >= NUMBER_THRESHOLD) return "number";

  if (sample.some((v) => typeof v === "string")) {
    const labels = sample.map(toDisplayString);
    const distinct = new Set(labels).size;
    // code points, so an emoji counts once
    const avgLength = labels.reduce((a, s) => a + Array.from(s).length, 0) / labels.length;
    if (distinct <= CATEGORY_MAX_UNIQUE && avgLength <= CATEGORY_MAX_AVG_LENGTH) return "category";
  }

  return "text";
}

export function inferColumnTypes(table: Table): TypeMap {
  const types = createRecord<ColumnType>();
  for (const c of table.columns) types[c] = inferColumnType(columnValues(table, c));
  return types;
}

export function columnsOfType(table: Table, types: TypeMap, type: ColumnType): string[] {
  return table.columns.filter((c) => ownValue(types, c) === type);
}

/** ======================= Frequencies ======================= */

/**
 * Value frequencies over display labels, missing values excluded.
 * Sorted by count descending; equal counts keep first-seen order.
 */
export function valueCounts(values: Cell[]): [string, number][] {
  const counts = new Map<string, number>();
  for (const v of values) {
    if (isMissing(v)) continue;
    const key = toDisplayString(v);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  // Array.prototype.sort is stable
  return [...counts.entries()].sort((a, b) => b[1] - a[1]);
}

/**
 * Pick the most informative category column: many distinct values, not
 * dominated by one. score = distinct - 2 * (top count / non-missing count).
 * Ties keep the earlier column; columns with no values are skipped.
 */
export function selectCategoryColumn(table: Table, types: TypeMap): string | null {
  let best: string | null = null;
  let bestScore = -Infinity;

  for (const c of columnsOfType(table, types, "category")) {
    const counts = valueCounts(columnValues(table, c));
    if (counts.length === 0) continue;

    const total = counts.reduce((a, [, n]) => a + n, 0);
    const score = counts.length - 2 * (counts[0][1] / total);
    if (score > bestScore) {
      bestScore = score;
      best = c;
    }
  }
  return best;
}
