// src/lib/charts.ts
import { startOfDay } from "date-fns";
import type { ChartByDate, ChartCategoryTop5, Charts, Table, TypeMap } from "./types";
import { formatDay, parseDate } from "./cells";
import { columnValues, columnsOfType, selectCategoryColumn, valueCounts } from "./stats";

export const TOP_K = 5;

const LABELS = {
  categoryTitle: (column: string) => `Top ${TOP_K} ${column} by count`,
  dateTitle: (column: string) => `Daily count by ${column}`,
  count: "Count",
  date: "Date",
  categoryExplanation: "Most frequent categories. Higher bars mean more rows share that value.",
  dateExplanation: "Rows per day. Rises and dips show how activity changes over time.",
};

export function buildCharts(table: Table, types: TypeMap): Charts {
  return {
    by_category_top5: buildCategoryTop5(table, types),
    by_date: buildByDate(table, types),
  };
}

// -------- builders --------
export function buildCategoryTop5(table: Table, types: TypeMap): ChartCategoryTop5 | null {
  const column = selectCategoryColumn(table, types);
  if (column === null) return null;

  const top = valueCounts(columnValues(table, column)).slice(0, TOP_K);
  if (top.length === 0) return null;

  return {
    title: LABELS.categoryTitle(column),
    x_label: column,
    y_label: LABELS.count,
    data: top.map(([label, value]) => ({ label, value })),
    explanation: LABELS.categoryExplanation,
  };
}

/** Daily counts for the first date column only, ascending by day, no gap filling. */
export function buildByDate(table: Table, types: TypeMap): ChartByDate | null {
  const [column] = columnsOfType(table, types, "date");
  if (column === undefined) return null;

  const perDay = new Map<number, number>();
  for (const v of columnValues(table, column)) {
    const parsed = parseDate(v);
    if (!parsed.ok) continue;
    const day = startOfDay(parsed.value).getTime();
    perDay.set(day, (perDay.get(day) ?? 0) + 1);
  }
  if (perDay.size === 0) return null;

  const data = [...perDay.entries()]
    .sort((a, b) => a[0] - b[0])
    .map(([day, count]) => ({ date: formatDay(new Date(day)), count }));

  return {
    title: LABELS.dateTitle(column),
    x_label: LABELS.date,
    y_label: LABELS.count,
    data,
    explanation: LABELS.dateExplanation,
  };
}
