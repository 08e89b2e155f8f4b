// src/lib/analyze.ts
import type { Analysis, Table } from "./types";
import { inferColumnTypes } from "./stats";
import { summarize } from "./summary";
import { buildCharts } from "./charts";
import { buildPreview } from "./preview";

/**
 * Infer column types once, then derive the summary, charts and preview from
 * the same table and type map. The builders only read their inputs.
 */
export function analyzeTable(table: Table): Analysis {
  const types = inferColumnTypes(table);
  return {
    summary: summarize(table, types),
    charts: buildCharts(table, types),
    preview: buildPreview(table, types),
    types,
  };
}
