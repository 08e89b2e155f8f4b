// src/lib/types.ts
export type Cell = string | number | boolean | Date | null | undefined;

/** Row-oriented table; `columns` carries the presentation order. */
export type Table = { columns: string[]; rows: Record<string, Cell>[] };

export type ColumnType = "date" | "number" | "category" | "text";

export type TypeMap = Record<string, ColumnType>;

/** Outcome of one parse attempt on one cell. A failure is a skip, never an error. */
export type Parsed<T> = { ok: true; value: T } | { ok: false };

/* ---------------- wire shapes (serialized verbatim, keep snake_case) ---------------- */

export type TopCategory = {
  column: string;
  value: string;
  ratio: number;
};

export type Summary = {
  row_count: number;
  column_count: number;
  latest_date: string | null;
  top_category: TopCategory | null;
  missing_columns: string[];
};

export type ChartDataPoint = { label: string; value: number };

export type ChartCategoryTop5 = {
  title: string;
  x_label: string;
  y_label: string;
  data: ChartDataPoint[];
  explanation: string;
};

export type ChartDatePoint = { date: string; count: number };

export type ChartByDate = {
  title: string;
  x_label: string;
  y_label: string;
  data: ChartDatePoint[];
  explanation: string;
};

export type Charts = {
  by_category_top5: ChartCategoryTop5 | null;
  by_date: ChartByDate | null;
};

export type PreviewColumn = { name: string; type: ColumnType };

export type Preview = {
  columns: PreviewColumn[];
  rows: string[][];
};

export type Analysis = {
  summary: Summary;
  charts: Charts;
  preview: Preview;
  types: TypeMap;
};

export type UploadResponse = { dataset_id: string };

export type ErrorBody = { error: string };
