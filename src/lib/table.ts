// src/lib/table.ts
import Papa from "papaparse";
import type { Cell, Table } from "./types";
import { isMissing, isNumericString } from "./cells";
import { createRecord } from "./records";

export class TableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TableError";
  }
}

// tokens a dataframe reader treats as NA by default
const NA_TOKENS = new Set([
  "", "#N/A", "#N/A N/A", "#NA", "-1.#IND", "-1.#QNAN", "-NaN", "-nan", "1.#IND",
  "1.#QNAN", "<NA>", "N/A", "NA", "NULL", "NaN", "None", "n/a", "nan", "null",
]);

/** Table boundary: column names must be unique and non-blank. */
export function createTable(columns: string[], rows: Record<string, Cell>[]): Table {
  const seen = new Set<string>();
  for (const c of columns) {
    if (c === "") throw new TableError("Column names must not be blank.");
    if (seen.has(c)) throw new TableError(`Duplicate column name: "${c}".`);
    seen.add(c);
  }
  return { columns: [...columns], rows };
}

function normalizeCell(raw: string | undefined): string | null {
  if (raw === undefined || NA_TOKENS.has(raw)) return null;
  return raw;
}

const INTEGER_RE = /^[+-]?\d+$/;

// integers past 2^53 would lose digits as numbers, so such columns stay strings
function toExactNumber(s: string): number | null {
  const t = s.trim();
  if (!isNumericString(t)) return null;
  const n = Number(t);
  if (INTEGER_RE.test(t)) return Number.isSafeInteger(n) ? n : null;
  return Number.isFinite(n) ? n : null;
}

/** A column becomes numeric only when every present value converts exactly. */
function typeColumn(rows: Record<string, Cell>[], column: string) {
  const converted: (number | null)[] = [];
  for (const r of rows) {
    const v = r[column];
    if (isMissing(v)) {
      converted.push(null);
      continue;
    }
    const n = typeof v === "string" ? toExactNumber(v) : null;
    if (n === null) return;
    converted.push(n);
  }
  if (converted.every((n) => n === null)) return;
  rows.forEach((r, i) => {
    r[column] = converted[i];
  });
}

// Unique, non-blank names: blanks become "Unnamed: <i>", repeats get "_1", "_2", ...
function headerNames(raw: string[]): string[] {
  const used = new Set<string>();
  return raw.map((h, i) => {
    const base = h === "" ? `Unnamed: ${i}` : h;
    let name = base;
    for (let n = 1; used.has(name); n++) name = `${base}_${n}`;
    used.add(name);
    return name;
  });
}

export function parseCsv(text: string): Table {
  const res = Papa.parse<string[]>(text.replace(/^\uFEFF/, ""), { skipEmptyLines: true });

  const fatal = res.errors.find((e) => e.type === "Quotes");
  if (fatal) {
    const where = fatal.row === undefined ? "" : ` (row ${fatal.row + 1})`;
    throw new TableError(`${fatal.message}${where}`);
  }

  const [header = [], ...records] = res.data;
  const columns = headerNames(header);
  const rows = records.map((fields, i) => {
    if (fields.length > columns.length) {
      throw new TableError(
        `Too many fields: expected ${columns.length} fields but parsed ${fields.length} (row ${i + 2})`,
      );
    }
    const row = createRecord<Cell>();
    columns.forEach((c, j) => {
      row[c] = normalizeCell(fields[j]);
    });
    return row;
  });
  for (const c of columns) typeColumn(rows, c);

  return createTable(columns, rows);
}
