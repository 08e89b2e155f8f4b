// src/lib/preview.ts
import type { Cell, Preview, Table, TypeMap } from "./types";
import { toDisplayString } from "./cells";
import { ownValue } from "./records";

export const MAX_PREVIEW_ROWS = 20;
export const MAX_TEXT_LENGTH = 200;
const ELLIPSIS = "…";

export function previewCell(v: Cell): string {
  const text = toDisplayString(v);
  // cut on code points; slicing UTF-16 units can split a surrogate pair
  const chars = Array.from(text);
  return chars.length > MAX_TEXT_LENGTH ? chars.slice(0, MAX_TEXT_LENGTH).join("") + ELLIPSIS : text;
}

export function buildPreview(table: Table, types: TypeMap): Preview {
  const columns = table.columns.map((name) => ({ name, type: ownValue(types, name) ?? "text" }));
  const rows = table.rows
    .slice(0, MAX_PREVIEW_ROWS)
    .map((r) => table.columns.map((c) => previewCell(ownValue(r, c))));
  return { columns, rows };
}
