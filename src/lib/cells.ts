// src/lib/cells.ts
import { format, isValid, parse, parseISO } from "date-fns";
import type { Cell, Parsed } from "./types";

/** ======================= Missing values ======================= */

export function isMissing(v: Cell): boolean {
  if (v === null || v === undefined) return true;
  if (typeof v === "number") return Number.isNaN(v);
  if (v instanceof Date) return Number.isNaN(v.getTime());
  return false;
}

/** ======================= Parse attempts ======================= */

const NUMERIC_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

// tried in order after ISO-8601; two-letter tokens also take one digit
const DATE_LAYOUTS = [
  "yyyy/MM/dd",
  "yyyy/MM/dd HH:mm",
  "yyyy/MM/dd HH:mm:ss",
  "MM/dd/yyyy",
  "MM/dd/yyyy HH:mm",
  "MM/dd/yyyy HH:mm:ss",
  "dd.MM.yyyy",
  "dd MMM yyyy",
  "MMM dd yyyy",
  "MMM dd, yyyy",
  "MMMM dd, yyyy",
];

const REFERENCE_DATE = new Date(2000, 0, 1);

const fail = { ok: false } as const;

function plausible(d: Date): boolean {
  if (!isValid(d)) return false;
  const year = d.getFullYear();
  return year >= 1000 && year <= 9999;
}

export function parseDate(v: Cell): Parsed<Date> {
  if (v instanceof Date) return isValid(v) ? { ok: true, value: v } : fail;
  if (typeof v !== "string") return fail;

  const s = v.trim();
  // "2024" or "20240101" would otherwise read as years/basic ISO dates
  if (!s || NUMERIC_RE.test(s)) return fail;

  const iso = parseISO(s);
  if (plausible(iso)) return { ok: true, value: iso };

  for (const layout of DATE_LAYOUTS) {
    const d = parse(s, layout, REFERENCE_DATE);
    if (plausible(d)) return { ok: true, value: d };
  }
  return fail;
}

export function parseNumber(v: Cell): Parsed<number> {
  if (typeof v === "number") return Number.isFinite(v) ? { ok: true, value: v } : fail;
  if (typeof v !== "string") return fail;
  const s = v.trim();
  if (!NUMERIC_RE.test(s)) return fail;
  const n = Number(s);
  return Number.isFinite(n) ? { ok: true, value: n } : fail;
}

export function isNumericString(s: string): boolean {
  return NUMERIC_RE.test(s.trim());
}

/** ======================= Display ======================= */

export function formatDay(d: Date): string {
  return format(d, "yyyy-MM-dd");
}

export function formatDateTime(d: Date): string {
  return format(d, "yyyy-MM-dd'T'HH:mm:ss");
}

export function toDisplayString(v: Cell): string {
  if (isMissing(v)) return "";
  if (v instanceof Date) return formatDateTime(v);
  return String(v);
}
