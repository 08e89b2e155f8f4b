// src/lib/client.ts
// Browser-side fetch helpers for the dashboard page.

export const SAMPLE_URL = "/sample-data/sales.csv";

export async function api<T>(url: string, init?: RequestInit): Promise<T> {
  const res = await fetch(url, { cache: "no-store", ...init });
  const body = await res.json().catch(() => ({}));
  if (!res.ok) throw new Error(typeof body?.error === "string" ? body.error : `HTTP ${res.status}`);
  return body;
}

/** Download the bundled sample as a File ready for upload. */
export async function fetchSampleFile(url = SAMPLE_URL): Promise<File> {
  const res = await fetch(url, { cache: "no-store" });
  if (!res.ok) throw new Error(`Could not load sample data (HTTP ${res.status}).`);
  const name = url.slice(url.lastIndexOf("/") + 1) || "sample.csv";
  return new File([await res.text()], name, { type: "text/csv" });
}
