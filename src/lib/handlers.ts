// src/lib/handlers.ts
import { randomUUID } from "crypto";
import { z } from "zod";
import type { Charts, ErrorBody, Preview, Summary, Table, UploadResponse } from "./types";
import type { DatasetBundle, DatasetStore } from "./store";
import { DEFAULT_CONFIG, type AppConfig } from "./config";
import { parseCsv, TableError } from "./table";
import { analyzeTable } from "./analyze";

export type ApiResult<T> =
  | { ok: true; status: number; body: T }
  | { ok: false; status: number; body: ErrorBody };

export function ok<T>(data: T, status = 200): ApiResult<T> { return { ok: true, status, body: data }; }
export function err(message: string, status = 400): ApiResult<never> { return { ok: false, status, body: { error: message } }; }

export type UploadedFile = {
  name: string;
  type: string;
  bytes: Uint8Array;
};

export type UploadOptions = {
  config?: AppConfig;
  newId?: () => string;
};

function formatFileSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function baseContentType(type: string): string {
  return type.split(";")[0].trim().toLowerCase();
}

/* ---------------------- Upload ---------------------- */

export function uploadDataset(
  store: DatasetStore,
  file: UploadedFile,
  { config = DEFAULT_CONFIG, newId = randomUUID }: UploadOptions = {},
): ApiResult<UploadResponse> {
  if (!config.allowedContentTypes.includes(baseContentType(file.type))) {
    return err("Unsupported file type. Please upload a CSV file.");
  }
  if (file.bytes.length === 0) return err("Uploaded file is empty.");
  if (file.bytes.length > config.maxUploadBytes) {
    return err(`File too large. Maximum allowed size is ${formatFileSize(config.maxUploadBytes)}.`, 413);
  }

  let table: Table;
  try {
    const text = new TextDecoder("utf-8", { fatal: true }).decode(file.bytes);
    table = parseCsv(text);
  } catch (e) {
    const reason = e instanceof TableError || e instanceof TypeError ? e.message : String(e);
    console.warn(`[upload] could not parse "${file.name}": ${reason}`);
    return err("Failed to parse CSV file.");
  }

  const analysis = analyzeTable(table);
  const bundle: DatasetBundle = {
    id: newId(),
    filename: file.name,
    createdAt: new Date().toISOString(),
    table,
    ...analysis,
  };
  store.save(bundle);
  console.log(`[upload] stored ${bundle.id} from "${file.name}" (${table.rows.length} rows, ${table.columns.length} columns)`);

  return ok({ dataset_id: bundle.id });
}

/* ---------------------- Reads ---------------------- */

const DatasetId = z.string().uuid();

function findBundle(store: DatasetStore, rawId: string): ApiResult<DatasetBundle> {
  const id = DatasetId.safeParse(rawId);
  if (!id.success) return err("Invalid dataset id.", 422);
  const bundle = store.get(id.data.toLowerCase());
  return bundle ? ok(bundle) : err("Dataset not found.", 404);
}

function pick<K extends "summary" | "charts" | "preview">(store: DatasetStore, rawId: string, key: K): ApiResult<DatasetBundle[K]> {
  const found = findBundle(store, rawId);
  return found.ok ? ok(found.body[key]) : found;
}

export function getSummary(store: DatasetStore, id: string): ApiResult<Summary> {
  return pick(store, id, "summary");
}

export function getCharts(store: DatasetStore, id: string): ApiResult<Charts> {
  return pick(store, id, "charts");
}

export function getPreview(store: DatasetStore, id: string): ApiResult<Preview> {
  return pick(store, id, "preview");
}
