// src/lib/store.ts
import type { Charts, Preview, Summary, Table, TypeMap } from "./types";

export type DatasetBundle = Readonly<{
  id: string;
  filename: string;
  createdAt: string;
  table: Table;
  types: TypeMap;
  summary: Summary;
  charts: Charts;
  preview: Preview;
}>;

/** Keyed bundle cache. Bundles are written once and never updated. */
export interface DatasetStore {
  save(bundle: DatasetBundle): void;
  get(id: string): DatasetBundle | undefined;
  size(): number;
}

// Date cells keep their internal time slot writable; everything else is locked.
function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export class InMemoryDatasetStore implements DatasetStore {
  private readonly datasets = new Map<string, DatasetBundle>();

  save(bundle: DatasetBundle): void {
    this.datasets.set(bundle.id, deepFreeze(bundle));
  }

  get(id: string): DatasetBundle | undefined {
    return this.datasets.get(id);
  }

  size(): number {
    return this.datasets.size;
  }
}

// Next.js dev reloads re-evaluate modules; park the store on globalThis so
// uploads survive between /api/upload and the read routes.
declare global {
  // eslint-disable-next-line no-var
  var __QUICKLOOK_DATASETS__: DatasetStore | undefined;
}

export function getDatasetStore(): DatasetStore {
  const store = globalThis.__QUICKLOOK_DATASETS__ ?? new InMemoryDatasetStore();
  globalThis.__QUICKLOOK_DATASETS__ = store;
  return store;
}
