// src/lib/respond.ts
import { NextResponse } from "next/server";
import type { ApiResult } from "./handlers";

export function toResponse<T>(result: ApiResult<T>) {
  return NextResponse.json(result.body, { status: result.status });
}

export function serverError(scope: string, e: unknown) {
  console.error(`[${scope}] Unexpected error`, e);
  return NextResponse.json({ error: "Internal server error." }, { status: 500 });
}

export type DatasetRouteContext = {
  params: Promise<{ datasetId: string }> | { datasetId: string };
};

// Next.js 15 hands params over as a Promise, older versions as a plain object
export async function datasetIdFrom(context: DatasetRouteContext): Promise<string> {
  const { datasetId } = await Promise.resolve(context.params);
  return datasetId;
}
