// src/app/api/upload/route.ts
export const runtime = "nodejs";
export const dynamic = "force-dynamic";

import { loadConfig } from "@/lib/config";
import { err, uploadDataset } from "@/lib/handlers";
import { serverError, toResponse } from "@/lib/respond";
import { getDatasetStore } from "@/lib/store";

const config = loadConfig();

export async function POST(req: Request) {
  try {
    const form = await req.formData().catch(() => null);
    const file = form?.get("file");
    if (!file || typeof file === "string") return toResponse(err("Missing 'file' in form data."));

    const bytes = new Uint8Array(await file.arrayBuffer());
    const result = uploadDataset(getDatasetStore(), { name: file.name, type: file.type, bytes }, { config });
    return toResponse(result);
  } catch (e) {
    return serverError("upload", e);
  }
}
