// src/lib/config.ts
import { z } from "zod";

export type AppConfig = {
  maxUploadBytes: number;
  allowedContentTypes: string[];
};

export const DEFAULT_CONFIG: AppConfig = {
  maxUploadBytes: 10 * 1024 * 1024,
  allowedContentTypes: ["text/csv", "application/vnd.ms-excel", "application/csv"],
};

const EnvSchema = z.object({
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(DEFAULT_CONFIG.maxUploadBytes),
  ALLOWED_CONTENT_TYPES: z
    .string()
    .default(DEFAULT_CONFIG.allowedContentTypes.join(","))
    .transform((s) => s.split(",").map((t) => t.trim().toLowerCase()).filter(Boolean))
    .pipe(z.array(z.string()).min(1)),
});

export function loadConfig(env: Partial<NodeJS.ProcessEnv> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse({
    MAX_UPLOAD_BYTES: env.MAX_UPLOAD_BYTES || undefined,
    ALLOWED_CONTENT_TYPES: env.ALLOWED_CONTENT_TYPES || undefined,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    console.warn(`[config] invalid environment, using defaults (${issues})`);
    return DEFAULT_CONFIG;
  }
  return {
    maxUploadBytes: parsed.data.MAX_UPLOAD_BYTES,
    allowedContentTypes: parsed.data.ALLOWED_CONTENT_TYPES,
  };
}
