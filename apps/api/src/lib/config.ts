import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().min(1).optional(),
});

export type ApiConfig = {
  port: number;
  corsOrigin: string | null;
};

/**
 * Load the first .env found; never overrides variables already set.
 */
export function bootstrapEnv(): string | null {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.resolve(process.cwd(), ".env"),
    path.resolve(process.cwd(), "../../.env"),
    path.resolve(here, "../../../../.env"),
  ];

  for (const envPath of candidates) {
    if (!fs.existsSync(envPath)) continue;
    loadEnv({ path: envPath, override: false });
    return envPath;
  }
  return null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = envSchema.parse({
    PORT: env.PORT || undefined,
    CORS_ORIGIN: env.CORS_ORIGIN || undefined,
  });
  return {
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN ?? null,
  };
}
