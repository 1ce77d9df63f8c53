// config.ts
import "dotenv/config";
import path from "path";
import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATA_FILE: z.string().min(1).default("data/inventory.json"),
  SITE_URL: z.preprocess(
    v => (v === "" ? undefined : v),
    z
      .string()
      .url()
      .optional()
      .transform(v => (v ? v.replace(/\/+$/, "") : undefined))
  ),
  ALLOW_ANONYMOUS: z
    .string()
    .optional()
    .transform(v => str2bool(v))
});

export interface AppConfig {
  port: number;
  dataFile: string;
  siteUrl?: string;
  allowAnonymous: boolean;
}

/**
 * Truthy spellings accepted for boolean settings and flags.
 */
export function str2bool(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value !== "string") return false;
  return ["1", "y", "yes", "t", "true", "on"].includes(value.trim().toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${issues}`);
  }

  return {
    port: parsed.data.PORT,
    dataFile: path.resolve(process.cwd(), parsed.data.DATA_FILE),
    siteUrl: parsed.data.SITE_URL,
    allowAnonymous: parsed.data.ALLOW_ANONYMOUS
  };
}
