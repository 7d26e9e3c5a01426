import { z } from "zod";

const booleanFromEnv = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const configSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8123),
  HOST: z.string().min(1).default("127.0.0.1"),
  DB_PATH: z.string().min(1).default("finance.db"),
  DEFAULT_CURRENCY: z
    .string()
    .regex(/^[A-Z]{3}$/, "DEFAULT_CURRENCY must be a 3-letter ISO code")
    .default("USD"),
  MAX_RECEIPT_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  SEED_SAMPLE_DATA: booleanFromEnv.default("true"),
  STATIC_DIR: z.string().min(1).default("dist/webapp"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type AppConfig = z.infer<typeof configSchema>;
export type LogLevel = AppConfig["LOG_LEVEL"];

export class ConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // Empty strings behave like unset variables.
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""),
  );
  const parsed = configSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  return parsed.data;
}
