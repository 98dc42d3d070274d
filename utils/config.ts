// utils/config.ts
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "@/utils/logger";

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";
export const DEFAULT_ALLOWED_ORIGINS = ["http://localhost:8501"];

/** Settings read once when the server starts and passed down explicitly. */
export interface AppConfig {
  geminiApiKey: string | null;
  geminiModel: string;
  allowedOrigins: string[];
  logLevel: LogLevel;
}

// `FOO=` in a .env file means "unset"
const blank = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const EnvSchema = z.object({
  GEMINI_API_KEY: z.preprocess(blank, z.string().trim().optional()),
  GEMINI_MODEL: z.preprocess(blank, z.string().trim().default(DEFAULT_GEMINI_MODEL)),
  ALLOWED_ORIGINS: z.preprocess(blank, z.string().optional()),
  LOG_LEVEL: z.preprocess(blank, z.enum(LOG_LEVELS).optional()),
  NODE_ENV: z.string().optional(),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid environment: ${issue.path.join(".")}: ${issue.message}`);
  }
  const e = parsed.data;

  return {
    geminiApiKey: e.GEMINI_API_KEY ?? null,
    geminiModel: e.GEMINI_MODEL,
    allowedOrigins: e.ALLOWED_ORIGINS
      ? e.ALLOWED_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean)
      : DEFAULT_ALLOWED_ORIGINS,
    logLevel: e.LOG_LEVEL ?? (e.NODE_ENV === "development" ? "debug" : "info"),
  };
}

export function isGeminiConfigured(config: AppConfig): boolean {
  return config.geminiApiKey !== null;
}
