import dotenv from "dotenv";
import { z } from "zod";
dotenv.config();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3017),
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),
  LLM_API_URL: z.string().url().default("https://api.openai.com/v1/chat/completions"),
  LLM_MODEL: z.string().min(1).default("gpt-4"),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(400),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  // vacío cuenta como "sin clave"
  OPENAI_API_KEY: z
    .string()
    .optional()
    .transform((v) => (v?.trim() ? v.trim() : undefined)),
  SESSION_TTL_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
});

export type AppConfig = z.infer<typeof envSchema>;

export function readConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${detail}`);
  }
  return parsed.data;
}

export const config = readConfig();

export const PORT = config.PORT;
export const NODE_ENV = config.NODE_ENV;
