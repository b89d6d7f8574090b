import { z } from "zod";
import { ValidationError } from "../errors.js";

export const ProviderNameSchema = z.enum(["lmstudio", "mock"]);
export type ProviderName = z.infer<typeof ProviderNameSchema>;

export const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const DEFAULT_LOG_LEVEL: LogLevel = "info";

/**
 * Log level for loggers created before `loadConfig()` runs.
 * Blank or unknown values fall back to the default; `loadConfig()` reports
 * unknown ones as a configuration error.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const result = LogLevelSchema.safeParse(value);
  return result.success ? result.data : DEFAULT_LOG_LEVEL;
}

const EnvSchema = z.object({
  LLM_PROVIDER: ProviderNameSchema.default("lmstudio"),
  LLM_BASE_URL: z.string().url().default("http://localhost:1234"),
  LLM_MODEL: z.string().min(1).default("local-model"),
  LLM_API_KEY: z.string().min(1).default("lm-studio"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
  LOG_LEVEL: LogLevelSchema.default(DEFAULT_LOG_LEVEL),
});

export interface LLMConfig {
  provider: ProviderName;
  baseUrl: string;
  model: string;
  apiKey: string;
  timeoutMs: number;
}

export interface AppConfig {
  llm: LLMConfig;
  server: { host: string; port: number };
  logLevel: LogLevel;
}

/**
 * Read application settings from environment variables.
 * Empty strings count as unset so a blank `.env` entry falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const result = EnvSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ValidationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  const parsed = result.data;
  return {
    llm: {
      provider: parsed.LLM_PROVIDER,
      baseUrl: parsed.LLM_BASE_URL,
      model: parsed.LLM_MODEL,
      apiKey: parsed.LLM_API_KEY,
      timeoutMs: parsed.LLM_TIMEOUT_MS,
    },
    server: { host: parsed.HOST, port: parsed.PORT },
    logLevel: parsed.LOG_LEVEL,
  };
}
