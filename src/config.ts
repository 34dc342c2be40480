import { config as loadDotenv } from "dotenv";
import path from "node:path";
import { z } from "zod";
import { env, parseBoolEnv, parseIntEnv, type EnvSource } from "./env.js";
import { TEMPLATE_IDS } from "./lesson/templates.js";

export const LLM_PROVIDERS = ["openrouter", "gemini"] as const;
export type LlmProviderName = (typeof LLM_PROVIDERS)[number];

const DEFAULT_MODELS: Record<LlmProviderName, string> = {
  openrouter: "deepseek/deepseek-r1:free",
  gemini: "gemini-1.5-flash",
};

const API_KEY_VARS: Record<LlmProviderName, string> = {
  openrouter: "OPENROUTER_API_KEY",
  gemini: "GEMINI_API_KEY",
};

/**
 * Loads `.env.local` then `.env` from the working directory. Values already in
 * the process environment win.
 */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  loadDotenv({ path: path.resolve(cwd, ".env.local"), override: false });
  loadDotenv({ path: path.resolve(cwd, ".env"), override: false });
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const SamplingSchema = z.object({
  temperature: z.coerce.number().min(0).max(2),
  maxOutputTokens: z.coerce.number().int().positive(),
  topP: z.number().min(0).max(1),
  frequencyPenalty: z.number(),
  presencePenalty: z.number(),
});

const ConfigSchema = z.object({
  provider: z.enum(LLM_PROVIDERS),
  apiKeyVar: z.string(),
  apiKey: z.string(),
  model: z.string().min(1),
  port: z.coerce.number().int().min(0).max(65535),
  host: z.string().min(1),
  corsOrigin: z
    .string()
    .url()
    .transform((v) => v.replace(/\/+$/, "")),
  templateId: z.enum(TEMPLATE_IDS),
  sampling: SamplingSchema,
  timeoutMs: z.number().int().positive(),
  rawLogMaxChars: z.number().int().positive(),
  maxBodyBytes: z.number().int().positive(),
  allowDegradedStart: z.boolean(),
});

export type AppConfig = Readonly<z.infer<typeof ConfigSchema>>;
export type SamplingDefaults = z.infer<typeof SamplingSchema>;

function pickProvider(source: EnvSource): string {
  const explicit = (env("LLM_PROVIDER", source) || "").toLowerCase();
  if (explicit) return explicit;
  if (env("OPENROUTER_API_KEY", source)) return "openrouter";
  if (env("GEMINI_API_KEY", source)) return "gemini";
  return "openrouter";
}

function isProviderName(v: string): v is LlmProviderName {
  return (LLM_PROVIDERS as readonly string[]).includes(v);
}

/**
 * Builds the immutable process configuration. The credential may be empty
 * here; the gateway constructor is what refuses to run without one.
 */
export function loadConfig(source: EnvSource = process.env): AppConfig {
  const provider = pickProvider(source);
  const known = isProviderName(provider);

  const parsed = ConfigSchema.safeParse({
    provider,
    apiKeyVar: known ? API_KEY_VARS[provider] : "",
    apiKey: known ? env(API_KEY_VARS[provider], source) ?? "" : "",
    model: env("LLM_MODEL", source) ?? (known ? DEFAULT_MODELS[provider] : ""),
    port: env("PORT", source) ?? 8080,
    host: env("HOST", source) ?? "0.0.0.0",
    corsOrigin: env("CORS_ORIGIN", source) ?? "http://localhost:3000",
    templateId: env("TEMPLATE_ID", source) ?? "flat-merged",
    sampling: {
      temperature: env("LLM_TEMPERATURE", source) ?? 0.5,
      maxOutputTokens: env("LLM_MAX_OUTPUT_TOKENS", source) ?? 2048,
      topP: 0.9,
      frequencyPenalty: 0.2,
      presencePenalty: 0.2,
    },
    timeoutMs: parseIntEnv("LLM_TIMEOUT_MS", 60_000, 1_000, 600_000, source),
    rawLogMaxChars: parseIntEnv("RAW_LOG_MAX_CHARS", 4_000, 200, 200_000, source),
    maxBodyBytes: parseIntEnv("MAX_BODY_BYTES", 1024 * 1024, 1024, 50 * 1024 * 1024, source),
    allowDegradedStart: parseBoolEnv("ALLOW_DEGRADED_START", source),
  });

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`),
    );
  }
  return Object.freeze(parsed.data);
}
