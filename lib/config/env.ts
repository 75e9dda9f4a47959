import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import type { ModelConfig } from "@/lib/models/types";
import { ConfigurationMissingError } from "@/lib/evaluation/errors";

const DEFAULT_SECRET_FILE = "/run/secrets/gemini_api_key";

const envSchema = z.object({
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_API_KEY_FILE: z.string().default(DEFAULT_SECRET_FILE),
  GEMINI_MODEL: z.string().min(1).default("gemini-2.5-flash"),
  GEMINI_BASE_URL: z.string().url().optional(),
  JSON_EXTRACTION_STRATEGY: z.enum(["greedy", "balanced"]).default("greedy"),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export function getEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }

  cachedEnv = parsed.data;
  return cachedEnv;
}

export function resetEnvCache(): void {
  cachedEnv = null;
}

export const MISSING_KEY_MESSAGE = [
  "Missing GEMINI_API_KEY.",
  "",
  "Secret store: write the key to /run/secrets/gemini_api_key,",
  "or point GEMINI_API_KEY_FILE at the file holding it.",
  "",
  "Environment: set the variable and restart, e.g. export GEMINI_API_KEY=YOUR_KEY_HERE",
  "(locally, a GEMINI_API_KEY line in .env.local works too).",
].join("\n");

function readSecretFile(filePath: string): string | undefined {
  if (!existsSync(filePath)) {
    return undefined;
  }

  const value = readFileSync(filePath, "utf8").trim();
  return value || undefined;
}

/** Resolves the Gemini credential. The secret file wins over the environment variable. */
export function resolveGeminiApiKey(env: Env = getEnv()): string {
  const fromSecret = readSecretFile(env.GEMINI_API_KEY_FILE);
  if (fromSecret) {
    return fromSecret;
  }

  const fromEnv = env.GEMINI_API_KEY?.trim();
  if (fromEnv) {
    return fromEnv;
  }

  throw new ConfigurationMissingError(MISSING_KEY_MESSAGE);
}

export function checkConfiguration(): ConfigurationMissingError | null {
  try {
    resolveGeminiApiKey();
    return null;
  } catch (error) {
    if (error instanceof ConfigurationMissingError) {
      return error;
    }
    throw error;
  }
}

export function buildModelConfig(env: Env = getEnv()): ModelConfig {
  return {
    provider: "gemini",
    model: env.GEMINI_MODEL,
    apiKey: resolveGeminiApiKey(env),
    baseUrl: env.GEMINI_BASE_URL,
  };
}
