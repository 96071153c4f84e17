import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Project root (one level above src/). */
export const PROJECT_ROOT = path.resolve(__dirname, "..");

// Single dotenv.config() call for the whole process. Prefer the project-root
// .env so starting from another working directory still picks it up.
(() => {
  const rootEnv = path.join(PROJECT_ROOT, ".env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

const PackageJson = z.object({ name: z.string(), version: z.string() });

/** Application name / version sourced from package.json. */
export const { name: APP_NAME, version: APP_VERSION } = PackageJson.parse(
  JSON.parse(fsSync.readFileSync(path.join(PROJECT_ROOT, "package.json"), "utf8")),
);

/** Bundled default corpus. */
export const DEFAULT_CORPUS_PATH = path.join(PROJECT_ROOT, "data", "documents.json");

/** Raised when required configuration is missing or unusable. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type Transport = "http" | "stdio";

export interface Config {
  OPENAI_API_KEY: string;
  OPENAI_MODEL: string;
  OPENAI_TIMEOUT_MS: number;
  MAX_TOKENS: number;
  TEMPERATURE: number;
  MODEL_NAME: string;
  EMBEDDING_DIMENSIONS: number;
  CORPUS_PATH: string;
  TOP_K: number;
  SIMILARITY_THRESHOLD: number;
  PORT: number;
  HOST: string;
  CORS_ORIGIN: string[];
  TRANSPORT: Transport;
  VERBOSE: boolean;
}

/** Upper bound for top_k, shared by the HTTP and MCP request validators. */
export const MAX_TOP_K = 50;

/** Parse a positive integer, clamped to [min, max]; falls back on anything unusable. */
export function parseIntEnv(raw: string | undefined, fallback: number, min: number, max: number) {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  if (!Number.isFinite(n)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(n)));
}

export function parseFloatEnv(raw: string | undefined, fallback: number, min: number, max: number) {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= min && n <= max ? n : fallback;
}

/** Tolerant truthy parsing ("1", "true", "yes", "on"). */
export function parseBoolEnv(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/**
 * Resolve runtime configuration from an environment map (process.env by
 * default). Only OPENAI_API_KEY is required.
 *
 * @throws {ConfigError} If OPENAI_API_KEY is unset or blank.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const OPENAI_API_KEY = env.OPENAI_API_KEY?.trim();
  if (!OPENAI_API_KEY) {
    throw new ConfigError("OPENAI_API_KEY is not set (add it to .env or the environment)");
  }

  const corpus = env.CORPUS_PATH?.trim();
  const transport = (env.TRANSPORT ?? "").trim().toLowerCase();

  return {
    OPENAI_API_KEY,
    OPENAI_MODEL: env.OPENAI_MODEL?.trim() || "gpt-3.5-turbo",
    OPENAI_TIMEOUT_MS: parseIntEnv(env.OPENAI_TIMEOUT_MS, 60_000, 1_000, 600_000),
    MAX_TOKENS: parseIntEnv(env.MAX_TOKENS, 150, 1, 4096),
    TEMPERATURE: parseFloatEnv(env.TEMPERATURE, 0.7, 0, 2),
    MODEL_NAME: env.MODEL_NAME?.trim() || "text-embedding-3-small",
    // 0 = the model's native size (required for models without a dimensions parameter)
    EMBEDDING_DIMENSIONS: parseIntEnv(env.EMBEDDING_DIMENSIONS, 384, 0, 3072),
    CORPUS_PATH: corpus ? path.resolve(corpus) : DEFAULT_CORPUS_PATH,
    TOP_K: parseIntEnv(env.TOP_K, 3, 1, MAX_TOP_K),
    SIMILARITY_THRESHOLD: parseFloatEnv(env.SIMILARITY_THRESHOLD, 0.6, -1, 1),
    PORT: parseIntEnv(env.PORT, 5000, 0, 65535),
    HOST: env.HOST?.trim() || "0.0.0.0",
    CORS_ORIGIN: (env.CORS_ORIGIN ?? "*")
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    TRANSPORT: transport === "stdio" ? "stdio" : "http",
    VERBOSE: parseBoolEnv(env.VERBOSE),
  };
}
