import dotenv from "dotenv";
import path from "node:path";
import { ConfigError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export type EmbedderProvider = "ollama" | "local-hash";
export type StoreBackend = "lancedb" | "memory";

export interface EmbedderConfig {
  provider: EmbedderProvider;
  model: string;
  ollamaUrl: string;
  /** Vector length of the local-hash provider; Ollama models report their own. */
  dims: number;
  batchSize: number;
}

export interface AppConfig {
  dataDir: string;
  storeBackend: StoreBackend;
  maxChunkSize: number;
  allowlistFile?: string;
  logLevel: LogLevel;
  embedder: EmbedderConfig;
}

export const DEFAULT_DATA_DIR = ".repolens";
export const DEFAULT_MAX_CHUNK_SIZE = 1000;
export const DEFAULT_EMBED_MODEL = "all-minilm";
export const DEFAULT_OLLAMA_URL = "http://127.0.0.1:11434";
export const DEFAULT_EMBED_DIMS = 384;
export const DEFAULT_EMBED_BATCH = 32;

let dotenvLoaded = false;

/** Load `.env` from the working directory once. Real environment variables win. */
export function loadDotenv(): void {
  if (dotenvLoaded) {
    return;
  }
  dotenvLoaded = true;
  dotenv.config();
}

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

function readChoice<T extends string>(
  env: NodeJS.ProcessEnv,
  key: string,
  choices: readonly T[],
  fallback: T
): T {
  const raw = readString(env, key)?.toLowerCase();
  if (raw === undefined) {
    return fallback;
  }
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new ConfigError(`${key} must be one of: ${choices.join(", ")}; got "${raw}"`);
  }
  return match;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawLevel = readString(env, "REPOLENS_LOG_LEVEL")?.toLowerCase() ?? "info";
  if (!isLogLevel(rawLevel)) {
    throw new ConfigError(`REPOLENS_LOG_LEVEL must be one of: debug, info, warn, error, silent; got "${rawLevel}"`);
  }

  const allowlist = readString(env, "REPOLENS_ALLOWLIST");

  return {
    dataDir: path.resolve(readString(env, "REPOLENS_DATA_DIR") ?? DEFAULT_DATA_DIR),
    storeBackend: readChoice(env, "REPOLENS_STORE", ["lancedb", "memory"] as const, "lancedb"),
    maxChunkSize: readPositiveInt(env, "REPOLENS_MAX_CHUNK_SIZE", DEFAULT_MAX_CHUNK_SIZE),
    allowlistFile: allowlist ? path.resolve(allowlist) : undefined,
    logLevel: rawLevel,
    embedder: {
      provider: readChoice(env, "REPOLENS_EMBEDDER", ["ollama", "local-hash"] as const, "ollama"),
      model: readString(env, "REPOLENS_EMBED_MODEL") ?? DEFAULT_EMBED_MODEL,
      ollamaUrl: readString(env, "OLLAMA_BASE_URL") ?? DEFAULT_OLLAMA_URL,
      dims: readPositiveInt(env, "REPOLENS_EMBED_DIMS", DEFAULT_EMBED_DIMS),
      batchSize: readPositiveInt(env, "REPOLENS_EMBED_BATCH", DEFAULT_EMBED_BATCH)
    }
  };
}
