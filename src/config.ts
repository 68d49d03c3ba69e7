import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };
import { ConfigurationError } from "./errors";
import { PROVIDER_KINDS, ProviderKind, ProviderSettings } from "./providers/types";
import { VNPT_DEFAULT_BASE_URL } from "./providers/vnpt";

// Centralized single dotenv.config() call. Prefer the project-root .env
// (one level above src/), otherwise dotenv's default lookup from cwd.
(() => {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const rootEnv = path.resolve(here, "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export type Env = Record<string, string | undefined>;

export interface Config {
  ARTIFACTS_DIR: string;
  INDEX_STORE_PATH: string;
  SAFETY_STORE_PATH: string;
  KNOWLEDGE_DIR: string;
  SAFETY_SEEDS_PATH: string;
  SAFETY_THRESHOLD: number;
  RRF_K: number;
  LEXICAL_WEIGHT: number;
  SEMANTIC_WEIGHT: number;
  LEXICAL_FAN_OUT: number;
  SEMANTIC_FAN_OUT: number;
  TOP_K: number;
  EMBEDDING_TIMEOUT_MS: number;
  LLM_TIMEOUT_MS: number;
  QUERY_DEADLINE_MS: number;
  MAX_CONCURRENT_QUERIES: number;
  LLM: ProviderSettings;
  EMBEDDING: ProviderSettings;
  VERBOSE: boolean;
  /** 'stdio' (default) or 'http' / 'streamable-http'. */
  MCP_TRANSPORT: string;
  MCP_PORT: number;
  HOST: string;
}

const DEFAULT_OLLAMA_URL = "http://localhost:11434/v1";
const DEFAULT_AZURE_API_VERSION = "2024-02-01";

const str = (env: Env, key: string): string | undefined => env[key]?.trim() || undefined;

/** Tolerant truthy parsing (supports several common forms). */
function flag(env: Env, key: string): boolean {
  const v = (env[key] ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/** Finite number within [min, max], else the fallback. */
function num(env: Env, key: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = str(env, key);
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= min && n <= max ? n : fallback;
}

function int(env: Env, key: string, fallback: number, min: number, max?: number): number {
  return Math.floor(num(env, key, fallback, min, max));
}

function isProviderKind(v: string): v is ProviderKind {
  return PROVIDER_KINDS.some((k) => k === v);
}

function required(env: Env, key: string, kind: ProviderKind): string {
  const v = str(env, key);
  if (!v) throw new ConfigurationError(`${key} is required for provider "${kind}"`);
  return v;
}

/**
 * Read one provider block (`LLM_*` or `EMBEDDING_*`). An unknown provider
 * kind or a missing credential is a ConfigurationError.
 */
function providerSettings(env: Env, prefix: "LLM" | "EMBEDDING", defaultModel: string): ProviderSettings {
  const kind = (str(env, `${prefix}_PROVIDER`) ?? "ollama").toLowerCase();
  if (!isProviderKind(kind)) {
    throw new ConfigurationError(
      `${prefix}_PROVIDER must be one of ${PROVIDER_KINDS.join(", ")} (got "${kind}")`,
    );
  }
  const model = str(env, `${prefix}_MODEL`) ?? defaultModel;
  const apiKey = str(env, `${prefix}_API_KEY`);
  switch (kind) {
    case "ollama":
      return {
        kind,
        baseUrl: str(env, `${prefix}_BASE_URL`) ?? DEFAULT_OLLAMA_URL,
        model,
        ...(apiKey ? { apiKey } : {}),
      };
    case "azure":
      return {
        kind,
        baseUrl: required(env, `${prefix}_BASE_URL`, kind),
        model,
        apiKey: required(env, `${prefix}_API_KEY`, kind),
        apiVersion: str(env, "AZURE_API_VERSION") ?? DEFAULT_AZURE_API_VERSION,
      };
    case "vnpt":
      return {
        kind,
        baseUrl: str(env, `${prefix}_BASE_URL`) ?? VNPT_DEFAULT_BASE_URL,
        model,
        apiKey: required(env, `${prefix}_API_KEY`, kind),
        tokenId: required(env, "VNPT_TOKEN_ID", kind),
        tokenKey: required(env, "VNPT_TOKEN_KEY", kind),
      };
  }
}

/**
 * Parse the environment into one explicit configuration object. Numeric
 * values outside their range fall back to the default; provider problems
 * throw {@link ConfigurationError}.
 */
export function getConfig(env: Env = process.env): Config {
  const ARTIFACTS_DIR = str(env, "ARTIFACTS_DIR") ?? "artifacts";
  return {
    ARTIFACTS_DIR,
    INDEX_STORE_PATH: str(env, "INDEX_STORE_PATH") ?? path.join(ARTIFACTS_DIR, "knowledge-store.json"),
    SAFETY_STORE_PATH: str(env, "SAFETY_STORE_PATH") ?? path.join(ARTIFACTS_DIR, "safety-store.json"),
    KNOWLEDGE_DIR: str(env, "KNOWLEDGE_DIR") ?? "data/knowledge",
    SAFETY_SEEDS_PATH: str(env, "SAFETY_SEEDS_PATH") ?? "data/safety-seeds.json",
    SAFETY_THRESHOLD: num(env, "SAFETY_THRESHOLD", 0.85, 0, 1),
    RRF_K: num(env, "RRF_K", 60, 0),
    LEXICAL_WEIGHT: num(env, "LEXICAL_WEIGHT", 1, 0),
    SEMANTIC_WEIGHT: num(env, "SEMANTIC_WEIGHT", 1, 0),
    LEXICAL_FAN_OUT: int(env, "LEXICAL_FAN_OUT", 20, 1, 1000),
    SEMANTIC_FAN_OUT: int(env, "SEMANTIC_FAN_OUT", 20, 1, 1000),
    TOP_K: int(env, "TOP_K", 5, 1, 100),
    EMBEDDING_TIMEOUT_MS: int(env, "EMBEDDING_TIMEOUT_MS", 30_000, 1),
    LLM_TIMEOUT_MS: int(env, "LLM_TIMEOUT_MS", 60_000, 1),
    QUERY_DEADLINE_MS: int(env, "QUERY_DEADLINE_MS", 120_000, 0),
    MAX_CONCURRENT_QUERIES: int(env, "MAX_CONCURRENT_QUERIES", 4, 1, 64),
    LLM: providerSettings(env, "LLM", "qwen2.5:3b"),
    EMBEDDING: providerSettings(env, "EMBEDDING", "nomic-embed-text"),
    VERBOSE: flag(env, "VERBOSE"),
    MCP_TRANSPORT: (env.MCP_TRANSPORT ?? "").trim().toLowerCase(),
    MCP_PORT: int(env, "MCP_PORT", 3000, 1, 65535),
    HOST: str(env, "HOST") ?? "127.0.0.1",
  };
}

/** "kind:model" label for status output. */
export function describeProvider(settings: ProviderSettings): string {
  return `${settings.kind}:${settings.model}`;
}
