/**
 * Configuration loader for the admissions RAG server
 */

import { config as loadEnv } from "dotenv";
import { resolve } from "path";
import { existsSync } from "fs";
import { ConfigurationError } from "../errors.js";

export interface ServerConfig {
  port: number;
  nodeEnv: string;
  openai: {
    apiKey: string;
    chatModel: string;
    embeddingModel: string;
    embeddingDimensions: number;
  };
  rerank: {
    enabled: boolean;
    url: string;
    apiKey: string;
    model: string;
  };
  retrieval: {
    topK: number;
    oversampleFactor: number;
    contextMaxChars: number;
    expansionCount: number;
  };
  agent: {
    maxSteps: number;
    toolTopK: number;
    deadlineMs: number;
  };
  /** Per-request deadlines for the HTTP API; 0 disables */
  timeouts: {
    requestMs: number;
    ingestMs: number;
  };
  storage: {
    databasePath: string;
    enableWalMode: boolean;
  };
  knowledgeDir: string;
}

type Env = Record<string, string | undefined>;

/**
 * Load the first .env file found in the working directory or its parent.
 * Variables already set in the shell win over the file.
 */
export function loadEnvFile(cwd: string = process.cwd()): string | null {
  const envPaths = [resolve(cwd, ".env"), resolve(cwd, "..", ".env")];

  for (const envPath of envPaths) {
    if (existsSync(envPath)) {
      const result = loadEnv({ path: envPath });
      if (!result.error) {
        console.log(`✓ Loaded environment variables from: ${envPath}`);
        return envPath;
      }
    }
  }

  console.warn("⚠ No .env file found in expected locations:");
  envPaths.forEach((p) => console.warn(`  - ${p}`));
  console.warn("Continuing with environment variables from shell/system...");
  return null;
}

function getEnvVar(env: Env, key: string, defaultValue?: string): string {
  const value = env[key];
  if (value) return value;
  if (defaultValue === undefined) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return defaultValue;
}

function getEnvBool(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (!value) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;
  throw new ConfigurationError(`Invalid boolean for ${key}: ${value}`);
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  if (isNaN(num) || num < 0) {
    throw new ConfigurationError(`Invalid number for ${key}: ${value}`);
  }
  return num;
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const cwd = process.cwd();
  const knowledgeDir = getEnvVar(env, "KNOWLEDGE_DIR", resolve(cwd, "knowledge"));

  const rerankEnabled = getEnvBool(env, "ENABLE_RERANK", true);
  const rerankUrl = getEnvVar(env, "RERANK_URL", "");
  if (rerankEnabled && !rerankUrl) {
    throw new ConfigurationError(
      "ENABLE_RERANK is true but RERANK_URL is not set",
    );
  }

  const oversampleFactor = getEnvNumber(env, "RAG_OVERSAMPLE_FACTOR", 3);
  if (oversampleFactor < 1) {
    throw new ConfigurationError("RAG_OVERSAMPLE_FACTOR must be at least 1");
  }

  return {
    port: getEnvNumber(env, "PORT", 3000),
    nodeEnv: getEnvVar(env, "NODE_ENV", "development"),
    openai: {
      apiKey: getEnvVar(env, "OPENAI_API_KEY"),
      chatModel: getEnvVar(env, "OPENAI_CHAT_MODEL", "gpt-4o-mini"),
      embeddingModel: getEnvVar(
        env,
        "OPENAI_EMBEDDING_MODEL",
        "text-embedding-3-small",
      ),
      embeddingDimensions: getEnvNumber(env, "EMBEDDING_DIMENSIONS", 1024),
    },
    rerank: {
      enabled: rerankEnabled,
      url: rerankUrl,
      apiKey: getEnvVar(env, "RERANK_API_KEY", ""),
      model: getEnvVar(env, "RERANK_MODEL", "rerank-v3.5"),
    },
    retrieval: {
      topK: getEnvNumber(env, "RAG_TOP_K", 5),
      oversampleFactor,
      contextMaxChars: getEnvNumber(env, "RAG_CONTEXT_MAX_CHARS", 12000),
      expansionCount: getEnvNumber(env, "EXPANSION_COUNT", 3),
    },
    agent: {
      maxSteps: getEnvNumber(env, "AGENT_MAX_STEPS", 5),
      toolTopK: getEnvNumber(env, "AGENT_TOOL_TOP_K", 4),
      deadlineMs: getEnvNumber(env, "AGENT_DEADLINE_MS", 60000),
    },
    timeouts: {
      requestMs: getEnvNumber(env, "REQUEST_TIMEOUT_MS", 30000),
      ingestMs: getEnvNumber(env, "INGEST_TIMEOUT_MS", 300000),
    },
    storage: {
      databasePath: getEnvVar(
        env,
        "DATABASE_PATH",
        resolve(cwd, "data", "admissions-rag.db"),
      ),
      enableWalMode: getEnvBool(env, "DATABASE_WAL_MODE", true),
    },
    knowledgeDir,
  };
}
