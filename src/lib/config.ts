import { contractViolation } from "@/lib/errors";

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_CHAT_MODEL = "gpt-4.1-mini";
export const DEFAULT_EMBEDDINGS_MODEL = "text-embedding-3-small";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

export type EngineConfig = {
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  chatModel: string;
  summaryModel: string;
  embeddingsModel: string;
  databaseUrl: string | null;
  maxIterations: number;
  streamMaxRetries: number;
  streamRetryDelayMs: number;
  summaryConcurrency: number;
  evidenceK: number;
  mmrLambda: number;
  citationMaxRetries: number;
  logCosts: boolean;
};

type Env = Record<string, string | undefined>;

export function parseBooleanFlag(value: string | undefined): boolean | null {
  if (!value) {
    return null;
  }

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }

  if (FALSE_VALUES.has(normalized)) {
    return false;
  }

  return null;
}

function readString(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = readString(env, name);
  if (raw === null) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw contractViolation(`${name} must be an integer >= ${min} (got "${raw}")`);
  }

  return parsed;
}

function readUnitInterval(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === null) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw contractViolation(`${name} must be a number between 0 and 1 (got "${raw}")`);
  }

  return parsed;
}

export function loadConfig(env: Env = process.env): EngineConfig {
  const chatModel = readString(env, "OPENAI_CHAT_MODEL") ?? DEFAULT_CHAT_MODEL;

  return {
    openaiApiKey: readString(env, "OPENAI_API_KEY"),
    openaiBaseUrl: (readString(env, "OPENAI_BASE_URL") ?? DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, ""),
    chatModel,
    summaryModel: readString(env, "OPENAI_SUMMARY_MODEL") ?? chatModel,
    embeddingsModel: readString(env, "OPENAI_EMBEDDINGS_MODEL") ?? DEFAULT_EMBEDDINGS_MODEL,
    databaseUrl: readString(env, "DATABASE_URL"),
    maxIterations: readInteger(env, "AGENT_MAX_ITERATIONS", 10, 1),
    streamMaxRetries: readInteger(env, "STREAM_MAX_RETRIES", 3, 0),
    streamRetryDelayMs: readInteger(env, "STREAM_RETRY_DELAY_MS", 5000, 0),
    summaryConcurrency: readInteger(env, "SUMMARY_CONCURRENCY", 4, 1),
    evidenceK: readInteger(env, "EVIDENCE_K", 5, 1),
    mmrLambda: readUnitInterval(env, "MMR_LAMBDA", 0.9),
    citationMaxRetries: readInteger(env, "CITATION_MAX_RETRIES", 2, 0),
    logCosts: parseBooleanFlag(env.DEBUG_COST) ?? false
  };
}
