// src/config/assistant.config.ts
import { registerAs } from '@nestjs/config';
import { cpus } from 'os';

export type VectorBackendKind = 'pgvector' | 'qdrant';
export type SessionBackendKind = 'memory' | 'redis';

export interface AssistantConfig {
  openai: {
    apiKey: string;
    model: string;
    embeddingModel: string;
    embeddingsUrl: string;
    timeoutMs: number;
  };
  vector: {
    backend: VectorBackendKind;
    documentsTable: string;
    qdrantUrl: string;
    qdrantApiKey: string;
    qdrantCollection: string;
    timeoutMs: number;
  };
  retrieval: {
    maxResults: number;
    confidenceThreshold: number;
    minContentChars: number;
  };
  search: {
    tavilyApiKey: string;
    endpoint: string;
    allowedDomains: string[];
    maxResults: number;
    maxAttempts: number;
    timeoutMs: number;
    retryDelayMs: number;
    cacheTtlMs: number;
  };
  fetch: {
    timeoutMs: number;
    maxAttempts: number;
    retryDelayMs: number;
    cacheTtlMs: number;
    maxSourceChars: number;
  };
  summarization: {
    concurrency: number;
    contextChars: number;
  };
  context: {
    tokenBudget: number;
  };
  sessions: {
    backend: SessionBackendKind;
    redisUrl: string;
    keyPrefix: string;
    idleTtlMs: number;
    activityWindowMs: number;
    readCacheTtlMs: number;
  };
  chat: {
    timeoutMs: number;
    statusTimeoutMs: number;
    workerPoolSize: number;
    terminalStatusTtlMs: number;
    staleProcessingMs: number;
    sweepIntervalMs: number;
  };
}

type Env = Record<string, string | undefined>;

const HOUR_MS = 60 * 60 * 1000;

// ---------------------------------------------------------------------------
// env helpers
// ---------------------------------------------------------------------------

function str(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function int(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function float(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new Error(`${key} must be a number in [${min}, ${max}], got "${raw}"`);
  }
  return value;
}

function list(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (!raw) return fallback;
  const items = raw
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);
  return items.length ? items : fallback;
}

function oneOf<T extends string>(env: Env, key: string, allowed: readonly T[], fallback: T): T {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  const match = allowed.find((candidate) => candidate === raw);
  if (!match) {
    throw new Error(`${key} must be one of ${allowed.join('|')}, got "${raw}"`);
  }
  return match;
}

function identifier(env: Env, key: string, fallback: string): string {
  const value = str(env, key, fallback);
  if (!/^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/.test(value)) {
    throw new Error(`${key} is not a valid table name: "${value}"`);
  }
  return value;
}

export function defaultWorkerPoolSize(): number {
  return Math.min(cpus().length + 4, 16);
}

// ---------------------------------------------------------------------------

export function buildAssistantConfig(env: Env): AssistantConfig {
  return {
    openai: {
      apiKey: str(env, 'OPENAI_API_KEY', ''),
      model: str(env, 'OPENAI_MODEL', 'gpt-4o-mini'),
      embeddingModel: str(env, 'EMBEDDING_MODEL', 'text-embedding-3-small'),
      embeddingsUrl: str(env, 'OPENAI_EMBEDDINGS_URL', 'https://api.openai.com/v1/embeddings'),
      timeoutMs: int(env, 'LLM_TIMEOUT_MS', 60_000, 1),
    },
    vector: {
      backend: oneOf(env, 'VECTOR_BACKEND', ['pgvector', 'qdrant'] as const, 'pgvector'),
      documentsTable: identifier(env, 'PG_DOCUMENTS_TABLE', 'legal_documents'),
      qdrantUrl: str(env, 'QDRANT_URL', 'http://localhost:6333'),
      qdrantApiKey: str(env, 'QDRANT_API_KEY', ''),
      qdrantCollection: str(env, 'QDRANT_COLLECTION', 'legal_sections'),
      timeoutMs: int(env, 'VECTOR_TIMEOUT_MS', 15_000, 1),
    },
    retrieval: {
      maxResults: int(env, 'RETRIEVAL_MAX_RESULTS', 3, 1),
      confidenceThreshold: float(env, 'RETRIEVAL_CONFIDENCE_THRESHOLD', 0, 0, 1),
      minContentChars: int(env, 'RETRIEVAL_MIN_CONTENT_CHARS', 50),
    },
    search: {
      tavilyApiKey: str(env, 'TAVILY_API_KEY', ''),
      endpoint: str(env, 'TAVILY_SEARCH_URL', 'https://api.tavily.com/search'),
      allowedDomains: list(env, 'SEARCH_ALLOWED_DOMAINS', ['gov.in', 'nic.in']),
      maxResults: int(env, 'SEARCH_MAX_RESULTS', 3, 1),
      maxAttempts: int(env, 'SEARCH_MAX_ATTEMPTS', 3, 1),
      timeoutMs: int(env, 'SEARCH_TIMEOUT_MS', 20_000, 1),
      retryDelayMs: int(env, 'SEARCH_RETRY_DELAY_MS', 1_000),
      cacheTtlMs: int(env, 'SEARCH_CACHE_TTL_MS', HOUR_MS, 1),
    },
    fetch: {
      timeoutMs: int(env, 'FETCH_TIMEOUT_MS', 15_000, 1),
      maxAttempts: int(env, 'FETCH_MAX_ATTEMPTS', 3, 1),
      retryDelayMs: int(env, 'FETCH_RETRY_DELAY_MS', 1_000),
      cacheTtlMs: int(env, 'FETCH_CACHE_TTL_MS', 24 * HOUR_MS, 1),
      maxSourceChars: int(env, 'MAX_SOURCE_CHARS', 12_000, 1),
    },
    summarization: {
      concurrency: int(env, 'SUMMARY_CONCURRENCY', 4, 1),
      contextChars: int(env, 'SUMMARY_CONTEXT_CHARS', 3_000, 1),
    },
    context: {
      tokenBudget: int(env, 'CONTEXT_TOKEN_BUDGET', 100_000, 1),
    },
    sessions: {
      backend: oneOf(env, 'SESSION_BACKEND', ['memory', 'redis'] as const, 'memory'),
      redisUrl: str(env, 'REDIS_URL', 'redis://localhost:6379'),
      keyPrefix: str(env, 'SESSION_KEY_PREFIX', 'assistant:'),
      idleTtlMs: int(env, 'SESSION_IDLE_TTL_MS', 24 * HOUR_MS),
      activityWindowMs: int(env, 'SESSION_ACTIVITY_WINDOW_MS', 24 * HOUR_MS, 1),
      readCacheTtlMs: int(env, 'SESSION_READ_CACHE_TTL_MS', 5_000, 1),
    },
    chat: {
      timeoutMs: int(env, 'CHAT_TIMEOUT_MS', 300_000, 1),
      statusTimeoutMs: int(env, 'STATUS_TIMEOUT_MS', 5_000, 1),
      workerPoolSize: int(env, 'WORKER_POOL_SIZE', defaultWorkerPoolSize(), 1),
      terminalStatusTtlMs: int(env, 'STATUS_RETENTION_MS', 5 * 60 * 1000, 1),
      staleProcessingMs: int(env, 'STATUS_STALE_MS', 30 * 60 * 1000, 1),
      sweepIntervalMs: int(env, 'STATUS_SWEEP_INTERVAL_MS', 60 * 1000, 1),
    },
  };
}

export const assistantConfig = registerAs('assistant', () => buildAssistantConfig(process.env));
