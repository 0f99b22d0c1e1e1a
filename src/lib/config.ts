/**
 * Application configuration, read once from the environment.
 * Components receive the parts they need through their constructors.
 */

/** better-sqlite3 path for a database that lives only as long as its process */
export const IN_MEMORY_DB = ':memory:';

export interface LLMConfig {
  azureEndpoint: string | null;
  azureApiKey: string | null;
  azureApiVersion: string;
  openAIApiKey: string | null;
  openAIBaseURL: string | null;
  model: string;
  timeoutMs: number;
}

export interface StorageConfig {
  supabaseUrl: string | null;
  supabaseKey: string | null;
  bucket: string;
  timeoutMs: number;
  localDbPath: string;
  /** Serialized size above which history is truncated */
  maxSessionBytes: number;
  /** History entries kept when truncating */
  truncatedHistoryLength: number;
}

export interface SessionConfig {
  secret: string;
  cookieName: string;
  retentionDays: number;
}

export interface AppConfig {
  llm: LLMConfig;
  storage: StorageConfig;
  session: SessionConfig;
}

export const DEFAULT_SESSION_SECRET = 'dev-session-secret';

type Env = Record<string, string | undefined>;

function readString(env: Env, ...names: string[]): string | null {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) {
      return value;
    }
  }
  return null;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    console.warn(`[config] ${name}="${raw}" is not a non-negative integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const secret = readString(env, 'SESSION_SECRET');
  if (!secret) {
    console.warn('[config] SESSION_SECRET is not set, using the development secret');
  }

  return {
    llm: {
      azureEndpoint: readString(env, 'AZURE_OPENAI_ENDPOINT'),
      azureApiKey: readString(env, 'AZURE_OPENAI_API_KEY'),
      azureApiVersion: readString(env, 'AZURE_OPENAI_API_VERSION') ?? '2024-02-15-preview',
      openAIApiKey: readString(env, 'OPENAI_API_KEY'),
      openAIBaseURL: readString(env, 'OPENAI_BASE_URL'),
      model: readString(env, 'LLM_MODEL') ?? 'gpt-4o',
      timeoutMs: readPositiveInt(env, 'LLM_TIMEOUT_MS', 20_000),
    },
    storage: {
      supabaseUrl: readString(env, 'SUPABASE_URL'),
      supabaseKey: readString(env, 'SUPABASE_ANON_KEY', 'SUPABASE_KEY'),
      bucket: readString(env, 'SUPABASE_BUCKET') ?? 'brain-bee-data',
      timeoutMs: readPositiveInt(env, 'STORAGE_TIMEOUT_MS', 8_000),
      localDbPath: readString(env, 'LOCAL_DB_PATH') ?? IN_MEMORY_DB,
      maxSessionBytes: readPositiveInt(env, 'MAX_SESSION_BYTES', 50 * 1024),
      truncatedHistoryLength: readPositiveInt(env, 'TRUNCATED_HISTORY_LENGTH', 10),
    },
    session: {
      secret: secret ?? DEFAULT_SESSION_SECRET,
      cookieName: 'quiz_session',
      retentionDays: readPositiveInt(env, 'HISTORY_RETENTION_DAYS', 30),
    },
  };
}
