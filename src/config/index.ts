import path from 'node:path';

export interface CosmosConfig {
  endpoint: string;
  key: string;
  databaseId: string;
  stateContainer: string;
  cacheContainer: string;
}

export interface RuntimeConfig {
  offline: boolean;
  model?: {
    endpoint: string;
    apiKey?: string;
    deployment: string;
  };
  modelTimeoutMs: number;
  tools?: {
    endpoint: string;
    apiKey?: string;
  };
  toolTimeoutMs: number;
}

export interface GroundingConfig {
  citationHost: string;
  snippetWordCap: number;
  maxCandidates: number;
  concurrency: number;
}

export type CacheProvider = 'memory' | 'file' | 'cosmos';

export interface CacheConfig {
  provider: CacheProvider;
  filePath: string;
  maxAgeMs?: number;
}

export interface SqliteConfig {
  dbPath: string;
  migrationsDir: string;
}

export interface StateConfig {
  sqlite?: SqliteConfig;
  localDir: string;
}

export interface SessionConfig {
  verifyIssuedExams: boolean;
  issuedExamLimit: number;
}

export interface AuthConfig {
  apiKeys: Array<{ key: string; identity: string }>;
}

export interface RateLimitConfig {
  maxRequests: number;
  windowMs: number;
}

export interface AppConfig {
  runtime: RuntimeConfig;
  grounding: GroundingConfig;
  cache: CacheConfig;
  state: StateConfig;
  cosmos?: CosmosConfig;
  session: SessionConfig;
  auth: AuthConfig;
  rateLimit: RateLimitConfig;
}

function readIntFromEnv(envName: string): number | undefined {
  const raw = process.env[envName];
  if (!raw) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function readPositiveIntFromEnv(envName: string, defaultValue: number): number {
  const value = readIntFromEnv(envName);
  return value !== undefined && value > 0 ? value : defaultValue;
}

function readCacheProviderFromEnv(envName: string): CacheProvider {
  const raw = (process.env[envName] ?? 'file').toLowerCase();
  if (raw === 'cosmos') return 'cosmos';
  if (raw === 'memory') return 'memory';
  return 'file';
}

function readBooleanFromEnv(envName: string, defaultValue: boolean): boolean {
  const raw = process.env[envName];
  if (raw === undefined) return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

function readApiKeys(envName: string): AuthConfig['apiKeys'] {
  const raw = process.env[envName];
  if (!raw) {
    return [];
  }
  return raw
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
    .flatMap(entry => {
      const separator = entry.indexOf(':');
      if (separator <= 0 || separator === entry.length - 1) {
        return [];
      }
      return [{ key: entry.slice(0, separator).trim(), identity: entry.slice(separator + 1).trim() }];
    });
}

export function loadConfig(): AppConfig {
  const modelEndpoint = process.env.MODEL_ENDPOINT;
  const toolEndpoint = process.env.TOOL_ENDPOINT;
  const cosmosEndpoint = process.env.COSMOS_ENDPOINT;
  const cosmosKey = process.env.COSMOS_KEY;
  const stateDbPath = process.env.STATE_DB_PATH;
  const maxAgeMs = readIntFromEnv('CACHE_MAX_AGE_MS');

  return {
    runtime: {
      offline: readBooleanFromEnv('OFFLINE_MODE', false) || !modelEndpoint,
      model: modelEndpoint
        ? {
            endpoint: modelEndpoint,
            apiKey: process.env.MODEL_API_KEY || undefined,
            deployment: process.env.MODEL_DEPLOYMENT || 'default',
          }
        : undefined,
      modelTimeoutMs: readPositiveIntFromEnv('MODEL_TIMEOUT_MS', 30_000),
      tools: toolEndpoint
        ? { endpoint: toolEndpoint, apiKey: process.env.TOOL_API_KEY || undefined }
        : undefined,
      toolTimeoutMs: readPositiveIntFromEnv('TOOL_TIMEOUT_MS', 15_000),
    },
    grounding: {
      citationHost: (process.env.CITATION_HOST || 'learn.microsoft.com').trim().toLowerCase(),
      snippetWordCap: readPositiveIntFromEnv('SNIPPET_WORD_CAP', 20),
      maxCandidates: readPositiveIntFromEnv('GROUNDING_MAX_CANDIDATES', 3),
      concurrency: readPositiveIntFromEnv('GROUNDING_CONCURRENCY', 4),
    },
    cache: {
      provider: readCacheProviderFromEnv('CACHE_PROVIDER'),
      filePath: process.env.CACHE_FILE_PATH || path.resolve(process.cwd(), 'data', 'cache', 'documents.json'),
      maxAgeMs: maxAgeMs !== undefined && maxAgeMs > 0 ? maxAgeMs : undefined,
    },
    state: {
      sqlite: stateDbPath
        ? {
            dbPath: stateDbPath,
            migrationsDir: process.env.SQLITE_MIGRATIONS_DIR || path.resolve(process.cwd(), 'migrations', 'sqlite'),
          }
        : undefined,
      localDir: process.env.STATE_DIR || path.resolve(process.cwd(), 'data', 'state'),
    },
    cosmos:
      cosmosEndpoint && cosmosKey
        ? {
            endpoint: cosmosEndpoint,
            key: cosmosKey,
            databaseId: process.env.COSMOS_DATABASE_ID || 'exam-coach',
            stateContainer: process.env.COSMOS_STATE_CONTAINER || 'student-state',
            cacheContainer: process.env.COSMOS_CACHE_CONTAINER || 'documents',
          }
        : undefined,
    session: {
      verifyIssuedExams: readBooleanFromEnv('VERIFY_ISSUED_EXAMS', true),
      issuedExamLimit: readPositiveIntFromEnv('ISSUED_EXAM_LIMIT', 5),
    },
    auth: {
      apiKeys: readApiKeys('AUTH_API_KEYS'),
    },
    rateLimit: {
      maxRequests: readIntFromEnv('RATE_LIMIT_REQUESTS') ?? 60,
      windowMs: readPositiveIntFromEnv('RATE_LIMIT_WINDOW_MS', 60_000),
    },
  };
}
