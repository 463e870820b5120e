import path from 'node:path';
import { afterAll, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../index.js';

const MANAGED_VARS = [
  'OFFLINE_MODE',
  'MODEL_ENDPOINT',
  'MODEL_API_KEY',
  'MODEL_DEPLOYMENT',
  'MODEL_TIMEOUT_MS',
  'TOOL_ENDPOINT',
  'TOOL_API_KEY',
  'TOOL_TIMEOUT_MS',
  'CITATION_HOST',
  'SNIPPET_WORD_CAP',
  'GROUNDING_MAX_CANDIDATES',
  'GROUNDING_CONCURRENCY',
  'CACHE_PROVIDER',
  'CACHE_FILE_PATH',
  'CACHE_MAX_AGE_MS',
  'STATE_DB_PATH',
  'SQLITE_MIGRATIONS_DIR',
  'STATE_DIR',
  'COSMOS_ENDPOINT',
  'COSMOS_KEY',
  'COSMOS_DATABASE_ID',
  'COSMOS_STATE_CONTAINER',
  'COSMOS_CACHE_CONTAINER',
  'VERIFY_ISSUED_EXAMS',
  'ISSUED_EXAM_LIMIT',
  'AUTH_API_KEYS',
  'RATE_LIMIT_REQUESTS',
  'RATE_LIMIT_WINDOW_MS',
];

describe('loadConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const name of MANAGED_VARS) {
      delete process.env[name];
    }
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('returns offline defaults when env vars are absent', () => {
    expect(loadConfig()).toEqual({
      runtime: {
        offline: true,
        model: undefined,
        modelTimeoutMs: 30_000,
        tools: undefined,
        toolTimeoutMs: 15_000,
      },
      grounding: {
        citationHost: 'learn.microsoft.com',
        snippetWordCap: 20,
        maxCandidates: 3,
        concurrency: 4,
      },
      cache: {
        provider: 'file',
        filePath: path.resolve(process.cwd(), 'data', 'cache', 'documents.json'),
        maxAgeMs: undefined,
      },
      state: {
        sqlite: undefined,
        localDir: path.resolve(process.cwd(), 'data', 'state'),
      },
      cosmos: undefined,
      session: { verifyIssuedExams: true, issuedExamLimit: 5 },
      auth: { apiKeys: [] },
      rateLimit: { maxRequests: 60, windowMs: 60_000 },
    });
  });

  it('goes online when a model endpoint is set, unless offline is forced', () => {
    process.env.MODEL_ENDPOINT = 'https://models.example.test';
    process.env.MODEL_API_KEY = 'test-secret';
    process.env.MODEL_DEPLOYMENT = 'tutor';

    expect(loadConfig().runtime).toMatchObject({
      offline: false,
      model: { endpoint: 'https://models.example.test', apiKey: 'test-secret', deployment: 'tutor' },
    });

    process.env.OFFLINE_MODE = 'yes';
    expect(loadConfig().runtime.offline).toBe(true);
  });

  it('parses API keys, skipping malformed entries', () => {
    process.env.AUTH_API_KEYS = 'test-key:alice, bad-entry, :nobody, other-key:bob';

    expect(loadConfig().auth.apiKeys).toEqual([
      { key: 'test-key', identity: 'alice' },
      { key: 'other-key', identity: 'bob' },
    ]);
  });

  it('reads storage settings', () => {
    process.env.CACHE_PROVIDER = 'COSMOS';
    process.env.STATE_DB_PATH = '/tmp/exam-coach/state.db';
    process.env.COSMOS_ENDPOINT = 'https://localhost:8081';
    process.env.COSMOS_KEY = 'test-secret';

    const config = loadConfig();

    expect(config.cache.provider).toBe('cosmos');
    expect(config.state.sqlite).toEqual({
      dbPath: '/tmp/exam-coach/state.db',
      migrationsDir: path.resolve(process.cwd(), 'migrations', 'sqlite'),
    });
    expect(config.cosmos).toEqual({
      endpoint: 'https://localhost:8081',
      key: 'test-secret',
      databaseId: 'exam-coach',
      stateContainer: 'student-state',
      cacheContainer: 'documents',
    });
  });

  it('falls back to defaults for unusable numbers and providers', () => {
    process.env.SNIPPET_WORD_CAP = '-5';
    process.env.GROUNDING_CONCURRENCY = 'many';
    process.env.CACHE_PROVIDER = 'redis';
    process.env.RATE_LIMIT_REQUESTS = '0';
    process.env.VERIFY_ISSUED_EXAMS = 'false';

    const config = loadConfig();

    expect(config.grounding.snippetWordCap).toBe(20);
    expect(config.grounding.concurrency).toBe(4);
    expect(config.cache.provider).toBe('file');
    expect(config.rateLimit.maxRequests).toBe(0);
    expect(config.session.verifyIssuedExams).toBe(false);
  });
});
