import { homedir } from 'node:os';
import { join } from 'node:path';

export interface AppConfig {
  port: number;
  dbPath: string;
  maxFileBytes: number;
  maxTotalBytes: number;
  includeGlobs: string[];
  excludeGlobs: string[];
  maxIterations: number;
  maxLlmCalls: number;
  maxOutputChars: number;
  modelBaseUrl: string;
  modelApiKey: string | undefined;
  mainModel: string;
  subModel: string;
  modelTimeoutMs: number;
  githubToken: string | undefined;
  githubApiBase: string;
  gitlabToken: string | undefined;
  gitlabApiBase: string;
  vcsTimeoutMs: number;
  fetchConcurrency: number;
  sandboxTimeoutMs: number;
  sessionTtlMs: number;
  maxSessions: number;
}

function intEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function listEnv(name: string): string[] {
  return (process.env[name] ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function loadConfig(): AppConfig {
  const mainModel = process.env['MAIN_MODEL'] ?? 'gpt-4o';
  return {
    port: intEnv('PORT', 3848),
    dbPath:
      process.env['DB_PATH'] ??
      join(homedir(), '.config', 'code-inquiry', 'db', 'inquiry.db'),
    maxFileBytes: intEnv('MAX_FILE_BYTES', 200_000),
    maxTotalBytes: intEnv('MAX_TOTAL_BYTES', 5_000_000),
    includeGlobs: listEnv('INCLUDE_GLOBS'),
    excludeGlobs: listEnv('EXCLUDE_GLOBS'),
    maxIterations: intEnv('MAX_ITERATIONS', 20),
    maxLlmCalls: intEnv('MAX_LLM_CALLS', 25),
    maxOutputChars: intEnv('MAX_OUTPUT_CHARS', 5000),
    modelBaseUrl: process.env['MODEL_BASE_URL'] ?? 'https://api.openai.com/v1',
    modelApiKey: process.env['MODEL_API_KEY'],
    mainModel,
    subModel: process.env['SUB_MODEL'] ?? mainModel,
    modelTimeoutMs: intEnv('MODEL_TIMEOUT_MS', 120_000),
    githubToken: process.env['GITHUB_TOKEN'],
    githubApiBase: process.env['GITHUB_API_BASE'] ?? 'https://api.github.com',
    gitlabToken: process.env['GITLAB_TOKEN'],
    gitlabApiBase: process.env['GITLAB_API_BASE'] ?? 'https://gitlab.com/api/v4',
    vcsTimeoutMs: intEnv('VCS_TIMEOUT_MS', 30_000),
    fetchConcurrency: intEnv('FETCH_CONCURRENCY', 8),
    sandboxTimeoutMs: intEnv('SANDBOX_TIMEOUT_MS', 10_000),
    sessionTtlMs: intEnv('SESSION_TTL_MS', 3_600_000),
    maxSessions: intEnv('MAX_SESSIONS', 100),
  };
}
