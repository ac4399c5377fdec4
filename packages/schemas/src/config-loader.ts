import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError } from '@searchbridge/shared/src/utils/errors.js';
import { validateSearchBridgeConfig, validateVocabulary } from './validators.js';
import type { SearchBridgeConfig } from './search-config.schema.js';
import type { Vocabulary } from './vocabulary.schema.js';

export interface AppConfig {
  readonly search: SearchBridgeConfig;
  readonly vocabulary: Vocabulary;
}

export type Environment = Readonly<Record<string, string | undefined>>;

function readString(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readNumber(env: Environment, name: string, scale = 1): number | undefined {
  const value = readString(env, name);
  return value === undefined ? undefined : Number(value) * scale;
}

// Unrecognized values are passed through so schema validation reports them.
function readBoolean(env: Environment, name: string): boolean | string | undefined {
  const value = readString(env, name)?.toLowerCase();
  if (value === 'true' || value === '1' || value === 'yes') return true;
  if (value === 'false' || value === '0' || value === 'no') return false;
  return value;
}

export function configFromEnv(env: Environment): SearchBridgeConfig {
  return validateSearchBridgeConfig({
    provider: {
      baseUrl: readString(env, 'BRAVE_API_BASE'),
      apiKey: readString(env, 'BRAVE_API_KEY'),
      timeoutMs: readNumber(env, 'HTTP_TIMEOUT_SECONDS', 1000),
      maxAttempts: readNumber(env, 'SEARCH_RETRY_ATTEMPTS'),
      backoffBaseMs: readNumber(env, 'SEARCH_BACKOFF_BASE_MS'),
      jitterMaxMs: readNumber(env, 'SEARCH_BACKOFF_JITTER_MS'),
    },
    enrichment: {
      enabled: readBoolean(env, 'ENABLE_ENRICHMENT'),
    },
    rerank: {
      enabled: readBoolean(env, 'ENABLE_RERANK'),
    },
    cache: {
      backend: readString(env, 'SEARCH_CACHE_BACKEND'),
      ttlMs: readNumber(env, 'SEARCH_CACHE_TTL_SECONDS', 1000),
      sweepIntervalMs: readNumber(env, 'SEARCH_CACHE_SWEEP_SECONDS', 1000),
      firestoreProjectId: readString(env, 'SEARCHBRIDGE_GCP_PROJECT_ID'),
    },
    maxResults: readNumber(env, 'SEARCH_MAX_RESULTS'),
  });
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

export async function loadVocabulary(filePath: string): Promise<Vocabulary> {
  return validateVocabulary(await readJsonFile(filePath));
}

export async function loadConfig(
  configDir: string,
  env: Environment = process.env,
): Promise<AppConfig> {
  const search = configFromEnv(env);
  const vocabulary = await loadVocabulary(join(configDir, 'vocabulary.json'));

  return { search, vocabulary };
}
