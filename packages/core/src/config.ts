/**
 * YAML configuration loader for .flashsync.yml files.
 * Handles loading, validation, and default values.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ValidationError } from './errors.js';

export const CONFIG_FILENAME = '.flashsync.yml';

const similarityBackendSchema = z.enum(['auto', 'exact', 'indexed']);

const configSchema = z.object({
  version: z.number().default(1),
  remote: z
    .object({
      baseUrl: z.string().url().default('https://app.mochi.cards/api'),
      apiKeyEnv: z.string().default('MOCHI_API_KEY'),
      requestTimeoutMs: z.number().int().positive().default(30_000),
      pageSize: z.number().int().min(1).max(100).default(100),
    })
    .default({}),
  llm: z
    .object({
      apiKeyEnv: z.string().default('ANTHROPIC_API_KEY'),
      models: z
        .object({
          classify: z.string().default('claude-haiku-4-5-20251001'),
          grade: z.string().default('claude-haiku-4-5-20251001'),
          improve: z.string().default('claude-sonnet-4-6'),
        })
        .default({}),
      maxTokens: z.number().int().positive().default(1024),
      maxRetries: z.number().int().min(0).default(3),
      retryBaseDelayMs: z.number().int().min(0).default(1000),
      requestTimeoutMs: z.number().int().positive().default(120_000),
      concurrency: z.number().int().min(1).max(100).default(10),
    })
    .default({}),
  embeddings: z
    .object({
      apiKeyEnv: z.string().default('OPENROUTER_API_KEY'),
      baseUrl: z.string().url().default('https://openrouter.ai/api/v1'),
      model: z.string().default('openai/text-embedding-3-small'),
      batchSize: z.number().int().min(1).max(2048).default(100),
    })
    .default({}),
  dedupe: z
    .object({
      threshold: z.number().min(0).max(1).default(0.85),
      backend: similarityBackendSchema.default('auto'),
      indexMinCards: z.number().int().min(2).default(1000),
      topK: z.number().int().min(1).default(100),
    })
    .default({}),
  curate: z
    .object({
      minScore: z.number().int().min(0).max(10).default(7),
    })
    .default({}),
  cache: z
    .object({
      dir: z.string().default('.flashsync/cache'),
    })
    .default({}),
  base: z
    .object({
      dir: z.string().default('.flashsync/base'),
    })
    .default({}),
});

export type FlashsyncConfig = z.output<typeof configSchema>;
export type SimilarityBackend = z.output<typeof similarityBackendSchema>;

/** Default configuration when no .flashsync.yml is found */
export function getDefaultConfig(): FlashsyncConfig {
  return configSchema.parse({});
}

/**
 * Load and validate a .flashsync.yml config file.
 * Falls back to defaults if the file doesn't exist.
 */
export function loadConfig(projectDir: string): FlashsyncConfig {
  const configPath = path.join(projectDir, CONFIG_FILENAME);

  if (!fs.existsSync(configPath)) {
    return getDefaultConfig();
  }

  const raw = fs.readFileSync(configPath, 'utf-8');
  const parsed = yaml.load(raw) ?? {};

  // Convert snake_case YAML keys to camelCase for TS
  const result = configSchema.safeParse(normalizeKeys(parsed));
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new ValidationError(`Invalid ${CONFIG_FILENAME}: ${issues}`, configPath);
  }
  return result.data;
}

/** Resolve a config directory setting against the project root */
export function resolveProjectPath(projectDir: string, dir: string): string {
  return path.isAbsolute(dir) ? dir : path.join(projectDir, dir);
}

/**
 * Write a default .flashsync.yml config file to the project directory.
 */
export function writeDefaultConfig(projectDir: string): string {
  const configPath = path.join(projectDir, CONFIG_FILENAME);
  const defaultYaml = `version: 1

# Remote card service. The API key is read from the named environment
# variable (a .env file in the working directory is loaded first).
remote:
  base_url: https://app.mochi.cards/api
  api_key_env: MOCHI_API_KEY
  request_timeout_ms: 30000
  page_size: 100

# Chat model used for duplicate classification, grading and rewrites
llm:
  api_key_env: ANTHROPIC_API_KEY
  models:
    classify: claude-haiku-4-5-20251001
    grade: claude-haiku-4-5-20251001
    improve: claude-sonnet-4-6
  max_tokens: 1024
  max_retries: 3
  retry_base_delay_ms: 1000
  request_timeout_ms: 120000
  concurrency: 10        # requests in flight per window

# OpenAI-compatible embeddings endpoint
embeddings:
  api_key_env: OPENROUTER_API_KEY
  base_url: https://openrouter.ai/api/v1
  model: openai/text-embedding-3-small
  batch_size: 100

dedupe:
  threshold: 0.85
  backend: auto          # auto | exact | indexed
  index_min_cards: 1000  # auto switches to the indexed backend at this size
  top_k: 100             # neighbours kept per card by the indexed backend

curate:
  min_score: 7           # cards graded below this get a suggested rewrite

cache:
  dir: .flashsync/cache

base:
  dir: .flashsync/base
`;

  fs.writeFileSync(configPath, defaultYaml, 'utf-8');
  return configPath;
}

/** Recursively convert snake_case keys to camelCase */
function normalizeKeys(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(normalizeKeys);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const camelKey = key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
      result[camelKey] = normalizeKeys(value);
    }
    return result;
  }
  return obj;
}
