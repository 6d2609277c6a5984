/**
 * @flashsync/core - Shared config, logging, errors, caching and provider clients.
 * This is the foundation package that all other flashsync packages depend on.
 */

// Config
export {
  loadConfig,
  writeDefaultConfig,
  getDefaultConfig,
  resolveProjectPath,
  CONFIG_FILENAME,
  type FlashsyncConfig,
  type SimilarityBackend,
} from './config.js';

// Errors
export {
  FlashsyncError,
  ValidationError,
  InconsistencyError,
  RemoteError,
  LlmError,
  LlmAuthError,
  LlmRateLimitError,
  CacheIOError,
  describeError,
  type OrphanedCard,
} from './errors.js';

// Logger
export { Logger, initLogger, getLogger, type LogEntry, type LogLevel, type LoggerOptions } from './logger.js';

// Cache
export { ContentCache, cacheKey } from './cache.js';

// Batching
export { runWindowed, type WindowProgress } from './batch.js';

// LLM
export {
  AnthropicChatProvider,
  createLlmClient,
  getModelForOperation,
  requireApiKey,
  type ChatProvider,
  type ChatRequest,
  type LlmOperation,
} from './llm.js';

// Embeddings
export {
  OpenAiEmbeddingProvider,
  normalizeEmbeddingResponse,
  type EmbeddingProvider,
} from './embeddings.js';

// Utils
export {
  generateId,
  now,
  hash,
  normalizeText,
  truncate,
  sleep,
  findProjectRoot,
  writeFileAtomic,
  clamp,
} from './utils.js';
