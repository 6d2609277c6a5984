/**
 * Anthropic chat client used by the curation pipeline.
 *
 * Features:
 * - API key enforcement with clear error messages
 * - Exponential backoff retry (configurable retries, 1s/2s/4s delays)
 * - Per-operation model selection (classify / grade / improve)
 * - Structured error types
 * - Request timeout handling
 *
 * Callers see only the `ChatProvider` interface, so tests can substitute an
 * in-process fake.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { FlashsyncConfig } from './config.js';
import { LlmAuthError, LlmError, LlmRateLimitError } from './errors.js';
import { getLogger } from './logger.js';
import { sleep } from './utils.js';

// ─── Provider interface ────────────────────────────────────────────

/** LLM operation type for model selection */
export type LlmOperation = 'classify' | 'grade' | 'improve';

/** Options for a single chat completion */
export interface ChatRequest {
  operation: LlmOperation;
  systemPrompt?: string;
  userPrompt: string;
  /** 0 for evaluative tasks, low nonzero for rewriting */
  temperature: number;
  maxTokens?: number;
}

export interface ChatProvider {
  /** Model id used for an operation; folded into cache keys */
  modelFor(operation: LlmOperation): string;
  /** Raw text of the completion. Rejects with an LlmError on failure. */
  complete(request: ChatRequest): Promise<string>;
}

// ─── Client Creation ───────────────────────────────────────────────

/**
 * Validate that the API key is configured.
 * Throws LlmAuthError with setup instructions if missing.
 */
export function requireApiKey(apiKeyEnv: string, purpose: string): string {
  const apiKey = process.env[apiKeyEnv];
  if (!apiKey) {
    throw new LlmAuthError(apiKeyEnv, purpose);
  }
  return apiKey;
}

/** Create an Anthropic client from config. Throws LlmAuthError if no API key. */
export function createLlmClient(config: FlashsyncConfig): Anthropic {
  const apiKey = requireApiKey(config.llm.apiKeyEnv, 'card classification and grading');
  return new Anthropic({
    apiKey,
    timeout: config.llm.requestTimeoutMs,
    // Retries are handled below so every attempt is logged
    maxRetries: 0,
  });
}

/** Get the model to use for a specific operation */
export function getModelForOperation(config: FlashsyncConfig, operation: LlmOperation): string {
  return config.llm.models[operation];
}

// ─── Anthropic provider ────────────────────────────────────────────

export class AnthropicChatProvider implements ChatProvider {
  private client: Anthropic;

  constructor(
    private readonly config: FlashsyncConfig,
    client?: Anthropic
  ) {
    this.client = client ?? createLlmClient(config);
  }

  modelFor(operation: LlmOperation): string {
    return getModelForOperation(this.config, operation);
  }

  /**
   * Run a completion with retry and logging.
   *
   * @returns Raw text response
   */
  async complete(request: ChatRequest): Promise<string> {
    const model = this.modelFor(request.operation);
    const maxOutput = request.maxTokens ?? this.config.llm.maxTokens;
    const maxRetries = this.config.llm.maxRetries;
    const baseDelay = this.config.llm.retryBaseDelayMs;
    let lastError: Error | undefined;
    const log = getLogger();

    log.llmRequest({
      operation: request.operation,
      model,
      promptChars: (request.systemPrompt ?? '').length + request.userPrompt.length,
    });

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = baseDelay * Math.pow(2, attempt - 1);
        log.debug('llm', `Retry attempt ${attempt}/${maxRetries} after ${delay}ms delay`);
        await sleep(delay);
      }

      const startTime = Date.now();

      try {
        const message = await this.client.messages.create({
          model,
          max_tokens: maxOutput,
          temperature: request.temperature,
          ...(request.systemPrompt ? { system: request.systemPrompt } : {}),
          messages: [{ role: 'user', content: request.userPrompt }],
        });

        const response = message.content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .join('');

        log.llmResponse({
          operation: request.operation,
          model,
          inputTokens: message.usage.input_tokens,
          outputTokens: message.usage.output_tokens,
          latencyMs: Date.now() - startTime,
        });

        return response;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        const statusCode = error instanceof Anthropic.APIError ? error.status : undefined;

        log.llmError({
          operation: request.operation,
          model,
          statusCode,
          errorMessage: lastError.message,
          attempt: attempt + 1,
          maxAttempts: maxRetries + 1,
        });

        // Don't retry auth errors
        if (statusCode === 401 || statusCode === 403) {
          throw new LlmError(
            `Anthropic API authentication failed. Check your API key (${this.config.llm.apiKeyEnv}).`,
            'AUTH_FAILED'
          );
        }

        if (statusCode === 429) {
          const retryAfter = baseDelay * Math.pow(2, attempt + 1);
          log.warn('llm', `Rate limited. Waiting ${retryAfter}ms before retry.`);
          if (attempt === maxRetries) {
            throw new LlmRateLimitError(retryAfter);
          }
          await sleep(retryAfter);
          continue;
        }

        if (attempt === maxRetries) {
          throw new LlmError(
            `LLM call failed after ${maxRetries + 1} attempts: ${lastError.message}`,
            'MAX_RETRIES'
          );
        }
      }
    }

    throw new LlmError(lastError?.message ?? 'Unknown LLM error', 'UNKNOWN');
  }
}
