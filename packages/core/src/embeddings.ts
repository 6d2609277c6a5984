/**
 * Embedding client for an OpenAI-compatible endpoint (OpenRouter by default).
 *
 * Provider responses are validated and re-ordered by their `index` field at
 * this boundary; anything else is a parse failure.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import type { FlashsyncConfig } from './config.js';
import { LlmError } from './errors.js';
import { requireApiKey } from './llm.js';
import { getLogger } from './logger.js';

export interface EmbeddingProvider {
  readonly model: string;
  /** One vector per input, in input order */
  embed(texts: readonly string[]): Promise<number[][]>;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().min(0),
      embedding: z.array(z.number()),
    })
  ),
});

/**
 * Normalize a raw embeddings response into vectors ordered like the input.
 * Throws LlmError when the shape or the count is wrong.
 */
export function normalizeEmbeddingResponse(raw: unknown, expected: number): number[][] {
  const result = embeddingResponseSchema.safeParse(raw);
  if (!result.success) {
    throw new LlmError(
      `Unexpected embeddings response: ${result.error.issues[0]?.message ?? 'invalid shape'}`,
      'VALIDATION_FAILED'
    );
  }

  const ordered: number[][] = new Array(expected);
  for (const item of result.data.data) {
    if (item.index >= expected) {
      throw new LlmError(`Embedding index ${item.index} out of range`, 'VALIDATION_FAILED');
    }
    ordered[item.index] = item.embedding;
  }
  for (let i = 0; i < expected; i++) {
    if (!ordered[i]) {
      throw new LlmError(`Missing embedding for input ${i}`, 'VALIDATION_FAILED');
    }
  }
  return ordered;
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private client: OpenAI;

  constructor(config: FlashsyncConfig, client?: OpenAI) {
    this.model = config.embeddings.model;
    this.client =
      client ??
      new OpenAI({
        apiKey: requireApiKey(config.embeddings.apiKeyEnv, 'embeddings'),
        baseURL: config.embeddings.baseUrl,
        timeout: config.llm.requestTimeoutMs,
      });
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const startTime = Date.now();
    let response: unknown;
    try {
      response = await this.client.embeddings.create({
        model: this.model,
        input: [...texts],
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      getLogger().error('embeddings', `Embedding request failed: ${message}`, {
        model: this.model,
        inputs: texts.length,
      });
      throw new LlmError(`Embedding request failed: ${message}`, 'EMBEDDING_FAILED');
    }

    getLogger().debug('embeddings', `Embedded ${texts.length} text(s)`, {
      model: this.model,
      latencyMs: Date.now() - startTime,
    });
    return normalizeEmbeddingResponse(response, texts.length);
  }
}
