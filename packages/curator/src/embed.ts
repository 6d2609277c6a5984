/**
 * Card embeddings, cache-checked per text and fetched in batches.
 */

import { cacheKey, getLogger, type ContentCache, type EmbeddingProvider } from '@flashsync/core';
import type { Card } from '@flashsync/deck';

export const EMBED_TEMPLATE_ID = 'embed-card@v1';

export interface EmbedOptions {
  batchSize: number;
  onBatch?: (done: number, total: number) => void;
}

export function embeddingText(card: Pick<Card, 'question' | 'answer'>): string {
  return `${card.question}\n${card.answer}`;
}

/**
 * One vector per card, in card order. Misses are embedded in input order
 * and stored in the cache after each batch; results are matched back by
 * cache key.
 */
export async function embedCards(
  cards: readonly Card[],
  provider: EmbeddingProvider,
  cache: ContentCache<number[]>,
  options: EmbedOptions
): Promise<number[][]> {
  if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${options.batchSize}`);
  }

  const keys = cards.map((card) => cacheKey(provider.model, EMBED_TEMPLATE_ID, [embeddingText(card)]));
  const misses = new Map<string, string>();
  keys.forEach((key, idx) => {
    if (!cache.has(key) && !misses.has(key)) misses.set(key, embeddingText(cards[idx]));
  });

  getLogger().cacheEvent({ domain: 'embeddings', hits: cards.length - misses.size, misses: misses.size });

  const pending = [...misses.entries()];
  for (let start = 0; start < pending.length; start += options.batchSize) {
    const batch = pending.slice(start, start + options.batchSize);
    const vectors = await provider.embed(batch.map(([, text]) => text));
    batch.forEach(([key], idx) => cache.put(key, vectors[idx]));
    cache.flush();
    options.onBatch?.(Math.min(start + batch.length, pending.length), pending.length);
  }

  return keys.map((key) => {
    const vector = cache.get(key);
    if (!vector) {
      throw new Error(`Embedding missing for cache key ${key}`);
    }
    return vector;
  });
}
