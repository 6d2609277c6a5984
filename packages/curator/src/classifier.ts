/**
 * Pairwise duplicate classification.
 *
 * The model answers `classification | reasoning`. Malformed answers become
 * `unclear` with a diagnostic; provider failures become `error`. Neither is
 * cached, so the next run asks again.
 */

import { cacheKey, getLogger, runWindowed, type ContentCache } from '@flashsync/core';
import type { Card } from '@flashsync/deck';
import type { CachedClassification } from './caches.js';
import { failureReason, type ParseOutcome, type PipelineOptions } from './pipeline.js';
import { CLASSIFY_PAIR, renderPrompt, templateKey } from './prompts.js';
import type { CandidatePair } from './similarity.js';

export type PairClassification = 'duplicate' | 'complementary' | 'unclear' | 'error';

export interface ClassificationResult {
  classification: PairClassification;
  reasoning: string;
}

export interface ClassifiedPair extends CandidatePair, ClassificationResult {}

const LABELS = ['duplicate', 'complementary', 'unclear'] as const;

function isLabel(value: string): value is CachedClassification['classification'] {
  return LABELS.some((l) => l === value);
}

export function parseClassification(response: string): ParseOutcome<CachedClassification> {
  const text = response.trim();
  const bar = text.indexOf('|');
  if (bar === -1) {
    return {
      value: { classification: 'unclear', reasoning: `LLM response format invalid: ${text.slice(0, 50)}` },
      ok: false,
    };
  }

  const label = text.slice(0, bar).trim().toLowerCase();
  const reasoning = text.slice(bar + 1).trim();
  if (!isLabel(label)) {
    return { value: { classification: 'unclear', reasoning: `Invalid classification '${label}': ${reasoning}` }, ok: false };
  }
  return { value: { classification: label, reasoning }, ok: true };
}

export async function classifyPairs(
  pairs: readonly CandidatePair[],
  cards: readonly Card[],
  cache: ContentCache<CachedClassification>,
  options: PipelineOptions
): Promise<ClassifiedPair[]> {
  const model = options.provider.modelFor('classify');
  const template = templateKey(CLASSIFY_PAIR);

  const requests = pairs.map((pair) => {
    const a = cards[pair.indexA];
    const b = cards[pair.indexB];
    return {
      pair,
      key: cacheKey(model, template, [a.question, a.answer, b.question, b.answer]),
      prompt: renderPrompt(CLASSIFY_PAIR, {
        question1: a.question,
        answer1: a.answer,
        question2: b.question,
        answer2: b.answer,
      }),
    };
  });

  const misses = requests.filter((r) => !cache.has(r.key));
  getLogger().cacheEvent({ domain: 'classifications', hits: requests.length - misses.length, misses: misses.length });

  const fresh = await runWindowed(
    misses,
    options.windowSize,
    (r) => r.key,
    async (r): Promise<ClassificationResult> => {
      let response: string;
      try {
        response = await options.provider.complete({
          operation: 'classify',
          userPrompt: r.prompt,
          temperature: 0,
        });
      } catch (error) {
        return { classification: 'error', reasoning: failureReason(error) };
      }
      const parsed = parseClassification(response);
      if (parsed.ok) cache.put(r.key, parsed.value);
      return parsed.value;
    },
    (progress) => {
      cache.flush();
      options.onWindow?.(progress);
    }
  );

  return requests.map(({ pair, key }) => {
    const result: ClassificationResult = cache.get(key) ??
      fresh.get(key) ?? { classification: 'error', reasoning: 'No result recorded' };
    return { ...pair, classification: result.classification, reasoning: result.reasoning };
  });
}
