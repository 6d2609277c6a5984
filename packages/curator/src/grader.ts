/**
 * Card quality grading: an integer score from 0 to 10 with reasoning.
 */

import { cacheKey, clamp, getLogger, runWindowed, type ContentCache } from '@flashsync/core';
import type { Card } from '@flashsync/deck';
import type { Grade } from './caches.js';
import { failureReason, type ParseOutcome, type PipelineOptions } from './pipeline.js';
import { GRADE_CARD, renderPrompt, templateKey } from './prompts.js';

export const NEUTRAL_SCORE = 5;

export interface GradedCard {
  index: number;
  card: Card;
  grade: Grade;
  /** The provider failed or answered in an unreadable format; the neutral grade is a placeholder */
  failed: boolean;
}

/** Parse `score | reasoning`. Anything unparseable is a neutral 5 with a diagnostic. */
export function parseGrade(response: string): ParseOutcome<Grade> {
  const text = response.trim();
  const bar = text.indexOf('|');
  if (bar === -1) {
    return { value: { score: NEUTRAL_SCORE, reasoning: `Could not parse grade: ${text.slice(0, 50)}` }, ok: false };
  }

  const rawScore = text.slice(0, bar).trim();
  const reasoning = text.slice(bar + 1).trim();
  const value = parseFloat(rawScore);
  if (Number.isNaN(value)) {
    return { value: { score: NEUTRAL_SCORE, reasoning: `Invalid score '${rawScore}': ${reasoning}` }, ok: false };
  }
  return { value: { score: clamp(Math.round(value), 0, 10), reasoning }, ok: true };
}

export async function gradeCards(
  cards: readonly Card[],
  cache: ContentCache<Grade>,
  options: PipelineOptions
): Promise<GradedCard[]> {
  const model = options.provider.modelFor('grade');
  const template = templateKey(GRADE_CARD);

  const requests = cards.map((card, index) => ({
    index,
    card,
    key: cacheKey(model, template, [card.question, card.answer]),
  }));

  const misses = requests.filter((r) => !cache.has(r.key));
  getLogger().cacheEvent({ domain: 'gradings', hits: requests.length - misses.length, misses: misses.length });

  const failures = await runWindowed(
    misses,
    options.windowSize,
    (r) => r.key,
    async (r): Promise<string | null> => {
      let response: string;
      try {
        response = await options.provider.complete({
          operation: 'grade',
          userPrompt: renderPrompt(GRADE_CARD, { question: r.card.question, answer: r.card.answer }),
          temperature: 0,
        });
      } catch (error) {
        return failureReason(error);
      }
      const parsed = parseGrade(response);
      if (!parsed.ok) return parsed.value.reasoning;
      cache.put(r.key, parsed.value);
      return null;
    },
    (progress) => {
      cache.flush();
      options.onWindow?.(progress);
    }
  );

  return requests.map(({ index, card, key }) => {
    const grade = cache.get(key);
    if (grade) return { index, card, grade, failed: false };
    const reason = failures.get(key) ?? 'No result recorded';
    return { index, card, grade: { score: NEUTRAL_SCORE, reasoning: reason }, failed: true };
  });
}
