/**
 * Rewrites for cards graded below the threshold. Not cached: a fresh
 * attempt is wanted on every run.
 */

import { getLogger, runWindowed } from '@flashsync/core';
import { cardProblems } from '@flashsync/deck';
import type { GradedCard } from './grader.js';
import type { PipelineOptions } from './pipeline.js';
import { IMPROVE_CARD, renderPrompt } from './prompts.js';

export interface Improvement {
  question: string;
  answer: string;
}

export interface CardReview extends GradedCard {
  improvement: Improvement | null;
}

const QUESTION_MARKER = /^[ \t]*QUESTION:[ \t]*/m;
const ANSWER_MARKER = /^[ \t]*ANSWER:[ \t]*/m;

/**
 * Read `QUESTION:` / `ANSWER:` sections. Returns null when a marker is
 * missing or out of order, a section is empty, or the rewrite would not
 * survive the deck file format.
 */
export function parseImprovement(response: string): Improvement | null {
  const q = QUESTION_MARKER.exec(response);
  const a = ANSWER_MARKER.exec(response);
  if (!q || !a || a.index < q.index) return null;

  const question = response.slice(q.index + q[0].length, a.index).trim();
  const answer = response.slice(a.index + a[0].length).trim();
  if (!question || !answer) return null;
  if (cardProblems({ question, answer }).length > 0) return null;

  return { question, answer };
}

export async function improveCards(
  graded: readonly GradedCard[],
  minScore: number,
  options: PipelineOptions
): Promise<CardReview[]> {
  const below = graded.filter((g) => !g.failed && g.grade.score < minScore);
  const log = getLogger();

  const improvements = await runWindowed(
    below,
    options.windowSize,
    (g) => String(g.index),
    async (g): Promise<Improvement | null> => {
      try {
        const response = await options.provider.complete({
          operation: 'improve',
          userPrompt: renderPrompt(IMPROVE_CARD, {
            question: g.card.question,
            answer: g.card.answer,
            score: g.grade.score,
            reasoning: g.grade.reasoning,
          }),
          temperature: 0.3,
        });
        const improvement = parseImprovement(response);
        if (!improvement) log.warn('improve', `No usable rewrite for card ${g.index + 1}`);
        return improvement;
      } catch (error) {
        log.warn('improve', `Rewrite failed for card ${g.index + 1}: ${error instanceof Error ? error.message : String(error)}`);
        return null;
      }
    },
    options.onWindow
  );

  return below.map((g) => ({ ...g, improvement: improvements.get(String(g.index)) ?? null }));
}
