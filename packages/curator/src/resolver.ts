/**
 * Interactive resolution of duplicate pairs and low-quality cards.
 *
 * Choosers are injected so the CLI can prompt and tests (or `--auto`) can
 * decide by policy. Nothing here writes files; an abort returns
 * `{ aborted: true }` and the caller leaves the deck untouched.
 */

import { getLogger } from '@flashsync/core';
import { withContent, type Card } from '@flashsync/deck';
import type { ClassifiedPair } from './classifier.js';
import type { CardReview, Improvement } from './improver.js';

// ─── Duplicates ─────────────────────────────────────────────────────

export type DuplicateChoice = 'keep-first' | 'keep-second' | 'keep-both' | 'skip' | 'abort';

export interface ReviewPosition {
  /** 1-based */
  current: number;
  total: number;
}

export type DuplicateChooser = (
  pair: ClassifiedPair,
  first: Card,
  second: Card,
  position: ReviewPosition
) => Promise<DuplicateChoice>;

export type DuplicateResolution =
  | { aborted: true }
  | { aborted: false; removed: Set<number>; reviewed: number; autoSkipped: number };

/** Keep the first card of every `duplicate` pair; leave everything else alone */
export const policyDuplicateChooser: DuplicateChooser = async (pair) =>
  pair.classification === 'duplicate' ? 'keep-first' : 'skip';

export async function resolveDuplicates(
  classified: readonly ClassifiedPair[],
  cards: readonly Card[],
  chooser: DuplicateChooser
): Promise<DuplicateResolution> {
  const queue = classified.filter((p) => p.classification !== 'complementary');
  const removed = new Set<number>();
  let reviewed = 0;
  let autoSkipped = 0;

  for (const [idx, pair] of queue.entries()) {
    if (removed.has(pair.indexA) || removed.has(pair.indexB)) {
      autoSkipped++;
      continue;
    }

    const choice = await chooser(pair, cards[pair.indexA], cards[pair.indexB], {
      current: idx + 1,
      total: queue.length,
    });
    reviewed++;

    switch (choice) {
      case 'keep-first':
        removed.add(pair.indexB);
        break;
      case 'keep-second':
        removed.add(pair.indexA);
        break;
      case 'keep-both':
      case 'skip':
        break;
      case 'abort':
        getLogger().info('dedupe', 'Review aborted, no changes made');
        return { aborted: true };
    }
  }

  return { aborted: false, removed, reviewed, autoSkipped };
}

// ─── Quality ────────────────────────────────────────────────────────

export type QualityChoice = 'accept' | 'keep' | 'remove' | 'skip' | 'abort';

export type QualityChooser = (review: CardReview, position: ReviewPosition) => Promise<QualityChoice>;

export type QualityResolution =
  | { aborted: true }
  | { aborted: false; removed: Set<number>; rewrites: Map<number, Improvement> };

export async function resolveQuality(
  reviews: readonly CardReview[],
  chooser: QualityChooser
): Promise<QualityResolution> {
  const removed = new Set<number>();
  const rewrites = new Map<number, Improvement>();

  for (const [idx, review] of reviews.entries()) {
    const choice = await chooser(review, { current: idx + 1, total: reviews.length });

    switch (choice) {
      case 'accept':
        if (review.improvement) {
          rewrites.set(review.index, review.improvement);
        } else {
          getLogger().warn('curate', `No rewrite to accept for card ${review.index + 1}; keeping it`);
        }
        break;
      case 'remove':
        removed.add(review.index);
        break;
      case 'keep':
      case 'skip':
        break;
      case 'abort':
        getLogger().info('curate', 'Review aborted, no changes made');
        return { aborted: true };
    }
  }

  return { aborted: false, removed, rewrites };
}

// ─── Applying decisions ─────────────────────────────────────────────

export function applyRemovals(cards: readonly Card[], removed: ReadonlySet<number>): Card[] {
  return cards.filter((_, idx) => !removed.has(idx));
}

/** Rewritten cards keep their id, tags and archived flag */
export function applyRewrites(cards: readonly Card[], rewrites: ReadonlyMap<number, Improvement>): Card[] {
  return cards.map((card, idx) => {
    const rewrite = rewrites.get(idx);
    return rewrite ? withContent(card, rewrite.question, rewrite.answer) : card;
  });
}
