import { createCard } from '@flashsync/deck';
import type { ClassifiedPair } from '../classifier.js';
import type { CardReview } from '../improver.js';
import {
  applyRemovals,
  applyRewrites,
  policyDuplicateChooser,
  resolveDuplicates,
  resolveQuality,
  type DuplicateChoice,
  type DuplicateChooser,
  type QualityChoice,
} from '../resolver.js';

const cards = ['Q0', 'Q1', 'Q2', 'Q3'].map((q, i) => createCard({ question: q, answer: `A${i}` }));

function pair(indexA: number, indexB: number, classification: ClassifiedPair['classification']): ClassifiedPair {
  return { indexA, indexB, score: 0.9, classification, reasoning: 'r' };
}

function scripted(choices: DuplicateChoice[]): { chooser: DuplicateChooser; seen: string[] } {
  const seen: string[] = [];
  const chooser: DuplicateChooser = async (_pair, first, second, position) => {
    seen.push(`${first.question}/${second.question} ${position.current}/${position.total}`);
    return choices.shift() ?? 'skip';
  };
  return { chooser, seen };
}

describe('resolveDuplicates', () => {
  const classified = [
    pair(0, 1, 'duplicate'),
    pair(0, 2, 'complementary'),
    pair(1, 2, 'unclear'),
    pair(2, 3, 'duplicate'),
  ];

  test('skips complementary pairs and pairs touching a removed card', async () => {
    const { chooser, seen } = scripted(['keep-first', 'keep-second']);

    const result = await resolveDuplicates(classified, cards, chooser);

    expect(seen).toEqual(['Q0/Q1 1/3', 'Q2/Q3 3/3']);
    expect(result).toEqual({ aborted: false, removed: new Set([1, 2]), reviewed: 2, autoSkipped: 1 });
  });

  test('abort discards every decision', async () => {
    const { chooser } = scripted(['keep-first', 'abort']);

    const result = await resolveDuplicates(
      [pair(0, 1, 'duplicate'), pair(2, 3, 'duplicate')],
      cards,
      chooser
    );

    expect(result).toEqual({ aborted: true });
  });

  test('the policy chooser keeps the first card of each duplicate pair', async () => {
    const result = await resolveDuplicates(classified, cards, policyDuplicateChooser);

    expect(result).toEqual({ aborted: false, removed: new Set([1, 3]), reviewed: 2, autoSkipped: 1 });
  });
});

describe('resolveQuality', () => {
  const review = (index: number, withRewrite: boolean): CardReview => ({
    index,
    card: cards[index],
    grade: { score: 3, reasoning: 'vague' },
    failed: false,
    improvement: withRewrite ? { question: `Better Q${index}`, answer: `Better A${index}` } : null,
  });

  test('collects rewrites and removals', async () => {
    const choices: QualityChoice[] = ['accept', 'remove', 'accept', 'keep'];
    const result = await resolveQuality(
      [review(0, true), review(1, true), review(2, false), review(3, true)],
      async () => choices.shift() ?? 'skip'
    );

    expect(result).toEqual({
      aborted: false,
      removed: new Set([1]),
      rewrites: new Map([[0, { question: 'Better Q0', answer: 'Better A0' }]]),
    });
  });

  test('abort returns nothing to apply', async () => {
    const result = await resolveQuality([review(0, true)], async () => 'abort');
    expect(result).toEqual({ aborted: true });
  });
});

describe('applying decisions', () => {
  test('removals drop cards by position', () => {
    expect(applyRemovals(cards, new Set([0, 2])).map((c) => c.question)).toEqual(['Q1', 'Q3']);
  });

  test('rewrites keep id, tags and archived flag', () => {
    const original = createCard({ id: 'AbCd1234', question: 'Old', answer: 'Ans', tags: ['bio'], archived: true });

    const [rewritten] = applyRewrites([original], new Map([[0, { question: 'New', answer: 'Ans' }]]));

    expect(rewritten).toMatchObject({ id: 'AbCd1234', question: 'New', answer: 'Ans', tags: ['bio'], archived: true });
    expect(rewritten.contentHash).not.toBe(original.contentHash);
  });
});
