import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createCard } from '@flashsync/deck';
import { CacheStore } from '../caches.js';
import { gradeCards, parseGrade } from '../grader.js';
import { FakeChatProvider } from './fakes.js';

describe('parseGrade', () => {
  test('reads score and reasoning', () => {
    expect(parseGrade('8 | clear and atomic')).toEqual({ value: { score: 8, reasoning: 'clear and atomic' }, ok: true });
  });

  test('clamps and rounds the score', () => {
    expect(parseGrade('12 | superb').value.score).toBe(10);
    expect(parseGrade('-3 | awful').value.score).toBe(0);
    expect(parseGrade('7.6 | fine').value.score).toBe(8);
    expect(parseGrade('6/10 | fine').value.score).toBe(6);
  });

  test('falls back to a neutral score with a diagnostic', () => {
    expect(parseGrade('great card')).toEqual({
      value: { score: 5, reasoning: 'Could not parse grade: great card' },
      ok: false,
    });
    expect(parseGrade('high | solid')).toEqual({ value: { score: 5, reasoning: "Invalid score 'high': solid" }, ok: false });
  });
});

describe('gradeCards', () => {
  let dir: string;
  let store: CacheStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flashsync-grade-'));
    store = new CacheStore(dir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('grades every card and caches only successes', async () => {
    const cards = [createCard({ question: 'Q1', answer: 'A1' }), createCard({ question: 'Q2', answer: 'A2' })];
    const provider = new FakeChatProvider((req) =>
      req.userPrompt.includes('Q: Q2') ? new Error('boom') : '9 | good card'
    );

    const graded = await gradeCards(cards, store.gradings, { provider, windowSize: 10 });

    expect(graded.map((g) => [g.index, g.grade.score, g.failed])).toEqual([
      [0, 9, false],
      [1, 5, true],
    ]);
    expect(graded[1].grade.reasoning).toBe('LLM request failed: boom');
    expect(store.gradings.size).toBe(1);
    expect(provider.requests.every((r) => r.operation === 'grade' && r.temperature === 0)).toBe(true);
  });

  test('an unreadable grade is marked failed and asked again next run', async () => {
    const cards = [createCard({ question: 'Q1', answer: 'A1' }), createCard({ question: 'Q2', answer: 'A2' })];
    const provider = new FakeChatProvider((req) =>
      req.userPrompt.includes('Q: Q2') ? 'garbled output without delimiter' : '7 | fine'
    );

    const graded = await gradeCards(cards, store.gradings, { provider, windowSize: 10 });

    expect(graded.map((g) => [g.grade.score, g.failed])).toEqual([
      [7, false],
      [5, true],
    ]);
    expect(graded[1].grade.reasoning).toBe('Could not parse grade: garbled output without delimiter');
    expect(store.gradings.size).toBe(1);

    await gradeCards(cards, store.gradings, { provider, windowSize: 10 });
    expect(provider.requests).toHaveLength(3);
  });

  test('cards with the same content share one request', async () => {
    const cards = [createCard({ question: 'Q', answer: 'A' }), createCard({ id: 'AbCd1234', question: 'Q', answer: 'A' })];
    const provider = new FakeChatProvider(() => '4 | vague');

    const graded = await gradeCards(cards, store.gradings, { provider, windowSize: 10 });

    expect(provider.requests).toHaveLength(1);
    expect(graded.map((g) => g.grade.score)).toEqual([4, 4]);
  });
});
