import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createCard } from '@flashsync/deck';
import { CacheStore } from '../caches.js';
import { embedCards, embeddingText } from '../embed.js';
import { FakeEmbeddingProvider } from './fakes.js';

describe('embedCards', () => {
  let dir: string;
  let store: CacheStore;

  const cards = [
    createCard({ question: 'Q1', answer: 'A1' }),
    createCard({ question: 'Q2', answer: 'A2' }),
    createCard({ id: 'AbCd1234', question: 'Q1', answer: 'A1' }),
  ];
  const provider = () =>
    new FakeEmbeddingProvider({
      'Q1\nA1': [1, 0, 0],
      'Q2\nA2': [0, 1, 0],
    });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flashsync-embed-'));
    store = new CacheStore(dir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('embedding text is question and answer on separate lines', () => {
    expect(embeddingText({ question: 'What?', answer: 'That.' })).toBe('What?\nThat.');
  });

  test('returns one vector per card, embedding each distinct text once', async () => {
    const fake = provider();
    const progress: Array<[number, number]> = [];

    const vectors = await embedCards(cards, fake, store.embeddings, {
      batchSize: 1,
      onBatch: (done, total) => progress.push([done, total]),
    });

    expect(vectors).toEqual([
      [1, 0, 0],
      [0, 1, 0],
      [1, 0, 0],
    ]);
    expect(fake.batches).toEqual([['Q1\nA1'], ['Q2\nA2']]);
    expect(progress).toEqual([
      [1, 2],
      [2, 2],
    ]);
  });

  test('cached vectors are not requested again', async () => {
    const fake = provider();
    await embedCards(cards, fake, store.embeddings, { batchSize: 10 });

    const reloaded = new CacheStore(dir);
    reloaded.load();
    const vectors = await embedCards(cards, fake, reloaded.embeddings, { batchSize: 10 });

    expect(fake.batches).toEqual([['Q1\nA1', 'Q2\nA2']]);
    expect(vectors[1]).toEqual([0, 1, 0]);
  });

  test('rejects a batch size below one', async () => {
    await expect(embedCards(cards, provider(), store.embeddings, { batchSize: 0 })).rejects.toThrow(
      'Batch size must be a positive integer, got 0'
    );
  });
});
