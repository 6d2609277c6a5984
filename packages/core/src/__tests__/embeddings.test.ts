import { LlmError } from '../errors.js';
import { normalizeEmbeddingResponse } from '../embeddings.js';

describe('normalizeEmbeddingResponse', () => {
  test('orders vectors by index', () => {
    const raw = {
      data: [
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] },
      ],
    };

    expect(normalizeEmbeddingResponse(raw, 2)).toEqual([
      [1, 0],
      [0, 1],
    ]);
  });

  test('rejects an unexpected shape', () => {
    expect(() => normalizeEmbeddingResponse({ data: [{ embedding: 'x' }] }, 1)).toThrow(LlmError);
  });

  test('rejects a missing vector', () => {
    expect(() => normalizeEmbeddingResponse({ data: [{ index: 0, embedding: [1] }] }, 2)).toThrow(
      'Missing embedding for input 1'
    );
  });

  test('rejects an index out of range', () => {
    expect(() => normalizeEmbeddingResponse({ data: [{ index: 3, embedding: [1] }] }, 1)).toThrow(
      'Embedding index 3 out of range'
    );
  });
});
