/**
 * Candidate pair search over card embeddings.
 *
 * Two backends:
 * - `exact`: every pair is scored (O(n²)).
 * - `indexed`: vectors are L2-normalized into a flat inner-product index and
 *   each card keeps only its top-K neighbours. Pairs outside a card's top K
 *   are missed, which matters only for very large decks with many
 *   near-identical cards. Raise `topK` to trade time for recall.
 */

import type { SimilarityBackend } from '@flashsync/core';

export interface CandidatePair {
  /** Always less than indexB */
  indexA: number;
  indexB: number;
  score: number;
}

export interface SimilarityOptions {
  backend?: SimilarityBackend;
  /** Neighbours kept per card by the indexed backend */
  topK?: number;
  /** `auto` switches to the indexed backend at this many cards */
  indexMinCards?: number;
}

export const DEFAULT_TOP_K = 100;
export const DEFAULT_INDEX_MIN_CARDS = 1000;

// ─── Vector math ────────────────────────────────────────────────────

function dot(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

function magnitude(v: readonly number[]): number {
  return Math.sqrt(dot(v, v));
}

/** Cosine similarity; 0 when either vector is all zeros */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const denom = magnitude(a) * magnitude(b);
  return denom === 0 ? 0 : dot(a, b) / denom;
}

/** Unit-length copy of `v` (a zero vector stays zero) */
export function normalize(v: readonly number[]): number[] {
  const mag = magnitude(v);
  return mag === 0 ? v.map(() => 0) : v.map((x) => x / mag);
}

// ─── Flat inner-product index ───────────────────────────────────────

export class FlatIpIndex {
  private readonly vectors: number[][];

  constructor(vectors: readonly (readonly number[])[]) {
    this.vectors = vectors.map(normalize);
  }

  get size(): number {
    return this.vectors.length;
  }

  /** Up to `k` nearest neighbours of the stored vector `i`, best first, excluding itself */
  neighbours(i: number, k: number): Array<{ index: number; score: number }> {
    const query = this.vectors[i];
    const hits: Array<{ index: number; score: number }> = [];
    for (let j = 0; j < this.vectors.length; j++) {
      if (j === i) continue;
      hits.push({ index: j, score: dot(query, this.vectors[j]) });
    }
    hits.sort((x, y) => y.score - x.score || x.index - y.index);
    return hits.slice(0, k);
  }
}

// ─── Pair search ────────────────────────────────────────────────────

export function chooseBackend(
  count: number,
  backend: SimilarityBackend,
  indexMinCards: number = DEFAULT_INDEX_MIN_CARDS
): 'exact' | 'indexed' {
  if (backend !== 'auto') return backend;
  return count >= indexMinCards ? 'indexed' : 'exact';
}

function comparePairs(x: CandidatePair, y: CandidatePair): number {
  return y.score - x.score || x.indexA - y.indexA || x.indexB - y.indexB;
}

function exactPairs(vectors: readonly (readonly number[])[], threshold: number): CandidatePair[] {
  const pairs: CandidatePair[] = [];
  for (let i = 0; i < vectors.length; i++) {
    for (let j = i + 1; j < vectors.length; j++) {
      const score = cosineSimilarity(vectors[i], vectors[j]);
      if (score >= threshold) pairs.push({ indexA: i, indexB: j, score });
    }
  }
  return pairs;
}

function indexedPairs(vectors: readonly (readonly number[])[], threshold: number, topK: number): CandidatePair[] {
  const index = new FlatIpIndex(vectors);
  const seen = new Map<string, CandidatePair>();
  for (let i = 0; i < index.size; i++) {
    for (const hit of index.neighbours(i, topK)) {
      if (hit.score < threshold) break;
      const indexA = Math.min(i, hit.index);
      const indexB = Math.max(i, hit.index);
      const key = `${indexA}:${indexB}`;
      if (!seen.has(key)) seen.set(key, { indexA, indexB, score: hit.score });
    }
  }
  return [...seen.values()];
}

/**
 * Pairs of vectors with similarity at or above `threshold`, each unordered
 * pair once, sorted by descending score.
 */
export function findCandidatePairs(
  vectors: readonly (readonly number[])[],
  threshold: number,
  options: SimilarityOptions = {}
): CandidatePair[] {
  const backend = chooseBackend(vectors.length, options.backend ?? 'auto', options.indexMinCards);
  const pairs =
    backend === 'indexed'
      ? indexedPairs(vectors, threshold, options.topK ?? DEFAULT_TOP_K)
      : exactPairs(vectors, threshold);
  return pairs.sort(comparePairs);
}
