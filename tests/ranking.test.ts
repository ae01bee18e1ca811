import { describe, it, expect } from 'vitest';
import { fuseResults, getHybridWeights, normalizeRelevance } from '../src/retrieval/ranking.js';
import { RetrievalResult } from '../src/types.js';

function hit(id: number, scores: { relevance?: number; keyword?: number; chunkIndex?: number }): RetrievalResult {
  const relevance = scores.relevance ?? 0;
  const keyword = scores.keyword ?? 0;
  return {
    id,
    content: `chunk ${id}`,
    metadata: {
      source_path: `/docs/doc${id}.md`,
      filename: `doc${id}.md`,
      chunk_index: scores.chunkIndex ?? 0,
      chunk_count: 10,
      file_type: '.md',
      file_size_mb: 0,
      content_hash: `h${id}`,
      category: 'reference',
      priority: 'low',
      tags: [],
      summary: '',
      custom: {}
    },
    distance: scores.relevance === undefined ? null : 1 - relevance,
    vector_score: relevance,
    keyword_score: keyword,
    combined_score: relevance || keyword,
    relevance_score: relevance || keyword
  };
}

describe('normalizeRelevance', () => {
  it('scales relative to the candidate set inside absolute distance bands', () => {
    expect(normalizeRelevance([0, 0.5, 1, 3])).toEqual([1, 0.8, 0.667, 0]);
  });

  it('gives equal distances the middle score', () => {
    expect(normalizeRelevance([1, 1])).toEqual([0.5, 0.5]);
  });

  it('keeps weak matches weak even when they are the best available', () => {
    expect(normalizeRelevance([2.5, 3])).toEqual([0.3, 0]);
    expect(normalizeRelevance([1.6, 1.8])).toEqual([0.5, 0.1]);
  });

  it('is monotone in distance', () => {
    const distances = [0.05, 0.2, 0.29, 0.31, 0.9, 1.49, 1.51, 1.99, 2.01, 2.7];
    const scores = normalizeRelevance(distances);
    for (let i = 1; i < scores.length; i++) {
      expect(scores[i - 1]).toBeGreaterThanOrEqual(scores[i]);
      expect(scores[i]).toBeGreaterThanOrEqual(0);
      expect(scores[i]).toBeLessThanOrEqual(1);
    }
  });

  it('handles an empty candidate set', () => {
    expect(normalizeRelevance([])).toEqual([]);
  });
});

describe('fuseResults', () => {
  const weights = { vector: 0.7, keyword: 0.3 };

  it('sums both contributions for a chunk found by both searches', () => {
    const fused = fuseResults(
      [hit(1, { relevance: 0.8 }), hit(2, { relevance: 0.6 })],
      [hit(2, { keyword: 0.5 }), hit(3, { keyword: 1 })],
      weights,
      5
    );

    expect(fused.map((r) => r.id)).toEqual([2, 1, 3]);
    expect(fused[0].combined_score).toBeCloseTo(0.7 * 0.6 + 0.3 * 0.5, 10);
    expect(fused[0].keyword_score).toBe(0.5);
    expect(fused[0].vector_score).toBe(0.6);
    expect(fused[1].combined_score).toBeCloseTo(0.56, 10);
    expect(fused[2].vector_score).toBe(0);
    expect(fused[2].combined_score).toBeCloseTo(0.3, 10);
  });

  it('equals scaled vector ranking when the keyword side is empty', () => {
    const vector = [hit(4, { relevance: 0.9 }), hit(5, { relevance: 0.4 }), hit(6, { relevance: 0.2 })];
    const fused = fuseResults(vector, [], weights, 2);

    expect(fused.map((r) => r.id)).toEqual([4, 5]);
    expect(fused.map((r) => r.combined_score)).toEqual([0.7 * 0.9, 0.7 * 0.4]);
  });

  it('breaks ties by vector rank, then chunk index', () => {
    const fused = fuseResults(
      [hit(1, { relevance: 0.5, chunkIndex: 3 }), hit(2, { relevance: 0.5, chunkIndex: 1 })],
      [hit(3, { keyword: 0.5, chunkIndex: 4 }), hit(4, { keyword: 0.5, chunkIndex: 2 })],
      { vector: 1, keyword: 1 },
      4
    );
    expect(fused.map((r) => r.id)).toEqual([1, 2, 4, 3]);
  });

  it('treats weights as independent multipliers', () => {
    const fused = fuseResults([hit(1, { relevance: 0.5 })], [hit(1, { keyword: 0.25 })], { vector: 2, keyword: 4 }, 1);
    expect(fused[0].combined_score).toBe(2);
  });
});

describe('getHybridWeights', () => {
  it('defaults to 0.7 vector and 0.3 keyword', () => {
    expect(getHybridWeights({})).toEqual({ vector: 0.7, keyword: 0.3 });
  });

  it('reads overrides without normalizing them', () => {
    expect(getHybridWeights({ KB_HYBRID_WEIGHTS_JSON: JSON.stringify({ vector: 1, keyword: 1 }) })).toEqual({
      vector: 1,
      keyword: 1
    });
  });

  it('falls back per key on bad input', () => {
    expect(getHybridWeights({ KB_HYBRID_WEIGHTS_JSON: 'not json' })).toEqual({ vector: 0.7, keyword: 0.3 });
    expect(getHybridWeights({ KB_HYBRID_WEIGHTS_JSON: JSON.stringify({ vector: -1, keyword: 0.5 }) })).toEqual({
      vector: 0.7,
      keyword: 0.5
    });
  });
});
