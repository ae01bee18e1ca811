import { HybridWeights, parseHybridWeights } from '../config.js';
import { RetrievalResult } from '../types.js';

export function getHybridWeights(env: NodeJS.ProcessEnv = process.env): HybridWeights {
  return parseHybridWeights(env.KB_HYBRID_WEIGHTS_JSON);
}

function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}

export function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Absolute band a relative score is held to. Weak matches stay weak even
 * when they are the best of the candidate set.
 */
function relevanceBand(distance: number): [number, number] {
  if (distance > 2.0) return [0, 0.3];
  if (distance > 1.5) return [0.1, 0.5];
  if (distance < 0.3) return [0.7, 1.0];
  return [0.2, 0.8];
}

/**
 * Maps candidate distances to relevance scores in [0, 1]. Smaller distance
 * never scores lower.
 */
export function normalizeRelevance(distances: number[]): number[] {
  if (!distances.length) return [];
  const min = Math.min(...distances);
  const max = Math.max(...distances);
  return distances.map((d) => {
    const base = max > min ? 1 - (d - min) / (max - min) : 0.5;
    const [lo, hi] = relevanceBand(d);
    return round3(clamp(base, lo, hi));
  });
}

interface FusedEntry {
  result: RetrievalResult;
  vectorRank: number;
  keywordRank: number;
}

/**
 * Merges vector and keyword candidates. A chunk present in both lists gets
 * the sum of its two weighted contributions.
 */
export function fuseResults(
  vectorHits: RetrievalResult[],
  keywordHits: RetrievalResult[],
  weights: HybridWeights,
  k: number
): RetrievalResult[] {
  const byId = new Map<number, FusedEntry>();

  vectorHits.forEach((hit, rank) => {
    byId.set(hit.id, {
      result: {
        ...hit,
        keyword_score: 0,
        combined_score: weights.vector * hit.relevance_score
      },
      vectorRank: rank,
      keywordRank: Number.POSITIVE_INFINITY
    });
  });

  keywordHits.forEach((hit, rank) => {
    const existing = byId.get(hit.id);
    const contribution = weights.keyword * hit.keyword_score;
    if (existing) {
      existing.result = {
        ...existing.result,
        keyword_score: hit.keyword_score,
        combined_score: existing.result.combined_score + contribution
      };
      existing.keywordRank = rank;
      return;
    }
    byId.set(hit.id, {
      result: { ...hit, vector_score: 0, combined_score: contribution },
      vectorRank: Number.POSITIVE_INFINITY,
      keywordRank: rank
    });
  });

  const compareRank = (a: number, b: number): number => (a === b ? 0 : a < b ? -1 : 1);

  return [...byId.values()]
    .sort(
      (a, b) =>
        b.result.combined_score - a.result.combined_score ||
        compareRank(a.vectorRank, b.vectorRank) ||
        a.result.metadata.chunk_index - b.result.metadata.chunk_index ||
        compareRank(a.keywordRank, b.keywordRank)
    )
    .slice(0, Math.max(0, k))
    .map((entry) => entry.result);
}
