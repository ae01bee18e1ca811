import { HybridWeights } from '../config.js';
import { ValidationError } from '../errors.js';
import { MetadataFilter, RetrievalResult, SearchMode } from '../types.js';
import { EmbeddingProvider } from './embeddings.js';
import { KeywordIndex } from './keyword-index.js';
import { fuseResults } from './ranking.js';
import { VectorIndex } from './vector-index.js';

export interface SearchDeps {
  index: VectorIndex;
  keywordIndex: KeywordIndex;
  provider: EmbeddingProvider;
}

export interface SearchOptions {
  filter?: MetadataFilter;
  signal?: AbortSignal;
}

function validateQuery(query: string, k: number): void {
  if (!query.trim()) throw new ValidationError('query must not be empty');
  if (!Number.isInteger(k) || k <= 0) throw new ValidationError(`k must be a positive integer, got ${k}`);
}

/**
 * Vector candidates for a query. Returns nothing when the index is empty or
 * the query vector does not match the index dimension.
 */
export async function vectorCandidates(
  deps: SearchDeps,
  query: string,
  k: number,
  opts: SearchOptions = {}
): Promise<RetrievalResult[]> {
  if (deps.index.stats().recordCount === 0) return [];
  const queryVector = await deps.provider.embedQuery(query, opts.signal);
  opts.signal?.throwIfAborted();
  if (queryVector.length !== deps.index.dimension) {
    console.warn(
      `[search] query vector has dimension ${queryVector.length}, index expects ${deps.index.dimension}; using keyword results only`
    );
    return [];
  }
  return deps.index.search(queryVector, k, opts.filter);
}

/**
 * Fuses 2k vector and 2k keyword candidates. Weights are independent
 * multipliers, not shares of 1.
 */
export async function hybridSearch(
  deps: SearchDeps,
  query: string,
  k: number,
  weights: HybridWeights,
  opts: SearchOptions = {}
): Promise<RetrievalResult[]> {
  validateQuery(query, k);
  const [vectorHits, keywordHits] = await Promise.all([
    vectorCandidates(deps, query, k * 2, opts),
    deps.keywordIndex.search(query, k * 2, opts.filter)
  ]);
  opts.signal?.throwIfAborted();
  return fuseResults(vectorHits, keywordHits, weights, k);
}

export async function searchChunks(
  deps: SearchDeps,
  query: string,
  k: number,
  mode: SearchMode,
  weights: HybridWeights,
  opts: SearchOptions = {}
): Promise<RetrievalResult[]> {
  validateQuery(query, k);
  switch (mode) {
    case 'hybrid':
      return hybridSearch(deps, query, k, weights, opts);
    case 'semantic': {
      // Same candidate window as hybrid, so relevance is normalized over the same set.
      const hits = await vectorCandidates(deps, query, k * 2, opts);
      return hits.slice(0, k);
    }
    case 'keyword': {
      const hits = await deps.keywordIndex.search(query, k, opts.filter);
      opts.signal?.throwIfAborted();
      return hits;
    }
  }
}
