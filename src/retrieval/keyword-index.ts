import { DBContext } from '../db/client.js';
import { rowToChunk, selectChunkRows } from '../db/chunks.js';
import { MetadataFilter, RetrievalResult } from '../types.js';
import { contentTokens, contentTokenSet } from '../utils/text.js';
import { round3 } from './ranking.js';

/**
 * Lexical side of hybrid search. `keyword_score` is in [0, 1]. An index
 * may return nothing; hybrid search then ranks by vectors alone.
 */
export interface KeywordIndex {
  search(query: string, k: number, filter?: MetadataFilter): Promise<RetrievalResult[]>;
}

export class EmptyKeywordIndex implements KeywordIndex {
  async search(): Promise<RetrievalResult[]> {
    return [];
  }
}

/**
 * Scores a chunk by the share of distinct query terms it contains. Ties go
 * to the chunk with more query-term occurrences, then to the older chunk.
 */
export class TokenOverlapKeywordIndex implements KeywordIndex {
  constructor(private readonly ctx: DBContext) {}

  async search(query: string, k: number, filter?: MetadataFilter): Promise<RetrievalResult[]> {
    const queryTerms = contentTokenSet(query);
    if (!queryTerms.size || k <= 0) return [];

    const scored = selectChunkRows(this.ctx, filter)
      .map((row) => {
        const tokens = contentTokens(row.text);
        const present = new Set(tokens.filter((t) => queryTerms.has(t)));
        const frequency = tokens.filter((t) => queryTerms.has(t)).length;
        return { row, score: present.size / queryTerms.size, frequency };
      })
      .filter((entry) => entry.score > 0)
      .sort((a, b) => b.score - a.score || b.frequency - a.frequency || a.row.id - b.row.id)
      .slice(0, k);

    return scored.map(({ row, score }) => {
      const rounded = round3(score);
      return {
        ...rowToChunk(row),
        distance: null,
        vector_score: 0,
        keyword_score: rounded,
        combined_score: rounded,
        relevance_score: rounded
      };
    });
  }
}
