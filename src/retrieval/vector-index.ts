import { DBContext } from '../db/client.js';
import {
  contentHashesFor,
  countChunks,
  countDocuments,
  deleteChunkRows,
  hasContentHash,
  insertChunkRows,
  listFilenames,
  parseEmbedding,
  rowToChunk,
  selectChunkRows,
  whereFromFilter
} from '../db/chunks.js';
import { readJsonSetting, writeJsonSetting } from '../db/settings.js';
import { isRecord } from '../config.js';
import { ValidationError } from '../errors.js';
import { Chunk, IndexStats, MetadataFilter, RetrievalResult } from '../types.js';
import {
  isTokenFrequencyState,
  STRATEGY_ORDER,
  StrategyName,
  TokenFrequencyState
} from './embedding-strategies.js';
import { euclideanDistance } from './embeddings.js';
import { normalizeRelevance } from './ranking.js';

export interface IndexIdentity {
  strategy: StrategyName;
  dimension: number;
}

export interface IndexConfig extends IndexIdentity {
  tokenFrequency: TokenFrequencyState | null;
}

const INDEX_CONFIG_KEY = 'index_config_v1';

export function readIndexConfig(ctx: DBContext): IndexConfig | null {
  const raw = readJsonSetting(ctx, INDEX_CONFIG_KEY);
  if (!isRecord(raw)) return null;
  const strategy = STRATEGY_ORDER.find((name) => name === raw.strategy);
  const dimension = raw.dimension;
  if (!strategy || typeof dimension !== 'number' || !Number.isInteger(dimension) || dimension <= 0) return null;
  return {
    strategy,
    dimension,
    tokenFrequency: isTokenFrequencyState(raw.tokenFrequency) ? raw.tokenFrequency : null
  };
}

export function writeIndexConfig(ctx: DBContext, config: IndexConfig): void {
  writeJsonSetting(ctx, INDEX_CONFIG_KEY, config);
}

/**
 * Chunk vectors in SQLite with exact Euclidean search. better-sqlite3 runs
 * each write to completion in one transaction, so writers never interleave.
 */
export class VectorIndex {
  private identity: IndexIdentity;

  constructor(
    private readonly ctx: DBContext,
    private readonly active: IndexIdentity
  ) {
    const persisted = readIndexConfig(ctx);
    this.identity = persisted && countChunks(ctx) > 0 ? { strategy: persisted.strategy, dimension: persisted.dimension } : { ...active };
  }

  get dimension(): number {
    return this.identity.dimension;
  }

  get strategyName(): StrategyName {
    return this.identity.strategy;
  }

  /**
   * Stores chunks with their vectors. Rejects the whole call, writing
   * nothing, when any vector does not fit the index.
   */
  add(chunks: Chunk[], vectors: number[][], strategy: StrategyName = this.active.strategy): boolean {
    if (chunks.length !== vectors.length) {
      throw new ValidationError(`got ${chunks.length} chunks but ${vectors.length} vectors`);
    }
    if (!chunks.length) return false;

    const empty = countChunks(this.ctx) === 0;
    const target = empty ? { ...this.active } : this.identity;

    if (strategy !== target.strategy) {
      throw new ValidationError(`index holds ${target.strategy} vectors; refusing ${strategy} vectors`);
    }
    vectors.forEach((vector, i) => {
      if (vector.length !== target.dimension) {
        throw new ValidationError(`vector ${i} has dimension ${vector.length}, index expects ${target.dimension}`);
      }
      if (!vector.every((x) => Number.isFinite(x))) {
        throw new ValidationError(`vector ${i} contains non-finite values`);
      }
    });

    if (empty) {
      const previous = readIndexConfig(this.ctx);
      const tokenFrequency = previous && previous.strategy === target.strategy ? previous.tokenFrequency : null;
      writeIndexConfig(this.ctx, { ...target, tokenFrequency });
      this.identity = target;
    }
    insertChunkRows(this.ctx, chunks, vectors);
    return true;
  }

  /** Nearest chunks by Euclidean distance, closest first. */
  search(queryVector: number[], k: number, filter?: MetadataFilter): RetrievalResult[] {
    if (!Number.isInteger(k) || k <= 0) {
      throw new ValidationError(`k must be a positive integer, got ${k}`);
    }
    if (queryVector.length !== this.identity.dimension) {
      throw new ValidationError(`query vector has dimension ${queryVector.length}, index expects ${this.identity.dimension}`);
    }

    const nearest = selectChunkRows(this.ctx, filter)
      .map((row) => ({ row, vector: parseEmbedding(row.embedding_json) }))
      .filter((entry) => entry.vector.length === queryVector.length)
      .map((entry) => ({ row: entry.row, distance: euclideanDistance(queryVector, entry.vector) }))
      .sort((a, b) => a.distance - b.distance || a.row.id - b.row.id)
      .slice(0, k);

    const scores = normalizeRelevance(nearest.map((n) => n.distance));
    return nearest.map((n, i) => ({
      ...rowToChunk(n.row),
      distance: n.distance,
      vector_score: scores[i],
      keyword_score: 0,
      combined_score: scores[i],
      relevance_score: scores[i]
    }));
  }

  /** Removes every matching record; false when the filter is empty or matched nothing. */
  delete(filter: MetadataFilter): boolean {
    if (!whereFromFilter(filter).clause) return false;
    return deleteChunkRows(this.ctx, filter) > 0;
  }

  hasContentHash(hash: string): boolean {
    return hasContentHash(this.ctx, hash);
  }

  contentHashesFor(filename: string): string[] {
    return contentHashesFor(this.ctx, filename);
  }

  listFilenames(): Array<{ filename: string; chunkCount: number }> {
    return listFilenames(this.ctx);
  }

  saveTokenFrequencyState(state: TokenFrequencyState): void {
    const current = readIndexConfig(this.ctx);
    const base = current ?? { ...this.identity, tokenFrequency: null };
    writeIndexConfig(this.ctx, { ...base, tokenFrequency: state });
  }

  stats(): IndexStats {
    return {
      recordCount: countChunks(this.ctx),
      documentCount: countDocuments(this.ctx),
      dimension: this.identity.dimension,
      strategyName: this.identity.strategy
    };
  }
}
