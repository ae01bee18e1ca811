import { DBContext } from './client.js';
import { isRecord } from '../config.js';
import {
  CATEGORIES,
  Category,
  Chunk,
  ChunkCustomFields,
  DEFAULT_CATEGORY,
  FilterKey,
  MetadataFilter,
  PRIORITIES,
  Priority,
  StoredChunk
} from '../types.js';

export interface ChunkRow {
  id: number;
  source_path: string;
  filename: string;
  chunk_index: number;
  chunk_count: number;
  file_type: string;
  file_size_mb: number;
  content_hash: string;
  category: string;
  priority: string;
  tags_json: string;
  summary: string;
  custom_json: string;
  text: string;
  embedding_json: string;
}

const FILTER_COLUMNS: Record<FilterKey, string> = {
  filename: 'filename',
  source_path: 'source_path',
  file_type: 'file_type',
  category: 'category',
  priority: 'priority',
  content_hash: 'content_hash'
};

function isFilterKey(key: string): key is FilterKey {
  return Object.prototype.hasOwnProperty.call(FILTER_COLUMNS, key);
}

/** Builds an AND-of-equalities WHERE clause. Unknown keys are ignored. */
export function whereFromFilter(filter: MetadataFilter | undefined): { clause: string; params: string[] } {
  const conditions: string[] = [];
  const params: string[] = [];
  for (const [key, value] of Object.entries(filter ?? {})) {
    if (value === undefined || !isFilterKey(key)) continue;
    conditions.push(`${FILTER_COLUMNS[key]} = ?`);
    params.push(value);
  }
  return { clause: conditions.length ? `WHERE ${conditions.join(' AND ')}` : '', params };
}

function parseCategory(value: string): Category {
  return CATEGORIES.find((c) => c === value) ?? DEFAULT_CATEGORY;
}

function parsePriority(value: string): Priority {
  return PRIORITIES.find((p) => p === value) ?? 'low';
}

function parseTags(value: string): string[] {
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === 'string') : [];
  } catch {
    return [];
  }
}

function parseCustom(value: string): ChunkCustomFields {
  try {
    const parsed: unknown = JSON.parse(value);
    if (!isRecord(parsed)) return {};
    const out: ChunkCustomFields = {};
    for (const [k, v] of Object.entries(parsed)) {
      if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') out[k] = v;
    }
    return out;
  } catch {
    return {};
  }
}

export function parseEmbedding(value: string): number[] {
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.map((v) => Number(v)) : [];
  } catch {
    return [];
  }
}

export function rowToChunk(row: ChunkRow): StoredChunk {
  return {
    id: row.id,
    content: row.text,
    metadata: {
      source_path: row.source_path,
      filename: row.filename,
      chunk_index: row.chunk_index,
      chunk_count: row.chunk_count,
      file_type: row.file_type,
      file_size_mb: row.file_size_mb,
      content_hash: row.content_hash,
      category: parseCategory(row.category),
      priority: parsePriority(row.priority),
      tags: parseTags(row.tags_json),
      summary: row.summary,
      custom: parseCustom(row.custom_json)
    }
  };
}

export function insertChunkRows(ctx: DBContext, chunks: Chunk[], vectors: number[][]): number[] {
  const stmt = ctx.db.prepare(
    `INSERT INTO chunks (source_path, filename, chunk_index, chunk_count, file_type, file_size_mb, content_hash,
                         category, priority, tags_json, summary, custom_json, text, embedding_json)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );
  const tx = ctx.db.transaction((items: Chunk[]) => {
    const ids: number[] = [];
    items.forEach((chunk, i) => {
      const m = chunk.metadata;
      const info = stmt.run(
        m.source_path,
        m.filename,
        m.chunk_index,
        m.chunk_count,
        m.file_type,
        m.file_size_mb,
        m.content_hash,
        m.category,
        m.priority,
        JSON.stringify(m.tags),
        m.summary,
        JSON.stringify(m.custom),
        chunk.content,
        JSON.stringify(vectors[i])
      );
      ids.push(Number(info.lastInsertRowid));
    });
    return ids;
  });
  return tx(chunks);
}

export function selectChunkRows(ctx: DBContext, filter?: MetadataFilter): ChunkRow[] {
  const { clause, params } = whereFromFilter(filter);
  return ctx.db.prepare(`SELECT * FROM chunks ${clause} ORDER BY id ASC`).all(...params) as ChunkRow[];
}

export function deleteChunkRows(ctx: DBContext, filter: MetadataFilter): number {
  const { clause, params } = whereFromFilter(filter);
  if (!clause) return 0;
  return ctx.db.prepare(`DELETE FROM chunks ${clause}`).run(...params).changes;
}

export function countChunks(ctx: DBContext): number {
  return Number((ctx.db.prepare('SELECT COUNT(*) as c FROM chunks').get() as { c: number }).c);
}

export function countDocuments(ctx: DBContext): number {
  return Number((ctx.db.prepare('SELECT COUNT(DISTINCT source_path) as c FROM chunks').get() as { c: number }).c);
}

export function hasContentHash(ctx: DBContext, contentHash: string): boolean {
  return Boolean(ctx.db.prepare('SELECT 1 as ok FROM chunks WHERE content_hash = ? LIMIT 1').get(contentHash));
}

/** Content hashes stored for `filename`, in chunk order. */
export function contentHashesFor(ctx: DBContext, filename: string): string[] {
  const rows = ctx.db
    .prepare('SELECT content_hash FROM chunks WHERE filename = ? ORDER BY chunk_index ASC, id ASC')
    .all(filename) as Array<{ content_hash: string }>;
  return rows.map((r) => r.content_hash);
}

export function listFilenames(ctx: DBContext): Array<{ filename: string; chunkCount: number }> {
  const rows = ctx.db
    .prepare('SELECT filename, COUNT(*) as c FROM chunks GROUP BY filename ORDER BY filename ASC')
    .all() as Array<{ filename: string; c: number }>;
  return rows.map((r) => ({ filename: r.filename, chunkCount: Number(r.c) }));
}
