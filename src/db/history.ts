import { DBContext } from './client.js';
import { parseSearchMode } from '../config.js';
import { SearchMode } from '../types.js';

export interface SearchHistoryEntry {
  id: number;
  query: string;
  mode: SearchMode;
  resultCount: number;
  createdAt: string;
}

/** Appends a search and trims the table to the newest `limit` rows. */
export function recordSearch(
  ctx: DBContext,
  params: { query: string; mode: SearchMode; resultCount: number; limit: number }
): void {
  const tx = ctx.db.transaction(() => {
    ctx.db
      .prepare('INSERT INTO search_history (query, mode, result_count) VALUES (?, ?, ?)')
      .run(params.query, params.mode, params.resultCount);
    ctx.db
      .prepare('DELETE FROM search_history WHERE id NOT IN (SELECT id FROM search_history ORDER BY id DESC LIMIT ?)')
      .run(Math.max(0, params.limit));
  });
  tx();
}

export function listSearchHistory(ctx: DBContext, limit = 50): SearchHistoryEntry[] {
  const rows = ctx.db
    .prepare('SELECT id, query, mode, result_count, created_at FROM search_history ORDER BY id DESC LIMIT ?')
    .all(limit) as Array<{ id: number; query: string; mode: string; result_count: number; created_at: string }>;
  return rows.map((r) => ({
    id: r.id,
    query: r.query,
    mode: parseSearchMode(r.mode) ?? 'hybrid',
    resultCount: r.result_count,
    createdAt: r.created_at
  }));
}

export interface PopularQuery {
  query: string;
  count: number;
}

/** Most repeated queries; equal counts go to the more recent query. */
export function popularQueries(ctx: DBContext, limit = 10): PopularQuery[] {
  return ctx.db
    .prepare(
      `SELECT query, COUNT(*) as count FROM search_history
       GROUP BY query ORDER BY count DESC, MAX(id) DESC LIMIT ?`
    )
    .all(limit) as PopularQuery[];
}

export function clearSearchHistory(ctx: DBContext): number {
  return ctx.db.prepare('DELETE FROM search_history').run().changes;
}
