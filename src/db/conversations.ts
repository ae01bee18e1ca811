import { DBContext } from './client.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { ChatRole, ChatTurn } from '../types.js';

export interface ConversationSession {
  id: number;
  title: string;
  /** Number of user messages. */
  totalTurns: number;
  createdAt: string;
  lastActive: string;
}

export interface ConversationMessage extends ChatTurn {
  id: number;
  sessionId: number;
  createdAt: string;
}

type SessionRow = { id: number; title: string; total_turns: number; created_at: string; last_active: string };

function toSession(r: SessionRow): ConversationSession {
  return { id: r.id, title: r.title, totalTurns: r.total_turns, createdAt: r.created_at, lastActive: r.last_active };
}

function parseRole(value: string): ChatRole {
  return value === 'assistant' ? 'assistant' : 'user';
}

function requireTitle(title: string): string {
  const trimmed = title.trim();
  if (!trimmed) throw new ValidationError('session title must not be empty');
  return trimmed;
}

export function createSession(ctx: DBContext, title?: string): ConversationSession {
  const name = title === undefined ? `Chat ${new Date().toISOString().slice(0, 16).replace('T', ' ')}` : requireTitle(title);
  const result = ctx.db.prepare('INSERT INTO sessions (title) VALUES (?)').run(name);
  const session = getSession(ctx, Number(result.lastInsertRowid));
  if (!session) throw new NotFoundError(`session ${result.lastInsertRowid} vanished after insert`);
  return session;
}

export function getSession(ctx: DBContext, id: number): ConversationSession | null {
  const row = ctx.db
    .prepare('SELECT id, title, total_turns, created_at, last_active FROM sessions WHERE id = ?')
    .get(id) as SessionRow | undefined;
  return row ? toSession(row) : null;
}

/** Most recently active first. */
export function listSessions(ctx: DBContext, limit = 100): ConversationSession[] {
  const rows = ctx.db
    .prepare(
      `SELECT s.id, s.title, s.total_turns, s.created_at, s.last_active FROM sessions s
       ORDER BY s.last_active DESC,
                COALESCE((SELECT MAX(m.id) FROM session_messages m WHERE m.session_id = s.id), 0) DESC,
                s.id DESC
       LIMIT ?`
    )
    .all(limit) as SessionRow[];
  return rows.map(toSession);
}

/** Appends a message and marks the session active; user messages count as turns. */
export function addMessage(
  ctx: DBContext,
  params: { sessionId: number; role: ChatRole; content: string }
): ConversationMessage {
  if (!params.content.trim()) throw new ValidationError('message content must not be empty');
  const tx = ctx.db.transaction((): number => {
    const touched = ctx.db
      .prepare('UPDATE sessions SET last_active = CURRENT_TIMESTAMP, total_turns = total_turns + ? WHERE id = ?')
      .run(params.role === 'user' ? 1 : 0, params.sessionId);
    if (touched.changes === 0) throw new NotFoundError(`session ${params.sessionId} does not exist`);
    const inserted = ctx.db
      .prepare('INSERT INTO session_messages (session_id, role, content) VALUES (?, ?, ?)')
      .run(params.sessionId, params.role, params.content);
    return Number(inserted.lastInsertRowid);
  });
  const id = tx();
  const row = ctx.db.prepare('SELECT created_at FROM session_messages WHERE id = ?').get(id) as { created_at: string };
  return { id, sessionId: params.sessionId, role: params.role, content: params.content, createdAt: row.created_at };
}

/** Oldest first; with `limit`, only the newest `limit` messages. */
export function listMessages(ctx: DBContext, sessionId: number, limit?: number): ConversationMessage[] {
  const rows = ctx.db
    .prepare(
      'SELECT id, session_id, role, content, created_at FROM session_messages WHERE session_id = ? ORDER BY id DESC LIMIT ?'
    )
    .all(sessionId, limit ?? -1) as Array<{ id: number; session_id: number; role: string; content: string; created_at: string }>;
  return rows.reverse().map((r) => ({
    id: r.id,
    sessionId: r.session_id,
    role: parseRole(r.role),
    content: r.content,
    createdAt: r.created_at
  }));
}

export function renameSession(ctx: DBContext, id: number, title: string): boolean {
  return ctx.db.prepare('UPDATE sessions SET title = ? WHERE id = ?').run(requireTitle(title), id).changes > 0;
}

export function deleteSession(ctx: DBContext, id: number): boolean {
  const tx = ctx.db.transaction((): boolean => {
    ctx.db.prepare('DELETE FROM session_messages WHERE session_id = ?').run(id);
    return ctx.db.prepare('DELETE FROM sessions WHERE id = ?').run(id).changes > 0;
  });
  return tx();
}

/** Deletes sessions idle for more than `olderThanDays` days, with their messages. */
export function pruneSessions(ctx: DBContext, olderThanDays = 30): number {
  const stale = "julianday('now') - julianday(last_active) > ?";
  const tx = ctx.db.transaction((): number => {
    ctx.db
      .prepare(`DELETE FROM session_messages WHERE session_id IN (SELECT id FROM sessions WHERE ${stale})`)
      .run(olderThanDays);
    return ctx.db.prepare(`DELETE FROM sessions WHERE ${stale}`).run(olderThanDays).changes;
  });
  return tx();
}
