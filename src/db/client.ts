import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';
import { runMigrations } from './migrations.js';

export interface DBContext {
  db: Database.Database;
}

export const DB_FILENAME = 'kb.sqlite';

export function dbPathFor(indexDir: string): string {
  return path.join(indexDir, DB_FILENAME);
}

export function initDB(dbPath = dbPathFor(path.resolve(process.cwd(), 'data', 'index'))): DBContext {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  runMigrations(db);
  return { db };
}
