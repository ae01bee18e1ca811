import { DBContext } from './client.js';
import { DEFAULT_SETTINGS, isRecord, KBSettings, parseSearchMode } from '../config.js';

const SETTINGS_KEY = 'kb_settings_v1';

export function readJsonSetting(ctx: DBContext, key: string): unknown {
  const row = ctx.db.prepare('SELECT value_json FROM settings WHERE key = ?').get(key) as { value_json: string } | undefined;
  if (!row) return undefined;
  try {
    return JSON.parse(row.value_json);
  } catch {
    return undefined;
  }
}

export function writeJsonSetting(ctx: DBContext, key: string, value: unknown): void {
  ctx.db
    .prepare(
      `INSERT INTO settings (key, value_json, updated_at) VALUES (?, ?, CURRENT_TIMESTAMP)
       ON CONFLICT(key) DO UPDATE SET value_json = excluded.value_json, updated_at = CURRENT_TIMESTAMP`
    )
    .run(key, JSON.stringify(value));
}

function sanitizeSettings(raw: unknown): KBSettings {
  if (!isRecord(raw)) return { ...DEFAULT_SETTINGS };
  const mode = typeof raw.defaultSearchMode === 'string' ? parseSearchMode(raw.defaultSearchMode) : null;
  const limit = raw.historyLimit;
  return {
    defaultSearchMode: mode ?? DEFAULT_SETTINGS.defaultSearchMode,
    includeSources: typeof raw.includeSources === 'boolean' ? raw.includeSources : DEFAULT_SETTINGS.includeSources,
    historyLimit:
      typeof limit === 'number' && Number.isInteger(limit) && limit > 0 ? limit : DEFAULT_SETTINGS.historyLimit
  };
}

export function getSettings(ctx: DBContext): KBSettings {
  return sanitizeSettings(readJsonSetting(ctx, SETTINGS_KEY));
}

export function updateSettings(ctx: DBContext, patch: Partial<KBSettings>): KBSettings {
  const next = sanitizeSettings({ ...getSettings(ctx), ...patch });
  writeJsonSetting(ctx, SETTINGS_KEY, next);
  return next;
}
