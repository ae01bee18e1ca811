import { createHash } from 'node:crypto';
import fs from 'node:fs';

const CJK_RUN_RE = /[\p{sc=Han}\p{sc=Hiragana}\p{sc=Katakana}\p{sc=Hangul}]/u;
const TOKEN_RE =
  /[\p{sc=Han}\p{sc=Hiragana}\p{sc=Katakana}\p{sc=Hangul}]+|(?:(?![\p{sc=Han}\p{sc=Hiragana}\p{sc=Katakana}\p{sc=Hangul}])[\p{L}\p{N}])+/gu;

/** Reads a JSON file from the repo's data/ directory. */
export function readDataFile(name: string): unknown {
  return JSON.parse(fs.readFileSync(new URL(`../../data/${name}`, import.meta.url), 'utf8'));
}

export function toStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export const STOPWORDS: ReadonlySet<string> = new Set(toStringList(readDataFile('stopwords.json')));

export function containsCjk(text: string): boolean {
  return CJK_RUN_RE.test(text);
}

/** Overlapping character pairs; a lone character stands for itself. */
function bigrams(run: string): string[] {
  const chars = [...run];
  if (chars.length < 2) return chars;
  const out: string[] = [];
  for (let i = 0; i < chars.length - 1; i++) out.push(chars[i] + chars[i + 1]);
  return out;
}

/**
 * Lower-cased letter/digit runs, in order of appearance. Han, Kana and Hangul
 * runs have no word breaks, so they are split into bigrams.
 */
export function tokenize(text: string): string[] {
  const runs = text.toLowerCase().match(TOKEN_RE) ?? [];
  return runs.flatMap((run) => (containsCjk(run) ? bigrams(run) : [run]));
}

export function contentTokens(text: string): string[] {
  return tokenize(text).filter((t) => (t.length > 1 || containsCjk(t)) && !STOPWORDS.has(t));
}

export function contentTokenSet(text: string): Set<string> {
  return new Set(contentTokens(text));
}

export function contentHash(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

export function truncate(text: string, max: number, suffix = '...'): string {
  return text.length > max ? `${text.slice(0, max)}${suffix}` : text;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
