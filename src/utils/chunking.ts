import { ValidationError } from '../errors.js';

export interface ChunkSpan {
  text: string;
  start: number;
  end: number;
  /** Leading text repeated from the end of the previous chunk ('' for the first). */
  overlapPrefix: string;
}

interface Span {
  start: number;
  end: number;
}

// Each level cuts after its separator, so separators stay attached to the preceding unit.
const PARAGRAPH_BREAK = /\n\s*\n/g;
const SENTENCE_END = /[.!?]+(?:\s+|$)|[。！？]+\s*/g;
const WORD_BREAK = /\s+/g;

const LEVELS: RegExp[] = [PARAGRAPH_BREAK, SENTENCE_END, WORD_BREAK];

function validateSizes(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ValidationError(`chunk size must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ValidationError(`overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= chunkSize) {
    throw new ValidationError(`overlap (${overlap}) must be smaller than chunk size (${chunkSize})`);
  }
}

function cutAfter(text: string, span: Span, pattern: RegExp): Span[] {
  const slice = text.slice(span.start, span.end);
  const pieces: Span[] = [];
  let prev = 0;
  const re = new RegExp(pattern.source, pattern.flags);
  for (const match of slice.matchAll(re)) {
    const cut = (match.index ?? 0) + match[0].length;
    if (cut <= prev || cut >= slice.length) continue;
    pieces.push({ start: span.start + prev, end: span.start + cut });
    prev = cut;
  }
  pieces.push({ start: span.start + prev, end: span.end });
  return pieces;
}

function fixedWindows(span: Span, size: number): Span[] {
  const out: Span[] = [];
  for (let s = span.start; s < span.end; s += size) {
    out.push({ start: s, end: Math.min(s + size, span.end) });
  }
  return out;
}

/**
 * Paragraphs, then sentences, then words, then fixed windows, until every
 * unit fits in `limit` characters.
 */
function segment(text: string, span: Span, limit: number, level = 0): Span[] {
  if (span.end - span.start <= limit) return [span];
  if (level >= LEVELS.length) return fixedWindows(span, limit);
  const pieces = cutAfter(text, span, LEVELS[level]);
  if (pieces.length === 1) return segment(text, span, limit, level + 1);
  return pieces.flatMap((piece) => segment(text, piece, limit, level + 1));
}

/**
 * Splits text into chunks of at most `chunkSize` characters. Every chunk is
 * an exact substring of the input and, after the first, begins with the
 * last `overlap` characters of its predecessor.
 */
export function chunkSpans(text: string, chunkSize = 1000, overlap = 200): ChunkSpan[] {
  validateSizes(chunkSize, overlap);
  if (!text.trim()) return [];
  if (text.length <= chunkSize) {
    return [{ text, start: 0, end: text.length, overlapPrefix: '' }];
  }

  // Units are capped at chunkSize - overlap so the carried overlap always fits.
  const units = segment(text, { start: 0, end: text.length }, chunkSize - overlap);
  const spans: ChunkSpan[] = [];
  let start = 0;
  let end = 0;
  let carry = 0;
  let fresh = false;

  const emit = (): void => {
    spans.push({ text: text.slice(start, end), start, end, overlapPrefix: text.slice(start, start + carry) });
  };

  for (const unit of units) {
    const unitLen = unit.end - unit.start;
    if (fresh && end - start + unitLen > chunkSize) {
      emit();
      carry = Math.min(overlap, end - start);
      start = end - carry;
      fresh = false;
    }
    end = unit.end;
    fresh = true;
  }
  if (fresh) emit();

  return spans;
}

export function splitText(text: string, chunkSize = 1000, overlap = 200): string[] {
  return chunkSpans(text, chunkSize, overlap).map((s) => s.text);
}
