import { TextCompletion } from '../llm/completion.js';
import { getErrorMessage } from '../errors.js';
import { AnswerResult, ChatTurn, RetrievalResult, SourceRef } from '../types.js';
import { contentTokenSet, truncate } from '../utils/text.js';
import { round3 } from './ranking.js';

/* ------------------------------------------------------------------ */
/*  Constants                                                          */
/* ------------------------------------------------------------------ */

export const NO_INFORMATION_ANSWER =
  'I could not find information about that in the indexed documents. Try uploading related documents or rephrasing the question.';

export const CONTEXT_DELIMITER = '\n\n---\n\n';

export const MAX_EXCERPT_LEN = 300;

/** Blend weights for answer confidence; they sum to 1. */
export const CONFIDENCE_WEIGHTS = {
  relevance: 0.4,
  chunkCount: 0.2,
  answerLength: 0.2,
  queryOverlap: 0.2
} as const;

export const CONFIDENCE_DIVISORS = {
  chunkCount: 5,
  answerLength: 500
} as const;

/** Earlier messages folded into a follow-up's retrieval query. */
export const RETRIEVAL_HISTORY_MESSAGES = 2;

/** Assistant messages are cut to this many characters before retrieval. */
export const RETRIEVAL_REPLY_LEN = 100;

/** Earlier messages shown to the completion. */
export const PROMPT_HISTORY_MESSAGES = 10;

/* ------------------------------------------------------------------ */
/*  Prompt                                                             */
/* ------------------------------------------------------------------ */

export function cleanLine(line: string): string {
  return line.replace(/\s+/g, ' ').trim();
}

export function buildContext(chunks: RetrievalResult[], includeSources: boolean): string {
  return chunks
    .map((chunk, i) => {
      const n = i + 1;
      const body = `[${n}] ${chunk.content.trim()}`;
      if (!includeSources) return body;
      return `${body}\nSource [${n}]: ${chunk.metadata.filename} (part ${chunk.metadata.chunk_index + 1})`;
    })
    .join(CONTEXT_DELIMITER);
}

function conversationLines(history: ChatTurn[]): string[] {
  if (!history.length) return [];
  const turns = history.map((turn) => `${turn.role === 'user' ? 'User' : 'Assistant'}: ${cleanLine(turn.content)}`);
  return ['Conversation so far:', ...turns, ''];
}

export function buildPrompt(query: string, context: string, history: ChatTurn[] = []): string {
  return [
    'You are a knowledge-base assistant. Answer the question using ONLY the context below.',
    '',
    'Rules:',
    '- Do not use any knowledge that is not in the context.',
    '- Cite every factual claim with its source tag, for example [1] or [2].',
    '- If the context does not contain the answer, reply exactly: "I could not find that in the provided documents."',
    '- Answer in Markdown.',
    '',
    ...conversationLines(history.slice(-PROMPT_HISTORY_MESSAGES)),
    'Context:',
    context,
    '',
    `Question: ${query}`,
    '',
    'Answer:'
  ].join('\n');
}

/**
 * Retrieval query for a follow-up question: the last messages of the
 * conversation, assistant replies shortened, followed by the question.
 */
export function contextualQuery(query: string, history: ChatTurn[]): string {
  const recent = history
    .slice(-RETRIEVAL_HISTORY_MESSAGES)
    .map((turn) => (turn.role === 'assistant' ? turn.content.slice(0, RETRIEVAL_REPLY_LEN) : turn.content))
    .map(cleanLine)
    .filter(Boolean);
  return recent.length ? `${recent.join(' ')} ${query}` : query;
}

/* ------------------------------------------------------------------ */
/*  Confidence                                                         */
/* ------------------------------------------------------------------ */

/** Share of the query's content terms that the answer repeats; 0 for an empty query. */
export function queryOverlap(query: string, answer: string): number {
  const queryTerms = contentTokenSet(query);
  if (!queryTerms.size) return 0;
  const answerTerms = contentTokenSet(answer);
  let shared = 0;
  for (const term of queryTerms) {
    if (answerTerms.has(term)) shared += 1;
  }
  return shared / queryTerms.size;
}

export function computeConfidence(query: string, answer: string, chunks: RetrievalResult[]): number {
  if (!chunks.length) return 0;
  const meanRelevance = chunks.reduce((acc, c) => acc + c.relevance_score, 0) / chunks.length;
  const score =
    CONFIDENCE_WEIGHTS.relevance * meanRelevance +
    CONFIDENCE_WEIGHTS.chunkCount * Math.min(chunks.length / CONFIDENCE_DIVISORS.chunkCount, 1) +
    CONFIDENCE_WEIGHTS.answerLength * Math.min(answer.length / CONFIDENCE_DIVISORS.answerLength, 1) +
    CONFIDENCE_WEIGHTS.queryOverlap * queryOverlap(query, answer);
  return round3(Math.max(0, Math.min(1, score)));
}

/* ------------------------------------------------------------------ */
/*  Sources and template answers                                       */
/* ------------------------------------------------------------------ */

/** One entry per filename (its first chunk), most relevant first. */
export function collectSources(chunks: RetrievalResult[]): SourceRef[] {
  const seen = new Map<string, SourceRef>();
  for (const chunk of chunks) {
    if (seen.has(chunk.metadata.filename)) continue;
    seen.set(chunk.metadata.filename, {
      filename: chunk.metadata.filename,
      relevanceScore: chunk.relevance_score,
      chunkIndex: chunk.metadata.chunk_index
    });
  }
  return [...seen.values()].sort((a, b) => b.relevanceScore - a.relevanceScore);
}

export function templateAnswer(chunks: RetrievalResult[], includeSources: boolean): string {
  const lines = ['Here are the most relevant excerpts from the indexed documents:', ''];
  chunks.forEach((chunk, i) => {
    lines.push(`[${i + 1}] (relevance ${chunk.relevance_score.toFixed(3)}) ${truncate(cleanLine(chunk.content), MAX_EXCERPT_LEN)}`);
    if (includeSources) {
      lines.push(`Source [${i + 1}]: ${chunk.metadata.filename} (part ${chunk.metadata.chunk_index + 1})`);
    }
    lines.push('');
  });
  return lines.join('\n').trim();
}

/* ------------------------------------------------------------------ */
/*  Main generation entry point                                        */
/* ------------------------------------------------------------------ */

export interface GenerateOptions {
  completion?: TextCompletion | null;
  includeSources?: boolean;
  /** Earlier messages of the conversation, oldest first. */
  history?: ChatTurn[];
  signal?: AbortSignal;
}

/**
 * Answers from ranked chunks. Without chunks the completion is never
 * called; when it is unavailable the answer is built from the chunks.
 */
export async function generateAnswer(
  query: string,
  chunks: RetrievalResult[],
  opts: GenerateOptions = {}
): Promise<AnswerResult> {
  if (!chunks.length) {
    return { answer: NO_INFORMATION_ANSWER, confidence: 0, sources: [], retrievedCount: 0, method: 'none' };
  }

  const includeSources = opts.includeSources ?? true;
  let answer: string | null = null;

  if (opts.completion) {
    const prompt = buildPrompt(query, buildContext(chunks, includeSources), opts.history);
    try {
      const text = await opts.completion.complete(prompt, { signal: opts.signal });
      answer = text || null;
    } catch (error) {
      if (opts.signal?.aborted) throw opts.signal.reason;
      console.warn(`[answer] completion unavailable (${getErrorMessage(error)}); using template answer`);
    }
  }

  const method = answer ? 'llm' : 'template';
  const finalAnswer = answer ?? templateAnswer(chunks, includeSources);

  return {
    answer: finalAnswer,
    confidence: computeConfidence(query, finalAnswer, chunks),
    sources: collectSources(chunks),
    retrievedCount: chunks.length,
    method
  };
}
