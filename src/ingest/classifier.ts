import { isRecord } from '../config.js';
import { getErrorMessage } from '../errors.js';
import { TextCompletion } from '../llm/completion.js';
import { round3 } from '../retrieval/ranking.js';
import { CATEGORIES, Category, DEFAULT_CATEGORY, PRIORITIES, Priority } from '../types.js';
import { containsCjk, contentTokens, escapeRegExp, readDataFile, toStringList, truncate } from '../utils/text.js';

export type ClassificationMethod = 'rules' | 'llm';

export interface Classification {
  category: Category;
  priority: Priority;
  summary: string;
  tags: string[];
  /** Not bounded by 1 for rule classification. */
  confidence: number;
  scores: Record<Category, number>;
  method: ClassificationMethod;
}

export interface Classifier {
  classify(text: string, signal?: AbortSignal): Promise<Classification>;
}

export interface ClassifierRules {
  defaultCategory: Category;
  categories: Record<Category, string[]>;
  urgencyMarkers: string[];
  mediumPriorityLength: number;
  summaryLength: number;
  tagCount: number;
}

export const LLM_CLASSIFICATION_CONFIDENCE = 0.85;

function perCategory<T>(fn: (category: Category) => T): Record<Category, T> {
  return {
    work: fn('work'),
    study: fn('study'),
    personal: fn('personal'),
    reference: fn('reference'),
    research: fn('research'),
    ideas: fn('ideas')
  };
}

function positiveNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}

export function parseClassifierRules(raw: unknown): ClassifierRules {
  const source = isRecord(raw) ? raw : {};
  const categoryLists = isRecord(source.categories) ? source.categories : {};
  const categories = perCategory((category) => toStringList(categoryLists[category]).map((k) => k.toLowerCase()));
  return {
    defaultCategory: CATEGORIES.find((c) => c === source.defaultCategory) ?? DEFAULT_CATEGORY,
    categories,
    urgencyMarkers: toStringList(source.urgencyMarkers).map((m) => m.toLowerCase()),
    mediumPriorityLength: positiveNumber(source.mediumPriorityLength, 2000),
    summaryLength: positiveNumber(source.summaryLength, 100),
    tagCount: positiveNumber(source.tagCount, 5)
  };
}

export const DEFAULT_RULES: ClassifierRules = parseClassifierRules(readDataFile('classifier-rules.json'));

function termPattern(term: string): RegExp {
  // CJK text has no word boundaries to anchor on.
  if (containsCjk(term)) return new RegExp(escapeRegExp(term), 'gu');
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(term)}(?![\\p{L}\\p{N}])`, 'gu');
}

/** Whole-word occurrences of `term` in already lower-cased text. */
export function countOccurrences(lowered: string, term: string): number {
  if (!term) return 0;
  return lowered.match(termPattern(term))?.length ?? 0;
}

/** Most frequent content tokens; ties keep first-occurrence order. */
export function extractTags(text: string, limit = 5): string[] {
  const freq = new Map<string, number>();
  for (const token of contentTokens(text)) {
    freq.set(token, (freq.get(token) ?? 0) + 1);
  }
  return [...freq.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([token]) => token);
}

export function classifyWithRules(text: string, rules: ClassifierRules = DEFAULT_RULES): Classification {
  const lowered = text.toLowerCase();

  const scores = perCategory((category) =>
    rules.categories[category].reduce((acc, keyword) => acc + countOccurrences(lowered, keyword), 0)
  );

  let category = rules.defaultCategory;
  let best = 0;
  for (const candidate of CATEGORIES) {
    if (scores[candidate] > best) {
      best = scores[candidate];
      category = candidate;
    }
  }

  let priority: Priority = 'low';
  if (rules.urgencyMarkers.some((marker) => countOccurrences(lowered, marker) > 0)) {
    priority = 'high';
  } else if (text.length > rules.mediumPriorityLength) {
    priority = 'medium';
  }

  const wordCount = text.split(/\s+/).filter(Boolean).length;

  return {
    category,
    priority,
    summary: truncate(text.trim(), rules.summaryLength),
    tags: extractTags(text, rules.tagCount),
    confidence: round3(best / Math.max(wordCount / 100, 1)),
    scores,
    method: 'rules'
  };
}

export class RuleClassifier implements Classifier {
  constructor(private readonly rules: ClassifierRules = DEFAULT_RULES) {}

  async classify(text: string): Promise<Classification> {
    return classifyWithRules(text, this.rules);
  }
}

const LLM_INPUT_LIMIT = 2000;

export function buildClassificationPrompt(text: string): string {
  return [
    'Classify the document below. Reply with exactly four lines:',
    `category: one of ${CATEGORIES.join(', ')}`,
    `priority: one of ${PRIORITIES.join(', ')}`,
    'tags: up to 5 comma-separated keywords',
    'summary: one sentence',
    '',
    'Document:',
    text.slice(0, LLM_INPUT_LIMIT)
  ].join('\n');
}

/** Null when the reply lacks a valid category or priority. */
export function parseClassificationReply(
  reply: string
): Pick<Classification, 'category' | 'priority' | 'tags'> & { summary: string | null } | null {
  const fields = new Map<string, string>();
  for (const line of reply.split('\n')) {
    const match = /^\s*[-*]?\s*(category|priority|tags|summary)\s*[:：]\s*(.+?)\s*$/i.exec(line);
    if (match) fields.set(match[1].toLowerCase(), match[2]);
  }
  const category = CATEGORIES.find((c) => c === fields.get('category')?.toLowerCase());
  const priority = PRIORITIES.find((p) => p === fields.get('priority')?.toLowerCase());
  if (!category || !priority) return null;
  const tags = (fields.get('tags') ?? '')
    .split(/[,，]/)
    .map((t) => t.trim().toLowerCase())
    .filter(Boolean)
    .slice(0, 5);
  return { category, priority, tags, summary: fields.get('summary') ?? null };
}

/**
 * Asks the completion model for a classification and falls back to the
 * keyword rules when the call fails or the reply does not parse.
 */
export class LlmClassifier implements Classifier {
  constructor(
    private readonly completion: TextCompletion,
    private readonly rules: ClassifierRules = DEFAULT_RULES
  ) {}

  async classify(text: string, signal?: AbortSignal): Promise<Classification> {
    const byRules = classifyWithRules(text, this.rules);
    let reply: string;
    try {
      reply = await this.completion.complete(buildClassificationPrompt(text), { signal, temperature: 0 });
    } catch (error) {
      if (signal?.aborted) throw signal.reason;
      console.warn(`[classifier] completion unavailable (${getErrorMessage(error)}); using keyword rules`);
      return byRules;
    }

    const parsed = parseClassificationReply(reply);
    if (!parsed) {
      console.warn('[classifier] unparseable classification reply; using keyword rules');
      return byRules;
    }
    return {
      category: parsed.category,
      priority: parsed.priority,
      tags: parsed.tags.length ? parsed.tags : byRules.tags,
      summary: parsed.summary ?? byRules.summary,
      confidence: LLM_CLASSIFICATION_CONFIDENCE,
      scores: byRules.scores,
      method: 'llm'
    };
  }
}
