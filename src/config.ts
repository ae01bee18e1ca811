import path from 'node:path';
import { SEARCH_MODES, SearchMode } from './types.js';

export type EmbeddingMethod = 'auto' | 'openai' | 'local-neural' | 'token-frequency' | 'hash';

const EMBEDDING_METHODS: readonly EmbeddingMethod[] = ['auto', 'openai', 'local-neural', 'token-frequency', 'hash'];

export interface EmbeddingConfig {
  method: EmbeddingMethod;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  openaiModel: string;
  localUrl: string;
  localModel: string;
  tfidfDimension: number;
  timeoutMs: number;
  batchSize: number;
  concurrency: number;
}

export interface LlmConfig {
  apiKey: string | null;
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface HybridWeights {
  vector: number;
  keyword: number;
}

export interface KBConfig {
  indexDir: string;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  maxFileSizeMb: number;
  supportedFileTypes: string[];
  hybridWeights: HybridWeights;
  embedding: EmbeddingConfig;
  llm: LlmConfig;
  useLlmClassifier: boolean;
}

/** Runtime settings, persisted in the index database. */
export interface KBSettings {
  defaultSearchMode: SearchMode;
  includeSources: boolean;
  historyLimit: number;
}

export const DEFAULT_SETTINGS: KBSettings = {
  defaultSearchMode: 'hybrid',
  includeSources: true,
  historyLimit: 50
};

export const DEFAULT_HYBRID_WEIGHTS: HybridWeights = { vector: 0.7, keyword: 0.3 };

export const SUPPORTED_FILE_TYPES = ['.pdf', '.txt', '.md', '.docx'];

function numberFrom(value: string | undefined, fallback: number, opts: { min?: number; integer?: boolean } = {}): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return fallback;
  if (opts.integer && !Number.isInteger(parsed)) return fallback;
  if (opts.min !== undefined && parsed < opts.min) return fallback;
  return parsed;
}

function stringOrNull(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJsonObject(value: string | undefined): Record<string, unknown> {
  if (!value) return {};
  try {
    const parsed: unknown = JSON.parse(value);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

/**
 * Hybrid fusion weights from KB_HYBRID_WEIGHTS_JSON. The two weights are
 * independent multipliers and are not normalized.
 */
export function parseHybridWeights(value: string | undefined): HybridWeights {
  const raw = parseJsonObject(value);
  const pick = (v: unknown, fallback: number): number =>
    typeof v === 'number' && Number.isFinite(v) && v >= 0 ? v : fallback;
  return {
    vector: pick(raw.vector, DEFAULT_HYBRID_WEIGHTS.vector),
    keyword: pick(raw.keyword, DEFAULT_HYBRID_WEIGHTS.keyword)
  };
}

function parseEmbeddingMethod(value: string | undefined): EmbeddingMethod {
  const normalized = (value || 'auto').trim().toLowerCase();
  const match = EMBEDDING_METHODS.find((m) => m === normalized);
  return match ?? 'auto';
}

export function parseSearchMode(value: string | undefined): SearchMode | null {
  const normalized = (value || '').trim().toLowerCase();
  return SEARCH_MODES.find((m) => m === normalized) ?? null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): KBConfig {
  return {
    indexDir: path.resolve(env.KB_INDEX_DIR || path.join('data', 'index')),
    chunkSize: numberFrom(env.KB_CHUNK_SIZE, 1000, { min: 1, integer: true }),
    chunkOverlap: numberFrom(env.KB_CHUNK_OVERLAP, 200, { min: 0, integer: true }),
    topK: numberFrom(env.KB_TOP_K, 5, { min: 1, integer: true }),
    maxFileSizeMb: numberFrom(env.KB_MAX_FILE_SIZE_MB, 50, { min: 0 }),
    supportedFileTypes: [...SUPPORTED_FILE_TYPES],
    hybridWeights: parseHybridWeights(env.KB_HYBRID_WEIGHTS_JSON),
    embedding: {
      method: parseEmbeddingMethod(env.EMBEDDING_METHOD),
      openaiApiKey: stringOrNull(env.OPENAI_API_KEY),
      openaiBaseUrl: env.OPENAI_BASE_URL?.trim() || 'https://api.openai.com/v1',
      openaiModel: env.OPENAI_EMBEDDING_MODEL?.trim() || 'text-embedding-3-small',
      localUrl: env.KB_LOCAL_EMBEDDING_URL?.trim() || 'http://localhost:11434',
      localModel: env.KB_LOCAL_EMBEDDING_MODEL?.trim() || 'all-minilm',
      tfidfDimension: numberFrom(env.KB_TFIDF_DIMENSION, 1000, { min: 1, integer: true }),
      timeoutMs: numberFrom(env.KB_EMBEDDING_TIMEOUT_MS, 10000, { min: 1 }),
      batchSize: numberFrom(env.KB_EMBEDDING_BATCH_SIZE, 32, { min: 1, integer: true }),
      concurrency: numberFrom(env.KB_EMBEDDING_CONCURRENCY, 4, { min: 1, integer: true })
    },
    llm: {
      apiKey: stringOrNull(env.DEEPSEEK_API_KEY),
      baseUrl: env.KB_LLM_BASE_URL?.trim() || 'https://api.deepseek.com/v1',
      model: env.KB_LLM_MODEL?.trim() || 'deepseek-chat',
      temperature: numberFrom(env.KB_LLM_TEMPERATURE, 0.7, { min: 0 }),
      maxTokens: numberFrom(env.KB_LLM_MAX_TOKENS, 500, { min: 1, integer: true }),
      timeoutMs: numberFrom(env.KB_LLM_TIMEOUT_MS, 30000, { min: 1 })
    },
    useLlmClassifier: (env.KB_USE_LLM_CLASSIFIER || 'false').toLowerCase() === 'true'
  };
}
