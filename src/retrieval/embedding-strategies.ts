import { EmbeddingConfig, EmbeddingMethod, isRecord } from '../config.js';
import { DependencyUnavailableError, getErrorMessage, toCapabilityError } from '../errors.js';
import { contentTokens, tokenize } from '../utils/text.js';

export type StrategyName = Exclude<EmbeddingMethod, 'auto'>;

export const STRATEGY_ORDER: readonly StrategyName[] = ['openai', 'local-neural', 'token-frequency', 'hash'];

export const HASH_DIMENSION = 384;
export const LOCAL_NEURAL_DIMENSION = 384;

export type ProbeResult = { ok: true } | { ok: false; reason: string };

/** Documents may fit a corpus-trained strategy; queries never do. */
export type EmbedPurpose = 'documents' | 'query';

export interface EmbeddingStrategy {
  readonly name: StrategyName;
  readonly dimension: number;
  /** Checks the strategy can serve requests. Never throws. */
  probe(): Promise<ProbeResult>;
  embed(texts: string[], signal?: AbortSignal, purpose?: EmbedPurpose): Promise<number[][]>;
}

export function l2Normalize(v: number[]): number[] {
  const norm = Math.sqrt(v.reduce((acc, x) => acc + x * x, 0));
  if (!norm) return v;
  return v.map((x) => x / norm);
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

function withTimeout(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

function isVector(value: unknown, dimension: number): value is number[] {
  return (
    Array.isArray(value) &&
    value.length === dimension &&
    value.every((x) => typeof x === 'number' && Number.isFinite(x))
  );
}

function vectorsFrom(list: unknown, count: number, dimension: number, label: string): number[][] {
  if (!Array.isArray(list) || list.length !== count) {
    throw new DependencyUnavailableError(`${label} returned ${Array.isArray(list) ? list.length : 'no'} vectors for ${count} inputs`);
  }
  return list.map((v) => {
    if (!isVector(v, dimension)) {
      throw new DependencyUnavailableError(`${label} returned a vector that is not ${dimension}-dimensional`);
    }
    return v;
  });
}

async function probeWith(strategy: EmbeddingStrategy): Promise<ProbeResult> {
  try {
    await strategy.embed(['ping']);
    return { ok: true };
  } catch (error) {
    return { ok: false, reason: getErrorMessage(error) };
  }
}

export function openAIDimensionFor(model: string): number {
  return model === 'text-embedding-3-large' ? 3072 : 1536;
}

/**
 * OpenAI-compatible `/embeddings` endpoint.
 */
export class OpenAIEmbeddingStrategy implements EmbeddingStrategy {
  readonly name = 'openai';
  readonly dimension: number;

  constructor(
    private readonly apiKey: string | null,
    private readonly model = 'text-embedding-3-small',
    private readonly baseUrl = 'https://api.openai.com/v1',
    private readonly timeoutMs = 10000
  ) {
    this.dimension = openAIDimensionFor(model);
  }

  async probe(): Promise<ProbeResult> {
    if (!this.apiKey) return { ok: false, reason: 'OPENAI_API_KEY not set' };
    return probeWith(this);
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (!this.apiKey) throw new DependencyUnavailableError('OPENAI_API_KEY not set');
    if (!texts.length) return [];

    let json: unknown;
    try {
      const res = await fetch(`${trimTrailingSlash(this.baseUrl)}/embeddings`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({ model: this.model, input: texts }),
        signal: withTimeout(this.timeoutMs, signal)
      });
      if (!res.ok) {
        throw new DependencyUnavailableError(`OpenAI embedding API error: ${res.status}`);
      }
      json = await res.json();
    } catch (error) {
      throw toCapabilityError('OpenAI embeddings', error);
    }

    const data = isRecord(json) && Array.isArray(json.data) ? json.data : null;
    const ordered = data
      ?.filter(isRecord)
      .map((item, position) => ({ index: typeof item.index === 'number' ? item.index : position, embedding: item.embedding }))
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
    return vectorsFrom(ordered, texts.length, this.dimension, 'OpenAI embeddings');
  }
}

/**
 * Local model server speaking the Ollama `/api/embed` protocol.
 */
export class LocalNeuralEmbeddingStrategy implements EmbeddingStrategy {
  readonly name = 'local-neural';
  readonly dimension = LOCAL_NEURAL_DIMENSION;

  constructor(
    private readonly baseUrl = 'http://localhost:11434',
    private readonly model = 'all-minilm',
    private readonly timeoutMs = 10000
  ) {}

  probe(): Promise<ProbeResult> {
    return probeWith(this);
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (!texts.length) return [];

    let json: unknown;
    try {
      const res = await fetch(`${trimTrailingSlash(this.baseUrl)}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, input: texts }),
        signal: withTimeout(this.timeoutMs, signal)
      });
      if (!res.ok) {
        throw new DependencyUnavailableError(`local embedding server error: ${res.status}`);
      }
      json = await res.json();
    } catch (error) {
      throw toCapabilityError('local embedding server', error);
    }

    return vectorsFrom(isRecord(json) ? json.embeddings : null, texts.length, this.dimension, 'local embedding server');
  }
}

export interface TokenFrequencyState {
  dimension: number;
  terms: string[];
  idf: number[];
}

export function isTokenFrequencyState(value: unknown): value is TokenFrequencyState {
  return (
    isRecord(value) &&
    typeof value.dimension === 'number' &&
    Array.isArray(value.terms) &&
    value.terms.every((t) => typeof t === 'string') &&
    Array.isArray(value.idf) &&
    value.idf.every((x) => typeof x === 'number') &&
    value.idf.length === value.terms.length
  );
}

/** Vocabulary and idf weights learned from a batch of texts. */
export function fitTokenFrequency(texts: string[], dimension: number): TokenFrequencyState {
  const totals = new Map<string, number>();
  const docFreq = new Map<string, number>();
  for (const text of texts) {
    const tokens = contentTokens(text);
    for (const token of tokens) totals.set(token, (totals.get(token) ?? 0) + 1);
    for (const token of new Set(tokens)) docFreq.set(token, (docFreq.get(token) ?? 0) + 1);
  }

  const terms = [...totals.entries()]
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .slice(0, dimension)
    .map(([term]) => term);
  const n = texts.length;
  const idf = terms.map((term) => Math.log((1 + n) / (1 + (docFreq.get(term) ?? 0))) + 1);
  return { dimension, terms, idf };
}

/**
 * TF-IDF over a vocabulary fitted on the first document batch it sees. Later
 * batches reuse it; unknown tokens contribute nothing. Queries embedded before
 * the fit come back as zero vectors.
 */
export class TokenFrequencyEmbeddingStrategy implements EmbeddingStrategy {
  readonly name = 'token-frequency';
  private state: TokenFrequencyState | null;
  private termIndex = new Map<string, number>();

  constructor(
    readonly dimension = 1000,
    state: TokenFrequencyState | null = null,
    private readonly onFit?: (state: TokenFrequencyState) => void
  ) {
    this.state = null;
    if (state) this.load(state);
  }

  get fitted(): boolean {
    return this.state !== null;
  }

  exportState(): TokenFrequencyState | null {
    return this.state ? { dimension: this.state.dimension, terms: [...this.state.terms], idf: [...this.state.idf] } : null;
  }

  private load(state: TokenFrequencyState): void {
    this.state = state;
    this.termIndex = new Map(state.terms.map((term, i) => [term, i]));
  }

  async probe(): Promise<ProbeResult> {
    return { ok: true };
  }

  async embed(texts: string[], _signal?: AbortSignal, purpose: EmbedPurpose = 'documents'): Promise<number[][]> {
    if (!this.state) {
      if (purpose === 'query') return texts.map(() => new Array<number>(this.dimension).fill(0));
      const state = fitTokenFrequency(texts, this.dimension);
      this.load(state);
      this.onFit?.(state);
    }
    return texts.map((text) => this.vectorize(text));
  }

  private vectorize(text: string): number[] {
    const vec = new Array<number>(this.dimension).fill(0);
    const idf = this.state?.idf ?? [];
    for (const token of contentTokens(text)) {
      const idx = this.termIndex.get(token);
      if (idx !== undefined) vec[idx] += 1;
    }
    return l2Normalize(vec.map((count, i) => (count ? count * (idf[i] ?? 1) : 0)));
  }
}

/** 32-bit FNV-1a. */
export function hashToken(token: string): number {
  let hash = 2166136261;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

export function hashEmbedding(text: string, dimension = HASH_DIMENSION): number[] {
  const vec = new Array<number>(dimension).fill(0);
  const tokens = tokenize(text);
  // Punctuation-only or empty text still maps to one bucket.
  for (const token of tokens.length ? tokens : [text]) {
    vec[hashToken(token) % dimension] += 1;
  }
  return l2Normalize(vec);
}

/** Terminal fallback: a pure function of the text. */
export class HashEmbeddingStrategy implements EmbeddingStrategy {
  readonly name = 'hash';

  constructor(readonly dimension = HASH_DIMENSION) {}

  async probe(): Promise<ProbeResult> {
    return { ok: true };
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => hashEmbedding(text, this.dimension));
  }
}

export function createStrategy(
  name: StrategyName,
  config: EmbeddingConfig,
  opts: { tokenFrequencyState?: TokenFrequencyState | null; onFit?: (state: TokenFrequencyState) => void } = {}
): EmbeddingStrategy {
  switch (name) {
    case 'openai':
      return new OpenAIEmbeddingStrategy(config.openaiApiKey, config.openaiModel, config.openaiBaseUrl, config.timeoutMs);
    case 'local-neural':
      return new LocalNeuralEmbeddingStrategy(config.localUrl, config.localModel, config.timeoutMs);
    case 'token-frequency': {
      const state = opts.tokenFrequencyState ?? null;
      return new TokenFrequencyEmbeddingStrategy(state?.dimension ?? config.tfidfDimension, state, opts.onFit);
    }
    case 'hash':
      return new HashEmbeddingStrategy();
  }
}
