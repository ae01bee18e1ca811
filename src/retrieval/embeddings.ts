import { EmbeddingConfig } from '../config.js';
import { getErrorMessage } from '../errors.js';
import {
  createStrategy,
  EmbedPurpose,
  EmbeddingStrategy,
  HashEmbeddingStrategy,
  STRATEGY_ORDER,
  StrategyName,
  TokenFrequencyState
} from './embedding-strategies.js';

export interface EmbeddedBatch {
  vectors: number[][];
  /** Strategy that actually produced the vectors. */
  strategy: StrategyName;
}

export interface EmbeddingProvider {
  readonly strategy: StrategyName;
  readonly dimension: number;
  embedDocuments(texts: string[], signal?: AbortSignal): Promise<number[][]>;
  embedBatch(texts: string[], signal?: AbortSignal): Promise<EmbeddedBatch>;
  embedQuery(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface DowngradeNotice {
  from: StrategyName;
  to: StrategyName;
  reason: string;
}

export const QUERY_CACHE_MAX = 1000;

function logDowngrade(notice: DowngradeNotice): void {
  console.warn(`[embeddings] ${notice.from} unavailable (${notice.reason}); using ${notice.to}`);
}

/**
 * Wraps the selected strategy. A call that fails at runtime is answered by
 * the hash strategy instead, so embedding never rejects unless the caller
 * aborts.
 */
export class FallbackEmbeddingProvider implements EmbeddingProvider {
  private readonly queryCache = new Map<string, number[]>();
  private hits = 0;
  private misses = 0;

  constructor(
    readonly primary: EmbeddingStrategy,
    private readonly fallback: EmbeddingStrategy = new HashEmbeddingStrategy(),
    private readonly onDowngrade: (notice: DowngradeNotice) => void = logDowngrade
  ) {}

  get strategy(): StrategyName {
    return this.primary.name;
  }

  get dimension(): number {
    return this.primary.dimension;
  }

  async embedDocuments(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const { vectors } = await this.embedBatch(texts, signal);
    return vectors;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<EmbeddedBatch> {
    const { vectors, fromPrimary } = await this.embedWithFallback(texts, signal);
    return { vectors, strategy: fromPrimary ? this.primary.name : this.fallback.name };
  }

  async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    const cached = this.queryCache.get(text);
    if (cached) {
      this.hits += 1;
      return cached;
    }
    this.misses += 1;
    const { vectors, fromPrimary } = await this.embedWithFallback([text], signal, 'query');
    const [vector] = vectors;
    // An unfitted strategy answers with zeros; those must not outlive the fit.
    if (fromPrimary && vector.some((x) => x !== 0)) this.remember(text, vector);
    return vector;
  }

  clearCache(): void {
    this.queryCache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  cacheStats(): { size: number; maxSize: number; hits: number; misses: number } {
    return { size: this.queryCache.size, maxSize: QUERY_CACHE_MAX, hits: this.hits, misses: this.misses };
  }

  private remember(text: string, vector: number[]): void {
    if (this.queryCache.size >= QUERY_CACHE_MAX) {
      // Map iterates in insertion order: drop the oldest half.
      const evict = Math.floor(QUERY_CACHE_MAX / 2);
      let dropped = 0;
      for (const key of this.queryCache.keys()) {
        if (dropped >= evict) break;
        this.queryCache.delete(key);
        dropped += 1;
      }
    }
    this.queryCache.set(text, vector);
  }

  private async embedWithFallback(
    texts: string[],
    signal?: AbortSignal,
    purpose: EmbedPurpose = 'documents'
  ): Promise<{ vectors: number[][]; fromPrimary: boolean }> {
    if (!texts.length) return { vectors: [], fromPrimary: true };
    try {
      return { vectors: await this.primary.embed(texts, signal, purpose), fromPrimary: true };
    } catch (error) {
      if (signal?.aborted) throw signal.reason;
      this.onDowngrade({ from: this.primary.name, to: this.fallback.name, reason: getErrorMessage(error) });
      return { vectors: await this.fallback.embed(texts, undefined, purpose), fromPrimary: false };
    }
  }
}

export interface ResolveOptions {
  /** Strategy persisted with an existing index; tried before the configured chain. */
  pinned?: StrategyName | null;
  tokenFrequencyState?: TokenFrequencyState | null;
  onFit?: (state: TokenFrequencyState) => void;
  /** Replaces the configured chain. */
  strategies?: EmbeddingStrategy[];
  onDowngrade?: (notice: DowngradeNotice) => void;
}

export function strategyChain(config: EmbeddingConfig, pinned?: StrategyName | null): StrategyName[] {
  const startAt = config.method === 'auto' ? 0 : STRATEGY_ORDER.indexOf(config.method);
  const chain = STRATEGY_ORDER.slice(Math.max(0, startAt));
  if (pinned) return [pinned, ...chain.filter((name) => name !== pinned)];
  return chain;
}

/**
 * Walks the strategy chain once and returns a provider around the first
 * strategy whose probe passes. Hash always passes, so this never rejects.
 */
export async function resolveEmbeddingProvider(
  config: EmbeddingConfig,
  opts: ResolveOptions = {}
): Promise<FallbackEmbeddingProvider> {
  const onDowngrade = opts.onDowngrade ?? logDowngrade;
  const candidates =
    opts.strategies ??
    strategyChain(config, opts.pinned).map((name) =>
      createStrategy(name, config, { tokenFrequencyState: opts.tokenFrequencyState, onFit: opts.onFit })
    );

  for (let i = 0; i < candidates.length; i++) {
    const candidate = candidates[i];
    const result = await candidate.probe();
    if (result.ok) {
      return new FallbackEmbeddingProvider(candidate, new HashEmbeddingStrategy(), onDowngrade);
    }
    onDowngrade({ from: candidate.name, to: candidates[i + 1]?.name ?? 'hash', reason: result.reason });
  }
  return new FallbackEmbeddingProvider(new HashEmbeddingStrategy(), new HashEmbeddingStrategy(), onDowngrade);
}

export interface BatchOptions {
  batchSize?: number;
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
}

/**
 * Embeds texts in batches on a bounded worker pool. Output order matches
 * input order; `strategies` lists every strategy that produced a batch.
 */
export async function embedInBatches(
  provider: EmbeddingProvider,
  texts: string[],
  opts: BatchOptions = {}
): Promise<{ vectors: number[][]; strategies: StrategyName[] }> {
  const batchSize = Math.max(1, opts.batchSize ?? 32);
  const concurrency = Math.max(1, opts.concurrency ?? 4);

  const queue: { texts: string[]; startIdx: number }[] = [];
  for (let i = 0; i < texts.length; i += batchSize) {
    queue.push({ texts: texts.slice(i, i + batchSize), startIdx: i });
  }

  const results: number[][] = new Array<number[]>(texts.length);
  const strategies = new Set<StrategyName>();
  let completed = 0;

  const workers = Array.from({ length: Math.min(concurrency, queue.length) }, async () => {
    for (let batch = queue.shift(); batch; batch = queue.shift()) {
      const { startIdx } = batch;
      const { vectors, strategy } = await provider.embedBatch(batch.texts, opts.signal);
      strategies.add(strategy);
      vectors.forEach((vector, j) => {
        results[startIdx + j] = vector;
      });
      completed += batch.texts.length;
      opts.onProgress?.(completed, texts.length);
    }
  });

  await Promise.all(workers);
  return { vectors: results, strategies: [...strategies] };
}

export function euclideanDistance(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}
