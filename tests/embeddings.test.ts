import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../src/config.js';
import {
  EmbeddingStrategy,
  fitTokenFrequency,
  HASH_DIMENSION,
  hashEmbedding,
  hashToken,
  LocalNeuralEmbeddingStrategy,
  OpenAIEmbeddingStrategy,
  ProbeResult,
  TokenFrequencyEmbeddingStrategy
} from '../src/retrieval/embedding-strategies.js';
import {
  DowngradeNotice,
  embedInBatches,
  FallbackEmbeddingProvider,
  QUERY_CACHE_MAX,
  resolveEmbeddingProvider,
  strategyChain
} from '../src/retrieval/embeddings.js';

function norm(v: number[]): number {
  return Math.sqrt(v.reduce((acc, x) => acc + x * x, 0));
}

/** Strategy that fails every call, for exercising fallbacks. */
class BrokenStrategy implements EmbeddingStrategy {
  readonly name = 'local-neural';
  readonly dimension = 384;
  calls = 0;

  async probe(): Promise<ProbeResult> {
    return { ok: true };
  }

  async embed(): Promise<number[][]> {
    this.calls += 1;
    throw new Error('model server went away');
  }
}

class CountingStrategy implements EmbeddingStrategy {
  readonly name = 'token-frequency';
  readonly dimension = 2;
  calls: string[][] = [];

  async probe(): Promise<ProbeResult> {
    return { ok: true };
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    return texts.map((t) => [t.length, 1]);
  }
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe('hash embeddings', () => {
  it('is deterministic and unit length', () => {
    const a = hashEmbedding('The quick brown fox');
    const b = hashEmbedding('The quick brown fox');
    expect(a).toEqual(b);
    expect(a).toHaveLength(HASH_DIMENSION);
    expect(norm(a)).toBeCloseTo(1, 10);
  });

  it('ignores case and punctuation between tokens', () => {
    expect(hashEmbedding('Hello, WORLD!')).toEqual(hashEmbedding('hello world'));
  });

  it('still produces a vector for text without word characters', () => {
    const v = hashEmbedding('!!!');
    expect(v.filter((x) => x !== 0)).toEqual([1]);
    expect(hashEmbedding('')).toHaveLength(HASH_DIMENSION);
  });

  it('uses 32-bit FNV-1a', () => {
    expect(hashToken('')).toBe(2166136261);
    expect(hashToken('a')).toBe(0xe40c292c);
  });
});

describe('token-frequency embeddings', () => {
  it('selects terms by frequency then alphabetically and weights them by idf', () => {
    const state = fitTokenFrequency(['apple banana apple', 'banana cherry'], 5);
    expect(state.terms).toEqual(['apple', 'banana', 'cherry']);
    expect(state.idf[0]).toBeCloseTo(Math.log(3 / 2) + 1, 10);
    expect(state.idf[1]).toBeCloseTo(1, 10);
  });

  it('fits on the first batch and ignores unknown tokens afterwards', async () => {
    const onFit = vi.fn();
    const strategy = new TokenFrequencyEmbeddingStrategy(5, null, onFit);
    await strategy.embed(['apple banana apple', 'banana cherry']);
    const [banana, unknown] = await strategy.embed(['banana', 'durian']);

    expect(onFit).toHaveBeenCalledTimes(1);
    expect(banana).toEqual([0, 1, 0, 0, 0]);
    expect(unknown).toEqual([0, 0, 0, 0, 0]);
  });

  it('answers queries with zeros until documents fit the vocabulary', async () => {
    const onFit = vi.fn();
    const strategy = new TokenFrequencyEmbeddingStrategy(5, null, onFit);
    const provider = new FallbackEmbeddingProvider(strategy);

    expect(await provider.embedQuery('apple')).toEqual([0, 0, 0, 0, 0]);
    expect(strategy.fitted).toBe(false);
    expect(onFit).not.toHaveBeenCalled();

    await provider.embedDocuments(['apple banana apple', 'banana cherry']);
    expect(onFit).toHaveBeenCalledTimes(1);
    expect(await provider.embedQuery('apple')).toEqual([1, 0, 0, 0, 0]);
  });

  it('reproduces identical vectors from an exported vocabulary', async () => {
    const first = new TokenFrequencyEmbeddingStrategy(8);
    const [firstVector] = await first.embed(['notes on retrieval and ranking of retrieval results']);
    const state = first.exportState();
    expect(state).not.toBeNull();

    const reloaded = new TokenFrequencyEmbeddingStrategy(8, state);
    const [again] = await reloaded.embed(['notes on retrieval and ranking of retrieval results']);
    expect(again).toEqual(firstVector);
  });
});

describe('remote strategies', () => {
  it('reads OpenAI vectors in index order', async () => {
    const fetchMock = vi.fn(async () =>
      new Response(
        JSON.stringify({
          data: [
            { index: 1, embedding: new Array(1536).fill(0.5) },
            { index: 0, embedding: new Array(1536).fill(0.25) }
          ]
        }),
        { status: 200 }
      )
    );
    vi.stubGlobal('fetch', fetchMock);

    const strategy = new OpenAIEmbeddingStrategy('test-secret');
    const vectors = await strategy.embed(['a', 'b']);
    expect(vectors[0][0]).toBe(0.25);
    expect(vectors[1][0]).toBe(0.5);
    expect(fetchMock).toHaveBeenCalledWith('https://api.openai.com/v1/embeddings', expect.objectContaining({ method: 'POST' }));
  });

  it('fails the probe without a key and never calls fetch', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    const result = await new OpenAIEmbeddingStrategy(null).probe();
    expect(result).toEqual({ ok: false, reason: 'OPENAI_API_KEY not set' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects vectors of the wrong dimension from the local server', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ embeddings: [[1, 2, 3]] }), { status: 200 })));
    const result = await new LocalNeuralEmbeddingStrategy().probe();
    expect(result.ok).toBe(false);
  });
});

describe('resolveEmbeddingProvider', () => {
  it('walks the chain past unreachable services to token-frequency', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed');
    }));
    const notices: DowngradeNotice[] = [];
    const config = loadConfig({ OPENAI_API_KEY: 'test-secret' });

    const provider = await resolveEmbeddingProvider(config.embedding, { onDowngrade: (n) => notices.push(n) });

    expect(provider.strategy).toBe('token-frequency');
    expect(provider.dimension).toBe(1000);
    expect(notices.map((n) => [n.from, n.to])).toEqual([
      ['openai', 'local-neural'],
      ['local-neural', 'token-frequency']
    ]);
  });

  it('ends at the hash strategy when every candidate fails', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 503 })));
    const config = loadConfig({});
    const provider = await resolveEmbeddingProvider(config.embedding, {
      strategies: [new OpenAIEmbeddingStrategy('test-secret'), new LocalNeuralEmbeddingStrategy()],
      onDowngrade: () => undefined
    });

    expect(provider.strategy).toBe('hash');
    expect(await provider.embedQuery('anything')).toEqual(hashEmbedding('anything'));
  });

  it('starts the chain at the configured method and puts a pinned strategy first', () => {
    const config = loadConfig({ EMBEDDING_METHOD: 'token-frequency' });
    expect(strategyChain(config.embedding)).toEqual(['token-frequency', 'hash']);
    expect(strategyChain(config.embedding, 'openai')).toEqual(['openai', 'token-frequency', 'hash']);
  });
});

describe('FallbackEmbeddingProvider', () => {
  it('answers a failed call with hash vectors and reports the downgrade', async () => {
    const broken = new BrokenStrategy();
    const onDowngrade = vi.fn();
    const provider = new FallbackEmbeddingProvider(broken, undefined, onDowngrade);

    const batch = await provider.embedBatch(['first text']);
    expect(batch.strategy).toBe('hash');
    expect(batch.vectors[0]).toEqual(hashEmbedding('first text'));
    expect(onDowngrade).toHaveBeenCalledWith({ from: 'local-neural', to: 'hash', reason: 'model server went away' });
  });

  it('rethrows when the caller aborted', async () => {
    const provider = new FallbackEmbeddingProvider(new BrokenStrategy(), undefined, () => undefined);
    const controller = new AbortController();
    controller.abort(new Error('cancelled by caller'));
    await expect(provider.embedDocuments(['x'], controller.signal)).rejects.toThrow('cancelled by caller');
  });

  it('caches query vectors from the primary strategy only', async () => {
    const counting = new CountingStrategy();
    const provider = new FallbackEmbeddingProvider(counting);
    await provider.embedQuery('repeat me');
    await provider.embedQuery('repeat me');
    expect(counting.calls).toHaveLength(1);
    expect(provider.cacheStats()).toEqual({ size: 1, maxSize: QUERY_CACHE_MAX, hits: 1, misses: 1 });

    const broken = new BrokenStrategy();
    const fallbackProvider = new FallbackEmbeddingProvider(broken, undefined, () => undefined);
    await fallbackProvider.embedQuery('q');
    await fallbackProvider.embedQuery('q');
    expect(broken.calls).toBe(2);
  });

  it('evicts the oldest half when the query cache is full', async () => {
    const provider = new FallbackEmbeddingProvider(new CountingStrategy());
    for (let i = 0; i < QUERY_CACHE_MAX; i++) await provider.embedQuery(`q${i}`);
    expect(provider.cacheStats().size).toBe(QUERY_CACHE_MAX);

    await provider.embedQuery('one more');
    expect(provider.cacheStats().size).toBe(QUERY_CACHE_MAX / 2 + 1);
    provider.clearCache();
    expect(provider.cacheStats().size).toBe(0);
  });
});

describe('embedInBatches', () => {
  it('keeps input order across concurrent batches', async () => {
    const counting = new CountingStrategy();
    const provider = new FallbackEmbeddingProvider(counting);
    const texts = ['a', 'bb', 'ccc', 'dddd', 'eeeee'];
    const progress: number[] = [];

    const { vectors, strategies } = await embedInBatches(provider, texts, {
      batchSize: 2,
      concurrency: 2,
      onProgress: (done) => progress.push(done)
    });

    expect(vectors.map((v) => v[0])).toEqual([1, 2, 3, 4, 5]);
    expect(strategies).toEqual(['token-frequency']);
    expect(counting.calls).toHaveLength(3);
    expect(progress[progress.length - 1]).toBe(5);
  });

  it('returns nothing for no texts', async () => {
    const provider = new FallbackEmbeddingProvider(new CountingStrategy());
    expect(await embedInBatches(provider, [])).toEqual({ vectors: [], strategies: [] });
  });
});
