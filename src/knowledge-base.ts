import { KBConfig, KBSettings } from './config.js';
import { countChunks } from './db/chunks.js';
import { DBContext, dbPathFor, initDB } from './db/client.js';
import {
  addMessage,
  ConversationMessage,
  ConversationSession,
  createSession,
  deleteSession,
  getSession,
  listMessages,
  listSessions,
  pruneSessions,
  renameSession
} from './db/conversations.js';
import { clearSearchHistory, listSearchHistory, popularQueries, PopularQuery, recordSearch, SearchHistoryEntry } from './db/history.js';
import { getSettings, updateSettings } from './db/settings.js';
import { Classifier, LlmClassifier, RuleClassifier } from './ingest/classifier.js';
import { BatchIngestResult, IngestDeps, ingestFile, ingestFiles, IngestOptions, IngestOutcome, ingestText, IngestTextInput } from './ingest/pipeline.js';
import { NotFoundError, ValidationError } from './errors.js';
import { createCompletion, TextCompletion } from './llm/completion.js';
import { healthStatus } from './observability.js';
import { EmbeddingStrategy, TokenFrequencyState } from './retrieval/embedding-strategies.js';
import { DowngradeNotice, FallbackEmbeddingProvider, resolveEmbeddingProvider } from './retrieval/embeddings.js';
import { KeywordIndex, TokenOverlapKeywordIndex } from './retrieval/keyword-index.js';
import { searchChunks, SearchDeps } from './retrieval/search.js';
import { contextualQuery, generateAnswer, PROMPT_HISTORY_MESSAGES } from './retrieval/synthesize.js';
import { readIndexConfig, VectorIndex } from './retrieval/vector-index.js';
import { AnswerResult, ChatTurn, IndexStats, MetadataFilter, RetrievalResult, SearchMode } from './types.js';

export interface OpenOptions {
  ctx?: DBContext;
  /** `null` disables generation; omitted builds a client from the LLM config. */
  completion?: TextCompletion | null;
  keywordIndex?: KeywordIndex;
  classifier?: Classifier;
  strategies?: EmbeddingStrategy[];
  onDowngrade?: (notice: DowngradeNotice) => void;
}

export interface QueryOptions {
  k?: number;
  mode?: SearchMode;
  filter?: MetadataFilter;
  signal?: AbortSignal;
}

export interface ChatOptions extends QueryOptions {
  includeSources?: boolean;
  /** Continues a stored conversation; the exchange is appended to it. */
  sessionId?: number;
}

export interface KBStats extends IndexStats {
  queryCache: { size: number; maxSize: number; hits: number; misses: number };
  jobs: { running: number; done: number; failed: number; skipped: number };
  generation: string | null;
}

export class KnowledgeBase {
  private readonly searchDeps: SearchDeps;
  private readonly ingestDeps: IngestDeps;

  private constructor(
    readonly config: KBConfig,
    readonly ctx: DBContext,
    readonly index: VectorIndex,
    readonly provider: FallbackEmbeddingProvider,
    readonly keywordIndex: KeywordIndex,
    readonly classifier: Classifier,
    readonly completion: TextCompletion | null
  ) {
    this.searchDeps = { index, keywordIndex, provider };
    this.ingestDeps = {
      ctx,
      index,
      provider,
      classifier,
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
      batchSize: config.embedding.batchSize,
      concurrency: config.embedding.concurrency
    };
  }

  /**
   * Opens (or creates) the index under `config.indexDir` and resolves the
   * embedding strategy once. A non-empty index pins the strategy it was
   * built with.
   */
  static async open(config: KBConfig, opts: OpenOptions = {}): Promise<KnowledgeBase> {
    const ctx = opts.ctx ?? initDB(dbPathFor(config.indexDir));
    const persisted = readIndexConfig(ctx);
    const pinned = persisted && countChunks(ctx) > 0 ? persisted.strategy : null;

    let index: VectorIndex | null = null;
    const onFit = (state: TokenFrequencyState): void => {
      index?.saveTokenFrequencyState(state);
    };

    const provider = await resolveEmbeddingProvider(config.embedding, {
      pinned,
      tokenFrequencyState: persisted?.tokenFrequency ?? null,
      onFit,
      strategies: opts.strategies,
      onDowngrade: opts.onDowngrade
    });

    const vectorIndex = new VectorIndex(ctx, { strategy: provider.strategy, dimension: provider.dimension });
    index = vectorIndex;
    if (pinned && vectorIndex.strategyName !== provider.strategy) {
      console.warn(
        `[kb] index was built with ${vectorIndex.strategyName} embeddings but ${provider.strategy} is active; new documents will be rejected until the index is rebuilt`
      );
    }

    const completion = opts.completion !== undefined ? opts.completion : createCompletion(config.llm);
    const classifier =
      opts.classifier ?? (config.useLlmClassifier && completion ? new LlmClassifier(completion) : new RuleClassifier());

    return new KnowledgeBase(
      config,
      ctx,
      vectorIndex,
      provider,
      opts.keywordIndex ?? new TokenOverlapKeywordIndex(ctx),
      classifier,
      completion
    );
  }

  settings(): KBSettings {
    return getSettings(this.ctx);
  }

  updateSettings(patch: Partial<KBSettings>): KBSettings {
    return updateSettings(this.ctx, patch);
  }

  async search(query: string, opts: QueryOptions = {}): Promise<RetrievalResult[]> {
    return this.retrieve(query, query, opts);
  }

  /**
   * Answers from the best-ranked chunks. With a session, the latest messages
   * shape the retrieval query and the prompt, and the exchange is stored.
   */
  async chat(query: string, opts: ChatOptions = {}): Promise<AnswerResult> {
    if (!query.trim()) throw new ValidationError('query must not be empty');
    const history = opts.sessionId === undefined ? [] : this.sessionHistory(opts.sessionId);

    const ranked = await this.retrieve(contextualQuery(query, history), query, opts);
    opts.signal?.throwIfAborted();
    const result = await generateAnswer(query, ranked, {
      completion: this.completion,
      includeSources: opts.includeSources ?? this.settings().includeSources,
      history,
      signal: opts.signal
    });

    const { sessionId } = opts;
    if (sessionId !== undefined) {
      this.ctx.db.transaction(() => {
        addMessage(this.ctx, { sessionId, role: 'user', content: query });
        addMessage(this.ctx, { sessionId, role: 'assistant', content: result.answer });
      })();
    }
    return result;
  }

  createSession(title?: string): ConversationSession {
    return createSession(this.ctx, title);
  }

  sessions(limit?: number): ConversationSession[] {
    return listSessions(this.ctx, limit);
  }

  messages(sessionId: number, limit?: number): ConversationMessage[] {
    return listMessages(this.ctx, sessionId, limit);
  }

  renameSession(sessionId: number, title: string): boolean {
    return renameSession(this.ctx, sessionId, title);
  }

  deleteSession(sessionId: number): boolean {
    return deleteSession(this.ctx, sessionId);
  }

  pruneSessions(olderThanDays?: number): number {
    return pruneSessions(this.ctx, olderThanDays);
  }

  stats(): KBStats {
    const health = healthStatus(this.ctx);
    return {
      ...this.index.stats(),
      queryCache: this.provider.cacheStats(),
      jobs: health.jobs,
      generation: this.completion?.model ?? null
    };
  }

  /** Removes every chunk of `filename`; false when none were stored. */
  delete(filename: string): boolean {
    return this.index.delete({ filename });
  }

  listDocuments(): Array<{ filename: string; chunkCount: number }> {
    return this.index.listFilenames();
  }

  ingestText(input: IngestTextInput, opts?: IngestOptions): Promise<IngestOutcome> {
    return ingestText(this.ingestDeps, input, opts);
  }

  ingestFile(filePath: string, opts?: IngestOptions): Promise<IngestOutcome> {
    return ingestFile(this.ingestDeps, filePath, this.loadOptions(), opts);
  }

  ingestFiles(filePaths: string[], opts?: IngestOptions): Promise<BatchIngestResult> {
    return ingestFiles(this.ingestDeps, filePaths, this.loadOptions(), opts);
  }

  history(limit?: number): SearchHistoryEntry[] {
    return listSearchHistory(this.ctx, limit ?? this.settings().historyLimit);
  }

  popularQueries(limit = 10): PopularQuery[] {
    return popularQueries(this.ctx, limit);
  }

  clearHistory(): number {
    return clearSearchHistory(this.ctx);
  }

  close(): void {
    this.ctx.db.close();
  }

  private async retrieve(retrievalQuery: string, recordedQuery: string, opts: QueryOptions): Promise<RetrievalResult[]> {
    const settings = this.settings();
    const mode = opts.mode ?? settings.defaultSearchMode;
    const results = await searchChunks(
      this.searchDeps,
      retrievalQuery,
      opts.k ?? this.config.topK,
      mode,
      this.config.hybridWeights,
      { filter: opts.filter, signal: opts.signal }
    );
    recordSearch(this.ctx, { query: recordedQuery, mode, resultCount: results.length, limit: settings.historyLimit });
    return results;
  }

  private sessionHistory(sessionId: number): ChatTurn[] {
    if (!getSession(this.ctx, sessionId)) throw new NotFoundError(`session ${sessionId} does not exist`);
    return listMessages(this.ctx, sessionId, PROMPT_HISTORY_MESSAGES).map(({ role, content }) => ({ role, content }));
  }

  private loadOptions(): { supportedFileTypes: string[]; maxFileSizeMb: number } {
    return { supportedFileTypes: this.config.supportedFileTypes, maxFileSizeMb: this.config.maxFileSizeMb };
  }
}
