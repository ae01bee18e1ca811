import path from 'node:path';
import { DBContext } from '../db/client.js';
import { getErrorMessage, ValidationError } from '../errors.js';
import { logIngestEvent, recordJobMetric } from '../observability.js';
import { embedInBatches, EmbeddingProvider } from '../retrieval/embeddings.js';
import { StrategyName } from '../retrieval/embedding-strategies.js';
import { VectorIndex } from '../retrieval/vector-index.js';
import { Category, Chunk, ChunkCustomFields } from '../types.js';
import { splitText } from '../utils/chunking.js';
import { contentHash } from '../utils/text.js';
import { Classification, Classifier } from './classifier.js';
import { loadTextFile, LoadOptions } from './loader.js';

export interface IngestDeps {
  ctx: DBContext;
  index: VectorIndex;
  provider: EmbeddingProvider;
  classifier: Classifier;
  chunkSize: number;
  chunkOverlap: number;
  batchSize?: number;
  concurrency?: number;
}

export interface IngestTextInput {
  text: string;
  filename: string;
  sourcePath?: string;
  fileType?: string;
  fileSizeMb?: number;
  custom?: ChunkCustomFields;
}

export interface IngestOptions {
  /** Replace any chunks already stored under the same filename. */
  force?: boolean;
  signal?: AbortSignal;
  onProgress?: (done: number, total: number) => void;
}

export interface IngestOutcome {
  jobId: number;
  filename: string;
  status: 'done' | 'skipped';
  chunksCreated: number;
  replaced: boolean;
  category: Category | null;
  strategy: StrategyName;
}

function startJob(ctx: DBContext, payload: Record<string, unknown>): number {
  const job = ctx.db
    .prepare('INSERT INTO jobs (job_type, status, payload_json) VALUES (?, ?, ?)')
    .run('ingest', 'running', JSON.stringify(payload));
  return Number(job.lastInsertRowid);
}

function finishJob(ctx: DBContext, jobId: number, status: 'done' | 'skipped' | 'failed', errorText: string | null = null): void {
  ctx.db
    .prepare('UPDATE jobs SET status = ?, error_text = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?')
    .run(status, errorText, jobId);
}

/** The most common category among a document's chunks; first seen wins ties. */
function dominantCategory(classifications: Classification[]): Category | null {
  const counts = new Map<Category, number>();
  for (const c of classifications) counts.set(c.category, (counts.get(c.category) ?? 0) + 1);
  let best: Category | null = null;
  let bestCount = 0;
  for (const [category, count] of counts) {
    if (count > bestCount) {
      best = category;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Chunks, classifies, embeds and stores one document as a tracked job.
 * A document whose chunks are all already indexed is skipped unless
 * `force` is set.
 */
export async function ingestText(deps: IngestDeps, input: IngestTextInput, opts: IngestOptions = {}): Promise<IngestOutcome> {
  const { ctx, index, provider } = deps;
  const sourcePath = input.sourcePath ?? input.filename;
  const fileType = input.fileType ?? path.extname(input.filename).toLowerCase();
  const jobId = startJob(ctx, { filename: input.filename, sourcePath, force: Boolean(opts.force) });
  const started = Date.now();

  try {
    logIngestEvent(ctx, { jobId, sourcePath, eventType: 'job_started', event: { filename: input.filename } });

    const texts = splitText(input.text, deps.chunkSize, deps.chunkOverlap);
    if (!texts.length) {
      throw new ValidationError(`${input.filename} produced zero chunks; refusing to index an empty document`);
    }
    const hashes = texts.map((t) => contentHash(t));
    const stored = index.contentHashesFor(input.filename);
    const unchanged = stored.length > 0 && stored.length === hashes.length && stored.every((h, i) => h === hashes[i]);
    // A file already indexed under this name is only a duplicate when its chunks match exactly.
    const duplicate = stored.length > 0 ? unchanged : hashes.every((h) => index.hasContentHash(h));

    if (!opts.force && duplicate) {
      finishJob(ctx, jobId, 'skipped');
      logIngestEvent(ctx, { jobId, sourcePath, eventType: 'duplicate_skipped', event: { chunks: texts.length } });
      return {
        jobId,
        filename: input.filename,
        status: 'skipped',
        chunksCreated: 0,
        replaced: false,
        category: null,
        strategy: provider.strategy
      };
    }

    const classifyStarted = Date.now();
    const classifications: Classification[] = [];
    for (const text of texts) {
      classifications.push(await deps.classifier.classify(text, opts.signal));
    }
    recordJobMetric(ctx, { jobId, metricName: 'classify_ms', metricValue: Date.now() - classifyStarted });
    opts.signal?.throwIfAborted();

    const embedStarted = Date.now();
    const { vectors, strategies } = await embedInBatches(provider, texts, {
      batchSize: deps.batchSize,
      concurrency: deps.concurrency,
      signal: opts.signal,
      onProgress: opts.onProgress
    });
    recordJobMetric(ctx, {
      jobId,
      metricName: 'embed_ms',
      metricValue: Date.now() - embedStarted,
      labels: { strategies }
    });
    if (strategies.length > 1) {
      throw new ValidationError(`embedding strategy changed while embedding ${input.filename} (${strategies.join(', ')})`);
    }
    const strategy = strategies[0] ?? provider.strategy;
    opts.signal?.throwIfAborted();

    const chunks: Chunk[] = texts.map((content, i) => ({
      content,
      metadata: {
        source_path: sourcePath,
        filename: input.filename,
        chunk_index: i,
        chunk_count: texts.length,
        file_type: fileType,
        file_size_mb: input.fileSizeMb ?? 0,
        content_hash: hashes[i],
        category: classifications[i].category,
        priority: classifications[i].priority,
        tags: classifications[i].tags,
        summary: classifications[i].summary,
        custom: { ...input.custom, classification_method: classifications[i].method }
      }
    }));

    // Replacing runs in one transaction so a rejected add keeps the old chunks.
    const replaced = ctx.db.transaction((): boolean => {
      const removed = opts.force || stored.length > 0 ? index.delete({ filename: input.filename }) : false;
      index.add(chunks, vectors, strategy);
      return removed;
    })();

    finishJob(ctx, jobId, 'done');
    recordJobMetric(ctx, { jobId, metricName: 'chunks_created', metricValue: chunks.length, labels: { filename: input.filename } });
    recordJobMetric(ctx, { jobId, metricName: 'job_duration_ms', metricValue: Date.now() - started });
    logIngestEvent(ctx, {
      jobId,
      sourcePath,
      eventType: 'job_completed',
      event: { chunks: chunks.length, strategy, replaced }
    });

    return {
      jobId,
      filename: input.filename,
      status: 'done',
      chunksCreated: chunks.length,
      replaced,
      category: dominantCategory(classifications),
      strategy
    };
  } catch (error) {
    finishJob(ctx, jobId, 'failed', getErrorMessage(error));
    logIngestEvent(ctx, {
      jobId,
      sourcePath,
      level: 'error',
      eventType: 'job_failed',
      event: { message: getErrorMessage(error) }
    });
    throw error;
  }
}

export async function ingestFile(
  deps: IngestDeps,
  filePath: string,
  load: LoadOptions,
  opts: IngestOptions = {}
): Promise<IngestOutcome> {
  const doc = await loadTextFile(filePath, load);
  return ingestText(
    deps,
    {
      text: doc.text,
      filename: doc.filename,
      sourcePath: doc.sourcePath,
      fileType: doc.fileType,
      fileSizeMb: doc.fileSizeMb
    },
    opts
  );
}

export interface BatchIngestResult {
  succeeded: IngestOutcome[];
  failed: Array<{ path: string; error: string }>;
}

/** Ingests files one after another; a failing file does not stop the rest. */
export async function ingestFiles(
  deps: IngestDeps,
  filePaths: string[],
  load: LoadOptions,
  opts: IngestOptions = {}
): Promise<BatchIngestResult> {
  const result: BatchIngestResult = { succeeded: [], failed: [] };
  for (const filePath of filePaths) {
    opts.signal?.throwIfAborted();
    try {
      result.succeeded.push(await ingestFile(deps, filePath, load, opts));
    } catch (error) {
      if (opts.signal?.aborted) throw error;
      console.error(`[ingest] ${filePath} failed: ${getErrorMessage(error)}`);
      result.failed.push({ path: filePath, error: getErrorMessage(error) });
    }
  }
  return result;
}
