import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SUPPORTED_FILE_TYPES } from '../src/config.js';
import { DBContext, initDB } from '../src/db/client.js';
import { NotFoundError, ValidationError } from '../src/errors.js';
import { RuleClassifier } from '../src/ingest/classifier.js';
import { loadTextFile } from '../src/ingest/loader.js';
import { ingestFile, ingestFiles, IngestDeps, ingestText } from '../src/ingest/pipeline.js';
import { buildIngestionSummary } from '../src/ingest/summary.js';
import { healthStatus, recentIngestLogs } from '../src/observability.js';
import { EmbeddingStrategy, HashEmbeddingStrategy, hashEmbedding } from '../src/retrieval/embedding-strategies.js';
import { FallbackEmbeddingProvider } from '../src/retrieval/embeddings.js';
import { VectorIndex } from '../src/retrieval/vector-index.js';

const MEETING = 'Project meeting: review the project plan with the client.';
const LOAD = { supportedFileTypes: SUPPORTED_FILE_TYPES, maxFileSizeMb: 1 };

function makeDeps(ctx: DBContext, overrides: Partial<IngestDeps> = {}): IngestDeps {
  return {
    ctx,
    index: new VectorIndex(ctx, { strategy: 'hash', dimension: 384 }),
    provider: new FallbackEmbeddingProvider(new HashEmbeddingStrategy()),
    classifier: new RuleClassifier(),
    chunkSize: 200,
    chunkOverlap: 40,
    ...overrides
  };
}

describe('ingestText', () => {
  let ctx: DBContext;
  let deps: IngestDeps;

  beforeEach(() => {
    ctx = initDB(':memory:');
    deps = makeDeps(ctx);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('chunks, classifies and stores a document', async () => {
    const outcome = await ingestText(deps, { text: MEETING, filename: 'meeting.md' });

    expect(outcome).toMatchObject({
      filename: 'meeting.md',
      status: 'done',
      chunksCreated: 1,
      replaced: false,
      category: 'work',
      strategy: 'hash'
    });
    const [hit] = deps.index.search(hashEmbedding(MEETING), 1);
    expect(hit.content).toBe(MEETING);
    expect(hit.metadata).toMatchObject({
      source_path: 'meeting.md',
      file_type: '.md',
      chunk_index: 0,
      chunk_count: 1,
      category: 'work',
      priority: 'low',
      custom: { classification_method: 'rules' }
    });
    expect(recentIngestLogs(ctx).map((l) => l.eventType)).toEqual(['job_completed', 'job_started']);
  });

  it('skips a document whose chunks are already indexed', async () => {
    await ingestText(deps, { text: MEETING, filename: 'meeting.md' });
    const again = await ingestText(deps, { text: MEETING, filename: 'copy.md' });

    expect(again.status).toBe('skipped');
    expect(again.chunksCreated).toBe(0);
    expect(deps.index.stats().recordCount).toBe(1);
    expect(healthStatus(ctx).jobs).toEqual({ running: 0, done: 1, skipped: 1, failed: 0 });
  });

  it('replaces a file whose content changed without being forced', async () => {
    await ingestText(deps, { text: 'Version one of the notes.', filename: 'notes.md' });
    const unchanged = await ingestText(deps, { text: 'Version one of the notes.', filename: 'notes.md' });
    const outcome = await ingestText(deps, { text: 'Version two, rewritten entirely.', filename: 'notes.md' });

    expect(unchanged.status).toBe('skipped');
    expect(outcome.status).toBe('done');
    expect(outcome.replaced).toBe(true);
    expect(deps.index.stats().recordCount).toBe(1);
    expect(deps.index.search(hashEmbedding('x'), 5).map((r) => r.content)).toEqual(['Version two, rewritten entirely.']);
  });

  it('replaces the previous version when forced', async () => {
    await ingestText(deps, { text: MEETING, filename: 'meeting.md' });
    const outcome = await ingestText(deps, { text: 'Brainstorm a prototype design.', filename: 'meeting.md' }, { force: true });

    expect(outcome.replaced).toBe(true);
    expect(outcome.category).toBe('ideas');
    expect(deps.index.listFilenames()).toEqual([{ filename: 'meeting.md', chunkCount: 1 }]);
    expect(deps.index.search(hashEmbedding('x'), 5).map((r) => r.content)).toEqual(['Brainstorm a prototype design.']);
  });

  it('keeps the old chunks when a forced replacement fails', async () => {
    await ingestText(deps, { text: MEETING, filename: 'meeting.md' });
    const narrow = { ...deps, provider: new FallbackEmbeddingProvider(new HashEmbeddingStrategy(8)) };

    await expect(ingestText(narrow, { text: 'Replacement text', filename: 'meeting.md' }, { force: true })).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(deps.index.search(hashEmbedding('x'), 5).map((r) => r.content)).toEqual([MEETING]);
    expect(healthStatus(ctx).jobs.failed).toBe(1);
  });

  it('fails the job for an empty document', async () => {
    await expect(ingestText(deps, { text: '  \n\n ', filename: 'blank.txt' })).rejects.toThrow(
      'blank.txt produced zero chunks; refusing to index an empty document'
    );
    const [failure] = recentIngestLogs(ctx);
    expect(failure).toMatchObject({ level: 'error', eventType: 'job_failed', sourcePath: 'blank.txt' });
    expect(deps.index.stats().recordCount).toBe(0);
  });

  it('refuses a document embedded by two strategies', async () => {
    let calls = 0;
    const flaky: EmbeddingStrategy = {
      name: 'token-frequency',
      dimension: 384,
      probe: async () => ({ ok: true }),
      embed: async (texts) => {
        calls += 1;
        if (calls > 1) throw new Error('model went away');
        return texts.map((t) => hashEmbedding(t));
      }
    };
    const mixed = makeDeps(ctx, {
      index: new VectorIndex(ctx, { strategy: 'token-frequency', dimension: 384 }),
      provider: new FallbackEmbeddingProvider(flaky, new HashEmbeddingStrategy(), () => undefined),
      batchSize: 1,
      concurrency: 1
    });

    await expect(ingestText(mixed, { text: 'Alpha beta gamma delta. '.repeat(15), filename: 'long.txt' })).rejects.toThrow(
      'embedding strategy changed while embedding long.txt (token-frequency, hash)'
    );
    expect(mixed.index.stats().recordCount).toBe(0);
  });

  it('reports embedding progress', async () => {
    const progress: Array<[number, number]> = [];
    const outcome = await ingestText(
      { ...deps, batchSize: 1, concurrency: 1 },
      { text: 'Alpha beta gamma delta. '.repeat(15), filename: 'long.txt' },
      { onProgress: (done, total) => progress.push([done, total]) }
    );

    expect(progress).toHaveLength(outcome.chunksCreated);
    expect(progress[progress.length - 1]).toEqual([outcome.chunksCreated, outcome.chunksCreated]);
  });
});

describe('file ingestion', () => {
  let dir: string;
  let deps: IngestDeps;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'doc-kb-'));
    deps = makeDeps(initDB(':memory:'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('loads Markdown from disk', async () => {
    const file = path.join(dir, 'Notes.MD');
    fs.writeFileSync(file, MEETING);

    const outcome = await ingestFile(deps, file, LOAD);
    expect(outcome.filename).toBe('Notes.MD');
    const [hit] = deps.index.search(hashEmbedding(MEETING), 1);
    expect(hit.metadata.source_path).toBe(path.resolve(file));
    expect(hit.metadata.file_type).toBe('.md');
  });

  it('rejects unsupported, missing, oversized and binary documents', async () => {
    fs.writeFileSync(path.join(dir, 'table.csv'), 'a,b');
    fs.writeFileSync(path.join(dir, 'paper.pdf'), '%PDF-1.4');
    fs.writeFileSync(path.join(dir, 'big.txt'), 'x'.repeat(2048));

    await expect(loadTextFile(path.join(dir, 'table.csv'), LOAD)).rejects.toBeInstanceOf(ValidationError);
    await expect(loadTextFile(path.join(dir, 'absent.txt'), LOAD)).rejects.toBeInstanceOf(NotFoundError);
    await expect(loadTextFile(path.join(dir, 'big.txt'), { ...LOAD, maxFileSizeMb: 0.001 })).rejects.toThrow(
      'big.txt is 0 MB; the limit is 0.001 MB'
    );
    await expect(loadTextFile(path.join(dir, 'paper.pdf'), LOAD)).rejects.toThrow(
      '.pdf files need a text extractor; convert paper.pdf to .txt or .md first'
    );
  });

  it('continues past files that fail', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const good = path.join(dir, 'good.txt');
    fs.writeFileSync(good, MEETING);
    const missing = path.join(dir, 'missing.txt');

    const result = await ingestFiles(deps, [missing, good], LOAD);

    expect(result.succeeded.map((o) => o.filename)).toEqual(['good.txt']);
    expect(result.failed).toEqual([{ path: missing, error: `file not found: ${missing}` }]);
    expect(error).toHaveBeenCalledOnce();
  });
});

describe('buildIngestionSummary', () => {
  it('summarizes a completed job', () => {
    const summary = buildIngestionSummary(
      { jobId: 3, filename: 'a.md', status: 'done', chunksCreated: 4, replaced: true, category: 'study', strategy: 'hash' },
      'First   line\nsecond'
    );
    expect(summary).toBe(
      ['✅ Ingested a.md', 'Job: #3', 'Chunks: 4 (replaced previous version)', 'Category: study', 'Embeddings: hash', 'Preview: First line second'].join(
        '\n'
      )
    );
  });
});
