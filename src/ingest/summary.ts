import type { IngestOutcome } from './pipeline.js';

export function buildIngestionSummary(outcome: IngestOutcome, preview = ''): string {
  const head = outcome.status === 'skipped' ? `⏭️ Skipped ${outcome.filename} (already indexed)` : `✅ Ingested ${outcome.filename}`;
  const compact = preview.replace(/\s+/g, ' ').trim().slice(0, 280);
  return [
    head,
    `Job: #${outcome.jobId}`,
    `Chunks: ${outcome.chunksCreated}${outcome.replaced ? ' (replaced previous version)' : ''}`,
    outcome.category ? `Category: ${outcome.category}` : null,
    `Embeddings: ${outcome.strategy}`,
    compact ? `Preview: ${compact}${compact.length >= 280 ? '…' : ''}` : null
  ]
    .filter(Boolean)
    .join('\n');
}
