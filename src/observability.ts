import { DBContext } from './db/client.js';
import { isRecord } from './config.js';

export type LogLevel = 'info' | 'warn' | 'error';

export function logIngestEvent(
  ctx: DBContext,
  params: { jobId?: number; sourcePath?: string; level?: LogLevel; eventType: string; event?: Record<string, unknown> }
): void {
  ctx.db
    .prepare(
      `INSERT INTO ingest_logs (job_id, source_path, level, event_type, event_json)
       VALUES (?, ?, ?, ?, ?)`
    )
    .run(
      params.jobId || null,
      params.sourcePath || null,
      params.level || 'info',
      params.eventType,
      JSON.stringify(params.event || {})
    );
}

export function recordJobMetric(
  ctx: DBContext,
  params: { jobId?: number; metricName: string; metricValue: number; labels?: Record<string, unknown> }
): void {
  ctx.db
    .prepare('INSERT INTO job_metrics (job_id, metric_name, metric_value, labels_json) VALUES (?, ?, ?, ?)')
    .run(params.jobId || null, params.metricName, params.metricValue, JSON.stringify(params.labels || {}));
}

export interface IngestLogEntry {
  jobId: number | null;
  sourcePath: string | null;
  level: string;
  eventType: string;
  event: Record<string, unknown>;
}

export function recentIngestLogs(ctx: DBContext, limit = 20): IngestLogEntry[] {
  const rows = ctx.db
    .prepare('SELECT job_id, source_path, level, event_type, event_json FROM ingest_logs ORDER BY id DESC LIMIT ?')
    .all(limit) as Array<{ job_id: number | null; source_path: string | null; level: string; event_type: string; event_json: string | null }>;
  return rows.map((r) => {
    let event: Record<string, unknown> = {};
    try {
      const parsed: unknown = JSON.parse(r.event_json || '{}');
      if (isRecord(parsed)) event = parsed;
    } catch {
      event = {};
    }
    return { jobId: r.job_id, sourcePath: r.source_path, level: r.level, eventType: r.event_type, event };
  });
}

export function healthStatus(ctx: DBContext): {
  dbOk: boolean;
  documentCount: number;
  chunkCount: number;
  jobs: { running: number; done: number; failed: number; skipped: number };
  recentFailures24h: number;
} {
  const dbOk = Boolean(ctx.db.prepare('SELECT 1 as ok').get());
  const documentCount = Number((ctx.db.prepare('SELECT COUNT(DISTINCT source_path) as c FROM chunks').get() as { c: number }).c);
  const chunkCount = Number((ctx.db.prepare('SELECT COUNT(*) as c FROM chunks').get() as { c: number }).c);
  const jobs = ctx.db
    .prepare(
      `SELECT
         SUM(CASE WHEN status = 'running' THEN 1 ELSE 0 END) as running,
         SUM(CASE WHEN status = 'done' THEN 1 ELSE 0 END) as done,
         SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) as failed,
         SUM(CASE WHEN status = 'skipped' THEN 1 ELSE 0 END) as skipped
       FROM jobs`
    )
    .get() as { running: number | null; done: number | null; failed: number | null; skipped: number | null };

  const recentFailures24h = Number(
    (
      ctx.db
        .prepare("SELECT COUNT(*) as c FROM jobs WHERE status = 'failed' AND created_at >= datetime('now', '-1 day')")
        .get() as { c: number }
    ).c
  );

  return {
    dbOk,
    documentCount,
    chunkCount,
    jobs: {
      running: jobs.running || 0,
      done: jobs.done || 0,
      failed: jobs.failed || 0,
      skipped: jobs.skipped || 0
    },
    recentFailures24h
  };
}
