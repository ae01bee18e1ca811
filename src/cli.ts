import { parseSearchMode } from './config.js';
import { ValidationError } from './errors.js';
import { buildIngestionSummary } from './ingest/summary.js';
import { KnowledgeBase } from './knowledge-base.js';
import { recentIngestLogs } from './observability.js';
import { CATEGORIES, MetadataFilter, PRIORITIES, RetrievalResult, SearchMode } from './types.js';

export type Flags = Record<string, string | true>;

export const USAGE = [
  'Usage:',
  '  doc-kb ingest <file...> [--force]',
  '  doc-kb search "<query>" [--mode hybrid|semantic|keyword] [--k <n>] [--filename <name>] [--category <c>] [--priority <p>]',
  '  doc-kb ask "<question>" [--mode <mode>] [--k <n>] [--no-sources] [--session <id>]',
  '  doc-kb sessions [new <title>|rename <id> <title>|delete <id>|show <id>|prune [--days <n>]] [--limit <n>]',
  '  doc-kb stats',
  '  doc-kb docs',
  '  doc-kb delete <filename>',
  '  doc-kb history [clear|popular] [--limit <n>]',
  '  doc-kb logs [--limit <n>]',
  '  doc-kb config set <defaultSearchMode|includeSources|historyLimit> <value>'
].join('\n');

export function parseFlags(args: string[]): { positional: string[]; flags: Flags } {
  const positional: string[] = [];
  const flags: Flags = {};
  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        flags[arg.slice(2)] = next;
        i += 2;
      } else {
        flags[arg.slice(2)] = true;
        i++;
      }
    } else {
      positional.push(arg);
      i++;
    }
  }
  return { positional, flags };
}

function stringFlag(flags: Flags, name: string): string | undefined {
  const value = flags[name];
  return typeof value === 'string' ? value : undefined;
}

function positiveInt(raw: string, label: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) throw new ValidationError(`${label} must be a positive integer`);
  return value;
}

function positiveIntFlag(flags: Flags, name: string): number | undefined {
  const raw = stringFlag(flags, name);
  return raw === undefined ? undefined : positiveInt(raw, `--${name}`);
}

function modeFlag(flags: Flags): SearchMode | undefined {
  const raw = stringFlag(flags, 'mode');
  if (raw === undefined) return undefined;
  const mode = parseSearchMode(raw);
  if (!mode) throw new ValidationError(`unknown search mode "${raw}"`);
  return mode;
}

function filterFlags(flags: Flags): MetadataFilter | undefined {
  const filter: MetadataFilter = {};
  const filename = stringFlag(flags, 'filename');
  const category = stringFlag(flags, 'category');
  const priority = stringFlag(flags, 'priority');
  if (filename) filter.filename = filename;
  if (category) {
    if (!CATEGORIES.some((c) => c === category)) throw new ValidationError(`unknown category "${category}"`);
    filter.category = category;
  }
  if (priority) {
    if (!PRIORITIES.some((p) => p === priority)) throw new ValidationError(`unknown priority "${priority}"`);
    filter.priority = priority;
  }
  return Object.keys(filter).length ? filter : undefined;
}

export function formatResult(result: RetrievalResult, rank: number): string {
  const m = result.metadata;
  const preview = result.content.replace(/\s+/g, ' ').trim().slice(0, 160);
  return [
    `${rank}. ${m.filename} (part ${m.chunk_index + 1}/${m.chunk_count}) score ${result.combined_score.toFixed(3)} relevance ${result.relevance_score.toFixed(3)}`,
    `   [${m.category}/${m.priority}] ${preview}`
  ].join('\n');
}

/** Runs one CLI command against an open knowledge base; returns the exit code. */
export async function runCli(args: string[], kb: KnowledgeBase, out: (line: string) => void = console.log): Promise<number> {
  const [cmd, ...rest] = args;
  const { positional, flags } = parseFlags(rest);

  if (cmd === 'ingest') {
    if (!positional.length) {
      out('Error: at least one file is required.\nUsage: doc-kb ingest <file...> [--force]');
      return 1;
    }
    const { succeeded, failed } = await kb.ingestFiles(positional, { force: flags.force === true });
    for (const outcome of succeeded) out(buildIngestionSummary(outcome));
    for (const failure of failed) out(`❌ ${failure.path}: ${failure.error}`);
    return failed.length ? 1 : 0;
  }

  if (cmd === 'search') {
    const query = positional.join(' ');
    if (!query) {
      out('Error: query required.\nUsage: doc-kb search "<query>"');
      return 1;
    }
    const results = await kb.search(query, { k: positiveIntFlag(flags, 'k'), mode: modeFlag(flags), filter: filterFlags(flags) });
    if (!results.length) {
      out('No matching chunks found.');
      return 0;
    }
    results.forEach((r, i) => out(formatResult(r, i + 1)));
    return 0;
  }

  if (cmd === 'ask') {
    const question = positional.join(' ');
    if (!question) {
      out('Error: question required.\nUsage: doc-kb ask "<question>"');
      return 1;
    }
    const result = await kb.chat(question, {
      k: positiveIntFlag(flags, 'k'),
      mode: modeFlag(flags),
      filter: filterFlags(flags),
      includeSources: flags['no-sources'] === true ? false : undefined,
      sessionId: positiveIntFlag(flags, 'session')
    });
    out(result.answer);
    out('');
    out(`Confidence: ${result.confidence.toFixed(3)} (${result.method}, ${result.retrievedCount} chunks)`);
    if (result.sources.length) {
      out('Sources:');
      for (const s of result.sources) out(`  - ${s.filename} (part ${s.chunkIndex + 1}, relevance ${s.relevanceScore.toFixed(3)})`);
    }
    return 0;
  }

  if (cmd === 'sessions') {
    const [action, target, ...words] = positional;
    if (action === 'new') {
      const session = kb.createSession([target, ...words].filter(Boolean).join(' ') || undefined);
      out(`Created session ${session.id}: ${session.title}`);
      return 0;
    }
    if (action === 'rename' || action === 'delete' || action === 'show') {
      if (!target) {
        out(`Error: session id required.\nUsage: doc-kb sessions ${action} <id>`);
        return 1;
      }
      const id = positiveInt(target, 'session id');
      if (action === 'show') {
        for (const m of kb.messages(id, positiveIntFlag(flags, 'limit'))) out(`${m.role === 'user' ? 'You' : 'KB'}: ${m.content}`);
        return 0;
      }
      const ok = action === 'rename' ? kb.renameSession(id, words.join(' ')) : kb.deleteSession(id);
      out(ok ? `${action === 'rename' ? 'Renamed' : 'Deleted'} session ${id}.` : `No session ${id}.`);
      return ok ? 0 : 1;
    }
    if (action === 'prune') {
      out(`Pruned ${kb.pruneSessions(positiveIntFlag(flags, 'days'))} sessions.`);
      return 0;
    }
    const sessions = kb.sessions(positiveIntFlag(flags, 'limit'));
    if (!sessions.length) {
      out('No conversations yet.');
      return 0;
    }
    for (const s of sessions) out(`${String(s.id).padStart(4)}  ${s.title} (${s.totalTurns} turns, last active ${s.lastActive})`);
    return 0;
  }

  if (cmd === 'stats') {
    out(JSON.stringify({ ...kb.stats(), settings: kb.settings() }, null, 2));
    return 0;
  }

  if (cmd === 'docs') {
    const docs = kb.listDocuments();
    if (!docs.length) {
      out('No documents indexed. Ingest some first:\n  doc-kb ingest <file...>');
      return 0;
    }
    const width = Math.max(8, ...docs.map((d) => d.filename.length));
    out(`  ${'Filename'.padEnd(width)}  Chunks`);
    for (const d of docs) out(`  ${d.filename.padEnd(width)}  ${String(d.chunkCount).padStart(6)}`);
    return 0;
  }

  if (cmd === 'delete') {
    const filename = positional[0];
    if (!filename) {
      out('Error: filename required.\nUsage: doc-kb delete <filename>');
      return 1;
    }
    if (!kb.delete(filename)) {
      out(`No chunks stored for ${filename}.`);
      return 1;
    }
    out(`Deleted ${filename}.`);
    return 0;
  }

  if (cmd === 'history') {
    if (positional[0] === 'clear') {
      out(`Cleared ${kb.clearHistory()} entries.`);
      return 0;
    }
    if (positional[0] === 'popular') {
      for (const p of kb.popularQueries(positiveIntFlag(flags, 'limit'))) out(`${String(p.count).padStart(4)}  ${p.query}`);
      return 0;
    }
    const entries = kb.history(positiveIntFlag(flags, 'limit'));
    if (!entries.length) {
      out('No searches yet.');
      return 0;
    }
    for (const e of entries) out(`${e.createdAt}  [${e.mode}] ${e.query} (${e.resultCount} results)`);
    return 0;
  }

  if (cmd === 'logs') {
    for (const entry of recentIngestLogs(kb.ctx, positiveIntFlag(flags, 'limit') ?? 20)) {
      out(`${entry.level.toUpperCase()} ${entry.eventType} job=${entry.jobId ?? '-'} ${entry.sourcePath ?? ''} ${JSON.stringify(entry.event)}`.trim());
    }
    return 0;
  }

  if (cmd === 'config' && positional[0] === 'set' && positional[1] && positional[2] !== undefined) {
    const key = positional[1];
    const value = positional.slice(2).join(' ');
    if (key === 'defaultSearchMode') {
      const mode = parseSearchMode(value);
      if (!mode) throw new ValidationError(`unknown search mode "${value}"`);
      kb.updateSettings({ defaultSearchMode: mode });
    } else if (key === 'includeSources') {
      kb.updateSettings({ includeSources: value.toLowerCase() === 'true' });
    } else if (key === 'historyLimit') {
      const limit = Number(value);
      if (!Number.isInteger(limit) || limit <= 0) throw new ValidationError('historyLimit must be a positive integer');
      kb.updateSettings({ historyLimit: limit });
    } else {
      throw new ValidationError(`unknown config key: ${key}`);
    }
    out(JSON.stringify(kb.settings(), null, 2));
    return 0;
  }

  out(USAGE);
  return cmd ? 1 : 0;
}
