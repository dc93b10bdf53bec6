/**
 * FillProgressStore: durable session progress on the local file system.
 *
 * Each session owns two files in the store directory:
 *   <sessionId>.json          coarse summary, rewritten synchronously on every transition
 *   <sessionId>.records.jsonl one line per processed row, appended in the background
 */

import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from 'node:fs';
import { appendFile } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { PersistenceConfig } from '../config/defaults';
import { errorMessage } from '../errors';
import { valuesMatch } from '../lib/values';
import { getLogger } from '../monitoring/logger';

// ── Schemas ──────────────────────────────────────────────────────────

export const SessionStatusSchema = z.enum(['idle', 'running', 'paused', 'completed', 'aborted', 'error']);
export type SessionStatus = z.infer<typeof SessionStatusSchema>;

export const ProgressSummarySchema = z.object({
  sessionId: z.string().min(1),
  sourceId: z.string(),
  totalRows: z.number().int().nonnegative(),
  cursor: z.number().int().nonnegative(),
  filledCount: z.number().int().nonnegative(),
  failedCount: z.number().int().nonnegative(),
  skippedCount: z.number().int().nonnegative().default(0),
  currentPage: z.number().int().positive(),
  anchorColumn: z.string().nullable(),
  status: SessionStatusSchema,
  startedAt: z.string(),
  updatedAt: z.string(),
});
export type ProgressSummary = z.infer<typeof ProgressSummarySchema>;

export const RecordStatusSchema = z.enum(['success', 'failed', 'skipped']);
export type RecordStatus = z.infer<typeof RecordStatusSchema>;

export const FillRecordSchema = z.object({
  sourceRow: z.number().int().nonnegative(),
  page: z.number().int().positive(),
  destRow: z.number().int().nonnegative().nullable(),
  fieldValues: z.record(z.string()),
  status: RecordStatusSchema,
  timestamp: z.string(),
  error: z.string().nullable(),
  anchorValue: z.string().nullable(),
});
export type FillRecord = z.infer<typeof FillRecordSchema>;

export type FillRecordInput = Omit<FillRecord, 'timestamp'>;

export interface FillProgress {
  summary: ProgressSummary;
  records: FillRecord[];
}

export interface ProgressView extends ProgressSummary {
  percent: number;
}

export interface BeginOptions {
  sourceId: string;
  totalRows: number;
  anchorColumn?: string | null;
  /** Continue a previously persisted session instead of opening a new one. */
  resume?: FillProgress;
}

function newSessionId(now: Date): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  return `progress_${stamp}_${randomUUID().slice(0, 8)}`;
}

// ── Store ────────────────────────────────────────────────────────────

export class FillProgressStore {
  private logger = getLogger({ service: 'FillProgressStore' });
  private readonly dir: string;
  private summary: ProgressSummary | null = null;
  private recent: FillRecord[] = [];
  /** Tail of the background record writes; each append waits for the one before it. */
  private writes: Promise<void> = Promise.resolve();

  /** Exact match after trimming, else numeric equality. */
  static verifyAnchor(expected: string, actual: string): boolean {
    return valuesMatch(expected, actual);
  }

  constructor(config: PersistenceConfig) {
    this.dir = config.dir;
  }

  get current(): ProgressSummary | null {
    return this.summary;
  }

  begin(opts: BeginOptions): ProgressSummary {
    mkdirSync(this.dir, { recursive: true });
    const now = new Date().toISOString();

    if (opts.resume) {
      // Record writes can outlive the last summary write, so the counts come from the records.
      this.summary = {
        ...opts.resume.summary,
        ...countRecords(opts.resume.records),
        status: 'running',
        updatedAt: now,
      };
      this.recent = opts.resume.records.slice(-50);
    } else {
      this.summary = {
        sessionId: newSessionId(new Date()),
        sourceId: opts.sourceId,
        totalRows: opts.totalRows,
        cursor: 0,
        filledCount: 0,
        failedCount: 0,
        skippedCount: 0,
        currentPage: 1,
        anchorColumn: opts.anchorColumn ?? null,
        status: 'running',
        startedAt: now,
        updatedAt: now,
      };
      this.recent = [];
    }
    this.writeSummary();
    return this.summary;
  }

  /** Record a status change (and optionally cursor/page) and persist it before returning. */
  transition(status: SessionStatus, position: { cursor?: number; currentPage?: number } = {}): void {
    const summary = this.requireSession();
    summary.status = status;
    if (position.cursor !== undefined) summary.cursor = position.cursor;
    if (position.currentPage !== undefined) summary.currentPage = position.currentPage;
    this.writeSummary();
  }

  pageTurned(currentPage: number, cursor: number): void {
    const summary = this.requireSession();
    summary.currentPage = currentPage;
    summary.cursor = cursor;
    this.writeSummary();
  }

  /** Append one row outcome. The write happens in the background; see flush(). */
  record(input: FillRecordInput): void {
    const summary = this.requireSession();
    const record: FillRecord = { ...input, timestamp: new Date().toISOString() };

    if (record.status === 'success') summary.filledCount++;
    else if (record.status === 'failed') summary.failedCount++;
    else summary.skippedCount++;
    summary.updatedAt = record.timestamp;

    this.recent.push(record);
    if (this.recent.length > 50) this.recent.shift();

    const path = this.recordsPath(summary.sessionId);
    this.writes = this.writes
      .then(() => appendFile(path, `${JSON.stringify(record)}\n`, 'utf-8'))
      .catch((err: unknown) => {
        this.logger.error('Failed to persist fill record', {
          sessionId: summary.sessionId,
          sourceRow: record.sourceRow,
          error: errorMessage(err),
        });
      });
  }

  /** Wait for every background record write issued so far. */
  async flush(): Promise<void> {
    await this.writes;
  }

  view(): ProgressView | null {
    if (!this.summary) return null;
    const { totalRows, filledCount, failedCount, skippedCount } = this.summary;
    const done = filledCount + failedCount + skippedCount;
    const percent = totalRows === 0 ? 0 : Math.min(100, Math.round((done / totalRows) * 1000) / 10);
    return { ...this.summary, percent };
  }

  recentRecords(count = 10): FillRecord[] {
    return this.recent.slice(-count);
  }

  /** Every persisted session summary, most recently updated first. */
  listSessions(): ProgressSummary[] {
    if (!existsSync(this.dir)) return [];

    const summaries: ProgressSummary[] = [];
    for (const file of readdirSync(this.dir)) {
      if (!file.endsWith('.json')) continue;
      try {
        summaries.push(ProgressSummarySchema.parse(JSON.parse(readFileSync(join(this.dir, file), 'utf-8'))));
      } catch (err) {
        this.logger.warn('Ignoring unreadable progress file', { file, error: errorMessage(err) });
      }
    }
    return summaries.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  /** Summary plus every record of a session; null when no such session exists. */
  load(sessionId: string): FillProgress | null {
    const summaryPath = this.summaryPath(sessionId);
    if (!existsSync(summaryPath)) return null;

    const summary = ProgressSummarySchema.parse(JSON.parse(readFileSync(summaryPath, 'utf-8')));
    const records: FillRecord[] = [];
    const recordsPath = this.recordsPath(sessionId);
    if (existsSync(recordsPath)) {
      const lines = readFileSync(recordsPath, 'utf-8').split('\n');
      for (const line of lines) {
        if (!line.trim()) continue;
        const parsed = FillRecordSchema.safeParse(safeJson(line));
        // A crash can leave the last line half-written.
        if (parsed.success) records.push(parsed.data);
        else this.logger.warn('Skipping malformed fill record', { sessionId });
      }
    }
    return { summary, records };
  }

  // ── Internals ──────────────────────────────────────────────────────

  private requireSession(): ProgressSummary {
    if (!this.summary) throw new Error('No progress session has been started');
    return this.summary;
  }

  private writeSummary(): void {
    const summary = this.requireSession();
    summary.updatedAt = new Date().toISOString();
    writeFileSync(this.summaryPath(summary.sessionId), JSON.stringify(summary, null, 2), 'utf-8');
  }

  private summaryPath(sessionId: string): string {
    return join(this.dir, `${sessionId}.json`);
  }

  private recordsPath(sessionId: string): string {
    return join(this.dir, `${sessionId}.records.jsonl`);
  }
}

/** Outcome totals of a set of records. */
export function countRecords(
  records: readonly FillRecord[],
): Pick<ProgressSummary, 'filledCount' | 'failedCount' | 'skippedCount'> {
  let filledCount = 0;
  let failedCount = 0;
  let skippedCount = 0;
  for (const record of records) {
    if (record.status === 'success') filledCount++;
    else if (record.status === 'failed') failedCount++;
    else skippedCount++;
  }
  return { filledCount, failedCount, skippedCount };
}

function safeJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}
