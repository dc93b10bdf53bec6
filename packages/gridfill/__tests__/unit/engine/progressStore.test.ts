import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { appendFileSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FillProgressStore, type FillRecordInput } from '../../../src/engine/ProgressStore';

function recordFor(sourceRow: number, overrides: Partial<FillRecordInput> = {}): FillRecordInput {
  return {
    sourceRow,
    page: 1,
    destRow: sourceRow,
    fieldValues: { amount: String(sourceRow * 10) },
    status: 'success',
    error: null,
    anchorValue: null,
    ...overrides,
  };
}

describe('FillProgressStore', () => {
  let dir: string;
  let store: FillProgressStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gridfill-progress-'));
    store = new FillProgressStore({ dir });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('begin opens a session and persists its summary', () => {
    const summary = store.begin({ sourceId: 'orders.csv', totalRows: 4, anchorColumn: 'code' });

    expect(summary.sessionId).toMatch(/^progress_\d{8}_\d{6}_[0-9a-f]{8}$/);
    const onDisk = JSON.parse(readFileSync(join(dir, `${summary.sessionId}.json`), 'utf-8'));
    expect(onDisk).toMatchObject({
      sourceId: 'orders.csv',
      totalRows: 4,
      cursor: 0,
      currentPage: 1,
      anchorColumn: 'code',
      status: 'running',
    });
  });

  test('transitions are on disk before the call returns', () => {
    const { sessionId } = store.begin({ sourceId: 'orders.csv', totalRows: 10 });

    store.transition('paused', { cursor: 5, currentPage: 2 });

    const onDisk = JSON.parse(readFileSync(join(dir, `${sessionId}.json`), 'utf-8'));
    expect(onDisk).toMatchObject({ status: 'paused', cursor: 5, currentPage: 2 });
  });

  test('records are appended in the background and readable after flush', async () => {
    const { sessionId } = store.begin({ sourceId: 'orders.csv', totalRows: 4 });
    store.record(recordFor(0));
    store.record(recordFor(1, { status: 'failed', error: 'No element matches #amount' }));
    await store.flush();

    const progress = store.load(sessionId);

    expect(progress?.records.map((r) => [r.sourceRow, r.status])).toEqual([
      [0, 'success'],
      [1, 'failed'],
    ]);
    expect(progress?.records[1].error).toBe('No element matches #amount');
    expect(store.view()).toMatchObject({ filledCount: 1, failedCount: 1, skippedCount: 0, percent: 50 });
  });

  test('load skips a half-written last line', async () => {
    const { sessionId } = store.begin({ sourceId: 'orders.csv', totalRows: 3 });
    store.record(recordFor(0));
    await store.flush();
    appendFileSync(join(dir, `${sessionId}.records.jsonl`), '{"sourceRow":1,"pa');

    expect(store.load(sessionId)?.records).toHaveLength(1);
  });

  test('load returns null for an unknown session', () => {
    expect(store.load('progress_20200101_000000_deadbeef')).toBeNull();
  });

  test('listSessions ignores files that are not summaries', async () => {
    const first = store.begin({ sourceId: 'a.csv', totalRows: 1 });
    const second = new FillProgressStore({ dir }).begin({ sourceId: 'b.csv', totalRows: 2 });
    writeFileSync(join(dir, 'notes.json'), '{"hello":"world"}');

    const sessions = store.listSessions();

    expect(sessions.map((s) => s.sessionId).sort()).toEqual([first.sessionId, second.sessionId].sort());
  });

  test('listSessions on a missing directory is empty', () => {
    expect(new FillProgressStore({ dir: join(dir, 'nowhere') }).listSessions()).toEqual([]);
  });

  test('resuming keeps the session identity and counters', async () => {
    const { sessionId } = store.begin({ sourceId: 'orders.csv', totalRows: 4 });
    store.record(recordFor(0));
    store.transition('paused', { cursor: 1 });
    await store.flush();
    const saved = store.load(sessionId);
    if (!saved) throw new Error('expected saved progress');

    const resumed = new FillProgressStore({ dir });
    const summary = resumed.begin({ sourceId: 'orders.csv', totalRows: 4, resume: saved });

    expect(summary).toMatchObject({ sessionId, status: 'running', cursor: 1, filledCount: 1 });
    expect(resumed.recentRecords()).toHaveLength(1);
  });

  test('resuming counts outcomes from records written after the last summary', async () => {
    const { sessionId } = store.begin({ sourceId: 'orders.csv', totalRows: 4 });
    store.transition('running', { cursor: 0 });
    store.record(recordFor(0));
    store.record(recordFor(1, { status: 'failed', error: 'no field could be written' }));
    store.record(recordFor(2, { status: 'skipped', destRow: null }));
    await store.flush();
    const saved = store.load(sessionId);
    if (!saved) throw new Error('expected saved progress');
    expect(saved.summary.filledCount).toBe(0);

    const summary = new FillProgressStore({ dir }).begin({ sourceId: 'orders.csv', totalRows: 4, resume: saved });

    expect(summary).toMatchObject({ filledCount: 1, failedCount: 1, skippedCount: 1 });
  });

  test('recording before begin is an error', () => {
    expect(() => store.record(recordFor(0))).toThrow('No progress session has been started');
  });

  test('verifyAnchor treats numerically equal keys as equal', () => {
    expect(FillProgressStore.verifyAnchor('100', '100.0')).toBe(true);
    expect(FillProgressStore.verifyAnchor(' A1', 'A1 ')).toBe(true);
    expect(FillProgressStore.verifyAnchor('A1', 'A2')).toBe(false);
  });
});
