import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FillSessionController, type FillSessionOptions } from '../../../src/session/FillSessionController';
import { AnchorConfig } from '../../../src/engine/AnchorConfig';
import { FillProgressStore } from '../../../src/engine/ProgressStore';
import { loadEngineConfig } from '../../../src/config/defaults';
import { ConfigurationError } from '../../../src/errors';
import { FakeTablePage, KEY_CELL, NEXT_BUTTON } from '../helpers/fakeTablePage';
import { makeRows } from '../helpers/factories';
import type { SourceRow } from '../../../src/engine/types';

const config = loadEngineConfig({
  scanner: { maxWaitMs: 0, pollIntervalMs: 0, stableThreshold: 1 },
  pagination: { clickSettleMs: 0, changeTimeoutMs: 0, changePollMs: 0, readyTimeoutMs: 0, readyPollMs: 0 },
  filler: { elementTimeoutMs: 0 },
  persistence: { dir: join(tmpdir(), 'gridfill-unused') },
});

function orderRows(codes: string[]): SourceRow[] {
  return makeRows(codes.map((code, i) => ({ code, amount: String((i + 1) * 100), note: `n${i}` })));
}

function keys(count: number, prefix = 'K'): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}${i}`);
}

function keyColumn(): AnchorConfig {
  return new AnchorConfig([{ field: 'code', selector: KEY_CELL, label: 'Code', enabled: true }]);
}

async function ready(
  page: FakeTablePage,
  rows: readonly SourceRow[],
  extra: Partial<FillSessionOptions> = {},
): Promise<FillSessionController> {
  const controller = new FillSessionController({ handle: page, rows, config, store: null, ...extra });
  await controller.scan();
  controller.match();
  return controller;
}

describe('FillSessionController', () => {
  describe('discovery and mapping', () => {
    test('maps source fields to the scanned columns by header', async () => {
      const page = new FakeTablePage({ pages: [keys(2)], columns: ['Amount', 'Note'] });
      const controller = await ready(page, orderRows(['K0']));

      expect(controller.fieldNames).toEqual(['code', 'amount', 'note']);
      expect([...controller.getMappings()].map(([field, fp]) => [field, fp.displayName])).toEqual([
        ['amount', 'Amount'],
        ['note', 'Note'],
      ]);
      expect(controller.fingerprints[0].mapping).toEqual({ field: 'amount', score: 100 });
    });

    test('setMapping replaces and clears a mapping', async () => {
      const page = new FakeTablePage({ pages: [keys(2)], columns: ['Amount', 'Note'] });
      const controller = await ready(page, orderRows(['K0']));
      const [amountFp, noteFp] = controller.fingerprints;

      controller.setMapping('amount', noteFp);
      expect(amountFp.mapping).toBeNull();
      expect(controller.getMappings().get('amount')).toBe(noteFp);

      controller.setMapping('amount', null);
      expect(controller.getMappings().has('amount')).toBe(false);
    });

    test('highlight goes to the best selector of the control', async () => {
      const page = new FakeTablePage({ pages: [keys(2)], columns: ['Amount'] });
      const spy = vi.spyOn(page, 'highlight');
      const controller = await ready(page, orderRows(['K0']));

      expect(await controller.highlight(controller.fingerprints[0])).toBe(true);
      expect(spy).toHaveBeenCalledWith('/html/body/table/tbody/tr[1]/td[2]/input[1]');
    });
  });

  describe('start validation', () => {
    test('no rows is a configuration error', async () => {
      const page = new FakeTablePage({ pages: [keys(2)], columns: ['Amount'] });
      const controller = await ready(page, []);
      await expect(controller.start()).rejects.toThrow(new ConfigurationError('No source rows to fill'));
    });

    test('no mapping is a configuration error', async () => {
      const page = new FakeTablePage({ pages: [keys(2)], columns: ['Amount'] });
      const controller = new FillSessionController({ handle: page, rows: orderRows(['K0']), config, store: null });
      await expect(controller.start()).rejects.toBeInstanceOf(ConfigurationError);
    });

    test('a key column without a control or configuration is rejected', async () => {
      const page = new FakeTablePage({ pages: [keys(2)], columns: ['Amount'] });
      const controller = await ready(page, orderRows(['K0']));
      controller.configure({ keyColumn: 'code' });

      await expect(controller.start()).rejects.toThrow('Key column code is not mapped to a page control');
    });
  });

  describe('positional filling', () => {
    test('writes every row to the row at the same position', async () => {
      const page = new FakeTablePage({ pages: [keys(3)], columns: ['Amount', 'Note'] });
      const states: string[] = [];
      const progress = vi.fn();
      const controller = await ready(page, orderRows(['a', 'b', 'c']), { progressSink: progress });
      controller.on('state', (status) => states.push(status));

      const report = await controller.start();

      expect(report).toMatchObject({ status: 'completed', successCount: 3, errorCount: 0, skippedCount: 0 });
      expect(page.rowsWritten()).toEqual([0, 1, 2]);
      expect(page.valueAt(0, 2, 'Amount')).toBe('300');
      expect(page.valueAt(0, 2, 'Note')).toBe('n2');
      expect(states).toEqual(['running', 'completed']);
      expect(progress).toHaveBeenLastCalledWith(3, 3, 1);
    });

    test('paused at 5 of 10 and resumed, only rows 5..9 are written afterwards', async () => {
      const page = new FakeTablePage({ pages: [keys(10)], columns: ['Amount', 'Note'] });
      const controller = await ready(page, orderRows(keys(10, 'S')));
      let writtenAtPause: number[] = [];
      let indexAtPause = -1;

      controller.on('row', (task) => {
        if (task.sourceIndex === 4) controller.pause();
      });
      controller.on('paused', (state) => {
        indexAtPause = state.currentIndex;
        writtenAtPause = page.rowsWritten();
        controller.resume();
      });

      const report = await controller.start();

      expect(indexAtPause).toBe(5);
      expect(writtenAtPause).toEqual([0, 1, 2, 3, 4]);
      expect(page.rowsWritten().slice(5)).toEqual([5, 6, 7, 8, 9]);
      expect(page.writes).toHaveLength(20);
      expect(report).toMatchObject({ status: 'completed', successCount: 10, currentIndex: 10 });
    });

    test('manual pagination waits for the page to be turned', async () => {
      const page = new FakeTablePage({ pages: [keys(3), keys(3)], columns: ['Amount'] });
      const controller = await ready(page, orderRows(keys(5, 'S')));
      controller.on('paused', (state) => {
        expect(state.pageTurnPending).toBe(true);
        page.page = 1;
        controller.resume();
      });

      const report = await controller.start();

      expect(page.rowsWritten(0)).toEqual([0, 1, 2]);
      expect(page.rowsWritten(1)).toEqual([0, 1]);
      expect(page.valueAt(1, 0, 'Amount')).toBe('400');
      expect(report).toMatchObject({ status: 'completed', successCount: 5, currentPage: 2 });
    });

    test('automatic pagination clicks through and stops at the last page', async () => {
      const page = new FakeTablePage({ pages: [keys(3), keys(3)], columns: ['Amount'] });
      const controller = await ready(page, orderRows(keys(7, 'S')));
      controller.configure({ paginationMode: 'auto', nextPageSelector: NEXT_BUTTON });

      const report = await controller.start();

      expect(page.clicks).toEqual([NEXT_BUTTON]);
      expect(page.rowsWritten(0)).toEqual([0, 1, 2]);
      expect(page.rowsWritten(1)).toEqual([0, 1, 2]);
      expect(report).toMatchObject({ status: 'completed', successCount: 6, currentPage: 2, currentIndex: 6 });
      expect(controller.pagination.lastOutcome).toBe('disabled');
    });

    test('a row with nothing written ends the batch and moves to the next page', async () => {
      const page = new FakeTablePage({ pages: [keys(2), keys(3)], columns: ['Amount'] });
      // The grid reports a footer row that takes no input.
      vi.spyOn(page, 'countRows').mockResolvedValue(3);
      const logSink = vi.fn();
      const controller = await ready(page, orderRows(keys(4, 'S')), { logSink });
      controller.configure({ paginationMode: 'auto', nextPageSelector: NEXT_BUTTON });

      const report = await controller.start();

      expect(logSink).toHaveBeenCalledWith(
        'Row 3: nothing could be written on page row 3, treating the page as full',
        'warning',
      );
      expect(page.clicks).toEqual([NEXT_BUTTON]);
      expect(page.rowsWritten(0)).toEqual([0, 1]);
      expect(page.rowsWritten(1)).toEqual([0, 1]);
      expect(page.valueAt(1, 0, 'Amount')).toBe('300');
      expect(page.valueAt(1, 1, 'Amount')).toBe('400');
      expect(report).toMatchObject({ status: 'completed', successCount: 4, errorCount: 0, currentPage: 2 });
    });

    test('resume called before the worker reaches the pause keeps it running', async () => {
      const page = new FakeTablePage({ pages: [keys(3)], columns: ['Amount'] });
      const controller = await ready(page, orderRows(keys(3, 'S')));
      const paused = vi.fn();
      controller.on('paused', paused);

      const run = controller.start();
      controller.pause();
      controller.resume();
      const report = await run;

      expect(paused).not.toHaveBeenCalled();
      expect(report).toMatchObject({ status: 'completed', successCount: 3 });
      expect(page.rowsWritten()).toEqual([0, 1, 2]);
    });

    test('abort stops after the row in flight', async () => {
      const page = new FakeTablePage({ pages: [keys(5)], columns: ['Amount'] });
      const controller = await ready(page, orderRows(keys(5, 'S')));
      controller.on('row', (task) => {
        if (task.sourceIndex === 1) controller.abort();
      });

      const report = await controller.start();

      expect(report).toMatchObject({ status: 'aborted', successCount: 2 });
      expect(page.rowsWritten()).toEqual([0, 1]);
      expect(controller.state?.isAborted).toBe(true);
    });

    test('a closed browser ends the session with an error', async () => {
      const page = new FakeTablePage({ pages: [keys(3)], columns: ['Amount'] });
      vi.spyOn(page, 'writeValue').mockRejectedValue(new Error('Target closed'));
      const controller = await ready(page, orderRows(keys(3, 'S')));
      const onError = vi.fn();
      controller.on('error', onError);

      const report = await controller.start();

      expect(report.status).toBe('error');
      expect(report.error).toBe('Target closed');
      expect(onError).toHaveBeenCalledTimes(1);
      expect(controller.state?.status).toBe('error');
    });

    test('resumes a persisted session below the rows already written', async () => {
      const dir = mkdtempSync(join(tmpdir(), 'gridfill-session-'));
      try {
        const earlier = new FillProgressStore({ dir });
        const { sessionId } = earlier.begin({ sourceId: 'orders.csv', totalRows: 10 });
        for (let row = 0; row < 3; row++) {
          earlier.record({
            sourceRow: row,
            page: 1,
            destRow: row,
            fieldValues: {},
            status: 'success',
            error: null,
            anchorValue: null,
          });
        }
        earlier.transition('paused', { cursor: 3 });
        await earlier.flush();
        const saved = earlier.load(sessionId);
        if (!saved) throw new Error('expected saved progress');

        const page = new FakeTablePage({ pages: [keys(10)], columns: ['Amount'] });
        const store = new FillProgressStore({ dir });
        const controller = await ready(page, orderRows(keys(10, 'S')), { store, sourceId: 'orders.csv' });

        const report = await controller.start({ resume: saved });
        await store.flush();

        expect(page.rowsWritten()).toEqual([3, 4, 5, 6, 7, 8, 9]);
        expect(report).toMatchObject({ status: 'completed', sessionId, successCount: 10 });
        expect(store.load(sessionId)?.records).toHaveLength(10);
        expect(store.load(sessionId)?.summary.status).toBe('completed');
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  describe('key-column filling', () => {
    let page: FakeTablePage;

    beforeEach(() => {
      page = new FakeTablePage({ pages: [['A3', 'A1', 'A2']], columns: ['Amount', 'Note'] });
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    test('writes each row next to its key and records keys that are not on the page', async () => {
      const controller = await ready(page, orderRows(['A1', 'A2', 'A9', 'A3']));
      controller.configure({ keyColumn: 'code', anchor: keyColumn(), paginationMode: 'auto' });

      const report = await controller.start();

      expect(page.rowsWritten()).toEqual([1, 2, 0]);
      expect(page.valueAt(0, 1, 'Amount')).toBe('100');
      expect(page.valueAt(0, 0, 'Amount')).toBe('400');
      expect(report).toMatchObject({ status: 'completed', successCount: 3, skippedCount: 1 });
    });

    test('single-record mode pauses after every row', async () => {
      const controller = await ready(page, orderRows(['A2', 'A3', 'A1']));
      controller.configure({ keyColumn: 'code', anchor: keyColumn(), fillMode: 'single' });
      const paused = new Promise<void>((resolve) => {
        controller.on('paused', () => resolve());
      });

      const run = controller.start();
      await paused;

      expect(controller.state?.isPaused).toBe(true);
      expect(controller.state?.currentIndex).toBe(1);
      expect(page.rowsWritten()).toEqual([2]);

      controller.abort();
      const report = await run;
      expect(report.status).toBe('aborted');
    });

    test('the key configuration is frozen for the session', async () => {
      const controller = await ready(page, orderRows(['A1']));
      const anchor = keyColumn();
      controller.configure({ keyColumn: 'code', anchor });

      await controller.start();

      expect(anchor.isFrozen).toBe(true);
    });

    test('rows on a later page are found after an automatic page turn', async () => {
      const paged = new FakeTablePage({ pages: [['A1', 'A2'], ['B1', 'B2']], columns: ['Amount'] });
      const controller = await ready(paged, orderRows(['A1', 'B2', 'B1', 'A2']));
      controller.configure({
        keyColumn: 'code',
        anchor: keyColumn(),
        paginationMode: 'auto',
        nextPageSelector: NEXT_BUTTON,
      });

      const report = await controller.start();

      expect(paged.rowsWritten(0)).toEqual([0, 1]);
      expect(paged.rowsWritten(1)).toEqual([1, 0]);
      expect(paged.valueAt(1, 1, 'Amount')).toBe('200');
      expect(report).toMatchObject({ status: 'completed', successCount: 4, skippedCount: 0, currentPage: 2 });
    });

    test('manual page turns re-resolve the remaining keys', async () => {
      const paged = new FakeTablePage({ pages: [['A1'], ['B1']], columns: ['Amount'] });
      const controller = await ready(paged, orderRows(['B1', 'A1']));
      controller.configure({ keyColumn: 'code', anchor: keyColumn() });
      controller.on('paused', () => {
        paged.page = 1;
        controller.resume();
      });

      const report = await controller.start();

      expect(paged.valueAt(0, 0, 'Amount')).toBe('200');
      expect(paged.valueAt(1, 0, 'Amount')).toBe('100');
      expect(report).toMatchObject({ status: 'completed', successCount: 2, skippedCount: 0 });
    });

    test('resuming on a later page writes the rows of that page not yet done', async () => {
      const dir = mkdtempSync(join(tmpdir(), 'gridfill-session-'));
      try {
        const earlier = new FillProgressStore({ dir });
        const { sessionId } = earlier.begin({ sourceId: 'orders.csv', totalRows: 3, anchorColumn: 'code' });
        earlier.record({
          sourceRow: 0,
          page: 1,
          destRow: 0,
          fieldValues: { amount: '100' },
          status: 'success',
          error: null,
          anchorValue: 'A1',
        });
        // The page turn is saved with the cursor at the end of the first page's queue.
        earlier.pageTurned(2, 3);
        earlier.record({
          sourceRow: 1,
          page: 2,
          destRow: 0,
          fieldValues: { amount: '200' },
          status: 'success',
          error: null,
          anchorValue: 'B1',
        });
        await earlier.flush();
        const saved = earlier.load(sessionId);
        if (!saved) throw new Error('expected saved progress');
        expect(saved.summary).toMatchObject({ cursor: 3, currentPage: 2 });
        expect(saved.records).toHaveLength(2);

        const paged = new FakeTablePage({ pages: [['A1'], ['B1', 'B2']], columns: ['Amount'] });
        paged.page = 1;
        const store = new FillProgressStore({ dir });
        const controller = await ready(paged, orderRows(['A1', 'B1', 'B2']), { store, sourceId: 'orders.csv' });
        controller.configure({
          keyColumn: 'code',
          anchor: keyColumn(),
          paginationMode: 'auto',
          nextPageSelector: NEXT_BUTTON,
        });

        const report = await controller.start({ resume: saved });
        await store.flush();

        expect(paged.rowsWritten(1)).toEqual([1]);
        expect(paged.valueAt(1, 1, 'Amount')).toBe('300');
        expect(paged.rowsWritten(0)).toEqual([]);
        expect(report).toMatchObject({ status: 'completed', successCount: 3, skippedCount: 0 });
        expect(store.load(sessionId)?.records.map((r) => r.sourceRow)).toEqual([0, 1, 2]);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    test('restores the skipped count of a saved session', async () => {
      const dir = mkdtempSync(join(tmpdir(), 'gridfill-session-'));
      try {
        const earlier = new FillProgressStore({ dir });
        const { sessionId } = earlier.begin({ sourceId: 'orders.csv', totalRows: 3 });
        earlier.record({
          sourceRow: 0,
          page: 1,
          destRow: 0,
          fieldValues: {},
          status: 'skipped',
          error: 'row has no values to write',
          anchorValue: null,
        });
        earlier.transition('paused', { cursor: 1 });
        await earlier.flush();
        const saved = earlier.load(sessionId);
        if (!saved) throw new Error('expected saved progress');

        const plain = new FakeTablePage({ pages: [keys(3)], columns: ['Amount'] });
        const store = new FillProgressStore({ dir });
        const controller = await ready(plain, orderRows(keys(3, 'S')), { store, sourceId: 'orders.csv' });

        const report = await controller.start({ resume: saved });
        await store.flush();

        expect(plain.rowsWritten()).toEqual([1, 2]);
        expect(report).toMatchObject({ status: 'completed', successCount: 2, skippedCount: 1 });
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
