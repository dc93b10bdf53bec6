/**
 * AnchorResolver: turns source rows into an ordered FillQueue.
 *
 * Without a key column the correspondence is positional. With one, the
 * key column's cells are read off the page into a value → row table and
 * every source row is looked up by its trimmed key; a miss becomes a
 * skipped task carrying the reason.
 */

import type { DomProbe } from '../adapters/types';
import type { SourceRow } from './types';
import type { AnchorConfig, AnchorPair } from './AnchorConfig';
import type { ElementFingerprint } from './ElementFingerprint';
import { FillQueue, createTask, markSkipped, retarget, type FillTask } from './FillQueue';
import { generalizeRowSelector, pinRowSelector } from './rowSelectors';
import { ConfigurationError } from '../errors';
import { valuesMatch } from '../lib/values';
import { getLogger } from '../monitoring/logger';

export type KeyTable = Map<string, number>;

export interface ReresolveSummary {
  resolved: number;
  skipped: number;
}

export class AnchorResolver {
  private logger = getLogger({ service: 'AnchorResolver' });

  constructor(private probe: DomProbe) {}

  /** One task per row, destination = 0-based position. */
  sequential(rows: readonly SourceRow[]): FillQueue {
    return new FillQueue(rows.map((row, position) => createTask(row.index, row.values, position)));
  }

  async resolve(
    rows: readonly SourceRow[],
    anchor: AnchorConfig,
    keyFingerprint: ElementFingerprint | null = null,
  ): Promise<FillQueue> {
    const primary = this.requirePrimary(anchor);
    const table = await this.scanKeyTable(primary, keyFingerprint);

    const tasks = rows.map((row) => createTask(row.index, row.values, null, keyOf(row.values, primary)));
    for (const task of tasks) {
      await this.bind(task, primary, table, anchor.auxiliary());
    }

    const queue = new FillQueue(tasks);
    const counts = queue.counts();
    this.logger.info('Key column resolved', {
      field: primary.field,
      pageKeys: table.size,
      resolved: counts.pending,
      skipped: counts.skipped,
    });
    return queue;
  }

  /**
   * Re-bind the tasks of an existing queue against the current page, after
   * a page turn. Rows already processed are left untouched so they are
   * never written twice.
   */
  async reresolve(
    queue: FillQueue,
    anchor: AnchorConfig,
    processed: ReadonlySet<number>,
    keyFingerprint: ElementFingerprint | null = null,
  ): Promise<ReresolveSummary> {
    const primary = this.requirePrimary(anchor);
    const table = await this.scanKeyTable(primary, keyFingerprint);

    const summary: ReresolveSummary = { resolved: 0, skipped: 0 };
    for (const task of queue.all()) {
      if (processed.has(task.sourceIndex)) continue;
      await this.bind(task, primary, table, anchor.auxiliary());
      if (task.status === 'pending') summary.resolved++;
      else summary.skipped++;
    }
    queue.seek(0);

    this.logger.info('Key column re-resolved', { field: primary.field, ...summary });
    return summary;
  }

  /**
   * Read the key column of every row on the page. The first row holding a
   * value wins; later duplicates are reported and ignored.
   */
  async scanKeyTable(pair: AnchorPair, keyFingerprint: ElementFingerprint | null = null): Promise<KeyTable> {
    const cells = await this.readKeyCells(pair, keyFingerprint);

    const table: KeyTable = new Map();
    const duplicates: string[] = [];
    cells.forEach((cell, row) => {
      const key = cell.trim();
      if (!key) return;
      if (table.has(key)) {
        duplicates.push(key);
        return;
      }
      table.set(key, row);
    });

    if (duplicates.length > 0) {
      this.logger.warn('Duplicate key values on page, first row kept', { duplicates });
    }
    return table;
  }

  // ── Internals ──────────────────────────────────────────────────────

  private requirePrimary(anchor: AnchorConfig): AnchorPair {
    const primary = anchor.primary();
    if (!primary) throw new ConfigurationError('No enabled key column configured');
    return primary;
  }

  private async readKeyCells(pair: AnchorPair, keyFingerprint: ElementFingerprint | null): Promise<string[]> {
    const generalized = generalizeRowSelector(pair.selector);
    if (generalized) return this.probe.readCells(generalized);

    if (keyFingerprint?.isGroup) {
      const cells: string[] = [];
      for (let offset = 0; offset < keyFingerprint.groupSize; offset++) {
        const selector = keyFingerprint.groupSelector(offset);
        const values = selector ? await this.probe.readCells(selector) : [];
        cells.push(values[0] ?? '');
      }
      return cells;
    }

    throw new ConfigurationError(`Key column selector has no row component: ${pair.selector}`, {
      field: pair.field,
    });
  }

  private async bind(task: FillTask, primary: AnchorPair, table: KeyTable, auxiliary: AnchorPair[]): Promise<void> {
    const key = task.anchorValue ?? '';
    if (!key) {
      markSkipped(task, `${primary.field} is empty`, 'anchor_value_not_found');
      return;
    }

    const row = table.get(key);
    if (row === undefined) {
      markSkipped(task, `${key} not found`, 'anchor_value_not_found');
      return;
    }

    const mismatch = await this.verifyAuxiliary(task, row, auxiliary);
    if (mismatch) {
      markSkipped(task, mismatch, 'anchor_value_not_found');
      return;
    }
    retarget(task, row);
  }

  /** First auxiliary column whose page cell disagrees with the source row, as a reason. */
  private async verifyAuxiliary(task: FillTask, row: number, auxiliary: AnchorPair[]): Promise<string | null> {
    for (const pair of auxiliary) {
      const expected = task.values[pair.field];
      if (expected === undefined) continue;

      const cells = await this.probe.readCells(pinRowSelector(pair.selector, row));
      const actual = cells[0] ?? '';
      if (!valuesMatch(expected, actual)) {
        return `${pair.field} mismatch on row ${row + 1}: expected ${expected.trim()}, found ${actual.trim()}`;
      }
    }
    return null;
  }
}

function keyOf(values: Readonly<Record<string, string>>, pair: AnchorPair): string {
  return (values[pair.field] ?? '').trim();
}
