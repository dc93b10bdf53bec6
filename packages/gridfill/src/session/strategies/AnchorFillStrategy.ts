/**
 * AnchorFillStrategy: each source row is written to whichever page row
 * carries its key. The key map is resolved per page; rows already
 * processed on an earlier page are never written again.
 *
 * Single-record mode stops after every task; batch mode drains the page
 * and then waits for (or performs) the page turn.
 */

import { FillStrategy, type StepOutcome } from './FillStrategy';
import type { FillQueue } from '../../engine/FillQueue';
import type { AnchorConfig } from '../../engine/AnchorConfig';
import { ConfigurationError } from '../../errors';

export class AnchorFillStrategy extends FillStrategy {
  readonly name = 'anchor';

  async execute(): Promise<StepOutcome> {
    const queue = this.ctx.state.queue ?? (await this.resolve());
    return this.drain(queue);
  }

  async continueFill(): Promise<StepOutcome> {
    const { state } = this.ctx;

    if (state.pageTurnPending) {
      state.pageTurnPending = false;
      state.currentPage++;
      await this.ctx.pageChanged();
      return this.afterPageTurn();
    }
    return this.drain(state.queue ?? (await this.resolve()));
  }

  // ── Internals ──────────────────────────────────────────────────────

  private get anchor(): AnchorConfig {
    const { anchor } = this.ctx.settings;
    if (!anchor) throw new ConfigurationError('Key-column strategy started without a key column');
    return anchor;
  }

  private async resolve(): Promise<FillQueue> {
    const { resolver, rows, settings } = this.ctx;
    const queue = this.adopt(await resolver.resolve(rows, this.anchor, settings.keyFingerprint));
    this.reportSkipped(queue);
    return queue;
  }

  /** Re-bind unprocessed rows to the page that was just reached and start over at its top. */
  private async afterPageTurn(): Promise<StepOutcome> {
    const { state, resolver, settings } = this.ctx;
    const queue = state.queue ?? (await this.resolve());

    const summary = await resolver.reresolve(queue, this.anchor, state.processedRows, settings.keyFingerprint);
    state.currentIndex = 0;
    if (summary.resolved === 0) {
      this.ctx.log(`Page ${state.currentPage}: none of the remaining keys are on this page`, 'warning');
      return 'completed';
    }
    this.ctx.log(`Page ${state.currentPage}: ${summary.resolved} rows located`, 'info');
    return this.drain(queue);
  }

  private async drain(queue: FillQueue): Promise<StepOutcome> {
    const { state, settings } = this.ctx;

    for (;;) {
      queue.seek(state.currentIndex);

      while (!queue.done) {
        const gate = this.ctx.checkpoint();
        if (gate !== 'continue') return gate;

        const task = queue.current();
        if (!task || task.status !== 'pending' || task.destIndex === null || state.processedRows.has(task.sourceIndex)) {
          queue.advance();
          state.currentIndex = queue.position;
          continue;
        }

        const row = task.destIndex;
        const result = await this.attempt(task, { row, offset: row });
        this.settle(task, result);
        queue.advance();
        state.currentIndex = queue.position;

        if (settings.fillMode === 'single' && queue.hasPending()) {
          return 'paused';
        }
      }

      const remaining = queue.all().filter((t) => !state.processedRows.has(t.sourceIndex)).length;
      if (remaining === 0) return 'completed';

      if (settings.paginationMode === 'manual') {
        state.pageTurnPending = true;
        this.ctx.log(`Page ${state.currentPage} done, ${remaining} rows not on it; turn the page and continue`, 'info');
        return 'paused';
      }

      const turned = await this.ctx.turnPage();
      if (!turned) {
        this.ctx.log(`No further page; ${remaining} rows were never located`, 'warning');
        return 'completed';
      }

      const summary = await this.ctx.resolver.reresolve(
        queue,
        this.anchor,
        state.processedRows,
        settings.keyFingerprint,
      );
      state.currentIndex = 0;
      if (summary.resolved === 0) {
        this.ctx.log(`Page ${state.currentPage}: none of the remaining keys are on this page`, 'warning');
        return 'completed';
      }
    }
  }

  private reportSkipped(queue: FillQueue): void {
    for (const task of queue.all()) {
      if (task.status === 'skipped') {
        this.ctx.log(`Row ${task.sourceIndex + 1} not on this page: ${task.message ?? 'no reason given'}`, 'warning');
      }
    }
  }
}
