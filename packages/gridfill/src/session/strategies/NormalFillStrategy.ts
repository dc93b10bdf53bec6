/**
 * NormalFillStrategy: source rows go to destination rows in order, one
 * page-load at a time. A batch is as large as the page's current row
 * capacity; in single-record mode every row is its own batch.
 */

import { FillStrategy, type StepOutcome } from './FillStrategy';
import type { FillQueue } from '../../engine/FillQueue';

export class NormalFillStrategy extends FillStrategy {
  readonly name = 'normal';

  async execute(): Promise<StepOutcome> {
    const { state, resolver, rows } = this.ctx;
    return this.run(state.queue ?? this.adopt(resolver.sequential(rows)));
  }

  async continueFill(): Promise<StepOutcome> {
    const { state } = this.ctx;
    if (state.pageTurnPending) {
      state.pageTurnPending = false;
      state.currentPage++;
      state.pageRow = 0;
      await this.ctx.pageChanged();
    }
    return this.run(state.queue ?? this.adopt(this.ctx.resolver.sequential(this.ctx.rows)));
  }

  private async run(queue: FillQueue): Promise<StepOutcome> {
    const { state, settings } = this.ctx;
    queue.seek(state.currentIndex);

    while (!queue.done) {
      const capacity = await this.pageCapacity(queue);
      const room = capacity - state.pageRow;

      if (room > 0) {
        const batch = queue.takeNext(room);
        if (batch.length === 0) break;

        for (const task of batch) {
          const gate = this.ctx.checkpoint();
          if (gate !== 'continue') return gate;

          queue.seek(queue.indexOf(task));
          state.currentIndex = queue.position;

          if (state.processedRows.has(task.sourceIndex)) {
            queue.advance();
            state.currentIndex = queue.position;
            continue;
          }

          const row = state.pageRow;
          const target = settings.fillMode === 'single' ? {} : { row, offset: row };
          task.destIndex = row;
          const result = await this.attempt(task, target);

          if (settings.fillMode === 'batch' && result.status === 'failed') {
            // Nothing landed: read as the end of the destination table. The row stays queued.
            this.ctx.log(
              `Row ${task.sourceIndex + 1}: nothing could be written on page row ${row + 1}, treating the page as full`,
              'warning',
            );
            break;
          }

          this.settle(task, result);
          queue.advance();
          state.currentIndex = queue.position;
          state.pageRow++;
        }
      }

      if (!queue.hasPending()) break;

      const next = await this.nextPage();
      if (next !== 'turned') return next;
    }

    return 'completed';
  }

  /** Rows the current page can take: one in single-record mode, else the group size or table row count. */
  private async pageCapacity(queue: FillQueue): Promise<number> {
    if (this.ctx.settings.fillMode === 'single') return 1;

    const groupSize = Math.max(0, ...this.ctx.mapping().map(([, fp]) => (fp.isGroup ? fp.groupSize : 0)));
    if (groupSize > 0) return groupSize;

    const rows = await this.ctx.probe.countRows();
    return rows > 0 ? rows : queue.length - queue.position;
  }

  private async nextPage(): Promise<'turned' | StepOutcome> {
    const { state, settings } = this.ctx;

    if (settings.paginationMode === 'auto') {
      const turned = await this.ctx.turnPage();
      if (!turned) {
        this.ctx.log('No further page; remaining rows left unfilled', 'warning');
        return 'completed';
      }
      state.pageRow = 0;
      return 'turned';
    }

    state.pageTurnPending = true;
    this.ctx.log(`Page ${state.currentPage} done; turn the page and continue`, 'info');
    return 'paused';
  }
}
