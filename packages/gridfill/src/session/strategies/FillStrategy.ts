import type { FillSessionState } from '../FillSessionState';
import type { SourceRow } from '../../engine/types';
import type { FillQueue, FillTask } from '../../engine/FillQueue';
import type { FieldMapping, FieldTarget, RowFillResult } from '../../engine/FillEngine';
import type { FillEngine } from '../../engine/FillEngine';
import type { AnchorResolver } from '../../engine/AnchorResolver';
import type { AnchorConfig } from '../../engine/AnchorConfig';
import type { ElementFingerprint } from '../../engine/ElementFingerprint';
import type { DomProbe } from '../../adapters/types';
import type { SinkLevel } from '../sinks';
import { markError, markSkipped, markSuccess } from '../../engine/FillQueue';

export type FillMode = 'single' | 'batch';
export type PaginationMode = 'manual' | 'auto';

/** How a strategy call ended. */
export type StepOutcome = 'paused' | 'completed' | 'aborted';

export type Checkpoint = 'continue' | 'paused' | 'aborted';

export interface StrategySettings {
  fillMode: FillMode;
  paginationMode: PaginationMode;
  anchor: AnchorConfig | null;
  keyFingerprint: ElementFingerprint | null;
}

/** What the controller lends the active strategy for the session's lifetime. */
export interface StrategyContext {
  readonly state: FillSessionState;
  readonly rows: readonly SourceRow[];
  readonly settings: StrategySettings;
  readonly engine: FillEngine;
  readonly resolver: AnchorResolver;
  readonly probe: DomProbe;

  /** Fields to write and their controls; changes when the page is re-bound. */
  mapping(): FieldMapping;
  /** Checked once per unit of work. */
  checkpoint(): Checkpoint;
  log(message: string, level?: SinkLevel): void;
  /** Bookkeeping for a finished task: counters, persistence, sinks. */
  taskSettled(task: FillTask, result: RowFillResult | null): void;
  /** Turn the page automatically; false when there is no next page. */
  turnPage(): Promise<boolean>;
  /** Re-establish the page after it was turned (by hand or automatically). */
  pageChanged(): Promise<void>;
}

/**
 * Shared contract of the two fill strategies. `execute` starts a session's
 * work, `continueFill` picks it up again after a pause, from the cursor in
 * the session state.
 */
export abstract class FillStrategy {
  abstract readonly name: 'normal' | 'anchor';

  constructor(protected readonly ctx: StrategyContext) {}

  abstract execute(): Promise<StepOutcome>;

  abstract continueFill(): Promise<StepOutcome>;

  protected get healing(): boolean {
    return this.ctx.settings.fillMode === 'single';
  }

  /**
   * Take ownership of a fresh queue. Rows processed before a restart are
   * marked done so they are neither written nor waited for again.
   */
  protected adopt(queue: FillQueue): FillQueue {
    for (const task of queue.all()) {
      if (this.ctx.state.processedRows.has(task.sourceIndex) && task.status === 'pending') {
        markSuccess(task, 'restored from saved progress');
      }
    }
    this.ctx.state.queue = queue;
    return queue;
  }

  protected attempt(task: FillTask, target: FieldTarget): Promise<RowFillResult> {
    return this.ctx.engine.fillRow(this.ctx.mapping(), task.values, { ...target, healing: this.healing });
  }

  /** Apply a row result to its task and report it. */
  protected settle(task: FillTask, result: RowFillResult): void {
    const { state } = this.ctx;

    switch (result.status) {
      case 'success':
        markSuccess(task);
        break;
      case 'partial': {
        const failed = result.fields.filter((f) => f.attempted && !f.ok).map((f) => f.field);
        markSuccess(task, `partial: ${failed.join(', ')} not written`);
        break;
      }
      case 'failed': {
        const first = result.fields.find((f) => f.attempted && !f.ok);
        markError(task, first?.error ?? 'no field could be written', first?.code ?? 'element_not_found');
        break;
      }
      case 'empty':
        markSkipped(task, 'row has no values to write', 'element_not_found');
        break;
    }

    state.processedRows.add(task.sourceIndex);
    this.ctx.taskSettled(task, result);
  }
}
