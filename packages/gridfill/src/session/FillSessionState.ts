import type { FillQueue } from '../engine/FillQueue';
import type { FillErrorCode } from '../errors';
import type { SessionStatus } from '../engine/ProgressStore';

export interface SessionError {
  sourceIndex: number;
  message: string;
  code: FillErrorCode;
}

/**
 * Everything one session knows about its progress. Owned by the
 * controller and handed by reference to the active strategy.
 */
export class FillSessionState {
  status: SessionStatus = 'idle';

  /** Source position of the next task to process. */
  currentIndex = 0;
  currentPage = 1;
  /** Destination row on the current page the next sequential task goes to. */
  pageRow = 0;
  /** Set while waiting for the page to be turned by hand. */
  pageTurnPending = false;

  successCount = 0;
  errorCount = 0;
  skippedCount = 0;
  healedCount = 0;
  readonly errors: SessionError[] = [];

  /** Source rows already written (or attempted); never written again. */
  readonly processedRows = new Set<number>();

  /** Task queue of the active strategy, kept so a resume picks up the same tasks. */
  queue: FillQueue | null = null;

  constructor(readonly totalRows: number) {}

  get isRunning(): boolean {
    return this.status === 'running';
  }

  get isPaused(): boolean {
    return this.status === 'paused';
  }

  get isAborted(): boolean {
    return this.status === 'aborted';
  }

  get isFinished(): boolean {
    return this.status === 'completed' || this.status === 'aborted' || this.status === 'error';
  }
}
