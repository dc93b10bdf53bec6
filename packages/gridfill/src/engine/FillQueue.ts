import type { TaskStatus } from './types';
import type { FillErrorCode } from '../errors';

/** One source row bound to a destination row, or to nothing when skipped. */
export interface FillTask {
  readonly sourceIndex: number;
  /** 0-based destination row on the current page; null when the row was skipped. */
  destIndex: number | null;
  readonly values: Readonly<Record<string, string>>;
  anchorValue: string | null;
  status: TaskStatus;
  message?: string;
  errorCode?: FillErrorCode;
}

export function createTask(
  sourceIndex: number,
  values: Record<string, string>,
  destIndex: number | null,
  anchorValue: string | null = null,
): FillTask {
  return { sourceIndex, destIndex, values: { ...values }, anchorValue, status: 'pending' };
}

export function markSuccess(task: FillTask, message?: string): void {
  task.status = 'success';
  task.message = message;
  task.errorCode = undefined;
}

export function markError(task: FillTask, message: string, code: FillErrorCode): void {
  task.status = 'error';
  task.message = message;
  task.errorCode = code;
}

export function markSkipped(task: FillTask, reason: string, code: FillErrorCode): void {
  task.status = 'skipped';
  task.destIndex = null;
  task.message = reason;
  task.errorCode = code;
}

/** Back to pending against a new destination row. */
export function retarget(task: FillTask, destIndex: number): void {
  task.status = 'pending';
  task.destIndex = destIndex;
  task.message = undefined;
  task.errorCode = undefined;
}

/** Ordered tasks plus a cursor. */
export class FillQueue {
  private cursor = 0;

  constructor(private readonly tasks: FillTask[]) {}

  get length(): number {
    return this.tasks.length;
  }

  get position(): number {
    return this.cursor;
  }

  /** Move the cursor to an absolute index, clamped to [0, length]. */
  seek(index: number): void {
    this.cursor = Math.max(0, Math.min(index, this.tasks.length));
  }

  advance(count = 1): void {
    this.seek(this.cursor + count);
  }

  get done(): boolean {
    return this.cursor >= this.tasks.length;
  }

  current(): FillTask | null {
    return this.tasks[this.cursor] ?? null;
  }

  /** Position of a task in the queue, -1 when it is not part of it. */
  indexOf(task: FillTask): number {
    return this.tasks.indexOf(task);
  }

  at(index: number): FillTask | null {
    return this.tasks[index] ?? null;
  }

  /** Up to `n` pending tasks at or after the cursor, without moving it. */
  takeNext(n: number): FillTask[] {
    const taken: FillTask[] = [];
    for (let i = this.cursor; i < this.tasks.length && taken.length < n; i++) {
      const task = this.tasks[i];
      if (task.status === 'pending') taken.push(task);
    }
    return taken;
  }

  hasPending(): boolean {
    return this.takeNext(1).length > 0;
  }

  all(): readonly FillTask[] {
    return this.tasks;
  }

  counts(): Record<TaskStatus, number> {
    const counts: Record<TaskStatus, number> = { pending: 0, success: 0, error: 0, skipped: 0 };
    for (const task of this.tasks) counts[task.status]++;
    return counts;
  }
}
