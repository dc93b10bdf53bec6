/** Operator-facing log levels. */
export type SinkLevel = 'info' | 'success' | 'warning' | 'error';

export type LogSink = (message: string, level: SinkLevel) => void;

export type ProgressSink = (current: number, total: number, page: number) => void;
