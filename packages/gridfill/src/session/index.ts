export { FillSessionController } from './FillSessionController';
export type { FillSessionOptions, SessionEvents, SessionReport, SessionSettings, StartOptions } from './FillSessionController';
export { FillSessionState } from './FillSessionState';
export type { SessionError } from './FillSessionState';
export { CancellationToken, PauseGate } from './control';
export type { LogSink, ProgressSink, SinkLevel } from './sinks';
export { FillStrategy } from './strategies/FillStrategy';
export type { Checkpoint, FillMode, PaginationMode, StepOutcome, StrategyContext, StrategySettings } from './strategies/FillStrategy';
export { NormalFillStrategy } from './strategies/NormalFillStrategy';
export { AnchorFillStrategy } from './strategies/AnchorFillStrategy';
