export * from './types';
export { ElementFingerprint } from './ElementFingerprint';
export type { FingerprintMapping } from './ElementFingerprint';
export { generalizeRowSelector, hasRowStep, pinRowSelector } from './rowSelectors';
export { PageScanner } from './PageScanner';
export type { ScanMode, ScanReport } from './PageScanner';
export { FieldMatcher, dedupeFingerprints, normalizeText, scoreFingerprint, scoreText, splitWords } from './FieldMatcher';
export type { FieldMatch, MatchResult } from './FieldMatcher';
export { FillQueue, createTask, markError, markSkipped, markSuccess, retarget } from './FillQueue';
export type { FillTask } from './FillQueue';
export { AnchorConfig } from './AnchorConfig';
export type { AnchorPair } from './AnchorConfig';
export { AnchorResolver } from './AnchorResolver';
export type { KeyTable, ReresolveSummary } from './AnchorResolver';
export { FillEngine } from './FillEngine';
export type {
  FieldFillResult,
  FieldMapping,
  FieldTarget,
  FillVia,
  RowFillResult,
  RowFillStatus,
} from './FillEngine';
export { PaginationController, contentFingerprint, disabledSignals, hasPageChanged } from './PaginationController';
export type { PageChangeListener, PageTurnOutcome } from './PaginationController';
export {
  FillProgressStore,
  countRecords,
  FillRecordSchema,
  ProgressSummarySchema,
  RecordStatusSchema,
  SessionStatusSchema,
} from './ProgressStore';
export type {
  BeginOptions,
  FillProgress,
  FillRecord,
  FillRecordInput,
  ProgressSummary,
  ProgressView,
  RecordStatus,
  SessionStatus,
} from './ProgressStore';
