/**
 * FillSessionController: one fill session at a time, from scan to the
 * last row.
 *
 *   idle ──start──▶ running ──▶ paused ──resume──▶ running
 *                      │
 *                      └──▶ completed | aborted | error
 *
 * The worker started by `start()` runs the chosen strategy; when the
 * strategy yields `paused` the same worker waits on the pause gate and
 * then calls `continueFill`. Abort cancels the token and opens the gate,
 * so a waiting worker wakes up and exits.
 */

import EventEmitter from 'eventemitter3';
import type { BrowserHandle } from '../adapters/types';
import type { SourceRow } from '../engine/types';
import type { FillTask } from '../engine/FillQueue';
import type { FieldMapping, RowFillResult } from '../engine/FillEngine';
import type { EngineConfig } from '../config/defaults';
import type { ElementFingerprint } from '../engine/ElementFingerprint';
import type { FieldMatch, MatchResult } from '../engine/FieldMatcher';
import type { FillProgress } from '../engine/ProgressStore';
import type { LogSink, ProgressSink, SinkLevel } from './sinks';
import type { Checkpoint, FillMode, PaginationMode, StepOutcome, StrategyContext } from './strategies/FillStrategy';
import { FillStrategy } from './strategies/FillStrategy';
import { NormalFillStrategy } from './strategies/NormalFillStrategy';
import { AnchorFillStrategy } from './strategies/AnchorFillStrategy';
import { FillSessionState, type SessionError } from './FillSessionState';
import { CancellationToken, PauseGate } from './control';
import { loadEngineConfig } from '../config/defaults';
import { PageScanner } from '../engine/PageScanner';
import { FieldMatcher } from '../engine/FieldMatcher';
import { AnchorResolver } from '../engine/AnchorResolver';
import { AnchorConfig } from '../engine/AnchorConfig';
import { FillEngine } from '../engine/FillEngine';
import { PaginationController } from '../engine/PaginationController';
import { FillProgressStore, countRecords } from '../engine/ProgressStore';
import { generalizeRowSelector } from '../engine/rowSelectors';
import { ConfigurationError } from '../errors';
import { getLogger, type Logger } from '../monitoring/logger';

// ── Types ─────────────────────────────────────────────────────────────

export interface FillSessionOptions {
  handle: BrowserHandle;
  rows: readonly SourceRow[];
  /** Identifies the data source in persisted progress, e.g. the file name. */
  sourceId?: string;
  config?: EngineConfig;
  /** Progress persistence; `null` turns it off. Defaults to a store in the configured directory. */
  store?: FillProgressStore | null;
  logSink?: LogSink;
  progressSink?: ProgressSink;
}

export interface SessionSettings {
  fillMode: FillMode;
  paginationMode: PaginationMode;
  nextPageSelector: string | null;
  /** Source field whose value locates the destination row; null for positional filling. */
  keyColumn: string | null;
  /** Explicit key-column configuration; derived from the key column's mapping when absent. */
  anchor: AnchorConfig | null;
}

export interface StartOptions {
  /** Pick up a persisted session: cursor, page and already-processed rows. */
  resume?: FillProgress;
}

export interface SessionReport {
  status: 'completed' | 'aborted' | 'error';
  sessionId: string | null;
  successCount: number;
  errorCount: number;
  skippedCount: number;
  healedCount: number;
  currentIndex: number;
  currentPage: number;
  errors: SessionError[];
  error?: string;
}

export type SessionEvents = {
  state: [status: FillSessionState['status']];
  row: [task: FillTask, result: RowFillResult | null];
  paused: [state: FillSessionState];
  resumed: [state: FillSessionState];
  completed: [report: SessionReport];
  aborted: [report: SessionReport];
  error: [error: Error];
};

const DEFAULT_SETTINGS: SessionSettings = {
  fillMode: 'batch',
  paginationMode: 'manual',
  nextPageSelector: null,
  keyColumn: null,
  anchor: null,
};

// ── Controller ────────────────────────────────────────────────────────

export class FillSessionController {
  private logger: Logger;
  private emitter = new EventEmitter<SessionEvents>();
  private readonly config: EngineConfig;
  private readonly handle: BrowserHandle;
  private readonly rows: readonly SourceRow[];
  private readonly sourceId: string;
  private readonly store: FillProgressStore | null;
  private readonly logSink?: LogSink;
  private readonly progressSink?: ProgressSink;

  private readonly scanner: PageScanner;
  private readonly matcher: FieldMatcher;
  private readonly resolver: AnchorResolver;
  private readonly engine: FillEngine;
  readonly pagination: PaginationController;

  private settings: SessionSettings = { ...DEFAULT_SETTINGS };
  private _fingerprints: ElementFingerprint[] = [];
  private mappings = new Map<string, ElementFingerprint>();

  private _state: FillSessionState | null = null;
  private strategy: FillStrategy | null = null;
  private token = new CancellationToken();
  private gate = new PauseGate();

  constructor(opts: FillSessionOptions) {
    this.config = opts.config ?? loadEngineConfig();
    this.handle = opts.handle;
    this.rows = opts.rows;
    this.sourceId = opts.sourceId ?? 'rows';
    this.store = opts.store === undefined ? new FillProgressStore(this.config.persistence) : opts.store;
    this.logSink = opts.logSink;
    this.progressSink = opts.progressSink;
    this.logger = getLogger({ service: 'FillSessionController' }).child({ sourceId: this.sourceId });

    this.scanner = new PageScanner(this.handle, this.config.scanner);
    this.matcher = new FieldMatcher(this.config.matcher);
    this.resolver = new AnchorResolver(this.handle);
    this.engine = new FillEngine(this.handle, this.config.filler);
    this.pagination = new PaginationController(this.handle, null, this.config.pagination);
  }

  // ── Events ─────────────────────────────────────────────────────────

  on<E extends keyof SessionEvents>(
    event: E,
    listener: EventEmitter.EventListener<SessionEvents, E>,
  ): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<E extends keyof SessionEvents>(
    event: E,
    listener: EventEmitter.EventListener<SessionEvents, E>,
  ): this {
    this.emitter.off(event, listener);
    return this;
  }

  // ── Discovery and mapping ──────────────────────────────────────────

  get fingerprints(): readonly ElementFingerprint[] {
    return this._fingerprints;
  }

  get state(): FillSessionState | null {
    return this._state;
  }

  get fieldNames(): string[] {
    const names: string[] = [];
    for (const row of this.rows) {
      for (const key of Object.keys(row.values)) {
        if (!names.includes(key)) names.push(key);
      }
    }
    return names;
  }

  async scan(): Promise<ElementFingerprint[]> {
    this._fingerprints = await this.scanner.scan();
    this.mappings.clear();
    this.emitLog(`Found ${this._fingerprints.length} input controls`, 'success');
    return this._fingerprints;
  }

  /** Match the source fields against the scanned controls; high-confidence matches are applied. */
  match(fields: string[] = this.fieldNames): MatchResult {
    const result = this.matcher.match(fields, this._fingerprints);
    this.applyMatches(result.suggestions);
    this.emitLog(
      `Matched ${result.matches.length} of ${fields.length} fields, ${result.suggestions.length} applied automatically`,
      'info',
    );
    return result;
  }

  applyMatches(matches: readonly FieldMatch[]): void {
    for (const m of matches) this.setMapping(m.field, m.fingerprint, m.score);
  }

  setMapping(field: string, fingerprint: ElementFingerprint | null, score = 100): void {
    const previous = this.mappings.get(field);
    if (previous) previous.mapping = null;

    if (fingerprint) {
      fingerprint.mapping = { field, score };
      this.mappings.set(field, fingerprint);
    } else {
      this.mappings.delete(field);
    }
  }

  getMappings(): ReadonlyMap<string, ElementFingerprint> {
    return this.mappings;
  }

  configure(settings: Partial<SessionSettings>): void {
    if (this._state && !this._state.isFinished && this._state.status !== 'idle') {
      throw new ConfigurationError('Cannot reconfigure while a session is active');
    }
    this.settings = { ...this.settings, ...settings };
    this.pagination.setNextSelector(this.settings.nextPageSelector);
  }

  async highlight(fingerprint: ElementFingerprint): Promise<boolean> {
    const inFrame = fingerprint.framePath.length > 0;
    try {
      if (inFrame) await this.handle.enterFrame(fingerprint.framePath);
      return await this.handle.highlight(fingerprint.bestSelector());
    } finally {
      if (inFrame) await this.handle.exitFrame();
    }
  }

  // ── Lifecycle ──────────────────────────────────────────────────────

  /**
   * Start a session and run it to the end. The returned promise settles
   * when the session completes, is aborted or fails; while paused it stays
   * pending. Throws ConfigurationError, before anything runs, when there
   * is nothing to fill or no usable mapping.
   */
  async start(opts: StartOptions = {}): Promise<SessionReport> {
    if (this._state && (this._state.isRunning || this._state.isPaused)) {
      throw new ConfigurationError('A session is already active on this controller');
    }

    const anchor = this.prepareAnchor();
    const state = new FillSessionState(this.rows.length);
    if (opts.resume) this.restore(state, opts.resume, anchor !== null);

    this._state = state;
    this.token = new CancellationToken();
    this.gate = new PauseGate();
    this.pagination.setPage(state.currentPage);

    const context = this.context(state, anchor);
    this.strategy = anchor ? new AnchorFillStrategy(context) : new NormalFillStrategy(context);

    this.store?.begin({
      sourceId: this.sourceId,
      totalRows: this.rows.length,
      anchorColumn: this.settings.keyColumn,
      resume: opts.resume,
    });
    this.setStatus('running');
    this.emitLog(
      `Filling ${this.rows.length} rows (${this.strategy.name} strategy, ${this.settings.fillMode} mode)`,
      'info',
    );

    return this.run(this.strategy, Boolean(opts.resume));
  }

  /** Ask the worker to stop after the row in flight. */
  pause(): void {
    if (!this._state?.isRunning) return;
    this.gate.close();
  }

  /** Let the worker go on; also cancels a pause it has not reached yet. */
  resume(): void {
    if (!this._state || this._state.isFinished) return;
    this.gate.open();
  }

  abort(): void {
    if (!this._state || this._state.isFinished) return;
    this.token.cancel();
    this.gate.open();
  }

  // ── Worker ─────────────────────────────────────────────────────────

  private async run(strategy: FillStrategy, resumed: boolean): Promise<SessionReport> {
    const state = this.requireState();
    try {
      let outcome: StepOutcome = resumed ? await strategy.continueFill() : await strategy.execute();

      while (outcome === 'paused') {
        this.gate.close();
        this.setStatus('paused', { cursor: state.currentIndex, currentPage: state.currentPage });
        this.emitLog(`Paused at row ${state.currentIndex + 1}`, 'info');
        this.emitter.emit('paused', state);

        await this.gate.wait();
        if (this.token.isCancelled) {
          outcome = 'aborted';
          break;
        }

        this.setStatus('running', { cursor: state.currentIndex, currentPage: state.currentPage });
        this.emitter.emit('resumed', state);
        outcome = await strategy.continueFill();
      }

      return this.finish(outcome === 'aborted' ? 'aborted' : 'completed');
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error('Fill session failed', { error: error.message, currentIndex: state.currentIndex });
      this.emitLog(`Fill stopped: ${error.message}`, 'error');
      const report = this.finish('error', error.message);
      this.emitter.emit('error', error);
      return report;
    }
  }

  private finish(status: SessionReport['status'], error?: string): SessionReport {
    const state = this.requireState();

    if (status === 'completed') this.recordNeverLocated(state);
    this.setStatus(status, { cursor: state.currentIndex, currentPage: state.currentPage });

    const report: SessionReport = {
      status,
      sessionId: this.store?.current?.sessionId ?? null,
      successCount: state.successCount,
      errorCount: state.errorCount,
      skippedCount: state.skippedCount,
      healedCount: state.healedCount,
      currentIndex: state.currentIndex,
      currentPage: state.currentPage,
      errors: [...state.errors],
      ...(error !== undefined ? { error } : {}),
    };

    if (status === 'completed') {
      this.emitLog(
        `Done: ${report.successCount} filled, ${report.errorCount} failed, ${report.skippedCount} skipped`,
        'success',
      );
      this.emitter.emit('completed', report);
    } else if (status === 'aborted') {
      this.emitLog(`Stopped by request after ${report.successCount + report.errorCount} rows`, 'warning');
      this.emitter.emit('aborted', report);
    }
    return report;
  }

  // ── Strategy context ───────────────────────────────────────────────

  private context(state: FillSessionState, anchor: AnchorConfig | null): StrategyContext {
    const keyColumn = this.settings.keyColumn;
    const excluded = new Set(anchor ? anchor.enabledPairs().map((p) => p.field) : []);

    return {
      state,
      rows: this.rows,
      settings: {
        fillMode: this.settings.fillMode,
        paginationMode: this.settings.paginationMode,
        anchor,
        keyFingerprint: keyColumn ? this.mappings.get(keyColumn) ?? null : null,
      },
      engine: this.engine,
      resolver: this.resolver,
      probe: this.handle,
      mapping: (): FieldMapping => [...this.mappings].filter(([field]) => !excluded.has(field)),
      checkpoint: (): Checkpoint => {
        if (this.token.isCancelled) return 'aborted';
        if (this.gate.isClosed) return 'paused';
        return 'continue';
      },
      log: (message, level = 'info') => this.emitLog(message, level),
      taskSettled: (task, result) => this.taskSettled(state, task, result),
      turnPage: async () => {
        const turned = await this.pagination.turnPage();
        if (!turned) return false;
        state.currentPage = this.pagination.page;
        await this.pageChanged(state);
        return true;
      },
      pageChanged: () => this.pageChanged(state),
    };
  }

  private taskSettled(state: FillSessionState, task: FillTask, result: RowFillResult | null): void {
    if (task.status === 'success') {
      state.successCount++;
      state.healedCount += result?.healed ?? 0;
    } else if (task.status === 'error') {
      state.errorCount++;
      state.errors.push({
        sourceIndex: task.sourceIndex,
        message: task.message ?? 'row failed',
        code: task.errorCode ?? 'unknown',
      });
    } else if (task.status === 'skipped') {
      state.skippedCount++;
    }

    this.store?.record({
      sourceRow: task.sourceIndex,
      page: state.currentPage,
      destRow: task.destIndex,
      fieldValues: { ...task.values },
      status: task.status === 'success' ? 'success' : task.status === 'error' ? 'failed' : 'skipped',
      error: task.message ?? null,
      anchorValue: task.anchorValue,
    });

    const label = `Row ${task.sourceIndex + 1}`;
    if (task.status === 'success') {
      this.emitLog(task.message ? `${label}: filled (${task.message})` : `${label}: filled`, 'success');
    } else if (task.status === 'error') {
      this.emitLog(`${label}: failed, ${task.message ?? 'unknown error'}`, 'error');
    } else {
      this.emitLog(`${label}: skipped, ${task.message ?? 'no reason given'}`, 'warning');
    }

    this.emitter.emit('row', task, result);
    this.progressSink?.(state.processedRows.size, this.rows.length, state.currentPage);
  }

  /** After a page turn: wait for the page, re-scan, and re-bind every mapping by display name. */
  private async pageChanged(state: FillSessionState): Promise<void> {
    this.pagination.setPage(state.currentPage);
    this.store?.pageTurned(state.currentPage, state.currentIndex);
    await this.pagination.waitForReady();

    if (this.mappings.size === 0) return;
    const fresh = await this.scanner.scan();
    let rebound = 0;
    for (const [field, old] of [...this.mappings]) {
      const replacement = fresh.find(
        (fp) => fp.displayName === old.displayName && fp.framePathLabel === old.framePathLabel,
      );
      if (replacement) {
        this.setMapping(field, replacement, old.mapping?.score);
        rebound++;
      }
    }
    this._fingerprints = fresh;
    this.emitLog(`Page ${state.currentPage}: re-bound ${rebound} of ${this.mappings.size} fields`, 'info');
  }

  // ── Helpers ────────────────────────────────────────────────────────

  /** Validate everything a session needs; returns the frozen key-column config, or null for positional filling. */
  private prepareAnchor(): AnchorConfig | null {
    if (this.rows.length === 0) throw new ConfigurationError('No source rows to fill');
    if (this.mappings.size === 0) throw new ConfigurationError('No field is mapped to a page control');

    const { keyColumn } = this.settings;
    if (!keyColumn) return null;

    const keyFingerprint = this.mappings.get(keyColumn) ?? null;
    if (!this.settings.anchor && !keyFingerprint) {
      throw new ConfigurationError(`Key column ${keyColumn} is not mapped to a page control`);
    }
    const anchor =
      this.settings.anchor ?? (keyFingerprint ? AnchorConfig.forKeyColumn(keyColumn, keyFingerprint) : new AnchorConfig());

    const problems = anchor.validate(this.fieldNames);
    if (problems.length > 0) throw new ConfigurationError(problems.join('; '), { problems });

    const primary = anchor.primary();
    if (!primary || (!generalizeRowSelector(primary.selector) && !keyFingerprint?.isGroup)) {
      throw new ConfigurationError(`Key column ${keyColumn} has no selector that addresses every row`);
    }

    const keyFields = new Set(anchor.enabledPairs().map((p) => p.field));
    const writable = [...this.mappings.keys()].filter((f) => !keyFields.has(f));
    if (writable.length === 0) throw new ConfigurationError('Only key columns are mapped; nothing to write');

    anchor.freeze();
    return anchor;
  }

  private restore(state: FillSessionState, progress: FillProgress, keyed: boolean): void {
    // The key map is re-resolved for the current page, so a keyed session
    // walks that page from its first task; processed rows are passed over.
    state.currentIndex = keyed ? 0 : progress.summary.cursor;
    state.currentPage = progress.summary.currentPage;
    for (const record of progress.records) {
      if (record.status !== 'skipped') state.processedRows.add(record.sourceRow);
      // Positional filling continues below the last row written on the current page.
      if (record.page === state.currentPage && record.destRow !== null) {
        state.pageRow = Math.max(state.pageRow, record.destRow + 1);
      }
    }
    const counts = countRecords(progress.records);
    state.successCount = counts.filledCount;
    state.errorCount = counts.failedCount;
    state.skippedCount = counts.skippedCount;
    this.emitLog(
      `Resuming at row ${state.currentIndex + 1}, page ${state.currentPage} (${state.processedRows.size} rows already done)`,
      'info',
    );
  }

  /** Tasks the key column never located get a durable skipped record. */
  private recordNeverLocated(state: FillSessionState): void {
    if (!state.queue) return;
    for (const task of state.queue.all()) {
      if (task.status === 'skipped' && !state.processedRows.has(task.sourceIndex)) {
        state.processedRows.add(task.sourceIndex);
        this.taskSettled(state, task, null);
      }
    }
  }

  private setStatus(
    status: FillSessionState['status'],
    position: { cursor?: number; currentPage?: number } = {},
  ): void {
    const state = this.requireState();
    state.status = status;
    this.store?.transition(status, position);
    this.logger.info('Session status', { status, ...position });
    this.emitter.emit('state', status);
  }

  private emitLog(message: string, level: SinkLevel): void {
    switch (level) {
      case 'error':
        this.logger.error(message);
        break;
      case 'warning':
        this.logger.warn(message);
        break;
      default:
        this.logger.info(message, level === 'success' ? { outcome: 'success' } : undefined);
    }
    this.logSink?.(message, level);
  }

  private requireState(): FillSessionState {
    if (!this._state) throw new ConfigurationError('No session has been started');
    return this._state;
  }
}

