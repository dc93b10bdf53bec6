/**
 * PaginationController: advances to the next page and proves it happened.
 *
 * The next-page control is checked for every disabled signal before any
 * click. A click only counts once a fresh PageState snapshot differs from
 * the one taken before it; after the retry budget with no difference the
 * answer is "no more pages", which is a normal outcome.
 */

import EventEmitter from 'eventemitter3';
import type { DomProbe, DomWriter } from '../adapters/types';
import type { ControlState, PageSignature, PageStateSnapshot, PaginationCandidate } from './types';
import type { PaginationConfig } from '../config/defaults';
import { DEFAULT_PAGINATION_CONFIG } from '../config/defaults';
import { NavigationStalledError, errorMessage, isFatalBrowserError } from '../errors';
import { pollUntil, sleep } from '../lib/timing';
import { getLogger } from '../monitoring/logger';

export type PageTurnOutcome = 'turned' | 'disabled' | 'missing' | 'stalled' | 'unconfigured';

type PaginationEvents = {
  pageChange: [page: number, before: PageStateSnapshot, after: PageStateSnapshot];
};

export type PageChangeListener = (page: number, before: PageStateSnapshot, after: PageStateSnapshot) => void;

type PaginationHandle = DomProbe & Pick<DomWriter, 'click'>;

const DISABLED_CLASS_TOKENS = new Set([
  'disabled',
  'ant-pagination-disabled',
  'el-button--disabled',
  'btn-disabled',
  'is-disabled',
  'pagination-disabled',
]);

/** Names of the disabled signals present on a control; empty when it looks clickable. */
export function disabledSignals(state: ControlState): string[] {
  const signals: string[] = [];
  if (state.disabledAttr !== null && state.disabledAttr !== 'false') signals.push('disabled-attribute');
  if (state.ariaDisabled === 'true') signals.push('aria-disabled');
  if (state.classTokens.some((token) => DISABLED_CLASS_TOKENS.has(token))) signals.push('disabled-class');
  if (state.pointerEvents === 'none') signals.push('pointer-events');
  if (state.opacity < 0.5) signals.push('opacity');
  return signals;
}

/**
 * Content fingerprint of a page: the visible pagination indicator, else
 * the first row's text, else the first input's value, else a timestamp
 * (which always reads as changed).
 */
export function contentFingerprint(signature: PageSignature, now: number = Date.now()): string {
  if (signature.indicator) return `page:${signature.indicator}`;
  if (signature.firstRowText) return `row:${signature.firstRowText}`;
  if (signature.firstInputValue) return `input:${signature.firstInputValue}`;
  return `time:${signature.url}:${now}`;
}

export function hasPageChanged(before: PageStateSnapshot, after: PageStateSnapshot): boolean {
  return before.url !== after.url || before.contentFingerprint !== after.contentFingerprint;
}

export class PaginationController {
  private logger = getLogger({ service: 'PaginationController' });
  private emitter = new EventEmitter<PaginationEvents>();
  private config: PaginationConfig;
  private currentPage = 1;
  private _lastOutcome: PageTurnOutcome | null = null;

  constructor(
    private handle: PaginationHandle,
    private nextSelector: string | null = null,
    config: Partial<PaginationConfig> = {},
  ) {
    this.config = { ...DEFAULT_PAGINATION_CONFIG, ...config };
  }

  get page(): number {
    return this.currentPage;
  }

  get lastOutcome(): PageTurnOutcome | null {
    return this._lastOutcome;
  }

  get selector(): string | null {
    return this.nextSelector;
  }

  setNextSelector(selector: string | null): void {
    this.nextSelector = selector;
  }

  /** Align the counter with a page reached some other way, e.g. on resume. */
  setPage(page: number): void {
    this.currentPage = Math.max(1, page);
  }

  reset(): void {
    this.currentPage = 1;
    this._lastOutcome = null;
  }

  onPageChange(listener: PageChangeListener): () => void {
    this.emitter.on('pageChange', listener);
    return () => {
      this.emitter.off('pageChange', listener);
    };
  }

  async captureState(): Promise<PageStateSnapshot> {
    const signature = await this.handle.pageSignature();
    const timestamp = Date.now();
    return {
      page: this.currentPage,
      url: signature.url,
      contentFingerprint: contentFingerprint(signature, timestamp),
      controlCount: signature.controlCount,
      timestamp,
    };
  }

  async isNextDisabled(): Promise<boolean> {
    if (!this.nextSelector) return true;
    const state = await this.handle.inspectControl(this.nextSelector);
    return !state.exists || disabledSignals(state).length > 0;
  }

  /**
   * Click the next-page control until the page content changes.
   * Returns false, without throwing, when there is no next page.
   */
  async turnPage(): Promise<boolean> {
    const selector = this.nextSelector;
    if (!selector) {
      this._lastOutcome = 'unconfigured';
      return false;
    }

    for (let attempt = 1; attempt <= this.config.maxRetries; attempt++) {
      const control = await this.handle.inspectControl(selector);
      if (!control.exists) {
        this.logger.info('Next-page control not found', { selector });
        this._lastOutcome = 'missing';
        return false;
      }
      const signals = disabledSignals(control);
      if (signals.length > 0) {
        this.logger.info('Next-page control disabled, last page reached', { signals });
        this._lastOutcome = 'disabled';
        return false;
      }

      const before = await this.captureState();
      try {
        await this.handle.click(selector);
      } catch (err) {
        if (isFatalBrowserError(err)) throw err;
        this.logger.warn('Next-page click failed', { attempt, error: errorMessage(err) });
        continue;
      }
      await sleep(this.config.clickSettleMs);

      let after = before;
      const changed = await pollUntil(
        async () => {
          after = await this.captureState();
          return hasPageChanged(before, after);
        },
        { timeoutMs: this.config.changeTimeoutMs, intervalMs: this.config.changePollMs },
      );

      if (changed) {
        this.currentPage++;
        this._lastOutcome = 'turned';
        this.logger.info('Page turned', { page: this.currentPage, attempt });
        this.emitter.emit('pageChange', this.currentPage, before, { ...after, page: this.currentPage });
        return true;
      }
      this.logger.debug('Page content unchanged after click', { attempt });
    }

    const stalled = new NavigationStalledError(this.config.maxRetries);
    this.logger.info('No more pages', { reason: stalled.message });
    this._lastOutcome = 'stalled';
    return false;
  }

  /** Wait for loading overlays to clear; false when still loading at the deadline. */
  async waitForReady(timeoutMs: number = this.config.readyTimeoutMs): Promise<boolean> {
    const ready = await pollUntil(async () => !(await this.handle.isLoading()), {
      timeoutMs,
      intervalMs: this.config.readyPollMs,
    });
    if (!ready) this.logger.warn('Page still loading after ready wait', { timeoutMs });
    return ready;
  }

  /** Likely next-page controls on the current page, one per distinct label. */
  async detectCandidates(limit = 10): Promise<PaginationCandidate[]> {
    const found = await this.handle.findPaginationCandidates();
    const seen = new Set<string>();
    const candidates: PaginationCandidate[] = [];
    for (const candidate of found) {
      const key = candidate.text.trim() || candidate.selector;
      if (seen.has(key)) continue;
      seen.add(key);
      candidates.push(candidate);
      if (candidates.length >= limit) break;
    }
    return candidates;
  }
}
