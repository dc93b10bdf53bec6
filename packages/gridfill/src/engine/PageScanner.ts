/**
 * PageScanner: produces the fingerprint set for a page and every nested
 * frame, tolerating asynchronous rendering.
 *
 * The top document is polled until its control count holds steady; nested
 * frames are walked with an explicit stack, depth-bounded, each frame
 * getting a polling budget by whether its address looks business-relevant.
 * When the deep scan fails outright, a flat tag-query scan is used instead.
 */

import type { DomProbe } from '../adapters/types';
import type { FrameDescriptor, RawElement } from './types';
import type { ScannerConfig } from '../config/defaults';
import { DEFAULT_SCANNER_CONFIG } from '../config/defaults';
import { ElementFingerprint } from './ElementFingerprint';
import { FrameUnreachableError, ScanTimeoutError, errorMessage, isFatalBrowserError } from '../errors';
import { getLogger } from '../monitoring/logger';
import { sleep } from '../lib/timing';

export type ScanMode = 'deep' | 'fallback';

export interface ScanReport {
  fingerprints: ElementFingerprint[];
  mode: ScanMode;
  framesScanned: number;
  framesSkipped: number;
  elapsedMs: number;
}

interface FrameScan {
  path: number[];
  elements: RawElement[];
}

function formatPath(path: readonly number[]): string {
  return path.length === 0 ? '(top)' : path.map((i) => `iframe[${i}]`).join('->');
}

export class PageScanner {
  private logger = getLogger({ service: 'PageScanner' });
  private config: ScannerConfig;

  constructor(
    private probe: DomProbe,
    config: Partial<ScannerConfig> = {},
  ) {
    this.config = { ...DEFAULT_SCANNER_CONFIG, ...config };
  }

  async scan(): Promise<ElementFingerprint[]> {
    const report = await this.scanWithReport();
    return report.fingerprints;
  }

  async scanWithReport(): Promise<ScanReport> {
    const start = Date.now();
    try {
      return await this.deepScan(start);
    } catch (err) {
      if (isFatalBrowserError(err)) throw err;
      this.logger.warn('Deep scan failed, using fallback scan', { error: errorMessage(err) });
    }

    const raws = await this.probe.fallbackSnapshot();
    const fingerprints = raws.map((raw, i) => ElementFingerprint.fromRaw(raw, i));
    this.logger.info('Fallback scan complete', { controls: fingerprints.length });
    return {
      fingerprints,
      mode: 'fallback',
      framesScanned: 0,
      framesSkipped: 0,
      elapsedMs: Date.now() - start,
    };
  }

  // ── Deep scan ──────────────────────────────────────────────────────

  private async deepScan(start: number): Promise<ScanReport> {
    const top = await this.waitForStableTop();
    const scans: FrameScan[] = [{ path: [], elements: top }];
    let framesScanned = 0;
    let framesSkipped = 0;

    const stack: number[][] = [[]];
    while (stack.length > 0) {
      const parent = stack.pop() ?? [];

      let frames: FrameDescriptor[];
      try {
        frames = await this.probe.listFrames(parent);
      } catch (err) {
        if (isFatalBrowserError(err)) throw err;
        const unreachable = new FrameUnreachableError(formatPath(parent), errorMessage(err));
        this.logger.debug('Skipping frame subtree', { error: unreachable.message });
        framesSkipped++;
        continue;
      }

      const children: number[][] = [];
      for (const frame of frames) {
        const path = [...parent, frame.index];
        if (path.length > this.config.maxFrameDepth) {
          this.logger.debug('Frame beyond max depth', { frame: formatPath(path) });
          framesSkipped++;
          continue;
        }
        if (frame.width < this.config.minFrameSize || frame.height < this.config.minFrameSize) {
          framesSkipped++;
          continue;
        }

        try {
          const elements = await this.pollFrame(path, this.isBusinessFrame(frame.src));
          scans.push({ path, elements });
          children.push(path);
          framesScanned++;
        } catch (err) {
          if (isFatalBrowserError(err)) throw err;
          const unreachable = new FrameUnreachableError(formatPath(path), errorMessage(err));
          this.logger.debug('Skipping frame subtree', { error: unreachable.message });
          framesSkipped++;
        }
      }
      // Reverse so the first child frame is walked first.
      stack.push(...children.reverse());
    }

    const fingerprints: ElementFingerprint[] = [];
    for (const { path, elements } of scans) {
      for (const raw of elements) {
        fingerprints.push(ElementFingerprint.fromRaw(raw, fingerprints.length, path));
      }
    }

    this.logger.info('Deep scan complete', {
      controls: fingerprints.length,
      framesScanned,
      framesSkipped,
    });

    return { fingerprints, mode: 'deep', framesScanned, framesSkipped, elapsedMs: Date.now() - start };
  }

  /**
   * Poll the top document until the control count is non-zero and unchanged
   * for `stableThreshold` consecutive polls, or the max wait runs out. The
   * highest-count snapshot seen is returned either way; a wait that never
   * produced a control throws ScanTimeoutError.
   */
  private async waitForStableTop(): Promise<RawElement[]> {
    const { maxWaitMs, pollIntervalMs, stableThreshold, loadingGraceMs } = this.config;
    const start = Date.now();
    let deadline = start + maxWaitMs;
    let graceLeft = loadingGraceMs;

    let best: RawElement[] = [];
    let lastCount = -1;
    let unchanged = 0;

    for (;;) {
      const result = await this.probe.snapshot([]);

      if (result.status === 'loading') {
        const extension = Math.min(graceLeft, pollIntervalMs);
        deadline += extension;
        graceLeft -= extension;
        this.logger.debug('Loading overlay visible, waiting', { graceLeftMs: graceLeft });
      } else {
        const count = result.elements.length;
        if (count >= best.length) best = result.elements;

        if (count === lastCount) {
          unchanged++;
        } else {
          unchanged = 0;
          lastCount = count;
        }

        if (count > 0 && unchanged >= stableThreshold) {
          this.logger.debug('Control count stable', { count, polls: unchanged + 1 });
          return best;
        }
      }

      if (Date.now() >= deadline) break;
      await sleep(pollIntervalMs);
    }

    if (best.length === 0) throw new ScanTimeoutError(Date.now() - start);
    this.logger.warn('Max wait reached before control count settled', { count: best.length });
    return best;
  }

  /**
   * Poll a nested frame within its budget. A generic frame takes the first
   * non-empty snapshot and gives up on a loading one; a business frame waits
   * out loading and needs the same non-zero count twice in a row. When the
   * budget runs out the largest snapshot seen is kept.
   */
  private async pollFrame(path: number[], business: boolean): Promise<RawElement[]> {
    const polls = business ? this.config.businessFramePolls : this.config.genericFramePolls;
    const interval = business ? this.config.businessFramePollMs : this.config.genericFramePollMs;

    let best: RawElement[] = [];
    let lastCount = -1;

    for (let attempt = 1; attempt <= polls; attempt++) {
      const result = await this.probe.snapshot(path);

      if (result.status === 'loading') {
        if (!business) break;
      } else {
        const count = result.elements.length;
        if (count > 0) {
          if (!business) return result.elements;
          if (count >= best.length) best = result.elements;
          if (count === lastCount) {
            this.logger.debug('Business frame stable', { frame: formatPath(path), count });
            return result.elements;
          }
          lastCount = count;
        }
      }

      if (attempt < polls) await sleep(interval);
    }
    return best;
  }

  private isBusinessFrame(src: string): boolean {
    const lower = src.toLowerCase();
    return this.config.businessFrameKeywords.some((kw) => lower.includes(kw.toLowerCase()));
  }
}
