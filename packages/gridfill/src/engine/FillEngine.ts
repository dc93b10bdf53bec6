/**
 * FillEngine: writes one value into one control, escalating through
 *
 *   1. rich write on the primary selector (full focus/input/change/blur sequence)
 *   2. plain clear+type on each alternative selector, short timeout each
 *   3. self-healing: relocation by label-text proximity, capped, single-record mode only
 *
 * Frame context is entered before the first attempt and always left
 * afterwards. Failures come back as results; only a dead browser throws.
 */

import type { DomProbe, DomWriter } from '../adapters/types';
import type { ElementFingerprint } from './ElementFingerprint';
import type { FillerConfig } from '../config/defaults';
import { DEFAULT_FILLER_CONFIG } from '../config/defaults';
import { classifyError, errorMessage, isFatalBrowserError, type FillErrorCode } from '../errors';
import { prepareValue } from '../lib/values';
import { sleep } from '../lib/timing';
import { getLogger } from '../monitoring/logger';

// ── Types ─────────────────────────────────────────────────────────────

export type FillVia = 'rich' | 'fallback' | 'healed';

export interface FieldTarget {
  /** Destination table row (0-based) for controls inside a repeated table. */
  row?: number;
  /** Position within a group control; selects the repeated sub-control. */
  offset?: number;
  /** Allow the text-proximity relocation as a last resort. */
  healing?: boolean;
}

export interface FieldFillResult {
  field: string;
  ok: boolean;
  /** False when there was nothing to write, or no sub-control at the offset. */
  attempted: boolean;
  via: FillVia | null;
  selector: string | null;
  error?: string;
  code?: FillErrorCode;
}

export type RowFillStatus = 'success' | 'partial' | 'failed' | 'empty';

export interface RowFillResult {
  status: RowFillStatus;
  filled: number;
  attempted: number;
  healed: number;
  fields: FieldFillResult[];
}

export type FieldMapping = readonly (readonly [field: string, fingerprint: ElementFingerprint])[];

type EngineHandle = DomWriter & Pick<DomProbe, 'locateByText'>;

interface Plan {
  primary: string;
  alternatives: string[];
}

// ── FillEngine ───────────────────────────────────────────────────────

export class FillEngine {
  private logger = getLogger({ service: 'FillEngine' });
  private config: FillerConfig;

  constructor(
    private handle: EngineHandle,
    config: Partial<FillerConfig> = {},
  ) {
    this.config = { ...DEFAULT_FILLER_CONFIG, ...config };
  }

  async fillField(
    field: string,
    fingerprint: ElementFingerprint,
    rawValue: string,
    target: FieldTarget = {},
  ): Promise<FieldFillResult> {
    const value = prepareValue(rawValue);
    if (!value) {
      return { field, ok: false, attempted: false, via: null, selector: null };
    }

    const plan = this.plan(fingerprint, target);
    if (!plan) {
      return { field, ok: false, attempted: false, via: null, selector: null };
    }

    const inFrame = fingerprint.framePath.length > 0;
    let lastError: unknown = null;
    try {
      if (inFrame) await this.handle.enterFrame(fingerprint.framePath);

      // 1. Rich write
      try {
        const result = await this.handle.writeValue(plan.primary, value, fingerprint.controlKind);
        if (result.ok) return await this.succeeded(field, 'rich', plan.primary);
        lastError = result.reason ?? 'rich write rejected';
      } catch (err) {
        if (isFatalBrowserError(err)) throw err;
        lastError = err;
      }

      // 2. Alternative selectors, plain clear+type
      for (const selector of plan.alternatives) {
        try {
          await this.handle.typeInto(selector, value, this.config.elementTimeoutMs);
          return await this.succeeded(field, 'fallback', selector);
        } catch (err) {
          if (isFatalBrowserError(err)) throw err;
          lastError = err;
        }
      }

      // 3. Self-healing
      if (target.healing) {
        const healed = await this.heal(fingerprint, value);
        if (healed) return await this.succeeded(field, 'healed', healed);
      }
    } catch (err) {
      if (isFatalBrowserError(err)) throw err;
      lastError = err;
    } finally {
      if (inFrame) await this.handle.exitFrame();
    }

    const error = lastError === null ? 'no selector located the control' : errorMessage(lastError);
    const code: FillErrorCode = lastError === null ? 'element_not_found' : classifyError(lastError);
    this.logger.debug('Field write failed', { field, control: fingerprint.displayName, error, code });
    return {
      field,
      ok: false,
      attempted: true,
      via: null,
      selector: plan.primary,
      error,
      code: code === 'unknown' ? 'element_not_found' : code,
    };
  }

  /** Write every mapped field of one row. Fields without a value are not attempted. */
  async fillRow(
    mapping: FieldMapping,
    values: Readonly<Record<string, string>>,
    target: FieldTarget = {},
  ): Promise<RowFillResult> {
    const fields: FieldFillResult[] = [];
    for (const [field, fingerprint] of mapping) {
      const raw = values[field];
      if (raw === undefined) continue;
      fields.push(await this.fillField(field, fingerprint, raw, target));
    }

    const attempted = fields.filter((f) => f.attempted).length;
    const filled = fields.filter((f) => f.ok).length;
    const healed = fields.filter((f) => f.via === 'healed').length;

    let status: RowFillStatus;
    if (attempted === 0) status = 'empty';
    else if (filled === 0) status = 'failed';
    else if (filled < attempted) status = 'partial';
    else status = 'success';

    return { status, filled, attempted, healed, fields };
  }

  // ── Internals ──────────────────────────────────────────────────────

  /**
   * Which selector to write first and which to fall back on. Group
   * controls go straight to the sub-control at the offset; table controls
   * on a row other than the scanned one only have their row-pinned
   * selector, since the recorded alternatives point at the scanned row.
   */
  private plan(fingerprint: ElementFingerprint, target: FieldTarget): Plan | null {
    if (target.offset !== undefined && fingerprint.isGroup) {
      const selector = fingerprint.groupSelector(target.offset);
      return selector ? { primary: selector, alternatives: [selector] } : null;
    }

    if (target.row !== undefined && fingerprint.table) {
      const pinned = fingerprint.selectorForRow(target.row);
      if (target.row !== fingerprint.table.rowIndex) {
        return { primary: pinned, alternatives: [pinned] };
      }
      return { primary: pinned, alternatives: dedupe([pinned, ...fingerprint.selectorChain()]) };
    }

    const chain = fingerprint.selectorChain();
    return { primary: fingerprint.bestSelector(), alternatives: chain };
  }

  private async heal(fingerprint: ElementFingerprint, value: string): Promise<string | null> {
    const { label, formLabel, ariaLabel, placeholder, nearbyText } = fingerprint.anchors;
    const texts = dedupe([label, formLabel, ariaLabel, placeholder, nearbyText].filter((t) => t.trim()));
    if (texts.length === 0) return null;

    const candidates = (await this.handle.locateByText(texts, this.config.healingMaxCandidates)).slice(
      0,
      this.config.healingMaxCandidates,
    );
    for (const selector of candidates) {
      try {
        const result = await this.handle.writeValue(selector, value, fingerprint.controlKind);
        if (result.ok) {
          this.logger.info('Control relocated by label text', {
            control: fingerprint.displayName,
            selector,
          });
          return selector;
        }
      } catch (err) {
        if (isFatalBrowserError(err)) throw err;
        this.logger.debug('Healing candidate rejected', { selector, error: errorMessage(err) });
      }
    }
    return null;
  }

  private async succeeded(field: string, via: FillVia, selector: string): Promise<FieldFillResult> {
    if (this.config.settleDelayMs > 0) await sleep(this.config.settleDelayMs);
    return { field, ok: true, attempted: true, via, selector };
  }
}

function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}
