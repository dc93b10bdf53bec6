/**
 * ElementFingerprint: everything known about one discovered control, from
 * its fallback selectors to the table cell it sits in. Built once per scan
 * and replaced wholesale on re-scan; only `mapping` is attached later.
 */

import {
  FingerprintDataSchema,
  type BoundingBox,
  type CandidateSelector,
  type ControlKind,
  type FingerprintData,
  type RawElement,
  type SelectorKind,
  type SemanticAnchors,
  type TableContext,
} from './types';
import { hasRowStep, pinRowSelector } from './rowSelectors';

const SELECTOR_PRIORITY: readonly SelectorKind[] = ['id', 'xpath', 'css', 'aria', 'text'];

export interface FingerprintMapping {
  field: string;
  score: number;
}

export class ElementFingerprint {
  readonly index: number;
  readonly tag: string;
  readonly type: string;
  readonly id: string;
  readonly name: string;
  readonly classes: readonly string[];
  readonly selectors: readonly CandidateSelector[];
  readonly anchors: Readonly<SemanticAnchors>;
  readonly box: Readonly<BoundingBox>;
  readonly table: Readonly<TableContext> | null;
  readonly siblings: readonly string[];
  readonly framePath: readonly number[];
  readonly stabilityScore: number;

  mapping: FingerprintMapping | null = null;

  private constructor(data: FingerprintData) {
    this.index = data.index;
    this.tag = data.tag.toLowerCase();
    this.type = data.type.toLowerCase();
    this.id = data.id;
    this.name = data.name;
    this.classes = data.classes;
    this.selectors = data.selectors;
    this.anchors = data.anchors;
    this.box = data.box;
    this.table = data.table;
    this.siblings = data.siblings;
    this.framePath = data.framePath;
    this.stabilityScore = computeStability(data);
  }

  static fromRaw(raw: RawElement, index: number, framePath: readonly number[] = []): ElementFingerprint {
    return new ElementFingerprint({ ...raw, index, framePath: [...framePath] });
  }

  static fromJSON(json: unknown): ElementFingerprint {
    return new ElementFingerprint(FingerprintDataSchema.parse(json));
  }

  toJSON(): FingerprintData {
    return {
      index: this.index,
      tag: this.tag,
      type: this.type,
      id: this.id,
      name: this.name,
      classes: [...this.classes],
      selectors: this.selectors.map((s) => ({ ...s })),
      anchors: { ...this.anchors },
      box: { ...this.box },
      table: this.table ? { ...this.table } : null,
      siblings: [...this.siblings],
      framePath: [...this.framePath],
    };
  }

  // ── Frame context ──────────────────────────────────────────────────

  get frameDepth(): number {
    return this.framePath.length;
  }

  /** Human-readable frame path, e.g. `iframe[0]->iframe[2]`; empty for the top document. */
  get framePathLabel(): string {
    return this.framePath.map((i) => `iframe[${i}]`).join('->');
  }

  // ── Group (batch) controls ─────────────────────────────────────────

  get isGroup(): boolean {
    return this.siblings.length > 0;
  }

  get groupSize(): number {
    return this.siblings.length + 1;
  }

  /** Selector of the control at `offset` within the group; offset 0 is this control. */
  groupSelector(offset: number): string | null {
    if (offset === 0) return this.bestSelector();
    return this.siblings[offset - 1] ?? null;
  }

  // ── Selectors ──────────────────────────────────────────────────────

  selectorOf(kind: SelectorKind): string | null {
    return this.selectors.find((s) => s.kind === kind)?.value ?? null;
  }

  /** Distinct selectors in priority order: identity, structural, class, accessibility, text. */
  selectorChain(): string[] {
    const chain: string[] = [];
    for (const kind of SELECTOR_PRIORITY) {
      for (const s of this.selectors) {
        if (s.kind === kind && !chain.includes(s.value)) chain.push(s.value);
      }
    }
    return chain;
  }

  bestSelector(): string {
    return this.selectorChain()[0] ?? `//${this.tag}`;
  }

  /**
   * Structural selector pointed at the given 0-based table row. Without a
   * recognizable row step the structural selector is returned unchanged, so
   * every row resolves to the control that was scanned.
   */
  selectorForRow(row: number): string {
    const xpath = this.selectorOf('xpath');
    if (!xpath) return this.bestSelector();

    if (hasRowStep(xpath)) return pinRowSelector(xpath, row);

    const step = row + 1;
    if (this.table && /table/i.test(xpath)) {
      if (xpath.includes('//tr/') && xpath.includes('/td')) {
        return xpath.replace('//tr/', `//tr[${step}]/`);
      }
      if (xpath.includes('/tr/') && xpath.includes('/td')) {
        return xpath.replace('/tr/', `/tr[${step}]/`);
      }
    }
    return xpath;
  }

  // ── Naming ─────────────────────────────────────────────────────────

  get displayName(): string {
    return (
      this.anchors.ariaLabel ||
      this.anchors.formLabel ||
      this.anchors.label ||
      this.anchors.placeholder ||
      this.name ||
      this.id ||
      `[${this.tag}]`
    );
  }

  /** Display name without a trailing ordinal, shared by repeated copies of one control. */
  get baseLabel(): string {
    return this.displayName
      .replace(/[\s_\-#(（[]*\d+[)）\]]?$/, '')
      .trim()
      .toLowerCase();
  }

  /** Texts the matcher scores against, in order: label, name, placeholder, id. */
  candidateTexts(): string[] {
    const label = this.anchors.label || this.anchors.formLabel || this.anchors.ariaLabel;
    return [label, this.name, this.anchors.placeholder, this.id].filter((t) => t.length > 0);
  }

  get controlKind(): ControlKind {
    if (this.tag === 'select' || this.type === 'radio') return 'choice';
    if (this.type === 'checkbox') return 'toggle';
    return 'text';
  }

  toString(): string {
    return `${this.displayName} (score=${this.stabilityScore})`;
  }
}

function computeStability(data: FingerprintData): number {
  let score = 0;
  if (data.selectors.some((s) => s.kind === 'id')) score += 40;
  if (data.anchors.ariaLabel) score += 35;
  if (data.anchors.formLabel) score += 25;
  if (data.name) score += 20;
  if (data.anchors.label) score += 15;
  if (data.classes.length > 0) score += 10;
  return Math.min(score, 100);
}
