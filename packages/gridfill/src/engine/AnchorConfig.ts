import type { ElementFingerprint } from './ElementFingerprint';
import { ConfigurationError } from '../errors';

/** A source field correlated with a read-only page column. */
export interface AnchorPair {
  field: string;
  /** Structural selector of the column cell in any one row. */
  selector: string;
  label: string;
  enabled: boolean;
}

/**
 * Key-column configuration. The first enabled pair is the primary key;
 * any further enabled pairs only verify a resolved row. Editable until a
 * session freezes it.
 */
export class AnchorConfig {
  private pairs: AnchorPair[];
  private frozen = false;

  constructor(pairs: AnchorPair[] = []) {
    this.pairs = pairs.map((p) => ({ ...p }));
  }

  /** Key the session on the column a matched fingerprint sits in. */
  static forKeyColumn(field: string, fingerprint: ElementFingerprint): AnchorConfig {
    const config = new AnchorConfig();
    config.add(field, fingerprint.selectorOf('xpath') ?? fingerprint.bestSelector(), fingerprint.displayName);
    return config;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  freeze(): void {
    this.frozen = true;
  }

  add(field: string, selector: string, label = ''): void {
    this.assertEditable();
    this.pairs.push({ field, selector, label, enabled: true });
  }

  remove(index: number): void {
    this.assertEditable();
    if (index >= 0 && index < this.pairs.length) this.pairs.splice(index, 1);
  }

  toggle(index: number): void {
    this.assertEditable();
    const pair = this.pairs[index];
    if (pair) pair.enabled = !pair.enabled;
  }

  list(): readonly Readonly<AnchorPair>[] {
    return this.pairs;
  }

  enabledPairs(): AnchorPair[] {
    return this.pairs.filter((p) => p.enabled);
  }

  primary(): AnchorPair | null {
    return this.enabledPairs()[0] ?? null;
  }

  auxiliary(): AnchorPair[] {
    return this.enabledPairs().slice(1);
  }

  /** Problems that prevent the configuration from being used; empty when valid. */
  validate(sourceFields?: readonly string[]): string[] {
    const errors: string[] = [];
    const enabled = this.enabledPairs();
    if (enabled.length === 0) errors.push('At least one enabled key column is required');

    const seen = new Set<string>();
    for (const pair of enabled) {
      if (seen.has(pair.field)) errors.push(`Key column ${pair.field} is configured twice`);
      seen.add(pair.field);
      if (!pair.selector.trim()) errors.push(`Key column ${pair.field} has no page selector`);
      if (sourceFields && !sourceFields.includes(pair.field)) {
        errors.push(`Key column ${pair.field} is not a source field`);
      }
    }
    return errors;
  }

  isValid(sourceFields?: readonly string[]): boolean {
    return this.validate(sourceFields).length === 0;
  }

  private assertEditable(): void {
    if (this.frozen) {
      throw new ConfigurationError('Key columns cannot change while a session is using them');
    }
  }
}
