/**
 * FieldMatcher: aligns external field names with discovered controls.
 *
 * Each field is scored against every unclaimed fingerprint's candidate
 * texts (label, name, placeholder, id); the best fingerprint at or above
 * the threshold is claimed greedily, in field order.
 *
 * Scoring, highest wins:
 *   exact normalized equality        100
 *   containment either direction      80
 *   multi-word initials (2+ letters)  60
 *   token overlap               40 + 30 × ratio
 */

import type { ElementFingerprint } from './ElementFingerprint';
import type { MatcherConfig } from '../config/defaults';
import { DEFAULT_MATCHER_CONFIG } from '../config/defaults';
import { getLogger } from '../monitoring/logger';

// ── Types ─────────────────────────────────────────────────────────────

export interface FieldMatch {
  field: string;
  fingerprint: ElementFingerprint;
  score: number;
}

export interface MatchResult {
  matches: FieldMatch[];
  unmatchedFields: string[];
  /** Unclaimed fingerprints, near-duplicates collapsed. */
  unmatchedFingerprints: ElementFingerprint[];
  /** Matches confident enough to apply without review. */
  suggestions: FieldMatch[];
}

// ── Text helpers ──────────────────────────────────────────────────────

export function normalizeText(text: string): string {
  return text.replace(/[：:\s\-_]+/g, '').toLowerCase();
}

export function splitWords(text: string): string[] {
  return text
    .split(/[\s\-_,.;:：，、/()（）]+/)
    .flatMap((part) => part.replace(/([a-z])([A-Z])/g, '$1 $2').split(/\s+/))
    .filter((w) => w.length > 0)
    .map((w) => w.toLowerCase());
}

function initials(words: string[]): string {
  return words.map((w) => w[0]).join('');
}

/** Score one field name against one candidate text, 0–100. */
export function scoreText(field: string, text: string): number {
  const a = normalizeText(field);
  const b = normalizeText(text);
  if (!a || !b) return 0;
  if (a === b) return 100;

  let score = 0;
  if (a.includes(b) || b.includes(a)) score = 80;

  const fieldWords = splitWords(field);
  const textWords = splitWords(text);
  const textSet = new Set(textWords);
  const common = new Set(fieldWords.filter((w) => textSet.has(w)));
  if (common.size > 0) {
    const overlap = common.size / Math.max(fieldWords.length, textWords.length);
    score = Math.max(score, Math.floor(40 + overlap * 30));
  }

  const fieldInitials = initials(fieldWords);
  if (fieldInitials.length >= 2 && fieldInitials === initials(textWords)) {
    score = Math.max(score, 60);
  }

  return score;
}

/** Best score of a field against any of a fingerprint's candidate texts. */
export function scoreFingerprint(field: string, fingerprint: ElementFingerprint): number {
  let best = 0;
  for (const text of fingerprint.candidateTexts()) {
    best = Math.max(best, scoreText(field, text));
    if (best === 100) break;
  }
  return best;
}

/**
 * Collapse fingerprints that share a base label (and frame), keeping the
 * one with the higher stability score. Order of first appearance is kept.
 */
export function dedupeFingerprints(fingerprints: ElementFingerprint[]): ElementFingerprint[] {
  const byKey = new Map<string, ElementFingerprint>();
  for (const fp of fingerprints) {
    const key = `${fp.framePathLabel}|${fp.baseLabel}`;
    const existing = byKey.get(key);
    if (!existing) {
      byKey.set(key, fp);
    } else if (fp.stabilityScore > existing.stabilityScore) {
      byKey.delete(key);
      byKey.set(key, fp);
    }
  }
  const kept = new Set(byKey.values());
  return fingerprints.filter((fp) => kept.has(fp));
}

// ── FieldMatcher ──────────────────────────────────────────────────────

export class FieldMatcher {
  private logger = getLogger({ service: 'FieldMatcher' });
  private config: MatcherConfig;

  constructor(config: Partial<MatcherConfig> = {}) {
    this.config = { ...DEFAULT_MATCHER_CONFIG, ...config };
  }

  match(fields: string[], fingerprints: ElementFingerprint[]): MatchResult {
    const claimed = new Set<ElementFingerprint>();
    const matches: FieldMatch[] = [];
    const unmatchedFields: string[] = [];

    for (const field of fields) {
      let best: FieldMatch | null = null;

      for (const fp of fingerprints) {
        if (claimed.has(fp)) continue;
        const score = scoreFingerprint(field, fp);
        if (score > (best?.score ?? 0)) {
          best = { field, fingerprint: fp, score };
          if (score === 100) break;
        }
      }

      if (best && best.score >= this.config.minScore) {
        claimed.add(best.fingerprint);
        matches.push(best);
        this.logger.debug('Field matched', {
          field,
          control: best.fingerprint.displayName,
          score: best.score,
        });
      } else {
        unmatchedFields.push(field);
        this.logger.debug('Field unmatched', { field, bestScore: best?.score ?? 0 });
      }
    }

    const unmatchedFingerprints = dedupeFingerprints(fingerprints.filter((fp) => !claimed.has(fp)));
    const suggestions = matches.filter((m) => m.score >= this.config.highConfidence);

    if (unmatchedFields.length > 0) {
      this.logger.warn('Some fields have no matching control', {
        unmatched: unmatchedFields,
        matched: matches.length,
      });
    }

    return { matches, unmatchedFields, unmatchedFingerprints, suggestions };
  }
}
