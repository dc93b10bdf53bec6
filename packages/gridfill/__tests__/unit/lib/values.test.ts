import { describe, expect, test } from 'vitest';
import { prepareValue, valuesMatch } from '../../../src/lib/values';
import { pollUntil } from '../../../src/lib/timing';

describe('prepareValue', () => {
  test('trims surrounding whitespace', () => {
    expect(prepareValue('  42 ')).toBe('42');
  });

  test('rewrites slash dates as ISO dates', () => {
    expect(prepareValue('2024/03/15')).toBe('2024-03-15');
    expect(prepareValue('2024/3/5')).toBe('2024-3-5');
  });

  test('leaves other slashes alone', () => {
    expect(prepareValue('A/B/C')).toBe('A/B/C');
  });
});

describe('valuesMatch', () => {
  test('compares trimmed text exactly', () => {
    expect(valuesMatch(' A-100 ', 'A-100')).toBe(true);
    expect(valuesMatch('A-100', 'a-100')).toBe(false);
  });

  test('treats numerically equal values as equal', () => {
    expect(valuesMatch('100', '100.0')).toBe(true);
    expect(valuesMatch('100', '100.5')).toBe(false);
  });

  test('an empty value only matches another empty value', () => {
    expect(valuesMatch('', '  ')).toBe(true);
    expect(valuesMatch('0', '')).toBe(false);
  });
});

describe('pollUntil', () => {
  test('runs the check at least once with a zero budget', async () => {
    let calls = 0;
    const met = await pollUntil(async () => {
      calls++;
      return false;
    }, { timeoutMs: 0, intervalMs: 0 });

    expect(met).toBe(false);
    expect(calls).toBe(1);
  });

  test('returns true as soon as the check passes', async () => {
    let calls = 0;
    const met = await pollUntil(async () => ++calls === 3, { timeoutMs: 1_000, intervalMs: 0 });
    expect(met).toBe(true);
    expect(calls).toBe(3);
  });
});
