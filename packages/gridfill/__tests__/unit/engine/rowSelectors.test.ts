import { describe, expect, test } from 'vitest';
import { generalizeRowSelector, hasRowStep, pinRowSelector } from '../../../src/engine/rowSelectors';

describe('generalizeRowSelector', () => {
  test('drops the index from an xpath row step', () => {
    expect(generalizeRowSelector('/html/body/table/tbody/tr[3]/td[1]')).toBe('/html/body/table/tbody/tr/td[1]');
  });

  test('drops nth-child from a css row step', () => {
    expect(generalizeRowSelector('table > tbody > tr:nth-child(2) > td.code')).toBe('table > tbody > tr > td.code');
  });

  test('handles div-based grid rows', () => {
    expect(generalizeRowSelector('//div[@class="grid-row"]/div[4]/span')).toBe('//div[@class="grid-row"]/div/span');
  });

  test('returns null without a row step', () => {
    expect(generalizeRowSelector('#order-code')).toBeNull();
    expect(hasRowStep('#order-code')).toBe(false);
  });
});

describe('pinRowSelector', () => {
  test('targets the 0-based row as a 1-based step', () => {
    expect(pinRowSelector('/html/body/table/tbody/tr[1]/td[2]/input[1]', 0)).toBe(
      '/html/body/table/tbody/tr[1]/td[2]/input[1]',
    );
    expect(pinRowSelector('/html/body/table/tbody/tr[1]/td[2]/input[1]', 6)).toBe(
      '/html/body/table/tbody/tr[7]/td[2]/input[1]',
    );
  });

  test('rewrites css row steps as nth-child', () => {
    expect(pinRowSelector('tr:nth-of-type(1) > td input', 2)).toBe('tr:nth-child(3) > td input');
  });

  test('leaves selectors without a row step unchanged', () => {
    expect(pinRowSelector('#order-code', 4)).toBe('#order-code');
  });
});
