// Rewriting of structural selectors that address one row of a repeated table.

const XPATH_ROW = /tr\[\d+\]/;
const XPATH_ROWS = /tr\[\d+\]/g;
const CSS_ROW = /tr:nth-(?:child|of-type)\(\d+\)/;
const CSS_ROWS = /tr:nth-(?:child|of-type)\(\d+\)/g;
const DIV_ROW = /div\[\d+\]/;
const DIV_ROWS = /div\[\d+\]/g;

function isRowDiv(selector: string): boolean {
  return DIV_ROW.test(selector) && selector.toLowerCase().includes('row');
}

export function hasRowStep(selector: string): boolean {
  return XPATH_ROW.test(selector) || CSS_ROW.test(selector) || isRowDiv(selector);
}

/**
 * Drop the concrete row index so the selector matches the same cell in
 * every row. Null when the selector carries no row step.
 */
export function generalizeRowSelector(selector: string): string | null {
  if (XPATH_ROW.test(selector)) return selector.replace(XPATH_ROWS, 'tr');
  if (CSS_ROW.test(selector)) return selector.replace(CSS_ROWS, 'tr');
  if (isRowDiv(selector)) return selector.replace(DIV_ROWS, 'div');
  return null;
}

/** Point a row-indexed selector at the given 0-based row; unchanged without a row step. */
export function pinRowSelector(selector: string, row: number): string {
  const step = row + 1;
  if (XPATH_ROW.test(selector)) return selector.replace(XPATH_ROWS, `tr[${step}]`);
  if (CSS_ROW.test(selector)) return selector.replace(CSS_ROWS, `tr:nth-child(${step})`);
  if (isRowDiv(selector)) return selector.replace(DIV_ROWS, `div[${step}]`);
  return selector;
}
