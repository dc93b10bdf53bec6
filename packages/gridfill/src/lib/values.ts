const SLASH_DATE = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;

/** Normalize a source value before it is written: trimmed, `YYYY/MM/DD` dates as `YYYY-MM-DD`. */
export function prepareValue(raw: string): string {
  const value = raw.trim();
  const date = SLASH_DATE.exec(value);
  if (date) return `${date[1]}-${date[2]}-${date[3]}`;
  return value;
}

/** Exact match after trimming, else numeric equality ("100" equals "100.0"). */
export function valuesMatch(a: string, b: string): boolean {
  const left = a.trim();
  const right = b.trim();
  if (left === right) return true;
  if (left === '' || right === '') return false;

  const l = Number(left);
  const r = Number(right);
  return Number.isFinite(l) && Number.isFinite(r) && l === r;
}
