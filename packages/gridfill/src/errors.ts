// ── Error codes ──────────────────────────────────────────────────────

export type FillErrorCode =
  | 'element_not_found'
  | 'frame_unreachable'
  | 'anchor_value_not_found'
  | 'navigation_stalled'
  | 'partial_field_failure'
  | 'scan_timeout'
  | 'configuration_error'
  | 'browser_disconnected'
  | 'unknown';

// ── Error classes ────────────────────────────────────────────────────

export class GridfillError extends Error {
  constructor(
    message: string,
    public readonly code: FillErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'GridfillError';
  }
}

export class ElementNotFoundError extends GridfillError {
  constructor(public readonly selector: string, details?: unknown) {
    super(`No element matches ${selector}`, 'element_not_found', details);
    this.name = 'ElementNotFoundError';
  }
}

export class FrameUnreachableError extends GridfillError {
  constructor(public readonly framePath: string, reason?: string) {
    super(
      reason ? `Frame ${framePath} unreachable: ${reason}` : `Frame ${framePath} unreachable`,
      'frame_unreachable',
    );
    this.name = 'FrameUnreachableError';
  }
}

export class NavigationStalledError extends GridfillError {
  constructor(public readonly attempts: number) {
    super(`Page content unchanged after ${attempts} navigation attempts`, 'navigation_stalled');
    this.name = 'NavigationStalledError';
  }
}

export class ScanTimeoutError extends GridfillError {
  constructor(public readonly waitedMs: number) {
    super(`Page never produced a stable control set within ${waitedMs}ms`, 'scan_timeout');
    this.name = 'ScanTimeoutError';
  }
}

export class ConfigurationError extends GridfillError {
  constructor(message: string, details?: unknown) {
    super(message, 'configuration_error', details);
    this.name = 'ConfigurationError';
  }
}

// ── Classification ───────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** A closed or crashed browser target: no later unit of work can succeed. */
export function isFatalBrowserError(err: unknown): boolean {
  return /target closed|browser has been closed|execution context was destroyed|page closed|crashed/i.test(
    errorMessage(err),
  );
}

export function classifyError(err: unknown): FillErrorCode {
  if (err instanceof GridfillError) return err.code;
  if (isFatalBrowserError(err)) return 'browser_disconnected';

  const msg = errorMessage(err).toLowerCase();
  if (msg.includes('not found') || msg.includes('no element') || msg.includes('timeout')) {
    return 'element_not_found';
  }
  if (msg.includes('cross-origin') || msg.includes('frame')) {
    return 'frame_unreachable';
  }
  return 'unknown';
}
