import { describe, expect, test } from 'vitest';
import { Logger, redactObject, type LogLevel } from '../../../src/monitoring/logger';

function capture(level: LogLevel = 'debug') {
  const lines: { level: LogLevel; entry: Record<string, unknown> }[] = [];
  const logger = new Logger({
    level,
    service: 'test',
    write: (lvl, line) => lines.push({ level: lvl, entry: JSON.parse(line) }),
  });
  return { logger, lines };
}

describe('Logger', () => {
  test('writes one JSON entry per call', () => {
    const { logger, lines } = capture();
    logger.info('Row filled', { row: 3 });

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe('info');
    expect(lines[0].entry).toMatchObject({ level: 'info', msg: 'Row filled', service: 'test', row: 3 });
    expect(typeof lines[0].entry.timestamp).toBe('string');
  });

  test('drops entries below the configured level', () => {
    const { logger, lines } = capture('warn');
    logger.debug('noise');
    logger.info('noise');
    logger.warn('kept');
    logger.error('kept too');

    expect(lines.map((l) => l.entry.msg)).toEqual(['kept', 'kept too']);
    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.isLevelEnabled('error')).toBe(true);
  });

  test('child loggers carry their bindings', () => {
    const { logger, lines } = capture();
    logger.child({ sourceId: 'orders.csv' }).info('Session status', { status: 'running' });

    expect(lines[0].entry).toMatchObject({ sourceId: 'orders.csv', status: 'running', service: 'test' });
  });

  test('redacts credentials in data', () => {
    const { logger, lines } = capture();
    logger.info('Connecting', { password: 'test-secret', endpoint: 'ws://127.0.0.1:9222/devtools' });

    expect(lines[0].entry.password).toBe('[REDACTED]');
    expect(lines[0].entry.endpoint).toBe('[REDACTED]');
  });
});

describe('redactObject', () => {
  test('walks nested objects and arrays', () => {
    const out = redactObject({
      auth: { token: 'abc', user: 'clerk' },
      headers: [{ authorization: 'Bearer x' }],
      note: 'plain text',
    });
    expect(out).toEqual({
      auth: { token: '[REDACTED]', user: 'clerk' },
      headers: [{ authorization: '[REDACTED]' }],
      note: 'plain text',
    });
  });
});
