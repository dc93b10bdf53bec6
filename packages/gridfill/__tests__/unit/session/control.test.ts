import { describe, expect, test } from 'vitest';
import { CancellationToken, PauseGate } from '../../../src/session/control';

describe('PauseGate', () => {
  test('wait resolves immediately while open', async () => {
    const gate = new PauseGate();
    await expect(gate.wait()).resolves.toBeUndefined();
    expect(gate.isClosed).toBe(false);
  });

  test('a closed gate holds waiters until opened', async () => {
    const gate = new PauseGate();
    gate.close();

    let released = false;
    const waiting = gate.wait().then(() => {
      released = true;
    });
    await Promise.resolve();
    expect(released).toBe(false);

    gate.open();
    await waiting;
    expect(released).toBe(true);
    expect(gate.isClosed).toBe(false);
  });

  test('closing twice keeps a single pending gate', async () => {
    const gate = new PauseGate();
    gate.close();
    const first = gate.wait();
    gate.close();
    gate.open();
    await expect(first).resolves.toBeUndefined();
  });
});

describe('CancellationToken', () => {
  test('stays cancelled once cancelled', () => {
    const token = new CancellationToken();
    expect(token.isCancelled).toBe(false);
    token.cancel();
    token.cancel();
    expect(token.isCancelled).toBe(true);
  });
});
