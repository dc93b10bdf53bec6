import { errors } from 'playwright-core';
import { describe, expect, test } from 'vitest';
import {
  PlaywrightBrowserHandle,
  toPlaywrightSelector,
} from '../../../src/adapters/playwright';
import type {
  DriverFrame,
  DriverFrameHost,
  DriverLocator,
  DriverPage,
} from '../../../src/adapters/playwright';
import { ElementNotFoundError, FrameUnreachableError } from '../../../src/errors';

// ── Fakes ────────────────────────────────────────────────────────────

class FakeLocator implements DriverLocator {
  readonly calls: string[] = [];
  failWith: Error | null = null;

  first(): DriverLocator {
    return this;
  }

  async fill(value: string): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.calls.push(`fill:${value}`);
  }

  async pressSequentially(text: string): Promise<void> {
    this.calls.push(`type:${text}`);
  }

  async click(): Promise<void> {
    this.calls.push('click');
  }
}

class FakeFrame implements DriverFrame {
  readonly scripts: string[] = [];
  readonly locators = new Map<string, FakeLocator>();
  hosts: DriverFrameHost[] = [];

  constructor(private readonly reply: (script: string) => unknown) {}

  async evaluate(script: string): Promise<unknown> {
    this.scripts.push(script);
    return this.reply(script);
  }

  async $$(): Promise<DriverFrameHost[]> {
    return this.hosts;
  }

  locator(selector: string): DriverLocator {
    const existing = this.locators.get(selector);
    if (existing) return existing;
    const created = new FakeLocator();
    this.locators.set(selector, created);
    return created;
  }
}

function hostOf(frame: DriverFrame | null): DriverFrameHost {
  return { contentFrame: async () => frame };
}

function pageOf(main: FakeFrame): DriverPage {
  return { mainFrame: () => main, url: () => 'https://erp.test/grid' };
}

// ── Tests ────────────────────────────────────────────────────────────

describe('toPlaywrightSelector', () => {
  test('routes xpath and css selectors to their engines', () => {
    expect(toPlaywrightSelector('//input[@id="a"]')).toBe('xpath=//input[@id="a"]');
    expect(toPlaywrightSelector('(//input)[2]')).toBe('xpath=(//input)[2]');
    expect(toPlaywrightSelector('#qty')).toBe('css=#qty');
  });
});

describe('PlaywrightBrowserHandle', () => {
  test('validates probe results with the shared schemas', async () => {
    const main = new FakeFrame(() => 4);
    const handle = new PlaywrightBrowserHandle(pageOf(main));

    await expect(handle.countRows()).resolves.toBe(4);
    expect(main.scripts).toHaveLength(1);
  });

  test('rejects probe results that do not match the schema', async () => {
    const main = new FakeFrame(() => 'four');
    const handle = new PlaywrightBrowserHandle(pageOf(main));

    await expect(handle.countRows()).rejects.toThrow();
  });

  test('embeds selector arguments as JSON literals', async () => {
    const main = new FakeFrame(() => ['a']);
    const handle = new PlaywrightBrowserHandle(pageOf(main));

    await handle.readCells('//td[@title="x"]');
    expect(main.scripts[0]).toContain(JSON.stringify('//td[@title="x"]'));
  });

  test('runs snapshots inside the frame named by the path', async () => {
    const inner = new FakeFrame(() => ({ status: 'loading' }));
    const main = new FakeFrame(() => ({ status: 'loading' }));
    main.hosts = [hostOf(null), hostOf(inner)];
    const handle = new PlaywrightBrowserHandle(pageOf(main));

    const result = await handle.snapshot([1]);

    expect(result).toEqual({ status: 'loading' });
    expect(inner.scripts).toHaveLength(1);
    expect(main.scripts).toHaveLength(0);
  });

  test('reports a frame path that does not resolve', async () => {
    const main = new FakeFrame(() => null);
    main.hosts = [hostOf(null)];
    const handle = new PlaywrightBrowserHandle(pageOf(main));

    await expect(handle.snapshot([0])).rejects.toBeInstanceOf(FrameUnreachableError);
    await expect(handle.enterFrame([3])).rejects.toThrow('Frame iframe[3] unreachable: no such frame element');
  });

  test('entered frame becomes the context for row probes until exit', async () => {
    const inner = new FakeFrame(() => true);
    const main = new FakeFrame(() => false);
    main.hosts = [hostOf(inner)];
    const handle = new PlaywrightBrowserHandle(pageOf(main));

    await handle.enterFrame([0]);
    await expect(handle.isLoading()).resolves.toBe(true);

    await handle.exitFrame();
    await expect(handle.isLoading()).resolves.toBe(false);
  });

  test('typeInto clears then types through a locator', async () => {
    const main = new FakeFrame(() => null);
    const handle = new PlaywrightBrowserHandle(pageOf(main));

    await handle.typeInto('#qty', '12', 500);

    expect(main.locators.get('css=#qty')?.calls).toEqual(['fill:', 'type:12']);
  });

  test('typeInto maps a locator timeout to ElementNotFoundError', async () => {
    const main = new FakeFrame(() => null);
    const handle = new PlaywrightBrowserHandle(pageOf(main));
    const locator = new FakeLocator();
    locator.failWith = new errors.TimeoutError('Timeout 500ms exceeded.');
    main.locators.set('xpath=//input[1]', locator);

    const failure = handle.typeInto('//input[1]', 'x', 500);

    await expect(failure).rejects.toBeInstanceOf(ElementNotFoundError);
    await expect(failure).rejects.toMatchObject({ selector: '//input[1]', details: { timeoutMs: 500 } });
  });

  test('typeInto passes other failures through', async () => {
    const main = new FakeFrame(() => null);
    const handle = new PlaywrightBrowserHandle(pageOf(main));
    const locator = new FakeLocator();
    locator.failWith = new Error('Target closed');
    main.locators.set('css=#qty', locator);

    await expect(handle.typeInto('#qty', 'x', 500)).rejects.toThrow('Target closed');
  });

  test('highlight reports false when the probe fails', async () => {
    const main = new FakeFrame(() => {
      throw new Error('Execution context was destroyed');
    });
    const handle = new PlaywrightBrowserHandle(pageOf(main));

    await expect(handle.highlight('#qty')).resolves.toBe(false);
  });

  test('url reads from the page', async () => {
    const handle = new PlaywrightBrowserHandle(pageOf(new FakeFrame(() => null)));
    await expect(handle.url()).resolves.toBe('https://erp.test/grid');
  });
});
