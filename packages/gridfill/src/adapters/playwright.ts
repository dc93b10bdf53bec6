/**
 * PlaywrightBrowserHandle: BrowserHandle over a Playwright `Page`.
 *
 * Reads run the string probes from ./probes inside the current frame and
 * validate what comes back with the shared zod schemas. Writes go through
 * the rich value-setter probe or, for plain typing, through a locator.
 */

import { errors } from 'playwright-core';
import { z } from 'zod';
import type { BrowserHandle } from './types';
import {
  ControlStateSchema,
  FrameDescriptorSchema,
  PageSignatureSchema,
  PaginationCandidateSchema,
  RawElementSchema,
  SnapshotResultSchema,
  WriteResultSchema,
} from '../engine/types';
import type {
  ControlKind,
  ControlState,
  FrameDescriptor,
  PageSignature,
  PaginationCandidate,
  RawElement,
  SnapshotResult,
  WriteResult,
} from '../engine/types';
import { ElementNotFoundError, FrameUnreachableError, errorMessage } from '../errors';
import { getLogger } from '../monitoring/logger';
import * as probes from './probes';

const StringListSchema = z.array(z.string());

// ── Driver surface ────────────────────────────────────────────────────
// The parts of Playwright's Page, Frame, ElementHandle and Locator the
// handle uses. A real `Page` satisfies DriverPage.

export interface DriverLocator {
  first(): DriverLocator;
  fill(value: string, options?: { timeout?: number }): Promise<void>;
  pressSequentially(text: string, options?: { timeout?: number }): Promise<void>;
  click(): Promise<void>;
}

export interface DriverFrameHost {
  contentFrame(): Promise<DriverFrame | null>;
}

export interface DriverFrame {
  evaluate(script: string): Promise<unknown>;
  $$(selector: string): Promise<DriverFrameHost[]>;
  locator(selector: string): DriverLocator;
}

export interface DriverPage {
  mainFrame(): DriverFrame;
  url(): string;
}

/** Playwright selector-engine prefix for a stored selector. */
export function toPlaywrightSelector(selector: string): string {
  if (selector.startsWith('/') || selector.startsWith('(')) return `xpath=${selector}`;
  return `css=${selector}`;
}

function pathLabel(path: readonly number[]): string {
  return path.map((i) => `iframe[${i}]`).join('->');
}

export class PlaywrightBrowserHandle implements BrowserHandle {
  private readonly logger = getLogger({ service: 'PlaywrightBrowserHandle' });
  private context: DriverFrame;

  constructor(private readonly page: DriverPage) {
    this.context = page.mainFrame();
  }

  // ── Frames ─────────────────────────────────────────────────────────

  private async resolveFrame(path: readonly number[]): Promise<DriverFrame> {
    let frame = this.page.mainFrame();
    for (let depth = 0; depth < path.length; depth++) {
      const index = path[depth];
      const label = pathLabel(path.slice(0, depth + 1));
      const hosts = await frame.$$('iframe, frame');
      const host = index === undefined ? undefined : hosts[index];
      if (!host) throw new FrameUnreachableError(label, 'no such frame element');

      const child = await host.contentFrame();
      if (!child) throw new FrameUnreachableError(label, 'frame has no content document');
      frame = child;
    }
    return frame;
  }

  async enterFrame(framePath: readonly number[]): Promise<void> {
    this.context = await this.resolveFrame(framePath);
  }

  async exitFrame(): Promise<void> {
    this.context = this.page.mainFrame();
  }

  private async run<T>(frame: DriverFrame, script: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const raw: unknown = await frame.evaluate(script);
    return schema.parse(raw);
  }

  private locator(selector: string): DriverLocator {
    return this.context.locator(toPlaywrightSelector(selector)).first();
  }

  // ── Probes ─────────────────────────────────────────────────────────

  async snapshot(framePath: readonly number[]): Promise<SnapshotResult> {
    const frame = await this.resolveFrame(framePath);
    return this.run(frame, probes.snapshotScript(), SnapshotResultSchema);
  }

  async listFrames(framePath: readonly number[]): Promise<FrameDescriptor[]> {
    const frame = await this.resolveFrame(framePath);
    return this.run(frame, probes.listFramesScript(), z.array(FrameDescriptorSchema));
  }

  async fallbackSnapshot(): Promise<RawElement[]> {
    return this.run(this.page.mainFrame(), probes.fallbackScanScript(), z.array(RawElementSchema));
  }

  async countRows(): Promise<number> {
    return this.run(this.context, probes.countRowsScript(), z.number().int().nonnegative());
  }

  async isLoading(): Promise<boolean> {
    return this.run(this.context, probes.isLoadingScript(), z.boolean());
  }

  async readCells(selector: string): Promise<string[]> {
    return this.run(this.context, probes.readCellsScript(selector), StringListSchema);
  }

  async pageSignature(): Promise<PageSignature> {
    return this.run(this.context, probes.pageSignatureScript(), PageSignatureSchema);
  }

  async inspectControl(selector: string): Promise<ControlState> {
    return this.run(this.context, probes.inspectControlScript(selector), ControlStateSchema);
  }

  async findPaginationCandidates(): Promise<PaginationCandidate[]> {
    return this.run(
      this.context,
      probes.paginationCandidatesScript(),
      z.array(PaginationCandidateSchema),
    );
  }

  async locateByText(texts: readonly string[], limit: number): Promise<string[]> {
    if (texts.length === 0 || limit <= 0) return [];
    return this.run(this.context, probes.locateByTextScript(texts, limit), StringListSchema);
  }

  async url(): Promise<string> {
    return this.page.url();
  }

  // ── Writes ─────────────────────────────────────────────────────────

  async writeValue(selector: string, value: string, kind: ControlKind): Promise<WriteResult> {
    return this.run(this.context, probes.writeValueScript(selector, value, kind), WriteResultSchema);
  }

  async typeInto(selector: string, value: string, timeoutMs: number): Promise<void> {
    const target = this.locator(selector);
    try {
      await target.fill('', { timeout: timeoutMs });
      await target.pressSequentially(value, { timeout: timeoutMs });
    } catch (err) {
      if (err instanceof errors.TimeoutError) {
        throw new ElementNotFoundError(selector, { timeoutMs });
      }
      throw err;
    }
  }

  async click(selector: string): Promise<void> {
    await this.locator(selector).click();
  }

  async highlight(selector: string): Promise<boolean> {
    try {
      return await this.run(this.context, probes.highlightScript(selector), z.boolean());
    } catch (err) {
      this.logger.debug('Highlight failed', { selector, error: errorMessage(err) });
      return false;
    }
  }
}
