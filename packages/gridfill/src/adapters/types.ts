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

/**
 * Read-only DOM capabilities the engine needs from a browser.
 *
 * Probes taking a `framePath` address a nested document by the index of
 * each `<iframe>` element on the way down; `[]` is the top document. The
 * remaining probes run in the context selected by `enterFrame`.
 */
export interface DomProbe {
  /** Data-entry controls of one document, or `loading` while an overlay is up. */
  snapshot(framePath: readonly number[]): Promise<SnapshotResult>;

  /** Direct child frames of one document with their rendered size. */
  listFrames(framePath: readonly number[]): Promise<FrameDescriptor[]>;

  /** Flat tag-query scan of the top document with minimal label inference. */
  fallbackSnapshot(): Promise<RawElement[]>;

  /** Number of data rows in the first repeated table; 0 when none is found. */
  countRows(): Promise<number>;

  /** Whether a generic loading overlay is visible or the document is still loading. */
  isLoading(): Promise<boolean>;

  /** Text (or value, for inputs) of every node the selector matches, in document order. */
  readCells(selector: string): Promise<string[]>;

  pageSignature(): Promise<PageSignature>;

  inspectControl(selector: string): Promise<ControlState>;

  findPaginationCandidates(): Promise<PaginationCandidate[]>;

  /**
   * Selectors of data-entry controls nearest to visible text matching one of
   * `texts`, closest first, at most `limit` of them.
   */
  locateByText(texts: readonly string[], limit: number): Promise<string[]>;

  url(): Promise<string>;
}

/** DOM capabilities that change the page. */
export interface DomWriter {
  /** Switch the execution context into a nested document. */
  enterFrame(framePath: readonly number[]): Promise<void>;

  /** Return the execution context to the top document. */
  exitFrame(): Promise<void>;

  /**
   * Set a control's value the way a user would, dispatching
   * focus, input, change and blur so reactive front ends observe it.
   */
  writeValue(selector: string, value: string, kind: ControlKind): Promise<WriteResult>;

  /** Plain clear-and-type. Throws ElementNotFoundError when nothing appears within the timeout. */
  typeInto(selector: string, value: string, timeoutMs: number): Promise<void>;

  click(selector: string): Promise<void>;

  /** Draw attention to a control; false when it cannot be located. */
  highlight(selector: string): Promise<boolean>;
}

/**
 * Opaque browser handle handed to the engine. Connection and launch are
 * the caller's concern.
 */
export interface BrowserHandle extends DomProbe, DomWriter {}
