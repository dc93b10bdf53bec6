import { z } from 'zod';

// --- Probe output: discovered controls ---

export const SelectorKindSchema = z.enum(['id', 'xpath', 'css', 'aria', 'text']);
export type SelectorKind = z.infer<typeof SelectorKindSchema>;

export const CandidateSelectorSchema = z.object({
  kind: SelectorKindSchema,
  value: z.string().min(1),
});
export type CandidateSelector = z.infer<typeof CandidateSelectorSchema>;

export const BoundingBoxSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
});
export type BoundingBox = z.infer<typeof BoundingBoxSchema>;

export const SemanticAnchorsSchema = z.object({
  label: z.string().default(''),
  placeholder: z.string().default(''),
  ariaLabel: z.string().default(''),
  nearbyText: z.string().default(''),
  formLabel: z.string().default(''),
});
export type SemanticAnchors = z.infer<typeof SemanticAnchorsSchema>;

export const TableContextSchema = z.object({
  rowIndex: z.number().int().nonnegative(),
  columnIndex: z.number().int().nonnegative(),
  tableId: z.string().default(''),
  columnHeader: z.string().default(''),
});
export type TableContext = z.infer<typeof TableContextSchema>;

export const RawElementSchema = z.object({
  tag: z.string().min(1),
  type: z.string().default(''),
  id: z.string().default(''),
  name: z.string().default(''),
  classes: z.array(z.string()).default([]),
  selectors: z.array(CandidateSelectorSchema).min(1),
  anchors: SemanticAnchorsSchema,
  box: BoundingBoxSchema,
  table: TableContextSchema.nullable().default(null),
  /** Selectors of repeated controls that belong to the same logical field. */
  siblings: z.array(z.string()).default([]),
});
export type RawElement = z.infer<typeof RawElementSchema>;

export const FingerprintDataSchema = RawElementSchema.extend({
  index: z.number().int().nonnegative(),
  framePath: z.array(z.number().int().nonnegative()).default([]),
});
export type FingerprintData = z.infer<typeof FingerprintDataSchema>;

export const SnapshotResultSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('loading') }),
  z.object({ status: z.literal('ready'), elements: z.array(RawElementSchema) }),
]);
export type SnapshotResult = z.infer<typeof SnapshotResultSchema>;

export const FrameDescriptorSchema = z.object({
  index: z.number().int().nonnegative(),
  src: z.string().default(''),
  width: z.number(),
  height: z.number(),
});
export type FrameDescriptor = z.infer<typeof FrameDescriptorSchema>;

// --- Probe output: pagination ---

export const PageSignatureSchema = z.object({
  url: z.string(),
  indicator: z.string().nullable(),
  firstRowText: z.string().nullable(),
  firstInputValue: z.string().nullable(),
  controlCount: z.number().int().nonnegative(),
});
export type PageSignature = z.infer<typeof PageSignatureSchema>;

export const ControlStateSchema = z.object({
  exists: z.boolean(),
  disabledAttr: z.string().nullable(),
  ariaDisabled: z.string().nullable(),
  classTokens: z.array(z.string()),
  pointerEvents: z.string(),
  opacity: z.number(),
});
export type ControlState = z.infer<typeof ControlStateSchema>;

export const PaginationCandidateSchema = z.object({
  text: z.string(),
  selector: z.string().min(1),
});
export type PaginationCandidate = z.infer<typeof PaginationCandidateSchema>;

export interface PageStateSnapshot {
  page: number;
  url: string;
  contentFingerprint: string;
  controlCount: number;
  timestamp: number;
}

// --- Writes ---

export type ControlKind = 'text' | 'choice' | 'toggle';

export const WriteResultSchema = z.object({
  ok: z.boolean(),
  reason: z.string().optional(),
});
export type WriteResult = z.infer<typeof WriteResultSchema>;

// --- Source data ---

export interface SourceRow {
  /** 0-based position in the source table. */
  index: number;
  values: Record<string, string>;
}

// --- Tasks ---

export type TaskStatus = 'pending' | 'success' | 'error' | 'skipped';
