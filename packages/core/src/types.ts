/**
 * Domain types shared by the coordinator, the tools and the outer surfaces.
 */

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

export type DocumentKind = 'report' | 'transcript';

export const DOCUMENT_KINDS: readonly DocumentKind[] = ['report', 'transcript'];

export type DocumentFormat = 'text' | 'markdown' | 'html' | 'image';

export interface FiscalPeriod {
  fiscalYear: number;
  quarter: 1 | 2 | 3 | 4;
}

export interface DocumentContent {
  /** Extractable text layer. Absent for scanned/image-only documents. */
  text?: string;
  /** Page images for OCR. */
  images?: Uint8Array[];
}

export interface SourceDocument {
  id: string;
  kind: DocumentKind;
  /** Source identifier the document was fetched from (e.g. 'screener'). */
  sourceId: string;
  period: FiscalPeriod;
  format: DocumentFormat;
  content: DocumentContent;
  /** Where the document came from (path or URL), for citations. */
  origin?: string;
}

/** Scanned documents carry page images and no usable text layer. */
export function isImageBased(document: SourceDocument): boolean {
  return document.format === 'image' || !document.content.text?.trim();
}

// ---------------------------------------------------------------------------
// Tool outputs
// ---------------------------------------------------------------------------

export type ExtractionStrategyName = 'table' | 'text' | 'ocr';
/** `derived` marks a value computed from other metrics during reconciliation. */
export type MetricStrategy = ExtractionStrategyName | 'derived';

export interface ExtractedMetric {
  /** Normalized metric key (e.g. 'revenue', 'operating_margin'). */
  name: string;
  value: number;
  unit: string;
  /** Clamped to [0, 1]. */
  confidence: number;
  strategy: MetricStrategy;
  sourceDocumentId: string;
  period: FiscalPeriod;
  /** Label as it appeared in the document. */
  label: string;
  /** Documents of the inputs, for derived metrics. */
  derivedFrom?: string[];
}

export interface QualitativeInsight {
  theme: string;
  /** Clamped to [-1, 1]. */
  sentiment: number;
  supportingQuote: string;
  confidence: number;
  /** Mean similarity of the theme's chunks to their centroid, [0, 1]. */
  cohesion: number;
  chunkCount: number;
  sourceDocumentId: string;
}

// ---------------------------------------------------------------------------
// Tool capabilities
// ---------------------------------------------------------------------------

export interface ExtractionTool {
  readonly kind: 'extract';
  readonly name: string;
  extract(document: SourceDocument, abortSignal?: AbortSignal): Promise<ExtractedMetric[]>;
}

export interface AnalysisTool {
  readonly kind: 'analyze';
  readonly name: string;
  analyze(document: SourceDocument, abortSignal?: AbortSignal): Promise<QualitativeInsight[]>;
}

/** The fixed tool handles a coordinator is built with. */
export interface ToolHandles {
  extractor: ExtractionTool;
  analyzer: AnalysisTool;
}

// ---------------------------------------------------------------------------
// Document fetch collaborator
// ---------------------------------------------------------------------------

export interface FetchQuery {
  sourceId: string;
  kind: DocumentKind;
  /** 0 = most recent quarter, 1 = the one before, ... */
  quarterOffset: number;
  ticker: string;
  abortSignal?: AbortSignal;
}

export type FetchOutcome =
  | { status: 'ok'; document: SourceDocument }
  | { status: 'unavailable'; reason: string };

export interface DocumentFetcher {
  fetch(query: FetchQuery): Promise<FetchOutcome>;
}

// ---------------------------------------------------------------------------
// Periods
// ---------------------------------------------------------------------------

export function periodOrdinal(period: FiscalPeriod): number {
  return period.fiscalYear * 4 + period.quarter;
}

export function comparePeriods(a: FiscalPeriod, b: FiscalPeriod): number {
  return periodOrdinal(a) - periodOrdinal(b);
}

export function formatPeriod(period: FiscalPeriod): string {
  return `FY${period.fiscalYear}-Q${period.quarter}`;
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(-1, value));
}
