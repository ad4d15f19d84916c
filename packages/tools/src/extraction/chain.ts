import {
  clamp01,
  getLogger,
  isImageBased,
  type ExtractedMetric,
  type ExtractionStrategyName,
  type ExtractionTool,
  type SourceDocument,
} from '@forecastr/core';
import type { OcrEngine } from '../types.js';
import { extractFromTables, TABLE_CEILING, type MetricCandidate } from './tables.js';
import { extractFromText } from './text.js';
import { MetricVocabularyIndex } from './vocabulary.js';

const log = getLogger('extraction');

export const OCR_CEILING = 0.6;

type TextStrategy = (text: string, vocabulary: MetricVocabularyIndex) => MetricCandidate[];

const TEXT_STRATEGIES: ReadonlyArray<[ExtractionStrategyName, TextStrategy]> = [
  ['table', extractFromTables],
  ['text', extractFromText],
];

export interface ExtractionChainOptions {
  /** Used for image-based documents only. Without one they yield nothing. */
  ocr?: OcrEngine;
  vocabulary?: MetricVocabularyIndex;
}

/**
 * Table, then text, then OCR. The first strategy that yields anything
 * decides the document's metrics; within it the first occurrence of each
 * metric wins. Never throws: a document nothing can be read from gives [].
 */
export class ExtractionChain implements ExtractionTool {
  readonly kind = 'extract' as const;
  readonly name = 'extraction-chain';
  private readonly vocabulary: MetricVocabularyIndex;

  constructor(private readonly options: ExtractionChainOptions = {}) {
    this.vocabulary = options.vocabulary ?? new MetricVocabularyIndex();
  }

  async extract(document: SourceDocument, abortSignal?: AbortSignal): Promise<ExtractedMetric[]> {
    if (!isImageBased(document)) {
      const text = document.content.text ?? '';
      for (const [strategy, run] of TEXT_STRATEGIES) {
        const candidates = this.attempt(document, strategy, () => run(text, this.vocabulary));
        if (candidates.length > 0) return toMetrics(document, strategy, candidates);
      }
      return [];
    }

    const transcript = await this.recognize(document, abortSignal);
    if (!transcript) return [];

    // Same strategies over the OCR text, scaled under the OCR ceiling.
    const scale = OCR_CEILING / TABLE_CEILING;
    for (const [strategy, run] of TEXT_STRATEGIES) {
      const candidates = this.attempt(document, strategy, () => run(transcript, this.vocabulary));
      if (candidates.length > 0) {
        return toMetrics(document, 'ocr', candidates.map(c => ({
          ...c,
          confidence: Math.min(OCR_CEILING, Math.round(c.confidence * scale * 100) / 100),
        })));
      }
    }
    return [];
  }

  private attempt(
    document: SourceDocument,
    strategy: ExtractionStrategyName,
    run: () => MetricCandidate[],
  ): MetricCandidate[] {
    try {
      return run();
    } catch (error) {
      log.warn({ err: error, documentId: document.id, strategy }, 'Extraction strategy failed');
      return [];
    }
  }

  private async recognize(document: SourceDocument, abortSignal?: AbortSignal): Promise<string | undefined> {
    const images = document.content.images ?? [];
    if (!this.options.ocr || images.length === 0) {
      log.debug({ documentId: document.id }, 'Image-based document without OCR input');
      return undefined;
    }
    try {
      const text = await this.options.ocr.recognize(images, abortSignal);
      return text.trim() || undefined;
    } catch (error) {
      log.warn({ err: error, documentId: document.id, engine: this.options.ocr.name }, 'OCR failed');
      return undefined;
    }
  }
}

function toMetrics(
  document: SourceDocument,
  strategy: ExtractionStrategyName,
  candidates: readonly MetricCandidate[],
): ExtractedMetric[] {
  const seen = new Set<string>();
  const metrics: ExtractedMetric[] = [];
  for (const candidate of candidates) {
    if (seen.has(candidate.name)) continue;
    seen.add(candidate.name);
    metrics.push({
      name: candidate.name,
      value: candidate.value,
      unit: candidate.unit,
      confidence: clamp01(candidate.confidence),
      strategy,
      sourceDocumentId: document.id,
      period: document.period,
      label: candidate.label,
    });
  }
  return metrics;
}
