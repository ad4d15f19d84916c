import type { ToolHandles } from '@forecastr/core';
import { ExtractionChain } from './extraction/chain.js';
import { MetricVocabularyIndex } from './extraction/vocabulary.js';
import { QualitativePipeline } from './qualitative/pipeline.js';
import type { AnalysisSettings, Embedder, OcrEngine } from './types.js';

export interface ToolHandleOptions {
  /** Shared by extraction and analysis for image-based documents. */
  ocr?: OcrEngine;
  /** Defaults to the local hashing embedder. */
  embedder?: Embedder;
  settings?: Partial<AnalysisSettings>;
  vocabulary?: MetricVocabularyIndex;
}

/** Builds the extraction and analysis handles a coordinator runs with. */
export function createToolHandles(options: ToolHandleOptions = {}): ToolHandles {
  return {
    extractor: new ExtractionChain({ ocr: options.ocr, vocabulary: options.vocabulary }),
    analyzer: new QualitativePipeline({
      ocr: options.ocr,
      embedder: options.embedder,
      settings: options.settings,
    }),
  };
}
