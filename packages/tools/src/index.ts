export {
  type OcrEngine,
  type Embedder,
  type AnalysisSettings,
  DEFAULT_ANALYSIS_SETTINGS,
} from './types.js';

export { createToolHandles, type ToolHandleOptions } from './registry.js';

export { ExtractionChain, OCR_CEILING, type ExtractionChainOptions } from './extraction/chain.js';
export { MetricVocabularyIndex, normalizeLabel } from './extraction/vocabulary.js';
export { TABLE_CEILING } from './extraction/tables.js';
export { TEXT_CEILING } from './extraction/text.js';

export { QualitativePipeline, type QualitativePipelineOptions } from './qualitative/pipeline.js';
export { HashingEmbedder, ModelEmbedder, cosine } from './qualitative/embedder.js';
export { chunkTranscript, type TranscriptChunk } from './qualitative/chunker.js';

export { ModelOcrEngine, type ModelOcrEngineOptions } from './ocr/engine.js';

export { ManifestDocumentFetcher, type ManifestFetcherOptions } from './documents/fetcher.js';
export { ManifestError, loadManifest, parseManifest, type Manifest, type ManifestEntry } from './documents/manifest.js';

export { fetchWithRetry, HttpStatusError, type FetchRetryConfig } from './retry.js';
