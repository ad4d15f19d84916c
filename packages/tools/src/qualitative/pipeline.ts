import {
  getLogger,
  isImageBased,
  type AnalysisTool,
  type QualitativeInsight,
  type SourceDocument,
} from '@forecastr/core';
import { stripHtml } from '../extraction/tables.js';
import { DEFAULT_ANALYSIS_SETTINGS, type AnalysisSettings, type Embedder, type OcrEngine } from '../types.js';
import { chunkTranscript } from './chunker.js';
import { clusterChunks } from './cluster.js';
import { HashingEmbedder } from './embedder.js';
import { defaultScoringResources, scoreCluster, type ScoringResources } from './score.js';

const log = getLogger('qualitative');

export interface QualitativePipelineOptions {
  embedder?: Embedder;
  /** Reads image-only transcripts. Without one they yield nothing. */
  ocr?: OcrEngine;
  settings?: Partial<AnalysisSettings>;
  resources?: ScoringResources;
}

/**
 * Chunk, embed, cluster, score. One insight per cluster, ordered by
 * confidence and then by where the cluster first appears.
 */
export class QualitativePipeline implements AnalysisTool {
  readonly kind = 'analyze' as const;
  readonly name = 'qualitative-pipeline';
  readonly settings: AnalysisSettings;
  private readonly embedder: Embedder;

  constructor(private readonly options: QualitativePipelineOptions = {}) {
    this.settings = { ...DEFAULT_ANALYSIS_SETTINGS, ...options.settings };
    this.embedder = options.embedder ?? new HashingEmbedder();
  }

  async analyze(document: SourceDocument, abortSignal?: AbortSignal): Promise<QualitativeInsight[]> {
    const text = isImageBased(document)
      ? await this.recognize(document, abortSignal)
      : document.format === 'html' ? stripHtml(document.content.text ?? '') : document.content.text;
    if (!text?.trim()) return [];
    return this.analyzeText(text, document.id, abortSignal);
  }

  async analyzeText(text: string, documentId: string, abortSignal?: AbortSignal): Promise<QualitativeInsight[]> {
    const chunks = chunkTranscript(text, this.settings);
    if (chunks.length === 0) return [];

    const embeddings = await this.embedder.embed(chunks.map(c => c.text), abortSignal);
    if (embeddings.length !== chunks.length) {
      throw new Error(`Embedder ${this.embedder.name} returned ${embeddings.length} vectors for ${chunks.length} chunks`);
    }

    const resources = this.options.resources ?? defaultScoringResources();
    const clusters = clusterChunks(embeddings, this.settings.similarityThreshold);
    const scored = clusters
      .map(cluster => scoreCluster(cluster, chunks, embeddings, resources))
      .sort((a, b) => b.confidence - a.confidence || a.firstChunk - b.firstChunk);

    log.debug({ documentId, chunks: chunks.length, clusters: clusters.length }, 'Transcript analyzed');

    return scored.map(s => ({
      theme: s.theme,
      sentiment: s.sentiment,
      supportingQuote: s.supportingQuote,
      confidence: s.confidence,
      cohesion: s.cohesion,
      chunkCount: s.chunkCount,
      sourceDocumentId: documentId,
    }));
  }

  private async recognize(document: SourceDocument, abortSignal?: AbortSignal): Promise<string | undefined> {
    const images = document.content.images ?? [];
    if (!this.options.ocr || images.length === 0) {
      log.debug({ documentId: document.id }, 'Image-only transcript without OCR input');
      return undefined;
    }
    return this.options.ocr.recognize(images, abortSignal);
  }
}
