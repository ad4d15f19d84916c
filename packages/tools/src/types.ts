/** Turns page images into a plain-text transcript. */
export interface OcrEngine {
  readonly name: string;
  recognize(images: readonly Uint8Array[], abortSignal?: AbortSignal): Promise<string>;
}

/** Maps texts to vectors of one fixed dimension, in input order. */
export interface Embedder {
  readonly name: string;
  embed(texts: readonly string[], abortSignal?: AbortSignal): Promise<number[][]>;
}

export interface AnalysisSettings {
  /** Word limit per transcript chunk. */
  maxWords: number;
  /** Trailing sentences repeated at the start of the next chunk. */
  overlapSentences: number;
  /** Minimum cosine similarity for a chunk to join a cluster. */
  similarityThreshold: number;
}

export const DEFAULT_ANALYSIS_SETTINGS: AnalysisSettings = {
  maxWords: 120,
  overlapSentences: 1,
  similarityThreshold: 0.35,
};
