import { createHash } from 'node:crypto';
import { embedMany, type EmbeddingModel } from 'ai';
import type { Embedder } from '../types.js';
import { contentWords } from './tokens.js';

export const HASHING_DIMENSIONS = 256;

/**
 * Feature-hashed bag of words: each content word adds ±1 to one of
 * `dimensions` slots picked from its SHA-256 digest. L2-normalized; texts
 * without content words map to the zero vector. Deterministic and offline.
 */
export class HashingEmbedder implements Embedder {
  readonly name = 'hashing';
  private readonly slots = new Map<string, { index: number; sign: number }>();

  constructor(private readonly dimensions: number = HASHING_DIMENSIONS) {}

  async embed(texts: readonly string[]): Promise<number[][]> {
    return texts.map(text => this.vectorize(text));
  }

  vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const word of contentWords(text)) {
      const { index, sign } = this.slotFor(word);
      vector[index] = (vector[index] ?? 0) + sign;
    }
    return normalize(vector);
  }

  private slotFor(word: string): { index: number; sign: number } {
    let slot = this.slots.get(word);
    if (!slot) {
      const digest = createHash('sha256').update(word).digest();
      slot = {
        index: digest.readUInt32BE(0) % this.dimensions,
        sign: (digest[4] ?? 0) & 1 ? -1 : 1,
      };
      this.slots.set(word, slot);
    }
    return slot;
  }
}

/** Hosted embedding model through the AI SDK. */
export class ModelEmbedder implements Embedder {
  constructor(
    private readonly model: EmbeddingModel<string>,
    readonly name: string,
  ) {}

  async embed(texts: readonly string[], abortSignal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    const { embeddings } = await embedMany({
      model: this.model,
      values: [...texts],
      abortSignal,
      maxRetries: 2,
    });
    return embeddings.map(normalize);
  }
}

export function normalize(vector: readonly number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, x) => sum + x * x, 0));
  return norm === 0 ? [...vector] : vector.map(x => x / norm);
}

/** Cosine similarity; 0 when either vector is zero. */
export function cosine(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return na === 0 || nb === 0 ? 0 : dot / Math.sqrt(na * nb);
}
