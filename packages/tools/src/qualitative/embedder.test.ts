import { describe, it, expect, vi } from 'vitest';
import { embedMany } from 'ai';
import { cosine, HashingEmbedder, HASHING_DIMENSIONS, ModelEmbedder, normalize } from './embedder.js';

vi.mock('ai', async importOriginal => ({
  ...(await importOriginal<typeof import('ai')>()),
  embedMany: vi.fn(),
}));

describe('HashingEmbedder', () => {
  const embedder = new HashingEmbedder();

  it('produces unit vectors of the configured size', async () => {
    const [vector] = await embedder.embed(['Deal wins were strong across verticals']);
    expect(vector).toHaveLength(HASHING_DIMENSIONS);
    expect(Math.hypot(...(vector ?? []))).toBeCloseTo(1, 10);
  });

  it('is deterministic and ignores stopwords and case', async () => {
    const [a, b] = await embedder.embed(['Strong deal pipeline', 'the STRONG deal pipeline, we think']);
    expect(a).toEqual(b);
  });

  it('maps text without content words to the zero vector', () => {
    expect(embedder.vectorize('and the of').every(x => x === 0)).toBe(true);
  });
});

describe('ModelEmbedder', () => {
  it('normalizes the vectors the model returns', async () => {
    vi.mocked(embedMany).mockResolvedValueOnce({
      values: ['a', 'b'],
      embeddings: [[3, 4], [0, 2]],
      usage: { tokens: 2 },
    } as unknown as Awaited<ReturnType<typeof embedMany>>);

    const embedder = new ModelEmbedder('text-embedding-3-small', 'openai:text-embedding-3-small');
    expect(await embedder.embed(['a', 'b'])).toEqual([[0.6, 0.8], [0, 1]]);
  });

  it('skips the call for an empty batch', async () => {
    vi.mocked(embedMany).mockClear();
    const embedder = new ModelEmbedder('text-embedding-3-small', 'openai:text-embedding-3-small');
    expect(await embedder.embed([])).toEqual([]);
    expect(embedMany).not.toHaveBeenCalled();
  });
});

describe('vector helpers', () => {
  it('computes cosine similarity', () => {
    expect(cosine([1, 0], [0, 1])).toBe(0);
    expect(cosine([2, 0], [5, 0])).toBe(1);
    expect(cosine([0, 0], [1, 1])).toBe(0);
  });

  it('leaves the zero vector alone when normalizing', () => {
    expect(normalize([0, 0])).toEqual([0, 0]);
    expect(normalize([3, 4])).toEqual([0.6, 0.8]);
  });
});
