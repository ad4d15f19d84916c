import { describe, it, expect, vi } from 'vitest';
import type { SourceDocument } from '@forecastr/core';
import { QualitativePipeline } from './pipeline.js';
import type { Embedder } from '../types.js';

/** Two-topic embedder: margin talk on one axis, deal talk on the other. */
const topicEmbedder: Embedder = {
  name: 'topics',
  async embed(texts) {
    return texts.map(t => [/margin/i.test(t) ? 1 : 0, /deal/i.test(t) ? 1 : 0]);
  },
};

const TRANSCRIPT = [
  'Margins expanded on better pricing.',
  'Margin pressure from wages remains a concern.',
  'Deal wins were strong this quarter.',
  'Margins should improve next year.',
].join(' ');

const SETTINGS = { maxWords: 7, overlapSentences: 0 };

function transcript(overrides: Partial<SourceDocument> = {}): SourceDocument {
  return {
    id: 'tcs-q4-call',
    kind: 'transcript',
    sourceId: 'company-ir',
    period: { fiscalYear: 2025, quarter: 4 },
    format: 'text',
    content: { text: TRANSCRIPT },
    ...overrides,
  };
}

describe('QualitativePipeline', () => {
  it('turns each cluster into an insight ordered by confidence', async () => {
    const pipeline = new QualitativePipeline({ embedder: topicEmbedder, settings: SETTINGS });
    const insights = await pipeline.analyze(transcript());

    expect(insights.map(i => [i.theme, i.chunkCount, i.supportingQuote, i.sourceDocumentId])).toEqual([
      ['Margins', 3, 'Margins expanded on better pricing.', 'tcs-q4-call'],
      ['Deal pipeline', 1, 'Deal wins were strong this quarter.', 'tcs-q4-call'],
    ]);
    expect(insights[0]?.sentiment).toBeCloseTo(1 / 3, 10);
    expect(insights[0]?.cohesion).toBe(1);
    expect(insights[0]?.confidence).toBeCloseTo(1 - Math.exp(-1), 10);
    expect(insights[1]?.sentiment).toBe(1);
    expect(insights[1]?.confidence).toBeCloseTo(1 - Math.exp(-1 / 3), 10);
  });

  it('uses the default settings and the hashing embedder', () => {
    const pipeline = new QualitativePipeline();
    expect(pipeline.settings).toEqual({ maxWords: 120, overlapSentences: 1, similarityThreshold: 0.35 });
  });

  it('reads image-only transcripts through OCR', async () => {
    const ocr = { name: 'fake-ocr', recognize: vi.fn(async () => TRANSCRIPT) };
    const pipeline = new QualitativePipeline({ embedder: topicEmbedder, ocr, settings: SETTINGS });
    const scanned = transcript({ format: 'image', content: { images: [new Uint8Array([7])] } });

    const insights = await pipeline.analyze(scanned);
    expect(insights.map(i => i.theme)).toEqual(['Margins', 'Deal pipeline']);
    expect(ocr.recognize).toHaveBeenCalledTimes(1);
  });

  it('yields nothing for an image-only transcript without OCR', async () => {
    const pipeline = new QualitativePipeline({ embedder: topicEmbedder });
    const scanned = transcript({ format: 'image', content: { images: [new Uint8Array([7])] } });
    expect(await pipeline.analyze(scanned)).toEqual([]);
  });

  it('rejects an embedder that drops vectors', async () => {
    const short: Embedder = { name: 'short', embed: async () => [] };
    const pipeline = new QualitativePipeline({ embedder: short, settings: SETTINGS });
    await expect(pipeline.analyzeText(TRANSCRIPT, 'doc')).rejects.toThrow('Embedder short returned 0 vectors for 4 chunks');
  });
});
