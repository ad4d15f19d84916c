import { describe, it, expect } from 'vitest';
import { extractFromText, linearize } from './text.js';
import { MetricVocabularyIndex } from './vocabulary.js';

const vocabulary = new MetricVocabularyIndex();

describe('linearize', () => {
  it('flattens markdown into one line', () => {
    expect(linearize('## Highlights\n\n**Net profit** rose\n| a | b |')).toBe('Highlights Net profit rose a b');
  });
});

describe('extractFromText', () => {
  it('pairs each label with the next value of the right kind', () => {
    const text = 'Revenue from operations grew 8.1% to ₹ 64,259 crore while net profit stood at ₹ 12,224 crore. ' +
      'Operating margin was 24.2%.';
    expect(extractFromText(text, vocabulary)).toEqual([
      { name: 'revenue', value: 64259, unit: 'INR_Cr', label: 'Revenue from operations', confidence: 0.75 },
      { name: 'net_profit', value: 12224, unit: 'INR_Cr', label: 'net profit', confidence: 0.75 },
      { name: 'operating_margin', value: 24.2, unit: '%', label: 'Operating margin', confidence: 0.75 },
    ]);
  });

  it('stops the search window at the next label', () => {
    const text = 'Revenue and net profit were ₹ 100 crore.';
    expect(extractFromText(text, vocabulary).map(m => [m.name, m.value])).toEqual([['net_profit', 100]]);
  });

  it('reads headcount in lakh and negative cash flow', () => {
    const text = 'Headcount stood at 6.07 lakh. Free cash flow (₹ crore): (1,250).';
    expect(extractFromText(text, vocabulary).map(m => [m.name, m.value, m.unit])).toEqual([
      ['headcount', 607000, 'count'],
      ['free_cash_flow', -1250, 'INR_Cr'],
    ]);
  });

  it('prefers a marked amount over a date before it', () => {
    const text = 'Revenue for the quarter ended December 31, 2024 was ₹63,973 crore.';
    expect(extractFromText(text, vocabulary)).toEqual([
      { name: 'revenue', value: 63973, unit: 'INR_Cr', label: 'Revenue', confidence: 0.75 },
    ]);
  });

  it('ignores labels with no value nearby', () => {
    expect(extractFromText(`Revenue ${'commentary '.repeat(20)}₹ 100 crore`, vocabulary)).toEqual([]);
  });
});
