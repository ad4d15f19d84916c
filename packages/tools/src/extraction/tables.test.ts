import { describe, it, expect } from 'vitest';
import { extractFromTables, stripHtml, tableRows } from './tables.js';
import { MetricVocabularyIndex } from './vocabulary.js';

const vocabulary = new MetricVocabularyIndex();

const MARKDOWN_TABLE = [
  '| Particulars | Q4 FY25 | Q3 FY25 |',
  '|---|---:|---:|',
  '| Revenue from operations | 64,259 | 63,973 |',
  '| Net profit | 12,224 | 12,380 |',
  '| Operating margin (%) | 24.2 | 24.5 |',
  '| EPS (₹) | 33.8 | 34.2 |',
].join('\n');

describe('tableRows', () => {
  it('splits pipe tables and drops separator rows', () => {
    expect(tableRows(MARKDOWN_TABLE).slice(0, 2)).toEqual([
      ['Particulars', 'Q4 FY25', 'Q3 FY25'],
      ['Revenue from operations', '64,259', '63,973'],
    ]);
  });

  it('reads whitespace-aligned columns', () => {
    expect(tableRows('Net profit      12,224     12,380')).toEqual([['Net profit', '12,224', '12,380']]);
  });

  it('reads HTML rows', () => {
    const html = '<table><tr><th>Metric</th><th>Value</th></tr><tr><td>Net Profit</td><td>&#8377; 12,224 Cr</td></tr></table>';
    expect(tableRows(html)).toEqual([
      ['Metric', 'Value'],
      ['Net Profit', '₹ 12,224 Cr'],
    ]);
  });

  it('leaves prose alone', () => {
    expect(tableRows('Revenue grew 8% to ₹ 64,259 crore.')).toEqual([]);
  });
});

describe('extractFromTables', () => {
  it('takes the first numeric cell of each metric row', () => {
    expect(extractFromTables(MARKDOWN_TABLE, vocabulary)).toEqual([
      { name: 'revenue', value: 64259, unit: 'INR_Cr', label: 'Revenue from operations', confidence: 0.95 },
      { name: 'net_profit', value: 12224, unit: 'INR_Cr', label: 'Net profit', confidence: 0.95 },
      { name: 'operating_margin', value: 24.2, unit: '%', label: 'Operating margin (%)', confidence: 0.95 },
      { name: 'eps', value: 33.8, unit: 'INR', label: 'EPS (₹)', confidence: 0.95 },
    ]);
  });

  it('lowers confidence when the value sits past the first numeric cell', () => {
    const [metric] = extractFromTables('| Revenue | 8.2% | 64,259 |', vocabulary);
    expect(metric).toEqual({ name: 'revenue', value: 64259, unit: 'INR_Cr', label: 'Revenue', confidence: 0.85 });
  });

  it('reads values that look like years', () => {
    const table = '| Metric | Q3 | Q2 |\n|---|---|---|\n| Revenue | 2045 | 1890 |';
    expect(extractFromTables(table, vocabulary)).toEqual([
      { name: 'revenue', value: 2045, unit: 'INR_Cr', label: 'Revenue', confidence: 0.95 },
    ]);
  });

  it('converts scaled amounts in HTML cells to crore', () => {
    const html = '<table><tr><td>Free cash flow</td><td>Rs 2,500 mn</td></tr></table>';
    expect(extractFromTables(html, vocabulary)).toEqual([
      { name: 'free_cash_flow', value: 250, unit: 'INR_Cr', label: 'Free cash flow', confidence: 0.95 },
    ]);
  });
});

describe('stripHtml', () => {
  it('removes tags and decodes entities', () => {
    expect(stripHtml('<p>Net&nbsp;profit &amp; EPS</p>').replace(/\s+/g, ' ').trim()).toBe('Net profit & EPS');
  });
});
