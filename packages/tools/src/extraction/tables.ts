import { parseCell } from './numbers.js';
import { acceptsToken, normalizeValue, unitFor, type MetricVocabularyIndex } from './vocabulary.js';

export interface MetricCandidate {
  name: string;
  value: number;
  unit: string;
  label: string;
  confidence: number;
}

export const TABLE_CEILING = 0.95;
/** Charged when the value is not the first numeric cell after the label. */
const LATER_CELL_PENALTY = 0.1;
const LATER_CELL_CONFIDENCE = Math.round((TABLE_CEILING - LATER_CELL_PENALTY) * 100) / 100;

const HTML_ROW = /<tr\b[^>]*>([\s\S]*?)<\/tr>/gi;
const HTML_CELL = /<t[hd]\b[^>]*>([\s\S]*?)<\/t[hd]>/gi;
const SEPARATOR_CELL = /^:?-{2,}:?$/;

const ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&#8377;': '₹',
  '&#x20b9;': '₹',
  '&quot;': '"',
  '&#39;': "'",
};

export function stripHtml(html: string): string {
  return html
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<br\s*\/?>|<\/(p|div|li|tr|h[1-6])>/gi, '\n')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&#?\w+;/g, entity => ENTITIES[entity.toLowerCase()] ?? ' ');
}

function cleanCell(cell: string): string {
  return stripHtml(cell).replace(/\s+/g, ' ').trim();
}

/**
 * Rows of every table in `text`: HTML `<table>` rows, markdown pipe rows
 * and whitespace-aligned columns (two or more spaces or a tab apart).
 */
export function tableRows(text: string): string[][] {
  const rows: string[][] = [];

  for (const row of text.matchAll(HTML_ROW)) {
    const cells = [...(row[1] ?? '').matchAll(HTML_CELL)].map(cell => cleanCell(cell[1] ?? ''));
    if (cells.length > 1) rows.push(cells);
  }

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.includes('<')) continue;

    if (trimmed.startsWith('|') || (trimmed.match(/\|/g)?.length ?? 0) >= 2) {
      const cells = trimmed.replace(/^\||\|$/g, '').split('|').map(c => c.trim());
      if (cells.every(c => SEPARATOR_CELL.test(c) || c === '')) continue;
      if (cells.length > 1) rows.push(cells);
      continue;
    }

    const columns = trimmed.split(/\t+|\s{2,}/).map(c => c.trim()).filter(Boolean);
    if (columns.length > 1) rows.push(columns);
  }

  return rows;
}

/**
 * Metrics from table rows. A row counts when one of its cells names a
 * vocabulary metric and a later cell in the same row parses as a value of
 * the right kind.
 */
export function extractFromTables(text: string, vocabulary: MetricVocabularyIndex): MetricCandidate[] {
  const candidates: MetricCandidate[] = [];

  for (const cells of tableRows(text)) {
    const labelIndex = cells.findIndex(cell => /[a-z]/i.test(cell) && vocabulary.matchLabel(cell) !== undefined);
    if (labelIndex < 0) continue;
    const label = cells[labelIndex] ?? '';
    const metric = vocabulary.matchLabel(label);
    if (!metric) continue;

    let numericCellsSeen = 0;
    for (const cell of cells.slice(labelIndex + 1)) {
      const token = parseCell(cell);
      if (!token) continue;
      numericCellsSeen++;
      if (!acceptsToken(metric.kind, token, true)) continue;

      candidates.push({
        name: metric.name,
        value: normalizeValue(metric.kind, token),
        unit: unitFor(metric.kind),
        label,
        confidence: numericCellsSeen === 1 ? TABLE_CEILING : LATER_CELL_CONFIDENCE,
      });
      break;
    }
  }

  return candidates;
}
